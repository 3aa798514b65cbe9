import type {
  Appointment,
  AppointmentStatus,
  AvailabilitySlot,
  Patient,
  ReminderTicket,
  ReminderTicketStatus,
} from "@/types";

// ── Filters ──

export interface SlotFilter {
  doctorId?: string;
  from?: string; // YYYY-MM-DD, inclusive
  to?: string; // YYYY-MM-DD, inclusive
}

export interface AppointmentFilter {
  patientId?: string;
  doctorId?: string;
  statuses?: AppointmentStatus[];
}

export interface ReminderTicketFilter {
  statuses?: ReminderTicketStatus[];
}

export type PatientPatch = Partial<Omit<Patient, "id" | "createdAt">>;
export type AppointmentPatch = Partial<Omit<Appointment, "id" | "createdAt">>;
export type ReminderTicketPatch = Partial<
  Omit<ReminderTicket, "appointmentId" | "createdAt">
>;

// ── Record Store ──

/**
 * Single writer of truth for patients, availability, appointments and
 * reminder tickets. Every implementation guarantees read-after-write
 * consistency and unique primary keys.
 */
export interface RecordStore {
  // Patients
  getPatient(id: string): Promise<Patient | null>;
  listPatients(): Promise<Patient[]>;
  insertPatient(patient: Patient): Promise<Patient>;
  updatePatient(id: string, patch: PatientPatch): Promise<Patient>;
  nextPatientId(): Promise<string>;

  // Availability
  listSlots(filter?: SlotFilter): Promise<AvailabilitySlot[]>;
  getSlot(doctorId: string, slotId: string): Promise<AvailabilitySlot | null>;
  upsertSlots(slots: AvailabilitySlot[]): Promise<void>;
  listDoctorIds(): Promise<string[]>;
  /**
   * Occupies every listed slot for the appointment, re-checking at write
   * time that each exists and is free. All-or-nothing.
   */
  claimSlots(doctorId: string, slotIds: string[], appointmentId: string): Promise<void>;
  /** Frees the listed slots that are held by the appointment. */
  releaseSlots(doctorId: string, slotIds: string[], appointmentId: string): Promise<void>;

  // Appointments
  getAppointment(id: string): Promise<Appointment | null>;
  listAppointments(filter?: AppointmentFilter): Promise<Appointment[]>;
  insertAppointment(appointment: Appointment): Promise<Appointment>;
  updateAppointment(id: string, patch: AppointmentPatch): Promise<Appointment>;
  nextAppointmentId(): Promise<string>;

  // Reminder tickets
  getReminderTicket(appointmentId: string): Promise<ReminderTicket | null>;
  listReminderTickets(filter?: ReminderTicketFilter): Promise<ReminderTicket[]>;
  insertReminderTicket(ticket: ReminderTicket): Promise<ReminderTicket>;
  updateReminderTicket(
    appointmentId: string,
    patch: ReminderTicketPatch,
  ): Promise<ReminderTicket>;
}

export function slotIdOf(slot: Pick<AvailabilitySlot, "date" | "time">): string {
  return `${slot.date}T${slot.time}`;
}

export function slotKey(doctorId: string, slotId: string): string {
  return `${doctorId}|${slotId}`;
}

export const PATIENT_ID_PREFIX = "P-";
export const APPOINTMENT_ID_PREFIX = "A-";

/** Sequential id: highest numeric suffix among existing ids, plus one. */
export function nextSequentialId(existing: Iterable<string>, prefix: string): string {
  let max = 0;
  for (const id of existing) {
    const suffix = id.startsWith(prefix) ? id.slice(prefix.length) : id;
    const n = Number(suffix);
    if (Number.isInteger(n) && n > max) max = n;
  }
  return `${prefix}${max + 1}`;
}
