import { NotFoundError, SlotUnavailableError, ValidationError } from "@/lib/errors";
import type { Appointment, AvailabilitySlot, Patient, ReminderTicket } from "@/types";

import {
  APPOINTMENT_ID_PREFIX,
  PATIENT_ID_PREFIX,
  nextSequentialId,
  slotIdOf,
  slotKey,
  type AppointmentFilter,
  type AppointmentPatch,
  type PatientPatch,
  type RecordStore,
  type ReminderTicketFilter,
  type ReminderTicketPatch,
  type SlotFilter,
} from "./types";

export type TableName = "patients" | "availability" | "appointments" | "reminderTickets";

export interface StoreSnapshot {
  patients: Patient[];
  availability: AvailabilitySlot[];
  appointments: Appointment[];
  reminderTickets: ReminderTicket[];
}

function compareSlots(a: AvailabilitySlot, b: AvailabilitySlot): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.time !== b.time) return a.time < b.time ? -1 : 1;
  if (a.doctorId !== b.doctorId) return a.doctorId < b.doctorId ? -1 : 1;
  return 0;
}

function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Map-backed record store. Rows are copied on the way in and out so
 * callers never hold a live reference into a table.
 *
 * Subclasses persist elsewhere by overriding `persist`, which runs after
 * every mutation with the name of the table that changed. A slot claim or
 * appointment insert whose write fails is undone in memory.
 */
export class InMemoryRecordStore implements RecordStore {
  protected patients = new Map<string, Patient>();
  protected slots = new Map<string, AvailabilitySlot>();
  protected appointments = new Map<string, Appointment>();
  protected reminderTickets = new Map<string, ReminderTicket>();

  constructor(snapshot?: Partial<StoreSnapshot>) {
    if (snapshot) this.load(snapshot);
  }

  protected load(snapshot: Partial<StoreSnapshot>): void {
    for (const p of snapshot.patients ?? []) this.patients.set(p.id, { ...p });
    for (const s of snapshot.availability ?? []) {
      this.slots.set(slotKey(s.doctorId, slotIdOf(s)), { ...s });
    }
    for (const a of snapshot.appointments ?? []) {
      this.appointments.set(a.id, { ...a, slotIds: [...a.slotIds] });
    }
    for (const t of snapshot.reminderTickets ?? []) {
      this.reminderTickets.set(t.appointmentId, { ...t });
    }
  }

  snapshot(): StoreSnapshot {
    return {
      patients: [...this.patients.values()].map((p) => ({ ...p })),
      availability: [...this.slots.values()].sort(compareSlots).map((s) => ({ ...s })),
      appointments: [...this.appointments.values()].map((a) => ({
        ...a,
        slotIds: [...a.slotIds],
      })),
      reminderTickets: [...this.reminderTickets.values()].map((t) => ({ ...t })),
    };
  }

  protected async persist(_table: TableName): Promise<void> {
    // In-memory tables need no flush
  }

  // ── Patients ──

  async getPatient(id: string): Promise<Patient | null> {
    const row = this.patients.get(id);
    return row ? { ...row } : null;
  }

  async listPatients(): Promise<Patient[]> {
    return [...this.patients.values()].map((p) => ({ ...p }));
  }

  async insertPatient(patient: Patient): Promise<Patient> {
    if (this.patients.has(patient.id)) {
      throw new ValidationError(`Patient ${patient.id} already exists`);
    }
    this.patients.set(patient.id, { ...patient });
    await this.persist("patients");
    return { ...patient };
  }

  async updatePatient(id: string, patch: PatientPatch): Promise<Patient> {
    const existing = this.patients.get(id);
    if (!existing) throw new NotFoundError("Patient", id);
    const updated: Patient = { ...existing, ...patch, id, updatedAt: nowIso() };
    this.patients.set(id, updated);
    await this.persist("patients");
    return { ...updated };
  }

  async nextPatientId(): Promise<string> {
    return nextSequentialId(this.patients.keys(), PATIENT_ID_PREFIX);
  }

  // ── Availability ──

  async listSlots(filter: SlotFilter = {}): Promise<AvailabilitySlot[]> {
    return [...this.slots.values()]
      .filter((s) => !filter.doctorId || s.doctorId === filter.doctorId)
      .filter((s) => !filter.from || s.date >= filter.from)
      .filter((s) => !filter.to || s.date <= filter.to)
      .sort(compareSlots)
      .map((s) => ({ ...s }));
  }

  async getSlot(doctorId: string, slotId: string): Promise<AvailabilitySlot | null> {
    const row = this.slots.get(slotKey(doctorId, slotId));
    return row ? { ...row } : null;
  }

  async upsertSlots(slots: AvailabilitySlot[]): Promise<void> {
    for (const s of slots) {
      this.slots.set(slotKey(s.doctorId, slotIdOf(s)), { ...s });
    }
    await this.persist("availability");
  }

  async listDoctorIds(): Promise<string[]> {
    const ids = new Set<string>();
    for (const s of this.slots.values()) ids.add(s.doctorId);
    return [...ids].sort();
  }

  async claimSlots(doctorId: string, slotIds: string[], appointmentId: string): Promise<void> {
    // Verify every slot before touching any of them
    const rows: AvailabilitySlot[] = [];
    for (const slotId of slotIds) {
      const row = this.slots.get(slotKey(doctorId, slotId));
      if (!row) throw new NotFoundError("Slot", `${doctorId}/${slotId}`);
      if (row.appointmentId !== null) throw new SlotUnavailableError(doctorId, slotId);
      rows.push(row);
    }
    for (const row of rows) row.appointmentId = appointmentId;
    try {
      await this.persist("availability");
    } catch (err) {
      for (const row of rows) row.appointmentId = null;
      throw err;
    }
  }

  async releaseSlots(doctorId: string, slotIds: string[], appointmentId: string): Promise<void> {
    for (const slotId of slotIds) {
      const row = this.slots.get(slotKey(doctorId, slotId));
      if (row && row.appointmentId === appointmentId) row.appointmentId = null;
    }
    await this.persist("availability");
  }

  // ── Appointments ──

  async getAppointment(id: string): Promise<Appointment | null> {
    const row = this.appointments.get(id);
    return row ? { ...row, slotIds: [...row.slotIds] } : null;
  }

  async listAppointments(filter: AppointmentFilter = {}): Promise<Appointment[]> {
    return [...this.appointments.values()]
      .filter((a) => !filter.patientId || a.patientId === filter.patientId)
      .filter((a) => !filter.doctorId || a.doctorId === filter.doctorId)
      .filter((a) => !filter.statuses || filter.statuses.includes(a.status))
      .map((a) => ({ ...a, slotIds: [...a.slotIds] }));
  }

  async insertAppointment(appointment: Appointment): Promise<Appointment> {
    if (this.appointments.has(appointment.id)) {
      throw new ValidationError(`Appointment ${appointment.id} already exists`);
    }
    this.appointments.set(appointment.id, {
      ...appointment,
      slotIds: [...appointment.slotIds],
    });
    try {
      await this.persist("appointments");
    } catch (err) {
      this.appointments.delete(appointment.id);
      throw err;
    }
    return { ...appointment, slotIds: [...appointment.slotIds] };
  }

  async updateAppointment(id: string, patch: AppointmentPatch): Promise<Appointment> {
    const existing = this.appointments.get(id);
    if (!existing) throw new NotFoundError("Appointment", id);
    const updated: Appointment = {
      ...existing,
      ...patch,
      id,
      slotIds: [...(patch.slotIds ?? existing.slotIds)],
      updatedAt: nowIso(),
    };
    this.appointments.set(id, updated);
    await this.persist("appointments");
    return { ...updated, slotIds: [...updated.slotIds] };
  }

  async nextAppointmentId(): Promise<string> {
    return nextSequentialId(this.appointments.keys(), APPOINTMENT_ID_PREFIX);
  }

  // ── Reminder tickets ──

  async getReminderTicket(appointmentId: string): Promise<ReminderTicket | null> {
    const row = this.reminderTickets.get(appointmentId);
    return row ? { ...row } : null;
  }

  async listReminderTickets(filter: ReminderTicketFilter = {}): Promise<ReminderTicket[]> {
    return [...this.reminderTickets.values()]
      .filter((t) => !filter.statuses || filter.statuses.includes(t.status))
      .map((t) => ({ ...t }));
  }

  async insertReminderTicket(ticket: ReminderTicket): Promise<ReminderTicket> {
    if (this.reminderTickets.has(ticket.appointmentId)) {
      throw new ValidationError(`Reminder ticket for ${ticket.appointmentId} already exists`);
    }
    this.reminderTickets.set(ticket.appointmentId, { ...ticket });
    await this.persist("reminderTickets");
    return { ...ticket };
  }

  async updateReminderTicket(
    appointmentId: string,
    patch: ReminderTicketPatch,
  ): Promise<ReminderTicket> {
    const existing = this.reminderTickets.get(appointmentId);
    if (!existing) throw new NotFoundError("Reminder ticket", appointmentId);
    const updated: ReminderTicket = {
      ...existing,
      ...patch,
      appointmentId,
      updatedAt: nowIso(),
    };
    this.reminderTickets.set(appointmentId, updated);
    await this.persist("reminderTickets");
    return { ...updated };
  }
}
