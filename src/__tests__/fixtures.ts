import type { Appointment, AvailabilitySlot, Patient, ReminderTicket } from "@/types";

const CREATED = "2024-05-01T12:00:00.000Z";

export function makePatient(overrides: Partial<Patient> = {}): Patient {
  return {
    id: "P-1",
    name: "Ana Smith",
    dateOfBirth: "1985-03-12",
    email: "ana.smith@example.com",
    phone: "555-123-4567",
    insuranceCarrier: null,
    memberId: null,
    groupNumber: null,
    doctorPreference: null,
    location: null,
    patientType: "returning",
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}

export function makeSlots(
  doctorId: string,
  date: string,
  times: string[],
  appointmentId: string | null = null,
): AvailabilitySlot[] {
  return times.map((time) => ({ doctorId, date, time, appointmentId }));
}

export function makeAppointment(overrides: Partial<Appointment> = {}): Appointment {
  return {
    id: "A-1",
    patientId: "P-1",
    doctorId: "Dr. Smith",
    date: "2024-06-04",
    startTime: "09:00",
    endTime: "09:30",
    durationMinutes: 30,
    slotIds: ["2024-06-04T09:00"],
    status: "scheduled",
    insuranceVerified: false,
    formsSent: false,
    formsCompleted: false,
    cancellationReason: null,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}

export function makeTicket(overrides: Partial<ReminderTicket> = {}): ReminderTicket {
  return {
    appointmentId: "A-1",
    level: 0,
    sentCount: 0,
    lastSentAt: null,
    acknowledged: false,
    failedAttempts: 0,
    status: "active",
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}
