import { z } from "zod";

export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
export const TIME_PATTERN = /^([01]\d|2[0-3]):[0-5]\d$/;

export const dateString = z.string().regex(DATE_PATTERN, "Must be YYYY-MM-DD format");
export const timeString = z.string().regex(TIME_PATTERN, "Must be HH:MM format");

export const PATIENT_TYPES = ["new", "returning"] as const;
export const APPOINTMENT_STATUSES = [
  "scheduled",
  "confirmed",
  "completed",
  "cancelled",
] as const;
export const REMINDER_TICKET_STATUSES = ["active", "finalized", "failed"] as const;

// ── Patients ──

export const patientSchema = z.object({
  id: z.string().min(1),
  name: z.string().trim().min(2).max(200),
  dateOfBirth: dateString,
  email: z.string().email().nullable(),
  phone: z.string().nullable(),
  insuranceCarrier: z.string().nullable(),
  memberId: z.string().nullable(),
  groupNumber: z.string().nullable(),
  doctorPreference: z.string().nullable(),
  location: z.string().nullable(),
  patientType: z.enum(PATIENT_TYPES),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

// ── Doctor availability ──

export const availabilitySlotSchema = z.object({
  doctorId: z.string().min(1),
  date: dateString,
  time: timeString,
  appointmentId: z.string().nullable(),
});

// ── Appointments ──

export const appointmentSchema = z.object({
  id: z.string().min(1),
  patientId: z.string().min(1),
  doctorId: z.string().min(1),
  date: dateString,
  startTime: timeString,
  endTime: timeString,
  durationMinutes: z.number().int().positive(),
  slotIds: z.array(z.string()).min(1),
  status: z.enum(APPOINTMENT_STATUSES),
  insuranceVerified: z.boolean(),
  formsSent: z.boolean(),
  formsCompleted: z.boolean(),
  cancellationReason: z.string().nullable(),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

// ── Reminder tickets ──

export const reminderTicketSchema = z.object({
  appointmentId: z.string().min(1),
  level: z.number().int().nonnegative(),
  sentCount: z.number().int().nonnegative(),
  lastSentAt: z.string().datetime().nullable(),
  acknowledged: z.boolean(),
  failedAttempts: z.number().int().nonnegative(),
  status: z.enum(REMINDER_TICKET_STATUSES),
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

export type Patient = z.infer<typeof patientSchema>;
export type AvailabilitySlot = z.infer<typeof availabilitySlotSchema>;
export type Appointment = z.infer<typeof appointmentSchema>;
export type ReminderTicket = z.infer<typeof reminderTicketSchema>;
