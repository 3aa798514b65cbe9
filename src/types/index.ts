// Convenience row types
export type {
  Patient,
  AvailabilitySlot,
  Appointment,
  ReminderTicket,
} from "@/lib/validations/records";

import type {
  PATIENT_TYPES,
  APPOINTMENT_STATUSES,
  REMINDER_TICKET_STATUSES,
} from "@/lib/validations/records";

// Patient type
export type PatientType = (typeof PATIENT_TYPES)[number];

// Appointment status
export type AppointmentStatus = (typeof APPOINTMENT_STATUSES)[number];

// Reminder ticket status
export type ReminderTicketStatus = (typeof REMINDER_TICKET_STATUSES)[number];

// Inclusive date window, both ends YYYY-MM-DD
export interface DateRange {
  from: string;
  to: string;
}

// A bookable start slot (possibly spanning several grid slots)
export interface CandidateSlot {
  doctorId: string;
  slotId: string;
  date: string;
  startTime: string;
  endTime: string;
  durationMinutes: number;
  slotIds: string[];
}
