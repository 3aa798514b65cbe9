import type { z } from "zod";

import { ValidationError } from "@/lib/errors";
import {
  appointmentSchema,
  availabilitySlotSchema,
  patientSchema,
  reminderTicketSchema,
} from "@/lib/validations/records";
import type { Appointment, AvailabilitySlot, Patient, ReminderTicket } from "@/types";

// ---------------------------------------------------------------------
// Column layout shared by the CSV and Supabase stores
// ---------------------------------------------------------------------

export type ColumnKind =
  | "text"
  | "nullableText"
  | "int"
  | "bool"
  | "list"
  | "time"
  | "timestamp"
  | "nullableTimestamp";

export interface ColumnSpec<T> {
  key: keyof T & string;
  column: string;
  kind: ColumnKind;
}

export interface TableSpec<T> {
  label: string;
  file: string;
  table: string;
  schema: z.ZodType<T>;
  columns: ReadonlyArray<ColumnSpec<T>>;
}

export type CellDecoder = (value: unknown, kind: ColumnKind) => unknown;

export const PATIENT_TABLE: TableSpec<Patient> = {
  label: "patient row",
  file: "patients.csv",
  table: "patients",
  schema: patientSchema,
  columns: [
    { key: "id", column: "patient_id", kind: "text" },
    { key: "name", column: "name", kind: "text" },
    { key: "dateOfBirth", column: "date_of_birth", kind: "text" },
    { key: "email", column: "email", kind: "nullableText" },
    { key: "phone", column: "phone", kind: "nullableText" },
    { key: "insuranceCarrier", column: "insurance_carrier", kind: "nullableText" },
    { key: "memberId", column: "member_id", kind: "nullableText" },
    { key: "groupNumber", column: "group_number", kind: "nullableText" },
    { key: "doctorPreference", column: "doctor_preference", kind: "nullableText" },
    { key: "location", column: "location", kind: "nullableText" },
    { key: "patientType", column: "patient_type", kind: "text" },
    { key: "createdAt", column: "created_at", kind: "timestamp" },
    { key: "updatedAt", column: "updated_at", kind: "timestamp" },
  ],
};

export const AVAILABILITY_TABLE: TableSpec<AvailabilitySlot> = {
  label: "availability row",
  file: "availability.csv",
  table: "availability_slots",
  schema: availabilitySlotSchema,
  columns: [
    { key: "doctorId", column: "doctor_id", kind: "text" },
    { key: "date", column: "date", kind: "text" },
    { key: "time", column: "time", kind: "time" },
    { key: "appointmentId", column: "appointment_id", kind: "nullableText" },
  ],
};

export const APPOINTMENT_TABLE: TableSpec<Appointment> = {
  label: "appointment row",
  file: "appointments.csv",
  table: "appointments",
  schema: appointmentSchema,
  columns: [
    { key: "id", column: "appointment_id", kind: "text" },
    { key: "patientId", column: "patient_id", kind: "text" },
    { key: "doctorId", column: "doctor_id", kind: "text" },
    { key: "date", column: "date", kind: "text" },
    { key: "startTime", column: "start_time", kind: "time" },
    { key: "endTime", column: "end_time", kind: "time" },
    { key: "durationMinutes", column: "duration_minutes", kind: "int" },
    { key: "slotIds", column: "slot_ids", kind: "list" },
    { key: "status", column: "status", kind: "text" },
    { key: "insuranceVerified", column: "insurance_verified", kind: "bool" },
    { key: "formsSent", column: "forms_sent", kind: "bool" },
    { key: "formsCompleted", column: "forms_completed", kind: "bool" },
    { key: "cancellationReason", column: "cancellation_reason", kind: "nullableText" },
    { key: "createdAt", column: "created_at", kind: "timestamp" },
    { key: "updatedAt", column: "updated_at", kind: "timestamp" },
  ],
};

export const REMINDER_TICKET_TABLE: TableSpec<ReminderTicket> = {
  label: "reminder ticket row",
  file: "reminder_tickets.csv",
  table: "reminder_tickets",
  schema: reminderTicketSchema,
  columns: [
    { key: "appointmentId", column: "appointment_id", kind: "text" },
    { key: "level", column: "level", kind: "int" },
    { key: "sentCount", column: "sent_count", kind: "int" },
    { key: "lastSentAt", column: "last_sent_at", kind: "nullableTimestamp" },
    { key: "acknowledged", column: "acknowledged", kind: "bool" },
    { key: "failedAttempts", column: "failed_attempts", kind: "int" },
    { key: "status", column: "status", kind: "text" },
    { key: "createdAt", column: "created_at", kind: "timestamp" },
    { key: "updatedAt", column: "updated_at", kind: "timestamp" },
  ],
};

// ---------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------

export function toColumns<T>(spec: TableSpec<T>, row: T): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const c of spec.columns) record[c.column] = row[c.key];
  return record;
}

/** Maps a snake_case record back to a validated domain row. */
export function fromColumns<T>(
  spec: TableSpec<T>,
  record: Record<string, unknown>,
  decode?: CellDecoder,
): T {
  const candidate: Record<string, unknown> = {};
  for (const c of spec.columns) {
    const raw = record[c.column];
    candidate[c.key] = decode ? decode(raw, c.kind) : raw;
  }
  const result = spec.schema.safeParse(candidate);
  if (!result.success) throw ValidationError.fromZod(spec.label, result.error);
  return result.data;
}

// ── CSV cells ──

export function encodeCell(value: unknown): string {
  if (value === null || value === undefined) return "";
  if (Array.isArray(value)) return value.map(String).join("|");
  return String(value);
}

export const decodeCsvCell: CellDecoder = (value, kind) => {
  const raw = typeof value === "string" ? value.trim() : "";
  switch (kind) {
    case "nullableText":
    case "nullableTimestamp":
      return raw === "" ? null : raw;
    case "int":
      return raw === "" ? null : Number(raw);
    case "bool":
      if (raw === "true") return true;
      if (raw === "false" || raw === "") return false;
      return raw;
    case "list":
      return raw === "" ? [] : raw.split("|");
    default:
      return raw;
  }
};

// ── Postgres cells ──

export const decodePostgresCell: CellDecoder = (value, kind) => {
  if (typeof value !== "string") return value;
  switch (kind) {
    case "time":
      return value.slice(0, 5); // "09:00:00" → "09:00"
    case "timestamp":
    case "nullableTimestamp": {
      const ms = Date.parse(value);
      return Number.isNaN(ms) ? value : new Date(ms).toISOString();
    }
    default:
      return value;
  }
};
