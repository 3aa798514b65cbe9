import { createClient, type SupabaseClient } from "@supabase/supabase-js";

import { NotFoundError, SlotUnavailableError, ValidationError } from "@/lib/errors";
import type { Appointment, AvailabilitySlot, Patient, ReminderTicket } from "@/types";

import {
  APPOINTMENT_TABLE,
  AVAILABILITY_TABLE,
  PATIENT_TABLE,
  REMINDER_TICKET_TABLE,
  decodePostgresCell,
  fromColumns,
  toColumns,
  type TableSpec,
} from "./columns";
import {
  APPOINTMENT_ID_PREFIX,
  PATIENT_ID_PREFIX,
  nextSequentialId,
  type AppointmentFilter,
  type AppointmentPatch,
  type PatientPatch,
  type RecordStore,
  type ReminderTicketFilter,
  type ReminderTicketPatch,
  type SlotFilter,
} from "./types";

const UNIQUE_VIOLATION = "23505";

interface PostgrestFailure {
  message: string;
  code?: string;
}

// ── Helpers ──

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function rowsOf<T>(spec: TableSpec<T>, data: unknown): T[] {
  if (!Array.isArray(data)) return [];
  return data.filter(isRecord).map((r) => fromColumns(spec, r, decodePostgresCell));
}

function rowOf<T>(spec: TableSpec<T>, data: unknown): T | null {
  return isRecord(data) ? fromColumns(spec, data, decodePostgresCell) : null;
}

function patchColumns<T>(spec: TableSpec<T>, patch: Partial<T>): Record<string, unknown> {
  const record: Record<string, unknown> = {};
  for (const c of spec.columns) {
    if (c.key in patch) record[c.column] = patch[c.key];
  }
  record.updated_at = new Date().toISOString();
  return record;
}

function fail(op: string, error: PostgrestFailure): never {
  console.error(`[store/supabase] ${op} failed:`, error.message);
  throw new Error(`${op} failed: ${error.message}`);
}

function failInsert(op: string, entity: string, id: string, error: PostgrestFailure): never {
  if (error.code === UNIQUE_VIOLATION) {
    throw new ValidationError(`${entity} ${id} already exists`);
  }
  fail(op, error);
}

function slotParts(slotId: string): { date: string; time: string } {
  const [date, time] = slotId.split("T");
  return { date, time };
}

/**
 * Record store over Supabase tables. Slot claims are conditional updates
 * on `appointment_id IS NULL`; a partial claim is rolled back before the
 * failure is reported.
 */
export class SupabaseRecordStore implements RecordStore {
  constructor(private readonly supabase: SupabaseClient) {}

  static connect(url: string, serviceRoleKey: string): SupabaseRecordStore {
    return new SupabaseRecordStore(
      createClient(url, serviceRoleKey, { auth: { persistSession: false } }),
    );
  }

  // ── Patients ──

  async getPatient(id: string): Promise<Patient | null> {
    const { data, error } = await this.supabase
      .from(PATIENT_TABLE.table)
      .select("*")
      .eq("patient_id", id)
      .maybeSingle();
    if (error) fail("getPatient", error);
    return rowOf(PATIENT_TABLE, data);
  }

  async listPatients(): Promise<Patient[]> {
    const { data, error } = await this.supabase
      .from(PATIENT_TABLE.table)
      .select("*")
      .order("patient_id");
    if (error) fail("listPatients", error);
    return rowsOf(PATIENT_TABLE, data);
  }

  async insertPatient(patient: Patient): Promise<Patient> {
    const { data, error } = await this.supabase
      .from(PATIENT_TABLE.table)
      .insert(toColumns(PATIENT_TABLE, patient))
      .select()
      .single();
    if (error) failInsert("insertPatient", "Patient", patient.id, error);
    return rowOf(PATIENT_TABLE, data) ?? patient;
  }

  async updatePatient(id: string, patch: PatientPatch): Promise<Patient> {
    const { data, error } = await this.supabase
      .from(PATIENT_TABLE.table)
      .update(patchColumns<Patient>(PATIENT_TABLE, patch))
      .eq("patient_id", id)
      .select()
      .maybeSingle();
    if (error) fail("updatePatient", error);
    const row = rowOf(PATIENT_TABLE, data);
    if (!row) throw new NotFoundError("Patient", id);
    return row;
  }

  async nextPatientId(): Promise<string> {
    const { data, error } = await this.supabase.from(PATIENT_TABLE.table).select("patient_id");
    if (error) fail("nextPatientId", error);
    return nextSequentialId(this.stringColumn(data, "patient_id"), PATIENT_ID_PREFIX);
  }

  // ── Availability ──

  async listSlots(filter: SlotFilter = {}): Promise<AvailabilitySlot[]> {
    let query = this.supabase.from(AVAILABILITY_TABLE.table).select("*");
    if (filter.doctorId) query = query.eq("doctor_id", filter.doctorId);
    if (filter.from) query = query.gte("date", filter.from);
    if (filter.to) query = query.lte("date", filter.to);

    const { data, error } = await query
      .order("date")
      .order("time")
      .order("doctor_id");
    if (error) fail("listSlots", error);
    return rowsOf(AVAILABILITY_TABLE, data);
  }

  async getSlot(doctorId: string, slotId: string): Promise<AvailabilitySlot | null> {
    const { date, time } = slotParts(slotId);
    const { data, error } = await this.supabase
      .from(AVAILABILITY_TABLE.table)
      .select("*")
      .eq("doctor_id", doctorId)
      .eq("date", date)
      .eq("time", time)
      .maybeSingle();
    if (error) fail("getSlot", error);
    return rowOf(AVAILABILITY_TABLE, data);
  }

  async upsertSlots(slots: AvailabilitySlot[]): Promise<void> {
    if (slots.length === 0) return;
    const { error } = await this.supabase
      .from(AVAILABILITY_TABLE.table)
      .upsert(
        slots.map((s) => toColumns(AVAILABILITY_TABLE, s)),
        { onConflict: "doctor_id,date,time" },
      );
    if (error) fail("upsertSlots", error);
  }

  async listDoctorIds(): Promise<string[]> {
    const { data, error } = await this.supabase
      .from(AVAILABILITY_TABLE.table)
      .select("doctor_id");
    if (error) fail("listDoctorIds", error);
    return [...new Set(this.stringColumn(data, "doctor_id"))].sort();
  }

  async claimSlots(doctorId: string, slotIds: string[], appointmentId: string): Promise<void> {
    const claimed: string[] = [];

    for (const slotId of slotIds) {
      const { date, time } = slotParts(slotId);
      const { data, error } = await this.supabase
        .from(AVAILABILITY_TABLE.table)
        .update({ appointment_id: appointmentId })
        .eq("doctor_id", doctorId)
        .eq("date", date)
        .eq("time", time)
        .is("appointment_id", null)
        .select();

      if (error || !Array.isArray(data) || data.length === 0) {
        await this.releaseSlots(doctorId, claimed, appointmentId);
        if (error) fail("claimSlots", error);
        const existing = await this.getSlot(doctorId, slotId);
        if (!existing) throw new NotFoundError("Slot", `${doctorId}/${slotId}`);
        throw new SlotUnavailableError(doctorId, slotId);
      }
      claimed.push(slotId);
    }
  }

  async releaseSlots(doctorId: string, slotIds: string[], appointmentId: string): Promise<void> {
    for (const slotId of slotIds) {
      const { date, time } = slotParts(slotId);
      const { error } = await this.supabase
        .from(AVAILABILITY_TABLE.table)
        .update({ appointment_id: null })
        .eq("doctor_id", doctorId)
        .eq("date", date)
        .eq("time", time)
        .eq("appointment_id", appointmentId);
      if (error) fail("releaseSlots", error);
    }
  }

  // ── Appointments ──

  async getAppointment(id: string): Promise<Appointment | null> {
    const { data, error } = await this.supabase
      .from(APPOINTMENT_TABLE.table)
      .select("*")
      .eq("appointment_id", id)
      .maybeSingle();
    if (error) fail("getAppointment", error);
    return rowOf(APPOINTMENT_TABLE, data);
  }

  async listAppointments(filter: AppointmentFilter = {}): Promise<Appointment[]> {
    let query = this.supabase.from(APPOINTMENT_TABLE.table).select("*");
    if (filter.patientId) query = query.eq("patient_id", filter.patientId);
    if (filter.doctorId) query = query.eq("doctor_id", filter.doctorId);
    if (filter.statuses) query = query.in("status", filter.statuses);

    const { data, error } = await query.order("date").order("start_time");
    if (error) fail("listAppointments", error);
    return rowsOf(APPOINTMENT_TABLE, data);
  }

  async insertAppointment(appointment: Appointment): Promise<Appointment> {
    const { data, error } = await this.supabase
      .from(APPOINTMENT_TABLE.table)
      .insert(toColumns(APPOINTMENT_TABLE, appointment))
      .select()
      .single();
    if (error) failInsert("insertAppointment", "Appointment", appointment.id, error);
    return rowOf(APPOINTMENT_TABLE, data) ?? appointment;
  }

  async updateAppointment(id: string, patch: AppointmentPatch): Promise<Appointment> {
    const { data, error } = await this.supabase
      .from(APPOINTMENT_TABLE.table)
      .update(patchColumns<Appointment>(APPOINTMENT_TABLE, patch))
      .eq("appointment_id", id)
      .select()
      .maybeSingle();
    if (error) fail("updateAppointment", error);
    const row = rowOf(APPOINTMENT_TABLE, data);
    if (!row) throw new NotFoundError("Appointment", id);
    return row;
  }

  async nextAppointmentId(): Promise<string> {
    const { data, error } = await this.supabase
      .from(APPOINTMENT_TABLE.table)
      .select("appointment_id");
    if (error) fail("nextAppointmentId", error);
    return nextSequentialId(this.stringColumn(data, "appointment_id"), APPOINTMENT_ID_PREFIX);
  }

  // ── Reminder tickets ──

  async getReminderTicket(appointmentId: string): Promise<ReminderTicket | null> {
    const { data, error } = await this.supabase
      .from(REMINDER_TICKET_TABLE.table)
      .select("*")
      .eq("appointment_id", appointmentId)
      .maybeSingle();
    if (error) fail("getReminderTicket", error);
    return rowOf(REMINDER_TICKET_TABLE, data);
  }

  async listReminderTickets(filter: ReminderTicketFilter = {}): Promise<ReminderTicket[]> {
    let query = this.supabase.from(REMINDER_TICKET_TABLE.table).select("*");
    if (filter.statuses) query = query.in("status", filter.statuses);

    const { data, error } = await query.order("appointment_id");
    if (error) fail("listReminderTickets", error);
    return rowsOf(REMINDER_TICKET_TABLE, data);
  }

  async insertReminderTicket(ticket: ReminderTicket): Promise<ReminderTicket> {
    const { data, error } = await this.supabase
      .from(REMINDER_TICKET_TABLE.table)
      .insert(toColumns(REMINDER_TICKET_TABLE, ticket))
      .select()
      .single();
    if (error) {
      failInsert("insertReminderTicket", "Reminder ticket for", ticket.appointmentId, error);
    }
    return rowOf(REMINDER_TICKET_TABLE, data) ?? ticket;
  }

  async updateReminderTicket(
    appointmentId: string,
    patch: ReminderTicketPatch,
  ): Promise<ReminderTicket> {
    const { data, error } = await this.supabase
      .from(REMINDER_TICKET_TABLE.table)
      .update(patchColumns<ReminderTicket>(REMINDER_TICKET_TABLE, patch))
      .eq("appointment_id", appointmentId)
      .select()
      .maybeSingle();
    if (error) fail("updateReminderTicket", error);
    const row = rowOf(REMINDER_TICKET_TABLE, data);
    if (!row) throw new NotFoundError("Reminder ticket", appointmentId);
    return row;
  }

  private stringColumn(data: unknown, column: string): string[] {
    if (!Array.isArray(data)) return [];
    return data
      .filter(isRecord)
      .map((r) => r[column])
      .filter((v): v is string => typeof v === "string");
  }
}
