import { NotFoundError, ValidationError } from "@/lib/errors";
import type { RecordStore } from "@/lib/store";
import {
  completePatientDraftSchema,
  patientLookupSchema,
  phoneDigits,
  type CompletePatientDraft,
  type PatientDraft,
  type PatientLookupQuery,
} from "@/lib/validations/patients";
import type { InsuranceDetails } from "@/lib/validations/insurance";
import type { Patient } from "@/types";

export type LookupMatch = "id" | "name_dob" | "email" | "phone";

export interface LookupResult {
  patient: Patient;
  matchedBy: LookupMatch;
}

function normalizeName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, " ");
}

// Last 10 digits, so "+1 555 123 4567" matches "555-123-4567"
function comparablePhone(phone: string): string {
  return phoneDigits(phone).slice(-10);
}

/**
 * Finds an existing patient by id, then name + date of birth, then email,
 * then phone digits. Returns null on a miss.
 */
export async function lookupPatient(
  store: RecordStore,
  query: PatientLookupQuery,
): Promise<LookupResult | null> {
  const parsed = patientLookupSchema.safeParse(query);
  if (!parsed.success) throw ValidationError.fromZod("patient lookup", parsed.error);
  const q = parsed.data;

  if (q.patientId) {
    const byId = await store.getPatient(q.patientId);
    if (byId) return { patient: byId, matchedBy: "id" };
  }

  const patients = await store.listPatients();

  if (q.name && q.dateOfBirth) {
    const name = normalizeName(q.name);
    const match = patients.find(
      (p) => normalizeName(p.name) === name && p.dateOfBirth === q.dateOfBirth,
    );
    if (match) return { patient: match, matchedBy: "name_dob" };
  }

  if (q.email) {
    const email = q.email.toLowerCase();
    const match = patients.find((p) => p.email?.toLowerCase() === email);
    if (match) return { patient: match, matchedBy: "email" };
  }

  if (q.phone) {
    const digits = comparablePhone(q.phone);
    if (digits.length === 10) {
      const match = patients.find((p) => p.phone !== null && comparablePhone(p.phone) === digits);
      if (match) return { patient: match, matchedBy: "phone" };
    }
  }

  return null;
}

export type RequiredPatientField = "name" | "dateOfBirth" | "email" | "phone";

/** First required field still missing from a draft, in asking order. */
export function missingPatientField(draft: PatientDraft): RequiredPatientField | null {
  if (!draft.name) return "name";
  if (!draft.dateOfBirth) return "dateOfBirth";
  if (!draft.email) return "email";
  if (!draft.phone) return "phone";
  return null;
}

export async function createPatient(
  store: RecordStore,
  draft: CompletePatientDraft,
): Promise<Patient> {
  const parsed = completePatientDraftSchema.safeParse(draft);
  if (!parsed.success) throw ValidationError.fromZod("patient", parsed.error);
  const d = parsed.data;

  const now = new Date().toISOString();
  const patient = await store.insertPatient({
    id: await store.nextPatientId(),
    name: d.name,
    dateOfBirth: d.dateOfBirth,
    email: d.email,
    phone: d.phone,
    insuranceCarrier: null,
    memberId: null,
    groupNumber: null,
    doctorPreference: d.doctorPreference ?? null,
    location: d.location ?? null,
    patientType: "new",
    createdAt: now,
    updatedAt: now,
  });
  console.log(`[patients] created ${patient.id}`);
  return patient;
}

/** Applies a returning patient's newly collected details. */
export async function updatePatientProfile(
  store: RecordStore,
  patientId: string,
  draft: PatientDraft,
): Promise<Patient> {
  const existing = await store.getPatient(patientId);
  if (!existing) throw new NotFoundError("Patient", patientId);

  return store.updatePatient(patientId, {
    name: draft.name ?? existing.name,
    dateOfBirth: draft.dateOfBirth ?? existing.dateOfBirth,
    email: draft.email ?? existing.email,
    phone: draft.phone ?? existing.phone,
    doctorPreference: draft.doctorPreference ?? existing.doctorPreference,
    location: draft.location ?? existing.location,
    patientType: "returning",
  });
}

export async function saveInsurance(
  store: RecordStore,
  patientId: string,
  details: InsuranceDetails,
): Promise<Patient> {
  return store.updatePatient(patientId, {
    insuranceCarrier: details.carrier,
    memberId: details.memberId,
    groupNumber: details.groupNumber ?? null,
  });
}

/** Draft pre-filled from a patient row, for the returning-patient path. */
export function draftFromPatient(patient: Patient): PatientDraft {
  return {
    name: patient.name,
    dateOfBirth: patient.dateOfBirth,
    email: patient.email ?? undefined,
    phone: patient.phone ?? undefined,
    doctorPreference: patient.doctorPreference ?? undefined,
    location: patient.location ?? undefined,
  };
}
