import type { VerificationResult } from "@/lib/insurance/verifier";
import type { PatientDraft, PatientLookupQuery } from "@/lib/validations/patients";
import type { InsuranceDetails, PartialInsurance } from "@/lib/validations/insurance";
import type { ScheduleRequest } from "@/lib/validations/scheduling";
import type { Appointment, CandidateSlot, Patient, PatientType } from "@/types";

// ── Stages ──

export const STAGES = [
  "greeting",
  "identify",
  "collect",
  "schedule",
  "insurance",
  "confirm",
  "distribute",
  "remind",
  "done",
  "aborted",
] as const;

export type Stage = (typeof STAGES)[number];

export const TERMINAL_STAGES: readonly Stage[] = ["done", "aborted"];

// ── State ──

export interface ConversationState {
  stage: Stage;
  patientId: string | null;
  patientType: PatientType | null;
  draft: PatientDraft;
  insurance: PartialInsurance;
  insuranceVerified: boolean | null;
  appointmentId: string | null;
  alternativeOffers: number;
  lastOffered: CandidateSlot[];
  escalated: boolean;
}

export function initialState(): ConversationState {
  return {
    stage: "greeting",
    patientId: null,
    patientType: null,
    draft: {},
    insurance: {},
    insuranceVerified: null,
    appointmentId: null,
    alternativeOffers: 0,
    lastOffered: [],
    escalated: false,
  };
}

// ── Structured input ──

export type StageInput =
  | { kind: "none" }
  | { kind: "identify"; query: PatientLookupQuery }
  | { kind: "collect"; fields: PatientDraft }
  | { kind: "schedule"; request: ScheduleRequest }
  | { kind: "insurance"; details: PartialInsurance }
  | { kind: "cancel"; reason?: string };

export const NO_INPUT: StageInput = { kind: "none" };

// ── Service results handed from resolvers to handlers ──

export type ServiceResult =
  | { kind: "none" }
  | { kind: "lookup"; patient: Patient | null }
  | { kind: "patient_saved"; patient: Patient }
  | { kind: "reserved"; appointment: Appointment }
  | { kind: "unavailable"; reason: string; alternatives: CandidateSlot[] }
  | { kind: "insurance"; details: InsuranceDetails; result: VerificationResult }
  | { kind: "error"; message: string; recoverable: boolean };

export const NO_RESULT: ServiceResult = { kind: "none" };

// ── Side effects requested of collaborators ──

export type Effect =
  | { type: "reply"; text: string }
  | { type: "offer_alternatives"; slots: CandidateSlot[]; attempt: number }
  | { type: "escalate_to_human"; reason: string }
  | {
      type: "record_insurance";
      patientId: string;
      appointmentId: string;
      details: InsuranceDetails;
      verified: boolean;
    }
  | { type: "insurance_unverified"; appointmentId: string; reason: string }
  | { type: "confirm_appointment"; appointmentId: string }
  | { type: "send_confirmation_email"; appointmentId: string }
  | { type: "send_intake_forms"; appointmentId: string }
  | { type: "create_reminder_ticket"; appointmentId: string }
  | { type: "release_slot"; appointmentId: string; reason: string };

export type EffectType = Effect["type"];

export interface StageOutcome {
  state: ConversationState;
  effects: Effect[];
}

export interface HandlerContext {
  maxAlternativeOffers: number;
}

export type StageHandler = (
  state: ConversationState,
  input: StageInput,
  result: ServiceResult,
  ctx: HandlerContext,
) => StageOutcome;

// ── Turn result ──

export interface EffectFailure {
  effect: EffectType;
  error: string;
}

export interface TurnResult {
  state: ConversationState;
  replies: string[];
  effects: Effect[];
  failures: EffectFailure[];
}
