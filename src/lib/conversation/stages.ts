import {
  draftFromPatient,
  missingPatientField,
  type RequiredPatientField,
} from "@/lib/patients/lookup";
import { formatSlots } from "@/lib/scheduling/availability";
import type { InsuranceDetails, PartialInsurance } from "@/lib/validations/insurance";
import type { PatientDraft, PatientLookupQuery } from "@/lib/validations/patients";
import type { Patient } from "@/types";

import type {
  ConversationState,
  Effect,
  ServiceResult,
  Stage,
  StageHandler,
  StageInput,
  StageOutcome,
} from "./types";

// ── Copy ──

const GREETING = "Hello! I'm the scheduling assistant for the clinic. I can book your appointment.";
const IDENTIFY_PROMPT =
  "To get started, please tell me your full name and date of birth, or your patient ID if you have one.";

const FIELD_PROMPTS: Record<RequiredPatientField, string> = {
  name: "What is your full name?",
  dateOfBirth: "What is your date of birth (YYYY-MM-DD)?",
  email: "What email address should we send your confirmation to?",
  phone: "What is the best phone number to reach you?",
};

const DONE_REPLY =
  "Your appointment is all set. To cancel it, use the cancel link in your confirmation email.";
const ABORTED_REPLY = "This conversation has ended. Start a new one to book again.";

const ESCALATION_REPLY =
  "I'm having trouble finding a time that works. A member of our staff will contact you to finish booking.";

// ── Helpers ──

export function mergeDraft(draft: PatientDraft, fields: PatientDraft): PatientDraft {
  return {
    name: fields.name ?? draft.name,
    dateOfBirth: fields.dateOfBirth ?? draft.dateOfBirth,
    email: fields.email ?? draft.email,
    phone: fields.phone ?? draft.phone,
    doctorPreference: fields.doctorPreference ?? draft.doctorPreference,
    location: fields.location ?? draft.location,
  };
}

export function mergeInsurance(current: PartialInsurance, fields: PartialInsurance): PartialInsurance {
  return {
    carrier: fields.carrier ?? current.carrier,
    memberId: fields.memberId ?? current.memberId,
    groupNumber: fields.groupNumber ?? current.groupNumber,
  };
}

export function completeInsurance(details: PartialInsurance): InsuranceDetails | null {
  if (!details.carrier || !details.memberId) return null;
  return { carrier: details.carrier, memberId: details.memberId, groupNumber: details.groupNumber };
}

export function hasLookupKey(query: PatientLookupQuery): boolean {
  return Boolean(
    query.patientId || (query.name && query.dateOfBirth) || query.email || query.phone,
  );
}

function profileFromQuery(query: PatientLookupQuery): PatientDraft {
  return {
    name: query.name,
    dateOfBirth: query.dateOfBirth,
    email: query.email,
    phone: query.phone,
  };
}

function insuranceFromPatient(patient: Patient): PartialInsurance {
  return {
    carrier: patient.insuranceCarrier ?? undefined,
    memberId: patient.memberId ?? undefined,
    groupNumber: patient.groupNumber ?? undefined,
  };
}

export function collectFields(input: StageInput): PatientDraft {
  return input.kind === "collect" ? input.fields : {};
}

export function insuranceFields(input: StageInput): PartialInsurance {
  return input.kind === "insurance" ? input.details : {};
}

function reply(text: string): Effect {
  return { type: "reply", text };
}

function stay(state: ConversationState, ...effects: Effect[]): StageOutcome {
  return { state, effects };
}

function move(state: ConversationState, stage: Stage, ...effects: Effect[]): StageOutcome {
  return { state: { ...state, stage }, effects };
}

function failed(state: ConversationState, result: Extract<ServiceResult, { kind: "error" }>): StageOutcome {
  const effects: Effect[] = [reply(`Sorry, something went wrong: ${result.message}`)];
  if (!result.recoverable) {
    effects.push({ type: "escalate_to_human", reason: result.message });
  }
  return stay(state, ...effects);
}

function missingAppointment(state: ConversationState): StageOutcome {
  return stay(
    state,
    reply("Sorry, I lost track of your appointment. A staff member will follow up with you."),
    { type: "escalate_to_human", reason: `No appointment in stage ${state.stage}` },
  );
}

// ---------------------------------------------------------------------
// Stage handlers
// ---------------------------------------------------------------------

export const greeting: StageHandler = (state) => move(state, "identify", reply(GREETING));

export const identify: StageHandler = (state, input, result) => {
  if (result.kind === "error") return failed(state, result);

  if (result.kind === "lookup") {
    const query = input.kind === "identify" ? input.query : {};
    if (result.patient) {
      const patient = result.patient;
      return move(
        {
          ...state,
          patientId: patient.id,
          patientType: "returning",
          draft: draftFromPatient(patient),
          insurance: insuranceFromPatient(patient),
        },
        "collect",
        reply(`Welcome back, ${patient.name}! I found your record (${patient.id}).`),
      );
    }
    return move(
      { ...state, patientId: null, patientType: "new", draft: profileFromQuery(query) },
      "collect",
      reply("I couldn't find an existing record, so let's set up a new patient profile."),
    );
  }

  return stay(state, reply(IDENTIFY_PROMPT));
};

export const collect: StageHandler = (state, input, result) => {
  const draft = mergeDraft(state.draft, collectFields(input));

  if (result.kind === "error") return failed({ ...state, draft }, result);

  if (result.kind === "patient_saved") {
    const patient = result.patient;
    const text =
      state.patientType === "returning"
        ? `Thanks, ${patient.name}. Your details are up to date.`
        : `Thanks, ${patient.name}. Your new patient ID is ${patient.id}.`;
    return move(
      { ...state, draft, patientId: patient.id, patientType: state.patientType ?? "new" },
      "schedule",
      reply(text),
    );
  }

  const missing = missingPatientField(draft);
  return stay(
    { ...state, draft },
    reply(missing ? FIELD_PROMPTS[missing] : "Could you confirm your details once more?"),
  );
};

export const schedule: StageHandler = (state, _input, result, ctx) => {
  if (result.kind === "error") return failed(state, result);

  if (result.kind === "reserved") {
    const a = result.appointment;
    return move(
      { ...state, appointmentId: a.id, lastOffered: [] },
      "insurance",
      reply(
        `You're booked with ${a.doctorId} on ${a.date} at ${a.startTime} (${a.durationMinutes} minutes).`,
      ),
    );
  }

  if (result.kind === "unavailable") {
    if (state.alternativeOffers >= ctx.maxAlternativeOffers) {
      const effects: Effect[] = [];
      if (!state.escalated) {
        effects.push({
          type: "escalate_to_human",
          reason: `No agreeable slot after ${state.alternativeOffers} alternative offers`,
        });
      }
      effects.push(reply(ESCALATION_REPLY));
      return stay({ ...state, escalated: true, lastOffered: [] }, ...effects);
    }

    const attempt = state.alternativeOffers + 1;
    const text =
      result.alternatives.length > 0
        ? `${result.reason} Here are some other times:\n${formatSlots(result.alternatives)}`
        : `${result.reason} There are no other open times in the search window.`;
    return stay(
      { ...state, alternativeOffers: attempt, lastOffered: result.alternatives },
      { type: "offer_alternatives", slots: result.alternatives, attempt },
      reply(text),
    );
  }

  return stay(state, reply("Which day, time or doctor would you prefer?"));
};

export const insurance: StageHandler = (state, input, result) => {
  const details = mergeInsurance(state.insurance, insuranceFields(input));

  if (result.kind === "error") return failed({ ...state, insurance: details }, result);

  if (result.kind === "insurance") {
    if (!state.patientId || !state.appointmentId) return missingAppointment(state);
    const record: Effect = {
      type: "record_insurance",
      patientId: state.patientId,
      appointmentId: state.appointmentId,
      details: result.details,
      verified: result.result.verified,
    };
    const next = { ...state, insurance: result.details, insuranceVerified: result.result.verified };

    if (result.result.verified) {
      return move(
        next,
        "confirm",
        record,
        reply(`Your ${result.result.carrier ?? result.details.carrier} coverage is verified.`),
      );
    }

    const reason = result.result.reason ?? "verification failed";
    return move(
      next,
      "confirm",
      record,
      { type: "insurance_unverified", appointmentId: state.appointmentId, reason },
      reply(
        `We couldn't verify your insurance (${reason}). Your appointment is still booked; please bring your insurance card.`,
      ),
    );
  }

  if (!details.carrier) {
    return stay({ ...state, insurance: details }, reply("Which insurance carrier do you have?"));
  }
  return stay(
    { ...state, insurance: details },
    reply("What is the member ID on your insurance card? Include the group number if there is one."),
  );
};

export const confirm: StageHandler = (state) => {
  if (!state.appointmentId) return missingAppointment(state);
  return move(
    state,
    "distribute",
    { type: "confirm_appointment", appointmentId: state.appointmentId },
    { type: "send_confirmation_email", appointmentId: state.appointmentId },
    reply(`Your appointment ${state.appointmentId} is confirmed. A confirmation email is on its way.`),
  );
};

export const distribute: StageHandler = (state) => {
  if (!state.appointmentId) return missingAppointment(state);
  return move(
    state,
    "remind",
    { type: "send_intake_forms", appointmentId: state.appointmentId },
    reply("I've emailed you the patient intake form. Please complete it before your visit."),
  );
};

export const remind: StageHandler = (state) => {
  if (!state.appointmentId) return missingAppointment(state);
  return move(
    state,
    "done",
    { type: "create_reminder_ticket", appointmentId: state.appointmentId },
    reply("You'll receive reminder emails before your visit. See you soon!"),
  );
};

export const done: StageHandler = (state) => stay(state, reply(DONE_REPLY));

export const aborted: StageHandler = (state) => stay(state, reply(ABORTED_REPLY));

/** Explicit cancellation before the booking is complete. */
export function cancelConversation(state: ConversationState, reason?: string): StageOutcome {
  if (state.stage === "done") return stay(state, reply(DONE_REPLY));
  if (state.stage === "aborted") return stay(state, reply(ABORTED_REPLY));

  const effects: Effect[] = [];
  if (state.appointmentId) {
    effects.push({
      type: "release_slot",
      appointmentId: state.appointmentId,
      reason: reason ?? "Patient cancelled during booking",
    });
  }
  effects.push(
    reply(
      state.appointmentId
        ? "Okay, I've cancelled the booking and released the time slot."
        : "Okay, I've stopped the booking. Nothing was scheduled.",
    ),
  );
  return move({ ...state, lastOffered: [] }, "aborted", ...effects);
}

export const HANDLERS: Record<Stage, StageHandler> = {
  greeting,
  identify,
  collect,
  schedule,
  insurance,
  confirm,
  distribute,
  remind,
  done,
  aborted,
};
