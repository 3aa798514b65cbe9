import type { SchedulingSettings } from "@/lib/config";
import { SlotUnavailableError, ValidationError, errorMessage, isSchedulingError } from "@/lib/errors";
import type { InsuranceVerifier } from "@/lib/insurance/verifier";
import { createPatient, lookupPatient, updatePatientProfile } from "@/lib/patients/lookup";
import type { SlotReservationEngine } from "@/lib/scheduling/reservation";
import { addDays, localDateTime } from "@/lib/scheduling/time";
import type { RecordStore } from "@/lib/store";
import type { ScheduleRequest } from "@/lib/validations/scheduling";
import type { DateRange } from "@/types";

import {
  collectFields,
  completeInsurance,
  hasLookupKey,
  insuranceFields,
  mergeDraft,
  mergeInsurance,
} from "./stages";
import type { ConversationState, ServiceResult, StageInput } from "./types";
import { NO_RESULT } from "./types";

export interface ResolverDeps {
  store: RecordStore;
  engine: SlotReservationEngine;
  verifier: InsuranceVerifier;
  settings: SchedulingSettings;
  now?: () => Date;
}

export type Resolver = (state: ConversationState, input: StageInput) => Promise<ServiceResult>;

// Domain errors are recoverable in conversation; anything else is not
function toErrorResult(err: unknown): ServiceResult {
  if (!isSchedulingError(err)) {
    console.error("[conversation] unexpected resolver error:", err);
  }
  return { kind: "error", message: errorMessage(err), recoverable: isSchedulingError(err) };
}

/**
 * Per-stage resolvers: each performs the one external call its stage
 * needs and hands the outcome to the stage handler.
 */
export function createResolvers(deps: ResolverDeps): Partial<Record<ConversationState["stage"], Resolver>> {
  const clock = deps.now ?? (() => new Date());

  function searchWindow(request: ScheduleRequest): { range: DateRange; notBefore: string } {
    const local = localDateTime(clock(), deps.settings.timezone);
    const notBefore = `${local.date}T${local.time}`;
    const date = request.date ?? request.slotId?.split("T")[0];
    if (date) return { range: { from: date, to: date }, notBefore };
    return {
      range: { from: local.date, to: addDays(local.date, deps.settings.searchDays - 1) },
      notBefore,
    };
  }

  // Alternatives widen to the whole search window across every doctor
  async function alternatives(reason: string, durationMinutes: number): Promise<ServiceResult> {
    const { range, notBefore } = searchWindow({});
    const suggestions = await deps.engine.suggestAlternatives(
      await deps.store.listDoctorIds(),
      range,
      durationMinutes,
      deps.settings.alternativeSuggestions,
      { notBefore },
    );
    return { kind: "unavailable", reason, alternatives: suggestions };
  }

  const identify: Resolver = async (_state, input) => {
    if (input.kind !== "identify" || !hasLookupKey(input.query)) return NO_RESULT;
    try {
      const match = await lookupPatient(deps.store, input.query);
      return { kind: "lookup", patient: match?.patient ?? null };
    } catch (err) {
      return toErrorResult(err);
    }
  };

  const collect: Resolver = async (state, input) => {
    const draft = mergeDraft(state.draft, collectFields(input));
    const { name, dateOfBirth, email, phone } = draft;
    if (!name || !dateOfBirth || !email || !phone) return NO_RESULT;

    try {
      const patient = state.patientId
        ? await updatePatientProfile(deps.store, state.patientId, draft)
        : await createPatient(deps.store, { ...draft, name, dateOfBirth, email, phone });
      return { kind: "patient_saved", patient };
    } catch (err) {
      return toErrorResult(err);
    }
  };

  // An empty request means "first open time"; no request at all means ask
  const schedule: Resolver = async (state, input) => {
    if (input.kind !== "schedule") return NO_RESULT;
    const request = input.request;
    const durationMinutes = deps.engine.durationFor(state.patientType ?? "new");
    const doctorId = request.doctorId ?? state.draft.doctorPreference ?? null;
    const slotId =
      request.slotId ?? (request.date && request.time ? `${request.date}T${request.time}` : null);

    if (!state.patientId) {
      return { kind: "error", message: "patient details are not saved yet", recoverable: false };
    }

    try {
      const { range, notBefore } = searchWindow(request);
      if (slotId && slotId < notBefore) {
        return { kind: "error", message: `${slotId} is in the past`, recoverable: true };
      }

      let target: { doctorId: string; slotId: string } | null = null;
      if (slotId && doctorId) {
        target = { doctorId, slotId };
      } else if (slotId) {
        // A time without a doctor: take whichever doctor has it free
        const candidates = await deps.engine.suggestAlternatives(
          await deps.store.listDoctorIds(),
          range,
          durationMinutes,
          Number.MAX_SAFE_INTEGER,
          { notBefore },
        );
        const match = candidates.find((c) => c.slotId === slotId);
        if (match) target = { doctorId: match.doctorId, slotId };
      } else {
        const first = await deps.engine.findFirstAvailable(doctorId, range, durationMinutes, {
          notBefore,
        });
        if (first) target = { doctorId: first.doctorId, slotId: first.slotId };
      }

      if (!target) {
        const who = doctorId ?? "any doctor";
        return alternatives(`No open time found for ${who}.`, durationMinutes);
      }

      const appointment = await deps.engine.reserve(target.doctorId, target.slotId, {
        patientId: state.patientId,
        durationMinutes,
      });
      return { kind: "reserved", appointment };
    } catch (err) {
      if (err instanceof SlotUnavailableError) {
        return alternatives("That time was just taken.", durationMinutes);
      }
      return toErrorResult(err);
    }
  };

  const insurance: Resolver = async (state, input) => {
    const details = completeInsurance(mergeInsurance(state.insurance, insuranceFields(input)));
    if (!details) return NO_RESULT;

    try {
      const result = await deps.verifier.verify(details);
      return { kind: "insurance", details, result };
    } catch (err) {
      if (err instanceof ValidationError) {
        return {
          kind: "insurance",
          details,
          result: { verified: false, carrier: null, reason: err.message },
        };
      }
      console.warn("[conversation] insurance verification unavailable:", errorMessage(err));
      return {
        kind: "insurance",
        details,
        result: { verified: false, carrier: null, reason: "verification unavailable" },
      };
    }
  };

  return { identify, collect, schedule, insurance };
}
