import { DEFAULT_SCHEDULING, type SchedulingSettings } from "@/lib/config";
import { NotFoundError, ValidationError } from "@/lib/errors";
import type { RecordStore } from "@/lib/store";
import {
  appointmentDraftSchema,
  dateRangeSchema,
  releaseInputSchema,
  slotIdSchema,
  type AppointmentDraft,
} from "@/lib/validations/scheduling";
import type {
  Appointment,
  AppointmentStatus,
  CandidateSlot,
  DateRange,
  PatientType,
} from "@/types";

import {
  candidateSlots,
  compareCandidates,
  coveredSlotIds,
  take,
  type CandidateOptions,
} from "./availability";
import { endTime } from "./time";

export interface SearchOptions {
  /** Skip start slots before this "YYYY-MM-DDTHH:MM" key */
  notBefore?: string;
}

// Forward-only lifecycle; cancellation goes through release()
const VALID_TRANSITIONS: Record<AppointmentStatus, AppointmentStatus[]> = {
  scheduled: ["confirmed"],
  confirmed: ["completed"],
  completed: [],
  cancelled: [],
};

function validRange(range: DateRange): DateRange {
  const parsed = dateRangeSchema.safeParse(range);
  if (!parsed.success) throw ValidationError.fromZod("date range", parsed.error);
  return parsed.data;
}

function validDuration(durationMinutes: number): number {
  if (!Number.isInteger(durationMinutes) || durationMinutes <= 0) {
    throw new ValidationError(`Invalid duration: ${durationMinutes}`);
  }
  return durationMinutes;
}

/**
 * Finds, reserves and releases doctor time slots. All writes go through
 * the record store; reserve() re-verifies every covered slot at write time.
 */
export class SlotReservationEngine {
  constructor(
    private readonly store: RecordStore,
    private readonly settings: SchedulingSettings = DEFAULT_SCHEDULING,
  ) {}

  durationFor(patientType: PatientType): number {
    return patientType === "new"
      ? this.settings.newPatientMinutes
      : this.settings.returningPatientMinutes;
  }

  // ── Search ──

  /**
   * Candidate start slots for one doctor, ordered by date then time.
   * Reads the store once; the returned sequence is lazy and restartable.
   */
  async findAvailable(
    doctorId: string,
    range: DateRange,
    durationMinutes: number,
    options: SearchOptions = {},
  ): Promise<Iterable<CandidateSlot>> {
    const { from, to } = validRange(range);
    const snapshot = await this.store.listSlots({ doctorId, from, to });
    return candidateSlots(snapshot, validDuration(durationMinutes), this.candidateOptions(options));
  }

  /** Top-K candidates across a caller-supplied set of doctors. */
  async suggestAlternatives(
    doctorIds: string[],
    range: DateRange,
    durationMinutes: number,
    limit = this.settings.alternativeSuggestions,
    options: SearchOptions = {},
  ): Promise<CandidateSlot[]> {
    const perDoctor = await Promise.all(
      [...new Set(doctorIds)].map(async (doctorId) =>
        take(await this.findAvailable(doctorId, range, durationMinutes, options), limit),
      ),
    );
    return perDoctor.flat().sort(compareCandidates).slice(0, Math.max(0, limit));
  }

  /** First slot for the preferred doctor, or across every doctor when none is given. */
  async findFirstAvailable(
    preferredDoctorId: string | null,
    range: DateRange,
    durationMinutes: number,
    options: SearchOptions = {},
  ): Promise<CandidateSlot | null> {
    const doctorIds = preferredDoctorId ? [preferredDoctorId] : await this.store.listDoctorIds();
    const [first] = await this.suggestAlternatives(doctorIds, range, durationMinutes, 1, options);
    return first ?? null;
  }

  // ── Writes ──

  async reserve(doctorId: string, slotId: string, draft: AppointmentDraft): Promise<Appointment> {
    const parsedSlot = slotIdSchema.safeParse(slotId);
    if (!parsedSlot.success) throw ValidationError.fromZod("slot id", parsedSlot.error);
    const parsedDraft = appointmentDraftSchema.safeParse(draft);
    if (!parsedDraft.success) throw ValidationError.fromZod("appointment draft", parsedDraft.error);
    const { patientId, durationMinutes, insuranceVerified } = parsedDraft.data;

    const doctors = await this.store.listDoctorIds();
    if (!doctors.includes(doctorId)) throw new NotFoundError("Doctor", doctorId);

    const [date, startTime] = slotId.split("T");
    const slotIds = coveredSlotIds(date, startTime, durationMinutes, this.settings.slotMinutes);
    if (!slotIds) {
      throw new ValidationError(`Appointment at ${slotId} would run past midnight`);
    }

    const appointmentId = await this.store.nextAppointmentId();
    await this.store.claimSlots(doctorId, slotIds, appointmentId);

    const now = new Date().toISOString();
    const appointment: Appointment = {
      id: appointmentId,
      patientId,
      doctorId,
      date,
      startTime,
      endTime: endTime(startTime, durationMinutes),
      durationMinutes,
      slotIds,
      status: "scheduled",
      insuranceVerified: insuranceVerified ?? false,
      formsSent: false,
      formsCompleted: false,
      cancellationReason: null,
      createdAt: now,
      updatedAt: now,
    };

    try {
      const created = await this.store.insertAppointment(appointment);
      console.log(`[reservation] reserved ${doctorId} ${slotId} → ${created.id}`);
      return created;
    } catch (err) {
      await this.store
        .releaseSlots(doctorId, slotIds, appointmentId)
        .catch((releaseErr: unknown) => {
          console.error(`[reservation] could not free ${doctorId} ${slotId}:`, releaseErr);
        });
      throw err;
    }
  }

  async release(appointmentId: string, reason: string): Promise<Appointment> {
    const parsed = releaseInputSchema.safeParse({ appointmentId, reason });
    if (!parsed.success) throw ValidationError.fromZod("release request", parsed.error);

    const appointment = await this.store.getAppointment(appointmentId);
    if (!appointment || appointment.status === "cancelled") {
      throw new NotFoundError("Appointment", appointmentId);
    }
    if (appointment.status === "completed") {
      throw new ValidationError(`Cannot cancel appointment ${appointmentId}: it is completed`);
    }

    await this.store.releaseSlots(appointment.doctorId, appointment.slotIds, appointment.id);
    const cancelled = await this.store.updateAppointment(appointment.id, {
      status: "cancelled",
      cancellationReason: parsed.data.reason,
    });
    console.log(`[reservation] released ${appointment.id}: ${parsed.data.reason}`);
    return cancelled;
  }

  async transitionAppointment(appointmentId: string, to: AppointmentStatus): Promise<Appointment> {
    const appointment = await this.store.getAppointment(appointmentId);
    if (!appointment) throw new NotFoundError("Appointment", appointmentId);
    if (appointment.status === to) return appointment;

    if (!VALID_TRANSITIONS[appointment.status].includes(to)) {
      throw new ValidationError(
        `Cannot move appointment ${appointmentId} from ${appointment.status} to ${to}`,
      );
    }
    return this.store.updateAppointment(appointmentId, { status: to });
  }

  async markFormsSent(appointmentId: string): Promise<Appointment> {
    await this.requireAppointment(appointmentId);
    return this.store.updateAppointment(appointmentId, { formsSent: true });
  }

  async markFormsCompleted(appointmentId: string): Promise<Appointment> {
    await this.requireAppointment(appointmentId);
    return this.store.updateAppointment(appointmentId, { formsSent: true, formsCompleted: true });
  }

  async markInsuranceVerified(appointmentId: string, verified: boolean): Promise<Appointment> {
    await this.requireAppointment(appointmentId);
    return this.store.updateAppointment(appointmentId, { insuranceVerified: verified });
  }

  private async requireAppointment(appointmentId: string): Promise<Appointment> {
    const appointment = await this.store.getAppointment(appointmentId);
    if (!appointment) throw new NotFoundError("Appointment", appointmentId);
    return appointment;
  }

  private candidateOptions(options: SearchOptions): CandidateOptions {
    return { slotMinutes: this.settings.slotMinutes, notBefore: options.notBefore };
  }
}
