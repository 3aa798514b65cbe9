import { CollaboratorFailureError, NotFoundError, errorMessage } from "@/lib/errors";
import type { AdminNotifier } from "@/lib/notifications/admin";
import { confirmationEmail, intakeFormEmail } from "@/lib/notifications/templates";
import { saveInsurance } from "@/lib/patients/lookup";
import type { ReminderScheduler } from "@/lib/reminders/scheduler";
import type { SlotReservationEngine } from "@/lib/scheduling/reservation";
import type { RecordStore } from "@/lib/store";
import type { EmailAttachment, EmailTransport } from "@/services/email";
import type { IntakeFormRenderer } from "@/services/intake-form";
import type { Appointment, Patient } from "@/types";

import type { Effect, EffectFailure } from "./types";

export interface EffectDeps {
  store: RecordStore;
  engine: SlotReservationEngine;
  transport: EmailTransport;
  forms: IntakeFormRenderer;
  admin: AdminNotifier;
  reminders: ReminderScheduler;
  publicUrl: string;
}

/**
 * Executes the side effects requested by stage handlers. Failures are
 * returned to the caller and never retried here.
 */
export class EffectRunner {
  constructor(private readonly deps: EffectDeps) {}

  async runAll(effects: Effect[]): Promise<EffectFailure[]> {
    const failures: EffectFailure[] = [];
    for (const effect of effects) {
      try {
        await this.run(effect);
      } catch (err) {
        console.error(`[conversation] effect ${effect.type} failed:`, errorMessage(err));
        failures.push({ effect: effect.type, error: errorMessage(err) });
      }
    }
    return failures;
  }

  private async run(effect: Effect): Promise<void> {
    const { store, engine, admin, reminders } = this.deps;

    switch (effect.type) {
      case "reply":
        return;

      case "offer_alternatives":
        console.log(
          `[conversation] offered ${effect.slots.length} alternatives (offer ${effect.attempt})`,
        );
        return;

      case "escalate_to_human": {
        const result = await admin.alert({
          kind: "human_escalation",
          summary: "A patient needs help from staff to finish booking",
          details: { reason: effect.reason },
        });
        if (!result.success) {
          throw new CollaboratorFailureError("admin", result.error ?? "alert failed");
        }
        return;
      }

      case "record_insurance":
        await saveInsurance(store, effect.patientId, effect.details);
        await engine.markInsuranceVerified(effect.appointmentId, effect.verified);
        return;

      case "insurance_unverified": {
        console.warn(
          `[conversation] appointment ${effect.appointmentId} flagged: insurance unverified (${effect.reason})`,
        );
        const result = await admin.alert({
          kind: "insurance_unverified",
          summary: `Insurance could not be verified for appointment ${effect.appointmentId}`,
          details: { appointment: effect.appointmentId, reason: effect.reason },
        });
        if (!result.success) {
          throw new CollaboratorFailureError("admin", result.error ?? "alert failed");
        }
        return;
      }

      case "confirm_appointment":
        await engine.transitionAppointment(effect.appointmentId, "confirmed");
        return;

      case "send_confirmation_email": {
        const { appointment, patient, email } = await this.recipient(effect.appointmentId);
        const content = confirmationEmail(patient, appointment, this.deps.publicUrl);
        await this.send(email, content.subject, content.body);
        return;
      }

      case "send_intake_forms": {
        const { appointment, patient, email } = await this.recipient(effect.appointmentId);
        const form = await this.deps.forms.render(patient.id);
        if (!form.success || !form.document) {
          throw new CollaboratorFailureError("pdf", form.error ?? "intake form unavailable");
        }
        const content = intakeFormEmail(patient, appointment);
        await this.send(email, content.subject, content.body, [form.document]);
        await engine.markFormsSent(appointment.id);
        return;
      }

      case "create_reminder_ticket":
        await reminders.createTicket(effect.appointmentId);
        return;

      case "release_slot":
        await engine.release(effect.appointmentId, effect.reason);
        return;
    }
  }

  private async recipient(
    appointmentId: string,
  ): Promise<{ appointment: Appointment; patient: Patient; email: string }> {
    const appointment = await this.deps.store.getAppointment(appointmentId);
    if (!appointment) throw new NotFoundError("Appointment", appointmentId);
    const patient = await this.deps.store.getPatient(appointment.patientId);
    if (!patient) throw new NotFoundError("Patient", appointment.patientId);
    if (!patient.email) {
      throw new CollaboratorFailureError("email", `patient ${patient.id} has no email address`);
    }
    return { appointment, patient, email: patient.email };
  }

  private async send(
    to: string,
    subject: string,
    body: string,
    attachments?: EmailAttachment[],
  ): Promise<void> {
    const result = await this.deps.transport.send({ to, subject, body, attachments });
    if (!result.success) {
      throw new CollaboratorFailureError("email", result.error ?? "send failed");
    }
  }
}
