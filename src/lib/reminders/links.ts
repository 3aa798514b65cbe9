import { NotFoundError, ValidationError } from "@/lib/errors";
import type { SlotReservationEngine } from "@/lib/scheduling/reservation";
import type { RecordStore } from "@/lib/store";
import { linkResponseSchema, type LinkResponse } from "@/lib/validations/scheduling";
import type { Appointment } from "@/types";

import type { ReminderScheduler } from "./scheduler";

export interface LinkHandlerDeps {
  store: RecordStore;
  engine: SlotReservationEngine;
  reminders: ReminderScheduler;
}

export interface LinkOutcome {
  appointment: Appointment;
  message: string;
}

/**
 * Applies a patient's answer from an emailed link: confirm or cancel the
 * appointment, or record the intake form as completed. Confirming and
 * cancelling also acknowledge the reminder ticket when one exists.
 */
export async function handleAppointmentLink(
  deps: LinkHandlerDeps,
  input: LinkResponse,
): Promise<LinkOutcome> {
  const parsed = linkResponseSchema.safeParse(input);
  if (!parsed.success) throw ValidationError.fromZod("link response", parsed.error);
  const { appointmentId, action, reason } = parsed.data;

  const appointment = await deps.store.getAppointment(appointmentId);
  if (!appointment) throw new NotFoundError("Appointment", appointmentId);
  if (appointment.status === "cancelled") {
    throw new ValidationError(`Appointment ${appointmentId} is already cancelled`);
  }
  const ticket = await deps.store.getReminderTicket(appointmentId);

  switch (action) {
    case "confirm": {
      const confirmed = await deps.engine.transitionAppointment(appointmentId, "confirmed");
      if (ticket) await deps.reminders.acknowledge(appointmentId);
      console.log(`[links] ${appointmentId} confirmed by patient`);
      return {
        appointment: confirmed,
        message: `Appointment ${appointmentId} with ${confirmed.doctorId} on ${confirmed.date} at ${confirmed.startTime} is confirmed.`,
      };
    }

    case "cancel": {
      const cancelled = ticket
        ? await deps.reminders.respond(appointmentId, false, reason)
        : await deps.engine.release(appointmentId, reason ?? "Cancelled by patient from email");
      console.log(`[links] ${appointmentId} cancelled by patient`);
      return {
        appointment: cancelled,
        message: `Appointment ${appointmentId} has been cancelled and the time slot released.`,
      };
    }

    case "forms-completed": {
      const updated = await deps.engine.markFormsCompleted(appointmentId);
      console.log(`[links] ${appointmentId} intake form completed`);
      return {
        appointment: updated,
        message: `Intake form recorded as completed for appointment ${appointmentId}.`,
      };
    }
  }
}
