import { DEFAULT_REMINDERS, type ReminderSettings } from "@/lib/config";
import { NotFoundError, ValidationError, errorMessage } from "@/lib/errors";
import type { AdminNotifier } from "@/lib/notifications/admin";
import { reminderEmail } from "@/lib/notifications/templates";
import type { SlotReservationEngine } from "@/lib/scheduling/reservation";
import { localToUtc } from "@/lib/scheduling/time";
import type { RecordStore } from "@/lib/store";
import type { EmailTransport } from "@/services/email";
import type { Appointment, ReminderTicket } from "@/types";

import { dueReminder } from "./policy";

// ── Types ──

export interface ReminderSchedulerDeps {
  store: RecordStore;
  engine: SlotReservationEngine;
  transport: EmailTransport;
  admin: AdminNotifier;
  settings?: ReminderSettings;
  timezone: string;
  publicUrl: string;
}

export interface ScanSummary {
  processed: number;
  sent: number;
  failed: number;
  finalized: number;
}

type TicketOutcome = "sent" | "failed" | "finalized" | "idle";

/**
 * Tracks one reminder ticket per confirmed appointment and, on each scan,
 * emits at most one reminder per ticket with rising urgency.
 */
export class ReminderScheduler {
  private readonly settings: ReminderSettings;

  constructor(private readonly deps: ReminderSchedulerDeps) {
    this.settings = deps.settings ?? DEFAULT_REMINDERS;
  }

  async createTicket(appointmentId: string): Promise<ReminderTicket> {
    const existing = await this.deps.store.getReminderTicket(appointmentId);
    if (existing) return existing;

    const appointment = await this.deps.store.getAppointment(appointmentId);
    if (!appointment) throw new NotFoundError("Appointment", appointmentId);
    if (appointment.status !== "confirmed") {
      throw new ValidationError(
        `Reminders need a confirmed appointment; ${appointmentId} is ${appointment.status}`,
      );
    }

    const now = new Date().toISOString();
    const ticket = await this.deps.store.insertReminderTicket({
      appointmentId,
      level: 0,
      sentCount: 0,
      lastSentAt: null,
      acknowledged: false,
      failedAttempts: 0,
      status: "active",
      createdAt: now,
      updatedAt: now,
    });
    console.log(`[reminders] ticket created for ${appointmentId}`);
    return ticket;
  }

  async scan(now: Date = new Date()): Promise<ScanSummary> {
    const tickets = await this.deps.store.listReminderTickets({ statuses: ["active"] });
    const summary: ScanSummary = { processed: 0, sent: 0, failed: 0, finalized: 0 };

    for (const ticket of tickets) {
      summary.processed++;
      try {
        const outcome = await this.processTicket(ticket, now);
        if (outcome === "sent") summary.sent++;
        else if (outcome === "failed") summary.failed++;
        else if (outcome === "finalized") summary.finalized++;
      } catch (err) {
        const message = errorMessage(err);
        console.error(`[reminders] ticket ${ticket.appointmentId} error:`, message);
        summary.failed++;
        await this.recordFailure(ticket, message).catch((recordErr: unknown) => {
          console.error(
            `[reminders] could not record failure for ${ticket.appointmentId}:`,
            errorMessage(recordErr),
          );
        });
      }
    }

    console.log(
      `[reminders] scan done: processed=${summary.processed} sent=${summary.sent} failed=${summary.failed} finalized=${summary.finalized}`,
    );
    return summary;
  }

  /** Patient saw the reminders; the level stops rising. */
  async acknowledge(appointmentId: string): Promise<ReminderTicket> {
    const ticket = await this.deps.store.getReminderTicket(appointmentId);
    if (!ticket) throw new NotFoundError("Reminder ticket", appointmentId);
    if (ticket.acknowledged) return ticket;
    return this.deps.store.updateReminderTicket(appointmentId, { acknowledged: true });
  }

  /**
   * Handles the confirm/cancel link in a reminder. Either answer counts
   * as acknowledgment; a cancel also frees the slot and ends the ticket.
   */
  async respond(appointmentId: string, confirmed: boolean, reason?: string): Promise<Appointment> {
    await this.acknowledge(appointmentId);

    if (confirmed) {
      const appointment = await this.deps.store.getAppointment(appointmentId);
      if (!appointment) throw new NotFoundError("Appointment", appointmentId);
      return appointment;
    }

    const cancelled = await this.deps.engine.release(
      appointmentId,
      reason ?? "Cancelled by patient from reminder",
    );
    await this.deps.store.updateReminderTicket(appointmentId, { status: "finalized" });
    return cancelled;
  }

  // ── Internals ──

  private async processTicket(ticket: ReminderTicket, now: Date): Promise<TicketOutcome> {
    const { store } = this.deps;
    const appointment = await store.getAppointment(ticket.appointmentId);

    if (!appointment || appointment.status === "cancelled" || appointment.status === "completed") {
      await store.updateReminderTicket(ticket.appointmentId, { status: "finalized" });
      return "finalized";
    }

    const startsAt = localToUtc(appointment.date, appointment.startTime, this.deps.timezone);
    if (now.getTime() >= startsAt.getTime()) {
      if (appointment.status === "confirmed") {
        await this.deps.engine.transitionAppointment(appointment.id, "completed");
      }
      await store.updateReminderTicket(ticket.appointmentId, { status: "finalized" });
      return "finalized";
    }

    const due = dueReminder(
      ticket,
      startsAt,
      this.settings.offsetsHours,
      now,
      this.settings.maxLevel,
    );
    if (!due) return "idle";

    const error = await this.sendReminder(appointment, due.level);
    if (!error) {
      await store.updateReminderTicket(ticket.appointmentId, {
        level: due.level,
        sentCount: due.index + 1,
        lastSentAt: now.toISOString(),
        failedAttempts: 0,
      });
      console.log(
        `[reminders] sent level ${due.level} (${due.offsetHours}h) for ${appointment.id}`,
      );
      return "sent";
    }

    await this.recordFailure(ticket, error, appointment);
    return "failed";
  }

  /** Counts a failed attempt; at the retry cap the ticket fails and the admin is told. */
  private async recordFailure(
    ticket: ReminderTicket,
    error: string,
    appointment?: Appointment,
  ): Promise<void> {
    const { store } = this.deps;
    const id = ticket.appointmentId;
    const failedAttempts = ticket.failedAttempts + 1;
    if (failedAttempts < this.settings.maxRetries) {
      await store.updateReminderTicket(id, { failedAttempts });
      console.warn(`[reminders] send failed for ${id} (attempt ${failedAttempts}): ${error}`);
      return;
    }

    await store.updateReminderTicket(id, { failedAttempts, status: "failed" });
    console.error(`[reminders] giving up on ${id} after ${failedAttempts} attempts`);
    const details: Record<string, string> = { appointment: id };
    if (appointment) {
      details.patient = appointment.patientId;
      details.doctor = appointment.doctorId;
      details.when = `${appointment.date} ${appointment.startTime}`;
    }
    details.attempts = String(failedAttempts);
    details.lastError = error;
    const alert = await this.deps.admin.alert({
      kind: "reminder_failed",
      summary: `Reminders for appointment ${id} could not be delivered`,
      details,
    });
    if (!alert.success) {
      console.error(`[reminders] admin alert failed for ${id}:`, alert.error);
    }
  }

  /** Returns an error message, or null when the reminder went out. */
  private async sendReminder(appointment: Appointment, level: number): Promise<string | null> {
    const patient = await this.deps.store.getPatient(appointment.patientId);
    if (!patient) return `patient ${appointment.patientId} not found`;
    if (!patient.email) return `patient ${patient.id} has no email`;

    const content = reminderEmail(level, patient, appointment, this.deps.publicUrl);
    try {
      const result = await this.deps.transport.send({
        to: patient.email,
        subject: content.subject,
        body: content.body,
      });
      return result.success ? null : (result.error ?? "email transport failed");
    } catch (err) {
      return errorMessage(err);
    }
  }
}
