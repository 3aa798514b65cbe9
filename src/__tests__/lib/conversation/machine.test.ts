import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import { DEFAULT_SCHEDULING, type SchedulingSettings } from "@/lib/config";
import { createConversationMachine } from "@/lib/conversation/machine";
import { initialState, type ConversationState } from "@/lib/conversation/types";
import { DirectoryInsuranceVerifier } from "@/lib/insurance/verifier";
import type { AdminNotifier } from "@/lib/notifications/admin";
import { ReminderScheduler } from "@/lib/reminders/scheduler";
import { SlotReservationEngine } from "@/lib/scheduling/reservation";
import { InMemoryRecordStore } from "@/lib/store";
import { SimulatedEmailTransport } from "@/services/email";
import type { IntakeFormRenderer } from "@/services/intake-form";

import { makePatient, makeSlots } from "../../fixtures";

const NOW = new Date("2024-06-03T12:00:00Z");

function clinic(settings: Partial<SchedulingSettings> = {}) {
  const store = new InMemoryRecordStore({
    patients: [makePatient()],
    availability: [
      ...makeSlots("Dr. Smith", "2024-06-04", ["09:00", "09:30", "10:00"]),
      ...makeSlots("Dr. Lee", "2024-06-04", ["10:00"]),
    ],
  });
  const schedulingSettings = { ...DEFAULT_SCHEDULING, ...settings };
  const engine = new SlotReservationEngine(store, schedulingSettings);
  const transport = new SimulatedEmailTransport();
  const alert = vi.fn<AdminNotifier["alert"]>().mockResolvedValue({ success: true });
  const admin: AdminNotifier = { alert };
  const render = vi.fn<IntakeFormRenderer["render"]>().mockResolvedValue({
    success: true,
    document: {
      filename: "intake-form-P-1.pdf",
      content: Buffer.from("%PDF-1.4"),
      contentType: "application/pdf",
    },
  });
  const reminders = new ReminderScheduler({
    store,
    engine,
    transport,
    admin,
    timezone: "UTC",
    publicUrl: "https://clinic.example",
  });
  const machine = createConversationMachine({
    store,
    engine,
    verifier: new DirectoryInsuranceVerifier(),
    settings: schedulingSettings,
    now: () => NOW,
    transport,
    forms: { render },
    admin,
    reminders,
    publicUrl: "https://clinic.example",
  });
  return { store, transport, alert, render, machine };
}

function returningAt(stage: ConversationState["stage"], overrides: Partial<ConversationState> = {}) {
  return {
    ...initialState(),
    stage,
    patientId: "P-1",
    patientType: "returning" as const,
    draft: { name: "Ana Smith", dateOfBirth: "1985-03-12" },
    ...overrides,
  };
}

describe("ConversationMachine", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("greets and waits for identification", async () => {
    const { machine } = clinic();

    const result = await machine.start(initialState());

    expect(result.state.stage).toBe("identify");
    expect(result.replies).toEqual([
      "Hello! I'm the scheduling assistant for the clinic. I can book your appointment.",
      "To get started, please tell me your full name and date of birth, or your patient ID if you have one.",
    ]);
  });

  it("books a returning patient end to end", async () => {
    const { store, transport, machine } = clinic();

    const identified = await machine.turn(returningAt("identify", { patientId: null, patientType: null, draft: {} }), {
      kind: "identify",
      query: { patientId: "P-1" },
    });
    expect(identified.state.stage).toBe("schedule");
    expect(identified.replies).toEqual([
      "Welcome back, Ana Smith! I found your record (P-1).",
      "Thanks, Ana Smith. Your details are up to date.",
      "Which day, time or doctor would you prefer?",
    ]);

    const booked = await machine.turn(identified.state, {
      kind: "schedule",
      request: { doctorId: "Dr. Smith", date: "2024-06-04", time: "09:30" },
    });
    expect(booked.state).toMatchObject({ stage: "insurance", appointmentId: "A-1" });
    expect(booked.replies).toEqual([
      "You're booked with Dr. Smith on 2024-06-04 at 09:30 (30 minutes).",
      "Which insurance carrier do you have?",
    ]);

    const finished = await machine.turn(booked.state, {
      kind: "insurance",
      details: { carrier: "Aetna", memberId: "AB12345" },
    });
    expect(finished.state.stage).toBe("done");
    expect(finished.failures).toEqual([]);
    expect(finished.effects.map((e) => e.type)).toEqual([
      "record_insurance",
      "reply",
      "confirm_appointment",
      "send_confirmation_email",
      "reply",
      "send_intake_forms",
      "reply",
      "create_reminder_ticket",
      "reply",
    ]);

    expect(await store.getAppointment("A-1")).toMatchObject({
      status: "confirmed",
      insuranceVerified: true,
      formsSent: true,
    });
    expect((await store.getPatient("P-1"))?.insuranceCarrier).toBe("Aetna");
    expect((await store.getReminderTicket("A-1"))?.status).toBe("active");
    expect(transport.outbox.map((m) => m.subject)).toEqual([
      "Appointment Confirmation with Dr. Smith",
      "Please Complete Your Patient Intake Form",
    ]);
    expect(transport.outbox[1].attachments?.map((a) => a.filename)).toEqual([
      "intake-form-P-1.pdf",
    ]);
  });

  it("registers a new patient after a lookup miss", async () => {
    const { store, machine } = clinic();

    const missed = await machine.turn(
      { ...initialState(), stage: "identify" },
      { kind: "identify", query: { name: "Ben Ortiz", dateOfBirth: "1990-01-01" } },
    );
    expect(missed.state).toMatchObject({ stage: "collect", patientType: "new" });
    expect(missed.replies).toEqual([
      "I couldn't find an existing record, so let's set up a new patient profile.",
      "What email address should we send your confirmation to?",
    ]);

    const saved = await machine.turn(missed.state, {
      kind: "collect",
      fields: { email: "ben@example.com", phone: "555-987-6543" },
    });
    expect(saved.state).toMatchObject({ stage: "schedule", patientId: "P-2" });
    expect(saved.replies[0]).toBe("Thanks, Ben Ortiz. Your new patient ID is P-2.");
    expect((await store.getPatient("P-2"))?.patientType).toBe("new");

    // New patients get the longer visit, at the first open time
    const booked = await machine.turn(saved.state, { kind: "schedule", request: {} });
    expect(booked.replies[0]).toBe(
      "You're booked with Dr. Smith on 2024-06-04 at 09:00 (60 minutes).",
    );
    expect((await store.getAppointment("A-1"))?.slotIds).toEqual([
      "2024-06-04T09:00",
      "2024-06-04T09:30",
    ]);
  });

  it("starts an empty profile for an unknown patient id", async () => {
    const { store, machine } = clinic();

    const missed = await machine.turn(
      { ...initialState(), stage: "identify" },
      { kind: "identify", query: { patientId: "P-404" } },
    );
    expect(missed.state.draft).toEqual({
      name: undefined,
      dateOfBirth: undefined,
      email: undefined,
      phone: undefined,
    });
    expect(missed.replies[1]).toBe("What is your full name?");

    const saved = await machine.turn(missed.state, {
      kind: "collect",
      fields: {
        name: "Cara Diaz",
        dateOfBirth: "1979-11-30",
        email: "cara@example.com",
        phone: "555-222-3333",
      },
    });
    expect(saved.state.patientId).toBe("P-2");
    expect(await store.getPatient("P-404")).toBeNull();
  });

  it("still completes the booking when insurance is not verified", async () => {
    const { store, alert, machine } = clinic();
    const booked = await machine.turn(returningAt("schedule"), {
      kind: "schedule",
      request: { slotId: "2024-06-04T10:00", doctorId: "Dr. Lee" },
    });

    const finished = await machine.turn(booked.state, {
      kind: "insurance",
      details: { carrier: "Acme Health", memberId: "XY99" },
    });

    expect(finished.state).toMatchObject({ stage: "done", insuranceVerified: false });
    expect(await store.getAppointment("A-1")).toMatchObject({
      doctorId: "Dr. Lee",
      status: "confirmed",
      insuranceVerified: false,
    });
    expect(alert).toHaveBeenCalledWith({
      kind: "insurance_unverified",
      summary: "Insurance could not be verified for appointment A-1",
      details: { appointment: "A-1", reason: 'Carrier "Acme Health" is not accepted' },
    });
  });

  it("reports malformed insurance details as the unverified reason", async () => {
    const { alert, machine } = clinic();
    const booked = await machine.turn(returningAt("schedule"), {
      kind: "schedule",
      request: { slotId: "2024-06-04T09:30", doctorId: "Dr. Smith" },
    });

    const finished = await machine.turn(booked.state, {
      kind: "insurance",
      details: { carrier: "Aetna", memberId: "AB" },
    });

    expect(finished.state).toMatchObject({ stage: "done", insuranceVerified: false });
    expect(alert).toHaveBeenCalledWith({
      kind: "insurance_unverified",
      summary: "Insurance could not be verified for appointment A-1",
      details: {
        appointment: "A-1",
        reason: "Invalid insurance details: memberId: String must contain at least 4 character(s)",
      },
    });
  });

  it("releases the held slot when the patient cancels", async () => {
    const { store, machine } = clinic();
    const booked = await machine.turn(returningAt("schedule"), {
      kind: "schedule",
      request: { slotId: "2024-06-04T09:00", doctorId: "Dr. Smith" },
    });

    const cancelled = await machine.turn(booked.state, { kind: "cancel" });

    expect(cancelled.state.stage).toBe("aborted");
    expect(cancelled.replies).toEqual([
      "Okay, I've cancelled the booking and released the time slot.",
    ]);
    expect(await store.getAppointment("A-1")).toMatchObject({
      status: "cancelled",
      cancellationReason: "Patient cancelled during booking",
    });
    expect((await store.getSlot("Dr. Smith", "2024-06-04T09:00"))?.appointmentId).toBeNull();
  });

  it("offers alternatives, then hands off to staff", async () => {
    const { alert, machine } = clinic({ maxAlternativeOffers: 1 });

    const offered = await machine.turn(returningAt("schedule"), {
      kind: "schedule",
      request: { doctorId: "Dr. Lee", date: "2024-06-05" },
    });
    expect(offered.state.alternativeOffers).toBe(1);
    expect(offered.state.lastOffered.map((s) => `${s.doctorId} ${s.slotId}`)).toEqual([
      "Dr. Smith 2024-06-04T09:00",
      "Dr. Smith 2024-06-04T09:30",
      "Dr. Lee 2024-06-04T10:00",
    ]);

    const escalated = await machine.turn(offered.state, {
      kind: "schedule",
      request: { doctorId: "Dr. Lee", date: "2024-06-05" },
    });
    expect(escalated.state).toMatchObject({ stage: "schedule", escalated: true });
    expect(escalated.replies).toEqual([
      "I'm having trouble finding a time that works. A member of our staff will contact you to finish booking.",
    ]);
    expect(alert).toHaveBeenCalledWith({
      kind: "human_escalation",
      summary: "A patient needs help from staff to finish booking",
      details: { reason: "No agreeable slot after 1 alternative offers" },
    });
  });

  it("rejects a time in the past", async () => {
    const { machine } = clinic();
    const result = await machine.turn(returningAt("schedule"), {
      kind: "schedule",
      request: { slotId: "2024-06-03T09:00", doctorId: "Dr. Smith" },
    });

    expect(result.state.stage).toBe("schedule");
    expect(result.replies).toEqual(["Sorry, something went wrong: 2024-06-03T09:00 is in the past"]);
  });

  it("reports effect failures without stopping the conversation", async () => {
    const { render, store, machine } = clinic();
    render.mockResolvedValue({ success: false, error: "intake form unavailable at missing.pdf" });
    const booked = await machine.turn(returningAt("schedule"), {
      kind: "schedule",
      request: { slotId: "2024-06-04T09:00", doctorId: "Dr. Smith" },
    });

    const finished = await machine.turn(booked.state, {
      kind: "insurance",
      details: { carrier: "Cigna", memberId: "CG55555" },
    });

    expect(finished.state.stage).toBe("done");
    expect(finished.failures).toEqual([
      { effect: "send_intake_forms", error: "pdf: intake form unavailable at missing.pdf" },
    ]);
    expect((await store.getAppointment("A-1"))?.formsSent).toBe(false);
  });
});
