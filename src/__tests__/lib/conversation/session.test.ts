import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

import type { StageExtractor } from "@/lib/agents/types";
import { DEFAULT_SCHEDULING } from "@/lib/config";
import { createConversationMachine } from "@/lib/conversation/machine";
import { ConversationSession } from "@/lib/conversation/session";
import { CollaboratorFailureError } from "@/lib/errors";
import { DirectoryInsuranceVerifier } from "@/lib/insurance/verifier";
import { LogAdminNotifier } from "@/lib/notifications/admin";
import { ReminderScheduler } from "@/lib/reminders/scheduler";
import { SlotReservationEngine } from "@/lib/scheduling/reservation";
import { InMemoryRecordStore } from "@/lib/store";
import { SimulatedEmailTransport } from "@/services/email";

import { makePatient, makeSlots } from "../../fixtures";

const GREETING = "Hello! I'm the scheduling assistant for the clinic. I can book your appointment.";
const IDENTIFY_PROMPT =
  "To get started, please tell me your full name and date of birth, or your patient ID if you have one.";

function sessionWith(extract: StageExtractor["extract"]) {
  const store = new InMemoryRecordStore({
    patients: [makePatient()],
    availability: makeSlots("Dr. Smith", "2024-06-04", ["09:00", "09:30"]),
  });
  const engine = new SlotReservationEngine(store);
  const transport = new SimulatedEmailTransport();
  const admin = new LogAdminNotifier();
  const machine = createConversationMachine({
    store,
    engine,
    verifier: new DirectoryInsuranceVerifier(),
    settings: DEFAULT_SCHEDULING,
    now: () => new Date("2024-06-03T12:00:00Z"),
    transport,
    forms: {
      render: async (patientId) => ({
        success: true,
        document: {
          filename: `intake-form-${patientId}.pdf`,
          content: Buffer.from("%PDF"),
          contentType: "application/pdf",
        },
      }),
    },
    admin,
    reminders: new ReminderScheduler({
      store,
      engine,
      transport,
      admin,
      timezone: "UTC",
      publicUrl: "https://clinic.example",
    }),
    publicUrl: "https://clinic.example",
  });
  return new ConversationSession(machine, { extract }, { context: () => "Today is 2024-06-03." });
}

describe("ConversationSession", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("records the opening replies", async () => {
    const session = sessionWith(vi.fn<StageExtractor["extract"]>());

    const turn = await session.start();

    expect(turn.extractionError).toBeNull();
    expect(session.state.stage).toBe("identify");
    expect(session.transcript).toEqual([
      { role: "assistant", content: GREETING },
      { role: "assistant", content: IDENTIFY_PROMPT },
    ]);
  });

  it("hands the stage, history and context to the extractor", async () => {
    const extract = vi.fn<StageExtractor["extract"]>().mockResolvedValue({
      kind: "input",
      input: { kind: "identify", query: { patientId: "P-1" } },
    });
    const session = sessionWith(extract);
    await session.start();

    const turn = await session.send("I'm patient P-1");

    expect(extract).toHaveBeenCalledWith({
      stage: "identify",
      message: "I'm patient P-1",
      transcript: [
        { role: "assistant", content: GREETING },
        { role: "assistant", content: IDENTIFY_PROMPT },
      ],
      context: "Today is 2024-06-03.",
    });
    expect(turn.state.stage).toBe("schedule");
    expect(session.transcript[2]).toEqual({ role: "user", content: "I'm patient P-1" });
    expect(session.transcript).toHaveLength(6);
  });

  it("asks the clarifying question without changing state", async () => {
    const extract = vi
      .fn<StageExtractor["extract"]>()
      .mockResolvedValue({ kind: "clarify", question: "Could you give your date of birth?" });
    const session = sessionWith(extract);
    await session.start();

    const turn = await session.send("I'm Ana");

    expect(turn.replies).toEqual(["Could you give your date of birth?"]);
    expect(session.state.stage).toBe("identify");
    expect(session.transcript.slice(-2)).toEqual([
      { role: "user", content: "I'm Ana" },
      { role: "assistant", content: "Could you give your date of birth?" },
    ]);
  });

  it("apologizes when the extractor fails", async () => {
    const extract = vi
      .fn<StageExtractor["extract"]>()
      .mockRejectedValue(new CollaboratorFailureError("text-generation", "timeout"));
    const session = sessionWith(extract);
    await session.start();

    const turn = await session.send("hello?");

    expect(turn.extractionError).toBe("text-generation: timeout");
    expect(turn.replies).toEqual([
      "Sorry, I'm having trouble understanding right now. Could you try again in a moment?",
    ]);
    expect(session.state.stage).toBe("identify");
  });

  it("falls back to keyword matching for insurance", async () => {
    const extract = vi
      .fn<StageExtractor["extract"]>()
      .mockResolvedValueOnce({ kind: "input", input: { kind: "identify", query: { patientId: "P-1" } } })
      .mockResolvedValueOnce({
        kind: "input",
        input: { kind: "schedule", request: { doctorId: "Dr. Smith", slotId: "2024-06-04T09:00" } },
      })
      .mockRejectedValueOnce(new CollaboratorFailureError("text-generation", "timeout"));
    const session = sessionWith(extract);
    await session.start();
    await session.send("I'm patient P-1");
    await session.send("Dr. Smith tomorrow at 9");
    expect(session.state.stage).toBe("insurance");

    const turn = await session.send("I have Aetna, member ID AB12345");

    expect(turn.extractionError).toBe("text-generation: timeout");
    expect(session.state).toMatchObject({
      stage: "done",
      insurance: { carrier: "Aetna", memberId: "AB12345" },
      insuranceVerified: true,
    });
    expect(session.finished).toBe(true);
  });
});
