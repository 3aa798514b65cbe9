import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from "vitest";
import type { SupabaseClient } from "@supabase/supabase-js";

import { NotFoundError, SlotUnavailableError, ValidationError } from "@/lib/errors";
import { SupabaseRecordStore } from "@/lib/store";

import { makePatient } from "../../fixtures";

// ── Mock helpers ──

interface QueryResult {
  data: unknown;
  error: { message: string; code?: string } | null;
}

interface MockChainable {
  select: Mock;
  insert: Mock;
  update: Mock;
  upsert: Mock;
  eq: Mock;
  is: Mock;
  in: Mock;
  gte: Mock;
  lte: Mock;
  order: Mock;
  single: Mock;
  maybeSingle: Mock;
  then: (
    onFulfilled: (value: QueryResult) => unknown,
    onRejected?: (reason: unknown) => unknown,
  ) => Promise<unknown>;
}

function createChainable(result: QueryResult): MockChainable {
  const chain: MockChainable = {
    select: vi.fn(),
    insert: vi.fn(),
    update: vi.fn(),
    upsert: vi.fn(),
    eq: vi.fn(),
    is: vi.fn(),
    in: vi.fn(),
    gte: vi.fn(),
    lte: vi.fn(),
    order: vi.fn(),
    single: vi.fn().mockResolvedValue(result),
    maybeSingle: vi.fn().mockResolvedValue(result),
    then: (onFulfilled, onRejected) => Promise.resolve(result).then(onFulfilled, onRejected),
  };
  for (const fn of [
    chain.select,
    chain.insert,
    chain.update,
    chain.upsert,
    chain.eq,
    chain.is,
    chain.in,
    chain.gte,
    chain.lte,
    chain.order,
  ]) {
    fn.mockReturnValue(chain);
  }
  return chain;
}

// One queued result per from() call, in call order
function createMockSupabase(results: QueryResult[]) {
  const chains: MockChainable[] = [];
  const from = vi.fn().mockImplementation(() => {
    const chain = createChainable(results.shift() ?? { data: null, error: null });
    chains.push(chain);
    return chain;
  });
  return { client: { from }, from, chains };
}

function storeWith(results: QueryResult[]) {
  const mock = createMockSupabase(results);
  const store = new SupabaseRecordStore(mock.client as unknown as SupabaseClient);
  return { store, ...mock };
}

const PATIENT_ROW = {
  patient_id: "P-1",
  name: "Ana Smith",
  date_of_birth: "1985-03-12",
  email: "ana.smith@example.com",
  phone: "555-123-4567",
  insurance_carrier: null,
  member_id: null,
  group_number: null,
  doctor_preference: null,
  location: null,
  patient_type: "returning",
  created_at: "2024-05-01T12:00:00+00:00",
  updated_at: "2024-05-01T12:00:00+00:00",
};

const SLOT_ROW = {
  doctor_id: "Dr. Smith",
  date: "2024-06-04",
  time: "09:00:00",
  appointment_id: null,
};

// ── Tests ──

describe("SupabaseRecordStore", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("maps a snake_case patient row to a domain row", async () => {
    const { store, from, chains } = storeWith([{ data: PATIENT_ROW, error: null }]);

    const patient = await store.getPatient("P-1");

    expect(patient).toEqual(makePatient());
    expect(from).toHaveBeenCalledWith("patients");
    expect(chains[0].eq).toHaveBeenCalledWith("patient_id", "P-1");
  });

  it("returns null for a missing patient", async () => {
    const { store } = storeWith([{ data: null, error: null }]);
    expect(await store.getPatient("P-9")).toBeNull();
  });

  it("applies slot filters and trims seconds from times", async () => {
    const { store, chains } = storeWith([{ data: [SLOT_ROW], error: null }]);

    const slots = await store.listSlots({ doctorId: "Dr. Smith", from: "2024-06-04", to: "2024-06-05" });

    expect(slots).toEqual([
      { doctorId: "Dr. Smith", date: "2024-06-04", time: "09:00", appointmentId: null },
    ]);
    expect(chains[0].eq).toHaveBeenCalledWith("doctor_id", "Dr. Smith");
    expect(chains[0].gte).toHaveBeenCalledWith("date", "2024-06-04");
    expect(chains[0].lte).toHaveBeenCalledWith("date", "2024-06-05");
  });

  it("maps a unique violation on insert to a validation error", async () => {
    const { store } = storeWith([
      { data: null, error: { message: "duplicate key", code: "23505" } },
    ]);

    const attempt = store.insertPatient(makePatient());
    await expect(attempt).rejects.toThrow(ValidationError);
    await expect(attempt).rejects.toThrow("Patient P-1 already exists");
  });

  it("reports an update of a missing appointment as not found", async () => {
    const { store } = storeWith([{ data: null, error: null }]);
    await expect(store.updateAppointment("A-4", { formsSent: true })).rejects.toThrow(
      NotFoundError,
    );
  });

  it("surfaces query errors", async () => {
    const { store } = storeWith([{ data: null, error: { message: "boom" } }]);
    await expect(store.listPatients()).rejects.toThrow("listPatients failed: boom");
  });

  it("computes the next id from existing ids", async () => {
    const { store } = storeWith([
      { data: [{ patient_id: "P-2" }, { patient_id: "P-10" }], error: null },
    ]);
    expect(await store.nextPatientId()).toBe("P-11");
  });

  describe("claimSlots", () => {
    it("claims each slot with a conditional update", async () => {
      const { store, chains } = storeWith([
        { data: [{ ...SLOT_ROW, appointment_id: "A-1" }], error: null },
        { data: [{ ...SLOT_ROW, time: "09:30:00", appointment_id: "A-1" }], error: null },
      ]);

      await store.claimSlots("Dr. Smith", ["2024-06-04T09:00", "2024-06-04T09:30"], "A-1");

      expect(chains).toHaveLength(2);
      expect(chains[0].update).toHaveBeenCalledWith({ appointment_id: "A-1" });
      expect(chains[0].is).toHaveBeenCalledWith("appointment_id", null);
      expect(chains[1].eq).toHaveBeenCalledWith("time", "09:30");
    });

    it("rolls back a partial claim when a slot is taken", async () => {
      const { store, chains } = storeWith([
        { data: [{ ...SLOT_ROW, appointment_id: "A-1" }], error: null },
        { data: [], error: null },
        { data: null, error: null },
        { data: { ...SLOT_ROW, time: "09:30:00", appointment_id: "A-7" }, error: null },
      ]);

      await expect(
        store.claimSlots("Dr. Smith", ["2024-06-04T09:00", "2024-06-04T09:30"], "A-1"),
      ).rejects.toThrow(SlotUnavailableError);

      const rollback = chains[2];
      expect(rollback.update).toHaveBeenCalledWith({ appointment_id: null });
      expect(rollback.eq).toHaveBeenCalledWith("time", "09:00");
      expect(rollback.eq).toHaveBeenCalledWith("appointment_id", "A-1");
    });

    it("reports a slot that does not exist", async () => {
      const { store } = storeWith([
        { data: [], error: null },
        { data: null, error: null },
      ]);

      await expect(
        store.claimSlots("Dr. Smith", ["2024-06-04T09:00"], "A-1"),
      ).rejects.toThrow("Slot Dr. Smith/2024-06-04T09:00 not found");
    });
  });
});
