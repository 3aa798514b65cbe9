import { describe, it, expect } from "vitest";

import {
  candidateSlots,
  coveredSlotIds,
  formatSlots,
  slotsNeeded,
  take,
} from "@/lib/scheduling/availability";

import { makeSlots } from "../../fixtures";

const GRID = { slotMinutes: 30 };

function starts(iterable: Iterable<{ doctorId: string; startTime: string }>): string[] {
  return [...iterable].map((c) => `${c.doctorId} ${c.startTime}`);
}

describe("slotsNeeded", () => {
  it("rounds partial slots up", () => {
    expect(slotsNeeded(30, 30)).toBe(1);
    expect(slotsNeeded(45, 30)).toBe(2);
    expect(slotsNeeded(60, 30)).toBe(2);
  });
});

describe("coveredSlotIds", () => {
  it("lists consecutive grid slots", () => {
    expect(coveredSlotIds("2024-06-04", "09:00", 60, 30)).toEqual([
      "2024-06-04T09:00",
      "2024-06-04T09:30",
    ]);
  });

  it("returns null when the span leaves the day", () => {
    expect(coveredSlotIds("2024-06-04", "23:30", 60, 30)).toBeNull();
  });
});

describe("candidateSlots", () => {
  it("yields free start slots in time order", () => {
    const snapshot = makeSlots("Dr. Smith", "2024-06-04", ["10:00", "09:00", "09:30"]);
    const candidates = [...candidateSlots(snapshot, 30, GRID)];

    expect(candidates.map((c) => c.slotId)).toEqual([
      "2024-06-04T09:00",
      "2024-06-04T09:30",
      "2024-06-04T10:00",
    ]);
    expect(candidates[0]).toEqual({
      doctorId: "Dr. Smith",
      slotId: "2024-06-04T09:00",
      date: "2024-06-04",
      startTime: "09:00",
      endTime: "09:30",
      durationMinutes: 30,
      slotIds: ["2024-06-04T09:00"],
    });
  });

  it("never yields an occupied slot", () => {
    const snapshot = [
      ...makeSlots("Dr. Smith", "2024-06-04", ["09:00"], "A-1"),
      ...makeSlots("Dr. Smith", "2024-06-04", ["09:30", "10:00"]),
    ];
    expect(starts(candidateSlots(snapshot, 30, GRID))).toEqual([
      "Dr. Smith 09:30",
      "Dr. Smith 10:00",
    ]);
  });

  it("needs every covered slot free for longer visits", () => {
    const snapshot = [
      ...makeSlots("Dr. Smith", "2024-06-04", ["09:00", "10:00", "10:30", "11:00"]),
      ...makeSlots("Dr. Smith", "2024-06-04", ["09:30"], "A-1"),
    ];
    const candidates = [...candidateSlots(snapshot, 60, GRID)];

    expect(candidates.map((c) => c.startTime)).toEqual(["10:00", "10:30"]);
    expect(candidates[0].endTime).toBe("11:00");
    expect(candidates[0].slotIds).toEqual(["2024-06-04T10:00", "2024-06-04T10:30"]);
  });

  it("breaks ties by date, then time, then doctor", () => {
    const snapshot = [
      ...makeSlots("Dr. Smith", "2024-06-05", ["09:00"]),
      ...makeSlots("Dr. Smith", "2024-06-04", ["09:30"]),
      ...makeSlots("Dr. Lee", "2024-06-04", ["09:30"]),
      ...makeSlots("Dr. Smith", "2024-06-04", ["09:00"]),
    ];
    expect([...candidateSlots(snapshot, 30, GRID)].map((c) => `${c.date} ${c.startTime} ${c.doctorId}`)).toEqual([
      "2024-06-04 09:00 Dr. Smith",
      "2024-06-04 09:30 Dr. Lee",
      "2024-06-04 09:30 Dr. Smith",
      "2024-06-05 09:00 Dr. Smith",
    ]);
  });

  it("skips start slots before notBefore", () => {
    const snapshot = makeSlots("Dr. Smith", "2024-06-04", ["09:00", "09:30", "10:00"]);
    const candidates = candidateSlots(snapshot, 30, { ...GRID, notBefore: "2024-06-04T09:30" });
    expect(starts(candidates)).toEqual(["Dr. Smith 09:30", "Dr. Smith 10:00"]);
  });

  it("can be iterated more than once", () => {
    const snapshot = makeSlots("Dr. Smith", "2024-06-04", ["09:00", "09:30"]);
    const candidates = candidateSlots(snapshot, 30, GRID);

    expect(starts(candidates)).toEqual(["Dr. Smith 09:00", "Dr. Smith 09:30"]);
    expect(starts(candidates)).toEqual(["Dr. Smith 09:00", "Dr. Smith 09:30"]);
  });

  it("does not see later changes to the input array", () => {
    const snapshot = makeSlots("Dr. Smith", "2024-06-04", ["09:00"]);
    const candidates = candidateSlots(snapshot, 30, GRID);
    snapshot.push(...makeSlots("Dr. Smith", "2024-06-04", ["09:30"]));

    expect(starts(candidates)).toEqual(["Dr. Smith 09:00"]);
  });
});

describe("take", () => {
  it("stops after the limit", () => {
    expect(take([1, 2, 3], 2)).toEqual([1, 2]);
    expect(take([1, 2, 3], 0)).toEqual([]);
  });
});

describe("formatSlots", () => {
  it("groups slots by date", () => {
    const slots = [...candidateSlots(
      [
        ...makeSlots("Dr. Smith", "2024-06-04", ["09:30", "10:00"]),
        ...makeSlots("Dr. Lee", "2024-06-05", ["14:00"]),
      ],
      30,
      GRID,
    )];

    expect(formatSlots(slots)).toBe(
      "Tuesday, June 4: 09:30 (Dr. Smith), 10:00 (Dr. Smith)\nWednesday, June 5: 14:00 (Dr. Lee)",
    );
  });

  it("says so when there is nothing to show", () => {
    expect(formatSlots([])).toBe("No available slots.");
  });
});
