import type { AvailabilitySlot, CandidateSlot } from "@/types";

import { addMinutes, endTime } from "./time";

// ---------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------

export interface CandidateOptions {
  slotMinutes: number;
  /** Start slots strictly before this "YYYY-MM-DDTHH:MM" key are skipped. */
  notBefore?: string;
}

// ---------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------

/** Earliest date, then earliest time, then lowest doctor id. */
export function compareCandidates(
  a: Pick<CandidateSlot, "date" | "startTime" | "doctorId">,
  b: Pick<CandidateSlot, "date" | "startTime" | "doctorId">,
): number {
  if (a.date !== b.date) return a.date < b.date ? -1 : 1;
  if (a.startTime !== b.startTime) return a.startTime < b.startTime ? -1 : 1;
  if (a.doctorId !== b.doctorId) return a.doctorId < b.doctorId ? -1 : 1;
  return 0;
}

function toKey(doctorId: string, date: string, time: string): string {
  return `${doctorId}|${date}T${time}`;
}

/** How many consecutive grid slots a duration covers. */
export function slotsNeeded(durationMinutes: number, slotMinutes: number): number {
  return Math.max(1, Math.ceil(durationMinutes / slotMinutes));
}

/**
 * The ids of the grid slots a booking starting at `time` would occupy,
 * or null when the span leaves the day.
 */
export function coveredSlotIds(
  date: string,
  time: string,
  durationMinutes: number,
  slotMinutes: number,
): string[] | null {
  const ids: string[] = [];
  for (let i = 0; i < slotsNeeded(durationMinutes, slotMinutes); i++) {
    const t = addMinutes(time, i * slotMinutes);
    if (t === null) return null;
    ids.push(`${date}T${t}`);
  }
  return ids;
}

// ---------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------

/**
 * Lazily walks a snapshot of availability rows and yields every start slot
 * whose covered slots all exist and are free, in tie-break order.
 * The returned iterable can be iterated any number of times.
 */
export function candidateSlots(
  snapshot: AvailabilitySlot[],
  durationMinutes: number,
  options: CandidateOptions,
): Iterable<CandidateSlot> {
  const rows = [...snapshot].sort((a, b) =>
    compareCandidates(
      { date: a.date, startTime: a.time, doctorId: a.doctorId },
      { date: b.date, startTime: b.time, doctorId: b.doctorId },
    ),
  );
  const index = new Map<string, AvailabilitySlot>();
  for (const row of rows) index.set(toKey(row.doctorId, row.date, row.time), row);

  return {
    *[Symbol.iterator]() {
      for (const row of rows) {
        if (row.appointmentId !== null) continue;
        if (options.notBefore && `${row.date}T${row.time}` < options.notBefore) continue;

        const ids = coveredSlotIds(row.date, row.time, durationMinutes, options.slotMinutes);
        if (!ids) continue;

        const allFree = ids.every((id) => {
          const [date, time] = id.split("T");
          const covered = index.get(toKey(row.doctorId, date, time));
          return covered !== undefined && covered.appointmentId === null;
        });
        if (!allFree) continue;

        yield {
          doctorId: row.doctorId,
          slotId: ids[0],
          date: row.date,
          startTime: row.time,
          endTime: endTime(row.time, durationMinutes),
          durationMinutes,
          slotIds: ids,
        };
      }
    },
  };
}

/** First `limit` items of an iterable. */
export function take<T>(items: Iterable<T>, limit: number): T[] {
  const out: T[] = [];
  if (limit <= 0) return out;
  for (const item of items) {
    out.push(item);
    if (out.length >= limit) break;
  }
  return out;
}

/**
 * Formats candidate slots as a human-readable list grouped by date.
 *
 * Example output:
 *   Tuesday, June 4: 09:30 (Smith), 10:00 (Smith)
 */
export function formatSlots(slots: CandidateSlot[], locale = "en-US"): string {
  if (slots.length === 0) {
    return "No available slots.";
  }

  const dateFormatter = new Intl.DateTimeFormat(locale, {
    timeZone: "UTC",
    weekday: "long",
    day: "numeric",
    month: "long",
  });

  const grouped = new Map<string, string[]>();
  for (const slot of slots) {
    const dateKey = dateFormatter.format(new Date(`${slot.date}T12:00:00Z`));
    const label = `${slot.startTime} (${slot.doctorId})`;
    const existing = grouped.get(dateKey);
    if (existing) {
      existing.push(label);
    } else {
      grouped.set(dateKey, [label]);
    }
  }

  const lines: string[] = [];
  for (const [dateLabel, labels] of grouped) {
    lines.push(`${dateLabel}: ${labels.join(", ")}`);
  }
  return lines.join("\n");
}
