import { addMinutes, datesBetween, toMinutes, weekday } from "@/lib/scheduling/time";
import type { AvailabilitySlot } from "@/types";

import { slotIdOf, slotKey, type RecordStore } from "./types";

export interface WorkingBlock {
  start: string; // HH:MM
  end: string; // HH:MM, exclusive
}

// Morning and afternoon sessions with a lunch break
export const DEFAULT_WORKING_BLOCKS: WorkingBlock[] = [
  { start: "09:00", end: "12:00" },
  { start: "13:00", end: "17:00" },
];

export interface GenerateAvailabilityOptions {
  doctorIds: string[];
  from: string;
  to: string;
  slotMinutes?: number;
  blocks?: WorkingBlock[];
  includeWeekends?: boolean;
}

/** Builds free slots on a fixed grid for every doctor and working day. */
export function generateAvailability(options: GenerateAvailabilityOptions): AvailabilitySlot[] {
  const slotMinutes = options.slotMinutes ?? 30;
  const blocks = options.blocks ?? DEFAULT_WORKING_BLOCKS;
  const slots: AvailabilitySlot[] = [];

  for (const date of datesBetween(options.from, options.to)) {
    const day = weekday(date);
    if (!options.includeWeekends && (day === 0 || day === 6)) continue;

    for (const doctorId of options.doctorIds) {
      for (const block of blocks) {
        const end = toMinutes(block.end);
        let cursor: string | null = block.start;
        while (cursor !== null && toMinutes(cursor) + slotMinutes <= end) {
          slots.push({ doctorId, date, time: cursor, appointmentId: null });
          cursor = addMinutes(cursor, slotMinutes);
        }
      }
    }
  }

  return slots;
}

/** Adds generated slots to a store without disturbing booked ones. */
export async function seedAvailability(
  store: RecordStore,
  options: GenerateAvailabilityOptions,
): Promise<number> {
  const existing = await store.listSlots({ from: options.from, to: options.to });
  const taken = new Set(existing.map((s) => slotKey(s.doctorId, slotIdOf(s))));
  const fresh = generateAvailability(options).filter(
    (s) => !taken.has(slotKey(s.doctorId, slotIdOf(s))),
  );
  await store.upsertSlots(fresh);
  return fresh.length;
}
