import type { ReminderTicket } from "@/types";

const MS_PER_HOUR = 60 * 60 * 1000;

export interface DueReminder {
  /** Index into the descending offset list */
  index: number;
  offsetHours: number;
  level: number;
}

// ---------------------------------------------------------------------
// Pure functions (no store access)
// ---------------------------------------------------------------------

/**
 * Level for the next emission. It rises by one only when an earlier
 * reminder went out and was not acknowledged; acknowledgment freezes it.
 */
export function nextLevel(
  ticket: Pick<ReminderTicket, "level" | "lastSentAt" | "acknowledged">,
  maxLevel: number,
): number {
  if (ticket.acknowledged || ticket.lastSentAt === null) return ticket.level;
  return Math.min(ticket.level + 1, maxLevel);
}

/**
 * The reminder owed at `now`: the latest offset whose send time has
 * passed and that has not been emitted yet. Offsets missed in between are
 * skipped so one scan never sends more than one reminder.
 */
export function dueReminder(
  ticket: Pick<ReminderTicket, "level" | "lastSentAt" | "acknowledged" | "sentCount">,
  startsAt: Date,
  offsetsHours: number[],
  now: Date,
  maxLevel: number,
): DueReminder | null {
  const startMs = startsAt.getTime();
  const nowMs = now.getTime();
  if (nowMs >= startMs) return null;

  let latest = -1;
  offsetsHours.forEach((offset, i) => {
    if (startMs - offset * MS_PER_HOUR <= nowMs) latest = i;
  });

  if (latest < ticket.sentCount) return null;
  return {
    index: latest,
    offsetHours: offsetsHours[latest],
    level: nextLevel(ticket, maxLevel),
  };
}
