// ---------------------------------------------------------------------
// Clock arithmetic on "YYYY-MM-DD" dates and "HH:MM" times
// ---------------------------------------------------------------------

const MINUTES_PER_DAY = 24 * 60;

export function toMinutes(time: string): number {
  const [hours, minutes] = time.split(":").map(Number);
  return hours * 60 + minutes;
}

export function fromMinutes(total: number): string {
  const hours = Math.floor(total / 60);
  const minutes = total % 60;
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}

/** Shifts a time of day; null when the result leaves the day. */
export function addMinutes(time: string, minutes: number): string | null {
  const total = toMinutes(time) + minutes;
  if (total < 0 || total >= MINUTES_PER_DAY) return null;
  return fromMinutes(total);
}

/** End time of a span; spans reaching midnight end at 23:59. */
export function endTime(time: string, minutes: number): string {
  return fromMinutes(Math.min(toMinutes(time) + minutes, MINUTES_PER_DAY - 1));
}

export function addDays(date: string, days: number): string {
  const [year, month, day] = date.split("-").map(Number);
  const shifted = new Date(Date.UTC(year, month - 1, day + days));
  return shifted.toISOString().slice(0, 10);
}

/** Every date from `from` to `to`, inclusive. */
export function datesBetween(from: string, to: string): string[] {
  const dates: string[] = [];
  for (let d = from; d <= to; d = addDays(d, 1)) dates.push(d);
  return dates;
}

/** 0 = Sunday … 6 = Saturday */
export function weekday(date: string): number {
  return new Date(`${date}T12:00:00Z`).getUTCDay();
}

// ---------------------------------------------------------------------
// Timezone conversion
// ---------------------------------------------------------------------

function zonedParts(ms: number, timezone: string) {
  const formatter = new Intl.DateTimeFormat("en-US", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    second: "2-digit",
    hour12: false,
  });
  const parts = formatter.formatToParts(new Date(ms));
  const get = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((p) => p.type === type)?.value ?? "0");
  return {
    year: get("year"),
    month: get("month"),
    day: get("day"),
    hour: get("hour") === 24 ? 0 : get("hour"),
    minute: get("minute"),
    second: get("second"),
  };
}

/**
 * Converts a clinic-local date and time in the given IANA timezone to a
 * UTC instant. The local values are first read as UTC, then corrected by
 * the zone's offset at that guess.
 */
export function localToUtc(date: string, time: string, timezone: string): Date {
  const [year, month, day] = date.split("-").map(Number);
  const [hours, minutes] = time.split(":").map(Number);
  const guessUtcMs = Date.UTC(year, month - 1, day, hours, minutes, 0, 0);

  const p = zonedParts(guessUtcMs, timezone);
  const localAtGuess = Date.UTC(p.year, p.month - 1, p.day, p.hour, p.minute, p.second);
  const offsetMs = localAtGuess - guessUtcMs;

  return new Date(guessUtcMs - offsetMs);
}

/** The clinic-local calendar date and wall-clock time of an instant. */
export function localDateTime(instant: Date, timezone: string): { date: string; time: string } {
  const p = zonedParts(instant.getTime(), timezone);
  return {
    date: `${p.year}-${String(p.month).padStart(2, "0")}-${String(p.day).padStart(2, "0")}`,
    time: fromMinutes(p.hour * 60 + p.minute),
  };
}
