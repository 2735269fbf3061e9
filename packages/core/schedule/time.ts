/**
 * Local date/time helpers for plan steps.
 *
 * Step times are zone-less "YYYY-MM-DDTHH:MM" strings, so everything here is
 * plain string and minute arithmetic; no Date objects with a local zone.
 */

const DAY_MS = 86_400_000;
export const MINUTES_PER_DAY = 24 * 60;
/** Last minute a step may end on its own date (23:59). */
export const END_OF_DAY_MINUTES = MINUTES_PER_DAY - 1;

export interface LocalDateTime {
  date: string;
  minutes: number;
}

export function parseLocalDateTime(value: string): LocalDateTime | null {
  const match = /^(\d{4}-\d{2}-\d{2})T(\d{2}):(\d{2})$/.exec(value);
  if (!match) return null;
  const hours = Number(match[2]);
  const minutes = Number(match[3]);
  if (hours > 23 || minutes > 59) return null;
  return { date: match[1], minutes: hours * 60 + minutes };
}

export function formatClock(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
}

export function formatLocalDateTime(date: string, minutes: number): string {
  return `${date}T${formatClock(minutes)}`;
}

/** Every date from start to end, inclusive. Empty when end < start. */
export function enumerateDates(startDate: string, endDate: string): string[] {
  const start = Date.parse(`${startDate}T00:00:00Z`);
  const end = Date.parse(`${endDate}T00:00:00Z`);
  if (Number.isNaN(start) || Number.isNaN(end)) return [];

  const dates: string[] = [];
  for (let t = start; t <= end; t += DAY_MS) {
    dates.push(new Date(t).toISOString().slice(0, 10));
  }
  return dates;
}

export function formatDateHuman(date: string): string {
  const time = Date.parse(`${date}T00:00:00Z`);
  if (Number.isNaN(time)) return date;
  return new Date(time).toLocaleDateString("en-US", {
    weekday: "long",
    year: "numeric",
    month: "long",
    day: "2-digit",
    timeZone: "UTC",
  });
}
