// src/utils/time.ts
import { format, getISODay, isValid, parse } from "date-fns";

export const MINUTES_PER_DAY = 24 * 60;

const CLOCK_RE = /^([01]\d|2[0-3]):([0-5]\d)$/;
const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

/** "HH:mm" -> minutes since midnight, or null when malformed. */
export function parseClock(value: string): number | null {
  const m = CLOCK_RE.exec(value);
  if (!m) return null;
  return Number(m[1]) * 60 + Number(m[2]);
}

export function formatClock(minutes: number): string {
  const h = Math.floor(minutes / 60);
  const m = minutes % 60;
  return `${String(h).padStart(2, "0")}:${String(m).padStart(2, "0")}`;
}

// Rejects shapes like 2025-02-30 that Date would silently roll over.
export function parseCalendarDate(value: string): Date | null {
  if (!DATE_RE.test(value)) return null;
  const parsed = parse(value, "yyyy-MM-dd", new Date());
  if (!isValid(parsed) || format(parsed, "yyyy-MM-dd") !== value) return null;
  return parsed;
}

/** 0 = Monday ... 6 = Sunday */
export function dayOfWeek(date: Date): number {
  return getISODay(date) - 1;
}

export function calendarDate(now: Date): string {
  return format(now, "yyyy-MM-dd");
}
