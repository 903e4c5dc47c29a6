// src/services/booking/intervals.ts
import type { IAppointment } from "../../models/Appointments";
import type { IDoctorAvailability } from "../../models/DoctorAvailability";
import { parseClock } from "../../utils/time";

/** Half-open [start, end) in minutes since midnight. */
export interface Interval {
  start: number;
  end: number;
}

// Back-to-back intervals (a.end === b.start) do not overlap.
export function overlaps(a: Interval, b: Interval): boolean {
  return a.start < b.end && b.start < a.end;
}

export function contains(outer: Interval, inner: Interval): boolean {
  return outer.start <= inner.start && inner.end <= outer.end;
}

/** Drops empty intervals, sorts by start and merges overlapping or touching ones. */
export function normalize(intervals: readonly Interval[]): Interval[] {
  const sorted = intervals.filter((i) => i.end > i.start).sort((a, b) => a.start - b.start || a.end - b.end);
  const merged: Interval[] = [];
  for (const next of sorted) {
    const last = merged[merged.length - 1];
    if (last && next.start <= last.end) {
      last.end = Math.max(last.end, next.end);
    } else {
      merged.push({ start: next.start, end: next.end });
    }
  }
  return merged;
}

export function subtract(base: readonly Interval[], cuts: readonly Interval[]): Interval[] {
  const holes = normalize(cuts);
  const result: Interval[] = [];

  for (const segment of normalize(base)) {
    let cursor = segment.start;
    for (const hole of holes) {
      if (hole.end <= cursor) continue;
      if (hole.start >= segment.end) break;
      if (hole.start > cursor) result.push({ start: cursor, end: hole.start });
      cursor = Math.max(cursor, hole.end);
      if (cursor >= segment.end) break;
    }
    if (cursor < segment.end) result.push({ start: cursor, end: segment.end });
  }

  return result;
}

/**
 * Bookable segments for a day: active windows with their breaks cut out,
 * merged into an ordered, disjoint list. Windows with unparseable or
 * inverted times are skipped.
 */
export function availableSegments(windows: readonly IDoctorAvailability[]): Interval[] {
  const segments: Interval[] = [];
  for (const window of windows) {
    if (!window.is_available) continue;
    const start = parseClock(window.start_time);
    const end = parseClock(window.end_time);
    if (start === null || end === null || end <= start) continue;

    const breakStart = window.break_start_time ? parseClock(window.break_start_time) : null;
    const breakEnd = window.break_end_time ? parseClock(window.break_end_time) : null;
    const breaks = breakStart !== null && breakEnd !== null ? [{ start: breakStart, end: breakEnd }] : [];

    segments.push(...subtract([{ start, end }], breaks));
  }
  return normalize(segments);
}

export function appointmentInterval(appointment: Pick<IAppointment, "appointment_id" | "time_start" | "duration_minutes">): Interval {
  const start = parseClock(appointment.time_start);
  if (start === null) {
    throw new Error(`Appointment ${appointment.appointment_id} has malformed time_start "${appointment.time_start}"`);
  }
  return { start, end: start + appointment.duration_minutes };
}
