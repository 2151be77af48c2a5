import { DateTime } from "luxon";

import type { TariffPart, TimeWindow, Weekday } from "./types";

export const MINUTES_PER_DAY = 1440;

export function isWeekday(n: number): n is Weekday {
  return Number.isInteger(n) && n >= 1 && n <= 7;
}

const PREVIOUS: Record<Weekday, Weekday> = { 1: 7, 2: 1, 3: 2, 4: 3, 5: 4, 6: 5, 7: 6 };
const NEXT: Record<Weekday, Weekday> = { 1: 2, 2: 3, 3: 4, 4: 5, 5: 6, 6: 7, 7: 1 };

export function previousWeekday(d: Weekday): Weekday {
  return PREVIOUS[d];
}

export function nextWeekday(d: Weekday): Weekday {
  return NEXT[d];
}

/**
 * "HH:MM" / "H:MM" / "HHMM" → minutes of the day. "24:00" is allowed (1440).
 */
export function parseTimeOfDay(v: unknown): number | null {
  const s = String(v ?? "").trim();
  const m = s.match(/^(\d{1,2}):?(\d{2})$/);
  if (!m?.[1] || !m?.[2]) return null;
  const hh = Number(m[1]);
  const mm = Number(m[2]);
  if (!Number.isInteger(hh) || !Number.isInteger(mm)) return null;
  if (hh === 24 && mm === 0) return MINUTES_PER_DAY;
  if (hh < 0 || hh > 23) return null;
  if (mm < 0 || mm > 59) return null;
  return hh * 60 + mm;
}

export function formatTimeOfDay(minute: number): string {
  const hh = Math.floor(minute / 60);
  const mm = minute % 60;
  return `${String(hh).padStart(2, "0")}:${String(mm).padStart(2, "0")}`;
}

export function isOvernightWindow(w: TimeWindow): boolean {
  return w.endMinute < w.startMinute;
}

// Splits a window into same-day segments. The overnight tail is tagged so the caller
// can check it against the previous weekday.
export function windowSegments(w: TimeWindow): Array<{ start: number; end: number; tail: boolean }> {
  if (isOvernightWindow(w)) {
    return [
      { start: w.startMinute, end: MINUTES_PER_DAY, tail: false },
      { start: 0, end: w.endMinute, tail: true },
    ];
  }
  return [{ start: w.startMinute, end: w.endMinute, tail: false }];
}

export function partAppliesOnDate(part: TariffPart, localDate: string): boolean {
  if (part.dates.from && localDate < part.dates.from) return false;
  if (part.dates.to && localDate > part.dates.to) return false;
  return true;
}

export function previousLocalDate(localDate: string): string {
  return DateTime.fromISO(localDate, { zone: "UTC" }).minus({ days: 1 }).toISODate() ?? localDate;
}

/**
 * If `part` covers the local moment (weekday, minute, date), returns the minute of the
 * same day at which that coverage ends. Otherwise null. An overnight tail is checked against
 * the weekday and date on which the window opened.
 */
export function coverageEndAt(
  part: TariffPart,
  at: { weekday: Weekday; minute: number; localDate: string },
): number | null {
  for (const seg of windowSegments(part.window)) {
    const day = seg.tail ? previousWeekday(at.weekday) : at.weekday;
    const date = seg.tail ? previousLocalDate(at.localDate) : at.localDate;
    if (!part.weekdays.includes(day) || !partAppliesOnDate(part, date)) continue;
    if (at.minute >= seg.start && at.minute < seg.end) return seg.end;
  }
  return null;
}

/**
 * Earliest minute later than `at.minute` on the same local day where `part` starts covering.
 */
export function nextCoverageStart(
  part: TariffPart,
  at: { weekday: Weekday; minute: number; localDate: string },
): number | null {
  let best: number | null = null;
  for (const seg of windowSegments(part.window)) {
    const day = seg.tail ? previousWeekday(at.weekday) : at.weekday;
    const date = seg.tail ? previousLocalDate(at.localDate) : at.localDate;
    if (!part.weekdays.includes(day) || !partAppliesOnDate(part, date)) continue;
    if (seg.start > at.minute && (best == null || seg.start < best)) best = seg.start;
  }
  return best;
}

/**
 * True when both parts can claim the same (weekday, minute-of-day) on some day both apply.
 */
export function partsOverlap(a: TariffPart, b: TariffPart): boolean {
  const aFrom = a.dates.from ?? "0000-01-01";
  const aTo = a.dates.to ?? "9999-12-31";
  const bFrom = b.dates.from ?? "0000-01-01";
  const bTo = b.dates.to ?? "9999-12-31";
  if (aTo < bFrom || bTo < aFrom) return false;

  const dayRanges = (p: TariffPart) => {
    const out: Array<{ day: Weekday; start: number; end: number }> = [];
    for (const seg of windowSegments(p.window)) {
      for (const d of p.weekdays) {
        // The overnight tail lands on the next weekday.
        const day = seg.tail ? nextWeekday(d) : d;
        out.push({ day, start: seg.start, end: seg.end });
      }
    }
    return out;
  };

  const ra = dayRanges(a);
  const rb = dayRanges(b);
  return ra.some((x) => rb.some((y) => x.day === y.day && x.start < y.end && y.start < x.end));
}
