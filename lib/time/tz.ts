import { DateTime } from "luxon";

import { MINUTES_PER_DAY, isWeekday } from "@/lib/tariff/windows";
import type { Weekday } from "@/lib/tariff/types";

export const DEFAULT_ZONE = "Europe/Amsterdam";
export type AmbiguousPolicy = "earlier" | "later";

export function isValidTimeZone(zone: string): boolean {
  return DateTime.now().setZone(zone).isValid;
}

/**
 * Parses an ISO-ish timestamp. Explicit offsets are trusted; wall times are read in `zone`.
 * Wall times inside a spring-forward gap move to the first minute after the gap.
 */
export function parseInZoneToUTC(
  s: string,
  zone: string = DEFAULT_ZONE,
  ambiguous: AmbiguousPolicy = "earlier",
): Date | null {
  if (!s) return null;

  const isoish = s.includes("T") ? s.trim() : s.trim().replace(" ", "T");

  const hasOffset = /[+-]\d{2}:?\d{2}$/.test(isoish) || /Z$/i.test(isoish);
  if (hasOffset) {
    const d = DateTime.fromISO(isoish, { setZone: true });
    return d.isValid ? d.toUTC().toJSDate() : null;
  }

  const m = isoish.match(/^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2}))?)?$/);
  if (!m) return null;
  const [, Y, M, D, h, mm, ss] = m;
  const base = {
    year: Number(Y),
    month: Number(M),
    day: Number(D),
    hour: Number(h ?? "0"),
    minute: Number(mm ?? "0"),
    second: Number(ss ?? "0"),
    millisecond: 0,
  };

  let dt = DateTime.fromObject(base, { zone });
  if (!dt.isValid) return null;

  if (dt.hour !== base.hour || dt.minute !== base.minute) {
    // Luxon shifted a non-existent wall time forward; snap to the top of the hour it landed in.
    dt = dt.set({ minute: 0, second: 0, millisecond: 0 });
  } else if (ambiguous === "later") {
    const plus1h = dt.plus({ hours: 1 });
    if (plus1h.offset !== dt.offset && plus1h.hour === dt.hour) dt = plus1h;
  }

  return dt.toUTC().toJSDate();
}

export type LocalMoment = {
  weekday: Weekday;
  minute: number; // wall-clock minute of the day
  localDate: string; // YYYY-MM-DD
};

export function localMoment(at: Date, zone: string): LocalMoment {
  const dt = DateTime.fromJSDate(at, { zone });
  const weekday = dt.weekday;
  if (!isWeekday(weekday)) throw new Error(`Unexpected weekday ${weekday} for ${at.toISOString()}`);
  return {
    weekday,
    minute: dt.hour * 60 + dt.minute,
    localDate: dt.toISODate() ?? "",
  };
}

/**
 * The instant at wall-clock `minute` on the local day of `from`, or the following midnight for 1440.
 * Never returns an instant at or before `from` (DST fall-back repeats wall times). A minute
 * skipped by spring-forward maps to the end of the gap.
 */
export function instantAtLocalMinute(from: Date, minute: number, zone: string): Date {
  const dt = DateTime.fromJSDate(from, { zone });
  let target: DateTime;
  if (minute >= MINUTES_PER_DAY) {
    target = dt.startOf("day").plus({ days: 1 });
  } else {
    target = dt.set({ hour: Math.floor(minute / 60), minute: minute % 60, second: 0, millisecond: 0 });
    // A wall time inside a spring-forward gap resolves to the first instant after the gap.
    if (target.hour * 60 + target.minute !== minute) target = target.set({ minute: 0 });
  }
  if (target.toMillis() <= dt.toMillis()) {
    const wallNow = dt.hour * 60 + dt.minute;
    return new Date(dt.toMillis() + (minute - wallNow) * 60_000);
  }
  return target.toJSDate();
}

export function truncateToMinute(d: Date): Date {
  return new Date(Math.floor(d.getTime() / 60_000) * 60_000);
}
