import { describe, expect, test } from "vitest";

import { instantAtLocalMinute, isValidTimeZone, localMoment, parseInZoneToUTC } from "@/lib/time/tz";

function iso(d: Date | null): string | null {
  return d ? d.toISOString() : null;
}

const AMS = "Europe/Amsterdam";

describe("parseInZoneToUTC", () => {
  test("trusts explicit offsets", () => {
    expect(iso(parseInZoneToUTC("2024-01-15T10:00:00+01:00", AMS))).toBe("2024-01-15T09:00:00.000Z");
    expect(iso(parseInZoneToUTC("2024-01-15T10:00:00Z", AMS))).toBe("2024-01-15T10:00:00.000Z");
  });

  test("reads wall times in the zone: winter vs summer", () => {
    expect(iso(parseInZoneToUTC("2024-01-15T10:00", AMS))).toBe("2024-01-15T09:00:00.000Z");
    expect(iso(parseInZoneToUTC("2024-07-15T10:00:00", AMS))).toBe("2024-07-15T08:00:00.000Z");
    expect(iso(parseInZoneToUTC("2024-07-15 10:00", AMS))).toBe("2024-07-15T08:00:00.000Z");
  });

  test("date-only means local midnight", () => {
    expect(iso(parseInZoneToUTC("2024-01-01", AMS))).toBe("2023-12-31T23:00:00.000Z");
  });

  test("spring forward: 02:30 snaps to 03:00 local", () => {
    expect(iso(parseInZoneToUTC("2024-03-31T02:30:00", AMS))).toBe("2024-03-31T01:00:00.000Z");
  });

  test("fall back: ambiguous 02:30 picks earlier or later", () => {
    expect(iso(parseInZoneToUTC("2024-10-27T02:30:00", AMS, "earlier"))).toBe("2024-10-27T00:30:00.000Z");
    expect(iso(parseInZoneToUTC("2024-10-27T02:30:00", AMS, "later"))).toBe("2024-10-27T01:30:00.000Z");
  });

  test("garbage is null", () => {
    expect(parseInZoneToUTC("", AMS)).toBeNull();
    expect(parseInZoneToUTC("yesterday", AMS)).toBeNull();
    expect(parseInZoneToUTC("2024-13-45T10:00", AMS)).toBeNull();
  });
});

describe("local time helpers", () => {
  test("isValidTimeZone", () => {
    expect(isValidTimeZone(AMS)).toBe(true);
    expect(isValidTimeZone("Mars/Olympus")).toBe(false);
  });

  test("localMoment gives ISO weekday, minute of day and local date", () => {
    // Sunday 23:30 UTC is Monday 00:30 in Amsterdam (winter).
    expect(localMoment(new Date("2024-01-14T23:30:00.000Z"), AMS)).toEqual({
      weekday: 1,
      minute: 30,
      localDate: "2024-01-15",
    });
  });

  test("instantAtLocalMinute targets the same local day, 1440 is next midnight", () => {
    const from = new Date("2024-01-15T09:00:00.000Z"); // 10:00 local
    expect(iso(instantAtLocalMinute(from, 18 * 60, AMS))).toBe("2024-01-15T17:00:00.000Z");
    expect(iso(instantAtLocalMinute(from, 1440, AMS))).toBe("2024-01-15T23:00:00.000Z");
  });

  test("instantAtLocalMinute maps a minute skipped by spring-forward to the end of the gap", () => {
    const from = new Date("2024-03-30T23:30:00.000Z"); // 00:30 local
    expect(iso(instantAtLocalMinute(from, 150, AMS))).toBe("2024-03-31T01:00:00.000Z");
    expect(iso(instantAtLocalMinute(from, 200, AMS))).toBe("2024-03-31T01:20:00.000Z");
  });
});
