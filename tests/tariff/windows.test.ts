import { describe, expect, test } from "vitest";

import {
  coverageEndAt,
  formatTimeOfDay,
  nextCoverageStart,
  parseTimeOfDay,
  partsOverlap,
  previousLocalDate,
  previousWeekday,
} from "@/lib/tariff/windows";

import { part } from "./fixtures";

describe("parseTimeOfDay / formatTimeOfDay", () => {
  test("accepts HH:MM, H:MM and HHMM", () => {
    expect(parseTimeOfDay("09:00")).toBe(540);
    expect(parseTimeOfDay("9:30")).toBe(570);
    expect(parseTimeOfDay("0930")).toBe(570);
    expect(parseTimeOfDay("24:00")).toBe(1440);
  });

  test("rejects out-of-range and garbage", () => {
    expect(parseTimeOfDay("24:01")).toBeNull();
    expect(parseTimeOfDay("25:00")).toBeNull();
    expect(parseTimeOfDay("12:60")).toBeNull();
    expect(parseTimeOfDay("noon")).toBeNull();
    expect(parseTimeOfDay("")).toBeNull();
  });

  test("formats minutes back to HH:MM", () => {
    expect(formatTimeOfDay(0)).toBe("00:00");
    expect(formatTimeOfDay(570)).toBe("09:30");
    expect(formatTimeOfDay(1440)).toBe("24:00");
  });
});

describe("coverage", () => {
  const fridayNight = part("night", { weekdays: [5], window: { startMinute: 1320, endMinute: 420 } });

  test("overnight window covers the listed day until midnight", () => {
    expect(coverageEndAt(fridayNight, { weekday: 5, minute: 23 * 60, localDate: "2024-01-19" })).toBe(1440);
  });

  test("overnight tail belongs to the previous weekday", () => {
    expect(coverageEndAt(fridayNight, { weekday: 6, minute: 180, localDate: "2024-01-20" })).toBe(420);
    expect(coverageEndAt(fridayNight, { weekday: 5, minute: 180, localDate: "2024-01-19" })).toBeNull();
  });

  test("date range limits the part", () => {
    const summer = part("summer", { dates: { from: "2024-06-01", to: "2024-08-31" } });
    expect(coverageEndAt(summer, { weekday: 1, minute: 600, localDate: "2024-05-31" })).toBeNull();
    expect(coverageEndAt(summer, { weekday: 1, minute: 600, localDate: "2024-08-31" })).toBe(1440);
  });

  test("overnight tail follows the date the window opened on", () => {
    const lateSummer = part("late", {
      window: { startMinute: 1320, endMinute: 420 },
      dates: { from: "2024-06-01", to: "2024-08-31" },
    });
    // 2024-09-01 is a Sunday; the window opened on the last listed date.
    expect(coverageEndAt(lateSummer, { weekday: 7, minute: 180, localDate: "2024-09-01" })).toBe(420);
    // 2024-06-01 03:00 belongs to the night of 05-31, before the range starts.
    expect(coverageEndAt(lateSummer, { weekday: 6, minute: 180, localDate: "2024-06-01" })).toBeNull();
    expect(coverageEndAt(lateSummer, { weekday: 6, minute: 1380, localDate: "2024-06-01" })).toBe(1440);
    expect(nextCoverageStart(lateSummer, { weekday: 7, minute: 600, localDate: "2024-09-01" })).toBeNull();
  });

  test("previousLocalDate crosses month and year ends", () => {
    expect(previousLocalDate("2024-09-01")).toBe("2024-08-31");
    expect(previousLocalDate("2024-03-01")).toBe("2024-02-29");
    expect(previousLocalDate("2025-01-01")).toBe("2024-12-31");
  });

  test("nextCoverageStart finds a later window start on the same day", () => {
    const office = part("office", { weekdays: [1], window: { startMinute: 540, endMinute: 1080 } });
    expect(nextCoverageStart(office, { weekday: 1, minute: 480, localDate: "2024-01-15" })).toBe(540);
    expect(nextCoverageStart(office, { weekday: 1, minute: 600, localDate: "2024-01-15" })).toBeNull();
    expect(nextCoverageStart(office, { weekday: 2, minute: 480, localDate: "2024-01-16" })).toBeNull();
  });

  test("previousWeekday wraps Monday to Sunday", () => {
    expect(previousWeekday(1)).toBe(7);
    expect(previousWeekday(7)).toBe(6);
  });
});

describe("partsOverlap", () => {
  const fridayNight = part("night", { weekdays: [5], window: { startMinute: 1320, endMinute: 420 } });

  test("overnight tail collides with the next morning", () => {
    const saturdayEarly = part("early", { weekdays: [6], window: { startMinute: 360, endMinute: 480 } });
    expect(partsOverlap(fridayNight, saturdayEarly)).toBe(true);
  });

  test("touching windows do not overlap", () => {
    const saturdayLater = part("later", { weekdays: [6], window: { startMinute: 420, endMinute: 480 } });
    expect(partsOverlap(fridayNight, saturdayLater)).toBe(false);
  });

  test("disjoint date ranges never overlap", () => {
    const a = part("a", { dates: { from: "2024-01-01", to: "2024-05-31" } });
    const b = part("b", { dates: { from: "2024-06-01", to: null } });
    expect(partsOverlap(a, b)).toBe(false);
  });
});
