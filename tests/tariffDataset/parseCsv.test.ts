import { describe, expect, test } from "vitest";

import { parseTariffCsv, sanitizeHeader } from "@/modules/tariffDataset/parseCsv";

describe("sanitizeHeader", () => {
  test("normalizes spacing, case and separators", () => {
    expect(sanitizeHeader("Zone ID")).toBe("zone_id");
    expect(sanitizeHeader("ZoneId")).toBe("zone_id");
    expect(sanitizeHeader("zone-id")).toBe("zone_id");
    expect(sanitizeHeader(" window_start ")).toBe("window_start");
  });
});

describe("parseTariffCsv", () => {
  test("keys rows by header and keeps file line numbers", () => {
    const csv = "\uFEFF# comment\nzone_id,zone_description\nA,\"Centrum, west\"\n\nB,Noord\n";
    expect(parseTariffCsv(csv)).toEqual([
      { row: 3, values: { zone_id: "A", zone_description: "Centrum, west" } },
      { row: 5, values: { zone_id: "B", zone_description: "Noord" } },
    ]);
  });

  test("quoted newlines and escaped quotes", () => {
    const csv = 'zone_id,zone_description\r\nA,"line one\nline ""two"""\r\nB,x';
    expect(parseTariffCsv(csv)).toEqual([
      { row: 2, values: { zone_id: "A", zone_description: 'line one\nline "two"' } },
      { row: 4, values: { zone_id: "B", zone_description: "x" } },
    ]);
  });

  test("missing trailing cells become empty strings", () => {
    expect(parseTariffCsv("a,b,c\n1")).toEqual([{ row: 2, values: { a: "1", b: "", c: "" } }]);
  });

  test("empty input", () => {
    expect(parseTariffCsv("")).toEqual([]);
  });
});
