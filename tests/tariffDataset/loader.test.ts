import { fileURLToPath } from "node:url";

import { describe, expect, test } from "vitest";

import { MalformedTariffDataError } from "@/lib/tariff/errors";
import { buildSnapshotFromCsv, buildSnapshotFromRecords, loadTariffDatasetFromFile } from "@/modules/tariffDataset/loader";

const DATASET = fileURLToPath(new URL("../../data/tariffs.csv", import.meta.url));
const OPTS = { defaultTimeZone: "Europe/Amsterdam" };

const HEADER =
  "zone_id,zone_valid_from,structure_id,structure_valid_from,part_id,weekdays,window_start,window_end,pricing_kind,unit_amount,step_size_minutes";

describe("buildSnapshotFromCsv", () => {
  test("builds a snapshot from CSV text", () => {
    const snap = buildSnapshotFromCsv(`${HEADER}\nZ1,2024-01-01,S1,2024-01-01,all,all,00:00,24:00,linear,1.00,60\n`, {
      ...OPTS,
      source: "inline",
    });
    expect(snap.source).toBe("inline");
    expect(snap.stats()).toEqual({ zones: 1, structures: 1, parts: 1 });
    expect(snap.getZone("Z1")?.description).toBe("Z1");
  });

  test("rejects a dataset without records", () => {
    expect(() => buildSnapshotFromCsv(`${HEADER}\n`, OPTS)).toThrow(MalformedTariffDataError);
  });

  test("reports missing required columns", () => {
    try {
      buildSnapshotFromCsv("zone_id,structure_id\nZ1,S1\n", OPTS);
      throw new Error("expected failure");
    } catch (e) {
      expect(e).toBeInstanceOf(MalformedTariffDataError);
      if (!(e instanceof MalformedTariffDataError)) return;
      expect(e.issues.map((i) => i.field)).toEqual([
        "zone_valid_from",
        "structure_valid_from",
        "part_id",
        "weekdays",
        "window_start",
        "window_end",
        "pricing_kind",
      ]);
    }
  });

  test("error message lists row and field", () => {
    expect(() =>
      buildSnapshotFromCsv(`${HEADER}\nZ1,2024-01-01,S1,2024-01-01,all,all,00:00,24:00,hourly,1.00,60\n`, OPTS),
    ).toThrow('Malformed tariff data: row 2 pricing_kind: expected flat|linear|stepped, got "hourly"');
  });
});

describe("buildSnapshotFromRecords", () => {
  test("accepts already-parsed values", () => {
    const snap = buildSnapshotFromRecords(
      [
        {
          row: 1,
          values: {
            zone_id: "Z9",
            zone_valid_from: "2024-01-01T00:00:00Z",
            structure_id: "S9",
            structure_valid_from: "2024-01-01T00:00:00Z",
            part_id: "p",
            weekdays: "all",
            window_start: "00:00",
            window_end: "00:00",
            pricing_kind: "flat",
            unit_amount: 2,
          },
        },
      ],
      OPTS,
    );
    expect(snap.structureAt("Z9", new Date("2024-02-01T00:00:00Z"))?.parts[0].pricing).toEqual({
      kind: "flat",
      amountCents: 200,
    });
  });
});

describe("loadTariffDatasetFromFile", () => {
  test("loads the bundled dataset", async () => {
    const snap = await loadTariffDatasetFromFile(DATASET, OPTS);
    expect(snap.source).toBe(DATASET);
    expect(snap.stats()).toEqual({ zones: 4, structures: 5, parts: 10 });
    expect(snap.listZones(new Date("2024-03-01T12:00:00Z")).map((z) => z.zoneId)).toEqual([
      "AMS-C01",
      "DHG-N04",
      "RTD-G03",
      "UTR-W02",
    ]);
  });

  test("missing file rejects", async () => {
    await expect(loadTariffDatasetFromFile(`${DATASET}.missing`, OPTS)).rejects.toThrow();
  });
});
