import fs from "node:fs/promises";

import { createLogger, errorDetails } from "@/lib/log";
import { MalformedTariffDataError } from "@/lib/tariff/errors";
import { ZoneRegistrySnapshot } from "@/modules/zoneRegistry/snapshot";

import { normalizeTariffRecords } from "./normalize";
import { parseTariffCsv, type CsvRecord } from "./parseCsv";
import { TARIFF_COLUMNS, type LoadOptions, type TariffColumn, type TariffRecord } from "./types";

const log = createLogger("tariff-dataset");

const REQUIRED_COLUMNS: TariffColumn[] = [
  "zone_id",
  "zone_valid_from",
  "structure_id",
  "structure_valid_from",
  "part_id",
  "weekdays",
  "window_start",
  "window_end",
  "pricing_kind",
];

function pickColumns(values: Record<string, string>): TariffRecord {
  const out: TariffRecord = {};
  for (const c of TARIFF_COLUMNS) {
    if (values[c] !== undefined) out[c] = values[c];
  }
  return out;
}

/**
 * Records (row-numbered) → snapshot. Throws MalformedTariffDataError on any invalid record.
 */
export function buildSnapshotFromRecords(
  records: Array<{ row: number; values: TariffRecord }>,
  opts: LoadOptions,
): ZoneRegistrySnapshot {
  const { zones, structures } = normalizeTariffRecords(records, { defaultTimeZone: opts.defaultTimeZone });
  return new ZoneRegistrySnapshot({ zones, structures, source: opts.source ?? "records" });
}

export function buildSnapshotFromCsv(csv: string, opts: LoadOptions): ZoneRegistrySnapshot {
  const rows: CsvRecord[] = parseTariffCsv(csv);
  if (rows.length === 0) {
    throw new MalformedTariffDataError([{ row: 1, field: "header", message: "dataset has no records" }]);
  }
  const missing = REQUIRED_COLUMNS.filter((c) => !(c in rows[0].values));
  if (missing.length > 0) {
    throw new MalformedTariffDataError(missing.map((c) => ({ row: 1, field: c, message: "missing column" })));
  }
  return buildSnapshotFromRecords(
    rows.map((r) => ({ row: r.row, values: pickColumns(r.values) })),
    opts,
  );
}

export async function loadTariffDatasetFromFile(path: string, opts: LoadOptions): Promise<ZoneRegistrySnapshot> {
  const startedAt = Date.now();
  let csv: string;
  try {
    csv = await fs.readFile(path, "utf8");
  } catch (e) {
    log.error("read_failed", { path, ...errorDetails(e) });
    throw e;
  }

  try {
    const snapshot = buildSnapshotFromCsv(csv, { ...opts, source: opts.source ?? path });
    log.info("loaded", { path, ms: Date.now() - startedAt, ...snapshot.stats() });
    return snapshot;
  } catch (e) {
    if (e instanceof MalformedTariffDataError) {
      log.error("malformed", { path, issues: e.issues.length, first: e.issues.slice(0, 5) });
    }
    throw e;
  }
}
