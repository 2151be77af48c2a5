import { DateTime } from "luxon";

import type { TariffPart, TariffStructure, Zone } from "@/lib/tariff/types";
import { ZoneRegistrySnapshot } from "@/modules/zoneRegistry/snapshot";

export const TZ = "Europe/Amsterdam";

// Wall time in Amsterdam → instant.
export function local(s: string): Date {
  const dt = DateTime.fromISO(s, { zone: TZ });
  if (!dt.isValid) throw new Error(`bad fixture time ${s}`);
  return dt.toJSDate();
}

export function zone(zoneId: string, overrides: Partial<Zone> = {}): Zone {
  return {
    zoneId,
    description: `Zone ${zoneId}`,
    usageCategory: "on-street",
    timeZone: TZ,
    validFrom: new Date("2020-01-01T00:00:00.000Z"),
    validTo: null,
    ...overrides,
  };
}

export function part(partId: string, overrides: Partial<TariffPart> = {}): TariffPart {
  return {
    partId,
    priority: 0,
    weekdays: [1, 2, 3, 4, 5, 6, 7],
    window: { startMinute: 0, endMinute: 1440 },
    dates: { from: null, to: null },
    pricing: { kind: "flat", amountCents: 0 },
    freeMinutes: 0,
    ...overrides,
  };
}

export function structure(
  structureId: string,
  zoneId: string,
  parts: TariffPart[],
  overrides: Partial<Omit<TariffStructure, "parts">> = {},
): TariffStructure {
  return {
    structureId,
    zoneId,
    validFrom: new Date("2020-01-01T00:00:00.000Z"),
    validTo: null,
    dailyMaxCents: null,
    vatPercentage: 21,
    parts,
    ...overrides,
  };
}

export function snapshotOf(zones: Zone[], structures: TariffStructure[]): ZoneRegistrySnapshot {
  return new ZoneRegistrySnapshot({ zones, structures, source: "fixture" });
}
