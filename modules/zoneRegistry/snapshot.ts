import { UnknownZoneError } from "@/lib/tariff/errors";
import type { Interval, TariffSource, TariffStructure, Zone } from "@/lib/tariff/types";

import type { ZoneSummary } from "./types";

function coversInstant(validFrom: Date, validTo: Date | null, at: Date): boolean {
  const t = at.getTime();
  return validFrom.getTime() <= t && (validTo == null || t < validTo.getTime());
}

function overlaps(validFrom: Date, validTo: Date | null, interval: Interval): boolean {
  const endsAfterStart = validTo == null || validTo.getTime() > interval.start.getTime();
  return endsAfterStart && validFrom.getTime() < interval.end.getTime();
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !(value instanceof Date) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

/**
 * Immutable, indexed view of one loaded tariff dataset. Never mutated after construction;
 * a refresh builds a new instance.
 */
export class ZoneRegistrySnapshot implements TariffSource {
  readonly loadedAt: Date;
  readonly source: string;
  private readonly zonesById: Map<string, Zone[]>;
  private readonly structuresByZone: Map<string, TariffStructure[]>;

  constructor(args: { zones: Zone[]; structures: TariffStructure[]; source: string; loadedAt?: Date }) {
    this.loadedAt = args.loadedAt ?? new Date();
    this.source = args.source;

    const zonesById = new Map<string, Zone[]>();
    for (const z of args.zones) {
      const arr = zonesById.get(z.zoneId) ?? [];
      arr.push(z);
      zonesById.set(z.zoneId, arr);
    }
    zonesById.forEach((arr) => arr.sort((a, b) => a.validFrom.getTime() - b.validFrom.getTime()));

    const structuresByZone = new Map<string, TariffStructure[]>();
    for (const s of args.structures) {
      const arr = structuresByZone.get(s.zoneId) ?? [];
      arr.push(s);
      structuresByZone.set(s.zoneId, arr);
    }
    structuresByZone.forEach((arr) => arr.sort((a, b) => a.validFrom.getTime() - b.validFrom.getTime()));

    this.zonesById = zonesById;
    this.structuresByZone = structuresByZone;
    zonesById.forEach((arr) => deepFreeze(arr));
    structuresByZone.forEach((arr) => deepFreeze(arr));
  }

  static empty(source = "empty"): ZoneRegistrySnapshot {
    return new ZoneRegistrySnapshot({ zones: [], structures: [], source });
  }

  hasZone(zoneId: string): boolean {
    return this.zonesById.has(zoneId);
  }

  getZoneVersions(zoneId: string): Zone[] {
    return this.zonesById.get(zoneId) ?? [];
  }

  /**
   * Structures overlapping any part of `interval`, by validFrom. Empty when the zone exists
   * but nothing is valid then; throws for an unknown zone.
   */
  findStructures(zoneId: string, interval: Interval): TariffStructure[] {
    if (!this.zonesById.has(zoneId)) throw new UnknownZoneError(zoneId);
    const all = this.structuresByZone.get(zoneId) ?? [];
    return all.filter((s) => overlaps(s.validFrom, s.validTo, interval));
  }

  /**
   * The zone version valid at `at`, else the most recent one.
   */
  getZone(zoneId: string, at: Date = new Date()): Zone | null {
    const versions = this.zonesById.get(zoneId);
    if (!versions || versions.length === 0) return null;
    return versions.find((z) => coversInstant(z.validFrom, z.validTo, at)) ?? versions[versions.length - 1];
  }

  structureAt(zoneId: string, at: Date = new Date()): TariffStructure | null {
    const all = this.structuresByZone.get(zoneId) ?? [];
    return all.find((s) => coversInstant(s.validFrom, s.validTo, at)) ?? null;
  }

  listZones(at: Date = new Date()): ZoneSummary[] {
    const out: ZoneSummary[] = [];
    this.zonesById.forEach((_versions, zoneId) => {
      const zone = this.getZone(zoneId, at);
      if (!zone) return;
      out.push({
        zoneId,
        description: zone.description,
        usageCategory: zone.usageCategory,
        timeZone: zone.timeZone,
        validFrom: zone.validFrom,
        validTo: zone.validTo,
        structureCount: (this.structuresByZone.get(zoneId) ?? []).length,
      });
    });
    return out.sort((a, b) => a.zoneId.localeCompare(b.zoneId));
  }

  searchZones(term: string, at: Date = new Date()): ZoneSummary[] {
    const q = String(term ?? "").trim().toLowerCase();
    if (!q) return [];
    return this.listZones(at).filter(
      (z) =>
        z.zoneId.toLowerCase().includes(q) ||
        z.description.toLowerCase().includes(q) ||
        z.usageCategory.toLowerCase().includes(q),
    );
  }

  stats(): { zones: number; structures: number; parts: number } {
    let structures = 0;
    let parts = 0;
    this.structuresByZone.forEach((arr) => {
      structures += arr.length;
      for (const s of arr) parts += s.parts.length;
    });
    return { zones: this.zonesById.size, structures, parts };
  }
}
