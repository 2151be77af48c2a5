import { localMoment, instantAtLocalMinute, truncateToMinute } from "@/lib/time/tz";

import { applyDailyMax } from "./dailyCap";
import { InvalidIntervalError, NoTariffCoverageError, UnknownZoneError } from "./errors";
import { priceMinutes } from "./pricing";
import type { CalculationRequest, CalculationResult, LineItem, TariffSource, TariffStructure, Zone } from "./types";
import { MINUTES_PER_DAY, coverageEndAt, nextCoverageStart } from "./windows";

export type CalculateOptions = {
  maxSpanMinutes: number;
};

type Segment = {
  structure: TariffStructure;
  zone: Zone;
  from: Date;
  to: Date;
};

function isValidDate(d: unknown): d is Date {
  return d instanceof Date && !Number.isNaN(d.getTime());
}

function minutesBetween(a: Date, b: Date): number {
  return Math.round((b.getTime() - a.getTime()) / 60_000);
}

function laterOf(a: Date, b: Date): Date {
  return a.getTime() >= b.getTime() ? a : b;
}

function earlierOf(a: Date, b: Date | null): Date {
  if (b == null) return a;
  return a.getTime() <= b.getTime() ? a : b;
}

function vatIncluded(grossCents: number, vatPercentage: number): number {
  if (!(vatPercentage > 0)) return 0;
  return Math.round((grossCents * vatPercentage) / (100 + vatPercentage));
}

// Structure validity ∩ zone validity ∩ request, ordered by start.
function coverageSegments(zones: Zone[], structures: TariffStructure[], start: Date, end: Date): Segment[] {
  const out: Segment[] = [];
  for (const structure of structures) {
    for (const zone of zones) {
      const from = laterOf(laterOf(structure.validFrom, zone.validFrom), start);
      const to = earlierOf(earlierOf(end, structure.validTo), zone.validTo);
      if (from.getTime() < to.getTime()) out.push({ structure, zone, from, to });
    }
  }
  return out.sort((a, b) => a.from.getTime() - b.from.getTime());
}

function emptyResult(zoneId: string, start: Date, end: Date): CalculationResult {
  return {
    zoneId,
    startTime: start,
    endTime: end,
    durationMinutes: 0,
    freeMinutesApplied: 0,
    totalCents: 0,
    vatCents: 0,
    cappedByDailyMax: false,
    lineItems: [],
  };
}

/**
 * Prices one structure's segment chunk by chunk. Each chunk sits under a single part and never
 * crosses local midnight, the end of the matched window, or the start of a part that would win.
 */
function priceSegment(
  seg: Segment,
  grace: { remaining: number | null },
): LineItem[] {
  const { structure, zone } = seg;
  const tz = zone.timeZone;
  const items: LineItem[] = [];

  let t = seg.from;
  while (t.getTime() < seg.to.getTime()) {
    const at = localMoment(t, tz);

    let matchIdx = -1;
    let coverageEnd: number | null = null;
    for (let i = 0; i < structure.parts.length; i++) {
      const end = coverageEndAt(structure.parts[i], at);
      if (end != null) {
        matchIdx = i;
        coverageEnd = end;
        break;
      }
    }
    if (matchIdx < 0 || coverageEnd == null) {
      throw new NoTariffCoverageError(zone.zoneId, t, `no part of ${structure.structureId} matches`);
    }
    const part = structure.parts[matchIdx];

    let chunkEnd = seg.to;
    chunkEnd = earlierOf(chunkEnd, instantAtLocalMinute(t, coverageEnd, tz));
    chunkEnd = earlierOf(chunkEnd, instantAtLocalMinute(t, MINUTES_PER_DAY, tz));
    for (let i = 0; i < matchIdx; i++) {
      const next = nextCoverageStart(structure.parts[i], at);
      if (next != null) chunkEnd = earlierOf(chunkEnd, instantAtLocalMinute(t, next, tz));
    }
    if (chunkEnd.getTime() <= t.getTime()) {
      throw new Error(`Chunk did not advance at ${t.toISOString()} in ${structure.structureId}`);
    }

    const minutes = minutesBetween(t, chunkEnd);
    if (grace.remaining == null) grace.remaining = part.freeMinutes;
    const free = Math.min(grace.remaining, minutes);
    grace.remaining -= free;
    const minutesCharged = minutes - free;
    const grossCents = priceMinutes(minutesCharged, part.pricing);

    items.push({
      structureId: structure.structureId,
      partId: part.partId,
      pricingKind: part.pricing.kind,
      intervalStart: t,
      intervalEnd: chunkEnd,
      localDate: at.localDate,
      minutes,
      freeMinutes: free,
      minutesCharged,
      grossCents,
      capReductionCents: 0,
      amountCents: grossCents,
    });

    t = chunkEnd;
  }

  return items;
}

/**
 * Itemized parking cost for `zoneId` over [startTime, endTime). Seconds are dropped from both ends.
 */
export function calculateParkingCost(
  source: TariffSource,
  req: CalculationRequest,
  opts: CalculateOptions,
): CalculationResult {
  if (!isValidDate(req.startTime) || !isValidDate(req.endTime)) {
    throw new InvalidIntervalError("startTime and endTime must be valid timestamps");
  }
  const start = truncateToMinute(req.startTime);
  const end = truncateToMinute(req.endTime);
  if (end.getTime() < start.getTime()) {
    throw new InvalidIntervalError("endTime must not be before startTime");
  }
  const durationMinutes = minutesBetween(start, end);
  if (durationMinutes > opts.maxSpanMinutes) {
    throw new InvalidIntervalError(`Interval of ${durationMinutes} minutes exceeds the maximum of ${opts.maxSpanMinutes}`);
  }

  const zones = source.getZoneVersions(req.zoneId);
  if (zones.length === 0) throw new UnknownZoneError(req.zoneId);
  if (durationMinutes === 0) return emptyResult(req.zoneId, start, end);

  const structures = source.findStructures(req.zoneId, { start, end });
  const segments = coverageSegments(zones, structures, start, end);

  const grace: { remaining: number | null } = { remaining: null };
  const lineItems: LineItem[] = [];
  let cursor = start;
  for (const seg of segments) {
    if (seg.to.getTime() <= cursor.getTime()) continue;
    if (seg.from.getTime() > cursor.getTime()) {
      throw new NoTariffCoverageError(req.zoneId, cursor, "no tariff structure valid");
    }
    lineItems.push(...priceSegment({ ...seg, from: cursor }, grace));
    cursor = seg.to;
  }
  if (cursor.getTime() < end.getTime()) {
    throw new NoTariffCoverageError(req.zoneId, cursor, "no tariff structure valid");
  }

  // Daily cap and VAT are per structure.
  let cappedByDailyMax = false;
  const finalItems = [...lineItems];
  for (const structure of structures) {
    const indices: number[] = [];
    lineItems.forEach((item, i) => {
      if (item.structureId === structure.structureId) indices.push(i);
    });
    if (indices.length === 0) continue;
    const capped = applyDailyMax(
      indices.map((i) => lineItems[i]),
      structure.dailyMaxCents,
    );
    if (capped.capped) cappedByDailyMax = true;
    capped.items.forEach((item, k) => {
      finalItems[indices[k]] = item;
    });
  }

  let totalCents = 0;
  let vatCents = 0;
  for (const structure of structures) {
    const sum = finalItems
      .filter((i) => i.structureId === structure.structureId)
      .reduce((a, i) => a + i.amountCents, 0);
    totalCents += sum;
    vatCents += vatIncluded(sum, structure.vatPercentage);
  }

  return {
    zoneId: req.zoneId,
    startTime: start,
    endTime: end,
    durationMinutes,
    freeMinutesApplied: finalItems.reduce((a, i) => a + i.freeMinutes, 0),
    totalCents,
    vatCents,
    cappedByDailyMax,
    lineItems: finalItems,
  };
}
