import { MalformedTariffDataError, type MalformedRecordIssue } from "@/lib/tariff/errors";
import type { PartPricing, PriceStep, TariffPart, TariffStructure, Weekday, Zone } from "@/lib/tariff/types";
import { MINUTES_PER_DAY, isWeekday, nextWeekday, parseTimeOfDay, partsOverlap } from "@/lib/tariff/windows";
import { isValidTimeZone, parseInZoneToUTC } from "@/lib/time/tz";

import type { TariffRecord } from "./types";

type Field<T> = { ok: true; value: T } | { ok: false; error: string };

const WEEKDAY_NAMES: Record<string, Weekday> = {
  mon: 1, monday: 1, ma: 1,
  tue: 2, tuesday: 2, di: 2,
  wed: 3, wednesday: 3, wo: 3,
  thu: 4, thursday: 4, do: 4,
  fri: 5, friday: 5, vr: 5,
  sat: 6, saturday: 6, za: 6,
  sun: 7, sunday: 7, zo: 7,
};

function str(v: unknown): string {
  return v == null ? "" : String(v).trim();
}

function requireNonEmpty(v: unknown): Field<string> {
  const s = str(v);
  return s ? { ok: true, value: s } : { ok: false, error: "required" };
}

function optionalInt(v: unknown, fallback: number, min: number): Field<number> {
  const s = str(v);
  if (!s) return { ok: true, value: fallback };
  const n = Number(s);
  if (!Number.isInteger(n)) return { ok: false, error: `expected an integer, got "${s}"` };
  if (n < min) return { ok: false, error: `must be >= ${min}` };
  return { ok: true, value: n };
}

// Decimal euros ("3.00", "3,5") → integer cents.
export function parseAmountCents(v: unknown): Field<number> {
  const s = str(v);
  if (!s) return { ok: false, error: "required" };
  const normalized = s.includes(".") ? s.replace(/,/g, "") : s.replace(",", ".");
  const n = Number(normalized);
  if (!Number.isFinite(n)) return { ok: false, error: `not a number: "${s}"` };
  if (n < 0) return { ok: false, error: "must not be negative" };
  return { ok: true, value: Math.round(n * 100) };
}

/**
 * "mon|tue|wed", "1-5", "1,2,3", "sat-sun", "all", "weekday", "weekend".
 */
export function parseWeekdays(v: unknown): Field<Weekday[]> {
  const s = str(v).toLowerCase();
  if (!s) return { ok: false, error: "required" };
  if (s === "all" || s === "*") return { ok: true, value: [1, 2, 3, 4, 5, 6, 7] };
  if (s === "weekday" || s === "weekdays") return { ok: true, value: [1, 2, 3, 4, 5] };
  if (s === "weekend") return { ok: true, value: [6, 7] };

  const toDay = (t: string): Weekday | null => {
    const n = Number(t);
    if (isWeekday(n)) return n;
    return WEEKDAY_NAMES[t] ?? null;
  };

  const seen = new Set<Weekday>();
  for (const token of s.split(/[|,;\s]+/).filter(Boolean)) {
    const range = token.split("-");
    if (range.length === 2) {
      const a = toDay(range[0]);
      const b = toDay(range[1]);
      if (a == null || b == null) return { ok: false, error: `unknown weekday range "${token}"` };
      // Ranges may wrap the week ("sat-mon").
      let d: Weekday = a;
      for (let guard = 0; guard < 7; guard++) {
        seen.add(d);
        if (d === b) break;
        d = nextWeekday(d);
      }
    } else {
      const d = toDay(token);
      if (d == null) return { ok: false, error: `unknown weekday "${token}"` };
      seen.add(d);
    }
  }
  if (seen.size === 0) return { ok: false, error: "required" };
  return { ok: true, value: Array.from(seen).sort((a, b) => a - b) };
}

export function parseWindow(startRaw: unknown, endRaw: unknown): Field<{ startMinute: number; endMinute: number }> {
  const start = parseTimeOfDay(startRaw);
  const endParsed = parseTimeOfDay(endRaw);
  if (start == null) return { ok: false, error: `invalid start time "${str(startRaw)}"` };
  if (endParsed == null) return { ok: false, error: `invalid end time "${str(endRaw)}"` };
  if (start >= MINUTES_PER_DAY) return { ok: false, error: "start must be before 24:00" };
  // An end of 00:00 means midnight at the end of the day.
  const end = endParsed === 0 ? MINUTES_PER_DAY : endParsed;
  if (start === end) return { ok: false, error: "zero-length window" };
  return { ok: true, value: { startMinute: start, endMinute: end } };
}

/**
 * "0:1.00|60:3.00|120:5.00" → steps. Each step must start at index * stepSize and amounts
 * must not decrease.
 */
export function parseSteps(v: unknown, stepSizeMinutes: number): Field<PriceStep[]> {
  const s = str(v);
  if (!s) return { ok: false, error: "required for stepped pricing" };
  const steps: PriceStep[] = [];
  for (const token of s.split(/[|;]+/).map((t) => t.trim()).filter(Boolean)) {
    const m = token.match(/^(\d+)\s*[:=]\s*(.+)$/);
    if (!m?.[1] || !m?.[2]) return { ok: false, error: `invalid step "${token}" (expected minute:amount)` };
    const amount = parseAmountCents(m[2]);
    if (!amount.ok) return { ok: false, error: `step "${token}": ${amount.error}` };
    steps.push({ fromMinute: Number(m[1]), amountCents: amount.value });
  }
  if (steps.length === 0) return { ok: false, error: "required for stepped pricing" };
  for (let i = 0; i < steps.length; i++) {
    if (steps[i].fromMinute !== i * stepSizeMinutes) {
      return { ok: false, error: `step ${i} must start at minute ${i * stepSizeMinutes}` };
    }
    if (i > 0 && steps[i].amountCents < steps[i - 1].amountCents) {
      return { ok: false, error: `step ${i} amount decreases` };
    }
  }
  return { ok: true, value: steps };
}

function parseLocalDate(v: unknown): Field<string | null> {
  const s = str(v);
  if (!s) return { ok: true, value: null };
  const m = s.match(/^(\d{4})-?(\d{2})-?(\d{2})$/);
  if (!m) return { ok: false, error: `invalid date "${s}" (expected YYYY-MM-DD)` };
  return { ok: true, value: `${m[1]}-${m[2]}-${m[3]}` };
}

function parseInstant(v: unknown, zone: string, required: boolean): Field<Date | null> {
  const s = str(v);
  if (!s) return required ? { ok: false, error: "required" } : { ok: true, value: null };
  const compact = s.match(/^(\d{4})(\d{2})(\d{2})$/);
  const iso = compact ? `${compact[1]}-${compact[2]}-${compact[3]}` : s;
  const d = parseInZoneToUTC(iso, zone);
  return d ? { ok: true, value: d } : { ok: false, error: `invalid date/time "${s}"` };
}

function parsePricing(r: TariffRecord): { pricing: PartPricing | null; issues: Array<{ field: string; message: string }> } {
  const issues: Array<{ field: string; message: string }> = [];
  const kind = str(r.pricing_kind).toLowerCase();

  if (kind === "flat") {
    const amount = parseAmountCents(r.unit_amount);
    if (!amount.ok) return { pricing: null, issues: [{ field: "unit_amount", message: amount.error }] };
    return { pricing: { kind: "flat", amountCents: amount.value }, issues };
  }

  if (kind === "linear" || kind === "stepped") {
    const step = optionalInt(r.step_size_minutes, 0, 1);
    if (!step.ok || step.value <= 0) {
      return { pricing: null, issues: [{ field: "step_size_minutes", message: step.ok ? "required and > 0" : step.error }] };
    }
    if (kind === "linear") {
      const amount = parseAmountCents(r.unit_amount);
      if (!amount.ok) return { pricing: null, issues: [{ field: "unit_amount", message: amount.error }] };
      return { pricing: { kind: "linear", amountCents: amount.value, stepSizeMinutes: step.value }, issues };
    }
    const steps = parseSteps(r.steps, step.value);
    if (!steps.ok) return { pricing: null, issues: [{ field: "steps", message: steps.error }] };
    return { pricing: { kind: "stepped", stepSizeMinutes: step.value, steps: steps.value }, issues };
  }

  return { pricing: null, issues: [{ field: "pricing_kind", message: `expected flat|linear|stepped, got "${str(r.pricing_kind)}"` }] };
}

type RowPart = { row: number; order: number; part: TariffPart };
type StructureDraft = { row: number; structure: Omit<TariffStructure, "parts">; parts: RowPart[] };
type ZoneDraft = { row: number; zone: Zone };

function sameInstant(a: Date | null, b: Date | null): boolean {
  if (a == null || b == null) return a === b;
  return a.getTime() === b.getTime();
}

function rangesOverlap(aFrom: Date, aTo: Date | null, bFrom: Date, bTo: Date | null): boolean {
  const aEnd = aTo?.getTime() ?? Infinity;
  const bEnd = bTo?.getTime() ?? Infinity;
  return aFrom.getTime() < bEnd && bFrom.getTime() < aEnd;
}

/**
 * Validates normalized records (one per zone/structure/part tuple) and assembles zones and
 * structures. Any issue rejects the whole dataset.
 */
export function normalizeTariffRecords(
  records: Array<{ row: number; values: TariffRecord }>,
  opts: { defaultTimeZone: string },
): { zones: Zone[]; structures: TariffStructure[] } {
  const issues: MalformedRecordIssue[] = [];
  const zoneDrafts = new Map<string, ZoneDraft>(); // key: zoneId|validFrom
  const structureDrafts = new Map<string, StructureDraft>();

  records.forEach(({ row, values: r }, order) => {
    const before = issues.length;
    const push = (field: string, message: string) => issues.push({ row, field, message });

    const zoneId = requireNonEmpty(r.zone_id);
    if (!zoneId.ok) push("zone_id", zoneId.error);

    const tz = str(r.zone_time_zone) || opts.defaultTimeZone;
    if (!isValidTimeZone(tz)) push("zone_time_zone", `unknown time zone "${tz}"`);

    const zoneFrom = parseInstant(r.zone_valid_from, tz, true);
    if (!zoneFrom.ok) push("zone_valid_from", zoneFrom.error);
    const zoneTo = parseInstant(r.zone_valid_to, tz, false);
    if (!zoneTo.ok) push("zone_valid_to", zoneTo.error);

    const structureId = requireNonEmpty(r.structure_id);
    if (!structureId.ok) push("structure_id", structureId.error);
    const structFrom = parseInstant(r.structure_valid_from, tz, true);
    if (!structFrom.ok) push("structure_valid_from", structFrom.error);
    const structTo = parseInstant(r.structure_valid_to, tz, false);
    if (!structTo.ok) push("structure_valid_to", structTo.error);

    let dailyMaxCents: number | null = null;
    if (str(r.daily_max_amount)) {
      const dm = parseAmountCents(r.daily_max_amount);
      if (dm.ok) dailyMaxCents = dm.value;
      else push("daily_max_amount", dm.error);
    }

    let vatPercentage = 0;
    if (str(r.vat_percentage)) {
      const vat = Number(str(r.vat_percentage).replace(",", "."));
      if (!Number.isFinite(vat) || vat < 0 || vat > 100) push("vat_percentage", "expected 0..100");
      else vatPercentage = vat;
    }

    const partId = requireNonEmpty(r.part_id);
    if (!partId.ok) push("part_id", partId.error);
    const priority = optionalInt(r.priority, 0, 0);
    if (!priority.ok) push("priority", priority.error);
    const weekdays = parseWeekdays(r.weekdays);
    if (!weekdays.ok) push("weekdays", weekdays.error);
    const window = parseWindow(r.window_start, r.window_end);
    if (!window.ok) push("window", window.error);
    const partFrom = parseLocalDate(r.part_valid_from);
    if (!partFrom.ok) push("part_valid_from", partFrom.error);
    const partTo = parseLocalDate(r.part_valid_to);
    if (!partTo.ok) push("part_valid_to", partTo.error);
    const freeMinutes = optionalInt(r.free_minutes, 0, 0);
    if (!freeMinutes.ok) push("free_minutes", freeMinutes.error);
    const pricing = parsePricing(r);
    for (const i of pricing.issues) push(i.field, i.message);

    if (
      issues.length > before ||
      !zoneId.ok || !zoneFrom.ok || !zoneTo.ok || !structureId.ok || !structFrom.ok || !structTo.ok ||
      !partId.ok || !priority.ok || !weekdays.ok || !window.ok || !partFrom.ok || !partTo.ok ||
      !freeMinutes.ok || !pricing.pricing || zoneFrom.value == null || structFrom.value == null
    ) {
      return;
    }

    if (zoneTo.value && zoneTo.value.getTime() <= zoneFrom.value.getTime()) {
      push("zone_valid_to", "must be after zone_valid_from");
      return;
    }
    if (structTo.value && structTo.value.getTime() <= structFrom.value.getTime()) {
      push("structure_valid_to", "must be after structure_valid_from");
      return;
    }
    if (partFrom.value && partTo.value && partTo.value < partFrom.value) {
      push("part_valid_to", "must not be before part_valid_from");
      return;
    }

    const zone: Zone = {
      zoneId: zoneId.value,
      description: str(r.zone_description) || zoneId.value,
      usageCategory: str(r.usage_category),
      timeZone: tz,
      validFrom: zoneFrom.value,
      validTo: zoneTo.value,
    };
    const zoneKey = `${zone.zoneId}|${zone.validFrom.toISOString()}`;
    const existingZone = zoneDrafts.get(zoneKey);
    if (!existingZone) {
      zoneDrafts.set(zoneKey, { row, zone });
    } else if (
      existingZone.zone.description !== zone.description ||
      existingZone.zone.usageCategory !== zone.usageCategory ||
      existingZone.zone.timeZone !== zone.timeZone ||
      !sameInstant(existingZone.zone.validTo, zone.validTo)
    ) {
      push("zone", `conflicts with zone ${zone.zoneId} declared on row ${existingZone.row}`);
      return;
    }

    const structure: Omit<TariffStructure, "parts"> = {
      structureId: structureId.value,
      zoneId: zone.zoneId,
      validFrom: structFrom.value,
      validTo: structTo.value,
      dailyMaxCents,
      vatPercentage,
    };
    const part: TariffPart = {
      partId: partId.value,
      priority: priority.value,
      weekdays: weekdays.value,
      window: window.value,
      dates: { from: partFrom.value, to: partTo.value },
      pricing: pricing.pricing,
      freeMinutes: freeMinutes.value,
    };

    const existing = structureDrafts.get(structure.structureId);
    if (!existing) {
      structureDrafts.set(structure.structureId, { row, structure, parts: [{ row, order, part }] });
      return;
    }
    const s = existing.structure;
    if (
      s.zoneId !== structure.zoneId ||
      !sameInstant(s.validFrom, structure.validFrom) ||
      !sameInstant(s.validTo, structure.validTo) ||
      s.dailyMaxCents !== structure.dailyMaxCents ||
      s.vatPercentage !== structure.vatPercentage
    ) {
      push("structure", `conflicts with structure ${s.structureId} declared on row ${existing.row}`);
      return;
    }
    if (existing.parts.some((p) => p.part.partId === part.partId)) {
      push("part_id", `duplicate part ${part.partId} in structure ${s.structureId}`);
      return;
    }
    existing.parts.push({ row, order, part });
  });

  // Zone versions of one id must not overlap.
  const zonesById = new Map<string, ZoneDraft[]>();
  zoneDrafts.forEach((d) => {
    const arr = zonesById.get(d.zone.zoneId) ?? [];
    arr.push(d);
    zonesById.set(d.zone.zoneId, arr);
  });
  zonesById.forEach((arr) => {
    for (let i = 0; i < arr.length; i++) {
      for (let j = i + 1; j < arr.length; j++) {
        const a = arr[i].zone;
        const b = arr[j].zone;
        if (rangesOverlap(a.validFrom, a.validTo, b.validFrom, b.validTo)) {
          issues.push({ row: arr[j].row, field: "zone_valid_from", message: `zone ${a.zoneId} versions overlap (row ${arr[i].row})` });
        }
      }
    }
  });

  // Structures of one zone must not overlap; parts with equal priority must not overlap.
  const structuresByZone = new Map<string, StructureDraft[]>();
  structureDrafts.forEach((d) => {
    const arr = structuresByZone.get(d.structure.zoneId) ?? [];
    arr.push(d);
    structuresByZone.set(d.structure.zoneId, arr);

    for (let i = 0; i < d.parts.length; i++) {
      for (let j = i + 1; j < d.parts.length; j++) {
        const a = d.parts[i];
        const b = d.parts[j];
        if (a.part.priority === b.part.priority && partsOverlap(a.part, b.part)) {
          issues.push({
            row: b.row,
            field: "window",
            message: `part ${b.part.partId} overlaps part ${a.part.partId} (row ${a.row}) with equal priority`,
          });
        }
      }
    }
  });
  structuresByZone.forEach((arr) => {
    for (let i = 0; i < arr.length; i++) {
      for (let j = i + 1; j < arr.length; j++) {
        const a = arr[i].structure;
        const b = arr[j].structure;
        if (rangesOverlap(a.validFrom, a.validTo, b.validFrom, b.validTo)) {
          issues.push({
            row: arr[j].row,
            field: "structure_valid_from",
            message: `structure ${b.structureId} overlaps ${a.structureId} (row ${arr[i].row})`,
          });
        }
      }
    }
  });

  if (issues.length > 0) throw new MalformedTariffDataError(issues);

  const zones: Zone[] = [];
  zoneDrafts.forEach((d) => zones.push(d.zone));
  const structures: TariffStructure[] = [];
  structureDrafts.forEach((d) => {
    const parts = [...d.parts].sort((a, b) => a.part.priority - b.part.priority || a.order - b.order).map((p) => p.part);
    structures.push({ ...d.structure, parts });
  });

  return { zones, structures };
}
