import type { PartPricing } from "@/lib/tariff/types";
import { formatTimeOfDay } from "@/lib/tariff/windows";

import type { ZoneRegistrySnapshot } from "./snapshot";
import type { TariffDescription } from "./types";

function pricingFields(p: PartPricing): Pick<TariffDescription["parts"][number], "amountCents" | "stepSizeMinutes" | "steps"> {
  switch (p.kind) {
    case "flat":
      return { amountCents: p.amountCents, stepSizeMinutes: null, steps: null };
    case "linear":
      return { amountCents: p.amountCents, stepSizeMinutes: p.stepSizeMinutes, steps: null };
    case "stepped":
      return { amountCents: null, stepSizeMinutes: p.stepSizeMinutes, steps: p.steps.map((s) => ({ ...s })) };
  }
}

/**
 * Read-only view of the structure valid at `at` for a zone; null when the zone has none then,
 * and null for an unknown zone.
 */
export function describeTariff(snapshot: ZoneRegistrySnapshot, zoneId: string, at: Date = new Date()): TariffDescription | null {
  const zone = snapshot.getZone(zoneId, at);
  const structure = snapshot.structureAt(zoneId, at);
  if (!zone || !structure) return null;

  return {
    zoneId,
    description: zone.description,
    timeZone: zone.timeZone,
    structureId: structure.structureId,
    validFrom: structure.validFrom,
    validTo: structure.validTo,
    dailyMaxCents: structure.dailyMaxCents,
    vatPercentage: structure.vatPercentage,
    parts: structure.parts.map((p) => ({
      partId: p.partId,
      priority: p.priority,
      weekdays: [...p.weekdays],
      window: { start: formatTimeOfDay(p.window.startMinute), end: formatTimeOfDay(p.window.endMinute) },
      dates: { from: p.dates.from, to: p.dates.to },
      pricingKind: p.pricing.kind,
      ...pricingFields(p.pricing),
      freeMinutes: p.freeMinutes,
    })),
  };
}
