import { createLogger } from "@/lib/log";
import { calculateParkingCost, type CalculateOptions } from "@/lib/tariff/calculateParkingCost";
import type { CalculationResult } from "@/lib/tariff/types";
import type { ZoneRegistry } from "@/modules/zoneRegistry/registry";
import type { ZoneRegistrySnapshot } from "@/modules/zoneRegistry/snapshot";

const log = createLogger("tariff-calculator");

export class TariffCalculator {
  private readonly registry: ZoneRegistry;
  private readonly options: CalculateOptions;

  constructor(registry: ZoneRegistry, options: CalculateOptions) {
    this.registry = registry;
    this.options = options;
  }

  /**
   * Prices [start, end) against the snapshot published when the call starts, or against
   * `snapshot` when the caller already holds one.
   */
  calculate(zoneId: string, start: Date, end: Date, snapshot: ZoneRegistrySnapshot = this.registry.current()): CalculationResult {
    const result = calculateParkingCost(snapshot, { zoneId, startTime: start, endTime: end }, this.options);
    log.debug("calculated", {
      zoneId,
      minutes: result.durationMinutes,
      totalCents: result.totalCents,
      items: result.lineItems.length,
      capped: result.cappedByDailyMax,
    });
    return result;
  }
}
