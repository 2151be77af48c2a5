import type { PartPricing, PriceStep } from "./types";

/**
 * Flat: the full amount as soon as one chargeable minute exists.
 */
export function priceFlat(minutes: number, amountCents: number): number {
  return minutes > 0 ? amountCents : 0;
}

/**
 * Linear: every started step is charged in full.
 */
export function priceLinear(minutes: number, amountCents: number, stepSizeMinutes: number): number {
  if (minutes <= 0) return 0;
  return Math.ceil(minutes / stepSizeMinutes) * amountCents;
}

/**
 * Stepped: `steps[i]` is the cumulative amount once `i` whole steps have elapsed.
 * Past the last defined step the schedule continues linearly at the last step's marginal amount.
 */
export function priceStepped(minutes: number, steps: PriceStep[], stepSizeMinutes: number): number {
  if (minutes <= 0 || steps.length === 0) return 0;
  const index = Math.floor(minutes / stepSizeMinutes);
  const lastIndex = steps.length - 1;
  const last = steps[lastIndex];
  if (index <= lastIndex) return steps[index].amountCents;

  const prev = lastIndex > 0 ? steps[lastIndex - 1].amountCents : 0;
  const marginal = last.amountCents - prev;
  return last.amountCents + (index - lastIndex) * marginal;
}

export function priceMinutes(minutes: number, pricing: PartPricing): number {
  switch (pricing.kind) {
    case "flat":
      return priceFlat(minutes, pricing.amountCents);
    case "linear":
      return priceLinear(minutes, pricing.amountCents, pricing.stepSizeMinutes);
    case "stepped":
      return priceStepped(minutes, pricing.steps, pricing.stepSizeMinutes);
  }
}
