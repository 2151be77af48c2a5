import type { LineItem } from "./types";

/**
 * Clamps one structure's line items to `dailyMaxCents` per local calendar day.
 * The excess is removed proportionally; leftover cents come off the largest items first
 * (earliest item on ties). Returns new line items and whether any day was clamped.
 */
export function applyDailyMax(
  items: LineItem[],
  dailyMaxCents: number | null,
): { items: LineItem[]; capped: boolean } {
  if (dailyMaxCents == null) return { items, capped: false };

  const byDay = new Map<string, number[]>();
  items.forEach((item, idx) => {
    const arr = byDay.get(item.localDate) ?? [];
    arr.push(idx);
    byDay.set(item.localDate, arr);
  });

  const reductions = new Array<number>(items.length).fill(0);
  let capped = false;

  byDay.forEach((indices) => {
    const daySum = indices.reduce((a, i) => a + items[i].grossCents, 0);
    if (daySum <= dailyMaxCents) return;
    capped = true;

    const excess = daySum - dailyMaxCents;
    let assigned = 0;
    for (const i of indices) {
      const share = Math.floor((excess * items[i].grossCents) / daySum);
      reductions[i] = share;
      assigned += share;
    }

    const order = [...indices].sort((a, b) => items[b].grossCents - items[a].grossCents || a - b);
    let leftover = excess - assigned;
    let k = 0;
    while (leftover > 0 && order.length > 0) {
      const i = order[k % order.length];
      if (items[i].grossCents - reductions[i] > 0) {
        reductions[i] += 1;
        leftover -= 1;
      }
      k += 1;
    }
  });

  return {
    items: items.map((item, i) => ({
      ...item,
      capReductionCents: reductions[i],
      amountCents: item.grossCents - reductions[i],
    })),
    capped,
  };
}
