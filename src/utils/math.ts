/**
 * Monetary and weighting utilities for ladder calculations.
 * Allocation works in whole pence so that rung amounts always sum exactly.
 */

import { PENCE_PER_POUND } from "./constants";

/**
 * Converts a pound amount to whole pence, rounding to the nearest penny.
 *
 * @example
 * ```ts
 * toPence(1.5) // returns 150
 * ```
 */
export function toPence(amount: number): number {
  return Math.round(amount * PENCE_PER_POUND);
}

/**
 * Converts whole pence back to pounds.
 */
export function fromPence(pence: number): number {
  return pence / PENCE_PER_POUND;
}

/**
 * Rounds a pound amount to the nearest penny.
 */
export function roundToPence(amount: number): number {
  return fromPence(toPence(amount));
}

/**
 * Splits an integer amount into `parts` equal integer shares.
 * Every share gets the floor of the even split; the final share also takes the remainder.
 *
 * @param total - Amount to split (whole units, e.g. pence)
 * @param parts - Number of shares (at least 1)
 * @returns Shares in order, summing exactly to `total`
 *
 * @example
 * ```ts
 * splitEvenly(1000, 3) // returns [333, 333, 334]
 * ```
 */
export function splitEvenly(total: number, parts: number): number[] {
  const base = Math.floor(total / parts);
  const shares = new Array<number>(parts).fill(base);
  shares[parts - 1] += total - base * parts;
  return shares;
}

/**
 * Calculates the weighted average of values.
 * Returns `fallback` when the weights sum to zero.
 */
export function weightedAverage(
  entries: ReadonlyArray<{ value: number; weight: number }>,
  fallback: number
): number {
  let weightedSum = 0;
  let totalWeight = 0;

  for (const { value, weight } of entries) {
    weightedSum += value * weight;
    totalWeight += weight;
  }

  return totalWeight > 0 ? weightedSum / totalWeight : fallback;
}

/**
 * Expresses `part` as a percentage of `whole`; 0 when `whole` is 0.
 */
export function percentOf(part: number, whole: number): number {
  if (whole === 0) {
    return 0;
  }
  return (part / whole) * 100;
}

/**
 * Annual income produced by an amount at a percentage yield.
 *
 * @example
 * ```ts
 * incomeAtYield(30000, 4) // returns 1200
 * ```
 */
export function incomeAtYield(amount: number, yieldPct: number): number {
  return (amount * yieldPct) / 100;
}
