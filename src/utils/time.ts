/**
 * Calendar helpers for ladder maturities.
 */

/**
 * Maturity year of a rung. Rungs are numbered from 1; the first rung
 * matures the year after the ladder is built.
 *
 * @param startYear - Calendar year the ladder is built
 * @param rungNumber - 1-based position of the rung in the ladder
 */
export function rungMaturityYear(startYear: number, rungNumber: number): number {
  return startYear + rungNumber;
}

/**
 * Whole years from `asOfYear` until `maturityYear`; 0 once the year has passed.
 */
export function yearsUntilMaturity(maturityYear: number, asOfYear: number): number {
  return Math.max(0, maturityYear - asOfYear);
}
