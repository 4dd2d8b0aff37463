/**
 * Shared constants for ladder construction and tax estimation.
 * Centralizing these makes behavior consistent and easier to tune.
 */

import { TaxBands } from "../models/TaxAssumptions";

/** Projected income within this many pounds of the target counts as on target. */
export const INCOME_TOLERANCE = 1;

/** Monetary amounts are allocated in whole pence. */
export const PENCE_PER_POUND = 100;

/** Largest pound amount whose value in pence is still an exact integer. */
export const MAX_MONEY_AMOUNT = Math.floor(Number.MAX_SAFE_INTEGER / PENCE_PER_POUND);

/** Calendar years accepted as a ladder start year. */
export const MIN_START_YEAR = 1900;
export const MAX_START_YEAR = 9999;

/** Default cash buffer withheld from each account before laddering (%). */
export const DEFAULT_CASH_BUFFER_PCT = 0;

/** Default extra yield earned on ISA holdings (%). */
export const DEFAULT_ISA_YIELD_PREMIUM_PCT = 0;

/** UK income tax bands for the 2024/25 tax year (England, Wales and Northern Ireland). */
export const UK_TAX_BANDS_2024_25: TaxBands = {
  personalAllowance: 12570,
  basicRateThreshold: 50270,
  higherRateThreshold: 125140,
  basicRatePct: 20,
  higherRatePct: 40,
  additionalRatePct: 45,
};
