/**
 * Tax data structures
 */

/**
 * Assumptions for the SIPP tax-drag estimate.
 * SIPP income above the personal allowance left after other taxable income
 * is taxed at the marginal rate; ISA income is untaxed.
 */
export interface TaxAssumptions {
  marginalRatePct: number;
  personalAllowance: number;
  otherTaxableIncome?: number; // State pension, DB pensions etc. Uses the allowance first.
}

/**
 * Banded income tax thresholds. Thresholds are total income levels in pounds.
 */
export interface TaxBands {
  personalAllowance: number;
  basicRateThreshold: number;
  higherRateThreshold: number;
  basicRatePct: number;
  higherRatePct: number;
  additionalRatePct: number;
}

export interface TaxLiability {
  grossIncome: number;
  taxLiability: number;
  netIncome: number;
  effectiveRatePct: number;
}

export interface SippTaxEstimate {
  taxableSippIncome: number;
  estimatedTax: number;
}
