import { SippTaxEstimate, TaxAssumptions, TaxBands, TaxLiability } from "../models/TaxAssumptions";
import { UK_TAX_BANDS_2024_25 } from "../utils/constants";
import { percentOf } from "../utils/math";
import { InvalidInputError } from "./errors";

/**
 * Income tax on total income under a banded regime.
 * Other income uses the personal allowance alongside ladder income.
 *
 * @param income - Ladder income
 * @param otherIncome - Other taxable income, such as a pension
 * @param bands - Tax bands to apply (defaults to UK 2024/25)
 */
export function calculateTaxLiability(
  income: number,
  otherIncome: number = 0,
  bands: TaxBands = UK_TAX_BANDS_2024_25
): TaxLiability {
  if (income < 0 || otherIncome < 0) {
    throw new InvalidInputError("income and otherIncome must not be negative");
  }

  const totalIncome = income + otherIncome;
  const basicBand = bands.basicRateThreshold - bands.personalAllowance;
  const higherBand = bands.higherRateThreshold - bands.basicRateThreshold;

  let tax: number;
  if (totalIncome <= bands.personalAllowance) {
    tax = 0;
  } else if (totalIncome <= bands.basicRateThreshold) {
    tax = ((totalIncome - bands.personalAllowance) * bands.basicRatePct) / 100;
  } else if (totalIncome <= bands.higherRateThreshold) {
    tax =
      (basicBand * bands.basicRatePct) / 100 +
      ((totalIncome - bands.basicRateThreshold) * bands.higherRatePct) / 100;
  } else {
    tax =
      (basicBand * bands.basicRatePct) / 100 +
      (higherBand * bands.higherRatePct) / 100 +
      ((totalIncome - bands.higherRateThreshold) * bands.additionalRatePct) / 100;
  }

  return {
    grossIncome: totalIncome,
    taxLiability: tax,
    netIncome: totalIncome - tax,
    effectiveRatePct: percentOf(tax, totalIncome),
  };
}

/**
 * Tax due on SIPP ladder income under a single marginal rate.
 * Other taxable income uses up the personal allowance first.
 */
export function estimateSippTax(sippIncome: number, assumptions: TaxAssumptions): SippTaxEstimate {
  const otherIncome = assumptions.otherTaxableIncome ?? 0;
  const remainingAllowance = Math.max(0, assumptions.personalAllowance - otherIncome);
  const taxableSippIncome = Math.max(0, sippIncome - remainingAllowance);

  return {
    taxableSippIncome,
    estimatedTax: (taxableSippIncome * assumptions.marginalRatePct) / 100,
  };
}
