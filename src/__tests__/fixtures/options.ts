import { LadderOptions } from '../../engine/ladder';
import { TaxAssumptions } from '../../models/TaxAssumptions';
import { YieldCurve } from '../../models/YieldCurve';

export const flatYield4: YieldCurve = { kind: 'flat', ratePct: 4 };

export const slopedYield: YieldCurve = {
  kind: 'sloped',
  baseRatePct: 4,
  slopePctPerYear: 0.25,
};

export const threePointCurve: YieldCurve = {
  kind: 'curve',
  ratesPct: [3, 3.5, 4],
};

export const basicRateTax: TaxAssumptions = {
  marginalRatePct: 20,
  personalAllowance: 12570,
};

// Other pension income already uses the whole personal allowance
export const allowanceUsedTax: TaxAssumptions = {
  marginalRatePct: 20,
  personalAllowance: 12570,
  otherTaxableIncome: 12570,
};

export const defaultOptions: LadderOptions = {
  yieldCurve: flatYield4,
  tax: basicRateTax,
};
