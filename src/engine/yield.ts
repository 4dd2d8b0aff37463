import { YieldCurve } from "../models/YieldCurve";
import { ConfigurationError, InvalidInputError } from "./errors";

/**
 * Base yield assumed for a rung, before any ISA premium.
 *
 * @param curve - Yield curve across the ladder
 * @param rungNumber - 1-based position of the rung, shortest maturity first
 * @returns Yield in percent
 */
export function getRungYield(curve: YieldCurve, rungNumber: number): number {
  switch (curve.kind) {
    case "flat":
      return curve.ratePct;
    case "sloped":
      return curve.baseRatePct + (rungNumber - 1) * curve.slopePctPerYear;
    case "curve": {
      const rate = curve.ratesPct[rungNumber - 1];
      if (rate === undefined) {
        throw new ConfigurationError(`Yield curve has no rate for rung ${rungNumber}`);
      }
      return rate;
    }
  }
}

/**
 * Approximate yield to maturity of a bond bought at `price`.
 * Formula: YTM ≈ (C + (F - P) / n) / ((F + P) / 2)
 *
 * @param price - Clean price paid
 * @param faceValue - Redemption value
 * @param couponRatePct - Annual coupon as a percentage of face value
 * @param yearsToMaturity - Years until redemption
 * @returns Yield to maturity in percent
 *
 * @example
 * ```ts
 * calculateYieldToMaturity(95, 100, 4, 5) // ≈ 5.128
 * ```
 */
export function calculateYieldToMaturity(
  price: number,
  faceValue: number,
  couponRatePct: number,
  yearsToMaturity: number
): number {
  if (price <= 0 || faceValue <= 0 || yearsToMaturity <= 0) {
    throw new InvalidInputError(
      "price, faceValue and yearsToMaturity must all be greater than 0"
    );
  }

  const annualCoupon = faceValue * (couponRatePct / 100);
  const capitalGain = (faceValue - price) / yearsToMaturity;
  const averagePrice = (faceValue + price) / 2;
  return ((annualCoupon + capitalGain) / averagePrice) * 100;
}
