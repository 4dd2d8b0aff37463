/**
 * Yield curve data structures
 */

export interface FlatYieldCurve {
  kind: "flat";
  ratePct: number;
}

/** Rung n yields baseRatePct + (n - 1) * slopePctPerYear */
export interface SlopedYieldCurve {
  kind: "sloped";
  baseRatePct: number;
  slopePctPerYear: number;
}

/** One rate per rung, shortest maturity first */
export interface PointYieldCurve {
  kind: "curve";
  ratesPct: number[];
}

export type YieldCurve = FlatYieldCurve | SlopedYieldCurve | PointYieldCurve;

/**
 * Number of rungs a curve can price; unlimited for formula curves
 */
export function getCurveCapacity(curve: YieldCurve): number {
  return curve.kind === "curve" ? curve.ratesPct.length : Number.POSITIVE_INFINITY;
}
