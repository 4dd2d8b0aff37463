import { calculateYieldToMaturity, getRungYield } from '../../engine/yield';
import { ConfigurationError, InvalidInputError } from '../../engine/errors';
import { flatYield4, threePointCurve } from '../fixtures/options';

describe('getRungYield', () => {
  it('should return the flat rate for every rung', () => {
    expect(getRungYield(flatYield4, 1)).toBe(4);
    expect(getRungYield(flatYield4, 10)).toBe(4);
  });

  it('should step a sloped curve by rung', () => {
    const curve = { kind: 'sloped' as const, baseRatePct: 4.5, slopePctPerYear: 0.1 };

    expect(getRungYield(curve, 1)).toBe(4.5);
    expect(getRungYield(curve, 3)).toBeCloseTo(4.7, 10);
  });

  it('should look up point curve rates by rung', () => {
    expect(getRungYield(threePointCurve, 1)).toBe(3);
    expect(getRungYield(threePointCurve, 2)).toBe(3.5);
  });

  it('should reject a rung beyond the point curve', () => {
    expect(() => getRungYield(threePointCurve, 4)).toThrow(ConfigurationError);
  });
});

describe('calculateYieldToMaturity', () => {
  it('should equal the coupon for a bond bought at par', () => {
    expect(calculateYieldToMaturity(100, 100, 4, 3)).toBeCloseTo(4, 10);
  });

  it('should include the pull to par for a discount bond', () => {
    // (4 + 5/5) / 97.5
    expect(calculateYieldToMaturity(95, 100, 4, 5)).toBeCloseTo(5.1282, 4);
  });

  it('should fall below the coupon for a premium bond', () => {
    // (4.25 - 10/2) / 105
    expect(calculateYieldToMaturity(110, 100, 4.25, 2)).toBeCloseTo(-0.7143, 4);
  });

  it('should reject non-positive price or term', () => {
    expect(() => calculateYieldToMaturity(0, 100, 4, 5)).toThrow(InvalidInputError);
    expect(() => calculateYieldToMaturity(95, 100, 4, 0)).toThrow(InvalidInputError);
  });
});
