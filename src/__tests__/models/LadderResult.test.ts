import { getIncomeGapStatus } from '../../models/LadderResult';
import { getCurveCapacity } from '../../models/YieldCurve';
import { flatYield4, slopedYield, threePointCurve } from '../fixtures/options';

describe('getIncomeGapStatus', () => {
  it('should treat differences under a pound as on target', () => {
    expect(getIncomeGapStatus(0)).toBe('on_target');
    expect(getIncomeGapStatus(0.5)).toBe('on_target');
    expect(getIncomeGapStatus(-0.99)).toBe('on_target');
  });

  it('should report a surplus above target', () => {
    expect(getIncomeGapStatus(1)).toBe('surplus');
    expect(getIncomeGapStatus(250)).toBe('surplus');
  });

  it('should report a shortfall below target', () => {
    expect(getIncomeGapStatus(-600)).toBe('shortfall');
  });
});

describe('getCurveCapacity', () => {
  it('should be unlimited for formula curves', () => {
    expect(getCurveCapacity(flatYield4)).toBe(Number.POSITIVE_INFINITY);
    expect(getCurveCapacity(slopedYield)).toBe(Number.POSITIVE_INFINITY);
  });

  it('should be the number of rates for a point curve', () => {
    expect(getCurveCapacity(threePointCurve)).toBe(3);
  });
});
