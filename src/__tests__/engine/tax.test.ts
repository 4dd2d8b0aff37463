import { calculateTaxLiability, estimateSippTax } from '../../engine/tax';
import { InvalidInputError } from '../../engine/errors';
import { TaxBands } from '../../models/TaxAssumptions';
import { allowanceUsedTax, basicRateTax } from '../fixtures/options';

describe('calculateTaxLiability', () => {
  it('should charge nothing within the personal allowance', () => {
    const result = calculateTaxLiability(10000);

    expect(result).toEqual({
      grossIncome: 10000,
      taxLiability: 0,
      netIncome: 10000,
      effectiveRatePct: 0,
    });
  });

  it('should charge basic rate above the allowance', () => {
    const result = calculateTaxLiability(30000);

    expect(result.taxLiability).toBe(3486);
    expect(result.netIncome).toBe(26514);
  });

  it('should add pension income before applying bands', () => {
    const result = calculateTaxLiability(40000, 13000);

    expect(result.grossIncome).toBe(53000);
    // 37,700 at 20% + 2,730 at 40%
    expect(result.taxLiability).toBe(8632);
    expect(result.netIncome).toBe(44368);
    expect(result.effectiveRatePct).toBeCloseTo(16.2868, 4);
  });

  it('should charge additional rate above the higher rate threshold', () => {
    const result = calculateTaxLiability(150000);

    // 7,540 basic + 29,948 higher + 11,187 additional
    expect(result.taxLiability).toBe(48675);
  });

  it('should report a zero effective rate for zero income', () => {
    expect(calculateTaxLiability(0).effectiveRatePct).toBe(0);
  });

  it('should accept custom bands', () => {
    const flatBands: TaxBands = {
      personalAllowance: 10000,
      basicRateThreshold: 100000,
      higherRateThreshold: 200000,
      basicRatePct: 10,
      higherRatePct: 10,
      additionalRatePct: 10,
    };

    expect(calculateTaxLiability(20000, 0, flatBands).taxLiability).toBe(1000);
  });

  it('should reject negative income', () => {
    expect(() => calculateTaxLiability(-1)).toThrow(InvalidInputError);
    expect(() => calculateTaxLiability(1000, -1)).toThrow(InvalidInputError);
    expect(() => calculateTaxLiability(1000, -1)).toThrow(
      'income and otherIncome must not be negative'
    );
  });
});

describe('estimateSippTax', () => {
  it('should not tax SIPP income within the allowance', () => {
    expect(estimateSippTax(4000, basicRateTax)).toEqual({ taxableSippIncome: 0, estimatedTax: 0 });
  });

  it('should tax SIPP income above the allowance at the marginal rate', () => {
    expect(estimateSippTax(20000, basicRateTax)).toEqual({
      taxableSippIncome: 7430,
      estimatedTax: 1486,
    });
  });

  it('should use other taxable income against the allowance first', () => {
    expect(estimateSippTax(4000, { ...basicRateTax, otherTaxableIncome: 10000 })).toEqual({
      taxableSippIncome: 1430,
      estimatedTax: 286,
    });
  });

  it('should tax all SIPP income once the allowance is used up', () => {
    expect(estimateSippTax(4000, allowanceUsedTax)).toEqual({
      taxableSippIncome: 4000,
      estimatedTax: 800,
    });
  });

  it('should not let other income beyond the allowance increase SIPP tax', () => {
    expect(estimateSippTax(4000, { ...basicRateTax, otherTaxableIncome: 50000 })).toEqual({
      taxableSippIncome: 4000,
      estimatedTax: 800,
    });
  });
});
