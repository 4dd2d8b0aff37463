import { getAccountBalances, getTotalPortfolioValue } from '../../models/PortfolioInput';
import { examplePortfolio, sippOnlyPortfolio } from '../fixtures/portfolios';

describe('getTotalPortfolioValue', () => {
  it('should add both accounts', () => {
    expect(getTotalPortfolioValue(examplePortfolio)).toBe(150000);
  });

  it('should handle an empty account', () => {
    expect(getTotalPortfolioValue(sippOnlyPortfolio)).toBe(120000);
  });
});

describe('getAccountBalances', () => {
  it('should key balances by account', () => {
    expect(getAccountBalances(examplePortfolio)).toEqual({ SIPP: 100000, ISA: 50000 });
  });
});
