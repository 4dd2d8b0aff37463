import { getAccountTotal, getPrimaryAccount, Rung, RungHolding } from '../../models/Rung';

const holding = (account: 'SIPP' | 'ISA', amount: number): RungHolding => ({
  account,
  amount,
  yieldPct: 4,
  annualIncome: (amount * 4) / 100,
});

describe('getPrimaryAccount', () => {
  it('should pick the account with the larger holding', () => {
    expect(getPrimaryAccount([holding('ISA', 20000), holding('SIPP', 10000)])).toBe('ISA');
    expect(getPrimaryAccount([holding('ISA', 10000), holding('SIPP', 20000)])).toBe('SIPP');
  });

  it('should prefer the ISA on a tie', () => {
    expect(getPrimaryAccount([holding('ISA', 15000), holding('SIPP', 15000)])).toBe('ISA');
  });

  it('should default to the ISA for an empty rung', () => {
    expect(getPrimaryAccount([])).toBe('ISA');
  });
});

describe('getAccountTotal', () => {
  const rungs: Rung[] = [
    {
      maturityYear: 2026,
      allocatedAmount: 30000,
      account: 'ISA',
      assumedYield: 4,
      annualIncome: 1200,
      holdings: [holding('ISA', 20000), holding('SIPP', 10000)],
    },
    {
      maturityYear: 2027,
      allocatedAmount: 30000,
      account: 'SIPP',
      assumedYield: 4,
      annualIncome: 1200,
      holdings: [holding('SIPP', 30000)],
    },
  ];

  it('should sum amounts for one account across rungs', () => {
    expect(getAccountTotal(rungs, 'SIPP', 'amount')).toBe(40000);
    expect(getAccountTotal(rungs, 'ISA', 'amount')).toBe(20000);
  });

  it('should sum amounts in whole pence', () => {
    const pennyRungs = [0.1, 0.2].map((amount, index): Rung => ({
      maturityYear: 2026 + index,
      allocatedAmount: amount,
      account: 'ISA',
      assumedYield: 4,
      annualIncome: (amount * 4) / 100,
      holdings: [holding('ISA', amount)],
    }));

    expect(getAccountTotal(pennyRungs, 'ISA', 'amount')).toBe(0.3);
  });

  it('should sum income for one account across rungs', () => {
    expect(getAccountTotal(rungs, 'SIPP', 'annualIncome')).toBe(1600);
  });
});
