import { Account, AccountBalances, ACCOUNT_FILL_ORDER } from "../models/PortfolioInput";
import { splitEvenly, toPence } from "../utils/math";

/**
 * Amount drawn from one account into one rung, in whole pence.
 */
export interface AccountDraw {
  account: Account;
  pence: number;
}

/**
 * Withholds a cash buffer from each account before laddering.
 *
 * @param balances - Account values in pounds
 * @param cashBufferPct - Share of each account kept as cash (0-100)
 * @returns Invested and cash amounts per account, in whole pence
 */
export function withholdCashBuffer(
  balances: AccountBalances,
  cashBufferPct: number
): { invested: AccountBalances; cash: AccountBalances } {
  const invested: AccountBalances = { SIPP: 0, ISA: 0 };
  const cash: AccountBalances = { SIPP: 0, ISA: 0 };

  for (const account of ACCOUNT_FILL_ORDER) {
    const totalPence = toPence(balances[account]);
    const cashPence = Math.round((totalPence * cashBufferPct) / 100);
    cash[account] = cashPence;
    invested[account] = totalPence - cashPence;
  }

  return { invested, cash };
}

/**
 * Splits the invested total into equal rungs, in whole pence.
 * The final rung takes any remainder so the rungs sum exactly to the total.
 */
export function splitIntoRungs(investedPence: AccountBalances, ladderYears: number): number[] {
  const totalPence = ACCOUNT_FILL_ORDER.reduce((sum, account) => sum + investedPence[account], 0);
  return splitEvenly(totalPence, ladderYears);
}

/**
 * Funds rungs from the accounts in fill order (ISA first).
 * Rungs are taken shortest maturity first, so the ISA backs the earliest rungs
 * and the SIPP, which cannot be accessed before pension age, backs the later ones.
 * A rung straddling the boundary draws on both accounts.
 *
 * @param rungPence - Rung sizes in pence, shortest maturity first
 * @param investedPence - Amount available per account in pence
 * @returns Draws per rung, in fill order
 */
export function fundRungs(rungPence: number[], investedPence: AccountBalances): AccountDraw[][] {
  const remaining: AccountBalances = { ...investedPence };

  return rungPence.map((rungSize) => {
    const draws: AccountDraw[] = [];
    let unfunded = rungSize;

    for (const account of ACCOUNT_FILL_ORDER) {
      if (unfunded <= 0) break;

      const drawn = Math.min(remaining[account], unfunded);
      if (drawn > 0) {
        draws.push({ account, pence: drawn });
        remaining[account] -= drawn;
        unfunded -= drawn;
      }
    }

    return draws;
  });
}
