import { Account, ACCOUNT_FILL_ORDER } from "./PortfolioInput";
import { fromPence, toPence } from "../utils/math";

/**
 * Ladder rung data structures
 */

export interface RungHolding {
  account: Account;
  amount: number;
  yieldPct: number;
  annualIncome: number;
}

export interface Rung {
  maturityYear: number;
  allocatedAmount: number;
  account: Account; // Account funding the larger share of the rung
  assumedYield: number; // Amount-weighted yield of the holdings (%)
  annualIncome: number;
  holdings: RungHolding[];
}

/**
 * Determine the account a rung is attributed to.
 * The largest holding wins; ties and empty rungs go to the account drawn on first.
 */
export function getPrimaryAccount(holdings: RungHolding[]): Account {
  let primary: Account = ACCOUNT_FILL_ORDER[0];
  let largest = -1;

  for (const account of ACCOUNT_FILL_ORDER) {
    const amount = holdings
      .filter((h) => h.account === account)
      .reduce((sum, h) => sum + h.amount, 0);
    if (amount > largest) {
      largest = amount;
      primary = account;
    }
  }

  return primary;
}

/**
 * Sum holding amounts or income for one account across a set of rungs.
 * Amounts are summed in whole pence, as they were allocated.
 */
export function getAccountTotal(
  rungs: Rung[],
  account: Account,
  field: "amount" | "annualIncome"
): number {
  const holdings = rungs.flatMap((rung) => rung.holdings.filter((h) => h.account === account));

  if (field === "amount") {
    return fromPence(holdings.reduce((sum, h) => sum + toPence(h.amount), 0));
  }
  return holdings.reduce((sum, h) => sum + h.annualIncome, 0);
}
