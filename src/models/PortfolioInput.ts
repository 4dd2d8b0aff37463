/**
 * Portfolio input data structures
 */

export type Account = "SIPP" | "ISA";

/** Accounts in the order rungs draw on them: ISA first for the earlier, more liquid rungs. */
export const ACCOUNT_FILL_ORDER: readonly Account[] = ["ISA", "SIPP"];

export type AccountBalances = Record<Account, number>;

export interface PortfolioInput {
  sippValue: number;
  isaValue: number;
  targetAnnualIncome: number;
  ladderYears: number; // Number of rungs
  startYear: number; // Calendar year the ladder is built
}

/**
 * Get total portfolio value across both accounts
 */
export function getTotalPortfolioValue(input: PortfolioInput): number {
  return input.sippValue + input.isaValue;
}

/**
 * Get account balances keyed by account
 */
export function getAccountBalances(input: PortfolioInput): AccountBalances {
  return {
    SIPP: input.sippValue,
    ISA: input.isaValue,
  };
}
