import { Account } from "./PortfolioInput";
import { Rung } from "./Rung";
import { INCOME_TOLERANCE } from "../utils/constants";

/**
 * Ladder result data structures
 */

export type IncomeGapStatus = "shortfall" | "surplus" | "on_target";

export interface IncomeGap {
  status: IncomeGapStatus;
  amount: number; // projected - target
  percentOfTarget: number;
}

export interface AccountSummary {
  allocated: number;
  annualIncome: number;
}

export interface CashBuffer {
  SIPP: number;
  ISA: number;
  total: number;
}

export interface LadderTaxSummary {
  sippIncome: number;
  isaIncome: number;
  taxableSippIncome: number;
  estimatedTax: number;
  netAnnualIncome: number;
  netPercentOfTarget: number; // after-tax income as % of target
}

export interface LadderResult {
  rungs: Rung[];
  totalAllocated: number;
  projectedAnnualIncome: number;
  estimatedTaxDrag: number; // % of projected income lost to tax
  incomeGap: IncomeGap;
  accountTotals: Record<Account, AccountSummary>;
  cashBuffer: CashBuffer;
  tax: LadderTaxSummary;
}

/**
 * Determine income gap status from the difference between projected and target income
 */
export function getIncomeGapStatus(amount: number): IncomeGapStatus {
  if (Math.abs(amount) < INCOME_TOLERANCE) {
    return "on_target";
  }
  return amount > 0 ? "surplus" : "shortfall";
}
