import { Account, getAccountBalances, PortfolioInput } from "../models/PortfolioInput";
import { getAccountTotal, getPrimaryAccount, Rung, RungHolding } from "../models/Rung";
import { getCurveCapacity, YieldCurve } from "../models/YieldCurve";
import { TaxAssumptions } from "../models/TaxAssumptions";
import { AccountSummary, getIncomeGapStatus, LadderResult } from "../models/LadderResult";
import {
  LadderOptionsSchema,
  PortfolioInputSchema,
  formatIssues,
} from "../utils/validation";
import {
  DEFAULT_CASH_BUFFER_PCT,
  DEFAULT_ISA_YIELD_PREMIUM_PCT,
} from "../utils/constants";
import { fromPence, incomeAtYield, percentOf, weightedAverage } from "../utils/math";
import { rungMaturityYear } from "../utils/time";
import { fundRungs, splitIntoRungs, withholdCashBuffer } from "./allocation";
import { getRungYield } from "./yield";
import { estimateSippTax } from "./tax";
import { ConfigurationError, InvalidInputError } from "./errors";

/**
 * Options controlling yields, tax and cash for a ladder calculation.
 *
 * @property yieldCurve - Base yield per rung (required)
 * @property tax - SIPP tax-drag assumptions (required)
 * @property isaYieldPremiumPct - Extra yield on ISA holdings, e.g. corporate bonds held alongside gilts
 * @property cashBufferPct - Share of each account kept as cash instead of laddered
 */
export interface LadderOptions {
  yieldCurve?: YieldCurve;
  tax?: TaxAssumptions;
  isaYieldPremiumPct?: number;
  cashBufferPct?: number;
}

/**
 * Ladder options after validation, with defaults applied.
 */
export interface ResolvedLadderOptions {
  yieldCurve: YieldCurve;
  tax: TaxAssumptions;
  isaYieldPremiumPct: number;
  cashBufferPct: number;
}

/**
 * Validates portfolio input.
 *
 * @throws InvalidInputError listing every offending field
 */
export function parsePortfolioInput(value: unknown): PortfolioInput {
  const parsed = PortfolioInputSchema.safeParse(value);
  if (!parsed.success) {
    throw new InvalidInputError("Invalid portfolio input", formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Validates ladder options and applies defaults.
 *
 * @param value - Options as supplied by the caller
 * @param ladderYears - Number of rungs the yield curve must cover
 * @throws ConfigurationError when the yield curve or tax assumptions are missing or malformed,
 * or when a sloped curve leaves 0-100% before the final rung
 */
export function parseLadderOptions(value: unknown, ladderYears: number): ResolvedLadderOptions {
  const parsed = LadderOptionsSchema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new ConfigurationError("Invalid ladder options", formatIssues(parsed.error));
  }

  const { yieldCurve, tax, isaYieldPremiumPct, cashBufferPct } = parsed.data;

  const missing: string[] = [];
  if (!yieldCurve) missing.push("yieldCurve");
  if (!tax) missing.push("tax");
  if (!yieldCurve || !tax) {
    throw new ConfigurationError(
      `Missing required configuration: ${missing.join(", ")}`,
      missing.map((field) => `${field}: Required`)
    );
  }

  if (getCurveCapacity(yieldCurve) < ladderYears) {
    throw new ConfigurationError(
      `Yield curve has ${getCurveCapacity(yieldCurve)} rates but the ladder has ${ladderYears} rungs`
    );
  }

  if (yieldCurve.kind === "sloped") {
    const finalYield = getRungYield(yieldCurve, ladderYears);
    if (finalYield < 0 || finalYield > 100) {
      throw new ConfigurationError(
        `Sloped yield curve gives rung ${ladderYears} a yield of ${finalYield}%, outside 0-100%`
      );
    }
  }

  return {
    yieldCurve,
    tax,
    isaYieldPremiumPct: isaYieldPremiumPct ?? DEFAULT_ISA_YIELD_PREMIUM_PCT,
    cashBufferPct: cashBufferPct ?? DEFAULT_CASH_BUFFER_PCT,
  };
}

/**
 * Builds a gilt ladder across a SIPP and an ISA.
 *
 * Allocation policy: the invested total is split into `ladderYears` equal rungs
 * (in pence, remainder on the final rung). Rungs are funded from the ISA first,
 * shortest maturity first, then from the SIPP. Rung n matures in startYear + n.
 *
 * Tax drag: SIPP income is taxed at the marginal rate above the personal allowance
 * left after other taxable income. ISA income is untaxed.
 *
 * @throws InvalidInputError for malformed or out-of-range portfolio parameters
 * @throws ConfigurationError for missing or malformed yield or tax parameters
 */
export function computeLadder(input: PortfolioInput, options: LadderOptions = {}): LadderResult {
  const portfolio = parsePortfolioInput(input);
  const { yieldCurve, tax, isaYieldPremiumPct, cashBufferPct } = parseLadderOptions(
    options,
    portfolio.ladderYears
  );

  const { invested, cash } = withholdCashBuffer(getAccountBalances(portfolio), cashBufferPct);
  const rungSizes = splitIntoRungs(invested, portfolio.ladderYears);
  const draws = fundRungs(rungSizes, invested);

  const rungs: Rung[] = rungSizes.map((rungPence, index) => {
    const rungNumber = index + 1;
    const baseYield = getRungYield(yieldCurve, rungNumber);
    const yieldFor = (account: Account): number =>
      account === "ISA" ? baseYield + isaYieldPremiumPct : baseYield;

    const holdings: RungHolding[] = draws[index].map(({ account, pence }) => {
      const amount = fromPence(pence);
      const yieldPct = yieldFor(account);
      return {
        account,
        amount,
        yieldPct,
        annualIncome: incomeAtYield(amount, yieldPct),
      };
    });

    const account = getPrimaryAccount(holdings);

    return {
      maturityYear: rungMaturityYear(portfolio.startYear, rungNumber),
      allocatedAmount: fromPence(rungPence),
      account,
      assumedYield: weightedAverage(
        holdings.map((h) => ({ value: h.yieldPct, weight: h.amount })),
        yieldFor(account)
      ),
      annualIncome: holdings.reduce((sum, h) => sum + h.annualIncome, 0),
      holdings,
    };
  });

  const summarize = (account: Account): AccountSummary => ({
    allocated: getAccountTotal(rungs, account, "amount"),
    annualIncome: getAccountTotal(rungs, account, "annualIncome"),
  });
  const accountTotals: Record<Account, AccountSummary> = {
    SIPP: summarize("SIPP"),
    ISA: summarize("ISA"),
  };

  const totalAllocated = fromPence(rungSizes.reduce((sum, pence) => sum + pence, 0));
  const projectedAnnualIncome = rungs.reduce((sum, rung) => sum + rung.annualIncome, 0);

  const sippIncome = accountTotals.SIPP.annualIncome;
  const { taxableSippIncome, estimatedTax } = estimateSippTax(sippIncome, tax);

  const gapAmount = projectedAnnualIncome - portfolio.targetAnnualIncome;
  const netAnnualIncome = projectedAnnualIncome - estimatedTax;

  return {
    rungs,
    totalAllocated,
    projectedAnnualIncome,
    estimatedTaxDrag: percentOf(estimatedTax, projectedAnnualIncome),
    incomeGap: {
      status: getIncomeGapStatus(gapAmount),
      amount: gapAmount,
      percentOfTarget: percentOf(projectedAnnualIncome, portfolio.targetAnnualIncome),
    },
    accountTotals,
    cashBuffer: {
      SIPP: fromPence(cash.SIPP),
      ISA: fromPence(cash.ISA),
      total: fromPence(cash.SIPP + cash.ISA),
    },
    tax: {
      sippIncome,
      isaIncome: accountTotals.ISA.annualIncome,
      taxableSippIncome,
      estimatedTax,
      netAnnualIncome,
      netPercentOfTarget: percentOf(netAnnualIncome, portfolio.targetAnnualIncome),
    },
  };
}
