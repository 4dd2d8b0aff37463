import { PortfolioInput } from "../models/PortfolioInput";
import { LadderResult } from "../models/LadderResult";
import { GiltRecommendation } from "../models/Gilt";
import { TaxLiability } from "../models/TaxAssumptions";
import {
  computeLadder,
  parseLadderOptions,
  parsePortfolioInput,
  ResolvedLadderOptions,
} from "../engine/ladder";
import { recommendGilts } from "../engine/gilts";
import { calculateTaxLiability } from "../engine/tax";
import { InvalidInputError } from "../engine/errors";
import { LadderRequestSchema, formatIssues } from "../utils/validation";

/**
 * Planning context containing all inputs for a ladder plan.
 */
export interface LadderPlanningContext {
  portfolio: PortfolioInput;
  options: ResolvedLadderOptions;
  includeGilts?: boolean;
}

/**
 * Ladder result with the banded income tax view and, on request, gilt suggestions.
 *
 * @property incomeTax - UK banded tax on SIPP ladder income plus other taxable income
 */
export interface LadderPlan extends LadderResult {
  incomeTax: TaxLiability;
  gilts?: GiltRecommendation[];
}

/**
 * Plans a gilt ladder from a request as received by the API or the CLI runner.
 */
export class LadderPlanner {
  private context: LadderPlanningContext;

  constructor(context: LadderPlanningContext) {
    this.context = context;
  }

  /**
   * Validates a raw request body and builds a planner from it.
   *
   * @throws InvalidInputError when the body or portfolio is malformed
   * @throws ConfigurationError when yield or tax parameters are missing or malformed
   */
  static fromRequest(body: unknown): LadderPlanner {
    const request = LadderRequestSchema.safeParse(body);
    if (!request.success) {
      throw new InvalidInputError("Invalid ladder request", formatIssues(request.error));
    }

    const { portfolio, yieldCurve, tax, isaYieldPremiumPct, cashBufferPct, includeGilts } =
      request.data;
    if (portfolio === undefined) {
      throw new InvalidInputError("Missing required field: portfolio", ["portfolio: Required"]);
    }

    const parsedPortfolio = parsePortfolioInput(portfolio);
    const options = parseLadderOptions(
      { yieldCurve, tax, isaYieldPremiumPct, cashBufferPct },
      parsedPortfolio.ladderYears
    );

    return new LadderPlanner({
      portfolio: parsedPortfolio,
      options,
      includeGilts: includeGilts ?? false,
    });
  }

  plan(): LadderPlan {
    const { portfolio, options, includeGilts } = this.context;
    const result = computeLadder(portfolio, options);

    const plan: LadderPlan = {
      ...result,
      incomeTax: calculateTaxLiability(result.tax.sippIncome, options.tax.otherTaxableIncome ?? 0),
    };

    if (includeGilts) {
      plan.gilts = recommendGilts(result.rungs, portfolio.startYear);
    }

    return plan;
  }
}
