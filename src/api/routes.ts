import { Router, Request, Response } from "express";
import { LadderPlanner } from "../planner/ladderPlanner";
import { calculateTaxLiability } from "../engine/tax";
import { calculateYieldToMaturity } from "../engine/yield";
import { LadderError } from "../engine/errors";
import {
  TaxLiabilityRequestSchema,
  YieldToMaturityRequestSchema,
  formatIssues,
} from "../utils/validation";

const router = Router();

/**
 * Sends a caller error as 400 and anything else as 500.
 */
function sendError(res: Response, error: unknown, context: string): void {
  if (error instanceof LadderError) {
    res.status(400).json({
      error: error.name,
      message: error.message,
      issues: error.issues,
    });
    return;
  }

  console.error(`Error in ${context}:`, error);
  res.status(500).json({
    error: "Internal server error",
    message: error instanceof Error ? error.message : String(error),
  });
}

/**
 * GET /api/ladder
 * Get information about the ladder endpoint
 */
router.get("/ladder", (req: Request, res: Response) => {
  res.json({
    method: "POST",
    description: "Build a gilt ladder across SIPP and ISA and estimate income and tax drag",
    endpoint: "/api/ladder",
    requiredFields: [
      "portfolio (sippValue, isaValue, targetAnnualIncome, ladderYears, startYear)",
      "yieldCurve (flat, sloped or curve)",
      "tax (marginalRatePct, personalAllowance, otherTaxableIncome optional)",
      "isaYieldPremiumPct (optional, default 0)",
      "cashBufferPct (optional, default 0)",
      "includeGilts (optional, default false)",
    ],
    example: "See example-request.json in the project root",
  });
});

/**
 * POST /api/ladder
 * Build a ladder and summarise income and tax
 */
router.post("/ladder", (req: Request, res: Response) => {
  try {
    const planner = LadderPlanner.fromRequest(req.body);
    res.json(planner.plan());
  } catch (error: unknown) {
    sendError(res, error, "ladder planning");
  }
});

/**
 * POST /api/tax/liability
 * Banded UK income tax on ladder income plus other pension income
 */
router.post("/tax/liability", (req: Request, res: Response) => {
  const request = TaxLiabilityRequestSchema.safeParse(req.body);
  if (!request.success) {
    return res.status(400).json({
      error: "Missing or invalid fields: income, otherIncome (optional)",
      issues: formatIssues(request.error),
    });
  }

  try {
    const { income, otherIncome } = request.data;
    res.json(calculateTaxLiability(income, otherIncome ?? 0));
  } catch (error: unknown) {
    sendError(res, error, "tax liability");
  }
});

/**
 * POST /api/yield/ytm
 * Approximate yield to maturity of a gilt
 */
router.post("/yield/ytm", (req: Request, res: Response) => {
  const request = YieldToMaturityRequestSchema.safeParse(req.body);
  if (!request.success) {
    return res.status(400).json({
      error: "Missing or invalid fields: price, faceValue, couponRatePct, yearsToMaturity",
      issues: formatIssues(request.error),
    });
  }

  try {
    const { price, faceValue, couponRatePct, yearsToMaturity } = request.data;
    res.json({
      yieldToMaturityPct: calculateYieldToMaturity(price, faceValue, couponRatePct, yearsToMaturity),
    });
  } catch (error: unknown) {
    sendError(res, error, "yield to maturity");
  }
});

/**
 * GET /api
 * API information endpoint
 */
router.get("/", (req: Request, res: Response) => {
  res.json({
    message: "Gilt Ladder Calculator API",
    version: "1.0.0",
    endpoints: {
      ladder: "POST /api/ladder - Build a gilt ladder across SIPP and ISA",
      taxLiability: "POST /api/tax/liability - Banded UK income tax liability",
      yieldToMaturity: "POST /api/yield/ytm - Approximate gilt yield to maturity",
      health: "GET /api/health - Health check",
    },
  });
});

/**
 * GET /api/health
 * Health check endpoint
 */
router.get("/health", (req: Request, res: Response) => {
  res.json({ status: "ok", timestamp: new Date().toISOString() });
});

export default router;
