import { z } from "zod";
import { MAX_MONEY_AMOUNT, MAX_START_YEAR, MIN_START_YEAR } from "./constants";

/**
 * Zod validation schemas for input data validation.
 * These schemas ensure data integrity for ladder and tax calculations.
 * All percentage values are in percent (e.g., 4.5 means 4.5%).
 */

const amount = z.number().finite().min(0).max(MAX_MONEY_AMOUNT);
const percent = z.number().finite().min(0).max(100);

/**
 * Schema for the portfolio being laddered.
 * The two accounts together must hold something to ladder, and no more than
 * can be counted exactly in pence.
 */
export const PortfolioInputSchema = z
  .object({
    sippValue: amount,
    isaValue: amount,
    targetAnnualIncome: z.number().finite().positive().max(MAX_MONEY_AMOUNT),
    ladderYears: z.number().int().min(1),
    startYear: z.number().int().min(MIN_START_YEAR).max(MAX_START_YEAR),
  })
  .refine((input) => input.sippValue + input.isaValue > 0, {
    message: "sippValue + isaValue must be greater than 0",
    path: ["sippValue"],
  })
  .refine((input) => input.sippValue + input.isaValue <= MAX_MONEY_AMOUNT, {
    message: `sippValue + isaValue must not exceed ${MAX_MONEY_AMOUNT}`,
    path: ["sippValue"],
  });

/**
 * Schema for the yield curve assumed across rungs.
 */
export const YieldCurveSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("flat"),
    ratePct: percent,
  }),
  z.object({
    kind: z.literal("sloped"),
    baseRatePct: percent,
    slopePctPerYear: z.number().finite(),
  }),
  z.object({
    kind: z.literal("curve"),
    ratesPct: z.array(percent).min(1),
  }),
]);

/**
 * Schema for SIPP tax-drag assumptions.
 */
export const TaxAssumptionsSchema = z.object({
  marginalRatePct: percent,
  personalAllowance: amount,
  otherTaxableIncome: amount.optional(),
});

/**
 * Schema for ladder options. Yield curve and tax assumptions are optional here
 * so that their absence can be reported separately from malformed values.
 */
export const LadderOptionsSchema = z.object({
  yieldCurve: YieldCurveSchema.optional(),
  tax: TaxAssumptionsSchema.optional(),
  isaYieldPremiumPct: percent.optional(),
  cashBufferPct: percent.optional(),
});

/**
 * Schema for a ladder request as received by the API and the CLI runner.
 * Nested values are validated by the engine.
 */
export const LadderRequestSchema = z.object({
  portfolio: z.unknown(),
  yieldCurve: z.unknown(),
  tax: z.unknown(),
  isaYieldPremiumPct: z.unknown(),
  cashBufferPct: z.unknown(),
  includeGilts: z.boolean().optional(),
});

/**
 * Schema for a banded tax liability request.
 */
export const TaxLiabilityRequestSchema = z.object({
  income: amount,
  otherIncome: amount.optional(),
});

/**
 * Schema for a yield to maturity request.
 */
export const YieldToMaturityRequestSchema = z.object({
  price: z.number().finite().positive(),
  faceValue: z.number().finite().positive(),
  couponRatePct: percent,
  yearsToMaturity: z.number().finite().positive(),
});

/**
 * Schema for the gilt catalogue data file.
 */
export const GiltCatalogueSchema = z.array(
  z.object({
    name: z.string().min(1),
    isin: z.string().nullable(),
    couponPct: percent,
    maturityYear: z.number().int(),
  })
);

/**
 * Formats zod issues as "path: message" strings.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
