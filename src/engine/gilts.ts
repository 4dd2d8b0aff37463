import giltData from "../data/gilts.json";
import { Gilt, GiltRecommendation } from "../models/Gilt";
import { Rung } from "../models/Rung";
import { GiltCatalogueSchema, formatIssues } from "../utils/validation";
import { yearsUntilMaturity } from "../utils/time";
import { ConfigurationError } from "./errors";

/**
 * Loads the bundled gilt catalogue.
 *
 * @throws ConfigurationError if the data file does not match the catalogue schema
 */
export function loadGiltCatalogue(data: unknown = giltData): Gilt[] {
  const parsed = GiltCatalogueSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError("Invalid gilt catalogue", formatIssues(parsed.error));
  }
  return parsed.data;
}

/**
 * Suggests a gilt for each rung by maturity year.
 * Uses the first catalogued gilt maturing in the rung's year; otherwise a
 * generic placeholder with no ISIN.
 *
 * @param rungs - Ladder rungs
 * @param asOfYear - Year the ladder is built, for years to maturity
 * @param catalogue - Gilts to choose from
 */
export function recommendGilts(
  rungs: Rung[],
  asOfYear: number,
  catalogue: Gilt[] = loadGiltCatalogue()
): GiltRecommendation[] {
  return rungs.map((rung) => {
    const gilt = catalogue.find((g) => g.maturityYear === rung.maturityYear);
    return {
      maturityYear: rung.maturityYear,
      yearsToMaturity: yearsUntilMaturity(rung.maturityYear, asOfYear),
      name: gilt ? gilt.name : `UK Treasury Gilt ${rung.maturityYear}`,
      isin: gilt ? gilt.isin : null,
      matched: gilt !== undefined,
    };
  });
}
