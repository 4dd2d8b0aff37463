/**
 * Gilt catalogue data structures
 */

export interface Gilt {
  name: string;
  isin: string | null;
  couponPct: number;
  maturityYear: number;
}

export interface GiltRecommendation {
  maturityYear: number;
  yearsToMaturity: number;
  name: string;
  isin: string | null;
  matched: boolean; // false when no catalogued gilt matures that year
}
