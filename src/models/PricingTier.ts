import { ENTERPRISE_ARR_THRESHOLD, MIDDLE_MARKET_ARR_THRESHOLD } from "../utils/constants";

/**
 * Pricing tier data structures
 */

export type TierName = "Small" | "Middle market" | "Enterprise";

export interface PricingTier {
  name: TierName;
  lowerBoundUsd: number; // inclusive
  upperBoundUsd: number; // exclusive, Infinity on the last row
  annualPriceUsd: number;
}

export interface TierResolution {
  tier: TierName;
  annualPriceUsd: number;
}

const TIER_ROWS: PricingTier[] = [
  {
    name: "Small",
    lowerBoundUsd: 0,
    upperBoundUsd: MIDDLE_MARKET_ARR_THRESHOLD,
    annualPriceUsd: 12_000,
  },
  {
    name: "Middle market",
    lowerBoundUsd: MIDDLE_MARKET_ARR_THRESHOLD,
    upperBoundUsd: ENTERPRISE_ARR_THRESHOLD,
    annualPriceUsd: 60_000,
  },
  {
    name: "Enterprise",
    lowerBoundUsd: ENTERPRISE_ARR_THRESHOLD,
    upperBoundUsd: Infinity,
    annualPriceUsd: 100_000,
  },
];

/**
 * ARR-based tiers, ordered by lower bound.
 * Bounds partition [0, Infinity) with no gaps or overlaps.
 */
export const PRICING_TIERS: ReadonlyArray<Readonly<PricingTier>> = Object.freeze(
  TIER_ROWS.map((row) => Object.freeze(row))
);

/**
 * Determines the pricing tier and annual price from ARR.
 *
 * - Small: revenue < 25,000,000
 * - Middle market: 25,000,000 <= revenue < 50,000,000
 * - Enterprise: revenue >= 50,000,000
 *
 * Negative or non-numeric revenue matches no row and falls back to the last tier.
 *
 * @param annualRevenue - Annual recurring revenue in USD
 */
export function resolveTier(annualRevenue: number): TierResolution {
  for (const row of PRICING_TIERS) {
    if (row.lowerBoundUsd <= annualRevenue && annualRevenue < row.upperBoundUsd) {
      return { tier: row.name, annualPriceUsd: row.annualPriceUsd };
    }
  }
  const fallback = PRICING_TIERS[PRICING_TIERS.length - 1];
  return { tier: fallback.name, annualPriceUsd: fallback.annualPriceUsd };
}

/**
 * Get a tier row by name
 */
export function getPricingTier(name: string): Readonly<PricingTier> | null {
  return PRICING_TIERS.find((row) => row.name === name) ?? null;
}
