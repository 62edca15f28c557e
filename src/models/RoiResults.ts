import { TierName } from "./PricingTier";

/**
 * Computation outputs
 */

export interface RoiResults {
  roiPct: number; // Percentage; e.g. 150 means 150%. Infinity when the price is 0 and benefit > 0
  cashFlowImprovementUsd: number; // Freed working capital, reported outside ROI
  annualizedEmployeeSavingsUsd: number;
  productivityHoursSaved: number;
  badDebtSavingsUsd: number;
  opportunityCostUsd: number; // What the client forgoes by not capturing the savings
  tier: TierName;
  annualPriceUsd: number;
}

/**
 * Benefit counted toward ROI: employee savings plus bad-debt savings.
 * Cash-flow improvement and productivity hours are reported separately.
 */
export function getTotalBenefitUsd(
  results: Pick<RoiResults, "annualizedEmployeeSavingsUsd" | "badDebtSavingsUsd">
): number {
  return results.annualizedEmployeeSavingsUsd + results.badDebtSavingsUsd;
}
