import { Assumptions, DEFAULT_ASSUMPTIONS, assertValidAssumptions } from "../models/Assumptions";
import { resolveTier } from "../models/PricingTier";
import { RoiInputs } from "../models/RoiInputs";
import { RoiResults, getTotalBenefitUsd } from "../models/RoiResults";
import {
  computeAnnualizedEmployeeSavings,
  computeBadDebtSavings,
  computeCashFlowImprovement,
  computeProductivityHoursSaved,
  computeRoiPct,
} from "./calculations";

/**
 * Compute all ROI metrics from inputs and assumptions,
 * determining tier and price from ARR.
 *
 * ROI counts employee savings and bad-debt savings only; freed cash and
 * hours saved are reported alongside it.
 *
 * @throws InvalidAssumptionsError if hoursPerFtePerYear or workingDaysPerYear is not positive
 */
export function calculateAll(
  inputs: RoiInputs,
  assumptions: Assumptions = DEFAULT_ASSUMPTIONS
): Readonly<RoiResults> {
  assertValidAssumptions(assumptions);

  const { tier, annualPriceUsd } = resolveTier(inputs.annualRevenue);

  const cashFlowImprovementUsd = computeCashFlowImprovement(inputs, assumptions);
  const annualizedEmployeeSavingsUsd = computeAnnualizedEmployeeSavings(inputs, assumptions);
  const productivityHoursSaved = computeProductivityHoursSaved(inputs, assumptions);
  const badDebtSavingsUsd = computeBadDebtSavings(inputs, assumptions);

  const totalBenefitUsd = getTotalBenefitUsd({ annualizedEmployeeSavingsUsd, badDebtSavingsUsd });
  const roiPct = computeRoiPct(totalBenefitUsd, annualPriceUsd);

  // Return the client could have earned on the benefit it forgoes
  const opportunityCostUsd = totalBenefitUsd * assumptions.costOfCapitalAnnualPct;

  return Object.freeze({
    roiPct,
    cashFlowImprovementUsd,
    annualizedEmployeeSavingsUsd,
    productivityHoursSaved,
    badDebtSavingsUsd,
    opportunityCostUsd,
    tier,
    annualPriceUsd,
  });
}
