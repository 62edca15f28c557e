import { Assumptions } from "../models/Assumptions";
import { RoiInputs } from "../models/RoiInputs";

/**
 * Benefit calculations for A/R automation.
 * Each metric is floored at zero; none of them mutate their arguments.
 */

/**
 * Working capital freed by collecting receivables faster.
 * Formula: (annualRevenue / workingDaysPerYear) × (currentDsoDays × dsoReductionRelativePct)
 *
 * No cost-of-capital multiplier is applied; this is a balance, not a yearly return.
 */
export function computeCashFlowImprovement(inputs: RoiInputs, assumptions: Assumptions): number {
  const daysReduced = inputs.currentDsoDays * assumptions.dsoReductionRelativePct;
  const averageDailyRevenue = inputs.annualRevenue / assumptions.workingDaysPerYear;
  const freedCashBalance = averageDailyRevenue * daysReduced;
  return Math.max(0, freedCashBalance);
}

/**
 * Annual labor cost saved by the A/R team spending less time on invoices.
 * Formula: headcount × (hours/year × share on invoices) × time saved × hourly wage
 */
export function computeAnnualizedEmployeeSavings(
  inputs: RoiInputs,
  assumptions: Assumptions
): number {
  const hourlyWage = inputs.fteSalaryBase / assumptions.hoursPerFtePerYear;
  const timeSpentOnInvoices =
    assumptions.hoursPerFtePerYear * assumptions.percentageOfTimeOnInvoices;
  const savings =
    inputs.arHeadcount * timeSpentOnInvoices * assumptions.productivityTimeSavedPct * hourlyWage;
  return Math.max(0, savings);
}

/**
 * Hours saved per year across the A/R team.
 */
export function computeProductivityHoursSaved(inputs: RoiInputs, assumptions: Assumptions): number {
  const totalHours =
    inputs.arHeadcount *
    assumptions.hoursPerFtePerYear *
    assumptions.productivityTimeSavedPct *
    assumptions.percentageOfTimeOnInvoices;
  return Math.max(0, totalHours);
}

/**
 * Reduction in bad debt, as a relative improvement on baseline bad debt.
 * Baseline bad debt is a share of the A/R balance, where
 * A/R ≈ annualRevenue × (currentDsoDays / workingDaysPerYear).
 */
export function computeBadDebtSavings(inputs: RoiInputs, assumptions: Assumptions): number {
  const estimatedArBalance =
    inputs.annualRevenue * (inputs.currentDsoDays / assumptions.workingDaysPerYear);
  const baselineBadDebt = estimatedArBalance * inputs.badDebtPct;
  const savings = baselineBadDebt * assumptions.badDebtReductionRelativePct;
  return Math.max(0, savings);
}

/**
 * ROI percentage: ((benefit - cost) / cost) × 100
 *
 * @param totalBenefitUsd - Annual benefit counted toward ROI
 * @param annualPriceUsd - Annual price of the product
 * @returns Infinity when cost <= 0 and benefit > 0; 0 when both are non-positive
 *
 * @example
 * ```ts
 * computeRoiPct(30000, 12000) // returns 150
 * ```
 */
export function computeRoiPct(totalBenefitUsd: number, annualPriceUsd: number): number {
  if (annualPriceUsd <= 0) {
    return totalBenefitUsd > 0 ? Infinity : 0;
  }
  const roiRatio = (totalBenefitUsd - annualPriceUsd) / annualPriceUsd;
  return roiRatio * 100;
}
