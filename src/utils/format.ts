import { DsoComparison, compareDsoToBenchmark } from "../models/IndustryBenchmark";
import { RoiInputs } from "../models/RoiInputs";
import { RoiResults } from "../models/RoiResults";

/**
 * Plain text formatting of ROI results for console output.
 * All amounts are USD with en-US grouping.
 */

const wholeNumber = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });
const oneDecimal = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 1,
  maximumFractionDigits: 1,
});

/**
 * Formats a USD amount without decimals.
 *
 * @example
 * ```ts
 * formatCurrency(-1234.4) // returns "-$1,234"
 * ```
 */
export function formatCurrency(value: number): string {
  const sign = value < 0 ? "-" : "";
  return `${sign}$${wholeNumber.format(Math.abs(value))}`;
}

export function formatNumber(value: number): string {
  return wholeNumber.format(value);
}

/**
 * Formats a percentage with one decimal, e.g. 735.6 -> "735.6%"
 */
export function formatPercent(value: number): string {
  return `${oneDecimal.format(value)}%`;
}

/**
 * Describes how the client's DSO sits against the industry benchmark.
 */
export function formatDsoComparison(comparison: DsoComparison, currentDsoDays: number): string {
  const current = `Your DSO (${formatNumber(currentDsoDays)} days)`;
  const benchmark = `industry benchmark (${comparison.benchmarkDsoDays} days)`;
  const gap = formatNumber(Math.abs(comparison.differenceDays));

  switch (comparison.position) {
    case "above":
      return `${current} is ${gap} days ABOVE ${benchmark}`;
    case "below":
      return `${current} is ${gap} days BELOW ${benchmark}`;
    case "matches":
      return `${current} matches ${benchmark}`;
  }
}

/**
 * Builds the ROI summary shown by the CLI and returned by the API.
 * The benchmark line is omitted when the industry has no benchmark data.
 *
 * @param inputs - Inputs the results were computed from
 * @param results - Output of calculateAll
 * @returns Summary lines, without trailing newlines
 */
export function formatRoiSummary(inputs: RoiInputs, results: RoiResults): string[] {
  const lines: string[] = ["ROI Summary", "-----------", `Industry: ${inputs.industry}`];

  const comparison = compareDsoToBenchmark(inputs.industry, inputs.currentDsoDays);
  if (comparison) {
    lines.push(formatDsoComparison(comparison, inputs.currentDsoDays));
  }

  lines.push(
    "",
    `Tier: ${results.tier}`,
    `Price (annual): ${formatCurrency(results.annualPriceUsd)}`,
    `ROI: ${formatPercent(results.roiPct)}`,
    `Cash flow improvement (freed cash): ${formatCurrency(results.cashFlowImprovementUsd)}`,
    `Employee savings (annualized): ${formatCurrency(results.annualizedEmployeeSavingsUsd)}`,
    `Productivity hours saved (annual): ${formatNumber(results.productivityHoursSaved)} hours`,
    `Bad debt savings (annual): ${formatCurrency(results.badDebtSavingsUsd)}`,
    `Opportunity cost (annual): ${formatCurrency(results.opportunityCostUsd)}`
  );

  return lines;
}
