import { DAYS_PER_YEAR } from "../utils/constants";

/**
 * Industry benchmark data structures
 * Source: Damodaran, NYU Stern working capital ratios (Jan 2025)
 */

export interface IndustryBenchmark {
  industry: string;
  accRecToSalesPct: number; // Accounts receivable / sales
  benchmarkDsoDays: number; // accRecToSalesPct × 365, rounded to whole days
}

export type DsoPosition = "above" | "below" | "matches";

export interface DsoComparison {
  industry: string;
  benchmarkDsoDays: number;
  differenceDays: number; // current - benchmark
  position: DsoPosition;
}

const AR_TO_SALES_RATIOS: Array<[string, number]> = [
  ["Retail Distributors", 0.1216],
  ["Chemical (Specialty)", 0.1764],
  ["Hospitals/Healthcare Facilities", 0.1447],
  ["Business & Consumer Services", 0.1829],
];

const INDUSTRY_BENCHMARKS: ReadonlyMap<string, Readonly<IndustryBenchmark>> = new Map(
  AR_TO_SALES_RATIOS.map(([industry, ratio]): [string, Readonly<IndustryBenchmark>] => [
    industry,
    Object.freeze({
      industry,
      accRecToSalesPct: ratio,
      benchmarkDsoDays: Math.round(ratio * DAYS_PER_YEAR),
    }),
  ])
);

/**
 * Get the full benchmark entry for an industry
 */
export function getIndustryBenchmark(industry: string): Readonly<IndustryBenchmark> | null {
  return INDUSTRY_BENCHMARKS.get(industry) ?? null;
}

/**
 * Returns the benchmark DSO for a given industry, or null if not found.
 * Matching is exact (case and punctuation sensitive).
 */
export function getIndustryBenchmarkDso(industry: string): number | null {
  return getIndustryBenchmark(industry)?.benchmarkDsoDays ?? null;
}

/**
 * Returns the industries with benchmark data, in table order
 */
export function getAvailableIndustries(): string[] {
  return Array.from(INDUSTRY_BENCHMARKS.keys());
}

/**
 * Compares a client's DSO with the benchmark for their industry.
 *
 * @param industry - Industry name (exact match)
 * @param currentDsoDays - Client's current DSO in days
 * @returns Comparison, or null when the industry has no benchmark
 */
export function compareDsoToBenchmark(
  industry: string,
  currentDsoDays: number
): DsoComparison | null {
  const benchmarkDsoDays = getIndustryBenchmarkDso(industry);
  if (benchmarkDsoDays === null) {
    return null;
  }

  const differenceDays = currentDsoDays - benchmarkDsoDays;
  let position: DsoPosition = "matches";
  if (differenceDays > 0) {
    position = "above";
  } else if (differenceDays < 0) {
    position = "below";
  }

  return { industry, benchmarkDsoDays, differenceDays, position };
}
