import { Router, Request, Response } from "express";
import { calculateAll } from "../engine/roiCalculator";
import { DEFAULT_ASSUMPTIONS, InvalidAssumptionsError, createAssumptions } from "../models/Assumptions";
import {
  compareDsoToBenchmark,
  getAvailableIndustries,
  getIndustryBenchmarkDso,
} from "../models/IndustryBenchmark";
import { PRICING_TIERS, resolveTier } from "../models/PricingTier";
import { getTotalBenefitUsd } from "../models/RoiResults";
import { formatRoiSummary } from "../utils/format";
import { AnnualRevenueQuerySchema, RoiRequestSchema } from "../utils/validation";

const router = Router();

export const API_ENDPOINTS = {
  calculate: "POST /api/roi/calculate - Compute ROI metrics for client inputs",
  tiers: "GET /api/tiers - Pricing tiers by ARR",
  resolveTier: "GET /api/tiers/resolve?annualRevenue= - Tier and price for an ARR",
  industries: "GET /api/industries - Industries with benchmark DSO",
  benchmark: "GET /api/industries/:industry/benchmark - Benchmark DSO for an industry",
  defaults: "GET /api/assumptions/defaults - Default assumptions",
  health: "GET /api/health - Health check",
};

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * GET /api/tiers
 * Pricing table. JSON has no Infinity, so an open upper bound is null.
 */
router.get("/tiers", (req: Request, res: Response) => {
  res.json({
    tiers: PRICING_TIERS.map((row) => ({
      ...row,
      upperBoundUsd: Number.isFinite(row.upperBoundUsd) ? row.upperBoundUsd : null,
    })),
  });
});

/**
 * GET /api/tiers/resolve?annualRevenue=30000000
 * Resolve the tier and annual price for an ARR
 */
router.get("/tiers/resolve", (req: Request, res: Response) => {
  const parsed = AnnualRevenueQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    return res.status(400).json({
      error: "Query parameter annualRevenue must be a non-negative number",
      issues: parsed.error.issues,
    });
  }

  res.json(resolveTier(parsed.data.annualRevenue));
});

/**
 * GET /api/industries
 * Industries with benchmark DSO data
 */
router.get("/industries", (req: Request, res: Response) => {
  res.json({ industries: getAvailableIndustries() });
});

/**
 * GET /api/industries/:industry/benchmark
 * Benchmark DSO for one industry. Names containing "/" must be URL-encoded.
 */
router.get("/industries/:industry/benchmark", (req: Request, res: Response) => {
  const { industry } = req.params;
  const benchmarkDsoDays = getIndustryBenchmarkDso(industry);
  if (benchmarkDsoDays === null) {
    return res.status(404).json({ error: `No benchmark data for industry: ${industry}` });
  }

  res.json({ industry, benchmarkDsoDays });
});

/**
 * GET /api/assumptions/defaults
 */
router.get("/assumptions/defaults", (req: Request, res: Response) => {
  res.json(DEFAULT_ASSUMPTIONS);
});

/**
 * GET /api/roi/calculate
 * Get information about the calculation endpoint
 */
router.get("/roi/calculate", (req: Request, res: Response) => {
  res.json({
    method: "POST",
    description: "Calculate ROI metrics, tier and price from client inputs",
    endpoint: "/api/roi/calculate",
    requiredFields: [
      "inputs.industry",
      "inputs.annualRevenue",
      "inputs.arHeadcount",
      "inputs.currentDsoDays",
      "inputs.monthlyInvoices",
      "inputs.fteSalaryBase",
      "inputs.badDebtPct",
      "assumptions (optional, overrides defaults per field)",
    ],
    example: "See example-request.json file in the project root",
  });
});

/**
 * POST /api/roi/calculate
 * Compute all ROI metrics for the given inputs and assumption overrides
 */
router.post("/roi/calculate", (req: Request, res: Response) => {
  const parsed = RoiRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    return res.status(400).json({
      error: "Invalid request body",
      issues: parsed.error.issues,
    });
  }

  try {
    const { inputs } = parsed.data;
    const assumptions = createAssumptions(parsed.data.assumptions);
    const results = calculateAll(inputs, assumptions);

    res.json({
      results,
      assumptions,
      totalBenefitUsd: getTotalBenefitUsd(results),
      dsoComparison: compareDsoToBenchmark(inputs.industry, inputs.currentDsoDays),
      summary: formatRoiSummary(inputs, results),
    });
  } catch (error: unknown) {
    if (error instanceof InvalidAssumptionsError) {
      return res.status(400).json({ error: error.message, fields: error.fields });
    }
    console.error("Error in ROI calculation:", error);
    res.status(500).json({
      error: "Internal server error",
      message: errorMessage(error),
    });
  }
});

/**
 * GET /api
 * API information endpoint
 */
router.get("/", (req: Request, res: Response) => {
  res.json({
    message: "Receivables Automation ROI API",
    version: "1.0.0",
    endpoints: API_ENDPOINTS,
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
