import { z } from "zod";

/**
 * Zod validation schemas for request and file input.
 * The calculation core trusts its arguments; these schemas guard the API and CLI.
 * Fractions are decimals (e.g., 0.05 means 5%).
 */

/**
 * Schema for client business inputs.
 * badDebtPct is expected in [0, 1] but values above 1 are accepted.
 */
export const RoiInputsSchema = z.object({
  industry: z.string(),
  annualRevenue: z.number().min(0),
  arHeadcount: z.number().int().min(0),
  currentDsoDays: z.number().min(0),
  monthlyInvoices: z.number().int().min(0),
  fteSalaryBase: z.number().min(0),
  badDebtPct: z.number().min(0),
});

/**
 * Schema for assumption overrides. Omitted fields fall back to DEFAULT_ASSUMPTIONS.
 */
export const AssumptionsOverridesSchema = z.object({
  costOfCapitalAnnualPct: z.number().optional(),
  dsoReductionRelativePct: z.number().optional(),
  badDebtReductionRelativePct: z.number().optional(),
  productivityTimeSavedPct: z.number().optional(),
  hoursPerFtePerYear: z.number().positive().optional(), // Divisor
  workingDaysPerYear: z.number().positive().optional(), // Divisor
  percentageOfTimeOnInvoices: z.number().optional(),
});

/**
 * Schema for a full calculation request (API body or CLI input file).
 */
export const RoiRequestSchema = z.object({
  inputs: RoiInputsSchema,
  assumptions: AssumptionsOverridesSchema.optional(),
});

/**
 * Schema for the ?annualRevenue= query parameter; query strings arrive as text.
 */
export const AnnualRevenueQuerySchema = z.object({
  annualRevenue: z.string().trim().min(1).pipe(z.coerce.number().finite().min(0)),
});
