/**
 * Model assumptions. Every field has a default and may be overridden per calculation.
 */

export interface Assumptions {
  costOfCapitalAnnualPct: number; // Annual return the client could earn on realized benefit
  dsoReductionRelativePct: number; // Relative reduction applied to current DSO
  badDebtReductionRelativePct: number; // Relative reduction vs baseline bad debt
  productivityTimeSavedPct: number; // Share of invoice handling time saved
  hoursPerFtePerYear: number;
  workingDaysPerYear: number;
  percentageOfTimeOnInvoices: number; // Share of an FTE's time spent on invoices
}

export const DEFAULT_ASSUMPTIONS: Readonly<Assumptions> = Object.freeze({
  costOfCapitalAnnualPct: 0.045,
  dsoReductionRelativePct: 0.4,
  badDebtReductionRelativePct: 0.4,
  productivityTimeSavedPct: 0.5,
  hoursPerFtePerYear: 2000,
  workingDaysPerYear: 365,
  percentageOfTimeOnInvoices: 0.8,
});

/** Assumptions used as divisors; each must be a finite number above zero. */
const DIVISOR_FIELDS = ["hoursPerFtePerYear", "workingDaysPerYear"] as const;

export class InvalidAssumptionsError extends Error {
  readonly fields: string[];

  constructor(fields: string[]) {
    super(`Assumptions must be positive finite numbers: ${fields.join(", ")}`);
    this.name = "InvalidAssumptionsError";
    this.fields = fields;
  }
}

/**
 * Throws InvalidAssumptionsError when a divisor assumption is zero, negative or not finite.
 */
export function assertValidAssumptions(assumptions: Assumptions): void {
  const invalid = DIVISOR_FIELDS.filter((field) => {
    const value = assumptions[field];
    return !Number.isFinite(value) || value <= 0;
  });
  if (invalid.length > 0) {
    throw new InvalidAssumptionsError([...invalid]);
  }
}

/**
 * Build an assumptions record from the defaults plus any overrides
 */
export function createAssumptions(overrides: Partial<Assumptions> = {}): Readonly<Assumptions> {
  const d = DEFAULT_ASSUMPTIONS;
  const assumptions: Assumptions = {
    costOfCapitalAnnualPct: overrides.costOfCapitalAnnualPct ?? d.costOfCapitalAnnualPct,
    dsoReductionRelativePct: overrides.dsoReductionRelativePct ?? d.dsoReductionRelativePct,
    badDebtReductionRelativePct:
      overrides.badDebtReductionRelativePct ?? d.badDebtReductionRelativePct,
    productivityTimeSavedPct: overrides.productivityTimeSavedPct ?? d.productivityTimeSavedPct,
    hoursPerFtePerYear: overrides.hoursPerFtePerYear ?? d.hoursPerFtePerYear,
    workingDaysPerYear: overrides.workingDaysPerYear ?? d.workingDaysPerYear,
    percentageOfTimeOnInvoices:
      overrides.percentageOfTimeOnInvoices ?? d.percentageOfTimeOnInvoices,
  };
  assertValidAssumptions(assumptions);
  return Object.freeze(assumptions);
}
