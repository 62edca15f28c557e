/**
 * Client-supplied business inputs (units noted in comments)
 */

export interface RoiInputs {
  industry: string; // Industry label, used for the DSO benchmark only
  annualRevenue: number; // USD/year (ARR)
  arHeadcount: number; // Number of FTEs managing A/R
  currentDsoDays: number; // Days Sales Outstanding (days)
  monthlyInvoices: number; // Count per month, informational
  fteSalaryBase: number; // USD/year per FTE (base salary)
  badDebtPct: number; // e.g. 0.01 for 1% of the A/R balance annually
}
