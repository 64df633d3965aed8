import { MonthlyCostBreakdown } from "./CostBreakdown";
import { HomeSaleEvent, RunwayPoint } from "./RunwaySeries";

/**
 * Planning result data structures returned to the presentation layer
 */

export interface IncomeBreakdown {
  byField: Record<string, number>;
  ltcBenefits: number;
  total: number;
}

export interface AssetBreakdown {
  byField: Record<string, number>;
  total: number;
}

export interface RunwaySummary {
  kind: "non_depleting" | "depleting";
  monthlyShortfall: number;
  depletionMonth: number | null; // null when assets last past the horizon or never deplete
  homeSaleApplied: boolean; // false when assets ran out before the sale month
  yearsFunded: number;
  yearsFundedCapped: boolean;
  points: RunwayPoint[];
}

export interface PlanSummary {
  names: { A: string; B: string | null };
  costs: MonthlyCostBreakdown;
  income: IncomeBreakdown;
  assets: AssetBreakdown;
  homeSale: HomeSaleEvent | null;
  monthlyGap: number;
  coverageRatio: number | null; // income / cost, null when cost is 0
  runway: RunwaySummary;
  flaggedFields: Record<string, string>;
}
