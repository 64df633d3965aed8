import { HOUSEHOLD_FIELDS, PERSON_FIELDS, personFieldKey } from "../models/CarePlan";
import { AssetBreakdown, IncomeBreakdown } from "../models/PlanSummary";
import { HomeSaleEvent } from "../models/RunwaySeries";
import { InputState } from "../state/inputState";
import { categoryAmounts, homePlan, includedPersons } from "../state/selectors";
import { roundToCents, sum } from "../utils/math";
import { createHomeSaleEvent } from "./runway";

/**
 * Household monthly income: every counted income field plus the long-term
 * care insurance benefit of each insured person.
 */
export function householdIncome(state: InputState): IncomeBreakdown {
  const { settings } = state.getSchema();
  const byField = categoryAmounts(state, "income");
  const insured = includedPersons(state).filter((p) =>
    state.getBoolean(personFieldKey(PERSON_FIELDS.ltcInsurance, p))
  );
  const ltcBenefits = roundToCents(insured.length * settings.ltcMonthlyBenefit);
  return {
    byField,
    ltcBenefits,
    total: roundToCents(sum(Object.values(byField)) + ltcBenefits),
  };
}

/**
 * Liquid assets available to pay for care
 */
export function liquidAssets(state: InputState): AssetBreakdown {
  const byField = categoryAmounts(state, "asset");
  return { byField, total: roundToCents(sum(Object.values(byField))) };
}

/**
 * Home sale configured by the session, or null unless the household plans
 * to sell. Payoff and selling costs are both deducted from the sale price.
 */
export function homeSaleFromState(state: InputState): HomeSaleEvent | null {
  if (homePlan(state) !== "sell") {
    return null;
  }
  const salePrice = state.getNumber(HOUSEHOLD_FIELDS.homeSalePrice);
  if (salePrice <= 0) {
    return null;
  }
  const costs =
    state.getNumber(HOUSEHOLD_FIELDS.homeMortgagePayoff) + state.getNumber(HOUSEHOLD_FIELDS.homeSellingCosts);
  return createHomeSaleEvent(salePrice, costs, state.getNumber(HOUSEHOLD_FIELDS.homeSaleMonth));
}

/**
 * Amount by which monthly cost exceeds income, never negative
 */
export function monthlyGap(totalMonthlyCost: number, totalMonthlyIncome: number): number {
  return roundToCents(Math.max(0, totalMonthlyCost - totalMonthlyIncome));
}

/**
 * Share of monthly cost covered by income, e.g. 0.75. Null when nothing is
 * owed.
 */
export function coverageRatio(totalMonthlyIncome: number, totalMonthlyCost: number): number | null {
  if (totalMonthlyCost <= 0) {
    return null;
  }
  return Math.round((totalMonthlyIncome / totalMonthlyCost) * 100) / 100;
}
