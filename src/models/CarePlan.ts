import { PersonTag } from "./Schema";

/**
 * Care plan data structures
 */

export type CareType = "none" | "in_home" | "assisted_living" | "memory_care";

export const CARE_TYPES: readonly CareType[] = ["none", "in_home", "assisted_living", "memory_care"];

export const FACILITY_CARE_TYPES: readonly CareType[] = ["assisted_living", "memory_care"];

export type HomePlan = "keep" | "sell" | "hecm" | "heloc";

export interface PersonCarePlan {
  person: PersonTag;
  careType: CareType;
  hoursPerDay: number;
  daysPerWeek: number;
  roomType: string;
  careLevel: string;
  mobility: string;
  chronic: string;
  location: string;
}

export function isCareType(value: string): value is CareType {
  return CARE_TYPES.some((t) => t === value);
}

export function isFacilityCare(careType: CareType): boolean {
  return FACILITY_CARE_TYPES.includes(careType);
}

/**
 * Per-person field keys follow the `<base>_<person>` convention,
 * e.g. personFieldKey("care_type", "B") === "care_type_b"
 */
export function personFieldKey(base: string, person: PersonTag): string {
  return `${base}_${person.toLowerCase()}`;
}

/**
 * Household-level field keys the models read
 */
export const HOUSEHOLD_FIELDS = {
  includePersonB: "include_person_b",
  location: "location",
  homePlan: "home_plan",
  shareOneUnit: "share_one_unit",
  homeModCost: "home_mod_cost",
  homeModMonths: "home_mod_months",
  homeSalePrice: "home_sale_price",
  homeMortgagePayoff: "home_mortgage_payoff",
  homeSellingCosts: "home_selling_costs",
  homeSaleMonth: "home_sale_month",
} as const;

/**
 * Per-person field bases, suffixed with `_a` / `_b`
 */
export const PERSON_FIELDS = {
  name: "name",
  careType: "care_type",
  hoursPerDay: "hours_per_day",
  daysPerWeek: "days_per_week",
  roomType: "room_type",
  careLevel: "care_level",
  mobility: "mobility",
  chronic: "chronic",
  vaCategory: "va_category",
  ltcInsurance: "ltc_insurance",
} as const;

export const HOME_PLANS: readonly HomePlan[] = ["keep", "sell", "hecm", "heloc"];

export function isHomePlan(value: string): value is HomePlan {
  return HOME_PLANS.some((p) => p === value);
}

export interface ModelBound {
  key: string;
  min: number;
  max: number;
}

/**
 * Ranges the cost formulas accept, regardless of the bounds a schema sets
 */
export function modelBounds(persons: readonly PersonTag[]): ModelBound[] {
  return [
    ...persons.flatMap((p) => [
      { key: personFieldKey(PERSON_FIELDS.hoursPerDay, p), min: 0, max: 24 },
      { key: personFieldKey(PERSON_FIELDS.daysPerWeek, p), min: 0, max: 7 },
    ]),
    { key: HOUSEHOLD_FIELDS.homeModMonths, min: 1, max: Number.POSITIVE_INFINITY },
  ];
}

export function boundMessage(label: string, bound: ModelBound): string {
  return Number.isFinite(bound.max)
    ? `${label} must be between ${bound.min} and ${bound.max}`
    : `${label} must be at least ${bound.min}`;
}
