import { PlannerSettings, RateTables } from "../models/Schema";
import {
  DEFAULT_AMORTIZATION_MONTHS,
  DEFAULT_DISPLAY_CAP_YEARS,
  DEFAULT_LOCATION,
  DEFAULT_LTC_MONTHLY_BENEFIT,
  DEFAULT_MEMORY_CARE_MULTIPLIER,
  DEFAULT_RUNWAY_HORIZON_MONTHS,
  DEFAULT_SECOND_PERSON_FEE,
  NO_VA_CATEGORY,
} from "../utils/constants";

/**
 * Fallback rate tables used when a schema document leaves a table out.
 * National averages; schema documents are expected to carry their own.
 */
export const DEFAULT_RATE_TABLES: RateTables = {
  roomRates: { studio: 3500, one_bedroom: 4200, shared: 3000 },
  inHomeHourlyRates: { "2": 38, "4": 34, "8": 30, "12": 28, "24": 24 },
  careLevelAdders: { low: 200, medium: 600, high: 1200 },
  chronicAdders: { none: 0, some: 150, multiple: 400 },
  mobilityAdders: {
    facility: { independent: 0, walker: 150, wheelchair: 300 },
    inHome: { independent: 0, walker: 1, wheelchair: 2 },
  },
  locationMultipliers: { [DEFAULT_LOCATION]: 1.0 },
  vaCategories: {
    [NO_VA_CATEGORY]: 0,
    veteran_only: 2358.33,
    veteran_with_spouse: 2795.67,
    two_veterans: 3740.5,
    surviving_spouse: 1515.58,
  },
};

export const DEFAULT_SETTINGS: PlannerSettings = {
  memoryCareMultiplier: DEFAULT_MEMORY_CARE_MULTIPLIER,
  secondPersonFee: DEFAULT_SECOND_PERSON_FEE,
  ltcMonthlyBenefit: DEFAULT_LTC_MONTHLY_BENEFIT,
  displayCapYears: DEFAULT_DISPLAY_CAP_YEARS,
  runwayHorizonMonths: DEFAULT_RUNWAY_HORIZON_MONTHS,
  vaIncomeTested: false,
  defaultAmortizationMonths: DEFAULT_AMORTIZATION_MONTHS,
};
