/**
 * Shared constants for care cost planning.
 */

/** Average weeks per month (52.14 / 12). */
export const WEEKS_PER_MONTH = 4.345;

/** Runway projections stop after this many months (30 years). */
export const DEFAULT_RUNWAY_HORIZON_MONTHS = 360;

/** "Years funded" is displayed up to this cap. */
export const DEFAULT_DISPLAY_CAP_YEARS = 30;

/** Home modification costs are spread over this many months unless the user chooses otherwise. */
export const DEFAULT_AMORTIZATION_MONTHS = 12;

export const DEFAULT_MEMORY_CARE_MULTIPLIER = 1.25;

/** Monthly fee charged for a second occupant sharing one facility unit. */
export const DEFAULT_SECOND_PERSON_FEE = 1200;

/** Monthly benefit paid by a long-term-care insurance policy. */
export const DEFAULT_LTC_MONTHLY_BENEFIT = 1800;

/** VA category key meaning "no benefit". */
export const NO_VA_CATEGORY = "none";

export const DEFAULT_LOCATION = "National";
