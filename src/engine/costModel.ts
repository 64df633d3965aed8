import {
  HOUSEHOLD_FIELDS,
  PERSON_FIELDS,
  PersonCarePlan,
  boundMessage,
  isCareType,
  isFacilityCare,
  modelBounds,
  personFieldKey,
} from "../models/CarePlan";
import { MonthlyCostBreakdown, PersonCost, SharedCosts, VaBenefitOffset } from "../models/CostBreakdown";
import { PersonTag, PlannerSettings, RateTables, getField } from "../models/Schema";
import { DEFAULT_SETTINGS } from "../schema/defaults";
import { InputState } from "../state/inputState";
import { categoryAmounts, homePlan, includedPersons, personName } from "../state/selectors";
import { DEFAULT_LOCATION, NO_VA_CATEGORY, WEEKS_PER_MONTH } from "../utils/constants";
import { ValidationError } from "../utils/errors";
import { interpolate, roundToCents, sum } from "../utils/math";

/**
 * Hourly in-home care rate for a number of hours per day.
 *
 * Rates between two breakpoints are interpolated linearly. Outside the
 * table the nearest endpoint's rate applies; the table is never
 * extrapolated.
 *
 * @param table - Hours-per-day breakpoint (as a string key) to hourly rate
 * @param hours - Requested hours of care per day
 */
export function interpolateHourlyRate(table: Record<string, number>, hours: number): number {
  const brackets = Object.entries(table)
    .map(([breakpoint, rate]) => ({ hours: Number(breakpoint), rate }))
    .filter((b) => Number.isFinite(b.hours))
    .sort((a, b) => a.hours - b.hours);

  if (brackets.length === 0) {
    return 0;
  }
  const first = brackets[0];
  const last = brackets[brackets.length - 1];
  if (hours <= first.hours) {
    return first.rate;
  }
  if (hours >= last.hours) {
    return last.rate;
  }

  for (let i = 0; i < brackets.length - 1; i++) {
    const lo = brackets[i];
    const hi = brackets[i + 1];
    if (hours >= lo.hours && hours <= hi.hours) {
      return interpolate(hours, lo.hours, lo.rate, hi.hours, hi.rate);
    }
  }
  return last.rate;
}

/**
 * Monthly cost of hourly in-home care.
 * Formula: hours/day × days/week × 4.345 weeks/month × hourly rate
 */
export function inHomeMonthlyCost(hoursPerDay: number, daysPerWeek: number, hourlyRate: number): number {
  if (hoursPerDay < 0 || hoursPerDay > 24) {
    throw new ValidationError(`Hours per day must be between 0 and 24, got ${hoursPerDay}`, "hours_per_day");
  }
  if (daysPerWeek < 0 || daysPerWeek > 7) {
    throw new ValidationError(`Days per week must be between 0 and 7, got ${daysPerWeek}`, "days_per_week");
  }
  return hoursPerDay * daysPerWeek * WEEKS_PER_MONTH * hourlyRate;
}

/**
 * Monthly cost of assisted living or memory care: room rate plus care level,
 * mobility and chronic-condition adders. Memory care scales the whole amount.
 */
export function facilityMonthlyCost(
  plan: PersonCarePlan,
  tables: RateTables,
  settings: PlannerSettings = DEFAULT_SETTINGS
): number {
  const base =
    (tables.roomRates[plan.roomType] ?? 0) +
    (tables.careLevelAdders[plan.careLevel] ?? 0) +
    (tables.mobilityAdders.facility[plan.mobility] ?? 0) +
    (tables.chronicAdders[plan.chronic] ?? 0);
  return plan.careType === "memory_care" ? base * settings.memoryCareMultiplier : base;
}

function locationMultiplier(tables: RateTables, location: string): number {
  return tables.locationMultipliers[location] ?? tables.locationMultipliers[DEFAULT_LOCATION] ?? 1;
}

/**
 * Monthly care cost for one person. "none" (staying at home without paid
 * care) contributes nothing.
 */
export function monthlyCost(
  plan: PersonCarePlan,
  tables: RateTables,
  settings: PlannerSettings = DEFAULT_SETTINGS
): number {
  const multiplier = locationMultiplier(tables, plan.location);

  switch (plan.careType) {
    case "none":
      return 0;
    case "in_home": {
      const hourlyRate =
        interpolateHourlyRate(tables.inHomeHourlyRates, plan.hoursPerDay) +
        (tables.mobilityAdders.inHome[plan.mobility] ?? 0);
      const cost =
        inHomeMonthlyCost(plan.hoursPerDay, plan.daysPerWeek, hourlyRate) + (tables.chronicAdders[plan.chronic] ?? 0);
      return roundToCents(cost * multiplier);
    }
    case "assisted_living":
    case "memory_care":
      return roundToCents(facilityMonthlyCost(plan, tables, settings) * multiplier);
  }
}

/**
 * Spread a one-time cost evenly over a number of months.
 *
 * @example
 * ```ts
 * amortizeMonthly(6000, 12) // returns 500
 * ```
 */
export function amortizeMonthly(oneTimeCost: number, amortizationMonths: number): number {
  if (!Number.isFinite(amortizationMonths) || amortizationMonths < 1) {
    throw new ValidationError(
      `Amortization months must be at least 1, got ${amortizationMonths}`,
      HOUSEHOLD_FIELDS.homeModMonths
    );
  }
  if (!Number.isFinite(oneTimeCost) || oneTimeCost < 0) {
    throw new ValidationError(`One-time cost must be zero or more, got ${oneTimeCost}`, HOUSEHOLD_FIELDS.homeModCost);
  }
  return roundToCents(oneTimeCost / amortizationMonths);
}

/**
 * Discount when both persons live in one facility unit: person B's room
 * rate is replaced by the second-occupant fee.
 */
export function sharedUnitDiscount(
  a: PersonCarePlan,
  b: PersonCarePlan,
  shareOneUnit: boolean,
  tables: RateTables,
  settings: PlannerSettings = DEFAULT_SETTINGS
): number {
  if (!shareOneUnit || !isFacilityCare(a.careType) || !isFacilityCare(b.careType)) {
    return 0;
  }
  const multiplier = locationMultiplier(tables, b.location);
  let roomB = tables.roomRates[b.roomType] ?? 0;
  if (b.careType === "memory_care") {
    roomB *= settings.memoryCareMultiplier;
  }
  return roundToCents(Math.max(0, roomB * multiplier - settings.secondPersonFee * multiplier));
}

export interface VaBenefitReference {
  person: PersonTag;
  category: string;
}

export interface VaOffsetOptions {
  incomeTested?: boolean;
  countableIncome?: number; // monthly household income before VA benefits
  medicalExpenses?: number; // monthly unreimbursed medical and care costs
}

/**
 * VA Aid & Attendance offsets for a household.
 *
 * Each distinct benefit category is deducted at most once per month, no
 * matter how many persons reference it. With income testing the amount is
 * reduced by countable income net of medical expenses, never below zero.
 */
export function vaHouseholdOffset(
  references: VaBenefitReference[],
  tables: RateTables,
  options: VaOffsetOptions = {}
): VaBenefitOffset[] {
  const byCategory = new Map<string, PersonTag[]>();
  for (const ref of references) {
    if (!ref.category || ref.category === NO_VA_CATEGORY) {
      continue;
    }
    const persons = byCategory.get(ref.category) ?? [];
    if (!persons.includes(ref.person)) {
      persons.push(ref.person);
    }
    byCategory.set(ref.category, persons);
  }

  const netIncome = Math.max(0, (options.countableIncome ?? 0) - (options.medicalExpenses ?? 0));
  const offsets: VaBenefitOffset[] = [];
  for (const [category, persons] of byCategory) {
    const mapr = tables.vaCategories[category] ?? 0;
    const amount = options.incomeTested ? Math.max(0, mapr - netIncome) : mapr;
    if (amount > 0) {
      offsets.push({ category, amount: roundToCents(amount), persons });
    }
  }
  return offsets;
}

/**
 * Read one person's care plan from the session values
 */
export function readCarePlan(state: InputState, person: PersonTag): PersonCarePlan {
  const key = (base: string) => personFieldKey(base, person);
  const careType = state.getString(key(PERSON_FIELDS.careType));
  return {
    person,
    careType: isCareType(careType) ? careType : "none",
    hoursPerDay: state.getNumber(key(PERSON_FIELDS.hoursPerDay)),
    daysPerWeek: state.getNumber(key(PERSON_FIELDS.daysPerWeek)),
    roomType: state.getString(key(PERSON_FIELDS.roomType)),
    careLevel: state.getString(key(PERSON_FIELDS.careLevel)),
    mobility: state.getString(key(PERSON_FIELDS.mobility)),
    chronic: state.getString(key(PERSON_FIELDS.chronic)),
    location: state.getString(HOUSEHOLD_FIELDS.location) || DEFAULT_LOCATION,
  };
}

/**
 * Reset values the cost formulas cannot use (more than 24 hours a day,
 * fewer than one amortization month, ...) to their defaults and flag them.
 * Schemas may leave these fields unbounded.
 */
export function enforceModelBounds(state: InputState): ValidationError[] {
  const errors: ValidationError[] = [];
  for (const bound of modelBounds(includedPersons(state))) {
    if (!state.has(bound.key)) {
      continue;
    }
    const value = state.getNumber(bound.key);
    if (value < bound.min || value > bound.max) {
      const label = getField(state.getSchema(), bound.key)?.label ?? bound.key;
      errors.push(state.reject(bound.key, boundMessage(label, bound)));
    }
  }
  return errors;
}

function homeModificationCost(state: InputState, settings: PlannerSettings): number {
  const oneTimeCost = state.getNumber(HOUSEHOLD_FIELDS.homeModCost);
  if (oneTimeCost <= 0) {
    return 0;
  }
  const months = state.has(HOUSEHOLD_FIELDS.homeModMonths)
    ? state.getNumber(HOUSEHOLD_FIELDS.homeModMonths)
    : settings.defaultAmortizationMonths;
  return amortizeMonthly(oneTimeCost, months);
}

export interface HouseholdCostOptions {
  countableIncome?: number; // used when VA benefits are income tested
}

/**
 * Monthly cost breakdown for the household: care for each included person,
 * shared household costs, and VA offsets deducted once per benefit.
 */
export function householdCost(state: InputState, options: HouseholdCostOptions = {}): MonthlyCostBreakdown {
  const { lookups: tables, settings } = state.getSchema();
  const persons = includedPersons(state);
  const plans = persons.map((p) => readCarePlan(state, p));
  const grossByPerson = plans.map((plan) => monthlyCost(plan, tables, settings));

  const discount =
    plans.length === 2
      ? sharedUnitDiscount(plans[0], plans[1], state.getBoolean(HOUSEHOLD_FIELDS.shareOneUnit), tables, settings)
      : 0;

  const optional = roundToCents(sum(Object.values(categoryAmounts(state, "expense"))));
  const shared: SharedCosts = {
    homeModifications: homeModificationCost(state, settings),
    homeCarrying:
      homePlan(state) === "keep" ? roundToCents(sum(Object.values(categoryAmounts(state, "home_expense")))) : 0,
    optional,
    sharedUnitDiscount: discount,
  };

  const careTotal = roundToCents(sum(grossByPerson) - discount);
  const vaOffsets = vaHouseholdOffset(
    persons.map((p) => ({ person: p, category: state.getString(personFieldKey(PERSON_FIELDS.vaCategory, p)) })),
    tables,
    {
      incomeTested: settings.vaIncomeTested,
      countableIncome: options.countableIncome,
      medicalExpenses: careTotal + optional,
    }
  );

  // Each offset is attributed to the first person referencing it
  const offsetByPerson = new Map<PersonTag, number>();
  for (const offset of vaOffsets) {
    const owner = offset.persons[0];
    offsetByPerson.set(owner, (offsetByPerson.get(owner) ?? 0) + offset.amount);
  }

  const personCosts: PersonCost[] = plans.map((plan, i) => {
    const vaOffset = roundToCents(offsetByPerson.get(plan.person) ?? 0);
    return {
      person: plan.person,
      name: personName(state, plan.person),
      careType: plan.careType,
      grossCost: grossByPerson[i],
      vaOffset,
      netCost: roundToCents(grossByPerson[i] - vaOffset),
    };
  });

  const vaOffsetTotal = roundToCents(sum(vaOffsets.map((o) => o.amount)));
  const householdTotal = roundToCents(
    Math.max(0, careTotal + shared.homeModifications + shared.homeCarrying + shared.optional - vaOffsetTotal)
  );

  return {
    persons: personCosts,
    shared,
    vaOffsets,
    careTotal,
    vaOffsetTotal,
    householdTotal,
  };
}
