import { CareType } from "./CarePlan";
import { PersonTag } from "./Schema";

/**
 * Monthly cost breakdown data structures. Derived on every read, never stored.
 */

export interface PersonCost {
  person: PersonTag;
  name: string;
  careType: CareType;
  grossCost: number;
  vaOffset: number; // household VA offset attributed to this person
  netCost: number;
}

export interface SharedCosts {
  homeModifications: number; // one-time cost amortized to a monthly figure
  homeCarrying: number; // mortgage, taxes, insurance, HOA, utilities when keeping the home
  optional: number; // other monthly expenses
  sharedUnitDiscount: number; // subtracted when a couple shares one facility unit
}

export interface VaBenefitOffset {
  category: string;
  amount: number;
  persons: PersonTag[]; // every person referencing this category
}

export interface MonthlyCostBreakdown {
  persons: PersonCost[];
  shared: SharedCosts;
  vaOffsets: VaBenefitOffset[];
  careTotal: number; // sum of person gross costs less shared-unit discount
  vaOffsetTotal: number;
  householdTotal: number;
}
