import { HOUSEHOLD_FIELDS, HomePlan, PERSON_FIELDS, isHomePlan, personFieldKey } from "../models/CarePlan";
import { FieldCategory, PersonTag, SchemaField, isNumericType, listFields } from "../models/Schema";
import { InputState } from "./inputState";

/**
 * Read-side helpers shared by the cost and affordability models.
 */

export function isPersonBIncluded(state: InputState): boolean {
  return state.getBoolean(HOUSEHOLD_FIELDS.includePersonB);
}

export function includedPersons(state: InputState): PersonTag[] {
  return isPersonBIncluded(state) ? ["A", "B"] : ["A"];
}

export function personName(state: InputState, person: PersonTag): string {
  return state.getString(personFieldKey(PERSON_FIELDS.name, person)) || `Person ${person}`;
}

export function homePlan(state: InputState): HomePlan {
  const value = state.getString(HOUSEHOLD_FIELDS.homePlan);
  return isHomePlan(value) ? value : "keep";
}

/**
 * A field counts towards totals when it is visible and, for person-B
 * fields, when person B is part of the household.
 */
export function isCounted(state: InputState, field: SchemaField): boolean {
  if (field.person === "B" && !isPersonBIncluded(state)) {
    return false;
  }
  return state.isVisible(field.key);
}

/**
 * Amounts of every counted numeric field in a category, keyed by field
 */
export function categoryAmounts(state: InputState, category: FieldCategory): Record<string, number> {
  const amounts: Record<string, number> = {};
  for (const field of listFields(state.getSchema())) {
    if (field.category === category && isNumericType(field.type) && isCounted(state, field)) {
      amounts[field.key] = state.getNumber(field.key);
    }
  }
  return amounts;
}
