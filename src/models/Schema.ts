/**
 * Schema, overlay and resolved-schema data structures
 */

export type FieldType = "currency" | "integer" | "percent" | "enum" | "boolean" | "text";

export type FieldValue = number | boolean | string;

export type FieldCategory = "income" | "asset" | "expense" | "home_expense" | "care" | "household";

export type PersonTag = "A" | "B";

export interface VisibilityCondition {
  field: string;
  equals: FieldValue;
}

export interface SchemaField {
  key: string;
  label: string;
  type: FieldType;
  default: FieldValue;
  choices?: string[]; // required for enum fields
  min?: number;
  max?: number;
  step?: number;
  tooltip?: string;
  category?: FieldCategory;
  person?: PersonTag; // field belongs to one person of the household
  visibleWhen?: VisibilityCondition;
}

export interface SchemaGroup {
  name: string;
  label?: string;
  step?: number; // wizard step the group is rendered on, defaults to 1
  visibleWhen?: VisibilityCondition;
  fields: SchemaField[];
}

export type OverlayAction = "replace-field" | "append-field" | "add-group";

export type OverlayDirective =
  | { action: "replace-field"; target: string; field: SchemaField }
  | { action: "append-field"; target: string; field: SchemaField }
  | { action: "add-group"; target: string; group: SchemaGroup };

/**
 * Rate tables consumed by the cost model. All amounts are monthly unless the
 * table name says otherwise.
 */
export interface RateTables {
  roomRates: Record<string, number>;
  inHomeHourlyRates: Record<string, number>; // hours-per-day breakpoint -> hourly rate
  careLevelAdders: Record<string, number>;
  chronicAdders: Record<string, number>;
  mobilityAdders: {
    facility: Record<string, number>;
    inHome: Record<string, number>; // added to the hourly rate
  };
  locationMultipliers: Record<string, number>;
  vaCategories: Record<string, number>;
}

export interface PlannerSettings {
  memoryCareMultiplier: number;
  secondPersonFee: number;
  ltcMonthlyBenefit: number;
  displayCapYears: number;
  runwayHorizonMonths: number;
  vaIncomeTested: boolean;
  defaultAmortizationMonths: number;
}

/**
 * Table overrides carried by a base or overlay document. Each table present
 * replaces the table of the same name.
 */
export interface RateTableOverrides {
  roomRates?: Record<string, number>;
  inHomeHourlyRates?: Record<string, number>;
  careLevelAdders?: Record<string, number>;
  chronicAdders?: Record<string, number>;
  mobilityAdders?: {
    facility?: Record<string, number>;
    inHome?: Record<string, number>;
  };
  locationMultipliers?: Record<string, number>;
  vaCategories?: Record<string, number>;
}

export interface BaseSchemaDocument {
  version?: string;
  groups: SchemaGroup[];
  lookups?: RateTableOverrides;
  settings?: Partial<PlannerSettings>;
}

export interface OverlayDocument {
  version?: string;
  directives: OverlayDirective[];
  lookups?: RateTableOverrides;
}

export interface ResolvedSchema {
  version: string;
  groups: SchemaGroup[];
  lookups: RateTables;
  settings: PlannerSettings;
}

/**
 * Get a field definition by key, or null when the schema has no such field
 */
export function getField(schema: ResolvedSchema, key: string): SchemaField | null {
  for (const group of schema.groups) {
    const field = group.fields.find((f) => f.key === key);
    if (field) {
      return field;
    }
  }
  return null;
}

/**
 * Get the group that owns a field
 */
export function getFieldGroup(schema: ResolvedSchema, key: string): SchemaGroup | null {
  return schema.groups.find((g) => g.fields.some((f) => f.key === key)) ?? null;
}

/**
 * All fields in group order
 */
export function listFields(schema: ResolvedSchema): SchemaField[] {
  return schema.groups.flatMap((g) => g.fields);
}

/**
 * Groups rendered on one wizard step
 */
export function groupsForStep(schema: ResolvedSchema, step: number): SchemaGroup[] {
  return schema.groups.filter((g) => (g.step ?? 1) === step);
}

/**
 * Zero value for a field type. Text and enum fields read as empty.
 */
export function zeroValue(type: FieldType): FieldValue {
  switch (type) {
    case "boolean":
      return false;
    case "enum":
    case "text":
      return "";
    default:
      return 0;
  }
}

export function isNumericType(type: FieldType): boolean {
  return type === "currency" || type === "integer" || type === "percent";
}
