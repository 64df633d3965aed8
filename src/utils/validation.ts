import { z } from "zod";

/**
 * Zod validation schemas for the planner's JSON documents and API bodies.
 * Money amounts are monthly USD unless stated otherwise.
 */

export const FieldTypeSchema = z.enum(["currency", "integer", "percent", "enum", "boolean", "text"]);

export const FieldValueSchema = z.union([z.number(), z.boolean(), z.string()]);

/**
 * Raw values as they arrive from a form or a saved plan. Null stands for a
 * blank input.
 */
export const RawFieldValueSchema = z.union([z.number(), z.boolean(), z.string(), z.null()]);

export const VisibilityConditionSchema = z.object({
  field: z.string().min(1),
  equals: FieldValueSchema,
});

/**
 * Schema for a single wizard field. `default` may be omitted; the loader
 * fills it with the type's zero value (first choice for enums).
 */
export const SchemaFieldSchema = z
  .object({
    key: z.string().min(1),
    label: z.string().min(1),
    type: FieldTypeSchema,
    default: FieldValueSchema.optional(),
    choices: z.array(z.string()).optional(),
    min: z.number().optional(),
    max: z.number().optional(),
    step: z.number().positive().optional(),
    tooltip: z.string().optional(),
    category: z.enum(["income", "asset", "expense", "home_expense", "care", "household"]).optional(),
    person: z.enum(["A", "B"]).optional(),
    visibleWhen: VisibilityConditionSchema.optional(),
  })
  .superRefine((field, ctx) => {
    if (field.type === "enum" && (!field.choices || field.choices.length === 0)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `enum field "${field.key}" must define at least one choice`,
        path: ["choices"],
      });
    }
    if (field.min !== undefined && field.max !== undefined && field.min > field.max) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `field "${field.key}" has min greater than max`,
        path: ["min"],
      });
    }
  });

export const SchemaGroupSchema = z.object({
  name: z.string().min(1),
  label: z.string().optional(),
  step: z.number().int().min(1).optional(),
  visibleWhen: VisibilityConditionSchema.optional(),
  fields: z.array(SchemaFieldSchema),
});

/**
 * Group payload of an add-group directive. The name defaults to the
 * directive's target.
 */
export const OverlayGroupSchema = SchemaGroupSchema.extend({
  name: z.string().min(1).optional(),
  fields: z.array(SchemaFieldSchema).default([]),
});

const NumberTableSchema = z.record(z.string(), z.number());

export const RateTablesSchema = z.object({
  roomRates: NumberTableSchema.optional(),
  inHomeHourlyRates: NumberTableSchema.optional(),
  careLevelAdders: NumberTableSchema.optional(),
  chronicAdders: NumberTableSchema.optional(),
  mobilityAdders: z
    .object({
      facility: NumberTableSchema.optional(),
      inHome: NumberTableSchema.optional(),
    })
    .optional(),
  locationMultipliers: NumberTableSchema.optional(),
  vaCategories: NumberTableSchema.optional(),
});

export const PlannerSettingsSchema = z.object({
  memoryCareMultiplier: z.number().min(0).optional(),
  secondPersonFee: z.number().min(0).optional(),
  ltcMonthlyBenefit: z.number().min(0).optional(),
  displayCapYears: z.number().positive().optional(),
  runwayHorizonMonths: z.number().int().min(1).optional(),
  vaIncomeTested: z.boolean().optional(),
  defaultAmortizationMonths: z.number().int().min(1).optional(),
});

export const BaseSchemaDocumentSchema = z.object({
  version: z.string().optional(),
  groups: z.array(SchemaGroupSchema),
  lookups: RateTablesSchema.optional(),
  settings: PlannerSettingsSchema.optional(),
});

export const OverlayDirectiveSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("replace-field"), target: z.string().min(1), field: SchemaFieldSchema }),
  z.object({ action: z.literal("append-field"), target: z.string().min(1), field: SchemaFieldSchema }),
  z.object({ action: z.literal("add-group"), target: z.string().min(1), group: OverlayGroupSchema }),
]);

export const OverlayDocumentSchema = z.object({
  version: z.string().optional(),
  directives: z.array(OverlayDirectiveSchema),
  lookups: RateTablesSchema.optional(),
});

/**
 * Saved plan file: flat mapping of field key to value
 */
export const SavedPlanSchema = z.record(z.string(), RawFieldValueSchema);

export const HomeSaleInputSchema = z.object({
  month: z.number().int().min(0),
  salePrice: z.number().min(0),
  costs: z.number().min(0).default(0),
});

export const PlanRequestSchema = z.object({
  inputs: SavedPlanSchema.default({}),
});

export const LoadPlanRequestSchema = z.object({
  plan: z.union([z.string(), SavedPlanSchema]),
});

export const RunwayRequestSchema = z.object({
  monthlyIncome: z.number().min(0),
  monthlyCost: z.number().min(0),
  liquidAssets: z.number().min(0),
  homeSale: HomeSaleInputSchema.optional(),
  horizonMonths: z.number().int().min(1).max(1200).optional(),
});

export type RawFieldValue = z.infer<typeof RawFieldValueSchema>;
export type ParsedSchemaField = z.infer<typeof SchemaFieldSchema>;
export type ParsedGroup = z.infer<typeof SchemaGroupSchema>;
export type ParsedOverlay = z.infer<typeof OverlayDocumentSchema>;
export type RunwayRequest = z.infer<typeof RunwayRequestSchema>;
