import { modelBounds, boundMessage } from "../models/CarePlan";
import {
  OverlayDirective,
  RateTableOverrides,
  RateTables,
  ResolvedSchema,
  SchemaField,
  SchemaGroup,
  listFields,
} from "../models/Schema";
import { SchemaError } from "../utils/errors";
import { DEFAULT_RATE_TABLES, DEFAULT_SETTINGS } from "./defaults";
import { coerceFieldValue } from "./fieldValues";
import { loadOverlayFile, loadSchemaFile, parseBaseSchema, parseOverlay } from "./schemaLoader";

/**
 * Overlay resolution.
 *
 * Directives are applied in document order and the last writer wins: a later
 * directive touching a field key fully supersedes whatever an earlier one (or
 * the base) put there, and a key never appears twice in the result.
 *
 * - add-group: appends a new, empty-or-populated group; no-op when the name exists
 * - append-field: appends to the target group; the group must exist
 * - replace-field: overwrites the field with the same key in place, or
 *   appends to the target group when no such field exists yet
 */

function findGroup(groups: SchemaGroup[], name: string): SchemaGroup | undefined {
  return groups.find((g) => g.name === name);
}

function removeFieldKey(groups: SchemaGroup[], key: string): void {
  for (const group of groups) {
    group.fields = group.fields.filter((f) => f.key !== key);
  }
}

function appendField(groups: SchemaGroup[], group: SchemaGroup, field: SchemaField): void {
  removeFieldKey(groups, field.key);
  group.fields.push(structuredClone(field));
}

function replaceField(groups: SchemaGroup[], target: string, field: SchemaField): void {
  for (const group of groups) {
    const index = group.fields.findIndex((f) => f.key === field.key);
    if (index !== -1) {
      group.fields[index] = structuredClone(field);
      return;
    }
  }
  const group = findGroup(groups, target);
  if (!group) {
    throw new SchemaError(
      `replace-field for "${field.key}" found no existing field and target group "${target}" does not exist`
    );
  }
  appendField(groups, group, field);
}

function addGroup(groups: SchemaGroup[], group: SchemaGroup): void {
  if (findGroup(groups, group.name)) {
    return;
  }
  const { fields, ...rest } = structuredClone(group);
  const added: SchemaGroup = { ...rest, fields: [] };
  groups.push(added);
  for (const field of fields) {
    appendField(groups, added, field);
  }
}

function applyDirective(groups: SchemaGroup[], directive: OverlayDirective): void {
  switch (directive.action) {
    case "add-group":
      addGroup(groups, directive.group);
      return;
    case "append-field": {
      const group = findGroup(groups, directive.target);
      if (!group) {
        throw new SchemaError(
          `append-field for "${directive.field.key}" targets unknown group "${directive.target}"`
        );
      }
      appendField(groups, group, directive.field);
      return;
    }
    case "replace-field":
      replaceField(groups, directive.target, directive.field);
      return;
  }
}

function mergeRateTables(base: RateTables, overrides?: RateTableOverrides): RateTables {
  if (!overrides) {
    return base;
  }
  return {
    roomRates: overrides.roomRates ?? base.roomRates,
    inHomeHourlyRates: overrides.inHomeHourlyRates ?? base.inHomeHourlyRates,
    careLevelAdders: overrides.careLevelAdders ?? base.careLevelAdders,
    chronicAdders: overrides.chronicAdders ?? base.chronicAdders,
    mobilityAdders: {
      facility: overrides.mobilityAdders?.facility ?? base.mobilityAdders.facility,
      inHome: overrides.mobilityAdders?.inHome ?? base.mobilityAdders.inHome,
    },
    locationMultipliers: overrides.locationMultipliers ?? base.locationMultipliers,
    vaCategories: overrides.vaCategories ?? base.vaCategories,
  };
}

/**
 * Checks that only make sense once every directive has been applied.
 * Defaults are replaced by their typed values, so "6" becomes 6.
 */
function checkResolved(schema: ResolvedSchema): void {
  const issues: string[] = [];
  const fields = listFields(schema);
  const keys = new Set(fields.map((f) => f.key));

  for (const field of fields) {
    const coerced = coerceFieldValue(field, field.default);
    if (coerced.ok) {
      field.default = coerced.value;
    } else {
      issues.push(`default of "${field.key}" is invalid: ${coerced.message}`);
    }
    if (field.visibleWhen && !keys.has(field.visibleWhen.field)) {
      issues.push(`field "${field.key}" depends on unknown field "${field.visibleWhen.field}"`);
    }
  }
  for (const bound of modelBounds(["A", "B"])) {
    const field = fields.find((f) => f.key === bound.key);
    if (field && typeof field.default === "number" && (field.default < bound.min || field.default > bound.max)) {
      issues.push(`default of "${field.key}" is invalid: ${boundMessage(field.label, bound)}`);
    }
  }
  for (const group of schema.groups) {
    if (group.visibleWhen && !keys.has(group.visibleWhen.field)) {
      issues.push(`group "${group.name}" depends on unknown field "${group.visibleWhen.field}"`);
    }
  }
  for (const breakpoint of Object.keys(schema.lookups.inHomeHourlyRates)) {
    if (!Number.isFinite(Number(breakpoint))) {
      issues.push(`in-home rate breakpoint "${breakpoint}" is not a number of hours`);
    }
  }

  if (issues.length > 0) {
    throw new SchemaError("Resolved schema is invalid", issues);
  }
}

/**
 * Merge an overlay into a base schema. Neither input is mutated; the same
 * inputs always produce a structurally identical result.
 */
export function resolve(base: unknown, overlay: unknown = { directives: [] }): ResolvedSchema {
  const baseDoc = parseBaseSchema(base);
  const overlayDoc = parseOverlay(overlay);

  const groups: SchemaGroup[] = [];
  for (const group of baseDoc.groups) {
    if (findGroup(groups, group.name)) {
      throw new SchemaError(`Base schema defines group "${group.name}" more than once`);
    }
    addGroup(groups, group);
  }

  for (const directive of overlayDoc.directives) {
    applyDirective(groups, directive);
  }

  const lookups = mergeRateTables(mergeRateTables(DEFAULT_RATE_TABLES, baseDoc.lookups), overlayDoc.lookups);

  const resolved: ResolvedSchema = {
    version: overlayDoc.version ? `${baseDoc.version ?? "base"}+${overlayDoc.version}` : baseDoc.version ?? "base",
    groups,
    lookups: structuredClone(lookups),
    settings: { ...DEFAULT_SETTINGS, ...baseDoc.settings },
  };
  checkResolved(resolved);
  return resolved;
}

/**
 * Load the base schema and optional overlay from disk and resolve them.
 */
export function loadResolvedSchema(basePath: string, overlayPath?: string): ResolvedSchema {
  const base = loadSchemaFile(basePath);
  const overlay = overlayPath ? loadOverlayFile(overlayPath) : { directives: [] };
  return resolve(base, overlay);
}
