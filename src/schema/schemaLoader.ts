import * as fs from "fs";
import * as path from "path";
import {
  BaseSchemaDocument,
  OverlayDirective,
  OverlayDocument,
  SchemaField,
  SchemaGroup,
  zeroValue,
} from "../models/Schema";
import { SchemaError, errorMessage, formatZodIssues } from "../utils/errors";
import {
  BaseSchemaDocumentSchema,
  OverlayDocumentSchema,
  ParsedGroup,
  ParsedOverlay,
  ParsedSchemaField,
} from "../utils/validation";

/**
 * Fill in a missing default: first choice for enums, zero value otherwise.
 */
function normalizeField(field: ParsedSchemaField): SchemaField {
  const fallback = field.type === "enum" && field.choices ? field.choices[0] : zeroValue(field.type);
  return { ...field, default: field.default ?? fallback };
}

function normalizeGroup(group: ParsedGroup): SchemaGroup {
  return { ...group, fields: group.fields.map(normalizeField) };
}

function normalizeDirective(directive: ParsedOverlay["directives"][number]): OverlayDirective {
  switch (directive.action) {
    case "replace-field":
    case "append-field":
      return { action: directive.action, target: directive.target, field: normalizeField(directive.field) };
    case "add-group": {
      const { group, target } = directive;
      if (group.name !== undefined && group.name !== target) {
        throw new SchemaError(
          `add-group directive targets "${target}" but its group is named "${group.name}"`
        );
      }
      return {
        action: "add-group",
        target,
        group: { ...group, name: target, fields: group.fields.map(normalizeField) },
      };
    }
  }
}

/**
 * Parse and structurally validate a base schema document
 */
export function parseBaseSchema(doc: unknown): BaseSchemaDocument {
  const parsed = BaseSchemaDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new SchemaError("Invalid base schema", formatZodIssues(parsed.error));
  }
  return { ...parsed.data, groups: parsed.data.groups.map(normalizeGroup) };
}

/**
 * Parse and structurally validate an overlay document
 */
export function parseOverlay(doc: unknown): OverlayDocument {
  const parsed = OverlayDocumentSchema.safeParse(doc);
  if (!parsed.success) {
    throw new SchemaError("Invalid overlay", formatZodIssues(parsed.error));
  }
  return { ...parsed.data, directives: parsed.data.directives.map(normalizeDirective) };
}

function readJsonFile(filePath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(path.resolve(filePath), "utf-8");
  } catch (err) {
    throw new SchemaError(`Cannot read schema file "${filePath}"`, [errorMessage(err)]);
  }
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new SchemaError(`Schema file "${filePath}" is not valid JSON`, [errorMessage(err)]);
  }
}

export function loadSchemaFile(filePath: string): BaseSchemaDocument {
  return parseBaseSchema(readJsonFile(filePath));
}

export function loadOverlayFile(filePath: string): OverlayDocument {
  return parseOverlay(readJsonFile(filePath));
}
