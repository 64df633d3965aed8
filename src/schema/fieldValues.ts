import { FieldValue, SchemaField, isNumericType } from "../models/Schema";
import { RawFieldValue } from "../utils/validation";

export type CoercionResult =
  | { ok: true; value: FieldValue }
  | { ok: false; message: string };

const TRUE_WORDS = new Set(["true", "yes", "y", "1", "on"]);
const FALSE_WORDS = new Set(["false", "no", "n", "0", "off"]);

function isBlank(raw: RawFieldValue | undefined): boolean {
  return raw === undefined || raw === null || (typeof raw === "string" && raw.trim() === "");
}

/**
 * Lower bound applied when the field sets none: amounts, counts and
 * percentages cannot be negative.
 */
function effectiveMin(field: SchemaField): number | undefined {
  if (field.min !== undefined) {
    return field.min;
  }
  return isNumericType(field.type) ? 0 : undefined;
}

function effectiveMax(field: SchemaField): number | undefined {
  if (field.max !== undefined) {
    return field.max;
  }
  return field.type === "percent" ? 100 : undefined;
}

function parseNumber(raw: number | boolean | string): number | null {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }
  if (typeof raw === "boolean") {
    return null;
  }
  const cleaned = raw.replace(/[$,%\s]/g, "");
  if (cleaned === "") {
    return null;
  }
  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

function coerceNumeric(field: SchemaField, raw: RawFieldValue | undefined): CoercionResult {
  // Blank numeric input reads as zero
  const value = raw === undefined || raw === null || isBlank(raw) ? 0 : parseNumber(raw);
  if (value === null) {
    return { ok: false, message: `${field.label} must be a number` };
  }
  if (field.type === "integer" && !Number.isInteger(value)) {
    return { ok: false, message: `${field.label} must be a whole number` };
  }
  const min = effectiveMin(field);
  if (min !== undefined && value < min) {
    return { ok: false, message: `${field.label} must be at least ${min}` };
  }
  const max = effectiveMax(field);
  if (max !== undefined && value > max) {
    return { ok: false, message: `${field.label} must be at most ${max}` };
  }
  return { ok: true, value };
}

function coerceBoolean(field: SchemaField, raw: RawFieldValue | undefined): CoercionResult {
  if (isBlank(raw)) {
    return { ok: true, value: false };
  }
  if (typeof raw === "boolean") {
    return { ok: true, value: raw };
  }
  const word = String(raw).trim().toLowerCase();
  if (TRUE_WORDS.has(word)) {
    return { ok: true, value: true };
  }
  if (FALSE_WORDS.has(word)) {
    return { ok: true, value: false };
  }
  return { ok: false, message: `${field.label} must be yes or no` };
}

function coerceEnum(field: SchemaField, raw: RawFieldValue | undefined): CoercionResult {
  const choices = field.choices ?? [];
  if (typeof raw === "string" && choices.includes(raw)) {
    return { ok: true, value: raw };
  }
  return { ok: false, message: `${field.label} must be one of: ${choices.join(", ")}` };
}

function coerceText(field: SchemaField, raw: RawFieldValue | undefined): CoercionResult {
  if (isBlank(raw)) {
    return { ok: true, value: "" };
  }
  if (typeof raw === "string" || typeof raw === "number") {
    return { ok: true, value: String(raw).trim() };
  }
  return { ok: false, message: `${field.label} must be text` };
}

/**
 * Coerce a raw form or file value into the field's typed value.
 * Never throws; callers decide whether a failure is fatal.
 */
export function coerceFieldValue(field: SchemaField, raw: RawFieldValue | undefined): CoercionResult {
  switch (field.type) {
    case "currency":
    case "integer":
    case "percent":
      return coerceNumeric(field, raw);
    case "boolean":
      return coerceBoolean(field, raw);
    case "enum":
      return coerceEnum(field, raw);
    case "text":
      return coerceText(field, raw);
  }
}
