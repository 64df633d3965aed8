import * as fs from "fs";
import * as path from "path";
import {
  FieldValue,
  ResolvedSchema,
  SchemaField,
  VisibilityCondition,
  getField,
  getFieldGroup,
  listFields,
} from "../models/Schema";
import { coerceFieldValue } from "../schema/fieldValues";
import { LoadError, ValidationError, errorMessage, formatZodIssues } from "../utils/errors";
import { RawFieldValue, SavedPlanSchema } from "../utils/validation";

export interface SetResult {
  key: string;
  value: FieldValue;
  error: ValidationError | null; // set when the default was substituted
}

export interface LoadResult {
  ignoredKeys: string[]; // keys in the document that the schema does not define
}

/**
 * Values of one planning session, keyed by field.
 *
 * Every field of the resolved schema always has a value: the state starts
 * from schema defaults, a rejected edit puts the default back and flags the
 * field, and a load either replaces every value or changes nothing.
 */
export class InputState {
  private readonly schema: ResolvedSchema;
  private readonly fields: Map<string, SchemaField>;
  private values: Map<string, FieldValue>;
  private flags: Map<string, string> = new Map();

  private constructor(schema: ResolvedSchema) {
    this.schema = schema;
    this.fields = new Map(listFields(schema).map((f): [string, SchemaField] => [f.key, f]));
    this.values = this.defaultValues();
  }

  static fromSchema(schema: ResolvedSchema): InputState {
    return new InputState(schema);
  }

  private defaultValues(): Map<string, FieldValue> {
    return new Map(Array.from(this.fields.values(), (f): [string, FieldValue] => [f.key, f.default]));
  }

  getSchema(): ResolvedSchema {
    return this.schema;
  }

  has(key: string): boolean {
    return this.fields.has(key);
  }

  keys(): string[] {
    return Array.from(this.fields.keys());
  }

  /**
   * Current value, or undefined when the schema has no such field
   */
  get(key: string): FieldValue | undefined {
    return this.values.get(key);
  }

  getNumber(key: string): number {
    const value = this.values.get(key);
    return typeof value === "number" ? value : 0;
  }

  getBoolean(key: string): boolean {
    const value = this.values.get(key);
    return typeof value === "boolean" ? value : false;
  }

  getString(key: string): string {
    const value = this.values.get(key);
    return typeof value === "string" ? value : "";
  }

  /**
   * Apply one user edit. An invalid value is replaced by the field's default
   * and the field is flagged until a valid value is set.
   */
  set(key: string, raw: RawFieldValue | undefined): SetResult {
    const field = this.fields.get(key);
    if (!field) {
      throw new ValidationError(`Unknown field "${key}"`, key);
    }
    const coerced = coerceFieldValue(field, raw);
    if (coerced.ok) {
      this.values.set(key, coerced.value);
      this.flags.delete(key);
      return { key, value: coerced.value, error: null };
    }
    return { key, value: field.default, error: this.reject(key, coerced.message) };
  }

  /**
   * Put a field back to its default and flag it. Used for values a model
   * cannot work with even though the field accepted them.
   */
  reject(key: string, message: string): ValidationError {
    const field = this.fields.get(key);
    if (!field) {
      throw new ValidationError(`Unknown field "${key}"`, key);
    }
    this.values.set(key, field.default);
    this.flags.set(key, message);
    return new ValidationError(message, key);
  }

  /**
   * Apply several edits in order. Unknown keys are rejected before any value
   * changes.
   */
  setMany(values: Record<string, RawFieldValue>): SetResult[] {
    const unknown = Object.keys(values).filter((k) => !this.fields.has(k));
    if (unknown.length > 0) {
      throw new ValidationError("Unknown fields", undefined, unknown.map((k) => `"${k}" is not a field`));
    }
    return Object.entries(values).map(([key, raw]) => this.set(key, raw));
  }

  private conditionHolds(condition: VisibilityCondition | undefined): boolean {
    return condition === undefined || this.values.get(condition.field) === condition.equals;
  }

  /**
   * Whether a field is currently shown: its group's condition and its own
   * condition must both hold.
   */
  isVisible(key: string): boolean {
    const field = getField(this.schema, key);
    if (!field) {
      return false;
    }
    const group = getFieldGroup(this.schema, key);
    return this.conditionHolds(group?.visibleWhen) && this.conditionHolds(field.visibleWhen);
  }

  flaggedFields(): Record<string, string> {
    return Object.fromEntries(this.flags);
  }

  reset(): void {
    this.values = this.defaultValues();
    this.flags = new Map();
  }

  toJSON(): Record<string, FieldValue> {
    return Object.fromEntries(this.values);
  }

  /**
   * Serialize as a flat saved-plan document
   */
  save(): string {
    return JSON.stringify(this.toJSON(), null, 2);
  }

  /**
   * Replace every value from a saved-plan document. On any problem a
   * LoadError is thrown and the current values are kept.
   */
  load(document: unknown): LoadResult {
    let data: unknown = document;
    if (typeof document === "string") {
      try {
        data = JSON.parse(document);
      } catch (err) {
        throw new LoadError("Saved plan is not valid JSON", [errorMessage(err)]);
      }
    }

    const parsed = SavedPlanSchema.safeParse(data);
    if (!parsed.success) {
      throw new LoadError("Saved plan must be a flat mapping of field keys to values", formatZodIssues(parsed.error));
    }

    const next = this.defaultValues();
    const ignoredKeys: string[] = [];
    const issues: string[] = [];
    for (const [key, raw] of Object.entries(parsed.data)) {
      const field = this.fields.get(key);
      if (!field) {
        ignoredKeys.push(key);
        continue;
      }
      const coerced = coerceFieldValue(field, raw);
      if (coerced.ok) {
        next.set(key, coerced.value);
      } else {
        issues.push(`${key}: ${coerced.message}`);
      }
    }
    if (issues.length > 0) {
      throw new LoadError("Saved plan has invalid values", issues);
    }

    this.values = next;
    this.flags = new Map();
    return { ignoredKeys };
  }

  saveToFile(filePath: string): void {
    fs.writeFileSync(path.resolve(filePath), this.save(), "utf-8");
  }

  loadFromFile(filePath: string): LoadResult {
    let raw: string;
    try {
      raw = fs.readFileSync(path.resolve(filePath), "utf-8");
    } catch (err) {
      throw new LoadError(`Cannot read saved plan "${filePath}"`, [errorMessage(err)]);
    }
    return this.load(raw);
  }
}
