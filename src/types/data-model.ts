/**
 * Core data model types for Seedbed
 * These structures flow through the pipeline: schema → generation → persistence → validation
 */

/**
 * JSON-representable value, the only kind of value a record carries
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * DataRecord - one concrete name → value mapping
 */
export type DataRecord = JsonObject;

/**
 * Records handed to validation may come from anywhere
 */
export type RecordInput = Readonly<Record<string, unknown>>;

export const DATA_TYPES = [
  "string",
  "integer",
  "float",
  "boolean",
  "date",
  "datetime",
  "email",
  "phone",
  "url",
  "uuid",
  "json",
] as const;

export type DataType = (typeof DATA_TYPES)[number];

export function isDataType(value: unknown): value is DataType {
  return DATA_TYPES.some((type) => type === value);
}

/**
 * FieldSpec - one named, typed attribute with optional constraints
 */
export interface FieldSpec {
  readonly name: string;
  readonly dataType: DataType;
  readonly required: boolean;
  readonly defaultValue: JsonValue;
  readonly minLength: number | null;
  readonly maxLength: number | null;
  readonly minValue: number | null;
  readonly maxValue: number | null;
  /** Format hint; a set pattern makes generated strings letters-only */
  readonly pattern: string | null;
  readonly choices: readonly JsonValue[] | null;
  /** Realistic-data category tried before generic synthesis */
  readonly generationHint: string | null;
  /** Name of a registered predicate */
  readonly validator: string | null;
  readonly description: string;
}

export type FieldSpecInput = Pick<FieldSpec, "name" | "dataType"> &
  Partial<Omit<FieldSpec, "name" | "dataType">>;

/**
 * FieldValidationResult - outcome of validating one record against a schema
 */
export interface FieldValidationResult {
  valid: boolean;
  violations: string[];
}

export interface RecordError {
  recordIndex: number;
  record: RecordInput;
  errors: string[];
}

/**
 * ValidationReport - one-shot result of validating a record batch
 * Invariant: validCount + invalidCount === total
 */
export interface ValidationReport {
  readonly total: number;
  readonly validCount: number;
  readonly invalidCount: number;
  readonly conformanceRate: number;
  readonly errors: readonly RecordError[];
}

export type RecordFormat = "json" | "ndjson" | "csv" | "yaml";

export const RECORD_FORMATS: readonly RecordFormat[] = [
  "json",
  "ndjson",
  "csv",
  "yaml",
];

export function isRecordFormat(value: string): value is RecordFormat {
  return RECORD_FORMATS.some((format) => format === value);
}

/**
 * Outcome - explicit success/failure result of registry entry points
 */
export type Outcome<T, E = Error> =
  | { status: "success"; value: T }
  | { status: "error"; error: E };

export function success<T>(value: T): { status: "success"; value: T } {
  return { status: "success", value };
}

export function failure<E>(error: E): { status: "error"; error: E } {
  return { status: "error", error };
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isJsonObject(value);
    default:
      return false;
  }
}

export function isJsonObject(value: unknown): value is JsonObject {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  return Object.values(value).every(isJsonValue);
}
