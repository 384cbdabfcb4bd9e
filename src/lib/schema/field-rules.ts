/**
 * Per-field rules shared by the validator and the generator's conformance check
 */

import { isDeepStrictEqual } from "util";
import type { DataType, FieldSpec, JsonValue } from "../../types/data-model.js";
import { SchemaDefinitionError } from "../../utils/errors.js";
import type { PredicateLookup } from "./predicates.js";

export function isMissing(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

/**
 * Check a value's runtime type against a data type's representation
 */
export function matchesType(dataType: DataType, value: unknown): boolean {
  switch (dataType) {
    case "string":
    case "date":
    case "datetime":
    case "email":
    case "phone":
    case "url":
    case "uuid":
      return typeof value === "string";
    case "integer":
      return typeof value === "number" && Number.isInteger(value);
    case "float":
      return typeof value === "number" && Number.isFinite(value);
    case "boolean":
      return typeof value === "boolean";
    case "json":
      return typeof value === "object" && value !== null;
    default:
      return unknownDataType(dataType);
  }
}

function unknownDataType(dataType: never): never {
  throw new SchemaDefinitionError(`Unknown data type: ${String(dataType)}`);
}

/**
 * Length of a scalar's string form in code points, or null for structured values
 */
export function valueLength(value: unknown): number | null {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return [...String(value)].length;
  }
  return null;
}

export function isChoice(choices: readonly JsonValue[], value: unknown): boolean {
  return choices.some((choice) => isDeepStrictEqual(choice, value));
}

export function formatChoices(choices: readonly JsonValue[]): string {
  const rendered = choices.map((choice) =>
    typeof choice === "string" ? choice : JSON.stringify(choice),
  );
  return `[${rendered.join(", ")}]`;
}

/**
 * Check a present value against a field's choices, type, length and range rules.
 * Choices take precedence: a field with choices is only checked for membership.
 */
export function checkFieldValue(field: FieldSpec, value: unknown): string[] {
  const violations: string[] = [];
  const label = `Field '${field.name}'`;

  if (field.choices) {
    if (!isChoice(field.choices, value)) {
      violations.push(`${label} must be one of ${formatChoices(field.choices)}`);
    }
    return violations;
  }

  if (!matchesType(field.dataType, value)) {
    violations.push(`${label} has wrong type, expected ${field.dataType}`);
  }

  const length = valueLength(value);
  if (length !== null) {
    if (field.minLength !== null && length < field.minLength) {
      violations.push(`${label} length must be at least ${field.minLength}`);
    }
    if (field.maxLength !== null && length > field.maxLength) {
      violations.push(`${label} length must be at most ${field.maxLength}`);
    }
  }

  if (typeof value === "number") {
    if (field.minValue !== null && value < field.minValue) {
      violations.push(`${label} must be >= ${field.minValue}`);
    }
    if (field.maxValue !== null && value > field.maxValue) {
      violations.push(`${label} must be <= ${field.maxValue}`);
    }
  }

  return violations;
}

/**
 * Run a field's named predicate, if any
 */
export function checkCustomRule(
  field: FieldSpec,
  value: unknown,
  predicates: PredicateLookup,
): string[] {
  if (field.validator === null) return [];

  const predicate = predicates.get(field.validator);
  if (!predicate) {
    return [
      `Field '${field.name}' references unknown validator '${field.validator}'`,
    ];
  }
  return predicate(value)
    ? []
    : [`Field '${field.name}' failed custom validation '${field.validator}'`];
}
