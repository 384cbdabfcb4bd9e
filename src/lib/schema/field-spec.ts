/**
 * FieldSpec construction with eager invariant checks
 */

import {
  isDataType,
  isJsonValue,
  type DataType,
  type FieldSpec,
  type JsonValue,
  type FieldSpecInput,
} from "../../types/data-model.js";
import { SchemaDefinitionError } from "../../utils/errors.js";
import { checkFieldValue } from "./field-rules.js";

/**
 * Fill defaults, validate and freeze a field definition
 *
 * @throws SchemaDefinitionError listing every broken invariant
 *
 * @example
 * defineField({ name: "age", dataType: "integer", minValue: 18, maxValue: 100 });
 */
export function defineField(input: FieldSpecInput): FieldSpec {
  const field: FieldSpec = {
    name: input.name,
    dataType: input.dataType,
    required: input.required ?? true,
    defaultValue: input.defaultValue ?? null,
    minLength: input.minLength ?? null,
    maxLength: input.maxLength ?? null,
    minValue: input.minValue ?? null,
    maxValue: input.maxValue ?? null,
    pattern: input.pattern ?? null,
    choices: input.choices ? [...input.choices] : null,
    generationHint: input.generationHint ?? null,
    validator: input.validator ?? null,
    description: input.description ?? "",
  };

  const problems = collectFieldProblems(field);
  if (problems.length > 0) {
    throw new SchemaDefinitionError(
      `Invalid field '${String(field.name)}': ${problems.join("; ")}`,
      { field: field.name, problems },
    );
  }

  // Choices and defaults are owned by the field; callers keep their own copies
  const choices = field.choices ? structuredClone([...field.choices]) : null;
  choices?.forEach(deepFreeze);
  const defaultValue = structuredClone(field.defaultValue);
  deepFreeze(defaultValue);

  return Object.freeze({
    ...field,
    defaultValue,
    choices: choices ? Object.freeze(choices) : null,
  });
}

function deepFreeze(value: JsonValue): void {
  if (Array.isArray(value)) {
    value.forEach(deepFreeze);
  } else if (typeof value === "object" && value !== null) {
    Object.values(value).forEach(deepFreeze);
  }
  Object.freeze(value);
}

// Generated string forms with a single possible length
const FIXED_LENGTHS: Partial<Record<DataType, number>> = {
  uuid: 36,
  date: 10,
  datetime: 24,
};

function collectFieldProblems(field: FieldSpec): string[] {
  const problems: string[] = [];

  if (typeof field.name !== "string" || field.name.trim() === "") {
    problems.push("name must be a non-empty string");
  }
  if (!isDataType(field.dataType)) {
    problems.push(`unknown data type '${String(field.dataType)}'`);
    // The remaining checks depend on a known type
    return problems;
  }

  for (const key of ["minLength", "maxLength"] as const) {
    const value = field[key];
    if (value !== null && !(Number.isInteger(value) && value >= 0)) {
      problems.push(`${key} must be a non-negative integer`);
    }
  }
  for (const key of ["minValue", "maxValue"] as const) {
    const value = field[key];
    if (value !== null && !Number.isFinite(value)) {
      problems.push(`${key} must be a finite number`);
    }
  }

  if (
    field.minLength !== null &&
    field.maxLength !== null &&
    field.minLength > field.maxLength
  ) {
    problems.push(
      `minLength (${field.minLength}) exceeds maxLength (${field.maxLength})`,
    );
  }
  if (
    field.minValue !== null &&
    field.maxValue !== null &&
    field.minValue > field.maxValue
  ) {
    problems.push(
      `minValue (${field.minValue}) exceeds maxValue (${field.maxValue})`,
    );
  }
  if (
    field.dataType === "integer" &&
    field.minValue !== null &&
    field.maxValue !== null &&
    Math.ceil(field.minValue) > Math.floor(field.maxValue)
  ) {
    problems.push(
      `range [${field.minValue}, ${field.maxValue}] contains no integer`,
    );
  }

  const fixedLength = FIXED_LENGTHS[field.dataType];
  if (
    fixedLength !== undefined &&
    field.choices === null &&
    ((field.minLength !== null && field.minLength > fixedLength) ||
      (field.maxLength !== null && field.maxLength < fixedLength))
  ) {
    problems.push(
      `${field.dataType} values are ${fixedLength} characters long, outside the length bounds`,
    );
  }

  if (field.choices !== null) {
    if (field.choices.length === 0) {
      problems.push("choices must not be empty");
    } else if (!field.choices.every(isJsonValue)) {
      problems.push("choices must be JSON values");
    }
  }

  if (field.defaultValue !== null) {
    if (!isJsonValue(field.defaultValue)) {
      problems.push("defaultValue must be a JSON value");
    } else if (problems.length === 0) {
      for (const violation of checkFieldValue(field, field.defaultValue)) {
        problems.push(`defaultValue breaks its own rules (${violation})`);
      }
    }
  }

  return problems;
}
