/**
 * SchemaDefinition - named, versioned, ordered collection of fields
 */

import type {
  FieldSpec,
  FieldSpecInput,
  FieldValidationResult,
  RecordInput,
} from "../../types/data-model.js";
import { SchemaDefinitionError } from "../../utils/errors.js";
import { checkCustomRule, checkFieldValue, isMissing } from "./field-rules.js";
import { defineField } from "./field-spec.js";
import { BUILTIN_PREDICATES, type PredicateLookup } from "./predicates.js";

export interface SchemaDefinitionInput {
  name: string;
  version?: string;
  description?: string;
  fields: readonly FieldSpecInput[];
}

export class SchemaDefinition {
  readonly name: string;
  readonly version: string;
  readonly description: string;
  readonly fields: readonly FieldSpec[];
  private readonly byName: ReadonlyMap<string, FieldSpec>;

  constructor(input: SchemaDefinitionInput) {
    if (typeof input.name !== "string" || input.name.trim() === "") {
      throw new SchemaDefinitionError("Schema name must be a non-empty string");
    }

    this.name = input.name;
    this.version = input.version ?? "1.0";
    this.description = input.description ?? "";
    this.fields = Object.freeze(input.fields.map(defineField));

    const byName = new Map<string, FieldSpec>();
    const duplicates = new Set<string>();
    for (const field of this.fields) {
      if (byName.has(field.name)) duplicates.add(field.name);
      byName.set(field.name, field);
    }
    if (duplicates.size > 0) {
      throw new SchemaDefinitionError(
        `Duplicate field names in schema '${this.name}': ${[...duplicates].join(", ")}`,
        { schema: this.name, duplicates: [...duplicates] },
      );
    }
    this.byName = byName;
  }

  get fieldNames(): string[] {
    return this.fields.map((field) => field.name);
  }

  field(name: string): FieldSpec | undefined {
    return this.byName.get(name);
  }

  /**
   * Validate one record. Every failing rule adds its own violation;
   * a missing required field reports only that it is required.
   */
  validate(
    record: RecordInput,
    predicates: PredicateLookup = BUILTIN_PREDICATES,
  ): FieldValidationResult {
    const violations: string[] = [];

    for (const field of this.fields) {
      const value = Object.prototype.hasOwnProperty.call(record, field.name)
        ? record[field.name]
        : undefined;

      if (isMissing(value)) {
        if (field.required) {
          violations.push(`Field '${field.name}' is required`);
        }
        continue;
      }

      violations.push(...checkFieldValue(field, value));
      violations.push(...checkCustomRule(field, value, predicates));
    }

    return { valid: violations.length === 0, violations };
  }
}
