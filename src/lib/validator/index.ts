/**
 * Validator module - batch validation and reporting
 */

import type {
  RecordError,
  RecordInput,
  ValidationReport,
} from "../../types/data-model.js";
import { SchemaDefinitionError } from "../../utils/errors.js";
import {
  BUILTIN_PREDICATES,
  type PredicateLookup,
} from "../schema/predicates.js";
import { SchemaDefinition } from "../schema/schema-definition.js";
import type { StreamValidationOptions } from "./types.js";

export * from "./types.js";

/**
 * Validates record collections and aggregates per-record violations
 */
export class RecordValidator {
  constructor(
    private readonly predicates: PredicateLookup = BUILTIN_PREDICATES,
  ) {}

  /**
   * Validate every record; bad records are reported, never thrown
   */
  validateMany(
    records: readonly RecordInput[],
    schema: SchemaDefinition,
  ): ValidationReport {
    assertSchema(schema);

    const errors: RecordError[] = [];
    records.forEach((record, index) => {
      const result = schema.validate(record, this.predicates);
      if (!result.valid) {
        errors.push({ recordIndex: index, record, errors: result.violations });
      }
    });

    return buildReport(records.length, records.length - errors.length, errors);
  }

  /**
   * Validate records from an async source without holding them all in memory
   */
  async validateStream(
    records: AsyncIterable<RecordInput>,
    schema: SchemaDefinition,
    options: StreamValidationOptions = {},
  ): Promise<ValidationReport> {
    assertSchema(schema);
    const { maxErrors = 1000 } = options;

    let total = 0;
    let validCount = 0;
    const errors: RecordError[] = [];

    for await (const record of records) {
      const index = total++;
      const result = schema.validate(record, this.predicates);
      if (result.valid) {
        validCount++;
      } else if (errors.length < maxErrors) {
        errors.push({ recordIndex: index, record, errors: result.violations });
      }
    }

    return buildReport(total, validCount, errors);
  }
}

function assertSchema(schema: unknown): asserts schema is SchemaDefinition {
  if (!(schema instanceof SchemaDefinition)) {
    throw new SchemaDefinitionError("A SchemaDefinition is required for validation");
  }
}

function buildReport(
  total: number,
  validCount: number,
  errors: RecordError[],
): ValidationReport {
  return Object.freeze({
    total,
    validCount,
    invalidCount: total - validCount,
    conformanceRate: total > 0 ? validCount / total : 0,
    errors: Object.freeze(errors),
  });
}
