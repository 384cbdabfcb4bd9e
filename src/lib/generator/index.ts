/**
 * Generator module - schema-driven record synthesis
 */

import type { DataRecord } from "../../types/data-model.js";
import { GenerationError } from "../../utils/errors.js";
import { logger as defaultLogger, type Logger } from "../../utils/logger.js";
import { toNumericSeed } from "../../utils/seed-manager.js";
import type { PredicateLookup } from "../schema/predicates.js";
import type { SchemaDefinition } from "../schema/schema-definition.js";
import {
  FakerProvider,
  createFaker,
  type RealisticDataProvider,
} from "./faker-provider.js";
import { ValueGenerator } from "./value-generator.js";

export * from "./faker-provider.js";
export * from "./value-generator.js";

export interface RecordGeneratorOptions {
  seed?: string | number;
  locale?: string;
  optionalDefaultRate?: number;
  predicates?: PredicateLookup;
  provider?: RealisticDataProvider;
  maxAttempts?: number;
  logger?: Logger;
}

/**
 * Composes per-field values into complete records
 */
export class RecordGenerator {
  private readonly logger: Logger;

  constructor(
    private readonly values: ValueGenerator,
    logger: Logger = defaultLogger,
  ) {
    this.logger = logger;
  }

  /** Predicates consulted for fields with a named validator */
  get predicates(): PredicateLookup {
    return this.values.predicates;
  }

  /**
   * Wire a generator with seeded faker instances
   */
  static create(options: RecordGeneratorOptions = {}): RecordGenerator {
    const seed = options.seed !== undefined ? toNumericSeed(options.seed) : undefined;
    const locale = options.locale ?? "en";
    const logger = options.logger ?? defaultLogger;

    const values = new ValueGenerator({
      faker: createFaker(locale, seed),
      provider: options.provider ?? new FakerProvider({ seed }),
      locale,
      optionalDefaultRate: options.optionalDefaultRate,
      predicates: options.predicates,
      maxAttempts: options.maxAttempts,
      logger,
    });

    logger.debug("Record generator initialized", { seed: options.seed, locale });
    return new RecordGenerator(values, logger);
  }

  /**
   * Generate `count` independent records
   *
   * @throws GenerationError for a negative or fractional count
   */
  generate(schema: SchemaDefinition, count: number): DataRecord[] {
    const records = [...this.iterate(schema, count)];
    this.logger.debug("Generation complete", {
      schema: schema.name,
      generated: records.length,
    });
    return records;
  }

  /**
   * Lazily yield records, one at a time
   */
  *iterate(schema: SchemaDefinition, count: number): Generator<DataRecord> {
    if (!Number.isInteger(count) || count < 0) {
      throw new GenerationError(
        `Record count must be a non-negative integer, got ${count}`,
        { count },
      );
    }

    for (let i = 0; i < count; i++) {
      const record: DataRecord = {};
      for (const field of schema.fields) {
        record[field.name] = this.values.generate(field);
      }
      yield record;
    }
  }
}
