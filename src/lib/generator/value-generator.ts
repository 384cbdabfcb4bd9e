/**
 * Single-field value synthesis
 */

import type { Faker } from "@faker-js/faker";
import type { FieldSpec, JsonValue } from "../../types/data-model.js";
import { GenerationError } from "../../utils/errors.js";
import { logger as defaultLogger, type Logger } from "../../utils/logger.js";
import { checkCustomRule, checkFieldValue } from "../schema/field-rules.js";
import {
  BUILTIN_PREDICATES,
  type PredicateLookup,
} from "../schema/predicates.js";
import { isoDate, type RealisticDataProvider } from "./faker-provider.js";

export interface ValueGeneratorOptions {
  /** Source of randomness for generic synthesis */
  faker: Faker;
  provider: RealisticDataProvider;
  locale?: string;
  /** Chance of returning an optional field's default */
  optionalDefaultRate?: number;
  predicates?: PredicateLookup;
  /** Candidates drawn before giving up on a field */
  maxAttempts?: number;
  logger?: Logger;
}

const SYNTHETIC_DATE_WINDOW = {
  from: "2000-01-01T00:00:00.000Z",
  to: "2030-12-31T23:59:59.999Z",
};

const MAX_STRING_LENGTH = 100;
const DEFAULT_MAX_STRING_LENGTH = 50;
const DEFAULT_MAX_NUMBER = 1000;

export class ValueGenerator {
  private readonly faker: Faker;
  private readonly provider: RealisticDataProvider;
  private readonly locale: string;
  private readonly optionalDefaultRate: number;
  readonly predicates: PredicateLookup;
  private readonly maxAttempts: number;
  private readonly logger: Logger;
  private readonly warnedHints = new Set<string>();

  constructor(options: ValueGeneratorOptions) {
    this.faker = options.faker;
    this.provider = options.provider;
    this.locale = options.locale ?? "en";
    this.optionalDefaultRate = options.optionalDefaultRate ?? 0.3;
    this.predicates = options.predicates ?? BUILTIN_PREDICATES;
    this.maxAttempts = options.maxAttempts ?? 50;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Produce one value that passes the field's own rules
   *
   * @throws GenerationError when no conforming candidate turns up
   */
  generate(field: FieldSpec): JsonValue {
    let lastViolations: string[] = [];

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const candidate = this.draw(field);
      lastViolations = this.violations(field, candidate);
      if (lastViolations.length === 0) return candidate;
    }

    throw new GenerationError(
      `Could not generate a conforming value for field '${field.name}' after ${this.maxAttempts} attempts`,
      { field: field.name, violations: lastViolations },
    );
  }

  private violations(field: FieldSpec, candidate: JsonValue): string[] {
    return [
      ...checkFieldValue(field, candidate),
      ...checkCustomRule(field, candidate, this.predicates),
    ];
  }

  private draw(field: FieldSpec): JsonValue {
    if (field.choices) {
      return structuredClone(this.faker.helpers.arrayElement(field.choices));
    }

    if (
      !field.required &&
      field.defaultValue !== null &&
      this.faker.datatype.boolean({ probability: this.optionalDefaultRate })
    ) {
      return structuredClone(field.defaultValue);
    }

    if (field.generationHint !== null) {
      const hinted = this.fromHint(field.generationHint);
      if (hinted !== undefined && this.violations(field, hinted).length === 0) {
        return hinted;
      }
    }

    return this.synthesize(field);
  }

  private fromHint(hint: string): JsonValue | undefined {
    if (!this.provider.hasCategory(hint)) {
      if (!this.warnedHints.has(hint)) {
        this.warnedHints.add(hint);
        this.logger.warn(`Unknown generation hint "${hint}", using generic synthesis`);
      }
      return undefined;
    }
    return this.provider.realisticValue(hint, this.locale);
  }

  private synthesize(field: FieldSpec): JsonValue {
    switch (field.dataType) {
      case "string":
        return this.text(field);
      case "integer":
        return this.integer(field);
      case "float":
        return this.float(field);
      case "boolean":
        return this.faker.datatype.boolean();
      case "date":
        return isoDate(this.faker.date.between(SYNTHETIC_DATE_WINDOW));
      case "datetime":
        return this.faker.date.between(SYNTHETIC_DATE_WINDOW).toISOString();
      case "email":
        return `${this.faker.string.alphanumeric(8).toLowerCase()}@${this.faker.internet.domainName()}`;
      case "phone":
        return this.faker.phone.number({ style: "international" });
      case "url":
        return this.faker.internet.url();
      case "uuid":
        return this.faker.string.uuid();
      case "json":
        return { key: this.faker.lorem.word(), value: this.faker.lorem.sentence() };
      default:
        return unsupportedDataType(field.dataType);
    }
  }

  private text(field: FieldSpec): string {
    const lower = Math.min(
      field.minLength ?? 1,
      field.maxLength ?? Number.POSITIVE_INFINITY,
    );
    const upper = Math.max(
      lower,
      Math.min(field.maxLength ?? DEFAULT_MAX_STRING_LENGTH, MAX_STRING_LENGTH),
    );
    const length = this.faker.number.int({ min: lower, max: upper });

    if (field.pattern !== null) {
      return this.faker.string.alpha(length);
    }

    let words: string[] = [];
    while ([...words.join(" ")].length < length) {
      words = [...words, this.faker.lorem.word()];
    }
    return [...words.join(" ")].slice(0, length).join("");
  }

  private integer(field: FieldSpec): number {
    const min =
      field.minValue !== null
        ? Math.ceil(field.minValue)
        : Math.min(0, Math.floor(field.maxValue ?? 0));
    const max =
      field.maxValue !== null
        ? Math.floor(field.maxValue)
        : Math.max(DEFAULT_MAX_NUMBER, min);
    return this.faker.number.int({ min, max });
  }

  private float(field: FieldSpec): number {
    const min = field.minValue ?? Math.min(0, field.maxValue ?? 0);
    const max = field.maxValue ?? Math.max(DEFAULT_MAX_NUMBER, min);

    // Two decimals: draw whole cents inside the range when there are any
    const lowCents = Math.ceil(min * 100);
    const highCents = Math.floor(max * 100);
    if (lowCents <= highCents) {
      return this.faker.number.int({ min: lowCents, max: highCents }) / 100;
    }
    return this.faker.number.float({ min, max });
  }
}

function unsupportedDataType(dataType: never): never {
  throw new GenerationError(`Unsupported data type: ${String(dataType)}`, {
    dataType: String(dataType),
  });
}
