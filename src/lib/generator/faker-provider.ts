/**
 * Realistic-data provider backed by @faker-js/faker
 */

import {
  Faker,
  allLocales,
  base,
  en,
  type LocaleDefinition,
} from "@faker-js/faker";
import type { JsonValue } from "../../types/data-model.js";
import { logger } from "../../utils/logger.js";

/**
 * Produces plausible domain values (names, emails, ...) by category and locale
 */
export interface RealisticDataProvider {
  /** Returns undefined when the category is unknown */
  realisticValue(category: string, locale: string): JsonValue | undefined;
  hasCategory(category: string): boolean;
}

// Fixed window so seeded runs stay repeatable from day to day
const DATE_WINDOW = {
  from: "2000-01-01T00:00:00.000Z",
  to: "2025-01-01T00:00:00.000Z",
};
const REFERENCE_YEAR = {
  from: "2025-01-01T00:00:00.000Z",
  to: "2025-12-31T23:59:59.999Z",
};

export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

type CategoryGenerator = (faker: Faker) => JsonValue;

const CATEGORIES: ReadonlyMap<string, CategoryGenerator> = new Map<
  string,
  CategoryGenerator
>([
  ["uuid4", (f) => f.string.uuid()],
  ["user_name", (f) => f.internet.username()],
  ["email", (f) => f.internet.email()],
  ["password", (f) => f.internet.password({ length: 12 })],
  ["first_name", (f) => f.person.firstName()],
  ["last_name", (f) => f.person.lastName()],
  ["name", (f) => f.person.fullName()],
  ["phone_number", (f) => f.phone.number()],
  ["address", (f) => f.location.streetAddress({ useFullAddress: true })],
  ["city", (f) => f.location.city()],
  ["country", (f) => f.location.country()],
  ["company", (f) => f.company.name()],
  ["catch_phrase", (f) => f.company.catchPhrase()],
  ["job", (f) => f.person.jobTitle()],
  ["word", (f) => f.lorem.word()],
  ["sentence", (f) => f.lorem.sentence()],
  ["text", (f) => f.lorem.paragraph()],
  ["url", (f) => f.internet.url()],
  ["ipv4", (f) => f.internet.ipv4()],
  ["ean13", (f) => f.string.numeric(13)],
  ["date", (f) => isoDate(f.date.between(DATE_WINDOW))],
  [
    "date_of_birth",
    (f) => isoDate(f.date.birthdate({ refDate: DATE_WINDOW.to })),
  ],
  ["date_time", (f) => f.date.between(DATE_WINDOW).toISOString()],
  ["date_time_this_year", (f) => f.date.between(REFERENCE_YEAR).toISOString()],
  ["boolean", (f) => f.datatype.boolean()],
]);

function findLocale(locale: string): LocaleDefinition | undefined {
  return Object.entries(allLocales).find(([name]) => name === locale)?.[1];
}

/**
 * Create a standalone Faker instance for a locale, seeded when a seed is given.
 * Unknown locales fall back to "en".
 */
export function createFaker(locale: string, seed?: number): Faker {
  const definition = findLocale(locale);
  if (!definition) {
    logger.warn(`Unknown faker locale "${locale}", falling back to "en"`);
  }

  const faker = new Faker({
    locale: definition ? [definition, en, base] : [en, base],
  });
  if (seed !== undefined) {
    faker.seed(seed);
  }
  return faker;
}

export class FakerProvider implements RealisticDataProvider {
  private readonly instances = new Map<string, Faker>();
  private readonly seed?: number;

  constructor(options: { seed?: number } = {}) {
    this.seed = options.seed;
  }

  hasCategory(category: string): boolean {
    return CATEGORIES.has(category);
  }

  categories(): string[] {
    return [...CATEGORIES.keys()];
  }

  realisticValue(category: string, locale: string): JsonValue | undefined {
    const generate = CATEGORIES.get(category);
    if (!generate) return undefined;
    return generate(this.forLocale(locale));
  }

  private forLocale(locale: string): Faker {
    let faker = this.instances.get(locale);
    if (!faker) {
      faker = createFaker(locale, this.seed);
      this.instances.set(locale, faker);
    }
    return faker;
  }
}
