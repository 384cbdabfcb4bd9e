/**
 * Named field predicates
 * Custom validation is referenced by name so schema documents stay declarative
 */

import { SchemaDefinitionError } from "../../utils/errors.js";

export type FieldPredicate = (value: unknown) => boolean;

export interface PredicateLookup {
  get(name: string): FieldPredicate | undefined;
}

const emailRegex = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;
const urlRegex = /^https?:\/\/[\w.-]+\.[a-zA-Z]{2,}/;
const uuidRegex =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const BUILTIN_ENTRIES: ReadonlyArray<readonly [string, FieldPredicate]> = [
  ["email", (v) => typeof v === "string" && emailRegex.test(v)],
  [
    "phone",
    (v) => {
      if (typeof v !== "string") return false;
      // Accepts +1-555-123-4567, (555) 123-4567, 555.123.4567
      const cleaned = v.replace(/[\s.\-()]/g, "");
      return /^\+?\d{7,15}$/.test(cleaned);
    },
  ],
  ["url", (v) => typeof v === "string" && urlRegex.test(v)],
  ["uuid", (v) => typeof v === "string" && uuidRegex.test(v)],
  ["non_blank", (v) => typeof v === "string" && v.trim() !== ""],
];

const builtinPredicates: ReadonlyMap<string, FieldPredicate> = new Map(
  BUILTIN_ENTRIES,
);

/**
 * Read-only lookup over the built-in predicates
 */
export const BUILTIN_PREDICATES: PredicateLookup = {
  get: (name) => builtinPredicates.get(name),
};

/**
 * Registry of predicates, seeded with the built-ins
 */
export class PredicateRegistry implements PredicateLookup {
  private predicates = new Map<string, FieldPredicate>(builtinPredicates);

  register(name: string, predicate: FieldPredicate): this {
    if (name.trim() === "") {
      throw new SchemaDefinitionError("Predicate name must not be empty");
    }
    this.predicates.set(name, predicate);
    return this;
  }

  get(name: string): FieldPredicate | undefined {
    return this.predicates.get(name);
  }

  has(name: string): boolean {
    return this.predicates.has(name);
  }

  names(): string[] {
    return [...this.predicates.keys()].sort();
  }
}
