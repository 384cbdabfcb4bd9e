/**
 * Schema module - field specs, schema definitions and their documents
 */

export * from "./predicates.js";
export * from "./field-rules.js";
export * from "./field-spec.js";
export * from "./schema-definition.js";
export * from "./serializer.js";
export * from "./presets.js";
