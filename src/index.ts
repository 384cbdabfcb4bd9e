/**
 * Seedbed: schema-driven test data generation and validation
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Modules
export * from "./lib/schema/index.js";
export * from "./lib/generator/index.js";
export * from "./lib/validator/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/workspace/index.js";
export * from "./lib/registry/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/config-loader.js";
export * from "./utils/seed-manager.js";
