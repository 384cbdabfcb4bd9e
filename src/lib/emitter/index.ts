/**
 * Emitter module - record persistence in interchangeable formats
 */
export * from "./types.js";
export * from "./json-writer.js";
export * from "./ndjson-writer.js";
export * from "./csv-codec.js";
export * from "./file-record-store.js";
