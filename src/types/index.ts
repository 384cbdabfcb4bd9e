// Core re-exports for the Seedbed type system

export * from "./data-model.js";
export * from "./config.js";
