/**
 * Configuration types for Seedbed
 */

import type { RecordFormat } from "./data-model.js";
import type { LogLevel } from "../utils/logger.js";

/**
 * SeedbedConfig - resolved runtime configuration
 */
export interface SeedbedConfig {
  /** Root of the data workspace (schemas/, generated/, fixtures/, temp/) */
  dataDir: string;
  /** Locale handed to the realistic-data provider, e.g. "en" or "zh_CN" */
  locale: string;
  seed?: string | number;
  /** Probability of emitting an optional field's default (0.0-1.0) */
  optionalDefaultRate: number;
  logLevel: LogLevel;
  defaultFormat: RecordFormat;
}

/**
 * Config file section as written by users (JSON or YAML)
 */
export type SeedbedConfigFile = Partial<SeedbedConfig>;

export const DEFAULT_CONFIG: SeedbedConfig = {
  dataDir: "test_data",
  locale: "en",
  optionalDefaultRate: 0.3,
  logLevel: "info",
  defaultFormat: "json",
};
