/**
 * Configuration loader - supports JSON and YAML files plus environment overrides
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import {
  DEFAULT_CONFIG,
  type SeedbedConfig,
  type SeedbedConfigFile,
} from "../types/config.js";
import { isRecordFormat } from "../types/data-model.js";
import { ConfigError } from "./errors.js";
import { isLogLevel, logger } from "./logger.js";

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: SeedbedConfigFile;
}

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): SeedbedConfigFile {
  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let parsed: unknown;
  try {
    parsed = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const config = coerceConfigSection(parsed ?? {}, filePath);
  logger.debug("Configuration file parsed", { filePath, keys: Object.keys(config) });
  return config;
}

/**
 * Read SEEDBED_* environment variables
 */
export function readEnvConfig(env: NodeJS.ProcessEnv): SeedbedConfigFile {
  const raw: Record<string, unknown> = {};
  if (env.SEEDBED_DATA_DIR) raw.dataDir = env.SEEDBED_DATA_DIR;
  if (env.SEEDBED_LOCALE) raw.locale = env.SEEDBED_LOCALE;
  if (env.SEEDBED_SEED) raw.seed = env.SEEDBED_SEED;
  if (env.SEEDBED_LOG_LEVEL) raw.logLevel = env.SEEDBED_LOG_LEVEL;
  if (env.SEEDBED_FORMAT) raw.defaultFormat = env.SEEDBED_FORMAT;
  if (env.SEEDBED_OPTIONAL_DEFAULT_RATE) {
    raw.optionalDefaultRate = Number(env.SEEDBED_OPTIONAL_DEFAULT_RATE);
  }
  return coerceConfigSection(raw, "environment");
}

/**
 * Load configuration with precedence: overrides > environment > config file > defaults
 *
 * @example
 * const config = loadConfig({ configPath: "seedbed.yaml", overrides: { seed: "ci" } });
 */
export function loadConfig(options: LoadConfigOptions = {}): SeedbedConfig {
  const fromFile = options.configPath ? parseConfigFile(options.configPath) : {};
  const fromEnv = readEnvConfig(options.env ?? {});
  const overrides = options.overrides ?? {};

  const config: SeedbedConfig = {
    ...DEFAULT_CONFIG,
    ...fromFile,
    ...fromEnv,
    ...overrides,
  };

  validateConfig(config);
  return config;
}

/**
 * Validate a resolved configuration
 *
 * @throws ConfigError if a value is out of range
 */
export function validateConfig(config: SeedbedConfig): void {
  if (config.dataDir.trim() === "") {
    throw new ConfigError("dataDir must not be empty");
  }
  if (config.locale.trim() === "") {
    throw new ConfigError("locale must not be empty");
  }
  if (
    !Number.isFinite(config.optionalDefaultRate) ||
    config.optionalDefaultRate < 0 ||
    config.optionalDefaultRate > 1
  ) {
    throw new ConfigError(
      `optionalDefaultRate must be between 0.0 and 1.0, got ${config.optionalDefaultRate}`,
    );
  }
}

function coerceConfigSection(value: unknown, source: string): SeedbedConfigFile {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new ConfigError(`Configuration in ${source} must be a mapping`);
  }

  const section: SeedbedConfigFile = {};
  for (const [key, raw] of Object.entries(value)) {
    switch (key) {
      case "dataDir":
      case "locale":
        section[key] = expectString(raw, key, source);
        break;
      case "seed":
        if (typeof raw !== "string" && typeof raw !== "number") {
          throw new ConfigError(`seed in ${source} must be a string or number`);
        }
        section.seed = raw;
        break;
      case "optionalDefaultRate":
        if (typeof raw !== "number") {
          throw new ConfigError(`optionalDefaultRate in ${source} must be a number`);
        }
        section.optionalDefaultRate = raw;
        break;
      case "logLevel": {
        const level = expectString(raw, key, source);
        if (!isLogLevel(level)) {
          throw new ConfigError(`Unknown log level in ${source}: ${level}`);
        }
        section.logLevel = level;
        break;
      }
      case "defaultFormat": {
        const format = expectString(raw, key, source);
        if (!isRecordFormat(format)) {
          throw new ConfigError(`Unknown record format in ${source}: ${format}`);
        }
        section.defaultFormat = format;
        break;
      }
      default:
        logger.warn(`Ignoring unknown config key in ${source}`, { key });
    }
  }
  return section;
}

function expectString(value: unknown, key: string, source: string): string {
  if (typeof value !== "string") {
    throw new ConfigError(`${key} in ${source} must be a string`);
  }
  return value;
}
