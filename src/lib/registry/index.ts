/**
 * Registry module - named schemas, generation and validation entry points
 */

import path from "path";
import type { SeedbedConfig } from "../../types/config.js";
import {
  failure,
  success,
  type DataRecord,
  type Outcome,
  type RecordFormat,
  type RecordInput,
  type ValidationReport,
} from "../../types/data-model.js";
import { SchemaNotFoundError, toSeedbedError, type SeedbedError } from "../../utils/errors.js";
import {
  createLogger,
  logger as defaultLogger,
  type Logger,
} from "../../utils/logger.js";
import { detectFormat, FileRecordStore } from "../emitter/file-record-store.js";
import { FORMAT_EXTENSIONS, type RecordStore } from "../emitter/types.js";
import { RecordGenerator } from "../generator/index.js";
import { BUILTIN_PREDICATES, type PredicateLookup } from "../schema/predicates.js";
import type { SchemaDefinition } from "../schema/schema-definition.js";
import { fromDocument, toDocument } from "../schema/serializer.js";
import { RecordValidator } from "../validator/index.js";
import { DataWorkspace } from "../workspace/index.js";
import { FileSchemaStore, type SchemaStore } from "./schema-store.js";

export * from "./schema-store.js";

export interface SchemaRegistryOptions {
  schemaStore: SchemaStore;
  recordStore: RecordStore;
  generator: RecordGenerator;
  /** Defaults to a validator sharing the generator's predicates */
  validator?: RecordValidator;
  /** Directory that receives generated record files */
  outputDir: string;
  /** Format used by generateAndStore when none is given */
  defaultFormat?: RecordFormat;
  logger?: Logger;
  clock?: () => Date;
}

export interface WorkspaceRegistryOptions {
  /** Defaults to a logger at the configured level */
  logger?: Logger;
  predicates?: PredicateLookup;
}

export interface LoadRecordsOptions {
  /** Inferred from the file extension when omitted */
  format?: RecordFormat;
  cacheKey?: string;
}

export type RegistryOutcome<T> = Outcome<T, SeedbedError>;

/**
 * Owns the schema cache and routes every operation through it
 */
export class SchemaRegistry {
  private readonly schemas = new Map<string, SchemaDefinition>();
  private readonly dataCache = new Map<string, DataRecord[]>();
  private readonly schemaStore: SchemaStore;
  private readonly recordStore: RecordStore;
  private readonly generator: RecordGenerator;
  private readonly validator: RecordValidator;
  private readonly outputDir: string;
  private readonly defaultFormat: RecordFormat;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: SchemaRegistryOptions) {
    this.schemaStore = options.schemaStore;
    this.recordStore = options.recordStore;
    this.generator = options.generator;
    this.validator =
      options.validator ?? new RecordValidator(options.generator.predicates);
    this.outputDir = options.outputDir;
    this.defaultFormat = options.defaultFormat ?? "json";
    this.logger = options.logger ?? defaultLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Persist the schema document, then cache it; last write wins
   */
  async register(schema: SchemaDefinition): Promise<RegistryOutcome<SchemaDefinition>> {
    try {
      await this.schemaStore.write(toDocument(schema));
    } catch (error) {
      this.logger.error("Failed to register schema", { schema: schema.name, error });
      return failure(toSeedbedError(error));
    }

    this.schemas.set(schema.name, schema);
    this.logger.info("Registered schema", {
      schema: schema.name,
      fields: schema.fields.length,
    });
    return success(schema);
  }

  /**
   * Resolve a schema from the cache, falling back to the store
   */
  async load(name: string): Promise<RegistryOutcome<SchemaDefinition>> {
    const cached = this.schemas.get(name);
    if (cached) return success(cached);

    try {
      const document = await this.schemaStore.read(name);
      if (document === undefined) {
        return failure(new SchemaNotFoundError(name));
      }
      const schema = fromDocument(document);
      this.schemas.set(name, schema);
      this.logger.debug("Loaded schema from store", { schema: name });
      return success(schema);
    } catch (error) {
      return failure(toSeedbedError(error));
    }
  }

  async generate(name: string, count: number): Promise<RegistryOutcome<DataRecord[]>> {
    const resolved = await this.load(name);
    if (resolved.status === "error") return resolved;

    try {
      return success(this.generator.generate(resolved.value, count));
    } catch (error) {
      return failure(toSeedbedError(error));
    }
  }

  /**
   * Generate records and save them under a timestamped file name
   * @returns the path of the written file
   */
  async generateAndStore(
    name: string,
    count: number,
    format: RecordFormat = this.defaultFormat,
  ): Promise<RegistryOutcome<string>> {
    const generated = await this.generate(name, count);
    if (generated.status === "error") return generated;

    const fileName = `${name}_${formatTimestamp(this.clock())}${FORMAT_EXTENSIONS[format]}`;
    const destination = path.join(this.outputDir, fileName);
    try {
      return success(await this.recordStore.save(generated.value, destination, format));
    } catch (error) {
      return failure(toSeedbedError(error));
    }
  }

  async validate(
    records: readonly RecordInput[],
    name: string,
  ): Promise<RegistryOutcome<ValidationReport>> {
    const resolved = await this.load(name);
    if (resolved.status === "error") return resolved;

    const report = this.validator.validateMany(records, resolved.value);
    this.logger.info("Validated records", {
      schema: name,
      total: report.total,
      invalid: report.invalidCount,
    });
    return success(report);
  }

  /**
   * Load records through the record store; non-empty results are cached
   * under `cacheKey` when one is given
   */
  async loadRecords(
    source: string,
    options: LoadRecordsOptions = {},
  ): Promise<RegistryOutcome<DataRecord[]>> {
    const { cacheKey } = options;
    if (cacheKey !== undefined) {
      const cached = this.dataCache.get(cacheKey);
      if (cached) return success(cached);
    }

    try {
      const format = options.format ?? detectFormat(source);
      const records = await this.recordStore.load(source, format);
      if (cacheKey !== undefined && records.length > 0) {
        this.dataCache.set(cacheKey, records);
      }
      return success(records);
    } catch (error) {
      return failure(toSeedbedError(error));
    }
  }

  /**
   * Registered and persisted schema names, sorted
   */
  async names(): Promise<string[]> {
    const persisted = await this.schemaStore.list();
    return [...new Set([...this.schemas.keys(), ...persisted])].sort();
  }

  cacheSize(): number {
    return this.dataCache.size;
  }
}

/**
 * Compose a registry over a file-backed data workspace
 */
export async function createWorkspaceRegistry(
  config: SeedbedConfig,
  options: WorkspaceRegistryOptions = {},
): Promise<SchemaRegistry> {
  const logger = options.logger ?? createLogger({ level: config.logLevel });
  const predicates = options.predicates ?? BUILTIN_PREDICATES;

  const workspace = new DataWorkspace(config.dataDir, logger);
  await workspace.ensure();

  return new SchemaRegistry({
    schemaStore: new FileSchemaStore(workspace.schemasDir),
    recordStore: new FileRecordStore(logger),
    generator: RecordGenerator.create({
      seed: config.seed,
      locale: config.locale,
      optionalDefaultRate: config.optionalDefaultRate,
      predicates,
      logger,
    }),
    validator: new RecordValidator(predicates),
    outputDir: workspace.generatedDir,
    defaultFormat: config.defaultFormat,
    logger,
  });
}

/**
 * Local time as YYYYMMDD_HHmmss
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
