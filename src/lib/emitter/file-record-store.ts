/**
 * File-backed record store
 *
 * Writes go to a temp file beside the destination and are renamed into place,
 * so a failed save leaves no partial output behind.
 */

import { createReadStream, createWriteStream } from "fs";
import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import path from "path";
import * as readline from "readline";
import { Readable, pipeline } from "stream";
import { promisify } from "util";
import { parse as parseYaml, stringify as stringifyYaml } from "yaml";
import {
  isJsonObject,
  type DataRecord,
  type RecordFormat,
} from "../../types/data-model.js";
import { PersistenceError } from "../../utils/errors.js";
import { logger as defaultLogger, type Logger } from "../../utils/logger.js";
import { decodeCsv, encodeCsv } from "./csv-codec.js";
import { createJSONWriter } from "./json-writer.js";
import { createNDJSONWriter } from "./ndjson-writer.js";
import type { RecordStore } from "./types.js";

const pipelineAsync = promisify(pipeline);

/**
 * Infer a record format from a file extension
 *
 * @throws PersistenceError for unsupported extensions
 */
export function detectFormat(filePath: string): RecordFormat {
  switch (path.extname(filePath).toLowerCase()) {
    case ".json":
      return "json";
    case ".ndjson":
    case ".jsonl":
      return "ndjson";
    case ".csv":
      return "csv";
    case ".yaml":
    case ".yml":
      return "yaml";
    default:
      throw new PersistenceError(`Unsupported record file format: ${filePath}`, {
        filePath,
      });
  }
}

/**
 * Yield records from an NDJSON file, one line at a time
 */
export async function* readNdjsonRecords(
  filePath: string,
): AsyncGenerator<DataRecord> {
  const input = createReadStream(filePath, { encoding: "utf8" });
  const rl = readline.createInterface({ input, crlfDelay: Infinity });

  let lineNumber = 0;
  for await (const line of rl) {
    lineNumber++;
    const trimmed = line.trim();
    if (trimmed === "") continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (error) {
      throw new PersistenceError(
        `Failed to parse NDJSON line ${lineNumber} of ${filePath}`,
        { filePath, line: lineNumber },
        { cause: error },
      );
    }
    yield expectRecord(parsed, filePath);
  }
}

export class FileRecordStore implements RecordStore {
  constructor(private readonly logger: Logger = defaultLogger) {}

  async save(
    records: readonly DataRecord[],
    destination: string,
    format: RecordFormat,
  ): Promise<string> {
    const tempPath = `${destination}.${process.pid}.${Date.now()}.tmp`;

    try {
      await mkdir(path.dirname(destination), { recursive: true });
    } catch (error) {
      throw new PersistenceError(
        `Failed to create output directory for ${destination}`,
        { destination },
        { cause: error },
      );
    }

    try {
      await this.write(records, tempPath, format);
      await rename(tempPath, destination);
    } catch (error) {
      await rm(tempPath, { force: true });
      throw new PersistenceError(
        `Failed to save ${records.length} records to ${destination}`,
        { destination, format },
        { cause: error },
      );
    }

    this.logger.info("Saved records", { destination, format, count: records.length });
    return destination;
  }

  async load(source: string, format: RecordFormat): Promise<DataRecord[]> {
    try {
      if (format === "ndjson") {
        const records: DataRecord[] = [];
        for await (const record of readNdjsonRecords(source)) {
          records.push(record);
        }
        return records;
      }

      const content = await readFile(source, "utf-8");
      switch (format) {
        case "json":
          return toRecordList(JSON.parse(content), source);
        case "yaml":
          return toRecordList(parseYaml(content) ?? [], source);
        case "csv":
          return decodeCsv(content);
      }
    } catch (error) {
      if (error instanceof PersistenceError) throw error;
      throw new PersistenceError(
        `Failed to load ${format} records from ${source}`,
        { source, format },
        { cause: error },
      );
    }
  }

  private async write(
    records: readonly DataRecord[],
    filePath: string,
    format: RecordFormat,
  ): Promise<void> {
    switch (format) {
      case "json":
        await pipelineAsync(
          Readable.from(records),
          createJSONWriter(),
          createWriteStream(filePath),
        );
        return;
      case "ndjson":
        await pipelineAsync(
          Readable.from(records),
          createNDJSONWriter(),
          createWriteStream(filePath),
        );
        return;
      case "csv":
        await writeFile(filePath, encodeCsv(records), "utf-8");
        return;
      case "yaml":
        await writeFile(filePath, stringifyYaml(records), "utf-8");
        return;
    }
  }
}

/**
 * A document is either a list of records or a single record
 */
function toRecordList(document: unknown, source: string): DataRecord[] {
  if (Array.isArray(document)) {
    return document.map((item) => expectRecord(item, source));
  }
  return [expectRecord(document, source)];
}

function expectRecord(value: unknown, source: string): DataRecord {
  if (!isJsonObject(value)) {
    throw new PersistenceError(`Expected a record object in ${source}`, { source });
  }
  return value;
}
