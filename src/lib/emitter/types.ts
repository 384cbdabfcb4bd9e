/**
 * Emitter module types
 */

import type { DataRecord, RecordFormat } from "../../types/data-model.js";

/**
 * A place to persist and reload sequences of records, keyed by format
 */
export interface RecordStore {
  /**
   * Persist all records or nothing
   * @returns the location the records were written to
   */
  save(
    records: readonly DataRecord[],
    destination: string,
    format: RecordFormat,
  ): Promise<string>;
  load(source: string, format: RecordFormat): Promise<DataRecord[]>;
}

export const FORMAT_EXTENSIONS: Readonly<Record<RecordFormat, string>> = {
  json: ".json",
  ndjson: ".ndjson",
  csv: ".csv",
  yaml: ".yaml",
};
