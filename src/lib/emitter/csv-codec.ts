/**
 * Tabular (CSV) encoding of records using PapaParse
 *
 * Cells carry non-string values as JSON. Strings are written raw unless they
 * are empty or would themselves parse as JSON, in which case they are quoted,
 * so every value reads back with its original type. An empty cell is an
 * absent key.
 */

import Papa from "papaparse";
import type { DataRecord, JsonValue } from "../../types/data-model.js";
import { isJsonValue } from "../../types/data-model.js";

export function encodeCell(value: JsonValue): string {
  if (typeof value !== "string") return JSON.stringify(value);
  return value === "" || parsesAsJson(value) ? JSON.stringify(value) : value;
}

export function decodeCell(cell: string): JsonValue | undefined {
  if (cell === "") return undefined;
  const parsed = tryParseJson(cell);
  return parsed === undefined ? cell : parsed;
}

/**
 * Columns are the union of record keys in first-seen order
 */
export function recordColumns(records: readonly DataRecord[]): string[] {
  const columns = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) columns.add(key);
  }
  return [...columns];
}

export function encodeCsv(records: readonly DataRecord[]): string {
  const fields = recordColumns(records);
  const data = records.map((record) =>
    fields.map((field) => {
      const value = record[field];
      return value === undefined ? "" : encodeCell(value);
    }),
  );
  return Papa.unparse({ fields, data }, { newline: "\n" });
}

export function decodeCsv(text: string): DataRecord[] {
  const result = Papa.parse<Record<string, string | undefined>>(text, {
    header: true,
    delimiter: ",",
    skipEmptyLines: true,
    dynamicTyping: false,
  });

  if (result.errors.length > 0) {
    const first = result.errors[0];
    throw new Error(
      `Malformed CSV at row ${first?.row ?? "?"}: ${first?.message ?? "unknown error"}`,
    );
  }

  return result.data.map((row) => {
    const record: DataRecord = {};
    for (const [key, cell] of Object.entries(row)) {
      if (cell === undefined) continue;
      const value = decodeCell(cell);
      if (value !== undefined) record[key] = value;
    }
    return record;
  });
}

function parsesAsJson(text: string): boolean {
  return tryParseJson(text) !== undefined;
}

function tryParseJson(text: string): JsonValue | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonValue(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}
