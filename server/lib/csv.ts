/**
 * JSON → CSV flattening for Massive responses
 *
 * Rules:
 * - `{ results: [...] }` envelopes are unwrapped; arrays are used as-is;
 *   anything else becomes a single record
 * - non-object records become `{ value: record }`
 * - nested objects flatten to `parent_child` columns
 * - arrays are written as JSON text
 * - columns are the union of keys in first-seen order
 *
 * @module server/lib/csv
 */

import { stringify } from "csv-stringify/sync";
import { isJsonObject, type JsonObject, type JsonValue } from "./json.js";

type FlatValue = string | number | boolean | null;
type FlatRecord = Record<string, FlatValue>;

function extractRecords(data: JsonValue): JsonValue[] {
  if (isJsonObject(data) && "results" in data) {
    const results = data.results;
    return Array.isArray(results) ? results : [results];
  }
  if (Array.isArray(data)) return data;
  return [data];
}

export function flattenRecord(record: JsonObject, parentKey = "", sep = "_"): FlatRecord {
  const flat: FlatRecord = {};
  for (const [key, value] of Object.entries(record)) {
    const column = parentKey ? `${parentKey}${sep}${key}` : key;
    if (Array.isArray(value)) {
      flat[column] = JSON.stringify(value);
    } else if (isJsonObject(value)) {
      Object.assign(flat, flattenRecord(value, column, sep));
    } else {
      flat[column] = value;
    }
  }
  return flat;
}

export function jsonToCsv(input: string | JsonValue): string {
  const data: JsonValue = typeof input === "string" ? JSON.parse(input) : input;

  const rows = extractRecords(data).map((record) =>
    flattenRecord(isJsonObject(record) ? record : { value: record })
  );
  if (rows.length === 0) return "";

  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  return stringify(rows, {
    header: true,
    columns,
    record_delimiter: "\n",
    cast: { boolean: (value) => String(value) },
  });
}
