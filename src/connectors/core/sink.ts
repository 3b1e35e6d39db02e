import * as fs from "node:fs";
import * as path from "node:path";
import Papa from "papaparse";
import type { ItemRecord, JsonValue, Sink } from "./types.js";

export interface CsvSinkOptions {
  delimiter?: string;
}

/**
 * Append-only CSV file with a fixed column schema.
 *
 * Each append opens, writes and closes the file, so a crash right after
 * an append leaves complete rows on disk.
 */
export class CsvSink implements Sink {
  readonly filePath: string;
  readonly columns: readonly string[];
  private readonly delimiter: string;

  constructor(
    filePath: string,
    columns: readonly string[],
    opts: CsvSinkOptions = {},
  ) {
    if (columns.length === 0) {
      throw new Error("CsvSink needs at least one column");
    }
    this.filePath = filePath;
    this.columns = [...columns];
    this.delimiter = opts.delimiter ?? ",";
  }

  async initialize(cursor: number): Promise<boolean> {
    if (cursor !== 0) return false;
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.writeFileSync(this.filePath, this.encode([[...this.columns]]));
    return true;
  }

  async append(batch: readonly ItemRecord[]): Promise<void> {
    if (batch.length === 0) return;
    const rows = batch.map((record) =>
      this.columns.map((column) => formatCell(readField(record, column))),
    );
    fs.appendFileSync(this.filePath, this.encode(rows));
  }

  private encode(rows: string[][]): string {
    const body = Papa.unparse(rows, {
      delimiter: this.delimiter,
      newline: "\n",
      header: false,
    });
    return `${body}\n`;
  }
}

/** Reads a field, yielding null for fields the record does not carry. */
export function readField(record: ItemRecord, field: string): JsonValue {
  if (!Object.prototype.hasOwnProperty.call(record, field)) return null;
  return record[field] ?? null;
}

export function formatCell(value: JsonValue): string {
  if (value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return JSON.stringify(value);
}

export function createSink(
  filePath: string,
  columns: readonly string[],
  opts?: CsvSinkOptions,
): Sink {
  return new CsvSink(filePath, columns, opts);
}
