import type { Metrics } from "@pricepoint/observability";
import type { CellValue, QueryResult } from "@pricepoint/types";
import Database from "better-sqlite3";
import { assertOpen, type StockDatabase } from "./sqlite";

export type ExecuteOptions = {
  metrics?: Metrics;
};

const failure = (message: string, code: string): QueryResult => {
  return { columns: [], rows: [], changes: 0, error: { message, code } };
};

const toCell = (value: unknown): CellValue => {
  if (
    value === null ||
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "bigint" ||
    Buffer.isBuffer(value)
  ) {
    return value;
  }

  return String(value);
};

const toCells = (row: unknown): CellValue[] => {
  return Array.isArray(row) ? row.map(toCell) : [toCell(row)];
};

/**
 * Runs caller-supplied SQL as-is. Statement shape is not restricted; the
 * store's own parser and constraints decide what succeeds. Failures come
 * back on `error` with empty rows.
 */
export const execute = (
  db: StockDatabase,
  sqlText: string,
  { metrics }: ExecuteOptions = {}
): QueryResult => {
  assertOpen(db);

  const text = sqlText.trim();
  if (text.length === 0) {
    return failure("The supplied SQL string contains no statements", "EMPTY_STATEMENT");
  }

  const stop = metrics?.startTimer("query.execute_ms");
  try {
    const statement = db.prepare(text);

    if (statement.reader) {
      const columns = statement.columns().map((column) => column.name);
      const rows = statement.raw(true).all().map(toCells);
      return { columns, rows, changes: 0 };
    }

    const info = statement.run();
    return { columns: [], rows: [], changes: info.changes };
  } catch (error) {
    if (error instanceof Database.SqliteError) {
      return failure(error.message, error.code);
    }

    // better-sqlite3 reports multiple statements and unbound parameters as RangeError.
    if (error instanceof RangeError) {
      return failure(error.message, "INVALID_STATEMENT");
    }

    throw error;
  } finally {
    stop?.();
  }
};
