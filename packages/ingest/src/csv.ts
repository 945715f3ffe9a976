import { readFileSync } from "node:fs";
import { CsvError } from "csv-parse";
import { parse } from "csv-parse/sync";
import { z } from "zod";
import { SourceFormatError, SourceUnavailableError } from "./errors";

export const REQUIRED_COLUMNS = ["Date", "Ticker", "Open", "High", "Low", "Close", "Volume"] as const;

export type SourceColumn = (typeof REQUIRED_COLUMNS)[number];

export type RawStockRow = Partial<Record<SourceColumn, string>>;

const CsvRowsSchema = z.array(z.array(z.string()));

export const readSource = (path: string): string => {
  try {
    return readFileSync(path, "utf8");
  } catch (error) {
    throw new SourceUnavailableError(path, { cause: error });
  }
};

// Extra columns are dropped; short rows leave their trailing fields undefined.
export const parseStockCsv = (text: string): RawStockRow[] => {
  let parsed: unknown;
  try {
    parsed = parse(text, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true
    });
  } catch (error) {
    if (error instanceof CsvError) {
      throw new SourceFormatError(`Malformed CSV: ${error.message}`, [], { cause: error });
    }
    throw error;
  }

  const [header, ...records] = CsvRowsSchema.parse(parsed);
  const columns = (header ?? []).map((column) => column.trim());
  const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
  if (missing.length > 0) {
    throw new SourceFormatError(`Missing required columns: ${missing.join(", ")}`, missing);
  }

  const positions = REQUIRED_COLUMNS.map((column) => [column, columns.indexOf(column)] as const);

  return records.map((values) => {
    const row: RawStockRow = {};
    for (const [column, index] of positions) {
      row[column] = values[index];
    }
    return row;
  });
};
