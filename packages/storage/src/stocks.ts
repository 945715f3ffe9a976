import type { StockRecord } from "@pricepoint/types";
import type Database from "better-sqlite3";
import { z } from "zod";

export const STOCKS_TABLE = "stocks";

export const STOCK_COLUMNS = "Date, Ticker, Open, High, Low, Close, Volume";

export const stocksTableDDL = (): string => {
  return `
CREATE TABLE IF NOT EXISTS ${STOCKS_TABLE} (
  Date TEXT,
  Ticker TEXT,
  Open REAL,
  High REAL,
  Low REAL,
  Close REAL,
  Volume INTEGER,
  PRIMARY KEY (Date, Ticker)
)
`;
};

export const stocksIndexDDL = (): string[] => {
  return [
    `CREATE INDEX IF NOT EXISTS idx_ticker ON ${STOCKS_TABLE} (Ticker)`,
    `CREATE INDEX IF NOT EXISTS idx_date ON ${STOCKS_TABLE} (Date)`
  ];
};

const isNumeric = (column: string): string => `typeof(${column}) IN ('integer', 'real')`;

// The table accepts NULL and text in every column, so rows written by ad-hoc
// SQL or other tools can be incomplete. Reads only consider complete rows.
export const NUMERIC_CLOSE_SQL = `typeof(Date) = 'text' AND ${isNumeric("Close")}`;

export const COMPLETE_ROW_SQL = [
  "typeof(Date) = 'text'",
  "typeof(Ticker) = 'text'",
  ...["Open", "High", "Low", "Close", "Volume"].map(isNumeric)
].join(" AND ");

// Column names follow the persisted schema, which other tooling reads directly.
export const StockRowSchema = z.object({
  Date: z.string(),
  Ticker: z.string(),
  Open: z.number(),
  High: z.number(),
  Low: z.number(),
  Close: z.number(),
  Volume: z.number()
});

export type StockRow = z.infer<typeof StockRowSchema>;

export type InsertOutcome = "inserted" | "duplicate";

export const normalizeTicker = (ticker: string): string => {
  return ticker.trim().toUpperCase();
};

export const toStockRow = (record: StockRecord): StockRow => {
  return {
    Date: record.date,
    Ticker: record.ticker,
    Open: record.open,
    High: record.high,
    Low: record.low,
    Close: record.close,
    Volume: record.volume
  };
};

export const fromStockRow = (row: StockRow): StockRecord => {
  return {
    date: row.Date,
    ticker: row.Ticker,
    open: row.Open,
    high: row.High,
    low: row.Low,
    close: row.Close,
    volume: row.Volume
  };
};

export const readStockRecords = (rows: unknown[]): StockRecord[] => {
  return StockRowSchema.array().parse(rows).map(fromStockRow);
};

// Appends in one transaction. A (Date, Ticker) collision leaves the stored row untouched.
export const insertStockRecords = (
  db: Database.Database,
  records: StockRecord[]
): InsertOutcome[] => {
  const statement = db.prepare(`
INSERT INTO ${STOCKS_TABLE} (${STOCK_COLUMNS})
VALUES (@Date, @Ticker, @Open, @High, @Low, @Close, @Volume)
ON CONFLICT (Date, Ticker) DO NOTHING
`);

  const insertAll = db.transaction((rows: StockRow[]): InsertOutcome[] =>
    rows.map((row) => (statement.run(row).changes > 0 ? "inserted" : "duplicate"))
  );

  return insertAll(records.map(toStockRow));
};
