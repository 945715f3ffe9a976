import type { StockRecord } from "@pricepoint/types";
import { connect, ensureSchema, type StockDatabase } from "../src/sqlite";
import { insertStockRecords } from "../src/stocks";

export const openMemoryStore = (): StockDatabase => {
  const db = connect({ path: ":memory:" });
  ensureSchema(db);
  return db;
};

export const buildRecord = (opts: Partial<StockRecord> = {}): StockRecord => {
  return {
    date: "2023-01-02",
    ticker: "AAPL",
    open: 100,
    high: 105,
    low: 99,
    close: 104,
    volume: 1_000,
    ...opts
  };
};

export const seed = (db: StockDatabase, records: Partial<StockRecord>[]): void => {
  insertStockRecords(db, records.map(buildRecord));
};
