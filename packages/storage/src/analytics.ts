import {
  IsoDateSchema,
  type PredefinedReport,
  type PriceChange,
  type StockRecord
} from "@pricepoint/types";
import { z } from "zod";
import { InvalidDateError, NoDataForDateError, NoDataForTickerError } from "./errors";
import { closeMoments, sampleStdDev } from "./moments";
import { dateExists, tickerExists, withStoreErrors, type StockDatabase } from "./sqlite";
import {
  COMPLETE_ROW_SQL,
  normalizeTicker,
  NUMERIC_CLOSE_SQL,
  readStockRecords,
  STOCK_COLUMNS,
  STOCKS_TABLE
} from "./stocks";

export const DEFAULT_TOP_VOLUME_DAYS = 5;

const AverageRowSchema = z.object({
  count: z.number(),
  average: z.number().nullable()
});

const PriceChangeRowSchema = z.object({
  date: z.string(),
  close: z.number(),
  previousClose: z.number().nullable()
});

const clampCount = (count: number): number => {
  if (!Number.isFinite(count)) {
    return DEFAULT_TOP_VOLUME_DAYS;
  }

  return Math.max(0, Math.floor(count));
};

const requireIsoDate = (date: string): string => {
  const trimmed = date.trim();
  if (!IsoDateSchema.safeParse(trimmed).success) {
    throw new InvalidDateError(date);
  }
  return trimmed;
};

export const averageClose = (db: StockDatabase, ticker: string): number => {
  const symbol = normalizeTicker(ticker);
  const row = withStoreErrors(db, () =>
    db
      .prepare(`SELECT COUNT(*) AS count, AVG(Close) AS average FROM ${STOCKS_TABLE}
WHERE Ticker = ? AND ${NUMERIC_CLOSE_SQL}`)
      .get(symbol)
  );

  const { count, average } = AverageRowSchema.parse(row);
  if (count === 0 || average === null) {
    throw new NoDataForTickerError(symbol);
  }

  return average;
};

export const topVolumeDays = (
  db: StockDatabase,
  ticker: string,
  n: number = DEFAULT_TOP_VOLUME_DAYS
): StockRecord[] => {
  const rows = withStoreErrors(db, () =>
    db
      .prepare(
        `SELECT ${STOCK_COLUMNS} FROM ${STOCKS_TABLE}
WHERE Ticker = ? AND ${COMPLETE_ROW_SQL}
ORDER BY Volume DESC, Date ASC
LIMIT ?`
      )
      .all(normalizeTicker(ticker), clampCount(n))
  );

  return readStockRecords(rows);
};

export const priceIncreasesOn = (db: StockDatabase, date: string): StockRecord[] => {
  const day = requireIsoDate(date);
  const rows = withStoreErrors(db, () =>
    db
      .prepare(
        `SELECT ${STOCK_COLUMNS} FROM ${STOCKS_TABLE}
WHERE Date = ? AND Close > Open AND ${COMPLETE_ROW_SQL}
ORDER BY Ticker ASC`
      )
      .all(day)
  );

  return readStockRecords(rows);
};

export const volatility = (db: StockDatabase, ticker: string): number => {
  const symbol = normalizeTicker(ticker);
  const stddev = sampleStdDev(closeMoments(db, symbol));
  if (stddev === null) {
    throw new NoDataForTickerError(symbol);
  }

  return stddev;
};

export const priceChanges = (db: StockDatabase, ticker: string): PriceChange[] => {
  const rows = withStoreErrors(db, () =>
    db
      .prepare(
        `SELECT Date AS date, Close AS close, LAG(Close) OVER (ORDER BY Date ASC) AS previousClose
FROM ${STOCKS_TABLE}
WHERE Ticker = ? AND ${NUMERIC_CLOSE_SQL}
ORDER BY Date ASC`
      )
      .all(normalizeTicker(ticker))
  );

  const changes: PriceChange[] = [];
  for (const row of PriceChangeRowSchema.array().parse(rows)) {
    if (row.previousClose === null) {
      continue;
    }

    const change = row.close - row.previousClose;
    changes.push({
      date: row.date,
      close: row.close,
      previousClose: row.previousClose,
      change,
      changePct: row.previousClose === 0 ? null : (change / row.previousClose) * 100
    });
  }

  return changes;
};

export const predefinedReport = (
  db: StockDatabase,
  ticker: string,
  date: string
): PredefinedReport => {
  const symbol = normalizeTicker(ticker);
  const day = requireIsoDate(date);

  if (!tickerExists(db, symbol)) {
    throw new NoDataForTickerError(symbol);
  }

  if (!dateExists(db, day)) {
    throw new NoDataForDateError(day);
  }

  return {
    ticker: symbol,
    date: day,
    averageClose: averageClose(db, symbol),
    topVolumeDays: topVolumeDays(db, symbol, DEFAULT_TOP_VOLUME_DAYS),
    priceIncreases: priceIncreasesOn(db, day),
    volatility: volatility(db, symbol)
  };
};
