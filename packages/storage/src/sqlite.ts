import { errorMessage, type Logger } from "@pricepoint/observability";
import Database from "better-sqlite3";
import { z } from "zod";
import { StoreQueryError, StoreUnavailableError } from "./errors";
import { normalizeTicker, STOCKS_TABLE, stocksIndexDDL, stocksTableDDL } from "./stocks";

export type StockDatabase = Database.Database;

export type StoreOptions = {
  path: string;
  readonly?: boolean;
  logger?: Logger;
};

export const connect = ({ path, readonly = false, logger }: StoreOptions): StockDatabase => {
  let db: StockDatabase;
  try {
    db = new Database(path, { readonly, fileMustExist: readonly });
  } catch (error) {
    logger?.error("failed to open store", { db_path: path, error: errorMessage(error) });
    throw new StoreUnavailableError(`Cannot open store at ${path}: ${errorMessage(error)}`, {
      cause: error
    });
  }

  logger?.info("store opened", { db_path: path, readonly });
  return db;
};

export const assertOpen = (db: StockDatabase): void => {
  if (!db.open) {
    throw new StoreUnavailableError(`Store at ${db.name} is closed`);
  }
};

const UNAVAILABLE_CODES = [
  "SQLITE_CANTOPEN",
  "SQLITE_IOERR",
  "SQLITE_NOTADB",
  "SQLITE_CORRUPT",
  "SQLITE_FULL"
];

// Extended codes such as SQLITE_IOERR_READ share their primary code's prefix.
export const isUnavailableCode = (code: string): boolean => {
  return UNAVAILABLE_CODES.some((prefix) => code === prefix || code.startsWith(`${prefix}_`));
};

// I/O and connection failures mean the store is gone; other SQLite errors
// (missing table, read-only file, constraint) leave the session usable.
export const withStoreErrors = <T>(db: StockDatabase, task: () => T): T => {
  assertOpen(db);
  try {
    return task();
  } catch (error) {
    if (error instanceof Database.SqliteError) {
      if (isUnavailableCode(error.code)) {
        throw new StoreUnavailableError(`Store at ${db.name} failed: ${error.message}`, {
          cause: error
        });
      }
      throw new StoreQueryError(error.message, error.code, { cause: error });
    }
    throw error;
  }
};

export const ensureSchema = (db: StockDatabase, logger?: Logger): void => {
  withStoreErrors(db, () => {
    const apply = db.transaction(() => {
      db.exec(stocksTableDDL());
      for (const ddl of stocksIndexDDL()) {
        db.exec(ddl);
      }
    });
    apply();
  });

  logger?.info("schema ensured", { db_path: db.name, table: STOCKS_TABLE });
};

export const close = (db: StockDatabase, logger?: Logger): void => {
  if (!db.open) {
    return;
  }

  db.close();
  logger?.info("store closed", { db_path: db.name });
};

export const withStore = async <T>(
  options: StoreOptions,
  task: (db: StockDatabase) => T | Promise<T>
): Promise<T> => {
  const db = connect(options);
  try {
    ensureSchema(db, options.logger);
    return await task(db);
  } finally {
    close(db, options.logger);
  }
};

const CountSchema = z.object({ count: z.number() });

const TickerRowSchema = z.object({ ticker: z.string() });

export const tickerExists = (db: StockDatabase, ticker: string): boolean => {
  return withStoreErrors(db, () => {
    const row = db
      .prepare(`SELECT 1 AS found FROM ${STOCKS_TABLE} WHERE Ticker = ? LIMIT 1`)
      .get(normalizeTicker(ticker));
    return row !== undefined;
  });
};

export const dateExists = (db: StockDatabase, date: string): boolean => {
  return withStoreErrors(db, () => {
    const row = db
      .prepare(`SELECT 1 AS found FROM ${STOCKS_TABLE} WHERE Date = ? LIMIT 1`)
      .get(date.trim());
    return row !== undefined;
  });
};

export const listTickers = (db: StockDatabase): string[] => {
  return withStoreErrors(db, () => {
    const rows = db
      .prepare(`SELECT DISTINCT Ticker AS ticker FROM ${STOCKS_TABLE} ORDER BY Ticker ASC`)
      .all();
    return TickerRowSchema.array()
      .parse(rows)
      .map((row) => row.ticker);
  });
};

export const countRecords = (db: StockDatabase): number => {
  return withStoreErrors(db, () => {
    const row = db.prepare(`SELECT COUNT(*) AS count FROM ${STOCKS_TABLE}`).get();
    return CountSchema.parse(row).count;
  });
};
