import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import Database from "better-sqlite3";
import { afterEach, describe, expect, it } from "vitest";
import { execute } from "../src/adhoc";
import { StoreQueryError, StoreUnavailableError } from "../src/errors";
import {
  close,
  connect,
  countRecords,
  dateExists,
  ensureSchema,
  isUnavailableCode,
  listTickers,
  tickerExists,
  withStore,
  withStoreErrors,
  type StockDatabase
} from "../src/sqlite";
import { openMemoryStore, seed } from "./helpers";

const tempDirs: string[] = [];

const makeTempDir = (): string => {
  const dir = mkdtempSync(join(tmpdir(), "pricepoint-store-"));
  tempDirs.push(dir);
  return dir;
};

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

describe("schema management", () => {
  it("creates the stocks table with its composite key and indexes", () => {
    const db = openMemoryStore();

    const columns = db
      .prepare("SELECT name, type, pk FROM pragma_table_info('stocks') ORDER BY cid")
      .all();
    expect(columns).toEqual([
      { name: "Date", type: "TEXT", pk: 1 },
      { name: "Ticker", type: "TEXT", pk: 2 },
      { name: "Open", type: "REAL", pk: 0 },
      { name: "High", type: "REAL", pk: 0 },
      { name: "Low", type: "REAL", pk: 0 },
      { name: "Close", type: "REAL", pk: 0 },
      { name: "Volume", type: "INTEGER", pk: 0 }
    ]);

    const indexes = db
      .prepare(
        "SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = 'stocks' AND name LIKE 'idx_%' ORDER BY name"
      )
      .all();
    expect(indexes).toEqual([{ name: "idx_date" }, { name: "idx_ticker" }]);
    close(db);
  });

  it("is a no-op when the schema already exists", () => {
    const db = openMemoryStore();
    seed(db, [{ ticker: "MSFT" }]);

    expect(() => ensureSchema(db)).not.toThrow();
    expect(countRecords(db)).toBe(1);
    close(db);
  });
});

describe("connection lifecycle", () => {
  it("reports an unreachable store as StoreUnavailableError", () => {
    const missing = join(makeTempDir(), "no-such-dir", "stocks.db");
    expect(() => connect({ path: missing })).toThrow(StoreUnavailableError);
  });

  it("rejects operations on a closed handle", () => {
    const db = openMemoryStore();
    close(db);
    close(db);

    expect(() => countRecords(db)).toThrow(StoreUnavailableError);
    expect(() => ensureSchema(db)).toThrow(StoreUnavailableError);
  });

  it("withStore persists work and closes the handle on success", async () => {
    const path = join(makeTempDir(), "stocks.db");

    const handle = await withStore({ path }, (db) => {
      seed(db, [{ ticker: "AAPL" }, { ticker: "MSFT" }]);
      return db;
    });
    expect(handle.open).toBe(false);

    const count = await withStore({ path }, (db) => countRecords(db));
    expect(count).toBe(2);
  });

  it("withStore closes the handle when the task throws", async () => {
    const handles: StockDatabase[] = [];

    await expect(
      withStore({ path: ":memory:" }, async (db) => {
        handles.push(db);
        throw new Error("task failed");
      })
    ).rejects.toThrow("task failed");

    expect(handles.map((db) => db.open)).toEqual([false]);
  });
});

describe("lookups", () => {
  it("answers existence checks and lists tickers", () => {
    const db = openMemoryStore();
    seed(db, [
      { ticker: "MSFT", date: "2023-01-03" },
      { ticker: "AAPL", date: "2023-01-02" },
      { ticker: "AAPL", date: "2023-01-03" }
    ]);

    expect(tickerExists(db, " aapl ")).toBe(true);
    expect(tickerExists(db, "GOOG")).toBe(false);
    expect(dateExists(db, "2023-01-03")).toBe(true);
    expect(dateExists(db, "2023-01-04")).toBe(false);
    expect(listTickers(db)).toEqual(["AAPL", "MSFT"]);
    expect(countRecords(db)).toBe(3);
    close(db);
  });
});

describe("store error classification", () => {
  it("treats I/O and connection codes as an unavailable store", () => {
    expect(isUnavailableCode("SQLITE_IOERR")).toBe(true);
    expect(isUnavailableCode("SQLITE_IOERR_READ")).toBe(true);
    expect(isUnavailableCode("SQLITE_CANTOPEN")).toBe(true);
    expect(isUnavailableCode("SQLITE_CORRUPT_VTAB")).toBe(true);
    expect(isUnavailableCode("SQLITE_ERROR")).toBe(false);
    expect(isUnavailableCode("SQLITE_READONLY")).toBe(false);
    expect(isUnavailableCode("SQLITE_FULLNESS")).toBe(false);
  });

  it("maps SQLite failures by code", () => {
    const db = connect({ path: ":memory:" });

    expect(() =>
      withStoreErrors(db, () => {
        throw new Database.SqliteError("disk I/O error", "SQLITE_IOERR_WRITE");
      })
    ).toThrow(StoreUnavailableError);
    expect(() =>
      withStoreErrors(db, () => {
        throw new Database.SqliteError("no such table: stocks", "SQLITE_ERROR");
      })
    ).toThrow(StoreQueryError);
    close(db);
  });
});

describe("read-only connections", () => {
  it("requires the file to exist", () => {
    const path = join(makeTempDir(), "absent.db");
    expect(() => connect({ path, readonly: true })).toThrow(StoreUnavailableError);
  });

  it("reads existing data and refuses writes", async () => {
    const path = join(makeTempDir(), "stocks.db");
    await withStore({ path }, (db) => seed(db, [{ ticker: "AAPL" }]));

    const db = connect({ path, readonly: true });
    expect(countRecords(db)).toBe(1);
    expect(execute(db, "DELETE FROM stocks").error?.code).toBe("SQLITE_READONLY");
    close(db);
  });
});
