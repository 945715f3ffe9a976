import type { Logger, Metrics } from "@pricepoint/observability";
import { assertOpen, insertStockRecords, withStoreErrors, type StockDatabase } from "@pricepoint/storage";
import type { LoadSummary, RejectionReason, RowRejection, StockRecord } from "@pricepoint/types";
import { parseStockCsv, readSource, type RawStockRow } from "./csv";
import { validateRow } from "./validate";

export const DEFAULT_BATCH_SIZE = 500;

export type LoadOptions = {
  batchSize?: number;
  logger?: Logger;
  metrics?: Metrics;
};

type PendingRow = {
  row: number;
  record: StockRecord;
};

const normalizeBatchSize = (value: number | undefined): number => {
  if (value === undefined || !Number.isFinite(value) || value < 1) {
    return DEFAULT_BATCH_SIZE;
  }

  return Math.floor(value);
};

const countByReason = (rejections: RowRejection[]): Partial<Record<RejectionReason, number>> => {
  const counts: Partial<Record<RejectionReason, number>> = {};
  for (const rejection of rejections) {
    counts[rejection.reason] = (counts[rejection.reason] ?? 0) + 1;
  }
  return counts;
};

/**
 * Validates rows in order and commits accepted ones in batches. Data
 * problems are reported on the summary; only a store failure throws, and
 * batches committed before it stay committed.
 */
export const loadRecords = (
  db: StockDatabase,
  rows: RawStockRow[],
  { batchSize, logger, metrics }: LoadOptions = {},
  source = "<records>"
): LoadSummary => {
  assertOpen(db);

  const size = normalizeBatchSize(batchSize);
  const rejections: RowRejection[] = [];
  let committed = 0;
  let pending: PendingRow[] = [];

  const flush = () => {
    if (pending.length === 0) {
      return;
    }

    const batch = pending;
    pending = [];
    const outcomes = withStoreErrors(db, () =>
      insertStockRecords(
        db,
        batch.map((entry) => entry.record)
      )
    );

    batch.forEach((entry, index) => {
      if (outcomes[index] === "inserted") {
        committed += 1;
        return;
      }

      rejections.push({
        row: entry.row,
        reason: "duplicate_key",
        message: `Duplicate key (${entry.record.date}, ${entry.record.ticker}); existing row kept`
      });
    });
  };

  rows.forEach((raw, index) => {
    const result = validateRow(raw, index + 1);
    if (!result.ok) {
      rejections.push(result.rejection);
      return;
    }

    pending.push({ row: index + 1, record: result.record });
    if (pending.length >= size) {
      flush();
    }
  });
  flush();

  const ordered = [...rejections].sort((a, b) => a.row - b.row);
  Object.freeze(ordered);

  const summary: LoadSummary = Object.freeze({
    source,
    attempted: rows.length,
    committed,
    rejected: ordered.length,
    rejections: ordered
  });

  metrics?.count("ingest.rows_attempted", summary.attempted);
  metrics?.count("ingest.rows_committed", summary.committed);
  const byReason = countByReason(ordered);
  for (const [reason, count] of Object.entries(byReason)) {
    metrics?.count("ingest.rows_rejected", count, { reason });
  }

  logger?.info("load complete", {
    source,
    attempted: summary.attempted,
    committed: summary.committed,
    rejected: summary.rejected
  });

  if (summary.rejected > 0) {
    logger?.warn("load rejected rows", { source, ...byReason });
  }

  return summary;
};

export const load = (db: StockDatabase, sourcePath: string, options: LoadOptions = {}): LoadSummary => {
  assertOpen(db);
  const rows = parseStockCsv(readSource(sourcePath));
  return loadRecords(db, rows, options, sourcePath);
};
