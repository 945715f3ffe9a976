import type { CloseMoments } from "@pricepoint/types";
import { z } from "zod";
import { withStoreErrors, type StockDatabase } from "./sqlite";
import { normalizeTicker, NUMERIC_CLOSE_SQL, STOCKS_TABLE } from "./stocks";

const CloseMomentsSchema = z.object({
  count: z.number().int().nonnegative(),
  sum: z.number(),
  sumSquares: z.number()
});

// Single aggregation pass; TOTAL yields 0.0 rather than NULL on empty input.
export const closeMoments = (db: StockDatabase, ticker: string): CloseMoments => {
  return withStoreErrors(db, () => {
    const row = db
      .prepare(
        `SELECT COUNT(Close) AS count, TOTAL(Close) AS sum, TOTAL(Close * Close) AS sumSquares
FROM ${STOCKS_TABLE} WHERE Ticker = ? AND ${NUMERIC_CLOSE_SQL}`
      )
      .get(normalizeTicker(ticker));
    return CloseMomentsSchema.parse(row);
  });
};

/**
 * Sample standard deviation from running sums:
 * sqrt((Σx² - (Σx)²/N) / (N - 1)).
 *
 * Returns null when there are no observations and 0 for a single one.
 * Cancellation can leave a tiny negative variance for near-constant
 * series; that is clamped to 0.
 */
export const sampleStdDev = ({ count, sum, sumSquares }: CloseMoments): number | null => {
  if (count === 0) {
    return null;
  }

  if (count === 1) {
    return 0;
  }

  const variance = (sumSquares - (sum * sum) / count) / (count - 1);
  return Math.sqrt(Math.max(0, variance));
};
