import type { SeriesPoint } from "@pricepoint/types";
import { z } from "zod";
import { withStoreErrors, type StockDatabase } from "./sqlite";
import { normalizeTicker, NUMERIC_CLOSE_SQL, STOCKS_TABLE } from "./stocks";

const SeriesRowSchema = z.object({
  date: z.string(),
  close: z.number()
});

export const series = (db: StockDatabase, ticker: string): SeriesPoint[] => {
  const rows = withStoreErrors(db, () =>
    db
      .prepare(
        `SELECT Date AS date, Close AS close FROM ${STOCKS_TABLE}
WHERE Ticker = ? AND ${NUMERIC_CLOSE_SQL}
ORDER BY Date ASC`
      )
      .all(normalizeTicker(ticker))
  );

  return SeriesRowSchema.array().parse(rows);
};
