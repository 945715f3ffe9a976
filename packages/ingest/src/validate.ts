import {
  IsoDateSchema,
  TickerSchema,
  type PriceField,
  type RowRejection,
  type StockField,
  type StockRecord
} from "@pricepoint/types";
import type { RawStockRow } from "./csv";

export type RowValidation =
  | { ok: true; record: StockRecord }
  | { ok: false; rejection: RowRejection };

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export const parseDecimal = (value: string | undefined): number | null => {
  const trimmed = value?.trim() ?? "";
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }

  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
};

const reject = (
  row: number,
  reason: RowRejection["reason"],
  field: StockField,
  message: string
): RowValidation => {
  return { ok: false, rejection: { row, reason, field, message } };
};

const notANumber = (row: number, field: PriceField, value: string | undefined): RowValidation => {
  return reject(row, "field_parse", field, `${field} "${value ?? ""}" is not a number`);
};

/**
 * Parses one source row into a record. Fields are checked in column
 * order and the first failure is reported: parse failures before range
 * failures. The ticker is trimmed and uppercased on the way.
 */
export const validateRow = (raw: RawStockRow, row: number): RowValidation => {
  const date = raw.Date?.trim() ?? "";
  if (!IsoDateSchema.safeParse(date).success) {
    return reject(row, "field_parse", "date", `Date "${date}" is not a valid YYYY-MM-DD date`);
  }

  const rawTicker = raw.Ticker?.trim() ?? "";
  if (rawTicker.length === 0) {
    return reject(row, "field_parse", "ticker", "Ticker is empty");
  }

  const ticker = TickerSchema.safeParse(rawTicker);
  if (!ticker.success) {
    return reject(row, "field_parse", "ticker", `Ticker "${rawTicker}" is not a valid symbol`);
  }

  const open = parseDecimal(raw.Open);
  if (open === null) {
    return notANumber(row, "open", raw.Open);
  }

  const high = parseDecimal(raw.High);
  if (high === null) {
    return notANumber(row, "high", raw.High);
  }

  const low = parseDecimal(raw.Low);
  if (low === null) {
    return notANumber(row, "low", raw.Low);
  }

  const close = parseDecimal(raw.Close);
  if (close === null) {
    return notANumber(row, "close", raw.Close);
  }

  const volume = parseDecimal(raw.Volume);
  if (volume === null || !Number.isSafeInteger(Math.abs(volume))) {
    return reject(row, "field_parse", "volume", `volume "${raw.Volume ?? ""}" is not an integer`);
  }

  const numeric: [StockField, number][] = [
    ["open", open],
    ["high", high],
    ["low", low],
    ["close", close],
    ["volume", volume]
  ];
  for (const [field, value] of numeric) {
    if (value < 0) {
      return reject(row, "range", field, `${field} ${value} is negative`);
    }
  }

  return {
    ok: true,
    record: { date, ticker: ticker.data, open, high, low, close, volume }
  };
};
