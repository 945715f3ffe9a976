import { z } from "zod";

export const STOCK_FIELDS = ["date", "ticker", "open", "high", "low", "close", "volume"] as const;

export type StockField = (typeof STOCK_FIELDS)[number];

export const PRICE_FIELDS = ["open", "high", "low", "close"] as const;

export type PriceField = (typeof PRICE_FIELDS)[number];

export const IsoDateSchema = z.string().date();

export const TickerSchema = z
  .string()
  .trim()
  .toUpperCase()
  .regex(/^[A-Z0-9][A-Z0-9.-]{0,14}$/);

const PriceSchema = z.number().finite().nonnegative();

export const StockRecordSchema = z.object({
  date: IsoDateSchema,
  ticker: TickerSchema,
  open: PriceSchema,
  high: PriceSchema,
  low: PriceSchema,
  close: PriceSchema,
  volume: z.number().int().nonnegative()
});

export type StockRecord = z.infer<typeof StockRecordSchema>;

export const RejectionReasonSchema = z.enum(["field_parse", "range", "duplicate_key"]);

export type RejectionReason = z.infer<typeof RejectionReasonSchema>;

export const RowRejectionSchema = z.object({
  row: z.number().int().positive(),
  reason: RejectionReasonSchema,
  field: z.enum(STOCK_FIELDS).optional(),
  message: z.string().min(1)
});

export type RowRejection = z.infer<typeof RowRejectionSchema>;

export const LoadSummarySchema = z.object({
  source: z.string(),
  attempted: z.number().int().nonnegative(),
  committed: z.number().int().nonnegative(),
  rejected: z.number().int().nonnegative(),
  rejections: z.array(RowRejectionSchema)
});

export type LoadSummary = z.infer<typeof LoadSummarySchema>;

export type CellValue = string | number | bigint | Buffer | null;

export type QueryError = {
  message: string;
  code: string;
};

export type QueryResult = {
  columns: string[];
  rows: CellValue[][];
  changes: number;
  error?: QueryError;
};

export const SeriesPointSchema = z.object({
  date: IsoDateSchema,
  close: PriceSchema
});

export type SeriesPoint = z.infer<typeof SeriesPointSchema>;

export const PriceChangeSchema = z.object({
  date: IsoDateSchema,
  close: PriceSchema,
  previousClose: PriceSchema,
  change: z.number(),
  changePct: z.number().nullable()
});

export type PriceChange = z.infer<typeof PriceChangeSchema>;

export type CloseMoments = {
  count: number;
  sum: number;
  sumSquares: number;
};

export type PredefinedReport = {
  ticker: string;
  date: string;
  averageClose: number;
  topVolumeDays: StockRecord[];
  priceIncreases: StockRecord[];
  volatility: number;
};
