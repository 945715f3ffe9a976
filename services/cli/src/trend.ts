import { writeFileSync } from "node:fs";
import { join } from "node:path";
import type { SeriesPoint } from "@pricepoint/types";
import { seriesToCsv } from "./format";

export const trendFileName = (ticker: string): string => `${ticker}_price_trend.csv`;

// Hands the series to whatever renders it; no image output happens here.
export const writeTrendFile = (outputDir: string, ticker: string, points: SeriesPoint[]): string => {
  const path = join(outputDir, trendFileName(ticker));
  writeFileSync(path, seriesToCsv(points), "utf8");
  return path;
};
