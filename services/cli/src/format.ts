import type {
  CellValue,
  LoadSummary,
  PredefinedReport,
  PriceChange,
  QueryResult,
  SeriesPoint
} from "@pricepoint/types";

const money = (value: number): string => `$${value.toFixed(2)}`;

export const formatLoadSummary = (summary: LoadSummary): string[] => {
  const lines = [
    `Loaded ${summary.source}: ${summary.committed} of ${summary.attempted} rows committed, ${summary.rejected} rejected`
  ];

  for (const rejection of summary.rejections) {
    const field = rejection.field ? ` [${rejection.field}]` : "";
    lines.push(`  row ${rejection.row}: ${rejection.reason}${field} ${rejection.message}`);
  }

  return lines;
};

export const formatReport = (report: PredefinedReport): string[] => {
  const lines = [
    `Average closing price for ${report.ticker}: ${money(report.averageClose)}`,
    "",
    `Top ${report.topVolumeDays.length} high-volume days for ${report.ticker}:`
  ];

  for (const day of report.topVolumeDays) {
    lines.push(`Date: ${day.date}, Volume: ${day.volume}`);
  }

  lines.push("", `Stocks with price increase on ${report.date}:`);
  if (report.priceIncreases.length === 0) {
    lines.push("No stocks with price increase found.");
  }
  for (const stock of report.priceIncreases) {
    lines.push(`Ticker: ${stock.ticker}, Open: ${money(stock.open)}, Close: ${money(stock.close)}`);
  }

  lines.push("", `Volatility (stddev of Close) for ${report.ticker}: ${money(report.volatility)}`);
  return lines;
};

const formatCell = (value: CellValue): string => {
  if (value === null) {
    return "NULL";
  }

  if (Buffer.isBuffer(value)) {
    return `<blob ${value.length} bytes>`;
  }

  return String(value);
};

export const formatQueryResult = (result: QueryResult): string[] => {
  if (result.error) {
    return [`Error executing query: ${result.error.message} (${result.error.code})`];
  }

  if (result.rows.length === 0) {
    return [`No results returned or query executed successfully (${result.changes} rows changed).`];
  }

  return [
    result.columns.join(" | "),
    ...result.rows.map((row) => row.map(formatCell).join(" | "))
  ];
};

export const formatSeries = (ticker: string, points: SeriesPoint[]): string[] => {
  if (points.length === 0) {
    return [`No data found for ticker ${ticker}`];
  }

  return [
    `${ticker} Price Trend (${points.length} days)`,
    ...points.map((point) => `${point.date}  ${money(point.close)}`)
  ];
};

const signed = (value: number, text: string): string => (value > 0 ? `+${text}` : text);

export const formatPriceChanges = (changes: PriceChange[]): string[] => {
  if (changes.length === 0) {
    return [];
  }

  return [
    "Day-over-day changes:",
    ...changes.map((change) => {
      const amount = signed(change.change, change.change.toFixed(2));
      const pct =
        change.changePct === null ? "n/a" : `${signed(change.changePct, change.changePct.toFixed(2))}%`;
      return `${change.date}  ${amount} (${pct})`;
    })
  ];
};

export const seriesToCsv = (points: SeriesPoint[]): string => {
  return ["Date,Close", ...points.map((point) => `${point.date},${point.close}`)].join("\n") + "\n";
};
