import { errorMessage, type Logger, type Metrics } from "@pricepoint/observability";
import {
  execute,
  InvalidDateError,
  listTickers,
  NoDataForDateError,
  NoDataForTickerError,
  normalizeTicker,
  predefinedReport,
  priceChanges,
  series,
  StoreQueryError,
  type StockDatabase
} from "@pricepoint/storage";
import { formatPriceChanges, formatQueryResult, formatReport, formatSeries } from "./format";
import { writeTrendFile } from "./trend";

export const DEFAULT_TICKER = "AAPL";
export const DEFAULT_DATE = "2023-01-01";

export type MenuIO = {
  prompt: (question: string) => Promise<string>;
  print: (line: string) => void;
};

export type MenuContext = {
  db: StockDatabase;
  io: MenuIO;
  outputDir: string;
  logger: Logger;
  metrics?: Metrics;
};

const MENU_LINES = [
  "",
  "PricePoint: Stock Data Query Engine",
  "1. Run predefined queries",
  "2. Run custom SQL query",
  "3. Price trend",
  "4. Exit"
];

const isRecoverable = (error: unknown): error is Error => {
  return (
    error instanceof NoDataForTickerError ||
    error instanceof NoDataForDateError ||
    error instanceof InvalidDateError ||
    error instanceof StoreQueryError
  );
};

const printAll = (io: MenuIO, lines: string[]) => {
  for (const line of lines) {
    io.print(line);
  }
};

const runPredefined = async ({ db, io }: MenuContext) => {
  const ticker = (await io.prompt(`Enter ticker (e.g., ${DEFAULT_TICKER}): `)).trim() || DEFAULT_TICKER;
  const date =
    (await io.prompt(`Enter date (YYYY-MM-DD, e.g., ${DEFAULT_DATE}): `)).trim() || DEFAULT_DATE;
  printAll(io, formatReport(predefinedReport(db, ticker, date)));
};

const runCustomQuery = async ({ db, io, logger, metrics }: MenuContext) => {
  io.print("");
  io.print("Enter your custom SQL query (or 'exit' to return):");
  const query = await io.prompt("> ");
  if (query.trim().toLowerCase() === "exit") {
    return;
  }

  const result = execute(db, query, { metrics });
  if (result.error) {
    logger.warn("custom query failed", { error: result.error.message, code: result.error.code });
  }
  printAll(io, formatQueryResult(result));
};

const runTrend = async ({ db, io, outputDir, logger }: MenuContext) => {
  const input = (await io.prompt(`Enter ticker for price trend (e.g., ${DEFAULT_TICKER}): `)).trim();
  const ticker = normalizeTicker(input || DEFAULT_TICKER);
  const save = (await io.prompt("Save trend to file? (y/n): ")).trim().toLowerCase() === "y";

  const points = series(db, ticker);
  printAll(io, formatSeries(ticker, points));
  printAll(io, formatPriceChanges(priceChanges(db, ticker)));

  if (save && points.length > 0) {
    const path = writeTrendFile(outputDir, ticker, points);
    logger.info("trend saved", { ticker, path, points: points.length });
    io.print(`Trend saved as ${path}`);
  }
};

/**
 * Runs the interactive loop until the user exits. Lookup and query
 * problems are printed and the loop continues; anything else, including
 * an unavailable store, ends the session by propagating.
 */
export const runMenu = async (context: MenuContext): Promise<void> => {
  const { io } = context;

  for (;;) {
    printAll(io, MENU_LINES);
    const choice = (await io.prompt("Select an option (1-4): ")).trim();

    try {
      switch (choice) {
        case "1":
          await runPredefined(context);
          break;
        case "2":
          await runCustomQuery(context);
          break;
        case "3":
          await runTrend(context);
          break;
        case "4":
          return;
        default:
          io.print("Invalid choice. Try again.");
      }
    } catch (error) {
      if (!isRecoverable(error)) {
        throw error;
      }

      context.logger.warn("menu action failed", { choice, error: errorMessage(error) });
      io.print(error.message);
      if (error instanceof NoDataForTickerError) {
        const known = listTickers(context.db);
        io.print(known.length > 0 ? `Available tickers: ${known.join(", ")}` : "The store is empty.");
      }
    }
  }
};
