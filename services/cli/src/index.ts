import { createInterface } from "node:readline/promises";
import { booleanFlag, readEnv } from "@pricepoint/config";
import { load } from "@pricepoint/ingest";
import { createLogger, createMetrics, errorMessage, stderrSink } from "@pricepoint/observability";
import { countRecords, withStore } from "@pricepoint/storage";
import { z } from "zod";
import { formatLoadSummary } from "./format";
import { runMenu } from "./menu";

const service = "cli";
const logger = createLogger({ service, sink: stderrSink });
const metrics = createMetrics({ service });

const envSchema = z.object({
  PRICEPOINT_DB_PATH: z.string().min(1).default("stock_market.db"),
  PRICEPOINT_CSV_PATH: z.string().min(1).default("stocks.csv"),
  PRICEPOINT_BATCH_SIZE: z.coerce.number().int().positive().default(500),
  PRICEPOINT_OUTPUT_DIR: z.string().min(1).default("."),
  PRICEPOINT_SKIP_LOAD: booleanFlag(false)
});

const env = readEnv(envSchema);

const run = async () => {
  logger.info("session starting", { db_path: env.PRICEPOINT_DB_PATH });

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    await withStore({ path: env.PRICEPOINT_DB_PATH, logger }, async (db) => {
      if (!env.PRICEPOINT_SKIP_LOAD) {
        const summary = load(db, env.PRICEPOINT_CSV_PATH, {
          batchSize: env.PRICEPOINT_BATCH_SIZE,
          logger,
          metrics
        });
        for (const line of formatLoadSummary(summary)) {
          console.log(line);
        }
      }
      console.log(`Store holds ${countRecords(db)} rows`);

      await runMenu({
        db,
        io: {
          prompt: (question) => rl.question(question),
          print: (line) => console.log(line)
        },
        outputDir: env.PRICEPOINT_OUTPUT_DIR,
        logger,
        metrics
      });
    });
  } finally {
    rl.close();
  }

  logger.info("session ended");
};

try {
  await run();
} catch (error) {
  logger.error("session aborted", {
    error: errorMessage(error),
    name: error instanceof Error ? error.name : "unknown"
  });
  process.exitCode = 1;
}
