import dotenv from "dotenv";
import path from "path";

dotenv.config({ path: path.resolve(__dirname, "../.env") });

import { loadConfig } from "./config";
import { ConfigError } from "./errors";
import { startServer } from "./gateway";
import { PgExecutor, createDbPool, poolConnections } from "./services/dbConnection";
import { PgRecordStore } from "./services/recordStore";
import { createLogger } from "./utils/logger";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  const pool = createDbPool(config.database, logger);
  const store = new PgRecordStore(new PgExecutor(poolConnections(pool), logger));
  await store.ensureSchema();
  logger.info("Database schema ready");

  const app = await startServer(store, config);

  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Shutting down");
    try {
      await app.close();
      await pool.end();
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, "Shutdown failed");
      process.exit(1);
    }
  };
  process.once("SIGINT", (signal) => void shutdown(signal));
  process.once("SIGTERM", (signal) => void shutdown(signal));
}

main().catch((error: unknown) => {
  const logger = createLogger("error");
  if (error instanceof ConfigError) {
    logger.fatal(error.message);
  } else {
    logger.fatal({ err: error }, "Server failed to start");
  }
  process.exit(1);
});
