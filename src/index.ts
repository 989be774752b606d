/**
 * Points Ledger Sync
 *
 * Entry point: ledger service with spreadsheet reconciliation.
 */

import { createDefaultSettings } from "./domains/settings";
import { loadConfig } from "./lib/config";
import {
  createDatabase,
  createPostgresGroupRepository,
  createPostgresLedgerStore,
  createPostgresSettingsRepository,
} from "./lib/db";
import { getEnv } from "./lib/env";
import { createLogger, toError } from "./lib/logger";
import { startHttpServer } from "./server";
import { startWorker } from "./worker";

const main = async (): Promise<void> => {
  // 1. Validate environment configuration
  const config = loadConfig(getEnv());
  const logger = createLogger({ level: config.logging.level, pretty: config.logging.pretty });

  logger.info("Points Ledger Sync starting...");

  try {
    // 2. Initialize database connection
    logger.info("Initializing database connection...");
    const database = createDatabase(config.database.url);
    await database.ping();
    logger.info("Database connection established");

    const defaults = createDefaultSettings({
      commissionRate: config.ledger.defaultCommissionRate,
      syncInterval: config.sync.defaultIntervalSeconds,
    });
    const stores = {
      ledger: createPostgresLedgerStore(database.db),
      groups: createPostgresGroupRepository(database.db),
      settings: createPostgresSettingsRepository(database.db, defaults),
    };

    // 3. Start worker (startup reconciliation, background sync)
    logger.info("Starting worker...");
    const worker = await startWorker({ config, stores, logger });
    logger.info("Worker started");

    // 4. Start HTTP server
    const httpServer = await startHttpServer({
      port: config.server.port,
      logger,
      ping: database.ping,
      ...worker,
    });

    // 5. Setup graceful shutdown
    let shuttingDown = false;
    const shutdown = async (signal: string): Promise<void> => {
      if (shuttingDown) {
        return;
      }
      shuttingDown = true;
      logger.info(`Received ${signal}, initiating graceful shutdown`);

      try {
        await worker.shutdown();
        await httpServer.close();
        await database.close();
        logger.info("Graceful shutdown complete");
        process.exit(0);
      } catch (error) {
        logger.error("Graceful shutdown failed", toError(error));
        process.exit(1);
      }
    };

    process.on("SIGTERM", () => {
      void shutdown("SIGTERM");
    });
    process.on("SIGINT", () => {
      void shutdown("SIGINT");
    });

    logger.info("Service initialized successfully");
  } catch (error) {
    logger.error("Fatal error during startup", toError(error));
    process.exit(1);
  }
};

main().catch((error: unknown) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
