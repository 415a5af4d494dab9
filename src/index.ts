/**
 * Entry Point: state-events-watch
 *
 * Starts the two long-running subsystems:
 * 1. API Server: Express endpoints for monitoring, check triggers and snapshot views
 * 2. Scheduler: node-cron job that checks every configured scope
 *
 * The data directory is verified before anything starts.
 */
import type { Server } from "http";
import config from "./config";
import { startServer } from "./api/server";
import { startScheduler, stopScheduler } from "./scheduler/scheduler.service";
import { SnapshotRepository } from "./persistence/repositories/snapshot.repository";
import { logger } from "./monitoring/logger";

let server: Server | null = null;

async function main(): Promise<void> {
  logger.info(
    { env: config.env, port: config.port, sourceUrl: config.sourceUrl },
    "Starting state-events-watch service"
  );

  // 1. Verify the snapshot directory
  try {
    await new SnapshotRepository().checkWritable();
    logger.info({ dataDir: config.dataDir }, "Data directory is writable");
  } catch (error) {
    logger.fatal(
      { error: (error as Error).message, dataDir: config.dataDir },
      "Data directory is not writable, aborting startup"
    );
    process.exit(1);
  }

  // 2. Start API server
  server = await startServer();

  // 3. Start scheduler
  startScheduler();

  logger.info("All subsystems started, service is ready");
}

// --- Graceful Shutdown ---
function shutdown(signal: string): void {
  logger.info({ signal }, "Shutdown signal received");

  stopScheduler();

  if (!server) {
    process.exit(0);
  }

  server.close((error) => {
    if (error) {
      logger.error({ error: error.message }, "Error during shutdown");
      process.exit(1);
    }
    logger.info("Graceful shutdown complete");
    process.exit(0);
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));

// Handle uncaught errors
process.on("uncaughtException", (error) => {
  logger.fatal({ error: error.message, stack: error.stack }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.fatal({ reason }, "Unhandled rejection");
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.fatal({ error: (error as Error).message }, "Failed to start service");
  process.exit(1);
});
