/**
 * Express API Server
 *
 * Minimal Express server for the watcher service.
 * Exposes health/metrics, check triggers and read-only snapshot views.
 */
import type { Server } from "http";
import express from "express";
import cors from "cors";
import { createRoutes } from "./routes";
import { errorMiddleware } from "./middlewares/error.middleware";
import { SnapshotRepository } from "../persistence/repositories/snapshot.repository";
import { runCheck } from "../workers/check.worker";
import { logger } from "../monitoring/logger";
import config from "../config";

/** Collaborators handed to the controllers; replaced with fakes in tests */
export interface ApiContext {
  repository: SnapshotRepository;
  runCheck: typeof runCheck;
  /** Bearer secret for protected routes (defaults to SERVICE_SECRET) */
  serviceSecret?: string;
}

/**
 * Create and configure the Express application.
 */
export function createServer(
  context: ApiContext = { repository: new SnapshotRepository(), runCheck }
): express.Application {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Request logging
  app.use((req, _res, next) => {
    logger.debug({ method: req.method, path: req.path }, "Incoming request");
    next();
  });

  app.use("/api/v1", createRoutes(context));

  app.use(errorMiddleware);

  return app;
}

/**
 * Start the Express server.
 */
export function startServer(port: number = config.port): Promise<Server> {
  return new Promise((resolve) => {
    const app = createServer();
    const server = app.listen(port, () => {
      logger.info({ port, env: config.env }, "API server started");
      resolve(server);
    });
  });
}
