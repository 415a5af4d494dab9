/**
 * Route Aggregator
 *
 * Mounts all API routes under the /api/v1 prefix.
 */
import { Router } from "express";
import type { ApiContext } from "../server";
import { createStatusRoutes } from "./status.routes";
import { createEventsRoutes } from "./events.routes";

export function createRoutes(context: ApiContext): Router {
  const router = Router();

  router.use("/", createStatusRoutes(context));
  router.use("/", createEventsRoutes(context));

  return router;
}
