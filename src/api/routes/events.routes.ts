/**
 * Events Routes
 *
 * Read-only views over the stored snapshot of a scope.
 */
import { Router } from "express";
import type { ApiContext } from "../server";
import { createEventsController } from "../controllers/events.controller";

export function createEventsRoutes(context: ApiContext): Router {
  const router = Router();
  const controller = createEventsController(context);

  router.get("/events", controller.listEvents);
  router.get("/changes", controller.listChanges);
  router.get("/removed", controller.listRemoved);

  return router;
}
