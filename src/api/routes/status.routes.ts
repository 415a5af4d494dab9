/**
 * Status Routes
 *
 * Health and metrics are public (for load balancers and scrapers).
 * Status and check triggers are protected.
 */
import { Router } from "express";
import type { ApiContext } from "../server";
import { createStatusController } from "../controllers/status.controller";
import { requireServiceSecret } from "../middlewares/auth.middleware";

export function createStatusRoutes(context: ApiContext): Router {
  const router = Router();
  const controller = createStatusController(context);
  const auth = requireServiceSecret(context.serviceSecret);

  router.get("/health", controller.getHealth);
  router.get("/metrics", controller.getMetrics);

  router.get("/status", auth, controller.getStatus);
  router.post("/checks", auth, controller.triggerCheck);

  return router;
}
