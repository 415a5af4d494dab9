/**
 * Status Controller
 *
 * Health, metrics, last check outcomes and on-demand checks.
 */
import type { NextFunction, Request, Response } from "express";
import type { ApiContext } from "../server";
import { checkHealth } from "../../monitoring/health.checker";
import { getLastOutcomes } from "../../monitoring/check-history";
import { metrics } from "../../monitoring/metrics.collector";
import { parseScope } from "../../processing/event-sorter";
import { ALL_STATES } from "../../config/constants";

export function createStatusController(context: ApiContext) {
  return {
    /**
     * GET /api/v1/health
     */
    async getHealth(_req: Request, res: Response): Promise<void> {
      try {
        const health = await checkHealth(context.repository);
        res.status(health.status === "unhealthy" ? 503 : 200).json(health);
      } catch (error) {
        res.status(503).json({
          status: "unhealthy",
          error: (error as Error).message,
        });
      }
    },

    /**
     * GET /api/v1/metrics
     *
     * Prometheus-compatible metrics endpoint.
     */
    getMetrics(_req: Request, res: Response): void {
      res.set("Content-Type", "text/plain");
      res.send(metrics.format());
    },

    /**
     * GET /api/v1/status
     *
     * Last check outcome per scope.
     */
    getStatus(_req: Request, res: Response): void {
      res.json({
        checks: getLastOutcomes().map((outcome) =>
          outcome.status === "success"
            ? {
                scope: outcome.scope,
                status: outcome.status,
                at: outcome.at,
                eventCount: outcome.report.eventCount,
                newCount: outcome.report.newEvents.length,
                removedCount: outcome.report.removedEvents.length,
                changedCount: outcome.report.changedEvents.length,
              }
            : outcome
        ),
        timestamp: new Date().toISOString(),
      });
    },

    /**
     * POST /api/v1/checks
     *
     * Body: { scope?: string, refresh?: boolean }. Runs a check now and
     * returns its report.
     */
    async triggerCheck(req: Request, res: Response, next: NextFunction): Promise<void> {
      try {
        const body: unknown = req.body;
        const scopeInput =
          isRecord(body) && typeof body.scope === "string" ? body.scope : ALL_STATES;
        const refresh = isRecord(body) && body.refresh === true;

        const report = await context.runCheck(parseScope(scopeInput), { refresh });
        res.status(200).json(report);
      } catch (error) {
        next(error);
      }
    },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}
