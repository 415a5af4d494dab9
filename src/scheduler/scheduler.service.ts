/**
 * Scheduler Service
 *
 * Runs a check for every configured scope on a node-cron schedule.
 * Scopes are checked one after another; a tick that fires while the
 * previous cycle is still running is skipped. Checks triggered over the
 * API for the same scope queue behind the cycle in the check worker.
 *
 * Default schedule: every 6 hours (CHECK_CRON).
 */
import cron, { type ScheduledTask } from "node-cron";
import { runCheck } from "../workers/check.worker";
import type { CheckReport } from "../workers/check.types";
import config from "../config";
import { logger } from "../monitoring/logger";

let isRunning = false;
let task: ScheduledTask | null = null;

/**
 * Run one cycle over the given scopes.
 * A failing scope is logged and does not stop the others.
 *
 * @returns Reports of the scopes that succeeded
 */
export async function runOnce(
  scopes: string[] = config.checkScopes,
  check: typeof runCheck = runCheck
): Promise<CheckReport[]> {
  const reports: CheckReport[] = [];

  for (const scope of scopes) {
    try {
      reports.push(await check(scope));
    } catch (error) {
      logger.error(
        { scope, error: (error as Error).message },
        "Scheduled check failed, continuing with next scope"
      );
    }
  }

  return reports;
}

/**
 * Start the scheduler cron job.
 */
export function startScheduler(cronExpression: string = config.checkCron): void {
  if (!cron.validate(cronExpression)) {
    throw new Error(`Invalid CHECK_CRON expression: "${cronExpression}"`);
  }

  logger.info(
    { cronExpression, scopes: config.checkScopes, timezone: config.timezone },
    "Starting scheduler"
  );

  task = cron.schedule(
    cronExpression,
    async () => {
      if (isRunning) {
        logger.warn("Check cycle already in progress, skipping");
        return;
      }

      isRunning = true;
      const startTime = Date.now();

      try {
        logger.info("Check cycle started");
        const reports = await runOnce();
        logger.info(
          {
            durationMs: Date.now() - startTime,
            succeeded: reports.length,
            failed: config.checkScopes.length - reports.length,
          },
          "Check cycle completed"
        );
      } finally {
        isRunning = false;
      }
    },
    { timezone: config.timezone }
  );
}

/** Stop the cron job (graceful shutdown) */
export function stopScheduler(): void {
  if (task) {
    task.stop();
    task = null;
    logger.info("Scheduler stopped");
  }
}
