/**
 * Log Notifier
 *
 * Writes the report to the structured log. Used when no webhook is
 * configured, and as a dry run of what a webhook would receive.
 */
import type { CheckReport } from "../workers/check.types";
import type { Notifier } from "./notifier.types";
import { logger } from "../monitoring/logger";

export class LogNotifier implements Notifier {
  readonly name = "log";

  async notify(report: CheckReport): Promise<void> {
    for (const event of report.newEvents) {
      logger.info(
        { scope: report.scope, state: event.state, dateText: event.dateText, id: event.id },
        `NEW: ${event.raw}`
      );
    }
    for (const event of report.removedEvents) {
      logger.info(
        { scope: report.scope, state: event.state, id: event.id },
        `REMOVED: ${event.raw}`
      );
    }
    for (const change of report.changedEvents) {
      logger.info(
        { scope: report.scope, id: change.eventId, changeType: change.changeType },
        `CHANGED: "${change.oldValue}" → "${change.newValue}"`
      );
    }
  }
}
