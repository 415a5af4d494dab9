/**
 * Notifier Types
 *
 * A notifier delivers a finished check report somewhere: the log, a
 * webhook. Rendering for humans is the receiver's job.
 */
import type { CheckReport } from "../workers/check.types";

export interface Notifier {
  /** Human-readable channel name for logs */
  readonly name: string;
  notify(report: CheckReport): Promise<void>;
}

/** True when the report carries anything worth delivering */
export function hasChanges(report: CheckReport): boolean {
  return (
    report.newEvents.length > 0 ||
    report.removedEvents.length > 0 ||
    report.changedEvents.length > 0
  );
}
