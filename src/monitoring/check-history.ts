/**
 * Check History
 *
 * Last outcome per scope, kept in memory for the status and health
 * endpoints. Lost on restart; the snapshot files are the durable record.
 */
import type { StateScope } from "../shared/types/event.types";
import type { CheckReport } from "../workers/check.types";

export type CheckOutcome =
  | { status: "success"; scope: StateScope; at: string; report: CheckReport }
  | { status: "failed"; scope: StateScope; at: string; error: string; code: string };

const lastOutcomes = new Map<StateScope, CheckOutcome>();

export function recordSuccess(report: CheckReport): void {
  lastOutcomes.set(report.scope, {
    status: "success",
    scope: report.scope,
    at: report.checkedAt,
    report,
  });
}

export function recordFailure(scope: StateScope, error: string, code: string): void {
  lastOutcomes.set(scope, {
    status: "failed",
    scope,
    at: new Date().toISOString(),
    error,
    code,
  });
}

export function getLastOutcomes(): CheckOutcome[] {
  return [...lastOutcomes.values()];
}

export function clearHistory(): void {
  lastOutcomes.clear();
}
