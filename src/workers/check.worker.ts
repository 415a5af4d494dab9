/**
 * Check Worker
 *
 * Runs one check for one scope, strictly in sequence:
 * 1. Fetch the listing page
 * 2. Extract events and keep those in scope
 * 3. Load the previous snapshot (skipped in refresh mode)
 * 4. Detect changes and build the next snapshot
 * 5. Save the snapshot
 * 6. Notify (only when something changed, never in refresh mode)
 *
 * Checks of the same scope are queued behind each other, whether they come
 * from the scheduler or the API, so a snapshot file has one writer at a time.
 * Fetch and storage errors propagate to the caller unchanged. A notifier
 * failure is logged and counted; the check itself still succeeds.
 */
import type { StateScope } from "../shared/types/event.types";
import type { CheckReport, RunCheckOptions } from "./check.types";
import { PageFetcher } from "../scraping/page-fetcher";
import { extractEvents } from "../scraping/extractors/event.extractor";
import { detectChanges, filterEventsByScope } from "../processing/change-detector";
import { parseScope } from "../processing/event-sorter";
import { SnapshotRepository } from "../persistence/repositories/snapshot.repository";
import { createNotifier, hasChanges, type Notifier } from "../notifiers";
import { CheckError } from "../shared/errors/check.errors";
import { ERROR_CODES } from "../config/constants";
import { recordFailure, recordSuccess } from "../monitoring/check-history";
import { metrics } from "../monitoring/metrics.collector";
import { scopeLogger } from "../monitoring/logger";
import config from "../config";

/** Collaborators of a check run; replaced with in-process fakes in tests */
export interface CheckDependencies {
  fetcher: Pick<PageFetcher, "fetch">;
  repository: Pick<SnapshotRepository, "load" | "save">;
  notifier: Notifier;
  clock: () => Date;
}

export function defaultDependencies(): CheckDependencies {
  return {
    fetcher: new PageFetcher(),
    repository: new SnapshotRepository(),
    notifier: createNotifier(),
    clock: () => new Date(),
  };
}

/** Tail of the queue of checks per scope */
const inFlight = new Map<StateScope, Promise<CheckReport>>();

/**
 * Run a single check.
 *
 * @param scopeInput - "all" or a state code, any case
 * @returns The report handed to the notifier
 */
export async function runCheck(
  scopeInput: string,
  options: RunCheckOptions = {},
  deps: CheckDependencies = defaultDependencies()
): Promise<CheckReport> {
  const scope: StateScope = parseScope(scopeInput);

  // The previous caller already received that run's failure
  const previous: Promise<unknown> =
    inFlight.get(scope)?.catch(() => undefined) ?? Promise.resolve();
  const run = previous.then(() => executeCheck(scope, options, deps));
  inFlight.set(scope, run);

  try {
    return await run;
  } finally {
    if (inFlight.get(scope) === run) inFlight.delete(scope);
  }
}

async function executeCheck(
  scope: StateScope,
  options: RunCheckOptions,
  deps: CheckDependencies
): Promise<CheckReport> {
  const refresh = options.refresh ?? false;
  const sourceUrl = options.sourceUrl ?? config.sourceUrl;
  const startTime = Date.now();
  const log = scopeLogger(scope);

  log.info({ refresh, sourceUrl }, "Check started");

  try {
    const page = await deps.fetcher.fetch(sourceUrl);
    const now = deps.clock();

    const extracted = extractEvents(page.text, page.url, now.toISOString());
    const inScope = filterEventsByScope(extracted, scope);
    metrics.increment("events_extracted_total", { scope }, inScope.length);

    const previous = refresh ? null : await deps.repository.load(scope);
    const diff = detectChanges(previous, inScope, now);

    await deps.repository.save(diff.snapshot, scope);

    const durationMs = Date.now() - startTime;
    const report: CheckReport = {
      scope,
      checkedAt: now.toISOString(),
      sourceUrl: page.url,
      eventCount: inScope.length,
      newEvents: refresh ? [] : diff.newEvents,
      removedEvents: refresh ? [] : diff.removedEvents,
      changedEvents: refresh ? [] : diff.fieldChanges,
      isFirstRun: diff.isFirstRun,
      refreshed: refresh,
      durationMs,
    };

    for (const change of [...diff.headlineChanges, ...diff.fieldChanges]) {
      metrics.increment("changes_detected_total", { type: change.changeType });
    }
    metrics.increment("checks_total", { scope, status: "success" });
    metrics.set("snapshot_events", { scope }, Object.keys(diff.snapshot.events).length);
    metrics.set("last_check_timestamp_seconds", { scope }, Math.floor(now.getTime() / 1000));
    metrics.recordDuration(durationMs / 1000);
    recordSuccess(report);

    if (!refresh && hasChanges(report)) {
      await deliver(report, deps.notifier, log);
    }

    log.info(
      {
        durationMs,
        eventCount: report.eventCount,
        newCount: report.newEvents.length,
        removedCount: report.removedEvents.length,
        changedCount: report.changedEvents.length,
      },
      "Check completed"
    );

    return report;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    const code = err instanceof CheckError ? err.code : ERROR_CODES.UNKNOWN;

    metrics.increment("checks_total", { scope, status: "failed" });
    recordFailure(scope, err.message, code);
    log.error({ code, err, durationMs: Date.now() - startTime }, "Check failed");
    throw err;
  }
}

async function deliver(
  report: CheckReport,
  notifier: Notifier,
  log: ReturnType<typeof scopeLogger>
): Promise<void> {
  try {
    await notifier.notify(report);
  } catch (error) {
    metrics.increment("notifications_failed_total", { notifier: notifier.name });
    log.error({ err: error, notifier: notifier.name }, "Notification failed, snapshot kept");
  }
}
