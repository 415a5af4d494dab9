/**
 * Check Run Types
 *
 * Shapes exchanged between the check worker, notifiers, the scheduler
 * and the API.
 */
import type { Event, EventChange, StateScope } from "../shared/types/event.types";

export interface RunCheckOptions {
  /** Ignore the previous snapshot and rebuild it; nothing is notified */
  refresh?: boolean;
  /** Override the listing URL (defaults to config.sourceUrl) */
  sourceUrl?: string;
}

/**
 * Outcome of one check run for one scope.
 * newEvents/removedEvents are the headline; changedEvents holds this run's
 * date/title/city/unknown entries.
 */
export interface CheckReport {
  scope: StateScope;
  checkedAt: string;
  sourceUrl: string;
  /** Events in scope on the page this run */
  eventCount: number;
  newEvents: Event[];
  removedEvents: Event[];
  changedEvents: EventChange[];
  isFirstRun: boolean;
  refreshed: boolean;
  durationMs: number;
}
