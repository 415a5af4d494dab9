/**
 * Snapshot Types
 *
 * The persisted state of one completed run and the result of diffing a
 * run against the previous snapshot.
 */
import type { Event, EventChange } from "./event.types";

/** An event that disappeared from the listing, kept for a bounded time */
export interface RemovedEventEntry {
  event: Event;
  removedAt: string;
}

/**
 * State of one completed run.
 * stableIndex is always derived from events; it is never patched in place.
 */
export interface Snapshot {
  /** Event ID → Event */
  events: Record<string, Event>;
  /** StableKey → Event ID */
  stableIndex: Record<string, string>;
  /** Field changes, oldest first, capped */
  changeLog: EventChange[];
  /** Event ID → archived removal */
  removedEvents: Record<string, RemovedEventEntry>;
  capturedAt: string;
}

/**
 * Result of comparing the current extraction against the previous snapshot.
 * Produced by detectChanges(); the snapshot is the one to persist next.
 */
export interface DiffResult {
  /** True when there was no previous snapshot */
  isFirstRun: boolean;
  /** Events classified "new", in document order */
  newEvents: Event[];
  /** Events classified "removed", in previous-snapshot order */
  removedEvents: Event[];
  /** date-changed / title-changed / city-changed / unknown entries of this run */
  fieldChanges: EventChange[];
  /** "new" and "removed" entries of this run */
  headlineChanges: EventChange[];
  /** Next snapshot: events, rebuilt index, capped log, pruned archive */
  snapshot: Snapshot;
}
