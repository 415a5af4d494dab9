/**
 * Snapshot Manager
 *
 * Builds the Snapshot value persisted after every run. A snapshot holds
 * the full event map, a StableKey index derived from it, a capped change
 * log and a time-bounded archive of removed events.
 *
 * Every function here returns new values; a previous snapshot handed in
 * is never modified.
 */
import type { Event, EventChange } from "../shared/types/event.types";
import type { RemovedEventEntry, Snapshot } from "../shared/types/snapshot.types";
import { RETENTION } from "../config/constants";
import { isOlderThanDays } from "../shared/utils/date";
import { logger } from "../monitoring/logger";

export function emptySnapshot(capturedAt: string): Snapshot {
  return {
    events: {},
    stableIndex: {},
    changeLog: [],
    removedEvents: {},
    capturedAt,
  };
}

/**
 * Derive the StableKey → ID index from a list of events.
 * On a StableKey shared by several events, the first one keeps the key.
 */
export function buildStableIndex(events: Iterable<Event>): Record<string, string> {
  const index: Record<string, string> = {};
  let collisions = 0;

  for (const event of events) {
    if (!event.stableKey) continue;
    if (event.stableKey in index) {
      collisions++;
      continue;
    }
    index[event.stableKey] = event.id;
  }

  if (collisions > 0) {
    logger.debug({ collisions }, "StableKey shared by several events, first kept");
  }

  return index;
}

/**
 * Create a snapshot from this run's events.
 * Duplicate ids keep their first occurrence; the index is rebuilt wholesale.
 */
export function createSnapshot(events: Event[], capturedAt: string): Snapshot {
  const map: Record<string, Event> = {};
  for (const event of events) {
    if (!(event.id in map)) map[event.id] = event;
  }

  return {
    ...emptySnapshot(capturedAt),
    events: map,
    stableIndex: buildStableIndex(Object.values(map)),
  };
}

/**
 * Append entries to a change log, evicting the oldest beyond `limit`.
 *
 * @returns New log, oldest first, length min(limit, log.length + entries.length)
 */
export function appendChangeLog(
  log: EventChange[],
  entries: EventChange[],
  limit: number = RETENTION.CHANGE_LOG_LIMIT
): EventChange[] {
  const combined = [...log, ...entries];
  if (combined.length <= limit) return combined;
  return combined.slice(combined.length - limit);
}

/**
 * Drop archived removals older than `retentionDays` relative to `now`.
 */
export function pruneRemovedEvents(
  archive: Record<string, RemovedEventEntry>,
  now: Date,
  retentionDays: number = RETENTION.REMOVED_RETENTION_DAYS
): Record<string, RemovedEventEntry> {
  const kept: Record<string, RemovedEventEntry> = {};
  for (const [id, entry] of Object.entries(archive)) {
    if (!isOlderThanDays(entry.removedAt, retentionDays, now)) {
      kept[id] = entry;
    }
  }
  return kept;
}

/** Record removals, stamped with this run's time */
export function archiveRemovedEvents(
  archive: Record<string, RemovedEventEntry>,
  removed: Event[],
  removedAt: string
): Record<string, RemovedEventEntry> {
  const next = { ...archive };
  for (const event of removed) {
    next[event.id] = { event, removedAt };
  }
  return next;
}

interface FinalizeInput {
  /** This run's events, firstSeen already carried forward */
  events: Event[];
  /** Previous snapshot's log and archive (empty on a first run) */
  previousChangeLog: EventChange[];
  previousRemoved: Record<string, RemovedEventEntry>;
  /** This run's field changes and removals */
  fieldChanges: EventChange[];
  removedEvents: Event[];
  now: Date;
}

/**
 * Assemble the next snapshot.
 * Order: prune old removals, record new ones, drop archive entries for
 * ids that are listed again, then append to the capped change log.
 */
export function finalizeSnapshot(input: FinalizeInput): Snapshot {
  const capturedAt = input.now.toISOString();
  const snapshot = createSnapshot(input.events, capturedAt);

  const pruned = pruneRemovedEvents(input.previousRemoved, input.now);
  const archived = archiveRemovedEvents(pruned, input.removedEvents, capturedAt);
  for (const id of Object.keys(snapshot.events)) {
    delete archived[id];
  }

  return {
    ...snapshot,
    changeLog: appendChangeLog(input.previousChangeLog, input.fieldChanges),
    removedEvents: archived,
  };
}
