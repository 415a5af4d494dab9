/**
 * Change Detector
 *
 * Compares this run's events against the previous snapshot and classifies
 * every difference:
 *
 * 1. Exact id match → unchanged, carried forward (firstSeen preserved).
 * 2. Previous id gone, but its StableKey appears in this run → the same
 *    event under a new id; report the first differing field
 *    (dateText, title, city) or "unknown" if none differs.
 * 3. Previous id gone and StableKey gone → removed (archived).
 * 4. Current id and StableKey both unknown to the previous run → new.
 *
 * new/removed are the run's headline; field changes go to the change log.
 * Pure: no I/O, never mutates the previous snapshot.
 */
import type { ChangeType, Event, EventChange, StateScope } from "../shared/types/event.types";
import type { DiffResult, Snapshot } from "../shared/types/snapshot.types";
import { ALL_STATES, CHANGE_TYPES } from "../config/constants";
import { finalizeSnapshot } from "./snapshot-manager";
import { logger } from "../monitoring/logger";

/** Fields compared on a StableKey match, in reporting priority */
const COMPARED_FIELDS: { field: "dateText" | "title" | "city"; changeType: ChangeType }[] = [
  { field: "dateText", changeType: CHANGE_TYPES.DATE_CHANGED },
  { field: "title", changeType: CHANGE_TYPES.TITLE_CHANGED },
  { field: "city", changeType: CHANGE_TYPES.CITY_CHANGED },
];

/**
 * Describe how `previous` turned into `current`.
 * One change per matched pair: the first differing field wins.
 */
export function compareEvents(
  previous: Event,
  current: Event,
  detectedAt: string
): EventChange {
  for (const { field, changeType } of COMPARED_FIELDS) {
    const oldValue = previous[field] ?? "";
    const newValue = current[field] ?? "";
    if (oldValue !== newValue) {
      return { eventId: current.id, changeType, oldValue, newValue, detectedAt };
    }
  }

  return {
    eventId: current.id,
    changeType: CHANGE_TYPES.UNKNOWN,
    oldValue: previous.raw,
    newValue: current.raw,
    detectedAt,
  };
}

/**
 * Detect changes between the previous snapshot and this run's events.
 *
 * @param previous - Last persisted snapshot, or null on a first run
 * @param current - This run's events, deduplicated by id, in document order
 * @param now - This run's time; stamps changes, removals and the snapshot
 */
export function detectChanges(
  previous: Snapshot | null,
  current: Event[],
  now: Date
): DiffResult {
  const detectedAt = now.toISOString();
  const previousEvents = previous?.events ?? {};
  const previousIndex = previous?.stableIndex ?? {};

  // StableKey → first current event carrying it
  const currentById = new Map<string, Event>();
  const currentByStableKey = new Map<string, Event>();
  for (const event of current) {
    if (!currentById.has(event.id)) currentById.set(event.id, event);
    if (!currentByStableKey.has(event.stableKey)) {
      currentByStableKey.set(event.stableKey, event);
    }
  }

  const fieldChanges: EventChange[] = [];
  const removedEvents: Event[] = [];
  // current id → firstSeen inherited from a StableKey predecessor
  const inheritedFirstSeen = new Map<string, string>();

  for (const [id, oldEvent] of Object.entries(previousEvents)) {
    if (currentById.has(id)) continue;

    const successor = currentByStableKey.get(oldEvent.stableKey);
    if (successor) {
      fieldChanges.push(compareEvents(oldEvent, successor, detectedAt));
      if (!inheritedFirstSeen.has(successor.id) && !(successor.id in previousEvents)) {
        inheritedFirstSeen.set(successor.id, oldEvent.firstSeen);
      }
    } else {
      removedEvents.push(oldEvent);
    }
  }

  const newEvents = [...currentById.values()].filter(
    (event) => !(event.id in previousEvents) && !(event.stableKey in previousIndex)
  );

  const carried = [...currentById.values()].map((event) => {
    const firstSeen =
      previousEvents[event.id]?.firstSeen ?? inheritedFirstSeen.get(event.id);
    return firstSeen ? { ...event, firstSeen } : event;
  });

  const headlineChanges: EventChange[] = [
    ...newEvents.map((event): EventChange => ({
      eventId: event.id,
      changeType: CHANGE_TYPES.NEW,
      oldValue: "",
      newValue: event.title,
      detectedAt,
    })),
    ...removedEvents.map((event): EventChange => ({
      eventId: event.id,
      changeType: CHANGE_TYPES.REMOVED,
      oldValue: event.title,
      newValue: "",
      detectedAt,
    })),
  ];

  const snapshot = finalizeSnapshot({
    events: carried,
    previousChangeLog: previous?.changeLog ?? [],
    previousRemoved: previous?.removedEvents ?? {},
    fieldChanges,
    removedEvents,
    now,
  });

  logger.info(
    {
      isFirstRun: previous === null,
      current: current.length,
      newCount: newEvents.length,
      removedCount: removedEvents.length,
      changedCount: fieldChanges.length,
    },
    "Change detection complete"
  );

  return {
    isFirstRun: previous === null,
    newEvents,
    removedEvents,
    fieldChanges,
    headlineChanges,
    snapshot,
  };
}

/** Keep only events belonging to `scope` ("ALL" keeps everything) */
export function filterEventsByScope(events: Event[], scope: StateScope): Event[] {
  if (scope === ALL_STATES) return events;
  return events.filter((event) => event.state.toUpperCase() === scope.toUpperCase());
}

export interface ChangeLogFilter {
  /** Change types to keep; defaults to every type except new and removed */
  types?: ChangeType[];
  /** Only entries detected at or after this time */
  since?: Date;
}

/**
 * The change log view handed to notifiers and the API.
 * new/removed entries are excluded by default since they are reported
 * separately as the headline.
 */
export function filterChangeLog(
  log: EventChange[],
  filter: ChangeLogFilter = {}
): EventChange[] {
  const types: ChangeType[] = filter.types ?? [
    CHANGE_TYPES.DATE_CHANGED,
    CHANGE_TYPES.TITLE_CHANGED,
    CHANGE_TYPES.CITY_CHANGED,
    CHANGE_TYPES.UNKNOWN,
  ];
  const since = filter.since?.getTime();

  return log.filter(
    (change) =>
      types.includes(change.changeType) &&
      (since === undefined || Date.parse(change.detectedAt) >= since)
  );
}
