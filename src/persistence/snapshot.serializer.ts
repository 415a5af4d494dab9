/**
 * Snapshot Serializer
 *
 * Maps the in-memory Snapshot to the snake_case document written to disk
 * and back. The StableKey index is not trusted on the way in: it is
 * rebuilt from the events so the two can never drift apart.
 */
import type { ChangeType, Event, EventChange } from "../shared/types/event.types";
import type { RemovedEventEntry, Snapshot } from "../shared/types/snapshot.types";
import type {
  ChangeDocument,
  EventDocument,
  SnapshotDocument,
} from "../processing/data-validator";
import { CHANGE_TYPES } from "../config/constants";
import { buildStableIndex } from "../processing/snapshot-manager";

const KNOWN_CHANGE_TYPES: readonly ChangeType[] = Object.values(CHANGE_TYPES);

function toChangeType(value: string): ChangeType {
  return KNOWN_CHANGE_TYPES.find((type) => type === value) ?? CHANGE_TYPES.UNKNOWN;
}

function eventToDocument(event: Event): EventDocument {
  const doc: EventDocument = {
    id: event.id,
    stable_key: event.stableKey,
    state: event.state,
    title: event.title,
    date_text: event.dateText,
    raw: event.raw,
    source_url: event.sourceUrl,
    first_seen: event.firstSeen,
  };
  if (event.city) doc.city = event.city;
  return doc;
}

function eventFromDocument(doc: EventDocument): Event {
  const event: Event = {
    id: doc.id,
    stableKey: doc.stable_key,
    state: doc.state,
    title: doc.title,
    dateText: doc.date_text,
    raw: doc.raw,
    sourceUrl: doc.source_url,
    firstSeen: doc.first_seen,
  };
  if (doc.city) event.city = doc.city;
  return event;
}

function changeToDocument(change: EventChange): ChangeDocument {
  return {
    event_id: change.eventId,
    change_type: change.changeType,
    old_value: change.oldValue,
    new_value: change.newValue,
    detected_at: change.detectedAt,
  };
}

function changeFromDocument(doc: ChangeDocument): EventChange {
  return {
    eventId: doc.event_id,
    changeType: toChangeType(doc.change_type),
    oldValue: doc.old_value,
    newValue: doc.new_value,
    detectedAt: doc.detected_at,
  };
}

export function toDocument(snapshot: Snapshot): SnapshotDocument {
  const events: Record<string, EventDocument> = {};
  for (const [id, event] of Object.entries(snapshot.events)) {
    events[id] = eventToDocument(event);
  }

  const removed: SnapshotDocument["removed_events"] = {};
  for (const [id, entry] of Object.entries(snapshot.removedEvents)) {
    removed[id] = { event: eventToDocument(entry.event), removed_at: entry.removedAt };
  }

  return {
    events,
    stable_index: { ...snapshot.stableIndex },
    change_log: snapshot.changeLog.map(changeToDocument),
    removed_events: removed,
    captured_at: snapshot.capturedAt,
  };
}

export function fromDocument(doc: SnapshotDocument): Snapshot {
  const events: Record<string, Event> = {};
  for (const [id, eventDoc] of Object.entries(doc.events)) {
    events[id] = eventFromDocument(eventDoc);
  }

  const removedEvents: Record<string, RemovedEventEntry> = {};
  for (const [id, entry] of Object.entries(doc.removed_events)) {
    removedEvents[id] = { event: eventFromDocument(entry.event), removedAt: entry.removed_at };
  }

  return {
    events,
    stableIndex: buildStableIndex(Object.values(events)),
    changeLog: doc.change_log.map(changeFromDocument),
    removedEvents,
    capturedAt: doc.captured_at,
  };
}
