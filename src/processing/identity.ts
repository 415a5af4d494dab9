/**
 * Identity Assigner
 *
 * The listing has no record identifiers, so every event gets two derived ones:
 *
 * - id: exact content (state, title, city after trim + lower-case). Any
 *   detail change yields a new id.
 * - stableKey: same fields, but the title also loses embedded dates,
 *   punctuation and repeated whitespace. A course whose listed date moves
 *   from "4.4.26" to "4.5.26" keeps its stableKey while its id changes,
 *   which lets the change detector report "date changed" instead of
 *   "removed" plus "new".
 */
import type { Event, ExtractedEventFields } from "../shared/types/event.types";
import { hashParts } from "../shared/utils/hash";
import { stripDateTokens } from "../scraping/extractors/date-text";

export function normalizeField(value: string | undefined): string {
  return (value ?? "").trim().toLowerCase();
}

/** Title reduced to the tokens that identify the event across runs */
export function stableTitle(title: string): string {
  return stripDateTokens(normalizeField(title))
    .replace(/[^\p{L}\p{N}\s]+/gu, " ")
    .replace(/\s+/g, " ")
    .trim();
}

export function computeEventId(state: string, title: string, city?: string): string {
  return hashParts([normalizeField(state), normalizeField(title), normalizeField(city)]);
}

export function computeStableKey(state: string, title: string, city?: string): string {
  return hashParts([
    normalizeField(state),
    stableTitle(title),
    normalizeField(city).replace(/\s+/g, " "),
  ]);
}

/**
 * Build an Event from extracted line fields.
 *
 * @param seenAt - ISO timestamp of the run; becomes firstSeen until a
 *   previous snapshot says otherwise
 */
export function createEvent(fields: ExtractedEventFields, seenAt: string): Event {
  const event: Event = {
    id: computeEventId(fields.state, fields.title, fields.city),
    stableKey: computeStableKey(fields.state, fields.title, fields.city),
    state: fields.state,
    title: fields.title,
    dateText: fields.dateText,
    raw: fields.raw,
    sourceUrl: fields.sourceUrl,
    firstSeen: seenAt,
  };
  if (fields.city) event.city = fields.city;
  return event;
}

/** Keep the first event for each id, preserving order */
export function dedupeById(events: Event[]): Event[] {
  const seen = new Set<string>();
  const unique: Event[] = [];
  for (const event of events) {
    if (seen.has(event.id)) continue;
    seen.add(event.id);
    unique.push(event);
  }
  return unique;
}
