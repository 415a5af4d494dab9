/**
 * Event Types
 *
 * Shapes for events extracted from the listing page and the changes
 * detected between runs.
 */
import type { CHANGE_TYPES } from "../../config/constants";

/**
 * One advertised occurrence on the listing page.
 * Timestamps are ISO-8601 strings so snapshots serialize losslessly.
 */
export interface Event {
  /** Exact-content identity: hash of normalized state, title and city */
  id: string;
  /** Drift-tolerant identity: hash with date tokens and punctuation stripped from the title */
  stableKey: string;
  /** Two-letter state code */
  state: string;
  title: string;
  /** Free text as found on the page, "" when no date was found */
  dateText: string;
  city?: string;
  /** Literal source line (bracketed date prefix removed) */
  raw: string;
  sourceUrl: string;
  /** When the event was first extracted; carried forward across runs */
  firstSeen: string;
}

/** Fields read off a single line, before identities are assigned */
export interface ExtractedEventFields {
  state: string;
  title: string;
  dateText: string;
  city?: string;
  raw: string;
  sourceUrl: string;
}

export type ChangeType = (typeof CHANGE_TYPES)[keyof typeof CHANGE_TYPES];

/** A single detected difference between two runs */
export interface EventChange {
  eventId: string;
  changeType: ChangeType;
  oldValue: string;
  newValue: string;
  detectedAt: string;
}

/** "ALL" or a two-letter upper-case state code, as returned by parseScope() */
export type StateScope = string;

export type SortOrder = "date" | "state" | "title";
