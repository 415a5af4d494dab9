/**
 * Application Constants
 *
 * Static values that don't change per environment: retention limits,
 * change types, scope sentinel, line patterns and error codes.
 */

// --- Snapshot retention ---
export const RETENTION = {
  /** Maximum ChangeLog entries kept per snapshot (oldest evicted first) */
  CHANGE_LOG_LIMIT: 100,
  /** Removed events older than this are purged at the start of each run */
  REMOVED_RETENTION_DAYS: 30,
} as const;

// --- Scope ---
/** Sentinel scope meaning "every state"; never a property of an event */
export const ALL_STATES = "ALL";

// --- Change Detection ---
export const CHANGE_TYPES = {
  NEW: "new",
  REMOVED: "removed",
  DATE_CHANGED: "date-changed",
  TITLE_CHANGED: "title-changed",
  CITY_CHANGED: "city-changed",
  UNKNOWN: "unknown",
} as const;

// --- Listing line shapes ---
// Order matters: the extractor tries the stricter shapes first.
export const LINE_PATTERNS = {
  /** "[Mar 13 2026] UT - Sunbrook Golf Club - St. George" */
  DATED_EVENT_WITH_CITY: /^\[(.*?)\]\s+([A-Z]{2})\s*-\s*(.+?)\s*-\s*(.+)$/,
  /** "[Mar 13 2026] UT - Sunbrook Golf Club" */
  DATED_EVENT: /^\[(.*?)\]\s+([A-Z]{2})\s*-\s*(.+)$/,
  /** "[Feb 13 2026]" */
  BRACKETED_DATE: /^\[(.*?)\]$/,
  /** "NV - Chimera Golf Club 4.4.26 - Las Vegas" */
  EVENT_WITH_CITY: /^([A-Z]{2})\s*-\s*(.+?)\s*-\s*(.+)$/,
  /** "NV - Chimera Golf Club 4.4.26" */
  EVENT: /^([A-Z]{2})\s*-\s*(.+)$/,
  /** Month, day and year announced on separate lines */
  MONTH: /^(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec)$/,
  DAY: /^\d{1,2}$/,
  YEAR: /^20\d{2}$/,
} as const;

/** Titles shorter than this on a city-less line are treated as page furniture */
export const MIN_TITLE_LENGTH = 5;

// --- Error Codes ---
// Classified error types for check reports and retry decisions.
export const ERROR_CODES = {
  SOURCE_UNREACHABLE: "SOURCE_UNREACHABLE",
  SNAPSHOT_CORRUPT: "SNAPSHOT_CORRUPT",
  SNAPSHOT_WRITE_FAILED: "SNAPSHOT_WRITE_FAILED",
  INVALID_SCOPE: "INVALID_SCOPE",
  UNKNOWN: "UNKNOWN",
} as const;

// --- Retry Configuration ---
export const RETRY_CONFIG = {
  BACKOFF_FACTOR: 2,
} as const;
