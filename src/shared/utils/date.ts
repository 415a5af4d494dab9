/**
 * Timezone-Aware Date Utilities
 *
 * Event dates on the listing are free text. These helpers interpret them
 * best-effort for sorting and filtering; extraction never depends on them.
 * Year-less dates ("Jan 24") are read in the configured timezone's current year.
 */
import moment from "moment-timezone";
import config from "../../config";

/** Strict month/day tokens, with and without zero padding */
const MONTH_DAY = [
  ["M", "D"],
  ["MM", "DD"],
  ["M", "DD"],
  ["MM", "D"],
];

function numericFormats(separator: string, year: string): string[] {
  return MONTH_DAY.map(([month, day]) => [month, day, year].join(separator));
}

/** Formats seen on the listing, tried strictly in order */
const EVENT_DATE_FORMATS = [
  "MMM D YYYY",
  "MMM DD YYYY",
  ...numericFormats(".", "YY"),
  ...numericFormats(".", "YYYY"),
  ...numericFormats("/", "YY"),
  ...numericFormats("/", "YYYY"),
  "MMM D",
  "MMM DD",
];

/**
 * Parse an event's dateText.
 * Returns null when no known format matches.
 */
export function parseEventDate(
  dateText: string,
  timezone: string = config.timezone
): moment.Moment | null {
  const trimmed = dateText.trim();
  if (trimmed === "") return null;

  for (const format of EVENT_DATE_FORMATS) {
    const parsed = moment.tz(trimmed, format, true, timezone);
    if (parsed.isValid()) return parsed;
  }

  return null;
}

/** An unparseable date is never considered past */
export function isPastEvent(dateText: string, now: Date = new Date()): boolean {
  const parsed = parseEventDate(dateText);
  if (!parsed) return false;
  return parsed.isBefore(now);
}

/** An unparseable date is always considered upcoming */
export function isUpcoming(dateText: string, now: Date = new Date()): boolean {
  const parsed = parseEventDate(dateText);
  if (!parsed) return true;
  return parsed.isAfter(now);
}

/**
 * True when the event falls between the start of today and `days` days ahead.
 * days <= 0 disables the filter; unparseable dates are included.
 */
export function isWithinDays(
  dateText: string,
  days: number,
  now: Date = new Date()
): boolean {
  if (days <= 0) return true;
  const parsed = parseEventDate(dateText);
  if (!parsed) return true;
  const startOfToday = moment.tz(now, config.timezone).startOf("day");
  const cutoff = moment(now).add(days, "days");
  return parsed.isSameOrAfter(startOfToday) && parsed.isBefore(cutoff);
}

/** True when `timestamp` lies strictly more than `days` days before `now` */
export function isOlderThanDays(
  timestamp: string,
  days: number,
  now: Date
): boolean {
  const cutoff = moment.utc(now).subtract(days, "days");
  return moment.utc(timestamp).isBefore(cutoff);
}
