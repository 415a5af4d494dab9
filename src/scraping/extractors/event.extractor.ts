/**
 * Event Extractor
 *
 * Turns the listing's plain text into Event records. The page has no
 * structure to rely on, so each line is matched against an ordered list of
 * line shapes; the first rule that claims a line wins and the next line is
 * processed. Stricter shapes come first because the looser ones would also
 * match their lines.
 *
 * Lines nobody claims (navigation, links, prose) are dropped silently.
 */
import type { Event, ExtractedEventFields } from "../../shared/types/event.types";
import { LINE_PATTERNS, MIN_TITLE_LENGTH } from "../../config/constants";
import { createEvent, dedupeById } from "../../processing/identity";
import { logger } from "../../monitoring/logger";
import {
  type DateContext,
  applyDateSignal,
  consumeActiveDate,
  dateContextState,
  initialDateContext,
  splitLines,
  withActiveDate,
} from "./date-context";
import { extractDate } from "./date-text";

/** What a rule did with a line: new context, plus an event if one was found */
interface LineOutcome {
  ctx: DateContext;
  fields?: ExtractedEventFields;
}

interface LineRule {
  name: string;
  apply: (line: string, ctx: DateContext, sourceUrl: string) => LineOutcome | null;
}

/** Link text and short labels that happen to look like "XX - something" */
function looksLikeFurniture(title: string): boolean {
  return title.includes("http") || title.length < MIN_TITLE_LENGTH;
}

/** Remove the leading "[...]" from a bracket-prefixed line */
function stripBracketPrefix(line: string, bracketContent: string): string {
  const prefix = `[${bracketContent}]`;
  return (line.startsWith(prefix) ? line.slice(prefix.length) : line).trim();
}

/** Active date if one is pending, otherwise a date written in the title */
function resolveUndatedLine(
  ctx: DateContext,
  title: string
): { ctx: DateContext; dateText: string } {
  const consumed = consumeActiveDate(ctx);
  return {
    ctx: consumed.ctx,
    dateText: consumed.date !== "" ? consumed.date : extractDate(title),
  };
}

const LINE_RULES: LineRule[] = [
  {
    name: "multi-line-date",
    apply: (line, ctx) => {
      const next = applyDateSignal(ctx, line);
      return next ? { ctx: next } : null;
    },
  },
  {
    name: "dated-event-with-city",
    apply: (line, ctx, sourceUrl) => {
      const m = LINE_PATTERNS.DATED_EVENT_WITH_CITY.exec(line);
      if (!m) return null;
      return {
        ctx,
        fields: {
          state: m[2],
          title: m[3].trim(),
          dateText: m[1].trim(),
          city: m[4].trim(),
          raw: stripBracketPrefix(line, m[1]),
          sourceUrl,
        },
      };
    },
  },
  {
    name: "dated-event",
    apply: (line, ctx, sourceUrl) => {
      const m = LINE_PATTERNS.DATED_EVENT.exec(line);
      if (!m) return null;
      const title = m[3].trim();
      if (looksLikeFurniture(title)) return { ctx };
      return {
        ctx,
        fields: {
          state: m[2],
          title,
          dateText: m[1].trim(),
          raw: stripBracketPrefix(line, m[1]),
          sourceUrl,
        },
      };
    },
  },
  {
    name: "bracketed-date",
    apply: (line, ctx) => {
      const m = LINE_PATTERNS.BRACKETED_DATE.exec(line);
      if (!m) return null;
      return { ctx: withActiveDate(ctx, m[1].trim()) };
    },
  },
  {
    name: "event-with-city",
    apply: (line, ctx, sourceUrl) => {
      const m = LINE_PATTERNS.EVENT_WITH_CITY.exec(line);
      if (!m) return null;
      const title = m[2].trim();
      const resolved = resolveUndatedLine(ctx, title);
      return {
        ctx: resolved.ctx,
        fields: {
          state: m[1],
          title,
          dateText: resolved.dateText,
          city: m[3].trim(),
          raw: line,
          sourceUrl,
        },
      };
    },
  },
  {
    name: "event",
    apply: (line, ctx, sourceUrl) => {
      const m = LINE_PATTERNS.EVENT.exec(line);
      if (!m) return null;
      const title = m[2].trim();
      if (looksLikeFurniture(title)) return { ctx };
      const resolved = resolveUndatedLine(ctx, title);
      return {
        ctx: resolved.ctx,
        fields: {
          state: m[1],
          title,
          dateText: resolved.dateText,
          raw: line,
          sourceUrl,
        },
      };
    },
  },
];

/**
 * Extract line fields in document order, duplicates included.
 * Exposed separately so the line rules can be tested without hashing.
 */
export function extractEventFields(
  text: string,
  sourceUrl: string
): ExtractedEventFields[] {
  const results: ExtractedEventFields[] = [];
  let ctx = initialDateContext();

  for (const line of splitLines(text)) {
    for (const rule of LINE_RULES) {
      const outcome = rule.apply(line, ctx, sourceUrl);
      if (!outcome) continue;
      ctx = outcome.ctx;
      if (outcome.fields) results.push(outcome.fields);
      logger.trace({ rule: rule.name, line }, "Line claimed");
      break;
    }
  }

  const trailing = dateContextState(ctx);
  if (trailing === "have-month" || trailing === "have-month-day") {
    logger.debug({ sourceUrl, trailing }, "Listing ended inside a multi-line date");
  }

  return results;
}

/**
 * Extract all events from page text.
 *
 * @param text - Entity-decoded page text, one listing line per text line
 * @param sourceUrl - Page URL recorded on every event
 * @param seenAt - ISO timestamp of this run, used as firstSeen
 * @returns Events deduplicated by id (first occurrence kept), in document order
 */
export function extractEvents(
  text: string,
  sourceUrl: string,
  seenAt: string
): Event[] {
  const extracted = extractEventFields(text, sourceUrl).map((fields) =>
    createEvent(fields, seenAt)
  );
  const events = dedupeById(extracted);

  logger.debug(
    {
      sourceUrl,
      extracted: extracted.length,
      duplicates: extracted.length - events.length,
    },
    "Events extracted from listing"
  );

  return events;
}
