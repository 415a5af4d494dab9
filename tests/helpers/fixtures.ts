import type { Event, ExtractedEventFields } from "../../src/shared/types/event.types";
import type { CheckReport } from "../../src/workers/check.types";
import { createEvent } from "../../src/processing/identity";

export const SOURCE_URL = "https://listing.test/state-events/";

export const RUN_1 = new Date("2026-03-01T12:00:00.000Z");
export const RUN_2 = new Date("2026-03-02T12:00:00.000Z");

/** Build an Event the way the extractor would */
export function makeEvent(
  fields: Partial<ExtractedEventFields> & Pick<ExtractedEventFields, "state" | "title">,
  seenAt: Date = RUN_1
): Event {
  return createEvent(
    {
      dateText: "",
      raw: `${fields.state} - ${fields.title}${fields.city ? ` - ${fields.city}` : ""}`,
      sourceUrl: SOURCE_URL,
      ...fields,
    },
    seenAt.toISOString()
  );
}

export function makeReport(overrides: Partial<CheckReport> = {}): CheckReport {
  return {
    scope: "ALL",
    checkedAt: RUN_1.toISOString(),
    sourceUrl: SOURCE_URL,
    eventCount: 0,
    newEvents: [],
    removedEvents: [],
    changedEvents: [],
    isFirstRun: false,
    refreshed: false,
    durationMs: 5,
    ...overrides,
  };
}
