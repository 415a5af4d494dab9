import { describe, expect, it } from "vitest";
import {
  isOlderThanDays,
  isPastEvent,
  isUpcoming,
  isWithinDays,
  parseEventDate,
} from "../../src/shared/utils/date";

const now = new Date("2026-04-01T00:00:00.000Z");

describe("date utils", () => {
  it("parses the date shapes used on the listing", () => {
    expect(parseEventDate("Mar 13 2026", "UTC")?.format("YYYY-MM-DD")).toBe("2026-03-13");
    expect(parseEventDate("4.4.26", "UTC")?.format("YYYY-MM-DD")).toBe("2026-04-04");
    expect(parseEventDate("02/15/26", "UTC")?.format("YYYY-MM-DD")).toBe("2026-02-15");
    expect(parseEventDate("4/5/2026", "UTC")?.format("YYYY-MM-DD")).toBe("2026-04-05");
  });

  it("accepts zero-padded month and day numbers", () => {
    expect(parseEventDate("04.04.2026", "UTC")?.format("YYYY-MM-DD")).toBe("2026-04-04");
    expect(parseEventDate("02.05.26", "UTC")?.format("YYYY-MM-DD")).toBe("2026-02-05");
    expect(parseEventDate("4/05/26", "UTC")?.format("YYYY-MM-DD")).toBe("2026-04-05");
    expect(parseEventDate("Mar 03 2026", "UTC")?.format("YYYY-MM-DD")).toBe("2026-03-03");
  });

  it("returns null for text that is not a valid date", () => {
    expect(parseEventDate("", "UTC")).toBeNull();
    expect(parseEventDate("TBD", "UTC")).toBeNull();
    expect(parseEventDate("Feb 30 2026", "UTC")).toBeNull();
  });

  it("treats unparseable dates as upcoming and never past", () => {
    expect(isPastEvent("TBD", now)).toBe(false);
    expect(isUpcoming("TBD", now)).toBe(true);
    expect(isPastEvent("Mar 13 2026", now)).toBe(true);
    expect(isUpcoming("Mar 13 2026", now)).toBe(false);
  });

  it("checks whether an event falls within a window", () => {
    expect(isWithinDays("Apr 18 2026", 30, now)).toBe(true);
    expect(isWithinDays("Apr 18 2026", 7, now)).toBe(false);
    expect(isWithinDays("Apr 18 2026", 0, now)).toBe(true);
  });

  it("counts an event dated today as within the window", () => {
    // 2026-04-01T00:00Z is the evening of Mar 31 in Los Angeles
    expect(isWithinDays("Mar 31 2026", 7, now)).toBe(true);
    expect(isWithinDays("Mar 30 2026", 7, now)).toBe(false);
  });

  it("compares timestamps against a day window strictly", () => {
    expect(isOlderThanDays("2026-03-01T23:59:59.000Z", 30, now)).toBe(true);
    expect(isOlderThanDays("2026-03-02T00:00:00.000Z", 30, now)).toBe(false);
  });
});
