import { describe, expect, it } from "vitest";
import {
  computeEventId,
  computeStableKey,
  createEvent,
  dedupeById,
  normalizeField,
  stableTitle,
} from "../../src/processing/identity";
import { hashString } from "../../src/shared/utils/hash";
import { SOURCE_URL, makeEvent } from "../helpers/fixtures";

describe("identity", () => {
  it("normalizes by trimming and lower-casing", () => {
    expect(normalizeField("  Las Vegas ")).toBe("las vegas");
    expect(normalizeField(undefined)).toBe("");
  });

  it("hashes the normalized state, title and city joined by a pipe", () => {
    expect(computeEventId("NV", "Chimera Golf Club 4.4.26", "Las Vegas")).toBe(
      hashString("nv|chimera golf club 4.4.26|las vegas")
    );
    expect(computeEventId("AZ", "Desert Ridge Classic")).toBe(
      hashString("az|desert ridge classic|")
    );
  });

  it("ignores case and surrounding whitespace in ids", () => {
    expect(computeEventId(" nv ", "CHIMERA GOLF CLUB 4.4.26", "las vegas ")).toBe(
      computeEventId("NV", "Chimera Golf Club 4.4.26", "Las Vegas")
    );
  });

  it("gives a new id but the same stable key when only the embedded date moves", () => {
    expect(computeEventId("NV", "Chimera Golf Club 4.5.26", "Las Vegas")).not.toBe(
      computeEventId("NV", "Chimera Golf Club 4.4.26", "Las Vegas")
    );
    expect(computeStableKey("NV", "Chimera Golf Club 4.5.26", "Las Vegas")).toBe(
      computeStableKey("NV", "Chimera Golf Club 4.4.26", "Las Vegas")
    );
  });

  it("reduces titles to their identifying words", () => {
    expect(stableTitle("Chimera Golf Club 4.4.26")).toBe("chimera golf club");
    expect(stableTitle("St. George's Open, Jan 24!")).toBe("st george s open");
  });

  it("collapses whitespace in the city for the stable key", () => {
    expect(computeStableKey("NV", "Chimera Golf Club", "Las  Vegas")).toBe(
      hashString("nv|chimera golf club|las vegas")
    );
  });

  it("omits an empty city from the event", () => {
    const event = createEvent(
      {
        state: "AZ",
        title: "Desert Ridge Classic",
        dateText: "",
        city: "",
        raw: "AZ - Desert Ridge Classic",
        sourceUrl: SOURCE_URL,
      },
      "2026-03-01T12:00:00.000Z"
    );

    expect("city" in event).toBe(false);
    expect(event.firstSeen).toBe("2026-03-01T12:00:00.000Z");
  });

  it("keeps the first event per id", () => {
    const first = makeEvent({ state: "NV", title: "Chimera Golf Club", raw: "first" });
    const second = makeEvent({ state: "NV", title: "chimera golf club", raw: "second" });
    const other = makeEvent({ state: "UT", title: "Sunbrook Golf Club" });

    expect(dedupeById([first, other, second])).toEqual([first, other]);
  });
});
