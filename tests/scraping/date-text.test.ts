import { describe, expect, it } from "vitest";
import { extractDate, stripDateTokens } from "../../src/scraping/extractors/date-text";

describe("date-text", () => {
  describe("extractDate", () => {
    it("finds a dotted date", () => {
      expect(extractDate("Chimera Golf Club 4.4.26")).toBe("4.4.26");
    });

    it("finds a month and day, any case", () => {
      expect(extractDate("Spring Classic Jan 24")).toBe("Jan 24");
      expect(extractDate("spring classic feb 8")).toBe("feb 8");
    });

    it("finds a slashed date", () => {
      expect(extractDate("Qualifier 02/15/26")).toBe("02/15/26");
    });

    it("prefers the dotted shape over a month token", () => {
      expect(extractDate("Mar 3 makeup of 4.4.26")).toBe("4.4.26");
    });

    it("returns an empty string when nothing looks like a date", () => {
      expect(extractDate("Sunbrook Golf Club")).toBe("");
    });
  });

  describe("stripDateTokens", () => {
    it("replaces each date with a space", () => {
      expect(stripDateTokens("chimera golf club 4.4.26")).toBe("chimera golf club  ");
    });

    it("removes every occurrence", () => {
      expect(stripDateTokens("a 1.2.26 b 3.4.26")).toBe("a   b  ");
    });

    it("leaves dateless text alone", () => {
      expect(stripDateTokens("sunbrook golf club")).toBe("sunbrook golf club");
    });
  });
});
