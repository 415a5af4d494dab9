import { describe, expect, it } from "vitest";
import type { EventChange } from "../../src/shared/types/event.types";
import {
  appendChangeLog,
  archiveRemovedEvents,
  buildStableIndex,
  createSnapshot,
  emptySnapshot,
  pruneRemovedEvents,
} from "../../src/processing/snapshot-manager";
import { RUN_1, makeEvent } from "../helpers/fixtures";

function change(n: number): EventChange {
  return {
    eventId: `evt-${n}`,
    changeType: "date-changed",
    oldValue: `${n}.1.26`,
    newValue: `${n}.2.26`,
    detectedAt: RUN_1.toISOString(),
  };
}

describe("snapshot-manager", () => {
  it("starts empty", () => {
    expect(emptySnapshot("2026-03-01T12:00:00.000Z")).toEqual({
      events: {},
      stableIndex: {},
      changeLog: [],
      removedEvents: {},
      capturedAt: "2026-03-01T12:00:00.000Z",
    });
  });

  it("indexes stable keys, first event wins on a shared key", () => {
    const early = makeEvent({ state: "NV", title: "Chimera Golf Club 4.4.26", city: "Las Vegas" });
    const late = makeEvent({ state: "NV", title: "Chimera Golf Club 4.5.26", city: "Las Vegas" });

    expect(buildStableIndex([early, late])).toEqual({ [early.stableKey]: early.id });
  });

  it("builds the event map and its index together", () => {
    const a = makeEvent({ state: "NV", title: "Chimera Golf Club" });
    const b = makeEvent({ state: "UT", title: "Sunbrook Golf Club" });

    const snapshot = createSnapshot([a, b], RUN_1.toISOString());

    expect(Object.keys(snapshot.events)).toEqual([a.id, b.id]);
    expect(snapshot.stableIndex).toEqual({ [a.stableKey]: a.id, [b.stableKey]: b.id });
  });

  describe("appendChangeLog", () => {
    it("appends while under the limit", () => {
      expect(appendChangeLog([change(1)], [change(2)])).toEqual([change(1), change(2)]);
    });

    it("evicts the oldest entries past the limit", () => {
      const log = Array.from({ length: 99 }, (_, i) => change(i));
      const next = appendChangeLog(log, [change(99), change(100)]);

      expect(next).toHaveLength(100);
      expect(next[0]).toEqual(change(1));
      expect(next[99]).toEqual(change(100));
    });

    it("honours a custom limit", () => {
      expect(appendChangeLog([change(1), change(2)], [change(3)], 2)).toEqual([
        change(2),
        change(3),
      ]);
    });
  });

  describe("pruneRemovedEvents", () => {
    const now = new Date("2026-04-01T00:00:00.000Z");
    const event = makeEvent({ state: "NV", title: "Chimera Golf Club" });

    it("drops entries older than the retention window", () => {
      const archive = {
        old: { event, removedAt: "2026-03-01T23:59:59.000Z" },
        exact: { event, removedAt: "2026-03-02T00:00:00.000Z" },
        recent: { event, removedAt: "2026-03-20T00:00:00.000Z" },
      };

      expect(Object.keys(pruneRemovedEvents(archive, now))).toEqual(["exact", "recent"]);
    });
  });

  it("stamps archived removals with the run time", () => {
    const event = makeEvent({ state: "NV", title: "Chimera Golf Club" });
    const archive = archiveRemovedEvents({}, [event], "2026-03-02T12:00:00.000Z");

    expect(archive).toEqual({
      [event.id]: { event, removedAt: "2026-03-02T12:00:00.000Z" },
    });
  });
});
