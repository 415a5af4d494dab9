import { describe, expect, it, vi } from "vitest";
import { runOnce, startScheduler, stopScheduler } from "../../src/scheduler/scheduler.service";
import { FetchFailedError } from "../../src/shared/errors/check.errors";
import { makeReport } from "../helpers/fixtures";

describe("scheduler", () => {
  it("checks every scope and carries on past failures", async () => {
    const check = vi.fn(async (scope: string) => {
      if (scope === "UT") throw new FetchFailedError("Fetching listing: timeout");
      return makeReport({ scope });
    });

    const reports = await runOnce(["ALL", "UT", "NV"], check);

    expect(check.mock.calls.map(([scope]) => scope)).toEqual(["ALL", "UT", "NV"]);
    expect(reports.map((r) => r.scope)).toEqual(["ALL", "NV"]);
  });

  it("refuses an invalid cron expression", () => {
    expect(() => startScheduler("every six hours")).toThrow(
      'Invalid CHECK_CRON expression: "every six hours"'
    );
  });

  it("starts and stops a valid schedule", () => {
    expect(() => startScheduler("0 */6 * * *")).not.toThrow();
    stopScheduler();
  });
});
