import { describe, it, expect, vi } from "vitest";
import { DefaultProgressTracker } from "../src/tracker.js";

function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("DefaultProgressTracker", () => {
  it("keeps the latest state per unit", () => {
    const tracker = new DefaultProgressTracker();
    tracker.track("a.ts", "f:1", "pending");
    tracker.track("a.ts", "f:1", "processed");
    tracker.track("a.ts", "g:4", "skipped");
    expect([...tracker.states("a.ts")]).toEqual([
      ["f:1", "processed"],
      ["g:4", "skipped"],
    ]);
  });

  it("returns an empty map for unknown files", () => {
    expect(new DefaultProgressTracker().states("none.ts").size).toBe(0);
  });

  it("counts per file and overall", () => {
    const tracker = new DefaultProgressTracker();
    tracker.track("a.ts", "f:1", "processed");
    tracker.track("a.ts", "g:4", "failed");
    tracker.track("b.ts", "h:2", "pending");
    tracker.track("b.ts", "k:9", "skipped");

    expect(tracker.counts("a.ts")).toEqual({ pending: 0, processed: 1, failed: 1, skipped: 0 });
    expect(tracker.counts()).toEqual({ pending: 1, processed: 1, failed: 1, skipped: 1 });
    expect(tracker.summary()).toBe("1 documented, 1 failed, 1 skipped, 1 pending");
  });

  it("forgets a file on reset", () => {
    const tracker = new DefaultProgressTracker();
    tracker.track("a.ts", "f:1", "processed");
    tracker.reset("a.ts");
    expect(tracker.counts()).toEqual({ pending: 0, processed: 0, failed: 0, skipped: 0 });
  });

  it("logs transitions and progress", () => {
    const logger = fakeLogger();
    const tracker = new DefaultProgressTracker(logger);
    tracker.track("a.ts", "f:1", "pending");
    tracker.track("a.ts", "g:3", "pending");
    tracker.track("a.ts", "f:1", "processed");

    expect(logger.debug.mock.calls.map((c) => c[0])).toEqual([
      "a.ts: f:1 new -> pending",
      "a.ts: g:3 new -> pending",
      "a.ts: f:1 pending -> processed",
    ]);
    expect(logger.info).toHaveBeenCalledTimes(1);
    expect(logger.info).toHaveBeenCalledWith("[1/2] a.ts: f:1 processed");
  });

  it("leaves skipped units out of the total", () => {
    const logger = fakeLogger();
    const tracker = new DefaultProgressTracker(logger);
    tracker.track("a.ts", "ctor:2", "skipped");
    tracker.track("a.ts", "f:5", "pending");
    tracker.track("a.ts", "f:5", "failed");
    expect(logger.info).toHaveBeenCalledWith("[1/1] a.ts: f:5 failed");
  });
});
