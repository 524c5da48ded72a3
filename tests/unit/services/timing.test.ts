import { describe, expect, it } from "vitest";
import {
  TimingCollector,
  formatElapsed,
  formatRunMetrics,
} from "../../../src/services/timing.js";

describe("formatElapsed", () => {
  it("renders H:MM:SS with whole seconds", () => {
    expect(formatElapsed(0)).toBe("0:00:00");
    expect(formatElapsed(59_999)).toBe("0:00:59");
    expect(formatElapsed(3_723_000)).toBe("1:02:03");
  });

  it("does not wrap hours", () => {
    expect(formatElapsed(90_061_000)).toBe("25:01:01");
  });

  it("clamps negative durations", () => {
    expect(formatElapsed(-5_000)).toBe("0:00:00");
  });
});

describe("TimingCollector", () => {
  it("records sync operations even when they throw", () => {
    const timing = new TimingCollector(new Date(2026, 0, 5));

    expect(timing.timeSync("step", () => 7)).toBe(7);
    expect(() =>
      timing.timeSync("step", () => {
        throw new Error("boom");
      })
    ).toThrow("boom");

    expect(timing.entries("step")).toHaveLength(2);
    expect(timing.summarize("step")?.count).toBe(2);
    expect(timing.summarize("missing")).toBeNull();
  });

  it("keeps context and groups entries by first-seen stage", () => {
    const timing = new TimingCollector(new Date(2026, 0, 5, 8, 0, 0));
    timing.record("evaluateMessage", 1, { messageIndex: 0 });
    timing.record("buildIndex", 2);
    timing.record("evaluateMessage", 3, { messageIndex: 1 });

    expect(timing.runId).toBe("run-20260105-080000");
    expect(timing.entries().map((e) => [e.stage, e.durationMs])).toEqual([
      ["evaluateMessage", 1],
      ["evaluateMessage", 3],
      ["buildIndex", 2],
    ]);
    expect(timing.entries("evaluateMessage")[1]?.context).toEqual({ messageIndex: 1 });
  });

  it("finalizes run metrics", () => {
    const start = new Date(2026, 0, 5, 8, 0, 0);
    const timing = new TimingCollector(start);
    timing.record("buildIndex", 2);
    timing.record("evaluateMessage", 4);
    timing.record("evaluateMessage", 6);

    const metrics = timing.finalize(2, 1, new Date(2026, 0, 5, 8, 0, 30));

    expect(metrics.totalDurationMs).toBe(30_000);
    expect(metrics.summaries).toEqual([
      { operation: "buildIndex", count: 1, totalMs: 2, maxMs: 2, avgMs: 2 },
      { operation: "evaluateMessage", count: 2, totalMs: 10, maxMs: 6, avgMs: 5 },
    ]);

    const lines = formatRunMetrics(metrics).split("\n");
    expect(lines[0]).toBe("=== Run Metrics (run-20260105-080000) ===");
    expect(lines.slice(1)).toEqual([
      "Duration: 0:00:30",
      "Messages: 2",
      "Attachments saved: 1",
      "  buildIndex: count=1, total=2ms, avg=2.0ms, max=2.0ms",
      "  evaluateMessage: count=2, total=10ms, avg=5.0ms, max=6.0ms",
    ]);
  });
});
