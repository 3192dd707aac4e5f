import { describe, it, expect } from "vitest";
import {
  buildReport,
  describeMode,
  formatDuration,
  renderReport,
  successRate,
  type ReportInput,
} from "./report.js";
import type { StatisticsSnapshot } from "../engine/session/statistics.js";

const SEPARATOR = "=".repeat(60);
const SUB_SEPARATOR = "-".repeat(60);

const finishedStats: StatisticsSnapshot = {
  submitted: 3,
  succeeded: 2,
  failed: 1,
  businessFailures: 1,
  transportFailures: 0,
  attempts: 4,
  areaUsage: { "DZ-A": 2, "DZ-B": 1 },
  storeUsage: { "L-1": 3 },
  hourly: [{ hour: 1, submitted: 3, succeeded: 2, businessFailures: 1, transportFailures: 0 }],
};

function input(overrides: Partial<ReportInput> = {}): ReportInput {
  return {
    sessionId: "s-1",
    taskType: "LiftToZone",
    mode: { kind: "count", count: 3 },
    state: "Completed",
    startedAt: 0,
    endedAt: 3_723_000,
    now: 0,
    stats: finishedStats,
    consecutiveFailures: 1,
    breakerThreshold: 5,
    ...overrides,
  };
}

describe("buildReport", () => {
  it("derives the termination reason, timings and success rate", () => {
    const report = buildReport(input());

    expect(report.terminationReason).toBe("Completed");
    expect(report.startedAt).toBe("1970-01-01T00:00:00.000Z");
    expect(report.endedAt).toBe("1970-01-01T01:02:03.000Z");
    expect(report.elapsedMs).toBe(3_723_000);
    expect(report.successRate).toBeCloseTo(2 / 3);
    expect(report.submitted).toBe(3);
  });

  it("uses the current time while the session is still running", () => {
    const report = buildReport(input({ state: "Running", endedAt: null, now: 90_000 }));

    expect(report.terminationReason).toBeNull();
    expect(report.endedAt).toBeNull();
    expect(report.elapsedMs).toBe(90_000);
  });
});

describe("renderReport", () => {
  it("renders a finished session", () => {
    expect(renderReport(buildReport(input()))).toEqual([
      SEPARATOR,
      "Session s-1 (LiftToZone)",
      SEPARATOR,
      "Termination: Completed",
      "Run mode:    3 tasks",
      "Started:     1970-01-01T00:00:00.000Z",
      "Ended:       1970-01-01T01:02:03.000Z",
      "Elapsed:     1:02:03",
      SUB_SEPARATOR,
      "Submitted:   3",
      "Succeeded:   2",
      "Failed:      1 (business 1, transport 0)",
      "Attempts:    4",
      "Success rate: 66.67%",
      "Consecutive failures: 1/5",
      SUB_SEPARATOR,
      "Area usage:",
      "  - DZ-A: 2",
      "  - DZ-B: 1",
      "Store usage:",
      "  - L-1: 3",
      SEPARATOR,
    ]);
  });

  it("adds an hourly table once the session spans several hours", () => {
    const lines = renderReport(
      buildReport(
        input({
          state: "Running",
          endedAt: null,
          now: 90_000,
          mode: { kind: "duration", durationMs: 7_200_000 },
          stats: {
            ...finishedStats,
            areaUsage: {},
            storeUsage: {},
            hourly: [
              { hour: 1, submitted: 2, succeeded: 1, businessFailures: 0, transportFailures: 1 },
              { hour: 2, submitted: 1, succeeded: 1, businessFailures: 0, transportFailures: 0 },
            ],
          },
        }),
      ),
    );

    expect(lines[3]).toBe("Termination: still running");
    expect(lines[4]).toBe("Run mode:    2:00:00 wall clock");
    expect(lines[6]).toBe("Ended:       -");
    expect(lines[7]).toBe("Elapsed:     0:01:30");
    expect(lines.slice(16)).toEqual([
      "Area usage: none",
      "Store usage: none",
      SUB_SEPARATOR,
      "Hour  Submitted  Succeeded  Business  Transport",
      "1     2          1          0         1",
      "2     1          1          0         0",
      SEPARATOR,
    ]);
  });
});

describe("formatting helpers", () => {
  it("formats durations as H:MM:SS", () => {
    expect(formatDuration(0)).toBe("0:00:00");
    expect(formatDuration(59_999)).toBe("0:00:59");
    expect(formatDuration(36_000_000)).toBe("10:00:00");
  });

  it("describes run modes", () => {
    expect(describeMode({ kind: "count", count: 12 })).toBe("12 tasks");
    expect(describeMode({ kind: "duration", durationMs: 5_400_000 })).toBe("1:30:00 wall clock");
  });

  it("reports a zero success rate when nothing was submitted", () => {
    expect(successRate(0, 0)).toBe(0);
  });
});
