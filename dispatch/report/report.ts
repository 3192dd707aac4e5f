import type { RunMode, TaskType, TerminationReason } from "../model/types.js";
import type { SessionState } from "../engine/session/states.js";
import type { HourlyBucket, StatisticsSnapshot } from "../engine/session/statistics.js";

export interface StatisticsReport extends StatisticsSnapshot {
  sessionId: string;
  taskType: TaskType;
  mode: RunMode;
  state: SessionState;
  /** null while the session is still running */
  terminationReason: TerminationReason | null;
  startedAt: string;
  endedAt: string | null;
  elapsedMs: number;
  /** succeeded / submitted, 0 when nothing was submitted */
  successRate: number;
  consecutiveFailures: number;
  breakerThreshold: number;
}

export interface ReportInput {
  sessionId: string;
  taskType: TaskType;
  mode: RunMode;
  state: SessionState;
  startedAt: number;
  endedAt: number | null;
  now: number;
  stats: StatisticsSnapshot;
  consecutiveFailures: number;
  breakerThreshold: number;
}

export function successRate(succeeded: number, submitted: number): number {
  return submitted === 0 ? 0 : succeeded / submitted;
}

export function buildReport(input: ReportInput): StatisticsReport {
  const end = input.endedAt ?? input.now;
  return {
    sessionId: input.sessionId,
    taskType: input.taskType,
    mode: input.mode,
    state: input.state,
    terminationReason: input.state === "Running" ? null : input.state,
    startedAt: new Date(input.startedAt).toISOString(),
    endedAt: input.endedAt === null ? null : new Date(input.endedAt).toISOString(),
    elapsedMs: Math.max(0, end - input.startedAt),
    ...input.stats,
    successRate: successRate(input.stats.succeeded, input.stats.submitted),
    consecutiveFailures: input.consecutiveFailures,
    breakerThreshold: input.breakerThreshold,
  };
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

const SEPARATOR = "=".repeat(60);
const SUB_SEPARATOR = "-".repeat(60);

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${hours}:${pad(minutes)}:${pad(seconds)}`;
}

export function describeMode(mode: RunMode): string {
  return mode.kind === "count"
    ? `${mode.count} tasks`
    : `${formatDuration(mode.durationMs)} wall clock`;
}

function formatPercent(rate: number): string {
  return `${(rate * 100).toFixed(2)}%`;
}

function usageLines(title: string, usage: Record<string, number>): string[] {
  const entries = Object.entries(usage);
  if (entries.length === 0) return [`${title}: none`];
  return [`${title}:`, ...entries.map(([key, count]) => `  - ${key}: ${count}`)];
}

function hourlyLines(hourly: HourlyBucket[]): string[] {
  if (hourly.length <= 1) return [];
  return [
    SUB_SEPARATOR,
    "Hour  Submitted  Succeeded  Business  Transport",
    ...hourly.map(
      (h) =>
        `${String(h.hour).padEnd(6)}${String(h.submitted).padEnd(11)}` +
        `${String(h.succeeded).padEnd(11)}${String(h.businessFailures).padEnd(10)}` +
        `${h.transportFailures}`,
    ),
  ];
}

/** Human-readable report block, one entry per line. */
export function renderReport(report: StatisticsReport): string[] {
  return [
    SEPARATOR,
    `Session ${report.sessionId} (${report.taskType})`,
    SEPARATOR,
    `Termination: ${report.terminationReason ?? "still running"}`,
    `Run mode:    ${describeMode(report.mode)}`,
    `Started:     ${report.startedAt}`,
    `Ended:       ${report.endedAt ?? "-"}`,
    `Elapsed:     ${formatDuration(report.elapsedMs)}`,
    SUB_SEPARATOR,
    `Submitted:   ${report.submitted}`,
    `Succeeded:   ${report.succeeded}`,
    `Failed:      ${report.failed} (business ${report.businessFailures}, transport ${report.transportFailures})`,
    `Attempts:    ${report.attempts}`,
    `Success rate: ${formatPercent(report.successRate)}`,
    `Consecutive failures: ${report.consecutiveFailures}/${report.breakerThreshold}`,
    SUB_SEPARATOR,
    ...usageLines("Area usage", report.areaUsage),
    ...usageLines("Store usage", report.storeUsage),
    ...hourlyLines(report.hourly),
    SEPARATOR,
  ];
}
