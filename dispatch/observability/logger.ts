import pino from "pino";
import type { Outcome, RunMode, Task, TaskType } from "../model/types.js";
import { describeOutcome } from "../model/types.js";
import type { SessionTransition } from "../engine/session/states.js";
import type { StatisticsReport } from "../report/report.js";
import { renderReport } from "../report/report.js";

export interface SessionStartInfo {
  sessionId: string;
  taskType: TaskType;
  mode: RunMode;
  breakerThreshold: number;
}

export interface TaskRecord {
  sessionId: string;
  task: Task;
  outcome: Outcome;
  attempts: number;
  durationMs: number;
  submitted: number;
  consecutiveFailures: number;
}

export interface SessionLogger {
  sessionStarted(info: SessionStartInfo): void;
  taskStarted(sessionId: string, task: Task): void;
  taskRecorded(record: TaskRecord): void;
  waiting(sessionId: string, untilMs: number, reason: string): void;
  transition(result: SessionTransition): void;
  sessionFinished(report: StatisticsReport): void;
  error(message: string, context?: Record<string, unknown>): void;
}

function describeTask(task: Task): string {
  return task.type === "LiftToZone"
    ? `${task.source} -> ${task.destination}`
    : `${task.source.area}#${task.source.number} (${task.source.locationId}) -> ${task.destination}`;
}

export class PinoSessionLogger implements SessionLogger {
  private logger: pino.Logger;

  constructor(logger?: pino.Logger) {
    this.logger = (logger ?? pino({ level: "info" })).child({
      component: "shuttlerun.session",
    });
  }

  sessionStarted(info: SessionStartInfo): void {
    this.logger.info(info, `[session:${info.sessionId}] started`);
  }

  taskStarted(sessionId: string, task: Task): void {
    this.logger.debug(
      { sessionId, taskId: task.id },
      `[session:${sessionId}] dispatching ${describeTask(task)}`,
    );
  }

  taskRecorded(record: TaskRecord): void {
    const { sessionId, task, outcome } = record;
    const line = `[session:${sessionId}] ${describeTask(task)}: ${describeOutcome(outcome)}`;
    const context = {
      sessionId,
      taskId: task.id,
      attempts: record.attempts,
      durationMs: record.durationMs,
      submitted: record.submitted,
      consecutiveFailures: record.consecutiveFailures,
    };
    if (outcome.kind === "Success") {
      this.logger.info(context, line);
    } else {
      this.logger.warn(context, line);
    }
  }

  waiting(sessionId: string, untilMs: number, reason: string): void {
    this.logger.info(
      { sessionId, until: new Date(untilMs).toISOString(), reason },
      `[session:${sessionId}] waiting`,
    );
  }

  transition(result: SessionTransition): void {
    this.logger.info(
      { sessionId: result.sessionId },
      `[session:${result.sessionId}] ${result.previous} → ${result.current}`,
    );
  }

  sessionFinished(report: StatisticsReport): void {
    const level = report.terminationReason === "CircuitTripped" ? "error" : "info";
    for (const line of renderReport(report)) {
      this.logger[level]({ sessionId: report.sessionId }, line);
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.logger.error(context ?? {}, message);
  }
}
