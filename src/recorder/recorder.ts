import { nanoid } from "nanoid";
import type { Context, Span } from "@opentelemetry/api";
import type { ShuttlerunEvent, ShuttlerunEventType } from "../types/index.js";
import type { ShuttlerunMetrics } from "../observability/metrics.js";
import {
  startSessionSpan,
  startTaskSpan,
  endSpanOk,
  endSpanError,
  extractTraceContext,
} from "../observability/tracer.js";
import type {
  SessionLogger,
  SessionStartInfo,
  TaskRecord,
} from "../../dispatch/observability/logger.js";
import type { SessionTransition } from "../../dispatch/engine/session/states.js";
import type { StatisticsReport } from "../../dispatch/report/report.js";
import type { Task } from "../../dispatch/model/types.js";
import { describeOutcome, sourceKey } from "../../dispatch/model/types.js";

/** Anything that accepts events; the Kafka EventProducer in production. */
export interface EventSink {
  emit(event: ShuttlerunEvent): void;
}

/**
 * Bridges one run session into the telemetry pipeline. Wraps the session's
 * own logger and adds spans, metrics and lifecycle events around it.
 *
 * Session span: opened on start, ended with the report.
 * Task spans: children of the session span, one per submitted task.
 */
export class SessionRecorder implements SessionLogger {
  private sessionSpan: { span: Span; ctx: Context } | null = null;
  private taskSpans = new Map<string, Span>();
  private taskType = "unknown";

  constructor(
    private readonly inner: SessionLogger,
    private readonly sink: EventSink | null,
    private readonly metrics: ShuttlerunMetrics | null,
  ) {}

  sessionStarted(info: SessionStartInfo): void {
    this.inner.sessionStarted(info);
    this.taskType = info.taskType;
    this.sessionSpan = startSessionSpan(info.sessionId, info.taskType);
    this.metrics?.activeSessions(1);
    this.emit("session.started", info.sessionId, undefined, {
      taskType: info.taskType,
      mode: info.mode,
      breakerThreshold: info.breakerThreshold,
    }, this.sessionSpan.span);
  }

  taskStarted(sessionId: string, task: Task): void {
    this.inner.taskStarted(sessionId, task);
    if (this.sessionSpan) {
      this.taskSpans.set(
        task.id,
        startTaskSpan(this.sessionSpan.ctx, task.id, sourceKey(task), task.destination),
      );
    }
  }

  taskRecorded(record: TaskRecord): void {
    this.inner.taskRecorded(record);

    const { task, outcome } = record;
    const attrs = { taskType: task.type, outcome: outcome.kind };
    this.metrics?.taskCount(attrs);
    this.metrics?.taskAttempts(record.attempts, { taskType: task.type });
    this.metrics?.submissionDuration(record.durationMs, attrs);

    const span = this.taskSpans.get(task.id);
    this.taskSpans.delete(task.id);
    if (span) {
      span.setAttribute("shuttlerun.task.attempts", record.attempts);
      span.setAttribute("shuttlerun.task.outcome", outcome.kind);
    }

    this.emit(
      outcome.kind === "Success" ? "task.succeeded" : "task.failed",
      record.sessionId,
      task.id,
      {
        task,
        outcome,
        attempts: record.attempts,
        durationMs: record.durationMs,
        consecutiveFailures: record.consecutiveFailures,
      },
      span,
    );

    if (span) {
      if (outcome.kind === "Success") endSpanOk(span);
      else endSpanError(span, describeOutcome(outcome));
    }
  }

  waiting(sessionId: string, untilMs: number, reason: string): void {
    this.inner.waiting(sessionId, untilMs, reason);
    this.sessionSpan?.span.addEvent("waiting", {
      until: new Date(untilMs).toISOString(),
      reason,
    });
  }

  transition(result: SessionTransition): void {
    this.inner.transition(result);
    if (result.current === "CircuitTripped") {
      this.metrics?.breakerTrips({ taskType: this.taskType });
    }
  }

  sessionFinished(report: StatisticsReport): void {
    this.inner.sessionFinished(report);
    this.metrics?.activeSessions(-1);

    const span = this.sessionSpan?.span;
    this.emit("session.finished", report.sessionId, undefined, { ...report }, span);

    if (span) {
      span.setAttribute("shuttlerun.session.submitted", report.submitted);
      span.setAttribute("shuttlerun.session.succeeded", report.succeeded);
      if (report.terminationReason === "CircuitTripped") {
        endSpanError(span, "circuit breaker tripped");
      } else {
        endSpanOk(span);
      }
    }
    this.sessionSpan = null;
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.inner.error(message, context);
    if (this.sessionSpan) {
      endSpanError(this.sessionSpan.span, message);
      this.sessionSpan = null;
      this.metrics?.activeSessions(-1);
    }
  }

  private emit(
    type: ShuttlerunEventType,
    sessionId: string,
    taskId: string | undefined,
    payload: Record<string, unknown>,
    span?: Span,
  ): void {
    if (!this.sink) return;
    this.sink.emit({
      id: nanoid(),
      type,
      source: "session",
      sessionId,
      ...(taskId ? { taskId } : {}),
      timestamp: Date.now(),
      payload,
      ...(span ? { traceContext: extractTraceContext(span) } : {}),
    });
  }
}
