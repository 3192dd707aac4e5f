import { nanoid } from "nanoid";
import pino from "pino";
import type { SessionConfig, SessionConfigInput } from "../../config/config.js";
import { parseSessionConfig, resolvePacingMs } from "../../config/config.js";
import type { DispatchClient } from "../../executor/client.js";
import type { TerminationReason } from "../../model/types.js";
import { PinoSessionLogger, type SessionLogger } from "../../observability/logger.js";
import { RetryController } from "../../policy/retry.js";
import { buildReport, type StatisticsReport } from "../../report/report.js";
import { CircuitBreaker } from "../breaker/breaker.js";
import { pauseUnlessAborted, type Now, type Pause, type Sleep } from "../clock.js";
import {
  createSelectionPolicy,
  type Exhausted,
  type SelectionPolicy,
  type SelectionStrategies,
} from "../selection/index.js";
import { isTerminal, transition, type SessionState } from "./states.js";
import { SessionStatistics } from "./statistics.js";

export interface SessionDeps {
  client: DispatchClient;
  /** Base pino logger; components derive children from it */
  logger?: pino.Logger;
  sessionLogger?: SessionLogger;
  sessionId?: string;
  now?: Now;
  /** Wait between retries of one task */
  sleep?: Sleep;
  /** Interruptible wait used for pacing and quota refills */
  pause?: Pause;
  strategies?: SelectionStrategies;
}

export interface SessionHandle {
  readonly id: string;
  readonly state: SessionState;
  /** Resolves with the final report once the session reaches a terminal state */
  readonly done: Promise<StatisticsReport>;
  interrupt(): void;
  report(): StatisticsReport;
}

/**
 * Drives one session: select, submit with retries, record, then decide
 * whether to continue. Exactly one task is outstanding at a time.
 */
export class RunSession implements SessionHandle {
  readonly id: string;
  readonly done: Promise<StatisticsReport>;

  private currentState: SessionState = "Running";
  private interruptRequested = false;
  private readonly abort = new AbortController();
  private readonly startedAt: number;
  private endedAt: number | null = null;

  private readonly policy: SelectionPolicy;
  private readonly retry: RetryController;
  private readonly breaker: CircuitBreaker;
  private readonly stats: SessionStatistics;
  private readonly sessionLogger: SessionLogger;
  private readonly now: Now;
  private readonly pause: Pause;
  private readonly pacingMs: number;

  constructor(
    readonly config: SessionConfig,
    deps: SessionDeps,
  ) {
    this.id = deps.sessionId ?? nanoid();
    this.now = deps.now ?? Date.now;
    this.pause = deps.pause ?? pauseUnlessAborted;
    this.sessionLogger = deps.sessionLogger ?? new PinoSessionLogger(deps.logger);

    this.pacingMs = resolvePacingMs(config);
    this.policy = createSelectionPolicy(config.selection, deps.strategies);
    this.retry = new RetryController(deps.client, config.request, {
      sleep: deps.sleep,
      logger: deps.logger,
    });
    this.breaker = new CircuitBreaker(config.breakerThreshold);
    this.startedAt = this.now();
    this.stats = new SessionStatistics(this.startedAt);

    this.done = this.run();
  }

  get state(): SessionState {
    return this.currentState;
  }

  /**
   * Ask the session to stop. Takes effect after the in-flight task (if any)
   * has been recorded; pending pacing or quota waits end immediately.
   */
  interrupt(): void {
    if (isTerminal(this.currentState) || this.interruptRequested) return;
    this.interruptRequested = true;
    this.abort.abort();
  }

  report(): StatisticsReport {
    return buildReport({
      sessionId: this.id,
      taskType: this.config.selection.taskType,
      mode: this.config.mode,
      state: this.currentState,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
      now: this.now(),
      stats: this.stats.snapshot(),
      consecutiveFailures: this.breaker.consecutiveFailures,
      breakerThreshold: this.breaker.threshold,
    });
  }

  private async run(): Promise<StatisticsReport> {
    // Let the caller attach to the handle before the first submission.
    await Promise.resolve();

    this.sessionLogger.sessionStarted({
      sessionId: this.id,
      taskType: this.config.selection.taskType,
      mode: this.config.mode,
      breakerThreshold: this.breaker.threshold,
    });

    try {
      const reason = await this.loop();
      return this.finish(reason);
    } catch (err) {
      this.sessionLogger.error(`Session ${this.id} aborted`, {
        sessionId: this.id,
        err: err instanceof Error ? err.message : String(err),
      });
      throw err;
    }
  }

  private async loop(): Promise<TerminationReason> {
    for (;;) {
      if (this.interruptRequested) return "Interrupted";
      if (this.targetReached()) return "Completed";

      const selection = this.policy.next(this.now());
      if (selection.kind === "exhausted") {
        const resumeAt = this.resumeTime(selection);
        if (resumeAt === null) return "Completed";
        this.sessionLogger.waiting(this.id, resumeAt, "quota");
        await this.pause(resumeAt - this.now(), this.abort.signal);
        continue;
      }

      const { task } = selection;
      this.sessionLogger.taskStarted(this.id, task);
      const started = this.now();
      const { outcome, attempts } = await this.retry.attempt(task);
      const recordedAt = this.now();

      this.stats.record(task, outcome, attempts, recordedAt);
      this.policy.settle(task);
      const tripped = this.breaker.record(outcome);

      this.sessionLogger.taskRecorded({
        sessionId: this.id,
        task,
        outcome,
        attempts,
        durationMs: recordedAt - started,
        submitted: this.stats.submittedCount,
        consecutiveFailures: this.breaker.consecutiveFailures,
      });

      if (tripped) return "CircuitTripped";
      if (this.targetReached()) return "Completed";
      if (this.interruptRequested) return "Interrupted";

      if (this.pacingMs > 0) {
        const wait = this.capToDeadline(started + this.pacingMs) - this.now();
        if (wait > 0) await this.pause(wait, this.abort.signal);
      }
    }
  }

  private targetReached(): boolean {
    const { mode } = this.config;
    return mode.kind === "count"
      ? this.stats.submittedCount >= mode.count
      : this.now() - this.startedAt >= mode.durationMs;
  }

  /** When the policy reports a refill time, wait for it. */
  private resumeTime(exhausted: Exhausted): number | null {
    if (exhausted.resumeAt === undefined) return null;
    return this.capToDeadline(exhausted.resumeAt);
  }

  /** A duration-bound session never waits past its deadline. */
  private capToDeadline(at: number): number {
    const { mode } = this.config;
    return mode.kind === "duration" ? Math.min(at, this.startedAt + mode.durationMs) : at;
  }

  private finish(reason: TerminationReason): StatisticsReport {
    const at = this.now();
    const result = transition(this.id, this.currentState, reason, at);
    this.currentState = result.current;
    this.endedAt = at;
    this.sessionLogger.transition(result);

    const report = this.report();
    this.sessionLogger.sessionFinished(report);
    return report;
  }
}

/**
 * Validate `config` and start a session. Configuration problems throw
 * ConfigurationError here, before anything is submitted.
 */
export function startSession(
  config: SessionConfigInput,
  deps: SessionDeps,
): SessionHandle {
  return new RunSession(parseSessionConfig(config), deps);
}

export function interrupt(handle: SessionHandle): void {
  handle.interrupt();
}

export function report(handle: SessionHandle): StatisticsReport {
  return handle.report();
}
