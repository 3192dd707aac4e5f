import pino from "pino";
import type { RequestConfig } from "../config/config.js";
import { sleepWithTimer, type Sleep } from "../engine/clock.js";
import { DispatchAttemptTimeoutError } from "../errors.js";
import type { DispatchClient } from "../executor/client.js";
import { classifyTransportError } from "../executor/http/response.js";
import type { Outcome, Task } from "../model/types.js";
import { describeOutcome } from "../model/types.js";

/**
 * Run `execute` with an abort signal that fires after `timeoutMs`.
 * Rejects with DispatchAttemptTimeoutError if the deadline passes first.
 */
export function withTimeout<T>(
  execute: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const controller = new AbortController();
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      const error = new DispatchAttemptTimeoutError(timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    const settle = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      fn();
    };

    let pending: Promise<T>;
    try {
      pending = execute(controller.signal);
    } catch (error) {
      settle(() => reject(error));
      return;
    }

    pending.then(
      (value) => settle(() => resolve(value)),
      (error: unknown) => settle(() => reject(error)),
    );
  });
}

export interface AttemptResult {
  outcome: Outcome;
  attempts: number;
}

/**
 * Wraps one task submission with bounded retries. Only transport faults are
 * retried; a business outcome or success ends the attempt immediately.
 */
export class RetryController {
  private logger: pino.Logger;
  private sleep: Sleep;

  constructor(
    private readonly client: DispatchClient,
    private readonly request: RequestConfig,
    options: { sleep?: Sleep; logger?: pino.Logger } = {},
  ) {
    this.sleep = options.sleep ?? sleepWithTimer;
    this.logger = (options.logger ?? pino({ level: "info" })).child({
      component: "shuttlerun.retry",
    });
  }

  get maxAttempts(): number {
    return this.request.retryCount + 1;
  }

  async attempt(task: Task): Promise<AttemptResult> {
    let outcome: Outcome = { kind: "TransportFailure", reason: "not-attempted" };

    for (let ordinal = 0; ordinal < this.maxAttempts; ordinal++) {
      outcome = await this.submitOnce(task);
      if (outcome.kind !== "TransportFailure") {
        return { outcome, attempts: ordinal + 1 };
      }

      if (ordinal < this.request.retryCount) {
        this.logger.warn(
          {
            taskId: task.id,
            attempt: ordinal + 1,
            of: this.maxAttempts,
            reason: outcome.reason,
            retryInMs: this.request.retryDelayMs,
          },
          "Dispatch attempt failed, retrying",
        );
        if (this.request.retryDelayMs > 0) {
          await this.sleep(this.request.retryDelayMs);
        }
      }
    }

    this.logger.error(
      { taskId: task.id, attempts: this.maxAttempts },
      `Dispatch gave up: ${describeOutcome(outcome)}`,
    );
    return { outcome, attempts: this.maxAttempts };
  }

  private async submitOnce(task: Task): Promise<Outcome> {
    try {
      return await withTimeout(
        (signal) =>
          this.client.submit(task, { timeoutMs: this.request.timeoutMs, signal }),
        this.request.timeoutMs,
      );
    } catch (err) {
      return classifyTransportError(err);
    }
  }
}
