import type { ShuttlerunConfig } from "./types/index.js";
import { EventProducer } from "./kafka/producer.js";
import { CommandConsumer, type SessionCommand } from "./kafka/consumer.js";
import { SessionRecorder } from "./recorder/recorder.js";
import {
  initTracing,
  shutdownTracing,
  initMetrics,
  shutdownMetrics,
} from "./observability/index.js";
import type { ShuttlerunMetrics } from "./observability/index.js";
import type { SessionConfigInput } from "../dispatch/config/config.js";
import type { DispatchClient } from "../dispatch/executor/client.js";
import { PinoSessionLogger } from "../dispatch/observability/logger.js";
import {
  startSession,
  type SessionDeps,
  type SessionHandle,
} from "../dispatch/engine/session/session.js";
import pino from "pino";

export type SessionOptions = Omit<SessionDeps, "client" | "logger" | "sessionLogger">;

/**
 * Top-level facade.
 *
 * Usage:
 *   const runner = new Shuttlerun(config);
 *   await runner.start();
 *
 *   const session = runner.startSession(sessionConfig, client);
 *   const report = await session.done;
 *
 *   await runner.shutdown();
 */
export class Shuttlerun {
  private config: ShuttlerunConfig;
  private logger: pino.Logger;
  private producer: EventProducer | null;
  private consumer: CommandConsumer | null;
  private metrics: ShuttlerunMetrics | null = null;
  private sessions = new Map<string, SessionHandle>();
  private started = false;

  constructor(config: ShuttlerunConfig, logger?: pino.Logger) {
    this.config = config;
    this.logger = logger ?? pino({ level: config.logLevel ?? "info" });

    this.producer = config.kafka ? new EventProducer(config.kafka, this.logger) : null;
    this.consumer = config.kafka ? new CommandConsumer(config.kafka, this.logger) : null;
  }

  /**
   * Start: init tracing/metrics when enabled, connect Kafka when configured.
   */
  async start(): Promise<void> {
    if (this.started) return;

    this.logger.info("Starting shuttlerun...");

    if (this.config.observability.enabled) {
      initTracing(this.config.observability);
      this.metrics = initMetrics(this.config.observability);
    }

    if (this.producer) {
      await this.producer.connect();
    }

    if (this.consumer) {
      this.consumer.onCommand(async (cmd) => this.handleCommand(cmd));
      await this.consumer.start();
    }

    this.started = true;
    this.logger.info(
      { kafka: this.producer !== null, observability: this.config.observability.enabled },
      "Shuttlerun started",
    );
  }

  /**
   * Validate the configuration and start a session against `client`.
   * Throws ConfigurationError before anything is submitted.
   */
  startSession(
    config: SessionConfigInput,
    client: DispatchClient,
    options: SessionOptions = {},
  ): SessionHandle {
    const recorder = new SessionRecorder(
      new PinoSessionLogger(this.logger),
      this.producer,
      this.metrics,
    );
    const handle = startSession(config, {
      ...options,
      client,
      logger: this.logger,
      sessionLogger: recorder,
    });

    this.sessions.set(handle.id, handle);
    const forget = (): void => {
      this.sessions.delete(handle.id);
    };
    handle.done.then(forget, forget);

    return handle;
  }

  /**
   * Interrupt one session, or every running session when no id is given.
   * Returns how many sessions were signalled.
   */
  interrupt(sessionId?: string): number {
    if (sessionId !== undefined) {
      const handle = this.sessions.get(sessionId);
      if (!handle) {
        this.logger.warn({ sessionId }, "Interrupt for unknown session");
        return 0;
      }
      handle.interrupt();
      return 1;
    }

    for (const handle of this.sessions.values()) {
      handle.interrupt();
    }
    return this.sessions.size;
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  /**
   * Graceful shutdown. Running sessions are interrupted and awaited first.
   * Each teardown step runs even when another fails; failures are logged,
   * never thrown, so a session's result is not replaced by a broker error.
   */
  async shutdown(): Promise<void> {
    if (!this.started) return;

    this.logger.info("Shutting down shuttlerun...");

    const pending = [...this.sessions.values()];
    for (const handle of pending) handle.interrupt();
    await Promise.allSettled(pending.map((handle) => handle.done));

    const steps: Array<{ step: string; run: () => Promise<void> }> = [];
    const { consumer, producer } = this;
    if (consumer) steps.push({ step: "consumer", run: () => consumer.stop() });
    if (producer) steps.push({ step: "producer", run: () => producer.disconnect() });
    if (this.config.observability.enabled) {
      steps.push({ step: "tracing", run: shutdownTracing });
      steps.push({ step: "metrics", run: shutdownMetrics });
    }

    const results = await Promise.allSettled(steps.map(({ run }) => run()));
    let failed = 0;
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        failed += 1;
        this.logger.error({ err: result.reason, step: steps[i]?.step }, "Shutdown step failed");
      }
    });

    this.started = false;
    this.logger.info({ failedSteps: failed }, "Shuttlerun shut down");
  }

  private async handleCommand(cmd: SessionCommand): Promise<void> {
    switch (cmd.action) {
      case "interrupt": {
        const count = this.interrupt(cmd.sessionId);
        this.logger.info({ sessionId: cmd.sessionId, count }, "Interrupt command applied");
        break;
      }
    }
  }
}
