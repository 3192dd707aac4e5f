import {
  Kafka,
  CompressionTypes,
  type Message,
  type Producer,
  type TopicMessages,
} from "kafkajs";
import type { CompressionCodec, KafkaConfig, ShuttlerunEvent } from "../types/index.js";
import { resolveTopicName, eventTypeToTopic } from "./topics.js";
import pino from "pino";

const DEFAULT_BATCH_SIZE = 50;
const DEFAULT_LINGER_MS = 500;
const DEFAULT_MAX_BUFFERED = 10_000;

interface PendingEvent {
  topic: string;
  message: Message;
}

function toMessage(event: ShuttlerunEvent): Message {
  return {
    key: event.sessionId,
    value: JSON.stringify(event),
    headers: {
      "event-type": event.type,
      source: event.source,
      "trace-id": event.traceContext?.traceId ?? "",
      "span-id": event.traceContext?.spanId ?? "",
    },
    timestamp: String(event.timestamp),
  };
}

/** One entry per topic, in order of first appearance; message order is kept. */
function toTopicMessages(pending: readonly PendingEvent[]): TopicMessages[] {
  const byTopic = new Map<string, Message[]>();
  for (const { topic, message } of pending) {
    const messages = byTopic.get(topic);
    if (messages) messages.push(message);
    else byTopic.set(topic, [message]);
  }
  return [...byTopic].map(([topic, messages]) => ({ topic, messages }));
}

function compressionFor(codec: CompressionCodec | undefined): CompressionTypes {
  return codec === "gzip" ? CompressionTypes.GZIP : CompressionTypes.None;
}

/**
 * Publishes session lifecycle events. Events are keyed by session id so one
 * session's events stay ordered within a partition.
 *
 * Delivery is batched: a send happens when `batchSize` events are waiting,
 * `lingerMs` after the first waiting event, or as soon as a session finishes.
 * At most `maxBuffered` events wait at once; beyond that the oldest are
 * dropped and counted.
 */
export class EventProducer {
  private readonly producer: Producer;
  private readonly logger: pino.Logger;
  private readonly topicPrefix: string;
  private readonly batchSize: number;
  private readonly lingerMs: number;
  private readonly maxBuffered: number;
  private readonly compression: CompressionTypes;

  private pending: PendingEvent[] = [];
  private lingerTimer: ReturnType<typeof setTimeout> | null = null;
  private connected = false;
  private dropped = 0;

  constructor(config: KafkaConfig, logger?: pino.Logger) {
    this.logger = (logger ?? pino({ level: "info" })).child({ component: "shuttlerun.producer" });
    this.topicPrefix = config.topicPrefix;
    this.batchSize = config.producer?.batchSize ?? DEFAULT_BATCH_SIZE;
    this.lingerMs = config.producer?.lingerMs ?? DEFAULT_LINGER_MS;
    this.maxBuffered = Math.max(1, config.producer?.maxBuffered ?? DEFAULT_MAX_BUFFERED);
    this.compression = compressionFor(config.producer?.compression);

    const kafka = new Kafka({
      clientId: config.clientId,
      brokers: config.brokers,
      ssl: config.ssl ?? false,
      ...(config.sasl ? { sasl: config.sasl } : {}),
    });
    this.producer = kafka.producer({ allowAutoTopicCreation: true });
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    await this.producer.connect();
    this.connected = true;
    if (this.pending.length > 0) this.scheduleLinger();
    this.logger.info("Kafka producer connected");
  }

  /** Flush what is waiting, then disconnect even if that flush fails. */
  async disconnect(): Promise<void> {
    if (!this.connected) return;
    try {
      await this.flush();
    } finally {
      await this.producer.disconnect();
      this.connected = false;
      this.logger.info({ unsent: this.pending.length }, "Kafka producer disconnected");
    }
  }

  emit(event: ShuttlerunEvent): void {
    const topic = resolveTopicName(this.topicPrefix, eventTypeToTopic(event.type));
    this.pending.push({ topic, message: toMessage(event) });
    this.trimToBound();

    if (event.type === "session.finished" || this.pending.length >= this.batchSize) {
      this.flush().catch((err: unknown) =>
        this.logger.error({ err, sessionId: event.sessionId }, "Event flush failed"),
      );
      return;
    }
    this.scheduleLinger();
  }

  /**
   * Send every waiting event. On failure the events go back in front of any
   * that arrived meanwhile, subject to the same bound, and the error is rethrown.
   */
  async flush(): Promise<void> {
    this.clearLinger();
    if (this.pending.length === 0) return;
    if (!this.connected) {
      this.logger.warn({ count: this.pending.length }, "Cannot flush, producer not connected");
      return;
    }

    const batch = this.pending.splice(0);
    const topicMessages = toTopicMessages(batch);
    try {
      await this.producer.sendBatch({ topicMessages, compression: this.compression });
      this.logger.debug(
        { count: batch.length, topics: topicMessages.length },
        "Flushed events to Kafka",
      );
    } catch (err) {
      this.pending = [...batch, ...this.pending];
      this.trimToBound();
      this.logger.error({ err, count: batch.length }, "Failed to send batch to Kafka");
      throw err;
    }
  }

  get bufferedCount(): number {
    return this.pending.length;
  }

  /** Events discarded because the buffer was full */
  get droppedCount(): number {
    return this.dropped;
  }

  private trimToBound(): void {
    const overflow = this.pending.length - this.maxBuffered;
    if (overflow <= 0) return;
    this.pending.splice(0, overflow);
    this.dropped += overflow;
    this.logger.warn(
      { dropped: overflow, totalDropped: this.dropped, maxBuffered: this.maxBuffered },
      "Event buffer full, dropped oldest events",
    );
  }

  private scheduleLinger(): void {
    if (!this.connected || this.lingerTimer) return;
    this.lingerTimer = setTimeout(() => {
      this.lingerTimer = null;
      this.flush().catch((err: unknown) => this.logger.error({ err }, "Linger flush failed"));
    }, this.lingerMs);
  }

  private clearLinger(): void {
    if (this.lingerTimer) {
      clearTimeout(this.lingerTimer);
      this.lingerTimer = null;
    }
  }
}
