import { Kafka, type Consumer, type EachMessagePayload } from "kafkajs";
import { z } from "zod";
import type { KafkaConfig } from "../types/index.js";
import { resolveTopicName, TOPICS } from "./topics.js";
import pino from "pino";

export const SessionCommandSchema = z.object({
  action: z.literal("interrupt"),
  /** Interrupt every running session when omitted */
  sessionId: z.string().min(1).optional(),
});

export type SessionCommand = z.infer<typeof SessionCommandSchema>;

export type CommandHandler = (command: SessionCommand) => Promise<void>;

/**
 * Kafka consumer for remote session commands.
 * Listens on the session-commands topic and dispatches to registered handlers.
 */
export class CommandConsumer {
  private kafka: Kafka;
  private consumer: Consumer;
  private logger: pino.Logger;
  private config: KafkaConfig;
  private handlers: CommandHandler[] = [];
  private running = false;

  constructor(config: KafkaConfig, logger?: pino.Logger) {
    this.config = config;
    this.logger = (logger ?? pino({ level: "info" })).child({ component: "shuttlerun.consumer" });

    this.kafka = new Kafka({
      clientId: config.clientId,
      brokers: config.brokers,
      ssl: config.ssl ?? false,
      ...(config.sasl ? { sasl: config.sasl } : {}),
    });

    this.consumer = this.kafka.consumer({
      groupId: config.consumer?.groupId ?? `${config.clientId}-commands`,
    });
  }

  onCommand(handler: CommandHandler): void {
    this.handlers.push(handler);
  }

  async start(): Promise<void> {
    if (this.running) return;

    await this.consumer.connect();

    const commandTopic = resolveTopicName(
      this.config.topicPrefix,
      TOPICS.SESSION_COMMANDS,
    );

    await this.consumer.subscribe({ topic: commandTopic, fromBeginning: false });

    await this.consumer.run({
      eachMessage: async (payload: EachMessagePayload) => {
        await this.handleMessage(payload);
      },
    });

    this.running = true;
    this.logger.info({ topic: commandTopic }, "Command consumer started");
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    await this.consumer.disconnect();
    this.running = false;
    this.logger.info("Command consumer stopped");
  }

  private async handleMessage({ message }: EachMessagePayload): Promise<void> {
    if (!message.value) return;

    try {
      const parsed = SessionCommandSchema.safeParse(JSON.parse(message.value.toString()));
      if (!parsed.success) {
        this.logger.warn(
          { issues: parsed.error.issues.map((i) => i.message) },
          "Ignoring malformed session command",
        );
        return;
      }

      const command = parsed.data;
      this.logger.debug(
        { action: command.action, sessionId: command.sessionId },
        "Received session command",
      );

      for (const handler of this.handlers) {
        await handler(command);
      }
    } catch (err) {
      this.logger.error({ err }, "Failed to process session command");
    }
  }
}
