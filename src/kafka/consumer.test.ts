import { describe, it, expect, vi, beforeEach } from "vitest";
import pino from "pino";
import { CommandConsumer, type SessionCommand } from "./consumer.js";

type MessageHandler = (payload: { message: { value: Buffer | null } }) => Promise<void>;

const mocks = vi.hoisted(() => {
  const handler: { current: MessageHandler | null } = { current: null };
  return {
    subscribe: vi.fn(async (_options: { topic: string; fromBeginning: boolean }) => {}),
    handler,
  };
});

vi.mock("kafkajs", () => ({
  Kafka: class {
    consumer() {
      return {
        connect: async () => {},
        disconnect: async () => {},
        subscribe: mocks.subscribe,
        run: async (options: { eachMessage: MessageHandler }) => {
          mocks.handler.current = options.eachMessage;
        },
      };
    }
  },
}));

const logger = pino({ level: "silent" });

async function startedConsumer() {
  const consumer = new CommandConsumer(
    { brokers: ["localhost:9092"], clientId: "test", topicPrefix: "test" },
    logger,
  );
  const received: SessionCommand[] = [];
  consumer.onCommand(async (command) => {
    received.push(command);
  });
  await consumer.start();

  const deliver = async (value: string | null) => {
    const handler = mocks.handler.current;
    if (!handler) throw new Error("consumer is not running");
    await handler({ message: { value: value === null ? null : Buffer.from(value) } });
  };
  return { consumer, received, deliver };
}

beforeEach(() => {
  mocks.subscribe.mockClear();
  mocks.handler.current = null;
});

describe("CommandConsumer", () => {
  it("subscribes to the session command topic", async () => {
    const { consumer } = await startedConsumer();

    expect(mocks.subscribe).toHaveBeenCalledWith({
      topic: "test.session-commands",
      fromBeginning: false,
    });
    await consumer.stop();
  });

  it("routes interrupt commands to the handlers", async () => {
    const { received, deliver } = await startedConsumer();

    await deliver(JSON.stringify({ action: "interrupt", sessionId: "s-1" }));
    await deliver(JSON.stringify({ action: "interrupt" }));

    expect(received).toEqual([{ action: "interrupt", sessionId: "s-1" }, { action: "interrupt" }]);
  });

  it("drops unknown actions, broken JSON and empty messages", async () => {
    const { received, deliver } = await startedConsumer();

    await deliver(JSON.stringify({ action: "pause", sessionId: "s-1" }));
    await deliver("{ nope");
    await deliver(null);

    expect(received).toEqual([]);
  });
});
