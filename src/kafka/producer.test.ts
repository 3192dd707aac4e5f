import { describe, it, expect, vi, beforeEach } from "vitest";
import pino from "pino";
import { EventProducer } from "./producer.js";
import type { KafkaConfig, ShuttlerunEvent } from "../types/index.js";

const mocks = vi.hoisted(() => ({
  connect: vi.fn(async () => {}),
  disconnect: vi.fn(async () => {}),
  sendBatch: vi.fn(async (_batch: unknown): Promise<unknown[]> => []),
}));

vi.mock("kafkajs", () => ({
  Kafka: class {
    producer() {
      return {
        connect: mocks.connect,
        disconnect: mocks.disconnect,
        sendBatch: mocks.sendBatch,
      };
    }
  },
  CompressionTypes: { None: 0, GZIP: 1, Snappy: 2, LZ4: 3, ZSTD: 4 },
}));

const logger = pino({ level: "silent" });

function config(batchSize = 50, maxBuffered = 100): KafkaConfig {
  return {
    brokers: ["localhost:9092"],
    clientId: "test",
    topicPrefix: "test",
    producer: { batchSize, lingerMs: 60_000, compression: "gzip", maxBuffered },
    ssl: true,
    sasl: { mechanism: "scram-sha-256", username: "test-user", password: "test-secret" },
  };
}

function sentTaskIds(call: number): unknown[] {
  const batch = mocks.sendBatch.mock.calls[call]?.[0];
  if (typeof batch !== "object" || batch === null || !("topicMessages" in batch)) return [];
  const { topicMessages } = batch;
  if (!Array.isArray(topicMessages)) return [];
  return topicMessages.flatMap((entry: { messages: Array<{ value: string }> }) =>
    entry.messages.map((m) => JSON.parse(m.value).taskId),
  );
}

function event(type: ShuttlerunEvent["type"], taskId?: string): ShuttlerunEvent {
  return {
    id: `e-${type}`,
    type,
    source: "session",
    sessionId: "s-1",
    ...(taskId ? { taskId } : {}),
    timestamp: 1_000,
    payload: { ok: true },
  };
}

beforeEach(() => {
  mocks.connect.mockClear();
  mocks.disconnect.mockClear();
  mocks.sendBatch.mockReset();
  mocks.sendBatch.mockImplementation(async () => []);
});

describe("EventProducer", () => {
  it("groups buffered events by topic on flush", async () => {
    const producer = new EventProducer(config(), logger);
    await producer.connect();

    const succeeded = event("task.succeeded", "t-1");
    producer.emit(succeeded);
    producer.emit(event("session.started"));
    expect(producer.bufferedCount).toBe(2);

    await producer.flush();

    expect(mocks.sendBatch).toHaveBeenCalledTimes(1);
    expect(mocks.sendBatch).toHaveBeenCalledWith({
      compression: 1,
      topicMessages: [
        {
          topic: "test.tasks",
          messages: [
            {
              key: "s-1",
              value: JSON.stringify(succeeded),
              headers: {
                "event-type": "task.succeeded",
                source: "session",
                "trace-id": "",
                "span-id": "",
              },
              timestamp: "1000",
            },
          ],
        },
        {
          topic: "test.sessions",
          messages: [expect.objectContaining({ key: "s-1" })],
        },
      ],
    });
    expect(producer.bufferedCount).toBe(0);

    await producer.disconnect();
  });

  it("flushes on its own once the batch size is reached", async () => {
    const producer = new EventProducer(config(2), logger);
    await producer.connect();

    producer.emit(event("task.failed", "t-1"));
    expect(mocks.sendBatch).not.toHaveBeenCalled();
    producer.emit(event("task.failed", "t-2"));

    await vi.waitFor(() => expect(mocks.sendBatch).toHaveBeenCalledTimes(1));
    await producer.disconnect();
  });

  it("keeps events buffered while disconnected", async () => {
    const producer = new EventProducer(config(), logger);

    producer.emit(event("session.finished"));
    await producer.flush();

    expect(mocks.sendBatch).not.toHaveBeenCalled();
    expect(producer.bufferedCount).toBe(1);
  });

  it("puts events back when the send fails", async () => {
    mocks.sendBatch.mockRejectedValueOnce(new Error("broker unavailable"));
    const producer = new EventProducer(config(), logger);
    await producer.connect();

    producer.emit(event("session.started"));
    await expect(producer.flush()).rejects.toThrow("broker unavailable");
    expect(producer.bufferedCount).toBe(1);

    await producer.disconnect();
    expect(mocks.sendBatch).toHaveBeenCalledTimes(2);
    expect(producer.bufferedCount).toBe(0);
  });

  it("sends right away when a session finishes", async () => {
    const producer = new EventProducer(config(), logger);
    await producer.connect();

    producer.emit(event("task.succeeded", "t-1"));
    expect(mocks.sendBatch).not.toHaveBeenCalled();
    producer.emit(event("session.finished"));

    await vi.waitFor(() => expect(mocks.sendBatch).toHaveBeenCalledTimes(1));
    expect(producer.bufferedCount).toBe(0);
    await producer.disconnect();
  });

  it("drops the oldest events once the buffer is full", async () => {
    const producer = new EventProducer(config(50, 2), logger);

    producer.emit(event("task.failed", "t-1"));
    producer.emit(event("task.failed", "t-2"));
    producer.emit(event("task.failed", "t-3"));

    expect(producer.bufferedCount).toBe(2);
    expect(producer.droppedCount).toBe(1);

    await producer.connect();
    await producer.flush();
    expect(sentTaskIds(0)).toEqual(["t-2", "t-3"]);
    await producer.disconnect();
  });

  it("keeps requeued events within the bound", async () => {
    const producer = new EventProducer(config(50, 2), logger);
    await producer.connect();
    let fail: (err: Error) => void = () => {};
    mocks.sendBatch.mockImplementationOnce(
      () =>
        new Promise<unknown[]>((_resolve, reject) => {
          fail = reject;
        }),
    );

    producer.emit(event("task.failed", "t-1"));
    producer.emit(event("task.failed", "t-2"));
    const flushing = producer.flush();
    producer.emit(event("task.failed", "t-3"));
    fail(new Error("broker down"));

    await expect(flushing).rejects.toThrow("broker down");
    expect(producer.bufferedCount).toBe(2);
    expect(producer.droppedCount).toBe(1);

    await producer.disconnect();
    expect(sentTaskIds(1)).toEqual(["t-2", "t-3"]);
  });

  it("disconnects even when the final flush fails", async () => {
    mocks.sendBatch.mockRejectedValueOnce(new Error("broker down"));
    const producer = new EventProducer(config(), logger);
    await producer.connect();
    producer.emit(event("session.started"));

    await expect(producer.disconnect()).rejects.toThrow("broker down");

    expect(mocks.disconnect).toHaveBeenCalledTimes(1);
    expect(producer.bufferedCount).toBe(1);
  });

  it("sends uncompressed batches when compression is off", async () => {
    const producer = new EventProducer(
      { ...config(), producer: { compression: "none", lingerMs: 60_000 } },
      logger,
    );
    await producer.connect();
    producer.emit(event("session.started"));
    await producer.flush();

    expect(mocks.sendBatch).toHaveBeenCalledWith(expect.objectContaining({ compression: 0 }));
    await producer.disconnect();
  });
});
