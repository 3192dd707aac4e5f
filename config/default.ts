import type {
  CompressionCodec,
  KafkaConfig,
  LogLevel,
  ShuttlerunConfig,
} from "../src/types/index.js";

const COMPRESSION_CODECS: readonly CompressionCodec[] = ["gzip", "none"];
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function oneOf<T extends string>(
  allowed: readonly T[],
  value: string | undefined,
  fallback: T,
): T {
  return allowed.find((candidate) => candidate === value) ?? fallback;
}

type Env = Record<string, string | undefined>;

function kafkaFromEnv(env: Env): KafkaConfig | undefined {
  if (!env.SHUTTLERUN_KAFKA_BROKERS) return undefined;
  return {
    brokers: env.SHUTTLERUN_KAFKA_BROKERS.split(",").map((b) => b.trim()).filter(Boolean),
    clientId: env.SHUTTLERUN_KAFKA_CLIENT_ID ?? "shuttlerun",
    topicPrefix: env.SHUTTLERUN_KAFKA_TOPIC_PREFIX ?? "shuttlerun",
    producer: {
      batchSize: parseInt(env.SHUTTLERUN_KAFKA_BATCH_SIZE ?? "50", 10),
      lingerMs: parseInt(env.SHUTTLERUN_KAFKA_LINGER_MS ?? "500", 10),
      compression: oneOf(COMPRESSION_CODECS, env.SHUTTLERUN_KAFKA_COMPRESSION, "gzip"),
      maxBuffered: parseInt(env.SHUTTLERUN_KAFKA_MAX_BUFFERED ?? "10000", 10),
    },
    consumer: {
      groupId: env.SHUTTLERUN_KAFKA_GROUP_ID ?? "shuttlerun-commands",
    },
  };
}

/**
 * Process configuration from SHUTTLERUN_* environment variables.
 * Kafka is only configured when SHUTTLERUN_KAFKA_BROKERS is set.
 */
export function configFromEnv(env: Env = process.env): ShuttlerunConfig {
  return {
    kafka: kafkaFromEnv(env),
    observability: {
      enabled: (env.SHUTTLERUN_OTEL_ENABLED ?? "false") === "true",
      serviceName: env.SHUTTLERUN_SERVICE_NAME ?? "shuttlerun",
      traceEndpoint: env.SHUTTLERUN_OTLP_TRACES_ENDPOINT ?? "http://localhost:4318/v1/traces",
      metricsEndpoint: env.SHUTTLERUN_OTLP_METRICS_ENDPOINT ?? "http://localhost:4318/v1/metrics",
      metricsInterval: parseInt(env.SHUTTLERUN_METRICS_INTERVAL_MS ?? "15000", 10),
    },
    logLevel: oneOf(LOG_LEVELS, env.SHUTTLERUN_LOG_LEVEL, "info"),
  };
}
