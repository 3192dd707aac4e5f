import type { SASLOptions } from "kafkajs";

// ============================================================================
// Event Types: session and task lifecycle published to Kafka
// ============================================================================

export interface ShuttlerunEvent {
  /** Event ID */
  id: string;
  /** Event type discriminator */
  type: ShuttlerunEventType;
  /** Emitting component */
  source: string;
  /** Correlation IDs */
  sessionId: string;
  taskId?: string;
  /** Event timestamp */
  timestamp: number;
  /** Event payload */
  payload: Record<string, unknown>;
  /** OpenTelemetry trace context for correlation */
  traceContext?: {
    traceId: string;
    spanId: string;
  };
}

export type ShuttlerunEventType =
  | "session.started"
  | "session.finished"
  | "task.succeeded"
  | "task.failed";

// ============================================================================
// Kafka Configuration
// ============================================================================

/** Codecs kafkajs ships with; snappy and lz4 need extra packages */
export type CompressionCodec = "gzip" | "none";

export interface KafkaConfig {
  brokers: string[];
  clientId: string;
  /** Topic prefix for all shuttlerun topics */
  topicPrefix: string;
  producer?: {
    /** Batch size before flush */
    batchSize?: number;
    /** Max wait before flush (ms) */
    lingerMs?: number;
    compression?: CompressionCodec;
    /** Oldest events are dropped once this many are waiting */
    maxBuffered?: number;
  };
  /** Consumer for remote session commands */
  consumer?: {
    groupId?: string;
  };
  ssl?: boolean;
  sasl?: SASLOptions;
}

// ============================================================================
// Observability Configuration
// ============================================================================

export interface ObservabilityConfig {
  /** Tracing and metrics are only initialised when set */
  enabled: boolean;
  /** Service name for traces/metrics */
  serviceName: string;
  /** OTLP endpoint for traces */
  traceEndpoint?: string;
  /** OTLP endpoint for metrics */
  metricsEndpoint?: string;
  /** Metrics export interval (ms) */
  metricsInterval?: number;
  /** Additional resource attributes */
  resourceAttributes?: Record<string, string>;
}

// ============================================================================
// Top-Level Configuration
// ============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ShuttlerunConfig {
  /** Kafka is skipped entirely when absent */
  kafka?: KafkaConfig;
  observability: ObservabilityConfig;
  logLevel?: LogLevel;
}
