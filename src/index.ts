// Shuttlerun: dispatch sessions for warehouse move tasks
// ========================================================
//
// A session repeatedly picks a (source, destination) pair, submits it to the
// dispatch server, and records the outcome until its run mode is satisfied,
// the selection policy runs dry, the circuit breaker trips, or it is
// interrupted.
//
//   ┌──────────────────────────────────────────────────┐
//   │  RunSession                                      │
//   │   SelectionPolicy → RetryController → Client     │
//   │          ↑                  │                    │
//   │       settle         CircuitBreaker, Statistics  │
//   └──────────────────────────┬───────────────────────┘
//                              │ SessionRecorder
//                 ┌────────────┼────────────┐
//                 ↓            ↓            ↓
//           ┌──────────┐ ┌──────────┐ ┌──────────┐
//           │  Kafka   │ │  OTel    │ │  pino    │
//           │  Topics  │ │ Metrics  │ │  Logs    │
//           └──────────┘ └──────────┘ └──────────┘
//

export { Shuttlerun } from "./shuttlerun.js";
export type { SessionOptions } from "./shuttlerun.js";

// Types
export type {
  ShuttlerunEvent,
  ShuttlerunEventType,
  ShuttlerunConfig,
  KafkaConfig,
  ObservabilityConfig,
  CompressionCodec,
  LogLevel,
} from "./types/index.js";

// Kafka
export {
  EventProducer,
  CommandConsumer,
  SessionCommandSchema,
  TOPICS,
  resolveTopicName,
  eventTypeToTopic,
} from "./kafka/index.js";
export type { CommandHandler, SessionCommand } from "./kafka/index.js";

// Observability
export {
  initTracing,
  shutdownTracing,
  initMetrics,
  shutdownMetrics,
} from "./observability/index.js";

// Recorder
export { SessionRecorder } from "./recorder/recorder.js";
export type { EventSink } from "./recorder/recorder.js";

// Engine
export * from "../dispatch/index.js";
