export { EventProducer } from "./producer.js";
export { CommandConsumer, SessionCommandSchema } from "./consumer.js";
export type { CommandHandler, SessionCommand } from "./consumer.js";
export { TOPICS, resolveTopicName, eventTypeToTopic } from "./topics.js";
