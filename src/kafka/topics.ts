/**
 * Kafka topic definitions.
 * All topics are prefixed with the configured topicPrefix.
 */

export const TOPICS = {
  /** Per-task outcome events, keyed by sessionId */
  TASKS: "tasks",
  /** Session lifecycle events (started/finished with report) */
  SESSIONS: "sessions",
  /** Remote session commands (interrupt) */
  SESSION_COMMANDS: "session-commands",
} as const;

export type TopicName = (typeof TOPICS)[keyof typeof TOPICS];

export function resolveTopicName(prefix: string, topic: TopicName): string {
  return `${prefix}.${topic}`;
}

/** Map event types to their target topics */
export function eventTypeToTopic(eventType: string): TopicName {
  if (eventType.startsWith("task.")) return TOPICS.TASKS;
  return TOPICS.SESSIONS;
}
