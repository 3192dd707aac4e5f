// Run session state machine:
//
//   [*] --> Running
//   Running --> Completed       (policy exhausted, or run-mode target reached)
//   Running --> CircuitTripped  (consecutive failures reached the threshold)
//   Running --> Interrupted     (interrupt observed between submissions)
//   Completed --> [*]
//   CircuitTripped --> [*]
//   Interrupted --> [*]

import type { TerminationReason } from "../../model/types.js";

export type SessionState = "Running" | TerminationReason;

export const TERMINAL_STATES: ReadonlySet<SessionState> = new Set([
  "Completed",
  "CircuitTripped",
  "Interrupted",
]);

export function isTerminal(state: SessionState): state is TerminationReason {
  return TERMINAL_STATES.has(state);
}

export interface SessionTransition {
  sessionId: string;
  previous: SessionState;
  current: SessionState;
  at: number;
}

/** Guarded transition: only Running may move, and only into a terminal state. */
export function transition(
  sessionId: string,
  from: SessionState,
  to: TerminationReason,
  at: number,
): SessionTransition {
  if (from !== "Running") {
    throw new Error(
      `Invalid transition for session "${sessionId}": expected "Running", got "${from}"`,
    );
  }
  return { sessionId, previous: from, current: to, at };
}
