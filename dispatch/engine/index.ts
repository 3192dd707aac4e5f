export { CircuitBreaker } from "./breaker/breaker.js";
export {
  pauseUnlessAborted,
  sleepWithTimer,
  type Now,
  type Pause,
  type Sleep,
} from "./clock.js";
export * from "./selection/index.js";
export {
  RunSession,
  interrupt,
  report,
  startSession,
  type SessionDeps,
  type SessionHandle,
} from "./session/session.js";
export {
  TERMINAL_STATES,
  isTerminal,
  transition,
  type SessionState,
  type SessionTransition,
} from "./session/states.js";
export {
  SessionStatistics,
  type HourlyBucket,
  type StatisticsSnapshot,
} from "./session/statistics.js";
