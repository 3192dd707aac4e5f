export {
  initTracing,
  shutdownTracing,
  getTracer,
  startSessionSpan,
  startTaskSpan,
  endSpanOk,
  endSpanError,
  extractTraceContext,
} from "./tracer.js";

export {
  initMetrics,
  shutdownMetrics,
} from "./metrics.js";

export type { ShuttlerunMetrics } from "./metrics.js";
