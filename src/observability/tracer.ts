import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Context,
} from "@opentelemetry/api";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { BatchSpanProcessor } from "@opentelemetry/sdk-trace-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { ObservabilityConfig } from "../types/index.js";

let provider: NodeTracerProvider | null = null;

/**
 * Initialize the OpenTelemetry trace provider.
 * Call once at startup.
 */
export function initTracing(config: ObservabilityConfig): void {
  if (provider) return;

  const resource = new Resource({
    [ATTR_SERVICE_NAME]: config.serviceName,
    ...config.resourceAttributes,
  });

  provider = new NodeTracerProvider({ resource });

  if (config.traceEndpoint) {
    const exporter = new OTLPTraceExporter({
      url: config.traceEndpoint,
    });
    provider.addSpanProcessor(new BatchSpanProcessor(exporter));
  }

  provider.register();
}

/**
 * Shutdown the trace provider. Call on process exit.
 */
export async function shutdownTracing(): Promise<void> {
  if (provider) {
    await provider.shutdown();
    provider = null;
  }
}

export function getTracer(component: string): Tracer {
  return trace.getTracer(`shuttlerun.${component}`);
}

/**
 * Root span for one run session. Task spans are parented on the returned
 * context.
 */
export function startSessionSpan(
  sessionId: string,
  taskType: string,
): { span: Span; ctx: Context } {
  const span = getTracer("session").startSpan(`session.${taskType}`, {
    kind: SpanKind.INTERNAL,
    attributes: {
      "shuttlerun.session.id": sessionId,
      "shuttlerun.task.type": taskType,
    },
  });
  const ctx = trace.setSpan(context.active(), span);
  return { span, ctx };
}

export function startTaskSpan(
  parentCtx: Context,
  taskId: string,
  source: string,
  destination: string,
): Span {
  return getTracer("task").startSpan(
    "task.dispatch",
    {
      kind: SpanKind.CLIENT,
      attributes: {
        "shuttlerun.task.id": taskId,
        "shuttlerun.task.source": source,
        "shuttlerun.task.destination": destination,
      },
    },
    parentCtx,
  );
}

export function endSpanOk(span: Span): void {
  span.setStatus({ code: SpanStatusCode.OK });
  span.end();
}

export function endSpanError(span: Span, error: Error | string): void {
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: typeof error === "string" ? error : error.message,
  });
  if (error instanceof Error) {
    span.recordException(error);
  }
  span.end();
}

/**
 * Extract trace context (traceId + spanId) from a span.
 */
export function extractTraceContext(span: Span): {
  traceId: string;
  spanId: string;
} {
  const spanCtx = span.spanContext();
  return {
    traceId: spanCtx.traceId,
    spanId: spanCtx.spanId,
  };
}
