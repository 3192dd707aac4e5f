import {
  MeterProvider,
  PeriodicExportingMetricReader,
  type MetricReader,
} from "@opentelemetry/sdk-metrics";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { ATTR_SERVICE_NAME } from "@opentelemetry/semantic-conventions";
import type { ObservabilityConfig } from "../types/index.js";

let meterProvider: MeterProvider | null = null;

/**
 * Initialize the OpenTelemetry meter provider.
 */
export function initMetrics(config: ObservabilityConfig): ShuttlerunMetrics {
  const resource = new Resource({
    [ATTR_SERVICE_NAME]: config.serviceName,
    ...config.resourceAttributes,
  });

  const readers: MetricReader[] = [];

  if (config.metricsEndpoint) {
    const exporter = new OTLPMetricExporter({
      url: config.metricsEndpoint,
    });
    readers.push(
      new PeriodicExportingMetricReader({
        exporter,
        exportIntervalMillis: config.metricsInterval ?? 15000,
      }),
    );
  }

  const provider = new MeterProvider({ resource, readers });
  meterProvider = provider;

  return createMetrics(provider);
}

export async function shutdownMetrics(): Promise<void> {
  if (meterProvider) {
    await meterProvider.shutdown();
    meterProvider = null;
  }
}

/**
 * Dispatch metrics: counters and histograms.
 */
export interface ShuttlerunMetrics {
  /** Recorded tasks, by outcome kind */
  taskCount: (attrs: { taskType: string; outcome: string }) => void;
  /** Attempts spent on one task */
  taskAttempts: (attempts: number, attrs: { taskType: string }) => void;
  /** Time from first attempt to recorded outcome */
  submissionDuration: (ms: number, attrs: { taskType: string; outcome: string }) => void;
  /** Sessions ended by the circuit breaker */
  breakerTrips: (attrs: { taskType: string }) => void;
  /** Sessions currently running */
  activeSessions: (delta: number) => void;
}

function createMetrics(provider: MeterProvider): ShuttlerunMetrics {
  const meter = provider.getMeter("shuttlerun");

  const taskCounter = meter.createCounter("shuttlerun.tasks.total", {
    description: "Total tasks recorded",
  });

  const attemptsHist = meter.createHistogram("shuttlerun.tasks.attempts", {
    description: "Submission attempts per task",
  });

  const durationHist = meter.createHistogram("shuttlerun.tasks.duration_ms", {
    description: "Task submission duration in milliseconds, retries included",
    unit: "ms",
  });

  const tripCounter = meter.createCounter("shuttlerun.breaker.trips_total", {
    description: "Sessions terminated by the circuit breaker",
  });

  const activeGauge = meter.createUpDownCounter("shuttlerun.sessions.active", {
    description: "Currently running sessions",
  });

  return {
    taskCount: (attrs) => taskCounter.add(1, attrs),
    taskAttempts: (attempts, attrs) => attemptsHist.record(attempts, attrs),
    submissionDuration: (ms, attrs) => durationHist.record(ms, attrs),
    breakerTrips: (attrs) => tripCounter.add(1, attrs),
    activeSessions: (delta) => activeGauge.add(delta),
  };
}
