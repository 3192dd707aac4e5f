import type { Outcome, Task } from "../../model/types.js";
import { usageKeys } from "../../model/types.js";
import { HOUR_MS } from "../selection/strategies.js";

export interface HourlyBucket {
  /** 1-based hour since the session started */
  hour: number;
  submitted: number;
  succeeded: number;
  businessFailures: number;
  transportFailures: number;
}

export interface StatisticsSnapshot {
  submitted: number;
  succeeded: number;
  failed: number;
  businessFailures: number;
  transportFailures: number;
  attempts: number;
  areaUsage: Record<string, number>;
  storeUsage: Record<string, number>;
  hourly: HourlyBucket[];
}

function bump(map: Map<string, number>, key: string): void {
  map.set(key, (map.get(key) ?? 0) + 1);
}

function sortedRecord(map: Map<string, number>): Record<string, number> {
  return Object.fromEntries(
    [...map.entries()].sort(([a], [b]) => a.localeCompare(b)),
  );
}

/**
 * In-memory counters for one session. Every recorded task bumps exactly one
 * of succeeded/failed, so submitted == succeeded + failed always holds.
 */
export class SessionStatistics {
  private submitted = 0;
  private succeeded = 0;
  private businessFailures = 0;
  private transportFailures = 0;
  private attempts = 0;
  private areaUsage = new Map<string, number>();
  private storeUsage = new Map<string, number>();
  private hourly = new Map<number, HourlyBucket>();

  constructor(private readonly startedAt: number) {}

  record(task: Task, outcome: Outcome, attempts: number, at: number): void {
    this.submitted += 1;
    this.attempts += attempts;

    const bucket = this.bucketFor(at);
    bucket.submitted += 1;

    switch (outcome.kind) {
      case "Success":
        this.succeeded += 1;
        bucket.succeeded += 1;
        break;
      case "BusinessFailure":
        this.businessFailures += 1;
        bucket.businessFailures += 1;
        break;
      case "TransportFailure":
        this.transportFailures += 1;
        bucket.transportFailures += 1;
        break;
    }

    const { area, store } = usageKeys(task);
    bump(this.areaUsage, area);
    bump(this.storeUsage, store);
  }

  get submittedCount(): number {
    return this.submitted;
  }

  snapshot(): StatisticsSnapshot {
    return {
      submitted: this.submitted,
      succeeded: this.succeeded,
      failed: this.businessFailures + this.transportFailures,
      businessFailures: this.businessFailures,
      transportFailures: this.transportFailures,
      attempts: this.attempts,
      areaUsage: sortedRecord(this.areaUsage),
      storeUsage: sortedRecord(this.storeUsage),
      hourly: [...this.hourly.values()]
        .sort((a, b) => a.hour - b.hour)
        .map((bucket) => ({ ...bucket })),
    };
  }

  private bucketFor(at: number): HourlyBucket {
    const hour = Math.floor(Math.max(0, at - this.startedAt) / HOUR_MS) + 1;
    let bucket = this.hourly.get(hour);
    if (!bucket) {
      bucket = {
        hour,
        submitted: 0,
        succeeded: 0,
        businessFailures: 0,
        transportFailures: 0,
      };
      this.hourly.set(hour, bucket);
    }
    return bucket;
  }
}
