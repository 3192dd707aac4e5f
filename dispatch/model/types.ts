// ============================================================================
// Dispatch Model: tasks, outcomes and run modes shared across the engine
// ============================================================================

export type TaskType = "LiftToZone" | "RegionPickup";

/** One pickup position discovered inside an area. */
export interface StoreSlot {
  locationId: string;
  area: string;
  /** Ordinal inside the area; lower numbers are executed first */
  number: number;
}

// ---------------------------------------------------------------------------
// Tasks
// ---------------------------------------------------------------------------

export interface TaskBase {
  id: string;
  type: TaskType;
  submittedAt: number;
}

/** Move cargo from a pickup location to a drop-zone area. */
export interface LiftToZoneTask extends TaskBase {
  type: "LiftToZone";
  source: string;
  destination: string;
}

/** Pick up from a store slot inside an area and deliver to a lift/store. */
export interface RegionPickupTask extends TaskBase {
  type: "RegionPickup";
  source: StoreSlot;
  destination: string;
}

export type Task = LiftToZoneTask | RegionPickupTask;

// ---------------------------------------------------------------------------
// Outcomes
// ---------------------------------------------------------------------------

export interface SuccessOutcome {
  kind: "Success";
  code: number | null;
}

export interface BusinessFailureOutcome {
  kind: "BusinessFailure";
  code: number | null;
  info: string;
}

export interface TransportFailureOutcome {
  kind: "TransportFailure";
  reason: string;
  /** HTTP status when the server answered at all */
  status?: number;
}

export type Outcome =
  | SuccessOutcome
  | BusinessFailureOutcome
  | TransportFailureOutcome;

export type OutcomeKind = Outcome["kind"];

export function describeOutcome(outcome: Outcome): string {
  switch (outcome.kind) {
    case "Success":
      return outcome.code === null ? "success" : `success (code ${outcome.code})`;
    case "BusinessFailure":
      return `business failure (code ${outcome.code ?? "none"}): ${outcome.info}`;
    case "TransportFailure":
      return `transport failure: ${outcome.reason}`;
  }
}

// ---------------------------------------------------------------------------
// Run modes
// ---------------------------------------------------------------------------

export interface CountBound {
  kind: "count";
  count: number;
}

export interface DurationBound {
  kind: "duration";
  durationMs: number;
}

export type RunMode = CountBound | DurationBound;

export type TerminationReason = "Completed" | "CircuitTripped" | "Interrupted";

/** Usage dimensions a task is counted under in the report. */
export function usageKeys(task: Task): { area: string; store: string } {
  switch (task.type) {
    case "LiftToZone":
      return { area: task.destination, store: task.source };
    case "RegionPickup":
      return { area: task.source.area, store: task.destination };
  }
}

/** Key used to track in-flight sources. */
export function sourceKey(task: Task): string {
  return task.type === "LiftToZone" ? task.source : task.source.locationId;
}
