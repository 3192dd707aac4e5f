import { nanoid } from "nanoid";
import type { Task } from "../../model/types.js";
import { sourceKey } from "../../model/types.js";

export interface Exhausted {
  kind: "exhausted";
  /** When set, capacity returns at this instant (quota-based policies) */
  resumeAt?: number;
}

export type Selection = { kind: "task"; task: Task } | Exhausted;

/**
 * Picks the next (source, destination) pair for a session.
 * Implementations are stateful and owned by exactly one session.
 */
export interface SelectionPolicy {
  next(now: number): Selection;
  /** Release the in-flight mark once the task's outcome has been recorded. */
  settle(task: Task): void;
  /** Number of sources currently selected but not yet settled. */
  readonly inFlightCount: number;
}

/**
 * Shared in-flight bookkeeping: a source handed out by `next()` is not handed
 * out again until `settle()` is called for it.
 */
export abstract class BaseSelectionPolicy implements SelectionPolicy {
  private inFlight = new Set<string>();

  abstract next(now: number): Selection;

  settle(task: Task): void {
    this.inFlight.delete(sourceKey(task));
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  protected isInFlight(key: string): boolean {
    return this.inFlight.has(key);
  }

  protected issue(task: Task): Selection {
    this.inFlight.add(sourceKey(task));
    return { kind: "task", task };
  }

  protected newTaskId(): string {
    return nanoid();
  }
}
