import type { Outcome } from "../../model/types.js";

/**
 * Counts consecutive non-success outcomes. Trips once the count reaches the
 * threshold; a trip is sticky for the life of the session.
 */
export class CircuitBreaker {
  private consecutive = 0;
  private trippedFlag = false;

  constructor(readonly threshold: number) {
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new Error(`Breaker threshold must be a positive integer, got ${threshold}`);
    }
  }

  /** Returns true on the outcome that trips the breaker. */
  record(outcome: Outcome): boolean {
    if (outcome.kind === "Success") {
      this.consecutive = 0;
      return false;
    }
    this.consecutive += 1;
    if (this.consecutive === this.threshold) {
      this.trippedFlag = true;
      return true;
    }
    return false;
  }

  get consecutiveFailures(): number {
    return this.consecutive;
  }

  get tripped(): boolean {
    return this.trippedFlag;
  }
}
