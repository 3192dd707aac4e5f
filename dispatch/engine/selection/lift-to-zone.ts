import type { LiftToZoneSelection } from "../../config/config.js";
import { BaseSelectionPolicy, type Selection } from "./policy.js";
import {
  LeastUsedZoneSelector,
  RollingWindowQuota,
  type QuotaStrategy,
  type RandomSource,
  type ZoneSelector,
} from "./strategies.js";

export interface LiftToZoneStrategies {
  quota?: QuotaStrategy;
  zones?: ZoneSelector;
  random?: RandomSource;
}

/**
 * Round-robin over pickup locations with a per-location hourly cap.
 * A location whose quota is used up is skipped, not failed; when every
 * location is capped the policy is exhausted until the earliest slot frees.
 */
export class LiftToZonePolicy extends BaseSelectionPolicy {
  private readonly locations: string[];
  private readonly quota: QuotaStrategy;
  private readonly zones: ZoneSelector;
  private cursor = 0;

  constructor(selection: LiftToZoneSelection, strategies: LiftToZoneStrategies = {}) {
    super();
    this.locations = [...new Set(selection.locations)];
    this.quota =
      strategies.quota ?? new RollingWindowQuota(selection.tasksPerLocationPerHour);
    this.zones =
      strategies.zones ??
      new LeastUsedZoneSelector([...new Set(selection.dropZones)], strategies.random);
  }

  next(now: number): Selection {
    for (let step = 0; step < this.locations.length; step++) {
      const index = (this.cursor + step) % this.locations.length;
      const location = this.locations[index];
      if (location === undefined) continue;
      if (this.isInFlight(location) || !this.quota.allows(location, now)) continue;

      this.cursor = index + 1;
      this.quota.consume(location, now);
      return this.issue({
        id: this.newTaskId(),
        type: "LiftToZone",
        source: location,
        destination: this.zones.select(),
        submittedAt: now,
      });
    }

    const resumeAt = this.quota.nextAvailableAt(this.locations, now);
    return resumeAt === null || resumeAt <= now
      ? { kind: "exhausted" }
      : { kind: "exhausted", resumeAt };
  }
}
