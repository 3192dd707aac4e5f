/** Source of uniform randoms in [0, 1). Injected so selections are reproducible in tests. */
export type RandomSource = () => number;

export const HOUR_MS = 3_600_000;

export function pickRandom<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new Error("Cannot pick from an empty list");
  }
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  const item = items[index];
  if (item === undefined) {
    throw new Error(`Random index ${index} out of range`);
  }
  return item;
}

// ---------------------------------------------------------------------------
// Per-location quota
// ---------------------------------------------------------------------------

export interface QuotaStrategy {
  /** Whether another task may be dispatched from this location now. */
  allows(location: string, now: number): boolean;
  /** Count a dispatch against the location. */
  consume(location: string, now: number): void;
  /** Earliest instant at which any of the locations regains capacity. */
  nextAvailableAt(locations: readonly string[], now: number): number | null;
}

/**
 * Caps dispatches per location inside a rolling window (one hour by default).
 */
export class RollingWindowQuota implements QuotaStrategy {
  private history = new Map<string, number[]>();

  constructor(
    private readonly limit: number,
    private readonly windowMs: number = HOUR_MS,
  ) {}

  allows(location: string, now: number): boolean {
    return this.prune(location, now).length < this.limit;
  }

  consume(location: string, now: number): void {
    this.prune(location, now).push(now);
  }

  nextAvailableAt(locations: readonly string[], now: number): number | null {
    let earliest: number | null = null;
    for (const location of locations) {
      const stamps = this.prune(location, now);
      if (stamps.length < this.limit) return now;
      const oldest = stamps[0];
      if (oldest === undefined) continue;
      const freesAt = oldest + this.windowMs;
      if (earliest === null || freesAt < earliest) earliest = freesAt;
    }
    return earliest;
  }

  private prune(location: string, now: number): number[] {
    const cutoff = now - this.windowMs;
    const stamps = (this.history.get(location) ?? []).filter((t) => t > cutoff);
    this.history.set(location, stamps);
    return stamps;
  }
}

// ---------------------------------------------------------------------------
// Drop-zone choice (LiftToZone)
// ---------------------------------------------------------------------------

export interface ZoneSelector {
  select(): string;
}

/**
 * Picks uniformly among the zones used the fewest times so far, so every zone
 * is covered evenly while the order stays random.
 */
export class LeastUsedZoneSelector implements ZoneSelector {
  private useCount = new Map<string, number>();

  constructor(
    zones: readonly string[],
    private readonly random: RandomSource = Math.random,
  ) {
    if (zones.length === 0) {
      throw new Error("Drop-zone list is empty");
    }
    for (const zone of zones) this.useCount.set(zone, 0);
  }

  select(): string {
    const min = Math.min(...this.useCount.values());
    const candidates = [...this.useCount.entries()]
      .filter(([, count]) => count === min)
      .map(([zone]) => zone);
    const selected = pickRandom(candidates, this.random);
    this.useCount.set(selected, min + 1);
    return selected;
  }
}

// ---------------------------------------------------------------------------
// Area choice (RegionPickup rule 2)
// ---------------------------------------------------------------------------

export interface AreaChooser {
  /**
   * Choose one of the areas that still have unexecuted stores.
   * `previous` is the area chosen on the last call, if any.
   */
  choose(available: readonly string[], previous: string | null): string;
}

/**
 * Uniform random choice that never repeats the previous area while another
 * area still has work.
 */
export class AntiContentionChooser implements AreaChooser {
  constructor(private readonly random: RandomSource = Math.random) {}

  choose(available: readonly string[], previous: string | null): string {
    const candidates =
      available.length >= 2 && previous !== null
        ? available.filter((area) => area !== previous)
        : available;
    return pickRandom(candidates, this.random);
  }
}

// ---------------------------------------------------------------------------
// Destination choice (RegionPickup)
// ---------------------------------------------------------------------------

export interface DestinationChooser {
  choose(): string;
}

export class FixedDestination implements DestinationChooser {
  constructor(private readonly store: string) {}

  choose(): string {
    return this.store;
  }
}

export class RandomDestination implements DestinationChooser {
  constructor(
    private readonly stores: readonly string[],
    private readonly random: RandomSource = Math.random,
  ) {
    if (stores.length === 0) {
      throw new Error("Destination store list is empty");
    }
  }

  choose(): string {
    return pickRandom(this.stores, this.random);
  }
}
