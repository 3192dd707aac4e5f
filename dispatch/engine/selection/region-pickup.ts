import type { RegionPickupSelection } from "../../config/config.js";
import { ConfigurationError } from "../../errors.js";
import type { StoreSlot } from "../../model/types.js";
import { BaseSelectionPolicy, type Selection } from "./policy.js";
import {
  AntiContentionChooser,
  FixedDestination,
  RandomDestination,
  type AreaChooser,
  type DestinationChooser,
  type RandomSource,
} from "./strategies.js";

/**
 * Group discovered slots by area, keeping only the configured areas, each
 * sorted by slot number. Unknown or empty areas are configuration errors.
 */
export function groupSlotsByArea(
  slots: readonly StoreSlot[],
  areas: readonly string[],
): Map<string, StoreSlot[]> {
  const grouped = new Map<string, StoreSlot[]>();
  for (const slot of slots) {
    const bucket = grouped.get(slot.area);
    if (bucket) {
      bucket.push(slot);
    } else {
      grouped.set(slot.area, [slot]);
    }
  }

  const wanted = [...new Set(areas)];
  const unknown = wanted.filter((area) => !grouped.has(area));
  if (unknown.length > 0) {
    throw new ConfigurationError([
      `selection.areas: no store slots discovered for ${unknown.join(", ")}`,
    ]);
  }

  const result = new Map<string, StoreSlot[]>();
  for (const area of wanted) {
    const bucket = grouped.get(area) ?? [];
    result.set(
      area,
      [...bucket].sort(
        (a, b) => a.number - b.number || a.locationId.localeCompare(b.locationId),
      ),
    );
  }
  return result;
}

export interface RegionPickupStrategies {
  areas?: AreaChooser;
  destination?: DestinationChooser;
  random?: RandomSource;
}

function defaultDestination(
  selection: RegionPickupSelection,
  random?: RandomSource,
): DestinationChooser {
  return selection.fixedStore !== null
    ? new FixedDestination(selection.fixedStore)
    : new RandomDestination(selection.stores, random);
}

/**
 * Base for both region rules: per-area queues of unexecuted slots, lowest
 * number first. A slot is executed as soon as it is handed out.
 */
abstract class RegionPickupPolicy extends BaseSelectionPolicy {
  protected readonly queues: Map<string, StoreSlot[]>;
  protected readonly destination: DestinationChooser;

  constructor(
    queues: Map<string, StoreSlot[]>,
    destination: DestinationChooser,
  ) {
    super();
    this.queues = queues;
    this.destination = destination;
  }

  protected take(area: string, now: number): Selection {
    const queue = this.queues.get(area) ?? [];
    const index = queue.findIndex((slot) => !this.isInFlight(slot.locationId));
    const slot = index >= 0 ? queue.splice(index, 1)[0] : undefined;
    if (!slot) return { kind: "exhausted" };

    return this.issue({
      id: this.newTaskId(),
      type: "RegionPickup",
      source: slot,
      destination: this.destination.choose(),
      submittedAt: now,
    });
  }
}

/** Rule 1: one area, slots in ascending number order. */
export class SequentialAreaPolicy extends RegionPickupPolicy {
  private readonly area: string;

  constructor(selection: RegionPickupSelection, strategies: RegionPickupStrategies = {}) {
    const area = selection.areas[0];
    if (area === undefined) {
      throw new ConfigurationError(["selection.areas: at least one area is required"]);
    }
    super(
      groupSlotsByArea(selection.slots, [area]),
      strategies.destination ?? defaultDestination(selection, strategies.random),
    );
    this.area = area;
  }

  next(now: number): Selection {
    return this.take(this.area, now);
  }
}

/** Rule 2: random area per task, never the same area twice in a row while another has work. */
export class RandomAreaPolicy extends RegionPickupPolicy {
  private readonly chooser: AreaChooser;
  private previous: string | null = null;

  constructor(selection: RegionPickupSelection, strategies: RegionPickupStrategies = {}) {
    super(
      groupSlotsByArea(selection.slots, selection.areas),
      strategies.destination ?? defaultDestination(selection, strategies.random),
    );
    this.chooser = strategies.areas ?? new AntiContentionChooser(strategies.random);
  }

  next(now: number): Selection {
    const available = [...this.queues.entries()]
      .filter(([, queue]) => queue.length > 0)
      .map(([area]) => area);
    if (available.length === 0) return { kind: "exhausted" };

    const area = this.chooser.choose(available, this.previous);
    this.previous = area;
    return this.take(area, now);
  }
}
