import type { SelectionConfig } from "../../config/config.js";
import { LiftToZonePolicy, type LiftToZoneStrategies } from "./lift-to-zone.js";
import type { SelectionPolicy } from "./policy.js";
import {
  RandomAreaPolicy,
  SequentialAreaPolicy,
  type RegionPickupStrategies,
} from "./region-pickup.js";

export type SelectionStrategies = LiftToZoneStrategies & RegionPickupStrategies;

export function createSelectionPolicy(
  selection: SelectionConfig,
  strategies: SelectionStrategies = {},
): SelectionPolicy {
  switch (selection.taskType) {
    case "LiftToZone":
      return new LiftToZonePolicy(selection, strategies);
    case "RegionPickup":
      return selection.rule === 1
        ? new SequentialAreaPolicy(selection, strategies)
        : new RandomAreaPolicy(selection, strategies);
  }
}

export {
  BaseSelectionPolicy,
  type Exhausted,
  type Selection,
  type SelectionPolicy,
} from "./policy.js";
export { LiftToZonePolicy, type LiftToZoneStrategies } from "./lift-to-zone.js";
export {
  RandomAreaPolicy,
  SequentialAreaPolicy,
  groupSlotsByArea,
  type RegionPickupStrategies,
} from "./region-pickup.js";
export * from "./strategies.js";
