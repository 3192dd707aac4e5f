import { describe, it, expect } from "vitest";
import { MAX_TIMER_MS, parseSessionConfig, resolvePacingMs } from "./config.js";
import { ConfigurationError } from "../errors.js";

const liftToZone = {
  taskType: "LiftToZone",
  locations: ["L-1"],
  dropZones: ["DZ-A"],
};

function configurationError(raw: unknown): ConfigurationError {
  try {
    parseSessionConfig(raw);
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error("expected a ConfigurationError");
}

describe("parseSessionConfig", () => {
  it("fills in every default", () => {
    const config = parseSessionConfig({
      selection: liftToZone,
      mode: { kind: "count", count: 10 },
    });

    expect(config).toEqual({
      selection: { ...liftToZone, tasksPerLocationPerHour: 40 },
      mode: { kind: "count", count: 10 },
      request: { timeoutMs: 15_000, retryCount: 2, retryDelayMs: 1_000 },
      breakerThreshold: 5,
      successCodes: [50421021],
    });
  });

  it("fills in region pickup defaults", () => {
    const config = parseSessionConfig({
      selection: {
        taskType: "RegionPickup",
        rule: 1,
        areas: ["A"],
        fixedStore: "LIFT-1",
        slots: [{ locationId: "A-1", area: "A", number: 1 }],
      },
      mode: { kind: "duration", durationMs: 60_000 },
    });

    expect(config.selection).toEqual({
      taskType: "RegionPickup",
      rule: 1,
      areas: ["A"],
      fixedStore: "LIFT-1",
      stores: [],
      slots: [{ locationId: "A-1", area: "A", number: 1 }],
    });
  });

  it("rejects a zero task count", () => {
    const error = configurationError({ selection: liftToZone, mode: { kind: "count", count: 0 } });

    expect(error.issues).toEqual(["mode.count: Number must be greater than or equal to 1"]);
    expect(error.message).toBe(
      "Invalid session configuration: mode.count: Number must be greater than or equal to 1",
    );
  });

  it("lists every problem at once", () => {
    const error = configurationError({
      selection: { ...liftToZone, dropZones: [] },
      mode: { kind: "count", count: 1 },
      breakerThreshold: 0,
    });

    expect(error.issues).toEqual([
      "selection.dropZones: at least one drop-zone area is required",
      "breakerThreshold: Number must be greater than or equal to 1",
    ]);
    expect(error.message).toBe(
      "Invalid session configuration:\n" +
        "  - selection.dropZones: at least one drop-zone area is required\n" +
        "  - breakerThreshold: Number must be greater than or equal to 1",
    );
  });

  it("requires a destination for region pickups", () => {
    const error = configurationError({
      selection: {
        taskType: "RegionPickup",
        rule: 2,
        areas: ["A", "B"],
        slots: [
          { locationId: "A-1", area: "A", number: 1 },
          { locationId: "B-1", area: "B", number: 1 },
        ],
      },
      mode: { kind: "count", count: 1 },
    });

    expect(error.issues).toEqual([
      "selection.stores: either fixedStore or a non-empty stores list is required",
    ]);
  });

  it("rejects more than one area for the sequential rule", () => {
    const error = configurationError({
      selection: {
        taskType: "RegionPickup",
        rule: 1,
        areas: ["A", "B"],
        fixedStore: "LIFT-1",
        slots: [{ locationId: "A-1", area: "A", number: 1 }],
      },
      mode: { kind: "count", count: 1 },
    });

    expect(error.issues).toEqual(["selection.areas: rule 1 takes exactly one area, got 2"]);
  });

  it("rejects a single area for the random rule", () => {
    const error = configurationError({
      selection: {
        taskType: "RegionPickup",
        rule: 2,
        areas: ["A"],
        stores: ["LIFT-1"],
        slots: [{ locationId: "A-1", area: "A", number: 1 }],
      },
      mode: { kind: "count", count: 1 },
    });

    expect(error.issues).toEqual(["selection.areas: rule 2 needs at least two areas, got 1"]);
  });

  it("rejects a fixed store outside the stores list", () => {
    const error = configurationError({
      selection: {
        taskType: "RegionPickup",
        rule: 1,
        areas: ["A"],
        fixedStore: "NOT-LISTED",
        stores: ["LIFT-1"],
        slots: [{ locationId: "A-1", area: "A", number: 1 }],
      },
      mode: { kind: "count", count: 1 },
    });

    expect(error.issues).toEqual(['selection.fixedStore: "NOT-LISTED" is not in the stores list']);
  });

  it("rejects delays a timer cannot hold", () => {
    const error = configurationError({
      selection: liftToZone,
      mode: { kind: "count", count: 1 },
      request: { timeoutMs: MAX_TIMER_MS + 1 },
      pacingMs: MAX_TIMER_MS + 1,
    });

    expect(error.issues).toEqual([
      "request.timeoutMs: Number must be less than or equal to 2147483647",
      "pacingMs: Number must be less than or equal to 2147483647",
    ]);
  });

  it("rejects a missing run mode", () => {
    const error = configurationError({ selection: liftToZone });

    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]).toMatch(/^mode: /);
  });
});

describe("resolvePacingMs", () => {
  const regionPickup = {
    taskType: "RegionPickup",
    rule: 1,
    areas: ["A"],
    fixedStore: "LIFT-1",
    slots: [{ locationId: "A-1", area: "A", number: 1 }],
  };

  it("keeps an explicit value", () => {
    const config = parseSessionConfig({
      selection: regionPickup,
      mode: { kind: "count", count: 1 },
      pacingMs: 0,
    });

    expect(resolvePacingMs(config)).toBe(0);
  });

  it("spaces region pickups by half a second", () => {
    const config = parseSessionConfig({ selection: regionPickup, mode: { kind: "count", count: 1 } });

    expect(resolvePacingMs(config)).toBe(500);
  });

  it("spreads a duration-bound lift run over the hour", () => {
    const config = parseSessionConfig({
      selection: { ...liftToZone, locations: ["L-1", "L-2", "L-3"] },
      mode: { kind: "duration", durationMs: 3_600_000 },
    });

    expect(resolvePacingMs(config)).toBe(30_000);
  });

  it("does not pace a count-bound lift run", () => {
    const config = parseSessionConfig({ selection: liftToZone, mode: { kind: "count", count: 5 } });

    expect(resolvePacingMs(config)).toBe(0);
  });
});
