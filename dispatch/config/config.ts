import { z } from "zod";
import { ConfigurationError } from "../errors.js";

/** Business code the dispatch API returns when an equivalent task already exists. */
export const ALREADY_EQUIVALENT_CODE = 50421021;

export const DEFAULT_TIMEOUT_MS = 15_000;
export const DEFAULT_RETRY_COUNT = 2;
export const DEFAULT_RETRY_DELAY_MS = 1_000;
export const DEFAULT_BREAKER_THRESHOLD = 5;
export const DEFAULT_TASKS_PER_LOCATION_PER_HOUR = 40;
export const REGION_PICKUP_PACING_MS = 500;

/** Longest delay a Node timer honours; larger values fire after 1ms */
export const MAX_TIMER_MS = 2_147_483_647;

const HOUR_MS = 3_600_000;

const nonEmptyId = z.string().trim().min(1);

const StoreSlotSchema = z.object({
  locationId: nonEmptyId,
  area: nonEmptyId,
  number: z.number().int(),
});

const RunModeSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("count"), count: z.number().int().min(1) }),
  z.object({ kind: z.literal("duration"), durationMs: z.number().positive() }),
]);

const LiftToZoneSelectionSchema = z.object({
  taskType: z.literal("LiftToZone"),
  locations: z.array(nonEmptyId).min(1, "at least one pickup location is required"),
  dropZones: z.array(nonEmptyId).min(1, "at least one drop-zone area is required"),
  tasksPerLocationPerHour: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_TASKS_PER_LOCATION_PER_HOUR),
});

const RegionPickupSelectionSchema = z.object({
  taskType: z.literal("RegionPickup"),
  rule: z.union([z.literal(1), z.literal(2)]),
  areas: z.array(nonEmptyId).min(1, "at least one area is required"),
  /** Destination store used for every task when set */
  fixedStore: nonEmptyId.nullable().default(null),
  /** Destination stores picked at random when no fixed store is set */
  stores: z.array(nonEmptyId).default([]),
  /** Store slots supplied by discovery */
  slots: z.array(StoreSlotSchema).min(1, "discovery supplied no store slots"),
});

const SelectionSchema = z.discriminatedUnion("taskType", [
  LiftToZoneSelectionSchema,
  RegionPickupSelectionSchema,
]);

const delayMs = z.number().min(0).max(MAX_TIMER_MS);

const RequestSchema = z.object({
  timeoutMs: z.number().positive().max(MAX_TIMER_MS).default(DEFAULT_TIMEOUT_MS),
  retryCount: z.number().int().min(0).default(DEFAULT_RETRY_COUNT),
  retryDelayMs: delayMs.default(DEFAULT_RETRY_DELAY_MS),
});

export const SessionConfigSchema = z
  .object({
    selection: SelectionSchema,
    mode: RunModeSchema,
    request: RequestSchema.default({}),
    breakerThreshold: z.number().int().min(1).default(DEFAULT_BREAKER_THRESHOLD),
    /** Business codes treated as success in addition to an explicit success flag */
    successCodes: z.array(z.number().int()).default([ALREADY_EQUIVALENT_CODE]),
    /** Minimum spacing between submission starts; see resolvePacingMs */
    pacingMs: delayMs.optional(),
  })
  .superRefine((value, ctx) => {
    const { selection } = value;
    if (selection.taskType !== "RegionPickup") return;

    if (selection.rule === 1 && selection.areas.length !== 1) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["selection", "areas"],
        message: `rule 1 takes exactly one area, got ${selection.areas.length}`,
      });
    }
    if (selection.rule === 2 && selection.areas.length < 2) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["selection", "areas"],
        message: `rule 2 needs at least two areas, got ${selection.areas.length}`,
      });
    }
    if (
      selection.fixedStore !== null &&
      selection.stores.length > 0 &&
      !selection.stores.includes(selection.fixedStore)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["selection", "fixedStore"],
        message: `"${selection.fixedStore}" is not in the stores list`,
      });
    }
    if (selection.fixedStore === null && selection.stores.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["selection", "stores"],
        message: "either fixedStore or a non-empty stores list is required",
      });
    }
  });

export type SessionConfig = z.output<typeof SessionConfigSchema>;
export type SessionConfigInput = z.input<typeof SessionConfigSchema>;
export type SelectionConfig = SessionConfig["selection"];
export type LiftToZoneSelection = z.output<typeof LiftToZoneSelectionSchema>;
export type RegionPickupSelection = z.output<typeof RegionPickupSelectionSchema>;
export type RequestConfig = SessionConfig["request"];

/**
 * Spacing between the starts of consecutive submissions. An explicit
 * `pacingMs` wins. Otherwise region pickups are spaced by half a second, and
 * a duration-bound lift run spreads each location's hourly cap over the hour.
 */
export function resolvePacingMs(config: SessionConfig): number {
  if (config.pacingMs !== undefined) return config.pacingMs;
  const { selection, mode } = config;
  if (selection.taskType === "RegionPickup") return REGION_PICKUP_PACING_MS;
  if (mode.kind === "count") return 0;
  return Math.floor(HOUR_MS / (selection.tasksPerLocationPerHour * selection.locations.length));
}

export function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  return `${path}: ${issue.message}`;
}

/**
 * Validate a raw session configuration and fill in defaults.
 * Throws ConfigurationError listing every problem found.
 */
export function parseSessionConfig(raw: unknown): SessionConfig {
  const result = SessionConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map(formatIssue));
  }
  return result.data;
}
