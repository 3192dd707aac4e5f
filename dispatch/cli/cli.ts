import { readFile } from "node:fs/promises";
import { parseArgs } from "node:util";
import { z } from "zod";
import { formatIssue, parseSessionConfig, type SessionConfig } from "../config/config.js";
import { ConfigurationError } from "../errors.js";
import type { TerminationReason } from "../model/types.js";

export const USAGE =
  "Usage: shuttlerun <session.json> [--total-tasks N] [--hours H] [--retry N] " +
  "[--timeout SECONDS] [--retry-delay SECONDS] [--debug]";

export interface CliOverrides {
  totalTasks?: number;
  hours?: number;
  retryCount?: number;
  timeoutSeconds?: number;
  retryDelaySeconds?: number;
}

export interface CliArgs {
  sessionFile: string;
  overrides: CliOverrides;
  debug: boolean;
}

function numberOption(
  name: string,
  value: string | undefined,
  check: (n: number) => boolean,
  expected: string,
): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed) || !check(parsed)) {
    throw new ConfigurationError([`--${name}: expected ${expected}, got "${value}"`]);
  }
  return parsed;
}

function tokenize(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        "total-tasks": { type: "string" },
        hours: { type: "string" },
        retry: { type: "string" },
        timeout: { type: "string" },
        "retry-delay": { type: "string" },
        debug: { type: "boolean", default: false },
      },
    });
  } catch (err) {
    throw new ConfigurationError([err instanceof Error ? err.message : String(err)]);
  }
}

/** Parse CLI arguments (without the node and script entries). */
export function parseCliArgs(argv: string[]): CliArgs {
  const parsed = tokenize(argv);
  const { values, positionals } = parsed;
  const sessionFile = positionals[0];
  if (!sessionFile) {
    throw new ConfigurationError([USAGE]);
  }

  const positiveInt = (n: number) => Number.isInteger(n) && n >= 1;
  const positive = (n: number) => n > 0;

  return {
    sessionFile,
    debug: values.debug === true,
    overrides: {
      totalTasks: numberOption("total-tasks", values["total-tasks"], positiveInt, "a positive integer"),
      hours: numberOption("hours", values.hours, positive, "a positive number"),
      retryCount: numberOption(
        "retry",
        values.retry,
        (n) => Number.isInteger(n) && n >= 0,
        "a non-negative integer",
      ),
      timeoutSeconds: numberOption("timeout", values.timeout, positive, "a positive number"),
      retryDelaySeconds: numberOption(
        "retry-delay",
        values["retry-delay"],
        (n) => n >= 0,
        "a non-negative number",
      ),
    },
  };
}

// ---------------------------------------------------------------------------
// Session file
// ---------------------------------------------------------------------------

const ServerSchema = z.object({
  baseUrl: z.string().url(),
  /** Falls back to SHUTTLERUN_TOKEN */
  token: z.string().min(1).optional(),
  sceneId: z.number().int().optional(),
});

const SessionFileSchema = z.object({
  server: ServerSchema,
  session: z.record(z.unknown()),
});

export type ServerSettings = z.infer<typeof ServerSchema>;
export type SessionFile = z.infer<typeof SessionFileSchema>;

export function parseSessionFile(raw: unknown): SessionFile {
  const result = SessionFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(result.error.issues.map(formatIssue));
  }
  return result.data;
}

export async function loadSessionFile(path: string): Promise<SessionFile> {
  const text = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError([
      `${path}: not valid JSON (${err instanceof Error ? err.message : String(err)})`,
    ]);
  }
  return parseSessionFile(raw);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Apply CLI overrides on top of the file's session block and validate the
 * result. A task count wins over hours.
 */
export function resolveSessionConfig(
  session: Record<string, unknown>,
  overrides: CliOverrides,
): SessionConfig {
  const merged: Record<string, unknown> = { ...session };

  if (overrides.totalTasks !== undefined) {
    merged.mode = { kind: "count", count: overrides.totalTasks };
  } else if (overrides.hours !== undefined) {
    merged.mode = { kind: "duration", durationMs: Math.round(overrides.hours * 3_600_000) };
  }

  const request: Record<string, unknown> = isRecord(session.request) ? { ...session.request } : {};
  if (overrides.retryCount !== undefined) request.retryCount = overrides.retryCount;
  if (overrides.timeoutSeconds !== undefined) {
    request.timeoutMs = Math.round(overrides.timeoutSeconds * 1000);
  }
  if (overrides.retryDelaySeconds !== undefined) {
    request.retryDelayMs = Math.round(overrides.retryDelaySeconds * 1000);
  }
  merged.request = request;

  return parseSessionConfig(merged);
}

export function resolveToken(
  server: ServerSettings,
  env: Record<string, string | undefined>,
): string {
  const token = server.token ?? env.SHUTTLERUN_TOKEN;
  if (!token) {
    throw new ConfigurationError([
      "server.token: missing (set it in the session file or SHUTTLERUN_TOKEN)",
    ]);
  }
  return token;
}

export function exitCodeFor(reason: TerminationReason | null): number {
  switch (reason) {
    case "Completed":
    case "Interrupted":
      return 0;
    case "CircuitTripped":
      return 3;
    case null:
      return 1;
  }
}
