import { AxiosError } from "axios";
import { DispatchAttemptTimeoutError } from "../../errors.js";
import type { Outcome, TransportFailureOutcome } from "../../model/types.js";

export const DEFAULT_ERROR_INFO = "no error detail";

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toCode(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value)) return value;
  if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
    return Number.parseInt(value.trim(), 10);
  }
  return null;
}

function nonBlank(value: unknown): string | null {
  return typeof value === "string" && value.trim().length > 0 ? value.trim() : null;
}

/**
 * Pull the business code and info out of a dispatch response body.
 * The nested `msg.detail` shape wins; top-level fields are the fallback.
 */
export function extractBusinessDetail(body: JsonObject): {
  code: number | null;
  info: string;
} {
  const msg = body.msg;
  const detail = isObject(msg) && isObject(msg.detail) ? msg.detail : null;

  const code = toCode(detail?.error_id) ?? toCode(body.error_id);
  const info =
    nonBlank(detail?.info) ??
    nonBlank(msg) ??
    nonBlank(body.info) ??
    DEFAULT_ERROR_INFO;

  return { code, info };
}

/**
 * Classify a 2xx response body. Success iff the body says `success: true`
 * or carries one of the configured success codes.
 */
export function classifyResponse(
  body: unknown,
  successCodes: ReadonlySet<number>,
): Outcome {
  if (!isObject(body)) {
    return { kind: "TransportFailure", reason: "malformed-response" };
  }

  const { code, info } = extractBusinessDetail(body);
  if (body.success === true || (code !== null && successCodes.has(code))) {
    return { kind: "Success", code };
  }
  return { kind: "BusinessFailure", code, info };
}

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT", "ETIME"]);

/** Map a thrown error to a transport failure. */
export function classifyTransportError(error: unknown): TransportFailureOutcome {
  if (error instanceof DispatchAttemptTimeoutError) {
    return { kind: "TransportFailure", reason: "timeout" };
  }

  if (error instanceof AxiosError) {
    const status = error.response?.status;
    if (status === 401 || status === 403) {
      return { kind: "TransportFailure", reason: "auth-rejected", status };
    }
    if (status !== undefined) {
      return { kind: "TransportFailure", reason: `http-${status}`, status };
    }
    if (error.code !== undefined && TIMEOUT_CODES.has(error.code)) {
      return { kind: "TransportFailure", reason: "timeout" };
    }
    if (error.code === AxiosError.ERR_CANCELED) {
      return { kind: "TransportFailure", reason: "canceled" };
    }
    return {
      kind: "TransportFailure",
      reason: `network: ${error.code ?? error.message}`,
    };
  }

  if (error instanceof Error) {
    return { kind: "TransportFailure", reason: `error: ${error.message}` };
  }
  return { kind: "TransportFailure", reason: `error: ${String(error)}` };
}
