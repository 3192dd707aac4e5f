/**
 * Raised when a session configuration is missing a required field or holds an
 * invalid value. Fatal: the session never starts.
 */
export class ConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(
      issues.length === 1
        ? `Invalid session configuration: ${issues[0]}`
        : `Invalid session configuration:\n  - ${issues.join("\n  - ")}`,
    );
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export class DispatchAttemptTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Dispatch attempt timed out after ${timeoutMs}ms`);
    this.name = "DispatchAttemptTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}
