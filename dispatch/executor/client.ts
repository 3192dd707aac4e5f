import type { Outcome, Task } from "../model/types.js";

export interface SubmitOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

/**
 * Submits one task to the dispatch API and classifies the response.
 * Implementations may also throw on transport faults; the retry controller
 * treats any thrown error as a transport failure.
 */
export interface DispatchClient {
  submit(task: Task, options: SubmitOptions): Promise<Outcome>;
}

/** Supplies the bearer credential. Refreshing it is the provider's concern. */
export interface TokenProvider {
  getToken(): string | Promise<string>;
}

export function staticToken(token: string): TokenProvider {
  return { getToken: () => token };
}
