export type Now = () => number;

/** Blocking wait used between retries of a single attempt. */
export type Sleep = (durationMs: number) => Promise<void>;

/** Wait that ends early, without error, once the signal aborts. */
export type Pause = (durationMs: number, signal: AbortSignal) => Promise<void>;

export function sleepWithTimer(durationMs: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, durationMs);
  });
}

export function pauseUnlessAborted(durationMs: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted || durationMs <= 0) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, durationMs);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
