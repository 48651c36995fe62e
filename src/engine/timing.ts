import { setImmediate, setTimeout } from "node:timers/promises";

/**
 * Sleep for `ms`, waking early when `signal` aborts.
 * Resolves true if the full interval elapsed.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    await setTimeout(ms, undefined, { signal });
    return true;
  } catch (e) {
    if (signal?.aborted) return false;
    throw e;
  }
}

/** Let timers, I/O callbacks and signal handlers run before continuing. */
export async function yieldToEventLoop(): Promise<void> {
  await setImmediate();
}
