import { setTimeout as delay } from "node:timers/promises";

export function backoffDelay(attempt: number, baseMs: number, maxMs: number): number {
  return Math.min(maxMs, baseMs * 2 ** attempt);
}

/** Resolves true after `ms`, or false as soon as the signal aborts. */
export async function cancellableSleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return false;
  try {
    await delay(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (err instanceof Error && err.name === "AbortError") return false;
    throw err;
  }
}
