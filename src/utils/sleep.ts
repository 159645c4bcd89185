import { setTimeout } from "node:timers/promises";

/**
 * Wait for the given number of milliseconds
 * Resolves early once the signal fires; callers check the signal afterwards.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return;
  try {
    await setTimeout(ms, undefined, { signal });
  } catch (error) {
    if (!signal?.aborted) throw error;
  }
}

/**
 * Exponential backoff: base, 2x base, 4x base...
 * A server-provided delay wins when it is longer.
 */
export function backoffDelay(
  base: number,
  attempt: number,
  serverDelay?: number,
): number {
  const delay = Math.pow(2, attempt) * base;
  return serverDelay !== undefined ? Math.max(delay, serverDelay) : delay;
}
