import { setTimeout as sleep } from 'timers/promises';

/**
 * Waits for `ms` milliseconds. Rejects with an AbortError if `signal` aborts first.
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  await sleep(ms, undefined, { signal });
}
