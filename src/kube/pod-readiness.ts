/**
 * Waits for a pod to start running before its logs are requested
 */

import { ClusterClient, DelayFn } from '../types';
import { delay as defaultDelay } from '../delay';
import { logger } from '../logger';

export const DEFAULT_READY_POLL_INTERVAL_MS = 500;
export const DEFAULT_READY_TIMEOUT_MS = 10 * 60 * 1000;

const TERMINAL_PHASES = new Set(['Succeeded', 'Failed']);

export interface WaitForPodReadyOptions {
  /** Time between status checks */
  intervalMs?: number;
  /** Upper bound on the whole wait */
  timeoutMs?: number;
  signal?: AbortSignal;
  delay?: DelayFn;
}

/**
 * Polls the pod status until its phase is Running.
 *
 * The first check happens immediately. Pending and Unknown phases keep polling;
 * a pod that already Succeeded or Failed will never produce new output, so that
 * rejects right away.
 *
 * @throws Error when the pod is in a terminal phase or the timeout elapses
 */
export async function waitForPodReady(
  client: ClusterClient,
  namespace: string,
  name: string,
  options: WaitForPodReadyOptions = {}
): Promise<void> {
  const {
    intervalMs = DEFAULT_READY_POLL_INTERVAL_MS,
    timeoutMs = DEFAULT_READY_TIMEOUT_MS,
    signal,
    delay = defaultDelay,
  } = options;
  const deadline = Date.now() + timeoutMs;

  for (;;) {
    signal?.throwIfAborted();

    const pod = await client.readPod(namespace, name);
    if (pod.phase === 'Running') {
      logger.debug(`Pod ${namespace}/${name} is running`);
      return;
    }
    if (pod.phase && TERMINAL_PHASES.has(pod.phase)) {
      throw new Error(`pod ${name} already in terminal phase: ${pod.phase}`);
    }

    if (Date.now() + intervalMs > deadline) {
      throw new Error(`timed out waiting for pod ${namespace}/${name} to be ready`);
    }
    logger.trace(`Pod ${namespace}/${name} is ${pod.phase ?? 'in an unknown phase'}, polling again`);
    await delay(intervalMs, signal);
  }
}
