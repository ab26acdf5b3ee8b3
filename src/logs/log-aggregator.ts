/**
 * Log aggregation: follows the logs of the container running a given image
 */

import type { Readable } from 'stream';
import { Muter } from '../muter';
import { ClusterClient, DelayFn, LogStreamRequest, PodReadinessWaiter } from '../types';
import { delay as defaultDelay } from '../delay';
import { wrapError } from '../errors';
import { waitForPodReady } from '../kube/pod-readiness';
import { locateContainer } from './container-locator';
import { forwardLogStream, formatHeader } from './stream-reader';
import { logger } from '../logger';

export const DEFAULT_RETRY_LIMIT = 5;
export const DEFAULT_RETRY_DELAY_MS = 1000;

/**
 * Options for creating a LogAggregator
 */
export interface LogAggregatorOptions {
  /** Sink for forwarded lines, owned by the caller */
  output: NodeJS.WritableStream;
  /** Maximum number of locate-and-stream attempts per `streamLogs` call */
  retryLimit?: number;
  /** Pause between attempts */
  retryDelayMs?: number;
  /** Readiness check run before attaching to a pod */
  waitForPodReady?: PodReadinessWaiter;
  delay?: DelayFn;
}

export interface StreamLogsOptions {
  /** Stops the current attempt and prevents further ones */
  signal?: AbortSignal;
}

const defaultReadinessWaiter: PodReadinessWaiter = (client, namespace, name, signal) =>
  waitForPodReady(client, namespace, name, { signal });

/**
 * Streams the logs of one image to one output, retrying on failure.
 *
 * Mute state belongs to the aggregator and survives retries: lines arriving
 * while muted are dropped, never replayed.
 */
export class LogAggregator extends Muter {
  /** Lower bound for every log request, so history from before the watch is skipped */
  readonly creationTime: Date;
  readonly retryLimit: number;
  readonly retryDelayMs: number;

  private readonly output: NodeJS.WritableStream;
  private readonly waitForPodReady: PodReadinessWaiter;
  private readonly delay: DelayFn;

  constructor(options: LogAggregatorOptions) {
    super();
    const {
      output,
      retryLimit = DEFAULT_RETRY_LIMIT,
      retryDelayMs = DEFAULT_RETRY_DELAY_MS,
      waitForPodReady = defaultReadinessWaiter,
      delay = defaultDelay,
    } = options;

    if (!Number.isInteger(retryLimit) || retryLimit < 1) {
      throw new Error(`retryLimit must be a positive integer, got ${retryLimit}`);
    }
    if (!Number.isFinite(retryDelayMs) || retryDelayMs < 0) {
      throw new Error(`retryDelayMs must be a non-negative number, got ${retryDelayMs}`);
    }

    this.creationTime = new Date();
    this.output = output;
    this.retryLimit = retryLimit;
    this.retryDelayMs = retryDelayMs;
    this.waitForPodReady = waitForPodReady;
    this.delay = delay;
  }

  /**
   * Finds the first container running `image` and forwards its logs until the
   * stream closes. Failures are logged and retried up to `retryLimit` times;
   * this method never rejects.
   */
  async streamLogs(
    client: ClusterClient,
    image: string,
    options: StreamLogsOptions = {}
  ): Promise<void> {
    const { signal } = options;

    for (let attempt = 1; attempt <= this.retryLimit; attempt++) {
      if (signal?.aborted) {
        logger.debug(`Log streaming for ${image} cancelled`);
        return;
      }

      try {
        await this.streamOnce(client, image, signal);
        return;
      } catch (error) {
        if (signal?.aborted) {
          logger.debug(`Log streaming for ${image} cancelled`);
          return;
        }
        logger.info(
          `Error getting logs (attempt ${attempt}/${this.retryLimit}): ${error instanceof Error ? error.message : error}`
        );
      }

      if (attempt < this.retryLimit) {
        try {
          await this.delay(this.retryDelayMs, signal);
        } catch (error) {
          if (signal?.aborted) {
            logger.debug(`Log streaming for ${image} cancelled during retry delay`);
            return;
          }
          logger.warn(`Retry delay failed: ${error instanceof Error ? error.message : error}`);
        }
      }
    }

    logger.warn(`Giving up streaming logs for ${image} after ${this.retryLimit} attempts`);
  }

  /**
   * One locate, wait, attach and forward sequence
   */
  private async streamOnce(
    client: ClusterClient,
    image: string,
    signal: AbortSignal | undefined
  ): Promise<void> {
    const { pod, container } = await locateContainer(client, image);
    logger.info(`Trying to stream logs from pod: ${pod.name} container: ${container.name}`);

    try {
      await this.waitForPodReady(client, pod.namespace, pod.name, signal);
    } catch (error) {
      throw wrapError('waiting for pod ready', error);
    }

    const request: LogStreamRequest = {
      namespace: pod.namespace,
      podName: pod.name,
      containerName: container.name,
      follow: true,
      sinceTime: this.creationTime,
    };

    let stream: Readable;
    try {
      stream = await client.openLogStream(request);
    } catch (error) {
      throw wrapError('setting up container log stream', error);
    }

    try {
      await forwardLogStream(formatHeader(pod.name, container.name), stream, {
        output: this.output,
        muter: this,
        signal,
      });
    } catch (error) {
      throw wrapError('streaming request', error);
    } finally {
      stream.destroy();
    }
  }
}
