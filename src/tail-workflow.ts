import { ClusterClient, PodReadinessWaiter, TailConfig } from './types';
import { LogAggregator } from './logs';

export interface TailDependencies {
  createClusterClient: (config: TailConfig) => ClusterClient;
  waitForPodReady: PodReadinessWaiter;
}

export interface TailLogger {
  info: (message: string, ...args: unknown[]) => void;
  debug: (message: string, ...args: unknown[]) => void;
}

export interface TailOptions {
  logger: TailLogger;
  output: NodeJS.WritableStream;
  signal?: AbortSignal;
  /** Receives the aggregator before streaming starts, e.g. to wire mute controls */
  onAggregatorCreated?: (aggregator: LogAggregator) => void;
}

/**
 * Runs one `podtail` invocation. Kept free of process-level concerns so it can
 * be unit tested with mocked dependencies.
 */
export async function runTailWorkflow(
  config: TailConfig,
  dependencies: TailDependencies,
  options: TailOptions
): Promise<void> {
  const { logger, output, signal, onAggregatorCreated } = options;

  const client = dependencies.createClusterClient(config);
  const aggregator = new LogAggregator({
    output,
    retryLimit: config.retryLimit,
    retryDelayMs: config.retryDelayMs,
    waitForPodReady: dependencies.waitForPodReady,
  });

  if (config.muted) {
    aggregator.mute();
    logger.info('Output starts muted');
  }
  onAggregatorCreated?.(aggregator);

  logger.debug(`Streaming logs for image ${config.image} (up to ${config.retryLimit} attempts)`);
  await aggregator.streamLogs(client, config.image, { signal });
}
