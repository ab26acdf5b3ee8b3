#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import type { KubeConfig } from '@kubernetes/client-node';
import { TailConfig, LogLevel } from './types';
import { logger, isLogLevel } from './logger';
import { runTailWorkflow } from './tail-workflow';
import { DEFAULT_READY_TIMEOUT_MS } from './kube/pod-readiness';
import {
  KubernetesClusterClient,
  loadKubeConfig,
  waitForPodReady,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_RETRY_LIMIT,
} from './logs';

/**
 * Parses an option value that must be an integer of at least 1
 * @throws InvalidArgumentError for anything else
 */
export function parsePositiveInt(value: string): number {
  const parsed = parseIntStrict(value);
  if (parsed === undefined || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Parses an option value that must be an integer of at least 0
 * @throws InvalidArgumentError for anything else
 */
export function parseNonNegativeInt(value: string): number {
  const parsed = parseIntStrict(value);
  if (parsed === undefined || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError('Must be one of: trace, debug, info, warn, error.');
  }
  return value;
}

// parseInt accepts "12abc"; only plain digit strings are valid here
function parseIntStrict(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    return undefined;
  }
  return Number(trimmed);
}

/**
 * Stops the run when the output sink fails (e.g. EPIPE once a downstream
 * `head` exits) instead of letting the 'error' event crash the process
 */
export function abortOnOutputError(output: NodeJS.WritableStream, controller: AbortController): void {
  output.on('error', (error: Error) => {
    if (!controller.signal.aborted) {
      logger.error(`Cannot write log output, stopping: ${error.message}`);
      controller.abort();
    }
  });
}

export interface CliOptions {
  kubeconfig?: string;
  context?: string;
  retries: number;
  retryDelay: number;
  readyTimeout: number;
  logLevel: LogLevel;
  muted: boolean;
}

/**
 * Maps parsed CLI flags onto the run configuration
 */
export function buildTailConfig(image: string, options: CliOptions): TailConfig {
  const trimmedImage = image.trim();
  if (trimmedImage.length === 0) {
    throw new Error('Image reference must not be empty');
  }

  return {
    image: trimmedImage,
    kubeconfig: options.kubeconfig,
    context: options.context,
    retryLimit: options.retries,
    retryDelayMs: options.retryDelay,
    readyTimeoutMs: options.readyTimeout,
    logLevel: options.logLevel,
    muted: options.muted,
  };
}

const program = new Command();

program
  .name('podtail')
  .description('Follow the logs of the container running an image anywhere in a Kubernetes cluster')
  .version('0.1.0')
  .argument('<image>', 'Container image reference to match exactly (e.g., registry.local/api:1.4.2)')
  .option('--kubeconfig <path>', 'Path to the kubeconfig file (defaults to KUBECONFIG or ~/.kube/config)')
  .option('--context <name>', 'Kubeconfig context to use')
  .option(
    '--retries <count>',
    'Maximum number of attempts to find and stream the container',
    parsePositiveInt,
    DEFAULT_RETRY_LIMIT
  )
  .option(
    '--retry-delay <ms>',
    'Milliseconds to wait between attempts',
    parseNonNegativeInt,
    DEFAULT_RETRY_DELAY_MS
  )
  .option(
    '--ready-timeout <ms>',
    'Milliseconds to wait for the pod to start running',
    parseNonNegativeInt,
    DEFAULT_READY_TIMEOUT_MS
  )
  .option(
    '--log-level <level>',
    'Log level: trace, debug, info, warn, error',
    parseLogLevel,
    'info'
  )
  .option(
    '--muted',
    'Start with output muted (send SIGUSR2 to unmute, SIGUSR1 to mute again)',
    false
  )
  .action(async (image: string, options: CliOptions) => {
    logger.setLevel(options.logLevel);

    let config: TailConfig;
    try {
      config = buildTailConfig(image, options);
    } catch (error) {
      logger.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
    logger.debug('Configuration:', JSON.stringify(config, null, 2));

    let kubeConfig: KubeConfig;
    try {
      kubeConfig = loadKubeConfig({ kubeconfig: config.kubeconfig, context: config.context });
    } catch (error) {
      logger.error(`Failed to load kubeconfig: ${error instanceof Error ? error.message : error}`);
      process.exit(1);
    }

    const controller = new AbortController();
    const stop = (signal: NodeJS.Signals, exitCode: number) => {
      logger.info(`Received ${signal}, stopping log stream...`);
      controller.abort();
      process.exitCode = exitCode;
    };
    process.once('SIGINT', () => stop('SIGINT', 130));
    process.once('SIGTERM', () => stop('SIGTERM', 143));
    abortOnOutputError(process.stdout, controller);

    try {
      await runTailWorkflow(
        config,
        {
          createClusterClient: () => KubernetesClusterClient.fromKubeConfig(kubeConfig),
          waitForPodReady: (client, namespace, name, signal) =>
            waitForPodReady(client, namespace, name, { timeoutMs: config.readyTimeoutMs, signal }),
        },
        {
          logger,
          output: process.stdout,
          signal: controller.signal,
          onAggregatorCreated: aggregator => {
            process.on('SIGUSR1', () => {
              aggregator.mute();
              logger.info('Log output muted');
            });
            process.on('SIGUSR2', () => {
              aggregator.unmute();
              logger.info('Log output unmuted');
            });
          },
        }
      );
    } catch (error) {
      logger.error('Fatal error:', error);
      process.exit(1);
    }

    // An aborted log request can leave its socket open
    process.exit(process.exitCode ?? 0);
  });

// Only parse arguments if this file is run directly (not imported as a module)
if (require.main === module) {
  program.parseAsync().catch(error => {
    logger.error('Fatal error:', error);
    process.exit(1);
  });
}
