/**
 * Shared types for podtail
 */

import type { Readable } from 'stream';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Configuration for a `podtail` run, built from CLI flags
 */
export interface TailConfig {
  /** Image reference the container must run, compared exactly */
  image: string;
  /** Path to a kubeconfig file (default loading rules when unset) */
  kubeconfig?: string;
  /** Kubeconfig context to switch to */
  context?: string;
  retryLimit: number;
  retryDelayMs: number;
  readyTimeoutMs: number;
  logLevel: LogLevel;
  /** Start with output muted */
  muted: boolean;
}

export interface ContainerSummary {
  name: string;
  image: string;
}

/**
 * Point-in-time snapshot of a pod, re-fetched on every attempt
 */
export interface PodSummary {
  namespace: string;
  name: string;
  /** Pod phase as reported by the cluster (Pending, Running, ...) */
  phase?: string;
  containers: ContainerSummary[];
}

/**
 * Parameters of a following log request for one container
 */
export interface LogStreamRequest {
  namespace: string;
  podName: string;
  containerName: string;
  follow: boolean;
  /** Only lines written at or after this instant are returned */
  sinceTime: Date;
}

/**
 * The cluster capabilities the aggregator needs
 */
export interface ClusterClient {
  /** Lists pods across all namespaces */
  listPods(): Promise<PodSummary[]>;
  readPod(namespace: string, name: string): Promise<PodSummary>;
  /** Opens the byte stream for a log request; destroying it releases the connection */
  openLogStream(request: LogStreamRequest): Promise<Readable>;
}

/**
 * Resolves once the pod is ready, rejects if it never becomes ready
 */
export type PodReadinessWaiter = (
  client: ClusterClient,
  namespace: string,
  name: string,
  signal?: AbortSignal
) => Promise<void>;

export type DelayFn = (ms: number, signal?: AbortSignal) => Promise<void>;
