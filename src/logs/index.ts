/**
 * Log streaming for containers located by image
 */

export { LogAggregator, LogAggregatorOptions, StreamLogsOptions, DEFAULT_RETRY_LIMIT, DEFAULT_RETRY_DELAY_MS } from './log-aggregator';
export { findContainerForImage, locateContainer, ContainerMatch } from './container-locator';
export { forwardLogStream, formatHeader, ForwardOptions } from './stream-reader';
export { Muter, MuteState } from '../muter';
export { waitForPodReady, WaitForPodReadyOptions } from '../kube/pod-readiness';
export { KubernetesClusterClient, loadKubeConfig, KubeConfigOptions } from '../kube/cluster-client';
export { ImageNotFoundError, OutputWriteError, wrapError } from '../errors';
export * from '../types';
