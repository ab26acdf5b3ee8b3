/**
 * ClusterClient backed by @kubernetes/client-node
 */

import * as k8s from '@kubernetes/client-node';
import { PassThrough, Readable } from 'stream';
import { ClusterClient, LogStreamRequest, PodSummary } from '../types';
import { logger } from '../logger';

/** Subset of CoreV1Api used here */
export type CoreApi = Pick<k8s.CoreV1Api, 'listPodForAllNamespaces' | 'readNamespacedPodStatus'>;

/** Subset of the streaming log API used here */
export type LogApi = Pick<k8s.Log, 'log'>;

export interface KubeConfigOptions {
  /** Path to a kubeconfig file; default loading rules apply when unset */
  kubeconfig?: string;
  /** Context to use instead of the file's current context */
  context?: string;
}

/**
 * Loads a kubeconfig from an explicit file or from the default locations
 * (KUBECONFIG, ~/.kube/config, in-cluster service account)
 */
export function loadKubeConfig(options: KubeConfigOptions = {}): k8s.KubeConfig {
  const kubeConfig = new k8s.KubeConfig();
  if (options.kubeconfig) {
    kubeConfig.loadFromFile(options.kubeconfig);
  } else {
    kubeConfig.loadFromDefault();
  }

  if (options.context) {
    if (!kubeConfig.getContextObject(options.context)) {
      throw new Error(`Context ${options.context} not found in kubeconfig`);
    }
    kubeConfig.setCurrentContext(options.context);
  }

  logger.debug(`Using kubeconfig context: ${kubeConfig.getCurrentContext()}`);
  return kubeConfig;
}

/**
 * Converts an API pod object into the snapshot used by the locator
 */
export function toPodSummary(pod: k8s.V1Pod): PodSummary | undefined {
  const name = pod.metadata?.name;
  if (!name) {
    return undefined;
  }

  return {
    namespace: pod.metadata?.namespace ?? 'default',
    name,
    phase: pod.status?.phase,
    containers: (pod.spec?.containers ?? []).map(container => ({
      name: container.name,
      image: container.image ?? '',
    })),
  };
}

export class KubernetesClusterClient implements ClusterClient {
  constructor(
    private readonly core: CoreApi,
    private readonly logApi: LogApi
  ) {}

  static fromKubeConfig(kubeConfig: k8s.KubeConfig): KubernetesClusterClient {
    return new KubernetesClusterClient(
      kubeConfig.makeApiClient(k8s.CoreV1Api),
      new k8s.Log(kubeConfig)
    );
  }

  async listPods(): Promise<PodSummary[]> {
    const { body } = await this.core.listPodForAllNamespaces();
    const pods: PodSummary[] = [];
    for (const item of body.items) {
      const pod = toPodSummary(item);
      if (pod) {
        pods.push(pod);
      }
    }
    return pods;
  }

  async readPod(namespace: string, name: string): Promise<PodSummary> {
    const { body } = await this.core.readNamespacedPodStatus(name, namespace);
    const pod = toPodSummary(body);
    if (!pod) {
      throw new Error(`Pod ${namespace}/${name} returned without metadata`);
    }
    return pod;
  }

  /**
   * Starts a log request whose body is piped into the returned stream.
   * Destroying the stream aborts the underlying HTTP request. A transport
   * error after the response has started destroys the stream with that error.
   */
  async openLogStream(request: LogStreamRequest): Promise<Readable> {
    const stream = new PassThrough();
    // LogOptions in this client release does not declare sinceTime; the
    // options object is spread into the query string as-is
    const options: k8s.LogOptions & { sinceTime: string } = {
      follow: request.follow,
      sinceTime: request.sinceTime.toISOString(),
    };

    let opened = false;
    const done = (err: unknown) => {
      if (!err) {
        if (!stream.writableEnded) {
          stream.end();
        }
        return;
      }
      if (!opened) {
        // The rejected log() call reports this failure
        stream.destroy();
        return;
      }
      stream.destroy(err instanceof Error ? err : new Error(String(err)));
    };

    const handle = await this.logApi.log(
      request.namespace,
      request.podName,
      request.containerName,
      stream,
      done,
      options
    );
    opened = true;

    stream.once('close', () => {
      handle.abort();
    });
    return stream;
  }
}
