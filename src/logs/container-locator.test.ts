/**
 * Tests for container-locator module
 */

import { findContainerForImage, locateContainer } from './container-locator';
import { ImageNotFoundError } from '../errors';
import { ClusterClient, LogStreamRequest, PodSummary } from '../types';
import { Readable } from 'stream';

jest.mock('../logger', () => ({
  logger: {
    trace: jest.fn(),
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

const pods: PodSummary[] = [
  {
    namespace: 'kube-system',
    name: 'coredns-5d78c',
    phase: 'Running',
    containers: [{ name: 'coredns', image: 'registry.k8s.io/coredns:v1.10.1' }],
  },
  {
    namespace: 'prod',
    name: 'api-1',
    phase: 'Running',
    containers: [
      { name: 'proxy', image: 'envoyproxy/envoy:v1.28' },
      { name: 'api', image: 'registry.local/api:1.4.2' },
    ],
  },
  {
    namespace: 'staging',
    name: 'api-2',
    phase: 'Running',
    containers: [{ name: 'api', image: 'registry.local/api:1.4.2' }],
  },
];

function createClient(listPods: () => Promise<PodSummary[]>): ClusterClient {
  return {
    listPods: jest.fn(listPods),
    readPod: jest.fn<Promise<PodSummary>, [string, string]>(),
    openLogStream: jest.fn<Promise<Readable>, [LogStreamRequest]>(),
  };
}

describe('container-locator', () => {
  describe('findContainerForImage', () => {
    it('should return the first match in pod and container order', () => {
      const match = findContainerForImage(pods, 'registry.local/api:1.4.2');

      expect(match?.pod.name).toBe('api-1');
      expect(match?.pod.namespace).toBe('prod');
      expect(match?.container.name).toBe('api');
    });

    it('should match sidecar images in the same way', () => {
      const match = findContainerForImage(pods, 'envoyproxy/envoy:v1.28');

      expect(match?.pod.name).toBe('api-1');
      expect(match?.container.name).toBe('proxy');
    });

    it('should require an exact image match', () => {
      expect(findContainerForImage(pods, 'registry.local/api')).toBeUndefined();
      expect(findContainerForImage(pods, 'registry.local/api:1.4')).toBeUndefined();
    });

    it('should return undefined for an empty pod list', () => {
      expect(findContainerForImage([], 'registry.local/api:1.4.2')).toBeUndefined();
    });

    it('should skip pods without containers', () => {
      const match = findContainerForImage(
        [{ namespace: 'prod', name: 'empty', containers: [] }, ...pods],
        'registry.k8s.io/coredns:v1.10.1'
      );
      expect(match?.pod.name).toBe('coredns-5d78c');
    });
  });

  describe('locateContainer', () => {
    it('should list pods and return the match', async () => {
      const client = createClient(async () => pods);

      const match = await locateContainer(client, 'registry.local/api:1.4.2');

      expect(client.listPods).toHaveBeenCalledTimes(1);
      expect(match.pod.name).toBe('api-1');
      expect(match.container.name).toBe('api');
    });

    it('should wrap pod listing failures', async () => {
      const client = createClient(async () => {
        throw new Error('pods is forbidden');
      });

      await expect(locateContainer(client, 'registry.local/api:1.4.2')).rejects.toThrow(
        'getting pods: pods is forbidden'
      );
    });

    it('should raise ImageNotFoundError when nothing matches', async () => {
      const client = createClient(async () => pods);

      const result = locateContainer(client, 'registry.local/worker:2.0.0');

      await expect(result).rejects.toBeInstanceOf(ImageNotFoundError);
      await expect(result).rejects.toThrow('image registry.local/worker:2.0.0 not found');
    });
  });
});
