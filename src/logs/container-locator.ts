/**
 * Finds the container to stream logs from
 */

import { ClusterClient, ContainerSummary, PodSummary } from '../types';
import { ImageNotFoundError, wrapError } from '../errors';
import { logger } from '../logger';

/**
 * A container selected for streaming, with the pod it runs in
 */
export interface ContainerMatch {
  pod: PodSummary;
  container: ContainerSummary;
}

/**
 * Returns the first container whose image equals `image`, scanning pods in
 * list order and containers in spec order.
 *
 * List order comes from the API server and is not guaranteed to be stable, so
 * with several matching containers the choice may differ between calls.
 */
export function findContainerForImage(
  pods: PodSummary[],
  image: string
): ContainerMatch | undefined {
  for (const pod of pods) {
    for (const container of pod.containers) {
      logger.debug(`Found container ${container.name} with image ${container.image}`);
      if (container.image === image) {
        return { pod, container };
      }
    }
  }
  return undefined;
}

/**
 * Lists every pod in the cluster and selects the first container running `image`
 *
 * @throws Error wrapped with "getting pods" when the pod listing fails
 * @throws ImageNotFoundError when no container matches
 */
export async function locateContainer(
  client: ClusterClient,
  image: string
): Promise<ContainerMatch> {
  let pods: PodSummary[];
  try {
    pods = await client.listPods();
  } catch (error) {
    throw wrapError('getting pods', error);
  }

  logger.info(`Looking for logs to stream for ${image}`);
  const match = findContainerForImage(pods, image);
  if (!match) {
    throw new ImageNotFoundError(image);
  }
  return match;
}
