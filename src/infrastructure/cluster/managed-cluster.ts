/**
 * Read-only lookup of the managed cluster resource itself
 */

import { ContainerServiceClient, type ManagedCluster } from '@azure/arm-containerservice';
import type { TokenCredential } from '@azure/identity';
import type { Logger } from 'pino';
import type { ClusterHandle } from '../../domain/types';
import { classifyRequestError } from '../run-command/aks-channel';

export interface ManagedClusterClient {
  managedClusters: {
    get(
      resourceGroupName: string,
      resourceName: string,
      options?: { abortSignal?: AbortSignal },
    ): Promise<ManagedCluster>;
  };
}

export interface ManagedClusterReaderOptions {
  credential: TokenCredential;
  logger: Logger;
  createClient?: (subscriptionId: string) => ManagedClusterClient;
}

export class ManagedClusterReader {
  private readonly logger: Logger;
  private readonly createClient: (subscriptionId: string) => ManagedClusterClient;

  constructor(options: ManagedClusterReaderOptions) {
    this.logger = options.logger.child({ component: 'ManagedClusterReader' });
    const credential = options.credential;
    this.createClient =
      options.createClient ?? ((subscriptionId) => new ContainerServiceClient(credential, subscriptionId));
  }

  async get(cluster: ClusterHandle, signal?: AbortSignal): Promise<ManagedCluster> {
    const logger = this.logger.child({ name: cluster.name, resourceGroup: cluster.resourceGroup });
    logger.info('starting to get aks');

    try {
      const managedCluster = await this.createClient(cluster.subscriptionId).managedClusters.get(
        cluster.resourceGroup,
        cluster.name,
        { abortSignal: signal },
      );
      logger.info({ provisioningState: managedCluster.provisioningState }, 'finished getting aks');
      return managedCluster;
    } catch (error) {
      throw classifyRequestError(error, signal);
    }
  }
}
