import { ValidationError } from '../../errors';

/**
 * Identifies the managed cluster a deploy or clean targets.
 */
export interface ClusterHandle {
  readonly name: string;
  readonly subscriptionId: string;
  readonly resourceGroup: string;
  readonly id: string;
}

const CLUSTER_ID_PATTERN =
  /^\/subscriptions\/([^/]+)\/resourceGroups\/([^/]+)\/providers\/Microsoft\.ContainerService\/managedClusters\/([^/]+)\/?$/i;

export function createClusterHandle(fields: {
  name: string;
  subscriptionId: string;
  resourceGroup: string;
  id?: string;
}): ClusterHandle {
  for (const key of ['name', 'subscriptionId', 'resourceGroup'] as const) {
    if (fields[key].trim() === '') {
      throw new ValidationError(`cluster ${key} must not be empty`, key);
    }
  }

  return Object.freeze({
    name: fields.name,
    subscriptionId: fields.subscriptionId,
    resourceGroup: fields.resourceGroup,
    id:
      fields.id ??
      `/subscriptions/${fields.subscriptionId}/resourceGroups/${fields.resourceGroup}/providers/Microsoft.ContainerService/managedClusters/${fields.name}`,
  });
}

/**
 * Parse a managed cluster ARM resource id
 */
export function loadCluster(resourceId: string): ClusterHandle {
  const trimmed = resourceId.trim();
  const match = CLUSTER_ID_PATTERN.exec(trimmed);
  if (!match) {
    throw new ValidationError(`not a managed cluster resource id: ${resourceId}`, 'id');
  }
  const [, subscriptionId = '', resourceGroup = '', name = ''] = match;

  return createClusterHandle({
    name,
    subscriptionId,
    resourceGroup,
    id: trimmed.replace(/\/$/, ''),
  });
}
