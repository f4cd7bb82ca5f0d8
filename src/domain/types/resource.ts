import type { KubernetesObject } from '@kubernetes/client-node';
import { ValidationError } from '../../errors';

/**
 * A resource to apply or delete. Namespace is '' when the manifest sets none.
 */
export interface ResourceObject {
  readonly kind: string;
  readonly name: string;
  readonly namespace: string;
  readonly body: unknown;
}

/**
 * Build a ResourceObject from a Kubernetes manifest
 */
export function fromManifest(manifest: KubernetesObject): ResourceObject {
  const kind = manifest.kind;
  const name = manifest.metadata?.name;

  if (!kind) {
    throw new ValidationError('manifest is missing kind', 'kind');
  }
  if (!name) {
    throw new ValidationError(`${kind} manifest is missing metadata.name`, 'metadata.name');
  }

  return Object.freeze({
    kind,
    name,
    namespace: manifest.metadata?.namespace ?? '',
    body: manifest,
  });
}

/**
 * kind/name as kubectl prints it
 */
export function describeObject(object: Pick<ResourceObject, 'kind' | 'name'>): string {
  return `${object.kind}/${object.name}`;
}
