/**
 * Manifest file loading
 */

import { readFile } from 'node:fs/promises';
import * as yaml from 'js-yaml';
import type { KubernetesObject } from '@kubernetes/client-node';
import { fromManifest, type ResourceObject } from '../domain/types';
import { ValidationError } from '../errors';

function isKubernetesObject(value: unknown): value is KubernetesObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse YAML/JSON manifest content. `kind: List` documents are flattened.
 */
export function parseManifests(content: string, source = '<inline>'): ResourceObject[] {
  let documents: unknown[];
  try {
    documents = yaml.loadAll(content);
  } catch (error) {
    throw new ValidationError(
      `parsing manifests from ${source}: ${error instanceof Error ? error.message : String(error)}`,
      'manifests',
    );
  }

  const objects: ResourceObject[] = [];
  for (const document of documents) {
    if (document === null || document === undefined) {
      continue;
    }
    if (!isKubernetesObject(document)) {
      throw new ValidationError(`${source}: manifest documents must be objects`, 'manifests');
    }

    const items: unknown = 'items' in document ? document.items : undefined;
    if (document.kind === 'List' && Array.isArray(items)) {
      for (const item of items) {
        if (!isKubernetesObject(item)) {
          throw new ValidationError(`${source}: List items must be objects`, 'manifests');
        }
        objects.push(fromManifest(item));
      }
      continue;
    }

    objects.push(fromManifest(document));
  }

  return objects;
}

/**
 * Load manifests from files, keeping file order then document order
 */
export async function loadManifestFiles(paths: readonly string[]): Promise<ResourceObject[]> {
  const objects: ResourceObject[] = [];
  for (const path of paths) {
    const content = await readFile(path, 'utf8');
    objects.push(...parseManifests(content, path));
  }
  return objects;
}
