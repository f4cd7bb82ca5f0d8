/**
 * Concurrency Coordinator - one stability check per object, all at once
 */

import type { Logger } from 'pino';
import { describeObject, type ClusterHandle, type ResourceObject } from '../../domain/types';
import { StabilityError } from '../../errors';
import { createTimer } from '../../lib/logger';
import type { CommandRunner } from '../../infrastructure/run-command';
import { resolveNamespace, type JobBounds, type StabilityRegistry } from './stability';
import { TaskGroup } from './task-group';

export interface WaitStableOptions {
  cluster: ClusterHandle;
  runner: CommandRunner;
  registry: StabilityRegistry;
  jobBounds: JobBounds;
  logger: Logger;
  signal?: AbortSignal;
}

/**
 * Check every object concurrently. Rejects with a StabilityError for the
 * first object whose check failed, after every check has finished.
 */
export async function waitStable(
  objects: readonly ResourceObject[],
  options: WaitStableOptions,
): Promise<void> {
  const { cluster, runner, registry, jobBounds, signal } = options;
  const timer = createTimer(options.logger, 'wait for resources to be stable', {
    objects: objects.length,
  });

  const group = new TaskGroup<ResourceObject>();
  for (const object of objects) {
    group.go(object, async () => {
      const namespace = resolveNamespace(object.namespace);
      const logger = options.logger.child({ kind: object.kind, name: object.name, namespace });
      logger.info(`checking stability of ${describeObject(object)}`);

      const strategy = await registry.check(object, {
        cluster,
        runner,
        logger,
        jobBounds,
        ...(signal !== undefined && { signal }),
      });
      logger.debug({ strategy }, `${describeObject(object)} is stable`);
    });
  }

  const { first, discarded } = await group.wait();

  for (const failure of discarded) {
    options.logger.warn(
      {
        kind: failure.label.kind,
        name: failure.label.name,
        namespace: resolveNamespace(failure.label.namespace),
        error: failure.error.message,
      },
      'additional stability check failed',
    );
  }

  if (first) {
    const error = new StabilityError(
      first.label.kind,
      first.label.name,
      resolveNamespace(first.label.namespace),
      first.error,
      discarded.length,
    );
    options.logger.debug({ error: error.message, additionalFailures: discarded.length }, 'Stability check failed');
    throw error;
  }

  timer.end();
}
