/**
 * Container registry image builds
 *
 * Builds go through `az acr build`; the SDK route needs a source upload and a
 * run poll that the CLI already does.
 */

import type { Logger } from 'pino';
import { DEFAULT_TIMEOUTS } from '../../config/defaults';
import { CommandFailure, ValidationError, isApplicationError, toError } from '../../errors';
import { CommandExecutor, type CommandResult } from '../command-executor';

export interface RegistryHandle {
  readonly name: string;
  readonly subscriptionId: string;
  readonly resourceGroup: string;
  readonly id: string;
}

/**
 * What the builder needs from a process runner
 */
export type ProcessRunner = Pick<CommandExecutor, 'execute'>;

export interface ImageBuilder {
  buildAndPush(imageName: string, dockerfilePath: string, signal?: AbortSignal): Promise<void>;
}

const REGISTRY_ID_PATTERN =
  /^\/subscriptions\/([^/]+)\/resourceGroups\/([^/]+)\/providers\/Microsoft\.ContainerRegistry\/registries\/([^/]+)\/?$/i;

/**
 * Parse a container registry ARM resource id
 */
export function loadRegistry(resourceId: string): RegistryHandle {
  const trimmed = resourceId.trim();
  const match = REGISTRY_ID_PATTERN.exec(trimmed);
  if (!match) {
    throw new ValidationError(`not a container registry resource id: ${resourceId}`, 'id');
  }
  const [, subscriptionId = '', resourceGroup = '', name = ''] = match;
  return Object.freeze({ name, subscriptionId, resourceGroup, id: trimmed.replace(/\/$/, '') });
}

export class AcrImageBuilder implements ImageBuilder {
  private readonly logger: Logger;

  constructor(
    private readonly registry: RegistryHandle,
    logger: Logger,
    private readonly executor: ProcessRunner = new CommandExecutor(logger),
  ) {
    this.logger = logger.child({
      registry: registry.name,
      resourceGroup: registry.resourceGroup,
      subscriptionId: registry.subscriptionId,
    });
  }

  async buildAndPush(imageName: string, dockerfilePath: string, signal?: AbortSignal): Promise<void> {
    const logger = this.logger.child({ image: imageName });
    logger.info('starting to build and push image');

    const args = [
      'acr',
      'build',
      '--subscription',
      this.registry.subscriptionId,
      '--registry',
      this.registry.name,
      '--image',
      imageName,
      dockerfilePath,
    ];

    let result: CommandResult;
    try {
      result = await this.executor.execute('az', args, {
        timeout: DEFAULT_TIMEOUTS.acrBuild,
        ...(signal !== undefined && { signal }),
        onLine: (stream, line) => {
          if (stream === 'stderr') {
            logger.error(`building and pushing acr image: ${line}`);
          } else {
            logger.info(`building and pushing acr image: ${line}`);
          }
        },
      });
    } catch (error) {
      if (isApplicationError(error)) {
        throw error;
      }
      const err = toError(error);
      throw new Error(`starting build and push command: ${err.message}`, { cause: err });
    }

    if (result.exitCode !== 0) {
      throw new CommandFailure(result.exitCode, `az ${args.join(' ')}`, { timedOut: result.timedOut, truncated: result.truncated });
    }

    logger.info('finished building and pushing image');
  }
}
