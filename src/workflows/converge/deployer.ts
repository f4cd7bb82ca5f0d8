/**
 * Cluster Deployer
 *
 * deploy: Packaging → Submitting → AwaitingCompletion → CheckingStability → Done
 * clean:  Packaging → Submitting → AwaitingCompletion → Done
 *
 * Any failing step moves to Failed and rejects with a StepError naming it.
 * Nothing is retried here.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { AppConfig } from '../../config';
import type { ClusterHandle, ResourceObject } from '../../domain/types';
import { StepError, toError, type DeployStep } from '../../errors';
import { createTimer } from '../../lib/logger';
import { encodeArchive, packageManifests } from '../../lib/manifest-archive';
import { FileOutputSink, type OutputSink } from '../../infrastructure/output-sink';
import {
  CommandDispatcher,
  CommandRunner,
  OperationPoller,
  type CommandChannel,
  type PollerOptions,
} from '../../infrastructure/run-command';
import { waitStable } from './coordinator';
import { defaultJobBounds, StabilityRegistry, type JobBounds } from './stability';

export type DeployPhase = DeployStep | 'Done' | 'Failed';

export interface ConvergeOptions {
  signal?: AbortSignal;
  onPhaseChange?: (phase: DeployPhase) => void;
}

export interface ClusterDeployerOptions {
  channel: CommandChannel;
  logger: Logger;
  /** Where job logs go; ignored when `sink` is given */
  outputDir?: string;
  sink?: OutputSink;
  polling?: PollerOptions;
  jobBounds?: JobBounds;
  registry?: StabilityRegistry;
}

type Action = 'apply' | 'delete';

export class ClusterDeployer {
  private readonly logger: Logger;
  private readonly runner: CommandRunner;
  private readonly registry: StabilityRegistry;
  private readonly jobBounds: JobBounds;

  constructor(options: ClusterDeployerOptions) {
    this.logger = options.logger;
    const sink = options.sink ?? new FileOutputSink(options.outputDir ?? process.cwd(), options.logger);
    this.runner = new CommandRunner({
      dispatcher: new CommandDispatcher(options.channel, options.logger),
      poller: new OperationPoller(options.channel, options.logger, options.polling),
      sink,
      logger: options.logger,
    });
    this.registry = options.registry ?? StabilityRegistry.defaults();
    this.jobBounds = options.jobBounds ?? defaultJobBounds();
  }

  /**
   * Apply `objects` and wait until each one is stable
   */
  async deploy(
    cluster: ClusterHandle,
    objects: readonly ResourceObject[],
    options: ConvergeOptions = {},
  ): Promise<void> {
    await this.converge('apply', cluster, objects, options);
  }

  /**
   * Delete `objects`. Deletion has no stability phase.
   */
  async clean(
    cluster: ClusterHandle,
    objects: readonly ResourceObject[],
    options: ConvergeOptions = {},
  ): Promise<void> {
    await this.converge('delete', cluster, objects, options);
  }

  private async converge(
    action: Action,
    cluster: ClusterHandle,
    objects: readonly ResourceObject[],
    options: ConvergeOptions,
  ): Promise<void> {
    const correlationId = nanoid();
    const logger = this.logger.child({
      cluster: cluster.name,
      resourceGroup: cluster.resourceGroup,
      correlationId,
    });
    const operation = action === 'apply' ? 'deploy resources' : 'clean resources';
    const timer = createTimer(logger, operation, { objects: objects.length });
    const { signal } = options;

    const step = async <T>(phase: DeployStep, run: () => Promise<T>): Promise<T> => {
      options.onPhaseChange?.(phase);
      logger.debug({ phase }, 'entering phase');
      try {
        return await run();
      } catch (error) {
        const wrapped = new StepError(phase, toError(error), { action, correlationId });
        options.onPhaseChange?.('Failed');
        timer.error(wrapped, { phase });
        throw wrapped;
      }
    };

    const archive = await step('Packaging', () => packageManifests(objects));
    const handle = await step('Submitting', () =>
      this.runner.submit(
        cluster,
        { command: `kubectl ${action} -f manifests/`, context: encodeArchive(archive) },
        signal,
      ),
    );
    await step('AwaitingCompletion', () =>
      this.runner.complete(handle, signal !== undefined ? { signal } : {}),
    );

    if (action === 'apply') {
      await step('CheckingStability', () =>
        waitStable(objects, {
          cluster,
          runner: this.runner,
          registry: this.registry,
          jobBounds: this.jobBounds,
          logger,
          ...(signal !== undefined && { signal }),
        }),
      );
    }

    options.onPhaseChange?.('Done');
    timer.end();
  }
}

/**
 * Deployer wired from application configuration
 */
export function createDeployer(
  config: AppConfig,
  channel: CommandChannel,
  logger: Logger,
): ClusterDeployer {
  return new ClusterDeployer({
    channel,
    logger,
    outputDir: config.outputDir,
    polling: { intervalMs: config.polling.intervalMs, maxIntervalMs: config.polling.maxIntervalMs },
    jobBounds: config.job,
  });
}
