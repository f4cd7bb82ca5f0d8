/**
 * Stability classification and checks
 *
 * Each kind maps to one strategy; each strategy maps to a check that issues
 * kubectl commands through the run-command channel. Kinds without an entry
 * need no check.
 */

import type { Logger } from 'pino';
import { DEFAULT_JOB_BOUNDS, DEFAULT_NAMESPACE } from '../../config/defaults';
import { describeObject, type ClusterHandle, type ResourceObject } from '../../domain/types';
import { CheckError, toError } from '../../errors';
import type { CommandRunner } from '../../infrastructure/run-command';

export type StabilityStrategy = 'RolloutStatus' | 'ReadinessWait' | 'JobCompletion' | 'NoCheck';

/**
 * Object to check, namespace already resolved
 */
export interface CheckTarget {
  readonly kind: string;
  readonly name: string;
  readonly namespace: string;
}

export interface JobBounds {
  /** kubectl --pod-running-timeout for the log follow */
  readonly podRunningTimeout: string;
  /** kubectl --timeout for the wait on condition=complete */
  readonly completeTimeout: string;
}

/**
 * Shared, read-only context of one stability phase
 */
export interface CheckContext {
  readonly cluster: ClusterHandle;
  readonly runner: CommandRunner;
  readonly logger: Logger;
  readonly jobBounds: JobBounds;
  readonly signal?: AbortSignal;
}

export type StabilityCheck = (target: CheckTarget, context: CheckContext) => Promise<void>;

// https://kubernetes.io/docs/concepts/workloads/ - the kinds `kubectl rollout status` understands
const DEFAULT_KIND_STRATEGIES: ReadonlyMap<string, StabilityStrategy> = new Map<string, StabilityStrategy>([
  ['Deployment', 'RolloutStatus'],
  ['StatefulSet', 'RolloutStatus'],
  ['DaemonSet', 'RolloutStatus'],
  ['Pod', 'ReadinessWait'],
  ['Job', 'JobCompletion'],
]);

export function classify(kind: string): StabilityStrategy {
  return DEFAULT_KIND_STRATEGIES.get(kind) ?? 'NoCheck';
}

export function resolveNamespace(namespace: string): string {
  return namespace === '' ? DEFAULT_NAMESPACE : namespace;
}

export function jobLogFile(jobName: string): string {
  return `job-${jobName}.log`;
}

async function step(
  description: string,
  context: CheckContext,
  command: string,
  outputFile?: string,
): Promise<void> {
  context.logger.info(description);
  try {
    await context.runner.run(
      context.cluster,
      { command },
      { signal: context.signal, ...(outputFile !== undefined && { outputFile }) },
    );
  } catch (error) {
    throw new CheckError(description, toError(error));
  }
}

export const rolloutStatus: StabilityCheck = (target, context) =>
  step(
    'checking rollout status',
    context,
    `kubectl rollout status ${describeObject(target)} -n ${target.namespace}`,
  );

export const readinessWait: StabilityCheck = (target, context) =>
  step(
    'waiting for pod to be ready',
    context,
    `kubectl wait --for=condition=Ready pod/${target.name} -n ${target.namespace}`,
  );

/**
 * Follow the job's logs into job-<name>.log, then require condition=complete.
 * Logs are captured even when the follow fails; a failed follow ends the check.
 */
export const jobCompletion: StabilityCheck = async (target, context) => {
  const { podRunningTimeout, completeTimeout } = context.jobBounds;

  await step(
    'following job logs',
    context,
    `kubectl logs --pod-running-timeout=${podRunningTimeout} --follow job/${target.name} -n ${target.namespace}`,
    jobLogFile(target.name),
  );

  await step(
    'waiting for job complete',
    context,
    `kubectl wait --for=condition=complete --timeout=${completeTimeout} job/${target.name} -n ${target.namespace}`,
  );
};

export const noCheck: StabilityCheck = async () => {};

const DEFAULT_CHECKS: Readonly<Record<StabilityStrategy, StabilityCheck>> = {
  RolloutStatus: rolloutStatus,
  ReadinessWait: readinessWait,
  JobCompletion: jobCompletion,
  NoCheck: noCheck,
};

/**
 * Immutable table of kind → strategy → check. `with*` return a new registry.
 */
export class StabilityRegistry {
  private constructor(
    private readonly kinds: ReadonlyMap<string, StabilityStrategy>,
    private readonly checks: Readonly<Record<StabilityStrategy, StabilityCheck>>,
  ) {}

  static defaults(): StabilityRegistry {
    return new StabilityRegistry(DEFAULT_KIND_STRATEGIES, DEFAULT_CHECKS);
  }

  classify(kind: string): StabilityStrategy {
    return this.kinds.get(kind) ?? 'NoCheck';
  }

  withKind(kind: string, strategy: StabilityStrategy): StabilityRegistry {
    return new StabilityRegistry(new Map<string, StabilityStrategy>([...this.kinds, [kind, strategy]]), this.checks);
  }

  withCheck(strategy: StabilityStrategy, check: StabilityCheck): StabilityRegistry {
    return new StabilityRegistry(this.kinds, { ...this.checks, [strategy]: check });
  }

  /**
   * Run the check for `object`, returning the strategy used
   */
  async check(object: ResourceObject, context: CheckContext): Promise<StabilityStrategy> {
    const strategy = this.classify(object.kind);
    const target: CheckTarget = {
      kind: object.kind,
      name: object.name,
      namespace: resolveNamespace(object.namespace),
    };
    await this.checks[strategy](target, context);
    return strategy;
  }
}

export function defaultJobBounds(): JobBounds {
  return { ...DEFAULT_JOB_BOUNDS };
}
