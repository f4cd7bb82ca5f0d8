import { describe, it, expect } from '@jest/globals';
import {
  StabilityRegistry,
  classify,
  defaultJobBounds,
  jobLogFile,
  resolveNamespace,
  type CheckContext,
  type StabilityCheck,
} from '../../../../src/workflows/converge';
import { createClusterHandle, type ResourceObject } from '../../../../src/domain/types';
import { CheckError } from '../../../../src/errors';
import { FakeCommandChannel, byCommand, exits, ok } from '../../../__support__/fakes/fake-channel';
import { MemorySink, createRunner } from '../../../__support__/fakes/memory-sink';
import { createMockLogger } from '../../../__support__/utilities/mock-infrastructure';

const cluster = createClusterHandle({ name: 'dev', subscriptionId: 'sub-1', resourceGroup: 'rg-1' });

const object = (kind: string, name: string, namespace = ''): ResourceObject => ({
  kind,
  name,
  namespace,
  body: { kind, metadata: { name } },
});

function setup(channel: FakeCommandChannel) {
  const logger = createMockLogger();
  const sink = new MemorySink();
  const context: CheckContext = {
    cluster,
    runner: createRunner(channel, logger, sink),
    logger,
    jobBounds: defaultJobBounds(),
  };
  return { sink, context };
}

describe('classify', () => {
  it.each([
    ['Deployment', 'RolloutStatus'],
    ['StatefulSet', 'RolloutStatus'],
    ['DaemonSet', 'RolloutStatus'],
    ['Pod', 'ReadinessWait'],
    ['Job', 'JobCompletion'],
    ['ConfigMap', 'NoCheck'],
    ['Service', 'NoCheck'],
    ['CronJob', 'NoCheck'],
    ['deployment', 'NoCheck'],
  ])('should classify %s as %s', (kind, strategy) => {
    expect(classify(kind)).toBe(strategy);
  });
});

describe('resolveNamespace', () => {
  it('should use default for an empty namespace', () => {
    expect(resolveNamespace('')).toBe('default');
    expect(resolveNamespace('prod')).toBe('prod');
  });
});

describe('StabilityRegistry', () => {
  it('should issue a rollout status check for workloads', async () => {
    const channel = new FakeCommandChannel();
    const { context } = setup(channel);

    const strategy = await StabilityRegistry.defaults().check(object('StatefulSet', 'db', 'data'), context);

    expect(strategy).toBe('RolloutStatus');
    expect(channel.commands).toEqual(['kubectl rollout status StatefulSet/db -n data']);
  });

  it('should wait for pod readiness in the default namespace', async () => {
    const channel = new FakeCommandChannel();
    const { context } = setup(channel);

    await StabilityRegistry.defaults().check(object('Pod', 'probe'), context);

    expect(channel.commands).toEqual(['kubectl wait --for=condition=Ready pod/probe -n default']);
  });

  it('should issue no command for kinds without a check', async () => {
    const channel = new FakeCommandChannel();
    const { context } = setup(channel);

    const strategy = await StabilityRegistry.defaults().check(object('Secret', 'creds'), context);

    expect(strategy).toBe('NoCheck');
    expect(channel.commands).toEqual([]);
  });

  it('should follow job logs into a file and then wait for completion', async () => {
    const channel = new FakeCommandChannel(byCommand([['kubectl logs', ok('migrating\ndone\n')]]));
    const { context, sink } = setup(channel);

    await StabilityRegistry.defaults().check(object('Job', 'migrate', 'prod'), context);

    expect(channel.commands).toEqual([
      'kubectl logs --pod-running-timeout=20s --follow job/migrate -n prod',
      'kubectl wait --for=condition=complete --timeout=10s job/migrate -n prod',
    ]);
    expect(sink.files.get('job-migrate.log')).toBe('migrating\ndone\n');
  });

  it('should keep the job logs and skip the wait when following fails', async () => {
    const channel = new FakeCommandChannel(byCommand([['kubectl logs', exits(1, 'error: timed out waiting for pod')]]));
    const { context, sink } = setup(channel);

    const checking = StabilityRegistry.defaults().check(object('Job', 'seed'), context);

    await expect(checking).rejects.toBeInstanceOf(CheckError);
    await expect(checking).rejects.toThrow('following job logs: command failed with exit code 1');
    expect(channel.commands).toEqual(['kubectl logs --pod-running-timeout=20s --follow job/seed -n default']);
    expect(sink.files.get('job-seed.log')).toBe('error: timed out waiting for pod');
  });

  it('should fail the job check when the job does not complete', async () => {
    const channel = new FakeCommandChannel(byCommand([['kubectl wait', exits(1)]]));
    const { context } = setup(channel);

    await expect(StabilityRegistry.defaults().check(object('Job', 'seed'), context)).rejects.toThrow(
      'waiting for job complete: command failed with exit code 1',
    );
  });

  it('should use configured job bounds', async () => {
    const channel = new FakeCommandChannel();
    const { context } = setup(channel);

    await StabilityRegistry.defaults().check(object('Job', 'batch'), {
      ...context,
      jobBounds: { podRunningTimeout: '1m', completeTimeout: '30s' },
    });

    expect(channel.commands).toEqual([
      'kubectl logs --pod-running-timeout=1m --follow job/batch -n default',
      'kubectl wait --for=condition=complete --timeout=30s job/batch -n default',
    ]);
  });

  it('should extend the table without changing the original', async () => {
    const channel = new FakeCommandChannel();
    const { context } = setup(channel);
    const defaults = StabilityRegistry.defaults();

    const extended = defaults.withKind('ReplicaSet', 'RolloutStatus');

    expect(extended.classify('ReplicaSet')).toBe('RolloutStatus');
    expect(defaults.classify('ReplicaSet')).toBe('NoCheck');
    await extended.check(object('ReplicaSet', 'rs', 'prod'), context);
    expect(channel.commands).toEqual(['kubectl rollout status ReplicaSet/rs -n prod']);
  });

  it('should run a replaced check', async () => {
    const channel = new FakeCommandChannel();
    const { context } = setup(channel);
    const seen: string[] = [];
    const record: StabilityCheck = async (target) => {
      seen.push(`${target.kind}/${target.name}@${target.namespace}`);
    };

    await StabilityRegistry.defaults().withCheck('ReadinessWait', record).check(object('Pod', 'probe'), context);

    expect(seen).toEqual(['Pod/probe@default']);
    expect(channel.commands).toEqual([]);
  });
});

describe('jobLogFile', () => {
  it('should name the log after the job', () => {
    expect(jobLogFile('migrate')).toBe('job-migrate.log');
  });
});
