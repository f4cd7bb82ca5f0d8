/**
 * Operation Poller Tests
 */

import { describe, it, expect, jest } from '@jest/globals';
import { OperationPoller } from '../../../../src/infrastructure/run-command/poller';
import { isTerminal, type CommandChannel, type OperationSnapshot } from '../../../../src/infrastructure/run-command';
import { CancelledError, ConnectionError } from '../../../../src/errors';
import { createClusterHandle } from '../../../../src/domain/types';
import { FakeCommandChannel, exits } from '../../../__support__/fakes/fake-channel';
import { createMockLogger } from '../../../__support__/utilities/mock-infrastructure';

const cluster = createClusterHandle({ name: 'dev', subscriptionId: 'sub', resourceGroup: 'rg' });

describe('OperationPoller', () => {
  it('should keep checking until the operation is terminal', async () => {
    const channel = new FakeCommandChannel(() => ({ ...exits(0, 'deployment "web" successfully rolled out'), pendingChecks: 3 }));
    const poller = new OperationPoller(channel, createMockLogger(), { intervalMs: 1, maxIntervalMs: 5 });
    const handle = await channel.submit(cluster, { command: 'kubectl rollout status Deployment/web -n prod' });

    const result = await poller.waitForCompletion(handle);

    expect(result).toEqual({ status: 'succeeded', logs: 'deployment "web" successfully rolled out', exitCode: 0 });
    expect(channel.checksFor('kubectl rollout status Deployment/web -n prod')).toBe(4);
  });

  it('should report a failed terminal state with its reason', async () => {
    const channel = new FakeCommandChannel(() => ({ status: 'failed', reason: 'agent pool unavailable' }));
    const poller = new OperationPoller(channel, createMockLogger(), { intervalMs: 1 });
    const handle = await channel.submit(cluster, { command: 'kubectl apply -f manifests/' });

    await expect(poller.waitForCompletion(handle)).resolves.toEqual({
      status: 'failed',
      logs: '',
      reason: 'agent pool unavailable',
    });
  });

  it('should use the interval the remote recommends, bounded by the maximum', () => {
    const poller = new OperationPoller(new FakeCommandChannel(), createMockLogger(), {
      intervalMs: 100,
      maxIntervalMs: 1000,
    });
    const running = (retryAfterMs?: number): OperationSnapshot => ({
      status: 'running',
      ...(retryAfterMs !== undefined && { retryAfterMs }),
    });

    expect(poller.nextDelay(running(250))).toBe(250);
    expect(poller.nextDelay(running(60000))).toBe(1000);
    expect(poller.nextDelay(running())).toBe(100);
    expect(poller.nextDelay(running(-5))).toBe(0);
  });

  it('should sleep between checks instead of spinning', async () => {
    const check = jest.fn<CommandChannel['check']>().mockResolvedValueOnce({ status: 'running', retryAfterMs: 40 });
    check.mockResolvedValueOnce({ status: 'succeeded', exitCode: 0, logs: '' });
    const channel: CommandChannel = { submit: jest.fn<CommandChannel['submit']>(), check };
    const poller = new OperationPoller(channel, createMockLogger(), { intervalMs: 1, maxIntervalMs: 1000 });

    const started = Date.now();
    await poller.waitForCompletion({ id: 'op-1', command: 'kubectl wait' });

    expect(check).toHaveBeenCalledTimes(2);
    expect(Date.now() - started).toBeGreaterThanOrEqual(35);
  });

  it('should stop waiting with CancelledError when the signal fires', async () => {
    const channel = new FakeCommandChannel(() => ({ ...exits(0), until: new Promise<void>(() => {}) }));
    const poller = new OperationPoller(channel, createMockLogger(), { intervalMs: 5, maxIntervalMs: 5 });
    const handle = await channel.submit(cluster, { command: 'kubectl wait --for=condition=Ready pod/probe -n default' });
    const controller = new AbortController();

    const waiting = poller.waitForCompletion(handle, controller.signal);
    setTimeout(() => controller.abort(), 20);

    await expect(waiting).rejects.toBeInstanceOf(CancelledError);
  });

  it('should not check at all when already cancelled', async () => {
    const check = jest.fn<CommandChannel['check']>();
    const poller = new OperationPoller({ submit: jest.fn<CommandChannel['submit']>(), check }, createMockLogger());
    const controller = new AbortController();
    controller.abort();

    await expect(poller.waitForCompletion({ id: 'op-1', command: 'kubectl wait' }, controller.signal)).rejects.toThrow(
      'cancelled while waiting for kubectl wait',
    );
    expect(check).not.toHaveBeenCalled();
  });

  it('should pass channel errors through', async () => {
    const check = jest.fn<CommandChannel['check']>().mockRejectedValue(new ConnectionError('cluster endpoint unreachable'));
    const poller = new OperationPoller({ submit: jest.fn<CommandChannel['submit']>(), check }, createMockLogger());

    await expect(poller.waitForCompletion({ id: 'op-1', command: 'kubectl wait' })).rejects.toBeInstanceOf(ConnectionError);
  });
});

describe('isTerminal', () => {
  it('should treat only running as non-terminal', () => {
    expect(isTerminal({ status: 'running', retryAfterMs: 10 })).toBe(false);
    expect(isTerminal({ status: 'succeeded', exitCode: 0 })).toBe(true);
    expect(isTerminal({ status: 'failed', reason: 'OperationCanceled' })).toBe(true);
  });
});
