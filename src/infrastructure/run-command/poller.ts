/**
 * Operation Poller - waits for a long-running run command to finish
 *
 * Between status checks the poller sleeps for the interval the remote asks
 * for (bounded by maxIntervalMs), or intervalMs when it asks for nothing.
 * A caller signal stops the local wait only; the remote command keeps running.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from 'pino';
import { CancelledError, isApplicationError, toError } from '../../errors';
import { DEFAULT_TIMEOUTS } from '../../config/defaults';
import { isTerminal, type CommandChannel, type OperationHandle, type OperationSnapshot } from './types';

export interface PollerOptions {
  intervalMs?: number;
  maxIntervalMs?: number;
}

export interface CompletedOperation {
  status: 'succeeded' | 'failed';
  logs: string;
  exitCode?: number;
  reason?: string;
}

export class OperationPoller {
  private readonly logger: Logger;
  private readonly intervalMs: number;
  private readonly maxIntervalMs: number;

  constructor(
    private readonly channel: CommandChannel,
    logger: Logger,
    options: PollerOptions = {},
  ) {
    this.logger = logger.child({ component: 'OperationPoller' });
    this.intervalMs = options.intervalMs ?? DEFAULT_TIMEOUTS.pollInterval;
    this.maxIntervalMs = Math.max(options.maxIntervalMs ?? DEFAULT_TIMEOUTS.maxPollInterval, this.intervalMs);
  }

  async waitForCompletion(handle: OperationHandle, signal?: AbortSignal): Promise<CompletedOperation> {
    let checks = 0;

    for (;;) {
      if (signal?.aborted) {
        throw new CancelledError(`cancelled while waiting for ${handle.command}`);
      }

      const snapshot = await this.check(handle, signal);
      checks += 1;

      if (isTerminal(snapshot)) {
        this.logger.debug(
          { operation: handle.id, status: snapshot.status, exitCode: snapshot.exitCode, checks },
          'Operation reached terminal state',
        );
        return {
          status: snapshot.status,
          logs: snapshot.logs ?? '',
          ...(snapshot.exitCode !== undefined && { exitCode: snapshot.exitCode }),
          ...(snapshot.reason !== undefined && { reason: snapshot.reason }),
        };
      }

      const delay = this.nextDelay(snapshot);
      if (checks % 12 === 0) {
        this.logger.info({ operation: handle.id, command: handle.command, checks }, 'Still running command');
      }

      try {
        await sleep(delay, undefined, { signal });
      } catch (error) {
        throw new CancelledError(`cancelled while waiting for ${handle.command}`, toError(error));
      }
    }
  }

  nextDelay(snapshot: OperationSnapshot): number {
    const requested = snapshot.retryAfterMs ?? this.intervalMs;
    return Math.min(Math.max(requested, 0), this.maxIntervalMs);
  }

  private async check(handle: OperationHandle, signal?: AbortSignal): Promise<OperationSnapshot> {
    try {
      return await this.channel.check(handle, signal);
    } catch (error) {
      if (signal?.aborted && !isApplicationError(error)) {
        throw new CancelledError(`cancelled while waiting for ${handle.command}`, toError(error));
      }
      throw error;
    }
  }
}
