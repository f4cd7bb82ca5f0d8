/**
 * Managed cluster run-command channel
 *
 * Runs commands on an AKS cluster through the ARM `runCommand` API. The
 * credential is built once by the caller and shared by every client this
 * channel creates.
 *
 * The SDK poller keeps the service's Retry-After to itself, so each operation
 * gets its own client whose pipeline records the header into a PollHint.
 */

import {
  ContainerServiceClient,
  type RunCommandRequest,
  type RunCommandResult,
} from '@azure/arm-containerservice';
import { isRestError, RestError, type PipelinePolicy } from '@azure/core-rest-pipeline';
import type { TokenCredential } from '@azure/identity';
import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type { ClusterHandle } from '../../domain/types';
import { CancelledError, ConnectionError, DispatchError, toError } from '../../errors';
import type { CommandChannel, CommandRequest, OperationHandle, OperationSnapshot } from './types';

/**
 * The part of the ARM poller the channel drives
 */
export interface RunCommandPoller {
  poll(options?: { abortSignal?: AbortSignal }): Promise<void>;
  isDone(): boolean;
  getOperationState(): { status: string; result?: RunCommandResult; error?: Error };
}

export interface RunCommandClient {
  managedClusters: {
    beginRunCommand(
      resourceGroupName: string,
      resourceName: string,
      requestPayload: RunCommandRequest,
      options?: { abortSignal?: AbortSignal },
    ): Promise<RunCommandPoller>;
  };
}

/**
 * Wait the service last asked for, updated by every response of one operation
 */
export interface PollHint {
  retryAfterMs?: number;
}

export interface AksRunCommandChannelOptions {
  credential: TokenCredential;
  logger: Logger;
  createClient?: (subscriptionId: string, hint: PollHint) => RunCommandClient;
}

const RETRY_AFTER_POLICY = 'runCommandRetryAfterPolicy';

/**
 * Read a wait in milliseconds from response headers: `retry-after-ms`,
 * `x-ms-retry-after-ms`, then `retry-after` in seconds or as an HTTP date.
 */
export function parseRetryAfter(
  headers: { get(name: string): string | undefined },
  now = Date.now(),
): number | undefined {
  for (const name of ['retry-after-ms', 'x-ms-retry-after-ms']) {
    const raw = headers.get(name)?.trim();
    const value = raw ? Number(raw) : Number.NaN;
    if (Number.isFinite(value) && value >= 0) {
      return value;
    }
  }

  const retryAfter = headers.get('retry-after');
  if (retryAfter === undefined || retryAfter.trim() === '') {
    return undefined;
  }
  const seconds = Number(retryAfter);
  if (Number.isFinite(seconds)) {
    return Math.max(seconds, 0) * 1000;
  }
  const date = Date.parse(retryAfter);
  return Number.isNaN(date) ? undefined : Math.max(date - now, 0);
}

/**
 * Per-call policy copying the service's requested wait into `hint`
 */
export function retryAfterPolicy(hint: PollHint): PipelinePolicy {
  return {
    name: RETRY_AFTER_POLICY,
    async sendRequest(request, next) {
      const response = await next(request);
      const retryAfterMs = parseRetryAfter(response.headers);
      if (retryAfterMs === undefined) {
        delete hint.retryAfterMs;
      } else {
        hint.retryAfterMs = retryAfterMs;
      }
      return response;
    },
  };
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  RestError.REQUEST_SEND_ERROR,
]);

class AksOperationHandle implements OperationHandle {
  constructor(
    readonly id: string,
    readonly command: string,
    readonly poller: RunCommandPoller,
    readonly hint: PollHint,
  ) {}
}

/**
 * Map a failed request to the error taxonomy
 */
export function classifyRequestError(error: unknown, signal?: AbortSignal): Error {
  const err = toError(error);

  if (signal?.aborted) {
    return new CancelledError('cancelled while talking to the cluster', err);
  }

  if (isRestError(err)) {
    if (err.statusCode === undefined || (err.code && CONNECTION_ERROR_CODES.has(err.code))) {
      return new ConnectionError(`cluster endpoint unreachable: ${err.message}`, err);
    }
    return new DispatchError(`command rejected: ${err.message}`, err.statusCode, err);
  }

  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  if (code && CONNECTION_ERROR_CODES.has(code)) {
    return new ConnectionError(`cluster endpoint unreachable: ${err.message}`, err);
  }

  return new DispatchError(`command rejected: ${err.message}`, undefined, err);
}

export class AksRunCommandChannel implements CommandChannel {
  private readonly logger: Logger;
  private readonly createClient: (subscriptionId: string, hint: PollHint) => RunCommandClient;

  constructor(options: AksRunCommandChannelOptions) {
    this.logger = options.logger.child({ component: 'AksRunCommandChannel' });
    const credential = options.credential;
    this.createClient =
      options.createClient ??
      ((subscriptionId, hint) =>
        new ContainerServiceClient(credential, subscriptionId, {
          additionalPolicies: [{ policy: retryAfterPolicy(hint), position: 'perCall' }],
        }));
  }

  async submit(
    cluster: ClusterHandle,
    request: CommandRequest,
    signal?: AbortSignal,
  ): Promise<OperationHandle> {
    if (signal?.aborted) {
      throw new CancelledError('cancelled before the command was submitted');
    }

    const hint: PollHint = {};
    const client = this.createClient(cluster.subscriptionId, hint);
    this.logger.debug(
      { cluster: cluster.name, resourceGroup: cluster.resourceGroup, command: request.command },
      'Submitting run command',
    );

    try {
      const poller = await client.managedClusters.beginRunCommand(
        cluster.resourceGroup,
        cluster.name,
        {
          command: request.command,
          ...(request.context !== undefined && { context: request.context }),
        },
        { abortSignal: signal },
      );
      return new AksOperationHandle(nanoid(), request.command, poller, hint);
    } catch (error) {
      throw classifyRequestError(error, signal);
    }
  }

  async check(handle: OperationHandle, signal?: AbortSignal): Promise<OperationSnapshot> {
    if (!(handle instanceof AksOperationHandle)) {
      throw new DispatchError(`operation ${handle.id} was not started by this channel`);
    }

    const { poller } = handle;
    if (!poller.isDone()) {
      try {
        await poller.poll({ abortSignal: signal });
      } catch (error) {
        const status = poller.getOperationState().status;
        // the poller throws on a failed terminal state; that is reported below
        if (signal?.aborted || (status !== 'failed' && status !== 'canceled')) {
          throw classifyRequestError(error, signal);
        }
      }
    }

    return this.toSnapshot(poller.getOperationState(), handle.hint);
  }

  private toSnapshot(state: ReturnType<RunCommandPoller['getOperationState']>, hint: PollHint): OperationSnapshot {
    const result = state.result;

    switch (state.status) {
      case 'succeeded':
        return {
          status: 'succeeded',
          logs: result?.logs ?? '',
          ...(result?.exitCode !== undefined && { exitCode: result.exitCode }),
        };
      case 'failed':
      case 'canceled':
        return {
          status: 'failed',
          logs: result?.logs ?? '',
          ...(result?.exitCode !== undefined && { exitCode: result.exitCode }),
          reason: result?.reason ?? state.error?.message ?? `operation ${state.status}`,
        };
      default:
        return {
          status: 'running',
          ...(hint.retryAfterMs !== undefined && { retryAfterMs: hint.retryAfterMs }),
        };
    }
  }
}
