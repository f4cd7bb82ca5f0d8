/**
 * Command Dispatcher - submits commands to the cluster's run-command channel
 */

import type { Logger } from 'pino';
import type { ClusterHandle } from '../../domain/types';
import { CancelledError, DispatchError, isApplicationError, toError } from '../../errors';
import type { CommandChannel, CommandRequest, OperationHandle } from './types';

export class CommandDispatcher {
  private readonly logger: Logger;

  constructor(
    private readonly channel: CommandChannel,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: 'CommandDispatcher' });
  }

  /**
   * Start a command and hand back its operation handle. The archive in
   * `request.context` is not logged.
   */
  async submit(
    cluster: ClusterHandle,
    request: CommandRequest,
    signal?: AbortSignal,
  ): Promise<OperationHandle> {
    if (signal?.aborted) {
      throw new CancelledError('cancelled before the command was submitted');
    }

    this.logger.info(
      {
        cluster: cluster.name,
        resourceGroup: cluster.resourceGroup,
        command: request.command,
        contextBytes: request.context?.length ?? 0,
      },
      'Submitting command',
    );

    try {
      return await this.channel.submit(cluster, request, signal);
    } catch (error) {
      if (isApplicationError(error)) {
        throw error;
      }
      const err = toError(error);
      if (signal?.aborted) {
        throw new CancelledError('cancelled while submitting the command', err);
      }
      throw new DispatchError(`starting run command: ${err.message}`, undefined, err);
    }
  }
}
