/**
 * Runs one command to completion: submit, wait, capture output, judge the result.
 */

import type { Logger } from 'pino';
import type { ClusterHandle } from '../../domain/types';
import { CommandFailure, TransportFailure } from '../../errors';
import { createTimer } from '../../lib/logger';
import type { OutputSink } from '../output-sink';
import type { CommandDispatcher } from './dispatcher';
import type { OperationPoller } from './poller';
import type { CommandRequest, OperationHandle } from './types';

export interface RunOptions {
  /** File name the captured output is written to before the result is judged */
  outputFile?: string;
  signal?: AbortSignal;
}

export interface CommandRunnerDeps {
  dispatcher: CommandDispatcher;
  poller: OperationPoller;
  sink: OutputSink;
  logger: Logger;
}

export class CommandRunner {
  private readonly dispatcher: CommandDispatcher;
  private readonly poller: OperationPoller;
  private readonly sink: OutputSink;
  private readonly logger: Logger;

  constructor(deps: CommandRunnerDeps) {
    this.dispatcher = deps.dispatcher;
    this.poller = deps.poller;
    this.sink = deps.sink;
    this.logger = deps.logger;
  }

  submit(cluster: ClusterHandle, request: CommandRequest, signal?: AbortSignal): Promise<OperationHandle> {
    return this.dispatcher.submit(cluster, request, signal);
  }

  /**
   * Wait for a submitted command and return its logs. Rejects with
   * CommandFailure on a non-zero exit code and TransportFailure when the
   * operation ends without a usable exit code.
   */
  async complete(handle: OperationHandle, options: RunOptions = {}): Promise<string> {
    const logger = this.logger.child({ command: handle.command });
    const timer = createTimer(logger, 'run command');

    const failed = (error: unknown): void => {
      logger.debug({ error: error instanceof Error ? error.message : String(error) }, 'Command did not succeed');
    };

    const outcome = await this.poller.waitForCompletion(handle, options.signal).catch((error: unknown) => {
      failed(error);
      throw error;
    });

    logger.debug({ exitCode: outcome.exitCode, logs: outcome.logs }, 'command output');
    if (options.outputFile) {
      await this.sink.write(options.outputFile, outcome.logs);
    }

    if (outcome.exitCode !== undefined && outcome.exitCode !== 0) {
      failed(`exit code ${outcome.exitCode}`);
      throw new CommandFailure(outcome.exitCode, handle.command);
    }

    if (outcome.status !== 'succeeded' || outcome.exitCode === undefined) {
      const reason = outcome.reason ?? 'operation finished without an exit code';
      failed(reason);
      throw new TransportFailure(`running command: ${reason}`, outcome.reason);
    }

    timer.end({ exitCode: outcome.exitCode });
    return outcome.logs;
  }

  async run(cluster: ClusterHandle, request: CommandRequest, options: RunOptions = {}): Promise<string> {
    const handle = await this.submit(cluster, request, options.signal);
    return this.complete(handle, options);
  }
}
