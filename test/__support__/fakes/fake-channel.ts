/**
 * In-process stand-in for the run-command API.
 *
 * Each submitted command gets a scripted response: either a synchronous
 * rejection (an Error) or an operation that reports `running` for `pendingChecks`
 * checks (or until `until` settles) and then its terminal outcome.
 */

import type { ClusterHandle } from '../../../src/domain/types';
import type {
  CommandChannel,
  CommandRequest,
  OperationHandle,
  OperationSnapshot,
} from '../../../src/infrastructure/run-command';

export interface FakeOperation {
  status: 'succeeded' | 'failed';
  exitCode?: number;
  logs?: string;
  reason?: string;
  pendingChecks?: number;
  until?: Promise<void>;
  retryAfterMs?: number;
}

export type FakeResponse = FakeOperation | Error;

export type Responder = (request: CommandRequest) => FakeResponse;

export const ok = (logs = ''): FakeOperation => ({ status: 'succeeded', exitCode: 0, logs });

export const exits = (exitCode: number, logs = ''): FakeOperation => ({ status: 'succeeded', exitCode, logs });

/**
 * Respond by the first rule whose pattern occurs in (or matches) the command
 */
export function byCommand(
  rules: Array<[pattern: string | RegExp, response: FakeResponse]>,
  fallback: FakeResponse = ok(),
): Responder {
  return (request) => {
    for (const [pattern, response] of rules) {
      const matches =
        typeof pattern === 'string' ? request.command.includes(pattern) : pattern.test(request.command);
      if (matches) {
        return response;
      }
    }
    return fallback;
  };
}

interface OperationState {
  command: string;
  operation: FakeOperation;
  checks: number;
  released: boolean;
  finished: boolean;
}

export class FakeCommandChannel implements CommandChannel {
  readonly submitted: Array<{ cluster: ClusterHandle; request: CommandRequest }> = [];
  /** Commands in the order their operations reached a terminal state */
  readonly finished: string[] = [];
  private readonly operations = new Map<string, OperationState>();
  private sequence = 0;

  constructor(private readonly respond: Responder = () => ok()) {}

  get commands(): string[] {
    return this.submitted.map((entry) => entry.request.command);
  }

  async submit(cluster: ClusterHandle, request: CommandRequest): Promise<OperationHandle> {
    this.submitted.push({ cluster, request });
    const response = this.respond(request);
    if (response instanceof Error) {
      throw response;
    }

    this.sequence += 1;
    const id = `op-${this.sequence}`;
    const state: OperationState = {
      command: request.command,
      operation: response,
      checks: 0,
      released: response.until === undefined,
      finished: false,
    };
    void response.until?.then(() => {
      state.released = true;
    });
    this.operations.set(id, state);
    return { id, command: request.command };
  }

  async check(handle: OperationHandle): Promise<OperationSnapshot> {
    const state = this.operations.get(handle.id);
    if (!state) {
      throw new Error(`unknown operation ${handle.id}`);
    }
    if (state.finished) {
      throw new Error(`operation ${handle.id} polled after reaching a terminal state`);
    }

    state.checks += 1;
    const { operation } = state;
    if (!state.released || state.checks <= (operation.pendingChecks ?? 0)) {
      return { status: 'running', retryAfterMs: operation.retryAfterMs ?? 1 };
    }

    state.finished = true;
    this.finished.push(handle.command);
    return {
      status: operation.status,
      logs: operation.logs ?? '',
      ...(operation.exitCode !== undefined && { exitCode: operation.exitCode }),
      ...(operation.reason !== undefined && { reason: operation.reason }),
    };
  }

  /** Status checks made against the operation started for `command` */
  checksFor(command: string): number {
    for (const state of this.operations.values()) {
      if (state.command === command) {
        return state.checks;
      }
    }
    return 0;
  }
}
