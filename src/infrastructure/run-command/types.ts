/**
 * Contract for the remote command-execution channel of a managed cluster
 */

import type { ClusterHandle } from '../../domain/types';

export type OperationStatus = 'running' | 'succeeded' | 'failed';

export interface CommandRequest {
  /** Shell command run on the cluster, e.g. `kubectl apply -f manifests/` */
  readonly command: string;
  /** Base64 encoded zip unpacked into the command's working directory */
  readonly context?: string;
}

/**
 * Opaque token for a submitted long-running operation
 */
export interface OperationHandle {
  readonly id: string;
  readonly command: string;
}

export interface OperationSnapshot {
  status: OperationStatus;
  logs?: string;
  exitCode?: number;
  reason?: string;
  /** How long the remote asks callers to wait before checking again */
  retryAfterMs?: number;
}

export interface CommandChannel {
  /**
   * Start a command. Rejects with DispatchError when the remote refuses it,
   * ConnectionError when the remote is unreachable.
   */
  submit(cluster: ClusterHandle, request: CommandRequest, signal?: AbortSignal): Promise<OperationHandle>;

  /**
   * Advance the operation by one status check and report where it stands
   */
  check(handle: OperationHandle, signal?: AbortSignal): Promise<OperationSnapshot>;
}

export function isTerminal(
  snapshot: OperationSnapshot,
): snapshot is OperationSnapshot & { status: 'succeeded' | 'failed' } {
  return snapshot.status !== 'running';
}
