/**
 * Command Executor - runs local tools (az) as child processes
 */

import { spawn } from 'node:child_process';
import type { Logger } from 'pino';
import { CancelledError } from '../errors';

export interface CommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
  maxBuffer?: number;
  /** How long a process gets to exit after SIGTERM before SIGKILL */
  killGraceMs?: number;
  signal?: AbortSignal;
  /** Called with each complete line of output as it arrives */
  onLine?: (stream: 'stdout' | 'stderr', line: string) => void;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  timedOut: boolean;
  /** stdout or stderr went past maxBuffer; the captured text stops there */
  truncated: boolean;
}

/**
 * Append `chunk` to `buffer` without growing past `limit`
 */
function capped(buffer: string, chunk: string, limit: number): { text: string; truncated: boolean } {
  if (buffer.length + chunk.length <= limit) {
    return { text: buffer + chunk, truncated: false };
  }
  return { text: buffer + chunk.slice(0, Math.max(limit - buffer.length, 0)), truncated: true };
}

function lineSplitter(emit: (line: string) => void): { push: (chunk: string) => void; flush: () => void } {
  let pending = '';
  return {
    push(chunk) {
      pending += chunk;
      const lines = pending.split('\n');
      pending = lines.pop() ?? '';
      for (const line of lines) {
        emit(line);
      }
    },
    flush() {
      if (pending !== '') {
        emit(pending);
        pending = '';
      }
    },
  };
}

export class CommandExecutor {
  constructor(private readonly logger: Logger) {}

  /**
   * Execute a command with arguments. Resolves with the exit code, whatever
   * it is; rejects only when the process cannot be started or is cancelled.
   */
  async execute(command: string, args: string[] = [], options: CommandOptions = {}): Promise<CommandResult> {
    const {
      cwd = process.cwd(),
      env = process.env,
      timeout = 30000,
      maxBuffer = 10 * 1024 * 1024,
      killGraceMs = 5000,
      signal,
    } = options;

    if (signal?.aborted) {
      throw new CancelledError(`cancelled before starting ${command}`);
    }

    this.logger.debug({ command, args, cwd }, 'Executing command');

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let timedOut = false;
      let truncated = false;
      let timeoutHandle: NodeJS.Timeout | undefined;
      let killHandle: NodeJS.Timeout | undefined;

      const child = spawn(command, args, { cwd, env, shell: false });

      // child.killed turns true as soon as a signal is sent, so check the exit state instead
      const terminate = (): void => {
        child.kill('SIGTERM');
        if (killHandle) {
          return;
        }
        killHandle = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            this.logger.warn({ command, pid: child.pid }, 'Process ignored SIGTERM, sending SIGKILL');
            child.kill('SIGKILL');
          }
        }, killGraceMs);
      };

      const onAbort = (): void => {
        terminate();
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      if (timeout > 0) {
        timeoutHandle = setTimeout(() => {
          timedOut = true;
          terminate();
        }, timeout);
      }

      const out = lineSplitter((line) => options.onLine?.('stdout', line));
      const err = lineSplitter((line) => options.onLine?.('stderr', line));

      child.stdout.on('data', (data: Buffer) => {
        const chunk = data.toString();
        out.push(chunk);
        const next = capped(stdout, chunk, maxBuffer);
        stdout = next.text;
        truncated = truncated || next.truncated;
      });

      child.stderr.on('data', (data: Buffer) => {
        const chunk = data.toString();
        err.push(chunk);
        const next = capped(stderr, chunk, maxBuffer);
        stderr = next.text;
        truncated = truncated || next.truncated;
      });

      const cleanup = (): void => {
        if (timeoutHandle) {
          clearTimeout(timeoutHandle);
        }
        if (killHandle) {
          clearTimeout(killHandle);
        }
        signal?.removeEventListener('abort', onAbort);
      };

      child.on('close', (code: number | null) => {
        cleanup();
        out.flush();
        err.flush();

        if (signal?.aborted) {
          reject(new CancelledError(`cancelled while running ${command}`));
          return;
        }

        const exitCode = code ?? -1;
        this.logger.debug({ command, exitCode, timedOut, truncated }, 'Command completed');
        resolve({ stdout: stdout.trim(), stderr: stderr.trim(), exitCode, timedOut, truncated });
      });

      child.on('error', (error: Error) => {
        cleanup();
        this.logger.error({ command, error: error.message }, 'Command execution failed');
        reject(error);
      });
    });
  }
}
