/**
 * Runs tasks concurrently and joins all of them, keeping the first failure.
 */

import { toError } from '../../errors';

export interface TaskFailure<L> {
  label: L;
  error: Error;
}

export interface TaskGroupResult<L> {
  /** First task to fail, by completion time */
  first?: TaskFailure<L>;
  /** Failures after the first, in completion order */
  discarded: TaskFailure<L>[];
  completed: number;
}

export class TaskGroup<L> {
  private readonly running: Promise<void>[] = [];
  private readonly failures: TaskFailure<L>[] = [];
  private completed = 0;

  /**
   * Start `task` now. A synchronous throw counts as a failure of the task.
   */
  go(label: L, task: () => Promise<void>): void {
    const run = (async () => {
      try {
        await task();
        this.completed += 1;
      } catch (error) {
        this.failures.push({ label, error: toError(error) });
      }
    })();
    this.running.push(run);
  }

  /**
   * Wait for every started task, failed or not
   */
  async wait(): Promise<TaskGroupResult<L>> {
    await Promise.all(this.running);
    const [first, ...discarded] = this.failures;
    return {
      ...(first !== undefined && { first }),
      discarded,
      completed: this.completed,
    };
  }
}
