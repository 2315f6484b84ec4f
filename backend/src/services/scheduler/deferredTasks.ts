/**
 * Deferred tasks keyed by purpose. Scheduling a task replaces the pending
 * task of the same purpose, so at most one settle delay and one retry are
 * ever queued.
 */

import { createServiceLogger, toError } from '../logger';

const log = createServiceLogger('deferred-tasks');

export type TaskPurpose = 'settle-delay' | 'retry';

export type DeferredTask = () => Promise<void>;

export class DeferredTaskScheduler {
  private readonly pending = new Map<TaskPurpose, NodeJS.Timeout>();

  schedule(purpose: TaskPurpose, delayMs: number, task: DeferredTask): void {
    this.cancel(purpose);

    const timer = setTimeout(() => {
      this.pending.delete(purpose);
      task().catch((error: unknown) => {
        log.error('task_failed', `Deferred ${purpose} task failed`, toError(error), undefined, { purpose });
      });
    }, delayMs);

    this.pending.set(purpose, timer);
  }

  cancel(purpose: TaskPurpose): boolean {
    const timer = this.pending.get(purpose);
    if (!timer) {
      return false;
    }
    clearTimeout(timer);
    this.pending.delete(purpose);
    return true;
  }

  cancelAll(): void {
    for (const timer of this.pending.values()) {
      clearTimeout(timer);
    }
    this.pending.clear();
  }

  isPending(purpose: TaskPurpose): boolean {
    return this.pending.has(purpose);
  }

  get size(): number {
    return this.pending.size;
  }
}
