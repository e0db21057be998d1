/**
 * Background Tasks
 *
 * Detached units of work started from the request path. Each task has its own
 * error boundary: failures are logged and never reach the caller. Pending
 * tasks are tracked so shutdown can wait for them.
 */

import { errorMeta, logDebug, logError } from "../utils/logger";

export class BackgroundTasks {
  private pending = new Set<Promise<void>>();

  get size(): number {
    return this.pending.size;
  }

  /**
   * Start `work` without awaiting it. Returns the settled promise for callers
   * (tests, shutdown) that want to observe completion; it never rejects.
   */
  run(name: string, work: () => Promise<void>): Promise<void> {
    const startedAt = Date.now();
    const task = Promise.resolve()
      .then(work)
      .then(
        () => {
          logDebug(`[Background] ${name} finished`, { duration: Date.now() - startedAt });
        },
        (err: unknown) => {
          logError(`[Background] ${name} failed`, { duration: Date.now() - startedAt, ...errorMeta(err) });
        },
      )
      .finally(() => {
        this.pending.delete(task);
      });

    this.pending.add(task);
    return task;
  }

  /**
   * Wait for every task started so far, including ones started while draining.
   */
  async drain(): Promise<void> {
    while (this.pending.size > 0) {
      await Promise.all(this.pending);
    }
  }
}
