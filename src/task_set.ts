// src/task_set.ts

/**
 * Tracks short-lived async tasks so their owner can wait for all of them
 * before shutting down.
 *
 * At most `limit` tasks are outstanding at once; `spawn` refuses new work
 * beyond that, and after `close()`.
 */
export class TaskSet {
  private readonly tasks = new Set<Promise<void>>();
  private _closed = false;

  constructor(readonly limit: number) {}

  get size(): number {
    return this.tasks.size;
  }

  get closed(): boolean {
    return this._closed;
  }

  /**
   * Runs `fn` on the next microtask and tracks it until it settles.
   * `onError` receives anything `fn` throws or rejects with.
   * @returns false when the task was not admitted.
   */
  spawn(fn: () => void | Promise<void>, onError: (err: unknown) => void): boolean {
    if (this._closed || this.tasks.size >= this.limit) {
      return false;
    }

    const task: Promise<void> = Promise.resolve()
      .then(fn)
      .catch(onError)
      .finally(() => {
        this.tasks.delete(task);
      });
    this.tasks.add(task);
    return true;
  }

  /**
   * Resolves once every task, including ones spawned while waiting, settled.
   */
  async join(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(Array.from(this.tasks));
    }
  }

  /**
   * Stops admitting tasks and waits for the outstanding ones.
   */
  async close(): Promise<void> {
    this._closed = true;
    await this.join();
  }
}
