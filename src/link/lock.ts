/**
 * FIFO mutual exclusion for async tasks. Each `run` starts after every
 * previously queued task has settled, whether it resolved or rejected.
 */
export class AsyncLock {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /** True while a task is running or queued. */
  get locked(): boolean {
    return this.pending > 0;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    const settle = () => {
      this.pending--;
    };
    this.tail = result.then(settle, settle);
    return result;
  }
}
