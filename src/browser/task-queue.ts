/**
 * Serial Task Queue
 *
 * Runs async tasks one at a time, in submission order. A failed task does
 * not block the ones queued after it.
 */

export class SerialTaskQueue {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * Queue a task; resolves or rejects with the task's own outcome.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    this.pending++;
    const result = this.tail.then(task);
    this.tail = result.then(
      () => this.settle(),
      () => this.settle()
    );
    return result;
  }

  /** Tasks queued or running */
  get size(): number {
    return this.pending;
  }

  private settle(): void {
    this.pending--;
  }
}
