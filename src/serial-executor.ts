/**
 * Single-owner run queue. Tasks run one at a time in submission order; a task
 * starts only after the previous one settled. A rejected task does not stop
 * the queue: the rejection is delivered to that task's caller only.
 */
export class SerialExecutor {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  run<T>(task: () => Promise<T>): Promise<T> {
    this.queued++;
    const next = this.tail.then(task).finally(() => {
      this.queued--;
    });
    this.tail = next.then(
      () => undefined,
      () => undefined,
    );
    return next;
  }

  /** Tasks submitted and not yet settled, including the running one. */
  get pending(): number {
    return this.queued;
  }
}
