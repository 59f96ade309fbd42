/**
 * Runs background jobs one at a time and keeps their results in a
 * mailbox for the sync loop to collect.
 *
 * The loop never awaits a job: it submits, keeps ticking, and takes one
 * finished result per tick.
 */

interface QueuedJob<T> {
  task: () => Promise<T>;
  onError: (error: unknown) => T;
}

export class SerialWorker<T> {
  private readonly queue: QueuedJob<T>[] = [];
  private readonly mailbox: T[] = [];
  private active: Promise<void> | null = null;

  /**
   * Queue a job. A job that throws is turned into a result by `onError`,
   * so every submitted job yields exactly one result.
   */
  submit(task: () => Promise<T>, onError: (error: unknown) => T): void {
    this.queue.push({ task, onError });
    if (!this.active) {
      this.active = this.drain();
    }
  }

  /** Oldest finished result, or undefined when none is waiting */
  take(): T | undefined {
    return this.mailbox.shift();
  }

  get idle(): boolean {
    return this.active === null && this.queue.length === 0;
  }

  get pending(): number {
    return this.mailbox.length;
  }

  /** Resolves once every queued job has finished */
  whenIdle(): Promise<void> {
    return this.active ?? Promise.resolve();
  }

  private async drain(): Promise<void> {
    let job = this.queue.shift();
    while (job) {
      let result: T;
      try {
        result = await job.task();
      } catch (error) {
        result = job.onError(error);
      }
      this.mailbox.push(result);
      job = this.queue.shift();
    }
    this.active = null;
  }
}
