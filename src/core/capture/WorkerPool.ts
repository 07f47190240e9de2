type Task = () => Promise<void>;

/**
 * Runs at most `concurrency` tasks at a time; waiting tasks start in FIFO order.
 */
export class WorkerPool {
  private readonly queue: Task[] = [];
  private running = 0;
  private stopped = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly concurrency: number,
    private readonly onTaskError: (error: unknown) => void = () => undefined
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker pool concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  get active(): number {
    return this.running;
  }

  get waiting(): number {
    return this.queue.length;
  }

  /** Returns false when the pool has been stopped and the task was not accepted. */
  submit(task: Task): boolean {
    if (this.stopped) {
      return false;
    }
    this.queue.push(task);
    this.dispatch();
    return true;
  }

  /** Stops dispatching. Queued tasks are dropped; returns how many. */
  stop(): number {
    this.stopped = true;
    const dropped = this.queue.length;
    this.queue.length = 0;
    this.notifyIfIdle();
    return dropped;
  }

  onIdle(): Promise<void> {
    if (this.running === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private dispatch(): void {
    while (!this.stopped && this.running < this.concurrency) {
      const task = this.queue.shift();
      if (!task) {
        break;
      }
      this.running += 1;
      void task()
        .catch((error: unknown) => this.onTaskError(error))
        .finally(() => {
          this.running -= 1;
          this.dispatch();
          this.notifyIfIdle();
        });
    }
  }

  private notifyIfIdle(): void {
    if (this.running > 0 || this.queue.length > 0) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
