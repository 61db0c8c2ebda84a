export class JobCancelledError extends Error {
  constructor(message = 'Job cancelled before it started') {
    super(message);
    this.name = 'JobCancelledError';
  }
}

interface PendingTask {
  start: () => void;
  cancel: (error: JobCancelledError) => void;
}

/**
 * Runs at most `concurrency` tasks at a time in submission order. Aborting
 * the signal rejects every task that has not started yet; running tasks see
 * the same signal and decide for themselves.
 */
export class WorkQueue {
  private active = 0;

  private readonly pending: PendingTask[] = [];

  constructor(
    private readonly concurrency: number,
    private readonly signal?: AbortSignal
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    signal?.addEventListener('abort', () => this.cancelPending(), { once: true });
  }

  get size(): number {
    return this.pending.length;
  }

  get running(): number {
    return this.active;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    if (this.signal?.aborted) {
      return Promise.reject(new JobCancelledError());
    }
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.active++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.active--;
            this.next();
          });
      };
      this.pending.push({ start, cancel: reject });
      this.next();
    });
  }

  private next() {
    while (this.active < this.concurrency && this.pending.length) {
      const task = this.pending.shift();
      task?.start();
    }
  }

  private cancelPending() {
    const cancelled = this.pending.splice(0);
    for (const task of cancelled) task.cancel(new JobCancelledError());
  }
}
