/**
 * Unit of work the pool can run
 */
export interface PoolTask {
  start(): void;
  cancel(): void;
  isFinished(): boolean;
  onFinish(listener: () => void): void;
}

/**
 * Worker Pool Configuration
 */
export interface WorkerPoolConfig {
  /** Maximum number of tasks executing at once (default: 6) */
  concurrency: number;
}

export const DEFAULT_WORKER_POOL_CONFIG: WorkerPoolConfig = {
  concurrency: 6,
};

/**
 * Bounded-concurrency FIFO executor.
 *
 * A running task holds its slot until it finishes; the next queued task is
 * started as soon as a slot frees up.
 */
export class WorkerPool {
  private config: WorkerPoolConfig;
  private queue: PoolTask[] = [];
  private running: Set<PoolTask> = new Set();
  private pumping = false;

  constructor(config: Partial<WorkerPoolConfig> = {}) {
    this.config = { ...DEFAULT_WORKER_POOL_CONFIG, ...config };

    const { concurrency } = this.config;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(
        `concurrency must be a positive integer, got ${concurrency}`,
      );
    }
  }

  /**
   * Admit a task for eventual execution
   */
  enqueue(task: PoolTask): void {
    if (task.isFinished()) {
      return;
    }

    task.onFinish(() => {
      this.running.delete(task);
      this.pump();
    });
    this.queue.push(task);
    this.pump();
  }

  /**
   * Cancel every queued and running task.
   *
   * Queued tasks are started right away: a cancelled task finishes as soon as
   * it starts, reporting its cancellation.
   */
  cancelAll(): void {
    const queued = this.queue.splice(0);

    for (const task of this.running) {
      task.cancel();
    }

    for (const task of queued) {
      task.cancel();
      this.running.add(task);
      task.start();
    }
  }

  get activeCount(): number {
    return this.running.size;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  get concurrency(): number {
    return this.config.concurrency;
  }

  private pump(): void {
    // A task finishing inside start() re-enters here; the running loop picks
    // up the freed slot instead
    if (this.pumping) {
      return;
    }
    this.pumping = true;
    try {
      while (this.running.size < this.config.concurrency) {
        const task = this.queue.shift();
        if (!task) {
          return;
        }
        this.running.add(task);
        task.start();
      }
    } finally {
      this.pumping = false;
    }
  }
}
