/**
 * Bounded worker pool for event processing.
 *
 * 关键点（中文）
 * - `submit` 等到有空闲 slot 才返回，返回时任务已经开始（不等待其完成）
 * - 拿到 slot 后再检查一次 `shouldStart`（例如 stop 已触发），为 false 则不启动任务
 * - 任务失败只交给 `onTaskError`，不会影响其它任务
 */

export type WorkerTask = () => Promise<void>;

export type WorkerPoolOptions = {
  concurrency: number;
  onTaskError?: (error: unknown) => void;
};

export class WorkerPool {
  readonly concurrency: number;
  private active = 0;
  private readonly waiters: Array<() => void> = [];
  private readonly inFlight: Set<Promise<void>> = new Set();
  private readonly onTaskError?: (error: unknown) => void;

  constructor(options: WorkerPoolOptions) {
    this.concurrency = Number.isFinite(options.concurrency)
      ? Math.max(1, Math.floor(options.concurrency))
      : 1;
    this.onTaskError = options.onTaskError;
  }

  /**
   * Waits for a free slot, then starts `task`.
   * Resolves `true` once started, `false` when `shouldStart` vetoed it.
   */
  async submit(task: WorkerTask, shouldStart?: () => boolean): Promise<boolean> {
    await this.acquire();
    if (shouldStart && !shouldStart()) {
      this.release();
      return false;
    }

    const running = (async () => {
      try {
        await task();
      } catch (error) {
        this.onTaskError?.(error);
      } finally {
        this.release();
      }
    })();
    this.inFlight.add(running);
    void running.finally(() => this.inFlight.delete(running));
    return true;
  }

  /** Resolves when every started task has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiters.length;
  }

  private acquire(): Promise<void> {
    if (this.active < this.concurrency) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(() => {
        this.active += 1;
        resolve();
      });
    });
  }

  private release(): void {
    this.active = Math.max(0, this.active - 1);
    const nextWaiter = this.waiters.shift();
    nextWaiter?.();
  }
}
