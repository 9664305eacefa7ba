import pLimit, { type LimitFunction } from "p-limit";
import { LspError } from "../protocol/errors";

export class PoolTerminatedError extends LspError {
  constructor(pool: string) {
    super(`The ${pool} pool has been terminated`);
  }
}

/**
 * Bounded pool of concurrent task slots. `terminate` drops queued tasks and
 * refuses new ones; `join` waits for the tasks that already started.
 */
export class WorkerPool {
  private readonly limit: LimitFunction;
  private terminated = false;
  private running = 0;
  private idleWaiters: (() => void)[] = [];

  constructor(
    readonly name: string,
    readonly size: number
  ) {
    this.limit = pLimit(size);
  }

  get activeCount(): number {
    return this.running;
  }

  get pendingCount(): number {
    return this.limit.pendingCount;
  }

  get isTerminated(): boolean {
    return this.terminated;
  }

  run<T>(task: () => T | Promise<T>): Promise<T> {
    if (this.terminated) return Promise.reject(new PoolTerminatedError(this.name));

    return this.limit(async () => {
      this.running += 1;
      try {
        return await task();
      } finally {
        this.running -= 1;
        // Joiners resume on a later turn, after the task's own consumers.
        if (this.running === 0) setImmediate(() => this.notifyIdle());
      }
    });
  }

  terminate(): void {
    this.terminated = true;
    this.limit.clearQueue();
  }

  join(): Promise<void> {
    if (this.running === 0) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private notifyIdle(): void {
    if (this.running > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
