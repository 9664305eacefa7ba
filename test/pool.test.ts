import { describe, test, expect } from "vitest";
import { PoolTerminatedError, WorkerPool } from "../src/runtime/pool";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("WorkerPool", () => {
  test("never runs more tasks than it has slots", async () => {
    const pool = new WorkerPool("test", 2);
    let running = 0;
    let peak = 0;

    await Promise.all(
      Array.from({ length: 6 }, () =>
        pool.run(async () => {
          running++;
          peak = Math.max(peak, running);
          await tick();
          running--;
        })
      )
    );

    expect(peak).toBe(2);
  });

  test("returns the task result", async () => {
    const pool = new WorkerPool("test", 1);
    await expect(pool.run(() => 42)).resolves.toBe(42);
  });

  test("terminate drops queued tasks and join waits for started ones", async () => {
    const pool = new WorkerPool("test", 1);
    const gate = deferred();
    const started: string[] = [];

    void pool.run(async () => {
      started.push("first");
      await gate.promise;
    });
    void pool.run(() => {
      started.push("second");
    });
    await tick();

    expect(pool.activeCount).toBe(1);
    expect(pool.pendingCount).toBe(1);

    pool.terminate();
    expect(pool.pendingCount).toBe(0);

    let joined = false;
    const joining = pool.join().then(() => {
      joined = true;
    });
    await tick();
    expect(joined).toBe(false);

    gate.resolve();
    await joining;
    expect(joined).toBe(true);
    expect(started).toEqual(["first"]);
  });

  test("refuses work after terminate", async () => {
    const pool = new WorkerPool("handler", 1);
    pool.terminate();
    expect(pool.isTerminated).toBe(true);
    await expect(pool.run(() => 1)).rejects.toThrow(PoolTerminatedError);
    await expect(pool.run(() => 1)).rejects.toThrow("The handler pool has been terminated");
  });

  test("join resolves at once when idle", async () => {
    await expect(new WorkerPool("test", 1).join()).resolves.toBeUndefined();
  });
});
