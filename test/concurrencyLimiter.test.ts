import { describe, expect, it } from "vitest";
import { CapacityExceededError, ConcurrencyLimiter } from "../src/lakegate/utils/concurrencyLimiter.js";
import { LakegateError } from "../src/lakegate/errors.js";

describe("ConcurrencyLimiter", () => {
  it("runs tasks up to maxConcurrent", async () => {
    const limiter = new ConcurrencyLimiter(2);
    let running = 0;
    let maxRunning = 0;

    const tasks = Array.from({ length: 5 }, () =>
      limiter.run(async () => {
        running++;
        maxRunning = Math.max(maxRunning, running);
        await new Promise((r) => setTimeout(r, 10));
        running--;
        return "done";
      })
    );

    await Promise.all(tasks);
    expect(maxRunning).toBe(2);
  });

  it("queues tasks when at capacity", async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: number[] = [];

    const task1 = limiter.run(async () => {
      await new Promise((r) => setTimeout(r, 20));
      order.push(1);
    });

    const task2 = limiter.run(async () => {
      order.push(2);
    });

    expect(limiter.running).toBe(1);
    expect(limiter.queued).toBe(1);

    await Promise.all([task1, task2]);
    expect(order).toEqual([1, 2]);
    expect(limiter.running).toBe(0);
  });

  it("handles errors without breaking queue", async () => {
    const limiter = new ConcurrencyLimiter(1);
    const results: string[] = [];

    const task1 = limiter.run(async () => {
      throw new Error("fail");
    }).catch(() => results.push("error1"));

    const task2 = limiter.run(async () => {
      results.push("ok2");
    });

    await Promise.all([task1, task2]);
    expect(results).toContain("error1");
    expect(results).toContain("ok2");
    expect(results.length).toBe(2);
  });

  it("throws CONFIG_INVALID on invalid maxConcurrent", () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow(LakegateError);
    expect(() => new ConcurrencyLimiter({ maxConcurrent: -1 })).toThrow("maxConcurrent must be at least 1");
  });

  it("rejects queued tasks after the queue timeout", async () => {
    const limiter = new ConcurrencyLimiter({ maxConcurrent: 1, queueTimeoutMs: 10 });
    let release: () => void = () => undefined;
    const blocker = limiter.run(() => new Promise<void>((resolve) => { release = resolve; }));

    const queued = limiter.run(async () => "never");
    await expect(queued).rejects.toBeInstanceOf(CapacityExceededError);
    expect(limiter.queued).toBe(0);

    release();
    await blocker;
  });

  it("drain refuses every waiter and keeps running tasks", async () => {
    const limiter = new ConcurrencyLimiter(1);
    let release: () => void = () => undefined;
    const blocker = limiter.run(() => new Promise<void>((resolve) => { release = resolve; }));

    const a = limiter.run(async () => "a");
    const b = limiter.run(async () => "b");
    expect(limiter.drain("shutting down")).toBe(2);

    await Promise.all([
      expect(a).rejects.toMatchObject({ code: "CAPACITY_EXCEEDED", retryAfterMs: 1000 }),
      expect(b).rejects.toThrow("shutting down")
    ]);
    expect(limiter.running).toBe(1);

    release();
    await blocker;
    expect(limiter.running).toBe(0);
  });

  it("withdraws a queued task when its signal aborts", async () => {
    const limiter = new ConcurrencyLimiter(1);
    let release: () => void = () => undefined;
    const blocker = limiter.run(() => new Promise<void>((resolve) => { release = resolve; }));

    const controller = new AbortController();
    let started = false;
    const queued = limiter.run(async () => {
      started = true;
    }, controller.signal);
    expect(limiter.queued).toBe(1);

    controller.abort(new Error("caller left"));
    await expect(queued).rejects.toThrow("caller left");
    expect(limiter.queued).toBe(0);

    release();
    await blocker;
    expect(started).toBe(false);
    expect(limiter.running).toBe(0);
  });

  it("refuses an already-aborted signal without taking a slot", async () => {
    const limiter = new ConcurrencyLimiter(1);
    const controller = new AbortController();
    controller.abort(new Error("gone"));
    await expect(limiter.run(async () => "x", controller.signal)).rejects.toThrow("gone");
    expect(limiter.running).toBe(0);
  });

  it("hands a freed slot to the oldest waiter", async () => {
    const limiter = new ConcurrencyLimiter(1);
    const order: string[] = [];
    let release: () => void = () => undefined;
    const first = limiter.run(() => new Promise<void>((resolve) => { release = resolve; }));
    const second = limiter.run(async () => { order.push("second"); });

    release();
    const late = limiter.run(async () => { order.push("late"); });
    await Promise.all([first, second, late]);
    expect(order).toEqual(["second", "late"]);
  });
});
