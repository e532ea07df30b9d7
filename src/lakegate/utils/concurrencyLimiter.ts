import { LakegateError } from "../errors.js";
import { abortReason } from "./abort.js";

/**
 * Raised when a waiter gives up on a slot: queue timeout or drain.
 */
export class CapacityExceededError extends LakegateError {
  readonly retryAfterMs: number;

  constructor(message: string, retryAfterMs: number) {
    super("CAPACITY_EXCEEDED", message, { retryAfterMs });
    this.name = "CapacityExceededError";
    this.retryAfterMs = retryAfterMs;
  }
}

export type ConcurrencyLimiterOptions = {
  maxConcurrent: number;
  /** Longest wait for a slot (ms). 0 waits indefinitely */
  queueTimeoutMs?: number;
};

type Waiter = {
  grant(): void;
  refuse(err: Error): void;
};

/**
 * Slots for upstream calls.
 *
 * A task keeps its slot until the promise it returns settles, even when the
 * caller has stopped waiting for it. Freed slots pass straight to the oldest
 * waiter. A waiter leaves the queue on timeout, on drain, or when its signal
 * aborts.
 */
export class ConcurrencyLimiter {
  private readonly maxConcurrent: number;
  private readonly queueTimeoutMs: number;
  private active = 0;
  private readonly waiters: Waiter[] = [];

  constructor(options: number | ConcurrencyLimiterOptions) {
    const { maxConcurrent, queueTimeoutMs = 0 } =
      typeof options === "number" ? { maxConcurrent: options } : options;
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new LakegateError("CONFIG_INVALID", "maxConcurrent must be at least 1");
    }
    this.maxConcurrent = maxConcurrent;
    this.queueTimeoutMs = queueTimeoutMs;
  }

  get running(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  /**
   * Run `task` in a slot. `signal` withdraws a queued call; once the task has
   * started, stopping it is up to the task.
   *
   * @throws CapacityExceededError when the queue wait times out or the limiter drains
   */
  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      throw abortReason(signal);
    }
    if (this.active < this.maxConcurrent) {
      this.active++;
    } else {
      await this.enqueue(signal);
    }

    try {
      return await task();
    } finally {
      this.release();
    }
  }

  /**
   * Refuse every queued waiter. Running tasks keep their slots.
   * Returns how many waiters were refused.
   */
  drain(message = "Limiter drained"): number {
    const refused = this.waiters.splice(0);
    for (const waiter of refused) {
      waiter.refuse(new CapacityExceededError(message, 1000));
    }
    return refused.length;
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next.grant();
    } else {
      this.active--;
    }
  }

  private enqueue(signal: AbortSignal | undefined): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | undefined;

      const leave = (err: Error) => {
        const index = this.waiters.indexOf(waiter);
        if (index !== -1) {
          this.waiters.splice(index, 1);
        }
        waiter.refuse(err);
      };
      const onAbort = () => {
        if (signal) leave(abortReason(signal));
      };
      const settle = () => {
        if (timer !== undefined) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      const waiter: Waiter = {
        grant: () => {
          settle();
          resolve();
        },
        refuse: (err) => {
          settle();
          reject(err);
        }
      };

      if (this.queueTimeoutMs > 0) {
        timer = setTimeout(
          () => leave(new CapacityExceededError(`Queue wait exceeded ${this.queueTimeoutMs}ms timeout`, this.queueTimeoutMs)),
          this.queueTimeoutMs
        );
      }
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }
}
