import type { RateBudget } from "../types/contracts.js";

export type RateLimitMode = "block" | "fail";
export type AcquireResult = "ok" | "timeout" | "aborted";

export interface TokenBucketOptions {
  capacity: number;
  refillPerSecond: number;
  now?: () => number;
}

interface Waiter {
  settle: (r: AcquireResult) => void;
}

/**
 * Shared send budget. Tokens refill continuously up to `capacity`; callers
 * that have to wait are served strictly in arrival order.
 */
export class TokenBucket {
  private budget: RateBudget;
  private waiters: Waiter[] = [];
  private timer: NodeJS.Timeout | null = null;
  private now: () => number;

  constructor(opts: TokenBucketOptions) {
    validate(opts.capacity, opts.refillPerSecond);
    this.now = opts.now ?? Date.now;
    this.budget = {
      capacity: opts.capacity,
      refillPerSecond: opts.refillPerSecond,
      tokens: opts.capacity,
      lastRefillAt: this.now()
    };
  }

  snapshot(): RateBudget {
    this.refill();
    return { ...this.budget };
  }

  get queued(): number {
    return this.waiters.length;
  }

  /** Takes a token if one is free and nobody is queued ahead. */
  tryAcquire(): boolean {
    if (this.waiters.length > 0) return false;
    this.refill();
    if (this.budget.tokens < 1) return false;
    this.budget.tokens -= 1;
    return true;
  }

  acquire(opts: { timeoutMs: number; signal?: AbortSignal }): Promise<AcquireResult> {
    if (opts.signal?.aborted) return Promise.resolve("aborted");
    if (this.tryAcquire()) return Promise.resolve("ok");

    return new Promise<AcquireResult>((resolve) => {
      const onAbort = () => finish("aborted");
      const timeout = setTimeout(() => finish("timeout"), opts.timeoutMs);

      const waiter: Waiter = { settle: (r) => finish(r) };
      const finish = (r: AcquireResult) => {
        clearTimeout(timeout);
        opts.signal?.removeEventListener("abort", onAbort);
        const i = this.waiters.indexOf(waiter);
        if (i >= 0) this.waiters.splice(i, 1);
        if (this.waiters.length === 0 && this.timer) {
          clearTimeout(this.timer);
          this.timer = null;
        }
        resolve(r);
      };

      opts.signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
      this.schedule();
    });
  }

  /** Changes limits in place; current tokens are clamped to the new capacity. */
  reconfigure(next: { capacity?: number; refillPerSecond?: number }): void {
    this.refill();
    const capacity = next.capacity ?? this.budget.capacity;
    const refillPerSecond = next.refillPerSecond ?? this.budget.refillPerSecond;
    validate(capacity, refillPerSecond);
    this.budget.capacity = capacity;
    this.budget.refillPerSecond = refillPerSecond;
    this.budget.tokens = Math.min(this.budget.tokens, capacity);
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.schedule();
  }

  /** Settles every waiter with "aborted" and stops the refill timer. */
  close(): void {
    for (const w of [...this.waiters]) w.settle("aborted");
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  private refill(): void {
    const at = this.now();
    const elapsed = Math.max(0, at - this.budget.lastRefillAt) / 1000;
    this.budget.tokens = Math.min(this.budget.capacity, this.budget.tokens + elapsed * this.budget.refillPerSecond);
    this.budget.lastRefillAt = at;
  }

  private schedule(): void {
    if (this.timer || this.waiters.length === 0) return;
    this.refill();
    while (this.waiters.length > 0 && this.budget.tokens >= 1) {
      this.budget.tokens -= 1;
      const head = this.waiters[0];
      head.settle("ok");
    }
    if (this.waiters.length === 0 || this.budget.refillPerSecond <= 0) return;

    const waitMs = Math.ceil(((1 - this.budget.tokens) / this.budget.refillPerSecond) * 1000);
    this.timer = setTimeout(() => {
      this.timer = null;
      this.schedule();
    }, Math.max(1, waitMs));
  }
}

function validate(capacity: number, refillPerSecond: number): void {
  if (!(capacity >= 1)) throw new RangeError(`capacity must be at least 1, got ${capacity}`);
  if (!(refillPerSecond >= 0)) throw new RangeError(`refillPerSecond must not be negative, got ${refillPerSecond}`);
}
