import { describe, it } from "node:test";
import assert from "node:assert";
import { TokenBucket } from "./bucket.js";

describe("TokenBucket", () => {
  it("hands out capacity tokens and then refuses", () => {
    const bucket = new TokenBucket({ capacity: 3, refillPerSecond: 1 });
    assert.strictEqual(bucket.tryAcquire(), true);
    assert.strictEqual(bucket.tryAcquire(), true);
    assert.strictEqual(bucket.tryAcquire(), true);
    assert.strictEqual(bucket.tryAcquire(), false);
  });

  it("refills continuously and never past capacity", () => {
    let now = 0;
    const bucket = new TokenBucket({ capacity: 2, refillPerSecond: 2, now: () => now });
    bucket.tryAcquire();
    bucket.tryAcquire();
    assert.strictEqual(bucket.tryAcquire(), false);

    now = 250;
    assert.strictEqual(bucket.tryAcquire(), false);
    now = 500;
    assert.strictEqual(bucket.tryAcquire(), true);

    now = 60_000;
    assert.strictEqual(bucket.snapshot().tokens, 2);
  });

  it("blocks the fourth of four immediate callers for at least a second", async () => {
    // Measured from before the bucket exists, on the same clock the bucket reads.
    const began = Date.now();
    const bucket = new TokenBucket({ capacity: 3, refillPerSecond: 1 });
    const results = await Promise.all(
      [1, 2, 3, 4].map((n) => bucket.acquire({ timeoutMs: 5000 }).then((r) => ({ n, r, at: Date.now() - began })))
    );

    assert.deepStrictEqual(results.map((x) => x.r), ["ok", "ok", "ok", "ok"]);
    assert.ok(results.slice(0, 3).every((x) => x.at < 1000));
    assert.ok(results[3].at >= 1000, `fourth caller waited only ${results[3].at}ms`);
    bucket.close();
  });

  it("times out a waiter", async () => {
    const bucket = new TokenBucket({ capacity: 1, refillPerSecond: 0.01 });
    bucket.tryAcquire();
    assert.strictEqual(await bucket.acquire({ timeoutMs: 30 }), "timeout");
    assert.strictEqual(bucket.queued, 0);
    bucket.close();
  });

  it("lets a waiter be cancelled", async () => {
    const bucket = new TokenBucket({ capacity: 1, refillPerSecond: 0.01 });
    bucket.tryAcquire();
    const ac = new AbortController();
    const pending = bucket.acquire({ timeoutMs: 10_000, signal: ac.signal });
    ac.abort();
    assert.strictEqual(await pending, "aborted");
    assert.strictEqual(bucket.queued, 0);
    bucket.close();
  });

  it("serves waiters in arrival order", async () => {
    const bucket = new TokenBucket({ capacity: 1, refillPerSecond: 20 });
    bucket.tryAcquire();
    const order: number[] = [];
    const waits = [1, 2, 3].map((n) =>
      bucket.acquire({ timeoutMs: 2000 }).then((r) => {
        order.push(n);
        return r;
      })
    );
    assert.strictEqual(bucket.tryAcquire(), false);
    assert.deepStrictEqual(await Promise.all(waits), ["ok", "ok", "ok"]);
    assert.deepStrictEqual(order, [1, 2, 3]);
    bucket.close();
  });

  it("never grants more than the budget to concurrent callers", async () => {
    const bucket = new TokenBucket({ capacity: 5, refillPerSecond: 0.01 });
    const results = await Promise.all(
      Array.from({ length: 8 }, () => bucket.acquire({ timeoutMs: 50 }))
    );
    assert.strictEqual(results.filter((r) => r === "ok").length, 5);
    assert.strictEqual(results.filter((r) => r === "timeout").length, 3);
    bucket.close();
  });

  it("clamps tokens when the capacity shrinks", () => {
    const bucket = new TokenBucket({ capacity: 10, refillPerSecond: 1 });
    bucket.reconfigure({ capacity: 2 });
    assert.strictEqual(bucket.snapshot().capacity, 2);
    assert.ok(bucket.snapshot().tokens <= 2);
    assert.throws(() => bucket.reconfigure({ capacity: 0 }), RangeError);
  });
});
