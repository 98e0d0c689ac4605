import { describe, it } from "node:test";
import assert from "node:assert";
import { backoffDelay, cancellableSleep } from "./backoff.js";
import { fromDaysBack, fromHoursBack, inRange } from "./range.js";

describe("date ranges", () => {
  const now = new Date("2024-05-01T12:00:00.000Z");

  it("builds look-back windows ending now", () => {
    assert.deepStrictEqual(fromHoursBack(2, now), { start: new Date("2024-05-01T10:00:00.000Z"), end: now });
    assert.deepStrictEqual(fromDaysBack(1, now), { start: new Date("2024-04-30T12:00:00.000Z"), end: now });
  });

  it("includes both bounds and treats a missing bound as open", () => {
    const range = fromHoursBack(1, now);
    assert.strictEqual(inRange(now, range), true);
    assert.strictEqual(inRange(new Date("2024-05-01T11:00:00.000Z"), range), true);
    assert.strictEqual(inRange(new Date("2024-05-01T10:59:59.999Z"), range), false);
    assert.strictEqual(inRange(new Date("2030-01-01T00:00:00.000Z"), { start: now }), true);
    assert.strictEqual(inRange(new Date("1999-01-01T00:00:00.000Z"), {}), true);
  });
});

describe("backoff", () => {
  it("doubles from the base and stops at the cap", () => {
    assert.deepStrictEqual([0, 1, 2, 3, 10].map((a) => backoffDelay(a, 250, 1500)), [250, 500, 1000, 1500, 1500]);
  });

  it("ends a sleep early when aborted", async () => {
    const ctrl = new AbortController();
    const started = Date.now();
    const sleeping = cancellableSleep(10_000, ctrl.signal);
    ctrl.abort();
    assert.strictEqual(await sleeping, false);
    assert.ok(Date.now() - started < 1000);
    assert.strictEqual(await cancellableSleep(1, new AbortController().signal), true);
  });
});
