import { describe, it } from "node:test";
import assert from "node:assert";
import { setTimeout as sleep } from "node:timers/promises";
import pino from "pino";
import { ChangeDetector } from "./detector.js";
import type { DetectorOptions } from "./detector.js";
import { MemoryCursorStore } from "./cursor.js";
import type { CursorStore } from "./cursor.js";
import { CallbackError, ConfigError, CursorPersistError, NormalizeError, SourceResetError } from "./errors.js";
import { buildContactFilter, FilterHolder } from "./filter.js";
import { ManualWakeSource } from "./wake.js";
import { MemoryRowSource } from "../store/memory-source.js";
import type { CursorState, Message, RawRow } from "../types/contracts.js";

const logger = pino({ level: "silent" });

function row(id: number, overrides: Partial<RawRow> = {}): RawRow {
  return {
    rowId: id,
    guid: `msg-${id}`,
    text: `m${id}`,
    attributedBody: null,
    date: 700_000_000 * 1e9 + id * 1e9,
    isFromMe: 0,
    service: "iMessage",
    handle: "+15550001111",
    chatIdentifier: "+15550001111",
    cacheHasAttachments: 0,
    associatedMessageGuid: null,
    associatedMessageType: 0,
    balloonBundleId: null,
    attachmentGuids: null,
    attachmentFilenames: null,
    attachmentMimeTypes: null,
    attachmentSizes: null,
    attachmentIsStickers: null,
    ...overrides
  };
}

function rows(...ids: number[]): RawRow[] {
  return ids.map((id) => row(id));
}

function setup(source: MemoryRowSource, opts: Partial<DetectorOptions> = {}) {
  const errors: Error[] = [];
  const cursorStore = opts.cursorStore ?? new MemoryCursorStore();
  const detector = new ChangeDetector({
    source,
    cursorStore,
    normalize: { attachmentsDir: "/nowhere", fileExists: () => false },
    logger,
    onError: (e) => errors.push(e),
    ...opts
  });
  const wake = new ManualWakeSource();
  const seen: number[] = [];
  const onMessage = (m: Message) => {
    seen.push(m.id);
  };
  return { detector, wake, seen, errors, cursorStore, onMessage };
}

class GatedSource extends MemoryRowSource {
  gate: Promise<void> | null = null;
  async fetchSince(lastSeenId: number, limit: number): Promise<RawRow[]> {
    if (this.gate) await this.gate;
    return super.fetchSince(lastSeenId, limit);
  }
}

describe("ChangeDetector", () => {
  it("delivers each new row once, in id order", async () => {
    const source = new MemoryRowSource([row(3), row(1), row(2)]);
    const t = setup(source);
    const handle = await t.detector.start(t.wake, t.onMessage);
    await t.detector.idle();
    assert.deepStrictEqual(t.seen, [1, 2, 3]);

    t.wake.fire();
    await t.detector.idle();
    assert.deepStrictEqual(t.seen, [1, 2, 3]);

    source.append(row(4));
    t.wake.fire();
    await t.detector.idle();
    assert.deepStrictEqual(t.seen, [1, 2, 3, 4]);
    assert.strictEqual(t.detector.stats().cursor.lastSeenId, 4);

    await t.detector.stop(handle);
    assert.strictEqual(t.detector.status, "stopped");
  });

  it("resumes from the persisted cursor after a restart", async () => {
    const source = new MemoryRowSource(rows(1, 2, 3));
    const store = new MemoryCursorStore();

    const first = setup(source, { cursorStore: store });
    const h1 = await first.detector.start(first.wake, first.onMessage);
    await first.detector.idle();
    await first.detector.stop(h1);

    source.append(row(4));
    const second = setup(source, { cursorStore: store });
    const h2 = await second.detector.start(second.wake, second.onMessage);
    await second.detector.idle();
    await second.detector.stop(h2);

    assert.deepStrictEqual(first.seen, [1, 2, 3]);
    assert.deepStrictEqual(second.seen, [4]);
  });

  it("advances the cursor past filtered rows", async () => {
    const source = new MemoryRowSource([
      row(5),
      row(6, { handle: "+15559999999", chatIdentifier: "+15559999999" }),
      row(7)
    ]);
    const { generation } = await source.snapshot();
    const store = new MemoryCursorStore({ lastSeenId: 4, generation });
    const filter = new FilterHolder(
      buildContactFilter({ inbound: { behavior: "blacklist", ids: ["+15559999999"] } })
    );
    const t = setup(source, { cursorStore: store, filter });

    const handle = await t.detector.start(t.wake, t.onMessage);
    await t.detector.idle();
    await t.detector.stop(handle);

    assert.deepStrictEqual(t.seen, [5, 7]);
    const saved = await store.load();
    assert.strictEqual(saved?.lastSeenId, 7);
    assert.strictEqual(t.detector.stats().filtered, 1);
  });

  it("skips rows it cannot normalize and reports them", async () => {
    const source = new MemoryRowSource([row(1), row(2, { text: null }), row(3)]);
    const t = setup(source);
    const handle = await t.detector.start(t.wake, t.onMessage);
    await t.detector.idle();
    await t.detector.stop(handle);

    assert.deepStrictEqual(t.seen, [1, 3]);
    assert.strictEqual(t.detector.stats().cursor.lastSeenId, 3);
    assert.strictEqual(t.errors.length, 1);
    const err = t.errors[0];
    assert.ok(err instanceof NormalizeError);
    assert.strictEqual(err.reason, "unrecognized");
    assert.strictEqual(err.rowId, 2);
  });

  it("rescans from zero when the store is replaced", async () => {
    const source = new MemoryRowSource(rows(1, 2, 3));
    const t = setup(source);
    const handle = await t.detector.start(t.wake, t.onMessage);
    await t.detector.idle();

    source.replace(rows(1, 2));
    t.wake.fire();
    await t.detector.idle();
    await t.detector.stop(handle);

    assert.deepStrictEqual(t.seen, [1, 2, 3, 1, 2]);
    assert.strictEqual(t.errors.length, 1);
    assert.ok(t.errors[0] instanceof SourceResetError);
    assert.strictEqual(t.detector.stats().resets, 1);
    assert.strictEqual(t.detector.stats().cursor.lastSeenId, 2);
  });

  it("rescans after the row count drops without redelivering surviving rows", async () => {
    const source = new MemoryRowSource(rows(1, 2, 3, 4, 5));
    const t = setup(source);
    const handle = await t.detector.start(t.wake, t.onMessage);
    await t.detector.idle();

    source.truncate((r) => r.rowId !== 3);
    t.wake.fire();
    await t.detector.idle();
    assert.deepStrictEqual(t.seen, [1, 2, 3, 4, 5]);
    assert.strictEqual(t.detector.stats().cursor.lastSeenId, 5);
    assert.strictEqual(t.detector.stats().resets, 1);
    assert.strictEqual(t.detector.stats().delivered, 5);
    const reset = t.errors[0];
    assert.ok(reset instanceof SourceResetError);
    assert.strictEqual(reset.next.rowCount, 4);

    source.append(row(6));
    t.wake.fire();
    await t.detector.idle();
    await t.detector.stop(handle);
    assert.deepStrictEqual(t.seen, [1, 2, 3, 4, 5, 6]);
  });

  it("coalesces wakes during a cycle into one follow-up", async () => {
    const source = new GatedSource(rows(1));
    let release: () => void = () => {};
    source.gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const t = setup(source);
    const handle = await t.detector.start(t.wake, t.onMessage);
    for (let i = 0; i < 5; i++) t.wake.fire();
    source.gate = null;
    release();
    await t.detector.idle();
    await t.detector.stop(handle);

    assert.strictEqual(source.fetches, 2);
    assert.strictEqual(t.detector.stats().cycles, 2);
    assert.deepStrictEqual(t.seen, [1]);
  });

  it("drains a backlog larger than one batch without further wakes", async () => {
    const source = new MemoryRowSource(rows(1, 2, 3, 4, 5));
    const t = setup(source, { maxBatchSize: 2 });
    const handle = await t.detector.start(t.wake, t.onMessage);
    await t.detector.idle();
    await t.detector.stop(handle);

    assert.deepStrictEqual(t.seen, [1, 2, 3, 4, 5]);
    assert.strictEqual(t.detector.stats().cycles, 3);
  });

  it("retries a locked store with backoff and recovers", async () => {
    const source = new MemoryRowSource(rows(1));
    const t = setup(source, { backoffBaseMs: 5, backoffMaxMs: 20 });
    const handle = await t.detector.start(t.wake, t.onMessage);
    await t.detector.idle();

    source.append(row(2));
    source.failNext(2);
    t.wake.fire();
    await t.detector.idle();
    await t.detector.stop(handle);

    assert.deepStrictEqual(t.seen, [1, 2]);
    assert.strictEqual(t.detector.stats().sourceErrors, 2);
  });

  it("abandons the cycle after the last retry and recovers on the next wake", async () => {
    const source = new MemoryRowSource(rows(1));
    const t = setup(source, { backoffBaseMs: 1, maxRetries: 2 });
    const handle = await t.detector.start(t.wake, t.onMessage);
    await t.detector.idle();

    source.append(row(2));
    source.failNext(3);
    t.wake.fire();
    await t.detector.idle();
    assert.deepStrictEqual(t.seen, [1]);
    assert.strictEqual(t.detector.stats().sourceErrors, 3);

    t.wake.fire();
    await t.detector.idle();
    await t.detector.stop(handle);
    assert.deepStrictEqual(t.seen, [1, 2]);
  });

  it("cancels a backoff wait on stop", async () => {
    const source = new MemoryRowSource(rows(1));
    const t = setup(source, { backoffBaseMs: 10_000, backoffMaxMs: 10_000 });
    const handle = await t.detector.start(t.wake, t.onMessage);
    await t.detector.idle();

    source.failNext(100);
    t.wake.fire();
    await sleep(20);

    const began = Date.now();
    await t.detector.stop(handle);
    assert.ok(Date.now() - began < 1000);
    assert.strictEqual(t.detector.stats().sourceErrors, 1);
    assert.strictEqual(t.detector.status, "stopped");
  });

  it("lets an in-flight cycle deliver and commit before stop resolves", async () => {
    const source = new GatedSource(rows(1, 2, 3));
    let release: () => void = () => {};
    source.gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const t = setup(source);
    const handle = await t.detector.start(t.wake, t.onMessage);
    await sleep(10);

    let stopped = false;
    const stopping = t.detector.stop(handle).then(() => {
      stopped = true;
    });
    await sleep(20);
    assert.strictEqual(stopped, false);
    assert.deepStrictEqual(t.seen, []);

    release();
    await stopping;
    assert.deepStrictEqual(t.seen, [1, 2, 3]);
    const saved = await t.cursorStore.load();
    assert.strictEqual(saved?.lastSeenId, 3);
    assert.strictEqual(t.detector.status, "stopped");
  });

  it("fails to start with ConfigError when the store is unreadable", async () => {
    const source = new MemoryRowSource();
    source.failNext(1);
    const t = setup(source);
    await assert.rejects(t.detector.start(t.wake, t.onMessage), ConfigError);
    assert.strictEqual(t.detector.status, "stopped");
  });

  it("refuses a second start while running", async () => {
    const t = setup(new MemoryRowSource());
    const handle = await t.detector.start(t.wake, t.onMessage);
    await assert.rejects(t.detector.start(t.wake, t.onMessage), { code: "already_running" });
    await t.detector.stop(handle);
  });

  it("keeps delivering when a subscriber throws", async () => {
    const source = new MemoryRowSource(rows(1, 2, 3));
    const t = setup(source);
    const seen: number[] = [];
    const handle = await t.detector.start(t.wake, (m) => {
      if (m.id === 2) throw new Error("subscriber broke");
      seen.push(m.id);
    });
    await t.detector.idle();
    await t.detector.stop(handle);

    assert.deepStrictEqual(seen, [1, 3]);
    assert.strictEqual(t.detector.stats().cursor.lastSeenId, 3);
    assert.strictEqual(t.detector.stats().callbackErrors, 1);
    const err = t.errors[0];
    assert.ok(err instanceof CallbackError);
    assert.strictEqual(err.messageId, 2);
  });

  it("starts at the newest row when asked for live messages only", async () => {
    const source = new MemoryRowSource(rows(1, 2, 3));
    const t = setup(source, { initialPosition: "latest" });
    const handle = await t.detector.start(t.wake, t.onMessage);
    await t.detector.idle();
    assert.deepStrictEqual(t.seen, []);

    source.append(row(4));
    t.wake.fire();
    await t.detector.idle();
    await t.detector.stop(handle);
    assert.deepStrictEqual(t.seen, [4]);
  });

  it("keeps the in-memory cursor when persisting fails", async () => {
    const broken: CursorStore = {
      async load(): Promise<CursorState | null> {
        return null;
      },
      async save(): Promise<void> {
        throw new Error("disk full");
      }
    };
    const source = new MemoryRowSource(rows(1, 2));
    const t = setup(source, { cursorStore: broken });
    const handle = await t.detector.start(t.wake, t.onMessage);
    await t.detector.idle();
    t.wake.fire();
    await t.detector.idle();
    await t.detector.stop(handle);

    assert.deepStrictEqual(t.seen, [1, 2]);
    assert.strictEqual(t.detector.stats().cursor.lastSeenId, 2);
    assert.ok(t.errors.length >= 1);
    assert.ok(t.errors.every((e) => e instanceof CursorPersistError));
  });
});
