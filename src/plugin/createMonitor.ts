import pino from "pino";
import type { Logger } from "pino";
import type { Ack, DateRange, Message, Result, SendPayload } from "../types/contracts.js";
import { ChangeDetector } from "../core/detector.js";
import type { DetectorHandle, DetectorStats, InitialPosition } from "../core/detector.js";
import type { CursorStore } from "../core/cursor.js";
import type { Subscriber } from "../core/dispatch.js";
import { MonitorError } from "../core/errors.js";
import type { OutboundError } from "../core/errors.js";
import { admit, buildContactFilter, FilterHolder, OPEN_FILTER } from "../core/filter.js";
import type { ContactFilter } from "../core/filter.js";
import { normalize } from "../core/normalize.js";
import type { NormalizeOptions } from "../core/normalize.js";
import type { WakeSource } from "../core/wake.js";
import { TokenBucket } from "../outbound/bucket.js";
import type { RateLimitMode } from "../outbound/bucket.js";
import { OutboundRouter } from "../outbound/router.js";
import type { OutboundStats, SendOptions } from "../outbound/router.js";
import type { Sender } from "../outbound/sender.js";
import type { RowSource } from "../store/source.js";

export interface MonitorArgs {
  source: RowSource;
  cursorStore: CursorStore;
  wake: WakeSource;
  normalize: NormalizeOptions;
  contactFilter?: ContactFilter;
  detector?: {
    maxBatchSize?: number;
    backoffBaseMs?: number;
    backoffMaxMs?: number;
    maxRetries?: number;
    initialPosition?: InitialPosition;
  };
  outbound: {
    senders: Sender[];
    defaultBackend: string;
    capacity: number;
    refillPerSecond: number;
    mode?: RateLimitMode;
    timeoutMs?: number;
    fileExists?: (p: string) => boolean;
  };
  recentLimit?: number;
  logger?: Logger;
  onError?: (err: Error) => void;
}

export interface MonitorStats {
  detector: DetectorStats;
  outbound: OutboundStats;
  errors: Record<string, number>;
  lastError: { code: string; message: string; at: string } | null;
  recent: number;
}

export interface Reconfiguration {
  contactFilter?: unknown;
  rate?: { capacity?: number; refillPerSecond?: number; mode?: RateLimitMode; timeoutMs?: number };
}

export type Monitor = ReturnType<typeof createMonitor>;

const MAX_QUERY_SCAN = 10_000;

/**
 * Wires the detector, filter, dispatch and outbound router into one object
 * with the lifecycle the server and embedding callers use.
 */
export function createMonitor(args: MonitorArgs) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const recentLimit = args.recentLimit ?? 200;
  const filter = new FilterHolder(args.contactFilter ?? OPEN_FILTER);

  const errors: Record<string, number> = {};
  let lastError: MonitorStats["lastError"] = null;
  function onError(err: Error) {
    const code = err instanceof MonitorError ? err.code : "internal";
    errors[code] = (errors[code] ?? 0) + 1;
    lastError = { code, message: err.message, at: new Date().toISOString() };
    args.onError?.(err);
  }

  const detector = new ChangeDetector({
    source: args.source,
    cursorStore: args.cursorStore,
    normalize: args.normalize,
    filter,
    ...args.detector,
    logger: log,
    onError
  });

  const bucket = new TokenBucket({ capacity: args.outbound.capacity, refillPerSecond: args.outbound.refillPerSecond });
  const router = new OutboundRouter({
    senders: args.outbound.senders,
    defaultBackend: args.outbound.defaultBackend,
    bucket,
    mode: args.outbound.mode,
    timeoutMs: args.outbound.timeoutMs,
    filter,
    fileExists: args.outbound.fileExists,
    logger: log
  });

  const recentMessages: Message[] = [];
  function remember(m: Message) {
    recentMessages.push(m);
    if (recentMessages.length > recentLimit) recentMessages.splice(0, recentMessages.length - recentLimit);
  }

  let handle: DetectorHandle | null = null;
  let unsubscribeStarter: (() => void) | null = null;

  async function start(onMessage?: Subscriber): Promise<DetectorHandle> {
    if (handle) return handle;
    const off = onMessage ? detector.dispatch.subscribe(onMessage) : null;
    try {
      handle = await detector.start(args.wake, remember);
    } catch (err) {
      off?.();
      throw err;
    }
    unsubscribeStarter = off;
    return handle;
  }

  async function stop(): Promise<void> {
    if (!handle) return;
    const h = handle;
    handle = null;
    await detector.stop(h);
    unsubscribeStarter?.();
    unsubscribeStarter = null;
  }

  /** Stops, settles queued sends and releases the source. */
  async function close(): Promise<void> {
    await stop();
    bucket.close();
    await args.source.close();
  }

  function subscribe(cb: Subscriber): () => void {
    return detector.dispatch.subscribe(cb);
  }

  /** Swaps the contact filter and rate budget without a restart. */
  function reconfigure(next: Reconfiguration): ContactFilter {
    if (next.rate) router.reconfigure(next.rate);
    if (next.contactFilter !== undefined) {
      filter.swap(buildContactFilter(next.contactFilter));
      log.info({ inbound: filter.current().inbound.behavior, outbound: filter.current().outbound.behavior }, "monitor: filter replaced");
    }
    return filter.current();
  }

  /**
   * One-off read of a date range, passed through the live filter. Newest
   * first. Widens the read until `limit` messages pass or the range runs out.
   */
  async function query(range: DateRange, limit = 100): Promise<Message[]> {
    if (limit <= 0) return [];
    const maxScan = Math.max(limit, MAX_QUERY_SCAN);
    for (let fetchSize = limit; ; fetchSize = Math.min(fetchSize * 4, maxScan)) {
      const rows = await args.source.fetchRange(range, fetchSize);
      const current = filter.current();
      const out: Message[] = [];
      for (const row of rows) {
        const m = normalize(row, args.normalize);
        if (!m.ok) {
          log.debug({ rowId: row.rowId, reason: m.error.reason }, "query: row skipped");
          continue;
        }
        if (admit(m.value, current)) out.push(m.value);
        if (out.length === limit) return out;
      }
      if (rows.length < fetchSize || fetchSize >= maxScan) return out;
    }
  }

  function recent(limit = recentLimit): Message[] {
    if (limit <= 0) return [];
    return recentMessages.slice(-limit).reverse();
  }

  function send(
    recipient: string,
    payload: SendPayload,
    backend?: string,
    opts?: SendOptions
  ): Promise<Result<Ack, OutboundError>> {
    return router.send(recipient, payload, backend, opts);
  }

  function stats(): MonitorStats {
    return {
      detector: detector.stats(),
      outbound: router.stats(),
      errors: { ...errors },
      lastError,
      recent: recentMessages.length
    };
  }

  return {
    start,
    stop,
    close,
    subscribe,
    reconfigure,
    query,
    recent,
    send,
    stats,
    trigger: () => detector.trigger(),
    idle: () => detector.idle(),
    backends: () => router.backends()
  };
}
