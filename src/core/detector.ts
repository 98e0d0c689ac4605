import { nanoid } from "nanoid";
import pino from "pino";
import type { Logger } from "pino";
import type { CursorState, SourceSnapshot } from "../types/contracts.js";
import type { RowSource } from "../store/source.js";
import { backoffDelay, cancellableSleep } from "./backoff.js";
import { Cursor } from "./cursor.js";
import type { CursorStore } from "./cursor.js";
import { DispatchQueue } from "./dispatch.js";
import type { Subscriber } from "./dispatch.js";
import {
  ConfigError,
  CursorPersistError,
  MonitorError,
  SourceResetError,
  SourceUnavailableError,
  errorMessage
} from "./errors.js";
import { admit, FilterHolder } from "./filter.js";
import { normalize } from "./normalize.js";
import type { NormalizeOptions } from "./normalize.js";
import type { WakeSource } from "./wake.js";

export type DetectorState = "stopped" | "starting" | "running" | "stopping";
export type InitialPosition = "start" | "latest";

export interface DetectorHandle {
  readonly id: string;
  readonly startedAt: string;
}

export interface DetectorOptions {
  source: RowSource;
  cursorStore: CursorStore;
  normalize: NormalizeOptions;
  filter?: FilterHolder;
  maxBatchSize?: number;
  backoffBaseMs?: number;
  backoffMaxMs?: number;
  maxRetries?: number;
  initialPosition?: InitialPosition;
  logger?: Logger;
  onError?: (err: Error) => void;
}

export interface DetectorStats {
  state: DetectorState;
  cycles: number;
  delivered: number;
  filtered: number;
  skipped: number;
  callbackErrors: number;
  sourceErrors: number;
  resets: number;
  cursor: CursorState;
  lastCycleAt: string | null;
}

/**
 * Drives the poll cycle: wake, query past the cursor, normalize, filter,
 * deliver, commit. One cycle runs at a time; wakes arriving meanwhile fold
 * into a single follow-up.
 */
export class ChangeDetector {
  readonly dispatch: DispatchQueue;
  readonly filter: FilterHolder;

  private source: RowSource;
  private cursorStore: CursorStore;
  private normalizeOpts: NormalizeOptions;
  private maxBatchSize: number;
  private backoffBaseMs: number;
  private backoffMaxMs: number;
  private maxRetries: number;
  private initialPosition: InitialPosition;
  private log: Logger;
  private onError: (err: Error) => void;

  private state: DetectorState = "stopped";
  private cursor: Cursor = Cursor.zero();
  private handle: DetectorHandle | null = null;
  private wake: WakeSource | null = null;
  private unsubscribe: (() => void) | null = null;
  private abort = new AbortController();
  private inFlight: Promise<void> | null = null;
  private pending = false;

  private counters = {
    cycles: 0,
    delivered: 0,
    filtered: 0,
    skipped: 0,
    callbackErrors: 0,
    sourceErrors: 0,
    resets: 0
  };
  private lastCycleAt: string | null = null;

  constructor(opts: DetectorOptions) {
    this.source = opts.source;
    this.cursorStore = opts.cursorStore;
    this.normalizeOpts = opts.normalize;
    this.filter = opts.filter ?? new FilterHolder();
    this.maxBatchSize = opts.maxBatchSize ?? 100;
    this.backoffBaseMs = opts.backoffBaseMs ?? 250;
    this.backoffMaxMs = opts.backoffMaxMs ?? 30_000;
    this.maxRetries = opts.maxRetries ?? 5;
    this.initialPosition = opts.initialPosition ?? "start";
    this.log = opts.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
    this.onError = opts.onError ?? (() => {});

    if (!(this.maxBatchSize > 0)) throw new ConfigError(`maxBatchSize must be positive, got ${this.maxBatchSize}`);

    this.dispatch = new DispatchQueue({
      logger: this.log,
      onError: (err) => this.report(err)
    });
  }

  get status(): DetectorState {
    return this.state;
  }

  async start(wake: WakeSource, onMessage: Subscriber): Promise<DetectorHandle> {
    if (this.state !== "stopped") {
      throw new MonitorError("already_running", `detector is ${this.state}`);
    }
    this.state = "starting";

    try {
      let snapshot: SourceSnapshot;
      try {
        snapshot = await this.source.snapshot();
      } catch (err) {
        throw new ConfigError(`message store is not readable: ${errorMessage(err)}`, { cause: err });
      }

      const persisted = await this.cursorStore.load();
      if (persisted) {
        this.cursor = Cursor.from(persisted);
      } else if (this.initialPosition === "latest") {
        this.cursor = Cursor.zero(snapshot.generation).advance(await this.source.latestId(), snapshot.rowCount);
      } else {
        this.cursor = Cursor.zero(snapshot.generation);
      }
    } catch (err) {
      this.state = "stopped";
      throw err;
    }

    this.dispatch.resetGeneration(this.cursor.generation);
    this.unsubscribe = this.dispatch.subscribe(onMessage);
    this.abort = new AbortController();
    this.wake = wake;
    this.handle = { id: nanoid(), startedAt: new Date().toISOString() };
    this.state = "running";

    wake.start((reason) => {
      this.log.debug({ reason }, "detector: wake");
      this.trigger();
    });
    this.log.info({ handle: this.handle.id, wake: wake.name, cursor: this.cursor.toState() }, "detector: started");

    this.trigger();
    return this.handle;
  }

  /** Lets the running cycle commit, cancels any backoff wait. */
  async stop(handle: DetectorHandle): Promise<void> {
    if (!this.handle || this.handle.id !== handle.id || this.state !== "running") return;
    this.state = "stopping";
    this.pending = false;
    this.abort.abort();
    const wake = this.wake;
    this.wake = null;
    await wake?.stop();

    await this.idle();

    this.unsubscribe?.();
    this.unsubscribe = null;
    this.handle = null;
    this.state = "stopped";
    this.log.info({ cursor: this.cursor.toState() }, "detector: stopped");
  }

  /** Requests a cycle; coalesces with the one in flight. */
  trigger(): void {
    if (this.state !== "running") return;
    if (this.inFlight) {
      this.pending = true;
      return;
    }
    this.inFlight = this.drain().finally(() => {
      this.inFlight = null;
    });
  }

  /** Resolves once no cycle is running. */
  async idle(): Promise<void> {
    while (this.inFlight) await this.inFlight;
  }

  stats(): DetectorStats {
    return {
      state: this.state,
      ...this.counters,
      cursor: this.cursor.toState(),
      lastCycleAt: this.lastCycleAt
    };
  }

  private async drain(): Promise<void> {
    do {
      this.pending = false;
      const full = await this.cycleWithRetry();
      if (full) this.pending = true;
    } while (this.pending && this.state === "running");
  }

  private async cycleWithRetry(): Promise<boolean> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.runCycle();
      } catch (err) {
        if (!(err instanceof SourceUnavailableError)) {
          this.log.error({ err }, "detector: cycle failed");
          this.report(err instanceof Error ? err : new Error(String(err)));
          return false;
        }

        this.counters.sourceErrors++;
        this.report(err);
        if (attempt >= this.maxRetries || this.state !== "running") {
          this.log.error({ err, attempts: attempt + 1 }, "detector: source unavailable, cycle abandoned");
          return false;
        }

        const waitMs = backoffDelay(attempt, this.backoffBaseMs, this.backoffMaxMs);
        this.log.warn({ err, attempt, waitMs }, "detector: source unavailable, backing off");
        if (!(await cancellableSleep(waitMs, this.abort.signal))) return false;
      }
    }
  }

  /** One pass over the source. True when the batch came back full. */
  private async runCycle(): Promise<boolean> {
    const snapshot = await this.source.snapshot();
    this.checkGeneration(snapshot);

    const rows = await this.source.fetchSince(this.cursor.lastSeenId, this.maxBatchSize);
    const filter = this.filter.current();
    let highest = this.cursor.lastSeenId;

    for (const row of [...rows].sort((a, b) => a.rowId - b.rowId)) {
      if (this.cursor.covers(row.rowId)) {
        this.counters.skipped++;
        continue;
      }
      highest = Math.max(highest, row.rowId);

      const out = normalize(row, this.normalizeOpts);
      if (!out.ok) {
        this.counters.skipped++;
        this.log.warn({ rowId: row.rowId, reason: out.error.reason }, "detector: row skipped");
        this.report(out.error);
        continue;
      }

      if (!admit(out.value, filter)) {
        this.counters.filtered++;
        continue;
      }

      const report = await this.dispatch.deliver(out.value);
      if (report.delivered) this.counters.delivered++;
      this.counters.callbackErrors += report.failures;
    }

    this.cursor = this.cursor.advance(highest, snapshot.rowCount);
    await this.persist();

    this.counters.cycles++;
    this.lastCycleAt = new Date().toISOString();
    if (rows.length > 0) {
      this.log.debug({ fetched: rows.length, cursor: this.cursor.lastSeenId }, "detector: cycle done");
    }
    return rows.length >= this.maxBatchSize;
  }

  private checkGeneration(snapshot: SourceSnapshot): void {
    const current = this.cursor;
    if (current.generation === "") {
      this.cursor = Cursor.from({ ...current.toState(), generation: snapshot.generation });
      return;
    }

    const replaced = current.generation !== snapshot.generation;
    const shrunk = current.rowCount !== undefined && snapshot.rowCount < current.rowCount;
    if (!replaced && !shrunk) return;

    const err = new SourceResetError(
      replaced
        ? "message store was replaced"
        : `message store shrank from ${current.rowCount} to ${snapshot.rowCount} rows`,
      current.toState(),
      snapshot
    );
    this.cursor = current.reset(snapshot.generation, snapshot.rowCount);
    // A shrunk store keeps its ids, so rows still present were already delivered.
    if (replaced) this.dispatch.resetGeneration(snapshot.generation);
    this.counters.resets++;
    this.log.warn({ previous: err.previous, next: err.next }, "detector: source reset, rescanning from zero");
    this.report(err);
  }

  private async persist(): Promise<void> {
    try {
      await this.cursorStore.save(this.cursor.toState());
    } catch (cause) {
      const err = new CursorPersistError(`cursor not saved: ${errorMessage(cause)}`, { cause });
      this.log.error({ err: cause, cursor: this.cursor.lastSeenId }, "detector: cursor persist failed");
      this.report(err);
    }
  }

  private report(err: Error): void {
    try {
      this.onError(err);
    } catch (cause) {
      this.log.error({ err: cause }, "detector: error handler threw");
    }
  }
}
