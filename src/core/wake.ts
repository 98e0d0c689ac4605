import chokidar from "chokidar";
import type { FSWatcher } from "chokidar";
import pino from "pino";
import type { Logger } from "pino";

export type WakeListener = (reason: string) => void;

/**
 * Posts wake-up hints to the detector. Sources never query the store
 * themselves; they only say "look again".
 */
export interface WakeSource {
  readonly name: string;
  start(onWake: WakeListener): void;
  stop(): void | Promise<void>;
}

export class TimerWakeSource implements WakeSource {
  readonly name = "timer";
  private timer: NodeJS.Timeout | null = null;

  constructor(private intervalMs: number) {
    if (!(intervalMs > 0)) throw new RangeError(`timer interval must be positive, got ${intervalMs}`);
  }

  start(onWake: WakeListener): void {
    if (this.timer) return;
    this.timer = setInterval(() => onWake(this.name), this.intervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }
}

/** The database file and the journal files SQLite writes beside it. */
export function storeFiles(dbPath: string): string[] {
  return [dbPath, `${dbPath}-wal`, `${dbPath}-shm`, `${dbPath}-journal`];
}

/**
 * Watches the database and its journal files. Bursts of writes collapse
 * into one wake `debounceMs` after the first event of the burst.
 */
export class FileWatchWakeSource implements WakeSource {
  readonly name = "file";
  private watcher: FSWatcher | null = null;
  private ready: Promise<void> = Promise.resolve();
  private pending: NodeJS.Timeout | null = null;
  private log: Logger;
  private debounceMs: number;
  events = 0;

  constructor(private dbPath: string, opts: { debounceMs?: number; logger?: Logger } = {}) {
    this.debounceMs = opts.debounceMs ?? 100;
    this.log = opts.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  }

  get active(): boolean {
    return this.watcher !== null;
  }

  /** Resolves once the initial scan is done and changes are being reported. */
  whenReady(): Promise<void> {
    return this.ready;
  }

  start(onWake: WakeListener): void {
    if (this.watcher) return;
    const watcher = chokidar.watch(storeFiles(this.dbPath), { persistent: true, ignoreInitial: true });
    this.watcher = watcher;
    this.ready = new Promise<void>((resolve) => watcher.once("ready", () => resolve()));

    watcher.on("all", (event, file) => {
      this.events++;
      this.log.trace({ event, file }, "wake: store file changed");
      if (this.pending) return;
      this.pending = setTimeout(() => {
        this.pending = null;
        onWake(this.name);
      }, this.debounceMs);
    });
    watcher.on("error", (err) => {
      this.log.warn({ err, dbPath: this.dbPath }, "wake: file watch failed, relying on timer");
    });
    this.log.debug({ dbPath: this.dbPath, debounceMs: this.debounceMs }, "wake: watching");
  }

  async stop(): Promise<void> {
    if (this.pending) clearTimeout(this.pending);
    this.pending = null;
    const watcher = this.watcher;
    this.watcher = null;
    await watcher?.close();
  }
}

/** Fires only when told to; used for programmatic triggers. */
export class ManualWakeSource implements WakeSource {
  readonly name = "manual";
  private listener: WakeListener | null = null;

  start(onWake: WakeListener): void {
    this.listener = onWake;
  }

  stop(): void {
    this.listener = null;
  }

  fire(): boolean {
    if (!this.listener) return false;
    this.listener(this.name);
    return true;
  }
}

/** Wakes whenever any of the given sources fires. */
export function anyOf(...sources: WakeSource[]): WakeSource {
  return {
    name: sources.map((s) => s.name).join("|"),
    start(onWake) {
      for (const s of sources) s.start(onWake);
    },
    async stop() {
      await Promise.all(sources.map((s) => s.stop()));
    }
  };
}
