import { nanoid } from "nanoid";
import type { DateRange, RawRow, SourceSnapshot } from "../types/contracts.js";
import { SourceUnavailableError } from "../core/errors.js";
import { storeDateToIso } from "../core/normalize.js";
import { inRange } from "../core/range.js";
import type { RowSource } from "./source.js";

/**
 * In-process row source. Backs tests and callers that feed rows from
 * somewhere other than the chat database.
 */
export class MemoryRowSource implements RowSource {
  private rows: RawRow[] = [];
  private generation = nanoid();
  private failures = 0;
  fetches = 0;

  constructor(rows: RawRow[] = []) {
    this.append(...rows);
  }

  append(...rows: RawRow[]): void {
    this.rows.push(...rows);
    this.rows.sort((a, b) => a.rowId - b.rowId);
  }

  /** Simulates the store being deleted and recreated. */
  replace(rows: RawRow[] = []): void {
    this.rows = [];
    this.generation = nanoid();
    this.append(...rows);
  }

  /** Drops rows without changing the generation marker. */
  truncate(keep: (row: RawRow) => boolean = () => false): void {
    this.rows = this.rows.filter(keep);
  }

  /** The next `count` calls fail as if the database were locked. */
  failNext(count = 1): void {
    this.failures += count;
  }

  private check(): void {
    if (this.failures > 0) {
      this.failures--;
      throw new SourceUnavailableError("database is locked");
    }
  }

  async snapshot(): Promise<SourceSnapshot> {
    this.check();
    return { generation: this.generation, rowCount: this.rows.length };
  }

  async fetchSince(lastSeenId: number, limit: number): Promise<RawRow[]> {
    this.check();
    this.fetches++;
    return this.rows.filter((r) => r.rowId > lastSeenId).slice(0, limit);
  }

  async fetchRange(range: DateRange, limit: number): Promise<RawRow[]> {
    this.check();
    return this.rows
      .filter((r) => {
        const iso = storeDateToIso(r.date);
        return iso !== null && inRange(new Date(iso), range);
      })
      .sort((a, b) => (b.date ?? 0) - (a.date ?? 0))
      .slice(0, limit);
  }

  async latestId(): Promise<number> {
    this.check();
    return this.rows.reduce((max, r) => Math.max(max, r.rowId), 0);
  }

  async close(): Promise<void> {}
}
