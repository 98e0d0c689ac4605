import type { CursorState } from "../types/contracts.js";

export interface CursorStore {
  load(): Promise<CursorState | null>;
  save(state: CursorState): Promise<void>;
}

/** Immutable high-water mark; every change returns a new cursor. */
export class Cursor {
  private constructor(
    readonly lastSeenId: number,
    readonly generation: string,
    readonly rowCount?: number
  ) {}

  static zero(generation = ""): Cursor {
    return new Cursor(0, generation);
  }

  static from(state: CursorState): Cursor {
    const id = Number.isSafeInteger(state.lastSeenId) && state.lastSeenId > 0 ? state.lastSeenId : 0;
    return new Cursor(id, state.generation, state.rowCount);
  }

  /** Never moves backwards. */
  advance(id: number, rowCount = this.rowCount): Cursor {
    return new Cursor(Math.max(this.lastSeenId, id), this.generation, rowCount);
  }

  reset(generation: string, rowCount?: number): Cursor {
    return new Cursor(0, generation, rowCount);
  }

  /** Ids at or below the mark count as delivered. */
  covers(id: number): boolean {
    return id <= this.lastSeenId;
  }

  toState(): CursorState {
    const state: CursorState = { lastSeenId: this.lastSeenId, generation: this.generation };
    if (this.rowCount !== undefined) state.rowCount = this.rowCount;
    return state;
  }
}

export class MemoryCursorStore implements CursorStore {
  saves = 0;

  constructor(private state: CursorState | null = null) {}

  async load(): Promise<CursorState | null> {
    return this.state ? { ...this.state } : null;
  }

  async save(state: CursorState): Promise<void> {
    this.saves++;
    this.state = { ...state };
  }
}
