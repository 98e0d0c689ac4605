import type { DateRange, RawRow, SourceSnapshot } from "../types/contracts.js";

/**
 * Read-only access to the message log. Implementations must not hold locks
 * between calls; the chat application keeps writing underneath.
 */
export interface RowSource {
  /** Generation marker and current row count; used to spot a replaced or truncated store. */
  snapshot(): Promise<SourceSnapshot>;

  /** Rows with id strictly greater than `lastSeenId`, ascending, at most `limit`. */
  fetchSince(lastSeenId: number, limit: number): Promise<RawRow[]>;

  /** Rows dated inside the inclusive range, newest first, at most `limit`. */
  fetchRange(range: DateRange, limit: number): Promise<RawRow[]>;

  latestId(): Promise<number>;

  close(): Promise<void>;
}
