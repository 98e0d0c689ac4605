import fs from "node:fs/promises";
import path from "node:path";
import pino from "pino";
import type { Logger } from "pino";
import { z } from "zod";
import type { CursorState } from "../types/contracts.js";
import type { CursorStore } from "../core/cursor.js";

const CursorFileSchema = z.object({
  lastSeenId: z.number().int().nonnegative(),
  generation: z.string(),
  rowCount: z.number().int().nonnegative().optional(),
  savedAt: z.string().optional()
});

/**
 * Keeps the cursor in a small JSON file. Writes go to a temporary file that
 * is renamed over the old one, so a crash leaves either the old or the new
 * cursor on disk.
 */
export class FileCursorStore implements CursorStore {
  private filePath: string;
  private log: Logger;

  constructor(dataDir: string, opts: { fileName?: string; logger?: Logger } = {}) {
    this.filePath = path.join(dataDir, opts.fileName ?? "cursor.json");
    this.log = opts.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  }

  get path(): string {
    return this.filePath;
  }

  async load(): Promise<CursorState | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.log.warn({ err, file: this.filePath }, "cursor: unreadable file ignored");
      return null;
    }

    const parsed = CursorFileSchema.safeParse(json);
    if (!parsed.success) {
      this.log.warn({ file: this.filePath, issues: parsed.error.issues }, "cursor: invalid file ignored");
      return null;
    }
    const { lastSeenId, generation, rowCount } = parsed.data;
    return rowCount === undefined ? { lastSeenId, generation } : { lastSeenId, generation, rowCount };
  }

  async save(state: CursorState): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    await fs.writeFile(tmp, JSON.stringify({ ...state, savedAt: new Date().toISOString() }, null, 2), "utf8");
    await fs.rename(tmp, this.filePath);
  }
}
