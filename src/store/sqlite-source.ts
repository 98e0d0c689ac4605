import fs from "node:fs/promises";
import sqlite3 from "sqlite3";
import type { DateRange, RawRow, SourceSnapshot } from "../types/contracts.js";
import { SourceUnavailableError } from "../core/errors.js";
import { isoToStoreDate } from "../core/normalize.js";
import type { RowSource } from "./source.js";

type SqlParam = string | number | null;
type SqlRow = Record<string, unknown>;

const TRANSIENT = ["SQLITE_BUSY", "SQLITE_LOCKED", "SQLITE_CANTOPEN", "SQLITE_IOERR", "ENOENT", "EBUSY"];

function isTransient(err: unknown): boolean {
  if (!(err instanceof Error) || !("code" in err)) return false;
  const code = err.code;
  return typeof code === "string" && TRANSIENT.some((c) => code.startsWith(c));
}

function unavailable(err: unknown): unknown {
  if (!isTransient(err)) return err;
  const msg = err instanceof Error ? err.message : String(err);
  return new SourceUnavailableError(`message store unavailable: ${msg}`, { cause: err });
}

function open(dbPath: string): Promise<sqlite3.Database> {
  return new Promise((resolve, reject) => {
    const db = new sqlite3.Database(dbPath, sqlite3.OPEN_READONLY, (err) => (err ? reject(err) : resolve(db)));
  });
}

function close(db: sqlite3.Database): Promise<void> {
  return new Promise((resolve, reject) => {
    db.close((err) => (err ? reject(err) : resolve()));
  });
}

function all(db: sqlite3.Database, sql: string, params: SqlParam[] = []): Promise<SqlRow[]> {
  return new Promise((resolve, reject) => {
    db.all(sql, params, (err: Error | null, rows: unknown[]) => {
      if (err) return reject(err);
      resolve(rows.filter((r): r is SqlRow => typeof r === "object" && r !== null));
    });
  });
}

function str(v: unknown): string | null {
  if (typeof v === "string") return v;
  if (typeof v === "number") return String(v);
  return null;
}

function num(v: unknown): number | null {
  if (typeof v === "number") return v;
  if (typeof v === "bigint") return Number(v);
  return null;
}

function blob(v: unknown): Buffer | null {
  return Buffer.isBuffer(v) ? v : null;
}

function toRawRow(r: SqlRow): RawRow {
  return {
    rowId: num(r.rowId) ?? 0,
    guid: str(r.guid),
    text: str(r.text),
    attributedBody: blob(r.attributedBody),
    date: num(r.date),
    isFromMe: num(r.isFromMe),
    service: str(r.service),
    handle: str(r.handle),
    chatIdentifier: str(r.chatIdentifier),
    cacheHasAttachments: num(r.cacheHasAttachments),
    associatedMessageGuid: str(r.associatedMessageGuid),
    associatedMessageType: num(r.associatedMessageType),
    balloonBundleId: str(r.balloonBundleId),
    attachmentGuids: str(r.attachmentGuids),
    attachmentFilenames: str(r.attachmentFilenames),
    attachmentMimeTypes: str(r.attachmentMimeTypes),
    attachmentSizes: str(r.attachmentSizes),
    attachmentIsStickers: str(r.attachmentIsStickers)
  };
}

// char(31) separates the per-attachment values; see ATTACHMENT_SEPARATOR.
const SELECT_ROWS = `
  select
    m.ROWID as rowId,
    m.guid as guid,
    m.text as text,
    m.attributedBody as attributedBody,
    m.date as date,
    m.is_from_me as isFromMe,
    m.service as service,
    h.id as handle,
    (
      select c.chat_identifier from chat_message_join cmj
      join chat c on c.ROWID = cmj.chat_id
      where cmj.message_id = m.ROWID
      limit 1
    ) as chatIdentifier,
    m.cache_has_attachments as cacheHasAttachments,
    m.associated_message_guid as associatedMessageGuid,
    m.associated_message_type as associatedMessageType,
    m.balloon_bundle_id as balloonBundleId,
    group_concat(coalesce(a.guid, ''), char(31)) as attachmentGuids,
    group_concat(coalesce(a.filename, ''), char(31)) as attachmentFilenames,
    group_concat(coalesce(a.mime_type, ''), char(31)) as attachmentMimeTypes,
    group_concat(coalesce(a.total_bytes, ''), char(31)) as attachmentSizes,
    group_concat(coalesce(a.is_sticker, 0), char(31)) as attachmentIsStickers
  from message m
  left join handle h on h.ROWID = m.handle_id
  left join message_attachment_join maj on maj.message_id = m.ROWID
  left join attachment a on a.ROWID = maj.attachment_id
`;

/**
 * Reads the Messages database. Every call opens its own read-only
 * connection and closes it before returning, so the chat application's
 * writer is never blocked by a long-lived reader.
 */
export class SqliteRowSource implements RowSource {
  constructor(private dbPath: string) {}

  private async withDb<T>(fn: (db: sqlite3.Database) => Promise<T>): Promise<T> {
    let db: sqlite3.Database;
    try {
      db = await open(this.dbPath);
    } catch (err) {
      throw unavailable(err);
    }
    try {
      return await fn(db);
    } catch (err) {
      throw unavailable(err);
    } finally {
      await close(db);
    }
  }

  async snapshot(): Promise<SourceSnapshot> {
    let generation: string;
    try {
      const st = await fs.stat(this.dbPath);
      generation = `${st.ino}-${Math.trunc(st.birthtimeMs)}`;
    } catch (err) {
      throw unavailable(err);
    }
    const rows = await this.withDb((db) => all(db, `select count(*) as n from message`));
    return { generation, rowCount: num(rows[0]?.n) ?? 0 };
  }

  async fetchSince(lastSeenId: number, limit: number): Promise<RawRow[]> {
    const rows = await this.withDb((db) =>
      all(db, `${SELECT_ROWS} where m.ROWID > ? group by m.ROWID order by m.ROWID asc limit ?`, [lastSeenId, limit])
    );
    return rows.map(toRawRow);
  }

  async fetchRange(range: DateRange, limit: number): Promise<RawRow[]> {
    const where: string[] = [];
    const params: SqlParam[] = [];
    if (range.start) {
      where.push("m.date >= ?");
      params.push(isoToStoreDate(range.start));
    }
    if (range.end) {
      where.push("m.date <= ?");
      params.push(isoToStoreDate(range.end));
    }
    const clause = where.length ? `where ${where.join(" and ")}` : "";
    const rows = await this.withDb((db) =>
      all(db, `${SELECT_ROWS} ${clause} group by m.ROWID order by m.date desc limit ?`, [...params, limit])
    );
    return rows.map(toRawRow);
  }

  async latestId(): Promise<number> {
    const rows = await this.withDb((db) => all(db, `select max(ROWID) as id from message`));
    return num(rows[0]?.id) ?? 0;
  }

  async close(): Promise<void> {}
}
