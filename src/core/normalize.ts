import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ATTACHMENT_SEPARATOR } from "../types/contracts.js";
import type { AttachmentRef, Message, MessageKind, RawRow, Result } from "../types/contracts.js";
import { NormalizeError } from "./errors.js";

// Seconds between the Unix epoch and 2001-01-01T00:00:00Z, the store's epoch.
const STORE_EPOCH_MS = 978_307_200_000;

const TAPBACKS: Record<number, string> = {
  0: "❤️",
  1: "👍",
  2: "👎",
  3: "😂",
  4: "‼️",
  5: "❓"
};

export interface NormalizeOptions {
  attachmentsDir: string;
  fileExists?: (p: string) => boolean;
}

/**
 * Store dates are nanoseconds since 2001-01-01 on current databases and
 * seconds on legacy ones.
 */
export function storeDateToIso(date: number | null): string | null {
  if (date === null || !Number.isFinite(date)) return null;
  const ms = Math.abs(date) > 1e11 ? date / 1e6 : date * 1000;
  const d = new Date(STORE_EPOCH_MS + ms);
  return Number.isNaN(d.getTime()) ? null : d.toISOString();
}

export function isoToStoreDate(d: Date): number {
  return (d.getTime() - STORE_EPOCH_MS) * 1e6;
}

/** Recovers the visible text of a message whose `text` column is empty. */
export function decodeAttributedBody(blob: Buffer | null): string | null {
  if (!blob || blob.length === 0) return null;
  const s = blob.toString("utf8");

  if (s.includes("NSNumber")) {
    let part = s.split("NSNumber")[0];
    if (part.includes("NSString")) {
      part = part.split("NSString")[1];
      if (part.includes("NSDictionary")) {
        const text = part.split("NSDictionary")[0].slice(6, -12).trim();
        return text || null;
      }
    }
  }

  const runs = s.match(/[\x20-\x7E]{2,}/g);
  if (!runs) return null;
  const longest = runs.reduce((a, b) => (b.length > a.length ? b : a));
  return longest.trim() || null;
}

export function resolveAttachmentPath(
  filename: string | undefined,
  attachmentsDir: string,
  exists: (p: string) => boolean = fs.existsSync
): string | null {
  if (!filename) return null;
  let candidates: string[];
  if (filename.startsWith("~")) {
    candidates = [path.join(os.homedir(), filename.slice(1))];
  } else if (path.isAbsolute(filename)) {
    candidates = [filename];
  } else {
    candidates = [path.join(attachmentsDir, filename), path.resolve(filename)];
  }
  return candidates.find((p) => exists(p)) ?? null;
}

function splitColumn(v: string | null): string[] {
  return v ? v.split(ATTACHMENT_SEPARATOR) : [];
}

export function parseAttachments(row: RawRow, opts: NormalizeOptions): AttachmentRef[] {
  const guids = splitColumn(row.attachmentGuids);
  const filenames = splitColumn(row.attachmentFilenames);
  const mimes = splitColumn(row.attachmentMimeTypes);
  const sizes = splitColumn(row.attachmentSizes);
  const stickers = splitColumn(row.attachmentIsStickers);

  return guids.map((ref, i) => {
    const filename = filenames[i] || undefined;
    const size = /^\d+$/.test(sizes[i] ?? "") ? Number(sizes[i]) : undefined;
    return {
      ref,
      filename,
      mime: mimes[i] || undefined,
      size,
      isSticker: stickers[i] === "1",
      path: resolveAttachmentPath(filename, opts.attachmentsDir, opts.fileExists)
    };
  });
}

function reactionOf(row: RawRow): MessageKind | null {
  const t = row.associatedMessageType ?? 0;
  const target = row.associatedMessageGuid;
  if (!target) return null;
  const added = t >= 2000 && t <= 2005;
  const removed = t >= 3000 && t <= 3005;
  if (!added && !removed) return null;
  return {
    type: "reaction",
    targetId: target.replace(/^(?:p:\d+\/|bp:)/, ""),
    emoji: TAPBACKS[t % 1000],
    removed
  };
}

function textOf(row: RawRow): string | null {
  // U+FFFC marks where an inline attachment sat in the text.
  const plain = (row.text ?? "").replace(/\uFFFC/g, "").trim();
  if (plain) return plain;
  return decodeAttributedBody(row.attributedBody);
}

function kindOf(row: RawRow, attachments: AttachmentRef[]): MessageKind | null {
  const reaction = reactionOf(row);
  if (reaction) return reaction;

  const sticker = attachments.find((a) => a.isSticker);
  if (sticker) return { type: "sticker", ref: sticker.ref };

  const body = textOf(row);
  if (body) return { type: "text", body };

  if (row.cacheHasAttachments === 1) {
    const first = attachments[0];
    if (!first) return { type: "attachment", ref: row.guid ?? String(row.rowId), path: null };
    return { type: "attachment", ref: first.ref, mime: first.mime, size: first.size, path: first.path };
  }
  return null;
}

export function normalize(row: RawRow, opts: NormalizeOptions): Result<Message, NormalizeError> {
  const timestamp = storeDateToIso(row.date);
  if (!timestamp) {
    return { ok: false, error: new NormalizeError("invalid_timestamp", row.rowId, `row ${row.rowId}: unreadable date ${row.date}`) };
  }

  const attachments = parseAttachments(row, opts);
  const kind = kindOf(row, attachments);
  if (!kind) {
    return { ok: false, error: new NormalizeError("unrecognized", row.rowId, `row ${row.rowId}: no text, sticker, reaction or attachment`) };
  }

  const counterpart = row.handle || row.chatIdentifier || "unknown";
  const message: Message = {
    id: row.rowId,
    guid: row.guid ?? String(row.rowId),
    timestamp,
    direction: row.isFromMe === 1 ? "outbound" : "inbound",
    chatId: row.chatIdentifier || counterpart,
    senderId: counterpart,
    service: row.service ?? undefined,
    kind: Object.freeze(kind),
    attachments: Object.freeze(attachments.map((a) => Object.freeze(a))),
    rawHasAttachments: row.cacheHasAttachments === 1
  };
  return { ok: true, value: Object.freeze(message) };
}
