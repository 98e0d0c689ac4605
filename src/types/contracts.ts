export type Direction = "inbound" | "outbound";
export type FilterBehavior = "none" | "whitelist" | "blacklist";

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export interface AttachmentRef {
  ref: string; // attachment guid
  filename?: string;
  mime?: string;
  size?: number;
  isSticker: boolean;
  path: string | null; // resolved on disk, null when the file is missing
}

export type MessageKind =
  | { type: "text"; body: string }
  | { type: "sticker"; ref: string }
  | { type: "reaction"; targetId: string; emoji: string; removed: boolean }
  | { type: "attachment"; ref: string; mime?: string; size?: number; path: string | null };

export interface Message {
  readonly id: number;
  readonly guid: string;
  readonly timestamp: string; // ISO
  readonly direction: Direction;
  readonly chatId: string;
  readonly senderId: string;
  readonly service?: string;
  readonly kind: MessageKind;
  readonly attachments: readonly AttachmentRef[];
  readonly rawHasAttachments: boolean;
}

/** Separates per-attachment values in the joined attachment columns (ASCII unit separator). */
export const ATTACHMENT_SEPARATOR = "\u001f";

/**
 * One row of the message log as the source query returns it.
 * Attachment columns hold one entry per joined attachment, split by ATTACHMENT_SEPARATOR.
 */
export interface RawRow {
  rowId: number;
  guid: string | null;
  text: string | null;
  attributedBody: Buffer | null;
  date: number | null;
  isFromMe: number | null;
  service: string | null;
  handle: string | null;
  chatIdentifier: string | null;
  cacheHasAttachments: number | null;
  associatedMessageGuid: string | null;
  associatedMessageType: number | null;
  balloonBundleId: string | null;
  attachmentGuids: string | null;
  attachmentFilenames: string | null;
  attachmentMimeTypes: string | null;
  attachmentSizes: string | null;
  attachmentIsStickers: string | null;
}

export interface CursorState {
  lastSeenId: number;
  generation: string;
  rowCount?: number; // last observed row count, for truncation detection
}

export interface SourceSnapshot {
  generation: string;
  rowCount: number;
}

export interface DateRange {
  start?: Date;
  end?: Date;
}

export interface RateBudget {
  capacity: number;
  refillPerSecond: number;
  tokens: number;
  lastRefillAt: number; // epoch ms
}

export type SendPayload =
  | { type: "text"; text: string }
  | { type: "file"; path: string };

export interface Ack {
  id: string;
  backend: string;
  recipient: string;
  sentAt: string; // ISO
}
