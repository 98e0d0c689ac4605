export { createMonitor } from "./plugin/createMonitor.js";
export type { Monitor, MonitorArgs, MonitorStats, Reconfiguration } from "./plugin/createMonitor.js";
export { makeRoutes } from "./api/routes.js";
export { makeRateLimiter } from "./api/rate-limit.js";
export { loadConfig } from "./config.js";
export type { AppConfig } from "./config.js";

export { ChangeDetector } from "./core/detector.js";
export type { DetectorHandle, DetectorOptions, DetectorStats, InitialPosition } from "./core/detector.js";
export { Cursor, MemoryCursorStore } from "./core/cursor.js";
export type { CursorStore } from "./core/cursor.js";
export { DispatchQueue } from "./core/dispatch.js";
export type { Subscriber } from "./core/dispatch.js";
export { admit, admitRecipient, buildContactFilter, FilterHolder, OPEN_FILTER } from "./core/filter.js";
export type { ContactFilter, ContactFilterInput } from "./core/filter.js";
export { normalize, storeDateToIso, isoToStoreDate, decodeAttributedBody } from "./core/normalize.js";
export { fromHoursBack, fromDaysBack, inRange } from "./core/range.js";
export { anyOf, FileWatchWakeSource, ManualWakeSource, TimerWakeSource } from "./core/wake.js";
export type { WakeSource } from "./core/wake.js";
export * from "./core/errors.js";

export { SqliteRowSource } from "./store/sqlite-source.js";
export { MemoryRowSource } from "./store/memory-source.js";
export { FileCursorStore } from "./store/cursor-file.js";
export type { RowSource } from "./store/source.js";

export { TokenBucket } from "./outbound/bucket.js";
export type { RateLimitMode } from "./outbound/bucket.js";
export { OutboundRouter } from "./outbound/router.js";
export type { Sender, RecipientKind } from "./outbound/sender.js";
export { AppleScriptSender } from "./adapters/applescript.js";
export { ShortcutsSender } from "./adapters/shortcuts.js";
export { EmailSender } from "./adapters/email-smtp.js";

export type {
  Ack,
  AttachmentRef,
  CursorState,
  DateRange,
  Direction,
  Message,
  MessageKind,
  RawRow,
  Result,
  SendPayload
} from "./types/contracts.js";
