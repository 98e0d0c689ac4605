export class MonitorError extends Error {
  constructor(public readonly code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transient: the store is locked, missing for a moment, or failed an I/O call. */
export class SourceUnavailableError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("source_unavailable", message, options);
  }
}

export class SourceResetError extends MonitorError {
  constructor(
    message: string,
    public readonly previous: { generation: string; lastSeenId: number; rowCount?: number },
    public readonly next: { generation: string; rowCount: number }
  ) {
    super("source_reset", message);
  }
}

export type NormalizeReason = "unrecognized" | "invalid_timestamp";

export class NormalizeError extends MonitorError {
  constructor(public readonly reason: NormalizeReason, public readonly rowId: number, message: string) {
    super(`normalize_${reason}`, message);
  }
}

export class CallbackError extends MonitorError {
  constructor(public readonly messageId: number, options: { cause: unknown }) {
    super("callback_failed", `subscriber failed on message ${messageId}`, options);
  }
}

export class CursorPersistError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("cursor_persist_failed", message, options);
  }
}

export class ConfigError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config_invalid", message, options);
  }
}

export class RateLimitExceededError extends MonitorError {
  constructor(message = "rate limit exceeded") {
    super("rate_limited", message);
  }
}

export type SendErrorCode =
  | "invalid_recipient"
  | "unsupported_recipient"
  | "unknown_backend"
  | "recipient_blocked"
  | "invalid_payload"
  | "file_not_found"
  | "backend_failed"
  | "timeout"
  | "cancelled";

export class SendError extends MonitorError {
  constructor(public readonly reason: SendErrorCode, message: string, options?: { cause?: unknown }) {
    super(reason, message, options);
  }
}

export type OutboundError = SendError | RateLimitExceededError;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
