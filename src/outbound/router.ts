import fs from "node:fs";
import pino from "pino";
import type { Logger } from "pino";
import type { Ack, Result, SendPayload } from "../types/contracts.js";
import { RateLimitExceededError, SendError, errorMessage } from "../core/errors.js";
import type { OutboundError } from "../core/errors.js";
import { admitRecipient, FilterHolder } from "../core/filter.js";
import { TokenBucket } from "./bucket.js";
import type { RateLimitMode } from "./bucket.js";
import { recipientKind } from "./sender.js";
import type { Sender } from "./sender.js";

export interface SendOptions {
  mode?: RateLimitMode;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface RouterOptions {
  senders: Sender[];
  defaultBackend: string;
  bucket: TokenBucket;
  mode?: RateLimitMode;
  timeoutMs?: number;
  filter?: FilterHolder;
  fileExists?: (p: string) => boolean;
  logger?: Logger;
}

export interface OutboundStats {
  sent: number;
  failed: number;
  rejected: number;
  rateLimited: number;
  byBackend: Record<string, { sent: number; failed: number }>;
  mode: RateLimitMode;
  budget: { capacity: number; refillPerSecond: number; tokens: number; queued: number };
}

function fail(error: OutboundError): Result<Ack, OutboundError> {
  return { ok: false, error };
}

/**
 * Validates a send request, takes a token from the shared budget and hands
 * the request to the chosen backend. Everything that can be rejected
 * without contacting a backend is rejected before a token is spent.
 */
export class OutboundRouter {
  private senders = new Map<string, Sender>();
  private defaultBackend: string;
  private bucket: TokenBucket;
  private mode: RateLimitMode;
  private timeoutMs: number;
  private filter: FilterHolder;
  private fileExists: (p: string) => boolean;
  private log: Logger;
  private counters = { sent: 0, failed: 0, rejected: 0, rateLimited: 0 };
  private perBackend = new Map<string, { sent: number; failed: number }>();

  constructor(opts: RouterOptions) {
    for (const s of opts.senders) this.register(s);
    this.defaultBackend = opts.defaultBackend;
    this.bucket = opts.bucket;
    this.mode = opts.mode ?? "block";
    this.timeoutMs = opts.timeoutMs ?? 60_000;
    this.filter = opts.filter ?? new FilterHolder();
    this.fileExists = opts.fileExists ?? fs.existsSync;
    this.log = opts.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  }

  register(sender: Sender): void {
    this.senders.set(sender.name, sender);
  }

  backends(): string[] {
    return [...this.senders.keys()];
  }

  reconfigure(next: { capacity?: number; refillPerSecond?: number; mode?: RateLimitMode; timeoutMs?: number }): void {
    this.bucket.reconfigure(next);
    if (next.mode) this.mode = next.mode;
    if (next.timeoutMs !== undefined) this.timeoutMs = next.timeoutMs;
  }

  async send(
    recipient: string,
    payload: SendPayload,
    backend?: string,
    opts: SendOptions = {}
  ): Promise<Result<Ack, OutboundError>> {
    const target = recipient.trim();
    const name = backend ?? this.defaultBackend;

    const rejected = this.check(target, payload, name);
    if (rejected) {
      this.counters.rejected++;
      this.log.warn({ recipient: target, backend: name, reason: rejected.reason }, "outbound: rejected");
      return fail(rejected);
    }
    const sender = this.senders.get(name);
    if (!sender) return fail(new SendError("unknown_backend", `no backend named ${name}`));

    const mode = opts.mode ?? this.mode;
    if (mode === "fail") {
      if (!this.bucket.tryAcquire()) return this.limited("no send budget left", mode);
    } else {
      const got = await this.bucket.acquire({ timeoutMs: opts.timeoutMs ?? this.timeoutMs, signal: opts.signal });
      if (got === "aborted") return fail(new SendError("cancelled", "send cancelled while waiting for budget"));
      if (got === "timeout") return this.limited("timed out waiting for send budget", mode);
    }

    let result: Result<Ack, SendError>;
    try {
      result = await sender.send(target, payload, { signal: opts.signal });
    } catch (err) {
      this.log.error({ err, backend: name }, "outbound: backend threw");
      result = { ok: false, error: new SendError("backend_failed", errorMessage(err), { cause: err }) };
    }

    const tally = this.perBackend.get(name) ?? { sent: 0, failed: 0 };
    this.perBackend.set(name, tally);
    if (result.ok) {
      this.counters.sent++;
      tally.sent++;
      this.log.info({ backend: name, ackId: result.value.id }, "outbound: sent");
    } else {
      this.counters.failed++;
      tally.failed++;
      this.log.warn({ backend: name, reason: result.error.reason, err: result.error }, "outbound: send failed");
    }
    return result;
  }

  stats(): OutboundStats {
    const budget = this.bucket.snapshot();
    return {
      ...this.counters,
      byBackend: Object.fromEntries([...this.perBackend].map(([k, v]) => [k, { ...v }])),
      mode: this.mode,
      budget: {
        capacity: budget.capacity,
        refillPerSecond: budget.refillPerSecond,
        tokens: budget.tokens,
        queued: this.bucket.queued
      }
    };
  }

  private check(recipient: string, payload: SendPayload, backend: string): SendError | null {
    const kind = recipientKind(recipient);
    if (!kind) return new SendError("invalid_recipient", `not an email address or phone number: ${recipient}`);

    const sender = this.senders.get(backend);
    if (!sender) return new SendError("unknown_backend", `no backend named ${backend}`);
    if (!sender.supports(kind)) {
      return new SendError("unsupported_recipient", `${backend} cannot deliver to a ${kind} recipient`);
    }

    if (!admitRecipient(recipient, this.filter.current())) {
      return new SendError("recipient_blocked", `recipient ${recipient} is excluded by the outbound filter`);
    }

    if (payload.type === "text" && payload.text.trim() === "") {
      return new SendError("invalid_payload", "text must not be empty");
    }
    if (payload.type === "file" && !this.fileExists(payload.path)) {
      return new SendError("file_not_found", `no file at ${payload.path}`);
    }
    return null;
  }

  private limited(message: string, mode: RateLimitMode): Result<Ack, OutboundError> {
    this.counters.rateLimited++;
    this.log.warn({ mode }, `outbound: ${message}`);
    return fail(new RateLimitExceededError(message));
  }
}
