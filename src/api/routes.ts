import { Router } from "express";
import type { Response } from "express";
import pino from "pino";
import type { Logger } from "pino";
import { z } from "zod";
import type { Monitor } from "../plugin/createMonitor.js";
import { ConfigError, RateLimitExceededError, SourceUnavailableError } from "../core/errors.js";
import type { OutboundError } from "../core/errors.js";
import { fromHoursBack } from "../core/range.js";
import type { DateRange, SendPayload } from "../types/contracts.js";

const MessagesQuery = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  start: z.string().datetime({ offset: true }).optional(),
  end: z.string().datetime({ offset: true }).optional(),
  hoursBack: z.coerce.number().positive().max(24 * 365).optional()
});

const SendBody = z
  .object({
    recipient: z.string().trim().min(1),
    text: z.string().min(1).max(20_000).optional(),
    filePath: z.string().min(1).optional(),
    backend: z.string().min(1).optional()
  })
  .refine((b) => (b.text === undefined) !== (b.filePath === undefined), {
    message: "exactly one of text or filePath is required"
  });

// Rejections decided before any backend was contacted.
const CLIENT_ERRORS = new Set([
  "invalid_recipient",
  "unsupported_recipient",
  "unknown_backend",
  "recipient_blocked",
  "invalid_payload",
  "file_not_found"
]);

function sendFailure(res: Response, error: OutboundError) {
  if (error instanceof RateLimitExceededError) {
    return res.status(429).json({ ok: false, error: "rate_limited", message: error.message });
  }
  if (CLIENT_ERRORS.has(error.code)) {
    return res.status(400).json({ ok: false, error: error.code, message: error.message });
  }
  return res.status(502).json({ ok: false, error: "send_failed", reason: error.code, message: error.message });
}

export function makeRoutes(args: { monitor: Monitor; logger?: Logger }) {
  const r = Router();
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const { monitor } = args;

  r.get("/health", (_req, res) => {
    res.json({ ok: true, state: monitor.stats().detector.state });
  });

  r.get("/stats", (_req, res) => {
    res.json({ ok: true, stats: monitor.stats() });
  });

  r.get("/messages/recent", (req, res) => {
    const parsed = MessagesQuery.pick({ limit: true }).safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ ok: false, error: "invalid_query", details: parsed.error.issues });
    res.json({ ok: true, messages: monitor.recent(parsed.data.limit) });
  });

  r.get("/messages", async (req, res) => {
    const parsed = MessagesQuery.safeParse(req.query);
    if (!parsed.success) return res.status(400).json({ ok: false, error: "invalid_query", details: parsed.error.issues });
    const q = parsed.data;

    let range: DateRange;
    if (q.hoursBack !== undefined) {
      range = fromHoursBack(q.hoursBack);
    } else if (q.start || q.end) {
      range = { start: q.start ? new Date(q.start) : undefined, end: q.end ? new Date(q.end) : undefined };
    } else {
      range = fromHoursBack(24);
    }

    try {
      const messages = await monitor.query(range, q.limit);
      res.json({ ok: true, count: messages.length, messages });
    } catch (err) {
      if (err instanceof SourceUnavailableError) {
        return res.status(503).json({ ok: false, error: "source_unavailable", message: err.message });
      }
      log.error({ err }, "api: message query failed");
      res.status(500).json({ ok: false, error: "internal" });
    }
  });

  r.post("/outbound/send", async (req, res) => {
    const parsed = SendBody.safeParse(req.body ?? {});
    if (!parsed.success) return res.status(400).json({ ok: false, error: "invalid_request", details: parsed.error.issues });
    const body = parsed.data;

    const payload: SendPayload =
      body.filePath !== undefined ? { type: "file", path: body.filePath } : { type: "text", text: body.text ?? "" };
    const out = await monitor.send(body.recipient, payload, body.backend);
    if (!out.ok) return sendFailure(res, out.error);
    res.json({ ok: true, ack: out.value });
  });

  r.put("/config/filter", (req, res) => {
    try {
      const filter = monitor.reconfigure({ contactFilter: req.body ?? {} });
      res.json({
        ok: true,
        filter: {
          inbound: { behavior: filter.inbound.behavior },
          outbound: { behavior: filter.outbound.behavior }
        }
      });
    } catch (err) {
      if (err instanceof ConfigError) return res.status(400).json({ ok: false, error: err.code, message: err.message });
      throw err;
    }
  });

  return r;
}
