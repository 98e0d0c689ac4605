import fs from "node:fs";
import path from "node:path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import express from "express";
import pino from "pino";

import { loadConfig } from "./config.js";
import { makeRoutes } from "./api/routes.js";
import { makeRateLimiter } from "./api/rate-limit.js";
import { createMonitor } from "./plugin/createMonitor.js";
import { SqliteRowSource } from "./store/sqlite-source.js";
import { FileCursorStore } from "./store/cursor-file.js";
import { anyOf, FileWatchWakeSource, TimerWakeSource } from "./core/wake.js";
import type { WakeSource } from "./core/wake.js";
import { AppleScriptSender } from "./adapters/applescript.js";
import { ShortcutsSender } from "./adapters/shortcuts.js";
import { EmailSender } from "./adapters/email-smtp.js";
import type { Sender } from "./outbound/sender.js";

async function main() {
  const config = loadConfig();
  const log = pino({ level: config.logLevel });

  fs.mkdirSync(config.dataDir, { recursive: true });

  const wakes: WakeSource[] = [new TimerWakeSource(config.detector.pollIntervalMs)];
  if (config.detector.watchFiles) {
    wakes.push(new FileWatchWakeSource(config.chatDbPath, { debounceMs: config.detector.watchDebounceMs, logger: log }));
  }

  const senders: Sender[] = [
    new AppleScriptSender({ timeoutMs: config.outbound.sendTimeoutMs }),
    new ShortcutsSender({ timeoutMs: config.outbound.sendTimeoutMs })
  ];
  if (config.outbound.email) senders.push(new EmailSender(config.outbound.email));

  const monitor = createMonitor({
    source: new SqliteRowSource(config.chatDbPath),
    cursorStore: new FileCursorStore(config.dataDir, { logger: log }),
    wake: anyOf(...wakes),
    normalize: { attachmentsDir: config.attachmentsDir },
    contactFilter: config.contactFilter,
    detector: {
      maxBatchSize: config.detector.maxBatchSize,
      backoffBaseMs: config.detector.backoffBaseMs,
      backoffMaxMs: config.detector.backoffMaxMs,
      maxRetries: config.detector.maxRetries,
      initialPosition: config.detector.initialPosition
    },
    outbound: {
      senders,
      defaultBackend: config.outbound.backend,
      capacity: config.outbound.capacity,
      refillPerSecond: config.outbound.refillPerSecond,
      mode: config.outbound.mode,
      timeoutMs: config.outbound.timeoutMs
    },
    logger: log
  });

  await monitor.start((m) => {
    log.info({ id: m.id, kind: m.kind, direction: m.direction, chatId: m.chatId }, "message");
  });

  const app = express();
  app.use(express.json({ limit: "512kb" }));
  app.use("/api", makeRateLimiter({ windowMs: config.http.rateLimitWindowMs, max: config.http.rateLimitMax }));
  app.use("/api", makeRoutes({ monitor, logger: log }));

  const server = app.listen(config.http.port, () => {
    log.info(
      {
        port: config.http.port,
        chatDbPath: config.chatDbPath,
        dataDir: config.dataDir,
        backends: monitor.backends(),
        defaultBackend: config.outbound.backend,
        wake: wakes.map((w) => w.name)
      },
      "message-tail running"
    );
  });

  let closing = false;
  const shutdown = (signal: string) => {
    if (closing) return;
    closing = true;
    log.info({ signal }, "shutting down");
    server.close();
    monitor
      .close()
      .then(() => process.exit(0))
      .catch((err) => {
        log.error({ err }, "shutdown failed");
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err) => {
  pino().error({ err }, "fatal");
  process.exit(1);
});
