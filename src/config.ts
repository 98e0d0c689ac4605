import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { ConfigError, errorMessage } from "./core/errors.js";
import { buildContactFilter } from "./core/filter.js";
import type { ContactFilter } from "./core/filter.js";
import type { InitialPosition } from "./core/detector.js";
import type { RateLimitMode } from "./outbound/bucket.js";

const flag = z
  .enum(["0", "1", "true", "false"])
  .transform((v) => v === "1" || v === "true");
const int = (def: number) => z.coerce.number().int().nonnegative().default(def);
const positive = (def: number) => z.coerce.number().int().positive().default(def);

const EnvSchema = z
  .object({
    CHAT_DB_PATH: z.string().default("~/Library/Messages/chat.db"),
    ATTACHMENTS_DIR: z.string().default("~/Library/Messages/Attachments"),
    DATA_DIR: z.string().default("./data"),

    POLL_INTERVAL_MS: positive(3000),
    WATCH_FILES: flag.default("1"),
    WATCH_DEBOUNCE_MS: int(100),
    MAX_BATCH_SIZE: z.coerce.number().int().positive().max(10_000).default(100),
    BACKOFF_BASE_MS: positive(250),
    BACKOFF_MAX_MS: positive(30_000),
    MAX_RETRIES: int(5),
    START_AT: z.enum(["start", "latest"]).default("latest"),

    OUTBOUND_BACKEND: z.enum(["applescript", "shortcuts", "email"]).default("applescript"),
    RATE_CAPACITY: positive(30),
    RATE_PER_MINUTE: z.coerce.number().nonnegative().default(30),
    RATE_LIMIT_MODE: z.enum(["block", "fail"]).default("block"),
    RATE_LIMIT_TIMEOUT_MS: int(60_000),
    SEND_TIMEOUT_MS: positive(30_000),

    SMTP_HOST: z.string().optional(),
    SMTP_PORT: positive(587),
    SMTP_USER: z.string().optional(),
    SMTP_PASS: z.string().optional(),
    EMAIL_FROM: z.string().email().optional(),
    EMAIL_SUBJECT: z.string().optional(),

    PORT: z.coerce.number().int().min(0).max(65_535).default(7090),
    HTTP_RATE_LIMIT_WINDOW_MS: positive(60_000),
    HTTP_RATE_LIMIT_MAX: positive(60),

    LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

    CONTACT_FILTER_JSON: z.string().optional(),
    CONTACT_FILTER_PATH: z.string().optional()
  })
  .superRefine((env, ctx) => {
    if (env.BACKOFF_MAX_MS < env.BACKOFF_BASE_MS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["BACKOFF_MAX_MS"], message: "must not be below BACKOFF_BASE_MS" });
    }
    if (env.OUTBOUND_BACKEND === "email" && !(env.SMTP_HOST && env.EMAIL_FROM)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["OUTBOUND_BACKEND"], message: "email needs SMTP_HOST and EMAIL_FROM" });
    }
  });

export interface EmailConfig {
  from: string;
  subject?: string;
  smtp: { host: string; port: number; user?: string; pass?: string };
}

export interface AppConfig {
  chatDbPath: string;
  attachmentsDir: string;
  dataDir: string;
  detector: {
    pollIntervalMs: number;
    watchFiles: boolean;
    watchDebounceMs: number;
    maxBatchSize: number;
    backoffBaseMs: number;
    backoffMaxMs: number;
    maxRetries: number;
    initialPosition: InitialPosition;
  };
  outbound: {
    backend: "applescript" | "shortcuts" | "email";
    capacity: number;
    refillPerSecond: number;
    mode: RateLimitMode;
    timeoutMs: number;
    sendTimeoutMs: number;
    email?: EmailConfig;
  };
  http: { port: number; rateLimitWindowMs: number; rateLimitMax: number };
  logLevel: string;
  contactFilter: ContactFilter;
}

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return path.resolve(p);
}

function readFilterInput(env: { CONTACT_FILTER_JSON?: string; CONTACT_FILTER_PATH?: string }): unknown {
  if (env.CONTACT_FILTER_JSON) {
    try {
      return JSON.parse(env.CONTACT_FILTER_JSON);
    } catch (err) {
      throw new ConfigError(`CONTACT_FILTER_JSON: ${errorMessage(err)}`, { cause: err });
    }
  }
  if (env.CONTACT_FILTER_PATH) {
    const file = expandHome(env.CONTACT_FILTER_PATH);
    try {
      return JSON.parse(fs.readFileSync(file, "utf8"));
    } catch (err) {
      throw new ConfigError(`CONTACT_FILTER_PATH ${file}: ${errorMessage(err)}`, { cause: err });
    }
  }
  return {};
}

/** Reads settings from the environment. Empty variables count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(env)"}: ${i.message}`);
    throw new ConfigError(`invalid configuration: ${issues.join("; ")}`);
  }
  const e = parsed.data;

  const email: EmailConfig | undefined =
    e.SMTP_HOST && e.EMAIL_FROM
      ? {
          from: e.EMAIL_FROM,
          subject: e.EMAIL_SUBJECT,
          smtp: { host: e.SMTP_HOST, port: e.SMTP_PORT, user: e.SMTP_USER, pass: e.SMTP_PASS }
        }
      : undefined;

  return {
    chatDbPath: expandHome(e.CHAT_DB_PATH),
    attachmentsDir: expandHome(e.ATTACHMENTS_DIR),
    dataDir: expandHome(e.DATA_DIR),
    detector: {
      pollIntervalMs: e.POLL_INTERVAL_MS,
      watchFiles: e.WATCH_FILES,
      watchDebounceMs: e.WATCH_DEBOUNCE_MS,
      maxBatchSize: e.MAX_BATCH_SIZE,
      backoffBaseMs: e.BACKOFF_BASE_MS,
      backoffMaxMs: e.BACKOFF_MAX_MS,
      maxRetries: e.MAX_RETRIES,
      initialPosition: e.START_AT
    },
    outbound: {
      backend: e.OUTBOUND_BACKEND,
      capacity: e.RATE_CAPACITY,
      refillPerSecond: e.RATE_PER_MINUTE / 60,
      mode: e.RATE_LIMIT_MODE,
      timeoutMs: e.RATE_LIMIT_TIMEOUT_MS,
      sendTimeoutMs: e.SEND_TIMEOUT_MS,
      email
    },
    http: { port: e.PORT, rateLimitWindowMs: e.HTTP_RATE_LIMIT_WINDOW_MS, rateLimitMax: e.HTTP_RATE_LIMIT_MAX },
    logLevel: e.LOG_LEVEL,
    contactFilter: buildContactFilter(readFilterInput(e))
  };
}
