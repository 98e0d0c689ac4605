import fs from "node:fs";
import path from "node:path";
import pino from "pino";
import sqlite3 from "sqlite3";
import { CHAT_SCHEMA } from "../store/chat-schema.js";

// Creates an empty chat.db with the tables the reader queries, for local runs off a Mac.
const log = pino({ level: process.env.LOG_LEVEL || "info" });
const DB_PATH = path.resolve(process.env.CHAT_DB_PATH || "./data/chat.db");

function exec(db: sqlite3.Database, sql: string) {
  return new Promise<void>((resolve, reject) => db.exec(sql, (err) => (err ? reject(err) : resolve())));
}

async function main() {
  fs.mkdirSync(path.dirname(DB_PATH), { recursive: true });
  const db = new sqlite3.Database(DB_PATH);
  try {
    for (const stmt of CHAT_SCHEMA) await exec(db, stmt);
  } finally {
    await new Promise<void>((resolve, reject) => db.close((err) => (err ? reject(err) : resolve())));
  }
  log.info({ dbPath: DB_PATH }, "db initialized");
}

main().catch((err) => {
  log.error({ err }, "db init failed");
  process.exit(1);
});
