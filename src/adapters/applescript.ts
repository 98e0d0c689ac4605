import path from "node:path";
import type { Ack, Result, SendPayload } from "../types/contracts.js";
import { SendError } from "../core/errors.js";
import { makeAck } from "../outbound/sender.js";
import type { RecipientKind, SendContext, Sender } from "../outbound/sender.js";
import { runScript, spawnRunner } from "./exec.js";
import type { ScriptRunner } from "./exec.js";

export function escapeAppleScript(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t");
}

/** Tries the iMessage service first and falls back to SMS. */
export function buildTextScript(recipient: string, text: string): string {
  const to = escapeAppleScript(recipient);
  const body = escapeAppleScript(text);
  return `tell application "Messages"
  try
    set targetService to 1st service whose service type = iMessage
    set targetBuddy to buddy "${to}" of targetService
    send "${body}" to targetBuddy
    return "success"
  on error errorMessage
    try
      set smsService to 1st service whose service type = SMS
      set smsBuddy to buddy "${to}" of smsService
      send "${body}" to smsBuddy
      return "success"
    on error smsError
      return "error: " & errorMessage & " (SMS fallback failed: " & smsError & ")"
    end try
  end try
end tell
`;
}

/**
 * Messages only attaches files it can read from a user folder, so the file
 * is copied into Pictures, sent from there and removed afterwards.
 */
export function buildFileScript(recipient: string, filePath: string): string {
  const to = escapeAppleScript(recipient);
  const source = escapeAppleScript(path.resolve(filePath));
  const name = escapeAppleScript(path.basename(filePath));
  return `set sourcePath to "${source}"
set fileName to "${name}"
set picturesDir to POSIX path of (path to pictures folder)
do shell script "cp " & quoted form of sourcePath & " " & quoted form of picturesDir
set picturesFile to ((path to pictures folder as text) & fileName) as alias
set outcome to "success"
tell application "Messages"
  try
    set targetService to 1st service whose service type = iMessage
    set targetBuddy to buddy "${to}" of targetService
    send picturesFile to targetBuddy
  on error errorMessage
    set outcome to "error: " & errorMessage
  end try
end tell
do shell script "rm -f " & quoted form of (picturesDir & fileName)
return outcome
`;
}

export interface AppleScriptSenderOptions {
  runner?: ScriptRunner;
  timeoutMs?: number;
  command?: string;
}

export class AppleScriptSender implements Sender {
  readonly name = "applescript";
  private runner: ScriptRunner;
  private timeoutMs: number;
  private command: string;

  constructor(opts: AppleScriptSenderOptions = {}) {
    this.runner = opts.runner ?? spawnRunner;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.command = opts.command ?? "/usr/bin/osascript";
  }

  supports(_kind: RecipientKind): boolean {
    return true;
  }

  async send(recipient: string, payload: SendPayload, ctx: SendContext = {}): Promise<Result<Ack, SendError>> {
    const script = payload.type === "text" ? buildTextScript(recipient, payload.text) : buildFileScript(recipient, payload.path);
    const run = await runScript(this.runner, this.command, ["-"], {
      input: script,
      timeoutMs: this.timeoutMs,
      signal: ctx.signal
    });
    if (!run.ok) return run;

    if (run.value.stdout.startsWith("error:")) {
      return { ok: false, error: new SendError("backend_failed", run.value.stdout.slice("error:".length).trim()) };
    }
    return { ok: true, value: makeAck(this.name, recipient) };
  }
}
