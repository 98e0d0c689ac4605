import path from "node:path";
import type { Ack, Result, SendPayload } from "../types/contracts.js";
import type { SendError } from "../core/errors.js";
import { makeAck } from "../outbound/sender.js";
import type { RecipientKind, SendContext, Sender } from "../outbound/sender.js";
import { runScript, spawnRunner } from "./exec.js";
import type { ScriptRunner } from "./exec.js";

export interface ShortcutNames {
  text: string;
  file: string;
}

/**
 * Runs user-installed shortcuts. The shortcut receives its input as JSON on
 * stdin: `{ recipient, message }` or `{ recipient, file_path }`.
 */
export class ShortcutsSender implements Sender {
  readonly name = "shortcuts";
  private runner: ScriptRunner;
  private timeoutMs: number;
  private command: string;
  private shortcuts: ShortcutNames;

  constructor(opts: { runner?: ScriptRunner; timeoutMs?: number; command?: string; shortcuts?: Partial<ShortcutNames> } = {}) {
    this.runner = opts.runner ?? spawnRunner;
    this.timeoutMs = opts.timeoutMs ?? 30_000;
    this.command = opts.command ?? "/usr/bin/shortcuts";
    this.shortcuts = { text: "Send Message", file: "Send Attachment", ...opts.shortcuts };
  }

  supports(_kind: RecipientKind): boolean {
    return true;
  }

  async send(recipient: string, payload: SendPayload, ctx: SendContext = {}): Promise<Result<Ack, SendError>> {
    const shortcut = payload.type === "text" ? this.shortcuts.text : this.shortcuts.file;
    const input =
      payload.type === "text"
        ? { recipient, message: payload.text }
        : { recipient, file_path: path.resolve(payload.path) };

    const run = await runScript(this.runner, this.command, ["run", shortcut], {
      input: JSON.stringify(input),
      timeoutMs: this.timeoutMs,
      signal: ctx.signal
    });
    if (!run.ok) return run;
    return { ok: true, value: makeAck(this.name, recipient) };
  }
}
