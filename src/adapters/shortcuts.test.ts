import { describe, it } from "node:test";
import assert from "node:assert";
import { ShortcutsSender } from "./shortcuts.js";
import type { RunOptions, ScriptRunner } from "./exec.js";

function recorder() {
  const calls: { command: string; args: string[]; opts: RunOptions }[] = [];
  const runner: ScriptRunner = async (command, args, opts) => {
    calls.push({ command, args, opts });
    return { code: 0, stdout: "", stderr: "", timedOut: false };
  };
  return { runner, calls };
}

describe("ShortcutsSender", () => {
  it("runs the message shortcut with a JSON payload", async () => {
    const { runner, calls } = recorder();
    const out = await new ShortcutsSender({ runner }).send("+15550001111", { type: "text", text: "on my way" });

    assert.ok(out.ok);
    assert.strictEqual(out.value.backend, "shortcuts");
    assert.strictEqual(calls[0].command, "/usr/bin/shortcuts");
    assert.deepStrictEqual(calls[0].args, ["run", "Send Message"]);
    assert.deepStrictEqual(JSON.parse(calls[0].opts.input), { recipient: "+15550001111", message: "on my way" });
  });

  it("runs the attachment shortcut with an absolute path", async () => {
    const { runner, calls } = recorder();
    await new ShortcutsSender({ runner }).send("a@example.com", { type: "file", path: "/tmp/a.png" });
    assert.deepStrictEqual(calls[0].args, ["run", "Send Attachment"]);
    assert.deepStrictEqual(JSON.parse(calls[0].opts.input), { recipient: "a@example.com", file_path: "/tmp/a.png" });
  });

  it("honours custom shortcut names", async () => {
    const { runner, calls } = recorder();
    await new ShortcutsSender({ runner, shortcuts: { text: "Relay Text" } }).send("a@example.com", { type: "text", text: "x" });
    assert.deepStrictEqual(calls[0].args, ["run", "Relay Text"]);
  });

  it("fails when the shortcut exits non-zero", async () => {
    const runner: ScriptRunner = async () => ({ code: 1, stdout: "", stderr: "shortcut not found", timedOut: false });
    const out = await new ShortcutsSender({ runner }).send("a@example.com", { type: "text", text: "x" });
    assert.ok(!out.ok);
    assert.strictEqual(out.error.message, "/usr/bin/shortcuts exited with 1: shortcut not found");
  });
});
