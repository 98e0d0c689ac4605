import { spawn } from "node:child_process";
import type { Result } from "../types/contracts.js";
import { SendError, errorMessage } from "../core/errors.js";

export interface ScriptResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface RunOptions {
  input: string;
  timeoutMs: number;
  signal?: AbortSignal;
}

/** Runs a command with `input` on stdin. Rejects only when the process cannot run. */
export type ScriptRunner = (command: string, args: string[], opts: RunOptions) => Promise<ScriptResult>;

export const spawnRunner: ScriptRunner = (command, args, opts) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, args, { signal: opts.signal });
    let stdout = "";
    let stderr = "";
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, opts.timeoutMs);

    child.stdout.setEncoding("utf8").on("data", (d: string) => (stdout += d));
    child.stderr.setEncoding("utf8").on("data", (d: string) => (stderr += d));
    child.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
    child.on("close", (code) => {
      clearTimeout(timer);
      resolve({ code, stdout: stdout.trim(), stderr: stderr.trim(), timedOut });
    });

    child.stdin.on("error", () => child.kill("SIGKILL"));
    child.stdin.end(opts.input, "utf8");
  });

/** Runs a script for a sender and folds every way it can fail into a SendError. */
export async function runScript(
  runner: ScriptRunner,
  command: string,
  args: string[],
  opts: RunOptions
): Promise<Result<ScriptResult, SendError>> {
  let res: ScriptResult;
  try {
    res = await runner(command, args, opts);
  } catch (err) {
    if (opts.signal?.aborted || (err instanceof Error && err.name === "AbortError")) {
      return { ok: false, error: new SendError("cancelled", `${command} cancelled`, { cause: err }) };
    }
    return { ok: false, error: new SendError("backend_failed", `${command} could not run: ${errorMessage(err)}`, { cause: err }) };
  }

  if (res.timedOut) {
    return { ok: false, error: new SendError("timeout", `${command} timed out after ${opts.timeoutMs}ms`) };
  }
  if (res.code !== 0) {
    return { ok: false, error: new SendError("backend_failed", `${command} exited with ${res.code}: ${res.stderr || res.stdout}`) };
  }
  return { ok: true, value: res };
}
