import { spawn } from "child_process";
import { debugLog } from "../utils/log";

// Output past this point is dropped; only the first few lines are ever kept.
const MAX_OUTPUT_BYTES = 1024 * 1024;

export type CommandResult =
  | { kind: "completed"; exitCode: number | null; stdout: string; stderr: string }
  | { kind: "timeout"; stdout: string; stderr: string }
  | { kind: "unavailable"; reason: string };

export type RunOptions = {
  cwd?: string;
  timeoutMs: number;
};

export type CommandRunner = (argv: readonly string[], options: RunOptions) => Promise<CommandResult>;

class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  push(chunk: Buffer): void {
    if (this.size >= MAX_OUTPUT_BYTES) return;
    const room = MAX_OUTPUT_BYTES - this.size;
    const kept = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(kept);
    this.size += kept.length;
  }

  text(): string {
    return Buffer.concat(this.chunks).toString("utf-8");
  }
}

/**
 * Runs a command to completion without a shell. A missing binary or a spawn
 * failure resolves as "unavailable"; the promise never rejects.
 */
export const runCommand: CommandRunner = (argv, options) =>
  new Promise<CommandResult>((resolvePromise) => {
    const [command, ...args] = argv;
    if (!command) {
      resolvePromise({ kind: "unavailable", reason: "empty command" });
      return;
    }

    const stdout = new OutputBuffer();
    const stderr = new OutputBuffer();
    let settled = false;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    const settle = (result: CommandResult) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolvePromise(result);
    };

    // Own process group, so a timeout also reaches the tools the command starts
    // (npx -> eslint, cargo -> clippy-driver, go -> vet) that share our pipes.
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"],
      detached: process.platform !== "win32",
      windowsHide: true,
    });

    const killTree = () => {
      if (child.pid !== undefined && process.platform !== "win32") {
        try {
          process.kill(-child.pid, "SIGKILL");
          return;
        } catch (error) {
          debugLog(`could not kill process group of ${command}`, error);
        }
      }
      child.kill("SIGKILL");
    };

    timer = setTimeout(() => {
      timedOut = true;
      killTree();
      // Don't wait for "close": a grandchild that escaped the kill can hold the pipes open.
      child.stdout.destroy();
      child.stderr.destroy();
      settle({ kind: "timeout", stdout: stdout.text(), stderr: stderr.text() });
    }, options.timeoutMs);

    child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    child.on("error", (error: NodeJS.ErrnoException) => {
      settle({ kind: "unavailable", reason: error.code ?? error.message });
    });

    child.on("close", (exitCode) => {
      if (timedOut) {
        settle({ kind: "timeout", stdout: stdout.text(), stderr: stderr.text() });
        return;
      }
      settle({ kind: "completed", exitCode, stdout: stdout.text(), stderr: stderr.text() });
    });
  });
