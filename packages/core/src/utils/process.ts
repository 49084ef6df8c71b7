import { spawn, type ChildProcess } from "node:child_process";

const MAX_CAPTURE_BYTES = 64 * 1024;
const DEFAULT_KILL_GRACE_MS = 2_000;

export interface CommandOptions {
  cwd: string;
  env?: Record<string, string>;
  timeoutMs: number;
  /** Time between SIGTERM and SIGKILL once the timeout fires. */
  killGraceMs?: number;
}

export interface CommandOutcome {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  stdout: string;
  stderr: string;
  durationMs: number;
}

/** Keeps the tail of a stream, which is where test runners print their summary. */
class TailBuffer {
  private text = "";

  append(chunk: string): void {
    this.text += chunk;
    if (this.text.length > MAX_CAPTURE_BYTES) {
      this.text = this.text.slice(-MAX_CAPTURE_BYTES);
    }
  }

  toString(): string {
    return this.text;
  }
}

/** Signals the whole process group so commands started through the shell die with it. */
function terminate(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid !== undefined && process.platform !== "win32") {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch {
      // group already gone; fall through to the direct child
    }
  }
  child.kill(signal);
}

export function runCommand(command: string, options: CommandOptions): Promise<CommandOutcome> {
  const startedAt = Date.now();
  const stdout = new TailBuffer();
  const stderr = new TailBuffer();

  return new Promise((resolve, reject) => {
    const child = spawn(command, {
      cwd: options.cwd,
      env: { ...process.env, ...options.env },
      shell: true,
      detached: process.platform !== "win32",
      stdio: ["ignore", "pipe", "pipe"]
    });

    const killGraceMs = options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    let timedOut = false;
    let settled = false;
    let escalation: NodeJS.Timeout | undefined;

    const settle = (exitCode: number | null, signal: NodeJS.Signals | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(escalation);
      resolve({
        exitCode,
        signal,
        timedOut,
        stdout: stdout.toString(),
        stderr: stderr.toString(),
        durationMs: Date.now() - startedAt
      });
    };

    const timer = setTimeout(() => {
      timedOut = true;
      terminate(child, "SIGTERM");
      escalation = setTimeout(() => {
        terminate(child, "SIGKILL");
        // a grandchild that left the group can hold the pipes open
        escalation = setTimeout(() => settle(null, "SIGKILL"), killGraceMs);
      }, killGraceMs);
    }, options.timeoutMs);

    child.stdout.setEncoding("utf8");
    child.stderr.setEncoding("utf8");
    child.stdout.on("data", (chunk: string) => stdout.append(chunk));
    child.stderr.on("data", (chunk: string) => stderr.append(chunk));

    child.on("error", (error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      clearTimeout(escalation);
      reject(error);
    });

    child.on("close", (exitCode, signal) => settle(exitCode, signal));
  });
}
