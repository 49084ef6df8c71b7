import { StringDecoder } from "node:string_decoder";
import { Client } from "ssh2";
import { ConnectivityError, RemoteCommandError } from "../errors.js";
import { formatDuration } from "../utils/duration.js";
import type { ConnectOptions, RemoteCommandResult, RemoteExecutor, RemoteSession } from "./executor.js";
import { formatTarget, type RemoteTarget } from "./target.js";

const MAX_CAPTURE_CHARS = 64 * 1024;

function appendTail(current: string, chunk: string): string {
  const next = current + chunk;
  return next.length > MAX_CAPTURE_CHARS ? next.slice(-MAX_CAPTURE_CHARS) : next;
}

class SshSession implements RemoteSession {
  private dropped: Error | null = null;

  constructor(private readonly client: Client) {
    client.on("error", (error) => {
      this.dropped = error;
    });
    client.on("close", () => {
      this.dropped ??= new Error("session closed by remote host");
    });
  }

  exec(command: string, options: { timeoutMs: number }): Promise<RemoteCommandResult> {
    if (this.dropped) {
      return Promise.reject(new RemoteCommandError(`Session dropped: ${this.dropped.message}`, null));
    }

    return new Promise((resolve, reject) => {
      let stdout = "";
      let stderr = "";
      const stdoutDecoder = new StringDecoder("utf8");
      const stderrDecoder = new StringDecoder("utf8");
      let exitCode: number | null = null;
      let signal: string | undefined;
      let finished = false;

      const finish = (outcome: () => void) => {
        if (finished) return;
        finished = true;
        clearTimeout(timer);
        this.client.off("close", onDrop);
        outcome();
      };

      const onDrop = () => {
        finish(() => reject(new RemoteCommandError("Session dropped while the command was running", null)));
      };

      const timer = setTimeout(() => {
        finish(() =>
          reject(new RemoteCommandError(`Command timed out after ${formatDuration(options.timeoutMs)}`, null))
        );
        this.client.end();
      }, options.timeoutMs);

      this.client.once("close", onDrop);

      this.client.exec(command, (error, channel) => {
        if (error) {
          finish(() => reject(new RemoteCommandError(`Cannot start command: ${error.message}`, null)));
          return;
        }

        channel.on("data", (chunk: Buffer) => {
          stdout = appendTail(stdout, stdoutDecoder.write(chunk));
        });
        channel.stderr.on("data", (chunk: Buffer) => {
          stderr = appendTail(stderr, stderrDecoder.write(chunk));
        });
        channel.on("exit", (...args: unknown[]) => {
          const [code, exitSignal] = args;
          exitCode = typeof code === "number" ? code : null;
          signal = typeof exitSignal === "string" ? exitSignal : undefined;
        });
        channel.on("close", () => {
          stdout = appendTail(stdout, stdoutDecoder.end());
          stderr = appendTail(stderr, stderrDecoder.end());
          finish(() => resolve({ exitCode, ...(signal ? { signal } : {}), stdout, stderr }));
        });
      });
    });
  }

  close(): void {
    this.client.end();
  }
}

/** Opens sessions with the `ssh2` client using key authentication. */
export class SshRemoteExecutor implements RemoteExecutor {
  connect(target: RemoteTarget, options: ConnectOptions): Promise<RemoteSession> {
    return new Promise((resolve, reject) => {
      const client = new Client();
      let settled = false;

      const fail = (error: unknown) => {
        if (settled) return;
        settled = true;
        const reason = error instanceof Error ? error.message : String(error);
        client.end();
        reject(new ConnectivityError(`Cannot open session to ${formatTarget(target)}: ${reason}`, target.host));
      };

      client.once("ready", () => {
        if (settled) return;
        settled = true;
        resolve(new SshSession(client));
      });
      client.on("error", fail);

      try {
        client.connect({
          host: target.host,
          port: target.port,
          username: target.username,
          privateKey: options.privateKey,
          readyTimeout: options.timeoutMs
        });
      } catch (error) {
        // malformed key material is reported synchronously
        fail(error);
      }
    });
  }
}
