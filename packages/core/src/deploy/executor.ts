import type { RemoteTarget } from "./target.js";

export interface RemoteCommandResult {
  exitCode: number | null;
  signal?: string;
  stdout: string;
  stderr: string;
}

export interface RemoteSession {
  /** Runs one command to completion. Rejects on timeout or a dropped session. */
  exec(command: string, options: { timeoutMs: number }): Promise<RemoteCommandResult>;
  close(): void;
}

export interface ConnectOptions {
  privateKey: string;
  timeoutMs: number;
}

/** Opens remote sessions. Rejects with a `ConnectivityError` when no session can be established. */
export interface RemoteExecutor {
  connect(target: RemoteTarget, options: ConnectOptions): Promise<RemoteSession>;
}
