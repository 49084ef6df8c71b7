import type { ConnectOptions, RemoteCommandResult, RemoteExecutor, RemoteSession } from "./executor.js";
import { formatTarget, type RemoteTarget } from "./target.js";

export interface RecordedCommand {
  target: string;
  command: string;
}

/**
 * Connects nowhere. Every command is recorded and reported as exit 0, which
 * lets an operator see the exact sequence a real invocation would send.
 */
export class DryRunExecutor implements RemoteExecutor {
  readonly commands: RecordedCommand[] = [];

  async connect(target: RemoteTarget, _options: ConnectOptions): Promise<RemoteSession> {
    const name = formatTarget(target);
    return {
      exec: async (command: string): Promise<RemoteCommandResult> => {
        this.commands.push({ target: name, command });
        return { exitCode: 0, stdout: `[dry-run] ${command}\n`, stderr: "" };
      },
      close: () => undefined
    };
  }
}
