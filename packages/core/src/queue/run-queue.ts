import type { ConcurrencyPolicy } from "../config/schema.js";
import { logger as rootLogger, type Logger } from "../logging/logger.js";
import type { PipelineController } from "../state/controller.js";
import type { PipelineRun, RunRequest } from "../state/types.js";

type RunExecutor = Pick<PipelineController, "createRun" | "execute" | "supersede" | "interrupt">;

export interface RunQueueOptions {
  policy?: ConcurrencyPolicy;
  logger?: Logger;
  onSettled?: (run: PipelineRun) => void;
}

/**
 * Serializes runs: one at a time, in arrival order. Under `coalesce` a new
 * request supersedes the still-queued runs of its branch; the active run is
 * never cancelled.
 */
export class RunQueue {
  private readonly pending: PipelineRun[] = [];
  private current: PipelineRun | null = null;
  private draining: Promise<void> | null = null;
  private closed = false;
  private readonly policy: ConcurrencyPolicy;
  private readonly log: Logger;

  constructor(
    private readonly controller: RunExecutor,
    private readonly options: RunQueueOptions = {}
  ) {
    this.policy = options.policy ?? "coalesce";
    this.log = (options.logger ?? rootLogger).child({ component: "run-queue" });
  }

  get active(): PipelineRun | null {
    return this.current;
  }

  get queued(): readonly PipelineRun[] {
    return this.pending;
  }

  submit(request: RunRequest): PipelineRun {
    if (this.closed) {
      throw new Error("Run queue is closed");
    }

    const run = this.controller.createRun(request);

    if (this.policy === "coalesce") {
      for (let index = this.pending.length - 1; index >= 0; index--) {
        const queued = this.pending[index];
        if (queued && queued.branch === run.branch) {
          this.pending.splice(index, 1);
          this.controller.supersede(queued, run.id);
        }
      }
    }

    this.pending.push(run);
    this.kick();
    return run;
  }

  /** Resolves once nothing is running or queued. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /** Stops accepting runs and marks the queued ones interrupted. The active run finishes. */
  async close(reason = "server shutting down"): Promise<void> {
    this.closed = true;
    for (const run of this.pending.splice(0)) {
      this.controller.interrupt(run, reason);
    }
    await this.idle();
  }

  private kick(): void {
    if (this.draining) {
      return;
    }
    this.draining = this.drain()
      .catch((error: unknown) => {
        this.log.error({ err: error }, "run queue drain failed");
      })
      .finally(() => {
        this.draining = null;
        if (this.pending.length > 0 && !this.closed) {
          this.kick();
        }
      });
  }

  private async drain(): Promise<void> {
    let next = this.pending.shift();
    while (next) {
      this.current = next;
      try {
        const finished = await this.controller.execute(next);
        this.options.onSettled?.(finished);
      } catch (error) {
        this.log.error({ err: error, run_id: next.id }, "run aborted by an unexpected error");
        this.controller.interrupt(next, "unexpected error while running");
      } finally {
        this.current = null;
      }
      next = this.closed ? undefined : this.pending.shift();
    }
  }
}
