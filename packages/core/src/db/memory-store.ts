import type { RunEventEnvelope } from "../contracts/events.js";
import { isTerminal } from "../state/machine.js";
import type { PipelineRun, RunState } from "../state/types.js";
import type { RunStore } from "./store.js";

export interface TransitionRecord {
  runId: string;
  from: RunState;
  to: RunState;
  reason?: string;
}

/** Process-local store for one-shot CLI runs and tests. */
export class MemoryRunStore implements RunStore {
  private runs = new Map<string, PipelineRun>();
  private order: string[] = [];
  readonly transitions: TransitionRecord[] = [];
  private events: RunEventEnvelope[] = [];

  createRun(run: PipelineRun): void {
    this.runs.set(run.id, { ...run });
    this.order.push(run.id);
  }

  updateRun(run: PipelineRun): void {
    if (this.runs.has(run.id)) {
      this.runs.set(run.id, { ...run });
    }
  }

  recordTransition(runId: string, from: RunState, to: RunState, reason?: string): void {
    this.transitions.push({ runId, from, to, ...(reason !== undefined ? { reason } : {}) });
  }

  recordEvent<T>(event: RunEventEnvelope<T>): void {
    this.events.push(event);
  }

  getRun(id: string): PipelineRun | null {
    const run = this.runs.get(id);
    return run ? { ...run } : null;
  }

  listUnfinished(): PipelineRun[] {
    return this.collect(this.order).filter((run) => !isTerminal(run.state));
  }

  listHistory(limit: number): PipelineRun[] {
    return this.collect([...this.order].reverse()).slice(0, limit);
  }

  getRecentEvents(runId: string, limit = 50): RunEventEnvelope[] {
    return this.events
      .filter((event) => event.run_id === runId)
      .reverse()
      .slice(0, limit);
  }

  close(): void {
    this.runs.clear();
    this.order = [];
  }

  private collect(ids: string[]): PipelineRun[] {
    const out: PipelineRun[] = [];
    for (const id of ids) {
      const run = this.runs.get(id);
      if (run) {
        out.push({ ...run });
      }
    }
    return out;
  }
}
