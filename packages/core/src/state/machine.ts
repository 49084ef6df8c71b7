import { InvalidTransitionError } from "../errors.js";
import type { PipelineRun, RunState, TerminalRunState } from "./types.js";

const ALLOWED: Record<RunState, RunState[]> = {
  QUEUED: ["TESTING", "SUPERSEDED", "INTERRUPTED"],
  TESTING: ["TEST_FAILED", "DEPLOYING", "INTERRUPTED"],
  DEPLOYING: ["VERIFYING", "DEPLOYED", "DEPLOY_FAILED", "INTERRUPTED"],
  VERIFYING: ["DEPLOYED", "DEPLOY_FAILED", "INTERRUPTED"],
  TEST_FAILED: [],
  DEPLOYED: [],
  DEPLOY_FAILED: [],
  SUPERSEDED: [],
  INTERRUPTED: []
};

export function isTerminal(state: RunState): state is TerminalRunState {
  return ALLOWED[state].length === 0;
}

export function assertTransitionAllowed(from: RunState, to: RunState): void {
  if (!ALLOWED[from].includes(to)) {
    throw new InvalidTransitionError(from, to);
  }
}

export function transitionRun(run: PipelineRun, to: RunState, patch: Partial<PipelineRun> = {}): PipelineRun {
  assertTransitionAllowed(run.state, to);
  return {
    ...run,
    ...patch,
    state: to,
    ...(isTerminal(to) ? { completedAt: patch.completedAt ?? new Date().toISOString() } : {})
  };
}
