import type { InvocationResult } from "../deploy/invoker.js";
import type { ProbeResult } from "../deploy/probe.js";
import type { Verdict } from "../verdict/verdict.js";

export type RunState =
  | "QUEUED"
  | "TESTING"
  | "TEST_FAILED"
  | "DEPLOYING"
  | "VERIFYING"
  | "DEPLOYED"
  | "DEPLOY_FAILED"
  | "SUPERSEDED"
  | "INTERRUPTED";

export type TerminalRunState = Extract<
  RunState,
  "TEST_FAILED" | "DEPLOYED" | "DEPLOY_FAILED" | "SUPERSEDED" | "INTERRUPTED"
>;

export type RunTrigger = "push" | "manual" | "local";

export interface RunRequest {
  branch: string;
  trigger: RunTrigger;
  commit?: string;
  author?: string;
  message?: string;
}

export interface PipelineRun {
  id: string;
  pipeline: string;
  branch: string;
  trigger: RunTrigger;
  commit?: string;
  author?: string;
  message?: string;
  state: RunState;
  queuedAt: string;
  startedAt?: string;
  completedAt?: string;
  verdict?: Verdict;
  invocation?: InvocationResult;
  probe?: ProbeResult;
  reason?: string;
}
