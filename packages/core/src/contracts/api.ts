import { z } from "zod";
import type { PipelineRun } from "../state/types.js";

export const RunStateSchema = z.enum([
  "QUEUED",
  "TESTING",
  "TEST_FAILED",
  "DEPLOYING",
  "VERIFYING",
  "DEPLOYED",
  "DEPLOY_FAILED",
  "SUPERSEDED",
  "INTERRUPTED"
]);

export const TriggerRequestSchema = z.object({
  commit: z.string().min(1).optional(),
  message: z.string().optional()
});

export const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10)
});

export const RunSummarySchema = z.object({
  id: z.string(),
  pipeline: z.string(),
  branch: z.string(),
  trigger: z.enum(["push", "manual", "local"]),
  commit: z.string().nullable(),
  state: RunStateSchema,
  queued_at: z.string(),
  started_at: z.string().nullable(),
  completed_at: z.string().nullable(),
  reason: z.string().nullable()
});

export const CheckReportSchema = z.object({
  name: z.string(),
  status: z.enum(["passed", "failed", "skipped"]),
  durationMs: z.number(),
  detail: z.string().optional()
});

export const VerdictSchema = z.discriminatedUnion("outcome", [
  z.object({ outcome: z.literal("success"), checks: z.array(CheckReportSchema) }),
  z.object({ outcome: z.literal("failure"), reason: z.string(), checks: z.array(CheckReportSchema) })
]);

export const StepResultSchema = z.object({
  name: z.enum(["fetch", "refresh", "restart"]),
  command: z.string(),
  exitCode: z.number().int().nullable(),
  signal: z.string().optional(),
  stdout: z.string(),
  stderr: z.string(),
  durationMs: z.number()
});

export const InvocationResultSchema = z.object({
  status: z.enum(["succeeded", "failed"]),
  kind: z.enum(["connectivity", "command"]).optional(),
  failedStep: z.enum(["fetch", "refresh", "restart"]).optional(),
  message: z.string().optional(),
  target: z.string(),
  steps: z.array(StepResultSchema),
  durationMs: z.number()
});

export const ProbeResultSchema = z.object({
  reachable: z.boolean(),
  attempts: z.number().int(),
  status: z.number().int().optional(),
  error: z.string().optional()
});

export const RunDetailSchema = RunSummarySchema.extend({
  verdict: VerdictSchema.nullable(),
  invocation: InvocationResultSchema.nullable(),
  probe: ProbeResultSchema.nullable()
});

export const StatusResponseSchema = z.object({
  pipeline: z.string(),
  branch: z.string(),
  active: RunSummarySchema.nullable(),
  queued: z.number().int(),
  last: RunSummarySchema.nullable()
});

export const HistoryResponseSchema = z.object({
  runs: z.array(RunSummarySchema)
});

export const TriggerResponseSchema = z.object({
  run_id: z.string(),
  state: RunStateSchema
});

export type TriggerRequest = z.infer<typeof TriggerRequestSchema>;
export type RunSummary = z.infer<typeof RunSummarySchema>;
export type RunDetail = z.infer<typeof RunDetailSchema>;
export type StatusResponse = z.infer<typeof StatusResponseSchema>;
export type HistoryResponse = z.infer<typeof HistoryResponseSchema>;
export type TriggerResponse = z.infer<typeof TriggerResponseSchema>;

export function toRunSummary(run: PipelineRun): RunSummary {
  return {
    id: run.id,
    pipeline: run.pipeline,
    branch: run.branch,
    trigger: run.trigger,
    commit: run.commit ?? null,
    state: run.state,
    queued_at: run.queuedAt,
    started_at: run.startedAt ?? null,
    completed_at: run.completedAt ?? null,
    reason: run.reason ?? null
  };
}

export function toRunDetail(run: PipelineRun): RunDetail {
  return {
    ...toRunSummary(run),
    verdict: run.verdict ?? null,
    invocation: run.invocation ?? null,
    probe: run.probe ?? null
  };
}
