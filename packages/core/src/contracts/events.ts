import { z } from "zod";

export const RunEventTypeSchema = z.enum([
  "run_queued",
  "run_started",
  "check_result",
  "verdict",
  "gate_decision",
  "deploy_step",
  "probe_result",
  "run_complete",
  "run_superseded",
  "run_interrupted"
]);

export type RunEventType = z.infer<typeof RunEventTypeSchema>;

export interface RunEventEnvelope<T = unknown> {
  type: RunEventType;
  timestamp: string;
  run_id: string;
  data: T;
}
