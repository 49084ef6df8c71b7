import { z } from "zod";
import { isSchedulableDuration } from "../utils/duration.js";

const DURATION_FORMAT = /^\d+(ms|s|m|h)$/;

const DurationSchema = z
  .string()
  .regex(DURATION_FORMAT, {
    message: "Duration must be in format like 30s, 10m, 1h, 500ms"
  })
  .refine((value) => !DURATION_FORMAT.test(value) || isSchedulableDuration(value), {
    message: "Duration must be at most 596h"
  });

const EnvNameSchema = z.string().regex(/^[A-Z_][A-Z0-9_]*$/, {
  message: "Must be an environment variable name like DEPLOY_HOST"
});

export const CommandCheckSchema = z.object({
  name: z.string().min(1, "name is required"),
  command: z.string().min(1),
  cwd: z.string().optional(),
  timeout: DurationSchema.default("5m"),
  env: z.record(z.string()).default({})
});

export const HttpCheckSchema = z.object({
  name: z.string().min(1, "name is required"),
  http: z.object({
    url: z.string().url(),
    method: z.enum(["GET", "HEAD", "POST"]).default("GET"),
    expect_status: z.number().int().min(100).max(599).default(200),
    expect_body: z.string().optional(),
    timeout: DurationSchema.default("10s")
  })
});

export const CheckSchema = z.union([CommandCheckSchema, HttpCheckSchema]);

export const TestsSchema = z.object({
  source_dir: z.string().default("."),
  checks: z.array(CheckSchema).min(1, "At least one check is required")
});

export const ConcurrencyPolicySchema = z.enum(["coalesce", "queue"]);

export const TriggerSchema = z.object({
  branch: z.string().min(1).default("main"),
  secret_env: EnvNameSchema.optional(),
  concurrency: ConcurrencyPolicySchema.default("coalesce")
});

export const DeployCommandsSchema = z.object({
  fetch: z.string().min(1).optional(),
  refresh: z.string().min(1).optional(),
  restart: z.string().min(1).optional()
});

export const VerifySchema = z.object({
  url: z.string().url(),
  expect_status: z.number().int().min(100).max(599).default(200),
  expect_body: z.string().optional(),
  attempts: z.number().int().min(1).max(30).default(5),
  interval: DurationSchema.default("2s"),
  timeout: DurationSchema.default("5s")
});

export const DeploySchema = z.object({
  host_env: EnvNameSchema.default("DEPLOY_HOST"),
  username_env: EnvNameSchema.default("DEPLOY_USER"),
  key_env: EnvNameSchema.default("DEPLOY_SSH_KEY"),
  port_env: EnvNameSchema.default("DEPLOY_PORT"),
  app_dir: z.string().min(1),
  service: z.string().min(1),
  commands: DeployCommandsSchema.default({}),
  connect_timeout: DurationSchema.default("30s"),
  command_timeout: DurationSchema.default("10m"),
  verify: VerifySchema.optional()
});

export const ServiceUnitSchema = z.object({
  description: z.string().default("Application managed by shipgate"),
  user: z.string().default("ubuntu"),
  working_directory: z.string().optional(),
  exec_start: z.string().min(1),
  environment: z.record(z.string()).default({}),
  restart_sec: z.number().int().min(0).default(3),
  start_limit_burst: z.number().int().min(1).default(5),
  start_limit_interval: DurationSchema.default("60s")
});

export const WebhookSchema = z.object({
  url: z.string().url(),
  on: z.array(z.string()).default(["*"]),
  headers: z.record(z.string()).default({}),
  retries: z.number().int().min(0).max(10).default(3)
});

export const NotificationsSchema = z.object({
  webhooks: z.array(WebhookSchema).default([])
});

export const ServerSchema = z.object({
  port: z.number().int().min(1_024).max(65_535).default(4200),
  host: z.string().default("127.0.0.1")
});

export const PipelineSchema = z.object({
  name: z.string().min(1),
  trigger: TriggerSchema.default({}),
  tests: TestsSchema,
  deploy: DeploySchema,
  service: ServiceUnitSchema.optional(),
  notifications: NotificationsSchema.default({}),
  server: ServerSchema.default({})
});

export const PipelineConfigSchema = z.object({
  pipeline: PipelineSchema
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type Pipeline = z.infer<typeof PipelineSchema>;
export type CheckConfig = z.infer<typeof CheckSchema>;
export type CommandCheckConfig = z.infer<typeof CommandCheckSchema>;
export type HttpCheckConfig = z.infer<typeof HttpCheckSchema>;
export type TriggerConfig = z.infer<typeof TriggerSchema>;
export type DeployConfig = z.infer<typeof DeploySchema>;
export type VerifyConfig = z.infer<typeof VerifySchema>;
export type ServiceUnitConfig = z.infer<typeof ServiceUnitSchema>;
export type ConcurrencyPolicy = z.infer<typeof ConcurrencyPolicySchema>;
