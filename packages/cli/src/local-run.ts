import {
  DryRunExecutor,
  MemoryRunStore,
  PipelineController,
  RunEventBus,
  SshRemoteExecutor,
  type Environment,
  type Logger,
  type Pipeline,
  type PipelineRun,
  type RecordedCommand,
  type RemoteExecutor,
  type RunEventEnvelope,
  type TestCheck
} from "@shipgate/core";

export interface LocalRunOptions {
  dryRun?: boolean;
  commit?: string;
  env?: Environment;
  checks?: readonly TestCheck[];
  executor?: RemoteExecutor;
  logger?: Logger;
  onEvent?: (event: RunEventEnvelope) => void;
}

export interface LocalRunResult {
  run: PipelineRun;
  /** Commands a dry run would have sent. */
  commands: RecordedCommand[];
}

/** Target values used by a dry run when the real ones are not exported. */
export function dryRunEnvironment(pipeline: Pipeline, env: Environment): Environment {
  const { deploy } = pipeline;
  return {
    [deploy.host_env]: "dry-run.invalid",
    [deploy.username_env]: "deploy",
    [deploy.key_env]: "dry-run-key",
    ...Object.fromEntries(Object.entries(env).filter(([, value]) => value))
  };
}

/**
 * One run of the whole pipeline from the operator's machine: test phase,
 * gate, remote invocation and verification. History stays in memory.
 */
export async function runLocalPipeline(pipeline: Pipeline, options: LocalRunOptions = {}): Promise<LocalRunResult> {
  const baseEnv = options.env ?? process.env;
  const dryRun = options.dryRun ?? false;
  const dryRunExecutor = new DryRunExecutor();

  const bus = new RunEventBus();
  if (options.onEvent) {
    bus.on("event", options.onEvent);
  }

  const controller = new PipelineController(
    pipeline,
    new MemoryRunStore(),
    {
      executor: options.executor ?? (dryRun ? dryRunExecutor : new SshRemoteExecutor()),
      env: dryRun ? dryRunEnvironment(pipeline, baseEnv) : baseEnv,
      ...(options.checks ? { checks: options.checks } : {}),
      ...(options.logger ? { logger: options.logger } : {}),
      ...(dryRun ? { probe: async () => ({ reachable: true, attempts: 0 }) } : {})
    },
    bus
  );

  const queued = controller.createRun({
    branch: pipeline.trigger.branch,
    trigger: "local",
    ...(options.commit ? { commit: options.commit } : {})
  });
  const run = await controller.execute(queued);
  return { run, commands: dryRunExecutor.commands };
}

/** 0 when deployed, 1 when the test phase failed, 2 when the deploy phase failed. */
export function runExitCode(run: PipelineRun): 0 | 1 | 2 {
  if (run.state === "DEPLOYED") {
    return 0;
  }
  return run.state === "TEST_FAILED" ? 1 : 2;
}
