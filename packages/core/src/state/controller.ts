import { randomUUID } from "node:crypto";
import type { Pipeline } from "../config/schema.js";
import type { RunEventEnvelope, RunEventType } from "../contracts/events.js";
import type { RunStore } from "../db/store.js";
import type { RemoteExecutor } from "../deploy/executor.js";
import { buildInvocation, DeploymentInvoker, type DeploymentInvocation } from "../deploy/invoker.js";
import {
  probeOptionsFromConfig,
  probeReachability,
  type ProbeOptions,
  type ProbeResult
} from "../deploy/probe.js";
import { envCredentialResolver, type CredentialResolver, type Environment } from "../deploy/target.js";
import { errorMessage } from "../errors.js";
import { RunEventBus } from "../events/event-bus.js";
import { decideGate, runGated } from "../gate/gate.js";
import { logger as rootLogger, type Logger } from "../logging/logger.js";
import { checksFromConfig, type TestCheck } from "../testing/checks.js";
import { TestRunner } from "../testing/runner.js";
import { verdictFailure, type SuccessVerdict, type Verdict } from "../verdict/verdict.js";
import { isTerminal, transitionRun } from "./machine.js";
import type { PipelineRun, RunRequest, RunState } from "./types.js";

export interface PipelineControllerDeps {
  executor: RemoteExecutor;
  /** Overrides the checks built from `tests.checks`. */
  checks?: readonly TestCheck[];
  resolveCredential?: CredentialResolver;
  probe?: (options: ProbeOptions) => Promise<ProbeResult>;
  env?: Environment;
  logger?: Logger;
}

/**
 * Drives a single run through test, gate, invoke and verify. Test, connectivity
 * and command failures end up as run state; only store or programming errors
 * escape `execute`.
 */
export class PipelineController {
  private readonly log: Logger;
  private readonly env: Environment;

  constructor(
    private readonly pipeline: Pipeline,
    private readonly store: RunStore,
    private readonly deps: PipelineControllerDeps,
    private readonly bus: RunEventBus = new RunEventBus()
  ) {
    this.env = deps.env ?? process.env;
    this.log = (deps.logger ?? rootLogger).child({ component: "controller", pipeline: pipeline.name });
  }

  get eventBus(): RunEventBus {
    return this.bus;
  }

  get name(): string {
    return this.pipeline.name;
  }

  get branch(): string {
    return this.pipeline.trigger.branch;
  }

  createRun(request: RunRequest, id: string = randomUUID()): PipelineRun {
    const run: PipelineRun = {
      id,
      pipeline: this.pipeline.name,
      branch: request.branch,
      trigger: request.trigger,
      ...(request.commit ? { commit: request.commit } : {}),
      ...(request.author ? { author: request.author } : {}),
      ...(request.message ? { message: request.message } : {}),
      state: "QUEUED",
      queuedAt: new Date().toISOString()
    };

    this.store.createRun(run);
    this.emit(run, "run_queued", {
      branch: run.branch,
      trigger: run.trigger,
      commit: run.commit ?? null
    });
    this.log.info({ run_id: run.id, branch: run.branch, trigger: run.trigger }, "run queued");
    return run;
  }

  async execute(queued: PipelineRun): Promise<PipelineRun> {
    const log = this.log.child({ run_id: queued.id });
    let run = this.transition(queued, "TESTING", "test phase started", {
      startedAt: new Date().toISOString()
    });
    this.emit(run, "run_started", { branch: run.branch, commit: run.commit ?? null });

    const verdict = await this.runTests(run, log);
    run = this.save({ ...run, verdict });
    this.emit(run, "verdict", {
      outcome: verdict.outcome,
      reason: verdict.outcome === "failure" ? verdict.reason : null
    });

    const decision = decideGate(verdict);
    this.emit(run, "gate_decision", decision);

    const testing = run;
    const outcome = await runGated(verdict, (passed) => this.deploy(testing, passed, log));
    if (outcome.status === "executed") {
      return outcome.value;
    }

    log.error({ reason: outcome.reason }, "gate closed; remote session not opened");
    return this.finish(run, "TEST_FAILED", outcome.reason);
  }

  supersede(run: PipelineRun, supersededBy: string): PipelineRun {
    const reason = `superseded by ${supersededBy}`;
    const next = this.transition(run, "SUPERSEDED", reason, { reason });
    this.emit(next, "run_superseded", { superseded_by: supersededBy });
    this.log.info({ run_id: run.id, superseded_by: supersededBy }, "queued run superseded");
    return next;
  }

  interrupt(run: PipelineRun, reason: string): PipelineRun {
    const latest = this.store.getRun(run.id) ?? run;
    if (isTerminal(latest.state)) {
      return latest;
    }
    const next = this.transition(latest, "INTERRUPTED", reason, { reason });
    this.emit(next, "run_interrupted", { from: latest.state, reason });
    this.log.warn({ run_id: run.id, from: latest.state, reason }, "run interrupted");
    return next;
  }

  /** Marks runs a previous process left unfinished. Nothing is resumed. */
  recoverInterrupted(): PipelineRun[] {
    return this.store
      .listUnfinished()
      .map((run) => this.interrupt(run, "process stopped before the run finished"));
  }

  private async runTests(run: PipelineRun, log: Logger): Promise<Verdict> {
    const checks = this.deps.checks ?? checksFromConfig(this.pipeline.tests.checks, this.pipeline.tests.source_dir);
    const runner = new TestRunner(checks, {
      logger: log,
      onCheck: (report) => this.emit(run, "check_result", report)
    });

    try {
      return await runner.run();
    } catch (error) {
      log.error({ err: error }, "test runner crashed");
      return verdictFailure(`test runner error: ${errorMessage(error)}`);
    }
  }

  private async deploy(testing: PipelineRun, passed: SuccessVerdict, log: Logger): Promise<PipelineRun> {
    let run = this.transition(testing, "DEPLOYING", "gate open");

    let invocation: DeploymentInvocation;
    try {
      invocation = buildInvocation(passed, this.pipeline.deploy, run.branch, this.env);
    } catch (error) {
      log.error({ err: error }, "cannot build deployment invocation");
      return this.finish(run, "DEPLOY_FAILED", `configuration: ${errorMessage(error)}`);
    }

    const invoker = new DeploymentInvoker(this.deps.executor, {
      resolveCredential: this.deps.resolveCredential ?? envCredentialResolver(this.env),
      logger: log,
      onStep: (step) =>
        this.emit(run, "deploy_step", {
          name: step.name,
          exit_code: step.exitCode,
          duration_ms: step.durationMs
        })
    });

    const result = await invoker.invoke(invocation);
    run = this.save({ ...run, invocation: result });

    if (result.status === "failed") {
      return this.finish(run, "DEPLOY_FAILED", `${result.kind}: ${result.message}`);
    }

    const verify = this.pipeline.deploy.verify;
    if (!verify) {
      return this.finish(run, "DEPLOYED");
    }

    run = this.transition(run, "VERIFYING", "restart succeeded");
    const probe = await (this.deps.probe ?? probeReachability)(probeOptionsFromConfig(verify));
    run = this.save({ ...run, probe });
    this.emit(run, "probe_result", probe);

    if (!probe.reachable) {
      return this.finish(run, "DEPLOY_FAILED", `probe: ${probe.error ?? "service unreachable"}`);
    }
    return this.finish(run, "DEPLOYED");
  }

  private finish(run: PipelineRun, to: RunState, reason?: string): PipelineRun {
    const next = this.transition(run, to, reason ?? to.toLowerCase(), reason ? { reason } : {});
    this.emit(next, "run_complete", { state: to, reason: reason ?? null });

    if (to === "DEPLOYED") {
      this.log.info({ run_id: run.id }, "run deployed");
    } else {
      this.log.error({ run_id: run.id, state: to, reason }, "run failed");
    }
    return next;
  }

  private transition(
    run: PipelineRun,
    to: RunState,
    reason: string,
    patch: Partial<PipelineRun> = {}
  ): PipelineRun {
    const next = transitionRun(run, to, patch);
    this.store.updateRun(next);
    this.store.recordTransition(run.id, run.state, to, reason);
    return next;
  }

  private save(run: PipelineRun): PipelineRun {
    this.store.updateRun(run);
    return run;
  }

  private emit<T>(run: PipelineRun, type: RunEventType, data: T): void {
    const event: RunEventEnvelope<T> = {
      type,
      run_id: run.id,
      timestamp: new Date().toISOString(),
      data
    };

    this.store.recordEvent(event);
    this.bus.emitEvent(event);
  }
}
