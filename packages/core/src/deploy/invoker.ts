import type { DeployConfig } from "../config/schema.js";
import { errorMessage } from "../errors.js";
import { logger as rootLogger, type Logger } from "../logging/logger.js";
import { parseDuration } from "../utils/duration.js";
import type { SuccessVerdict } from "../verdict/verdict.js";
import type { RemoteExecutor, RemoteSession } from "./executor.js";
import { buildDeploySteps, type DeployStep, type DeployStepName } from "./script.js";
import {
  envCredentialResolver,
  formatTarget,
  resolveRemoteTarget,
  type CredentialResolver,
  type Environment,
  type RemoteTarget
} from "./target.js";

/** One execution of the remote command sequence. Never retried automatically. */
export interface DeploymentInvocation {
  target: RemoteTarget;
  credentialRef: string;
  steps: DeployStep[];
  connectTimeoutMs: number;
  commandTimeoutMs: number;
}

export interface StepResult {
  name: DeployStepName;
  command: string;
  exitCode: number | null;
  signal?: string;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export type FailureKind = "connectivity" | "command";

export type InvocationResult =
  | {
      status: "succeeded";
      target: string;
      steps: StepResult[];
      durationMs: number;
    }
  | {
      status: "failed";
      kind: FailureKind;
      failedStep?: DeployStepName;
      message: string;
      target: string;
      steps: StepResult[];
      durationMs: number;
    };

/**
 * Only a passing verdict can produce an invocation; the parameter exists so a
 * failed build cannot reach this point through the type system.
 */
export function buildInvocation(
  _passed: SuccessVerdict,
  deploy: DeployConfig,
  branch: string,
  env: Environment = process.env
): DeploymentInvocation {
  return {
    target: resolveRemoteTarget(deploy, env),
    credentialRef: deploy.key_env,
    steps: buildDeploySteps(deploy, branch),
    connectTimeoutMs: parseDuration(deploy.connect_timeout),
    commandTimeoutMs: parseDuration(deploy.command_timeout)
  };
}

export interface DeploymentInvokerOptions {
  resolveCredential?: CredentialResolver;
  logger?: Logger;
  onStep?: (step: StepResult) => void;
}

export class DeploymentInvoker {
  private readonly resolveCredential: CredentialResolver;
  private readonly log: Logger;

  constructor(
    private readonly executor: RemoteExecutor,
    private readonly options: DeploymentInvokerOptions = {}
  ) {
    this.resolveCredential = options.resolveCredential ?? envCredentialResolver();
    this.log = (options.logger ?? rootLogger).child({ component: "invoker" });
  }

  async invoke(invocation: DeploymentInvocation): Promise<InvocationResult> {
    const startedAt = Date.now();
    const target = formatTarget(invocation.target);
    const steps: StepResult[] = [];

    const fail = (kind: FailureKind, message: string, failedStep?: DeployStepName): InvocationResult => {
      this.log.error({ target, kind, step: failedStep }, message);
      return {
        status: "failed",
        kind,
        ...(failedStep ? { failedStep } : {}),
        message,
        target,
        steps,
        durationMs: Date.now() - startedAt
      };
    };

    const privateKey = this.resolveCredential(invocation.credentialRef);
    if (!privateKey) {
      return fail("connectivity", `Credential ${invocation.credentialRef} is not set`);
    }

    let session: RemoteSession;
    try {
      this.log.info({ target }, "opening remote session");
      session = await this.executor.connect(invocation.target, {
        privateKey,
        timeoutMs: invocation.connectTimeoutMs
      });
    } catch (error) {
      return fail("connectivity", errorMessage(error));
    }

    try {
      for (const step of invocation.steps) {
        const stepStartedAt = Date.now();
        this.log.info({ target, step: step.name, command: step.command }, "running deploy step");

        let result: StepResult;
        try {
          const output = await session.exec(step.command, { timeoutMs: invocation.commandTimeoutMs });
          result = {
            name: step.name,
            command: step.command,
            exitCode: output.exitCode,
            ...(output.signal ? { signal: output.signal } : {}),
            stdout: output.stdout,
            stderr: output.stderr,
            durationMs: Date.now() - stepStartedAt
          };
        } catch (error) {
          return fail("command", `Step ${step.name} failed: ${errorMessage(error)}`, step.name);
        }

        steps.push(result);
        this.options.onStep?.(result);

        if (result.exitCode !== 0) {
          const status = result.exitCode === null ? `signal ${result.signal ?? "unknown"}` : `exit ${result.exitCode}`;
          return fail("command", `Step ${step.name} failed with ${status}`, step.name);
        }
      }
    } finally {
      session.close();
    }

    this.log.info({ target, steps: steps.length }, "deployment invocation succeeded");
    return { status: "succeeded", target, steps, durationMs: Date.now() - startedAt };
  }
}
