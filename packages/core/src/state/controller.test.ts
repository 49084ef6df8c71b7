import { describe, expect, it, vi } from "vitest";
import { PipelineSchema } from "../config/schema.js";
import type { RunEventEnvelope } from "../contracts/events.js";
import { MemoryRunStore } from "../db/memory-store.js";
import type { RemoteCommandResult, RemoteExecutor, RemoteSession } from "../deploy/executor.js";
import type { ProbeOptions, ProbeResult } from "../deploy/probe.js";
import { ConnectivityError } from "../errors.js";
import type { TestCheck } from "../testing/checks.js";
import { PipelineController, type PipelineControllerDeps } from "./controller.js";

class FakeExecutor implements RemoteExecutor {
  readonly executed: string[] = [];
  connections = 0;

  constructor(
    private readonly results: Record<string, RemoteCommandResult> = {},
    private readonly connectError?: Error
  ) {}

  async connect(): Promise<RemoteSession> {
    this.connections += 1;
    if (this.connectError) {
      throw this.connectError;
    }
    return {
      exec: async (command) => {
        this.executed.push(command);
        const match = Object.entries(this.results).find(([fragment]) => command.includes(fragment));
        return match?.[1] ?? { exitCode: 0, stdout: "", stderr: "" };
      },
      close: () => undefined
    };
  }
}

const passing = (name: string): TestCheck => ({ name, run: async () => undefined });
const failing = (name: string, message: string): TestCheck => ({
  name,
  run: async () => {
    throw new Error(message);
  }
});

const env = { DEPLOY_HOST: "203.0.113.10", DEPLOY_USER: "ubuntu", DEPLOY_SSH_KEY: "test-key" };

function pipeline(verify = false) {
  return PipelineSchema.parse({
    name: "sample",
    tests: { checks: [{ name: "unit", command: "npm test" }] },
    deploy: {
      app_dir: "/home/ubuntu/app",
      service: "app.service",
      ...(verify ? { verify: { url: "http://203.0.113.10:5000/", attempts: 1 } } : {})
    }
  });
}

function setup(overrides: Partial<PipelineControllerDeps> = {}, verify = false) {
  const store = new MemoryRunStore();
  const executor = overrides.executor ?? new FakeExecutor();
  const controller = new PipelineController(pipeline(verify), store, {
    checks: [passing("unit")],
    env,
    ...overrides,
    executor
  });
  const events: RunEventEnvelope[] = [];
  controller.eventBus.on("event", (event: RunEventEnvelope) => events.push(event));
  return { store, executor, controller, events };
}

describe("PipelineController", () => {
  it("deploys when every check passes", async () => {
    const executor = new FakeExecutor();
    const { controller, store, events } = setup({ executor });

    const run = controller.createRun({ branch: "main", trigger: "push", commit: "abc123" });
    const finished = await controller.execute(run);

    expect(finished.state).toBe("DEPLOYED");
    expect(finished.completedAt).toBeDefined();
    expect(finished.invocation?.status).toBe("succeeded");
    expect(executor.executed).toEqual([
      "cd /home/ubuntu/app && git fetch --prune origin && git reset --hard origin/main",
      "cd /home/ubuntu/app && npm ci --omit=dev",
      "sudo systemctl restart app.service"
    ]);
    expect(store.getRun(run.id)?.state).toBe("DEPLOYED");
    expect(store.transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
      "QUEUED->TESTING",
      "TESTING->DEPLOYING",
      "DEPLOYING->DEPLOYED"
    ]);
    expect(events.map((event) => event.type)).toEqual([
      "run_queued",
      "run_started",
      "check_result",
      "verdict",
      "gate_decision",
      "deploy_step",
      "deploy_step",
      "deploy_step",
      "run_complete"
    ]);
  });

  it("never opens a remote session when a check fails", async () => {
    const executor = new FakeExecutor();
    const { controller, events } = setup({
      executor,
      checks: [passing("lint"), failing("unit", "expected 12, got 13"), passing("smoke")]
    });

    const finished = await controller.execute(controller.createRun({ branch: "main", trigger: "push" }));

    expect(finished.state).toBe("TEST_FAILED");
    expect(finished.reason).toBe("check 'unit' failed: expected 12, got 13");
    expect(finished.verdict?.checks.map((check) => check.status)).toEqual(["passed", "failed", "skipped"]);
    expect(finished.invocation).toBeUndefined();
    expect(executor.connections).toBe(0);
    expect(events.find((event) => event.type === "gate_decision")?.data).toEqual({
      open: false,
      reason: "check 'unit' failed: expected 12, got 13"
    });
  });

  it("reports a connectivity failure with no steps run", async () => {
    const executor = new FakeExecutor({}, new ConnectivityError("Cannot open session to ubuntu@203.0.113.10:22: timed out", "203.0.113.10"));
    const { controller } = setup({ executor });

    const finished = await controller.execute(controller.createRun({ branch: "main", trigger: "push" }));

    expect(finished.state).toBe("DEPLOY_FAILED");
    expect(finished.reason).toBe("connectivity: Cannot open session to ubuntu@203.0.113.10:22: timed out");
    expect(finished.invocation?.steps).toEqual([]);
    expect(executor.executed).toEqual([]);
  });

  it("stops at the failing step and leaves earlier steps in place", async () => {
    const executor = new FakeExecutor({ "npm ci": { exitCode: 1, stdout: "", stderr: "npm ERR! lockfile" } });
    const { controller } = setup({ executor });

    const finished = await controller.execute(controller.createRun({ branch: "main", trigger: "push" }));

    expect(finished.state).toBe("DEPLOY_FAILED");
    expect(finished.reason).toBe("command: Step refresh failed with exit 1");
    expect(executor.executed).toHaveLength(2);
    expect(executor.executed.some((command) => command.includes("systemctl"))).toBe(false);
  });

  it("fails before connecting when the target variables are missing", async () => {
    const executor = new FakeExecutor();
    const { controller } = setup({ executor, env: { DEPLOY_SSH_KEY: "test-key" } });

    const finished = await controller.execute(controller.createRun({ branch: "main", trigger: "manual" }));

    expect(finished.state).toBe("DEPLOY_FAILED");
    expect(finished.reason).toBe(
      "configuration: Missing or empty required environment variables:\n  - DEPLOY_HOST\n  - DEPLOY_USER"
    );
    expect(executor.connections).toBe(0);
  });

  it("turns a crashing runner into a failed verdict", async () => {
    const { controller } = setup({
      checks: [
        {
          get name(): string {
            throw new Error("broken check");
          },
          run: async () => undefined
        }
      ]
    });

    const finished = await controller.execute(controller.createRun({ branch: "main", trigger: "push" }));

    expect(finished.state).toBe("TEST_FAILED");
    expect(finished.reason).toBe("test runner error: broken check");
  });

  it("verifies reachability after the restart", async () => {
    const probe = vi.fn<(options: ProbeOptions) => Promise<ProbeResult>>(async () => ({
      reachable: true,
      attempts: 1,
      status: 200
    }));
    const { controller, store } = setup({ probe }, true);

    const finished = await controller.execute(controller.createRun({ branch: "main", trigger: "push" }));

    expect(finished.state).toBe("DEPLOYED");
    expect(finished.probe).toEqual({ reachable: true, attempts: 1, status: 200 });
    expect(probe).toHaveBeenCalledWith({
      url: "http://203.0.113.10:5000/",
      expectStatus: 200,
      attempts: 1,
      intervalMs: 2_000,
      timeoutMs: 5_000
    });
    expect(store.transitions.map((t) => t.to)).toEqual(["TESTING", "DEPLOYING", "VERIFYING", "DEPLOYED"]);
  });

  it("fails the run when the restarted service is unreachable", async () => {
    const probe = async (): Promise<ProbeResult> => ({ reachable: false, attempts: 1, error: "fetch failed" });
    const { controller } = setup({ probe }, true);

    const finished = await controller.execute(controller.createRun({ branch: "main", trigger: "push" }));

    expect(finished.state).toBe("DEPLOY_FAILED");
    expect(finished.reason).toBe("probe: fetch failed");
    expect(finished.invocation?.status).toBe("succeeded");
  });

  it("opens a remote session if and only if every check passed", async () => {
    const suites: Array<{ checks: TestCheck[]; deployed: boolean }> = [
      { checks: [passing("a")], deployed: true },
      { checks: [passing("a"), passing("b"), passing("c")], deployed: true },
      { checks: [failing("a", "boom")], deployed: false },
      { checks: [passing("a"), failing("b", "boom")], deployed: false },
      { checks: [failing("a", "boom"), passing("b")], deployed: false }
    ];

    for (const suite of suites) {
      const executor = new FakeExecutor();
      const { controller } = setup({ executor, checks: suite.checks });
      const finished = await controller.execute(controller.createRun({ branch: "main", trigger: "push" }));

      expect(executor.connections > 0).toBe(suite.deployed);
      expect(finished.state).toBe(suite.deployed ? "DEPLOYED" : "TEST_FAILED");
    }
  });

  it("supersedes queued runs and interrupts unfinished ones", () => {
    const { controller, store } = setup();
    const first = controller.createRun({ branch: "main", trigger: "push" });
    const second = controller.createRun({ branch: "main", trigger: "push" });

    const superseded = controller.supersede(first, second.id);
    expect(superseded.state).toBe("SUPERSEDED");
    expect(superseded.reason).toBe(`superseded by ${second.id}`);

    const recovered = controller.recoverInterrupted();
    expect(recovered.map((run) => run.id)).toEqual([second.id]);
    expect(store.getRun(second.id)?.state).toBe("INTERRUPTED");
    expect(store.listUnfinished()).toEqual([]);
  });

  it("leaves terminal runs alone when interrupting", async () => {
    const { controller } = setup();
    const finished = await controller.execute(controller.createRun({ branch: "main", trigger: "push" }));

    expect(controller.interrupt(finished, "shutdown").state).toBe("DEPLOYED");
  });
});
