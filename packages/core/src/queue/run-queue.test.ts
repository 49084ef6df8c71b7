import { describe, expect, it } from "vitest";
import { PipelineSchema } from "../config/schema.js";
import { MemoryRunStore } from "../db/memory-store.js";
import { DryRunExecutor } from "../deploy/dry-run-executor.js";
import { PipelineController } from "../state/controller.js";
import type { PipelineRun } from "../state/types.js";
import { RunQueue } from "./run-queue.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

function setup(policy: "coalesce" | "queue") {
  const store = new MemoryRunStore();
  const release = deferred();
  const started: string[] = [];
  const executor = new DryRunExecutor();

  const controller = new PipelineController(
    PipelineSchema.parse({
      name: "sample",
      tests: { checks: [{ name: "unit", command: "npm test" }] },
      deploy: { app_dir: "/srv/app", service: "app.service" }
    }),
    store,
    {
      executor,
      env: { DEPLOY_HOST: "203.0.113.10", DEPLOY_USER: "ubuntu", DEPLOY_SSH_KEY: "test-key" },
      checks: [
        {
          name: "gated",
          run: async () => {
            started.push(String(started.length));
            await release.promise;
          }
        }
      ]
    }
  );

  const settled: PipelineRun[] = [];
  const queue = new RunQueue(controller, { policy, onSettled: (run) => settled.push(run) });
  return { store, queue, release, settled, executor, started };
}

describe("RunQueue", () => {
  it("runs one run at a time and coalesces queued pushes per branch", async () => {
    const { queue, release, settled, store } = setup("coalesce");

    const first = queue.submit({ branch: "main", trigger: "push", commit: "c1" });
    const second = queue.submit({ branch: "main", trigger: "push", commit: "c2" });
    const third = queue.submit({ branch: "main", trigger: "push", commit: "c3" });

    expect(queue.active?.id).toBe(first.id);
    expect(queue.queued.map((run) => run.id)).toEqual([third.id]);
    expect(store.getRun(second.id)?.state).toBe("SUPERSEDED");
    expect(store.getRun(second.id)?.reason).toBe(`superseded by ${third.id}`);

    release.resolve();
    await queue.idle();

    expect(settled.map((run) => [run.commit, run.state])).toEqual([
      ["c1", "DEPLOYED"],
      ["c3", "DEPLOYED"]
    ]);
    expect(queue.active).toBeNull();
  });

  it("keeps every run under the queue policy", async () => {
    const { queue, release, settled, executor } = setup("queue");

    queue.submit({ branch: "main", trigger: "push", commit: "c1" });
    queue.submit({ branch: "main", trigger: "push", commit: "c2" });
    queue.submit({ branch: "main", trigger: "manual" });
    expect(queue.queued).toHaveLength(2);

    release.resolve();
    await queue.idle();

    expect(settled.map((run) => run.commit ?? "manual")).toEqual(["c1", "c2", "manual"]);
    expect(executor.commands).toHaveLength(9);
  });

  it("interrupts queued runs on close and lets the active run finish", async () => {
    const { queue, release, store, settled } = setup("queue");

    const active = queue.submit({ branch: "main", trigger: "push" });
    const waiting = queue.submit({ branch: "main", trigger: "push" });

    const closing = queue.close();
    expect(() => queue.submit({ branch: "main", trigger: "push" })).toThrow("Run queue is closed");

    release.resolve();
    await closing;

    expect(store.getRun(waiting.id)?.state).toBe("INTERRUPTED");
    expect(store.getRun(active.id)?.state).toBe("DEPLOYED");
    expect(settled.map((run) => run.id)).toEqual([active.id]);
  });
});
