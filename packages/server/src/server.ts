import type { Server as HttpServer } from "node:http";
import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { WebSocketServer } from "ws";
import {
  errorMessage,
  evaluatePush,
  HistoryQuerySchema,
  isTerminal,
  logger as rootLogger,
  PipelineController,
  PushEventSchema,
  RunEventBus,
  RunQueue,
  SqliteRunStore,
  SshRemoteExecutor,
  toRunDetail,
  toRunSummary,
  TriggerRequestSchema,
  verifySignature,
  type Environment,
  type Logger,
  type PipelineConfig,
  type PipelineControllerDeps,
  type RunEventEnvelope,
  type RunStore,
  type StatusResponse
} from "@shipgate/core";
import { WebhookDispatcher } from "./services/webhook-dispatcher.js";

export interface ShipgateServerOptions {
  config: PipelineConfig;
  host?: string;
  port?: number;
  dbPath?: string;
  /** Replaces the sqlite store, mostly for tests. */
  store?: RunStore;
  deps?: Partial<PipelineControllerDeps>;
  dispatcher?: WebhookDispatcher;
  env?: Environment;
  logger?: Logger;
}

export class ShipgateServer {
  readonly app = new Hono();

  private readonly store: RunStore;
  private readonly eventBus = new RunEventBus();
  private readonly controller: PipelineController;
  private readonly queue: RunQueue;
  private readonly webhookDispatcher: WebhookDispatcher;
  private readonly env: Environment;
  private readonly log: Logger;

  private server?: ReturnType<typeof serve>;
  private ws?: WebSocketServer;

  private host: string;
  private port: number;

  constructor(private readonly options: ShipgateServerOptions) {
    const pipeline = options.config.pipeline;
    this.host = options.host ?? pipeline.server.host;
    this.port = options.port ?? pipeline.server.port;
    this.env = options.env ?? process.env;
    this.log = (options.logger ?? rootLogger).child({ component: "server" });

    this.store = options.store ?? new SqliteRunStore(options.dbPath ?? "./shipgate.db");
    this.controller = new PipelineController(
      pipeline,
      this.store,
      {
        executor: new SshRemoteExecutor(),
        env: this.env,
        ...options.deps,
        ...(options.logger ? { logger: options.logger } : {})
      },
      this.eventBus
    );
    this.queue = new RunQueue(this.controller, {
      policy: pipeline.trigger.concurrency,
      ...(options.logger ? { logger: options.logger } : {})
    });

    const recovered = this.controller.recoverInterrupted();
    if (recovered.length > 0) {
      this.log.warn({ runs: recovered.map((run) => run.id) }, "marked unfinished runs as interrupted");
    }

    this.webhookDispatcher =
      options.dispatcher ?? new WebhookDispatcher(pipeline.notifications.webhooks, { logger: this.log });
    this.eventBus.on("event", (event: RunEventEnvelope) => {
      this.webhookDispatcher.dispatch(event).catch((error: unknown) => {
        this.log.warn({ err: error, event: event.type }, "webhook dispatch failed");
      });
    });

    this.setupApp();
  }

  async start(): Promise<void> {
    this.server = serve({
      fetch: this.app.fetch,
      hostname: this.host,
      port: this.port
    });

    this.ws = new WebSocketServer({ server: this.server as unknown as HttpServer, path: "/ws" });
    this.eventBus.on("event", (event: RunEventEnvelope) => {
      this.broadcast(event);
    });
  }

  async stop(): Promise<void> {
    await this.queue.close();
    this.ws?.close();
    this.server?.close();
    this.store.close();
  }

  /** Resolves once no run is active or queued. */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  getAddress(): string {
    return `http://${this.host}:${this.port}`;
  }

  private setupApp(): void {
    this.app.get("/health", (c) => c.json({ ok: true }));

    this.app.post("/webhooks/github", async (c) => {
      const body = await c.req.text();

      const secretEnv = this.options.config.pipeline.trigger.secret_env;
      const secret = secretEnv ? this.env[secretEnv] : undefined;
      if (secret && !verifySignature(body, c.req.header("x-hub-signature-256"), secret)) {
        this.log.warn({ delivery: c.req.header("x-github-delivery") }, "rejected webhook with a bad signature");
        return c.json({ error: "invalid signature" }, 401);
      }

      const eventName = c.req.header("x-github-event") ?? "push";
      if (eventName !== "push") {
        return c.json({ ignored: `event ${eventName}` }, 202);
      }

      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch {
        return c.json({ error: "body is not valid JSON" }, 400);
      }

      const parsed = PushEventSchema.safeParse(payload);
      if (!parsed.success) {
        return c.json({ error: parsed.error.issues.map((issue) => issue.message).join("; ") }, 400);
      }

      const decision = evaluatePush(parsed.data, this.controller.branch);
      if (!decision.accepted) {
        this.log.info({ reason: decision.reason }, "push ignored");
        return c.json({ ignored: decision.reason }, 202);
      }

      try {
        const run = this.queue.submit(decision.request);
        return c.json({ run_id: run.id, state: run.state }, 202);
      } catch (error) {
        return c.json({ error: errorMessage(error) }, 503);
      }
    });

    this.app.post("/api/runs", async (c) => {
      const parsed = TriggerRequestSchema.safeParse(await c.req.json().catch(() => ({})));
      if (!parsed.success) {
        return c.json({ error: parsed.error.issues.map((issue) => issue.message).join("; ") }, 400);
      }

      try {
        const run = this.queue.submit({
          branch: this.controller.branch,
          trigger: "manual",
          ...(parsed.data.commit ? { commit: parsed.data.commit } : {}),
          ...(parsed.data.message ? { message: parsed.data.message } : {})
        });
        return c.json({ run_id: run.id, state: run.state }, 202);
      } catch (error) {
        return c.json({ error: errorMessage(error) }, 503);
      }
    });

    this.app.get("/api/status", (c) => {
      const active = this.queue.active;
      const last = this.store.listHistory(25).find((run) => isTerminal(run.state));
      const status: StatusResponse = {
        pipeline: this.controller.name,
        branch: this.controller.branch,
        active: active ? toRunSummary(this.store.getRun(active.id) ?? active) : null,
        queued: this.queue.queued.length,
        last: last ? toRunSummary(last) : null
      };
      return c.json(status);
    });

    this.app.get("/api/runs", (c) => {
      const parsed = HistoryQuerySchema.safeParse({
        limit: c.req.query("limit")
      });
      const limit = parsed.success ? parsed.data.limit : 10;
      return c.json({ runs: this.store.listHistory(limit).map(toRunSummary) });
    });

    this.app.get("/api/runs/:id", (c) => {
      const run = this.store.getRun(c.req.param("id"));
      if (!run) {
        return c.json({ error: "run not found" }, 404);
      }
      return c.json(toRunDetail(run));
    });

    this.app.get("/api/events", (c) => {
      const runId = c.req.query("run_id");

      const encoder = new TextEncoder();

      const stream = new ReadableStream<Uint8Array>({
        start: (controller) => {
          if (runId) {
            for (const event of this.store.getRecentEvents(runId, 25).reverse()) {
              controller.enqueue(encoder.encode(encodeSSE(event)));
            }
          }

          const onEvent = (event: RunEventEnvelope) => {
            if (!runId || event.run_id === runId) {
              controller.enqueue(encoder.encode(encodeSSE(event)));
            }
          };

          this.eventBus.on("event", onEvent);

          controller.enqueue(
            encoder.encode(`event: connected\ndata: ${JSON.stringify({ run_id: runId ?? null })}\n\n`)
          );

          const close = () => {
            this.eventBus.off("event", onEvent);
          };

          c.req.raw.signal.addEventListener("abort", close, { once: true });
        }
      });

      return new Response(stream, {
        headers: {
          "Content-Type": "text/event-stream",
          "Cache-Control": "no-cache",
          Connection: "keep-alive"
        }
      });
    });
  }

  private broadcast(event: RunEventEnvelope): void {
    if (!this.ws) {
      return;
    }
    const payload = JSON.stringify(event);
    for (const client of this.ws.clients) {
      if (client.readyState === 1) {
        client.send(payload);
      }
    }
  }
}

function encodeSSE(event: RunEventEnvelope): string {
  return `event: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}
