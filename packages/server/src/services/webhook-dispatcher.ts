import { logger as rootLogger, sleep, type Logger, type Pipeline, type RunEventEnvelope } from "@shipgate/core";

type WebhookConfig = Pipeline["notifications"]["webhooks"][number];

export interface WebhookDispatcherOptions {
  logger?: Logger;
  /** First retry delay; doubles per attempt, capped at 5s. */
  backoffMs?: number;
}

/** Posts run events to the operator's notification webhooks. */
export class WebhookDispatcher {
  private readonly log: Logger;
  private readonly backoffMs: number;

  constructor(
    private readonly hooks: WebhookConfig[] = [],
    options: WebhookDispatcherOptions = {}
  ) {
    this.log = (options.logger ?? rootLogger).child({ component: "webhooks" });
    this.backoffMs = options.backoffMs ?? 250;
  }

  async dispatch(event: RunEventEnvelope): Promise<void> {
    if (this.hooks.length === 0) {
      return;
    }

    await Promise.all(
      this.hooks
        .filter((hook) => hook.on.includes("*") || hook.on.includes(event.type))
        .map((hook) => this.sendWithRetry(hook, event))
    );
  }

  private async sendWithRetry(hook: WebhookConfig, event: RunEventEnvelope): Promise<void> {
    let attempt = 0;
    while (true) {
      attempt += 1;
      try {
        const response = await fetch(hook.url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            ...hook.headers
          },
          body: JSON.stringify(event)
        });

        if (!response.ok) {
          throw new Error(`Webhook failed: HTTP ${response.status}`);
        }

        return;
      } catch (error) {
        if (attempt > hook.retries) {
          this.log.warn(
            { url: hook.url, event: event.type, attempts: attempt, err: error },
            "webhook delivery failed"
          );
          return;
        }

        await sleep(Math.min(2 ** (attempt - 1) * this.backoffMs, 5000));
      }
    }
  }
}
