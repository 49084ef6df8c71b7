import { Hono } from "hono";

export const DEFAULT_WELCOME_TEXT = "Sample application";

export interface AppOptions {
  welcomeText?: string;
}

export function createApp(options: AppOptions = {}): Hono {
  const welcomeText = options.welcomeText ?? DEFAULT_WELCOME_TEXT;
  const app = new Hono();

  app.get("/", (c) => c.text(welcomeText));
  app.notFound((c) => c.text("Not Found", 404));

  return app;
}

/** Smoke target for the test phase. */
export function multiply(a = 3, b = 4): number {
  return a * b;
}
