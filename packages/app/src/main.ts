#!/usr/bin/env node
import { serve } from "@hono/node-server";
import { createApp } from "./app.js";

const port = Number(process.env.PORT ?? 5000);
const hostname = process.env.HOST ?? "0.0.0.0";

const app = createApp(process.env.WELCOME_TEXT ? { welcomeText: process.env.WELCOME_TEXT } : {});
const server = serve({ fetch: app.fetch, hostname, port });
console.log(`[app] listening on http://${hostname}:${port}`);

const shutdown = () => {
  console.log("[app] shutting down...");
  server.close(() => process.exit(0));
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);
