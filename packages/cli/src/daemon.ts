import { spawn } from "node:child_process";
import { existsSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { sleep } from "@shipgate/core";
import { ShipgateHttpClient } from "./client.js";
import type { EndpointFlags, ServerEndpoint } from "./endpoint.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export interface DaemonParams {
  /** Where the client looks for the daemon. */
  endpoint: ServerEndpoint;
  /** Only flags the user gave are forwarded; the daemon resolves the rest from env and config. */
  flags?: EndpointFlags;
  configPath: string;
  dbPath?: string;
  detach?: boolean;
}

export function daemonArgs(entry: string, params: Omit<DaemonParams, "endpoint" | "detach">): string[] {
  const args = [entry, "--config", params.configPath];
  if (params.flags?.host) {
    args.push("--host", params.flags.host);
  }
  if (params.flags?.port) {
    args.push("--port", params.flags.port);
  }
  if (params.dbPath) {
    args.push("--db", params.dbPath);
  }
  return args;
}

export async function ensureDaemon(params: DaemonParams): Promise<void> {
  const baseUrl = `http://${params.endpoint.host}:${params.endpoint.port}`;
  const client = new ShipgateHttpClient(baseUrl);

  if (await client.health()) {
    return;
  }

  const serverDist = resolve(__dirname, "../../server/src/cli.js");
  const serverSrc = resolve(__dirname, "../../server/src/cli.ts");
  const compiled = existsSync(serverDist);

  const args = [...(compiled ? [] : ["--import", "tsx"]), ...daemonArgs(compiled ? serverDist : serverSrc, params)];

  const child = spawn(process.execPath, args, {
    detached: Boolean(params.detach),
    stdio: params.detach ? "ignore" : "inherit",
    env: process.env
  });

  if (params.detach) {
    child.unref();
  }

  const deadline = Date.now() + 10_000;
  while (Date.now() < deadline) {
    if (await client.health()) {
      return;
    }
    await sleep(250);
  }

  throw new Error(`Failed to start daemon at ${baseUrl}`);
}
