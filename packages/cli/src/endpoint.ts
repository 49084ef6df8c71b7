import { existsSync } from "node:fs";
import { loadConfig, type Environment, type Pipeline } from "@shipgate/core";

export interface EndpointFlags {
  host?: string;
  port?: string;
}

export interface ServerEndpoint {
  host: string;
  port: number;
}

/** Flags win, then `SHIPGATE_HOST`/`SHIPGATE_PORT`, then the config's `server` section. */
export function resolveEndpoint(
  flags: EndpointFlags,
  env: Environment = process.env,
  server?: Pipeline["server"]
): ServerEndpoint {
  const host = flags.host ?? env.SHIPGATE_HOST ?? server?.host ?? "127.0.0.1";
  const rawPort = flags.port ?? env.SHIPGATE_PORT;
  const port = rawPort === undefined ? (server?.port ?? 4200) : Number(rawPort);
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new Error(`Invalid port: ${rawPort}`);
  }
  return { host, port };
}

/** The `server` section of the config at `path`, when that file exists. */
export async function serverSection(path: string): Promise<Pipeline["server"] | undefined> {
  if (!existsSync(path)) {
    return undefined;
  }
  const config = await loadConfig(path);
  return config.pipeline.server;
}
