import type { DeployConfig } from "../config/schema.js";
import { ConfigurationError } from "../errors.js";

export interface RemoteTarget {
  host: string;
  username: string;
  port: number;
}

export type Environment = Record<string, string | undefined>;

/** Looks up private key material by reference. The key never lives in config. */
export type CredentialResolver = (ref: string) => string | undefined;

export const envCredentialResolver =
  (env: Environment = process.env): CredentialResolver =>
  (ref) => {
    const value = env[ref];
    if (!value) {
      return undefined;
    }
    // single-line secret stores: literal \n becomes a newline
    return value.includes("\n") ? value : value.replace(/\\n/g, "\n");
  };

const DEFAULT_SSH_PORT = 22;

export function resolveRemoteTarget(deploy: DeployConfig, env: Environment = process.env): RemoteTarget {
  const host = env[deploy.host_env]?.trim() ?? "";
  const username = env[deploy.username_env]?.trim() ?? "";

  const missing = [
    ...(host ? [] : [deploy.host_env]),
    ...(username ? [] : [deploy.username_env])
  ];
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Missing or empty required environment variables:\n${missing.map((name) => `  - ${name}`).join("\n")}`,
      missing
    );
  }

  const rawPort = env[deploy.port_env]?.trim();
  const port = rawPort ? Number.parseInt(rawPort, 10) : DEFAULT_SSH_PORT;
  if (!Number.isInteger(port) || port <= 0 || port > 65_535) {
    throw new ConfigurationError(`Invalid ${deploy.port_env}: "${rawPort ?? ""}"`, [deploy.port_env]);
  }

  return { host, username, port };
}

export function formatTarget(target: RemoteTarget): string {
  return `${target.username}@${target.host}:${target.port}`;
}
