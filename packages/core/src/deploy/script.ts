import type { DeployConfig } from "../config/schema.js";

export type DeployStepName = "fetch" | "refresh" | "restart";

export interface DeployStep {
  name: DeployStepName;
  command: string;
}

const SAFE_SHELL_WORD = /^[A-Za-z0-9_./:@%+=,-]+$/;

export function shellQuote(value: string): string {
  if (value !== "" && SAFE_SHELL_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * The fixed command sequence of one invocation: fetch the latest revision,
 * refresh dependencies, restart the supervised service.
 */
export function buildDeploySteps(deploy: DeployConfig, branch: string): DeployStep[] {
  const dir = shellQuote(deploy.app_dir);
  const ref = shellQuote(`origin/${branch}`);
  return [
    {
      name: "fetch",
      command: deploy.commands.fetch ?? `cd ${dir} && git fetch --prune origin && git reset --hard ${ref}`
    },
    {
      name: "refresh",
      command: deploy.commands.refresh ?? `cd ${dir} && npm ci --omit=dev`
    },
    {
      name: "restart",
      command: deploy.commands.restart ?? `sudo systemctl restart ${shellQuote(deploy.service)}`
    }
  ];
}
