import type { DeployConfig, ServiceUnitConfig } from "../config/schema.js";
import { parseDuration } from "../utils/duration.js";

function quoteEnvironment(key: string, value: string): string {
  const escaped = `${key}=${value}`.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
  return `Environment="${escaped}"`;
}

/**
 * Renders the unit file an operator installs once on the host. Restart
 * on exit, a bounded restart rate and start on boot all live here; the
 * pipeline only ever calls `systemctl restart`.
 */
export function renderSystemdUnit(service: ServiceUnitConfig, deploy?: Pick<DeployConfig, "app_dir">): string {
  const workingDirectory = service.working_directory ?? deploy?.app_dir;
  const intervalSec = Math.ceil(parseDuration(service.start_limit_interval) / 1000);

  const lines = [
    "[Unit]",
    `Description=${service.description}`,
    "After=network-online.target",
    "Wants=network-online.target",
    `StartLimitIntervalSec=${intervalSec}`,
    `StartLimitBurst=${service.start_limit_burst}`,
    "",
    "[Service]",
    "Type=simple",
    `User=${service.user}`,
    ...(workingDirectory ? [`WorkingDirectory=${workingDirectory}`] : []),
    ...Object.entries(service.environment).map(([key, value]) => quoteEnvironment(key, value)),
    `ExecStart=${service.exec_start}`,
    "Restart=always",
    `RestartSec=${service.restart_sec}`,
    "",
    "[Install]",
    "WantedBy=multi-user.target",
    ""
  ];

  return lines.join("\n");
}

/** `app` and `app.service` name the same unit. */
export function unitFileName(service: string): string {
  return service.endsWith(".service") ? service : `${service}.service`;
}
