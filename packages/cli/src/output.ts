import chalk from "chalk";
import Table from "cli-table3";
import {
  formatDuration,
  type CheckReport,
  type HistoryResponse,
  type RunDetail,
  type RunState,
  type RunSummary,
  type StatusResponse
} from "@shipgate/core";

export function colorState(state: RunState): string {
  switch (state) {
    case "DEPLOYED":
      return chalk.green(state);
    case "TEST_FAILED":
    case "DEPLOY_FAILED":
      return chalk.red(state);
    case "SUPERSEDED":
    case "INTERRUPTED":
      return chalk.gray(state);
    default:
      return chalk.yellow(state);
  }
}

export function formatCheck(report: CheckReport): string {
  const emoji = report.status === "passed" ? "✅" : report.status === "failed" ? "❌" : "⏭️";
  const line = `${emoji} ${report.name} (${report.status}`;
  if (report.status === "skipped") {
    return `${line})`;
  }
  const timed = `${line}, ${formatDuration(report.durationMs)})`;
  return report.detail ? `${timed}\n   ${chalk.red(report.detail.split("\n").join("\n   "))}` : timed;
}

function describeRun(run: RunSummary): string {
  const commit = run.commit ? run.commit.slice(0, 7) : "-";
  return `${run.id.slice(0, 8)} ${colorState(run.state)} ${run.branch}@${commit} (${run.trigger})`;
}

export function printStatus(status: StatusResponse): void {
  console.log(chalk.cyan(`shipgate: ${status.pipeline} (branch ${status.branch})`));

  if (status.active) {
    console.log(`\n  Active: ${describeRun(status.active)}`);
  } else {
    console.log(chalk.gray("\n  No active run"));
  }
  console.log(`  Queued: ${status.queued}`);

  if (status.last) {
    console.log(`  Last:   ${describeRun(status.last)}`);
    if (status.last.reason) {
      console.log(chalk.gray(`          ${status.last.reason}`));
    }
  }
}

export function printHistory(history: HistoryResponse): void {
  const table = new Table({
    head: ["Run", "State", "Branch", "Commit", "Trigger", "Queued", "Completed"],
    style: { head: ["cyan"] }
  });

  for (const run of history.runs) {
    table.push([
      run.id.slice(0, 8),
      colorState(run.state),
      run.branch,
      run.commit ? run.commit.slice(0, 7) : "-",
      run.trigger,
      run.queued_at,
      run.completed_at ?? "-"
    ]);
  }

  console.log(table.toString());
}

export function printRun(run: RunDetail): void {
  console.log(`\n  Run:   ${run.id}`);
  console.log(`  State: ${colorState(run.state)}`);
  if (run.reason) {
    console.log(`  Reason: ${run.reason}`);
  }

  if (run.verdict) {
    console.log("\n  Checks:");
    for (const check of run.verdict.checks) {
      console.log(`  ${formatCheck(check)}`);
    }
  }

  if (run.invocation && run.invocation.steps.length > 0) {
    const table = new Table({
      head: ["Step", "Command", "Exit", "Duration"],
      style: { head: ["cyan"] }
    });
    for (const step of run.invocation.steps) {
      table.push([step.name, step.command, String(step.exitCode ?? step.signal ?? "-"), formatDuration(step.durationMs)]);
    }
    console.log(`\n  Target: ${run.invocation.target}`);
    console.log(table.toString());
  }

  if (run.probe) {
    const probe = run.probe;
    console.log(
      probe.reachable
        ? chalk.green(`\n  Service reachable after ${probe.attempts} attempt(s)`)
        : chalk.red(`\n  Service unreachable after ${probe.attempts} attempt(s): ${probe.error ?? "unknown"}`)
    );
  }
}
