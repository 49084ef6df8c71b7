#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import chalk from "chalk";
import ora from "ora";
import {
  buildDeploySteps,
  checksFromConfig,
  errorMessage,
  formatTarget,
  loadConfig,
  renderSystemdUnit,
  resolveRemoteTarget,
  summarizeVerdict,
  TestRunner,
  toRunDetail,
  unitFileName,
  verdictExitCode,
  type PipelineConfig
} from "@shipgate/core";
import { ShipgateHttpClient } from "./client.js";
import { ensureDaemon } from "./daemon.js";
import { resolveEndpoint, serverSection, type EndpointFlags, type ServerEndpoint } from "./endpoint.js";
import { runExitCode, runLocalPipeline } from "./local-run.js";
import { formatCheck, printHistory, printRun, printStatus } from "./output.js";

const DEFAULT_CONFIG = "./shipgate.config.yaml";

function client(endpoint: ServerEndpoint): ShipgateHttpClient {
  return new ShipgateHttpClient(`http://${endpoint.host}:${endpoint.port}`);
}

function flagsFrom(host: unknown, port: unknown): EndpointFlags {
  return {
    ...(host ? { host: String(host) } : {}),
    ...(port ? { port: String(port) } : {})
  };
}

async function locate(configPath: string, flags: EndpointFlags): Promise<ServerEndpoint> {
  return resolveEndpoint(flags, process.env, await serverSection(configPath));
}

async function load(path: string): Promise<PipelineConfig> {
  const spinner = ora("Loading config").start();
  try {
    const config = await loadConfig(path);
    spinner.succeed(`Config ${path} valid`);
    return config;
  } catch (error) {
    spinner.fail(errorMessage(error));
    process.exit(1);
  }
}

const validateCommand = defineCommand({
  meta: { name: "validate", description: "Validate config file" },
  args: {
    config: { type: "string", default: DEFAULT_CONFIG, alias: "c" },
    branch: { type: "string" }
  },
  run: async ({ args }) => {
    const { pipeline } = await load(String(args.config));
    const branch = args.branch ? String(args.branch) : pipeline.trigger.branch;

    console.log(`Pipeline: ${pipeline.name} (branch ${pipeline.trigger.branch}, ${pipeline.trigger.concurrency})`);
    console.log(`Checks: ${pipeline.tests.checks.map((check) => check.name).join(", ")}`);
    for (const step of buildDeploySteps(pipeline.deploy, branch)) {
      console.log(chalk.gray(`  ${step.name}: ${step.command}`));
    }

    try {
      console.log(`Target: ${formatTarget(resolveRemoteTarget(pipeline.deploy))}`);
    } catch (error) {
      console.log(chalk.yellow(`Target: not resolvable here (${errorMessage(error)})`));
    }
  }
});

const testCommand = defineCommand({
  meta: { name: "test", description: "Run the test phase only; exits 0 when every check passes" },
  args: {
    config: { type: "string", default: DEFAULT_CONFIG, alias: "c" }
  },
  run: async ({ args }) => {
    const { pipeline } = await load(String(args.config));
    const runner = new TestRunner(checksFromConfig(pipeline.tests.checks, pipeline.tests.source_dir), {
      onCheck: (report) => console.log(formatCheck(report))
    });

    const verdict = await runner.run();
    const summary = summarizeVerdict(verdict);
    console.log(verdict.outcome === "success" ? chalk.green(summary) : chalk.red(summary));
    process.exit(verdictExitCode(verdict));
  }
});

const runCommand = defineCommand({
  meta: { name: "run", description: "Test, then deploy and verify when every check passes" },
  args: {
    config: { type: "string", default: DEFAULT_CONFIG, alias: "c" },
    dryRun: { type: "boolean", default: false },
    commit: { type: "string" },
    json: { type: "boolean", default: false }
  },
  run: async ({ args }) => {
    const { pipeline } = await load(String(args.config));
    const spinner = args.json ? null : ora(`Running ${pipeline.name}`).start();

    const { run, commands } = await runLocalPipeline(pipeline, {
      dryRun: Boolean(args.dryRun),
      ...(args.commit ? { commit: String(args.commit) } : {}),
      onEvent: (event) => {
        if (spinner && event.type === "run_started") spinner.text = "Testing";
        if (spinner && event.type === "gate_decision") spinner.text = "Deploying";
        if (spinner && event.type === "probe_result") spinner.text = "Verifying";
      }
    });

    const detail = toRunDetail(run);
    if (args.json) {
      console.log(JSON.stringify(detail, null, 2));
    } else {
      if (run.state === "DEPLOYED") {
        spinner?.succeed(`Deployed ${pipeline.name}`);
      } else {
        spinner?.fail(`${run.state}: ${run.reason ?? "unknown reason"}`);
      }
      printRun(detail);
      if (args.dryRun && commands.length > 0) {
        console.log(chalk.cyan("\n  Dry run, commands not sent:"));
        for (const recorded of commands) {
          console.log(`  ${recorded.target} $ ${recorded.command}`);
        }
      }
    }

    process.exit(runExitCode(run));
  }
});

const serveCommand = defineCommand({
  meta: { name: "serve", description: "Start the webhook server" },
  args: {
    config: { type: "string", default: DEFAULT_CONFIG, alias: "c" },
    detach: { type: "boolean", default: false, alias: "d" },
    host: { type: "string" },
    port: { type: "string" },
    db: { type: "string" }
  },
  run: async ({ args }) => {
    const configPath = String(args.config);
    const flags = flagsFrom(args.host, args.port);
    const endpoint = await locate(configPath, flags);
    await ensureDaemon({
      endpoint,
      flags,
      configPath,
      detach: Boolean(args.detach),
      ...(args.db ? { dbPath: String(args.db) } : {})
    });
    console.log(chalk.green(`shipgate server running at http://${endpoint.host}:${endpoint.port}`));
  }
});

const triggerCommand = defineCommand({
  meta: { name: "trigger", description: "Queue a manual run on the server" },
  args: {
    config: { type: "string", default: DEFAULT_CONFIG, alias: "c" },
    commit: { type: "string" },
    message: { type: "string" },
    host: { type: "string" },
    port: { type: "string" }
  },
  run: async ({ args }) => {
    const configPath = String(args.config);
    const flags = flagsFrom(args.host, args.port);
    const endpoint = await locate(configPath, flags);
    await ensureDaemon({ endpoint, flags, configPath, detach: true });

    const api = client(endpoint);
    const result = await api.trigger({
      ...(args.commit ? { commit: String(args.commit) } : {}),
      ...(args.message ? { message: String(args.message) } : {})
    });
    console.log(chalk.green(`Run queued: ${result.run_id}`));
    console.log(chalk.gray(`State: ${result.state}`));
  }
});

const statusCommand = defineCommand({
  meta: { name: "status", description: "Get status" },
  args: {
    config: { type: "string", default: DEFAULT_CONFIG, alias: "c" },
    host: { type: "string" },
    port: { type: "string" },
    json: { type: "boolean", default: false },
    watch: { type: "boolean", default: false, alias: "w" }
  },
  run: async ({ args }) => {
    const api = client(await locate(String(args.config), flagsFrom(args.host, args.port)));

    const render = async () => {
      const status = await api.status();
      if (args.json) {
        console.log(JSON.stringify(status, null, 2));
      } else {
        console.clear();
        printStatus(status);
      }
    };

    if (!args.watch) {
      await render();
      return;
    }

    while (true) {
      await render();
      await new Promise((resolve) => setTimeout(resolve, 5_000));
    }
  }
});

const historyCommand = defineCommand({
  meta: { name: "history", description: "Show past runs" },
  args: {
    limit: { type: "string", default: "10" },
    config: { type: "string", default: DEFAULT_CONFIG, alias: "c" },
    host: { type: "string" },
    port: { type: "string" },
    json: { type: "boolean", default: false }
  },
  run: async ({ args }) => {
    const api = client(await locate(String(args.config), flagsFrom(args.host, args.port)));
    const history = await api.history(Number(args.limit));
    if (args.json) {
      console.log(JSON.stringify(history, null, 2));
    } else {
      printHistory(history);
    }
  }
});

const showCommand = defineCommand({
  meta: { name: "show", description: "Show one run with its checks and deploy steps" },
  args: {
    id: { type: "positional", required: true },
    config: { type: "string", default: DEFAULT_CONFIG, alias: "c" },
    host: { type: "string" },
    port: { type: "string" },
    json: { type: "boolean", default: false }
  },
  run: async ({ args }) => {
    const api = client(await locate(String(args.config), flagsFrom(args.host, args.port)));
    const run = await api.run(String(args.id));
    if (args.json) {
      console.log(JSON.stringify(run, null, 2));
    } else {
      printRun(run);
    }
  }
});

const unitCommand = defineCommand({
  meta: { name: "unit", description: "Print the systemd unit file for the managed service" },
  args: {
    config: { type: "string", default: DEFAULT_CONFIG, alias: "c" }
  },
  run: async ({ args }) => {
    const { pipeline } = await loadConfig(String(args.config));
    if (!pipeline.service) {
      console.error(chalk.red("No `service` section in config"));
      process.exit(1);
    }
    console.error(chalk.gray(`# /etc/systemd/system/${unitFileName(pipeline.deploy.service)}`));
    process.stdout.write(renderSystemdUnit(pipeline.service, pipeline.deploy));
  }
});

const main = defineCommand({
  meta: {
    name: "shipgate",
    description: "Test-gated deployments over SSH"
  },
  subCommands: {
    validate: validateCommand,
    test: testCommand,
    run: runCommand,
    serve: serveCommand,
    trigger: triggerCommand,
    status: statusCommand,
    history: historyCommand,
    show: showCommand,
    unit: unitCommand
  }
});

void runMain(main);
