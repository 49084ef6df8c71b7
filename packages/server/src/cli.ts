#!/usr/bin/env node
import { loadConfig, logger } from "@shipgate/core";
import { ShipgateServer } from "./server.js";

function getArg(name: string): string | undefined {
  const index = process.argv.indexOf(name);
  if (index === -1) return undefined;
  return process.argv[index + 1];
}

async function main(): Promise<void> {
  const configPath = getArg("--config") ?? process.env.SHIPGATE_CONFIG ?? "./shipgate.config.yaml";
  const config = await loadConfig(configPath);

  const host = getArg("--host") ?? process.env.SHIPGATE_HOST;
  const rawPort = getArg("--port") ?? process.env.SHIPGATE_PORT;
  const dbPath = getArg("--db") ?? process.env.SHIPGATE_DB_PATH ?? "./shipgate.db";

  const server = new ShipgateServer({
    config,
    dbPath,
    ...(host ? { host } : {}),
    ...(rawPort ? { port: Number(rawPort) } : {})
  });

  await server.start();
  logger.info({ address: server.getAddress(), pipeline: config.pipeline.name }, "shipgate server listening");

  const shutdown = () => {
    logger.info("shutting down");
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, "shutdown failed");
        process.exit(1);
      }
    );
  };

  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, "shipgate server failed to start");
  process.exit(1);
});
