export * from "./config/schema.js";
export * from "./config/loader.js";
export * from "./contracts/api.js";
export * from "./contracts/events.js";
export * from "./db/store.js";
export * from "./db/memory-store.js";
export * from "./deploy/executor.js";
export * from "./deploy/dry-run-executor.js";
export * from "./deploy/ssh-executor.js";
export * from "./deploy/invoker.js";
export * from "./deploy/probe.js";
export * from "./deploy/script.js";
export * from "./deploy/target.js";
export * from "./errors.js";
export * from "./events/event-bus.js";
export * from "./gate/gate.js";
export * from "./logging/logger.js";
export * from "./queue/run-queue.js";
export * from "./state/controller.js";
export * from "./state/machine.js";
export * from "./state/types.js";
export * from "./supervisor/systemd-unit.js";
export * from "./testing/checks.js";
export * from "./testing/runner.js";
export * from "./trigger/push-event.js";
export * from "./utils/duration.js";
export * from "./verdict/verdict.js";
