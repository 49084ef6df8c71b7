import { describe, expect, it } from "vitest";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "../errors.js";
import { loadConfig, parseConfig } from "./loader.js";

const EXAMPLE_CONFIG = fileURLToPath(new URL("../../../../shipgate.config.yaml", import.meta.url));

describe("parseConfig", () => {
  it("lists every schema issue with its path", () => {
    const raw = ["pipeline:", "  name: sample", "  tests:", "    checks: []", "  deploy:", "    service: app"].join("\n");

    expect(() => parseConfig(raw)).toThrow(
      "Invalid shipgate config:\n  pipeline.tests.checks: At least one check is required\n  pipeline.deploy.app_dir: Required"
    );
  });

  it("rejects an empty document", () => {
    expect(() => parseConfig("")).toThrow(ConfigurationError);
  });
});

describe("loadConfig", () => {
  it("loads the example configuration", async () => {
    const config = await loadConfig(EXAMPLE_CONFIG);

    expect(config.pipeline.name).toBe("sample-app");
    expect(config.pipeline.trigger.secret_env).toBe("SHIPGATE_WEBHOOK_SECRET");
    expect(config.pipeline.deploy.commands.refresh).toBe("cd /home/ubuntu/app && npm ci");
    expect(config.pipeline.deploy.verify?.expect_status).toBe(200);
    expect(config.pipeline.service?.environment).toEqual({ PORT: "5000" });
  });

  it("reports unreadable files as configuration errors", async () => {
    await expect(loadConfig("/nonexistent/shipgate.config.yaml")).rejects.toBeInstanceOf(ConfigurationError);
  });
});
