import { afterEach, describe, expect, it, vi } from "vitest";
import { CheckSchema } from "../config/schema.js";
import { CommandCheck, HttpCheck, checkFromConfig } from "./checks.js";

const node = JSON.stringify(process.execPath);

describe("CommandCheck", () => {
  it("passes on exit 0", async () => {
    const check = new CommandCheck(
      { name: "ok", command: `${node} -e "process.exit(0)"`, timeout: "10s", env: {} },
      process.cwd()
    );
    await expect(check.run()).resolves.toBeUndefined();
  });

  it("fails with the exit code and the tail of stderr", async () => {
    const check = new CommandCheck(
      {
        name: "broken",
        command: `${node} -e "console.error('assertion failed'); process.exit(1)"`,
        timeout: "10s",
        env: {}
      },
      process.cwd()
    );
    await expect(check.run()).rejects.toThrow("exit 1\nassertion failed");
  });

  it("fails when the command times out", async () => {
    const check = new CommandCheck(
      { name: "hangs", command: `${node} -e "setTimeout(() => {}, 30000)"`, timeout: "200ms", env: {} },
      process.cwd()
    );
    await expect(check.run()).rejects.toThrow("timed out after 200ms");
  });
});

describe("HttpCheck", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  const config = CheckSchema.parse({
    name: "root",
    http: { url: "http://127.0.0.1:5000/", expect_body: "Sample application" }
  });

  it("passes when status and body match", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("Sample application", { status: 200 })));
    await expect(checkFromConfig(config, ".").run()).resolves.toBeUndefined();
  });

  it("fails on an unexpected status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("down", { status: 502 })));
    await expect(checkFromConfig(config, ".").run()).rejects.toThrow(
      "GET http://127.0.0.1:5000/ returned 502, expected 200"
    );
  });

  it("fails when the body lacks the expected text", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("Hello", { status: 200 })));
    await expect(checkFromConfig(config, ".").run()).rejects.toThrow(
      'GET http://127.0.0.1:5000/ body does not contain "Sample application"'
    );
  });

  it("builds the right check type from config", () => {
    expect(checkFromConfig(config, ".")).toBeInstanceOf(HttpCheck);
    expect(
      checkFromConfig(CheckSchema.parse({ name: "unit", command: "npm test" }), ".")
    ).toBeInstanceOf(CommandCheck);
  });
});
