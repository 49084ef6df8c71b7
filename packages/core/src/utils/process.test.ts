import { describe, expect, it, vi } from "vitest";
import { runCommand } from "./process.js";

const node = JSON.stringify(process.execPath);

describe("runCommand", () => {
  it("captures output and a zero exit code", async () => {
    const outcome = await runCommand(`${node} -e "process.stdout.write('ok')"`, {
      cwd: process.cwd(),
      timeoutMs: 10_000
    });

    expect(outcome.exitCode).toBe(0);
    expect(outcome.stdout).toBe("ok");
    expect(outcome.timedOut).toBe(false);
  });

  it("reports a nonzero exit code", async () => {
    const outcome = await runCommand(`${node} -e "process.exit(3)"`, {
      cwd: process.cwd(),
      timeoutMs: 10_000
    });

    expect(outcome.exitCode).toBe(3);
  });

  it("passes extra environment variables", async () => {
    const outcome = await runCommand(`${node} -e "process.stdout.write(process.env.SHIPGATE_PROBE ?? '')"`, {
      cwd: process.cwd(),
      env: { SHIPGATE_PROBE: "from-env" },
      timeoutMs: 10_000
    });

    expect(outcome.stdout).toBe("from-env");
  });

  it("kills commands that exceed the timeout", async () => {
    const outcome = await runCommand(`${node} -e "setTimeout(() => {}, 30000)"`, {
      cwd: process.cwd(),
      timeoutMs: 200
    });

    expect(outcome.timedOut).toBe(true);
    expect(outcome.exitCode).not.toBe(0);
  });

  it("escalates to SIGKILL when a command ignores SIGTERM", async () => {
    const outcome = await runCommand(
      `exec ${node} -e "process.on('SIGTERM', () => {}); process.stdout.write(String(process.pid)); setInterval(() => {}, 1000)"`,
      { cwd: process.cwd(), timeoutMs: 500, killGraceMs: 200 }
    );

    expect(outcome.timedOut).toBe(true);
    expect(outcome.exitCode).toBeNull();
    expect(outcome.signal).toBe("SIGKILL");

    const pid = Number(outcome.stdout);
    expect(pid).toBeGreaterThan(0);
    await vi.waitFor(() => expect(() => process.kill(pid, 0)).toThrow());
  });

  it("decodes multi-byte characters split across chunks", async () => {
    const outcome = await runCommand(
      `${node} -e "const b = Buffer.from('caf\u00e9'); process.stdout.write(b.subarray(0, 4)); setTimeout(() => process.stdout.write(b.subarray(4)), 50)"`,
      { cwd: process.cwd(), timeoutMs: 10_000 }
    );

    expect(outcome.stdout).toBe("caf\u00e9");
  });
});
