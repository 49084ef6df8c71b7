import { describe, expect, it } from "vitest";
import { branchFromRef, evaluatePush, PushEventSchema, signPayload, verifySignature } from "./push-event.js";

const push = (overrides: Record<string, unknown> = {}) =>
  PushEventSchema.parse({
    ref: "refs/heads/main",
    after: "0a1b2c3d",
    head_commit: {
      id: "0a1b2c3d",
      message: "Fix multiply\n\nlonger body",
      author: { name: "Sample Dev", username: "sampledev" }
    },
    pusher: { name: "sampledev" },
    ...overrides
  });

describe("branchFromRef", () => {
  it("strips the heads prefix and rejects tags", () => {
    expect(branchFromRef("refs/heads/feature/x")).toBe("feature/x");
    expect(branchFromRef("refs/tags/v1.0.0")).toBeNull();
  });
});

describe("evaluatePush", () => {
  it("accepts pushes to the watched branch", () => {
    expect(evaluatePush(push(), "main")).toEqual({
      accepted: true,
      request: { branch: "main", trigger: "push", commit: "0a1b2c3d", author: "sampledev", message: "Fix multiply" }
    });
  });

  it("falls back to the after sha when there is no head commit", () => {
    expect(evaluatePush(push({ head_commit: null }), "main")).toEqual({
      accepted: true,
      request: { branch: "main", trigger: "push", commit: "0a1b2c3d", author: "sampledev" }
    });
  });

  it("ignores tags, deletions and other branches", () => {
    expect(evaluatePush(push({ ref: "refs/tags/v1" }), "main")).toEqual({
      accepted: false,
      reason: "not a branch push: refs/tags/v1"
    });
    expect(evaluatePush(push({ deleted: true }), "main")).toEqual({
      accepted: false,
      reason: "branch deleted: main"
    });
    expect(evaluatePush(push({ ref: "refs/heads/dev" }), "main")).toEqual({
      accepted: false,
      reason: "branch dev is not watched"
    });
  });
});

describe("verifySignature", () => {
  const body = JSON.stringify({ ref: "refs/heads/main" });

  it("accepts a matching signature", () => {
    expect(verifySignature(body, signPayload(body, "test-secret"), "test-secret")).toBe(true);
  });

  it("rejects a wrong secret, a missing header and a malformed one", () => {
    expect(verifySignature(body, signPayload(body, "other-secret"), "test-secret")).toBe(false);
    expect(verifySignature(body, undefined, "test-secret")).toBe(false);
    expect(verifySignature(body, "sha1=abcdef", "test-secret")).toBe(false);
    expect(verifySignature(body, "sha256=abc", "test-secret")).toBe(false);
  });
});
