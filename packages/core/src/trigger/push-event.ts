import { createHmac, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import type { RunRequest } from "../state/types.js";

export const PushEventSchema = z.object({
  ref: z.string(),
  after: z.string().optional(),
  deleted: z.boolean().default(false),
  head_commit: z
    .object({
      id: z.string(),
      message: z.string().default(""),
      author: z.object({ name: z.string().optional(), username: z.string().optional() }).partial().optional()
    })
    .nullable()
    .optional(),
  repository: z.object({ full_name: z.string() }).partial().optional(),
  pusher: z.object({ name: z.string() }).partial().optional()
});

export type PushEvent = z.infer<typeof PushEventSchema>;

export type PushDecision =
  | { accepted: true; request: RunRequest }
  | { accepted: false; reason: string };

const BRANCH_PREFIX = "refs/heads/";

export function branchFromRef(ref: string): string | null {
  return ref.startsWith(BRANCH_PREFIX) ? ref.slice(BRANCH_PREFIX.length) : null;
}

/** Decides whether a push to the repository should start a pipeline run. */
export function evaluatePush(event: PushEvent, watchedBranch: string): PushDecision {
  const branch = branchFromRef(event.ref);
  if (branch === null) {
    return { accepted: false, reason: `not a branch push: ${event.ref}` };
  }
  if (event.deleted) {
    return { accepted: false, reason: `branch deleted: ${branch}` };
  }
  if (branch !== watchedBranch) {
    return { accepted: false, reason: `branch ${branch} is not watched` };
  }

  const commit = event.head_commit?.id ?? event.after;
  const author = event.head_commit?.author?.username ?? event.head_commit?.author?.name ?? event.pusher?.name;
  const message = event.head_commit?.message.split("\n")[0];

  return {
    accepted: true,
    request: {
      branch,
      trigger: "push",
      ...(commit ? { commit } : {}),
      ...(author ? { author } : {}),
      ...(message ? { message } : {})
    }
  };
}

const SIGNATURE_PREFIX = "sha256=";

export function signPayload(body: string, secret: string): string {
  return SIGNATURE_PREFIX + createHmac("sha256", secret).update(body).digest("hex");
}

/** Checks an `X-Hub-Signature-256` header against the raw request body. */
export function verifySignature(body: string, header: string | undefined, secret: string): boolean {
  if (!header || !header.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  const actual = Buffer.from(header.slice(SIGNATURE_PREFIX.length), "hex");
  const expected = Buffer.from(signPayload(body, secret).slice(SIGNATURE_PREFIX.length), "hex");
  if (actual.length !== expected.length) {
    return false;
  }
  return timingSafeEqual(actual, expected);
}
