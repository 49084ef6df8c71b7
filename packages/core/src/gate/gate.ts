import { isSuccessVerdict, type SuccessVerdict, type Verdict } from "../verdict/verdict.js";

export type GateDecision = { open: true } | { open: false; reason: string };

export type GatedOutcome<T> =
  | { status: "executed"; value: T }
  | { status: "skipped"; reason: string };

export function decideGate(verdict: Verdict): GateDecision {
  if (isSuccessVerdict(verdict)) {
    return { open: true };
  }
  return { open: false, reason: verdict.reason };
}

/**
 * Runs `next` if and only if the verdict is a success. The decision itself is
 * never retried and has no timeout.
 */
export async function runGated<T>(
  verdict: Verdict,
  next: (passed: SuccessVerdict) => Promise<T>
): Promise<GatedOutcome<T>> {
  if (!isSuccessVerdict(verdict)) {
    return { status: "skipped", reason: verdict.reason };
  }
  return { status: "executed", value: await next(verdict) };
}
