export type CheckStatus = "passed" | "failed" | "skipped";

export interface CheckReport {
  name: string;
  status: CheckStatus;
  durationMs: number;
  detail?: string;
}

export interface SuccessVerdict {
  outcome: "success";
  checks: CheckReport[];
}

export interface FailureVerdict {
  outcome: "failure";
  reason: string;
  checks: CheckReport[];
}

/**
 * Pass/fail outcome of one test phase. Produced once per run and read once by
 * the gate.
 */
export type Verdict = SuccessVerdict | FailureVerdict;

export function verdictSuccess(checks: CheckReport[]): SuccessVerdict {
  return { outcome: "success", checks };
}

export function verdictFailure(reason: string, checks: CheckReport[] = []): FailureVerdict {
  return { outcome: "failure", reason, checks };
}

export function isSuccessVerdict(verdict: Verdict): verdict is SuccessVerdict {
  return verdict.outcome === "success";
}

export function isFailureVerdict(verdict: Verdict): verdict is FailureVerdict {
  return verdict.outcome === "failure";
}

export function verdictExitCode(verdict: Verdict): 0 | 1 {
  return isSuccessVerdict(verdict) ? 0 : 1;
}

export function summarizeVerdict(verdict: Verdict): string {
  const passed = verdict.checks.filter((check) => check.status === "passed").length;
  const total = verdict.checks.length;
  if (isSuccessVerdict(verdict)) {
    return `${passed}/${total} checks passed`;
  }
  return `${passed}/${total} checks passed; ${verdict.reason}`;
}
