import type { VerifyConfig } from "../config/schema.js";
import { errorMessage } from "../errors.js";
import { parseDuration, sleep } from "../utils/duration.js";

export interface ProbeOptions {
  url: string;
  expectStatus: number;
  expectBody?: string;
  attempts: number;
  intervalMs: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ProbeResult {
  reachable: boolean;
  attempts: number;
  status?: number;
  error?: string;
}

export function probeOptionsFromConfig(verify: VerifyConfig): ProbeOptions {
  return {
    url: verify.url,
    expectStatus: verify.expect_status,
    ...(verify.expect_body !== undefined ? { expectBody: verify.expect_body } : {}),
    attempts: verify.attempts,
    intervalMs: parseDuration(verify.interval),
    timeoutMs: parseDuration(verify.timeout)
  };
}

/**
 * Polls the service after a restart until it answers with the expected
 * status, or the attempts run out.
 */
export async function probeReachability(options: ProbeOptions): Promise<ProbeResult> {
  let last: ProbeResult = { reachable: false, attempts: 0 };

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    if (options.signal?.aborted) {
      break;
    }

    try {
      const response = await fetch(options.url, { signal: AbortSignal.timeout(options.timeoutMs) });
      const body = await response.text();
      const bodyMatches = options.expectBody === undefined || body.includes(options.expectBody);

      if (response.status === options.expectStatus && bodyMatches) {
        return { reachable: true, attempts: attempt, status: response.status };
      }

      last = {
        reachable: false,
        attempts: attempt,
        status: response.status,
        error: bodyMatches
          ? `status ${response.status}, expected ${options.expectStatus}`
          : `body does not contain ${JSON.stringify(options.expectBody)}`
      };
    } catch (error) {
      last = { reachable: false, attempts: attempt, error: errorMessage(error) };
    }

    if (attempt < options.attempts) {
      await sleep(options.intervalMs, options.signal);
    }
  }

  return last;
}
