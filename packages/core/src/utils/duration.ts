const DURATION_RE = /^(\d+)(ms|s|m|h)$/;

/** Longest delay `setTimeout` honours; larger values fire after 1ms. */
export const MAX_DURATION_MS = 2_147_483_647;

export type DurationUnit = "ms" | "s" | "m" | "h";

const MULTIPLIER: Record<DurationUnit, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000
};

function isUnit(value: string | undefined): value is DurationUnit {
  return value !== undefined && value in MULTIPLIER;
}

function toMilliseconds(input: string): number | undefined {
  const match = DURATION_RE.exec(input.trim());
  const unit = match?.[2];
  if (!match || !isUnit(unit)) {
    return undefined;
  }
  return Number(match[1]) * MULTIPLIER[unit];
}

/** True for well-formed durations a timer can wait out. */
export function isSchedulableDuration(input: string): boolean {
  const ms = toMilliseconds(input);
  return ms !== undefined && ms <= MAX_DURATION_MS;
}

/** Converts `30s`, `10m`, `1h` or `500ms` to milliseconds. Numbers pass through. */
export function parseDuration(input: string | number): number {
  if (typeof input === "number") {
    return input;
  }
  const ms = toMilliseconds(input);
  if (ms === undefined) {
    throw new Error(`Invalid duration: ${input}. Use formats like 30s, 10m, 1h.`);
  }
  if (ms > MAX_DURATION_MS) {
    throw new RangeError(`Duration ${input} is too long; the maximum is 596h.`);
  }
  return ms;
}

export function formatDuration(ms: number): string {
  if (ms < 1_000) {
    return `${Math.round(ms)}ms`;
  }
  if (ms < 60_000) {
    return `${(ms / 1_000).toFixed(1)}s`;
  }
  if (ms < 3_600_000) {
    return `${Math.round(ms / 60_000)}m`;
  }
  return `${Math.round(ms / 3_600_000)}h`;
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
