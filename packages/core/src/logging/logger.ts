import pino, { type LevelWithSilent, type Logger } from "pino";

const LEVELS: ReadonlySet<string> = new Set<LevelWithSilent>([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent"
]);

function isLevel(value: string): value is LevelWithSilent {
  return LEVELS.has(value);
}

export function resolveLogLevel(value: string | undefined): LevelWithSilent {
  const level = (value ?? "").trim().toLowerCase();
  return isLevel(level) ? level : "info";
}

export interface LoggerOptions {
  name?: string;
  level?: string;
  /** File descriptor the JSON lines go to. Defaults to stderr so CLI output on stdout stays clean. */
  fd?: number;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {
      name: options.name ?? "shipgate",
      level: resolveLogLevel(options.level ?? process.env.SHIPGATE_LOG_LEVEL),
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.destination({ fd: options.fd ?? 2, sync: true })
  );
}

export const logger = createLogger();

export type { Logger };
