export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly missingKeys: string[] = []
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ConnectivityError extends Error {
  constructor(
    message: string,
    readonly host: string
  ) {
    super(message);
    this.name = "ConnectivityError";
  }
}

export class RemoteCommandError extends Error {
  constructor(
    message: string,
    readonly exitCode: number | null,
    readonly signal?: string
  ) {
    super(message);
    this.name = "RemoteCommandError";
  }
}

export class InvalidTransitionError extends Error {
  constructor(
    readonly from: string,
    readonly to: string
  ) {
    super(`Invalid transition: ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
