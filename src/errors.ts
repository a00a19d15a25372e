/**
 * Exit codes shared by the stack CLI and the service's management commands.
 */
export enum ExitCode {
  Success = 0,
  Failure = 1,
  Usage = 2,
  DatabaseUnavailable = 3,
  MigrationFailed = 4,
}

export class AuctionsError extends Error {
  readonly exitCode: ExitCode = ExitCode.Failure;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends AuctionsError {
  readonly exitCode = ExitCode.Usage;
}

export class ManifestError extends AuctionsError {}

export class UnknownTaskError extends AuctionsError {
  readonly exitCode = ExitCode.Usage;

  constructor(readonly target: string) {
    super(`Unknown task target: ${target}`);
  }
}

/**
 * Raised when a bounded wait runs out of attempts
 */
export class ReadinessTimeoutError extends AuctionsError {
  constructor(
    readonly subject: string,
    readonly attempts: number,
    readonly exitCode: ExitCode = ExitCode.Failure,
  ) {
    super(`${subject} was not ready after ${attempts} attempts`);
  }
}

export class MigrationError extends AuctionsError {
  readonly exitCode = ExitCode.MigrationFailed;

  constructor(
    readonly migration: string,
    readonly reason: unknown,
  ) {
    super(`Migration ${migration} failed: ${describeError(reason).message}`);
  }
}

export interface ErrorDetails {
  readonly message: string;
  readonly stack?: string;
}

export function describeError(error: unknown): ErrorDetails {
  if (error instanceof Error) {
    return { message: error.message, stack: error.stack };
  }
  return { message: String(error) };
}

export function exitCodeFor(error: unknown): ExitCode {
  return error instanceof AuctionsError ? error.exitCode : ExitCode.Failure;
}

/**
 * Docker Engine API errors carry the HTTP status of the failed call
 */
export function isNotFound(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    error.statusCode === 404
  );
}
