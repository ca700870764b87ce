/**
 * Preflight error types
 *
 * Every failure that ends the run is a PreflightError carrying the exit code
 * the process should terminate with.
 */

export class PreflightError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = 'PreflightError';
  }
}

/**
 * The deployment CLI is not on PATH
 */
export class MissingDependencyError extends PreflightError {
  constructor(public readonly command: string) {
    super(`${command} not found in PATH`);
    this.name = 'MissingDependencyError';
  }
}

/**
 * One or more required files are absent from the working directory
 */
export class MissingArtifactError extends PreflightError {
  constructor(public readonly missing: string[]) {
    super(`Missing required files: ${missing.join(', ')}`);
    this.name = 'MissingArtifactError';
  }
}

export class OperatorDeclinedError extends PreflightError {
  constructor() {
    super('Environment variables not confirmed');
    this.name = 'OperatorDeclinedError';
  }
}

export class InvalidSelectionError extends PreflightError {
  constructor(public readonly input: string) {
    super(`Invalid option: ${input}`);
    this.name = 'InvalidSelectionError';
  }
}

/**
 * A delegated subcommand exited non-zero; its exit code is passed through as-is
 */
export class DelegatedFailureError extends PreflightError {
  constructor(
    public readonly command: string,
    exitCode: number
  ) {
    super(`${command} exited with code ${exitCode}`, exitCode);
    this.name = 'DelegatedFailureError';
  }
}

export class ConfigurationError extends PreflightError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Extract a message from anything thrown
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
