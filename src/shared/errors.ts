/**
 * Error types for the entrypoint
 * Separates "nothing to do" exits from real command failures
 */

/**
 * Raised when the run should stop cleanly (exit 0), e.g. an irrelevant
 * PR action or a branch without a configured stack
 */
export class SkipRunError extends Error {
  readonly lines: string[];

  constructor(message: string, details: string[] = []) {
    super(message);
    this.name = 'SkipRunError';
    this.lines = [message, ...details];
  }
}

/**
 * Raised when an external command fails before the wrapped Pulumi command runs
 */
export class CommandFailedError extends Error {
  readonly command: string;
  readonly exitCode: number;

  constructor(command: string, exitCode: number) {
    super(`Command \`${command}\` failed with exit code ${exitCode}`);
    this.name = 'CommandFailedError';
    this.command = command;
    this.exitCode = exitCode;
  }
}

/**
 * Invalid environment, arguments or input files
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function isSkipRunError(error: unknown): error is SkipRunError {
  return error instanceof SkipRunError;
}

export function isCommandFailedError(error: unknown): error is CommandFailedError {
  return error instanceof CommandFailedError;
}

/**
 * Message of a caught value, whatever was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
