/**
 * Error types for the container entrypoint.
 * Every error carries the process exit code the launcher reports for it.
 */

import { EXIT_CODES } from '../config/defaults';

/**
 * Base error class for all application errors
 */
export abstract class ApplicationError extends Error {
  public readonly timestamp: Date;
  public readonly context: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    public readonly exitCode: number,
    context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    this.timestamp = new Date();
    this.context = context ?? {};
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): {
    name: string;
    message: string;
    code: string;
    exitCode: number;
    timestamp: Date;
    context: Record<string, unknown>;
    stack?: string;
  } {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      exitCode: this.exitCode,
      timestamp: this.timestamp,
      context: this.context,
      stack: this.stack,
    };
  }
}

/**
 * No mode was given on the command line
 */
export class UsageError extends ApplicationError {
  constructor(message: string) {
    super(message, 'USAGE_ERROR', EXIT_CODES.usage);
    this.name = 'UsageError';
  }
}

/**
 * Error thrown when configuration is invalid
 */
export class ConfigurationError extends ApplicationError {
  constructor(
    message: string,
    public readonly violations: Array<{ path: string; message: string }> = [],
    public readonly source?: string,
  ) {
    super(message, 'CONFIG_ERROR', EXIT_CODES.configuration, { violations, source });
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when dependencies stayed unreachable and the escalation policy is `abort`
 */
export class DependencyTimeoutError extends ApplicationError {
  constructor(
    message: string,
    public readonly dependencies: string[],
  ) {
    super(message, 'DEPENDENCY_TIMEOUT', EXIT_CODES.dependencyTimeout, { dependencies });
    this.name = 'DependencyTimeoutError';
  }
}

/**
 * A pre-step of a run mode exited non-zero. The step's own status is propagated.
 */
export class StepFailedError extends ApplicationError {
  constructor(
    message: string,
    public readonly step: string,
    exitCode: number,
    code = 'STEP_FAILED',
  ) {
    super(message, code, exitCode, { step });
    this.name = 'StepFailedError';
  }
}

/**
 * The database migration before `web`/`web-dev` failed; the server is never launched.
 */
export class MigrationError extends StepFailedError {
  constructor(message: string, exitCode: number) {
    super(message, 'migrate', exitCode, 'MIGRATION_FAILED');
    this.name = 'MigrationError';
  }
}

/**
 * The command could not be started at all (missing binary, no execute permission)
 */
export class CommandLaunchError extends ApplicationError {
  constructor(
    message: string,
    public readonly command: string,
    exitCode: number,
    public override readonly cause?: Error,
  ) {
    super(message, 'COMMAND_LAUNCH_FAILED', exitCode, { command });
    this.name = 'CommandLaunchError';
  }
}

/**
 * Helper function to check if an error is one of our custom error types
 */
export function isApplicationError(error: unknown): error is ApplicationError {
  return error instanceof ApplicationError;
}

export function isStepFailedError(error: unknown): error is StepFailedError {
  return error instanceof StepFailedError;
}

/**
 * Exit code for anything thrown out of the launcher
 */
export function exitCodeFor(error: unknown): number {
  return isApplicationError(error) ? error.exitCode : EXIT_CODES.internal;
}
