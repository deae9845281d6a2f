/**
 * Core type definitions for the container entrypoint.
 * Provides the Result type for expected failures and the data model shared by
 * the readiness waiter and the mode dispatcher.
 */

/**
 * Result type for outcomes that are expected rather than exceptional.
 *
 * A dependency that never came up, or an escalation policy that decides to stop,
 * is an ordinary outcome of a start-up: callers branch on `ok` instead of catching.
 *
 * @example
 * ```typescript
 * const escalation = resolveEscalation(report, 'abort', logger);
 * if (!escalation.ok) {
 *   logger.error(escalation.error);
 *   return { exitCode: EXIT_CODES.dependencyTimeout };
 * }
 * ```
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: string };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/** Create a failure result */
export const Failure = <T>(error: string): Result<T> => ({ ok: false, error });

/** Type guard to check if result is a failure */
export const isFail = <T>(result: Result<T>): result is { ok: false; error: string } => !result.ok;

// ===== READINESS =====

/**
 * A TCP endpoint that must accept connections before the selected mode starts.
 */
export interface Dependency {
  host: string;
  port: number;
}

export interface RetryPolicy {
  /** Seconds slept between two failed attempts */
  intervalSeconds: number;
  /** Connection attempts per dependency before giving up */
  maxAttempts: number;
}

/** What happens when a dependency exhausts its retry budget */
export type TimeoutEscalation = 'continue' | 'abort';

export type ReadinessStrategy = 'sequential' | 'parallel';

export type ReadinessOutcome =
  | { status: 'reachable'; dependency: Dependency; attempts: number }
  | { status: 'timed-out'; dependency: Dependency; attempts: number };

export interface ReadinessReport {
  outcomes: ReadinessOutcome[];
  timedOut: Dependency[];
}

// ===== DISPATCH =====

export type ModeKind = 'serve' | 'serve-dev' | 'worker' | 'test' | 'shell' | 'passthrough';

/**
 * The single run behavior selected for an invocation.
 */
export type Mode =
  | { kind: 'serve'; args: string[] }
  | { kind: 'serve-dev'; args: string[] }
  | { kind: 'worker'; args: string[] }
  | { kind: 'test'; args: string[] }
  | { kind: 'shell'; args: string[] }
  | { kind: 'passthrough'; command: string; args: string[] };

export interface CommandInvocation {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

export interface CommandExit {
  exitCode: number;
  signal?: NodeJS.Signals;
}

export const formatDependency = (dependency: Dependency): string =>
  `${dependency.host}:${dependency.port}`;

export const formatInvocation = (invocation: CommandInvocation): string =>
  [invocation.command, ...invocation.args].join(' ');
