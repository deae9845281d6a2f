/**
 * Main export file for programmatic use of the launcher
 */

export { runLauncher, type LaunchOptions, type LaunchResult, type LauncherOverrides } from './app/launcher';
export * from './config';
export * from './dispatch';
export * from './readiness';
export * from './errors';
export {
  Failure,
  Success,
  isFail,
  formatDependency,
  formatInvocation,
  type CommandExit,
  type CommandInvocation,
  type Dependency,
  type Mode,
  type ModeKind,
  type ReadinessOutcome,
  type ReadinessReport,
  type ReadinessStrategy,
  type Result,
  type RetryPolicy,
  type TimeoutEscalation,
} from './domain/types';
export { ChildProcessRunner, FORWARDED_SIGNALS, signalExitCode, type CommandRunner, type RunnerOptions } from './infrastructure/command-runner';
export { createTcpProbe, tcpProbe, type Probe, type ProbeSocket } from './infrastructure/tcp-probe';
export { createLogger, createTimer, type Logger, type LoggerOptions } from './lib/logger';
