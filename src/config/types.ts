/**
 * Configuration Types
 */

import type { Dependency, ReadinessStrategy, TimeoutEscalation } from '../domain/types';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';
export type LogFormat = 'json' | 'pretty';

/** argv of an external program: command first, then its arguments */
export type CommandLine = string[];

export interface TestCommands {
  erase: CommandLine;
  run: CommandLine;
  summary: CommandLine;
  /** Human-readable report, outside CI */
  html: CommandLine;
  /** Machine-readable report, under CI */
  xml: CommandLine;
  upload: CommandLine;
}

export interface CommandTable {
  migrate: CommandLine;
  serve: CommandLine;
  serveDev: CommandLine;
  worker: CommandLine;
  test: TestCommands;
  shell: {
    command: CommandLine;
    hint: string;
  };
}

export interface ReadinessSettings {
  intervalSeconds: number;
  maxAttempts: number;
  connectTimeoutMs: number;
  onTimeout: TimeoutEscalation;
  strategy: ReadinessStrategy;
}

/**
 * Snapshot taken once at start and handed to the waiter and the dispatcher.
 */
export interface LauncherConfig {
  port: number;
  /** Presence of DEVELOPMENT: run the readiness phase */
  development: boolean;
  /** Presence of CI: machine-readable test reporting */
  ci: boolean;
  /** Words placed in front of the production server command */
  commandPrefix: string[];
  dependencies: Dependency[];
  readiness: ReadinessSettings;
  commands: CommandTable;
  logging: {
    level: LogLevel;
    format: LogFormat;
  };
  /** Configuration file the snapshot was read from, if any */
  configFile?: string;
}
