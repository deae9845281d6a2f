/**
 * Shared test utilities
 */

import type { LogLevel } from '../../../src/config/types';
import type { CommandExit, CommandInvocation } from '../../../src/domain/types';
import type { CommandRunner } from '../../../src/infrastructure/command-runner';
import { createLogger, type Logger } from '../../../src/lib/logger';

export interface LogRecord {
  level: string;
  msg?: string;
  [key: string]: unknown;
}

/**
 * A real pino logger whose output is parsed into records
 */
export function createCapturingLogger(level: LogLevel = 'trace'): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger({
    level,
    destination: {
      write(line: string): void {
        const record: LogRecord = JSON.parse(line);
        records.push(record);
      },
    },
  });
  return { logger, records };
}

export const messagesOf = (records: readonly LogRecord[], level?: string): string[] =>
  records
    .filter((record) => level === undefined || record.level === level)
    .map((record) => record.msg ?? '');

export interface RunnerCall {
  kind: 'run' | 'handOff';
  invocation: CommandInvocation;
}

/**
 * CommandRunner that records invocations instead of launching anything
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RunnerCall[] = [];

  constructor(private readonly exitFor: (call: RunnerCall) => CommandExit = () => ({ exitCode: 0 })) {}

  async run(invocation: CommandInvocation): Promise<CommandExit> {
    return this.record({ kind: 'run', invocation });
  }

  async handOff(invocation: CommandInvocation): Promise<CommandExit> {
    return this.record({ kind: 'handOff', invocation });
  }

  /** Each call as `kind: command args...` */
  get lines(): string[] {
    return this.calls.map(({ kind, invocation }) => `${kind}: ${[invocation.command, ...invocation.args].join(' ')}`);
  }

  private record(call: RunnerCall): CommandExit {
    this.calls.push(call);
    return this.exitFor(call);
  }
}

/**
 * Sleeper that returns immediately and remembers what it was asked for
 */
export function createFakeSleep(): { sleep: (ms: number) => Promise<void>; calls: number[] } {
  const calls: number[] = [];
  return {
    calls,
    sleep: async (ms: number) => {
      calls.push(ms);
    },
  };
}
