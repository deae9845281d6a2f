/**
 * Command Runner - launches the external programs a run mode is made of
 *
 * Node cannot replace its own process image, so a hand-off launches the child
 * with the launcher's stdio, relays termination signals to it, and reports its
 * exit status for the launcher to exit with.
 */

import { spawn, type ChildProcess, type StdioOptions } from 'node:child_process';
import { constants } from 'node:os';
import type { Logger } from 'pino';
import { EXIT_CODES } from '../config/defaults';
import { formatInvocation, type CommandExit, type CommandInvocation } from '../domain/types';
import { CommandLaunchError } from '../errors';

export interface CommandRunner {
  /** Run a command to completion */
  run(invocation: CommandInvocation): Promise<CommandExit>;
  /** Run the command the rest of the process lifetime belongs to */
  handOff(invocation: CommandInvocation): Promise<CommandExit>;
}

export interface RunnerOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  stdio?: StdioOptions;
}

/**
 * Signals relayed to a handed-off child while it runs
 */
export const FORWARDED_SIGNALS: readonly NodeJS.Signals[] = [
  'SIGINT',
  'SIGTERM',
  'SIGHUP',
  'SIGQUIT',
  'SIGUSR1',
  'SIGUSR2',
];

/**
 * Exit status a POSIX shell reports for a child killed by `signal`
 */
export function signalExitCode(signal: NodeJS.Signals): number {
  const entry = Object.entries(constants.signals).find(([name]) => name === signal);
  const value: unknown = entry?.[1];
  return EXIT_CODES.signalBase + (typeof value === 'number' ? value : 0);
}

export class ChildProcessRunner implements CommandRunner {
  constructor(
    private readonly logger: Logger,
    private readonly options: RunnerOptions = {},
  ) {}

  async run(invocation: CommandInvocation): Promise<CommandExit> {
    return this.launch(invocation, false);
  }

  async handOff(invocation: CommandInvocation): Promise<CommandExit> {
    return this.launch(invocation, true);
  }

  private launch(invocation: CommandInvocation, forwardSignals: boolean): Promise<CommandExit> {
    const { command, args } = invocation;
    const cwd = this.options.cwd ?? process.cwd();
    const env = { ...(this.options.env ?? process.env), ...invocation.env };

    this.logger.debug({ command, args, cwd, handOff: forwardSignals }, 'Executing command');

    return new Promise<CommandExit>((resolve, reject) => {
      let settled = false;
      const relays = new Map<NodeJS.Signals, () => void>();

      const release = (): void => {
        for (const [signal, relay] of relays) {
          process.removeListener(signal, relay);
        }
        relays.clear();
      };

      const child: ChildProcess = spawn(command, args, {
        cwd,
        env,
        stdio: this.options.stdio ?? 'inherit',
        shell: false,
      });

      if (forwardSignals) {
        for (const signal of FORWARDED_SIGNALS) {
          const relay = (): void => {
            this.logger.debug({ command, signal }, 'Forwarding signal to child');
            child.kill(signal);
          };
          relays.set(signal, relay);
          process.on(signal, relay);
        }
      }

      // Handle process exit
      child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
        if (settled) return;
        settled = true;
        release();

        const result: CommandExit =
          signal !== null
            ? { exitCode: signalExitCode(signal), signal }
            : { exitCode: code ?? EXIT_CODES.internal };

        this.logger.debug({ command, ...result }, 'Command completed');
        resolve(result);
      });

      // Handle launch failure
      child.on('error', (error: NodeJS.ErrnoException) => {
        if (settled) return;
        settled = true;
        release();

        const exitCode = error.code === 'ENOENT' ? EXIT_CODES.notFound : EXIT_CODES.notExecutable;
        const reason = error.code === 'ENOENT' ? 'command not found' : error.message;

        this.logger.error({ command, error: error.message }, 'Command execution failed');
        reject(
          new CommandLaunchError(
            `Cannot execute ${formatInvocation(invocation)}: ${reason}`,
            command,
            exitCode,
            error,
          ),
        );
      });
    });
  }
}
