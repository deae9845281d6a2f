/**
 * Launcher - one invocation of the container entrypoint
 *
 * usage check -> configuration snapshot -> readiness phase (development only)
 * -> mode dispatch. Returns the status the process should exit with.
 */

import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import { createConfiguration, getConfigurationSummary } from '../config/config';
import { USAGE } from '../config/defaults';
import type { LauncherConfig, LogLevel } from '../config/types';
import { ModeDispatcher, type Printer } from '../dispatch/dispatcher';
import { formatDependency, isFail } from '../domain/types';
import { ConfigurationError, DependencyTimeoutError, UsageError, exitCodeFor, isApplicationError } from '../errors';
import { ChildProcessRunner, type CommandRunner } from '../infrastructure/command-runner';
import type { Probe } from '../infrastructure/tcp-probe';
import { createLogger, type LoggerOptions } from '../lib/logger';
import { resolveEscalation, waitForAll } from '../readiness/waiter';
import type { Sleeper } from '../shared/async';

export interface LaunchOptions {
  configFile?: string;
  logLevel?: LogLevel;
  /** Print the resolved configuration and stop */
  printConfig?: boolean;
}

export interface LaunchResult {
  exitCode: number;
  signal?: NodeJS.Signals;
}

/**
 * Collaborators that tests replace
 */
export interface LauncherOverrides {
  createLogger?: (options: LoggerOptions) => Logger;
  createRunner?: (logger: Logger) => CommandRunner;
  probe?: Probe;
  sleep?: Sleeper;
  /** Notices meant for the user, such as the shell hint and --print-config */
  print?: Printer;
  /** The usage message and configuration errors */
  printError?: Printer;
}

const printToStderr: Printer = (line) => {
  process.stderr.write(`${line}\n`);
};

const printToStdout: Printer = (line) => {
  process.stdout.write(`${line}\n`);
};

/**
 * Readiness phase. Only runs when the development signal is present.
 * @throws DependencyTimeoutError when a dependency timed out and the escalation is `abort`
 */
async function waitForDependencies(
  config: Readonly<LauncherConfig>,
  logger: Logger,
  overrides: LauncherOverrides,
): Promise<void> {
  if (!config.development) {
    logger.debug('Readiness phase skipped outside development');
    return;
  }

  const report = await waitForAll(config.dependencies, config.readiness, {
    logger,
    strategy: config.readiness.strategy,
    connectTimeoutMs: config.readiness.connectTimeoutMs,
    probe: overrides.probe,
    sleep: overrides.sleep,
  });

  const escalation = resolveEscalation(report, config.readiness.onTimeout, logger);
  if (isFail(escalation)) {
    throw new DependencyTimeoutError(escalation.error, report.timedOut.map(formatDependency));
  }
}

/**
 * Run the entrypoint for `argv` (the mode and its arguments) against an environment snapshot
 */
export async function runLauncher(
  argv: readonly string[],
  env: NodeJS.ProcessEnv,
  options: LaunchOptions = {},
  overrides: LauncherOverrides = {},
): Promise<LaunchResult> {
  const printError = overrides.printError ?? printToStderr;
  const print = overrides.print ?? printToStdout;
  const makeLogger = overrides.createLogger ?? createLogger;

  const [mode, ...args] = argv;
  if (mode === undefined && !options.printConfig) {
    const usage = new UsageError(USAGE);
    printError(usage.message);
    return { exitCode: usage.exitCode };
  }

  let logger = makeLogger({ level: options.logLevel ?? 'info' });

  try {
    const { config, warnings } = await createConfiguration(env, {
      configFile: options.configFile,
      logLevel: options.logLevel,
    });

    logger = makeLogger({ level: config.logging.level, format: config.logging.format }).child({
      runId: nanoid(10),
      mode: mode ?? null,
    });
    warnings.forEach((warning) => logger.warn(warning));

    if (options.printConfig || mode === undefined) {
      print(JSON.stringify(config, null, 2));
      return { exitCode: 0 };
    }

    logger.debug({ config: getConfigurationSummary(config) }, 'Configuration loaded');

    await waitForDependencies(config, logger, overrides);

    const runner = overrides.createRunner?.(logger) ?? new ChildProcessRunner(logger, { env });
    const dispatcher = new ModeDispatcher(config, runner, logger, print);
    const outcome = await dispatcher.dispatch(mode, args);

    return outcome.signal !== undefined
      ? { exitCode: outcome.exitCode, signal: outcome.signal }
      : { exitCode: outcome.exitCode };
  } catch (error) {
    if (!isApplicationError(error)) {
      logger.fatal({ error }, 'Launcher failed');
      return { exitCode: exitCodeFor(error) };
    }

    logger.error({ error: error.toJSON() }, error.message);
    if (error instanceof ConfigurationError) {
      printError(`❌ ${error.message}`);
      error.violations.forEach((violation) => printError(`  • ${violation.path}: ${violation.message}`));
    }
    return { exitCode: error.exitCode };
  }
}
