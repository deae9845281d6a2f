/**
 * Command line for the container entrypoint: `run [options] <mode> [args...]`
 */

import { Command, Option, type OptionValues } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { runLauncher, type LaunchOptions, type LaunchResult } from '../app/launcher';
import { ENV } from '../config/defaults';
import type { LogLevel } from '../config/types';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readVersion(): string {
  // src/cli/ in development, dist/src/cli/ once built
  const packageJsonPath = __dirname.includes('dist')
    ? join(__dirname, '../../../package.json')
    : join(__dirname, '../../package.json');
  const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson) {
    return String(packageJson.version);
  }
  return '0.0.0';
}

export type LaunchHandler = (argv: string[], options: LaunchOptions) => Promise<void>;

export function toLaunchOptions(values: OptionValues): LaunchOptions {
  const options: LaunchOptions = {};
  if (typeof values.config === 'string') options.configFile = values.config;
  if (isLogLevel(values.logLevel)) options.logLevel = values.logLevel;
  if (values.printConfig === true) options.printConfig = true;
  return options;
}

/**
 * Build the commander program. Options after the mode belong to the mode's command.
 */
export function createProgram(handler: LaunchHandler): Command {
  const program = new Command();

  program
    .name('run')
    .description('Wait for backing services, then run one mode of the container')
    .version(readVersion())
    .argument('[mode]', 'web | web-dev | worker | test | bash, or any command to execute verbatim')
    .argument('[args...]', 'arguments passed to the mode')
    .option('--config <path>', `YAML configuration file (default: $${ENV.configFile})`)
    .addOption(new Option('--log-level <level>', 'logging level').choices(LOG_LEVELS))
    .option('--print-config', 'print the resolved configuration as JSON and exit')
    .passThroughOptions()
    .allowUnknownOption()
    .addHelpText(
      'after',
      `

Modes:
  web        migrate, then the production server on $${ENV.port}
  web-dev    migrate, then the development server on $${ENV.port}
  worker     background task worker
  test       coverage-instrumented test suite and reports
  bash       print a hint, then a shell (or the given command)
  <other>    executed verbatim with its arguments

Environment Variables:
  ${ENV.port.padEnd(22)} port for web and web-dev (default: 8000)
  ${ENV.sleep.padEnd(22)} seconds between readiness attempts (default: 1)
  ${ENV.tries.padEnd(22)} readiness attempts per dependency (default: 60)
  ${ENV.development.padEnd(22)} when set, wait for dependencies first
  ${ENV.ci.padEnd(22)} when set, test mode writes XML and uploads coverage
  ${ENV.cmdPrefix.padEnd(22)} words put in front of the production server command
  ${ENV.waitFor.padEnd(22)} host:port list replacing the default dependencies
  ${ENV.onTimeout.padEnd(22)} continue | abort (default: continue)
  ${ENV.strategy.padEnd(22)} sequential | parallel (default: sequential)
  ${ENV.configFile.padEnd(22)} YAML configuration file
  ${ENV.logLevel.padEnd(22)} logging level (default: info)
  ${ENV.logFormat.padEnd(22)} json | pretty (default: json)
`,
    )
    .action(async (mode: string | undefined, args: string[], values: OptionValues) => {
      const argv = mode === undefined ? [] : [mode, ...args];
      await handler(argv, toLaunchOptions(values));
    });

  return program;
}

/**
 * Parse `argv`, launch, and exit with the launched command's status
 */
export async function main(
  argv: readonly string[] = process.argv,
  exit: (result: LaunchResult) => void = (result) => process.exit(result.exitCode),
): Promise<void> {
  const program = createProgram(async (launchArgv, options) => {
    const result = await runLauncher(launchArgv, process.env, options);
    exit(result);
  });
  await program.parseAsync([...argv]);
}
