/**
 * Launcher configuration: defaults, then the YAML file, then the environment
 */

import { formatDependency } from '../domain/types';
import { ConfigurationError } from '../errors';
import {
  DEFAULT_COMMANDS,
  DEFAULT_DEPENDENCIES,
  DEFAULT_PORT,
  DEFAULT_READINESS,
} from './defaults';
import { EnvironmentParser, type EnvOverrides } from './env-parser';
import { loadConfigFile } from './loader';
import type { FileConfig } from './schema';
import type { LauncherConfig, LogLevel } from './types';
import { validateConfig } from './validation';

export interface ConfigurationOptions {
  /** Configuration file given on the command line; wins over RUN_CONFIG */
  configFile?: string;
  /** Log level given on the command line; wins over LOG_LEVEL */
  logLevel?: LogLevel;
}

export interface ConfigurationResult {
  config: Readonly<LauncherConfig>;
  warnings: string[];
}

/**
 * Create default configuration
 * @returns LauncherConfig with default values for all sections
 */
function createDefaultConfig(): LauncherConfig {
  return {
    port: DEFAULT_PORT,
    development: false,
    ci: false,
    commandPrefix: [],
    dependencies: DEFAULT_DEPENDENCIES.map((dependency) => ({ ...dependency })),
    readiness: { ...DEFAULT_READINESS },
    commands: structuredClone(DEFAULT_COMMANDS),
    logging: {
      level: 'info',
      format: 'json',
    },
  };
}

/**
 * Overlay a validated configuration file on a base configuration
 */
function applyFileConfig(base: LauncherConfig, file: FileConfig): LauncherConfig {
  const commands = file.commands ?? {};
  return {
    ...base,
    port: file.port ?? base.port,
    dependencies: file.dependencies ?? base.dependencies,
    readiness: { ...base.readiness, ...file.readiness },
    commands: {
      migrate: commands.migrate ?? base.commands.migrate,
      serve: commands.serve ?? base.commands.serve,
      serveDev: commands.serveDev ?? base.commands.serveDev,
      worker: commands.worker ?? base.commands.worker,
      test: { ...base.commands.test, ...commands.test },
      shell: { ...base.commands.shell, ...commands.shell },
    },
  };
}

/**
 * Overlay environment overrides on a base configuration
 */
function applyEnvOverrides(base: LauncherConfig, env: EnvOverrides): LauncherConfig {
  return {
    ...base,
    port: env.port ?? base.port,
    development: env.development,
    ci: env.ci,
    commandPrefix: env.commandPrefix,
    dependencies: env.dependencies ?? base.dependencies,
    readiness: {
      ...base.readiness,
      intervalSeconds: env.intervalSeconds ?? base.readiness.intervalSeconds,
      maxAttempts: env.maxAttempts ?? base.readiness.maxAttempts,
      onTimeout: env.onTimeout ?? base.readiness.onTimeout,
      strategy: env.strategy ?? base.readiness.strategy,
    },
    logging: {
      level: env.logLevel ?? base.logging.level,
      format: env.logFormat ?? base.logging.format,
    },
  };
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Build the configuration snapshot for one invocation.
 * The environment is read here and nowhere else.
 * @throws ConfigurationError when any layer is invalid
 */
async function createConfiguration(
  env: NodeJS.ProcessEnv,
  options: ConfigurationOptions = {},
): Promise<ConfigurationResult> {
  const parsed = new EnvironmentParser(env).parse();
  if (parsed.errors.length > 0) {
    throw new ConfigurationError(
      'Invalid environment configuration',
      parsed.errors.map((message) => ({ path: 'env', message })),
    );
  }

  let config = createDefaultConfig();

  const configFile = options.configFile ?? parsed.overrides.configFile;
  if (configFile !== undefined) {
    config = applyFileConfig(config, await loadConfigFile(configFile));
    config.configFile = configFile;
  }

  config = applyEnvOverrides(config, parsed.overrides);
  if (options.logLevel !== undefined) {
    config.logging.level = options.logLevel;
  }

  const validation = validateConfig(config);
  if (!validation.isValid) {
    throw new ConfigurationError('Invalid configuration', validation.errors, configFile);
  }

  return { config: deepFreeze(config), warnings: parsed.warnings };
}

/**
 * Get configuration summary with key values
 */
function getConfigurationSummary(config: LauncherConfig): {
  port: number;
  development: boolean;
  ci: boolean;
  dependencies: string[];
  readiness: string;
} {
  return {
    port: config.port,
    development: config.development,
    ci: config.ci,
    dependencies: config.dependencies.map(formatDependency),
    readiness: `${config.readiness.strategy}, ${config.readiness.maxAttempts} x ${config.readiness.intervalSeconds}s, on timeout ${config.readiness.onTimeout}`,
  };
}

export { createDefaultConfig, applyFileConfig, applyEnvOverrides, createConfiguration, getConfigurationSummary };
