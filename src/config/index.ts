/**
 * Configuration module.
 * Builds the per-invocation snapshot from defaults, an optional YAML file and the environment.
 */

export {
  createConfiguration,
  createDefaultConfig,
  getConfigurationSummary,
  type ConfigurationOptions,
  type ConfigurationResult,
} from './config';
export { DEFAULT_COMMANDS, DEFAULT_DEPENDENCIES, DEFAULT_PORT, DEFAULT_READINESS, ENV, EXIT_CODES, USAGE } from './defaults';
export { EnvironmentParser, parseDependencyList } from './env-parser';
export { loadConfigFile } from './loader';
export { fileConfigSchema, type FileConfig } from './schema';
export type { CommandLine, CommandTable, LauncherConfig, LogFormat, LogLevel, ReadinessSettings, TestCommands } from './types';
export { validateConfig } from './validation';
