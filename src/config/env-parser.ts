/**
 * Environment Variable Parser
 *
 * Turns an environment snapshot into typed configuration overrides.
 * Problems are collected rather than thrown: malformed numbers are warnings
 * (the lower layer wins), malformed lists and enum values are errors.
 */

import type { Dependency, ReadinessStrategy, TimeoutEscalation } from '../domain/types';
import { ENV } from './defaults';
import type { LogFormat, LogLevel } from './types';

export interface EnvOverrides {
  port?: number;
  intervalSeconds?: number;
  maxAttempts?: number;
  onTimeout?: TimeoutEscalation;
  strategy?: ReadinessStrategy;
  dependencies?: Dependency[];
  commandPrefix: string[];
  development: boolean;
  ci: boolean;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  configFile?: string;
}

export interface ParseResult {
  overrides: EnvOverrides;
  warnings: string[];
  errors: string[];
}

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];
const LOG_FORMATS: readonly LogFormat[] = ['json', 'pretty'];
const ESCALATIONS: readonly TimeoutEscalation[] = ['continue', 'abort'];
const STRATEGIES: readonly ReadinessStrategy[] = ['sequential', 'parallel'];

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

/**
 * Parse a `host:port` list such as `db:5432,redis-cache:6379`
 */
export function parseDependencyList(value: string): { dependencies: Dependency[]; errors: string[] } {
  const dependencies: Dependency[] = [];
  const errors: string[] = [];

  for (const entry of value.split(',').map((part) => part.trim())) {
    if (entry === '') continue;

    const separator = entry.lastIndexOf(':');
    const rawHost = separator > 0 ? entry.slice(0, separator) : '';
    const host = rawHost.startsWith('[') && rawHost.endsWith(']') ? rawHost.slice(1, -1) : rawHost;
    const portText = separator > 0 ? entry.slice(separator + 1) : '';
    const port = Number(portText);

    if (host === '' || portText === '' || !Number.isInteger(port) || port < 1 || port > 65535) {
      errors.push(`Invalid dependency "${entry}" in ${ENV.waitFor} (expected host:port)`);
      continue;
    }
    dependencies.push({ host, port });
  }

  return { dependencies, errors };
}

export class EnvironmentParser {
  private warnings: string[] = [];
  private errors: string[] = [];

  constructor(private readonly env: NodeJS.ProcessEnv) {}

  /**
   * Parse environment variables into configuration overrides
   */
  parse(): ParseResult {
    this.warnings = [];
    this.errors = [];

    const overrides: EnvOverrides = {
      commandPrefix: this.words(ENV.cmdPrefix),
      development: this.isPresent(ENV.development),
      ci: this.isPresent(ENV.ci),
    };

    const port = this.integer(ENV.port);
    if (port !== undefined) overrides.port = port;

    const intervalSeconds = this.number(ENV.sleep);
    if (intervalSeconds !== undefined) overrides.intervalSeconds = intervalSeconds;

    const maxAttempts = this.integer(ENV.tries);
    if (maxAttempts !== undefined) overrides.maxAttempts = maxAttempts;

    const onTimeout = this.enumeration(ENV.onTimeout, ESCALATIONS);
    if (onTimeout !== undefined) overrides.onTimeout = onTimeout;

    const strategy = this.enumeration(ENV.strategy, STRATEGIES);
    if (strategy !== undefined) overrides.strategy = strategy;

    const waitFor = this.env[ENV.waitFor];
    if (waitFor !== undefined) {
      const parsed = parseDependencyList(waitFor);
      this.errors.push(...parsed.errors);
      overrides.dependencies = parsed.dependencies;
    }

    const logLevel = this.enumeration(ENV.logLevel, LOG_LEVELS);
    if (logLevel !== undefined) overrides.logLevel = logLevel;

    const logFormat = this.enumeration(ENV.logFormat, LOG_FORMATS);
    if (logFormat !== undefined) overrides.logFormat = logFormat;

    const configFile = this.value(ENV.configFile);
    if (configFile !== undefined) overrides.configFile = configFile;

    return {
      overrides,
      warnings: this.warnings,
      errors: this.errors,
    };
  }

  /**
   * Defined in the environment, even when empty
   */
  private isPresent(name: string): boolean {
    return this.env[name] !== undefined;
  }

  /**
   * Trimmed value, or undefined when unset or blank
   */
  private value(name: string): string | undefined {
    const value = this.env[name]?.trim();
    return value ? value : undefined;
  }

  private words(name: string): string[] {
    return (this.env[name] ?? '').split(/\s+/).filter((word) => word.length > 0);
  }

  private number(name: string): number | undefined {
    const value = this.value(name);
    if (value === undefined) return undefined;

    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      this.warnings.push(`Invalid ${name}: ${value}. Ignoring it`);
      return undefined;
    }
    return parsed;
  }

  private integer(name: string): number | undefined {
    const value = this.value(name);
    if (value === undefined) return undefined;

    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
      this.warnings.push(`Invalid ${name}: ${value}. Ignoring it`);
      return undefined;
    }
    return parsed;
  }

  private enumeration<T extends string>(name: string, values: readonly T[]): T | undefined {
    const value = this.value(name);
    if (value === undefined) return undefined;

    if (!isOneOf(values, value)) {
      const expected = `${values.slice(0, -1).join(', ')} or ${values[values.length - 1] ?? ''}`;
      this.errors.push(`Invalid value for ${name}: "${value}" (expected ${expected})`);
      return undefined;
    }
    return value;
  }
}
