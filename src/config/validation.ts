/**
 * Configuration validation
 *
 * Range and shape checks on the assembled snapshot. Runs after all layers are
 * merged, so a bad value is reported whichever layer it came from.
 */

import { formatDependency } from '../domain/types';
import { MAX_INTERVAL_SECONDS, MAX_TIMER_MS } from './defaults';
import type { CommandLine, LauncherConfig, TestCommands } from './types';

interface ValidationResult {
  isValid: boolean;
  errors: Array<{ path: string; message: string }>;
}

const TEST_STEPS: ReadonlyArray<keyof TestCommands> = ['erase', 'run', 'summary', 'html', 'xml', 'upload'];

const isValidPort = (port: number): boolean => Number.isInteger(port) && port >= 1 && port <= 65535;

/**
 * Validate launcher configuration
 */
export function validateConfig(config: LauncherConfig): ValidationResult {
  const errors: Array<{ path: string; message: string }> = [];

  if (!isValidPort(config.port)) {
    errors.push({ path: 'port', message: `Invalid port: ${config.port}. Must be between 1 and 65535` });
  }

  // Readiness validation
  if (!Number.isInteger(config.readiness.maxAttempts) || config.readiness.maxAttempts < 1) {
    errors.push({ path: 'readiness.maxAttempts', message: 'Must be an integer of at least 1' });
  }

  if (config.readiness.intervalSeconds < 0) {
    errors.push({ path: 'readiness.intervalSeconds', message: 'Must be 0 or greater' });
  } else if (config.readiness.intervalSeconds > MAX_INTERVAL_SECONDS) {
    errors.push({ path: 'readiness.intervalSeconds', message: `Must be at most ${MAX_INTERVAL_SECONDS}` });
  }

  if (config.readiness.connectTimeoutMs <= 0) {
    errors.push({ path: 'readiness.connectTimeoutMs', message: 'Must be greater than 0' });
  } else if (config.readiness.connectTimeoutMs > MAX_TIMER_MS) {
    errors.push({ path: 'readiness.connectTimeoutMs', message: `Must be at most ${MAX_TIMER_MS}` });
  }

  config.dependencies.forEach((dependency, index) => {
    if (dependency.host.trim() === '') {
      errors.push({ path: `dependencies.${index}.host`, message: 'Must not be empty' });
    }
    if (!isValidPort(dependency.port)) {
      errors.push({
        path: `dependencies.${index}.port`,
        message: `Invalid port in ${formatDependency(dependency)}`,
      });
    }
  });

  // Command validation
  const commands: Array<[string, CommandLine]> = [
    ['commands.migrate', config.commands.migrate],
    ['commands.serve', config.commands.serve],
    ['commands.serveDev', config.commands.serveDev],
    ['commands.worker', config.commands.worker],
    ['commands.shell.command', config.commands.shell.command],
    ...TEST_STEPS.map((step): [string, CommandLine] => [`commands.test.${step}`, config.commands.test[step]]),
  ];

  for (const [path, line] of commands) {
    if (line.length === 0 || line[0]?.trim() === '') {
      errors.push({ path, message: 'Must name a command' });
    }
  }

  return {
    isValid: errors.length === 0,
    errors,
  };
}
