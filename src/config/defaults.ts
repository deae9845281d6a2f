/**
 * Centralized Configuration Defaults
 *
 * Single source of truth for the values used when neither the configuration
 * file nor the environment says otherwise.
 */

import type { Dependency } from '../domain/types';
import type { CommandTable, ReadinessSettings } from './types';

/**
 * Port the HTTP serving modes bind to
 */
export const DEFAULT_PORT = 8000;

/**
 * Longest delay a Node timer honours; anything above it fires after 1 ms
 */
export const MAX_TIMER_MS = 2_147_483_647;

export const MAX_INTERVAL_SECONDS = MAX_TIMER_MS / 1000;

/**
 * Readiness polling defaults
 */
export const DEFAULT_READINESS: Readonly<ReadinessSettings> = {
  intervalSeconds: 1,
  maxAttempts: 60,
  connectTimeoutMs: 2000,
  onTimeout: 'continue',
  strategy: 'sequential',
};

/**
 * Backing services of the web and worker containers, waited on in this order
 */
export const DEFAULT_DEPENDENCIES: readonly Dependency[] = [
  { host: 'db', port: 5432 },
  { host: 'redis-cache', port: 6379 },
  { host: 'redis-store', port: 6379 },
];

/**
 * Placeholder substituted with the configured port in command arguments
 */
export const PORT_PLACEHOLDER = '{port}';

export const DEFAULT_COMMANDS: CommandTable = {
  migrate: ['python', 'manage.py', 'migrate', '--noinput'],
  serve: [
    'gunicorn',
    'tecken.wsgi:application',
    '-b',
    `0.0.0.0:${PORT_PLACEHOLDER}`,
    '--workers',
    '4',
    '--access-logfile',
    '-',
  ],
  serveDev: ['python', 'manage.py', 'runserver', `0.0.0.0:${PORT_PLACEHOLDER}`],
  worker: [
    'newrelic-admin',
    'run-program',
    'celery',
    '-A',
    'tecken.celery:app',
    'worker',
    '-l',
    'info',
  ],
  test: {
    erase: ['coverage', 'erase'],
    run: ['coverage', 'run', '-m', 'py.test', '--nomigrations'],
    summary: ['coverage', 'report', '-m'],
    html: ['coverage', 'html'],
    xml: ['coverage', 'xml'],
    upload: ['bash', '-c', 'bash <(curl -s https://codecov.io/bash) -s /tmp'],
  },
  shell: {
    command: ['bash'],
    hint: 'For high-speed test development, run: pytest-watch',
  },
};

/**
 * Process exit codes reported by the launcher itself
 */
export const EXIT_CODES = {
  usage: 1,
  internal: 1,
  dependencyTimeout: 69, // EX_UNAVAILABLE
  configuration: 78, // EX_CONFIG
  notExecutable: 126,
  notFound: 127,
  signalBase: 128,
} as const;

/**
 * Environment variable names read when the configuration snapshot is built
 */
export const ENV = {
  port: 'PORT',
  sleep: 'SLEEP',
  tries: 'TRIES',
  development: 'DEVELOPMENT',
  ci: 'CI',
  cmdPrefix: 'CMD_PREFIX',
  waitFor: 'WAIT_FOR',
  onTimeout: 'READINESS_ON_TIMEOUT',
  strategy: 'READINESS_STRATEGY',
  configFile: 'RUN_CONFIG',
  logLevel: 'LOG_LEVEL',
  logFormat: 'LOG_FORMAT',
} as const;

export const MODE_NAMES = ['web', 'web-dev', 'worker', 'test', 'bash'] as const;

export const USAGE = `usage: run ${MODE_NAMES.join('|')} [args...]`;
