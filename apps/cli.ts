#!/usr/bin/env node
/**
 * Container entrypoint CLI
 */

import { main } from '../src/cli/cli';
import { createLogger } from '../src/lib/logger';

process.on('uncaughtException', (error) => {
  createLogger({ name: 'cli' }).fatal({ error }, 'Uncaught exception in CLI');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  createLogger({ name: 'cli' }).fatal({ reason }, 'Unhandled rejection in CLI');
  process.exit(1);
});

void main();
