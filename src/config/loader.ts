/**
 * YAML configuration file loader
 */

import { readFile } from 'node:fs/promises';
import yaml from 'js-yaml';
import { ConfigurationError } from '../errors';
import { fileConfigSchema, type FileConfig } from './schema';

/**
 * Load and validate a configuration file.
 * An empty file is an empty configuration; anything unreadable, unparsable or
 * off-schema is a ConfigurationError.
 */
export async function loadConfigFile(path: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read configuration file ${path}: ${errorMsg}`, [], path);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(raw, { filename: path });
  } catch (error) {
    const errorMsg = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid YAML in ${path}: ${errorMsg}`, [], path);
  }

  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    const violations = result.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    throw new ConfigurationError(`Invalid configuration file ${path}`, violations, path);
  }

  return result.data;
}
