/**
 * Mode table: maps the first command-line token to a run mode.
 * Anything not in the table is a passthrough command, never an error.
 */

import type { Mode, ModeKind } from '../domain/types';

type NamedModeKind = Exclude<ModeKind, 'passthrough'>;

export const MODE_TABLE: Readonly<Record<string, NamedModeKind>> = {
  web: 'serve',
  'web-dev': 'serve-dev',
  worker: 'worker',
  test: 'test',
  bash: 'shell',
};

/**
 * Resolve the mode for a non-empty argv
 */
export function resolveMode(mode: string, args: readonly string[]): Mode {
  const kind = Object.prototype.hasOwnProperty.call(MODE_TABLE, mode) ? MODE_TABLE[mode] : undefined;

  switch (kind) {
    case 'serve':
    case 'serve-dev':
    case 'worker':
    case 'test':
    case 'shell':
      return { kind, args: [...args] };
    case undefined:
      return { kind: 'passthrough', command: mode, args: [...args] };
  }
}
