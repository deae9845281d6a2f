import { describe, it, expect, jest } from '@jest/globals';
import type { LaunchOptions, LaunchResult } from '../../../src/app/launcher';
import { createProgram, main, toLaunchOptions } from '../../../src/cli/cli';

function parse(...args: string[]) {
  const handler = jest.fn(async (_argv: string[], _options: LaunchOptions) => {});
  const program = createProgram(handler)
    .exitOverride()
    .configureOutput({ writeErr: () => {}, writeOut: () => {} });
  return { handler, parsing: program.parseAsync(['node', 'run', ...args]) };
}

describe('CLI Interface', () => {
  describe('createProgram', () => {
    it('should pass the mode and its arguments to the launcher', async () => {
      const { handler, parsing } = parse('web-dev');
      await parsing;

      expect(handler).toHaveBeenCalledWith(['web-dev'], {});
    });

    it('should leave options after the mode to the mode', async () => {
      const { handler, parsing } = parse('--config', 'ci.yaml', '--log-level', 'debug', 'test', '-k', 'slow', '--version');
      await parsing;

      expect(handler).toHaveBeenCalledWith(['test', '-k', 'slow', '--version'], {
        configFile: 'ci.yaml',
        logLevel: 'debug',
      });
    });

    it('should call the launcher without a mode so it can report the usage', async () => {
      const { handler, parsing } = parse();
      await parsing;

      expect(handler).toHaveBeenCalledWith([], {});
    });

    it('should accept --print-config on its own', async () => {
      const { handler, parsing } = parse('--print-config');
      await parsing;

      expect(handler).toHaveBeenCalledWith([], { printConfig: true });
    });

    it('should reject an unknown log level', async () => {
      const { handler, parsing } = parse('--log-level', 'loud', 'web');

      await expect(parsing).rejects.toMatchObject({ code: 'commander.invalidArgument' });
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('toLaunchOptions', () => {
    it('should keep only well-typed values', () => {
      expect(toLaunchOptions({ config: 42, logLevel: 'loud', printConfig: 'yes' })).toEqual({});
      expect(toLaunchOptions({ config: 'run.yaml', logLevel: 'trace', printConfig: true })).toEqual({
        configFile: 'run.yaml',
        logLevel: 'trace',
        printConfig: true,
      });
    });
  });

  describe('main', () => {
    it('should exit with the launcher status', async () => {
      const stderr = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const results: LaunchResult[] = [];

      await main(['node', 'run'], (result) => {
        results.push(result);
      });

      expect(results).toEqual([{ exitCode: 1 }]);
      expect(stderr).toHaveBeenCalledWith('usage: run web|web-dev|worker|test|bash [args...]\n');
    });
  });
});
