import { describe, it, expect } from '@jest/globals';
import { createDefaultConfig } from '../../../src/config/config';
import type { LauncherConfig } from '../../../src/config/types';
import { ModeDispatcher } from '../../../src/dispatch/dispatcher';
import type { CommandExit } from '../../../src/domain/types';
import { CommandLaunchError } from '../../../src/errors';
import {
  FakeRunner,
  createCapturingLogger,
  messagesOf,
  type RunnerCall,
} from '../../__support__/utilities/test-helpers';

function setup(
  exitFor?: (call: RunnerCall) => CommandExit,
  configure: (config: LauncherConfig) => void = () => {},
) {
  const config = createDefaultConfig();
  configure(config);
  const runner = new FakeRunner(exitFor);
  const { logger, records } = createCapturingLogger();
  const printed: string[] = [];
  const dispatcher = new ModeDispatcher(config, runner, logger, (line) => printed.push(line));
  return { dispatcher, runner, records, printed };
}

const failing =
  (command: string, exitCode: number) =>
  ({ invocation }: RunnerCall): CommandExit =>
    [invocation.command, ...invocation.args].join(' ').startsWith(command) ? { exitCode } : { exitCode: 0 };

describe('ModeDispatcher', () => {
  describe('web', () => {
    it('should migrate, then hand off to the production server', async () => {
      const { dispatcher, runner } = setup();

      const outcome = await dispatcher.dispatch('web', []);

      expect(runner.lines).toEqual([
        'run: python manage.py migrate --noinput',
        'handOff: gunicorn tecken.wsgi:application -b 0.0.0.0:8000 --workers 4 --access-logfile -',
      ]);
      expect(outcome).toEqual({ mode: 'web', exitCode: 0 });
    });

    it('should never start the server when the migration fails', async () => {
      const { dispatcher, runner, records } = setup(failing('python manage.py migrate', 2));

      const outcome = await dispatcher.dispatch('web', []);

      expect(runner.lines).toEqual(['run: python manage.py migrate --noinput']);
      expect(outcome).toEqual({ mode: 'web', exitCode: 2, failedStep: 'migrate' });
      expect(messagesOf(records, 'error')).toEqual(['Migration failed with exit code 2; not starting the server']);
    });

    it('should ignore extra arguments', async () => {
      const { dispatcher, runner, records } = setup();

      await dispatcher.dispatch('web', ['--reload']);

      expect(runner.lines[1]).toBe(
        'handOff: gunicorn tecken.wsgi:application -b 0.0.0.0:8000 --workers 4 --access-logfile -',
      );
      expect(messagesOf(records, 'debug')).toContain('Ignoring extra arguments');
    });
  });

  describe('web-dev', () => {
    it('should migrate, then hand off to the development server on the configured port', async () => {
      const { dispatcher, runner } = setup(undefined, (config) => {
        config.port = 9000;
      });

      await dispatcher.dispatch('web-dev', []);

      expect(runner.lines).toEqual([
        'run: python manage.py migrate --noinput',
        'handOff: python manage.py runserver 0.0.0.0:9000',
      ]);
    });
  });

  describe('worker', () => {
    it('should hand off to the worker without pre-steps', async () => {
      const { dispatcher, runner } = setup();

      await dispatcher.dispatch('worker', []);

      expect(runner.lines).toEqual([
        'handOff: newrelic-admin run-program celery -A tecken.celery:app worker -l info',
      ]);
    });

    it('should exit with the status of a worker killed by a signal', async () => {
      const { dispatcher } = setup(() => ({ exitCode: 143, signal: 'SIGTERM' }));

      await expect(dispatcher.dispatch('worker', [])).resolves.toEqual({
        mode: 'worker',
        exitCode: 143,
        signal: 'SIGTERM',
      });
    });
  });

  describe('test', () => {
    it('should run the suite and write the html report outside CI', async () => {
      const { dispatcher, runner } = setup();

      const outcome = await dispatcher.dispatch('test', ['tests/test_upload.py']);

      expect(runner.lines).toEqual([
        'run: coverage erase',
        'run: coverage run -m py.test --nomigrations tests/test_upload.py',
        'run: coverage report -m',
        'run: coverage html',
      ]);
      expect(outcome).toEqual({ mode: 'test', exitCode: 0 });
    });

    it('should write xml and upload coverage under CI', async () => {
      const { dispatcher, runner } = setup(undefined, (config) => {
        config.ci = true;
      });

      await dispatcher.dispatch('test', []);

      expect(runner.lines).toEqual([
        'run: coverage erase',
        'run: coverage run -m py.test --nomigrations',
        'run: coverage report -m',
        'run: coverage xml',
        'run: bash -c bash <(curl -s https://codecov.io/bash) -s /tmp',
      ]);
    });

    it('should stop at the first failing step and exit with its status', async () => {
      const { dispatcher, runner, records } = setup(failing('coverage run', 1));

      const outcome = await dispatcher.dispatch('test', []);

      expect(runner.lines).toEqual(['run: coverage erase', 'run: coverage run -m py.test --nomigrations']);
      expect(outcome).toEqual({ mode: 'test', exitCode: 1, failedStep: 'run' });
      expect(messagesOf(records, 'error')).toEqual(['Step run failed with exit code 1']);
    });
  });

  describe('bash', () => {
    it('should print the hint, then open a shell', async () => {
      const { dispatcher, runner, printed } = setup();

      await dispatcher.dispatch('bash', []);

      expect(printed).toEqual(['For high-speed test development, run: pytest-watch']);
      expect(runner.lines).toEqual(['handOff: bash']);
    });

    it('should run the given command instead of a shell', async () => {
      const { dispatcher, runner, printed } = setup();

      await dispatcher.dispatch('bash', ['pytest-watch', '--', '-x']);

      expect(printed).toHaveLength(1);
      expect(runner.lines).toEqual(['handOff: pytest-watch -- -x']);
    });
  });

  describe('passthrough', () => {
    it('should execute anything else verbatim', async () => {
      const { dispatcher, runner, printed } = setup(() => ({ exitCode: 4 }));

      const outcome = await dispatcher.dispatch('X', ['a', 'b']);

      expect(runner.lines).toEqual(['handOff: X a b']);
      expect(printed).toEqual([]);
      expect(outcome).toEqual({ mode: 'X', exitCode: 4 });
    });

    it('should propagate a launch failure', async () => {
      const { dispatcher } = setup(() => {
        throw new CommandLaunchError('Cannot execute X: command not found', 'X', 127);
      });

      await expect(dispatcher.dispatch('X', [])).rejects.toBeInstanceOf(CommandLaunchError);
    });
  });
});
