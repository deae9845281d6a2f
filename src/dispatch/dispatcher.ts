/**
 * Mode Dispatcher
 *
 * Runs a mode's pre-steps in order, then hands the process over to the mode's
 * long-running command. One-shot: every invocation dispatches exactly once.
 */

import type { Logger } from 'pino';
import type { LauncherConfig } from '../config/types';
import { formatInvocation } from '../domain/types';
import { MigrationError, StepFailedError, isStepFailedError } from '../errors';
import type { CommandRunner } from '../infrastructure/command-runner';
import { resolveMode } from './modes';
import { buildPlan, type PlanStep } from './plan';

export interface DispatchOutcome {
  mode: string;
  exitCode: number;
  signal?: NodeJS.Signals;
  failedStep?: string;
}

export type Printer = (line: string) => void;

const printToStdout: Printer = (line) => {
  process.stdout.write(`${line}\n`);
};

export class ModeDispatcher {
  constructor(
    private readonly config: Readonly<LauncherConfig>,
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
    private readonly print: Printer = printToStdout,
  ) {}

  /**
   * Dispatch `mode` with the arguments that followed it.
   * Resolves with the exit status the launcher should exit with.
   */
  async dispatch(mode: string, args: readonly string[]): Promise<DispatchOutcome> {
    const resolved = resolveMode(mode, args);
    const plan = buildPlan(resolved, this.config);

    this.logger.debug({ mode, kind: resolved.kind, steps: plan.steps.map((step) => step.name) }, 'Dispatching');

    if (plan.ignoredArgs.length > 0) {
      this.logger.debug({ mode, args: plan.ignoredArgs }, 'Ignoring extra arguments');
    }

    try {
      await this.runSteps(plan.steps);
    } catch (error) {
      if (isStepFailedError(error)) {
        this.logger.error({ step: error.step, exitCode: error.exitCode }, error.message);
        return { mode, exitCode: error.exitCode, failedStep: error.step };
      }
      throw error;
    }

    if (plan.notice) {
      this.print(plan.notice);
    }

    if (!plan.handOff) {
      return { mode, exitCode: 0 };
    }

    this.logger.info({ mode, command: formatInvocation(plan.handOff) }, 'Handing off');
    const exit = await this.runner.handOff(plan.handOff);
    return { mode, ...exit };
  }

  private async runSteps(steps: readonly PlanStep[]): Promise<void> {
    for (const step of steps) {
      this.logger.info({ step: step.name, command: formatInvocation(step.invocation) }, `Running ${step.name}`);
      const { exitCode } = await this.runner.run(step.invocation);

      if (exitCode !== 0) {
        throw step.name === 'migrate'
          ? new MigrationError(`Migration failed with exit code ${exitCode}; not starting the server`, exitCode)
          : new StepFailedError(`Step ${step.name} failed with exit code ${exitCode}`, step.name, exitCode);
      }
    }
  }
}
