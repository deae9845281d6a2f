/**
 * Execution plans: what a mode runs, in which order, given the configuration
 */

import { PORT_PLACEHOLDER } from '../config/defaults';
import type { CommandLine, LauncherConfig } from '../config/types';
import type { CommandInvocation, Mode } from '../domain/types';

export type StepName = 'migrate' | 'erase' | 'run' | 'summary' | 'html' | 'xml' | 'upload';

export interface PlanStep {
  name: StepName;
  invocation: CommandInvocation;
}

export interface ExecutionPlan {
  /** Run to completion, in order; the first failure ends the plan */
  steps: PlanStep[];
  /** Printed after the steps, before the hand-off */
  notice?: string;
  /** Owns the rest of the process lifetime */
  handOff?: CommandInvocation;
  /** Extra arguments the mode does not use */
  ignoredArgs: string[];
}

/**
 * Turn a command line into an invocation, substituting the configured port
 */
export function toInvocation(line: CommandLine, port: number, extraArgs: readonly string[] = []): CommandInvocation {
  const [command = '', ...args] = line.map((word) => word.split(PORT_PLACEHOLDER).join(String(port)));
  return { command, args: [...args, ...extraArgs] };
}

export function buildPlan(mode: Mode, config: LauncherConfig): ExecutionPlan {
  const { commands, port } = config;
  const step = (name: StepName, line: CommandLine, extraArgs: readonly string[] = []): PlanStep => ({
    name,
    invocation: toInvocation(line, port, extraArgs),
  });

  switch (mode.kind) {
    case 'serve':
      return {
        steps: [step('migrate', commands.migrate)],
        handOff: toInvocation([...config.commandPrefix, ...commands.serve], port),
        ignoredArgs: mode.args,
      };

    case 'serve-dev':
      return {
        steps: [step('migrate', commands.migrate)],
        handOff: toInvocation(commands.serveDev, port),
        ignoredArgs: mode.args,
      };

    case 'worker':
      return {
        steps: [],
        handOff: toInvocation(commands.worker, port),
        ignoredArgs: mode.args,
      };

    case 'test': {
      const reporting = config.ci
        ? [step('xml', commands.test.xml), step('upload', commands.test.upload)]
        : [step('html', commands.test.html)];
      return {
        steps: [
          step('erase', commands.test.erase),
          step('run', commands.test.run, mode.args),
          step('summary', commands.test.summary),
          ...reporting,
        ],
        ignoredArgs: [],
      };
    }

    case 'shell': {
      const [command, ...args] = mode.args;
      return {
        steps: [],
        notice: commands.shell.hint || undefined,
        handOff: command !== undefined ? { command, args } : toInvocation(commands.shell.command, port),
        ignoredArgs: [],
      };
    }

    case 'passthrough':
      return {
        steps: [],
        handOff: { command: mode.command, args: mode.args },
        ignoredArgs: [],
      };
  }
}
