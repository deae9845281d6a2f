/**
 * Readiness Waiter
 *
 * Polls declared dependencies until each accepts a TCP connection or exhausts
 * its retry budget. Readiness timeouts are results, not exceptions: what to do
 * about them is decided by resolveEscalation.
 */

import type { Logger } from 'pino';
import { DEFAULT_READINESS } from '../config/defaults';
import {
  Failure,
  Success,
  formatDependency,
  type Dependency,
  type ReadinessOutcome,
  type ReadinessReport,
  type ReadinessStrategy,
  type Result,
  type RetryPolicy,
  type TimeoutEscalation,
} from '../domain/types';
import { tcpProbe, type Probe } from '../infrastructure/tcp-probe';
import { createTimer } from '../lib/logger';
import { secondsToMs, sleep, type Sleeper } from '../shared/async';

export interface WaitOptions {
  logger: Logger;
  probe?: Probe;
  sleep?: Sleeper;
  connectTimeoutMs?: number;
}

export interface WaitAllOptions extends WaitOptions {
  strategy?: ReadinessStrategy;
}

/**
 * Wait for one dependency.
 *
 * Makes at most `policy.maxAttempts` connection attempts, sleeping
 * `policy.intervalSeconds` between two of them. Returns as soon as one succeeds.
 */
export async function waitFor(
  dependency: Dependency,
  policy: RetryPolicy,
  options: WaitOptions,
): Promise<ReadinessOutcome> {
  const probe = options.probe ?? tcpProbe;
  const pause = options.sleep ?? sleep;
  const connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_READINESS.connectTimeoutMs;
  const { logger } = options;

  logger.info(
    { dependency: formatDependency(dependency) },
    `Waiting for ${dependency.host} to listen on ${dependency.port}...`,
  );
  const timer = createTimer(logger, 'waitFor', { dependency: formatDependency(dependency) });

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    if (await probe(dependency, connectTimeoutMs)) {
      timer.end({ attempts: attempt });
      return { status: 'reachable', dependency, attempts: attempt };
    }

    logger.trace({ dependency: formatDependency(dependency), attempt }, 'Dependency not reachable yet');

    if (attempt < policy.maxAttempts) {
      await pause(secondsToMs(policy.intervalSeconds));
    }
  }

  timer.end({ attempts: policy.maxAttempts, timedOut: true });
  return { status: 'timed-out', dependency, attempts: policy.maxAttempts };
}

/**
 * Wait for every dependency, each with its own budget.
 *
 * `sequential` waits in declaration order, so the worst case is the sum of the
 * budgets; `parallel` waits on all at once. Outcomes keep declaration order either way.
 */
export async function waitForAll(
  dependencies: readonly Dependency[],
  policy: RetryPolicy,
  options: WaitAllOptions,
): Promise<ReadinessReport> {
  const strategy = options.strategy ?? DEFAULT_READINESS.strategy;
  let outcomes: ReadinessOutcome[];

  if (strategy === 'parallel') {
    outcomes = await Promise.all(dependencies.map((dependency) => waitFor(dependency, policy, options)));
  } else {
    outcomes = [];
    for (const dependency of dependencies) {
      outcomes.push(await waitFor(dependency, policy, options));
    }
  }

  return {
    outcomes,
    timedOut: outcomes
      .filter((outcome) => outcome.status === 'timed-out')
      .map((outcome) => outcome.dependency),
  };
}

/**
 * Apply the configured escalation policy to a readiness report.
 * `continue` logs timeouts and succeeds; `abort` fails if anything timed out.
 */
export function resolveEscalation(
  report: ReadinessReport,
  escalation: TimeoutEscalation,
  logger: Logger,
): Result<ReadinessReport> {
  if (report.timedOut.length === 0) {
    return Success(report);
  }

  const names = report.timedOut.map(formatDependency);

  if (escalation === 'abort') {
    return Failure(`Dependencies not reachable: ${names.join(', ')}`);
  }

  logger.warn({ dependencies: names }, 'Dependencies not reachable, continuing anyway');
  return Success(report);
}
