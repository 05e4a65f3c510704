/**
 * Fallback Ladder
 *
 * Each pipeline stage declares its fallbacks as an ordered list of attempts
 * ending in a terminal default. An attempt can decline by returning null or
 * fail by throwing; either way the next attempt runs. The terminal default
 * must not throw.
 */

import { logger, serializeError } from './logger';
import { fallbackStepsCounter } from './metrics';

export interface LadderAttempt<T> {
  /** Stable name, used in logs and metrics */
  name: string;
  run: () => T | null;
}

export interface LadderOutcome<T> {
  value: T;
  /** Name of the attempt that produced the value, or 'terminal' */
  resolvedBy: string;
  /** Attempts that threw, in order */
  failures: Array<{ attempt: string; error: unknown }>;
}

export function runFallbackLadder<T>(
  stage: string,
  attempts: ReadonlyArray<LadderAttempt<T>>,
  terminal: () => T
): LadderOutcome<T> {
  const failures: LadderOutcome<T>['failures'] = [];

  for (const attempt of attempts) {
    try {
      const value = attempt.run();
      if (value !== null) {
        fallbackStepsCounter.inc({ stage, attempt: attempt.name, outcome: 'resolved' });
        return { value, resolvedBy: attempt.name, failures };
      }
      fallbackStepsCounter.inc({ stage, attempt: attempt.name, outcome: 'declined' });
      logger.debug('Fallback attempt declined', { stage, attempt: attempt.name });
    } catch (error) {
      failures.push({ attempt: attempt.name, error });
      fallbackStepsCounter.inc({ stage, attempt: attempt.name, outcome: 'failed' });
      logger.warn('Fallback attempt failed, moving to next', {
        stage,
        attempt: attempt.name,
        error: serializeError(error),
      });
    }
  }

  fallbackStepsCounter.inc({ stage, attempt: 'terminal', outcome: 'resolved' });
  logger.warn('All fallback attempts exhausted, using terminal default', { stage });
  return { value: terminal(), resolvedBy: 'terminal', failures };
}
