/**
 * RECOVERY ACTION - bounded sequential retries
 * ============================================
 *
 * IDLE -> ATTEMPTING(1..maxRetries) -> SUCCESS | FAILED
 *
 * - Attempts run one after another, never in parallel (the browser session
 *   cannot be driven concurrently). A timed-out attempt is aborted and
 *   awaited before the next one starts
 * - First success ends the invocation
 * - A step that resolves false or throws is a failure; one that outlives
 *   attemptTimeoutMs is a timeout
 * - No delay after the last attempt
 * - An aborted signal stops before the next attempt and ends FAILED
 */

import type { RecoveryAttempt, RecoveryOutcome, RecoveryPhase } from '../../shared/schema';
import { TimeoutError, ValidationError, getErrorMessage } from '../errors/app-errors';
import { log, type Logger } from '../utils/logger';
import { runWithTimeout, sleep as defaultSleep, type SleepFn } from '../utils/timeout';
import type { Clock } from './session-state';


export type RecoveryStep = (attemptNumber: number, signal: AbortSignal) => Promise<boolean>;

export interface RecoveryTransition {
  phase: RecoveryPhase;
  attemptNumber: number;
}

export interface RecoveryOptions {
  maxRetries: number;
  retryDelayMs: number;
  attemptTimeoutMs?: number;
  signal?: AbortSignal;
  sleep?: SleepFn;
  clock?: Clock;
  logger?: Logger;
  onTransition?: (transition: RecoveryTransition) => void;
}

export interface RecoveryResult {
  success: boolean;
  phase: 'SUCCESS' | 'FAILED';
  attempts: RecoveryAttempt[];
}

export async function runRecovery(step: RecoveryStep, options: RecoveryOptions): Promise<RecoveryResult> {
  const {
    maxRetries,
    retryDelayMs,
    attemptTimeoutMs,
    signal,
    sleep = defaultSleep,
    clock = () => new Date(),
    logger = log.child({ component: 'RecoveryAction' }),
    onTransition,
  } = options;

  if (!Number.isInteger(maxRetries) || maxRetries < 1) {
    throw new ValidationError('maxRetries must be a positive integer', { maxRetries });
  }
  if (retryDelayMs < 0) {
    throw new ValidationError('retryDelayMs must not be negative', { retryDelayMs });
  }

  const attempts: RecoveryAttempt[] = [];
  onTransition?.({ phase: 'IDLE', attemptNumber: 0 });

  const finish = (phase: 'SUCCESS' | 'FAILED'): RecoveryResult => {
    onTransition?.({ phase, attemptNumber: attempts.length });
    return { success: phase === 'SUCCESS', phase, attempts };
  };

  for (let attemptNumber = 1; attemptNumber <= maxRetries; attemptNumber++) {
    if (signal?.aborted) {
      logger.info({ attempts: attempts.length }, 'Recovery cancelled');
      break;
    }

    onTransition?.({ phase: 'ATTEMPTING', attemptNumber });
    const startedAt = clock().toISOString();
    let outcome: RecoveryOutcome;
    let error: string | undefined;

    try {
      const recovered = attemptTimeoutMs
        ? await runWithTimeout((attemptSignal) => step(attemptNumber, attemptSignal), {
          timeoutMs: attemptTimeoutMs,
          operation: `recovery-attempt-${attemptNumber}`,
          signal,
        })
        : await step(attemptNumber, signal ?? new AbortController().signal);
      outcome = recovered ? 'success' : 'failure';
    } catch (caught) {
      outcome = caught instanceof TimeoutError ? 'timeout' : 'failure';
      error = getErrorMessage(caught);
    }

    const attempt: RecoveryAttempt = {
      attemptNumber,
      startedAt,
      finishedAt: clock().toISOString(),
      outcome,
      ...(error !== undefined && { error }),
    };
    attempts.push(attempt);

    if (outcome === 'success') {
      logger.info({ attempt: attemptNumber, maxRetries }, 'Recovery attempt succeeded');
      return finish('SUCCESS');
    }

    logger.warn({ attempt: attemptNumber, maxRetries, outcome, error }, 'Recovery attempt failed');

    if (attemptNumber < maxRetries) {
      await sleep(retryDelayMs, signal);
    }
  }

  return finish('FAILED');
}
