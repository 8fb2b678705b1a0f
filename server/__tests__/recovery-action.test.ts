/**
 * Recovery action: bounded retries, outcomes, transitions, cancellation
 */

import { describe, it, expect, jest } from '@jest/globals';
import { ValidationError } from '../errors/app-errors';
import { runRecovery, type RecoveryStep, type RecoveryTransition } from '../watchdog/recovery-action';
import type { SleepFn } from '../utils/timeout';

function noSleep() {
  return jest.fn<SleepFn>().mockResolvedValue(undefined);
}

/** A step that only finishes once its signal aborts */
function untilAborted(_attemptNumber: number, signal: AbortSignal): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    signal.addEventListener('abort', () => resolve(false), { once: true });
  });
}

describe('runRecovery', () => {
  it('fails after exactly maxRetries attempts when every attempt fails', async () => {
    const step = jest.fn<RecoveryStep>().mockResolvedValue(false);
    const sleep = noSleep();

    const result = await runRecovery(step, { maxRetries: 3, retryDelayMs: 1000, sleep });

    expect(result.success).toBe(false);
    expect(result.phase).toBe('FAILED');
    expect(result.attempts).toHaveLength(3);
    expect(result.attempts.map((attempt) => attempt.outcome)).toEqual(['failure', 'failure', 'failure']);
    expect(step).toHaveBeenCalledTimes(3);
    expect(step.mock.calls.map(([attemptNumber]) => attemptNumber)).toEqual([1, 2, 3]);
  });

  it('stops at the first success', async () => {
    const step = jest.fn<RecoveryStep>()
      .mockResolvedValueOnce(false)
      .mockResolvedValueOnce(true);
    const sleep = noSleep();

    const result = await runRecovery(step, { maxRetries: 5, retryDelayMs: 1000, sleep });

    expect(result.success).toBe(true);
    expect(result.phase).toBe('SUCCESS');
    expect(result.attempts.map((attempt) => attempt.outcome)).toEqual(['failure', 'success']);
    expect(step).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(1);
  });

  it('never exceeds maxRetries', async () => {
    for (let maxRetries = 1; maxRetries <= 6; maxRetries++) {
      const step = jest.fn<RecoveryStep>().mockResolvedValue(false);

      const result = await runRecovery(step, { maxRetries, retryDelayMs: 0, sleep: noSleep() });

      expect(step).toHaveBeenCalledTimes(maxRetries);
      expect(result.attempts).toHaveLength(maxRetries);
    }
  });

  it('waits retryDelayMs between attempts but not after the last one', async () => {
    const step = jest.fn<RecoveryStep>().mockResolvedValue(false);
    const sleep = noSleep();

    await runRecovery(step, { maxRetries: 3, retryDelayMs: 2500, sleep });

    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenNthCalledWith(1, 2500, undefined);
    expect(sleep).toHaveBeenNthCalledWith(2, 2500, undefined);
  });

  it('treats a throwing step as a failure and keeps the message', async () => {
    const step = jest.fn<RecoveryStep>()
      .mockRejectedValueOnce(new Error('page crashed'))
      .mockResolvedValueOnce(true);

    const result = await runRecovery(step, { maxRetries: 2, retryDelayMs: 0, sleep: noSleep() });

    expect(result.success).toBe(true);
    expect(result.attempts[0]).toMatchObject({ attemptNumber: 1, outcome: 'failure', error: 'page crashed' });
    expect(result.attempts[1]).not.toHaveProperty('error');
  });

  it('marks an attempt that outlives attemptTimeoutMs as a timeout', async () => {
    const step = jest.fn<RecoveryStep>().mockImplementation(untilAborted);

    const result = await runRecovery(step, {
      maxRetries: 1,
      retryDelayMs: 0,
      attemptTimeoutMs: 20,
      sleep: noSleep(),
    });

    expect(result.success).toBe(false);
    expect(result.attempts[0]).toMatchObject({
      outcome: 'timeout',
      error: "Operation 'recovery-attempt-1' timed out after 20ms",
    });
  });

  it('waits for a timed-out attempt to finish before starting the next one', async () => {
    let active = 0;
    let maxActive = 0;
    const abortedSeen: boolean[] = [];
    const step = jest.fn<RecoveryStep>().mockImplementation(async (_attemptNumber, signal) => {
      active++;
      maxActive = Math.max(maxActive, active);
      await new Promise((resolve) => setTimeout(resolve, 100));
      abortedSeen.push(signal.aborted);
      active--;
      return false;
    });

    const result = await runRecovery(step, {
      maxRetries: 3,
      retryDelayMs: 0,
      attemptTimeoutMs: 20,
      sleep: noSleep(),
    });

    expect(maxActive).toBe(1);
    expect(abortedSeen).toEqual([true, true, true]);
    expect(result.attempts.map((attempt) => attempt.outcome)).toEqual(['timeout', 'timeout', 'timeout']);
  });

  it('emits IDLE, ATTEMPTING(n) and the final phase', async () => {
    const transitions: RecoveryTransition[] = [];
    const step = jest.fn<RecoveryStep>().mockResolvedValue(false);

    await runRecovery(step, {
      maxRetries: 2,
      retryDelayMs: 0,
      sleep: noSleep(),
      onTransition: (transition) => transitions.push(transition),
    });

    expect(transitions).toEqual([
      { phase: 'IDLE', attemptNumber: 0 },
      { phase: 'ATTEMPTING', attemptNumber: 1 },
      { phase: 'ATTEMPTING', attemptNumber: 2 },
      { phase: 'FAILED', attemptNumber: 2 },
    ]);
  });

  it('stops before the next attempt once the signal aborts', async () => {
    const controller = new AbortController();
    const step = jest.fn<RecoveryStep>().mockImplementation(async () => {
      controller.abort();
      return false;
    });

    const result = await runRecovery(step, {
      maxRetries: 5,
      retryDelayMs: 0,
      signal: controller.signal,
      sleep: noSleep(),
    });

    expect(result.phase).toBe('FAILED');
    expect(result.attempts).toHaveLength(1);
    expect(step).toHaveBeenCalledTimes(1);
  });

  it('rejects invalid bounds', async () => {
    const step = jest.fn<RecoveryStep>().mockResolvedValue(true);

    await expect(runRecovery(step, { maxRetries: 0, retryDelayMs: 0 })).rejects.toThrow(ValidationError);
    await expect(runRecovery(step, { maxRetries: 1.5, retryDelayMs: 0 })).rejects.toThrow(ValidationError);
    await expect(runRecovery(step, { maxRetries: 1, retryDelayMs: -1 })).rejects.toThrow(ValidationError);
    expect(step).not.toHaveBeenCalled();
  });
});
