/**
 * Session state owned by the watchdog loop.
 *
 * The store is the only holder of the mutable state. Each mutation builds a
 * new frozen object and swaps it in with a single assignment, so snapshot()
 * always returns a state that was complete at some point in time.
 */

import type { RecoveryAttempt, RecoverySummary, SessionState } from '../../shared/schema';

export type Clock = () => Date;

const systemClock: Clock = () => new Date();

export interface RecoveryRecord {
  success: boolean;
  attempts: readonly RecoveryAttempt[];
}

function summarize(recovery: RecoveryRecord, finishedAt: string): RecoverySummary {
  const last = recovery.attempts[recovery.attempts.length - 1];
  return {
    success: recovery.success,
    attempts: recovery.attempts.length,
    lastOutcome: last ? last.outcome : null,
    finishedAt,
  };
}

export class SessionStateStore {
  private state: Readonly<SessionState>;

  constructor(private readonly clock: Clock = systemClock) {
    this.state = Object.freeze(SessionStateStore.initial(clock().toISOString()));
  }

  static initial(startedAt: string): SessionState {
    return {
      startedAt,
      lastCheckAt: null,
      isConnected: false,
      consecutiveFailures: 0,
      totalChecks: 0,
      totalSuccesses: 0,
      totalFailures: 0,
      totalRecoveries: 0,
      recoveryExhaustions: 0,
      lastSuccessAt: null,
      lastFailureAt: null,
      lastError: null,
      lastRecovery: null,
    };
  }

  /**
   * Check that found the target connected, or whose recovery succeeded
   */
  recordSuccess(recovery?: RecoveryRecord): void {
    const now = this.clock().toISOString();
    const current = this.state;

    this.commit({
      ...current,
      lastCheckAt: now,
      isConnected: true,
      consecutiveFailures: 0,
      totalChecks: current.totalChecks + 1,
      totalSuccesses: current.totalSuccesses + 1,
      totalRecoveries: recovery ? current.totalRecoveries + 1 : current.totalRecoveries,
      lastSuccessAt: now,
      lastRecovery: recovery ? summarize(recovery, now) : current.lastRecovery,
    });
  }

  /**
   * Check that ended disconnected. A recovery record marks an exhausted recovery.
   */
  recordFailure(error: string, recovery?: RecoveryRecord): void {
    const now = this.clock().toISOString();
    const current = this.state;

    this.commit({
      ...current,
      lastCheckAt: now,
      isConnected: false,
      consecutiveFailures: current.consecutiveFailures + 1,
      totalChecks: current.totalChecks + 1,
      totalFailures: current.totalFailures + 1,
      recoveryExhaustions: recovery ? current.recoveryExhaustions + 1 : current.recoveryExhaustions,
      lastFailureAt: now,
      lastError: error,
      lastRecovery: recovery ? summarize(recovery, now) : current.lastRecovery,
    });
  }

  snapshot(): Readonly<SessionState> {
    return this.state;
  }

  private commit(next: SessionState): void {
    if (next.lastRecovery) {
      Object.freeze(next.lastRecovery);
    }
    this.state = Object.freeze(next);
  }
}
