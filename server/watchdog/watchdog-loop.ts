/**
 * WATCHDOG LOOP
 * =============
 *
 * Every interval (default 150s):
 * 1. Ask the probe whether the target is connected
 * 2. Connected -> record success
 * 3. Disconnected, check error or check timeout -> run the recovery action
 * 4. Recovery exhausted -> record failure + critical alert, wait for next tick
 * 5. Let the probe do its housekeeping
 *
 * tick() never throws. Every failure becomes a state update and a log line.
 * Probe calls run one at a time: a call that times out is aborted and awaited
 * before the next one is made.
 */

import type { LoopStatus, SessionState } from '../../shared/schema';
import {
  ConflictError,
  ConnectionCheckFailure,
  RecoveryExhaustedError,
  ServiceUnavailableError,
  getErrorMessage,
} from '../errors/app-errors';
import { log, type Logger } from '../utils/logger';
import { runWithTimeout, type SleepFn } from '../utils/timeout';
import { runRecovery, type RecoveryTransition } from './recovery-action';
import { ScheduledTask } from './scheduled-task';
import type { SessionStateStore } from './session-state';
import type { AlertSink, ConnectionProbe } from './types';

export interface WatchdogLoopOptions {
  probe: ConnectionProbe;
  state: SessionStateStore;
  targetUrl: string;
  intervalMs: number;
  maxRetries: number;
  retryDelayMs: number;
  checkTimeoutMs: number;
  alerts?: AlertSink;
  sleep?: SleepFn;
  logger?: Logger;
}

export class WatchdogLoop {
  private readonly task: ScheduledTask;
  private readonly logger: Logger;
  private recovery: RecoveryTransition = { phase: 'IDLE', attemptNumber: 0 };

  constructor(private readonly options: WatchdogLoopOptions) {
    this.logger = options.logger ?? log.child({ component: 'WatchdogLoop' });
    this.task = new ScheduledTask({
      name: 'watchdog',
      intervalMs: options.intervalMs,
      run: (signal) => this.tick(signal),
      logger: this.logger,
    });
  }

  /**
   * Idempotent; false when already running. Announces the start through the alert sink.
   */
  start(): boolean {
    const started = this.task.start();
    if (started) {
      this.logger.info({
        targetUrl: this.options.targetUrl,
        intervalMs: this.options.intervalMs,
        maxRetries: this.options.maxRetries,
        retryDelayMs: this.options.retryDelayMs,
      }, 'Watchdog started');
      void this.announceStart();
    }
    return started;
  }

  /**
   * Idempotent; false when already stopped. Waits for the tick in progress
   * (its recovery delay is cut short) and then releases the probe, unless
   * start() was called again meanwhile.
   */
  async stop(): Promise<boolean> {
    const stopped = this.task.stop();
    if (!stopped) {
      return false;
    }

    await this.task.drain();
    await this.releaseProbe();

    this.logger.info('Watchdog stopped');
    return true;
  }

  /**
   * One tick on demand. Rejects with ConflictError while a tick is running.
   * On a stopped loop the probe is released again afterwards.
   */
  async runOnce(): Promise<Readonly<SessionState>> {
    await this.task.runNow();
    await this.releaseProbe();
    return this.options.state.snapshot();
  }

  /**
   * Throws away the current target session and opens a new one.
   * Only allowed while the loop runs, so the new session is watched.
   */
  async restartSession(): Promise<void> {
    const { probe } = this.options;
    if (!probe.restart) {
      throw new ServiceUnavailableError('Session restart is not supported by this probe');
    }
    if (!this.task.isRunning()) {
      throw new ConflictError('Start the watchdog before restarting the session');
    }
    if (this.task.isExecuting()) {
      throw new ConflictError('A check is in progress, try again shortly');
    }

    this.logger.info({ targetUrl: this.options.targetUrl }, 'Session restart requested');
    await probe.restart();
  }

  getLoopStatus(): LoopStatus {
    const nextRunAt = this.task.getNextRunAt();
    return {
      state: this.task.isRunning() ? 'running' : 'stopped',
      isTicking: this.task.isExecuting(),
      intervalMs: this.task.intervalMs,
      nextTickAt: nextRunAt ? nextRunAt.toISOString() : null,
      recovery: { ...this.recovery },
    };
  }

  async tick(signal: AbortSignal): Promise<void> {
    try {
      await this.checkAndRecover(signal);
    } catch (error) {
      // Only reachable through a bug in state/alert handling
      this.logger.error({ error: getErrorMessage(error) }, 'Unexpected error in watchdog tick');
    }
  }

  private async checkAndRecover(signal: AbortSignal): Promise<void> {
    const { probe, state } = this.options;

    const failure = await this.check(signal);
    if (!failure) {
      state.recordSuccess();
      this.logger.info('Target connected');
      await this.maintain(true, signal);
      return;
    }

    this.logger.warn({ code: failure.code, reason: failure.message }, 'Target not connected, starting recovery');

    if (signal.aborted) {
      state.recordFailure(failure.message);
      return;
    }

    const result = await runRecovery((attemptNumber, attemptSignal) => probe.reconnect(attemptNumber, attemptSignal), {
      maxRetries: this.options.maxRetries,
      retryDelayMs: this.options.retryDelayMs,
      attemptTimeoutMs: this.options.checkTimeoutMs,
      signal,
      sleep: this.options.sleep,
      logger: this.logger.child({ component: 'RecoveryAction' }),
      onTransition: (transition) => {
        this.recovery = transition;
      },
    });

    if (result.success) {
      state.recordSuccess(result);
      this.logger.info({ attempts: result.attempts.length }, 'Recovery succeeded');
      await this.maintain(true, signal);
      return;
    }

    if (signal.aborted) {
      state.recordFailure('Recovery cancelled by stop request');
      this.logger.info({ attempts: result.attempts.length }, 'Recovery cancelled');
      return;
    }

    const exhausted = new RecoveryExhaustedError(result.attempts.length, { reason: failure.message });
    state.recordFailure(exhausted.message, result);
    const snapshot = state.snapshot();

    this.logger.error({
      code: exhausted.code,
      attempts: result.attempts.length,
      consecutiveFailures: snapshot.consecutiveFailures,
    }, 'Recovery exhausted, will retry on next tick');

    await this.notify(exhausted, snapshot.consecutiveFailures);
    await this.maintain(false, signal);
  }

  /**
   * Resolves to the failure, or null when connected
   */
  private async check(signal: AbortSignal): Promise<ConnectionCheckFailure | null> {
    const { probe } = this.options;
    try {
      const connected = await runWithTimeout((checkSignal) => probe.isConnected(checkSignal), {
        timeoutMs: this.options.checkTimeoutMs,
        operation: 'connection-check',
        signal,
      });
      return connected ? null : new ConnectionCheckFailure('Target reported disconnected');
    } catch (error) {
      return new ConnectionCheckFailure(`Connection check failed: ${getErrorMessage(error)}`);
    }
  }

  private async maintain(isConnected: boolean, signal: AbortSignal): Promise<void> {
    const { probe } = this.options;
    if (!probe.maintain || signal.aborted) {
      return;
    }

    try {
      await runWithTimeout((maintainSignal) => this.callMaintain(probe, isConnected, maintainSignal), {
        timeoutMs: this.options.checkTimeoutMs,
        operation: 'maintenance',
        signal,
      });
    } catch (error) {
      this.logger.warn({ error: getErrorMessage(error) }, 'Maintenance failed (non-fatal)');
    }
  }

  private async callMaintain(probe: ConnectionProbe, isConnected: boolean, signal: AbortSignal): Promise<void> {
    if (probe.maintain) {
      await probe.maintain({ isConnected }, signal);
    }
  }

  /**
   * Closes the probe unless the loop is running (again)
   */
  private async releaseProbe(): Promise<void> {
    const { probe } = this.options;
    if (!probe.close || this.task.isRunning()) {
      return;
    }

    try {
      await probe.close();
    } catch (error) {
      this.logger.warn({ error: getErrorMessage(error) }, 'Error releasing probe (non-fatal)');
    }
  }

  private async announceStart(): Promise<void> {
    if (!this.options.alerts) {
      return;
    }

    try {
      await this.options.alerts.sendAlert({
        severity: 'info',
        title: 'Colab keepalive started',
        message: `Watching ${this.options.targetUrl} every ${Math.round(this.options.intervalMs / 1000)}s`,
        context: {
          targetUrl: this.options.targetUrl,
          intervalMs: this.options.intervalMs,
          maxRetries: this.options.maxRetries,
        },
      });
    } catch (error) {
      this.logger.warn({ error: getErrorMessage(error) }, 'Alert delivery failed');
    }
  }

  private async notify(exhausted: RecoveryExhaustedError, consecutiveFailures: number): Promise<void> {
    if (!this.options.alerts) {
      return;
    }

    try {
      await this.options.alerts.sendAlert({
        severity: 'critical',
        title: 'Colab reconnect failed',
        message: `${exhausted.message}. The watchdog will try again on the next check.`,
        context: {
          targetUrl: this.options.targetUrl,
          attempts: exhausted.attempts,
          consecutiveFailures,
        },
      });
    } catch (error) {
      this.logger.warn({ error: getErrorMessage(error) }, 'Alert delivery failed');
    }
  }
}
