import type { HealthReport, LoopStatus, SessionState, StatusSnapshot } from '../../shared/schema';
import type { Clock } from './session-state';

export interface SessionStateReader {
  snapshot(): Readonly<SessionState>;
}

export interface LoopStatusReader {
  getLoopStatus(): LoopStatus;
}

export interface StatusReporterOptions {
  unhealthyThreshold: number;
  targetUrl: string;
  clock?: Clock;
}

/**
 * Read-only view over the watchdog state for the dashboard and health checks.
 */
export class StatusReporter {
  private readonly clock: Clock;

  constructor(
    private readonly state: SessionStateReader,
    private readonly loop: LoopStatusReader,
    private readonly options: StatusReporterOptions,
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  getSnapshot(): Readonly<StatusSnapshot> {
    const session = this.state.snapshot();
    const now = this.clock();
    const startedAtMs = Date.parse(session.startedAt);

    return Object.freeze({
      session,
      loop: this.loop.getLoopStatus(),
      targetUrl: this.options.targetUrl,
      uptimeSeconds: Math.max(0, Math.floor((now.getTime() - startedAtMs) / 1000)),
      successRate: session.totalChecks === 0
        ? 0
        : Math.round((session.totalSuccesses / session.totalChecks) * 10000) / 100,
      generatedAt: now.toISOString(),
    });
  }

  /**
   * Unhealthy exactly when consecutiveFailures exceeds the threshold
   */
  getHealth(): HealthReport {
    const session = this.state.snapshot();
    const threshold = this.options.unhealthyThreshold;

    return {
      status: session.consecutiveFailures > threshold ? 'unhealthy' : 'healthy',
      isConnected: session.isConnected,
      lastCheckAt: session.lastCheckAt,
      consecutiveFailures: session.consecutiveFailures,
      threshold,
    };
  }
}
