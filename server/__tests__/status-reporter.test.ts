/**
 * Status reporter: snapshot derivation and health threshold
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { statusSnapshotSchema, type LoopStatus } from '../../shared/schema';
import { SessionStateStore } from '../watchdog/session-state';
import { StatusReporter } from '../watchdog/status-reporter';

const TARGET_URL = 'https://colab.research.google.com/drive/test-notebook';

const stoppedLoop = {
  getLoopStatus: (): LoopStatus => ({
    state: 'stopped',
    isTicking: false,
    intervalMs: 150_000,
    nextTickAt: null,
    recovery: { phase: 'IDLE', attemptNumber: 0 },
  }),
};

describe('StatusReporter', () => {
  let state: SessionStateStore;
  let now: Date;

  function createReporter(unhealthyThreshold = 3): StatusReporter {
    return new StatusReporter(state, stoppedLoop, {
      unhealthyThreshold,
      targetUrl: TARGET_URL,
      clock: () => now,
    });
  }

  function fail(times: number): void {
    for (let i = 0; i < times; i++) {
      state.recordFailure('Target reported disconnected');
    }
  }

  beforeEach(() => {
    state = new SessionStateStore(() => new Date('2026-01-01T00:00:00.000Z'));
    now = new Date('2026-01-01T00:01:30.500Z');
  });

  describe('getSnapshot', () => {
    it('derives uptime and a zero success rate before any check', () => {
      const snapshot = createReporter().getSnapshot();

      expect(snapshot.uptimeSeconds).toBe(90);
      expect(snapshot.successRate).toBe(0);
      expect(snapshot.targetUrl).toBe(TARGET_URL);
      expect(snapshot.generatedAt).toBe('2026-01-01T00:01:30.500Z');
      expect(snapshot.loop.state).toBe('stopped');
      expect(() => statusSnapshotSchema.parse(snapshot)).not.toThrow();
    });

    it('rounds the success rate to two decimals', () => {
      state.recordSuccess();
      state.recordSuccess();
      fail(1);

      expect(createReporter().getSnapshot().successRate).toBe(66.67);
    });

    it('returns a frozen copy that later updates do not touch', () => {
      const reporter = createReporter();
      const snapshot = reporter.getSnapshot();

      fail(2);

      expect(Object.isFrozen(snapshot)).toBe(true);
      expect(snapshot.session.consecutiveFailures).toBe(0);
      expect(reporter.getSnapshot().session.consecutiveFailures).toBe(2);
    });
  });

  describe('getHealth', () => {
    it('is healthy up to the threshold', () => {
      fail(3);

      expect(createReporter(3).getHealth()).toEqual({
        status: 'healthy',
        isConnected: false,
        lastCheckAt: '2026-01-01T00:00:00.000Z',
        consecutiveFailures: 3,
        threshold: 3,
      });
    });

    it('is unhealthy once failures exceed the threshold', () => {
      fail(4);

      expect(createReporter(3).getHealth().status).toBe('unhealthy');
    });

    it('recovers after a success', () => {
      fail(5);
      state.recordSuccess();

      expect(createReporter(3).getHealth().status).toBe('healthy');
    });

    it('flags the first failure with a zero threshold', () => {
      const reporter = createReporter(0);
      expect(reporter.getHealth().status).toBe('healthy');

      fail(1);
      expect(reporter.getHealth().status).toBe('unhealthy');
    });
  });
});
