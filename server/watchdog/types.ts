import type { AlertRecord, AlertSeverity, LoopStatus, SessionState } from '../../shared/schema';
import type { AlertPayload } from '../services/alert-service';

export interface MaintenanceContext {
  isConnected: boolean;
}

/**
 * The collaborator the watchdog checks and repairs. The loop is its only caller.
 *
 * Check, reconnect and maintenance calls receive an AbortSignal that fires when
 * the call timed out or the loop is stopping. The loop waits for an aborted call to settle before it
 * issues the next one.
 */
export interface ConnectionProbe {
  /** Inspects the target; false means disconnected */
  isConnected(signal?: AbortSignal): Promise<boolean>;
  /** One recovery step; resolves true once the target is connected again */
  reconnect(attemptNumber: number, signal?: AbortSignal): Promise<boolean>;
  /** Housekeeping after each tick (keep-alive, cookies, rotation). Failures are logged only. */
  maintain?(context: MaintenanceContext, signal?: AbortSignal): Promise<void>;
  /** Starts a fresh session on the target */
  restart?(): Promise<void>;
  /** Releases the underlying resource when the loop stops */
  close?(): Promise<void>;
}

export interface AlertSink {
  sendAlert(payload: AlertPayload): Promise<void>;
}

/**
 * Operator controls over the loop (HTTP routes and bot commands)
 */
export interface LoopControls {
  start(): boolean;
  stop(): Promise<boolean>;
  runOnce(): Promise<Readonly<SessionState>>;
  restartSession(): Promise<void>;
  getLoopStatus(): LoopStatus;
}

export interface AlertHistory {
  getRecentAlerts(limit?: number, severity?: AlertSeverity): AlertRecord[];
}

export interface ScreenshotSource {
  screenshot(): Promise<Buffer>;
}
