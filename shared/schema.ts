import { z } from "zod";

// ============================================================================
// RECOVERY
// ============================================================================

export const recoveryOutcomeSchema = z.enum(["success", "failure", "timeout"]);
export type RecoveryOutcome = z.infer<typeof recoveryOutcomeSchema>;

export const recoveryAttemptSchema = z.object({
  attemptNumber: z.number().int().positive(),
  startedAt: z.string(),
  finishedAt: z.string(),
  outcome: recoveryOutcomeSchema,
  error: z.string().optional(),
});
export type RecoveryAttempt = z.infer<typeof recoveryAttemptSchema>;

/**
 * Summary of the most recent recovery invocation, kept on the session state.
 * Individual attempts are logged and then dropped.
 */
export const recoverySummarySchema = z.object({
  success: z.boolean(),
  attempts: z.number().int().nonnegative(),
  lastOutcome: recoveryOutcomeSchema.nullable(),
  finishedAt: z.string(),
});
export type RecoverySummary = z.infer<typeof recoverySummarySchema>;

// ============================================================================
// SESSION STATE
// ============================================================================

export const sessionStateSchema = z.object({
  startedAt: z.string(),
  lastCheckAt: z.string().nullable(),
  isConnected: z.boolean(),
  consecutiveFailures: z.number().int().nonnegative(),
  totalChecks: z.number().int().nonnegative(),
  totalSuccesses: z.number().int().nonnegative(),
  totalFailures: z.number().int().nonnegative(),
  totalRecoveries: z.number().int().nonnegative(),
  recoveryExhaustions: z.number().int().nonnegative(),
  lastSuccessAt: z.string().nullable(),
  lastFailureAt: z.string().nullable(),
  lastError: z.string().nullable(),
  lastRecovery: recoverySummarySchema.nullable(),
});
export type SessionState = z.infer<typeof sessionStateSchema>;

export const recoveryPhaseSchema = z.enum(["IDLE", "ATTEMPTING", "SUCCESS", "FAILED"]);
export type RecoveryPhase = z.infer<typeof recoveryPhaseSchema>;

/** Phase of the most recent recovery invocation; ATTEMPTING while one runs */
export const recoveryProgressSchema = z.object({
  phase: recoveryPhaseSchema,
  attemptNumber: z.number().int().nonnegative(),
});

export const loopStatusSchema = z.object({
  state: z.enum(["running", "stopped"]),
  isTicking: z.boolean(),
  intervalMs: z.number().int().positive(),
  nextTickAt: z.string().nullable(),
  recovery: recoveryProgressSchema,
});
export type LoopStatus = z.infer<typeof loopStatusSchema>;

export const statusSnapshotSchema = z.object({
  session: sessionStateSchema,
  loop: loopStatusSchema,
  targetUrl: z.string(),
  uptimeSeconds: z.number().nonnegative(),
  successRate: z.number().min(0).max(100),
  generatedAt: z.string(),
});
export type StatusSnapshot = z.infer<typeof statusSnapshotSchema>;

// ============================================================================
// HEALTH
// ============================================================================

export const healthReportSchema = z.object({
  status: z.enum(["healthy", "unhealthy"]),
  isConnected: z.boolean(),
  lastCheckAt: z.string().nullable(),
  consecutiveFailures: z.number().int().nonnegative(),
  threshold: z.number().int().nonnegative(),
});
export type HealthReport = z.infer<typeof healthReportSchema>;

// ============================================================================
// ALERTS
// ============================================================================

export const alertSeveritySchema = z.enum(["info", "warning", "critical"]);
export type AlertSeverity = z.infer<typeof alertSeveritySchema>;

export const alertPayloadSchema = z.object({
  severity: alertSeveritySchema,
  title: z.string(),
  message: z.string(),
  context: z.record(z.unknown()).optional(),
});
export type AlertPayload = z.infer<typeof alertPayloadSchema>;

export const alertRecordSchema = alertPayloadSchema.extend({
  timestamp: z.string(),
});
export type AlertRecord = z.infer<typeof alertRecordSchema>;

// ============================================================================
// API ENVELOPES
// ============================================================================

export const controlResultSchema = z.object({
  changed: z.boolean(),
  loop: loopStatusSchema,
});
export type ControlResult = z.infer<typeof controlResultSchema>;

export function apiSuccessSchema<T extends z.ZodTypeAny>(data: T) {
  return z.object({
    ok: z.literal(true),
    data,
  });
}

export const apiErrorSchema = z.object({
  error: z.object({
    code: z.string(),
    message: z.string(),
    context: z.record(z.unknown()).optional(),
  }),
});
export type ApiErrorBody = z.infer<typeof apiErrorSchema>;
