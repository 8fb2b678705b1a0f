/**
 * Metrics Exporter - Prometheus text exposition of the watchdog state
 */

import type { RequestHandler } from "express";
import type { StatusSnapshot } from "../../shared/schema";

const PREFIX = "colab_keepalive";

type MetricType = "counter" | "gauge";

function metric(lines: string[], name: string, type: MetricType, help: string, value: number): void {
  lines.push(`# HELP ${PREFIX}_${name} ${help}`);
  lines.push(`# TYPE ${PREFIX}_${name} ${type}`);
  lines.push(`${PREFIX}_${name} ${value}`);
}

function toEpochSeconds(iso: string | null): number {
  return iso ? Math.floor(Date.parse(iso) / 1000) : 0;
}

export function renderPrometheusMetrics(snapshot: StatusSnapshot): string {
  const { session, loop } = snapshot;
  const lines: string[] = [];

  // Counters
  metric(lines, "checks_total", "counter", "Total connection checks", session.totalChecks);
  metric(lines, "check_successes_total", "counter", "Checks that ended connected", session.totalSuccesses);
  metric(lines, "check_failures_total", "counter", "Checks that ended disconnected", session.totalFailures);
  metric(lines, "recoveries_total", "counter", "Successful reconnects", session.totalRecoveries);
  metric(lines, "recovery_exhaustions_total", "counter", "Recoveries that ran out of attempts", session.recoveryExhaustions);

  // Gauges
  metric(lines, "connected", "gauge", "1 when the last check found the runtime connected", session.isConnected ? 1 : 0);
  metric(lines, "consecutive_failures", "gauge", "Failed checks since the last success", session.consecutiveFailures);
  metric(lines, "success_rate_percent", "gauge", "Successful checks as a percentage", snapshot.successRate);
  metric(lines, "loop_running", "gauge", "1 while the watchdog loop is running", loop.state === "running" ? 1 : 0);
  metric(lines, "uptime_seconds", "gauge", "Seconds since the process started", snapshot.uptimeSeconds);
  metric(lines, "last_check_timestamp_seconds", "gauge", "Unix time of the last check", toEpochSeconds(session.lastCheckAt));
  metric(lines, "last_success_timestamp_seconds", "gauge", "Unix time of the last success", toEpochSeconds(session.lastSuccessAt));

  return lines.join("\n") + "\n";
}

export function createMetricsHandler(getSnapshot: () => StatusSnapshot): RequestHandler {
  return (_req, res) => {
    res.set("Content-Type", "text/plain; version=0.0.4");
    res.send(renderPrometheusMetrics(getSnapshot()));
  };
}
