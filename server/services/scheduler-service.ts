/**
 * SCHEDULER SERVICE
 * =================
 *
 * Cron jobs on top of node-cron. Each job run is wrapped so a failure is
 * logged and counted, never thrown into the cron timer.
 *
 * JOBS:
 * - daily-report: status summary through the AlertService (DAILY_REPORT_CRON)
 */

import * as cron from 'node-cron';
import type { StatusSnapshot } from '../../shared/schema';
import { NotFoundError, ValidationError, getErrorMessage } from '../errors/app-errors';
import { log } from '../utils/logger';
import type { AlertSink } from '../watchdog/types';

const logger = log.child({ component: 'SchedulerService' });

export interface JobDefinition {
  name: string;
  schedule: string; // Cron syntax
  task: () => Promise<void>;
}

interface ScheduledJob extends JobDefinition {
  job?: cron.ScheduledTask;
  lastRun?: Date;
  runCount: number;
  errorCount: number;
}

export interface JobStatus {
  name: string;
  schedule: string;
  running: boolean;
  lastRun?: string;
  runCount: number;
  errorCount: number;
}

export class SchedulerService {
  private jobs: Map<string, ScheduledJob> = new Map();
  private isRunning = false;

  register(definition: JobDefinition): void {
    if (!cron.validate(definition.schedule)) {
      throw new ValidationError(`Invalid cron expression for job '${definition.name}': ${definition.schedule}`);
    }
    this.jobs.set(definition.name, { ...definition, runCount: 0, errorCount: 0 });
    logger.info({ job: definition.name, schedule: definition.schedule }, 'Job registered');
  }

  start(): void {
    if (this.isRunning) {
      logger.warn('Scheduler already running');
      return;
    }

    for (const [name, job] of Array.from(this.jobs.entries())) {
      job.job = cron.schedule(job.schedule, () => {
        void this.executeJob(name);
      });
      logger.info({ job: name, schedule: job.schedule }, 'Job scheduled');
    }

    this.isRunning = true;
  }

  stop(): void {
    for (const job of Array.from(this.jobs.values())) {
      if (job.job) {
        job.job.stop();
        job.job = undefined;
      }
    }

    if (this.isRunning) {
      logger.info('Scheduler stopped');
    }
    this.isRunning = false;
  }

  /**
   * Runs a job outside its schedule
   */
  async runNow(name: string): Promise<void> {
    if (!this.jobs.has(name)) {
      throw new NotFoundError(`Job '${name}' not found`);
    }
    await this.executeJob(name);
  }

  getStatus(): JobStatus[] {
    return Array.from(this.jobs.values()).map((job) => ({
      name: job.name,
      schedule: job.schedule,
      running: this.isRunning,
      lastRun: job.lastRun?.toISOString(),
      runCount: job.runCount,
      errorCount: job.errorCount,
    }));
  }

  private async executeJob(name: string): Promise<void> {
    const job = this.jobs.get(name);
    if (!job) return;

    const startTime = Date.now();

    try {
      await job.task();
      job.runCount++;
      job.lastRun = new Date();
      logger.info({ job: name, durationMs: Date.now() - startTime, runCount: job.runCount }, 'Job completed');
    } catch (error) {
      job.errorCount++;
      logger.error({ job: name, durationMs: Date.now() - startTime, error: getErrorMessage(error), errorCount: job.errorCount }, 'Job failed');
    }
  }
}

function formatDuration(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  return `${hours}h ${minutes}m`;
}

export function formatDailyReport(snapshot: StatusSnapshot): string {
  const { session } = snapshot;
  return [
    `Runtime: ${session.isConnected ? 'connected' : 'disconnected'}`,
    `Loop: ${snapshot.loop.state}`,
    `Uptime: ${formatDuration(snapshot.uptimeSeconds)}`,
    `Checks: ${session.totalChecks} (${snapshot.successRate}% successful)`,
    `Recoveries: ${session.totalRecoveries}, exhausted: ${session.recoveryExhaustions}`,
    `Consecutive failures: ${session.consecutiveFailures}`,
  ].join('\n');
}

export function createDailyReportJob(
  schedule: string,
  getSnapshot: () => StatusSnapshot,
  alerts: AlertSink,
): JobDefinition {
  return {
    name: 'daily-report',
    schedule,
    task: async () => {
      const snapshot = getSnapshot();
      await alerts.sendAlert({
        severity: 'info',
        title: 'Daily keepalive report',
        message: formatDailyReport(snapshot),
        context: { targetUrl: snapshot.targetUrl, generatedAt: snapshot.generatedAt },
      });
    },
  };
}
