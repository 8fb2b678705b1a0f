/**
 * Fixed-interval task with cancellation.
 *
 * Runs never overlap: the next run is scheduled only once the previous one
 * settles. stop() clears the pending timer and aborts the signal handed to the
 * run in progress.
 */

import { ConflictError, getErrorMessage } from '../errors/app-errors';
import { log, type Logger } from '../utils/logger';

export interface ScheduledTaskOptions {
  name: string;
  intervalMs: number;
  run: (signal: AbortSignal) => Promise<void>;
  /** First run right after start() instead of one interval later (default true) */
  runImmediately?: boolean;
  logger?: Logger;
}

export class ScheduledTask {
  private timer: NodeJS.Timeout | null = null;
  private controller: AbortController | null = null;
  private inFlight: Promise<void> | null = null;
  private nextRunAt: Date | null = null;
  private readonly logger: Logger;

  constructor(private readonly options: ScheduledTaskOptions) {
    this.logger = options.logger ?? log.child({ component: 'ScheduledTask', task: options.name });
  }

  get intervalMs(): number {
    return this.options.intervalMs;
  }

  isRunning(): boolean {
    return this.controller !== null;
  }

  isExecuting(): boolean {
    return this.inFlight !== null;
  }

  getNextRunAt(): Date | null {
    return this.nextRunAt;
  }

  /**
   * Returns false when already running
   */
  start(): boolean {
    if (this.controller) {
      return false;
    }

    this.controller = new AbortController();
    this.schedule(this.options.runImmediately === false ? this.options.intervalMs : 0);
    this.logger.info({ intervalMs: this.options.intervalMs }, 'Task started');
    return true;
  }

  /**
   * Returns false when already stopped
   */
  stop(): boolean {
    if (!this.controller) {
      return false;
    }

    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRunAt = null;
    this.controller.abort();
    this.controller = null;
    this.logger.info('Task stopped');
    return true;
  }

  /**
   * Runs once outside the schedule. Rejects with ConflictError while a run is in progress.
   */
  async runNow(): Promise<void> {
    if (this.inFlight) {
      throw new ConflictError(`Task '${this.options.name}' is already running`);
    }

    const signal = this.controller?.signal ?? new AbortController().signal;
    await this.execute(signal);
  }

  /**
   * Waits for the run in progress, if any
   */
  async drain(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  private schedule(delayMs: number): void {
    this.nextRunAt = new Date(Date.now() + delayMs);
    this.timer = setTimeout(() => {
      void this.onTimer();
    }, delayMs);
  }

  private async onTimer(): Promise<void> {
    this.timer = null;
    this.nextRunAt = null;

    const controller = this.controller;
    if (!controller) {
      return;
    }

    if (this.inFlight) {
      this.logger.debug('Previous run still in progress, skipping');
    } else {
      await this.execute(controller.signal);
    }

    // Reschedule only if this start() cycle is still the active one
    if (this.controller === controller && !this.timer) {
      this.schedule(this.options.intervalMs);
    }
  }

  private async execute(signal: AbortSignal): Promise<void> {
    const run = (async () => {
      try {
        await this.options.run(signal);
      } catch (error) {
        this.logger.error({ error: getErrorMessage(error) }, 'Task run failed');
      }
    })();

    this.inFlight = run;
    try {
      await run;
    } finally {
      this.inFlight = null;
    }
  }
}
