/**
 * SHUTDOWN SERVICE
 *
 * Gracefully shuts down on SIGTERM/SIGINT:
 * 1. Stop accepting new requests
 * 2. Stop scheduled jobs
 * 3. Stop Telegram command polling
 * 4. Stop the watchdog loop (waits for the tick in progress, closes the browser)
 * 5. Exit
 */

import type { Server } from 'http';
import { getErrorMessage } from '../errors/app-errors';
import { log } from '../utils/logger';

const logger = log.child({ component: 'Shutdown' });

export interface ShutdownTargets {
  server: Server;
  scheduler?: { stop(): void };
  bot?: { stop(): Promise<void> };
  loop?: { stop(): Promise<boolean> };
}

export class ShutdownService {
  private isShuttingDown = false;

  constructor(private readonly exit: (code: number) => void = (code) => process.exit(code)) {}

  async gracefulShutdown(targets: ShutdownTargets, exitCode: number = 0): Promise<void> {
    if (this.isShuttingDown) {
      logger.info('Already shutting down');
      return;
    }

    this.isShuttingDown = true;
    const startTime = Date.now();
    logger.info({ exitCode }, 'Starting graceful shutdown');

    try {
      targets.server.close();
      targets.scheduler?.stop();
      await targets.bot?.stop();
      await targets.loop?.stop();
      logger.info({ durationMs: Date.now() - startTime }, 'Graceful shutdown completed');
    } catch (error) {
      logger.error({ error: getErrorMessage(error) }, 'Shutdown error');
    } finally {
      this.exit(exitCode);
    }
  }
}

export const shutdownService = new ShutdownService();
