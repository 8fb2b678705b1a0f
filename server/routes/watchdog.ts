/**
 * WATCHDOG API ROUTES
 * ===================
 *
 * GET  /health               - 200 healthy / 503 unhealthy
 * GET  /api/status           - status snapshot
 * POST /api/control/start    - start the loop (idempotent)
 * POST /api/control/stop     - stop the loop (idempotent)
 * POST /api/control/check    - run one tick now (409 while a tick runs)
 * POST /api/control/restart  - fresh browser session (409 while stopped or busy)
 * GET  /api/alerts           - recent alert history
 * GET  /api/screenshot       - PNG of the notebook tab
 * GET  /metrics              - Prometheus exposition
 */

import type { Router } from 'express';
import { z } from 'zod';
import {
  alertSeveritySchema,
  type ControlResult,
} from '../../shared/schema';
import { BrowserUnavailableError, ValidationError } from '../errors/app-errors';
import { requireControlToken } from '../middleware/auth';
import { asyncHandler } from '../middleware/error-handler';
import { createMetricsHandler } from '../metrics/exporter';
import { reqLog } from '../utils/logger';
import { sendSuccess } from '../utils/response';
import type { StatusReporter } from '../watchdog/status-reporter';
import type { AlertHistory, LoopControls, ScreenshotSource } from '../watchdog/types';

export type { AlertHistory, LoopControls, ScreenshotSource };

export interface WatchdogRouteDeps {
  loop: LoopControls;
  reporter: StatusReporter;
  alerts: AlertHistory;
  screenshots?: ScreenshotSource;
  controlToken?: string;
}

const alertQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  severity: alertSeveritySchema.optional(),
});

export function registerWatchdogRoutes(app: Router, deps: WatchdogRouteDeps) {
  const { loop, reporter, alerts, screenshots } = deps;
  const requireControl = requireControlToken(deps.controlToken);

  app.get('/health', (_req, res) => {
    const health = reporter.getHealth();
    res.status(health.status === 'healthy' ? 200 : 503).json(health);
  });

  app.get('/api/status', (_req, res) => {
    sendSuccess(res, reporter.getSnapshot());
  });

  app.post('/api/control/start', requireControl, (req, res) => {
    const result: ControlResult = { changed: loop.start(), loop: loop.getLoopStatus() };
    reqLog(req).info({ changed: result.changed }, 'Start requested');
    sendSuccess(res, result);
  });

  app.post('/api/control/stop', requireControl, asyncHandler(async (req, res) => {
    const changed = await loop.stop();
    const result: ControlResult = { changed, loop: loop.getLoopStatus() };
    reqLog(req).info({ changed }, 'Stop requested');
    sendSuccess(res, result);
  }));

  app.post('/api/control/check', requireControl, asyncHandler(async (req, res) => {
    reqLog(req).info('Manual check requested');
    await loop.runOnce();
    sendSuccess(res, reporter.getSnapshot());
  }));

  app.post('/api/control/restart', requireControl, asyncHandler(async (req, res) => {
    reqLog(req).info('Session restart requested');
    await loop.restartSession();
    const result: ControlResult = { changed: true, loop: loop.getLoopStatus() };
    sendSuccess(res, result);
  }));

  app.get('/api/alerts', (req, res) => {
    const query = alertQuerySchema.safeParse(req.query);
    if (!query.success) {
      throw new ValidationError('Invalid alert query', {
        issues: query.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const recent = alerts.getRecentAlerts(query.data.limit, query.data.severity);
    sendSuccess(res, { alerts: recent, total: recent.length });
  });

  app.get('/api/screenshot', asyncHandler(async (_req, res) => {
    if (!screenshots) {
      throw new BrowserUnavailableError('Screenshots are not available');
    }

    const png = await screenshots.screenshot();
    res.set('Cache-Control', 'no-store');
    res.type('png').send(png);
  }));

  app.get('/metrics', createMetricsHandler(() => reporter.getSnapshot()));
}
