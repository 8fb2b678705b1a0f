/**
 * ALERT SERVICE
 * =============
 *
 * Sends watchdog notifications through every configured channel:
 * - Generic webhook (HTTP POST, JSON body), retried with backoff on 5xx/ECONNREFUSED
 * - Telegram Bot API (sendMessage)
 * - Structured log (always)
 *
 * Delivery failures are logged and never propagate to the caller.
 *
 * USAGE:
 * ```ts
 * await alertService.sendAlert({
 *   severity: 'critical',
 *   title: 'CAPTCHA detected',
 *   message: 'Manual login required',
 *   context: { targetUrl },
 * });
 * ```
 */

import axios, { isAxiosError } from 'axios';
import type { AlertPayload, AlertRecord, AlertSeverity } from '../../shared/schema';
import type { TelegramConfig } from '../config/env';
import { getErrorMessage } from '../errors/app-errors';
import { log } from '../utils/logger';
import { sleep } from '../utils/timeout';

const logger = log.child({ component: 'AlertService' });

export type { AlertPayload, AlertRecord, AlertSeverity };

export interface HttpPostConfig {
  timeout: number;
  headers: Record<string, string>;
}

export type HttpPost = (url: string, body: unknown, config: HttpPostConfig) => Promise<{ status: number }>;

export interface AlertServiceOptions {
  webhookUrl?: string;
  telegram?: TelegramConfig;
  /** Delays between webhook retries */
  retryDelaysMs?: number[];
  maxHistory?: number;
  post?: HttpPost;
}

const DEFAULT_RETRY_DELAYS_MS = [2000, 4000, 8000];
const REQUEST_TIMEOUT_MS = 10000;
const SOURCE = 'colab-keepalive';

const SEVERITY_LABEL: Record<AlertSeverity, string> = {
  info: 'INFO',
  warning: 'WARNING',
  critical: 'CRITICAL',
};

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Telegram message body (HTML parse mode)
 */
export function formatTelegramMessage(alert: AlertRecord): string {
  return `<b>[${SEVERITY_LABEL[alert.severity]}] ${escapeHtml(alert.title)}</b>\n${escapeHtml(alert.message)}\n<i>${alert.timestamp}</i>`;
}

function isTransient(error: unknown): boolean {
  if (!isAxiosError(error)) {
    return false;
  }
  const status = error.response?.status;
  return (status !== undefined && status >= 500) || error.code === 'ECONNREFUSED';
}

export class AlertService {
  private readonly webhookUrl?: string;
  private readonly telegram?: TelegramConfig;
  private readonly retryDelaysMs: number[];
  private readonly maxHistory: number;
  private readonly post: HttpPost;
  private history: AlertRecord[] = [];

  constructor(options: AlertServiceOptions = {}) {
    this.webhookUrl = options.webhookUrl;
    this.telegram = options.telegram;
    this.retryDelaysMs = options.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
    this.maxHistory = options.maxHistory ?? 100;
    this.post = options.post ?? ((url, body, config) => axios.post(url, body, config));

    if (this.webhookUrl) {
      // Only the host: webhook paths usually embed a secret
      try {
        logger.info({ webhookHost: new URL(this.webhookUrl).hostname }, 'Webhook alerts enabled');
      } catch {
        logger.info('Webhook alerts enabled');
      }
    }
    if (this.telegram) {
      logger.info({ chatId: this.telegram.chatId }, 'Telegram alerts enabled');
    }
  }

  hasRemoteChannels(): boolean {
    return Boolean(this.webhookUrl || this.telegram);
  }

  async sendAlert(payload: AlertPayload): Promise<void> {
    const alert: AlertRecord = { ...payload, timestamp: new Date().toISOString() };

    this.addToHistory(alert);
    this.logAlert(alert);

    const deliveries: Promise<void>[] = [];
    if (this.webhookUrl) {
      deliveries.push(this.sendWebhook(this.webhookUrl, alert));
    }
    if (this.telegram) {
      deliveries.push(this.sendTelegram(this.telegram, alert));
    }

    await Promise.all(deliveries);
  }

  /**
   * Newest first
   */
  getRecentAlerts(limit: number = 20, severity?: AlertSeverity): AlertRecord[] {
    const alerts = severity ? this.history.filter((alert) => alert.severity === severity) : this.history;
    return alerts.slice(-limit).reverse();
  }

  clearHistory(): void {
    this.history = [];
  }

  private async sendWebhook(url: string, alert: AlertRecord): Promise<void> {
    const body = {
      severity: alert.severity,
      title: alert.title,
      message: alert.message,
      context: alert.context,
      timestamp: alert.timestamp,
      source: SOURCE,
    };
    const config: HttpPostConfig = {
      timeout: REQUEST_TIMEOUT_MS,
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': `${SOURCE}/1.0`,
      },
    };

    for (let attempt = 0; ; attempt++) {
      try {
        const response = await this.post(url, body, config);
        logger.debug({ status: response.status, attempt }, 'Webhook delivered');
        return;
      } catch (error) {
        const delay = this.retryDelaysMs[attempt];
        if (delay === undefined || !isTransient(error)) {
          logger.error({ error: getErrorMessage(error), attempt }, 'Webhook delivery failed');
          return;
        }
        logger.warn({ error: getErrorMessage(error), retryInMs: delay }, 'Webhook failed, will retry');
        await sleep(delay);
      }
    }
  }

  private async sendTelegram(telegram: TelegramConfig, alert: AlertRecord): Promise<void> {
    try {
      await this.post(
        `https://api.telegram.org/bot${telegram.botToken}/sendMessage`,
        {
          chat_id: telegram.chatId,
          text: formatTelegramMessage(alert),
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        },
        { timeout: REQUEST_TIMEOUT_MS, headers: { 'Content-Type': 'application/json' } },
      );
      logger.debug('Telegram notification sent');
    } catch (error) {
      logger.error({ error: getErrorMessage(error) }, 'Telegram delivery failed');
    }
  }

  private logAlert(alert: AlertRecord): void {
    const entry = { severity: alert.severity, message: alert.message, context: alert.context };
    const line = `[ALERT] ${alert.title}`;

    switch (alert.severity) {
      case 'critical':
        logger.error(entry, line);
        break;
      case 'warning':
        logger.warn(entry, line);
        break;
      default:
        logger.info(entry, line);
    }
  }

  private addToHistory(alert: AlertRecord): void {
    this.history.push(alert);
    if (this.history.length > this.maxHistory) {
      this.history.shift();
    }
  }
}
