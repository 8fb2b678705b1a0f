/**
 * TELEGRAM COMMAND BOT
 * ====================
 *
 * Long-polls the Bot API (getUpdates) and answers commands from the configured
 * chat only:
 *
 * /status      - runtime, loop and last check
 * /stats       - counters since start
 * /start_bot   - start the watchdog loop
 * /stop_bot    - stop the watchdog loop
 * /restart     - fresh browser session
 * /screenshot  - PNG of the notebook tab
 * /alerts      - recent alerts
 * /help        - command list
 */

import axios from 'axios';
import { z } from 'zod';
import type { StatusSnapshot } from '../../shared/schema';
import type { TelegramConfig } from '../config/env';
import { ServiceUnavailableError, getErrorMessage } from '../errors/app-errors';
import { log } from '../utils/logger';
import { sleep as defaultSleep, type SleepFn } from '../utils/timeout';
import type { AlertHistory, LoopControls, ScreenshotSource } from '../watchdog/types';
import { escapeHtml } from './alert-service';
import { formatDailyReport } from './scheduler-service';

const logger = log.child({ component: 'TelegramBot' });

const POLL_TIMEOUT_S = 25;
const REQUEST_TIMEOUT_MS = 10_000;
const DEFAULT_RETRY_DELAY_MS = 5_000;
const ALERTS_SHOWN = 5;

const SEVERITY_ICON = { info: 'ℹ️', warning: '⚠️', critical: '🚨' } as const;

export type TelegramBody = Record<string, unknown> | FormData;

export interface TelegramCallOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** One Bot API method call; resolves the raw JSON response body */
export type TelegramCall = (method: string, body: TelegramBody, options: TelegramCallOptions) => Promise<unknown>;

const apiResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
});

const updateSchema = z.object({
  update_id: z.number().int(),
  message: z.object({
    chat: z.object({ id: z.union([z.number(), z.string()]) }),
    text: z.string().optional(),
  }).optional().catch(undefined),
});
export type TelegramUpdate = z.infer<typeof updateSchema>;

export interface SnapshotSource {
  getSnapshot(): Readonly<StatusSnapshot>;
}

export type BotReply =
  | { kind: 'text'; text: string }
  | { kind: 'photo'; photo: Buffer; caption: string };

export interface TelegramBotOptions {
  telegram: TelegramConfig;
  loop: LoopControls;
  reporter: SnapshotSource;
  alerts: AlertHistory;
  screenshots?: ScreenshotSource;
  call?: TelegramCall;
  retryDelayMs?: number;
  sleep?: SleepFn;
}

export function createTelegramCall(botToken: string): TelegramCall {
  const client = axios.create({ baseURL: `https://api.telegram.org/bot${botToken}/` });
  return async (method, body, { timeoutMs, signal }) => {
    const response = await client.post<unknown>(method, body, { timeout: timeoutMs, signal });
    return response.data;
  };
}

/**
 * Command name without the slash and any @botname suffix, or null for plain text
 */
export function parseCommand(text: string): string | null {
  const [first] = text.trim().split(/\s+/);
  if (!first?.startsWith('/')) {
    return null;
  }
  const [name] = first.slice(1).split('@');
  return name ? name.toLowerCase() : null;
}

export function formatStatus(snapshot: StatusSnapshot): string {
  const { session, loop } = snapshot;
  return [
    `<b>Runtime:</b> ${session.isConnected ? '🟢 connected' : '🔴 disconnected'}`,
    `<b>Loop:</b> ${loop.state}`,
    `<b>Recovery:</b> ${loop.recovery.phase}${loop.recovery.attemptNumber > 0 ? ` (attempt ${loop.recovery.attemptNumber})` : ''}`,
    `<b>Last check:</b> ${session.lastCheckAt ?? 'never'}`,
    `<b>Consecutive failures:</b> ${session.consecutiveFailures}`,
  ].join('\n');
}

const HELP_TEXT = [
  '<b>Colab keepalive</b>',
  '/status - runtime, loop and last check',
  '/stats - counters since start',
  '/start_bot - start the watchdog',
  '/stop_bot - stop the watchdog',
  '/restart - fresh browser session',
  '/screenshot - capture the notebook tab',
  '/alerts - recent alerts',
].join('\n');

export class TelegramCommandBot {
  private readonly call: TelegramCall;
  private readonly retryDelayMs: number;
  private readonly sleep: SleepFn;
  private offset = 0;
  private controller: AbortController | null = null;
  private polling: Promise<void> | null = null;

  constructor(private readonly options: TelegramBotOptions) {
    this.call = options.call ?? createTelegramCall(options.telegram.botToken);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  isPolling(): boolean {
    return this.polling !== null;
  }

  /**
   * Starts long polling. Returns false when already polling.
   */
  start(): boolean {
    if (this.polling) {
      return false;
    }
    const controller = new AbortController();
    this.controller = controller;
    this.polling = this.pollLoop(controller.signal);
    logger.info('Telegram command polling started');
    return true;
  }

  /**
   * Stops polling and waits for the request in flight to settle
   */
  async stop(): Promise<void> {
    const polling = this.polling;
    if (!polling) {
      return;
    }
    this.controller?.abort();
    await polling;
    this.controller = null;
    this.polling = null;
    logger.info('Telegram command polling stopped');
  }

  /**
   * Fetches one batch of updates and answers each in order
   */
  async pollOnce(signal?: AbortSignal): Promise<number> {
    const result = await this.request('getUpdates', {
      offset: this.offset,
      timeout: POLL_TIMEOUT_S,
      allowed_updates: ['message'],
    }, POLL_TIMEOUT_S * 1000 + REQUEST_TIMEOUT_MS, signal);

    const updates = z.array(updateSchema).parse(result ?? []);
    for (const update of updates) {
      this.offset = Math.max(this.offset, update.update_id + 1);
      await this.handleUpdate(update);
    }
    return updates.length;
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const message = update.message;
    if (!message?.text) {
      return;
    }
    if (String(message.chat.id) !== this.options.telegram.chatId) {
      logger.warn({ chatId: message.chat.id }, 'Ignoring command from unknown chat');
      return;
    }

    const command = parseCommand(message.text);
    if (!command) {
      return;
    }

    logger.info({ command }, 'Telegram command received');
    const reply = await this.execute(command);
    await this.send(reply);
  }

  async execute(command: string): Promise<BotReply> {
    try {
      return await this.dispatch(command);
    } catch (error) {
      logger.error({ command, error: getErrorMessage(error) }, 'Telegram command failed');
      return text(`❌ /${escapeHtml(command)} failed: ${escapeHtml(getErrorMessage(error))}`);
    }
  }

  private async dispatch(command: string): Promise<BotReply> {
    const { loop, reporter, alerts, screenshots } = this.options;

    switch (command) {
      case 'start':
      case 'help':
        return text(HELP_TEXT);
      case 'status':
        return text(formatStatus(reporter.getSnapshot()));
      case 'stats':
        return text(`<b>Keepalive stats</b>\n${escapeHtml(formatDailyReport(reporter.getSnapshot()))}`);
      case 'start_bot':
        return text(loop.start() ? '🚀 Watchdog started' : '✅ Watchdog is already running');
      case 'stop_bot':
        return text(await loop.stop() ? '🛑 Watchdog stopped' : 'Watchdog is not running');
      case 'restart':
        await loop.restartSession();
        return text('🔄 Browser session restarted');
      case 'screenshot': {
        if (!screenshots) {
          return text('Screenshots are not available');
        }
        const photo = await screenshots.screenshot();
        return { kind: 'photo', photo, caption: `Notebook at ${new Date().toISOString()}` };
      }
      case 'alerts': {
        const recent = alerts.getRecentAlerts(ALERTS_SHOWN);
        if (recent.length === 0) {
          return text('No alerts yet');
        }
        return text(recent
          .map((alert) => `${SEVERITY_ICON[alert.severity]} <b>${escapeHtml(alert.title)}</b> <i>${alert.timestamp}</i>`)
          .join('\n'));
      }
      default:
        return text(`Unknown command /${escapeHtml(command)}. Send /help for the list.`);
    }
  }

  private async send(reply: BotReply): Promise<void> {
    const { chatId } = this.options.telegram;
    try {
      if (reply.kind === 'text') {
        await this.request('sendMessage', {
          chat_id: chatId,
          text: reply.text,
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        }, REQUEST_TIMEOUT_MS);
        return;
      }

      const form = new FormData();
      form.append('chat_id', chatId);
      form.append('caption', reply.caption);
      form.append('photo', new Blob([new Uint8Array(reply.photo)], { type: 'image/png' }), 'screenshot.png');
      await this.request('sendPhoto', form, REQUEST_TIMEOUT_MS);
    } catch (error) {
      logger.error({ kind: reply.kind, error: getErrorMessage(error) }, 'Telegram reply failed');
    }
  }

  private async request(method: string, body: TelegramBody, timeoutMs: number, signal?: AbortSignal): Promise<unknown> {
    const response = apiResponseSchema.parse(await this.call(method, body, { timeoutMs, signal }));
    if (!response.ok) {
      throw new ServiceUnavailableError(`Telegram ${method} failed: ${response.description ?? 'unknown error'}`, { method });
    }
    return response.result;
  }

  private async pollLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.pollOnce(signal);
      } catch (error) {
        if (signal.aborted) {
          break;
        }
        logger.warn({ error: getErrorMessage(error), retryInMs: this.retryDelayMs }, 'Telegram polling failed, will retry');
        await this.sleep(this.retryDelayMs, signal);
      }
    }
  }
}

function text(body: string): BotReply {
  return { kind: 'text', text: body };
}
