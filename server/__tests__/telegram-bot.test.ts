/**
 * Telegram command bot: chat filtering, commands, polling
 */

import { describe, it, expect, jest } from '@jest/globals';
import type { StatusSnapshot } from '../../shared/schema';
import { ConflictError, ServiceUnavailableError } from '../errors/app-errors';
import {
  TelegramCommandBot,
  formatStatus,
  parseCommand,
  type TelegramBody,
  type TelegramBotOptions,
  type TelegramCall,
  type TelegramUpdate,
} from '../services/telegram-bot';
import type { SleepFn } from '../utils/timeout';
import { SessionStateStore } from '../watchdog/session-state';
import type { AlertHistory, LoopControls } from '../watchdog/types';

const CHAT_ID = '12345';

function snapshot(): StatusSnapshot {
  return {
    session: {
      ...SessionStateStore.initial('2026-01-01T00:00:00.000Z'),
      isConnected: true,
      totalChecks: 40,
      totalSuccesses: 39,
      totalFailures: 1,
      totalRecoveries: 1,
    },
    loop: {
      state: 'running',
      isTicking: false,
      intervalMs: 150_000,
      nextTickAt: null,
      recovery: { phase: 'IDLE', attemptNumber: 0 },
    },
    targetUrl: 'https://colab.research.google.com/drive/test-notebook',
    uptimeSeconds: 9000,
    successRate: 97.5,
    generatedAt: '2026-01-01T02:30:00.000Z',
  };
}

interface SentRequest {
  method: string;
  body: TelegramBody;
}

/**
 * Bot API stand-in: getUpdates hands out `batches` in order, then hangs until aborted
 */
function fakeApi(batches: unknown[][] = [], failures: Error[] = []) {
  const sent: SentRequest[] = [];
  const call = jest.fn<TelegramCall>(async (method, body, { signal }) => {
    if (method !== 'getUpdates') {
      sent.push({ method, body });
      return { ok: true, result: {} };
    }
    const failure = failures.shift();
    if (failure) {
      throw failure;
    }
    const batch = batches.shift();
    if (batch) {
      return { ok: true, result: batch };
    }
    return new Promise<unknown>((_resolve, reject) => {
      signal?.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
    });
  });
  return { call, sent };
}

function createBot(overrides: Partial<TelegramBotOptions> = {}) {
  const loop = {
    start: jest.fn<LoopControls['start']>().mockReturnValue(true),
    stop: jest.fn<LoopControls['stop']>().mockResolvedValue(true),
    runOnce: jest.fn<LoopControls['runOnce']>(),
    restartSession: jest.fn<LoopControls['restartSession']>().mockResolvedValue(undefined),
    getLoopStatus: jest.fn<LoopControls['getLoopStatus']>(),
  };
  const alerts = { getRecentAlerts: jest.fn<AlertHistory['getRecentAlerts']>().mockReturnValue([]) };
  const api = fakeApi();

  const bot = new TelegramCommandBot({
    telegram: { botToken: 'test-token', chatId: CHAT_ID },
    loop,
    reporter: { getSnapshot: () => snapshot() },
    alerts,
    call: api.call,
    ...overrides,
  });
  return { bot, loop, alerts, api };
}

function message(updateId: number, text: string, chatId: number | string = Number(CHAT_ID)): TelegramUpdate {
  return { update_id: updateId, message: { chat: { id: chatId }, text } };
}

function textReply(text: string): SentRequest {
  return {
    method: 'sendMessage',
    body: { chat_id: CHAT_ID, text, parse_mode: 'HTML', disable_web_page_preview: true },
  };
}

async function flush(times = 20): Promise<void> {
  for (let i = 0; i < times; i++) {
    await new Promise((resolve) => setImmediate(resolve));
  }
}

describe('parseCommand', () => {
  it('strips the slash, bot name and arguments', () => {
    expect(parseCommand('/status')).toBe('status');
    expect(parseCommand('  /Stats@keepalive_bot now')).toBe('stats');
  });

  it('returns null for plain text', () => {
    expect(parseCommand('hello')).toBeNull();
    expect(parseCommand('/')).toBeNull();
  });
});

describe('formatStatus', () => {
  it('lists runtime, loop, recovery and last check', () => {
    expect(formatStatus(snapshot())).toBe([
      '<b>Runtime:</b> 🟢 connected',
      '<b>Loop:</b> running',
      '<b>Recovery:</b> IDLE',
      '<b>Last check:</b> never',
      '<b>Consecutive failures:</b> 0',
    ].join('\n'));
  });

  it('shows the attempt while recovering', () => {
    const current = snapshot();
    current.loop.recovery = { phase: 'ATTEMPTING', attemptNumber: 2 };

    expect(formatStatus(current).split('\n')[2]).toBe('<b>Recovery:</b> ATTEMPTING (attempt 2)');
  });
});

describe('TelegramCommandBot', () => {
  describe('handleUpdate', () => {
    it('ignores commands from other chats', async () => {
      const { bot, loop, api } = createBot();

      await bot.handleUpdate(message(1, '/start_bot', 999));

      expect(loop.start).not.toHaveBeenCalled();
      expect(api.sent).toEqual([]);
    });

    it('ignores plain messages and updates without text', async () => {
      const { bot, api } = createBot();

      await bot.handleUpdate(message(1, 'are you there?'));
      await bot.handleUpdate({ update_id: 2 });

      expect(api.sent).toEqual([]);
    });

    it('starts the watchdog on /start_bot', async () => {
      const { bot, loop, api } = createBot();

      await bot.handleUpdate(message(1, '/start_bot'));

      expect(loop.start).toHaveBeenCalledTimes(1);
      expect(api.sent).toEqual([textReply('🚀 Watchdog started')]);
    });

    it('reports an already running watchdog', async () => {
      const { bot, loop, api } = createBot();
      loop.start.mockReturnValue(false);

      await bot.handleUpdate(message(1, '/start_bot'));

      expect(api.sent).toEqual([textReply('✅ Watchdog is already running')]);
    });

    it('stops the watchdog on /stop_bot', async () => {
      const { bot, loop, api } = createBot();

      await bot.handleUpdate(message(1, '/stop_bot'));

      expect(loop.stop).toHaveBeenCalledTimes(1);
      expect(api.sent).toEqual([textReply('🛑 Watchdog stopped')]);
    });

    it('restarts the session on /restart', async () => {
      const { bot, loop, api } = createBot();

      await bot.handleUpdate(message(1, '/restart'));

      expect(loop.restartSession).toHaveBeenCalledTimes(1);
      expect(api.sent).toEqual([textReply('🔄 Browser session restarted')]);
    });

    it('replies with the error when a command fails', async () => {
      const { bot, loop, api } = createBot();
      loop.restartSession.mockRejectedValue(new ConflictError('Start the watchdog before restarting the session'));

      await bot.handleUpdate(message(1, '/restart'));

      expect(api.sent).toEqual([textReply('❌ /restart failed: Start the watchdog before restarting the session')]);
    });

    it('sends the counters on /stats', async () => {
      const { bot, api } = createBot();

      await bot.handleUpdate(message(1, '/stats'));

      expect(api.sent).toEqual([textReply([
        '<b>Keepalive stats</b>',
        'Runtime: connected',
        'Loop: running',
        'Uptime: 2h 30m',
        'Checks: 40 (97.5% successful)',
        'Recoveries: 1, exhausted: 0',
        'Consecutive failures: 0',
      ].join('\n'))]);
    });

    it('lists recent alerts with escaped titles', async () => {
      const { bot, alerts, api } = createBot();
      alerts.getRecentAlerts.mockReturnValue([
        { severity: 'critical', title: 'CAPTCHA <detected>', message: 'x', timestamp: '2026-01-01T00:00:00.000Z' },
        { severity: 'info', title: 'Colab keepalive started', message: 'y', timestamp: '2026-01-01T00:00:01.000Z' },
      ]);

      await bot.handleUpdate(message(1, '/alerts'));

      expect(alerts.getRecentAlerts).toHaveBeenCalledWith(5);
      expect(api.sent).toEqual([textReply([
        '🚨 <b>CAPTCHA &lt;detected&gt;</b> <i>2026-01-01T00:00:00.000Z</i>',
        'ℹ️ <b>Colab keepalive started</b> <i>2026-01-01T00:00:01.000Z</i>',
      ].join('\n'))]);
    });

    it('says when there are no alerts', async () => {
      const { bot, api } = createBot();

      await bot.handleUpdate(message(1, '/alerts'));

      expect(api.sent).toEqual([textReply('No alerts yet')]);
    });

    it('uploads the screenshot as a photo', async () => {
      const png = Buffer.from([0x89, 0x50, 0x4e, 0x47]);
      const screenshot = jest.fn<() => Promise<Buffer>>().mockResolvedValue(png);
      const { bot, api } = createBot({ screenshots: { screenshot } });

      await bot.handleUpdate(message(1, '/screenshot'));

      expect(screenshot).toHaveBeenCalledTimes(1);
      expect(api.sent).toHaveLength(1);
      const [request] = api.sent;
      expect(request?.method).toBe('sendPhoto');
      const body = request?.body;
      if (!(body instanceof FormData)) {
        throw new Error('sendPhoto body should be multipart form data');
      }
      expect(body.get('chat_id')).toBe(CHAT_ID);
      expect(body.get('photo')).toBeInstanceOf(Blob);
    });

    it('answers /screenshot without a screenshot source', async () => {
      const { bot, api } = createBot();

      await bot.handleUpdate(message(1, '/screenshot'));

      expect(api.sent).toEqual([textReply('Screenshots are not available')]);
    });

    it('points unknown commands at /help', async () => {
      const { bot, api } = createBot();

      await bot.handleUpdate(message(1, '/reboot'));

      expect(api.sent).toEqual([textReply('Unknown command /reboot. Send /help for the list.')]);
    });
  });

  describe('pollOnce', () => {
    it('answers each update and advances the offset', async () => {
      const api = fakeApi([[message(10, '/start_bot'), message(11, '/stop_bot')], []]);
      const { bot, loop } = createBot({ call: api.call });

      await expect(bot.pollOnce()).resolves.toBe(2);
      await expect(bot.pollOnce()).resolves.toBe(0);

      expect(loop.start).toHaveBeenCalledTimes(1);
      expect(loop.stop).toHaveBeenCalledTimes(1);
      expect(api.call).toHaveBeenNthCalledWith(1, 'getUpdates', expect.objectContaining({ offset: 0 }), expect.anything());
      expect(api.call).toHaveBeenLastCalledWith('getUpdates', expect.objectContaining({ offset: 12 }), expect.anything());
    });

    it('skips a malformed message without losing the update', async () => {
      const api = fakeApi([[{ update_id: 7, message: { text: '/status' } }], []]);
      const { bot } = createBot({ call: api.call });

      await expect(bot.pollOnce()).resolves.toBe(1);
      await bot.pollOnce();

      expect(api.sent).toEqual([]);
      expect(api.call).toHaveBeenLastCalledWith('getUpdates', expect.objectContaining({ offset: 8 }), expect.anything());
    });

    it('rejects when the Bot API reports an error', async () => {
      const call = jest.fn<TelegramCall>().mockResolvedValue({ ok: false, description: 'Unauthorized' });
      const { bot } = createBot({ call });

      await expect(bot.pollOnce()).rejects.toThrow(ServiceUnavailableError);
      await expect(bot.pollOnce()).rejects.toThrow('Telegram getUpdates failed: Unauthorized');
    });
  });

  describe('start / stop', () => {
    it('polls until stopped', async () => {
      const api = fakeApi([[message(1, '/status')]]);
      const { bot } = createBot({ call: api.call });

      expect(bot.start()).toBe(true);
      expect(bot.start()).toBe(false);
      await flush();

      expect(api.sent).toHaveLength(1);
      expect(api.sent[0]?.method).toBe('sendMessage');

      await bot.stop();
      expect(bot.isPolling()).toBe(false);
    });

    it('backs off after a failed poll and keeps going', async () => {
      const api = fakeApi([[message(1, '/help')]], [new Error('network down')]);
      const sleep = jest.fn<SleepFn>().mockResolvedValue(undefined);
      const { bot } = createBot({ call: api.call, sleep, retryDelayMs: 1234 });

      bot.start();
      await flush();

      expect(sleep).toHaveBeenCalledWith(1234, expect.any(AbortSignal));
      expect(api.sent).toHaveLength(1);

      await bot.stop();
    });
  });
});
