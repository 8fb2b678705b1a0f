/**
 * COLAB BROWSER SESSION
 * =====================
 *
 * The ConnectionProbe the watchdog drives in production. Owns one headless
 * Chromium (puppeteer-extra + StealthPlugin) with one tab on the notebook.
 *
 * - isConnected(): inspect the page, classify it (connection-detector)
 * - reconnect(n): click strategies in order, settle, re-inspect
 * - maintain(): keep-alive injection, cookie persistence, rotation after max age
 * - restart(): fresh browser, connect, run all cells (Ctrl+F9)
 * - screenshot(): PNG of the tab for the dashboard
 *
 * Every operation on the tab goes through one PageLock. An aborted operation
 * closes the browser so that its pending page calls fail fast; the next
 * operation relaunches.
 */

import puppeteer from 'puppeteer-extra';
import StealthPlugin from 'puppeteer-extra-plugin-stealth';
import type { Browser, Page } from 'puppeteer-core';
import { BrowserUnavailableError, getErrorMessage } from '../errors/app-errors';
import { log, type Logger } from '../utils/logger';
import { DESKTOP_USER_AGENT, getPuppeteerConfig } from '../utils/puppeteer-config';
import { sleep as defaultSleep, type SleepFn } from '../utils/timeout';
import type { Clock } from '../watchdog/session-state';
import type { AlertSink, ConnectionProbe, MaintenanceContext } from '../watchdog/types';
import {
  CLICK_STRATEGIES,
  NAME_HELPER_SHIM,
  classifyPage,
  clickConnectControl,
  inspectPage,
  installKeepAlive,
  type ClickStrategy,
  type ConnectionVerdict,
} from './connection-detector';
import type { CookieStore, StoredCookie } from './cookie-store';
import { PageLock } from './page-lock';

puppeteer.use(StealthPlugin());

export const KEEP_ALIVE_INTERVAL_MS = 85_000;

type RelaunchReason = 'rotation' | 'manual';

export interface ColabSessionOptions {
  targetUrl: string;
  headless: boolean;
  executablePath?: string;
  cookies: CookieStore;
  reconnectSettleMs: number;
  sessionMaxAgeMs: number;
  navigationTimeoutMs: number;
  /** Press Ctrl+F9 after a rotation or manual restart */
  runAllCellsOnRestart: boolean;
  alerts?: AlertSink;
  sleep?: SleepFn;
  clock?: Clock;
  logger?: Logger;
}

export class ColabBrowserSession implements ConnectionProbe {
  private browser: Browser | null = null;
  private page: Page | null = null;
  private launchedAt: Date | null = null;
  private blockedAlertSent = false;
  private readonly lock = new PageLock();
  private readonly logger: Logger;
  private readonly sleep: SleepFn;
  private readonly clock: Clock;

  constructor(private readonly options: ColabSessionOptions) {
    this.logger = options.logger ?? log.child({ component: 'ColabSession' });
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? (() => new Date());
  }

  isConnected(signal?: AbortSignal): Promise<boolean> {
    return this.exclusive('connection-check', signal, async () => {
      const page = await this.ensurePage();
      const verdict = await this.inspect(page);
      await this.handleVerdict(verdict);
      return verdict.kind === 'connected';
    });
  }

  reconnect(attemptNumber: number, signal?: AbortSignal): Promise<boolean> {
    return this.exclusive(`reconnect-${attemptNumber}`, signal, async () => {
      const page = await this.ensurePage();

      const before = await this.inspect(page);
      if (before.kind === 'connected') {
        return true;
      }
      if (before.kind === 'captcha' || before.kind === 'login-required') {
        await this.handleVerdict(before);
        return false;
      }

      const clickedWith = await this.clickConnect(page);
      if (!clickedWith) {
        this.logger.warn({ attemptNumber }, 'No connect control found, reloading page');
        await page.reload({ waitUntil: 'networkidle2', timeout: this.options.navigationTimeoutMs });
        return false;
      }

      this.logger.info({ attemptNumber, strategy: clickedWith }, 'Clicked connect control');
      await this.sleep(this.options.reconnectSettleMs, signal);

      const after = await this.inspect(page);
      await this.handleVerdict(after);
      return after.kind === 'connected';
    });
  }

  maintain({ isConnected }: MaintenanceContext, signal?: AbortSignal): Promise<void> {
    return this.exclusive('maintenance', signal, async () => {
      if (this.launchedAt && this.clock().getTime() - this.launchedAt.getTime() >= this.options.sessionMaxAgeMs) {
        await this.relaunch('rotation', signal);
        return;
      }

      const page = this.currentPage();
      if (!isConnected || !page) {
        return;
      }

      if (await page.evaluate(installKeepAlive, KEEP_ALIVE_INTERVAL_MS)) {
        this.logger.info({ intervalMs: KEEP_ALIVE_INTERVAL_MS }, 'Keep-alive script injected');
      }

      await this.options.cookies.save(toStoredCookies(await page.cookies()));
    });
  }

  restart(): Promise<void> {
    return this.exclusive('restart', undefined, () => this.relaunch('manual'));
  }

  screenshot(): Promise<Buffer> {
    return this.exclusive('screenshot', undefined, async () => {
      const page = this.currentPage();
      if (!page) {
        throw new BrowserUnavailableError('No browser page is open');
      }
      return Buffer.from(await page.screenshot({ type: 'png' }));
    });
  }

  /**
   * Closes the browser right away, without waiting for the operation in progress
   */
  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.page = null;
    this.launchedAt = null;

    if (browser) {
      await browser.close();
      this.logger.info('Browser closed');
    }
  }

  /**
   * Runs `operation` once every earlier one has finished. When `signal` aborts
   * mid-operation the browser is closed, which fails its pending page calls.
   */
  private exclusive<T>(operation: string, signal: AbortSignal | undefined, work: () => Promise<T>): Promise<T> {
    return this.lock.run(async () => {
      if (signal?.aborted) {
        throw new BrowserUnavailableError(`Browser operation '${operation}' was cancelled`);
      }

      const onAbort = () => {
        void this.abandon(operation);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      try {
        return await work();
      } finally {
        signal?.removeEventListener('abort', onAbort);
      }
    });
  }

  private async abandon(operation: string): Promise<void> {
    this.logger.warn({ operation }, 'Browser operation aborted, closing browser');
    try {
      await this.close();
    } catch (error) {
      this.logger.warn({ error: getErrorMessage(error) }, 'Error closing browser after abort');
    }
  }

  private async relaunch(reason: RelaunchReason, signal?: AbortSignal): Promise<void> {
    const previousLaunch = this.launchedAt;
    this.logger.info({ reason, previousLaunch }, 'Relaunching browser session');

    await this.close();
    const page = await this.ensurePage();

    const clickedWith = await this.clickConnect(page);
    if (clickedWith) {
      this.logger.info({ strategy: clickedWith }, 'Clicked connect control after relaunch');
      await this.sleep(this.options.reconnectSettleMs, signal);
    }

    if (this.options.runAllCellsOnRestart) {
      await this.runAllCells(page);
    }

    await this.options.alerts?.sendAlert(reason === 'rotation'
      ? {
        severity: 'info',
        title: 'Colab session rotated',
        message: `Browser session restarted after ${(this.options.sessionMaxAgeMs / 3_600_000).toFixed(1)}h`,
        context: { targetUrl: this.options.targetUrl, previousLaunch: previousLaunch?.toISOString() },
      }
      : {
        severity: 'info',
        title: 'Colab session restarted',
        message: 'Browser session restarted on request',
        context: { targetUrl: this.options.targetUrl, previousLaunch: previousLaunch?.toISOString() },
      });
  }

  private async clickConnect(page: Page): Promise<ClickStrategy | null> {
    for (const strategy of CLICK_STRATEGIES) {
      try {
        if (await page.evaluate(clickConnectControl, strategy)) {
          return strategy;
        }
      } catch (error) {
        this.logger.debug({ strategy, error: getErrorMessage(error) }, 'Click strategy failed');
      }
    }
    return null;
  }

  private async runAllCells(page: Page): Promise<void> {
    await page.keyboard.down('Control');
    await page.keyboard.press('F9');
    await page.keyboard.up('Control');
    this.logger.info('Sent Ctrl+F9 to run all cells');
  }

  /**
   * The open page, or null once it was closed or the browser went away
   */
  private currentPage(): Page | null {
    if (!this.page || this.page.isClosed() || !this.browser?.connected) {
      return null;
    }
    return this.page;
  }

  private async ensurePage(): Promise<Page> {
    const current = this.currentPage();
    if (current) {
      return current;
    }
    const stale = this.browser;
    if (stale) {
      this.logger.warn({ connected: stale.connected }, 'Browser page lost, relaunching');
      this.browser = null;
      this.page = null;
      this.launchedAt = null;
      if (stale.connected) {
        await stale.close();
      }
    }
    return this.launch();
  }

  private async launch(): Promise<Page> {
    const config = await getPuppeteerConfig({
      headless: this.options.headless,
      executablePath: this.options.executablePath,
    });

    this.logger.info({ headless: this.options.headless, executablePath: config.executablePath }, 'Launching browser');
    const browser: Browser = await puppeteer.launch(config);
    // Tracked before navigation so that an abort can close it
    this.browser = browser;

    try {
      const page = await browser.newPage();
      await page.setUserAgent(DESKTOP_USER_AGENT);
      await page.setExtraHTTPHeaders({ 'Accept-Language': 'en-US,en;q=0.9' });
      await page.evaluateOnNewDocument(NAME_HELPER_SHIM);

      const cookies = await this.options.cookies.load();
      if (cookies.length > 0) {
        await page.setCookie(...cookies);
      }

      await page.goto(this.options.targetUrl, {
        waitUntil: 'networkidle2',
        timeout: this.options.navigationTimeoutMs,
      });

      this.page = page;
      this.launchedAt = this.clock();
      this.logger.info({ url: page.url() }, 'Notebook opened');
      return page;
    } catch (error) {
      if (this.browser === browser) {
        this.browser = null;
      }
      if (browser.connected) {
        await browser.close();
      }
      throw error;
    }
  }

  private async inspect(page: Page): Promise<ConnectionVerdict> {
    const verdict = classifyPage(await page.evaluate(inspectPage));
    this.logger.debug({ verdict }, 'Page inspected');
    return verdict;
  }

  private async handleVerdict(verdict: ConnectionVerdict): Promise<void> {
    if (verdict.kind === 'connected') {
      this.blockedAlertSent = false;
      return;
    }
    if (verdict.kind === 'disconnected' || this.blockedAlertSent) {
      return;
    }

    this.blockedAlertSent = true;
    const title = verdict.kind === 'captcha' ? 'CAPTCHA detected' : 'Google login required';
    this.logger.error({ reason: verdict.reason }, title);

    await this.options.alerts?.sendAlert({
      severity: 'critical',
      title,
      message: `${verdict.reason}. Manual intervention required; refresh the saved cookies.`,
      context: { targetUrl: this.options.targetUrl },
    });
  }
}

function toStoredCookies(cookies: Awaited<ReturnType<Page['cookies']>>): StoredCookie[] {
  return cookies.map((cookie) => ({
    name: cookie.name,
    value: cookie.value,
    domain: cookie.domain,
    path: cookie.path,
    expires: cookie.expires,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite,
  }));
}
