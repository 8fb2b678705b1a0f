import { createServer } from "http";
import { ColabBrowserSession } from "./browser/colab-session";
import { CookieStore } from "./browser/cookie-store";
import { validateEnv, type AppConfig } from "./config/env";
import { ConfigurationError, getErrorMessage } from "./errors/app-errors";
import { createApp } from "./routes";
import { AlertService } from "./services/alert-service";
import { SchedulerService, createDailyReportJob } from "./services/scheduler-service";
import { shutdownService } from "./services/shutdown-service";
import { TelegramCommandBot } from "./services/telegram-bot";
import { log as logger } from "./utils/logger";
import { SessionStateStore } from "./watchdog/session-state";
import { StatusReporter } from "./watchdog/status-reporter";
import { WatchdogLoop } from "./watchdog/watchdog-loop";

function loadConfig(): AppConfig {
  try {
    return validateEnv();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal({ issues: error.context?.issues }, error.message);
      process.exit(1);
    }
    throw error;
  }
}

function main(): void {
  const config = loadConfig();

  const alerts = new AlertService({
    webhookUrl: config.alertWebhookUrl,
    telegram: config.telegram,
  });

  const session = new ColabBrowserSession({
    targetUrl: config.colabUrl,
    headless: config.headless,
    executablePath: config.executablePath,
    cookies: new CookieStore({ filePath: config.cookiesPath, secret: config.cookieSecret }),
    reconnectSettleMs: config.reconnectSettleMs,
    sessionMaxAgeMs: config.sessionMaxAgeMs,
    navigationTimeoutMs: config.checkTimeoutMs,
    runAllCellsOnRestart: config.runAllCellsOnRestart,
    alerts,
  });

  const state = new SessionStateStore();
  const loop = new WatchdogLoop({
    probe: session,
    state,
    targetUrl: config.colabUrl,
    intervalMs: config.checkIntervalMs,
    maxRetries: config.maxRetries,
    retryDelayMs: config.retryDelayMs,
    checkTimeoutMs: config.checkTimeoutMs,
    alerts,
  });

  const reporter = new StatusReporter(state, loop, {
    unhealthyThreshold: config.unhealthyThreshold,
    targetUrl: config.colabUrl,
  });

  const scheduler = new SchedulerService();
  scheduler.register(createDailyReportJob(config.dailyReportCron, () => reporter.getSnapshot(), alerts));

  const app = createApp({
    loop,
    reporter,
    alerts,
    screenshots: session,
    controlToken: config.controlToken,
    corsOrigin: config.corsOrigin,
  });

  const bot = config.telegram && config.telegramCommands
    ? new TelegramCommandBot({ telegram: config.telegram, loop, reporter, alerts, screenshots: session })
    : undefined;

  const server = createServer(app);

  server.listen({ port: config.port, host: "0.0.0.0" }, () => {
    logger.info({ port: config.port, targetUrl: config.colabUrl, autoStart: config.autoStart }, "Keepalive server listening");

    scheduler.start();
    bot?.start();
    if (config.autoStart) {
      loop.start();
    }
  });

  const targets = { server, scheduler, bot, loop };

  process.once("SIGTERM", () => {
    logger.warn("SIGTERM received - starting graceful shutdown");
    void shutdownService.gracefulShutdown(targets, 0);
  });

  process.once("SIGINT", () => {
    logger.warn("SIGINT received - starting graceful shutdown");
    void shutdownService.gracefulShutdown(targets, 0);
  });

  process.once("uncaughtException", (error) => {
    logger.fatal({ error: error.message, stack: error.stack }, "Uncaught exception");
    void shutdownService.gracefulShutdown(targets, 1);
  });

  process.once("unhandledRejection", (reason) => {
    logger.fatal({ reason: getErrorMessage(reason) }, "Unhandled rejection");
    void shutdownService.gracefulShutdown(targets, 1);
  });
}

main();
