import { z } from 'zod';
import * as cron from 'node-cron';
import { ConfigurationError } from '../errors/app-errors';

function positiveInt(defaultValue: string) {
  return z.string().default(defaultValue).transform(Number).pipe(z.number().int().positive());
}

function nonNegativeInt(defaultValue: string) {
  return z.string().default(defaultValue).transform(Number).pipe(z.number().int().nonnegative());
}

function positiveNumber(defaultValue: string) {
  return z.string().default(defaultValue).transform(Number).pipe(z.number().positive());
}

function nonNegativeNumber(defaultValue: string) {
  return z.string().default(defaultValue).transform(Number).pipe(z.number().nonnegative());
}

function booleanFlag(defaultValue: 'true' | 'false') {
  return z
    .enum(['true', 'false', '1', '0', 'yes', 'no'])
    .default(defaultValue)
    .transform((value) => value === 'true' || value === '1' || value === 'yes');
}

const optionalString = z.string().min(1).optional();

const envSchema = z.object({
  COLAB_URL: z.string({ required_error: 'COLAB_URL is required' }).url(),
  CHECK_INTERVAL_SECONDS: positiveInt('150'),
  MAX_RETRIES: positiveInt('10'),
  RETRY_DELAY_SECONDS: positiveNumber('10'),
  CHECK_TIMEOUT_SECONDS: positiveNumber('60'),
  RECONNECT_SETTLE_SECONDS: nonNegativeNumber('5'),
  UNHEALTHY_THRESHOLD: nonNegativeInt('3'),
  SESSION_MAX_HOURS: positiveNumber('11.5'),
  PORT: positiveInt('8080'),
  AUTO_START: booleanFlag('true'),
  HEADLESS: booleanFlag('true'),
  RUN_ALL_CELLS_ON_RESTART: booleanFlag('true'),
  COOKIES_PATH: z.string().min(1).default('./data/google-cookies.json'),
  COOKIE_SECRET: optionalString,
  CONTROL_TOKEN: optionalString,
  ALERT_WEBHOOK_URL: z.string().url().optional(),
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: optionalString,
  TELEGRAM_COMMANDS: booleanFlag('true'),
  PUPPETEER_EXECUTABLE_PATH: optionalString,
  CORS_ORIGIN: optionalString,
  DAILY_REPORT_CRON: z
    .string()
    .default('0 9 * * *')
    .refine((expression) => cron.validate(expression), { message: 'Invalid cron expression' }),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
}).refine(
  (env) => Boolean(env.TELEGRAM_BOT_TOKEN) === Boolean(env.TELEGRAM_CHAT_ID),
  { message: 'TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID must be set together', path: ['TELEGRAM_CHAT_ID'] },
);

export type Env = z.infer<typeof envSchema>;

export interface TelegramConfig {
  botToken: string;
  chatId: string;
}

/**
 * Runtime configuration derived from the environment, durations in ms
 */
export interface AppConfig {
  colabUrl: string;
  checkIntervalMs: number;
  maxRetries: number;
  retryDelayMs: number;
  checkTimeoutMs: number;
  reconnectSettleMs: number;
  unhealthyThreshold: number;
  sessionMaxAgeMs: number;
  port: number;
  autoStart: boolean;
  headless: boolean;
  runAllCellsOnRestart: boolean;
  cookiesPath: string;
  cookieSecret?: string;
  controlToken?: string;
  alertWebhookUrl?: string;
  telegram?: TelegramConfig;
  /** Answer bot commands in the Telegram chat (only with `telegram` set) */
  telegramCommands: boolean;
  executablePath?: string;
  corsOrigin: string | string[];
  dailyReportCron: string;
  nodeEnv: Env['NODE_ENV'];
}

// Blank values count as unset so that `FOO=` in a .env file falls back to the default
function dropBlankValues(source: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }
  return cleaned;
}

function toAppConfig(env: Env): AppConfig {
  return {
    colabUrl: env.COLAB_URL,
    checkIntervalMs: env.CHECK_INTERVAL_SECONDS * 1000,
    maxRetries: env.MAX_RETRIES,
    retryDelayMs: Math.round(env.RETRY_DELAY_SECONDS * 1000),
    checkTimeoutMs: Math.round(env.CHECK_TIMEOUT_SECONDS * 1000),
    reconnectSettleMs: Math.round(env.RECONNECT_SETTLE_SECONDS * 1000),
    unhealthyThreshold: env.UNHEALTHY_THRESHOLD,
    sessionMaxAgeMs: Math.round(env.SESSION_MAX_HOURS * 60 * 60 * 1000),
    port: env.PORT,
    autoStart: env.AUTO_START,
    headless: env.HEADLESS,
    runAllCellsOnRestart: env.RUN_ALL_CELLS_ON_RESTART,
    cookiesPath: env.COOKIES_PATH,
    cookieSecret: env.COOKIE_SECRET,
    controlToken: env.CONTROL_TOKEN,
    alertWebhookUrl: env.ALERT_WEBHOOK_URL,
    telegram: env.TELEGRAM_BOT_TOKEN && env.TELEGRAM_CHAT_ID
      ? { botToken: env.TELEGRAM_BOT_TOKEN, chatId: env.TELEGRAM_CHAT_ID }
      : undefined,
    telegramCommands: env.TELEGRAM_COMMANDS,
    executablePath: env.PUPPETEER_EXECUTABLE_PATH,
    corsOrigin: env.CORS_ORIGIN ? env.CORS_ORIGIN.split(',').map((origin) => origin.trim()) : '*',
    dailyReportCron: env.DAILY_REPORT_CRON,
    nodeEnv: env.NODE_ENV,
  };
}

/**
 * Parses and validates an environment map.
 * Throws ConfigurationError listing every invalid variable.
 */
export function parseEnv(source: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(dropBlankValues(source));

  if (!result.success) {
    const issues = result.error.issues.map((issue) => ({
      variable: issue.path.join('.') || '(root)',
      message: issue.message,
    }));
    throw new ConfigurationError(
      `Invalid environment: ${issues.map((issue) => `${issue.variable}: ${issue.message}`).join('; ')}`,
      { issues },
    );
  }

  return toAppConfig(result.data);
}

let validatedConfig: AppConfig | undefined;

export function validateEnv(): AppConfig {
  if (!validatedConfig) {
    validatedConfig = parseEnv(process.env);
  }
  return validatedConfig;
}
