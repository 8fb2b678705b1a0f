import { execFile } from 'child_process';
import { promisify } from 'util';
import type { PuppeteerLaunchOptions } from 'puppeteer-core';
import { BrowserUnavailableError } from '../errors/app-errors';
import { log } from './logger';

const execFileAsync = promisify(execFile);
const logger = log.child({ component: 'Puppeteer' });

export const DESKTOP_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

const CHROME_BINARIES = [
  'chromium',
  'google-chrome-stable',
  'google-chrome',
  'chromium-browser',
];

let cachedChromiumPath: string | undefined;

/**
 * Resolves the browser binary: explicit path, then env overrides, then PATH lookup
 */
export async function getSystemChromiumPath(explicitPath?: string): Promise<string> {
  if (explicitPath) {
    return explicitPath;
  }
  if (cachedChromiumPath) {
    return cachedChromiumPath;
  }

  const envOverrides = [
    process.env.PUPPETEER_EXECUTABLE_PATH,
    process.env.CHROME_BIN,
    process.env.CHROMIUM_PATH,
  ];

  for (const envPath of envOverrides) {
    if (envPath) {
      cachedChromiumPath = envPath;
      logger.info({ path: envPath }, 'Using Chrome from env override');
      return cachedChromiumPath;
    }
  }

  for (const binary of CHROME_BINARIES) {
    try {
      const { stdout } = await execFileAsync('which', [binary]);
      const path = stdout.trim();

      if (path) {
        cachedChromiumPath = path;
        logger.info({ binary, path }, 'Using Chrome binary');
        return cachedChromiumPath;
      }
    } catch {
      // `which` exits non-zero when the binary is missing
      continue;
    }
  }

  throw new BrowserUnavailableError(
    `Chrome not found. Set PUPPETEER_EXECUTABLE_PATH or install one of: ${CHROME_BINARIES.join(', ')}`,
  );
}

export interface BrowserLaunchSettings {
  headless: boolean;
  executablePath?: string;
}

export async function getPuppeteerConfig(settings: BrowserLaunchSettings): Promise<PuppeteerLaunchOptions> {
  const executablePath = await getSystemChromiumPath(settings.executablePath);

  return {
    headless: settings.headless,
    executablePath,
    defaultViewport: { width: 1920, height: 1080 },
    args: [
      '--no-sandbox',
      '--disable-setuid-sandbox',
      '--disable-dev-shm-usage',
      '--disable-gpu',
      '--disable-blink-features=AutomationControlled',
      '--window-size=1920,1080',
    ],
  };
}
