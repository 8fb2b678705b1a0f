/**
 * Colab connection heuristics.
 *
 * `inspectPage`, `clickConnectControl` and `installKeepAlive` are serialized
 * into the page by `page.evaluate`, so they must stay self-contained (no
 * imports, no outer references; see NAME_HELPER_SHIM). `classifyPage` is pure
 * and runs in Node.
 */

export interface PageInspection {
  url: string;
  /** Lower-cased visible body text */
  bodyText: string;
  hasCaptchaFrame: boolean;
  /** Labels of visible buttons that look like Connect/Reconnect controls */
  connectControls: string[];
}

export type ConnectionVerdict =
  | { kind: 'connected' }
  | { kind: 'disconnected'; reason: string }
  | { kind: 'captcha'; reason: string }
  | { kind: 'login-required'; reason: string };

export const DISCONNECT_INDICATORS = [
  'runtime disconnected',
  'connect to runtime',
  'not connected',
  'reconnect',
];

const CAPTCHA_PHRASES = ['verify you are human', 'complete the captcha', "i'm not a robot"];

/** "Connect", "Reconnect", "Connect to a hosted runtime"; not "Connected" */
const CONNECT_LABEL = /^(re)?connect\b/i;

export function isConnectLabel(label: string): boolean {
  return CONNECT_LABEL.test(label.trim());
}

export function classifyPage(inspection: PageInspection): ConnectionVerdict {
  let host = '';
  try {
    host = new URL(inspection.url).hostname;
  } catch {
    host = '';
  }

  if (host === 'accounts.google.com') {
    return { kind: 'login-required', reason: 'Redirected to Google sign-in' };
  }

  const text = inspection.bodyText.toLowerCase();

  if (inspection.hasCaptchaFrame || CAPTCHA_PHRASES.some((phrase) => text.includes(phrase))) {
    return { kind: 'captcha', reason: 'CAPTCHA challenge on page' };
  }

  const indicator = DISCONNECT_INDICATORS.find((phrase) => text.includes(phrase));
  if (indicator) {
    return { kind: 'disconnected', reason: `Page shows "${indicator}"` };
  }

  const control = inspection.connectControls.find(isConnectLabel);
  if (control) {
    return { kind: 'disconnected', reason: `Visible "${control.trim()}" control` };
  }

  return { kind: 'connected' };
}

// ---------------------------------------------------------------------------
// In-page functions
// ---------------------------------------------------------------------------

export function inspectPage(): PageInspection {
  const labelPattern = /^(re)?connect\b/i;

  const isVisible = (el: Element): boolean => el.getClientRects().length > 0;

  const labelOf = (el: Element): string => {
    const aria = el.getAttribute('aria-label');
    if (aria && aria.trim()) {
      return aria.trim();
    }
    const text = (el.textContent ?? '').trim();
    if (text) {
      return text;
    }
    return el.shadowRoot ? (el.shadowRoot.textContent ?? '').trim() : '';
  };

  const captchaSelectors = [
    'iframe[src*="recaptcha"]',
    '.g-recaptcha',
    'iframe[src*="hcaptcha"]',
    '.h-captcha',
    'iframe[src*="challenges.cloudflare.com"]',
  ];

  const controls: string[] = [];
  document.querySelectorAll('button, paper-button, colab-connect-button, [role="button"]').forEach((el) => {
    if (!isVisible(el)) {
      return;
    }
    const label = labelOf(el);
    if (labelPattern.test(label)) {
      controls.push(label.slice(0, 80));
    }
  });

  return {
    url: window.location.href,
    bodyText: (document.body ? document.body.innerText : '').toLowerCase().slice(0, 20000),
    hasCaptchaFrame: captchaSelectors.some((selector) => document.querySelector(selector) !== null),
    connectControls: controls,
  };
}

export const CLICK_STRATEGIES = ['aria-label', 'button-text', 'connect-element', 'script-dispatch'] as const;

export type ClickStrategy = (typeof CLICK_STRATEGIES)[number];

/**
 * Clicks the first matching control for one strategy. Resolves true when something was clicked.
 */
export function clickConnectControl(strategy: ClickStrategy): boolean {
  const labelPattern = /^(re)?connect\b/i;
  const isVisible = (el: Element): boolean => el.getClientRects().length > 0;

  const clickFirst = (elements: Element[]): boolean => {
    for (const el of elements) {
      if (el instanceof HTMLElement && isVisible(el)) {
        el.click();
        return true;
      }
    }
    return false;
  };

  switch (strategy) {
    case 'aria-label':
      return clickFirst(Array.from(document.querySelectorAll(
        '[aria-label*="Connect"], [aria-label*="RECONNECT"], [aria-label*="Reconnect"]',
      )).filter((el) => labelPattern.test(el.getAttribute('aria-label') ?? '')));

    case 'button-text':
      return clickFirst(Array.from(document.querySelectorAll('button, paper-button'))
        .filter((el) => labelPattern.test((el.textContent ?? '').trim())));

    case 'connect-element': {
      const host = document.querySelector('colab-connect-button');
      if (!host) {
        return false;
      }
      const inner = host.shadowRoot ? host.shadowRoot.querySelector('#connect, button') : null;
      return clickFirst(inner ? [inner, host] : [host]);
    }

    case 'script-dispatch': {
      const target = Array.from(document.querySelectorAll('button, paper-button, [role="button"]'))
        .find((el) => labelPattern.test((el.getAttribute('aria-label') ?? el.textContent ?? '').trim()));
      if (!target) {
        return false;
      }
      target.dispatchEvent(new MouseEvent('click', { bubbles: true, cancelable: true, view: window }));
      return true;
    }
  }
}

/**
 * Installs a periodic in-page click on Connect controls. No-op when this document already has one.
 */
export function installKeepAlive(intervalMs: number): boolean {
  const root = document.documentElement;
  if (root.dataset.keepaliveInstalled === 'true') {
    return false;
  }
  root.dataset.keepaliveInstalled = 'true';

  const labelPattern = /^(re)?connect\b/i;
  window.setInterval(() => {
    document.querySelectorAll('button, paper-button, colab-connect-button').forEach((el) => {
      const label = (el.getAttribute('aria-label') ?? el.textContent ?? '').trim();
      if (el instanceof HTMLElement && el.getClientRects().length > 0 && labelPattern.test(label)) {
        el.click();
      }
    });
  }, intervalMs);
  return true;
}

/**
 * Installed on every new document before the functions above run there.
 * Under tsx, esbuild's keepNames wraps inner functions in `__name(fn, "name")`,
 * a helper that only exists in Node, so serialized copies need a page-side one.
 */
export const NAME_HELPER_SHIM =
  'globalThis.__name = globalThis.__name || function (fn) { return fn; };';
