import type { Page } from 'playwright-core';
import { debug } from '../log';
import { errorMessage } from '../errors';
import { USER_AGENT } from './common';
import type { ScrapeContext } from './types';

export interface BrowserOptions {
  args?: string[];
}

/**
 * Launches headless Chromium, hands a fresh page to `fn` and always closes the
 * browser afterwards. An abort on the context closes it early.
 */
export async function withBrowserPage<T>(
  label: string,
  context: ScrapeContext,
  fn: (page: Page) => Promise<T>,
  options: BrowserOptions = {},
): Promise<T> {
  const { chromium } = await import('playwright-core');

  console.log(`[${label}] Launching browser...`);
  const browser = await chromium.launch({
    headless: context.headless,
    executablePath: context.chromiumPath ?? undefined,
    args: options.args,
  });

  // The timeout may have fired while Chromium was starting; no abort event follows.
  if (context.signal.aborted) {
    await browser.close();
    throw new Error('Aborted while the browser was launching');
  }

  const onAbort = () => {
    browser.close().catch((error: unknown) => {
      console.error(`[${label}] Failed to close browser after abort: ${errorMessage(error)}`);
    });
  };
  context.signal.addEventListener('abort', onAbort, { once: true });

  try {
    const browserContext = await browser.newContext({ userAgent: USER_AGENT });
    const page = await browserContext.newPage();
    return await fn(page);
  } finally {
    context.signal.removeEventListener('abort', onAbort);
    if (browser.isConnected()) {
      await browser.close();
    }
    console.log(`[${label}] Browser closed.`);
  }
}

/** Clicks a consent button when one shows up; most pages have none. */
export async function acceptCookies(
  page: Page,
  label: string,
  name: RegExp = /Accept|Agree|OK/i,
  timeout = 3000,
): Promise<void> {
  try {
    await page.getByRole('button', { name }).first().click({ timeout });
  } catch (error) {
    debug(label, `No consent button: ${errorMessage(error)}`);
  }
}
