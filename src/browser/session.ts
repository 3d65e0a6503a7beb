import { chromium, errors } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';
import { BrowserLaunchError, FetchFailure } from '../errors.js';
import type { LoadedPage } from '../types.js';

export interface LoadPageOptions {
  waitForSelector?: string;
  timeoutMs: number;
  scrollPasses?: number;
}

/**
 * Everything the fetcher needs from a browser. Failures surface as FetchFailure so
 * callers never see driver-specific errors.
 */
export interface BrowserSession {
  loadPage(url: string, options: LoadPageOptions): Promise<LoadedPage>;
  close(): Promise<void>;
}

export interface LaunchOptions {
  headless: boolean;
  userAgent?: string;
}

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

export function toFetchFailure(url: string, error: unknown): FetchFailure {
  if (error instanceof FetchFailure) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const kind = error instanceof errors.TimeoutError ? 'FetchTimeout' : 'FetchError';
  return new FetchFailure(kind, url, message.split('\n')[0].slice(0, 200));
}

async function render(page: Page, url: string, options: LoadPageOptions): Promise<LoadedPage> {
  await page.goto(url, { waitUntil: 'domcontentloaded', timeout: options.timeoutMs });
  if (options.waitForSelector) {
    await page.waitForSelector(options.waitForSelector, {
      state: 'attached',
      timeout: options.timeoutMs,
    });
  }

  for (let pass = 0; pass < (options.scrollPasses ?? 0); pass += 1) {
    await page.mouse.wheel(0, 2500);
    await page.waitForTimeout(400);
  }

  return {
    url: page.url(),
    html: await page.content(),
  };
}

class PlaywrightSession implements BrowserSession {
  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
  ) {}

  async loadPage(url: string, options: LoadPageOptions): Promise<LoadedPage> {
    const page = await this.context.newPage().catch((error: unknown) => {
      throw toFetchFailure(url, error);
    });

    let outcome: LoadedPage | FetchFailure;
    try {
      outcome = await render(page, url, options);
    } catch (error) {
      outcome = toFetchFailure(url, error);
    }

    try {
      await page.close();
    } catch (error) {
      // A failed load keeps its own error; a close failure only surfaces after a good load.
      if (!(outcome instanceof FetchFailure)) {
        outcome = toFetchFailure(url, error);
      }
    }

    if (outcome instanceof FetchFailure) {
      throw outcome;
    }
    return outcome;
  }

  async close(): Promise<void> {
    await this.context.close();
    await this.browser.close();
  }
}

export async function launchBrowserSession(options: LaunchOptions): Promise<BrowserSession> {
  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless: options.headless,
      args: ['--disable-blink-features=AutomationControlled', '--disable-dev-shm-usage'],
    });
  } catch (error) {
    throw new BrowserLaunchError(error);
  }

  let context: BrowserContext;
  try {
    context = await browser.newContext({
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      viewport: { width: 1920, height: 1080 },
    });
  } catch (error) {
    await browser.close();
    throw new BrowserLaunchError(error);
  }
  return new PlaywrightSession(browser, context);
}
