import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';
import { getLogger } from '../utils/logger.js';
import { describeError } from '../utils/errors.js';

export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  close: () => Promise<void>;
}

export interface BrowserSessionOptions {
  headless?: boolean;
  /** Default navigation and selector timeout for the page */
  timeoutMs?: number;
}

export async function createBrowserSession(
  options: BrowserSessionOptions = {}
): Promise<BrowserSession> {
  const logger = getLogger();
  const headless = options.headless ?? true;

  let browser: Browser | null = null;
  let context: BrowserContext | null = null;
  let page: Page | null = null;
  let closed = false;

  const closeQuietly = async (name: string, resource: { close: () => Promise<void> } | null) => {
    if (!resource) return;
    try {
      await resource.close();
    } catch (error) {
      logger.debug(`closing ${name} failed: ${describeError(error)}`);
    }
  };

  const close = async () => {
    if (closed) return;
    closed = true;

    await closeQuietly('page', page);
    await closeQuietly('context', context);
    await closeQuietly('browser', browser);
    logger.debug('browser closed');
  };

  try {
    logger.debug(`launching chromium (${headless ? 'headless' : 'visible'})`);
    browser = await chromium.launch({ headless });
    context = await browser.newContext();
    if (options.timeoutMs !== undefined) {
      context.setDefaultTimeout(options.timeoutMs);
    }
    page = await context.newPage();

    return {
      browser,
      context,
      page,
      close,
    };
  } catch (error) {
    await close();
    throw error;
  }
}
