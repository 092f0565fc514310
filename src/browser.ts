import { chromium } from 'playwright';

import type { Logger } from './bootstrap/logger.js';
import { defaultLaunchOptions, type LaunchOptions } from './config.js';
import { bindContextDebugObservers, type DebugFlags } from './debugging.js';
import { createPortalPage, type PortalPage } from './page.js';

const BROWSER_ARGS = ['--no-sandbox', '--disable-dev-shm-usage', '--disable-blink-features=AutomationControlled'];

export interface BrowserSession {
  readonly page: PortalPage;
  readonly close: () => Promise<void>;
}

/** Acquires a browser session for one run; the scraper owns closing it. */
export type BrowserFactory = () => Promise<BrowserSession>;

export async function launchPortalBrowser(
  overrides: Partial<LaunchOptions>,
  flags: DebugFlags,
  logger: Logger,
): Promise<BrowserSession> {
  const options: LaunchOptions = { ...defaultLaunchOptions, ...overrides };

  const browser = await chromium.launch({ headless: options.headless, args: BROWSER_ARGS });
  try {
    const context = await browser.newContext({
      userAgent: options.userAgent,
      locale: options.locale,
      viewport: options.viewport,
    });
    bindContextDebugObservers(context, flags, logger);
    const page = await context.newPage();
    logger.info('[browser] launched', { headless: options.headless });

    let closed = false;
    return {
      page: createPortalPage(page),
      close: async () => {
        if (closed) {
          return;
        }
        closed = true;
        await context.close();
        await browser.close();
        logger.info('[browser] closed');
      },
    };
  } catch (error) {
    await browser.close();
    throw error;
  }
}
