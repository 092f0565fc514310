import path from 'node:path';
import type { BrowserContext, Page } from 'playwright';

import type { Logger } from './bootstrap/logger.js';
import { DIAGNOSTIC_TEXT_LIMIT } from './config.js';
import { writeFileAtomic } from './io/files.js';
import type { PortalPage } from './page.js';

export interface DiagnosticSink {
  /** Best effort: a capture failure is logged, never thrown. */
  capture(label: string, page: Pick<PortalPage, 'url' | 'bodyText'>): Promise<void>;
}

export const diagnosticFileName = (label: string): string => `debug_${label}.txt`;

export const formatDiagnostic = (url: string, text: string): string =>
  `URL: ${url}\n\n${text.slice(0, DIAGNOSTIC_TEXT_LIMIT)}`;

export function createFileDiagnosticSink(directory: string, logger: Logger): DiagnosticSink {
  return {
    async capture(label, page) {
      const target = path.join(directory, diagnosticFileName(label));
      try {
        const url = page.url();
        const text = await page.bodyText();
        await writeFileAtomic(target, formatDiagnostic(url, text));
        logger.info('[diagnostics] page captured', { label, path: target });
      } catch (error) {
        logger.warn('[diagnostics] capture failed', { label, path: target, error });
      }
    },
  };
}

export interface DebugFlags {
  readonly debugNetwork: boolean;
  readonly debugConsole: boolean;
}

const BENIGN_FAILURES = ['ERR_ABORTED', 'ERR_BLOCKED_BY_RESPONSE', 'ERR_BLOCKED_BY_ORB'];
const NOISY_HOSTS = ['googletagmanager', 'google-analytics', 'sentry', 'hotjar', 'intercom'];

export function isBenignRequestFailure(url: string, errorText: string): boolean {
  return (
    BENIGN_FAILURES.some((code) => errorText.includes(code)) || NOISY_HOSTS.some((host) => url.includes(host))
  );
}

export function attachPageDebugObservers(page: Page, flags: DebugFlags, logger: Logger): void {
  if (flags.debugNetwork) {
    page.on('requestfailed', (request) => {
      const url = request.url();
      const errorText = request.failure()?.errorText ?? '';
      if (isBenignRequestFailure(url, errorText)) {
        return;
      }
      logger.warn('[net] request failed', { url, error: errorText });
    });
  }

  if (flags.debugConsole) {
    page.on('console', (message) => {
      const type = message.type();
      const entry = `[console:${type}] ${message.text()}`;
      if (type === 'error') {
        logger.warn(entry);
      } else {
        logger.debug(entry);
      }
    });
  }
}

export function bindContextDebugObservers(context: BrowserContext, flags: DebugFlags, logger: Logger): void {
  if (!flags.debugNetwork && !flags.debugConsole) {
    return;
  }

  for (const page of context.pages()) {
    attachPageDebugObservers(page, flags, logger);
  }

  context.on('page', (page) => attachPageDebugObservers(page, flags, logger));
}
