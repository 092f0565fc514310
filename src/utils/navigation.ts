import type { LoadState, PortalPage } from '../page.js';

export interface SafeGotoOptions {
  attempts?: number;
  waitUntil?: LoadState;
  timeoutMs?: number;
  waitBetweenAttemptsMs?: number;
}

export const DEFAULT_SAFE_GOTO_OPTIONS: Required<SafeGotoOptions> = {
  attempts: 1,
  waitUntil: 'domcontentloaded',
  timeoutMs: 30_000,
  waitBetweenAttemptsMs: 1_000,
};

/** Navigates with bounded retries; the last navigation error is rethrown. */
export async function safeGoto(page: PortalPage, url: string, options?: SafeGotoOptions): Promise<void> {
  const resolvedOptions = {
    ...DEFAULT_SAFE_GOTO_OPTIONS,
    ...options,
    attempts: Math.max(options?.attempts ?? DEFAULT_SAFE_GOTO_OPTIONS.attempts, 1),
  } as const;

  let lastError: unknown;

  for (let attempt = 0; attempt < resolvedOptions.attempts; attempt++) {
    if (attempt > 0 && resolvedOptions.waitBetweenAttemptsMs > 0) {
      await page.waitForTimeout(resolvedOptions.waitBetweenAttemptsMs);
    }

    try {
      await page.goto(url, {
        waitUntil: resolvedOptions.waitUntil,
        timeout: resolvedOptions.timeoutMs,
      });
      return;
    } catch (error) {
      lastError = error;
    }
  }

  throw lastError instanceof Error ? lastError : new Error(`Navigation to ${url} failed`);
}
