import type { Credential } from '../../bootstrap/env.js';
import type { Logger } from '../../bootstrap/logger.js';
import { registerCloser } from '../../bootstrap/signals.js';
import type { BrowserFactory } from '../../browser.js';
import { DEFAULT_TIMING, type PageTarget, type SubPortfolio, type Timing } from '../../config.js';
import type { DiagnosticSink } from '../../debugging.js';
import { describeError, SessionLost, TotalDataLoss } from '../../errors.js';
import type { SnapshotStore } from '../../io/snapshot-store.js';
import { isLoginSurface, login, type Session } from '../../login.js';
import type { PortalPage } from '../../page.js';
import { safeGoto } from '../../utils/navigation.js';
import { extract } from '../discovery/index.js';
import { normalize } from '../normalize/index.js';
import { assembleSnapshot, isEmptySnapshot } from './snapshot.js';
import type { PortfolioPositions, PortfolioSnapshot, Position } from './types.js';

export type ScrapePhase = 'init' | 'logging-in' | 'scraping' | 'assembling' | 'done' | 'failed';

export type RunStatus = 'ok' | 'login-failed' | 'total-data-loss' | 'stale';

export const EXIT_CODES: Readonly<Record<RunStatus, number>> = {
  ok: 0,
  'login-failed': 1,
  'total-data-loss': 2,
  stale: 3,
};

export type PageOutcome = 'ok' | 'empty' | 'session-lost' | 'error';

export interface PageReport {
  readonly portfolio: SubPortfolio;
  readonly label: string;
  /** The URL that produced the outcome: the one that yielded positions, or the last one tried. */
  readonly url: string;
  readonly outcome: PageOutcome;
  readonly rows: number;
  readonly positions: number;
  readonly triedUrls: readonly string[];
}

export interface ScrapeRunResult {
  readonly status: RunStatus;
  readonly exitCode: number;
  /** The prior snapshot when the run stopped before assembling. */
  readonly snapshot: PortfolioSnapshot | null;
  readonly written: boolean;
  readonly pages: readonly PageReport[];
  readonly session?: Session;
  readonly error?: Error;
}

export interface PortfolioScraperOptions {
  readonly store: SnapshotStore;
  readonly launchBrowser: BrowserFactory;
  readonly diagnostics: DiagnosticSink;
  readonly logger: Logger;
  readonly loginUrl: string;
  /** Domain recorded as the snapshot source. */
  readonly source: string;
  readonly timing?: Timing;
  readonly now?: () => Date;
}

interface Visit {
  readonly outcome: PageOutcome;
  readonly rows: number;
  readonly positions: Position[];
}

export class PortfolioScraper {
  private readonly timing: Timing;
  private readonly now: () => Date;
  private currentPhase: ScrapePhase = 'init';

  constructor(private readonly options: PortfolioScraperOptions) {
    this.timing = options.timing ?? DEFAULT_TIMING;
    this.now = options.now ?? (() => new Date());
  }

  get phase(): ScrapePhase {
    return this.currentPhase;
  }

  async run(credential: Credential, pages: readonly PageTarget[]): Promise<ScrapeRunResult> {
    const { store, logger } = this.options;
    this.enter('init');

    const prior = await store.read();
    const browser = await this.options.launchBrowser();
    const unregister = registerCloser(browser.close);

    try {
      this.enter('logging-in');
      let session: Session;
      try {
        session = await login(browser.page, this.options.loginUrl, credential, {
          logger,
          diagnostics: this.options.diagnostics,
          timing: this.timing,
        });
      } catch (error) {
        this.enter('failed');
        logger.error('[scraper] login failed', { url: this.options.loginUrl, stage: 'login', error: describeError(error) });
        return {
          status: 'login-failed',
          exitCode: EXIT_CODES['login-failed'],
          snapshot: prior,
          written: false,
          pages: [],
          error: error instanceof Error ? error : new Error(describeError(error)),
        };
      }

      const reports: PageReport[] = [];
      const extracted: Record<SubPortfolio, Position[]> = { sectorRotation: [], longTerm: [] };
      for (const target of pages) {
        this.enter('scraping', { label: target.label });
        const { report, positions } = await this.scrapeTarget(browser.page, target);
        reports.push(report);
        extracted[target.portfolio].push(...positions);
      }

      this.enter('assembling');
      const result = await this.assemble(extracted, prior, reports);
      this.enter('done', { status: result.status });
      return { ...result, session };
    } finally {
      unregister();
      await browser.close();
    }
  }

  private enter(phase: ScrapePhase, details: Record<string, unknown> = {}): void {
    this.options.logger.info(`[scraper] ${this.currentPhase} -> ${phase}`, details);
    this.currentPhase = phase;
  }

  private async scrapeTarget(
    page: PortalPage,
    target: PageTarget,
  ): Promise<{ report: PageReport; positions: Position[] }> {
    const triedUrls: string[] = [];
    let visit: Visit = { outcome: 'empty', rows: 0, positions: [] };
    let url = target.url;

    for (const candidate of [target.url, ...target.alternateUrls]) {
      if (triedUrls.length > 0) {
        this.options.logger.info('[scraper] trying alternate URL', { label: target.label, url: candidate });
      }
      url = candidate;
      triedUrls.push(candidate);
      visit = await this.visit(page, target, candidate);
      if (visit.positions.length > 0) {
        break;
      }
    }

    return {
      report: {
        portfolio: target.portfolio,
        label: target.label,
        url,
        outcome: visit.outcome,
        rows: visit.rows,
        positions: visit.positions.length,
        triedUrls,
      },
      positions: visit.positions,
    };
  }

  private async visit(page: PortalPage, target: PageTarget, url: string): Promise<Visit> {
    const { logger, diagnostics } = this.options;

    try {
      await safeGoto(page, url, {
        waitUntil: 'networkidle',
        timeoutMs: this.timing.pageLoadTimeoutMs,
        attempts: this.timing.pageLoadAttempts,
        waitBetweenAttemptsMs: this.timing.pageRetryDelayMs,
      });
      await page.waitForTimeout(this.timing.pageSettleMs);

      if (isLoginSurface(page.url())) {
        const lost = new SessionLost(url, page.url());
        logger.error(`[scraper] ${lost.message}`, lost.context);
        await diagnostics.capture(`${target.label}_redirect`, page);
        return { outcome: 'session-lost', rows: 0, positions: [] };
      }

      const rows = await extract(page, logger);
      const positions = normalize(rows);
      if (positions.length === 0) {
        logger.warn('[scraper] no positions found', { url, label: target.label, rows: rows.length });
      }
      return { outcome: positions.length > 0 ? 'ok' : 'empty', rows: rows.length, positions };
    } catch (error) {
      logger.error('[scraper] page failed', { url, label: target.label, stage: 'scraping', error: describeError(error) });
      return { outcome: 'error', rows: 0, positions: [] };
    }
  }

  private async assemble(
    extracted: PortfolioPositions,
    prior: PortfolioSnapshot | null,
    pages: readonly PageReport[],
  ): Promise<Omit<ScrapeRunResult, 'session'>> {
    const { store, logger } = this.options;
    const { snapshot, fresh, write } = assembleSnapshot(extracted, prior, this.now(), this.options.source);

    if (write) {
      await store.write(snapshot);
    } else {
      logger.warn('[scraper] no page yielded positions, keeping the prior snapshot', { path: store.path });
    }

    if (isEmptySnapshot(snapshot)) {
      const error = new TotalDataLoss(this.options.source);
      logger.error(`[scraper] ${error.message}`, error.context);
      return { status: 'total-data-loss', exitCode: EXIT_CODES['total-data-loss'], snapshot, written: write, pages, error };
    }

    const status: RunStatus = fresh ? 'ok' : 'stale';
    return { status, exitCode: EXIT_CODES[status], snapshot, written: write, pages };
  }
}
