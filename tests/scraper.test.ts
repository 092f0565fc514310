import assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, test } from 'node:test';

import type { BrowserSession } from '../src/browser.js';
import { DEFAULT_TIMING, defaultPageTargets } from '../src/config.js';
import { LoginFieldNotFound, TotalDataLoss } from '../src/errors.js';
import { createFileSnapshotStore } from '../src/io/snapshot-store.js';
import { PortfolioScraper } from '../src/modules/portfolio/scraper.js';
import { FakePortalPage } from './helpers/fake-page.js';
import { createMemoryLogger, createRecordingDiagnostics, type RecordingDiagnostics } from './helpers/recorders.js';

const BASE_URL = 'https://portal.test';
const LOGIN_URL = `${BASE_URL}/login`;
const SECTOR_URL = `${BASE_URL}/sector-heaters`;
const LONG_TERM_URL = `${BASE_URL}/longterm`;
const LONG_TERM_ALT_URL = `${BASE_URL}/long-term`;
const NOW = new Date(Date.UTC(2024, 0, 5, 14, 30));
const credential = { identity: 'trader@example.test', secret: 'test-secret' };

const table = (rows: Array<[string, string]>): string =>
  `<table><thead><tr><th>Ticker</th><th>Current Price</th></tr></thead><tbody>${rows
    .map(([ticker, price]) => `<tr><td>${ticker}</td><td>${price}</td></tr>`)
    .join('')}</tbody></table>`;

const PRIOR_DOCUMENT = `${JSON.stringify(
  {
    last_updated: '2023-12-29 09:05 UTC',
    source: 'portal.test',
    sector_rotation: [{ ticker: 'XLE', name: 'XLE', curr_price: 90 }],
    long_term: [{ ticker: 'BRK', name: 'BRK', curr_price: 410 }],
  },
  null,
  2,
)}\n`;

let directory: string;
let outputPath: string;

beforeEach(async () => {
  directory = await fs.mkdtemp(path.join(os.tmpdir(), 'scraper-'));
  outputPath = path.join(directory, 'portfolios.json');
});

afterEach(async () => {
  await fs.rm(directory, { recursive: true, force: true });
});

type Harness = {
  readonly page: FakePortalPage;
  readonly scraper: PortfolioScraper;
  readonly diagnostics: RecordingDiagnostics;
  readonly closes: () => number;
};

function createHarness(): Harness {
  const page = new FakePortalPage();
  page.routes.set(LOGIN_URL, { redirectTo: `${BASE_URL}/dashboard` });
  const logger = createMemoryLogger();
  const diagnostics = createRecordingDiagnostics();
  let closeCount = 0;

  const session: BrowserSession = {
    page,
    close: async () => {
      closeCount += 1;
    },
  };

  const scraper = new PortfolioScraper({
    store: createFileSnapshotStore(outputPath, logger),
    launchBrowser: async () => session,
    diagnostics,
    logger,
    loginUrl: LOGIN_URL,
    source: 'portal.test',
    timing: DEFAULT_TIMING,
    now: () => NOW,
  });

  return { page, scraper, diagnostics, closes: () => closeCount };
}

const readOutput = async (): Promise<unknown> => JSON.parse(await fs.readFile(outputPath, 'utf8'));

describe('PortfolioScraper', () => {
  test('scrapes every page, falls back to the alternate URL and writes the snapshot', async () => {
    const { page, scraper, closes } = createHarness();
    page.routes.set(SECTOR_URL, { html: table([['XLK', '$210.00'], ['SMH', '$225.40']]) });
    page.routes.set(LONG_TERM_URL, { html: '<p>Moved</p>' });
    page.routes.set(LONG_TERM_ALT_URL, { html: table([['NVDA', '880.50']]) });

    const result = await scraper.run(credential, defaultPageTargets(BASE_URL));

    assert.equal(result.status, 'ok');
    assert.equal(result.exitCode, 0);
    assert.equal(result.written, true);
    assert.equal(closes(), 1);
    assert.deepEqual(
      result.pages.map((report) => [report.label, report.outcome, report.positions, report.url, report.triedUrls]),
      [
        ['sector_rotation', 'ok', 2, SECTOR_URL, [SECTOR_URL]],
        ['long_term', 'ok', 1, LONG_TERM_ALT_URL, [LONG_TERM_URL, LONG_TERM_ALT_URL]],
      ],
    );

    const written = await readOutput();
    assert.deepEqual(written, {
      last_updated: '2024-01-05 14:30 UTC',
      source: 'portal.test',
      sector_rotation: [
        {
          ticker: 'XLK',
          name: 'XLK',
          shares: null,
          avg_cost: null,
          curr_price: 210,
          market_value: null,
          unrealized_pnl: null,
          pct_return: null,
          weight: null,
          stop_loss: null,
          buy_up_to: null,
          entry_date: null,
        },
        {
          ticker: 'SMH',
          name: 'SMH',
          shares: null,
          avg_cost: null,
          curr_price: 225.4,
          market_value: null,
          unrealized_pnl: null,
          pct_return: null,
          weight: null,
          stop_loss: null,
          buy_up_to: null,
          entry_date: null,
        },
      ],
      long_term: [
        {
          ticker: 'NVDA',
          name: 'NVDA',
          shares: null,
          avg_cost: null,
          curr_price: 880.5,
          market_value: null,
          unrealized_pnl: null,
          pct_return: null,
          weight: null,
          stop_loss: null,
          buy_up_to: null,
          entry_date: null,
        },
      ],
    });
  });

  test('navigates portfolio pages with networkidle and the page load timeout', async () => {
    const { page, scraper } = createHarness();
    page.routes.set(SECTOR_URL, { html: table([['XLK', '1']]) });
    page.routes.set(LONG_TERM_URL, { html: table([['NVDA', '2']]) });

    await scraper.run(credential, defaultPageTargets(BASE_URL));

    assert.deepEqual(
      page.visited.map((visit) => [visit.url, visit.options.waitUntil, visit.options.timeout]),
      [
        [LOGIN_URL, 'domcontentloaded', 30_000],
        [SECTOR_URL, 'networkidle', 30_000],
        [LONG_TERM_URL, 'networkidle', 30_000],
      ],
    );
  });

  test('a login failure leaves the snapshot file byte-identical', async () => {
    await fs.writeFile(outputPath, PRIOR_DOCUMENT, 'utf8');
    const { page, scraper, diagnostics, closes } = createHarness();
    page.routes.set(LOGIN_URL, {});

    const result = await scraper.run(credential, defaultPageTargets(BASE_URL));

    assert.equal(result.status, 'login-failed');
    assert.equal(result.exitCode, 1);
    assert.equal(result.written, false);
    assert.ok(result.error instanceof LoginFieldNotFound);
    assert.equal(scraper.phase, 'failed');
    assert.equal(closes(), 1);
    assert.deepEqual(diagnostics.captures, [{ label: 'no_identity_field', url: LOGIN_URL }]);
    assert.equal(await fs.readFile(outputPath, 'utf8'), PRIOR_DOCUMENT);
  });

  test('redirects to the login surface on every page keep the prior snapshot and exit non-zero', async () => {
    await fs.writeFile(outputPath, PRIOR_DOCUMENT, 'utf8');
    const { page, scraper, diagnostics } = createHarness();
    for (const url of [SECTOR_URL, LONG_TERM_URL, LONG_TERM_ALT_URL]) {
      page.routes.set(url, { redirectTo: `${LOGIN_URL}?next=portfolio` });
    }

    const result = await scraper.run(credential, defaultPageTargets(BASE_URL));

    assert.equal(result.status, 'stale');
    assert.equal(result.exitCode, 3);
    assert.equal(result.written, false);
    assert.deepEqual(
      result.pages.map((report) => report.outcome),
      ['session-lost', 'session-lost'],
    );
    assert.deepEqual(
      diagnostics.captures.map((capture) => capture.label),
      ['sector_rotation_redirect', 'long_term_redirect', 'long_term_redirect'],
    );
    assert.equal(result.snapshot?.updatedAt?.toISOString(), '2023-12-29T09:05:00.000Z');
    assert.equal(await fs.readFile(outputPath, 'utf8'), PRIOR_DOCUMENT);
  });

  test('redirects without any prior snapshot report total data loss', async () => {
    const { page, scraper } = createHarness();
    for (const url of [SECTOR_URL, LONG_TERM_URL, LONG_TERM_ALT_URL]) {
      page.routes.set(url, { redirectTo: LOGIN_URL });
    }

    const result = await scraper.run(credential, defaultPageTargets(BASE_URL));

    assert.equal(result.status, 'total-data-loss');
    assert.equal(result.exitCode, 2);
    assert.ok(result.error instanceof TotalDataLoss);
  });

  test('an empty sub-portfolio falls back to the prior one while fresh data wins elsewhere', async () => {
    await fs.writeFile(outputPath, PRIOR_DOCUMENT, 'utf8');
    const { page, scraper } = createHarness();
    page.routes.set(SECTOR_URL, { html: table([['XLU', '70']]) });

    const result = await scraper.run(credential, defaultPageTargets(BASE_URL));

    assert.equal(result.status, 'ok');
    assert.deepEqual(
      result.snapshot?.sectorRotation.map((position) => position.ticker),
      ['XLU'],
    );
    assert.deepEqual(
      result.snapshot?.longTerm.map((position) => position.ticker),
      ['BRK'],
    );
    const written = await readOutput();
    assert.deepEqual(written, {
      last_updated: '2024-01-05 14:30 UTC',
      source: 'portal.test',
      sector_rotation: [
        {
          ticker: 'XLU',
          name: 'XLU',
          shares: null,
          avg_cost: null,
          curr_price: 70,
          market_value: null,
          unrealized_pnl: null,
          pct_return: null,
          weight: null,
          stop_loss: null,
          buy_up_to: null,
          entry_date: null,
        },
      ],
      long_term: [
        {
          ticker: 'BRK',
          name: 'BRK',
          shares: null,
          avg_cost: null,
          curr_price: 410,
          market_value: null,
          unrealized_pnl: null,
          pct_return: null,
          weight: null,
          stop_loss: null,
          buy_up_to: null,
          entry_date: null,
        },
      ],
    });
  });

  test('a navigation error is a page-level failure', async () => {
    const { page, scraper } = createHarness();
    page.routes.set(SECTOR_URL, { error: new Error('net::ERR_CONNECTION_RESET') });
    page.routes.set(LONG_TERM_URL, { html: table([['NVDA', '880']]) });

    const result = await scraper.run(credential, defaultPageTargets(BASE_URL));

    assert.equal(result.status, 'ok');
    assert.deepEqual(
      result.pages.map((report) => report.outcome),
      ['error', 'ok'],
    );
    assert.equal(page.visited.filter((visit) => visit.url === SECTOR_URL).length, DEFAULT_TIMING.pageLoadAttempts);
  });

  test('a page that fails once is retried after the retry delay', async () => {
    const { page, scraper } = createHarness();
    page.routes.set(LONG_TERM_URL, { html: table([['NVDA', '880']]), error: new Error('net::ERR_TIMED_OUT'), failures: 1 });

    const result = await scraper.run(credential, defaultPageTargets(BASE_URL));

    assert.deepEqual(
      result.pages.map((report) => [report.label, report.outcome, report.url]),
      [
        ['sector_rotation', 'empty', SECTOR_URL],
        ['long_term', 'ok', LONG_TERM_URL],
      ],
    );
    assert.equal(page.visited.filter((visit) => visit.url === LONG_TERM_URL).length, 2);
    assert.equal(page.waitedMs, DEFAULT_TIMING.loginSettleMs + DEFAULT_TIMING.pageSettleMs * 2 + DEFAULT_TIMING.pageRetryDelayMs);
  });

  test('several targets feeding one sub-portfolio concatenate in target order', async () => {
    const { page, scraper } = createHarness();
    page.routes.set(`${BASE_URL}/a`, { html: table([['AAA', '1']]) });
    page.routes.set(`${BASE_URL}/b`, { html: table([['BBB', '2']]) });

    const result = await scraper.run(credential, [
      { portfolio: 'longTerm', label: 'first', url: `${BASE_URL}/a`, alternateUrls: [] },
      { portfolio: 'longTerm', label: 'second', url: `${BASE_URL}/b`, alternateUrls: [] },
    ]);

    assert.deepEqual(
      result.snapshot?.longTerm.map((position) => position.ticker),
      ['AAA', 'BBB'],
    );
    assert.deepEqual(result.snapshot?.sectorRotation, []);
  });

  test('the browser is closed even when persisting the snapshot fails', async () => {
    const page = new FakePortalPage();
    page.routes.set(LOGIN_URL, { redirectTo: `${BASE_URL}/dashboard` });
    page.routes.set(SECTOR_URL, { html: table([['XLK', '1']]) });
    let closed = 0;

    const scraper = new PortfolioScraper({
      store: {
        path: outputPath,
        read: async () => null,
        write: async () => {
          throw new Error('disk full');
        },
      },
      launchBrowser: async () => ({
        page,
        close: async () => {
          closed += 1;
        },
      }),
      diagnostics: createRecordingDiagnostics(),
      logger: createMemoryLogger(),
      loginUrl: LOGIN_URL,
      source: 'portal.test',
      now: () => NOW,
    });

    await assert.rejects(scraper.run(credential, defaultPageTargets(BASE_URL)), /disk full/);
    assert.equal(closed, 1);
  });
});
