import { load } from 'cheerio';

import type { Logger } from '../../bootstrap/logger.js';
import type { PortalPage } from '../../page.js';
import type { RawRow } from '../portfolio/types.js';
import { extractTickerPatterns } from './pattern-extraction.js';
import { findCandidateLayout } from './repeated-elements.js';
import { extractStructuredTable } from './structured-table.js';

export { extractTickerPatterns, plausiblePrices } from './pattern-extraction.js';
export { findCandidateLayout, type CandidateLayout } from './repeated-elements.js';
export { extractStructuredTable, selectBestTable } from './structured-table.js';

export type DiscoveryStrategy = 'structured-table' | 'pattern-extraction' | 'none';

export interface DiscoveryResult {
  readonly strategy: DiscoveryStrategy;
  readonly rows: RawRow[];
  /** Selector of the repeated-element layout, when one was seen. */
  readonly candidateLayout: string | null;
}

export interface DiscoverOptions {
  readonly logger?: Logger;
}

/**
 * Runs the discovery cascade over a rendered document: the richest table
 * first, then ticker pattern extraction scoped by any repeated-element
 * layout. The first strategy that yields rows wins.
 */
export function discover(html: string, options: DiscoverOptions = {}): DiscoveryResult {
  const { logger } = options;
  const $ = load(html);

  const tableRows = extractStructuredTable($);
  if (tableRows.length > 0) {
    logger?.debug('[discovery] structured table', { rows: tableRows.length });
    return { strategy: 'structured-table', rows: tableRows, candidateLayout: null };
  }

  const layout = findCandidateLayout($);
  if (layout) {
    logger?.info('[discovery] repeated-element layout', {
      selector: layout.selector,
      count: layout.elements.length,
    });
  }

  const patternRows = extractTickerPatterns($, layout);
  const candidateLayout = layout?.selector ?? null;
  if (patternRows.length > 0) {
    logger?.warn('[discovery] falling back to ticker pattern extraction', { rows: patternRows.length });
    return { strategy: 'pattern-extraction', rows: patternRows, candidateLayout };
  }

  return { strategy: 'none', rows: [], candidateLayout };
}

/** Discovered rows of the page as currently rendered. */
export async function extract(page: Pick<PortalPage, 'content' | 'url'>, logger?: Logger): Promise<RawRow[]> {
  const html = await page.content();
  const result = discover(html, { logger });
  logger?.info('[discovery] rows extracted', { url: page.url(), strategy: result.strategy, rows: result.rows.length });
  return result.rows;
}
