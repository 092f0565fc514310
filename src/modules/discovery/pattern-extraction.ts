import type { CheerioAPI } from 'cheerio';
import { isTag, type Element, type Text } from 'domhandler';

import { parseNumeric } from '../normalize/numbers.js';
import type { RawRow } from '../portfolio/types.js';
import { isLeafElement, isWithin, textNodesOf, textOf } from './dom.js';
import type { CandidateLayout } from './repeated-elements.js';

export const TICKER_PATTERN = /^[A-Z]{1,5}$/;

// Uppercase words that routinely appear as standalone labels next to positions.
export const TICKER_STOP_WORDS: ReadonlySet<string> = new Set([
  'USD',
  'ETF',
  'BUY',
  'SELL',
  'HOLD',
  'NEW',
  'TOTAL',
  'CASH',
  'YTD',
  'MTD',
  'AM',
  'PM',
  'ET',
  'EST',
  'UTC',
  'NA',
  'THE',
  'AND',
  'FOR',
]);

export const ROW_CONTEXT_SELECTOR = [
  'tr',
  'li',
  '[role="row"]',
  '[role="listitem"]',
  '[class~="row"]',
  '[class*="-row"]',
  '[class*="row-"]',
  '[class*="item"]',
  '[class*="position"]',
  '[class*="holding"]',
].join(', ');

export const PATTERN_ROW_LIMIT = 50;

export const PLAUSIBLE_PRICE_RANGE = { min: 0.01, max: 100_000 } as const;

export const PATTERN_LABELS = {
  ticker: 'Ticker',
  avgCost: 'Avg Cost',
  currentPrice: 'Current Price',
} as const;

interface TickerHit {
  readonly ticker: string;
  readonly context: Element;
}

const TOKEN_EDGE_PUNCTUATION = /^[^A-Za-z0-9]+|[^A-Za-z0-9]+$/g;

const isTickerToken = (token: string): boolean => TICKER_PATTERN.test(token) && !TICKER_STOP_WORDS.has(token);

function tickerInText(node: Text): string | null {
  for (const raw of node.data.split(/\s+/)) {
    const token = raw.replace(TOKEN_EDGE_PUNCTUATION, '');
    if (isTickerToken(token)) {
      return token;
    }
  }
  return null;
}

/**
 * Nearest row-like ancestor-or-self of a text node's element. Without one, a
 * text-only element such as `<span>SPY</span>` is a cell and its parent is the
 * row. Nothing above `bound` is ever returned.
 */
function rowContext($: CheerioAPI, node: Text, bound: Element | null): Element | null {
  const owner = node.parent;
  if (!owner || !isTag(owner)) {
    return null;
  }

  const found = $(owner).closest(ROW_CONTEXT_SELECTOR).get(0);
  const cellParent = owner.parent;
  const fallback = isLeafElement(owner) && cellParent && isTag(cellParent) ? cellParent : owner;
  const context = found && isTag(found) ? found : fallback;
  return bound && !isWithin(context, bound) ? bound : context;
}

function collectHits($: CheerioAPI, root: Element, bound: Element | null): TickerHit[] {
  const hits: TickerHit[] = [];
  for (const node of textNodesOf(root)) {
    const ticker = tickerInText(node);
    const context = ticker ? rowContext($, node, bound) : null;
    if (ticker && context) {
      hits.push({ ticker, context });
    }
  }
  return hits;
}

function scopedHits($: CheerioAPI, layout: CandidateLayout | null): TickerHit[] {
  if (layout) {
    return layout.elements.flatMap((element) => collectHits($, element, element));
  }

  const body = $('body').get(0);
  return body ? collectHits($, body, null) : [];
}

/** Values in the plausible price range, in reading order. */
export function plausiblePrices(text: string): number[] {
  return text
    .split(/\s+/)
    .map((token) => parseNumeric(token))
    .filter(
      (value): value is number =>
        value !== null && value >= PLAUSIBLE_PRICE_RANGE.min && value <= PLAUSIBLE_PRICE_RANGE.max,
    );
}

function buildRows(hits: readonly TickerHit[]): RawRow[] {
  const seen = new Set<Element>();
  const rows: RawRow[] = [];

  for (const { ticker, context } of hits) {
    if (rows.length >= PATTERN_ROW_LIMIT) {
      break;
    }
    if (seen.has(context)) {
      continue;
    }
    seen.add(context);

    const row = new Map<string, string>([[PATTERN_LABELS.ticker, ticker]]);
    const [avgCost, currentPrice] = plausiblePrices(textOf(context));
    if (avgCost !== undefined) {
      row.set(PATTERN_LABELS.avgCost, String(avgCost));
    }
    if (currentPrice !== undefined) {
      row.set(PATTERN_LABELS.currentPrice, String(currentPrice));
    }
    rows.push(row);
  }

  return rows;
}

/**
 * Lossy last resort: anchors one row on the first ticker-like token of every
 * row-like element and guesses the first two plausible prices in that row as
 * average cost and current price. With a candidate layout only its elements
 * are scanned; the whole document is scanned when that yields nothing.
 */
export function extractTickerPatterns($: CheerioAPI, layout: CandidateLayout | null = null): RawRow[] {
  if (layout) {
    const scoped = buildRows(scopedHits($, layout));
    if (scoped.length > 0) {
      return scoped;
    }
  }
  return buildRows(scopedHits($, null));
}
