import assert from 'node:assert/strict';
import { test } from 'node:test';

import { normalize, normalizeRow, parseNumeric } from '../src/modules/normalize/index.js';
import type { RawRow } from '../src/modules/portfolio/types.js';

const row = (entries: Array<[string, string]>): RawRow => new Map(entries);

test('parseNumeric strips currency, thousands and percent punctuation', () => {
  assert.equal(parseNumeric('$1,234.56'), 1234.56);
  assert.equal(parseNumeric('14.5%'), 14.5);
  assert.equal(parseNumeric('€ 99'), 99);
  assert.equal(parseNumeric('  42  '), 42);
  assert.equal(parseNumeric('1e3'), 1000);
});

test('parseNumeric treats parentheses and unicode minus as negative', () => {
  assert.equal(parseNumeric('(5.4%)'), -5.4);
  assert.equal(parseNumeric('−3'), -3);
  assert.equal(parseNumeric('($12.00)'), -12);
});

test('parseNumeric resolves unparsable text to null instead of zero', () => {
  assert.equal(parseNumeric('N/A'), null);
  assert.equal(parseNumeric(''), null);
  assert.equal(parseNumeric('   '), null);
  assert.equal(parseNumeric('12abc'), null);
  assert.equal(parseNumeric('2024-01-05'), null);
  assert.equal(parseNumeric(null), null);
  assert.equal(parseNumeric(undefined), null);
});

test('normalizeRow maps heterogeneous labels onto the position schema', () => {
  const position = normalizeRow(
    row([
      ['Symbol', ' aapl '],
      ['Company', 'Apple Inc.'],
      ['Shares', '10'],
      ['Avg Cost', '$150.25'],
      ['Current Price', '$172.10'],
      ['Market Value', '$1,721.00'],
      ['Unrealized P&L', '$218.50'],
      ['Return %', '14.5%'],
      ['Weight', '12%'],
      ['Stop Loss', '$140'],
      ['Buy Up To', '$160'],
      ['Entry Date', '2024-01-05'],
    ]),
  );

  assert.deepEqual(position, {
    ticker: 'AAPL',
    name: 'Apple Inc.',
    shares: 10,
    avgCost: 150.25,
    currentPrice: 172.1,
    marketValue: 1721,
    unrealizedPnl: 218.5,
    pctReturn: 14.5,
    weight: 12,
    stopLoss: 140,
    buyUpTo: 160,
    entryDate: '2024-01-05',
  });
});

test('field resolution tries candidates in order before columns', () => {
  const position = normalizeRow(
    row([
      ['Last', '10'],
      ['Price', '12'],
      ['Ticker', 'xom'],
    ]),
  );

  assert.equal(position?.currentPrice, 12);
});

test('an entry column satisfies avgCost when no avg or cost column exists', () => {
  const position = normalizeRow(
    row([
      ['Entry', '45.10'],
      ['Entry Date', '2024-03-01'],
      ['Symbol', 'xom'],
    ]),
  );

  assert.equal(position?.avgCost, 45.1);
  assert.equal(position?.entryDate, '2024-03-01');
});

test('name falls back to the ticker and missing values stay null', () => {
  const position = normalizeRow(row([['Ticker', 'nvda']]));

  assert.deepEqual(position, {
    ticker: 'NVDA',
    name: 'NVDA',
    shares: null,
    avgCost: null,
    currentPrice: null,
    marketValue: null,
    unrealizedPnl: null,
    pctReturn: null,
    weight: null,
    stopLoss: null,
    buyUpTo: null,
    entryDate: null,
  });
});

test('normalize drops rows without a resolvable ticker', () => {
  const positions = normalize([
    row([
      ['Ticker', 'MSFT'],
      ['Price', '405'],
    ]),
    row([
      ['Ticker', '   '],
      ['Price', '1'],
    ]),
    row([
      ['Description', 'Total'],
      ['Price', '406'],
    ]),
  ]);

  assert.deepEqual(
    positions.map((position) => position.ticker),
    ['MSFT'],
  );
});

test('normalize is idempotent and always yields uppercase tickers', () => {
  const rows = [
    row([
      ['Stock', 'tsla'],
      ['Qty', '3'],
    ]),
    row([
      ['Stock', 'Amd'],
      ['Qty', '(2)'],
    ]),
  ];

  const first = normalize(rows);
  const second = normalize(rows);

  assert.deepEqual(first, second);
  assert.deepEqual(
    first.map((position) => [position.ticker, position.shares]),
    [
      ['TSLA', 3],
      ['AMD', -2],
    ],
  );
  for (const position of first) {
    assert.equal(position.ticker, position.ticker.toUpperCase());
    assert.ok(position.ticker.length > 0);
  }
});
