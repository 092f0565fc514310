import type { NumericField, Position, RawRow } from '../portfolio/types.js';
import { FIELD_CANDIDATES, indexLabels, resolveField, type CanonicalField, type LabelIndex } from './fields.js';
import { parseNumeric } from './numbers.js';

export { FIELD_CANDIDATES } from './fields.js';
export { parseNumeric } from './numbers.js';

const CANDIDATES_BY_FIELD: ReadonlyMap<CanonicalField, readonly string[]> = new Map(FIELD_CANDIDATES);

const resolve = (labels: LabelIndex, field: CanonicalField): string | null =>
  resolveField(labels, CANDIDATES_BY_FIELD.get(field) ?? []);

const resolveText = (labels: LabelIndex, field: CanonicalField): string | null => {
  const value = resolve(labels, field)?.trim();
  return value ? value : null;
};

const resolveNumber = (labels: LabelIndex, field: NumericField): number | null =>
  parseNumeric(resolve(labels, field));

export function normalizeRow(row: RawRow): Position | null {
  const labels = indexLabels(row);

  const ticker = resolveText(labels, 'ticker')?.toUpperCase();
  if (!ticker) {
    return null;
  }

  return {
    ticker,
    name: resolveText(labels, 'name') ?? ticker,
    shares: resolveNumber(labels, 'shares'),
    avgCost: resolveNumber(labels, 'avgCost'),
    currentPrice: resolveNumber(labels, 'currentPrice'),
    marketValue: resolveNumber(labels, 'marketValue'),
    unrealizedPnl: resolveNumber(labels, 'unrealizedPnl'),
    pctReturn: resolveNumber(labels, 'pctReturn'),
    weight: resolveNumber(labels, 'weight'),
    stopLoss: resolveNumber(labels, 'stopLoss'),
    buyUpTo: resolveNumber(labels, 'buyUpTo'),
    entryDate: resolveText(labels, 'entryDate'),
  };
}

/** Rows without a resolvable ticker (headers, totals, decoration) are dropped. */
export function normalize(rows: readonly RawRow[]): Position[] {
  const positions: Position[] = [];
  for (const row of rows) {
    const position = normalizeRow(row);
    if (position) {
      positions.push(position);
    }
  }
  return positions;
}
