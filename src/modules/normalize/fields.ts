import type { Position } from '../portfolio/types.js';

export type CanonicalField = keyof Position;

/**
 * Candidate substrings per canonical field, in priority order.
 *
 * Tie-break rule "candidate order, then column order": for a field, each
 * candidate is tried in the order declared here, and for each candidate the
 * raw column labels are scanned left to right. The first label whose trimmed,
 * lowercased text contains the candidate supplies the value. Containment is
 * ambiguous on purpose (`Entry Date` can satisfy `avgCost` via `entry` when
 * no `avg` or `cost` column exists); the rule only makes the outcome
 * deterministic.
 */
export const FIELD_CANDIDATES: ReadonlyArray<readonly [CanonicalField, readonly string[]]> = [
  ['ticker', ['ticker', 'symbol', 'stock']],
  ['name', ['company', 'name', 'description']],
  ['shares', ['shares', 'qty', 'quantity']],
  ['avgCost', ['avg', 'cost', 'average', 'entry', 'basis']],
  ['currentPrice', ['current', 'price', 'last']],
  ['marketValue', ['market', 'value', 'mkt']],
  ['unrealizedPnl', ['unrealized', 'gain', 'p&l', 'pnl']],
  ['pctReturn', ['return', 'change', 'pct', '%', 'gain%']],
  ['weight', ['weight', 'alloc']],
  ['stopLoss', ['stop']],
  ['buyUpTo', ['buy up', 'target']],
  ['entryDate', ['date', 'entry date']],
];

export type LabelIndex = ReadonlyArray<readonly [label: string, value: string]>;

export function indexLabels(row: ReadonlyMap<string, string>): LabelIndex {
  return Array.from(row, ([label, value]) => [label.trim().toLowerCase(), value] as const);
}

export function resolveField(labels: LabelIndex, candidates: readonly string[]): string | null {
  for (const candidate of candidates) {
    for (const [label, value] of labels) {
      if (label.includes(candidate)) {
        return value;
      }
    }
  }
  return null;
}
