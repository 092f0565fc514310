import type { SubPortfolio } from '../../config.js';

/** Column label (as rendered) to cell text, in column order. */
export type RawRow = ReadonlyMap<string, string>;

export interface Position {
  readonly ticker: string;
  readonly name: string;
  readonly shares: number | null;
  readonly avgCost: number | null;
  readonly currentPrice: number | null;
  readonly marketValue: number | null;
  readonly unrealizedPnl: number | null;
  readonly pctReturn: number | null;
  readonly weight: number | null;
  readonly stopLoss: number | null;
  readonly buyUpTo: number | null;
  readonly entryDate: string | null;
}

export type NumericField = {
  [K in keyof Position]: Position[K] extends number | null ? K : never;
}[keyof Position];

export type PortfolioPositions = Readonly<Record<SubPortfolio, readonly Position[]>>;

export interface PortfolioSnapshot extends PortfolioPositions {
  /** `null` only for a loaded snapshot whose timestamp could not be parsed. */
  readonly updatedAt: Date | null;
  readonly source: string;
}
