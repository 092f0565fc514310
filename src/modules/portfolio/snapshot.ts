import { DateTime } from 'luxon';
import { z } from 'zod';

import { SUB_PORTFOLIOS, type SubPortfolio } from '../../config.js';
import type { PortfolioPositions, PortfolioSnapshot, Position } from './types.js';

export const TIMESTAMP_FORMAT = "yyyy-MM-dd HH:mm 'UTC'";

export const formatTimestamp = (date: Date): string =>
  DateTime.fromJSDate(date, { zone: 'utc' }).toFormat(TIMESTAMP_FORMAT);

export function parseTimestamp(text: string): Date | null {
  const parsed = DateTime.fromFormat(text, TIMESTAMP_FORMAT, { zone: 'utc' });
  return parsed.isValid ? parsed.toJSDate() : null;
}

export const isFresh = (extracted: PortfolioPositions): boolean =>
  SUB_PORTFOLIOS.some((portfolio) => extracted[portfolio].length > 0);

/**
 * Per sub-portfolio, an empty extraction is replaced by the prior value; a
 * non-empty extraction always wins, even when it has fewer positions.
 */
export function mergeWithPrior(
  extracted: PortfolioPositions,
  prior: PortfolioPositions | null,
): PortfolioPositions {
  const pick = (portfolio: SubPortfolio): readonly Position[] =>
    extracted[portfolio].length > 0 ? extracted[portfolio] : (prior?.[portfolio] ?? []);

  return { sectorRotation: pick('sectorRotation'), longTerm: pick('longTerm') };
}

export interface Assembly {
  readonly snapshot: PortfolioSnapshot;
  readonly fresh: boolean;
  /** False when the prior snapshot is kept as is. */
  readonly write: boolean;
}

export function assembleSnapshot(
  extracted: PortfolioPositions,
  prior: PortfolioSnapshot | null,
  now: Date,
  source: string,
): Assembly {
  const fresh = isFresh(extracted);
  if (!fresh && prior) {
    return { snapshot: prior, fresh, write: false };
  }

  return {
    snapshot: { ...mergeWithPrior(extracted, prior), updatedAt: now, source },
    fresh,
    write: true,
  };
}

export const isEmptySnapshot = (snapshot: PortfolioPositions): boolean =>
  SUB_PORTFOLIOS.every((portfolio) => snapshot[portfolio].length === 0);

const nullableNumber = z.number().nullable().default(null);

const DiskPositionSchema = z.object({
  ticker: z
    .string()
    .trim()
    .min(1)
    .transform((ticker) => ticker.toUpperCase()),
  name: z.string().optional(),
  shares: nullableNumber,
  avg_cost: nullableNumber,
  curr_price: nullableNumber,
  market_value: nullableNumber,
  unrealized_pnl: nullableNumber,
  pct_return: nullableNumber,
  weight: nullableNumber,
  stop_loss: nullableNumber,
  buy_up_to: nullableNumber,
  entry_date: z.string().nullable().default(null),
});

export type DiskPosition = {
  ticker: string;
  name: string;
  shares: number | null;
  avg_cost: number | null;
  curr_price: number | null;
  market_value: number | null;
  unrealized_pnl: number | null;
  pct_return: number | null;
  weight: number | null;
  stop_loss: number | null;
  buy_up_to: number | null;
  entry_date: string | null;
};

const DiskSnapshotSchema = z.object({
  last_updated: z.string().nullable().optional(),
  source: z.string().optional(),
  sector_rotation: z.array(z.unknown()).default([]),
  long_term: z.array(z.unknown()).default([]),
});

export type DiskSnapshot = {
  last_updated: string | null;
  source: string;
  sector_rotation: DiskPosition[];
  long_term: DiskPosition[];
};

export const positionToDisk = (position: Position): DiskPosition => ({
  ticker: position.ticker,
  name: position.name,
  shares: position.shares,
  avg_cost: position.avgCost,
  curr_price: position.currentPrice,
  market_value: position.marketValue,
  unrealized_pnl: position.unrealizedPnl,
  pct_return: position.pctReturn,
  weight: position.weight,
  stop_loss: position.stopLoss,
  buy_up_to: position.buyUpTo,
  entry_date: position.entryDate,
});

export function toDisk(snapshot: PortfolioSnapshot): DiskSnapshot {
  return {
    last_updated: snapshot.updatedAt ? formatTimestamp(snapshot.updatedAt) : null,
    source: snapshot.source,
    sector_rotation: snapshot.sectorRotation.map(positionToDisk),
    long_term: snapshot.longTerm.map(positionToDisk),
  };
}

export interface DecodedSnapshot {
  readonly snapshot: PortfolioSnapshot;
  /** Entries that were not valid positions and were left out. */
  readonly dropped: number;
}

function decodePositions(entries: readonly unknown[]): { positions: Position[]; dropped: number } {
  const positions: Position[] = [];
  let dropped = 0;

  for (const entry of entries) {
    const parsed = DiskPositionSchema.safeParse(entry);
    if (!parsed.success) {
      dropped += 1;
      continue;
    }

    const value = parsed.data;
    positions.push({
      ticker: value.ticker,
      name: value.name ?? value.ticker,
      shares: value.shares,
      avgCost: value.avg_cost,
      currentPrice: value.curr_price,
      marketValue: value.market_value,
      unrealizedPnl: value.unrealized_pnl,
      pctReturn: value.pct_return,
      weight: value.weight,
      stopLoss: value.stop_loss,
      buyUpTo: value.buy_up_to,
      entryDate: value.entry_date,
    });
  }

  return { positions, dropped };
}

/** Throws a `ZodError` when the document is not a snapshot object at all. */
export function fromDisk(document: unknown): DecodedSnapshot {
  const parsed = DiskSnapshotSchema.parse(document);
  const sectorRotation = decodePositions(parsed.sector_rotation);
  const longTerm = decodePositions(parsed.long_term);

  return {
    snapshot: {
      updatedAt: parsed.last_updated ? parseTimestamp(parsed.last_updated) : null,
      source: parsed.source ?? '',
      sectorRotation: sectorRotation.positions,
      longTerm: longTerm.positions,
    },
    dropped: sectorRotation.dropped + longTerm.dropped,
  };
}
