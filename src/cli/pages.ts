import { promises as fs } from 'node:fs';

import { parse } from 'yaml';
import { z } from 'zod';

import { buildPortalUrl, type PageTarget, type SubPortfolio } from '../config.js';

const PORTFOLIO_ALIASES: Readonly<Record<string, SubPortfolio>> = {
  sector_rotation: 'sectorRotation',
  sectorRotation: 'sectorRotation',
  long_term: 'longTerm',
  longTerm: 'longTerm',
};

const DEFAULT_LABELS: Readonly<Record<SubPortfolio, string>> = {
  sectorRotation: 'sector_rotation',
  longTerm: 'long_term',
};

const PortfolioSchema = z
  .string()
  .trim()
  .transform((value, ctx): SubPortfolio => {
    const portfolio = PORTFOLIO_ALIASES[value];
    if (!portfolio) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Unknown portfolio "${value}" (expected sector_rotation or long_term).`,
      });
      return z.NEVER;
    }
    return portfolio;
  });

const StringArraySchema = z.preprocess(
  (value) => (typeof value === 'string' ? [value] : value),
  z.array(z.string().trim().min(1)).default([]),
);

const PageEntrySchema = z.object({
  portfolio: PortfolioSchema,
  label: z
    .string()
    .trim()
    .regex(/^[\w-]+$/, 'Labels may only contain letters, digits, "_" and "-".')
    .optional(),
  url: z.string().trim().min(1),
  alternates: StringArraySchema,
});

export const PagesFileSchema = z.object({
  pages: z.array(PageEntrySchema).nonempty('At least one page is required.'),
});

/** Relative URLs in the document resolve against the portal base URL. */
export function parsePageTargets(document: unknown, baseUrl: string): PageTarget[] {
  const { pages } = PagesFileSchema.parse(document);
  return pages.map((entry) => ({
    portfolio: entry.portfolio,
    label: entry.label ?? DEFAULT_LABELS[entry.portfolio],
    url: buildPortalUrl(baseUrl, entry.url),
    alternateUrls: entry.alternates.map((url) => buildPortalUrl(baseUrl, url)),
  }));
}

export async function loadPageTargets(filePath: string, baseUrl: string): Promise<PageTarget[]> {
  const raw = await fs.readFile(filePath, 'utf8');
  return parsePageTargets(parse(raw), baseUrl);
}
