import type { CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

// Ordered from most to least specific; the first selector over the threshold wins.
export const REPEATED_ELEMENT_SELECTORS = [
  '[role="row"]',
  '[data-testid*="position"]',
  '[class*="position"]',
  '[class*="holding"]',
  '[class*="stock-row"]',
  // Whole-word `row`, so `arrow` or `narrow` never match.
  '[class~="row"], [class*="-row"], [class*="row-"]',
] as const;

export const REPEATED_ELEMENT_THRESHOLD = 3;

export interface CandidateLayout {
  readonly selector: string;
  readonly elements: readonly Element[];
}

export function findCandidateLayout($: CheerioAPI): CandidateLayout | null {
  for (const selector of REPEATED_ELEMENT_SELECTORS) {
    const elements = $(selector).toArray();
    if (elements.length > REPEATED_ELEMENT_THRESHOLD) {
      return { selector, elements };
    }
  }
  return null;
}
