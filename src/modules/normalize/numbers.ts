const PLAIN_DECIMAL = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:e[-+]?\d+)?$/i;
const STRIPPED_PUNCTUATION = /[$€£¥,%\s]/g;
const PARENTHESIZED = /^\((.*)\)$/;

/**
 * Parses cell text such as `$1,234.56`, `(5.4%)` or `−3` into a number.
 * Parenthesized values are negative. Anything that is not a plain decimal
 * once currency, thousands and percent punctuation is stripped resolves to
 * `null`, never to zero.
 */
export function parseNumeric(text: string | null | undefined): number | null {
  if (text === null || text === undefined) {
    return null;
  }

  let cleaned = text.trim().replace(/−/g, '-');
  const parenthesized = PARENTHESIZED.exec(cleaned);
  if (parenthesized) {
    cleaned = `-${parenthesized[1]}`;
  }
  cleaned = cleaned.replace(STRIPPED_PUNCTUATION, '');

  if (!PLAIN_DECIMAL.test(cleaned)) {
    return null;
  }

  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}
