const WHITESPACE_RE = /\s+/g;
const NBSP_RE = /[\u00A0\u202F]/g;
const SEGMENT_SPLIT_RE = /[;\r\n]+/;

export function normalizeLotText(raw: string): string {
  return String(raw || '')
    .replace(NBSP_RE, ' ')
    .replace(WHITESPACE_RE, ' ')
    .trim();
}

/**
 * Splits a description into the spans the extractor treats independently.
 * Commas do not split: "H 50 cm, L 40 cm" is one cluster.
 */
export function splitSegments(raw: string): string[] {
  return String(raw || '')
    .replace(NBSP_RE, ' ')
    .split(SEGMENT_SPLIT_RE)
    .map((s) => s.replace(WHITESPACE_RE, ' ').trim())
    .filter(Boolean);
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case-insensitive keyword pattern. A trailing "s" or "x" is
 * accepted so plurals ("toiles", "rideaux") match their singular keyword.
 */
export function keywordPattern(keyword: string): RegExp {
  const body = escapeRegExp(keyword.toLowerCase()).replace(/ /g, '\\s+');
  return new RegExp(`(?<![\\p{L}\\p{N}])${body}(?:s|x)?(?![\\p{L}\\p{N}])`, 'iu');
}

export function findKeyword(text: string, keywords: readonly string[]): string | null {
  for (const kw of keywords) {
    if (keywordPattern(kw).test(text)) return kw;
  }
  return null;
}
