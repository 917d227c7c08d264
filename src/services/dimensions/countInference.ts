import type { RuleSet } from '../../config/ruleSet';
import { normalizeLotText } from './normalize';
import { LotTrace } from './trace';
import type { ItemCount, ItemCountSource } from './types';

type Span = { start: number; end: number };

type CountCandidate = {
  value: number;
  source: ItemCountSource;
  span: Span;
  text: string;
};

const CHAQUE_RE = /(?<!\p{L})(chaque|each)(?!\p{L})/iu;
const PIECES_RE = /(?<![\p{L}\p{N}.,])(\d{1,3})\s+(?:pièces|pieces|éléments|elements|items|parts)(?!\p{L})/giu;
// "12 assiettes" at the start of a sentence; the following word must be a real word, not "x" or a unit.
const LEADING_DIGITS_RE = /(?:^|[.!?]\s+)(\d{1,2})\s+(?=\p{L}{3,})/giu;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function alternation(words: readonly string[]): string {
  return [...words]
    .sort((a, b) => b.length - a.length)
    .map(escapeRegExp)
    .join('|');
}

/**
 * Compiled per rule set: number words and idioms come from configuration.
 */
function buildPatterns(ruleSet: RuleSet) {
  // "(?!)" never matches: a rule set without number words only counts digits.
  const words = alternation(Object.keys(ruleSet.numberWords)) || '(?!)';
  const token = `(\\d{1,3}|${words})`;
  const setIdioms = alternation(ruleSet.setIdioms);
  const pairWords = alternation(ruleSet.pairWords);
  const link = `(?:de\\s+|d['’]\\s*|of\\s+)`;

  return {
    setIdiom: setIdioms ? new RegExp(`(?<!\\p{L})(?:${setIdioms})\\s+${link}${token}(?![\\p{L}\\p{N}-])`, 'giu') : null,
    // "deux paires de" counts both pairs.
    pairIdiom: pairWords
      ? new RegExp(`(?<![\\p{L}\\p{N}])(?:${token}\\s+)?(?:${pairWords})s?\\s+(?:(?:de|of)(?!\\p{L})|d['’])`, 'giu')
      : null,
    leadingWord: new RegExp(`(?:^|[.!?]\\s+)(${words})(?![\\p{L}-])`, 'giu'),
    anyWord: new RegExp(`(?<![\\p{L}-])(${words})(?![\\p{L}-])`, 'giu'),
    exclusions: [
      new RegExp(`(?:édition|edition|tirage|tiré|tire)\\s+(?:limitée?\\s+)?(?:de|à|a|of)\\s+${token}`, 'giu'),
      new RegExp(`(?<![\\p{L}\\p{N}])${token}\\s+(?:exemplaires?|ex\\.|copies|épreuves?)`, 'giu'),
      new RegExp(`(?<!\\p{L})(?:tome|vol\\.?|volume|n°|no\\.)\\s*${token}`, 'giu'),
    ],
  };
}

function toCount(token: string, ruleSet: RuleSet): number | null {
  const t = token.toLowerCase();
  if (/^\d+$/.test(t)) {
    const n = parseInt(t, 10);
    return n >= 1 ? n : null;
  }
  return ruleSet.numberWords[t] ?? null;
}

function collect(re: RegExp | null, text: string, fn: (m: RegExpExecArray) => CountCandidate | null): CountCandidate[] {
  if (!re) return [];
  const out: CountCandidate[] = [];
  const local = new RegExp(re.source, re.flags);
  let m: RegExpExecArray | null;
  while ((m = local.exec(text)) !== null) {
    const c = fn(m);
    if (c) out.push(c);
  }
  return out;
}

/** Span of the captured token inside a match (the match may include a leading sentence boundary). */
function tokenSpan(m: RegExpExecArray, token: string): Span {
  const start = m.index + m[0].toLowerCase().lastIndexOf(token.toLowerCase());
  return { start, end: start + token.length };
}

/**
 * Count Inferrer.
 *
 * Signals are tried in a fixed order; the first one not inside an
 * edition/volume numbering window wins. No signal means one item.
 */
export function inferItemCount(text: string, ruleSet: RuleSet, trace: LotTrace = new LotTrace()): ItemCount {
  const normalized = normalizeLotText(text);
  const patterns = buildPatterns(ruleSet);

  const ambiguous = CHAQUE_RE.test(normalized);
  if (ambiguous) {
    const word = normalized.match(CHAQUE_RE)?.[1] ?? 'chaque';
    trace.raise('CHAQUE_DETECTED', `"${word}" implies per-unit measurement; total count unverified`);
  }

  const excluded: Span[] = [];
  for (const re of patterns.exclusions) {
    const local = new RegExp(re.source, re.flags);
    let m: RegExpExecArray | null;
    while ((m = local.exec(normalized)) !== null) {
      excluded.push({ start: m.index, end: m.index + m[0].length });
    }
  }
  const isExcluded = (span: Span) => excluded.some((e) => span.start >= e.start && span.end <= e.end);

  const ordered: CountCandidate[][] = [
    collect(patterns.setIdiom, normalized, (m) => {
      const value = toCount(m[1], ruleSet);
      return value === null ? null : { value, source: 'set_idiom', span: tokenSpan(m, m[1]), text: m[0].trim() };
    }),
    collect(patterns.pairIdiom, normalized, (m) => {
      const pairs = m[1] ? toCount(m[1], ruleSet) : 1;
      if (pairs === null) return null;
      const span = m[1] ? tokenSpan(m, m[1]) : { start: m.index, end: m.index + m[0].length };
      return { value: pairs * 2, source: 'pair_idiom', span, text: m[0].trim() };
    }),
    collect(patterns.leadingWord, normalized, (m) => {
      const value = toCount(m[1], ruleSet);
      return value === null ? null : { value, source: 'number_word', span: tokenSpan(m, m[1]), text: m[1] };
    }),
    collect(LEADING_DIGITS_RE, normalized, (m) => {
      const value = toCount(m[1], ruleSet);
      return value === null || value < 2 ? null : { value, source: 'digits', span: tokenSpan(m, m[1]), text: m[0].trim() };
    }),
    collect(PIECES_RE, normalized, (m) => {
      const value = toCount(m[1], ruleSet);
      return value === null ? null : { value, source: 'digits', span: tokenSpan(m, m[1]), text: m[0].trim() };
    }),
  ];

  // With "chaque", any number word may be the unit count ("chaque vase ... six vases").
  if (ambiguous) {
    ordered.push(
      collect(patterns.anyWord, normalized, (m) => {
        const value = toCount(m[1], ruleSet);
        return value === null ? null : { value, source: 'number_word', span: tokenSpan(m, m[1]), text: m[1] };
      })
    );
  }

  for (const group of ordered) {
    for (const candidate of group) {
      if (isExcluded(candidate.span)) {
        trace.note(`Ignored "${candidate.text}" as item count: edition or volume numbering`);
        continue;
      }
      trace.note(`ITEM_COUNT=${candidate.value} from "${candidate.text}"`);
      return { value: candidate.value, source: candidate.source, ambiguous };
    }
  }

  trace.note('No count signal found: ITEM_COUNT=1');
  return { value: 1, source: 'default', ambiguous };
}
