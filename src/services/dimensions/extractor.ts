import { DIMENSION_NUMBER_SOURCE, formatCm, parseDimensionNumber } from '../../utils/numberParsing';
import { splitSegments } from './normalize';
import { LotTrace } from './trace';
import { DIMENSION_AXES, type DimensionAxis, type DimensionNotation, type DimensionValues, type RawDimensionSet } from './types';

type Span = { start: number; end: number };

type SegmentContext = {
  text: string;
  index: number;
  claimed: Span[];
  hasSets: boolean;
};

type ExtractedSet = {
  set: RawDimensionSet;
  span: Span;
  convertedFrom?: string;
};

export type MatchAttempt = { matched: true; found: ExtractedSet[] } | { matched: false };

export interface DimensionMatcher {
  readonly notation: DimensionNotation;
  attempt(segment: SegmentContext): MatchAttempt;
}

// ---------------------------------------------------------------------------
// Pattern pieces. All quantifiers are bounded or separated by literal tokens,
// so no pattern can backtrack catastrophically.
// ---------------------------------------------------------------------------

const NUM = `(${DIMENSION_NUMBER_SOURCE})`;
const UNIT = '(?:\\s*(cm|mm|m)(?!\\p{L}))?';
const SEP = '\\s*[x×*]\\s*';
const LABEL_SEP = '\\s*(?:[x×*,/-]|et|and)?\\s*';
const NOT_AFTER_LETTER = '(?<!\\p{L})';
const NOT_AFTER_NUMBER = '(?<![\\p{N}.,])';

const AXIS_LABELS = 'hauteur|height|haut|largeur|larg|longueur|long|length|width|profondeur|prof|depth|h|l|w|p|d';
const HEIGHT_LABELS = 'hauteur|height|haut|h';
const DIAMETER_LABELS = 'ø|⌀|diam(?:ètre|etre|eter)?';

const LABELED_VALUE = `${NOT_AFTER_LETTER}(${AXIS_LABELS})\\.?\\s*:?\\s*${NUM}${UNIT}`;
const HEIGHT_VALUE = `${NOT_AFTER_LETTER}(?:${HEIGHT_LABELS})\\.?\\s*:?\\s*${NUM}${UNIT}`;
const DIAMETER_VALUE = `${NOT_AFTER_LETTER}(?:${DIAMETER_LABELS})\\.?\\s*:?\\s*${NUM}${UNIT}`;

const LABELED_RE = new RegExp(`${LABELED_VALUE}${LABEL_SEP}${LABELED_VALUE}(?:${LABEL_SEP}${LABELED_VALUE})?`, 'giu');
const TRIPLET_RE = new RegExp(`${NOT_AFTER_NUMBER}${NUM}${UNIT}${SEP}${NUM}${UNIT}${SEP}${NUM}${UNIT}`, 'giu');
const HEIGHT_DIAMETER_RE = new RegExp(`${HEIGHT_VALUE}${LABEL_SEP}${DIAMETER_VALUE}`, 'giu');
const DIAMETER_HEIGHT_RE = new RegExp(`${DIAMETER_VALUE}${LABEL_SEP}${HEIGHT_VALUE}`, 'giu');
const PAIR_RE = new RegExp(`${NOT_AFTER_NUMBER}${NUM}${UNIT}${SEP}${NUM}${UNIT}(?!\\p{N})`, 'giu');
const DIAMETER_RE = new RegExp(DIAMETER_VALUE, 'giu');
const SINGLE_LABEL_RE = new RegExp(
  `${NOT_AFTER_LETTER}(${DIAMETER_LABELS}|${AXIS_LABELS})\\.?\\s*:?\\s*${NUM}${UNIT}`,
  'giu'
);

const QUALIFIER_RE = /^\s*\(([^()]{1,60})\)/;

export function axisForLabel(label: string): DimensionAxis {
  const l = label.toLowerCase();
  if (l === 'ø' || l === '⌀' || l.startsWith('diam')) return 'Diameter';
  if (l.startsWith('h')) return 'H';
  if (l.startsWith('p')) return 'P';
  if (l === 'd' || l === 'depth') return 'D';
  return 'L';
}

function overlaps(span: Span, claimed: Span[]): boolean {
  return claimed.some((c) => span.start < c.end && c.start < span.end);
}

/** Last unit written in the cluster applies to its unitless numbers. */
function clusterUnit(units: Array<string | undefined>): string | undefined {
  for (let i = units.length - 1; i >= 0; i--) {
    const u = units[i];
    if (u) return u;
  }
  return undefined;
}

type AxisReading = { axis: DimensionAxis; raw: string };

function buildExtractedSet(
  notation: DimensionNotation,
  readings: AxisReading[],
  units: Array<string | undefined>,
  segment: SegmentContext,
  span: Span
): ExtractedSet | null {
  const unit = clusterUnit(units);
  const values: DimensionValues = {};
  let converted: string | undefined;

  for (const r of readings) {
    if (values[r.axis] !== undefined) return null;
    const parsed = parseDimensionNumber(r.raw, unit);
    if (parsed.value === null) return null;
    values[r.axis] = parsed.value;
    if (parsed.wasConverted) converted = parsed.unit;
  }

  const source = segment.text.slice(span.start, span.end).trim();
  const qualifier = segment.text.slice(span.end).match(QUALIFIER_RE)?.[1]?.trim();

  return {
    set: {
      values,
      notation,
      source,
      segment: segment.index,
      offset: span.start,
      ...(qualifier ? { qualifier } : {}),
    },
    span,
    convertedFrom: converted,
  };
}

/**
 * Runs one regex over the segment and keeps the matches that do not overlap a
 * span claimed by a higher-priority matcher.
 */
class RegexMatcher implements DimensionMatcher {
  constructor(
    readonly notation: DimensionNotation,
    private readonly patterns: RegExp[],
    private readonly read: (m: RegExpExecArray) => { readings: AxisReading[]; units: Array<string | undefined> } | null
  ) {}

  attempt(segment: SegmentContext): MatchAttempt {
    const found: ExtractedSet[] = [];
    const taken = [...segment.claimed];

    for (const pattern of this.patterns) {
      const re = new RegExp(pattern.source, pattern.flags);
      let m: RegExpExecArray | null;
      while ((m = re.exec(segment.text)) !== null) {
        const span = { start: m.index, end: m.index + m[0].length };
        if (overlaps(span, taken)) continue;
        const reading = this.read(m);
        if (!reading) continue;
        const extracted = buildExtractedSet(this.notation, reading.readings, reading.units, segment, span);
        if (!extracted) continue;
        found.push(extracted);
        taken.push(span);
      }
    }

    return found.length > 0 ? { matched: true, found } : { matched: false };
  }
}

/**
 * Lowest confidence: individual labels with no partner. Only consulted when
 * nothing else matched in the segment, so labels already read as part of a
 * cluster are never counted twice. All labels of the segment merge into one set.
 */
class ScatteredLabelMatcher implements DimensionMatcher {
  readonly notation = 'scattered' as const;

  attempt(segment: SegmentContext): MatchAttempt {
    if (segment.hasSets) return { matched: false };

    const re = new RegExp(SINGLE_LABEL_RE.source, SINGLE_LABEL_RE.flags);
    const readings: AxisReading[] = [];
    const units: Array<string | undefined> = [];
    let first: Span | null = null;
    let last: Span | null = null;
    let m: RegExpExecArray | null;

    while ((m = re.exec(segment.text)) !== null) {
      const span = { start: m.index, end: m.index + m[0].length };
      if (overlaps(span, segment.claimed)) continue;
      const axis = axisForLabel(m[1]);
      if (readings.some((r) => r.axis === axis)) continue;
      readings.push({ axis, raw: m[2] });
      units.push(m[3]);
      first = first ?? span;
      last = span;
    }

    if (!first || !last || readings.length === 0) return { matched: false };

    // Scattered labels each carry their own unit; parse them one by one.
    const values: DimensionValues = {};
    let converted: string | undefined;
    for (let i = 0; i < readings.length; i++) {
      const parsed = parseDimensionNumber(readings[i].raw, units[i]);
      if (parsed.value === null) continue;
      values[readings[i].axis] = parsed.value;
      if (parsed.wasConverted) converted = parsed.unit;
    }
    if (Object.keys(values).length === 0) return { matched: false };

    const span = { start: first.start, end: last.end };
    return {
      matched: true,
      found: [
        {
          set: {
            values,
            notation: this.notation,
            source: segment.text.slice(span.start, span.end).trim(),
            segment: segment.index,
            offset: span.start,
          },
          span,
          convertedFrom: converted,
        },
      ],
    };
  }
}

/** Matchers in priority order. */
export const DEFAULT_MATCHERS: readonly DimensionMatcher[] = [
  new RegexMatcher('labeled', [LABELED_RE], (m) => {
    const readings: AxisReading[] = [];
    const units: Array<string | undefined> = [];
    for (const base of [1, 4, 7]) {
      if (m[base] === undefined) continue;
      readings.push({ axis: axisForLabel(m[base]), raw: m[base + 1] });
      units.push(m[base + 2]);
    }
    return { readings, units };
  }),
  new RegexMatcher('unlabeled_triplet', [TRIPLET_RE], (m) => ({
    readings: [
      { axis: 'H', raw: m[1] },
      { axis: 'L', raw: m[3] },
      { axis: 'P', raw: m[5] },
    ],
    units: [m[2], m[4], m[6]],
  })),
  new RegexMatcher('height_diameter', [HEIGHT_DIAMETER_RE, DIAMETER_HEIGHT_RE], (m) => {
    const heightFirst = /^\s*h/i.test(m[0]);
    return {
      readings: heightFirst
        ? [
            { axis: 'H', raw: m[1] },
            { axis: 'Diameter', raw: m[3] },
          ]
        : [
            { axis: 'Diameter', raw: m[1] },
            { axis: 'H', raw: m[3] },
          ],
      units: [m[2], m[4]],
    };
  }),
  new RegexMatcher('unlabeled_pair', [PAIR_RE], (m) => ({
    readings: [
      { axis: 'H', raw: m[1] },
      { axis: 'L', raw: m[3] },
    ],
    units: [m[2], m[4]],
  })),
  new RegexMatcher('diameter', [DIAMETER_RE], (m) => ({
    readings: [{ axis: 'Diameter', raw: m[1] }],
    units: [m[2]],
  })),
  new ScatteredLabelMatcher(),
];

export function describeValues(values: DimensionValues): string {
  return DIMENSION_AXES
    .filter((axis) => values[axis] !== undefined)
    .map((axis) => `${axis === 'Diameter' ? 'Ø' : axis}=${formatCm(values[axis] ?? 0)}`)
    .join(', ');
}

/**
 * Pattern Extractor.
 *
 * Scans each segment of the description with the prioritized matchers. A
 * region claimed by a higher-priority matcher is never re-read by a lower one.
 * Finding nothing is a valid outcome (empty list), never an error.
 */
export function extractDimensionSets(
  text: string,
  trace: LotTrace = new LotTrace(),
  matchers: readonly DimensionMatcher[] = DEFAULT_MATCHERS
): RawDimensionSet[] {
  const sets: RawDimensionSet[] = [];

  splitSegments(text).forEach((segmentText, index) => {
    const segment: SegmentContext = { text: segmentText, index, claimed: [], hasSets: false };
    const found: ExtractedSet[] = [];

    for (const matcher of matchers) {
      const attempt = matcher.attempt(segment);
      if (!attempt.matched) continue;
      for (const f of attempt.found) {
        found.push(f);
        segment.claimed.push(f.span);
      }
      segment.hasSets = true;
    }

    found.sort((a, b) => a.span.start - b.span.start);
    for (const f of found) {
      if (f.convertedFrom) trace.note(`Converted ${f.convertedFrom} to cm in "${f.set.source}"`);
      const qualifier = f.set.qualifier ? ` (${f.set.qualifier})` : '';
      trace.note(`Extracted ${f.set.notation} "${f.set.source}"${qualifier}: ${describeValues(f.set.values)}`);
      sets.push(f.set);
    }
  });

  return sets;
}
