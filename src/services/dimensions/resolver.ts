import type { RuleSet } from '../../config/ruleSet';
import { formatCm } from '../../utils/numberParsing';
import { describeValues } from './extractor';
import { findKeyword, normalizeLotText } from './normalize';
import { SELECTION_POLICIES, selectDimensionSet } from './selectionPolicy';
import { LotTrace } from './trace';
import type { Classification, ItemCount, RawDimensionSet, ResolvedItem } from './types';

type Dims = Omit<ResolvedItem, 'index'>;

export type ResolveParams = {
  text: string;
  sets: RawDimensionSet[];
  itemCount: ItemCount;
  classification: Classification;
  ruleSet: RuleSet;
};

const EMPTY_DIMS: Dims = { H: null, L: null, D: null, P: null, Diameter: null };

const FASHION_SIZE_RE =
  /(?<!\p{L})(?:taille|size|sz)\.?\s*:?\s*(?:XXS|XS|S|M|L|XL|XXL|XXXL|\d{2}(?:\/\d{2})?)(?![\p{L}\p{N}])/iu;
// Uppercase "D" used as a label with no figure after it ("Vase, D."); an initial ("D. Martin") is not one.
const BARE_D_LABEL_RE = /(?<!\p{L})D(?![\p{L}'’])(?!\.?\s*:?\s*\d)(?!\.\s*\p{Lu})/u;
const VOLUME_NUMBER_RE = /(?<!\p{L})(?:tome|vol\.?|volume|t\.|n°|no\.?)\s*(\d{1,4})(?!\p{N})/giu;
const NUMBER_RE = /\d+(?:[.,]\d+)?/g;

function spansOf(re: RegExp, text: string): Array<{ start: number; end: number }> {
  const local = new RegExp(re.source, re.flags);
  const out: Array<{ start: number; end: number }> = [];
  let m: RegExpExecArray | null;
  while ((m = local.exec(text)) !== null) {
    out.push({ start: m.index, end: m.index + m[0].length });
  }
  return out;
}

/**
 * Book lots often carry no size at all, only "tome 3" or "vol. 2".
 * When every number in the text sits in such a reference, none of them is a dimension.
 */
function suppressVolumeNumbers(params: ResolveParams, trace: LotTrace): RawDimensionSet[] {
  const { text, sets, ruleSet } = params;
  const bookWord = findKeyword(text, ruleSet.bookKeywords);
  if (!bookWord) return sets;

  const numbers = spansOf(NUMBER_RE, text);
  if (numbers.length === 0) return sets;

  const volumes = spansOf(VOLUME_NUMBER_RE, text);
  const onlyVolumeNumbers = numbers.every((n) => volumes.some((v) => n.start >= v.start && n.end <= v.end));
  if (!onlyVolumeNumbers) return sets;

  for (const set of sets) {
    trace.note(`Suppressed "${set.source}": volume number, not a dimension`);
  }
  trace.raise('BOOK_DIMENSION_CHECK', `book lot ("${bookWord}") whose only numbers are volume references`);
  return [];
}

/**
 * Normalizes one raw set for the lot's classification.
 * `prefix` distinguishes log lines when several sets are resolved.
 */
function normalizeSet(set: RawDimensionSet, params: ResolveParams, trace: LotTrace, prefix: string): Dims {
  const v = set.values;
  const kind = params.classification.kind;
  const twoDDepth = params.ruleSet.twoDDepth;
  const base: Dims = { ...EMPTY_DIMS, P: v.P ?? null, Diameter: v.Diameter ?? null };
  const axes = Object.keys(v);

  if (axes.length === 1 && v.Diameter === undefined) {
    const only = axes[0];
    const value = v.H ?? v.L ?? v.D ?? v.P ?? 0;
    const D = kind === 'TwoD' ? twoDDepth : v.D ?? null;
    if (v.H !== undefined) {
      trace.raise('HEIGHT_ONLY_OBJECT', `${prefix}only H=${formatCm(value)} given; L and D left unset`);
      return { ...base, H: value, D };
    }
    trace.raise('PARTIAL_DIMENSIONS', `${prefix}only ${only}=${formatCm(value)} given`);
    return { ...base, L: v.L ?? null, D };
  }

  if (kind === 'TwoD') {
    if (v.H === undefined && v.L === undefined && v.Diameter !== undefined && v.P === undefined && v.D === undefined) {
      trace.note(`${prefix}H=Ø, L=Ø; D=${formatCm(twoDDepth)} (2D)`);
      return { ...base, H: v.Diameter, L: v.Diameter, D: twoDDepth };
    }

    let a: number;
    let b: number;
    if (v.H !== undefined && v.L !== undefined) {
      a = v.H;
      b = v.L;
    } else {
      const present = (['H', 'L', 'P', 'D', 'Diameter'] as const).filter((axis) => v[axis] !== undefined);
      a = v[present[0]] ?? 0;
      b = v[present[1]] ?? 0;
      trace.note(`${prefix}Planar sides taken from ${present[0]}×${present[1]}`);
    }

    let D = twoDDepth;
    const measuredDepth = v.D ?? (v.H !== undefined && v.L !== undefined ? v.P : undefined);
    if (trace.has('PANEL_OBJECT_3D') && measuredDepth !== undefined) {
      D = measuredDepth;
      trace.note(`${prefix}L=max(H,L); D=${formatCm(D)} (panel, measured depth kept)`);
    } else {
      trace.note(`${prefix}L=max(H,L); D=${formatCm(twoDDepth)} (2D)`);
    }
    return { ...base, H: Math.min(a, b), L: Math.max(a, b), D };
  }

  if (kind === 'ThreeD') {
    if (v.Diameter !== undefined && v.L === undefined) {
      trace.note(`${prefix}L=Ø, D=Ø`);
      return { ...base, H: v.H ?? null, L: v.Diameter, D: v.Diameter };
    }

    const L = v.L ?? null;
    let D: number | null = v.D ?? null;
    if (D === null && v.P !== undefined) {
      D = v.P;
      trace.note(`${prefix}D=P`);
    } else if (D === null && L !== null) {
      D = L;
      trace.note(`${prefix}D=L`);
      trace.raise('DEPTH_DERIVED_FROM_LENGTH', `${prefix}no depth given; D approximated from L=${formatCm(L)}`);
    }
    if (L === null) {
      trace.raise('PARTIAL_DIMENSIONS', `${prefix}no length given; L left unset`);
      if (axes.length === 2 && v.H !== undefined && v.D !== undefined) {
        trace.raise('D_NOTATION_DEPTH', `${prefix}H×D given; "D" could be depth or diameter`);
      }
    }
    return { ...base, H: v.H ?? null, L, D };
  }

  // Indeterminate: keep what was measured, derive nothing.
  let D: number | null = v.D ?? null;
  if (D === null && v.P !== undefined) {
    D = v.P;
    trace.note(`${prefix}D=P`);
  }
  trace.note(`${prefix}Type undetermined: values kept as extracted`);
  return { ...base, H: v.H ?? null, L: v.L ?? null, D };
}

function toItems(dims: Dims[]): ResolvedItem[] {
  return dims.map((d, i) => ({ index: i + 1, ...d }));
}

function matchSetsToCount(sets: RawDimensionSet[], params: ResolveParams, trace: LotTrace): ResolvedItem[] {
  const n = params.itemCount.value;

  if (sets.length === 0) {
    trace.raise('NO_DIMENSIONS', `no dimension pattern found; ${n} item(s) left without H/L/D`);
    return toItems(Array.from({ length: n }, () => ({ ...EMPTY_DIMS })));
  }

  if (sets.length === 1) {
    const dims = normalizeSet(sets[0], params, trace, '');
    if (n > 1) {
      trace.note(
        params.itemCount.ambiguous
          ? `Dimensions read as per unit ("chaque"); replicated to match ${n} items`
          : `Replicated dimensions to match ${n} items`
      );
      trace.raise('DIMENSIONS_REPLICATED', 'one dimension set copied to every item (approximation)');
    }
    return toItems(Array.from({ length: n }, () => ({ ...dims })));
  }

  if (n === 1) {
    const policy = SELECTION_POLICIES[params.ruleSet.selectionPolicy];
    const chosen = selectDimensionSet(sets, policy);
    trace.raise('MULTIPLE_DIMENSIONS_SINGLE_ITEM', `${sets.length} dimension sets for a single item`);
    sets.forEach((set, i) => {
      if (i === chosen) return;
      const qualifier = set.qualifier ? ` (${set.qualifier})` : '';
      trace.note(`Discarded set ${i + 1} "${set.source}"${qualifier}: ${describeValues(set.values)}`);
    });
    trace.note(`Selected set ${chosen + 1} "${sets[chosen].source}" by ${policy.label}`);
    return toItems([normalizeSet(sets[chosen], params, trace, '')]);
  }

  const resolved = sets.map((set, i) => normalizeSet(set, params, trace, `Set ${i + 1}: `));

  if (sets.length === n) {
    trace.note(`Assigned ${n} dimension sets to ${n} items in order`);
    return toItems(resolved);
  }

  trace.raise('DIMENSION_COUNT_MISMATCH', `${sets.length} dimension sets for ${n} items`);
  if (sets.length < n) {
    const last = resolved[resolved.length - 1];
    trace.note(`Items ${sets.length + 1}-${n} reuse set ${sets.length}`);
    return toItems([...resolved, ...Array.from({ length: n - sets.length }, () => ({ ...last }))]);
  }
  trace.note(`Dropped ${sets.length - n} extra dimension set(s)`);
  return toItems(resolved.slice(0, n));
}

function applyTextOverrides(sets: RawDimensionSet[], params: ResolveParams, trace: LotTrace): void {
  const { ruleSet } = params;
  const text = normalizeLotText(params.text);

  const size = text.match(FASHION_SIZE_RE);
  if (size) {
    trace.raise('FASHION_ITEM', `sizing notation "${size[0].trim()}" is not a shipping dimension`);
  }

  // An H×D set may already have raised it.
  if (!trace.has('D_NOTATION_DEPTH')) {
    if (BARE_D_LABEL_RE.test(text)) {
      trace.raise('D_NOTATION_DEPTH', '"D" label without a figure; depth or diameter unknown');
    } else if (sets.some((s) => s.notation === 'scattered' && s.values.D !== undefined)) {
      trace.raise('D_NOTATION_DEPTH', 'lone "D" value could be depth or diameter');
    }
  }

  const rug = findKeyword(text, ruleSet.rugKeywords);
  if (rug && sets.some((s) => s.values.L !== undefined && s.values.P !== undefined && s.values.H === undefined)) {
    trace.raise('RUG_L_P_PATTERN', `rug "${rug}" given as L×P; flat or rolled shipping unknown`);
  }

  const curtain = findKeyword(text, ruleSet.curtainKeywords);
  if (curtain && findKeyword(text, ruleSet.pairWords)) {
    trace.raise('CURTAIN_PAIR_COUNT', `pair of curtains ("${curtain}") may ship as one unit`);
  }

  const openClosed = findKeyword(text, ruleSet.openClosedKeywords);
  if (openClosed) {
    trace.raise('OPEN_CLOSED_DIMENSIONS', `dimensions depend on state ("${openClosed}")`);
  }

  const complex = findKeyword(text, ruleSet.complexKeywords);
  if (complex) {
    trace.raise('COMPLEX_STRUCTURE', `structural element "${complex}"`);
  }
}

/**
 * Dimension Resolver.
 *
 * Turns raw sets into exactly `itemCount.value` items: geometry first, then
 * count-driven flags, then text-driven overrides.
 */
export function resolveDimensions(params: ResolveParams, trace: LotTrace = new LotTrace()): ResolvedItem[] {
  const sets = suppressVolumeNumbers(params, trace);
  const items = matchSetsToCount(sets, params, trace);

  const n = params.itemCount.value;
  if (n > params.ruleSet.highCountThreshold) {
    trace.raise('HIGH_COUNT', `${n} items exceeds ${params.ruleSet.highCountThreshold}; per-item replication unreliable`);
  }

  applyTextOverrides(sets, params, trace);
  return items;
}
