import { describe, it, expect } from 'vitest';
import { defaultRuleSet, withRuleSetOverrides } from '../../../src/config/ruleSet';
import { resolveDimensions, type ResolveParams } from '../../../src/services/dimensions/resolver';
import { SELECTION_POLICIES, selectDimensionSet } from '../../../src/services/dimensions/selectionPolicy';
import { LotTrace } from '../../../src/services/dimensions/trace';
import type { Classification, DimensionValues, RawDimensionSet } from '../../../src/services/dimensions/types';

const TWO_D: Classification = { kind: 'TwoD', rule: 'technique_2d', keyword: 'huile' };
const THREE_D: Classification = { kind: 'ThreeD', rule: 'object_3d', keyword: 'vase' };
const UNKNOWN: Classification = { kind: 'Indeterminate', rule: 'no_keyword', keyword: null };

function rawSet(values: DimensionValues, source = 'set'): RawDimensionSet {
  return { values, notation: 'labeled', source, segment: 0, offset: 0 };
}

function resolve(overrides: Partial<ResolveParams>) {
  const params: ResolveParams = {
    text: '',
    sets: [],
    itemCount: { value: 1, source: 'default', ambiguous: false },
    classification: THREE_D,
    ruleSet: defaultRuleSet,
    ...overrides,
  };
  const trace = new LotTrace();
  const items = resolveDimensions(params, trace);
  return { items, trace, codes: trace.flags.map((f) => f.code) };
}

describe('resolveDimensions', () => {
  it('puts the larger planar side in L and the placeholder depth in D for 2D', () => {
    const { items, codes } = resolve({ sets: [rawSet({ H: 162, L: 130 })], classification: TWO_D });
    expect(items).toEqual([{ index: 1, H: 130, L: 162, D: 5, P: null, Diameter: null }]);
    expect(codes).toEqual([]);
  });

  it('uses the rule set depth for 2D', () => {
    const ruleSet = withRuleSetOverrides({ twoDDepth: 3 });
    const { items } = resolve({ sets: [rawSet({ H: 40, L: 30 })], classification: TWO_D, ruleSet });
    expect(items[0].D).toBe(3);
  });

  it('squares a round 2D work on its diameter', () => {
    const { items, trace } = resolve({ sets: [rawSet({ Diameter: 40 })], classification: TWO_D });
    expect(items[0]).toEqual({ index: 1, H: 40, L: 40, D: 5, P: null, Diameter: 40 });
    expect(trace.log).toEqual(['H=Ø, L=Ø; D=5 (2D)']);
  });

  it('takes depth from P for 3D', () => {
    const { items, trace } = resolve({ sets: [rawSet({ H: 50, L: 40, P: 30 })] });
    expect(items[0]).toEqual({ index: 1, H: 50, L: 40, D: 30, P: 30, Diameter: null });
    expect(trace.log).toEqual(['D=P']);
  });

  it('approximates a missing 3D depth from L with an informational flag', () => {
    const { items, trace } = resolve({ sets: [rawSet({ H: 60, L: 45 })] });
    expect(items[0].D).toBe(45);
    expect(trace.flags).toEqual([{ code: 'DEPTH_DERIVED_FROM_LENGTH', reviewRequired: false }]);
  });

  it('uses the diameter for L and D of a round 3D object', () => {
    const { items } = resolve({ sets: [rawSet({ H: 30, Diameter: 12 })] });
    expect(items[0]).toEqual({ index: 1, H: 30, L: 12, D: 12, P: null, Diameter: 12 });
  });

  it('derives nothing for an undetermined type', () => {
    const { items, trace } = resolve({ sets: [rawSet({ H: 60, L: 45 })], classification: UNKNOWN });
    expect(items[0]).toEqual({ index: 1, H: 60, L: 45, D: null, P: null, Diameter: null });
    expect(trace.log).toEqual(['Type undetermined: values kept as extracted']);
  });

  it('leaves L and D unset when only a height is given', () => {
    const { items, trace } = resolve({ sets: [rawSet({ H: 97 })] });
    expect(items[0]).toEqual({ index: 1, H: 97, L: null, D: null, P: null, Diameter: null });
    expect(trace.log).toEqual(['HEIGHT_ONLY_OBJECT: only H=97 given; L and D left unset']);
  });

  it('flags a single non-height axis as partial', () => {
    const { items, codes } = resolve({ sets: [rawSet({ L: 80 })] });
    expect(items[0].L).toBe(80);
    expect(codes).toEqual(['PARTIAL_DIMENSIONS']);
  });

  it('flags a 3D set given as H x D with no length', () => {
    const { items, trace, codes } = resolve({
      text: 'Vase en porcelaine H 30 x D 20 cm',
      sets: [rawSet({ H: 30, D: 20 })],
    });
    expect(items[0]).toEqual({ index: 1, H: 30, L: null, D: 20, P: null, Diameter: null });
    expect(codes).toEqual(['PARTIAL_DIMENSIONS', 'D_NOTATION_DEPTH']);
    expect(trace.log).toEqual([
      'PARTIAL_DIMENSIONS: no length given; L left unset',
      'D_NOTATION_DEPTH: H×D given; "D" could be depth or diameter',
    ]);
  });

  it('flags a "D" label without a figure', () => {
    const { codes, trace } = resolve({ text: 'Vase H 30 cm, D.', sets: [rawSet({ H: 30 })] });
    expect(codes).toEqual(['HEIGHT_ONLY_OBJECT', 'D_NOTATION_DEPTH']);
    expect(trace.log).toEqual([
      'HEIGHT_ONLY_OBJECT: only H=30 given; L and D left unset',
      'D_NOTATION_DEPTH: "D" label without a figure; depth or diameter unknown',
    ]);
  });

  it('flags a lone scattered "D" value', () => {
    const { items, codes, trace } = resolve({
      text: 'Coffret, H 40 cm, L 30 cm, D 25 cm',
      sets: [{ values: { H: 40, L: 30, D: 25 }, notation: 'scattered', source: 'H 40 cm, L 30 cm, D 25 cm', segment: 0, offset: 9 }],
    });
    expect(items[0]).toEqual({ index: 1, H: 40, L: 30, D: 25, P: null, Diameter: null });
    expect(codes).toEqual(['D_NOTATION_DEPTH']);
    expect(trace.log).toEqual(['D_NOTATION_DEPTH: lone "D" value could be depth or diameter']);
  });

  it('does not read a signature initial as a "D" label', () => {
    const { codes, trace } = resolve({
      text: 'signée D. Martin, H 50 x L 40 x P 30 cm',
      sets: [rawSet({ H: 50, L: 40, P: 30 })],
    });
    expect(codes).toEqual([]);
    expect(trace.log).toEqual(['D=P']);
  });

  it('produces unset items and NO_DIMENSIONS when nothing was extracted', () => {
    const { items, codes } = resolve({ itemCount: { value: 2, source: 'pair_idiom', ambiguous: false } });
    expect(items).toEqual([
      { index: 1, H: null, L: null, D: null, P: null, Diameter: null },
      { index: 2, H: null, L: null, D: null, P: null, Diameter: null },
    ]);
    expect(codes).toEqual(['NO_DIMENSIONS']);
  });

  it('replicates one set across several items', () => {
    const { items, trace } = resolve({
      sets: [rawSet({ H: 10, L: 20, P: 5 })],
      itemCount: { value: 3, source: 'set_idiom', ambiguous: false },
    });
    expect(items.map((i) => i.index)).toEqual([1, 2, 3]);
    expect(items.every((i) => i.H === 10 && i.L === 20 && i.D === 5)).toBe(true);
    expect(trace.log).toEqual([
      'D=P',
      'Replicated dimensions to match 3 items',
      'DIMENSIONS_REPLICATED: one dimension set copied to every item (approximation)',
    ]);
  });

  it('replicates a per-unit set for a "chaque" lot', () => {
    const { items, trace } = resolve({
      text: 'Paire de vases, chaque H 30 x L 20 x P 20 cm',
      sets: [rawSet({ H: 30, L: 20, P: 20 })],
      itemCount: { value: 2, source: 'pair_idiom', ambiguous: true },
    });
    expect(items).toEqual([
      { index: 1, H: 30, L: 20, D: 20, P: 20, Diameter: null },
      { index: 2, H: 30, L: 20, D: 20, P: 20, Diameter: null },
    ]);
    expect(trace.log).toEqual([
      'D=P',
      'Dimensions read as per unit ("chaque"); replicated to match 2 items',
      'DIMENSIONS_REPLICATED: one dimension set copied to every item (approximation)',
    ]);
  });

  it('keeps the largest set for a single item and logs the discarded one', () => {
    const { items, trace, codes } = resolve({
      sets: [rawSet({ H: 45, L: 34 }, '45×34cm'), rawSet({ H: 80, L: 34 }, '80×34cm')],
      classification: TWO_D,
    });
    expect(items).toEqual([{ index: 1, H: 34, L: 80, D: 5, P: null, Diameter: null }]);
    expect(codes).toEqual(['MULTIPLE_DIMENSIONS_SINGLE_ITEM']);
    expect(trace.log).toEqual([
      'MULTIPLE_DIMENSIONS_SINGLE_ITEM: 2 dimension sets for a single item',
      'Discarded set 1 "45×34cm": H=45, L=34',
      'Selected set 2 "80×34cm" by max(H,L)',
      'L=max(H,L); D=5 (2D)',
    ]);
  });

  it('assigns sets to items in order when the counts agree', () => {
    const { items, codes } = resolve({
      sets: [rawSet({ H: 10, L: 20, P: 5 }), rawSet({ H: 30, L: 40, P: 6 })],
      itemCount: { value: 2, source: 'pair_idiom', ambiguous: false },
    });
    expect(items.map((i) => [i.H, i.L, i.D])).toEqual([
      [10, 20, 5],
      [30, 40, 6],
    ]);
    expect(codes).toEqual([]);
  });

  it('reuses the last set when there are fewer sets than items', () => {
    const { items, codes } = resolve({
      sets: [rawSet({ H: 10, L: 20, P: 5 }), rawSet({ H: 30, L: 40, P: 6 })],
      itemCount: { value: 3, source: 'set_idiom', ambiguous: false },
    });
    expect(items).toHaveLength(3);
    expect(items[2]).toEqual({ index: 3, H: 30, L: 40, D: 6, P: 6, Diameter: null });
    expect(codes).toEqual(['DIMENSION_COUNT_MISMATCH']);
  });

  it('flags counts above the threshold', () => {
    const { items, codes } = resolve({
      sets: [rawSet({ H: 2, L: 8, P: 8 })],
      itemCount: { value: 12, source: 'digits', ambiguous: false },
    });
    expect(items).toHaveLength(12);
    expect(codes).toEqual(['DIMENSIONS_REPLICATED', 'HIGH_COUNT']);
  });

  it('flags garment sizes', () => {
    const { codes } = resolve({ text: 'Veste en soie, taille 38' });
    expect(codes).toEqual(['NO_DIMENSIONS', 'FASHION_ITEM']);
  });

  it('flags a rug given as L x P', () => {
    const { items, codes } = resolve({
      text: 'Tapis kilim L 200 x P 140 cm',
      sets: [rawSet({ L: 200, P: 140 })],
      classification: { kind: 'TwoD', rule: 'technique_2d', keyword: 'tapis' },
    });
    expect(items[0]).toEqual({ index: 1, H: 140, L: 200, D: 5, P: 140, Diameter: null });
    expect(codes).toEqual(['RUG_L_P_PATTERN']);
  });
});

describe('selectDimensionSet', () => {
  const sets = [rawSet({ H: 100, L: 10 }), rawSet({ H: 60, L: 60 })];

  it('ranks by max(H,L) by default', () => {
    expect(selectDimensionSet(sets, SELECTION_POLICIES.max_height_length)).toBe(0);
  });

  it('ranks by area when asked', () => {
    expect(selectDimensionSet(sets, SELECTION_POLICIES.max_area)).toBe(1);
  });

  it('keeps the first set on a tie and returns -1 for nothing', () => {
    expect(selectDimensionSet([rawSet({ H: 5 }), rawSet({ L: 5 })], SELECTION_POLICIES.max_axis)).toBe(0);
    expect(selectDimensionSet([], SELECTION_POLICIES.max_axis)).toBe(-1);
  });
});
