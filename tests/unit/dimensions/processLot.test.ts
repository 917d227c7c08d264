import { describe, it, expect } from 'vitest';
import { LotInputError, processLot } from '../../../src/services/dimensions';
import { TWO_D_OVERRIDE_FLAGS } from '../../../src/services/dimensions/flags';

const SAMPLE_DESCRIPTIONS = [
  'Huile sur toile 162 x 130 cm',
  'Bronze H 50 × L 40 × P 30 cm',
  'Paire de vases, chaque 30cm',
  '45×34cm (canvas) 80×34cm (avec cadre)',
  'Souvenir de voyage, provenance inconnue',
  'Canne, H 97 cm',
  'Ensemble de 4 assiettes en porcelaine, diam. 24 cm',
  'Commode à trois tiroirs 85 x 120 x 50 cm',
  'Livre ancien, tome 3',
  'Veste en soie, taille 38',
  'Paire de rideaux en velours',
  'Valise ouverte H 40 x L 60 cm',
  'Tapis kilim L 200 x P 140 cm',
  'Boîte en bois, objets divers 30 x 20 x 10 cm',
  'Panneau laqué 120 x 60 x 4 cm',
  'Service de 24 pièces en porcelaine',
];

describe('processLot', () => {
  it('resolves a canvas painting', () => {
    const r = processLot({ lotId: 'A', description: 'Huile sur toile 162 x 130 cm' });
    expect(r.classification.kind).toBe('TwoD');
    expect(r.itemCount.value).toBe(1);
    expect(r.items).toEqual([{ index: 1, H: 130, L: 162, D: 5, P: null, Diameter: null }]);
    expect(r.flags).toEqual([]);
    expect(r.material).toBe('Canvas');
    expect(r.manualReviewRequired).toBe(false);
    expect(r.conversionLog).toEqual([
      'Extracted unlabeled_pair "162 x 130 cm": H=162, L=130',
      'No count signal found: ITEM_COUNT=1',
      'Classified 2D: technique "huile"',
      'L=max(H,L); D=5 (2D)',
    ]);
  });

  it('resolves a labeled bronze', () => {
    const r = processLot({ lotId: 'B', description: 'Bronze H 50 × L 40 × P 30 cm' });
    expect(r.classification.kind).toBe('ThreeD');
    expect(r.items[0]).toMatchObject({ H: 50, L: 40, D: 30 });
    expect(r.material).toBe('Bronze');
    expect(r.manualReviewRequired).toBe(false);
  });

  it('counts a pair and flags per-unit wording', () => {
    const r = processLot({ lotId: 'C', description: 'Paire de vases, chaque 30cm' });
    expect(r.itemCount.value).toBe(2);
    expect(r.flags.map((f) => f.code)).toEqual(['CHAQUE_DETECTED', 'NO_DIMENSIONS']);
    expect(r.manualReviewRequired).toBe(true);
  });

  it('keeps the larger of two sets for a single item', () => {
    const r = processLot({ lotId: 'D', description: '45×34cm (canvas) 80×34cm (avec cadre)' });
    expect(r.flags.map((f) => f.code)).toEqual(['MULTIPLE_DIMENSIONS_SINGLE_ITEM']);
    expect(r.items).toEqual([{ index: 1, H: 34, L: 80, D: 5, P: null, Diameter: null }]);
    expect(r.manualReviewRequired).toBe(true);
  });

  it('keeps furniture in a painting title from making it 3D', () => {
    const r = processLot({ lotId: 'D2', description: 'Huile sur toile, nature morte à la table, 60 x 80 cm' });
    expect(r.classification).toEqual({ kind: 'TwoD', rule: 'technique_2d', keyword: 'huile' });
    expect(r.items).toEqual([{ index: 1, H: 60, L: 80, D: 5, P: null, Diameter: null }]);
    expect(r.flags).toEqual([]);
  });

  it('routes a description without numbers to manual review', () => {
    const r = processLot({ lotId: 'E', description: 'Souvenir de voyage, provenance inconnue' });
    expect(r.itemCount.value).toBe(1);
    expect(r.classification.kind).toBe('Indeterminate');
    expect(r.flags.map((f) => f.code)).toEqual(['MATERIAL_UNKNOWN', 'NO_DIMENSIONS']);
    expect(r.manualReviewRequired).toBe(true);
  });

  it('flags a height-only object', () => {
    const r = processLot({ lotId: 'F', description: 'Canne, H 97 cm' });
    expect(r.flags.map((f) => f.code)).toEqual(['HEIGHT_ONLY_OBJECT']);
    expect(r.items[0]).toMatchObject({ H: 97, L: null, D: null });
    expect(r.manualReviewRequired).toBe(true);
  });

  it('does not read volume numbers as dimensions', () => {
    const r = processLot({ lotId: 'G', description: 'Livre ancien, tome 3' });
    expect(r.flags.map((f) => f.code)).toEqual(['BOOK_DIMENSION_CHECK', 'NO_DIMENSIONS']);
  });

  it('flags structural elements without requiring review', () => {
    const r = processLot({ lotId: 'H', description: 'Commode à trois tiroirs 85 x 120 x 50 cm' });
    expect(r.classification.rule).toBe('force_3d');
    expect(r.items[0]).toMatchObject({ H: 85, L: 120, D: 50 });
    expect(r.flags).toEqual([{ code: 'COMPLEX_STRUCTURE', reviewRequired: false }]);
    expect(r.manualReviewRequired).toBe(false);
  });

  it('flags state-dependent dimensions', () => {
    const r = processLot({ lotId: 'I', description: 'Valise ouverte H 40 x L 60 cm' });
    expect(r.flags.map((f) => f.code)).toContain('OPEN_CLOSED_DIMENSIONS');
  });

  it('flags a pair of curtains', () => {
    const r = processLot({ lotId: 'J', description: 'Paire de rideaux en velours' });
    expect(r.itemCount.value).toBe(2);
    expect(r.flags.map((f) => f.code)).toContain('CURTAIN_PAIR_COUNT');
  });

  it('accepts a numeric lot id and an empty description', () => {
    const r = processLot({ lotId: 12, description: '' });
    expect(r.lotId).toBe('12');
    expect(r.flags.map((f) => f.code)).toEqual(['MATERIAL_UNKNOWN', 'NO_DIMENSIONS']);
  });

  it('rejects a missing description', () => {
    expect(() => processLot({ lotId: 'K' })).toThrow(LotInputError);
    expect(() => processLot({ lotId: 'K' })).toThrow('[Lot] Invalid lot input: description: description is required');
  });

  it('rejects a blank lot id', () => {
    expect(() => processLot({ lotId: '  ', description: 'Vase' })).toThrow(LotInputError);
  });

  it('returns identical results for identical input', () => {
    for (const description of SAMPLE_DESCRIPTIONS) {
      const first = processLot({ lotId: 'X', description });
      const second = processLot({ lotId: 'X', description });
      expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    }
  });

  it('always yields exactly ITEM_COUNT items', () => {
    for (const description of SAMPLE_DESCRIPTIONS) {
      const r = processLot({ lotId: 'X', description });
      expect(r.items).toHaveLength(r.itemCount.value);
      expect(r.itemCount.value).toBeGreaterThanOrEqual(1);
    }
  });

  it('explains every flag in the conversion log', () => {
    for (const description of SAMPLE_DESCRIPTIONS) {
      const r = processLot({ lotId: 'X', description });
      for (const flag of r.flags) {
        expect(r.conversionLog.some((line) => line.startsWith(`${flag.code}: `))).toBe(true);
      }
    }
  });

  it('keeps 2D items flat with L >= H unless an override flag is set', () => {
    for (const description of SAMPLE_DESCRIPTIONS) {
      const r = processLot({ lotId: 'X', description });
      if (r.classification.kind !== 'TwoD') continue;
      if (r.flags.some((f) => TWO_D_OVERRIDE_FLAGS.has(f.code))) continue;
      for (const item of r.items) {
        expect(item.D).toBe(5);
        expect(item.L ?? 0).toBeGreaterThanOrEqual(item.H ?? 0);
      }
    }
  });

  it('requires review whenever the type is undetermined or a review flag is set', () => {
    for (const description of SAMPLE_DESCRIPTIONS) {
      const r = processLot({ lotId: 'X', description });
      const expected = r.classification.kind === 'Indeterminate' || r.flags.some((f) => f.reviewRequired);
      if (expected) expect(r.manualReviewRequired).toBe(true);
    }
  });
});
