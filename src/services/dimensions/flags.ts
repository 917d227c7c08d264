import type { FlagCode } from './types';

type FlagDefinition = {
  reviewRequired: boolean;
  description: string;
};

export const FLAG_DEFINITIONS: Record<FlagCode, FlagDefinition> = {
  NO_DIMENSIONS: { reviewRequired: true, description: 'No dimension could be extracted' },
  CHAQUE_DETECTED: { reviewRequired: true, description: 'Per-unit wording; total count unverified' },
  MULTIPLE_DIMENSIONS_SINGLE_ITEM: { reviewRequired: true, description: 'Several dimension sets for one item' },
  HEIGHT_ONLY_OBJECT: { reviewRequired: true, description: 'Only a height was given' },
  PARTIAL_DIMENSIONS: { reviewRequired: true, description: 'A shipping axis is missing' },
  HIGH_COUNT: { reviewRequired: true, description: 'Item count too high for per-item replication' },
  ASSEMBLAGE_3D_MANUAL_CHECK: { reviewRequired: true, description: 'Assemblage depth cannot be estimated' },
  MATERIAL_UNKNOWN: { reviewRequired: true, description: 'No material or technique keyword' },
  FASHION_ITEM: { reviewRequired: true, description: 'Garment sizing is not a shipping dimension' },
  D_NOTATION_DEPTH: { reviewRequired: true, description: 'D label could be depth or diameter' },
  RUG_L_P_PATTERN: { reviewRequired: true, description: 'Rug given as L x P; flat or rolled shipping unknown' },
  CURTAIN_PAIR_COUNT: { reviewRequired: true, description: 'Pair of curtains may ship as one unit' },
  BOOK_DIMENSION_CHECK: { reviewRequired: true, description: 'Only numeric content looks like a volume number' },
  DIMENSION_COUNT_MISMATCH: { reviewRequired: true, description: 'Dimension sets do not match the item count' },
  OPEN_CLOSED_DIMENSIONS: { reviewRequired: true, description: 'Dimensions depend on open/closed state' },
  PANEL_OBJECT_3D: { reviewRequired: false, description: 'Panel treated as flat; measured depth kept' },
  DEPTH_DERIVED_FROM_LENGTH: { reviewRequired: false, description: 'Depth approximated from length' },
  DIMENSIONS_REPLICATED: { reviewRequired: false, description: 'One dimension set copied to every item' },
  COMPLEX_STRUCTURE: { reviewRequired: false, description: 'Drawers, mirrors or compartments' },
};

/** Flags under which a 2D item may legitimately deviate from the placeholder depth or L >= H. */
export const TWO_D_OVERRIDE_FLAGS: ReadonlySet<FlagCode> = new Set<FlagCode>([
  'PANEL_OBJECT_3D',
  'NO_DIMENSIONS',
  'HEIGHT_ONLY_OBJECT',
  'PARTIAL_DIMENSIONS',
]);

export function isReviewRequired(code: FlagCode): boolean {
  return FLAG_DEFINITIONS[code].reviewRequired;
}
