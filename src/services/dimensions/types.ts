export type LotInput = {
  lotId: string;
  description: string;
};

export type DimensionAxis = 'H' | 'L' | 'D' | 'P' | 'Diameter';

export const DIMENSION_AXES: readonly DimensionAxis[] = ['H', 'L', 'D', 'P', 'Diameter'];

export type DimensionValues = Partial<Record<DimensionAxis, number>>;

/** Notation a raw set was read from, highest confidence first. */
export type DimensionNotation =
  | 'labeled'
  | 'unlabeled_triplet'
  | 'height_diameter'
  | 'unlabeled_pair'
  | 'diameter'
  | 'scattered';

export type RawDimensionSet = {
  /** Centimetres. */
  values: DimensionValues;
  notation: DimensionNotation;
  /** Matched text, as it appeared in the segment. */
  source: string;
  segment: number;
  offset: number;
  /** Parenthetical scoping the set, e.g. "avec cadre". */
  qualifier?: string;
};

export type ItemCountSource = 'set_idiom' | 'pair_idiom' | 'number_word' | 'digits' | 'default';

export type ItemCount = {
  value: number;
  source: ItemCountSource;
  /** "chaque"/"each" seen: dimensions may be per unit and the total unverified. */
  ambiguous: boolean;
};

export type ClassificationKind = 'TwoD' | 'ThreeD' | 'Indeterminate';

export type ClassificationRule =
  | 'force_3d'
  | 'assemblage'
  | 'technique_2d'
  | 'support_2d'
  | 'framed_for_removal'
  | 'object_3d'
  | 'panel'
  | 'no_keyword';

export type Classification = {
  kind: ClassificationKind;
  rule: ClassificationRule;
  keyword: string | null;
};

export type ResolvedItem = {
  index: number;
  H: number | null;
  L: number | null;
  D: number | null;
  P: number | null;
  Diameter: number | null;
};

export type ProcessingFlag = {
  code: FlagCode;
  reviewRequired: boolean;
};

export type FlagCode =
  | 'NO_DIMENSIONS'
  | 'CHAQUE_DETECTED'
  | 'MULTIPLE_DIMENSIONS_SINGLE_ITEM'
  | 'HEIGHT_ONLY_OBJECT'
  | 'PARTIAL_DIMENSIONS'
  | 'HIGH_COUNT'
  | 'ASSEMBLAGE_3D_MANUAL_CHECK'
  | 'MATERIAL_UNKNOWN'
  | 'FASHION_ITEM'
  | 'D_NOTATION_DEPTH'
  | 'RUG_L_P_PATTERN'
  | 'CURTAIN_PAIR_COUNT'
  | 'BOOK_DIMENSION_CHECK'
  | 'DIMENSION_COUNT_MISMATCH'
  | 'OPEN_CLOSED_DIMENSIONS'
  | 'PANEL_OBJECT_3D'
  | 'DEPTH_DERIVED_FROM_LENGTH'
  | 'DIMENSIONS_REPLICATED'
  | 'COMPLEX_STRUCTURE';

export type LotResult = {
  lotId: string;
  description: string;
  itemCount: ItemCount;
  classification: Classification;
  /** English material names, comma separated. */
  material: string;
  items: ResolvedItem[];
  flags: ProcessingFlag[];
  conversionLog: string[];
  manualReviewRequired: boolean;
};
