import type { SelectionPolicyName } from '../../config/ruleSet';
import type { DimensionValues, RawDimensionSet } from './types';

export type SelectionPolicy = {
  name: SelectionPolicyName;
  label: string;
  measure: (values: DimensionValues) => number;
};

/** H and L, or the diameter twice for round pieces. */
function planar(values: DimensionValues): [number, number] {
  if (values.H !== undefined || values.L !== undefined) return [values.H ?? 0, values.L ?? 0];
  const d = values.Diameter ?? 0;
  return [d, d];
}

export const SELECTION_POLICIES: Record<SelectionPolicyName, SelectionPolicy> = {
  max_height_length: {
    name: 'max_height_length',
    label: 'max(H,L)',
    measure: (values) => Math.max(...planar(values)),
  },
  max_area: {
    name: 'max_area',
    label: 'max(H×L)',
    measure: (values) => {
      const [h, l] = planar(values);
      return h * l;
    },
  },
  max_axis: {
    name: 'max_axis',
    label: 'max(any axis)',
    measure: (values) => Math.max(0, ...Object.values(values).filter((v): v is number => v !== undefined)),
  },
};

/**
 * Index of the set the policy ranks largest. Ties keep the earliest set.
 * Returns -1 for an empty list.
 */
export function selectDimensionSet(sets: RawDimensionSet[], policy: SelectionPolicy): number {
  let best = -1;
  let bestMeasure = -Infinity;
  sets.forEach((set, i) => {
    const m = policy.measure(set.values);
    if (m > bestMeasure) {
      best = i;
      bestMeasure = m;
    }
  });
  return best;
}
