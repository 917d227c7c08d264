import { z } from 'zod';
import { defaultRuleSet, type RuleSet } from '../../config/ruleSet';
import { classifyMaterial, extractMaterials } from './classifier';
import { inferItemCount } from './countInference';
import { extractDimensionSets } from './extractor';
import { resolveDimensions } from './resolver';
import { computeManualReviewRequired, LotTrace } from './trace';
import type { LotInput, LotResult } from './types';

export class LotInputError extends Error {
  readonly code = 'INVALID_LOT_INPUT';
  readonly statusCode = 400;

  constructor(message: string) {
    super(message);
    this.name = 'LotInputError';
  }
}

const lotInputSchema = z.object({
  lotId: z.union([z.string().trim().min(1), z.number().finite()]).transform((v) => String(v)),
  description: z.string({
    required_error: 'description is required',
    invalid_type_error: 'description must be a string',
  }),
});

/**
 * Caller contract check. Any text is acceptable (even empty); a missing or
 * non-string description is not, since it would produce a misleading record.
 */
export function assertLotInput(input: unknown): LotInput {
  const parsed = lotInputSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new LotInputError(`[Lot] Invalid lot input: ${detail}`);
  }
  return parsed.data;
}

/**
 * Runs the full pipeline on one lot description:
 * extraction -> count -> classification -> resolution -> flags/log.
 *
 * Pure: the same input and rule set always give the same result.
 */
export function processLot(input: unknown, ruleSet: RuleSet = defaultRuleSet): LotResult {
  const { lotId, description } = assertLotInput(input);
  const trace = new LotTrace();

  const sets = extractDimensionSets(description, trace);
  const itemCount = inferItemCount(description, ruleSet, trace);
  const classification = classifyMaterial(description, ruleSet, trace);
  const items = resolveDimensions({ text: description, sets, itemCount, classification, ruleSet }, trace);

  const flags = trace.flags;
  return {
    lotId,
    description,
    itemCount,
    classification,
    material: extractMaterials(description, ruleSet),
    items,
    flags,
    conversionLog: trace.log,
    manualReviewRequired: computeManualReviewRequired({ classification, flags, items }),
  };
}

export { ITEM_TYPE_LABELS } from './classifier';
export { formatConversionLog, formatFlags } from './trace';
export type {
  Classification,
  ClassificationKind,
  DimensionAxis,
  FlagCode,
  ItemCount,
  LotInput,
  LotResult,
  ProcessingFlag,
  RawDimensionSet,
  ResolvedItem,
} from './types';
