import z from 'zod';
import { config } from '../config/env';

// Shape only; description content is never rejected (an empty text is a valid lot).
export const LotRequest = z.object({
  lotId: z.union([z.string().min(1, 'lotId is required'), z.number()]),
  description: z.string(),
});

export const ProcessLotRequest = LotRequest;

export type ProcessLotRequestType = z.infer<typeof ProcessLotRequest>;

export const BatchLotsRequest = z.object({
  lots: z
    .array(LotRequest)
    .min(1, 'At least one lot is required')
    .max(config.BATCH_MAX_LOTS, `At most ${config.BATCH_MAX_LOTS} lots per batch`),
});

export type BatchLotsRequestType = z.infer<typeof BatchLotsRequest>;
