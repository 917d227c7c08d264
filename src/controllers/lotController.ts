import { FastifyRequest, FastifyReply } from 'fastify';
import { BatchLotsRequestType, ProcessLotRequestType } from '../dtos/lotDtos';
import { processLot } from '../services/dimensions';
import { buildLotRows, DESCRIPTION_COLUMN, LOT_COLUMN, outputColumns } from '../services/lotTable/layout';

export const lotController = {
  async processLot(request: FastifyRequest<{ Body: ProcessLotRequestType }>, reply: FastifyReply) {
    const result = processLot(request.body, request.server.ruleSet);

    request.log.info(
      {
        lotId: result.lotId,
        itemCount: result.itemCount.value,
        itemType: result.classification.kind,
        flags: result.flags.map((f) => f.code),
        manualReviewRequired: result.manualReviewRequired,
      },
      'Lot processed'
    );

    return reply.send(result);
  },

  async processBatch(request: FastifyRequest<{ Body: BatchLotsRequestType }>, reply: FastifyReply) {
    const { lots } = request.body;
    const ruleSet = request.server.ruleSet;

    const results = lots.map((lot) => processLot(lot, ruleSet));
    const records = results.map((r) => ({ [LOT_COLUMN]: r.lotId, [DESCRIPTION_COLUMN]: r.description }));
    const { rows, itemColumns } = buildLotRows(records, results);

    const reviewCount = results.filter((r) => r.manualReviewRequired).length;
    request.log.info({ lots: lots.length, reviewCount, itemColumns }, 'Lot batch processed');

    return reply.send({
      results,
      rows,
      itemColumns,
      columns: outputColumns([LOT_COLUMN, DESCRIPTION_COLUMN], itemColumns),
    });
  },
};
