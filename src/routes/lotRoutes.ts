import { FastifyInstance } from 'fastify';
import { ZodTypeProvider } from 'fastify-type-provider-zod';
import { lotController } from '../controllers/lotController';
import { BatchLotsRequest, ProcessLotRequest } from '../dtos/lotDtos';
import { defaultRuleSet, type RuleSet } from '../config/ruleSet';

export type LotRoutesOptions = {
  ruleSet?: RuleSet;
};

export default async function lotRoutes(fastify: FastifyInstance, opts: LotRoutesOptions) {
  // Scoped to this plugin; handlers read it through request.server.
  fastify.decorate('ruleSet', opts.ruleSet ?? defaultRuleSet);

  const app = fastify.withTypeProvider<ZodTypeProvider>();

  app.post(
    '/process',
    {
      schema: {
        body: ProcessLotRequest,
      },
    },
    lotController.processLot
  );

  app.post(
    '/batch',
    {
      schema: {
        body: BatchLotsRequest,
      },
    },
    lotController.processBatch
  );
}
