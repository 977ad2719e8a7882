import type { FastifyPluginCallback } from 'fastify';
import { z } from 'zod';
import { env } from '../config';
import type { CurationOptimizer } from '../services/curation-optimizer';
import { sendRouteError } from './route-errors';

const listOpportunitiesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(50),
  minWeeklyQueries: z.coerce.number().nonnegative().default(0),
  windowDays: z.coerce.number().positive().default(env.DEFAULT_WINDOW_DAYS),
});

export interface OptimizerRouteOptions {
  optimizer: CurationOptimizer;
}

/**
 * Ranked curation opportunities for the current market
 */
export const opportunityRoutes: FastifyPluginCallback<OptimizerRouteOptions> = (app, opts, done) => {
  const { optimizer } = opts;

  app.get('/', async (request, reply) => {
    const parsed = listOpportunitiesQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Invalid query parameters',
        details: parsed.error.flatten(),
      });
    }

    const query = parsed.data;

    try {
      const market = await optimizer.scoreMarket(query.windowDays);
      const opportunities = market.opportunities.filter(
        (opportunity) => opportunity.weeklyQueries >= query.minWeeklyQueries
      );

      return {
        data: opportunities.slice(0, query.limit),
        meta: {
          price: market.price,
          windowDays: market.windowDays,
          total: opportunities.length,
        },
      };
    } catch (error) {
      return sendRouteError(request.log, reply, error, 'Failed to score opportunities');
    }
  });

  done();
};
