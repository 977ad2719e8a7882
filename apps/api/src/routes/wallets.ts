import type { FastifyPluginCallback } from 'fastify';
import { z } from 'zod';
import { env, walletAddressSchema } from '../config';
import { sendRouteError } from './route-errors';
import type { OptimizerRouteOptions } from './opportunities';

const walletParamsSchema = z.object({
  address: walletAddressSchema,
});

const positionsQuerySchema = z.object({
  topN: z.coerce.number().int().min(1).default(env.DEFAULT_TOP_N),
  windowDays: z.coerce.number().positive().default(env.DEFAULT_WINDOW_DAYS),
});

/**
 * A curator wallet's current positions and rank-by-rank suggestions
 */
export const walletRoutes: FastifyPluginCallback<OptimizerRouteOptions> = (app, opts, done) => {
  const { optimizer } = opts;

  app.get('/:address/positions', async (request, reply) => {
    const params = walletParamsSchema.safeParse(request.params);
    if (!params.success) {
      return reply.status(400).send({
        error: 'Invalid wallet address',
        details: params.error.flatten(),
      });
    }

    const query = positionsQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.status(400).send({
        error: 'Invalid query parameters',
        details: query.error.flatten(),
      });
    }

    try {
      const market = await optimizer.scoreMarket(query.data.windowDays);
      const report = await optimizer.evaluateWallet(params.data.address, market, query.data.topN);

      return {
        data: report,
        meta: {
          price: market.price,
          windowDays: market.windowDays,
        },
      };
    } catch (error) {
      return sendRouteError(request.log, reply, error, 'Failed to evaluate wallet');
    }
  });

  done();
};
