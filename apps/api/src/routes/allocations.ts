import type { FastifyPluginCallback } from 'fastify';
import { optimizerOptionsSchema } from '../config';
import { sendRouteError } from './route-errors';
import type { OptimizerRouteOptions } from './opportunities';

/**
 * Greedy allocation of a signal budget, with the wallet report when a wallet is given
 */
export const allocationRoutes: FastifyPluginCallback<OptimizerRouteOptions> = (app, opts, done) => {
  const { optimizer } = opts;

  app.post('/', async (request, reply) => {
    const parsed = optimizerOptionsSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return reply.status(400).send({
        error: 'Invalid request body',
        details: parsed.error.flatten(),
      });
    }

    try {
      const report = await optimizer.optimize(parsed.data);
      return { data: report };
    } catch (error) {
      return sendRouteError(request.log, reply, error, 'Failed to allocate signal');
    }
  });

  done();
};
