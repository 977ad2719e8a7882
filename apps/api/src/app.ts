import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';

import { env } from './config';
import { CurationOptimizer } from './services/curation-optimizer';
import { createDefaultSources } from './services/default-sources';
import type { OptimizerSources } from './services/source-cache';
import { opportunityRoutes } from './routes/opportunities';
import { walletRoutes } from './routes/wallets';
import { allocationRoutes } from './routes/allocations';

export interface BuildAppOptions {
  enableRequestLogging?: boolean;
  /** Override the data sources, e.g. with in-memory fakes */
  sources?: OptimizerSources;
}

export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: options.enableRequestLogging ?? true,
  });

  await app.register(cors, {
    origin: true,
  });

  const optimizer = new CurationOptimizer(options.sources ?? createDefaultSources(env));

  app.get('/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  await app.register(opportunityRoutes, { prefix: '/v1/opportunities', optimizer });
  await app.register(walletRoutes, { prefix: '/v1/wallets', optimizer });
  await app.register(allocationRoutes, { prefix: '/v1/allocations', optimizer });

  return app;
}
