import type { Env } from '../config';
import { GraphClient } from '../lib/graph-client';
import { createLogger } from '../lib/logger';
import { NetworkSubgraphClient } from './network-subgraph';
import { SubgraphPriceOracle } from './price-oracle';
import { CsvQueryVolumeAggregator } from './query-volume';
import { withSourceCache, type OptimizerSources } from './source-cache';

/**
 * Production wiring: Graph gateway subgraphs for deployments, wallets and price,
 * CSV exports on disk for query volume, all behind the TTL cache.
 */
export function createDefaultSources(env: Env): OptimizerSources {
  const clientDefaults = {
    apiKey: env.THE_GRAPH_API_KEY,
    timeout: env.REQUEST_TIMEOUT_MS,
    retries: env.MAX_RETRY_ATTEMPTS,
    retryDelay: env.RETRY_BASE_DELAY_MS,
  };

  const network = new NetworkSubgraphClient(
    new GraphClient(
      { serviceName: 'network-subgraph', url: env.NETWORK_SUBGRAPH_URL, ...clientDefaults },
      createLogger({ service: 'network-subgraph' })
    )
  );

  const price = new SubgraphPriceOracle(
    new GraphClient(
      { serviceName: 'price-subgraph', url: env.PRICE_SUBGRAPH_URL, ...clientDefaults },
      createLogger({ service: 'price-subgraph' })
    ),
    { asset: env.GRT_ASSET_ADDRESS, comparedAsset: env.USD_ASSET_ADDRESS }
  );

  const usage = new CsvQueryVolumeAggregator(env.QUERY_VOLUME_DIR, createLogger({ service: 'query-volume' }));

  return withSourceCache(
    { deployments: network, usage, price, wallets: network },
    env.SOURCE_CACHE_TTL_SECONDS
  );
}
