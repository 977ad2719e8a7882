import NodeCache from 'node-cache';
import type Decimal from 'decimal.js';
import type {
  DeploymentSource,
  PriceOracle,
  RawDeployment,
  UsageAggregate,
  UsageAggregator,
  WalletSignals,
  WalletSignalSource,
} from './sources';

export interface OptimizerSources {
  deployments: DeploymentSource;
  usage: UsageAggregator;
  price: PriceOracle;
  wallets: WalletSignalSource;
}

/**
 * TTL memoisation in front of the remote sources. Failures are not cached.
 * Values are stored by reference; callers never mutate them.
 */
export class CachedSources implements DeploymentSource, UsageAggregator, PriceOracle, WalletSignalSource {
  private readonly cache: NodeCache;

  constructor(
    private readonly sources: OptimizerSources,
    ttlSeconds: number
  ) {
    this.cache = new NodeCache({
      stdTTL: ttlSeconds,
      checkperiod: Math.max(ttlSeconds * 2, 60),
      useClones: false,
    });
  }

  fetchDeployments(): Promise<RawDeployment[]> {
    return this.remember('deployments', () => this.sources.deployments.fetchDeployments());
  }

  aggregate(windowDays: number): Promise<UsageAggregate> {
    return this.remember(`usage:${windowDays}`, () => this.sources.usage.aggregate(windowDays));
  }

  fetchPrice(): Promise<Decimal> {
    return this.remember('price', () => this.sources.price.fetchPrice());
  }

  fetchWalletSignals(wallet: string): Promise<WalletSignals> {
    return this.remember(`wallet:${wallet.toLowerCase()}`, () => this.sources.wallets.fetchWalletSignals(wallet));
  }

  private async remember<T>(key: string, load: () => Promise<T>): Promise<T> {
    const cached = this.cache.get<T>(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await load();
    this.cache.set(key, value);
    return value;
  }
}

/**
 * Wrap the sources in a TTL cache. A TTL of 0 disables caching (node-cache
 * would otherwise treat 0 as "never expire").
 */
export function withSourceCache(sources: OptimizerSources, ttlSeconds: number): OptimizerSources {
  if (ttlSeconds <= 0) {
    return sources;
  }

  const cached = new CachedSources(sources, ttlSeconds);
  return { deployments: cached, usage: cached, price: cached, wallets: cached };
}
