import Decimal from 'decimal.js';
import { z } from 'zod';
import { GraphClient } from '../lib/graph-client';
import { UpstreamUnavailableError } from '../lib/errors';
import type { PriceOracle } from './sources';

const ASSET_PAIR_QUERY = `
  query AssetPrice($asset: String!, $comparedAsset: String!) {
    assetPairs(first: 1, where: { asset: $asset, comparedAsset: $comparedAsset }) {
      currentPrice
    }
  }
`;

const assetPairsSchema = z.object({
  assetPairs: z.array(z.object({ currentPrice: z.union([z.string(), z.number()]) })),
});

export interface AssetPair {
  asset: string;
  comparedAsset: string;
}

/**
 * Token price in USD from a price subgraph's asset pair.
 */
export class SubgraphPriceOracle implements PriceOracle {
  constructor(
    private readonly client: GraphClient,
    private readonly pair: AssetPair
  ) {}

  async fetchPrice(): Promise<Decimal> {
    const data = await this.client.query(
      ASSET_PAIR_QUERY,
      { asset: this.pair.asset.toLowerCase(), comparedAsset: this.pair.comparedAsset.toLowerCase() },
      assetPairsSchema
    );

    const [pair] = data.assetPairs;
    if (!pair) {
      throw new UpstreamUnavailableError(
        this.client.serviceName,
        `no asset pair for ${this.pair.asset}/${this.pair.comparedAsset}`
      );
    }

    let price: Decimal;
    try {
      price = new Decimal(pair.currentPrice);
    } catch (error) {
      throw new UpstreamUnavailableError(this.client.serviceName, `unparseable price ${String(pair.currentPrice)}`, error);
    }

    if (!price.isFinite() || price.lessThanOrEqualTo(0)) {
      throw new UpstreamUnavailableError(this.client.serviceName, `unusable price ${price.toString()}`);
    }

    return price;
  }
}
