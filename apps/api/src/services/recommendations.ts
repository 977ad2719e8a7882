import type Decimal from 'decimal.js';
import { formatApr } from '../lib/units';
import type { Opportunity } from './opportunity-scorer';
import type { UserPosition } from './position-evaluator';

export type RecommendationKind = 'move' | 'increase';

export interface Recommendation {
  rank: number;
  kind: RecommendationKind;
  fromId: string;
  fromApr: Decimal;
  toId: string;
  toApr: Decimal;
  message: string;
}

/**
 * Compare the wallet's i-th best holding with the market's i-th best
 * opportunity, rank by rank. Pairs stop at the shorter of the two lists.
 */
export function generateRecommendations(
  positions: readonly UserPosition[],
  marketTop: readonly Opportunity[]
): Recommendation[] {
  const recommendations: Recommendation[] = [];
  const pairs = Math.min(positions.length, marketTop.length);

  for (let index = 0; index < pairs; index++) {
    const held = positions[index];
    const market = marketTop[index];
    const rank = index + 1;

    if (held.id !== market.id) {
      recommendations.push({
        rank,
        kind: 'move',
        fromId: held.id,
        fromApr: held.apr,
        toId: market.id,
        toApr: market.apr,
        message: `Consider moving signal from ${held.id} (APR: ${formatApr(held.apr)}%) to ${market.id} (APR: ${formatApr(market.apr)}%)`,
      });
    } else if (held.apr.lessThan(market.apr)) {
      recommendations.push({
        rank,
        kind: 'increase',
        fromId: held.id,
        fromApr: held.apr,
        toId: market.id,
        toApr: market.apr,
        message: `Consider increasing your signal on ${held.id} to improve APR from ${formatApr(held.apr)}% to ${formatApr(market.apr)}%`,
      });
    }
  }

  return recommendations;
}
