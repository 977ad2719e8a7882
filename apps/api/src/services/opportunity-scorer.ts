/**
 * Opportunity Scorer
 *
 * Turns deployments, trailing query volume and the token price into a list of
 * curation opportunities ranked by APR:
 * - annual queries = weekly queries * 52
 * - total earnings = $4 per 100k annual queries
 * - curator share = 10% of total earnings
 * - APR = this stake's share of the curator pool / stake value
 */

import Decimal from 'decimal.js';
import { UpstreamUnavailableError } from '../lib/errors';
import { fromMinorUnits, safeDiv } from '../lib/units';
import type { Deployment, RawDeployment, UsageAggregate } from './sources';

export const WEEKS_PER_YEAR = 52;
export const USD_PER_QUERY_BATCH = new Decimal(4);
export const QUERIES_PER_BATCH = 100000;
export const CURATOR_SHARE_RATE = new Decimal(0.1);

export interface Opportunity {
  readonly id: string;
  readonly signalAmount: Decimal;
  readonly signalledTokens: Decimal;
  readonly weeklyQueries: number;
  readonly weeklyFees: number;
  readonly annualQueries: Decimal;
  readonly totalEarnings: Decimal;
  readonly curatorShare: Decimal;
  readonly portionOwned: Decimal;
  readonly estimatedEarnings: Decimal;
  readonly apr: Decimal;
}

export interface YieldEstimate {
  portionOwned: Decimal;
  estimatedEarnings: Decimal;
  apr: Decimal;
}

/**
 * Share of a curator pool earned by `stake` out of `pool` total signal.
 * Zero denominators resolve to 0 rather than throwing.
 */
export function estimateYield(params: {
  curatorShare: Decimal;
  stake: Decimal;
  pool: Decimal;
  price: Decimal;
}): YieldEstimate {
  const { curatorShare, stake, pool, price } = params;

  const portionOwned = safeDiv(stake, pool);
  const estimatedEarnings = curatorShare.times(portionOwned);
  const apr = safeDiv(estimatedEarnings, stake.times(price)).times(100);

  return { portionOwned, estimatedEarnings, apr };
}

/**
 * Stable descending sort by APR; equal APRs keep their input order.
 */
export function rankByApr<T extends { apr: Decimal }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => b.apr.comparedTo(a.apr));
}

export function assertValidPrice(price: Decimal): void {
  if (!price.isFinite() || price.lessThanOrEqualTo(0)) {
    throw new UpstreamUnavailableError('price-oracle', `unusable token price ${price.toString()}`);
  }
}

export function convertRawDeployments(raw: readonly RawDeployment[]): Deployment[] {
  return raw.map((deployment) => {
    try {
      return {
        id: deployment.id,
        signalAmount: fromMinorUnits(deployment.signalAmountRaw),
        signalledTokens: fromMinorUnits(deployment.signalledTokensRaw),
      };
    } catch (error) {
      throw new UpstreamUnavailableError(
        'deployment-source',
        `deployment ${deployment.id} has malformed signal amounts`,
        error
      );
    }
  });
}

export function scoreOpportunities(
  deployments: readonly Deployment[],
  usage: UsageAggregate,
  price: Decimal
): Opportunity[] {
  assertValidPrice(price);

  const opportunities: Opportunity[] = [];

  for (const deployment of deployments) {
    const weeklyQueries = usage.queryCounts.get(deployment.id);
    // No usage records in the window: not an opportunity at all
    if (weeklyQueries === undefined) {
      continue;
    }
    if (!Number.isFinite(weeklyQueries) || weeklyQueries < 0) {
      throw new UpstreamUnavailableError(
        'usage-aggregator',
        `query count for ${deployment.id} is not a non-negative number`
      );
    }

    const annualQueries = new Decimal(weeklyQueries).times(WEEKS_PER_YEAR);
    const totalEarnings = annualQueries.div(QUERIES_PER_BATCH).times(USD_PER_QUERY_BATCH);
    const curatorShare = totalEarnings.times(CURATOR_SHARE_RATE);

    const { portionOwned, estimatedEarnings, apr } = estimateYield({
      curatorShare,
      stake: deployment.signalAmount,
      pool: deployment.signalledTokens,
      price,
    });

    opportunities.push({
      id: deployment.id,
      signalAmount: deployment.signalAmount,
      signalledTokens: deployment.signalledTokens,
      weeklyQueries,
      weeklyFees: usage.queryFees.get(deployment.id) ?? 0,
      annualQueries,
      totalEarnings,
      curatorShare,
      portionOwned,
      estimatedEarnings,
      apr,
    });
  }

  return rankByApr(opportunities.filter((opportunity) => opportunity.signalAmount.greaterThan(0)));
}
