import Decimal from 'decimal.js';
import { safeDiv } from '../lib/units';
import { estimateYield, rankByApr, type Opportunity } from './opportunity-scorer';
import type { WalletSignals } from './sources';

export interface UserPosition {
  readonly id: string;
  readonly userSignal: Decimal;
  readonly totalSignal: Decimal;
  readonly portionOwned: Decimal;
  readonly estimatedEarnings: Decimal;
  readonly apr: Decimal;
  readonly weeklyQueries: number;
}

export interface PositionSummary {
  totalSignal: Decimal;
  totalValueUsd: Decimal;
  totalEstimatedEarnings: Decimal;
  overallApr: Decimal;
}

export interface PositionEvaluation {
  positions: UserPosition[];
  summary: PositionSummary;
}

/**
 * Realized share and yield of a wallet's existing signal on each scored
 * opportunity it holds. Holdings on deployments that were not scored are ignored.
 */
export function evaluatePositions(
  walletSignals: WalletSignals,
  opportunities: readonly Opportunity[],
  price: Decimal
): PositionEvaluation {
  const positions: UserPosition[] = [];

  for (const opportunity of opportunities) {
    const userSignal = walletSignals.get(opportunity.id);
    if (userSignal === undefined) {
      continue;
    }

    const { portionOwned, estimatedEarnings, apr } = estimateYield({
      curatorShare: opportunity.curatorShare,
      stake: userSignal,
      pool: opportunity.signalledTokens,
      price,
    });

    positions.push({
      id: opportunity.id,
      userSignal,
      totalSignal: opportunity.signalledTokens,
      portionOwned,
      estimatedEarnings,
      apr,
      weeklyQueries: opportunity.weeklyQueries,
    });
  }

  const ranked = rankByApr(positions);

  return {
    positions: ranked,
    summary: summarizePositions(ranked, price),
  };
}

export function summarizePositions(positions: readonly UserPosition[], price: Decimal): PositionSummary {
  const totalSignal = positions.reduce((sum, position) => sum.plus(position.userSignal), new Decimal(0));
  const totalEstimatedEarnings = positions.reduce(
    (sum, position) => sum.plus(position.estimatedEarnings),
    new Decimal(0)
  );
  const totalValueUsd = totalSignal.times(price);

  return {
    totalSignal,
    totalValueUsd,
    totalEstimatedEarnings,
    overallApr: safeDiv(totalEstimatedEarnings, totalValueUsd).times(100),
  };
}
