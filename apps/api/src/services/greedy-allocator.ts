/**
 * Greedy Allocator
 *
 * Spends a budget of new signal across the top opportunities one step at a
 * time. Each step goes to the candidate whose APR would be highest after
 * receiving it. Adding signal dilutes the share curve, so the chosen candidate
 * moves around as allocations grow.
 *
 * The heuristic is myopic: it never looks past the next step, so it can land
 * short of the best split when two candidates' curves cross.
 */

import Decimal from 'decimal.js';
import { ValidationError } from '../lib/errors';
import { safeDiv } from '../lib/units';
import {
  WEEKS_PER_YEAR,
  assertValidPrice,
  estimateYield,
  rankByApr,
  type Opportunity,
} from './opportunity-scorer';

export const DAYS_PER_YEAR = 365;
export const MONTHS_PER_YEAR = 12;
/** Upper bound on greedy steps per pass; the loop runs synchronously */
export const MAX_ALLOCATION_ITERATIONS = 1000000;

export interface CandidateSelection {
  candidates: Opportunity[];
  requested: number;
  available: number;
  /** Fewer opportunities passed the filter than were requested */
  insufficient: boolean;
}

export interface AllocationEntry {
  id: string;
  signalBefore: Decimal;
  signalAfter: Decimal;
  signalledTokensBefore: Decimal;
  signalledTokensAfter: Decimal;
  aprBefore: Decimal;
  /** null when the candidate received nothing */
  aprAfter: Decimal | null;
  earningsAfter: Decimal;
  allocated: Decimal;
  weeklyQueries: number;
}

export interface EarningsBreakdown {
  perDay: Decimal;
  perWeek: Decimal;
  perMonth: Decimal;
  perYear: Decimal;
}

export interface AllocationPlan {
  entries: AllocationEntry[];
  budget: Decimal;
  step: Decimal;
  price: Decimal;
  totalAllocated: Decimal;
  iterations: number;
  earnings: EarningsBreakdown;
  overallApr: Decimal;
}

export function selectCandidates(
  opportunities: readonly Opportunity[],
  options: { candidateCount: number; minWeeklyQueries: number }
): CandidateSelection {
  const { candidateCount, minWeeklyQueries } = options;
  if (!Number.isInteger(candidateCount) || candidateCount < 1) {
    throw new ValidationError('Invalid candidate count', {
      candidateCount: ['must be an integer of at least 1'],
    });
  }

  const eligible = rankByApr(
    opportunities.filter((opportunity) => opportunity.weeklyQueries >= minWeeklyQueries)
  );

  return {
    candidates: eligible.slice(0, candidateCount),
    requested: candidateCount,
    available: eligible.length,
    insufficient: eligible.length < candidateCount,
  };
}

export function breakdownEarnings(annual: Decimal): EarningsBreakdown {
  return {
    perDay: annual.div(DAYS_PER_YEAR),
    perWeek: annual.div(WEEKS_PER_YEAR),
    perMonth: annual.div(MONTHS_PER_YEAR),
    perYear: annual,
  };
}

export function allocateBudget(
  candidates: readonly Opportunity[],
  price: Decimal,
  options: { budget: Decimal.Value; step: Decimal.Value }
): AllocationPlan {
  const budget = new Decimal(options.budget);
  const step = new Decimal(options.step);

  if (!budget.isFinite() || budget.isNegative()) {
    throw new ValidationError('Invalid budget', { budget: ['must be a non-negative number'] });
  }
  if (!step.isFinite() || step.lessThanOrEqualTo(0)) {
    throw new ValidationError('Invalid allocation step', { step: ['must be a positive number'] });
  }
  if (budget.div(step).ceil().greaterThan(MAX_ALLOCATION_ITERATIONS)) {
    throw new ValidationError('Too many allocation steps', {
      budget: [`budget / step must not exceed ${MAX_ALLOCATION_ITERATIONS} allocation steps`],
    });
  }
  assertValidPrice(price);

  const allocations = candidates.map(() => new Decimal(0));
  let remaining = budget;
  let iterations = 0;

  while (remaining.greaterThan(0)) {
    let bestApr = new Decimal(-1);
    let bestIndex = -1;

    for (const [index, candidate] of candidates.entries()) {
      const stake = candidate.signalAmount.plus(allocations[index]).plus(step);
      const pool = candidate.signalledTokens.plus(allocations[index]).plus(step);
      const { apr } = estimateYield({ curatorShare: candidate.curatorShare, stake, pool, price });

      if (apr.greaterThan(bestApr)) {
        bestApr = apr;
        bestIndex = index;
      }
    }

    if (bestIndex === -1) {
      break;
    }

    allocations[bestIndex] = allocations[bestIndex].plus(Decimal.min(step, remaining));
    // Always the full step, even when less than a step was committed
    remaining = remaining.minus(step);
    iterations++;
  }

  const entries = candidates.map((candidate, index): AllocationEntry => {
    const allocated = allocations[index];
    const signalAfter = candidate.signalAmount.plus(allocated);
    const signalledTokensAfter = candidate.signalledTokens.plus(allocated);
    const after = estimateYield({
      curatorShare: candidate.curatorShare,
      stake: signalAfter,
      pool: signalledTokensAfter,
      price,
    });

    return {
      id: candidate.id,
      signalBefore: candidate.signalAmount,
      signalAfter,
      signalledTokensBefore: candidate.signalledTokens,
      signalledTokensAfter,
      aprBefore: candidate.apr,
      aprAfter: allocated.greaterThan(0) ? after.apr : null,
      earningsAfter: after.estimatedEarnings,
      allocated,
      weeklyQueries: candidate.weeklyQueries,
    };
  });

  const totalAllocated = allocations.reduce((sum, amount) => sum.plus(amount), new Decimal(0));
  const totalEarningsAfter = entries.reduce((sum, entry) => sum.plus(entry.earningsAfter), new Decimal(0));

  return {
    entries,
    budget,
    step,
    price,
    totalAllocated,
    iterations,
    earnings: breakdownEarnings(totalEarningsAfter),
    overallApr: safeDiv(totalEarningsAfter, budget.times(price)).times(100),
  };
}
