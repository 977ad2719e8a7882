/**
 * Curation Optimizer
 *
 * Runs one optimization pass: fetch deployments, query volume and price,
 * score the market, evaluate an optional wallet against it, and allocate a
 * budget of new signal across the top candidates.
 */

import type Decimal from 'decimal.js';
import { optimizerOptionsSchema, type OptimizerOptions, type OptimizerOptionsInput } from '../config';
import { UpstreamUnavailableError, ValidationError, describeError } from '../lib/errors';
import { createLogger, type Logger } from '../lib/logger';
import { allocateBudget, selectCandidates, type AllocationPlan } from './greedy-allocator';
import { convertRawDeployments, scoreOpportunities, type Opportunity } from './opportunity-scorer';
import { evaluatePositions, type PositionSummary, type UserPosition } from './position-evaluator';
import { generateRecommendations, type Recommendation } from './recommendations';
import type { OptimizerSources } from './source-cache';

export interface MarketSnapshot {
  price: Decimal;
  opportunities: Opportunity[];
  windowDays: number;
}

export interface WalletReport {
  address: string;
  positions: UserPosition[];
  summary: PositionSummary;
  recommendations: Recommendation[];
}

export interface OptimizationReport {
  generatedAt: Date;
  options: OptimizerOptions;
  price: Decimal;
  opportunityCount: number;
  selection: {
    requested: number;
    available: number;
    insufficient: boolean;
  };
  allocation: AllocationPlan;
  wallet: WalletReport | null;
  warnings: string[];
}

export function parseOptimizerOptions(input: OptimizerOptionsInput): OptimizerOptions {
  const parsed = optimizerOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const errors: Record<string, string[]> = {};
    for (const issue of parsed.error.issues) {
      const key = issue.path.join('.') || 'options';
      (errors[key] ??= []).push(issue.message);
    }
    throw new ValidationError('Invalid optimizer options', errors);
  }
  return parsed.data;
}

async function fromSource<T>(source: string, load: Promise<T>): Promise<T> {
  try {
    return await load;
  } catch (error) {
    if (error instanceof UpstreamUnavailableError) {
      throw error;
    }
    throw new UpstreamUnavailableError(source, describeError(error), error);
  }
}

export class CurationOptimizer {
  constructor(
    private readonly sources: OptimizerSources,
    private readonly logger: Logger = createLogger({ service: 'curation-optimizer' })
  ) {}

  async scoreMarket(windowDays: number): Promise<MarketSnapshot> {
    const [rawDeployments, usage, price] = await Promise.all([
      fromSource('deployment-source', this.sources.deployments.fetchDeployments()),
      fromSource('usage-aggregator', this.sources.usage.aggregate(windowDays)),
      fromSource('price-oracle', this.sources.price.fetchPrice()),
    ]);

    const opportunities = scoreOpportunities(convertRawDeployments(rawDeployments), usage, price);

    this.logger.info(
      {
        deployments: rawDeployments.length,
        deploymentsWithUsage: usage.queryCounts.size,
        opportunities: opportunities.length,
        price: price.toString(),
        windowDays,
      },
      'Scored curation opportunities'
    );

    return { price, opportunities, windowDays };
  }

  async evaluateWallet(
    address: string,
    market: MarketSnapshot,
    topN: number
  ): Promise<WalletReport> {
    const signals = await fromSource('wallet-signal-source', this.sources.wallets.fetchWalletSignals(address));
    const { positions, summary } = evaluatePositions(signals, market.opportunities, market.price);
    const recommendations = generateRecommendations(positions, market.opportunities.slice(0, topN));

    this.logger.info(
      {
        wallet: address,
        holdings: signals.size,
        positions: positions.length,
        recommendations: recommendations.length,
        overallApr: summary.overallApr.toFixed(2),
      },
      'Evaluated wallet positions'
    );

    return { address, positions, summary, recommendations };
  }

  async optimize(input: OptimizerOptionsInput = {}): Promise<OptimizationReport> {
    const options = parseOptimizerOptions(input);
    const market = await this.scoreMarket(options.windowDays);
    const warnings: string[] = [];

    const wallet = options.wallet
      ? await this.evaluateWallet(options.wallet, market, options.topN)
      : null;

    const selection = selectCandidates(market.opportunities, {
      candidateCount: options.candidateCount,
      minWeeklyQueries: options.minWeeklyQueries,
    });

    if (selection.insufficient) {
      const warning = `Only ${selection.available} subgraphs available for allocation after filtering.`;
      warnings.push(warning);
      this.logger.warn(
        { requested: selection.requested, available: selection.available, minWeeklyQueries: options.minWeeklyQueries },
        warning
      );
    }

    const allocation = allocateBudget(selection.candidates, market.price, {
      budget: options.budget,
      step: options.step,
    });

    this.logger.info(
      {
        budget: options.budget,
        candidates: selection.candidates.length,
        iterations: allocation.iterations,
        totalAllocated: allocation.totalAllocated.toString(),
        annualEarnings: allocation.earnings.perYear.toFixed(2),
      },
      'Allocated signal budget'
    );

    return {
      generatedAt: new Date(),
      options,
      price: market.price,
      opportunityCount: market.opportunities.length,
      selection: {
        requested: selection.requested,
        available: selection.available,
        insufficient: selection.insufficient,
      },
      allocation,
      wallet,
      warnings,
    };
  }
}
