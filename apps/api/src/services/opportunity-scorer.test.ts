import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { UpstreamUnavailableError } from '../lib/errors';
import {
  convertRawDeployments,
  estimateYield,
  rankByApr,
  scoreOpportunities,
} from './opportunity-scorer';
import { rawDeployment, usageOf } from '../test/fixtures';
import type { Deployment } from './sources';

const price = new Decimal('0.1');

function deployment(id: string, signalAmount: Decimal.Value, signalledTokens: Decimal.Value): Deployment {
  return { id, signalAmount: new Decimal(signalAmount), signalledTokens: new Decimal(signalledTokens) };
}

describe('scoreOpportunities', () => {
  it('computes earnings and APR for a sole curator', () => {
    const [opportunity] = scoreOpportunities(
      [deployment('QmSolo', 1000, 1000)],
      usageOf({ QmSolo: 700000 }),
      price
    );

    expect(opportunity.annualQueries.toString()).toBe('36400000');
    expect(opportunity.totalEarnings.toString()).toBe('1456');
    expect(opportunity.curatorShare.toString()).toBe('145.6');
    expect(opportunity.portionOwned.toString()).toBe('1');
    expect(opportunity.estimatedEarnings.toString()).toBe('145.6');
    // 145.6 / (1000 * 0.10) * 100
    expect(opportunity.apr.toString()).toBe('145.6');
    expect(opportunity.weeklyQueries).toBe(700000);
  });

  it('treats zero signalled tokens as a zero share', () => {
    const [opportunity] = scoreOpportunities(
      [deployment('QmEmptyPool', 500, 0)],
      usageOf({ QmEmptyPool: 700000 }),
      price
    );

    expect(opportunity.portionOwned.toString()).toBe('0');
    expect(opportunity.estimatedEarnings.toString()).toBe('0');
    expect(opportunity.apr.toString()).toBe('0');
  });

  it('drops deployments without usage and deployments without signal', () => {
    const opportunities = scoreOpportunities(
      [deployment('QmUnused', 100, 100), deployment('QmNoSignal', 0, 500), deployment('QmKept', 100, 400)],
      usageOf({ QmNoSignal: 10000, QmKept: 10000 }),
      price
    );

    expect(opportunities.map((opportunity) => opportunity.id)).toEqual(['QmKept']);
  });

  it('ranks by APR descending', () => {
    const opportunities = scoreOpportunities(
      [deployment('QmLow', 1000, 4000), deployment('QmHigh', 1000, 1000), deployment('QmMid', 1000, 2000)],
      usageOf({ QmLow: 100000, QmHigh: 100000, QmMid: 100000 }),
      price
    );

    expect(opportunities.map((opportunity) => opportunity.id)).toEqual(['QmHigh', 'QmMid', 'QmLow']);
    for (const opportunity of opportunities) {
      expect(opportunity.apr.isNegative()).toBe(false);
    }
  });

  it('keeps input order for equal APRs', () => {
    const usage = usageOf({ QmFirst: 5000, QmSecond: 5000 });

    const forward = scoreOpportunities(
      [deployment('QmFirst', 10, 100), deployment('QmSecond', 10, 100)],
      usage,
      price
    );
    const reversed = scoreOpportunities(
      [deployment('QmSecond', 10, 100), deployment('QmFirst', 10, 100)],
      usage,
      price
    );

    expect(forward.map((opportunity) => opportunity.id)).toEqual(['QmFirst', 'QmSecond']);
    expect(reversed.map((opportunity) => opportunity.id)).toEqual(['QmSecond', 'QmFirst']);
  });

  it('carries summed query fees without using them', () => {
    const [opportunity] = scoreOpportunities(
      [deployment('QmFees', 1000, 1000)],
      usageOf({ QmFees: 700000 }, { QmFees: 42.5 }),
      price
    );

    expect(opportunity.weeklyFees).toBe(42.5);
    expect(opportunity.apr.toString()).toBe('145.6');
  });

  it('produces identical output for identical inputs', () => {
    const deployments = [deployment('QmA', 1000, 3000), deployment('QmB', 250, 1000)];
    const usage = usageOf({ QmA: 90000, QmB: 40000 });

    const summarize = () =>
      scoreOpportunities(deployments, usage, price).map((opportunity) => [opportunity.id, opportunity.apr.toString()]);

    expect(summarize()).toEqual(summarize());
  });

  it('rejects an unusable price', () => {
    expect(() => scoreOpportunities([deployment('QmA', 1, 1)], usageOf({ QmA: 1 }), new Decimal(0))).toThrow(
      UpstreamUnavailableError
    );
  });

  it('rejects non-finite query counts', () => {
    expect(() =>
      scoreOpportunities([deployment('QmA', 1, 1)], usageOf({ QmA: Number.NaN }), price)
    ).toThrow('usage-aggregator');
  });
});

describe('convertRawDeployments', () => {
  it('converts 18-decimal minor units to tokens', () => {
    const [converted] = convertRawDeployments([
      { id: 'QmRaw', signalAmountRaw: '1500000000000000000', signalledTokensRaw: '2500000000000000000000' },
    ]);

    expect(converted.signalAmount.toString()).toBe('1.5');
    expect(converted.signalledTokens.toString()).toBe('2500');
  });

  it('accepts zero', () => {
    const [converted] = convertRawDeployments([rawDeployment('QmZero', '0', '0')]);
    expect(converted.signalAmount.isZero()).toBe(true);
  });

  it('fails the pass on malformed amounts', () => {
    expect(() =>
      convertRawDeployments([{ id: 'QmBad', signalAmountRaw: '12.5', signalledTokensRaw: '100' }])
    ).toThrow(UpstreamUnavailableError);
    expect(() =>
      convertRawDeployments([{ id: 'QmNeg', signalAmountRaw: '-1', signalledTokensRaw: '100' }])
    ).toThrow('deployment QmNeg has malformed signal amounts');
  });
});

describe('estimateYield', () => {
  it('returns zero APR for a zero stake', () => {
    const result = estimateYield({
      curatorShare: new Decimal(100),
      stake: new Decimal(0),
      pool: new Decimal(1000),
      price,
    });

    expect(result.portionOwned.toString()).toBe('0');
    expect(result.apr.toString()).toBe('0');
  });
});

describe('rankByApr', () => {
  it('does not mutate its input', () => {
    const items = [{ apr: new Decimal(1) }, { apr: new Decimal(2) }];
    const ranked = rankByApr(items);

    expect(ranked.map((item) => item.apr.toNumber())).toEqual([2, 1]);
    expect(items.map((item) => item.apr.toNumber())).toEqual([1, 2]);
  });
});
