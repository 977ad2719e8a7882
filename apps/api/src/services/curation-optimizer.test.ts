import { describe, it, expect } from 'vitest';
import Decimal from 'decimal.js';
import { UpstreamUnavailableError, ValidationError } from '../lib/errors';
import { CurationOptimizer } from './curation-optimizer';
import { createFakeSources, marketFixture, silentLogger } from '../test/fixtures';

const WALLET = '0x00000000000000000000000000000000000000aa';

describe('CurationOptimizer', () => {
  describe('scoreMarket', () => {
    it('scores only deployments with usage and signal', async () => {
      const sources = createFakeSources(marketFixture());
      const optimizer = new CurationOptimizer(sources, silentLogger);

      const market = await optimizer.scoreMarket(14);

      expect(market.opportunities.map((opportunity) => [opportunity.id, opportunity.apr.toString()])).toEqual([
        ['QmA', '145.6'],
        ['QmB', '10.4'],
      ]);
      expect(market.opportunities[0].weeklyFees).toBe(12.5);
      expect(market.price.toString()).toBe('0.1');
      expect(sources.usageRequests).toEqual([14]);
    });

    it('fails the pass when the price is unavailable', async () => {
      const optimizer = new CurationOptimizer(
        createFakeSources(marketFixture({ priceError: new Error('connection refused') })),
        silentLogger
      );

      const failure = optimizer.scoreMarket(7);

      await expect(failure).rejects.toBeInstanceOf(UpstreamUnavailableError);
      await expect(failure).rejects.toMatchObject({
        source: 'price-oracle',
        message: 'price-oracle: connection refused',
      });
    });

    it('fails the pass on malformed deployment amounts', async () => {
      const optimizer = new CurationOptimizer(
        createFakeSources(
          marketFixture({ deployments: [{ id: 'QmBad', signalAmountRaw: 'lots', signalledTokensRaw: '1' }] })
        ),
        silentLogger
      );

      await expect(optimizer.scoreMarket(7)).rejects.toMatchObject({ source: 'deployment-source' });
    });
  });

  describe('optimize', () => {
    it('allocates the budget and warns about a short candidate list', async () => {
      const optimizer = new CurationOptimizer(createFakeSources(marketFixture()), silentLogger);

      const report = await optimizer.optimize({ budget: 250, step: 100, candidateCount: 5 });

      expect(report.opportunityCount).toBe(2);
      expect(report.selection).toEqual({ requested: 5, available: 2, insufficient: true });
      expect(report.warnings).toEqual(['Only 2 subgraphs available for allocation after filtering.']);
      expect(report.wallet).toBeNull();

      const [first, second] = report.allocation.entries;
      expect(first.id).toBe('QmA');
      expect(first.allocated.toString()).toBe('250');
      expect(second.id).toBe('QmB');
      expect(second.allocated.toString()).toBe('0');
      expect(second.aprAfter).toBeNull();

      expect(report.allocation.iterations).toBe(3);
      expect(report.allocation.totalAllocated.toString()).toBe('250');
      // QmA keeps its full pool share (145.6) and QmB's unchanged holding earns 5.2
      expect(report.allocation.earnings.perYear.toString()).toBe('150.8');
      expect(report.allocation.overallApr.toString()).toBe('603.2');
    });

    it('applies the weekly query floor before selecting', async () => {
      const optimizer = new CurationOptimizer(createFakeSources(marketFixture()), silentLogger);

      const report = await optimizer.optimize({ budget: 100, candidateCount: 1, minWeeklyQueries: 200000 });

      expect(report.allocation.entries.map((entry) => entry.id)).toEqual(['QmA']);
      expect(report.selection.insufficient).toBe(false);
      expect(report.warnings).toEqual([]);
    });

    it('evaluates a wallet and suggests better deployments', async () => {
      const sources = createFakeSources(
        marketFixture({ wallets: { [WALLET]: new Map([['QmB', new Decimal(500)]]) } })
      );
      const optimizer = new CurationOptimizer(sources, silentLogger);

      const report = await optimizer.optimize({ budget: 0, wallet: WALLET });

      expect(sources.walletRequests).toEqual([WALLET]);
      expect(report.wallet?.positions.map((position) => position.id)).toEqual(['QmB']);
      expect(report.wallet?.summary.totalValueUsd.toString()).toBe('50');
      expect(report.wallet?.recommendations.map((recommendation) => recommendation.message)).toEqual([
        'Consider moving signal from QmB (APR: 10.40%) to QmA (APR: 145.60%)',
      ]);
    });

    it('normalises the wallet address before looking it up', async () => {
      const sources = createFakeSources(marketFixture());
      const optimizer = new CurationOptimizer(sources, silentLogger);

      await optimizer.optimize({ budget: 0, wallet: ` ${WALLET.replace('aa', 'AA')} ` });

      expect(sources.walletRequests).toEqual([WALLET]);
    });

    it('rejects a wallet that is not an address', async () => {
      const optimizer = new CurationOptimizer(createFakeSources(marketFixture()), silentLogger);

      await expect(optimizer.optimize({ wallet: 'curator-wallet' })).rejects.toMatchObject({
        errors: { wallet: ['Invalid EVM address. Expected 0x-prefixed 40 byte hex string.'] },
      });
    });

    it('rejects invalid options before touching the sources', async () => {
      const sources = createFakeSources(marketFixture());
      const optimizer = new CurationOptimizer(sources, silentLogger);

      await expect(optimizer.optimize({ budget: -5 })).rejects.toBeInstanceOf(ValidationError);
      expect(sources.usageRequests).toEqual([]);
    });
  });
});
