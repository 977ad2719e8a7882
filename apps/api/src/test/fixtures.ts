import Decimal from 'decimal.js';
import pino from 'pino';
import type { Opportunity } from '../services/opportunity-scorer';
import type { OptimizerSources } from '../services/source-cache';
import type { RawDeployment, UsageAggregate, WalletSignals } from '../services/sources';

export const silentLogger = pino({ level: 'silent' });

export const WEI = '000000000000000000';

export function rawDeployment(id: string, signal: string, signalled: string): RawDeployment {
  return {
    id,
    signalAmountRaw: signal === '0' ? '0' : `${signal}${WEI}`,
    signalledTokensRaw: signalled === '0' ? '0' : `${signalled}${WEI}`,
  };
}

export function usageOf(counts: Record<string, number>, fees: Record<string, number> = {}): UsageAggregate {
  return {
    queryCounts: new Map(Object.entries(counts)),
    queryFees: new Map(Object.entries(fees)),
  };
}

/**
 * Build an opportunity directly from its curator pool, bypassing query volume
 */
export function opportunity(params: {
  id: string;
  signalAmount: Decimal.Value;
  signalledTokens: Decimal.Value;
  curatorShare: Decimal.Value;
  apr?: Decimal.Value;
  weeklyQueries?: number;
}): Opportunity {
  const curatorShare = new Decimal(params.curatorShare);
  return {
    id: params.id,
    signalAmount: new Decimal(params.signalAmount),
    signalledTokens: new Decimal(params.signalledTokens),
    weeklyQueries: params.weeklyQueries ?? 1000,
    weeklyFees: 0,
    annualQueries: new Decimal(0),
    totalEarnings: curatorShare.times(10),
    curatorShare,
    portionOwned: new Decimal(0),
    estimatedEarnings: new Decimal(0),
    apr: new Decimal(params.apr ?? 0),
  };
}

export interface FakeSourceData {
  deployments: RawDeployment[];
  usage: UsageAggregate;
  price: Decimal;
  wallets?: Record<string, WalletSignals>;
  priceError?: Error;
}

export interface FakeSources extends OptimizerSources {
  walletRequests: string[];
  usageRequests: number[];
}

/**
 * In-memory stand-ins for the subgraphs and the query volume exports
 */
export function createFakeSources(data: FakeSourceData): FakeSources {
  const walletRequests: string[] = [];
  const usageRequests: number[] = [];

  return {
    walletRequests,
    usageRequests,
    deployments: {
      fetchDeployments: async () => data.deployments,
    },
    usage: {
      aggregate: async (windowDays: number) => {
        usageRequests.push(windowDays);
        return data.usage;
      },
    },
    price: {
      fetchPrice: async () => {
        if (data.priceError) {
          throw data.priceError;
        }
        return data.price;
      },
    },
    wallets: {
      fetchWalletSignals: async (wallet: string) => {
        walletRequests.push(wallet);
        return data.wallets?.[wallet] ?? new Map();
      },
    },
  };
}

/**
 * Two scored deployments with usage, one without usage and one without signal.
 * At $0.10: QmA scores 145.6% APR, QmB 10.4%.
 */
export function marketFixture(overrides: Partial<FakeSourceData> = {}): FakeSourceData {
  return {
    deployments: [
      rawDeployment('QmA', '1000', '1000'),
      rawDeployment('QmB', '500', '2000'),
      rawDeployment('QmZ', '300', '900'),
      rawDeployment('QmE', '0', '100'),
    ],
    usage: usageOf({ QmA: 700000, QmB: 100000, QmE: 5000 }, { QmA: 12.5 }),
    price: new Decimal('0.1'),
    ...overrides,
  };
}
