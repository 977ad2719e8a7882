import type Decimal from 'decimal.js';

/**
 * Data the optimizer consumes. Implementations fetch and parse; the scoring
 * functions only ever see these shapes.
 */

export interface RawDeployment {
  id: string;
  /** This curator's signal in 18-decimal minor units */
  signalAmountRaw: string;
  /** Total signal across all curators in 18-decimal minor units */
  signalledTokensRaw: string;
}

export interface Deployment {
  id: string;
  signalAmount: Decimal;
  signalledTokens: Decimal;
}

export interface UsageAggregate {
  /** deployment id -> query count summed over the window */
  queryCounts: Map<string, number>;
  /** deployment id -> query fees summed over the window (not used for APR) */
  queryFees: Map<string, number>;
}

/** deployment id -> signal held by one wallet, in token units */
export type WalletSignals = Map<string, Decimal>;

export interface DeploymentSource {
  fetchDeployments(): Promise<RawDeployment[]>;
}

export interface UsageAggregator {
  aggregate(windowDays: number): Promise<UsageAggregate>;
}

export interface PriceOracle {
  /** Token price in USD */
  fetchPrice(): Promise<Decimal>;
}

export interface WalletSignalSource {
  fetchWalletSignals(wallet: string): Promise<WalletSignals>;
}
