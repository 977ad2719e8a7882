import Decimal from 'decimal.js';
import { z } from 'zod';
import { GraphClient } from '../lib/graph-client';
import { UpstreamUnavailableError } from '../lib/errors';
import { fromMinorUnits } from '../lib/units';
import type { DeploymentSource, RawDeployment, WalletSignals, WalletSignalSource } from './sources';

const DEPLOYMENTS_QUERY = `
  query Deployments($first: Int!) {
    subgraphDeployments(first: $first, orderBy: signalAmount, orderDirection: desc) {
      ipfsHash
      signalAmount
      signalledTokens
    }
  }
`;

const NAME_SIGNALS_QUERY = `
  query NameSignals($curator: String!) {
    nameSignals(where: { curator: $curator }) {
      signal
      subgraph {
        currentVersion {
          subgraphDeployment {
            ipfsHash
          }
        }
      }
    }
  }
`;

const deploymentsSchema = z.object({
  subgraphDeployments: z.array(
    z.object({
      ipfsHash: z.string().min(1),
      signalAmount: z.string(),
      signalledTokens: z.string(),
    })
  ),
});

const nameSignalsSchema = z.object({
  nameSignals: z.array(
    z.object({
      signal: z.string(),
      subgraph: z.object({
        currentVersion: z
          .object({
            subgraphDeployment: z.object({ ipfsHash: z.string().min(1) }),
          })
          .nullable(),
      }),
    })
  ),
});

export const DEFAULT_DEPLOYMENT_LIMIT = 1000;

/**
 * Reads curation state from the Graph network subgraph: signal per deployment
 * and the signal a given curator wallet holds.
 */
export class NetworkSubgraphClient implements DeploymentSource, WalletSignalSource {
  constructor(
    private readonly client: GraphClient,
    private readonly deploymentLimit: number = DEFAULT_DEPLOYMENT_LIMIT
  ) {}

  async fetchDeployments(): Promise<RawDeployment[]> {
    const data = await this.client.query(DEPLOYMENTS_QUERY, { first: this.deploymentLimit }, deploymentsSchema);

    return data.subgraphDeployments.map((deployment) => ({
      id: deployment.ipfsHash,
      signalAmountRaw: deployment.signalAmount,
      signalledTokensRaw: deployment.signalledTokens,
    }));
  }

  async fetchWalletSignals(wallet: string): Promise<WalletSignals> {
    const data = await this.client.query(
      NAME_SIGNALS_QUERY,
      { curator: wallet.toLowerCase() },
      nameSignalsSchema
    );

    const signals: WalletSignals = new Map();

    for (const nameSignal of data.nameSignals) {
      // Deprecated subgraphs have no current version to curate
      if (!nameSignal.subgraph.currentVersion) {
        continue;
      }

      const id = nameSignal.subgraph.currentVersion.subgraphDeployment.ipfsHash;
      let amount: Decimal;
      try {
        amount = fromMinorUnits(nameSignal.signal);
      } catch (error) {
        throw new UpstreamUnavailableError(this.client.serviceName, `malformed signal for ${id}`, error);
      }

      signals.set(id, (signals.get(id) ?? new Decimal(0)).plus(amount));
    }

    return signals;
  }
}
