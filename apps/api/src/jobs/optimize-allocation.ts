import { env } from '../config';
import { createLogger } from '../lib/logger';
import { CurationOptimizer } from '../services/curation-optimizer';
import { createDefaultSources } from '../services/default-sources';

const logger = createLogger({ job: 'optimize-allocation' });

async function main() {
  logger.info('Starting signal allocation job...');

  const optimizer = new CurationOptimizer(createDefaultSources(env));
  const report = await optimizer.optimize({ wallet: env.WALLET_ADDRESS });

  if (report.wallet) {
    logger.info(
      {
        wallet: report.wallet.address,
        totalSignal: report.wallet.summary.totalSignal.toFixed(2),
        totalValueUsd: report.wallet.summary.totalValueUsd.toFixed(2),
        annualEarningsUsd: report.wallet.summary.totalEstimatedEarnings.toFixed(2),
        overallApr: report.wallet.summary.overallApr.toFixed(2),
      },
      'Current curation signal'
    );
    report.wallet.recommendations.forEach((recommendation) => {
      logger.info({ rank: recommendation.rank, kind: recommendation.kind }, recommendation.message);
    });
  }

  report.allocation.entries.forEach((entry) => {
    logger.info(
      {
        deployment: entry.id,
        signalBefore: entry.signalBefore.toFixed(2),
        signalAfter: entry.signalAfter.toFixed(2),
        aprBefore: entry.aprBefore.toFixed(2),
        aprAfter: entry.aprAfter ? entry.aprAfter.toFixed(2) : '-',
        earningsAfter: entry.earningsAfter.toFixed(2),
        allocated: entry.allocated.toFixed(2),
        weeklyQueries: entry.weeklyQueries,
      },
      'Allocation'
    );
  });

  const { earnings } = report.allocation;
  logger.info(
    {
      price: report.price.toFixed(4),
      budget: report.options.budget,
      candidates: report.allocation.entries.length,
      minWeeklyQueries: report.options.minWeeklyQueries,
      perDay: earnings.perDay.toFixed(2),
      perWeek: earnings.perWeek.toFixed(2),
      perMonth: earnings.perMonth.toFixed(2),
      perYear: earnings.perYear.toFixed(2),
      overallApr: report.allocation.overallApr.toFixed(2),
      warnings: report.warnings,
    },
    'Signal allocation completed'
  );
}

main().catch((error) => {
  logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Signal allocation failed');
  process.exit(1);
});
