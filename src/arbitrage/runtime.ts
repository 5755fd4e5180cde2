import { ConsoleLogger, type Logger } from '../utils/logger.util';
import { loadArbConfig, type ArbConfig, type ConfigOverrides } from './config';
import { ArbitrageEngine } from './engine';
import { OpportunityLedger } from './ledger/opportunity-ledger';
import { SimulatedPriceSource } from './provider/simulated.provider';
import { PersistenceTracker } from './state/persistence-tracker';
import { FileStateStore } from './state/state-store';
import { ConditionEvaluator } from './strategy/condition-evaluator';
import type { PriceSource } from './types';
import { formatWad } from './utils/bps';
import { DecisionLogger } from './utils/decision-logger';

export type ArbitrageRuntime = {
  config: Readonly<ArbConfig>;
  engine: ArbitrageEngine;
  evaluator: ConditionEvaluator;
  tracker: PersistenceTracker;
  ledger: OpportunityLedger;
};

/**
 * Builds the engine and its collaborators, restoring the tracker and ledger
 * from the state snapshot when one is enabled. Without a `source` the
 * simulated market is used.
 */
export async function createArbitrageRuntime(params: {
  overrides?: ConfigOverrides;
  source?: PriceSource;
  logger?: Logger;
} = {}): Promise<ArbitrageRuntime> {
  const logger = params.logger ?? new ConsoleLogger();
  const config = loadArbConfig(params.overrides);

  logger.info(
    `[ARB] min_gap_bps=${config.minPriceGapBps} min_liquidity=${formatWad(config.minLiquidity)} min_profit=${formatWad(config.minProfit)} max_gas_cost=${formatWad(config.maxGasCost)} gas_units=${config.gasUnits} asset_price=${formatWad(config.assetPrice)} reserve_ratio=[${config.minReserveRatio},${config.maxReserveRatio}] persistence_window=${config.persistenceWindow} history_size=${config.historySize}`,
  );

  const stateStore = new FileStateStore(config.stateDir, config.snapshotState, logger);
  const restored = await stateStore.load();

  const tracker = new PersistenceTracker({
    threshold: config.persistenceWindow,
    maxEntries: config.persistenceMaxEntries,
    logger,
  });
  let ledger = new OpportunityLedger(logger);
  if (restored) {
    tracker.restore(restored.persistence);
    ledger = OpportunityLedger.fromState(restored.ledger, logger);
    logger.info(
      `[ARB] Restored state from ${stateStore.filePath}: pairs=${tracker.size} opportunities=${ledger.count} next_height=${restored.nextHeight ?? 'n/a'}`,
    );
  }

  const evaluator = new ConditionEvaluator({ config, tracker, logger });
  const source =
    params.source ??
    new SimulatedPriceSource({
      seed: config.simSeed,
      basePrice: config.simBasePrice,
      referenceAsset: config.token,
    });
  const decisionLogger = config.decisionsLog ? new DecisionLogger(config.decisionsLog) : undefined;

  const engine = new ArbitrageEngine({
    source,
    evaluator,
    ledger,
    tracker,
    config,
    logger,
    decisionLogger,
    stateStore: config.snapshotState ? stateStore : undefined,
    resumeHeight: restored?.nextHeight,
  });

  return { config, engine, evaluator, tracker, ledger };
}

export function formatPerformanceSummary(runtime: ArbitrageRuntime): string {
  const metrics = runtime.ledger.getPerformanceMetrics();
  const diagnostics = runtime.evaluator.getDiagnostics();
  const skips = Object.entries(diagnostics.skipCounts)
    .map(([reason, count]) => `${reason}:${count}`)
    .join(',');
  return `[ARB] Summary cycles=${diagnostics.evaluated} accepted=${diagnostics.accepted} opportunities=${metrics.count} total_profit=${formatWad(metrics.totalProfitPotential)} avg_profit=${formatWad(metrics.averageProfitPotential)} last_height=${metrics.lastRecordedHeight ?? 'n/a'} last_detector=${metrics.lastDetector ?? 'n/a'} tracked_pairs=${runtime.tracker.size} skips=${skips}`;
}
