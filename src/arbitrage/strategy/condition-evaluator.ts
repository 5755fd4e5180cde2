import type { ArbConfig } from '../config';
import {
  InsufficientHistoryError,
  InvalidObservationError,
} from '../../errors/app.errors';
import type { Logger } from '../../utils/logger.util';
import type { PersistenceTracker } from '../state/persistence-tracker';
import {
  SOURCE_COUNT,
  type EvaluationMetrics,
  type EvaluationResult,
  type Evaluator,
  type Observation,
  type PairIdentity,
  type PriceSnapshot,
  type RejectReason,
} from '../types';
import {
  calculatePriceGapBps,
  calculateReserveRatio,
  estimateGasCost,
  estimatePairProfit,
} from '../utils/bps';

export type EvaluatorConfig = Pick<
  ArbConfig,
  | 'minPriceGapBps'
  | 'minLiquidity'
  | 'minProfit'
  | 'maxGasCost'
  | 'gasUnits'
  | 'assetPrice'
  | 'minReserveRatio'
  | 'maxReserveRatio'
  | 'persistenceWindow'
>;

export type SkipCounts = Record<RejectReason, number>;

export type EvaluatorDiagnostics = {
  evaluated: number;
  accepted: number;
  skipCounts: SkipCounts;
};

/**
 * Indices of the cheapest and the most expensive source. Ties resolve to the
 * lowest index.
 */
export function findExtremes(sources: readonly PriceSnapshot[]): { minIndex: number; maxIndex: number } {
  let minIndex = 0;
  let maxIndex = 0;
  for (let i = 1; i < sources.length; i += 1) {
    if (sources[i].price < sources[minIndex].price) minIndex = i;
    if (sources[i].price > sources[maxIndex].price) maxIndex = i;
  }
  return { minIndex, maxIndex };
}

export function pairIdentityOf(observation: Observation): PairIdentity {
  const { minIndex, maxIndex } = findExtremes(observation.sources);
  return [observation.sources[minIndex].sourceId, observation.sources[maxIndex].sourceId]
    .sort()
    .join('|');
}

export function assertHistoryDepth(history: readonly Observation[], required: number): void {
  if (history.length < required) {
    throw new InsufficientHistoryError(required, history.length);
  }
}

export function assertObservation(observation: Observation): void {
  if (observation.sources.length !== SOURCE_COUNT) {
    throw new InvalidObservationError(
      `Observation at height ${observation.logicalHeight} has ${observation.sources.length} sources, expected ${SOURCE_COUNT}`,
    );
  }
  if (!Number.isSafeInteger(observation.logicalHeight) || observation.logicalHeight < 0) {
    throw new InvalidObservationError(
      `Invalid logical height ${observation.logicalHeight}`,
    );
  }
  const ids = new Set(observation.sources.map((source) => source.sourceId));
  if (ids.size !== SOURCE_COUNT) {
    throw new InvalidObservationError(
      `Duplicate source ids at height ${observation.logicalHeight}`,
    );
  }
}

/**
 * Five-condition safety chain over the latest observation of a history.
 * Conditions run in order and the first failure rejects; only the last one
 * (persistence) writes to the tracker, so a rejected earlier condition
 * leaves the tracker untouched.
 */
export class ConditionEvaluator implements Evaluator {
  private readonly config: EvaluatorConfig;
  private readonly tracker: PersistenceTracker;
  private readonly logger?: Logger;
  private diagnostics: EvaluatorDiagnostics = ConditionEvaluator.emptyDiagnostics();

  constructor(params: {
    config: EvaluatorConfig;
    tracker: PersistenceTracker;
    logger?: Logger;
  }) {
    this.config = params.config;
    this.tracker = params.tracker;
    this.logger = params.logger;
  }

  evaluate(history: readonly Observation[]): boolean {
    return this.evaluateDetailed(history).accepted;
  }

  evaluateDetailed(history: readonly Observation[]): EvaluationResult {
    try {
      assertHistoryDepth(history, this.config.persistenceWindow);
    } catch (err) {
      if (err instanceof InsufficientHistoryError) {
        this.logger?.debug(`[ARB] ${err.message}`);
        return this.record({ accepted: false, reason: 'INSUFFICIENT_HISTORY' });
      }
      throw err;
    }

    const latest = history[history.length - 1];
    assertObservation(latest);
    return this.record(this.runConditions(latest));
  }

  getDiagnostics(): EvaluatorDiagnostics {
    return {
      evaluated: this.diagnostics.evaluated,
      accepted: this.diagnostics.accepted,
      skipCounts: { ...this.diagnostics.skipCounts },
    };
  }

  resetDiagnostics(): void {
    this.diagnostics = ConditionEvaluator.emptyDiagnostics();
  }

  private runConditions(observation: Observation): EvaluationResult {
    const { sources, logicalHeight } = observation;
    const { minIndex, maxIndex } = findExtremes(sources);
    const metrics: EvaluationMetrics = {
      height: logicalHeight,
      gapBps: calculatePriceGapBps(sources.map((source) => source.price)),
      buySource: sources[minIndex].sourceId,
      sellSource: sources[maxIndex].sourceId,
      pairIdentity: pairIdentityOf(observation),
    };

    if (metrics.gapBps < this.config.minPriceGapBps) {
      return { accepted: false, reason: 'PRICE_GAP', metrics };
    }

    if (sources.some((source) => source.totalLiquidity < this.config.minLiquidity)) {
      return { accepted: false, reason: 'LIQUIDITY', metrics };
    }

    metrics.maxProfit = this.maxPairProfit(sources);
    metrics.gasCost = estimateGasCost({
      gasPriceHint: observation.gasPriceHint,
      gasUnits: this.config.gasUnits,
      assetPrice: this.config.assetPrice,
    });
    if (
      metrics.gasCost > this.config.maxGasCost ||
      metrics.maxProfit <= metrics.gasCost ||
      metrics.maxProfit <= this.config.minProfit
    ) {
      return { accepted: false, reason: 'PROFITABILITY', metrics };
    }

    const balanced = sources.every((source) => {
      const ratio = calculateReserveRatio(source.reserveBase, source.reserveQuote);
      return ratio >= this.config.minReserveRatio && ratio <= this.config.maxReserveRatio;
    });
    if (!balanced) {
      return { accepted: false, reason: 'RESERVE_BALANCE', metrics };
    }

    const matured = this.tracker.observe(metrics.pairIdentity, logicalHeight);
    metrics.firstSeenHeight = this.tracker.getFirstSeen(metrics.pairIdentity);
    if (!matured) {
      return { accepted: false, reason: 'PERSISTENCE', metrics };
    }

    return { accepted: true, metrics };
  }

  private maxPairProfit(sources: readonly PriceSnapshot[]): bigint {
    let best = 0n;
    for (let i = 0; i < sources.length; i += 1) {
      for (let j = i + 1; j < sources.length; j += 1) {
        const profit = estimatePairProfit({
          liquidityA: sources[i].totalLiquidity,
          liquidityB: sources[j].totalLiquidity,
          priceA: sources[i].price,
          priceB: sources[j].price,
        });
        if (profit > best) best = profit;
      }
    }
    return best;
  }

  private record(result: EvaluationResult): EvaluationResult {
    this.diagnostics.evaluated += 1;
    if (result.accepted) {
      this.diagnostics.accepted += 1;
    } else {
      this.diagnostics.skipCounts[result.reason] += 1;
    }
    return result;
  }

  private static emptyDiagnostics(): EvaluatorDiagnostics {
    return {
      evaluated: 0,
      accepted: 0,
      skipCounts: {
        INSUFFICIENT_HISTORY: 0,
        PRICE_GAP: 0,
        LIQUIDITY: 0,
        PROFITABILITY: 0,
        RESERVE_BALANCE: 0,
        PERSISTENCE: 0,
      },
    };
  }
}
