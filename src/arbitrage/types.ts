export const SOURCE_COUNT = 3;

/** One source's market state at a logical height. Amounts are 18-decimal fixed point. */
export type PriceSnapshot = {
  sourceId: string;
  displayName: string;
  referenceAsset: string;
  price: bigint;
  /** Integer count of base units */
  reserveBase: bigint;
  reserveQuote: bigint;
  totalLiquidity: bigint;
  lastUpdateHeight: number;
  /** Basis points */
  volatilityFactor: number;
};

export type SourceTriple = readonly [PriceSnapshot, PriceSnapshot, PriceSnapshot];

export type Observation = {
  readonly sources: SourceTriple;
  readonly logicalHeight: number;
  /** Wei */
  readonly gasPriceHint: bigint;
};

/** Sorted `sourceId`s of the max and min priced sources, joined by `|` */
export type PairIdentity = string;

export type PersistenceEntry = {
  pairIdentity: PairIdentity;
  firstSeenHeight: number;
};

export type OpportunityRecord = {
  id: number;
  buySource: string;
  sellSource: string;
  token: string;
  priceDifferenceBps: bigint;
  profitPotential: bigint;
  detectedHeight: number;
  detector: string;
  executed: boolean;
  actualProfit?: bigint;
};

export type OpportunityInput = {
  buySource: string;
  sellSource: string;
  token: string;
  priceDifferenceBps: bigint;
  profitPotential: bigint;
  detector: string;
  height: number;
};

export type PerformanceMetrics = {
  count: number;
  totalProfitPotential: bigint;
  averageProfitPotential: bigint;
  lastRecordedHeight?: number;
  lastDetector?: string;
};

export type ConditionName =
  | 'PRICE_GAP'
  | 'LIQUIDITY'
  | 'PROFITABILITY'
  | 'RESERVE_BALANCE'
  | 'PERSISTENCE';

export type RejectReason = 'INSUFFICIENT_HISTORY' | ConditionName;

export type EvaluationMetrics = {
  height: number;
  gapBps: bigint;
  buySource: string;
  sellSource: string;
  pairIdentity: PairIdentity;
  maxProfit?: bigint;
  gasCost?: bigint;
  firstSeenHeight?: number;
};

export type EvaluationResult =
  | { accepted: true; metrics: EvaluationMetrics }
  | {
      accepted: false;
      reason: RejectReason;
      metrics?: EvaluationMetrics;
    };

export interface PriceSource {
  collect: (height: number) => Observation;
}

export interface Evaluator {
  evaluate: (history: readonly Observation[]) => boolean;
  evaluateDetailed: (history: readonly Observation[]) => EvaluationResult;
}
