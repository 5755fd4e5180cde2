import type { Logger } from "../utils/logger.util";
import type { ArbConfig } from "./config";
import type { DecisionLogEntry, DecisionLogger } from "./utils/decision-logger";
import { DuplicateHeightError } from "../errors/app.errors";
import type { OpportunityLedger } from "./ledger/opportunity-ledger";
import type { PersistenceTracker } from "./state/persistence-tracker";
import type { FileStateStore } from "./state/state-store";
import type {
  EvaluationResult,
  Evaluator,
  Observation,
  OpportunityInput,
  PriceSource,
} from "./types";
import { formatWad } from "./utils/bps";

export type EngineConfig = Pick<
  ArbConfig,
  "scanIntervalMs" | "historySize" | "maxCycles" | "detectorId" | "token" | "startHeight"
>;

export type CycleOutcome =
  | { status: "accepted"; height: number; opportunityId: number; result: EvaluationResult }
  | { status: "rejected"; height: number; result: EvaluationResult }
  | { status: "duplicate"; height: number; result: EvaluationResult };

/**
 * Drives collect -> evaluate -> record cycles. Holds the rolling observation
 * history; the tracker and ledger are shared handles passed in by the caller.
 */
export class ArbitrageEngine {
  private readonly source: PriceSource;
  private readonly evaluator: Evaluator;
  private readonly ledger: OpportunityLedger;
  private readonly tracker: PersistenceTracker;
  private readonly config: EngineConfig;
  private readonly logger: Logger;
  private readonly decisionLogger?: DecisionLogger;
  private readonly stateStore?: FileStateStore;
  private history: Observation[] = [];
  private nextHeight: number;
  private cycles = 0;
  private running = false;

  constructor(params: {
    source: PriceSource;
    evaluator: Evaluator;
    ledger: OpportunityLedger;
    tracker: PersistenceTracker;
    config: EngineConfig;
    logger: Logger;
    decisionLogger?: DecisionLogger;
    stateStore?: FileStateStore;
    /** Next height saved by a previous session */
    resumeHeight?: number;
  }) {
    this.source = params.source;
    this.evaluator = params.evaluator;
    this.ledger = params.ledger;
    this.tracker = params.tracker;
    this.config = params.config;
    this.logger = params.logger;
    this.decisionLogger = params.decisionLogger;
    this.stateStore = params.stateStore;
    const lastHeight = this.ledger.getPerformanceMetrics().lastRecordedHeight;
    this.nextHeight = Math.max(
      this.config.startHeight,
      params.resumeHeight ?? this.config.startHeight,
      lastHeight === undefined ? this.config.startHeight : lastHeight + 1,
    );
  }

  /** Height the next `scanOnce` collects at. */
  get currentHeight(): number {
    return this.nextHeight;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  getHistory(): readonly Observation[] {
    return [...this.history];
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.logger.info(
      `[ARB] Engine started detector=${this.config.detectorId} token=${this.config.token} start_height=${this.nextHeight}`,
    );
    try {
      while (this.running) {
        const startedAt = Date.now();
        await this.scanOnce();
        if (this.config.maxCycles > 0 && this.cycles >= this.config.maxCycles) {
          break;
        }
        const elapsed = Date.now() - startedAt;
        const waitMs = Math.max(0, this.config.scanIntervalMs - elapsed);
        await new Promise((resolve) => setTimeout(resolve, waitMs));
      }
    } finally {
      this.running = false;
    }
    this.logger.info(`[ARB] Engine stopped after ${this.cycles} cycle(s)`);
  }

  stop(): void {
    this.running = false;
  }

  /**
   * Runs one cycle at the next logical height.
   */
  async scanOnce(): Promise<CycleOutcome> {
    const observation = this.source.collect(this.nextHeight);
    return this.process(observation);
  }

  /**
   * Feeds an externally collected observation through the same cycle. The
   * history only takes the observation once evaluation has not thrown; the
   * next height never moves backwards.
   */
  async process(observation: Observation): Promise<CycleOutcome> {
    const history = [...this.history, observation].slice(-this.config.historySize);
    const height = observation.logicalHeight;
    const result = this.evaluator.evaluateDetailed(history);
    this.history = history;
    this.cycles += 1;
    let outcome: CycleOutcome;

    if (!result.accepted) {
      const gap = result.metrics ? ` gap=${result.metrics.gapBps}bps pair=${result.metrics.pairIdentity}` : "";
      this.logger.debug(`[ARB] Reject height=${height} reason=${result.reason}${gap}`);
      outcome = { status: "rejected", height, result };
      await this.logDecision(outcome);
    } else {
      const { metrics } = result;
      try {
        const opportunityId = this.recordOpportunity({
          buySource: metrics.buySource,
          sellSource: metrics.sellSource,
          token: this.config.token,
          priceDifferenceBps: metrics.gapBps,
          profitPotential: metrics.maxProfit ?? 0n,
          detector: this.config.detectorId,
          height,
        });
        this.logger.info(
          `[ARB] Accept height=${height} buy=${metrics.buySource} sell=${metrics.sellSource} gap=${metrics.gapBps}bps est=${formatWad(metrics.maxProfit ?? 0n)} gas=${formatWad(metrics.gasCost ?? 0n)} id=${opportunityId}`,
        );
        outcome = { status: "accepted", height, opportunityId, result };
      } catch (err) {
        if (!(err instanceof DuplicateHeightError)) throw err;
        this.logger.warn(`[ARB] Skip height=${height} reason=duplicate_height`);
        outcome = { status: "duplicate", height, result };
      }
      await this.logDecision(outcome);
    }

    this.nextHeight = Math.max(this.nextHeight, height + 1);
    await this.persist();
    return outcome;
  }

  /**
   * Ledger sink for an accepted cycle. Throws `DuplicateHeightError` when the
   * height already has a record.
   */
  recordOpportunity(input: OpportunityInput): number {
    return this.ledger.append(input);
  }

  markExecuted(id: number, actualProfit: bigint): void {
    this.ledger.markExecuted(id, actualProfit);
  }

  async persist(): Promise<void> {
    if (!this.stateStore) return;
    await this.stateStore.snapshot(this.tracker.entries(), this.ledger.toState(), this.nextHeight);
  }

  private async logDecision(outcome: CycleOutcome): Promise<void> {
    if (!this.decisionLogger) return;
    const { result } = outcome;
    const metrics = result.metrics;
    const entry: DecisionLogEntry = {
      ts: new Date().toISOString(),
      height: outcome.height,
      action: outcome.status === "accepted" ? "accept" : outcome.status === "duplicate" ? "duplicate" : "reject",
      reason: result.accepted ? undefined : result.reason,
      pair: metrics?.pairIdentity,
      buy_source: metrics?.buySource,
      sell_source: metrics?.sellSource,
      gap_bps: metrics?.gapBps.toString(),
      max_profit: metrics?.maxProfit?.toString(),
      gas_cost: metrics?.gasCost?.toString(),
      first_seen_height: metrics?.firstSeenHeight,
      opportunity_id: outcome.status === "accepted" ? outcome.opportunityId : undefined,
    };
    await this.decisionLogger.append(entry);
  }
}
