/**
 * Opportunity Ledger - append-only record of accepted opportunities
 *
 * - Dense sequential ids starting at 0
 * - At most one record per logical height (compared with the last recorded height)
 * - Running profit total; average is truncated integer division
 * - `executed` flips false -> true once, nothing else changes after append
 *
 * Every operation validates before it mutates, so a thrown error leaves the
 * ledger exactly as it was.
 */

import {
  DuplicateHeightError,
  InvalidIdError,
  OpportunityAlreadyExecutedError,
} from "../../errors/app.errors";
import type { Logger } from "../../utils/logger.util";
import type {
  OpportunityInput,
  OpportunityRecord,
  PerformanceMetrics,
} from "../types";
import { formatWad } from "../utils/bps";

export type LedgerState = {
  records: OpportunityRecord[];
  totalProfitPotential: bigint;
  lastRecordedHeight?: number;
  lastDetector?: string;
};

export class OpportunityLedger {
  private readonly logger?: Logger;
  private records: OpportunityRecord[] = [];
  private totalProfitPotential = 0n;
  private lastRecordedHeight?: number;
  private lastDetector?: string;

  constructor(logger?: Logger) {
    this.logger = logger;
  }

  static fromState(state: LedgerState, logger?: Logger): OpportunityLedger {
    const ledger = new OpportunityLedger(logger);
    let total = 0n;
    state.records.forEach((record, index) => {
      if (record.id !== index) {
        throw new InvalidIdError(record.id, index);
      }
      total += record.profitPotential;
    });
    ledger.records = state.records.map((record) => ({ ...record }));
    // Recomputed so the total always matches the records it was restored with.
    ledger.totalProfitPotential = total;
    ledger.lastRecordedHeight = state.lastRecordedHeight;
    ledger.lastDetector = state.lastDetector;
    return ledger;
  }

  get count(): number {
    return this.records.length;
  }

  append(input: OpportunityInput): number {
    if (input.height === this.lastRecordedHeight) {
      throw new DuplicateHeightError(input.height);
    }
    if (!Number.isSafeInteger(input.height) || input.height < 0) {
      throw new RangeError(`Invalid height ${input.height}`);
    }
    if (input.priceDifferenceBps < 0n || input.profitPotential < 0n) {
      throw new RangeError("Price difference and profit potential must be non-negative");
    }

    const id = this.records.length;
    this.records.push({
      id,
      buySource: input.buySource,
      sellSource: input.sellSource,
      token: input.token,
      priceDifferenceBps: input.priceDifferenceBps,
      profitPotential: input.profitPotential,
      detectedHeight: input.height,
      detector: input.detector,
      executed: false,
    });
    this.totalProfitPotential += input.profitPotential;
    this.lastRecordedHeight = input.height;
    this.lastDetector = input.detector;

    this.logger?.info(
      `[LEDGER] Recorded id=${id} buy=${input.buySource} sell=${input.sellSource} token=${input.token} gap=${input.priceDifferenceBps}bps profit=${formatWad(input.profitPotential)} height=${input.height}`,
    );
    return id;
  }

  markExecuted(id: number, actualProfit: bigint): void {
    const record = this.records[this.checkId(id)];
    if (record.executed) {
      throw new OpportunityAlreadyExecutedError(id);
    }
    record.executed = true;
    record.actualProfit = actualProfit;
    this.logger?.info(
      `[LEDGER] Executed id=${id} actual=${formatWad(actualProfit)} estimated=${formatWad(record.profitPotential)}`,
    );
  }

  getOpportunity(id: number): Readonly<OpportunityRecord> {
    return Object.freeze({ ...this.records[this.checkId(id)] });
  }

  /**
   * The last `min(n, count)` records, oldest first.
   */
  getRecentOpportunities(n: number): Readonly<OpportunityRecord>[] {
    if (Number.isNaN(n)) return [];
    const take = Math.min(Math.max(0, Math.floor(n)), this.records.length);
    if (take === 0) return [];
    return this.records
      .slice(this.records.length - take)
      .map((record) => Object.freeze({ ...record }));
  }

  getPerformanceMetrics(): PerformanceMetrics {
    const count = this.records.length;
    return {
      count,
      totalProfitPotential: this.totalProfitPotential,
      averageProfitPotential: count === 0 ? 0n : this.totalProfitPotential / BigInt(count),
      lastRecordedHeight: this.lastRecordedHeight,
      lastDetector: this.lastDetector,
    };
  }

  toState(): LedgerState {
    return {
      records: this.records.map((record) => ({ ...record })),
      totalProfitPotential: this.totalProfitPotential,
      lastRecordedHeight: this.lastRecordedHeight,
      lastDetector: this.lastDetector,
    };
  }

  private checkId(id: number): number {
    if (!Number.isInteger(id) || id < 0 || id >= this.records.length) {
      throw new InvalidIdError(id, this.records.length);
    }
    return id;
  }
}
