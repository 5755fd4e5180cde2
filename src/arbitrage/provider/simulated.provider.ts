import { InvalidIndexError } from "../../errors/app.errors";
import {
  SOURCE_COUNT,
  type Observation,
  type PriceSnapshot,
  type PriceSource,
} from "../types";
import { BPS_DENOMINATOR, WAD } from "../utils/bps";

type SourceProfile = {
  sourceId: string;
  displayName: string;
  volatilityFactor: number;
  liquidityUnits: bigint;
};

const DEFAULT_PROFILES: readonly SourceProfile[] = [
  { sourceId: "pool-a", displayName: "Pool A", volatilityFactor: 150, liquidityUnits: 6000n },
  { sourceId: "pool-b", displayName: "Pool B", volatilityFactor: 300, liquidityUnits: 4500n },
  { sourceId: "pool-c", displayName: "Pool C", volatilityFactor: 450, liquidityUnits: 3000n },
];

const GWEI = 10n ** 9n;

/** mulberry32 */
export function createSeededRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Deterministic three-pool market. Each collect moves every unpinned price
 * by up to its volatility factor (in bps) around the previous price.
 * `reserveBase` is generated as whole base units sized against the quote
 * reserve so the reserve ratio sits near 1000.
 */
export class SimulatedPriceSource implements PriceSource {
  private readonly random: () => number;
  private readonly referenceAsset: string;
  private readonly profiles: readonly SourceProfile[];
  private readonly prices: bigint[];
  private readonly pinned: Array<bigint | undefined>;
  private last?: Observation;

  constructor(params: { seed: number; basePrice: bigint; referenceAsset: string }) {
    this.random = createSeededRandom(params.seed);
    this.referenceAsset = params.referenceAsset;
    this.profiles = DEFAULT_PROFILES;
    this.prices = this.profiles.map(() => params.basePrice);
    this.pinned = this.profiles.map(() => undefined);
  }

  /** Fixes a source's price until `clearPrice` is called. */
  setPrice(index: number, price: bigint): void {
    this.checkIndex(index);
    if (price <= 0n) {
      throw new RangeError(`Price must be positive, got ${price}`);
    }
    this.pinned[index] = price;
    this.prices[index] = price;
  }

  clearPrice(index: number): void {
    this.checkIndex(index);
    this.pinned[index] = undefined;
  }

  /** Snapshot of a source from the last collected observation. */
  getSnapshot(index: number): PriceSnapshot | undefined {
    this.checkIndex(index);
    return this.last?.sources[index];
  }

  collect(height: number): Observation {
    const snapshots = this.profiles.map((profile, index) =>
      this.nextSnapshot(profile, index, height),
    );
    const gasPriceHint = BigInt(20 + Math.floor(this.random() * 21)) * GWEI;
    const observation: Observation = Object.freeze({
      sources: Object.freeze([snapshots[0], snapshots[1], snapshots[2]] as const),
      logicalHeight: height,
      gasPriceHint,
    });
    this.last = observation;
    return observation;
  }

  private nextSnapshot(profile: SourceProfile, index: number, height: number): PriceSnapshot {
    const pinned = this.pinned[index];
    if (pinned === undefined) {
      const driftBps = BigInt(Math.round((this.random() * 2 - 1) * profile.volatilityFactor));
      this.prices[index] = (this.prices[index] * (BPS_DENOMINATOR + driftBps)) / BPS_DENOMINATOR;
    }
    // +/- 20% around the profile depth
    const depthPermille = BigInt(800 + Math.floor(this.random() * 401));
    const liquidityUnits = (profile.liquidityUnits * depthPermille) / 1000n;
    const balancePermille = BigInt(900 + Math.floor(this.random() * 201));
    return Object.freeze({
      sourceId: profile.sourceId,
      displayName: profile.displayName,
      referenceAsset: this.referenceAsset,
      price: this.prices[index],
      reserveBase: (liquidityUnits * balancePermille) / 1000n,
      reserveQuote: liquidityUnits * WAD,
      totalLiquidity: liquidityUnits * WAD,
      lastUpdateHeight: height,
      volatilityFactor: profile.volatilityFactor,
    });
  }

  private checkIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= SOURCE_COUNT) {
      throw new InvalidIndexError(index);
    }
  }
}
