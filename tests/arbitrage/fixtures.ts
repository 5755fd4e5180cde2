import type { EvaluatorConfig } from "../../src/arbitrage/strategy/condition-evaluator";
import type { Observation, PriceSnapshot } from "../../src/arbitrage/types";
import { WAD, toWad } from "../../src/arbitrage/utils/bps";
import type { Logger } from "../../src/utils/logger.util";

export const SOURCE_IDS = ["pool-a", "pool-b", "pool-c"] as const;

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

export function buildEvaluatorConfig(overrides: Partial<EvaluatorConfig> = {}): EvaluatorConfig {
  return {
    minPriceGapBps: 50n,
    minLiquidity: 1000n * WAD,
    minProfit: 10n * WAD,
    maxGasCost: 100n * WAD,
    gasUnits: 300000n,
    assetPrice: 3000n * WAD,
    minReserveRatio: 10n,
    maxReserveRatio: 10000n,
    persistenceWindow: 2,
    ...overrides,
  };
}

export function buildSnapshot(
  index: number,
  price: string | number,
  overrides: Partial<PriceSnapshot> = {},
): PriceSnapshot {
  return {
    sourceId: SOURCE_IDS[index] ?? `pool-${index}`,
    displayName: `Pool ${index}`,
    referenceAsset: "WETH",
    price: toWad(price),
    reserveBase: 5000n,
    reserveQuote: 5000n * WAD,
    totalLiquidity: 5000n * WAD,
    lastUpdateHeight: 0,
    volatilityFactor: 100,
    ...overrides,
  };
}

/**
 * Three sources priced in whole quote units, 5000 units of liquidity each,
 * reserve ratio 1000, gas hint in gwei.
 */
export function buildObservation(
  height: number,
  prices: readonly [string | number, string | number, string | number],
  options: { gasGwei?: number; overrides?: Array<Partial<PriceSnapshot>> } = {},
): Observation {
  const overrides = options.overrides ?? [];
  return {
    sources: [
      buildSnapshot(0, prices[0], { lastUpdateHeight: height, ...overrides[0] }),
      buildSnapshot(1, prices[1], { lastUpdateHeight: height, ...overrides[1] }),
      buildSnapshot(2, prices[2], { lastUpdateHeight: height, ...overrides[2] }),
    ],
    logicalHeight: height,
    gasPriceHint: BigInt(options.gasGwei ?? 30) * 10n ** 9n,
  };
}

export const WIDE_PRICES = [3000, 3200, 2950] as const;
export const TIGHT_PRICES = [3000, 3005, 2998] as const;
