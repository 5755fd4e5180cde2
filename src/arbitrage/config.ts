import { ConfigurationError } from '../errors/app.errors';
import { toWad } from './utils/bps';

export type ArbConfig = {
  minPriceGapBps: bigint;
  minLiquidity: bigint;
  minProfit: bigint;
  maxGasCost: bigint;
  gasUnits: bigint;
  assetPrice: bigint;
  minReserveRatio: bigint;
  maxReserveRatio: bigint;
  persistenceWindow: number;
  persistenceMaxEntries: number;
  historySize: number;
  scanIntervalMs: number;
  maxCycles: number;
  detectorId: string;
  token: string;
  startHeight: number;
  simSeed: number;
  simBasePrice: bigint;
  stateDir: string;
  snapshotState: boolean;
  decisionsLog: string;
};

export type ConfigOverrides = Record<string, string | undefined>;

export function loadArbConfig(overrides: ConfigOverrides = {}): Readonly<ArbConfig> {
  const read = (key: string): string | undefined => {
    const val = overrides[key] ?? process.env[key];
    return val === undefined || val.trim() === '' ? undefined : val.trim();
  };
  const readBool = (key: string, fallback: boolean): boolean => {
    const val = read(key);
    if (val === undefined) return fallback;
    return val.toLowerCase() === 'true' || val === '1';
  };
  const readInt = (key: string, fallback: number, min = 0): number => {
    const val = read(key);
    if (val === undefined) return fallback;
    const parsed = Number(val);
    if (!Number.isSafeInteger(parsed) || parsed < min) {
      throw new ConfigurationError(
        `${key} must be an integer >= ${min}, got "${val}"`,
        key,
      );
    }
    return parsed;
  };
  const readBigInt = (key: string, fallback: number): bigint =>
    BigInt(readInt(key, fallback));
  // Amounts are configured in whole units and held as 18-decimal values.
  const readAmount = (key: string, fallback: string): bigint => {
    const val = read(key) ?? fallback;
    try {
      const amount = toWad(val);
      if (amount < 0n) throw new Error('negative amount');
      return amount;
    } catch (err) {
      throw new ConfigurationError(
        `${key} must be a non-negative decimal amount, got "${val}"`,
        key,
        err instanceof Error ? err : undefined,
      );
    }
  };

  const config: ArbConfig = {
    minPriceGapBps: readBigInt('ARB_MIN_GAP_BPS', 50),
    minLiquidity: readAmount('ARB_MIN_LIQUIDITY', '1000'),
    minProfit: readAmount('ARB_MIN_PROFIT', '10'),
    maxGasCost: readAmount('ARB_MAX_GAS_COST', '100'),
    gasUnits: readBigInt('ARB_GAS_UNITS', 300000),
    assetPrice: readAmount('ARB_ASSET_PRICE', '3000'),
    minReserveRatio: readBigInt('ARB_MIN_RESERVE_RATIO', 10),
    maxReserveRatio: readBigInt('ARB_MAX_RESERVE_RATIO', 10000),
    persistenceWindow: readInt('ARB_PERSISTENCE_WINDOW', 2, 1),
    persistenceMaxEntries: readInt('ARB_PERSISTENCE_MAX_ENTRIES', 0),
    historySize: readInt('ARB_HISTORY_SIZE', 10, 1),
    scanIntervalMs: readInt('ARB_SCAN_INTERVAL_MS', 3000),
    maxCycles: readInt('ARB_MAX_CYCLES', 0),
    detectorId: read('ARB_DETECTOR_ID') ?? 'validator-1',
    token: read('ARB_TOKEN') ?? 'WETH',
    startHeight: readInt('ARB_START_HEIGHT', 1),
    simSeed: readInt('ARB_SIM_SEED', 1),
    simBasePrice: readAmount('ARB_SIM_BASE_PRICE', '3000'),
    stateDir: read('ARB_STATE_DIR') ?? './data',
    snapshotState: readBool('ARB_SNAPSHOT_STATE', false),
    decisionsLog: read('ARB_DECISIONS_LOG') ?? '',
  };

  if (config.minReserveRatio > config.maxReserveRatio) {
    throw new ConfigurationError(
      `ARB_MIN_RESERVE_RATIO (${config.minReserveRatio}) exceeds ARB_MAX_RESERVE_RATIO (${config.maxReserveRatio})`,
      'ARB_MIN_RESERVE_RATIO',
    );
  }
  if (config.historySize < config.persistenceWindow) {
    throw new ConfigurationError(
      `ARB_HISTORY_SIZE (${config.historySize}) must hold at least ARB_PERSISTENCE_WINDOW (${config.persistenceWindow}) observations`,
      'ARB_HISTORY_SIZE',
    );
  }
  if (config.simBasePrice === 0n) {
    throw new ConfigurationError('ARB_SIM_BASE_PRICE must be positive', 'ARB_SIM_BASE_PRICE');
  }

  return Object.freeze(config);
}

export function parseCliOverrides(argv: string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith('--')) continue;
    const [rawKey, ...rest] = arg.slice(2).split('=');
    const key = rawKey.toUpperCase().replace(/-/g, '_');
    if (rest.length > 0) {
      overrides[key] = rest.join('=');
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      overrides[key] = next;
      i += 1;
    } else {
      overrides[key] = 'true';
    }
  }
  return overrides;
}
