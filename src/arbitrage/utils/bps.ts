import { formatUnits, parseUnits } from 'ethers';
import { InvalidPriceError, InvalidReserveError } from '../../errors/app.errors';

export const WAD_DECIMALS = 18;
export const WAD = 10n ** 18n;
export const BPS_DENOMINATOR = 10000n;

export function toWad(value: string | number): bigint {
  return parseUnits(String(value), WAD_DECIMALS);
}

export function formatWad(value: bigint, fractionDigits = 4): string {
  const [whole, fraction = ''] = formatUnits(value, WAD_DECIMALS).split('.');
  const trimmed = fraction.slice(0, fractionDigits).replace(/0+$/, '');
  return trimmed ? `${whole}.${trimmed}` : whole;
}

export function absDiff(a: bigint, b: bigint): bigint {
  return a >= b ? a - b : b - a;
}

export function minOf(a: bigint, b: bigint): bigint {
  return a <= b ? a : b;
}

/**
 * Floor of `(max - min) * 10000 / min` across the given prices.
 */
export function calculatePriceGapBps(prices: readonly bigint[]): bigint {
  if (prices.length === 0) {
    throw new InvalidPriceError('No prices supplied');
  }
  let max = prices[0];
  let min = prices[0];
  for (const price of prices) {
    if (price > max) max = price;
    if (price < min) min = price;
  }
  if (min <= 0n) {
    throw new InvalidPriceError(`Minimum price must be positive, got ${min}`);
  }
  return ((max - min) * BPS_DENOMINATOR) / min;
}

/**
 * Profit estimate for trading across one source pair, bounded by the
 * shallower side: `min(liq) * |pA - pB| / (min(pA, pB) * 10)`.
 * A large price paired with a tiny difference can truncate to zero.
 */
export function estimatePairProfit(params: {
  liquidityA: bigint;
  liquidityB: bigint;
  priceA: bigint;
  priceB: bigint;
}): bigint {
  const { liquidityA, liquidityB, priceA, priceB } = params;
  const referencePrice = minOf(priceA, priceB);
  if (referencePrice <= 0n) {
    throw new InvalidPriceError(
      `Reference price must be positive, got ${referencePrice}`,
    );
  }
  return (minOf(liquidityA, liquidityB) * absDiff(priceA, priceB)) / (referencePrice * 10n);
}

/**
 * Gas cost in quote units: wei price * gas units * asset price, rescaled
 * from wei to 18-decimal quote units.
 */
export function estimateGasCost(params: {
  gasPriceHint: bigint;
  gasUnits: bigint;
  assetPrice: bigint;
}): bigint {
  return (params.gasPriceHint * params.gasUnits * params.assetPrice) / WAD;
}

/**
 * `(reserveBase * 1000) / (reserveQuote / WAD)`: base units per whole quote
 * unit, in thousandths.
 */
export function calculateReserveRatio(reserveBase: bigint, reserveQuote: bigint): bigint {
  const quoteUnits = reserveQuote / WAD;
  if (quoteUnits === 0n) {
    throw new InvalidReserveError(
      `Quote reserve below one unit (${reserveQuote})`,
    );
  }
  return (reserveBase * 1000n) / quoteUnits;
}
