import { Fraction, Token } from '@uniswap/sdk-core';
import { encodeSqrtRatioX96 } from '@uniswap/v3-sdk';
import { PriceMathError } from '../errors.js';

export const Q96 = 2n ** 96n;
export const MAX_UINT160 = 2n ** 160n - 1n;

export interface DecodedPrice {
  /** sqrtPriceX96 / 2^96, exact. */
  sqrtPrice: Fraction;
  /** Raw token1 base units per token0 base unit. */
  ratio: Fraction;
  /** Token1 per token0, adjusted for decimals. */
  price0in1: Fraction;
  /** Token0 per token1, adjusted for decimals. */
  price1in0: Fraction;
}

function assertDecimals(decimals: number, label: string): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals >= 255) {
    throw new PriceMathError(`${label} must be an integer in [0, 255), got ${decimals}`, { decimals });
  }
}

/**
 * 10^(decimals0 - decimals1) as an exact fraction; a negative exponent
 * lands in the denominator.
 */
export function decimalScale(decimals0: number, decimals1: number): Fraction {
  assertDecimals(decimals0, 'decimals0');
  assertDecimals(decimals1, 'decimals1');
  const exponent = decimals0 - decimals1;
  const power = (10n ** BigInt(Math.abs(exponent))).toString();
  return exponent >= 0 ? new Fraction(power) : new Fraction('1', power);
}

/**
 * Decode a pool's Q64.96 square-root price into exact rationals.
 *
 * Zero is rejected rather than decoded: an uninitialized pool has no price,
 * and inverting it would divide by zero.
 */
export function decodeSqrtPriceX96(sqrtPriceX96: bigint, decimals0: number, decimals1: number): DecodedPrice {
  if (sqrtPriceX96 < 0n || sqrtPriceX96 > MAX_UINT160) {
    throw new PriceMathError(`sqrtPriceX96 out of uint160 range: ${sqrtPriceX96}`, {
      sqrtPriceX96: sqrtPriceX96.toString(),
    });
  }
  if (sqrtPriceX96 === 0n) {
    throw new PriceMathError('Division by zero: sqrtPriceX96 is 0, pool is not initialized', {
      sqrtPriceX96: '0',
    });
  }
  const scale = decimalScale(decimals0, decimals1);

  const sqrtPrice = new Fraction(sqrtPriceX96.toString(), Q96.toString());
  const ratio = sqrtPrice.multiply(sqrtPrice);
  const price0in1 = ratio.multiply(scale);
  return { sqrtPrice, ratio, price0in1, price1in0: price0in1.invert() };
}

/**
 * Inverse of `decodeSqrtPriceX96`: floor(sqrt(price / 10^(d0 - d1)) * 2^96).
 */
export function encodeSqrtPriceX96(price0in1: Fraction, decimals0: number, decimals1: number): bigint {
  const sign = BigInt(price0in1.numerator.toString()) * BigInt(price0in1.denominator.toString());
  if (sign <= 0n) {
    throw new PriceMathError('Cannot encode a non-positive price', {
      numerator: price0in1.numerator.toString(),
      denominator: price0in1.denominator.toString(),
    });
  }
  const ratio = price0in1.divide(decimalScale(decimals0, decimals1));
  // both signs agree here; hand the SDK magnitudes only
  const numerator = ratio.numerator.toString().replace(/^-/, '');
  const denominator = ratio.denominator.toString().replace(/^-/, '');
  const encoded = BigInt(encodeSqrtRatioX96(numerator, denominator).toString());
  if (encoded > MAX_UINT160) {
    throw new PriceMathError(`Encoded sqrtPriceX96 exceeds uint160: ${encoded}`, { sqrtPriceX96: encoded.toString() });
  }
  return encoded;
}

/**
 * Lossy conversion for display. Everything before this stays exact.
 */
export function toApproximateNumber(value: Fraction, significantDigits = 15): number {
  return parseFloat(value.toSignificant(significantDigits));
}

/**
 * Pools order their tokens by address; the lower one is token0.
 */
export function sortTokens(tokenA: Token, tokenB: Token): [Token, Token] {
  return tokenA.sortsBefore(tokenB) ? [tokenA, tokenB] : [tokenB, tokenA];
}

/**
 * Price of `base` in units of `quote`, whichever side of the pool each sits on.
 */
export function orientPrice(decoded: DecodedPrice, base: Token, quote: Token): Fraction {
  return base.sortsBefore(quote) ? decoded.price0in1 : decoded.price1in0;
}
