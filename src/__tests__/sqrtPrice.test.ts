import { describe, it, expect } from 'vitest';
import { Fraction } from '@uniswap/sdk-core';
import { PriceMathError } from '../errors.js';
import {
  MAX_UINT160,
  Q96,
  decimalScale,
  decodeSqrtPriceX96,
  encodeSqrtPriceX96,
  orientPrice,
  sortTokens,
  toApproximateNumber,
} from '../math/sqrtPrice.js';
import { SQRT_PRICE_2500, USDC, WETH } from './helpers/fixtures.js';

describe('decodeSqrtPriceX96', () => {
  it('decodes 2^96 with 18/6 decimals to exactly 10^12', () => {
    const decoded = decodeSqrtPriceX96(79228162514264337593543950336n, 18, 6);
    expect(decoded.sqrtPrice.equalTo(new Fraction('1'))).toBe(true);
    expect(decoded.price0in1.equalTo(new Fraction('1000000000000'))).toBe(true);
    expect(decoded.price0in1.quotient.toString()).toBe('1000000000000');
    expect(decoded.price0in1.remainder.numerator.toString()).toBe('0');
    expect(toApproximateNumber(decoded.price0in1)).toBe(1e12);
  });

  it('keeps sqrtPrice as the exact fraction v / 2^96', () => {
    const v = 3n * 2n ** 95n;
    const decoded = decodeSqrtPriceX96(v, 0, 0);
    expect(decoded.sqrtPrice.numerator.toString()).toBe(v.toString());
    expect(decoded.sqrtPrice.denominator.toString()).toBe(Q96.toString());
    expect(decoded.ratio.equalTo(new Fraction('9', '4'))).toBe(true);
    expect(decoded.price0in1.equalTo(new Fraction('9', '4'))).toBe(true);
  });

  it('puts a negative decimal exponent in the denominator', () => {
    const decoded = decodeSqrtPriceX96(Q96, 6, 18);
    expect(decoded.price0in1.equalTo(new Fraction('1', '1000000000000'))).toBe(true);
    expect(decoded.price1in0.equalTo(new Fraction('1000000000000'))).toBe(true);
  });

  it('fails explicitly on zero', () => {
    expect(() => decodeSqrtPriceX96(0n, 18, 6)).toThrow(PriceMathError);
    expect(() => decodeSqrtPriceX96(0n, 18, 6)).toThrow('Division by zero: sqrtPriceX96 is 0, pool is not initialized');
  });

  it('rejects values outside uint160', () => {
    expect(() => decodeSqrtPriceX96(MAX_UINT160 + 1n, 18, 6)).toThrow(PriceMathError);
    expect(() => decodeSqrtPriceX96(-1n, 18, 6)).toThrow(PriceMathError);
  });

  it('decodes the largest uint160 without overflow', () => {
    const decoded = decodeSqrtPriceX96(MAX_UINT160, 0, 0);
    expect(decoded.price0in1.numerator.toString()).toBe((MAX_UINT160 * MAX_UINT160).toString());
    expect(decoded.price0in1.denominator.toString()).toBe((2n ** 192n).toString());
    expect(toApproximateNumber(decoded.price0in1) / 2 ** 128).toBeCloseTo(1, 12);
  });

  it('rejects decimals outside [0, 255)', () => {
    expect(() => decodeSqrtPriceX96(Q96, 1.5, 6)).toThrow(PriceMathError);
    expect(() => decodeSqrtPriceX96(Q96, 18, -1)).toThrow(PriceMathError);
    expect(() => decodeSqrtPriceX96(Q96, 255, 6)).toThrow(PriceMathError);
  });
});

describe('decimalScale', () => {
  it('scales by 10^(d0 - d1)', () => {
    expect(decimalScale(18, 6).equalTo(new Fraction('1000000000000'))).toBe(true);
    expect(decimalScale(6, 18).equalTo(new Fraction('1', '1000000000000'))).toBe(true);
    expect(decimalScale(8, 8).equalTo(new Fraction('1'))).toBe(true);
  });
});

describe('encodeSqrtPriceX96', () => {
  it('encodes a perfect-square ratio exactly', () => {
    // 1/2500 WETH per USDC is a raw ratio of 4e8
    expect(encodeSqrtPriceX96(new Fraction('1', '2500'), 6, 18)).toBe(SQRT_PRICE_2500);
  });

  it('round-trips a price within the truncation error', () => {
    const price = new Fraction('1', '2000');
    const decoded = decodeSqrtPriceX96(encodeSqrtPriceX96(price, 6, 18), 6, 18);

    // encoding floors, so decoding never overshoots the input price
    expect(decoded.price0in1.greaterThan(price)).toBe(false);
    const relativeError = price.subtract(decoded.price0in1).divide(price);
    expect(relativeError.lessThan(new Fraction('1', `1${'0'.repeat(30)}`))).toBe(true);
    expect(toApproximateNumber(decoded.price1in0)).toBeCloseTo(2000, 9);
  });

  it('refuses to encode zero', () => {
    expect(() => encodeSqrtPriceX96(new Fraction('0'), 6, 18)).toThrow(PriceMathError);
  });

  it('refuses to encode a negative price', () => {
    expect(() => encodeSqrtPriceX96(new Fraction('-1', '2000'), 6, 18)).toThrow(PriceMathError);
    expect(() => encodeSqrtPriceX96(new Fraction('1', '-2000'), 6, 18)).toThrow('Cannot encode a non-positive price');
  });

  it('accepts a price with both signs negative', () => {
    expect(encodeSqrtPriceX96(new Fraction('-1', '-2500'), 6, 18)).toBe(SQRT_PRICE_2500);
  });
});

describe('orientPrice', () => {
  const decoded = decodeSqrtPriceX96(SQRT_PRICE_2500, USDC.decimals, WETH.decimals);

  it('prices WETH in USDC when WETH is token1', () => {
    expect(orientPrice(decoded, WETH, USDC).equalTo(new Fraction('2500'))).toBe(true);
  });

  it('prices USDC in WETH when USDC is token0', () => {
    expect(orientPrice(decoded, USDC, WETH).equalTo(new Fraction('1', '2500'))).toBe(true);
  });
});

describe('sortTokens', () => {
  it('puts the lower address first regardless of input order', () => {
    expect(sortTokens(WETH, USDC)).toEqual([USDC, WETH]);
    expect(sortTokens(USDC, WETH)).toEqual([USDC, WETH]);
  });
});

describe('toApproximateNumber', () => {
  it('converts small fractions', () => {
    expect(toApproximateNumber(new Fraction('1', '2500'))).toBe(0.0004);
    expect(toApproximateNumber(new Fraction('1', '3'), 6)).toBe(0.333333);
  });
});
