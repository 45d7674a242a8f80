import { ethers } from 'ethers';
import type { Fraction, Token } from '@uniswap/sdk-core';
import { loadConfig, type PriceClientConfig } from './config.js';
import { createPoolStateReader, resolvePool, type PoolStateReader, type PoolTokens, type Slot0 } from './dexClients/uniswapV3.js';
import { sameAddress } from './dexClients/utils.js';
import { PoolMismatchError } from './errors.js';
import { decodeSqrtPriceX96, orientPrice, sortTokens, toApproximateNumber } from './math/sqrtPrice.js';

export interface PoolPriceReport {
  pool: string;
  tokens: PoolTokens;
  slot0: Slot0;
  /** Price of the base token in quote token units, exact. */
  price: Fraction;
  /** `price` rounded to a float for display. */
  approxPrice: number;
}

export type PrintFn = (line: string) => void;

export function formatSlot0(slot0: Slot0): string {
  return (
    `slot0: sqrtPriceX96=${slot0.sqrtPriceX96} tick=${slot0.tick}` +
    ` observationIndex=${slot0.observationIndex}` +
    ` observationCardinality=${slot0.observationCardinality}` +
    ` observationCardinalityNext=${slot0.observationCardinalityNext}` +
    ` feeProtocol=${slot0.feeProtocol} unlocked=${slot0.unlocked}`
  );
}

export function formatPrice(approxPrice: number, base: Token, quote: Token): string {
  return `price: ${approxPrice} ${quote.symbol ?? quote.address} per ${base.symbol ?? base.address}`;
}

function verifyPoolTokens(pool: string, tokens: PoolTokens, token0: Token, token1: Token) {
  if (!sameAddress(tokens.token0, token0.address) || !sameAddress(tokens.token1, token1.address)) {
    throw new PoolMismatchError(pool, [token0.address, token1.address], [tokens.token0, tokens.token1]);
  }
}

/**
 * Resolve the configured pool, read its state and price the base token.
 * Calls run one after another; the first failure aborts the run.
 */
export async function checkPoolPrice(
  config: PriceClientConfig,
  reader: PoolStateReader,
  print: PrintFn = console.log,
): Promise<PoolPriceReport> {
  const { baseToken, quoteToken, fee } = config;

  const pool = await resolvePool(reader, baseToken.address, quoteToken.address, fee);
  print(`pool: ${pool}`);

  const [token0, token1] = sortTokens(baseToken, quoteToken);
  const tokens = await reader.tokens(pool);
  verifyPoolTokens(pool, tokens, token0, token1);

  const slot0 = await reader.slot0(pool);
  print(formatSlot0(slot0));

  const decoded = decodeSqrtPriceX96(slot0.sqrtPriceX96, token0.decimals, token1.decimals);
  const price = orientPrice(decoded, baseToken, quoteToken);
  const approxPrice = toApproximateNumber(price);
  print(formatPrice(approxPrice, baseToken, quoteToken));

  return { pool, tokens, slot0, price, approxPrice };
}

export interface RunDeps {
  createProvider?: (config: PriceClientConfig) => ethers.providers.Provider;
  print?: PrintFn;
}

function defaultProvider(config: PriceClientConfig): ethers.providers.Provider {
  return new ethers.providers.StaticJsonRpcProvider(config.rpcUrl, config.chainId);
}

/**
 * Load configuration from `env` and run the price check against a live
 * provider. Configuration errors surface before any provider is created.
 */
export async function runPriceCheck(env: NodeJS.ProcessEnv, deps: RunDeps = {}): Promise<PoolPriceReport> {
  const config = loadConfig(env);
  const provider = (deps.createProvider ?? defaultProvider)(config);
  const reader = createPoolStateReader(provider, {
    factoryAddress: config.factoryAddress,
    debug: config.debug,
  });
  return checkPoolPrice(config, reader, deps.print);
}
