import { ethers } from 'ethers';
import UniswapV3FactoryABI from '../abi/UniswapV3Factory.json' with { type: 'json' };
import UniswapV3PoolABI from '../abi/UniswapV3Pool.json' with { type: 'json' };
import { MalformedResponseError, PoolNotFoundError, mapError } from '../errors.js';
import { checkAbi, isZeroAddress } from './utils.js';

/**
 * Decoded `slot0()` of a Uniswap V3 pool.
 */
export interface Slot0 {
  sqrtPriceX96: bigint;
  tick: number;
  observationIndex: number;
  observationCardinality: number;
  observationCardinalityNext: number;
  feeProtocol: number;
  unlocked: boolean;
}

export interface PoolTokens {
  token0: string;
  token1: string;
}

/**
 * Read-only calls against the V3 factory and its pools.
 */
export interface PoolStateReader {
  getPool(tokenA: string, tokenB: string, fee: number): Promise<string>;
  slot0(pool: string): Promise<Slot0>;
  tokens(pool: string): Promise<PoolTokens>;
}

export interface PoolStateReaderOptions {
  factoryAddress: string;
  debug?: boolean;
}

const FACTORY_METHODS = ['getPool'];
const POOL_METHODS = ['slot0', 'token0', 'token1'];

function parseAddressResult(raw: unknown, method: string): string {
  if (typeof raw !== 'string' || !ethers.utils.isAddress(raw)) {
    throw new MalformedResponseError(`${method} returned a non-address value`, { method, value: String(raw) });
  }
  return ethers.utils.getAddress(raw);
}

function parseSmallInt(value: unknown, field: string, min: number, max: number): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
    throw new MalformedResponseError(`slot0.${field} out of range: ${String(value)}`, { field });
  }
  return value;
}

/**
 * Validate the 7-tuple returned by `slot0()`. ethers v5 hands back uint160
 * as a BigNumber and the narrow integer fields as plain numbers.
 */
export function parseSlot0(raw: unknown): Slot0 {
  if (!Array.isArray(raw) || raw.length < 7) {
    throw new MalformedResponseError('slot0 did not return a 7-tuple');
  }
  const values: unknown[] = raw;
  const [sqrtPriceX96, tick, observationIndex, observationCardinality, observationCardinalityNext, feeProtocol, unlocked] =
    values;

  let sqrtPrice: bigint;
  if (ethers.BigNumber.isBigNumber(sqrtPriceX96)) {
    sqrtPrice = sqrtPriceX96.toBigInt();
  } else if (typeof sqrtPriceX96 === 'bigint') {
    sqrtPrice = sqrtPriceX96;
  } else {
    throw new MalformedResponseError('slot0.sqrtPriceX96 is not an integer', { field: 'sqrtPriceX96' });
  }
  if (typeof unlocked !== 'boolean') {
    throw new MalformedResponseError('slot0.unlocked is not a boolean', { field: 'unlocked' });
  }

  return {
    sqrtPriceX96: sqrtPrice,
    tick: parseSmallInt(tick, 'tick', -(2 ** 23), 2 ** 23 - 1),
    observationIndex: parseSmallInt(observationIndex, 'observationIndex', 0, 2 ** 16 - 1),
    observationCardinality: parseSmallInt(observationCardinality, 'observationCardinality', 0, 2 ** 16 - 1),
    observationCardinalityNext: parseSmallInt(observationCardinalityNext, 'observationCardinalityNext', 0, 2 ** 16 - 1),
    feeProtocol: parseSmallInt(feeProtocol, 'feeProtocol', 0, 2 ** 8 - 1),
    unlocked,
  };
}

async function contractCall(fn: () => Promise<unknown>, details: Record<string, unknown>): Promise<unknown> {
  try {
    return await fn();
  } catch (err) {
    throw mapError(err, details);
  }
}

/**
 * Build a reader backed by ethers contracts on `provider`.
 *
 * The bundled ABIs are checked up front so a missing fragment fails before
 * the first request goes out.
 */
export function createPoolStateReader(
  provider: ethers.providers.Provider,
  options: PoolStateReaderOptions,
): PoolStateReader {
  const debug = options.debug ?? false;
  const factoryInterface = new ethers.utils.Interface(UniswapV3FactoryABI);
  const poolInterface = new ethers.utils.Interface(UniswapV3PoolABI);
  checkAbi(factoryInterface, FACTORY_METHODS, debug);
  checkAbi(poolInterface, POOL_METHODS, debug);

  const factory = new ethers.Contract(options.factoryAddress, factoryInterface, provider);
  const poolContract = (pool: string) => new ethers.Contract(pool, poolInterface, provider);

  return {
    async getPool(tokenA, tokenB, fee) {
      const raw = await contractCall(() => factory.getPool(tokenA, tokenB, fee), {
        method: 'getPool',
        factory: options.factoryAddress,
      });
      const pool = parseAddressResult(raw, 'getPool');
      if (debug) console.log('[UniswapV3] getPool:', tokenA, tokenB, fee, '->', pool);
      return pool;
    },

    async slot0(pool) {
      const raw = await contractCall(() => poolContract(pool).slot0(), { method: 'slot0', pool });
      const slot0 = parseSlot0(raw);
      if (debug) console.log('[UniswapV3] slot0.sqrtPriceX96:', slot0.sqrtPriceX96.toString(), 'tick:', slot0.tick);
      return slot0;
    },

    async tokens(pool) {
      const contract = poolContract(pool);
      const token0 = parseAddressResult(
        await contractCall(() => contract.token0(), { method: 'token0', pool }),
        'token0',
      );
      const token1 = parseAddressResult(
        await contractCall(() => contract.token1(), { method: 'token1', pool }),
        'token1',
      );
      if (debug) console.log('[UniswapV3] token0:', token0, 'token1:', token1);
      return { token0, token1 };
    },
  };
}

/**
 * Look up the pool for a pair and fee tier. The factory answers with the
 * zero address when no such pool exists.
 */
export async function resolvePool(
  reader: PoolStateReader,
  tokenA: string,
  tokenB: string,
  fee: number,
): Promise<string> {
  const pool = await reader.getPool(tokenA, tokenB, fee);
  if (isZeroAddress(pool)) {
    throw new PoolNotFoundError(tokenA, tokenB, fee);
  }
  return pool;
}
