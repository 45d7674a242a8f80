import { ethers } from 'ethers';
import { Token } from '@uniswap/sdk-core';
import { ConfigError } from './errors.js';

export const MAINNET_CHAIN_ID = 1;
export const DEFAULT_ALCHEMY_HOST = 'eth-mainnet.g.alchemy.com';
export const DEFAULT_POOL_FEE = 3000; // 0.3%
export const MAX_UINT24 = 2 ** 24 - 1;

// https://docs.uniswap.org/contracts/v3/reference/deployments
export const UNISWAP_V3_FACTORY = '0x1F98431c8aD98523631AE4a59f267346ea31F984';
const WETH_ADDRESS = '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2';
const USDC_ADDRESS = '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48';

/**
 * Resolved once at startup and handed to the reader; nothing downstream
 * looks at `process.env`.
 */
export interface PriceClientConfig {
  rpcUrl: string;
  chainId: number;
  factoryAddress: string;
  /** Token being priced. */
  baseToken: Token;
  /** Token the price is expressed in. */
  quoteToken: Token;
  /** Fee tier in hundredths of a bip (3000 = 0.3%). */
  fee: number;
  debug: boolean;
}

export function buildRpcUrl(host: string, apiKey: string): string {
  return `https://${host}/v2/${apiKey}`;
}

function parseAddress(value: string, label: string): string {
  try {
    return ethers.utils.getAddress(value);
  } catch (err) {
    throw new ConfigError(`Invalid ${label} address: ${value}`, { value, cause: err });
  }
}

function parseFee(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_POOL_FEE;
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError(`POOL_FEE must be an unsigned integer, got "${raw}"`, { value: raw });
  }
  const fee = Number(trimmed);
  if (fee > MAX_UINT24) {
    throw new ConfigError(`POOL_FEE must fit in uint24, got ${fee}`, { value: raw });
  }
  return fee;
}

/**
 * Build the client configuration from environment variables.
 *
 * Throws `ConfigError` when `ALCHEMY_API_KEY` is missing or blank, or when
 * `POOL_FEE` is not a uint24.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PriceClientConfig {
  const apiKey = env.ALCHEMY_API_KEY?.trim();
  if (!apiKey) {
    throw new ConfigError('ALCHEMY_API_KEY not set');
  }
  const host = env.ALCHEMY_HOST?.trim() || DEFAULT_ALCHEMY_HOST;

  const factoryAddress = parseAddress(UNISWAP_V3_FACTORY, 'factory');
  const baseToken = new Token(
    MAINNET_CHAIN_ID,
    parseAddress(WETH_ADDRESS, 'base token'),
    18,
    'WETH',
    'Wrapped Ether',
  );
  const quoteToken = new Token(
    MAINNET_CHAIN_ID,
    parseAddress(USDC_ADDRESS, 'quote token'),
    6,
    'USDC',
    'USD Coin',
  );
  if (baseToken.equals(quoteToken)) {
    throw new ConfigError('Base and quote tokens must differ', { address: baseToken.address });
  }

  return {
    rpcUrl: buildRpcUrl(host, apiKey),
    chainId: MAINNET_CHAIN_ID,
    factoryAddress,
    baseToken,
    quoteToken,
    fee: parseFee(env.POOL_FEE),
    debug: env.DEX_DEBUG === 'true',
  };
}
