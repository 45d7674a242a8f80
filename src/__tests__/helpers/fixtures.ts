import { Token } from '@uniswap/sdk-core';
import type { FakePool } from './fakeRpcProvider.js';

export const FACTORY = '0x1F98431c8aD98523631AE4a59f267346ea31F984';
export const WETH_ADDRESS = '0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2';
export const USDC_ADDRESS = '0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48';
export const DAI_ADDRESS = '0x6B175474E89094C44Da98b954EedeAC495271d0F';
export const POOL_ADDRESS = '0x1111111111111111111111111111111111111111';

export const WETH = new Token(1, WETH_ADDRESS, 18, 'WETH', 'Wrapped Ether');
export const USDC = new Token(1, USDC_ADDRESS, 6, 'USDC', 'USD Coin');

// sqrt(4e8) * 2^96: token0 USDC, token1 WETH, 2500 USDC per WETH
export const SQRT_PRICE_2500 = 20000n * 2n ** 96n;

export const TEST_ENV = { ALCHEMY_API_KEY: 'test-key' };

export function wethUsdcPool(overrides: Partial<FakePool> = {}): FakePool {
  return {
    address: POOL_ADDRESS,
    tokenA: WETH_ADDRESS,
    tokenB: USDC_ADDRESS,
    fee: 3000,
    slot0: [SQRT_PRICE_2500, 198080, 7, 100, 100, 0, true],
    ...overrides,
  };
}
