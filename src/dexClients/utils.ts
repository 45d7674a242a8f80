import { ethers } from 'ethers';
import { AbiMismatchError } from '../errors.js';

export function checkAbi(iface: ethers.utils.Interface, methods: string[], debug: boolean) {
  const fragments = iface.fragments.map(f => f.name);
  for (const m of methods) {
    if (!fragments.includes(m)) {
      if (debug) console.error(`[UniswapV3] ABI mismatch: ${m}`);
      throw new AbiMismatchError(m);
    }
  }
  if (debug) console.log('[UniswapV3] ABI matches:', methods.join(', '));
}

export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function isZeroAddress(address: string): boolean {
  return sameAddress(address, ethers.constants.AddressZero);
}
