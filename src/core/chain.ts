/**
 * Chain profiles
 * Per-network defaults used to seed wallet clients and fee strategies
 */

import { GWEI } from './units.js';

export interface ChainProfile {
  readonly chainId: number;
  readonly name: string;
  readonly defaultRpcUrl?: string;
  readonly supportsEip1559: boolean;
  readonly defaultPriorityFeePerGas: bigint;
}

/**
 * Create a chain profile, validating the chain id
 */
export function defineChain(profile: ChainProfile): ChainProfile {
  if (!Number.isSafeInteger(profile.chainId) || profile.chainId <= 0) {
    throw new Error(`Chain id must be a positive integer, got ${profile.chainId}`);
  }
  if (profile.defaultPriorityFeePerGas < 0n) {
    throw new Error('defaultPriorityFeePerGas cannot be negative');
  }
  return Object.freeze({ ...profile });
}

export const mainnet = defineChain({
  chainId: 1,
  name: 'Ethereum',
  defaultRpcUrl: 'https://ethereum.publicnode.com',
  supportsEip1559: true,
  defaultPriorityFeePerGas: GWEI(1),
});

export const sepolia = defineChain({
  chainId: 11155111,
  name: 'Sepolia',
  defaultRpcUrl: 'https://ethereum-sepolia.publicnode.com',
  supportsEip1559: true,
  defaultPriorityFeePerGas: GWEI(1),
});

export const base = defineChain({
  chainId: 8453,
  name: 'Base',
  defaultRpcUrl: 'https://mainnet.base.org',
  supportsEip1559: true,
  defaultPriorityFeePerGas: GWEI(1),
});

export const baseSepolia = defineChain({
  chainId: 84532,
  name: 'Base Sepolia',
  defaultRpcUrl: 'https://sepolia.base.org',
  supportsEip1559: true,
  defaultPriorityFeePerGas: GWEI(1),
});

export const anvil = defineChain({
  chainId: 31337,
  name: 'Anvil',
  defaultRpcUrl: 'http://127.0.0.1:8545',
  supportsEip1559: true,
  defaultPriorityFeePerGas: GWEI(1),
});
