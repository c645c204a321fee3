/**
 * Shared test data and node scripts
 */

import type { Address, Hash, Hex } from '../../src/core/types.js';
import { normalizeAddress } from '../../src/core/address.js';
import { isHash, keccak256 } from '../../src/core/hash.js';
import { isHex, numberToHex } from '../../src/core/hex.js';
import { GWEI } from '../../src/core/units.js';
import type { BlobSidecar } from '../../src/protocol/transaction.js';
import { FakeTransport, failure, result } from './fake-transport.js';

export const TEST_PRIVATE_KEY: Hex = `0x${'01'.repeat(32)}`;

export const TOKEN_ADDRESS: Address = normalizeAddress('0x1111111111111111111111111111111111111111');
export const HOLDER: Address = normalizeAddress('0x2222222222222222222222222222222222222222');
export const RECIPIENT: Address = normalizeAddress('0x3333333333333333333333333333333333333333');

export const BLOCK_HASH: Hash = keccak256('test-block');
export const TX_HASH: Hash = keccak256('test-transaction');

export const TOKEN_ABI = [
  {
    type: 'function',
    name: 'balanceOf',
    stateMutability: 'view',
    inputs: [{ name: 'account', type: 'address' }],
    outputs: [{ name: '', type: 'uint256' }],
  },
  {
    type: 'function',
    name: 'name',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'string' }],
  },
  {
    type: 'function',
    name: 'decimals',
    stateMutability: 'pure',
    inputs: [],
    outputs: [{ name: '', type: 'uint8' }],
  },
  {
    type: 'function',
    name: 'owner',
    stateMutability: 'view',
    inputs: [],
    outputs: [{ name: '', type: 'address' }],
  },
  {
    type: 'function',
    name: 'reserves',
    stateMutability: 'view',
    inputs: [],
    outputs: [
      { name: 'base', type: 'uint112' },
      { name: 'quote', type: 'uint112' },
    ],
  },
  {
    type: 'function',
    name: 'transfer',
    stateMutability: 'nonpayable',
    inputs: [
      { name: 'to', type: 'address' },
      { name: 'amount', type: 'uint256' },
    ],
    outputs: [{ name: '', type: 'bool' }],
  },
  {
    type: 'function',
    name: 'deposit',
    stateMutability: 'payable',
    inputs: [],
    outputs: [],
  },
  {
    type: 'function',
    name: 'burn',
    stateMutability: 'nonpayable',
    inputs: [{ name: 'amount', type: 'uint256' }],
    outputs: [],
  },
  {
    type: 'event',
    name: 'Transfer',
    anonymous: false,
    inputs: [
      { name: 'from', type: 'address', indexed: true },
      { name: 'to', type: 'address', indexed: true },
      { name: 'value', type: 'uint256', indexed: false },
    ],
  },
  {
    type: 'error',
    name: 'InsufficientBalance',
    inputs: [
      { name: 'available', type: 'uint256' },
      { name: 'required', type: 'uint256' },
    ],
  },
] as const;

export interface NodeScript {
  chainId?: number;
  /** null removes baseFeePerGas from the latest block */
  baseFee?: bigint | null;
  gasPrice?: bigint;
  estimate?: bigint;
  nonce?: number;
  blobBaseFee?: bigint;
}

export function blockJson(baseFee: bigint | null): Record<string, unknown> {
  return {
    number: '0x10',
    hash: BLOCK_HASH,
    timestamp: '0x6553f100',
    ...(baseFee !== null && { baseFeePerGas: numberToHex(baseFee) }),
  };
}

export function receiptJson(
  transactionHash: Hash,
  status: boolean,
  overrides: Record<string, unknown> = {}
): Record<string, unknown> {
  return {
    transactionHash,
    blockHash: BLOCK_HASH,
    blockNumber: '0x11',
    from: HOLDER.toLowerCase(),
    to: TOKEN_ADDRESS.toLowerCase(),
    contractAddress: null,
    logs: [],
    status: status ? '0x1' : '0x0',
    gasUsed: '0xc350',
    effectiveGasPrice: '0x4a817c800',
    ...overrides,
  };
}

/**
 * A node that answers every write-path method; eth_sendRawTransaction echoes keccak256(raw)
 */
export function scriptNode(transport: FakeTransport, script: NodeScript = {}): FakeTransport {
  return transport
    .respond('eth_chainId', numberToHex(script.chainId ?? 1))
    .respond('eth_getBlockByNumber', blockJson(script.baseFee === undefined ? GWEI(10) : script.baseFee))
    .respond('eth_gasPrice', numberToHex(script.gasPrice ?? GWEI(20)))
    .respond('eth_estimateGas', numberToHex(script.estimate ?? 50_000n))
    .respond('eth_getTransactionCount', numberToHex(script.nonce ?? 7))
    .respond('eth_blobBaseFee', numberToHex(script.blobBaseFee ?? GWEI(1)))
    .handle('eth_sendRawTransaction', ([raw]) =>
      isHex(raw) ? result(keccak256(raw)) : failure(-32602, 'invalid raw transaction')
    );
}

/**
 * The raw transaction of the n-th eth_sendRawTransaction call
 */
export function sentRaw(transport: FakeTransport, index = 0): Hex {
  const [raw] = transport.paramsOf('eth_sendRawTransaction', index);
  if (!isHex(raw)) {
    throw new Error('eth_sendRawTransaction was not called with hex');
  }
  return raw;
}

/**
 * One 32-byte ABI word, without the 0x prefix
 */
export function word(value: bigint): string {
  return value.toString(16).padStart(64, '0');
}

export function addressWord(address: string): string {
  return address.slice(2).toLowerCase().padStart(64, '0');
}

export function asHash(hex: string): Hash {
  if (!isHash(hex)) {
    throw new Error(`${hex} is not a 32-byte hash`);
  }
  return hex;
}

/**
 * Error(string) revert payload
 */
export function errorStringData(reason: string): Hex {
  const bytes = new TextEncoder().encode(reason);
  const body = Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
  const padded = body.padEnd(Math.ceil(body.length / 64) * 64, '0');
  return `0x08c379a0${word(32n)}${word(BigInt(bytes.length))}${padded}`;
}

/**
 * Zero blobs with distinct commitments; shapes are valid, the KZG values are not
 */
export function blobSidecar(count: number): BlobSidecar {
  return {
    blobs: Array.from({ length: count }, () => `0x${'00'.repeat(131072)}` as const),
    commitments: Array.from({ length: count }, (_, i) => `0x${'c0'.repeat(47)}${i.toString(16).padStart(2, '0')}` as const),
    proofs: Array.from({ length: count }, () => `0x${'ab'.repeat(48)}` as const),
  };
}
