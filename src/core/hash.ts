/**
 * Cryptographic hash functions
 * Wrapper around @noble/hashes for Ethereum-specific hashing
 */

import { keccak_256 } from '@noble/hashes/sha3';
import { sha256 as nobleSha256 } from '@noble/hashes/sha256';
import type { Hash, Hex } from './types.js';
import { bytesToHex, hexToBytes, isHex } from './hex.js';

function toBytes(data: Hex | Uint8Array | string): Uint8Array {
  if (data instanceof Uint8Array) return data;
  if (isHex(data)) return hexToBytes(data);
  return new TextEncoder().encode(data);
}

/**
 * Check for a 32-byte hex string
 */
export function isHash(value: unknown): value is Hash {
  return isHex(value) && value.length === 66;
}

/**
 * Compute keccak256 hash
 * Hex input is hashed as bytes, any other string as UTF-8
 */
export function keccak256(data: Hex | Uint8Array | string): Hash {
  const hash = bytesToHex(keccak_256(toBytes(data)));
  if (!isHash(hash)) {
    throw new Error('keccak256 produced a digest of unexpected length');
  }
  return hash;
}

/**
 * Compute SHA256 hash
 */
export function sha256(data: Hex | Uint8Array): Uint8Array {
  return nobleSha256(toBytes(data));
}

/**
 * Compute function selector from a canonical function signature
 * e.g., "transfer(address,uint256)" -> "0xa9059cbb"
 */
export function functionSelector(signature: string): Hex {
  if (signature.trim() === '') {
    throw new Error('functionSignature must be provided');
  }
  return `0x${keccak256(signature).slice(2, 10)}`;
}

/**
 * Compute event topic from a canonical event signature
 * e.g., "Transfer(address,address,uint256)" -> full keccak256 hash
 */
export function eventTopic(signature: string): Hash {
  if (signature.trim() === '') {
    throw new Error('eventSignature must be provided');
  }
  return keccak256(signature);
}

/**
 * Hash a message according to EIP-191 personal sign
 * Prepends "\x19Ethereum Signed Message:\n" + length
 */
export function hashMessage(message: string | Uint8Array): Hash {
  const messageBytes = typeof message === 'string' ? new TextEncoder().encode(message) : message;
  const prefixBytes = new TextEncoder().encode(`\x19Ethereum Signed Message:\n${messageBytes.length}`);

  const combined = new Uint8Array(prefixBytes.length + messageBytes.length);
  combined.set(prefixBytes);
  combined.set(messageBytes, prefixBytes.length);

  return keccak256(combined);
}
