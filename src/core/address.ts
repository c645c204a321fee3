/**
 * Ethereum address utilities
 * Validation, checksum encoding (EIP-55)
 */

import type { Address } from './types.js';
import { keccak256 } from './hash.js';
import { isHex } from './hex.js';

/**
 * Check if a string is a valid Ethereum address (with or without checksum)
 */
export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && value.length === 42 && isHex(value);
}

/**
 * Assert that a value is a valid Ethereum address
 */
export function assertAddress(value: unknown, name = 'address'): asserts value is Address {
  if (!isAddress(value)) {
    throw new Error(
      `${name} must be a valid Ethereum address (0x followed by 40 hex characters), got: ${String(value)}`
    );
  }
}

/**
 * Convert an address to checksum format (EIP-55)
 */
export function toChecksumAddress(address: string): Address {
  assertAddress(address);

  const lower = address.slice(2).toLowerCase();
  const hash = keccak256(lower).slice(2);

  let checksummed = '0x';
  for (let i = 0; i < lower.length; i++) {
    const char = lower.charAt(i);
    // Uppercase wherever the matching hash nibble is >= 8
    checksummed += parseInt(hash.charAt(i), 16) >= 8 ? char.toUpperCase() : char;
  }

  assertAddress(checksummed);
  return checksummed;
}

/**
 * Normalize an address to EIP-55 checksum format
 */
export function normalizeAddress(address: string): Address {
  return toChecksumAddress(address);
}

/**
 * Compare two addresses (case-insensitive)
 */
export function addressEquals(a: string, b: string): boolean {
  if (!isAddress(a) || !isAddress(b)) return false;
  return a.toLowerCase() === b.toLowerCase();
}
