/**
 * Hex string utilities
 * Conversions between hex strings, bytes and integers
 */

import type { Hex } from './types.js';

const hexChars = '0123456789abcdef';

/**
 * Check if a value is a valid hex string
 */
export function isHex(value: unknown): value is Hex {
  if (typeof value !== 'string') return false;
  if (!value.startsWith('0x')) return false;
  return /^[0-9a-fA-F]*$/.test(value.slice(2));
}

/**
 * Assert that a value is a valid hex string
 */
export function assertHex(value: unknown, name = 'value'): asserts value is Hex {
  if (!isHex(value)) {
    throw new Error(`${name} must be a valid hex string starting with 0x, got: ${String(value)}`);
  }
}

/**
 * Convert bytes to hex string
 */
export function bytesToHex(bytes: Uint8Array): Hex {
  let hex = '';
  for (const byte of bytes) {
    hex += hexChars[byte >> 4];
    hex += hexChars[byte & 0x0f];
  }
  return `0x${hex}`;
}

/**
 * Convert hex string to bytes
 * Odd-length input is left-padded with a zero nibble
 */
export function hexToBytes(hex: Hex): Uint8Array {
  assertHex(hex);
  const body = hex.length % 2 === 0 ? hex.slice(2) : `0${hex.slice(2)}`;
  const bytes = new Uint8Array(body.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = parseInt(body.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

/**
 * Convert a non-negative number or bigint to a quantity hex string (no leading zeros)
 */
export function numberToHex(value: number | bigint): Hex {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0) {
      throw new Error(`Cannot convert ${value} to hex: must be a non-negative integer`);
    }
    return `0x${value.toString(16)}`;
  }
  if (value < 0n) {
    throw new Error(`Cannot convert negative bigint to hex: ${value}`);
  }
  return `0x${value.toString(16)}`;
}

/**
 * Convert hex string to number
 */
export function hexToNumber(hex: Hex): number {
  const value = hexToBigInt(hex);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new Error(`Hex value ${hex} is too large for a safe integer, use hexToBigInt instead`);
  }
  return Number(value);
}

/**
 * Convert hex string to bigint
 */
export function hexToBigInt(hex: Hex): bigint {
  assertHex(hex);
  if (hex === '0x') return 0n;
  return BigInt(hex);
}

/**
 * Pad hex string to a specific byte length (left-padded with zeros)
 */
export function padHex(hex: Hex, byteLength: number): Hex {
  assertHex(hex);
  const body = hex.slice(2);
  if (body.length > byteLength * 2) {
    throw new Error(`Hex string ${hex} exceeds ${byteLength} bytes`);
  }
  return `0x${body.padStart(byteLength * 2, '0')}`;
}

/**
 * Concatenate multiple hex strings
 */
export function concatHex(...parts: ReadonlyArray<Hex>): Hex {
  let body = '';
  for (const part of parts) {
    assertHex(part);
    body += part.slice(2);
  }
  return `0x${body}`;
}

/**
 * Get byte length of hex string
 */
export function hexLength(hex: Hex): number {
  assertHex(hex);
  return Math.ceil((hex.length - 2) / 2);
}

/**
 * Convert string to hex (UTF-8 encoding)
 */
export function stringToHex(str: string): Hex {
  return bytesToHex(new TextEncoder().encode(str));
}

/**
 * Convert bytes to an unsigned bigint (big-endian)
 */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  let result = 0n;
  for (const byte of bytes) {
    result = (result << 8n) | BigInt(byte);
  }
  return result;
}

/**
 * Convert an unsigned bigint to its minimal big-endian bytes (0 is empty)
 */
export function bigIntToBytes(value: bigint): Uint8Array {
  if (value < 0n) {
    throw new Error(`Cannot convert negative bigint to bytes: ${value}`);
  }
  const bytes: number[] = [];
  let v = value;
  while (v > 0n) {
    bytes.unshift(Number(v & 0xffn));
    v >>= 8n;
  }
  return new Uint8Array(bytes);
}

/**
 * Concatenate byte arrays
 */
export function concatBytes(...parts: ReadonlyArray<Uint8Array>): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}
