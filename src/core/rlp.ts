/**
 * RLP (Recursive Length Prefix) encoding/decoding
 * Used for serializing Ethereum transactions
 *
 * Reference: https://ethereum.org/en/developers/docs/data-structures-and-encoding/rlp/
 */

import type { Hex } from './types.js';
import { bigIntToBytes, bytesToHex, hexToBytes } from './hex.js';

export type RLPInput = Uint8Array | Hex | bigint | number | ReadonlyArray<RLPInput>;

// Decoded RLP is always bytes or nested lists of bytes
export type RLPItem = Uint8Array | RLPItem[];

/**
 * Encode data as RLP
 * Integers are encoded as minimal big-endian byte strings, zero as the empty string
 */
export function encode(input: RLPInput): Uint8Array {
  if (input instanceof Uint8Array) {
    return encodeBytes(input);
  }

  if (typeof input === 'string') {
    return encodeBytes(hexToBytes(input));
  }

  if (typeof input === 'number') {
    if (!Number.isSafeInteger(input) || input < 0) {
      throw new Error(`Cannot RLP encode number: ${input}`);
    }
    return encodeBytes(bigIntToBytes(BigInt(input)));
  }

  if (typeof input === 'bigint') {
    return encodeBytes(bigIntToBytes(input));
  }

  return encodeList(input);
}

function encodeBytes(bytes: Uint8Array): Uint8Array {
  const first = bytes[0];
  if (bytes.length === 1 && first !== undefined && first < 0x80) {
    return bytes;
  }
  return withPrefix(0x80, 0xb7, bytes);
}

function encodeList(items: ReadonlyArray<RLPInput>): Uint8Array {
  const encoded = items.map(encode);
  const total = encoded.reduce((sum, item) => sum + item.length, 0);
  const payload = new Uint8Array(total);
  let offset = 0;
  for (const item of encoded) {
    payload.set(item, offset);
    offset += item.length;
  }
  return withPrefix(0xc0, 0xf7, payload);
}

function withPrefix(shortBase: number, longBase: number, payload: Uint8Array): Uint8Array {
  if (payload.length <= 55) {
    const result = new Uint8Array(1 + payload.length);
    result[0] = shortBase + payload.length;
    result.set(payload, 1);
    return result;
  }
  const lenBytes = bigIntToBytes(BigInt(payload.length));
  const result = new Uint8Array(1 + lenBytes.length + payload.length);
  result[0] = longBase + lenBytes.length;
  result.set(lenBytes, 1);
  result.set(payload, 1 + lenBytes.length);
  return result;
}

/**
 * Decode RLP data
 */
export function decode(input: Uint8Array | Hex): RLPItem {
  const bytes = input instanceof Uint8Array ? input : hexToBytes(input);
  const [item, end] = decodeItem(bytes, 0);
  if (end !== bytes.length) {
    throw new Error(`Trailing bytes after RLP item: ${bytes.length - end}`);
  }
  return item;
}

function decodeItem(bytes: Uint8Array, offset: number): [RLPItem, number] {
  const prefix = bytes[offset];
  if (prefix === undefined) {
    throw new Error('Unexpected end of RLP input');
  }

  if (prefix < 0x80) {
    return [bytes.slice(offset, offset + 1), offset + 1];
  }

  if (prefix <= 0xb7) {
    const end = offset + 1 + (prefix - 0x80);
    return [readSlice(bytes, offset + 1, end), end];
  }

  if (prefix <= 0xbf) {
    const lenLen = prefix - 0xb7;
    const len = readLength(bytes, offset + 1, lenLen);
    const start = offset + 1 + lenLen;
    return [readSlice(bytes, start, start + len), start + len];
  }

  if (prefix <= 0xf7) {
    return decodeList(bytes, offset + 1, prefix - 0xc0);
  }

  const lenLen = prefix - 0xf7;
  const len = readLength(bytes, offset + 1, lenLen);
  return decodeList(bytes, offset + 1 + lenLen, len);
}

function decodeList(bytes: Uint8Array, offset: number, len: number): [RLPItem[], number] {
  const items: RLPItem[] = [];
  const end = offset + len;
  if (end > bytes.length) {
    throw new Error('RLP list exceeds input length');
  }

  let cursor = offset;
  while (cursor < end) {
    const [item, next] = decodeItem(bytes, cursor);
    items.push(item);
    cursor = next;
  }
  if (cursor !== end) {
    throw new Error('RLP list items overrun the declared length');
  }

  return [items, end];
}

function readSlice(bytes: Uint8Array, start: number, end: number): Uint8Array {
  if (end > bytes.length) {
    throw new Error('RLP string exceeds input length');
  }
  return bytes.slice(start, end);
}

function readLength(bytes: Uint8Array, start: number, lenLen: number): number {
  let len = 0;
  for (const byte of readSlice(bytes, start, start + lenLen)) {
    len = len * 256 + byte;
  }
  return len;
}

/**
 * Encode to hex string
 */
export function encodeHex(input: RLPInput): Hex {
  return bytesToHex(encode(input));
}
