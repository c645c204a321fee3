/**
 * Revert payload decoding
 * Error(string), Panic(uint256) and ABI-declared custom errors
 */

import type { Hex } from '../core/types.js';
import type { AbiErrorEntry } from '../core/abi.js';
import { type AbiValue, decodeParameters } from '../core/abi-codec.js';
import { AbiDecodingError, type RevertDiagnosis, RevertError, type RpcError } from '../core/errors.js';
import { isHex } from '../core/hex.js';
import { isRecord } from '../core/guards.js';

export const ERROR_STRING_SELECTOR = '0x08c379a0';
export const PANIC_SELECTOR = '0x4e487b71';

const PANIC_REASONS: ReadonlyMap<bigint, string> = new Map([
  [0x01n, 'assertion failed'],
  [0x11n, 'arithmetic overflow or underflow'],
  [0x12n, 'division or modulo by zero'],
  [0x21n, 'enum conversion out of range'],
  [0x22n, 'invalid storage byte array access'],
  [0x31n, 'pop on empty array'],
  [0x32n, 'array index out of bounds'],
  [0x41n, 'memory allocation overflow'],
  [0x51n, 'call to zero-initialized internal function'],
]);

function unknown(rawData: Hex | null): RevertDiagnosis {
  return { kind: 'unknown', reason: null, rawData };
}

/**
 * Decode revert data into a diagnosis
 * Payloads that cannot be decoded are reported as `unknown` with the raw bytes kept
 */
export function decodeRevert(
  data: Hex | null | undefined,
  customErrors: ReadonlyArray<AbiErrorEntry> = []
): RevertDiagnosis {
  if (data === null || data === undefined || data === '0x') {
    return unknown(null);
  }
  if (data.length < 10) {
    return unknown(data);
  }

  const selector = data.slice(0, 10).toLowerCase();
  const payload: Hex = `0x${data.slice(10)}`;

  try {
    if (selector === ERROR_STRING_SELECTOR) {
      const [reason] = decodeParameters([{ kind: 'string' }], payload);
      return typeof reason === 'string' ? { kind: 'error-string', reason, rawData: data } : unknown(data);
    }

    if (selector === PANIC_SELECTOR) {
      const [code] = decodeParameters([{ kind: 'uint', bits: 256 }], payload);
      if (typeof code !== 'bigint') return unknown(data);
      return {
        kind: 'panic',
        reason: PANIC_REASONS.get(code) ?? `panic with code 0x${code.toString(16)}`,
        rawData: data,
      };
    }

    const custom = customErrors.find((e) => e.selector === selector);
    if (custom) {
      const values = decodeParameters(
        custom.inputs.map((p) => p.type),
        payload
      );
      return {
        kind: 'custom',
        reason: `${custom.name}(${values.map(formatValue).join(', ')})`,
        rawData: data,
      };
    }
  } catch (error) {
    // Malformed payload behind a known selector
    if (error instanceof AbiDecodingError) return unknown(data);
    throw error;
  }

  return unknown(data);
}

function formatValue(value: AbiValue): string {
  if (typeof value === 'string' || typeof value === 'bigint' || typeof value === 'boolean') {
    return String(value);
  }
  return `[${value.map(formatValue).join(', ')}]`;
}

/**
 * Revert data carried by a node error, either as `data` itself or as `data.data`
 */
export function extractRevertData(data: unknown): Hex | undefined {
  if (isHex(data) && data.length > 10) {
    return data;
  }
  if (isRecord(data)) {
    const nested = data['data'];
    if (isHex(nested) && nested.length > 10) {
      return nested;
    }
  }
  return undefined;
}

/**
 * Reclassify an RPC error as a revert when it carries revert data
 */
export function revertFromRpcError(
  error: RpcError,
  customErrors: ReadonlyArray<AbiErrorEntry> = []
): RevertError | undefined {
  const data = extractRevertData(error.data);
  return data === undefined ? undefined : new RevertError(decodeRevert(data, customErrors));
}
