/**
 * ABI encoding and decoding
 * Head/tail layout of the Solidity contract ABI
 */

import type { Hex } from './types.js';
import { type TypeSchema, canonicalType, headSize, isDynamic } from './abi-schema.js';
import { AbiDecodingError, AbiEncodingError } from './errors.js';
import { bytesToBigInt, bytesToHex, hexToBytes, isHex } from './hex.js';
import { isAddress, toChecksumAddress } from './address.js';

/**
 * Decoded ABI value
 * Integers decode to bigint, addresses to checksummed hex, bytes to lowercase hex,
 * arrays and tuples to arrays
 */
export type AbiValue = bigint | boolean | string | ReadonlyArray<AbiValue>;

/**
 * Accepted input for encoding
 * Tuples may be given positionally or keyed by component name
 */
export type AbiInput =
  | bigint
  | number
  | boolean
  | string
  | Uint8Array
  | ReadonlyArray<AbiInput>
  | { readonly [name: string]: AbiInput };

const WORD = 32;
const UINT256_MOD = 1n << 256n;

// ============ Encoding ============

/**
 * Encode values against a list of type schemas
 */
export function encodeParameters(
  schemas: ReadonlyArray<TypeSchema>,
  values: ReadonlyArray<AbiInput>
): Hex {
  return `0x${encodeSequence(schemas, values, 'args')}`;
}

function encodeSequence(
  schemas: ReadonlyArray<TypeSchema>,
  values: ReadonlyArray<AbiInput>,
  path: string
): string {
  if (schemas.length !== values.length) {
    throw new AbiEncodingError(
      `Parameter count mismatch at ${path}: expected ${schemas.length}, got ${values.length}`,
      { path, expected: schemas.length, actual: values.length }
    );
  }

  const heads: string[] = [];
  const tails: string[] = [];
  let tailOffset = schemas.reduce((sum, schema) => sum + headSize(schema), 0);

  schemas.forEach((schema, i) => {
    const encoded = encodeValue(schema, values[i], `${path}[${i}]`);
    if (isDynamic(schema)) {
      heads.push(word(BigInt(tailOffset)));
      tails.push(encoded);
      tailOffset += encoded.length / 2;
    } else {
      heads.push(encoded);
    }
  });

  return heads.join('') + tails.join('');
}

function encodeValue(schema: TypeSchema, value: AbiInput | undefined, path: string): string {
  switch (schema.kind) {
    case 'uint': {
      const n = toInteger(value, schema, path);
      if (n < 0n) {
        throw mismatch(path, schema, `Negative value ${n} for uint${schema.bits}`);
      }
      if (n >> BigInt(schema.bits) !== 0n) {
        throw mismatch(path, schema, `Value ${n} exceeds uint${schema.bits} max`);
      }
      return word(n);
    }

    case 'int': {
      const n = toInteger(value, schema, path);
      const limit = 1n << BigInt(schema.bits - 1);
      if (n < -limit || n >= limit) {
        throw mismatch(path, schema, `Value ${n} out of range for int${schema.bits}`);
      }
      return word(n < 0n ? UINT256_MOD + n : n);
    }

    case 'bool':
      if (typeof value !== 'boolean') {
        throw mismatch(path, schema, `Expected boolean, got ${describe(value)}`);
      }
      return word(value ? 1n : 0n);

    case 'address':
      if (!isAddress(value)) {
        throw mismatch(path, schema, `Invalid address: ${describe(value)}`);
      }
      return value.slice(2).toLowerCase().padStart(64, '0');

    case 'fixed-bytes': {
      const bytes = toBytes(value, schema, path);
      if (bytes.length !== schema.size) {
        throw mismatch(path, schema, `Expected ${schema.size} bytes, got ${bytes.length}`);
      }
      return padRight(bytesToHex(bytes).slice(2));
    }

    case 'bytes': {
      const bytes = toBytes(value, schema, path);
      return word(BigInt(bytes.length)) + padRight(bytesToHex(bytes).slice(2));
    }

    case 'string': {
      if (typeof value !== 'string') {
        throw mismatch(path, schema, `Expected string, got ${describe(value)}`);
      }
      const bytes = new TextEncoder().encode(value);
      return word(BigInt(bytes.length)) + padRight(bytesToHex(bytes).slice(2));
    }

    case 'array': {
      if (!isInputArray(value)) {
        throw mismatch(path, schema, `Expected array, got ${describe(value)}`);
      }
      if (schema.length !== null && value.length !== schema.length) {
        throw mismatch(path, schema, `Array size mismatch: expected ${schema.length}, got ${value.length}`);
      }
      const elements = encodeSequence(
        value.map(() => schema.element),
        value,
        path
      );
      return schema.length === null ? word(BigInt(value.length)) + elements : elements;
    }

    case 'tuple': {
      const members = tupleMembers(schema.components, value, schema, path);
      return encodeSequence(
        schema.components.map((c) => c.type),
        members,
        path
      );
    }
  }
}

function tupleMembers(
  components: ReadonlyArray<{ readonly name: string }>,
  value: AbiInput | undefined,
  schema: TypeSchema,
  path: string
): ReadonlyArray<AbiInput> {
  if (isInputArray(value)) {
    if (value.length !== components.length) {
      throw mismatch(path, schema, `Tuple size mismatch: expected ${components.length}, got ${value.length}`);
    }
    return value;
  }
  if (isInputRecord(value)) {
    return components.map((component, i) => {
      const member = component.name === '' ? undefined : value[component.name];
      if (member === undefined) {
        throw mismatch(path, schema, `Missing tuple component '${component.name || i}'`);
      }
      return member;
    });
  }
  throw mismatch(path, schema, `Expected tuple, got ${describe(value)}`);
}

function isInputArray(value: AbiInput | undefined): value is ReadonlyArray<AbiInput> {
  return Array.isArray(value);
}

function isInputRecord(value: AbiInput | undefined): value is { readonly [name: string]: AbiInput } {
  return typeof value === 'object' && !(value instanceof Uint8Array) && !Array.isArray(value);
}

function toInteger(value: AbiInput | undefined, schema: TypeSchema, path: string): bigint {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw mismatch(path, schema, `Number ${value} is not a safe integer, pass a bigint`);
    }
    return BigInt(value);
  }
  if (typeof value === 'string' && /^-?(0x[0-9a-fA-F]+|\d+)$/.test(value)) {
    return value.startsWith('-') ? -BigInt(value.slice(1)) : BigInt(value);
  }
  throw mismatch(path, schema, `Expected integer, got ${describe(value)}`);
}

function toBytes(value: AbiInput | undefined, schema: TypeSchema, path: string): Uint8Array {
  if (value instanceof Uint8Array) return value;
  if (isHex(value) && value.length % 2 === 0) return hexToBytes(value);
  throw mismatch(path, schema, `Expected hex bytes, got ${describe(value)}`);
}

function word(value: bigint): string {
  return value.toString(16).padStart(64, '0');
}

function padRight(hexBody: string): string {
  const remainder = hexBody.length % 64;
  return remainder === 0 ? hexBody : hexBody + '0'.repeat(64 - remainder);
}

function describe(value: AbiInput | undefined): string {
  if (value === undefined) return 'nothing';
  if (value instanceof Uint8Array) return `Uint8Array(${value.length})`;
  if (Array.isArray(value)) return `array(${value.length})`;
  if (typeof value === 'object') return 'object';
  return `${typeof value} ${String(value)}`;
}

function mismatch(path: string, schema: TypeSchema, message: string): AbiEncodingError {
  return new AbiEncodingError(`${message} (${canonicalType(schema)} at ${path})`, {
    path,
    type: canonicalType(schema),
  });
}

// ============ Decoding ============

/**
 * Decode ABI data against a list of type schemas
 */
export function decodeParameters(
  schemas: ReadonlyArray<TypeSchema>,
  data: Hex | Uint8Array
): AbiValue[] {
  if (schemas.length === 0) return [];

  const bytes = data instanceof Uint8Array ? data : payloadBytes(data);
  if (bytes.length === 0) {
    throw new AbiDecodingError('Cannot decode empty data (0x)', {
      types: schemas.map(canonicalType),
    });
  }

  return decodeSequence(schemas, bytes, 0);
}

/**
 * Decode a single static value from a 32-byte word (e.g. an indexed event topic)
 */
export function decodeWord(schema: TypeSchema, data: Hex): AbiValue {
  return decodeValue(schema, payloadBytes(data), 0);
}

function payloadBytes(data: string): Uint8Array {
  if (!isHex(data) || data.length % 2 !== 0) {
    throw new AbiDecodingError('Malformed hex payload', { data });
  }
  return hexToBytes(data);
}

function decodeSequence(
  schemas: ReadonlyArray<TypeSchema>,
  bytes: Uint8Array,
  base: number
): AbiValue[] {
  const values: AbiValue[] = [];
  let head = base;

  for (const schema of schemas) {
    if (isDynamic(schema)) {
      const offset = readOffset(bytes, head);
      values.push(decodeValue(schema, bytes, base + offset));
      head += WORD;
    } else {
      values.push(decodeValue(schema, bytes, head));
      head += headSize(schema);
    }
  }

  return values;
}

function decodeValue(schema: TypeSchema, bytes: Uint8Array, offset: number): AbiValue {
  switch (schema.kind) {
    case 'uint': {
      const n = readWord(bytes, offset);
      if (n >> BigInt(schema.bits) !== 0n) {
        throw new AbiDecodingError(`Value out of range for uint${schema.bits} at offset ${offset}`);
      }
      return n;
    }

    case 'int': {
      const raw = readWord(bytes, offset);
      const n = raw >= UINT256_MOD >> 1n ? raw - UINT256_MOD : raw;
      const limit = 1n << BigInt(schema.bits - 1);
      if (n < -limit || n >= limit) {
        throw new AbiDecodingError(`Value out of range for int${schema.bits} at offset ${offset}`);
      }
      return n;
    }

    case 'bool': {
      const n = readWord(bytes, offset);
      if (n > 1n) {
        throw new AbiDecodingError(`Invalid boolean value ${n} at offset ${offset}`);
      }
      return n === 1n;
    }

    case 'address': {
      const n = readWord(bytes, offset);
      if (n >> 160n !== 0n) {
        throw new AbiDecodingError(`Invalid address word at offset ${offset}`);
      }
      return toChecksumAddress(`0x${n.toString(16).padStart(40, '0')}`);
    }

    case 'fixed-bytes':
      return bytesToHex(readSlice(bytes, offset, schema.size));

    case 'bytes':
      return bytesToHex(readLengthPrefixed(bytes, offset));

    case 'string':
      return new TextDecoder().decode(readLengthPrefixed(bytes, offset));

    case 'array': {
      if (schema.length === null) {
        const length = readLength(bytes, offset);
        return decodeSequence(repeat(schema.element, length), bytes, offset + WORD);
      }
      return decodeSequence(repeat(schema.element, schema.length), bytes, offset);
    }

    case 'tuple':
      return decodeSequence(
        schema.components.map((c) => c.type),
        bytes,
        offset
      );
  }
}

function repeat(schema: TypeSchema, count: number): TypeSchema[] {
  return Array.from({ length: count }, () => schema);
}

function readWord(bytes: Uint8Array, offset: number): bigint {
  return bytesToBigInt(readSlice(bytes, offset, WORD));
}

function readSlice(bytes: Uint8Array, offset: number, length: number): Uint8Array {
  if (offset < 0 || offset + length > bytes.length) {
    throw new AbiDecodingError(
      `Data too short: need ${length} bytes at offset ${offset}, have ${bytes.length}`,
      { offset, length, available: bytes.length }
    );
  }
  return bytes.subarray(offset, offset + length);
}

function readOffset(bytes: Uint8Array, offset: number): number {
  const n = readWord(bytes, offset);
  if (n > BigInt(bytes.length)) {
    throw new AbiDecodingError(`Offset ${n} points past the end of the data`, { offset });
  }
  return Number(n);
}

// Lengths are bounded by the remaining data so corrupt input cannot allocate huge arrays
function readLength(bytes: Uint8Array, offset: number): number {
  const n = readWord(bytes, offset);
  if (n > BigInt(bytes.length)) {
    throw new AbiDecodingError(`Length ${n} exceeds the available data`, { offset });
  }
  return Number(n);
}

function readLengthPrefixed(bytes: Uint8Array, offset: number): Uint8Array {
  const length = readLength(bytes, offset);
  return readSlice(bytes, offset + WORD, length);
}
