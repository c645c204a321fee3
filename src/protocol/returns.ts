/**
 * Return shapes
 * What a contract method hands back to its caller, checked against the ABI at bind time
 */

import type { Address, Hash, Hex, TransactionReceipt } from '../core/types.js';
import type { AbiFunctionEntry } from '../core/abi.js';
import type { AbiValue } from '../core/abi-codec.js';
import type { TypeSchema } from '../core/abi-schema.js';
import { AbiDecodingError } from '../core/errors.js';
import { isAddress } from '../core/address.js';
import { isHex } from '../core/hex.js';

/**
 * Value type produced for each return shape
 */
export interface ReturnShapeTypes {
  void: void;
  receipt: TransactionReceipt;
  hash: Hash;
  /** The single output, or every output as an array when there are several */
  value: AbiValue;
  bigint: bigint;
  number: number;
  boolean: boolean;
  address: Address;
  string: string;
  bytes: Hex;
  array: ReadonlyArray<AbiValue>;
  /** Every output as an array, or the components of a single tuple output */
  tuple: ReadonlyArray<AbiValue>;
}

export type ReturnShape = keyof ReturnShapeTypes;

/** Shapes a state-changing function may declare */
export type WriteShape = 'void' | 'receipt' | 'hash';

/** Shapes decodable from eth_call output */
export type ReadShape = Exclude<ReturnShape, 'receipt' | 'hash'>;

const RETURN_SHAPES: ReadonlySet<string> = new Set<ReturnShape>([
  'void',
  'receipt',
  'hash',
  'value',
  'bigint',
  'number',
  'boolean',
  'address',
  'string',
  'bytes',
  'array',
  'tuple',
]);

export function isReturnShape(value: unknown): value is ReturnShape {
  return typeof value === 'string' && RETURN_SHAPES.has(value);
}

export function isWriteShape(shape: ReturnShape): shape is WriteShape {
  return shape === 'void' || shape === 'receipt' || shape === 'hash';
}

export function isReadShape(shape: ReturnShape): shape is ReadShape {
  return shape !== 'receipt' && shape !== 'hash';
}

/**
 * view and pure functions are answered by eth_call; everything else needs a transaction
 */
export function isReadOnlyFunction(fn: AbiFunctionEntry): boolean {
  return fn.stateMutability === 'view' || fn.stateMutability === 'pure';
}

type SchemaKind = TypeSchema['kind'];

const SINGLE_OUTPUT_KINDS: Partial<Record<ReadShape, ReadonlyArray<SchemaKind>>> = {
  bigint: ['uint', 'int'],
  number: ['uint', 'int'],
  boolean: ['bool'],
  address: ['address'],
  string: ['string'],
  bytes: ['bytes', 'fixed-bytes'],
  array: ['array'],
};

/**
 * Explain why `shape` cannot be returned by `fn`, or undefined when it can
 */
export function returnShapeProblem(fn: AbiFunctionEntry, shape: ReturnShape): string | undefined {
  if (!isReadOnlyFunction(fn)) {
    return isWriteShape(shape)
      ? undefined
      : `${fn.signature} is ${fn.stateMutability} and can only return void, receipt or hash, not ${shape}`;
  }

  if (!isReadShape(shape)) {
    return `${fn.signature} is ${fn.stateMutability} and is never sent as a transaction, so it cannot return ${shape}`;
  }

  switch (shape) {
    case 'void':
      return undefined;
    case 'value':
      return fn.outputs.length > 0 ? undefined : `${fn.signature} has no outputs to return`;
    case 'tuple':
      return fn.outputs.length > 1 || fn.outputs[0]?.type.kind === 'tuple'
        ? undefined
        : `${fn.signature} does not return several values or a tuple`;
    default: {
      const kinds = SINGLE_OUTPUT_KINDS[shape] ?? [];
      const [output] = fn.outputs;
      if (fn.outputs.length !== 1 || output === undefined) {
        return `${fn.signature} returns ${fn.outputs.length} values, expected exactly one for ${shape}`;
      }
      return kinds.includes(output.type.kind)
        ? undefined
        : `${fn.signature} returns ${output.type.kind}, which cannot be read as ${shape}`;
    }
  }
}

// ============ Shaping decoded output ============

type Converters = {
  [S in ReadShape]: (values: ReadonlyArray<AbiValue>, fn: AbiFunctionEntry) => ReturnShapeTypes[S];
};

function mismatch(fn: AbiFunctionEntry, expected: string, value: AbiValue | undefined): AbiDecodingError {
  return new AbiDecodingError(`${fn.signature} did not decode to ${expected}`, {
    signature: fn.signature,
    expected,
    actual: value === undefined ? 'nothing' : typeof value,
  });
}

function single(values: ReadonlyArray<AbiValue>, fn: AbiFunctionEntry): AbiValue {
  const [value] = values;
  if (value === undefined) {
    throw mismatch(fn, 'a value', value);
  }
  return value;
}

const CONVERTERS: Converters = {
  void: () => undefined,
  value: (values, fn) => (values.length === 1 ? single(values, fn) : values),
  bigint: (values, fn) => {
    const value = single(values, fn);
    if (typeof value !== 'bigint') throw mismatch(fn, 'an integer', value);
    return value;
  },
  number: (values, fn) => {
    const value = single(values, fn);
    if (typeof value !== 'bigint') throw mismatch(fn, 'an integer', value);
    if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw new AbiDecodingError(`${fn.signature} returned ${value}, outside the safe integer range`, {
        signature: fn.signature,
        value: value.toString(),
      });
    }
    return Number(value);
  },
  boolean: (values, fn) => {
    const value = single(values, fn);
    if (typeof value !== 'boolean') throw mismatch(fn, 'a boolean', value);
    return value;
  },
  address: (values, fn) => {
    const value = single(values, fn);
    if (!isAddress(value)) throw mismatch(fn, 'an address', value);
    return value;
  },
  string: (values, fn) => {
    const value = single(values, fn);
    if (typeof value !== 'string') throw mismatch(fn, 'a string', value);
    return value;
  },
  bytes: (values, fn) => {
    const value = single(values, fn);
    if (!isHex(value)) throw mismatch(fn, 'bytes', value);
    return value;
  },
  array: (values, fn) => {
    const value = single(values, fn);
    if (typeof value !== 'object') throw mismatch(fn, 'an array', value);
    return value;
  },
  tuple: (values, fn) => {
    if (values.length !== 1) return values;
    const value = single(values, fn);
    if (typeof value !== 'object') throw mismatch(fn, 'a tuple', value);
    return value;
  },
};

/**
 * Convert decoded outputs of `fn` into the requested shape
 */
export function shapeResult<S extends ReadShape>(
  shape: S,
  values: ReadonlyArray<AbiValue>,
  fn: AbiFunctionEntry
): ReturnShapeTypes[S] {
  return CONVERTERS[shape](values, fn);
}
