/**
 * ABI model
 * Parses JSON ABIs into immutable function, event and error entries and
 * drives the codec for calldata, results and event logs
 */

import type { Hash, Hex, Log } from './types.js';
import {
  type AbiParameterJson,
  type TypeSchema,
  canonicalSignature,
  canonicalType,
  parseTypeSchema,
} from './abi-schema.js';
import { type AbiInput, type AbiValue, decodeParameters, decodeWord, encodeParameters } from './abi-codec.js';
import { AbiDecodingError, AbiEncodingError, AbiParseError } from './errors.js';
import { functionSelector, eventTopic } from './hash.js';
import { concatHex, hexToBytes } from './hex.js';
import { isRecord } from './guards.js';

export type StateMutability = 'pure' | 'view' | 'nonpayable' | 'payable';

const STATE_MUTABILITIES: ReadonlyArray<StateMutability> = ['pure', 'view', 'nonpayable', 'payable'];

export interface AbiParameter {
  readonly name: string;
  readonly type: TypeSchema;
  readonly indexed: boolean;
}

export interface AbiFunctionEntry {
  readonly kind: 'function';
  readonly name: string;
  readonly stateMutability: StateMutability;
  readonly inputs: ReadonlyArray<AbiParameter>;
  readonly outputs: ReadonlyArray<AbiParameter>;
  /** Canonical signature, e.g. `transfer(address,uint256)` */
  readonly signature: string;
  readonly selector: Hex;
}

export interface AbiEventEntry {
  readonly kind: 'event';
  readonly name: string;
  readonly inputs: ReadonlyArray<AbiParameter>;
  readonly anonymous: boolean;
  readonly signature: string;
  readonly topic: Hash;
}

export interface AbiErrorEntry {
  readonly kind: 'error';
  readonly name: string;
  readonly inputs: ReadonlyArray<AbiParameter>;
  readonly signature: string;
  readonly selector: Hex;
}

export interface AbiConstructorEntry {
  readonly kind: 'constructor';
  readonly inputs: ReadonlyArray<AbiParameter>;
  readonly stateMutability: StateMutability;
}

export interface AbiFallbackEntry {
  readonly kind: 'fallback' | 'receive';
  readonly stateMutability: StateMutability;
}

export type AbiEntry =
  | AbiFunctionEntry
  | AbiEventEntry
  | AbiErrorEntry
  | AbiConstructorEntry
  | AbiFallbackEntry;

/**
 * Encoded function invocation
 * `data` is always `selector` followed by `encodedArgs`
 */
export interface FunctionCall {
  readonly function: AbiFunctionEntry;
  readonly selector: Hex;
  readonly encodedArgs: Hex;
  readonly data: Hex;
}

/**
 * Event decoded from a log
 * `args` follows declaration order with indexed dynamic values omitted
 */
export interface DecodedEvent {
  readonly name: string;
  readonly args: ReadonlyArray<AbiValue>;
  readonly named: Readonly<Record<string, AbiValue>>;
  readonly log: Log;
}

// ============ JSON parsing ============

function optionalString(entry: Record<string, unknown>, key: string, where: string): string | undefined {
  const value = entry[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new AbiParseError(`${where}: '${key}' must be a string`, { key });
  }
  return value;
}

function parseParameterJson(raw: unknown, where: string): AbiParameterJson {
  if (!isRecord(raw)) {
    throw new AbiParseError(`${where}: parameter must be an object`);
  }
  const type = optionalString(raw, 'type', where);
  if (type === undefined) {
    throw new AbiParseError(`${where}: parameter is missing 'type'`);
  }
  const name = optionalString(raw, 'name', where);

  const rawIndexed = raw['indexed'];
  let indexed: boolean | undefined;
  if (typeof rawIndexed === 'boolean') {
    indexed = rawIndexed;
  } else if (rawIndexed !== undefined) {
    throw new AbiParseError(`${where}: 'indexed' must be a boolean`);
  }

  const rawComponents = raw['components'];
  let components: AbiParameterJson[] | undefined;
  if (Array.isArray(rawComponents)) {
    components = rawComponents.map((c: unknown, i: number) =>
      parseParameterJson(c, `${where}.components[${i}]`)
    );
  } else if (rawComponents !== undefined) {
    throw new AbiParseError(`${where}: 'components' must be an array`);
  }

  return {
    type,
    ...(name !== undefined && { name }),
    ...(indexed !== undefined && { indexed }),
    ...(components !== undefined && { components }),
  };
}

function parseParameters(entry: Record<string, unknown>, key: string, where: string): AbiParameter[] {
  const raw = entry[key];
  if (raw === undefined) return [];
  if (!Array.isArray(raw)) {
    throw new AbiParseError(`${where}: '${key}' must be an array`);
  }
  return raw.map((item: unknown, i: number) => {
    const json = parseParameterJson(item, `${where}.${key}[${i}]`);
    return {
      name: json.name ?? '',
      type: parseTypeSchema(json.type, json.components),
      indexed: json.indexed ?? false,
    };
  });
}

function isStateMutability(value: unknown): value is StateMutability {
  return STATE_MUTABILITIES.some((m) => m === value);
}

// Older compilers emit `constant`/`payable` flags instead of stateMutability
function parseStateMutability(entry: Record<string, unknown>, where: string): StateMutability {
  const value = entry['stateMutability'];
  if (value !== undefined) {
    if (!isStateMutability(value)) {
      throw new AbiParseError(`${where}: unknown stateMutability '${String(value)}'`, {
        stateMutability: value,
      });
    }
    return value;
  }
  if (entry['constant'] === true) return 'view';
  if (entry['payable'] === true) return 'payable';
  return 'nonpayable';
}

function signatureOf(name: string, inputs: ReadonlyArray<AbiParameter>): string {
  return `${name}(${inputs.map((p) => canonicalType(p.type)).join(',')})`;
}

function requireName(entry: Record<string, unknown>, where: string): string {
  const name = optionalString(entry, 'name', where);
  if (name === undefined || name === '') {
    throw new AbiParseError(`${where}: entry is missing 'name'`);
  }
  return name;
}

function parseEntry(raw: unknown, index: number): AbiEntry {
  const where = `ABI entry ${index}`;
  if (!isRecord(raw)) {
    throw new AbiParseError(`${where}: must be an object`);
  }

  const type = optionalString(raw, 'type', where) ?? 'function';

  switch (type) {
    case 'function': {
      const name = requireName(raw, where);
      const inputs = parseParameters(raw, 'inputs', where);
      const signature = signatureOf(name, inputs);
      return {
        kind: 'function',
        name,
        stateMutability: parseStateMutability(raw, where),
        inputs,
        outputs: parseParameters(raw, 'outputs', where),
        signature,
        selector: functionSelector(signature),
      };
    }

    case 'event': {
      const name = requireName(raw, where);
      const inputs = parseParameters(raw, 'inputs', where);
      const signature = signatureOf(name, inputs);
      return {
        kind: 'event',
        name,
        inputs,
        anonymous: raw['anonymous'] === true,
        signature,
        topic: eventTopic(signature),
      };
    }

    case 'error': {
      const name = requireName(raw, where);
      const inputs = parseParameters(raw, 'inputs', where);
      const signature = signatureOf(name, inputs);
      return { kind: 'error', name, inputs, signature, selector: functionSelector(signature) };
    }

    case 'constructor':
      return {
        kind: 'constructor',
        inputs: parseParameters(raw, 'inputs', where),
        stateMutability: parseStateMutability(raw, where),
      };

    case 'fallback':
      return { kind: 'fallback', stateMutability: parseStateMutability(raw, where) };

    case 'receive':
      return { kind: 'receive', stateMutability: 'payable' };

    default:
      throw new AbiParseError(`${where}: unknown entry type '${type}'`, { type });
  }
}

// Indexed values of these types are stored as a hash and cannot be recovered
function isHashedWhenIndexed(schema: TypeSchema): boolean {
  return (
    schema.kind === 'string' ||
    schema.kind === 'bytes' ||
    schema.kind === 'array' ||
    schema.kind === 'tuple'
  );
}

// ============ Abi ============

/**
 * Parsed contract ABI
 */
export class Abi {
  readonly entries: ReadonlyArray<AbiEntry>;
  readonly functions: ReadonlyArray<AbiFunctionEntry>;
  readonly events: ReadonlyArray<AbiEventEntry>;
  readonly errors: ReadonlyArray<AbiErrorEntry>;
  readonly constructorEntry: AbiConstructorEntry | undefined;

  private constructor(entries: ReadonlyArray<AbiEntry>) {
    this.entries = Object.freeze([...entries]);
    const functions: AbiFunctionEntry[] = [];
    const events: AbiEventEntry[] = [];
    const errors: AbiErrorEntry[] = [];
    let constructorEntry: AbiConstructorEntry | undefined;

    for (const entry of entries) {
      switch (entry.kind) {
        case 'function':
          functions.push(entry);
          break;
        case 'event':
          events.push(entry);
          break;
        case 'error':
          errors.push(entry);
          break;
        case 'constructor':
          constructorEntry = entry;
          break;
        default:
          break;
      }
    }

    this.functions = Object.freeze(functions);
    this.events = Object.freeze(events);
    this.errors = Object.freeze(errors);
    this.constructorEntry = constructorEntry;
  }

  /**
   * Parse a JSON ABI, given either as text or as an already-parsed array
   */
  static fromJson(json: string | ReadonlyArray<unknown>): Abi {
    let parsed: unknown = json;
    if (typeof json === 'string') {
      try {
        parsed = JSON.parse(json);
      } catch (error) {
        throw new AbiParseError(
          `ABI is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
        );
      }
    }
    if (!Array.isArray(parsed)) {
      throw new AbiParseError('ABI must be a JSON array of entries');
    }
    return new Abi(parsed.map((entry: unknown, i: number) => parseEntry(entry, i)));
  }

  /**
   * 4-byte selector of a function signature; names and whitespace are ignored
   */
  static functionSelector(signature: string): Hex {
    return functionSelector(canonicalSignature(signature));
  }

  /**
   * Full 32-byte topic0 of an event signature
   */
  static eventTopic(signature: string): Hash {
    return eventTopic(canonicalSignature(signature));
  }

  /**
   * All function overloads sharing a name
   */
  functionsNamed(name: string): AbiFunctionEntry[] {
    return this.functions.filter((f) => f.name === name);
  }

  /**
   * Look up a function by canonical signature, or by name and optional argument count
   */
  getFunction(nameOrSignature: string, argCount?: number): AbiFunctionEntry {
    if (nameOrSignature.includes('(')) {
      const signature = canonicalSignature(nameOrSignature);
      const found = this.functions.find((f) => f.signature === signature);
      if (!found) {
        throw new AbiEncodingError(`Function '${signature}' not found in ABI`, { signature });
      }
      return found;
    }

    let candidates = this.functionsNamed(nameOrSignature);
    if (argCount !== undefined) {
      candidates = candidates.filter((f) => f.inputs.length === argCount);
    }

    const [first, ...rest] = candidates;
    if (!first) {
      const arity = argCount === undefined ? '' : ` with ${argCount} argument(s)`;
      throw new AbiEncodingError(`Function '${nameOrSignature}'${arity} not found in ABI`, {
        name: nameOrSignature,
        argCount,
      });
    }
    if (rest.length > 0) {
      throw new AbiEncodingError(
        `Function '${nameOrSignature}' is ambiguous: ${candidates.map((f) => f.signature).join(', ')}`,
        { name: nameOrSignature, overloads: candidates.map((f) => f.signature) }
      );
    }
    return first;
  }

  getEvent(nameOrSignature: string): AbiEventEntry {
    const signature = nameOrSignature.includes('(') ? canonicalSignature(nameOrSignature) : undefined;
    const matches = this.events.filter((e) =>
      signature === undefined ? e.name === nameOrSignature : e.signature === signature
    );
    const [first, ...rest] = matches;
    if (!first) {
      throw new AbiDecodingError(`Event '${nameOrSignature}' not found in ABI`, { name: nameOrSignature });
    }
    if (rest.length > 0) {
      throw new AbiDecodingError(
        `Event '${nameOrSignature}' is ambiguous: ${matches.map((e) => e.signature).join(', ')}`
      );
    }
    return first;
  }

  /**
   * Find a custom error by its 4-byte selector
   */
  getErrorBySelector(selector: Hex): AbiErrorEntry | undefined {
    const needle = selector.toLowerCase();
    return this.errors.find((e) => e.selector === needle);
  }

  /**
   * Encode calldata for a function
   * A bare name that is overloaded is resolved by argument count
   */
  encodeFunction(nameOrSignature: string, ...args: AbiInput[]): FunctionCall {
    const fn =
      nameOrSignature.includes('(') || this.functionsNamed(nameOrSignature).length <= 1
        ? this.getFunction(nameOrSignature)
        : this.getFunction(nameOrSignature, args.length);

    return Abi.encodeCall(fn, args);
  }

  /**
   * Encode calldata for an already-resolved function entry
   */
  static encodeCall(fn: AbiFunctionEntry, args: ReadonlyArray<AbiInput>): FunctionCall {
    if (args.length !== fn.inputs.length) {
      throw new AbiEncodingError(
        `Argument count mismatch for ${fn.signature}: expected ${fn.inputs.length}, got ${args.length}`,
        { signature: fn.signature, expected: fn.inputs.length, actual: args.length }
      );
    }

    const encodedArgs = encodeParameters(
      fn.inputs.map((p) => p.type),
      args
    );
    return {
      function: fn,
      selector: fn.selector,
      encodedArgs,
      data: concatHex(fn.selector, encodedArgs),
    };
  }

  /**
   * Encode constructor arguments, to be appended to deployment bytecode
   */
  encodeConstructor(...args: AbiInput[]): Hex {
    const inputs = this.constructorEntry?.inputs ?? [];
    if (args.length !== inputs.length) {
      throw new AbiEncodingError(
        `Constructor expects ${inputs.length} argument(s), got ${args.length}`
      );
    }
    return encodeParameters(
      inputs.map((p) => p.type),
      args
    );
  }

  /**
   * Decode a function's return data into its output values
   */
  decodeFunctionResult(nameOrSignature: string | AbiFunctionEntry, data: Hex): AbiValue[] {
    const fn = typeof nameOrSignature === 'string' ? this.getFunction(nameOrSignature) : nameOrSignature;
    return decodeParameters(
      fn.outputs.map((p) => p.type),
      data
    );
  }

  /**
   * Decode a single value of the given type
   */
  decode(rawHex: Hex, type: string | TypeSchema): AbiValue {
    const schema = typeof type === 'string' ? parseTypeSchema(type) : type;
    const [value] = decodeParameters([schema], rawHex);
    if (value === undefined) {
      throw new AbiDecodingError('Decoder produced no value', { type: canonicalType(schema) });
    }
    return value;
  }

  /**
   * Decode every log matching an event
   * Indexed string, bytes, array and tuple values are omitted from `args`
   */
  decodeEvents(nameOrSignature: string, logs: ReadonlyArray<Log>): DecodedEvent[];
  decodeEvents<T>(
    nameOrSignature: string,
    logs: ReadonlyArray<Log>,
    shape: (event: DecodedEvent) => T
  ): T[];
  decodeEvents<T>(
    nameOrSignature: string,
    logs: ReadonlyArray<Log>,
    shape?: (event: DecodedEvent) => T
  ): Array<DecodedEvent | T> {
    const event = this.getEvent(nameOrSignature);
    const decoded: Array<DecodedEvent | T> = [];

    for (const log of logs) {
      const result = decodeLog(event, log);
      if (result) {
        decoded.push(shape ? shape(result) : result);
      }
    }

    return decoded;
  }
}

function decodeLog(event: AbiEventEntry, log: Log): DecodedEvent | undefined {
  const indexed = event.inputs.filter((p) => p.indexed);
  const firstIndexedTopic = event.anonymous ? 0 : 1;

  if (!event.anonymous && log.topics[0]?.toLowerCase() !== event.topic) {
    return undefined;
  }
  // Same signature with a different indexed layout (ERC-20 vs ERC-721 Transfer)
  if (log.topics.length !== firstIndexedTopic + indexed.length) {
    return undefined;
  }

  const nonIndexed = decodeParameters(
    event.inputs.filter((p) => !p.indexed).map((p) => p.type),
    hexToBytes(log.data)
  );

  const args: AbiValue[] = [];
  const named: Record<string, AbiValue> = {};
  let topicIndex = firstIndexedTopic;
  let dataIndex = 0;

  for (const input of event.inputs) {
    let value: AbiValue | undefined;
    if (input.indexed) {
      const topic = log.topics[topicIndex++];
      if (topic !== undefined && !isHashedWhenIndexed(input.type)) {
        value = decodeWord(input.type, topic);
      }
    } else {
      value = nonIndexed[dataIndex++];
    }

    if (value === undefined) continue;
    args.push(value);
    if (input.name !== '') {
      named[input.name] = value;
    }
  }

  return { name: event.name, args, named, log };
}
