/**
 * Solidity type schemas
 * Recursive description of ABI types shared by the encoder and decoder
 */

import { AbiParseError } from './errors.js';

export type TypeSchema =
  | { readonly kind: 'uint'; readonly bits: number }
  | { readonly kind: 'int'; readonly bits: number }
  | { readonly kind: 'bool' }
  | { readonly kind: 'address' }
  | { readonly kind: 'fixed-bytes'; readonly size: number }
  | { readonly kind: 'bytes' }
  | { readonly kind: 'string' }
  | { readonly kind: 'array'; readonly element: TypeSchema; readonly length: number | null }
  | { readonly kind: 'tuple'; readonly components: ReadonlyArray<TupleComponent> };

export interface TupleComponent {
  readonly name: string;
  readonly type: TypeSchema;
}

/**
 * Parameter as it appears in JSON ABI files
 */
export interface AbiParameterJson {
  readonly name?: string;
  readonly type: string;
  readonly indexed?: boolean;
  readonly components?: ReadonlyArray<AbiParameterJson>;
}

const ARRAY_SUFFIX = /^(.*)\[(\d*)\]$/;

/**
 * Parse a type string into a schema
 * `components` supplies the members of `tuple` types as found in JSON ABIs;
 * inline tuples such as `(uint256,address)[]` are also accepted
 */
export function parseTypeSchema(
  type: string,
  components?: ReadonlyArray<AbiParameterJson>
): TypeSchema {
  const trimmed = type.trim();

  const arrayMatch = ARRAY_SUFFIX.exec(trimmed);
  if (arrayMatch) {
    const [, inner = '', size = ''] = arrayMatch;
    const length = size === '' ? null : Number(size);
    if (length !== null && length <= 0) {
      throw new AbiParseError(`Invalid fixed array length in type: ${type}`, { type });
    }
    return { kind: 'array', element: parseTypeSchema(inner, components), length };
  }

  if (trimmed === 'tuple') {
    if (!components) {
      throw new AbiParseError('Tuple type requires components', { type });
    }
    return {
      kind: 'tuple',
      components: components.map((component) => ({
        name: component.name ?? '',
        type: parseTypeSchema(component.type, component.components),
      })),
    };
  }

  if (trimmed.startsWith('(') && trimmed.endsWith(')')) {
    return {
      kind: 'tuple',
      components: splitTopLevel(trimmed.slice(1, -1)).map((member) => ({
        name: '',
        type: parseTypeSchema(member),
      })),
    };
  }

  return parseElementary(trimmed, type);
}

function parseElementary(name: string, original: string): TypeSchema {
  switch (name) {
    case 'address':
      return { kind: 'address' };
    case 'bool':
      return { kind: 'bool' };
    case 'string':
      return { kind: 'string' };
    case 'bytes':
      return { kind: 'bytes' };
    case 'uint':
      return { kind: 'uint', bits: 256 };
    case 'int':
      return { kind: 'int', bits: 256 };
  }

  const intMatch = /^(u?)int(\d+)$/.exec(name);
  if (intMatch) {
    const bits = Number(intMatch[2]);
    if (bits < 8 || bits > 256 || bits % 8 !== 0) {
      throw new AbiParseError(`Invalid integer width in type: ${original}`, { type: original });
    }
    return { kind: intMatch[1] === 'u' ? 'uint' : 'int', bits };
  }

  const bytesMatch = /^bytes(\d+)$/.exec(name);
  if (bytesMatch) {
    const size = Number(bytesMatch[1]);
    if (size < 1 || size > 32) {
      throw new AbiParseError(`Invalid fixed bytes size in type: ${original}`, { type: original });
    }
    return { kind: 'fixed-bytes', size };
  }

  throw new AbiParseError(`Unsupported ABI type: ${original}`, { type: original });
}

// Split "a,(b,c),d[]" on commas that are not nested inside parentheses
export function splitTopLevel(body: string): string[] {
  if (body.trim() === '') return [];

  const parts: string[] = [];
  let depth = 0;
  let current = '';
  for (const char of body) {
    if (char === '(') depth++;
    if (char === ')') depth--;
    if (char === ',' && depth === 0) {
      parts.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  if (depth !== 0) {
    throw new AbiParseError(`Unbalanced parentheses in tuple type: (${body})`);
  }
  parts.push(current);
  return parts;
}

/**
 * Canonical type string used in signatures, e.g. `(uint256,address)[]`
 */
export function canonicalType(schema: TypeSchema): string {
  switch (schema.kind) {
    case 'uint':
    case 'int':
      return `${schema.kind}${schema.bits}`;
    case 'fixed-bytes':
      return `bytes${schema.size}`;
    case 'array':
      return `${canonicalType(schema.element)}[${schema.length ?? ''}]`;
    case 'tuple':
      return `(${schema.components.map((c) => canonicalType(c.type)).join(',')})`;
    default:
      return schema.kind;
  }
}

/**
 * Dynamic types are encoded out-of-line behind an offset
 */
export function isDynamic(schema: TypeSchema): boolean {
  switch (schema.kind) {
    case 'bytes':
    case 'string':
      return true;
    case 'array':
      return schema.length === null || isDynamic(schema.element);
    case 'tuple':
      return schema.components.some((c) => isDynamic(c.type));
    default:
      return false;
  }
}

/**
 * Number of bytes a value of this type occupies in the head section
 */
export function headSize(schema: TypeSchema): number {
  if (isDynamic(schema)) return 32;
  if (schema.kind === 'array') {
    return (schema.length ?? 0) * headSize(schema.element);
  }
  if (schema.kind === 'tuple') {
    return schema.components.reduce((sum, c) => sum + headSize(c.type), 0);
  }
  return 32;
}

/**
 * Reduce a human-written signature to its canonical form
 * e.g. `transfer(address to, uint amount)` -> `transfer(address,uint256)`
 */
export function canonicalSignature(signature: string): string {
  const match = /^\s*([A-Za-z_$][\w$]*)\s*\((.*)\)\s*$/s.exec(signature);
  if (!match) {
    throw new AbiParseError(`Invalid signature: ${signature}`, { signature });
  }
  const [, name = '', params = ''] = match;
  return `${name}(${splitTopLevel(params).map(canonicalParameter).join(',')})`;
}

function canonicalParameter(param: string): string {
  const trimmed = param.trim();
  if (!trimmed.startsWith('(')) {
    const [type = ''] = trimmed.split(/\s+/);
    return canonicalType(parseTypeSchema(type));
  }

  let depth = 0;
  let close = -1;
  for (let i = 0; i < trimmed.length; i++) {
    if (trimmed[i] === '(') depth++;
    if (trimmed[i] === ')') depth--;
    if (depth === 0) {
      close = i;
      break;
    }
  }
  if (close === -1) {
    throw new AbiParseError(`Unbalanced parentheses in parameter: ${param}`);
  }

  const inner = splitTopLevel(trimmed.slice(1, close)).map(canonicalParameter).join(',');
  const suffix = /^(\[\d*\])*/.exec(trimmed.slice(close + 1))?.[0] ?? '';
  return `(${inner})${suffix}`;
}
