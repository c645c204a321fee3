/**
 * InterfaceBinding
 * Maps declared interface methods onto ABI functions by name and arity, once per method
 */

import type { Abi, AbiFunctionEntry } from '../core/abi.js';
import { AbiEncodingError, BindingError } from '../core/errors.js';
import { ResolutionCache } from '../core/cache.js';
import { type ReturnShape, isReadOnlyFunction, isReturnShape, returnShapeProblem } from './returns.js';

/**
 * One method of a contract interface
 */
export interface MethodDeclaration {
  /** Arguments the bound method takes, counting the wei value of a payable method */
  readonly args: number;
  readonly returns: ReturnShape;
  /** The first argument is the value sent with the transaction */
  readonly payable?: boolean;
  /** ABI function name or canonical signature, when it differs from the method name */
  readonly function?: string;
}

export type InterfaceDeclaration = Readonly<Record<string, MethodDeclaration>>;

/** Names every bound instance answers locally */
export const RESERVED_METHOD_NAMES: ReadonlySet<string> = new Set(['toString', 'equals', 'address', 'methods']);

/**
 * Declare a contract interface, keeping its literal return shapes for typing
 *
 * @example
 * ```ts
 * const Token = defineInterface({
 *   balanceOf: { args: 1, returns: 'bigint' },
 *   transfer: { args: 2, returns: 'receipt' },
 * });
 * ```
 */
export function defineInterface<const D extends InterfaceDeclaration>(declaration: D): D {
  return declaration;
}

export type InvocationMode = 'read' | 'write';

export function invocationMode(fn: AbiFunctionEntry): InvocationMode {
  return isReadOnlyFunction(fn) ? 'read' : 'write';
}

/**
 * A resolved method; the same instance is handed out for the binding's lifetime
 */
export interface FunctionMetadata {
  readonly method: string;
  readonly entry: AbiFunctionEntry;
  readonly methodSignature: string;
  readonly declaration: MethodDeclaration;
}

export interface InterfaceBindingOptions {
  /** False when no wallet is available, which rules out state-changing methods */
  writable?: boolean;
}

export class InterfaceBinding<D extends InterfaceDeclaration = InterfaceDeclaration> {
  readonly abi: Abi;
  readonly declaration: D;
  readonly writable: boolean;
  private readonly cache = new ResolutionCache<string, FunctionMetadata>();

  /**
   * Resolves every declared method; any mismatch with the ABI fails here rather than at call time
   */
  constructor(abi: Abi, declaration: D, options: InterfaceBindingOptions = {}) {
    this.abi = abi;
    this.declaration = declaration;
    this.writable = options.writable ?? true;

    for (const method of this.methods()) {
      this.resolve(method);
    }
  }

  methods(): string[] {
    return Object.keys(this.declaration);
  }

  /**
   * Cached metadata for a declared method
   */
  resolve(method: string): FunctionMetadata {
    return this.cache.getOrCreate(method, (name) => this.compute(name));
  }

  private compute(method: string): FunctionMetadata {
    if (RESERVED_METHOD_NAMES.has(method)) {
      throw new BindingError(method, 'the name is reserved by bound instances');
    }
    const declarations: InterfaceDeclaration = this.declaration;
    const declaration = Object.hasOwn(declarations, method) ? declarations[method] : undefined;
    if (declaration === undefined) {
      throw new BindingError(method, 'not declared on this interface');
    }
    if (!Number.isInteger(declaration.args) || declaration.args < 0) {
      throw new BindingError(method, `args must be a non-negative integer, got ${declaration.args}`);
    }
    if (!isReturnShape(declaration.returns)) {
      throw new BindingError(method, `unknown return shape '${String(declaration.returns)}'`);
    }

    const payable = declaration.payable === true;
    if (payable && declaration.args < 1) {
      throw new BindingError(method, 'a payable method takes the value as its first argument');
    }

    const entry = this.findFunction(method, declaration, payable ? declaration.args - 1 : declaration.args);

    if (payable && entry.stateMutability !== 'payable') {
      throw new BindingError(method, `declared payable but ${entry.signature} is ${entry.stateMutability}`);
    }

    const problem = returnShapeProblem(entry, declaration.returns);
    if (problem !== undefined) {
      throw new BindingError(method, problem);
    }

    if (!this.writable && invocationMode(entry) === 'write') {
      throw new BindingError(method, `${entry.signature} changes state but the binding has no wallet`);
    }

    return { method, entry, methodSignature: entry.signature, declaration };
  }

  private findFunction(method: string, declaration: MethodDeclaration, abiArity: number): AbiFunctionEntry {
    const target = declaration.function ?? method;

    if (target.includes('(')) {
      let entry: AbiFunctionEntry;
      try {
        entry = this.abi.getFunction(target);
      } catch (error) {
        if (error instanceof AbiEncodingError) {
          throw new BindingError(method, error.message);
        }
        throw error;
      }
      if (entry.inputs.length !== abiArity) {
        throw new BindingError(
          method,
          `${entry.signature} takes ${entry.inputs.length} argument(s) but ${abiArity} are declared`
        );
      }
      return entry;
    }

    const named = this.abi.functionsNamed(target);
    if (named.length === 0) {
      throw new BindingError(method, `no function named '${target}' in the ABI`);
    }
    const matching = named.filter((fn) => fn.inputs.length === abiArity);
    const [first, ...rest] = matching;
    if (first === undefined) {
      throw new BindingError(
        method,
        `no overload of '${target}' takes ${abiArity} argument(s); found ${named.map((fn) => fn.signature).join(', ')}`
      );
    }
    if (rest.length > 0) {
      throw new BindingError(
        method,
        `'${target}' has several overloads taking ${abiArity} argument(s): ${matching
          .map((fn) => fn.signature)
          .join(', ')}; name one with 'function'`
      );
    }
    return first;
  }
}
