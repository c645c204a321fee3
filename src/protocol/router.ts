/**
 * InvocationRouter - single entry point for bound contract interfaces
 *
 * The dispatch table is built once at bind time: view and pure methods go
 * to the ReadInvoker, everything else to the WalletClient. Calls never
 * re-inspect state mutability, and host methods (toString, equals) are
 * answered locally.
 */

import type { Address } from '../core/types.js';
import { Abi } from '../core/abi.js';
import type { AbiInput } from '../core/abi-codec.js';
import { BindingError, InvalidRequestError } from '../core/errors.js';
import { type Logger, noopLogger, createPrefixedLogger } from '../core/logger.js';
import type { RpcClient } from './rpc.js';
import type { WalletClient } from './wallet.js';
import { Contract, type ContractOptions, type WriteOverrides } from './contract.js';
import {
  type FunctionMetadata,
  type InterfaceDeclaration,
  type MethodDeclaration,
  InterfaceBinding,
  invocationMode,
} from './binding.js';
import { type ReadShape, type ReturnShapeTypes, type WriteShape, isReadShape, isWriteShape } from './returns.js';

export type DispatchEntry =
  | { readonly mode: 'read'; readonly returns: ReadShape; readonly metadata: FunctionMetadata }
  | { readonly mode: 'write'; readonly returns: WriteShape; readonly metadata: FunctionMetadata };

type MethodArgs<M extends MethodDeclaration> = M extends { readonly payable: true }
  ? [value: bigint, ...args: AbiInput[]]
  : AbiInput[];

export type BoundMethod<M extends MethodDeclaration> = (
  ...args: MethodArgs<M>
) => Promise<ReturnShapeTypes[M['returns']]>;

/**
 * Members every bound instance answers without touching the node
 */
export interface BindingHost {
  readonly address: Address;
  readonly methods: ReadonlyArray<string>;
  toString(): string;
  equals(other: unknown): boolean;
}

export type BoundContract<D extends InterfaceDeclaration> = {
  readonly [K in keyof D]: BoundMethod<D[K]>;
} & BindingHost;

export class InvocationRouter<D extends InterfaceDeclaration = InterfaceDeclaration> {
  readonly binding: InterfaceBinding<D>;
  readonly contract: Contract;
  private readonly wallet: WalletClient | undefined;
  private readonly table: ReadonlyMap<string, DispatchEntry>;
  private readonly logger: Logger;

  constructor(binding: InterfaceBinding<D>, contract: Contract, wallet?: WalletClient, logger: Logger = noopLogger) {
    this.binding = binding;
    this.contract = contract;
    this.wallet = wallet;
    this.logger = createPrefixedLogger(logger, 'InvocationRouter');

    const table = new Map<string, DispatchEntry>();
    for (const method of binding.methods()) {
      table.set(method, this.dispatchEntry(binding.resolve(method)));
    }
    this.table = table;
  }

  /**
   * Dispatch decision for a method, fixed at bind time
   */
  route(method: string): DispatchEntry {
    const entry = this.table.get(method);
    if (!entry) {
      throw new BindingError(method, 'not declared on this interface');
    }
    return entry;
  }

  async invoke(method: string, args: ReadonlyArray<AbiInput>): Promise<unknown> {
    const route = this.route(method);
    this.logger.debug(`Routing ${method} as ${route.mode}`, { signature: route.metadata.methodSignature });

    if (route.mode === 'read') {
      return this.contract.read(route.metadata.entry, route.returns, args);
    }
    return this.write(route.returns, route.metadata, args);
  }

  private async write(
    returns: WriteShape,
    metadata: FunctionMetadata,
    args: ReadonlyArray<AbiInput>
  ): Promise<unknown> {
    const wallet = this.wallet;
    if (wallet === undefined) {
      throw new BindingError(metadata.method, 'the binding has no wallet');
    }

    let callArgs = args;
    let overrides: WriteOverrides = {};
    if (metadata.declaration.payable === true) {
      const [value, ...rest] = args;
      if (typeof value !== 'bigint') {
        throw new InvalidRequestError(`${metadata.method} takes the wei value as a bigint first argument`, {
          method: metadata.method,
        });
      }
      callArgs = rest;
      overrides = { value };
    }

    switch (returns) {
      case 'hash':
        return this.contract.write(wallet, metadata.entry, callArgs, overrides);
      case 'receipt':
        return this.contract.writeAndWait(wallet, metadata.entry, callArgs, overrides);
      case 'void':
        await this.contract.writeAndWait(wallet, metadata.entry, callArgs, overrides);
        return undefined;
    }
  }

  private dispatchEntry(metadata: FunctionMetadata): DispatchEntry {
    const returns = metadata.declaration.returns;
    if (invocationMode(metadata.entry) === 'read') {
      if (!isReadShape(returns)) {
        throw new BindingError(metadata.method, `${returns} is not a read result`);
      }
      return { mode: 'read', returns, metadata };
    }
    if (!isWriteShape(returns)) {
      throw new BindingError(metadata.method, `${returns} is not a write result`);
    }
    return { mode: 'write', returns, metadata };
  }
}

export interface BindConfig<D extends InterfaceDeclaration> {
  address: Address;
  abi: Abi | string | ReadonlyArray<unknown>;
  declaration: D;
  readClient: RpcClient;
  walletClient: WalletClient;
  options?: ContractOptions;
  logger?: Logger;
}

export type ReadOnlyBindConfig<D extends InterfaceDeclaration> = Omit<BindConfig<D>, 'walletClient'>;

/**
 * Bind an interface declaration to a deployed contract
 *
 * @example
 * ```ts
 * const token = bind({ address, abi, declaration: Token, readClient, walletClient });
 * const balance = await token.balanceOf(holder);
 * const receipt = await token.transfer(recipient, 100n);
 * ```
 */
export function bind<const D extends InterfaceDeclaration>(config: BindConfig<D>): BoundContract<D> {
  return createBoundContract(config, config.walletClient);
}

/**
 * Bind an interface without a wallet; state-changing methods are rejected at bind time
 */
export function bindReadOnly<const D extends InterfaceDeclaration>(config: ReadOnlyBindConfig<D>): BoundContract<D> {
  return createBoundContract(config, undefined);
}

function createBoundContract<D extends InterfaceDeclaration>(
  config: ReadOnlyBindConfig<D>,
  wallet: WalletClient | undefined
): BoundContract<D> {
  const abi = config.abi instanceof Abi ? config.abi : Abi.fromJson(config.abi);
  const binding = new InterfaceBinding(abi, config.declaration, { writable: wallet !== undefined });
  const contract = new Contract({
    address: config.address,
    abi,
    readClient: config.readClient,
    ...(config.options !== undefined && { options: config.options }),
    ...(config.logger !== undefined && { logger: config.logger }),
  });
  const router = new InvocationRouter(binding, contract, wallet, config.logger);
  const methods = Object.freeze(binding.methods());

  const bound = {} as BoundContract<D>;
  for (const method of methods) {
    Object.defineProperty(bound, method, {
      value: (...args: AbiInput[]) => router.invoke(method, args),
      enumerable: true,
    });
  }
  Object.defineProperties(bound, {
    address: { value: contract.address },
    methods: { value: methods },
    toString: { value: () => `ContractBinding{address=${contract.address}}` },
    equals: { value: (other: unknown) => other === bound },
  });
  Object.freeze(bound);
  return bound;
}
