/**
 * Smart contract interactions
 * Low-level surface: named reads through eth_call and writes through a WalletClient
 */

import type { Address, BlockTag, Hash, Log, TransactionReceipt } from '../core/types.js';
import { Abi, type AbiFunctionEntry, type DecodedEvent, type FunctionCall } from '../core/abi.js';
import type { AbiInput, AbiValue } from '../core/abi-codec.js';
import { InvalidRequestError, type InvocationFailure } from '../core/errors.js';
import { ResultAsync } from '../core/result.js';
import type { Logger } from '../core/logger.js';
import type { RpcClient } from './rpc.js';
import type { WalletClient } from './wallet.js';
import type { TransactionRequest } from './fee-strategy.js';
import { DEFAULT_POLL_INTERVAL_MS, DEFAULT_TIMEOUT_MS } from './poller.js';
import { ReadInvoker, type ReadCallOptions } from './reader.js';
import type { ReadShape, ReturnShapeTypes } from './returns.js';

export interface ContractOptions {
  /** Fixed gas limit for writes; estimated when unset */
  gasLimit?: bigint;
  timeoutMs?: number;
  pollIntervalMs?: number;
  transactionType?: 'eip1559' | 'legacy';
  maxPriorityFeePerGas?: bigint;
  /** Block reference for reads */
  blockTag?: BlockTag;
}

export interface ResolvedContractOptions {
  readonly gasLimit: bigint | undefined;
  readonly timeoutMs: number;
  readonly pollIntervalMs: number;
  readonly transactionType: 'eip1559' | 'legacy';
  readonly maxPriorityFeePerGas: bigint | undefined;
  readonly blockTag: BlockTag;
}

export interface ContractConfig {
  address: Address;
  abi: Abi | string | ReadonlyArray<unknown>;
  readClient: RpcClient;
  options?: ContractOptions;
  logger?: Logger;
}

/**
 * Per-call transaction overrides; calldata and recipient always come from the contract
 */
export type WriteOverrides = Omit<TransactionRequest, 'to' | 'data' | 'sidecar'>;

export interface WaitOverrides extends WriteOverrides {
  timeoutMs?: number;
  pollIntervalMs?: number;
}

export function resolveContractOptions(options: ContractOptions = {}): ResolvedContractOptions {
  const resolved: ResolvedContractOptions = {
    gasLimit: options.gasLimit,
    timeoutMs: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    pollIntervalMs: options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
    transactionType: options.transactionType ?? 'eip1559',
    maxPriorityFeePerGas: options.maxPriorityFeePerGas,
    blockTag: options.blockTag ?? 'latest',
  };

  if (!(resolved.timeoutMs > 0) || !(resolved.pollIntervalMs > 0)) {
    throw new InvalidRequestError('timeoutMs and pollIntervalMs must be positive', {
      timeoutMs: resolved.timeoutMs,
      pollIntervalMs: resolved.pollIntervalMs,
    });
  }
  if (resolved.gasLimit !== undefined && resolved.gasLimit <= 0n) {
    throw new InvalidRequestError('gasLimit must be positive', { gasLimit: resolved.gasLimit.toString() });
  }
  if (resolved.maxPriorityFeePerGas !== undefined && resolved.maxPriorityFeePerGas < 0n) {
    throw new InvalidRequestError('maxPriorityFeePerGas cannot be negative');
  }
  return resolved;
}

/**
 * Contract instance for interacting with smart contracts
 */
export class Contract {
  readonly address: Address;
  readonly abi: Abi;
  readonly options: ResolvedContractOptions;
  private readonly reader: ReadInvoker;

  constructor(config: ContractConfig) {
    this.address = config.address;
    this.abi = config.abi instanceof Abi ? config.abi : Abi.fromJson(config.abi);
    this.options = resolveContractOptions(config.options);
    this.reader = new ReadInvoker(config.readClient, this.abi, config.address, {
      blockTag: this.options.blockTag,
      ...(config.logger !== undefined && { logger: config.logger }),
    });
  }

  /**
   * Call a function through eth_call and shape its outputs
   *
   * @example
   * ```ts
   * const balance = await token.read('balanceOf', 'bigint', [holder]);
   * ```
   */
  async read<S extends ReadShape>(
    method: string | AbiFunctionEntry,
    returns: S,
    args: ReadonlyArray<AbiInput> = [],
    options: ReadCallOptions = {}
  ): Promise<ReturnShapeTypes[S]> {
    return this.reader.call(method, returns, args, options);
  }

  /**
   * Every decoded output of a call
   */
  async readRaw(
    method: string | AbiFunctionEntry,
    args: ReadonlyArray<AbiInput> = [],
    options: ReadCallOptions = {}
  ): Promise<AbiValue[]> {
    return this.reader.callRaw(method, args, options);
  }

  /**
   * Submit a transaction calling `method`; resolves once the node accepts it
   */
  async write(
    wallet: WalletClient,
    method: string | AbiFunctionEntry,
    args: ReadonlyArray<AbiInput> = [],
    overrides: WriteOverrides = {}
  ): Promise<Hash> {
    const call = this.encodeCall(method, args);
    return wallet.sendTransaction(this.buildRequest(call, overrides), { customErrors: this.abi.errors });
  }

  /**
   * Submit and wait for the receipt; a mined revert rejects with RevertError
   */
  async writeAndWait(
    wallet: WalletClient,
    method: string | AbiFunctionEntry,
    args: ReadonlyArray<AbiInput> = [],
    overrides: WaitOverrides = {}
  ): Promise<TransactionReceipt> {
    const { timeoutMs, pollIntervalMs, ...fields } = overrides;
    const call = this.encodeCall(method, args);
    return wallet.sendTransactionAndWait(this.buildRequest(call, fields), {
      customErrors: this.abi.errors,
      timeoutMs: timeoutMs ?? this.options.timeoutMs,
      pollIntervalMs: pollIntervalMs ?? this.options.pollIntervalMs,
    });
  }

  /**
   * `read` with failures returned as values
   */
  tryRead<S extends ReadShape>(
    method: string | AbiFunctionEntry,
    returns: S,
    args: ReadonlyArray<AbiInput> = [],
    options: ReadCallOptions = {}
  ): ResultAsync<ReturnShapeTypes[S], InvocationFailure> {
    return ResultAsync.fromInvocation(this.read(method, returns, args, options));
  }

  /**
   * `writeAndWait` with failures returned as values
   */
  tryWrite(
    wallet: WalletClient,
    method: string | AbiFunctionEntry,
    args: ReadonlyArray<AbiInput> = [],
    overrides: WaitOverrides = {}
  ): ResultAsync<TransactionReceipt, InvocationFailure> {
    return ResultAsync.fromInvocation(this.writeAndWait(wallet, method, args, overrides));
  }

  /**
   * Encode calldata without sending anything
   */
  encodeFunction(method: string, ...args: AbiInput[]): FunctionCall {
    return this.abi.encodeFunction(method, ...args);
  }

  /**
   * Decode this contract's logs for an event; logs from other addresses are ignored
   */
  decodeEvents(event: string, logs: ReadonlyArray<Log>): DecodedEvent[] {
    const own = this.address.toLowerCase();
    return this.abi.decodeEvents(
      event,
      logs.filter((log) => log.address.toLowerCase() === own)
    );
  }

  private encodeCall(method: string | AbiFunctionEntry, args: ReadonlyArray<AbiInput>): FunctionCall {
    const fn =
      typeof method !== 'string'
        ? method
        : method.includes('(') || this.abi.functionsNamed(method).length <= 1
          ? this.abi.getFunction(method)
          : this.abi.getFunction(method, args.length);
    return Abi.encodeCall(fn, args);
  }

  private buildRequest(call: FunctionCall, overrides: WriteOverrides): TransactionRequest {
    const fn = call.function;
    if (overrides.value !== undefined && overrides.value > 0n && fn.stateMutability !== 'payable') {
      throw new InvalidRequestError(`${fn.signature} is ${fn.stateMutability} and cannot receive value`, {
        signature: fn.signature,
        value: overrides.value.toString(),
      });
    }

    // An override left undefined keeps the contract default
    const gasLimit = overrides.gasLimit ?? this.options.gasLimit;
    const maxPriorityFeePerGas = overrides.maxPriorityFeePerGas ?? this.options.maxPriorityFeePerGas;
    const type = overrides.type ?? (this.options.transactionType === 'legacy' ? 'legacy' : undefined);

    return {
      ...overrides,
      ...(gasLimit !== undefined && { gasLimit }),
      ...(maxPriorityFeePerGas !== undefined && { maxPriorityFeePerGas }),
      ...(type !== undefined && { type }),
      to: this.address,
      data: call.data,
    };
  }
}
