/**
 * ReadInvoker - the eth_call path for view and pure functions
 */

import type { Address, BlockTag, Hex } from '../core/types.js';
import { Abi, type AbiFunctionEntry } from '../core/abi.js';
import type { AbiInput, AbiValue } from '../core/abi-codec.js';
import { AbiDecodingError, RpcError } from '../core/errors.js';
import { type Logger, noopLogger, createPrefixedLogger } from '../core/logger.js';
import type { RpcClient } from './rpc.js';
import { revertFromRpcError } from './revert.js';
import { type ReadShape, type ReturnShapeTypes, shapeResult } from './returns.js';

export interface ReadInvokerOptions {
  /** Block reference used when a call does not name one */
  blockTag?: BlockTag;
  logger?: Logger;
}

export interface ReadCallOptions {
  blockTag?: BlockTag;
  from?: Address;
}

export class ReadInvoker {
  readonly address: Address;
  readonly abi: Abi;
  private readonly rpc: RpcClient;
  private readonly blockTag: BlockTag;
  private readonly logger: Logger;

  constructor(rpc: RpcClient, abi: Abi, address: Address, options: ReadInvokerOptions = {}) {
    this.rpc = rpc;
    this.abi = abi;
    this.address = address;
    this.blockTag = options.blockTag ?? 'latest';
    this.logger = createPrefixedLogger(options.logger ?? noopLogger, 'ReadInvoker');
  }

  /**
   * Call a function and convert its outputs into `returns`
   */
  async call<S extends ReadShape>(
    fn: string | AbiFunctionEntry,
    returns: S,
    args: ReadonlyArray<AbiInput> = [],
    options: ReadCallOptions = {}
  ): Promise<ReturnShapeTypes[S]> {
    const entry = this.resolve(fn, args.length);
    const values = await this.callEntry(entry, args, options);
    return shapeResult(returns, values, entry);
  }

  /**
   * Call a function and return every decoded output
   */
  async callRaw(
    fn: string | AbiFunctionEntry,
    args: ReadonlyArray<AbiInput> = [],
    options: ReadCallOptions = {}
  ): Promise<AbiValue[]> {
    return this.callEntry(this.resolve(fn, args.length), args, options);
  }

  private async callEntry(
    fn: AbiFunctionEntry,
    args: ReadonlyArray<AbiInput>,
    options: ReadCallOptions
  ): Promise<AbiValue[]> {
    const { data } = Abi.encodeCall(fn, args);
    const blockTag = options.blockTag ?? this.blockTag;

    let result: Hex;
    try {
      result = await this.rpc.call(
        {
          to: this.address,
          data,
          ...(options.from !== undefined && { from: options.from }),
        },
        blockTag
      );
    } catch (error) {
      if (error instanceof RpcError) {
        const revert = revertFromRpcError(error, this.abi.errors);
        if (revert) {
          this.logger.warn('Call reverted', { signature: fn.signature, reason: revert.reason });
          throw revert;
        }
      }
      throw error;
    }

    // Functions without outputs legitimately answer 0x
    if (result === '0x' && fn.outputs.length > 0) {
      throw new AbiDecodingError(`eth_call to ${this.address} for ${fn.signature} returned an empty result`, {
        address: this.address,
        signature: fn.signature,
      });
    }

    return this.abi.decodeFunctionResult(fn, result);
  }

  private resolve(fn: string | AbiFunctionEntry, argCount: number): AbiFunctionEntry {
    if (typeof fn !== 'string') {
      return fn;
    }
    return fn.includes('(') || this.abi.functionsNamed(fn).length <= 1
      ? this.abi.getFunction(fn)
      : this.abi.getFunction(fn, argCount);
  }
}
