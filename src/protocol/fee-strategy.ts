/**
 * Fee strategy
 * Chooses the transaction kind and fills nonce, gas and fee fields from node state
 */

import type { AccessList, Address, Hex } from '../core/types.js';
import type { AbiErrorEntry } from '../core/abi.js';
import { GWEI, formatGwei } from '../core/units.js';
import { InvalidRequestError, RpcError } from '../core/errors.js';
import { type Logger, noopLogger, createPrefixedLogger } from '../core/logger.js';
import type { RpcClient } from './rpc.js';
import { revertFromRpcError } from './revert.js';
import {
  type BlobSidecar,
  type UnsignedTransaction,
  computeVersionedHash,
  validateSidecar,
} from './transaction.js';

/**
 * Caller-facing transaction request; every absent field is computed
 */
export interface TransactionRequest {
  to?: Address;
  value?: bigint;
  data?: Hex;
  nonce?: number;
  gasLimit?: bigint;
  gasPrice?: bigint;
  maxFeePerGas?: bigint;
  maxPriorityFeePerGas?: bigint;
  maxFeePerBlobGas?: bigint;
  accessList?: AccessList;
  /** Force a legacy transaction; EIP-1559 is used whenever the chain allows it otherwise */
  type?: 'legacy' | 'eip1559';
  /** Blob payloads; their presence makes this an EIP-4844 transaction */
  sidecar?: BlobSidecar;
}

export interface GasLimitBuffer {
  numerator: bigint;
  denominator: bigint;
}

/**
 * What to do when EIP-1559 was requested but the latest block has no base fee
 */
export type Eip1559FallbackPolicy = 'warn' | 'silent' | 'throw';

export interface FeeStrategyConfig {
  defaultPriorityFeePerGas?: bigint;
  /** maxFeePerGas = baseFee * baseFeeMultiplier + priority fee */
  baseFeeMultiplier?: bigint;
  gasLimitBuffer?: GasLimitBuffer;
  /** Apply the buffer to caller-supplied gas limits too */
  bufferExplicitGasLimit?: boolean;
  blobBaseFeeMultiplier?: bigint;
  eip1559Fallback?: Eip1559FallbackPolicy;
  supportsEip1559?: boolean;
  logger?: Logger;
}

export interface PreparedTransaction {
  readonly transaction: UnsignedTransaction;
  readonly sidecar?: BlobSidecar;
  readonly requestedEip1559: boolean;
  readonly actualEip1559: boolean;
  readonly fellBackToLegacy: boolean;
}

export interface PrepareOptions {
  /** Custom errors used to decode a revert during gas estimation */
  customErrors?: ReadonlyArray<AbiErrorEntry>;
}

const EMPTY_DATA: Hex = '0x';

type FeeFields =
  | { kind: 'legacy'; gasPrice: bigint }
  | { kind: 'eip1559'; maxFeePerGas: bigint; maxPriorityFeePerGas: bigint };

export class FeeStrategy {
  private readonly rpc: RpcClient;
  private readonly config: Required<Omit<FeeStrategyConfig, 'logger'>>;
  private readonly logger: Logger;

  constructor(rpc: RpcClient, config: FeeStrategyConfig = {}) {
    this.rpc = rpc;
    this.logger = createPrefixedLogger(config.logger ?? noopLogger, 'FeeStrategy');
    this.config = {
      defaultPriorityFeePerGas: config.defaultPriorityFeePerGas ?? GWEI(1),
      baseFeeMultiplier: config.baseFeeMultiplier ?? 2n,
      gasLimitBuffer: config.gasLimitBuffer ?? { numerator: 1n, denominator: 1n },
      bufferExplicitGasLimit: config.bufferExplicitGasLimit ?? false,
      blobBaseFeeMultiplier: config.blobBaseFeeMultiplier ?? 2n,
      eip1559Fallback: config.eip1559Fallback ?? 'warn',
      supportsEip1559: config.supportsEip1559 ?? true,
    };

    const { gasLimitBuffer, defaultPriorityFeePerGas, baseFeeMultiplier, blobBaseFeeMultiplier } = this.config;
    if (gasLimitBuffer.numerator <= 0n || gasLimitBuffer.denominator <= 0n) {
      throw new InvalidRequestError('gasLimitBuffer numerator and denominator must be positive');
    }
    if (defaultPriorityFeePerGas < 0n || baseFeeMultiplier < 0n || blobBaseFeeMultiplier < 0n) {
      throw new InvalidRequestError('Fee defaults and multipliers cannot be negative');
    }
  }

  /**
   * Compute every field of the unsigned transaction for `from`
   */
  async prepare(
    request: TransactionRequest,
    from: Address,
    options: PrepareOptions = {}
  ): Promise<PreparedTransaction> {
    if (request.sidecar) {
      return this.prepareBlob(request, request.sidecar, from, options);
    }

    const requestedEip1559 = this.wantsEip1559(request);
    const fees = await this.resolveFees(request, requestedEip1559);
    const gasLimit = await this.resolveGasLimit(request, from, options);
    const nonce = request.nonce ?? (await this.rpc.getTransactionCount(from, 'pending'));

    const base = {
      nonce,
      gasLimit,
      ...(request.to !== undefined && { to: request.to }),
      value: request.value ?? 0n,
      data: request.data ?? EMPTY_DATA,
    };

    const transaction: UnsignedTransaction =
      fees.kind === 'eip1559'
        ? {
            type: 'eip1559',
            ...base,
            maxPriorityFeePerGas: fees.maxPriorityFeePerGas,
            maxFeePerGas: fees.maxFeePerGas,
            accessList: request.accessList ?? [],
          }
        : { type: 'legacy', ...base, gasPrice: fees.gasPrice };

    const actualEip1559 = fees.kind === 'eip1559';
    return {
      transaction,
      requestedEip1559,
      actualEip1559,
      fellBackToLegacy: requestedEip1559 && !actualEip1559,
    };
  }

  private wantsEip1559(request: TransactionRequest): boolean {
    if (!this.config.supportsEip1559 || request.type === 'legacy') {
      return false;
    }
    // A bare gasPrice reads as a legacy request
    const onlyGasPrice =
      request.gasPrice !== undefined &&
      request.maxFeePerGas === undefined &&
      request.maxPriorityFeePerGas === undefined;
    return !(onlyGasPrice && request.type === undefined);
  }

  private async resolveFees(request: TransactionRequest, requestedEip1559: boolean): Promise<FeeFields> {
    if (requestedEip1559) {
      const block = await this.rpc.getLatestBlock();
      const baseFee = block?.baseFeePerGas;
      if (baseFee !== undefined) {
        return { kind: 'eip1559', ...this.eip1559Fees(request, baseFee) };
      }
      this.onMissingBaseFee(block === null ? 'no latest block' : `block ${block.number} has no baseFeePerGas`);
    }

    const gasPrice = request.gasPrice ?? (await this.rpc.gasPrice());
    return { kind: 'legacy', gasPrice };
  }

  private eip1559Fees(
    request: TransactionRequest,
    baseFee: bigint
  ): { maxFeePerGas: bigint; maxPriorityFeePerGas: bigint } {
    const fallbackPriority = this.config.defaultPriorityFeePerGas;
    const maxPriorityFeePerGas =
      request.maxPriorityFeePerGas ??
      (request.maxFeePerGas !== undefined && request.maxFeePerGas < fallbackPriority
        ? request.maxFeePerGas
        : fallbackPriority);
    const maxFeePerGas = request.maxFeePerGas ?? baseFee * this.config.baseFeeMultiplier + maxPriorityFeePerGas;
    return { maxFeePerGas, maxPriorityFeePerGas };
  }

  private onMissingBaseFee(detail: string): void {
    switch (this.config.eip1559Fallback) {
      case 'throw':
        throw new InvalidRequestError(`EIP-1559 transaction requested but ${detail}`, { detail });
      case 'warn':
        this.logger.warn('EIP-1559 unavailable, falling back to a legacy transaction', { detail });
        return;
      case 'silent':
        return;
    }
  }

  private async prepareBlob(
    request: TransactionRequest,
    sidecar: BlobSidecar,
    from: Address,
    options: PrepareOptions
  ): Promise<PreparedTransaction> {
    const to = request.to;
    if (to === undefined) {
      throw new InvalidRequestError('Blob transactions require a recipient address');
    }
    if (request.type === 'legacy') {
      throw new InvalidRequestError('Blob transactions cannot be sent as legacy transactions');
    }
    validateSidecar(sidecar);

    const block = await this.rpc.getLatestBlock();
    const baseFee = block?.baseFeePerGas;
    if (baseFee === undefined && request.maxFeePerGas === undefined) {
      throw new InvalidRequestError('Blob transactions need a base fee or an explicit maxFeePerGas');
    }
    const fees = this.eip1559Fees(request, baseFee ?? 0n);
    const maxFeePerBlobGas =
      request.maxFeePerBlobGas ?? (await this.rpc.blobBaseFee()) * this.config.blobBaseFeeMultiplier;
    const gasLimit = await this.resolveGasLimit(request, from, options);
    const nonce = request.nonce ?? (await this.rpc.getTransactionCount(from, 'pending'));

    this.logger.debug('Prepared blob transaction', {
      blobs: sidecar.blobs.length,
      maxFeePerBlobGas: formatGwei(maxFeePerBlobGas),
    });

    return {
      transaction: {
        type: 'eip4844',
        nonce,
        gasLimit,
        to,
        value: request.value ?? 0n,
        data: request.data ?? EMPTY_DATA,
        maxPriorityFeePerGas: fees.maxPriorityFeePerGas,
        maxFeePerGas: fees.maxFeePerGas,
        accessList: request.accessList ?? [],
        maxFeePerBlobGas,
        blobVersionedHashes: sidecar.commitments.map(computeVersionedHash),
      },
      sidecar,
      requestedEip1559: true,
      actualEip1559: true,
      fellBackToLegacy: false,
    };
  }

  private async resolveGasLimit(
    request: TransactionRequest,
    from: Address,
    options: PrepareOptions
  ): Promise<bigint> {
    if (request.gasLimit !== undefined) {
      return this.config.bufferExplicitGasLimit ? this.applyBuffer(request.gasLimit) : request.gasLimit;
    }

    try {
      const estimate = await this.rpc.estimateGas({
        from,
        ...(request.to !== undefined && { to: request.to }),
        ...(request.data !== undefined && { data: request.data }),
        ...(request.value !== undefined && { value: request.value }),
        ...(request.accessList !== undefined && { accessList: request.accessList }),
      });
      return this.applyBuffer(estimate);
    } catch (error) {
      if (!(error instanceof RpcError)) {
        throw error;
      }
      const revert = revertFromRpcError(error, options.customErrors);
      if (revert) {
        throw revert;
      }
      throw new RpcError(
        error.rpcCode,
        `eth_estimateGas failed for tx from ${from} to ${request.to ?? 'contract creation'}: ${error.message}`,
        error.data,
        { cause: error }
      );
    }
  }

  private applyBuffer(gas: bigint): bigint {
    const { numerator, denominator } = this.config.gasLimitBuffer;
    return (gas * numerator) / denominator;
  }
}
