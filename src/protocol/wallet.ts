/**
 * WalletClient - the write path
 * building -> signed -> submitted -> polling -> mined-success | mined-reverted | timed-out
 */

import type { Address, Hash, TransactionReceipt } from '../core/types.js';
import type { AbiErrorEntry } from '../core/abi.js';
import type { ChainProfile } from '../core/chain.js';
import {
  ChainMismatchError,
  ClosedResourceError,
  InvalidSenderError,
  type RevertDiagnosis,
  RevertError,
  RpcError,
  TimeoutError,
} from '../core/errors.js';
import { type Logger, noopLogger, createPrefixedLogger } from '../core/logger.js';
import type { RpcClient } from './rpc.js';
import type { Signer } from './signer.js';
import {
  FeeStrategy,
  type FeeStrategyConfig,
  type PreparedTransaction,
  type TransactionRequest,
} from './fee-strategy.js';
import { finalizeTransaction, type SignedTransaction, type UnsignedTransaction } from './transaction.js';
import {
  type Clock,
  systemClock,
  awaitReceipt,
  validatePolling,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_TIMEOUT_MS,
} from './poller.js';
import { decodeRevert, extractRevertData, revertFromRpcError } from './revert.js';

export type LifecycleState =
  | 'building'
  | 'signed'
  | 'submitted'
  | 'polling'
  | 'mined-success'
  | 'mined-reverted'
  | 'timed-out';

export interface LifecycleEvent {
  readonly state: LifecycleState;
  readonly transactionHash?: Hash;
}

export interface WalletClientConfig {
  signer: Signer;
  rpc: RpcClient;
  /** Seeds the expected chain id and fee defaults */
  chain?: ChainProfile;
  expectedChainId?: number;
  fees?: FeeStrategyConfig;
  logger?: Logger;
  clock?: Clock;
  onStateChange?: (event: LifecycleEvent) => void;
}

export interface SendOptions {
  /** Custom errors for decoding reverts raised by this transaction */
  customErrors?: ReadonlyArray<AbiErrorEntry>;
}

export interface WaitOptions extends SendOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
}

interface Submission {
  readonly hash: Hash;
  readonly prepared: PreparedTransaction;
  readonly signed: SignedTransaction;
}

export class WalletClient {
  readonly signer: Signer;
  readonly rpc: RpcClient;
  readonly expectedChainId: number | undefined;
  private readonly feeStrategy: FeeStrategy;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly onStateChange: ((event: LifecycleEvent) => void) | undefined;
  private chainIdPromise: Promise<number> | undefined;
  private isClosed = false;

  constructor(config: WalletClientConfig) {
    this.signer = config.signer;
    this.rpc = config.rpc;
    this.expectedChainId = config.expectedChainId ?? config.chain?.chainId;
    this.logger = createPrefixedLogger(config.logger ?? noopLogger, 'WalletClient');
    this.clock = config.clock ?? systemClock;
    this.onStateChange = config.onStateChange;

    const chainDefaults: FeeStrategyConfig = config.chain
      ? {
          supportsEip1559: config.chain.supportsEip1559,
          defaultPriorityFeePerGas: config.chain.defaultPriorityFeePerGas,
        }
      : {};
    this.feeStrategy = new FeeStrategy(this.rpc, {
      ...chainDefaults,
      ...config.fees,
      logger: config.fees?.logger ?? config.logger ?? noopLogger,
    });
  }

  get address(): Address {
    return this.signer.address;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Chain id reported by the node, fetched once and shared by concurrent callers
   */
  async chainId(): Promise<number> {
    this.assertOpen();
    if (!this.chainIdPromise) {
      // A failed lookup must not poison the cache
      this.chainIdPromise = this.rpc.chainId().catch((error: unknown) => {
        this.chainIdPromise = undefined;
        throw error;
      });
    }
    return this.chainIdPromise;
  }

  /**
   * Build, sign and submit; resolves with the transaction hash without waiting for inclusion
   */
  async sendTransaction(request: TransactionRequest, options: SendOptions = {}): Promise<Hash> {
    const { hash } = await this.submit(request, options);
    return hash;
  }

  /**
   * Submit and poll for the receipt
   * A mined revert is replayed with eth_call at the receipt's block to recover the reason
   */
  async sendTransactionAndWait(
    request: TransactionRequest,
    options: WaitOptions = {}
  ): Promise<TransactionReceipt> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    validatePolling(timeoutMs, pollIntervalMs);

    const { hash, prepared } = await this.submit(request, options);

    this.transition('polling', hash);
    let receipt: TransactionReceipt;
    try {
      receipt = await awaitReceipt(this.rpc, hash, { timeoutMs, pollIntervalMs, clock: this.clock });
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.transition('timed-out', hash);
      }
      throw error;
    }

    if (receipt.status) {
      this.transition('mined-success', hash);
      return receipt;
    }

    this.transition('mined-reverted', hash);
    const diagnosis = await this.replay(prepared.transaction, receipt, options.customErrors);
    this.logger.warn('Transaction reverted', {
      hash,
      blockNumber: receipt.blockNumber,
      reason: diagnosis.reason ?? 'unknown',
    });
    throw new RevertError(diagnosis, receipt);
  }

  /**
   * Close the wallet and its RPC client; later sends fail without touching the node
   */
  close(): void {
    this.isClosed = true;
    this.chainIdPromise = undefined;
    this.rpc.close();
  }

  private async submit(request: TransactionRequest, options: SendOptions): Promise<Submission> {
    this.assertOpen();
    this.transition('building');

    // Chain id is settled before any fee, gas or nonce lookup
    const chainId = await this.chainId();
    if (this.expectedChainId !== undefined && chainId !== this.expectedChainId) {
      throw new ChainMismatchError(this.expectedChainId, chainId);
    }

    const prepared = await this.feeStrategy.prepare(request, this.signer.address, {
      ...(options.customErrors !== undefined && { customErrors: options.customErrors }),
    });
    const signature = await this.signer.signTransaction(prepared.transaction, chainId);
    const signed = finalizeTransaction(prepared.transaction, chainId, signature, prepared.sidecar);
    this.transition('signed', signed.hash);

    let hash: Hash;
    try {
      hash = await this.rpc.sendRawTransaction(signed.raw);
    } catch (error) {
      throw translateSendError(error, options.customErrors);
    }
    this.transition('submitted', hash);

    if (hash.toLowerCase() !== signed.hash.toLowerCase()) {
      this.logger.warn('Node reported a different transaction hash', { expected: signed.hash, actual: hash });
    }

    return { hash, prepared, signed };
  }

  private async replay(
    transaction: UnsignedTransaction,
    receipt: TransactionReceipt,
    customErrors: ReadonlyArray<AbiErrorEntry> = []
  ): Promise<RevertDiagnosis> {
    try {
      await this.rpc.call(
        {
          from: this.signer.address,
          ...(transaction.to !== undefined && { to: transaction.to }),
          data: transaction.data,
          value: transaction.value,
        },
        receipt.blockNumber
      );
    } catch (error) {
      if (error instanceof RpcError) {
        return decodeRevert(extractRevertData(error.data) ?? null, customErrors);
      }
      throw error;
    }
    // The replay succeeded against post-block state, so no reason can be recovered
    return decodeRevert(null);
  }

  private transition(state: LifecycleState, transactionHash?: Hash): void {
    this.logger.debug(`Lifecycle: ${state}`, transactionHash !== undefined ? { hash: transactionHash } : undefined);
    this.onStateChange?.({ state, ...(transactionHash !== undefined && { transactionHash }) });
  }

  private assertOpen(): void {
    if (this.isClosed) {
      throw new ClosedResourceError('WalletClient');
    }
  }
}

/**
 * Map an eth_sendRawTransaction failure onto the failure taxonomy
 */
export function translateSendError(error: unknown, customErrors: ReadonlyArray<AbiErrorEntry> = []): unknown {
  if (!(error instanceof RpcError)) {
    return error;
  }
  if (error.message.toLowerCase().includes('invalid sender')) {
    return new InvalidSenderError(error.rpcCode, error.message);
  }
  return revertFromRpcError(error, customErrors) ?? error;
}
