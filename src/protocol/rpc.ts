/**
 * JSON-RPC client for Ethereum
 * Typed wrappers over the node methods the invocation engine consumes
 */

import type {
  Address,
  BlockHeader,
  BlockTag,
  CallRequest,
  Hash,
  Hex,
  Log,
  TransactionReceipt,
} from '../core/types.js';
import { hexToBigInt, hexToNumber, isHex, numberToHex } from '../core/hex.js';
import { isHash } from '../core/hash.js';
import { isAddress } from '../core/address.js';
import { isRecord } from '../core/guards.js';
import { ClosedResourceError, RpcError } from '../core/errors.js';
import { type Logger, noopLogger, createPrefixedLogger } from '../core/logger.js';
import { HttpTransport, type HttpTransportOptions, type Transport } from './transport.js';

export interface RpcClientOptions {
  logger?: Logger;
}

const MALFORMED_RESULT = -32603;

export class RpcClient {
  private readonly transport: Transport;
  private readonly logger: Logger;
  private isClosed = false;

  constructor(transport: Transport, options: RpcClientOptions = {}) {
    this.transport = transport;
    this.logger = createPrefixedLogger(options.logger ?? noopLogger, 'RpcClient');
  }

  /**
   * Create a client over HTTP
   */
  static connect(transport: HttpTransportOptions | string, options: RpcClientOptions = {}): RpcClient {
    const resolved = typeof transport === 'string' ? { url: transport } : transport;
    const logger = resolved.logger ?? options.logger;
    return new RpcClient(new HttpTransport({ ...resolved, ...(logger && { logger }) }), options);
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Send a raw JSON-RPC request; node errors are thrown as RpcError
   */
  async request(method: string, params: ReadonlyArray<unknown> = []): Promise<unknown> {
    if (this.isClosed) {
      throw new ClosedResourceError('RpcClient');
    }

    const response = await this.transport.send(method, params);
    if (response.error !== undefined) {
      const { code, message, data } = response.error;
      this.logger.debug('RPC error', { method, code, message });
      throw new RpcError(code, message, data);
    }
    return response.result;
  }

  // ============ Node methods ============

  async chainId(): Promise<number> {
    return hexToNumber(expectHex(await this.request('eth_chainId'), 'eth_chainId'));
  }

  async gasPrice(): Promise<bigint> {
    return hexToBigInt(expectHex(await this.request('eth_gasPrice'), 'eth_gasPrice'));
  }

  async blobBaseFee(): Promise<bigint> {
    return hexToBigInt(expectHex(await this.request('eth_blobBaseFee'), 'eth_blobBaseFee'));
  }

  /**
   * Latest block header, or null when the node has none
   */
  async getLatestBlock(): Promise<BlockHeader | null> {
    const result = await this.request('eth_getBlockByNumber', ['latest', false]);
    return result === null || result === undefined ? null : parseBlock(result);
  }

  async getTransactionCount(address: Address, block: BlockTag = 'pending'): Promise<number> {
    const result = await this.request('eth_getTransactionCount', [address, blockTagParam(block)]);
    return hexToNumber(expectHex(result, 'eth_getTransactionCount'));
  }

  async estimateGas(call: CallRequest): Promise<bigint> {
    const result = await this.request('eth_estimateGas', [formatCall(call)]);
    return hexToBigInt(expectHex(result, 'eth_estimateGas'));
  }

  /**
   * eth_call; a null result is reported as empty data
   */
  async call(call: CallRequest, block: BlockTag = 'latest'): Promise<Hex> {
    const result = await this.request('eth_call', [formatCall(call), blockTagParam(block)]);
    if (result === null || result === undefined) {
      return '0x';
    }
    return expectHex(result, 'eth_call');
  }

  async sendRawTransaction(raw: Hex): Promise<Hash> {
    const result = await this.request('eth_sendRawTransaction', [raw]);
    if (!isHash(result)) {
      throw new RpcError(MALFORMED_RESULT, 'eth_sendRawTransaction returned a malformed hash', result);
    }
    return result;
  }

  async getTransactionReceipt(hash: Hash): Promise<TransactionReceipt | null> {
    const result = await this.request('eth_getTransactionReceipt', [hash]);
    return result === null || result === undefined ? null : parseReceipt(result);
  }

  /**
   * Close the client and its transport; later calls fail with ClosedResourceError
   */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.transport.close();
  }
}

// ============ Request formatting ============

export function blockTagParam(block: BlockTag): string {
  return typeof block === 'number' || typeof block === 'bigint' ? numberToHex(block) : block;
}

export function formatCall(call: CallRequest): Record<string, unknown> {
  const callObject: Record<string, unknown> = {};
  if (call.from) callObject['from'] = call.from;
  if (call.to) callObject['to'] = call.to;
  if (call.data) callObject['data'] = call.data;
  if (call.value !== undefined && call.value > 0n) callObject['value'] = numberToHex(call.value);
  if (call.gas !== undefined) callObject['gas'] = numberToHex(call.gas);
  if (call.accessList && call.accessList.length > 0) callObject['accessList'] = call.accessList;
  return callObject;
}

// ============ Response parsing ============

function malformed(what: string, value: unknown): RpcError {
  return new RpcError(MALFORMED_RESULT, `Malformed ${what} in node response`, value);
}

function expectHex(value: unknown, what: string): Hex {
  if (!isHex(value)) {
    throw malformed(what, value);
  }
  return value;
}

function optionalQuantity(record: Record<string, unknown>, key: string): bigint | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  return hexToBigInt(expectHex(value, key));
}

function requireHash(record: Record<string, unknown>, key: string): Hash {
  const value = record[key];
  if (!isHash(value)) {
    throw malformed(key, value);
  }
  return value;
}

function requireAddress(record: Record<string, unknown>, key: string): Address {
  const value = record[key];
  if (!isAddress(value)) {
    throw malformed(key, value);
  }
  return value;
}

function optionalAddress(record: Record<string, unknown>, key: string): Address | undefined {
  const value = record[key];
  if (value === undefined || value === null) return undefined;
  if (!isAddress(value)) {
    throw malformed(key, value);
  }
  return value;
}

export function parseBlock(raw: unknown): BlockHeader {
  if (!isRecord(raw)) {
    throw malformed('block', raw);
  }
  const baseFeePerGas = optionalQuantity(raw, 'baseFeePerGas');
  return {
    number: hexToNumber(expectHex(raw['number'], 'block.number')),
    hash: requireHash(raw, 'hash'),
    timestamp: hexToNumber(expectHex(raw['timestamp'], 'block.timestamp')),
    ...(baseFeePerGas !== undefined && { baseFeePerGas }),
  };
}

export function parseLog(raw: unknown): Log {
  if (!isRecord(raw)) {
    throw malformed('log', raw);
  }
  const topics = raw['topics'];
  if (!Array.isArray(topics)) {
    throw malformed('log.topics', topics);
  }
  const blockNumber = optionalQuantity(raw, 'blockNumber');
  const logIndex = optionalQuantity(raw, 'logIndex');
  const transactionHash = raw['transactionHash'];
  const removed = raw['removed'];

  return {
    address: requireAddress(raw, 'address'),
    topics: topics.map((topic: unknown) => {
      if (!isHash(topic)) {
        throw malformed('log topic', topic);
      }
      return topic;
    }),
    data: expectHex(raw['data'], 'log.data'),
    ...(blockNumber !== undefined && { blockNumber: Number(blockNumber) }),
    ...(isHash(transactionHash) && { transactionHash }),
    ...(logIndex !== undefined && { logIndex: Number(logIndex) }),
    ...(typeof removed === 'boolean' && { removed }),
  };
}

export function parseReceipt(raw: unknown): TransactionReceipt {
  if (!isRecord(raw)) {
    throw malformed('receipt', raw);
  }
  const logs = raw['logs'] ?? [];
  if (!Array.isArray(logs)) {
    throw malformed('receipt.logs', logs);
  }
  const to = optionalAddress(raw, 'to');
  const contractAddress = optionalAddress(raw, 'contractAddress');
  const effectiveGasPrice = optionalQuantity(raw, 'effectiveGasPrice');
  const status = optionalQuantity(raw, 'status');

  return {
    transactionHash: requireHash(raw, 'transactionHash'),
    blockHash: requireHash(raw, 'blockHash'),
    blockNumber: hexToNumber(expectHex(raw['blockNumber'], 'receipt.blockNumber')),
    from: requireAddress(raw, 'from'),
    ...(to !== undefined && { to }),
    ...(contractAddress !== undefined && { contractAddress }),
    logs: logs.map(parseLog),
    status: status !== undefined && status !== 0n,
    gasUsed: optionalQuantity(raw, 'gasUsed') ?? 0n,
    ...(effectiveGasPrice !== undefined && { effectiveGasPrice }),
  };
}
