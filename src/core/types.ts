/**
 * Core type definitions for evm-invoke
 */

// Hex string type (0x prefixed)
export type Hex = `0x${string}`;

// Address is a 20-byte hex string
export type Address = Hex & { readonly __brand: 'Address' };

// Hash is a 32-byte hex string
export type Hash = Hex & { readonly __brand: 'Hash' };

// Signature components
export interface Signature {
  readonly r: Hex;
  readonly s: Hex;
  readonly v: number;
  readonly yParity: 0 | 1;
}

// Transaction kinds understood by the engine
export type TransactionType = 'legacy' | 'eip1559' | 'eip4844';

// Access list for EIP-2930 style fields carried by EIP-1559/4844 transactions
export type AccessList = ReadonlyArray<AccessListItem>;

export interface AccessListItem {
  readonly address: Address;
  readonly storageKeys: ReadonlyArray<Hash>;
}

// Block references accepted by eth_call and friends
export type BlockTag = 'latest' | 'pending' | 'earliest' | 'safe' | 'finalized' | number | bigint;

// Event log
export interface Log {
  readonly address: Address;
  readonly topics: ReadonlyArray<Hash>;
  readonly data: Hex;
  readonly blockNumber?: number;
  readonly transactionHash?: Hash;
  readonly logIndex?: number;
  readonly removed?: boolean;
}

// Transaction receipt
export interface TransactionReceipt {
  readonly transactionHash: Hash;
  readonly blockHash: Hash;
  readonly blockNumber: number;
  readonly from: Address;
  readonly to?: Address;
  readonly contractAddress?: Address;
  readonly logs: ReadonlyArray<Log>;
  readonly status: boolean;
  readonly gasUsed: bigint;
  readonly effectiveGasPrice?: bigint;
}

// Subset of the block header the fee strategy needs
export interface BlockHeader {
  readonly number: number;
  readonly hash: Hash;
  readonly timestamp: number;
  readonly baseFeePerGas?: bigint;
}

// Call object for eth_call / eth_estimateGas
export interface CallRequest {
  readonly from?: Address;
  readonly to?: Address;
  readonly data?: Hex;
  readonly value?: bigint;
  readonly gas?: bigint;
  readonly accessList?: AccessList;
}

// JSON-RPC error payload
export interface RpcErrorPayload {
  readonly code: number;
  readonly message: string;
  readonly data?: unknown;
}

// JSON-RPC request
export interface JsonRpcRequest {
  readonly jsonrpc: '2.0';
  readonly id: number;
  readonly method: string;
  readonly params: ReadonlyArray<unknown>;
}

// Outcome of a single JSON-RPC call: exactly one of result or error
export type RpcResponse =
  | { readonly result: unknown; readonly error?: undefined }
  | { readonly result?: undefined; readonly error: RpcErrorPayload };
