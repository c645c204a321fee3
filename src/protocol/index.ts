/**
 * Protocol layer
 * JSON-RPC transport, the read and write paths, and interface binding
 */

// Transport and RPC client
export { HttpTransport, parseRpcResponse, isTransientRpcError } from './transport.js';
export type { Transport, HttpTransportOptions } from './transport.js';
export { RpcClient, blockTagParam, formatCall, parseBlock, parseLog, parseReceipt } from './rpc.js';
export type { RpcClientOptions } from './rpc.js';

// Transactions
export {
  BLOB_SIZE,
  MAX_BLOBS_PER_TRANSACTION,
  serializeForSigning,
  signingHash,
  serializeSigned,
  serializeNetworkWrapper,
  computeVersionedHash,
  validateSidecar,
  finalizeTransaction,
  parseSignedTransaction,
} from './transaction.js';
export type {
  LegacyTransaction,
  Eip1559Transaction,
  Eip4844Transaction,
  UnsignedTransaction,
  BlobSidecar,
  SignedTransaction,
  ParsedTransaction,
} from './transaction.js';

// Signing
export { PrivateKeySigner } from './signer.js';
export type { Signer } from './signer.js';

// Revert decoding
export { ERROR_STRING_SELECTOR, PANIC_SELECTOR, decodeRevert, extractRevertData, revertFromRpcError } from './revert.js';

// Fee strategy
export { FeeStrategy } from './fee-strategy.js';
export type {
  TransactionRequest,
  GasLimitBuffer,
  Eip1559FallbackPolicy,
  FeeStrategyConfig,
  PreparedTransaction,
  PrepareOptions,
} from './fee-strategy.js';

// Receipt polling
export {
  DEFAULT_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
  systemClock,
  receiptTicks,
  awaitReceipt,
} from './poller.js';
export type { Clock, PollTick, AwaitReceiptOptions } from './poller.js';

// Transaction lifecycle
export { WalletClient, translateSendError } from './wallet.js';
export type { LifecycleState, LifecycleEvent, WalletClientConfig, SendOptions, WaitOptions } from './wallet.js';

// Read path and contracts
export { ReadInvoker } from './reader.js';
export type { ReadInvokerOptions, ReadCallOptions } from './reader.js';
export { Contract, resolveContractOptions } from './contract.js';
export type {
  ContractConfig,
  ContractOptions,
  ResolvedContractOptions,
  WriteOverrides,
  WaitOverrides,
} from './contract.js';
export { isReturnShape, isReadShape, isWriteShape, isReadOnlyFunction, shapeResult } from './returns.js';
export type { ReturnShape, ReturnShapeTypes, ReadShape, WriteShape } from './returns.js';

// Interface binding and routing
export {
  defineInterface,
  invocationMode,
  InterfaceBinding,
  RESERVED_METHOD_NAMES,
} from './binding.js';
export type {
  MethodDeclaration,
  InterfaceDeclaration,
  InvocationMode,
  FunctionMetadata,
  InterfaceBindingOptions,
} from './binding.js';
export { InvocationRouter, bind, bindReadOnly } from './router.js';
export type {
  DispatchEntry,
  BoundMethod,
  BindingHost,
  BoundContract,
  BindConfig,
  ReadOnlyBindConfig,
} from './router.js';
