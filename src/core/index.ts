/**
 * Core primitives layer
 * Codec, hashing and error building blocks with no RPC dependency
 */

// Types
export type {
  Hex,
  Address,
  Hash,
  Signature,
  TransactionType,
  AccessList,
  AccessListItem,
  BlockTag,
  Log,
  TransactionReceipt,
  BlockHeader,
  CallRequest,
  RpcErrorPayload,
  JsonRpcRequest,
  RpcResponse,
} from './types.js';

// Hex utilities
export {
  isHex,
  assertHex,
  bytesToHex,
  hexToBytes,
  numberToHex,
  hexToNumber,
  hexToBigInt,
  padHex,
  concatHex,
  hexLength,
  stringToHex,
  bytesToBigInt,
  bigIntToBytes,
  concatBytes,
} from './hex.js';

// RLP encoding
export { encode as rlpEncode, decode as rlpDecode, encodeHex as rlpEncodeHex } from './rlp.js';
export type { RLPInput, RLPItem } from './rlp.js';

// Hash functions
export { isHash, keccak256, sha256, functionSelector, eventTopic, hashMessage } from './hash.js';

// Signature utilities
export {
  isValidPrivateKey,
  publicKeyToAddress,
  privateKeyToAddress,
  sign,
  signMessage,
  recoverAddress,
} from './signature.js';

// Address utilities
export { isAddress, assertAddress, toChecksumAddress, normalizeAddress, addressEquals } from './address.js';

// Units
export { ETH, GWEI, parseUnits, formatUnits, formatGwei } from './units.js';

// Chain profiles
export { defineChain, mainnet, sepolia, base, baseSepolia, anvil } from './chain.js';
export type { ChainProfile } from './chain.js';

// ABI model
export { Abi } from './abi.js';
export type {
  StateMutability,
  AbiParameter,
  AbiEntry,
  AbiFunctionEntry,
  AbiEventEntry,
  AbiErrorEntry,
  AbiConstructorEntry,
  AbiFallbackEntry,
  FunctionCall,
  DecodedEvent,
} from './abi.js';
export { parseTypeSchema, canonicalType, canonicalSignature, isDynamic } from './abi-schema.js';
export type { TypeSchema, TupleComponent, AbiParameterJson } from './abi-schema.js';
export { encodeParameters, decodeParameters } from './abi-codec.js';
export type { AbiInput, AbiValue } from './abi-codec.js';

// Errors
export {
  InvocationError,
  AbiParseError,
  AbiEncodingError,
  AbiDecodingError,
  BindingError,
  RevertError,
  RpcError,
  InvalidSenderError,
  ChainMismatchError,
  TimeoutError,
  ClosedResourceError,
  InvalidRequestError,
  isInvocationFailure,
  matchFailure,
} from './errors.js';
export type { ErrorDetails, RevertKind, RevertDiagnosis, InvocationFailure, FailureKind } from './errors.js';

// Result type for explicit error handling
export {
  ok,
  err,
  isOk,
  isErr,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  match as matchResult,
  settle,
  ResultAsync,
} from './result.js';
export type { Ok, Err, Result } from './result.js';

// Caching
export { ResolutionCache } from './cache.js';

// Logging
export { noopLogger, consoleLogger, createPrefixedLogger, sanitizeForLog } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';
