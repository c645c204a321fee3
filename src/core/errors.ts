/**
 * Invocation error types
 * Structured errors with a literal `kind` per failure class
 */

import type { Hash, Hex, TransactionReceipt } from './types.js';

export interface ErrorDetails {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
  retryable?: boolean;
}

/**
 * Base error class for every failure raised by the library
 */
export class InvocationError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  readonly suggestion: string;
  readonly retryable: boolean;

  constructor(config: ErrorDetails, options?: { cause?: unknown }) {
    super(config.message, options);
    this.name = 'InvocationError';
    this.code = config.code;
    this.details = config.details ?? {};
    this.suggestion = config.suggestion ?? 'Check the error details and try again';
    this.retryable = config.retryable ?? false;
  }

  toJSON(): ErrorDetails {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
      retryable: this.retryable,
    };
  }

  override toString(): string {
    return `${this.code}: ${this.message}. ${this.suggestion}`;
  }
}

// ============ ABI Errors ============

export class AbiParseError extends InvocationError {
  readonly kind = 'abi-parse' as const;

  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'ABI_PARSE_ERROR',
      message,
      details,
      suggestion: 'Check that the ABI is valid JSON produced by the Solidity compiler',
    });
    this.name = 'AbiParseError';
  }
}

export class AbiEncodingError extends InvocationError {
  readonly kind = 'encoding' as const;

  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'ABI_ENCODING_ERROR',
      message,
      details,
      suggestion: 'Check the number and types of the arguments against the ABI',
    });
    this.name = 'AbiEncodingError';
  }
}

export class AbiDecodingError extends InvocationError {
  readonly kind = 'decoding' as const;

  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'ABI_DECODING_ERROR',
      message,
      details,
      suggestion: 'Check that the contract address and ABI match the deployed contract',
    });
    this.name = 'AbiDecodingError';
  }
}

export class BindingError extends InvocationError {
  readonly kind = 'binding' as const;

  constructor(method: string, reason: string) {
    super({
      code: 'BINDING_ERROR',
      message: `Cannot bind method '${method}': ${reason}`,
      details: { method, reason },
      suggestion: 'Align the interface declaration with the contract ABI',
    });
    this.name = 'BindingError';
  }
}

// ============ Execution Errors ============

export type RevertKind = 'error-string' | 'panic' | 'custom' | 'unknown';

/**
 * Decoded explanation of a revert
 */
export interface RevertDiagnosis {
  readonly kind: RevertKind;
  readonly reason: string | null;
  readonly rawData: Hex | null;
}

export class RevertError extends InvocationError {
  readonly kind = 'revert' as const;
  readonly diagnosis: RevertDiagnosis;
  readonly receipt?: TransactionReceipt;

  constructor(diagnosis: RevertDiagnosis, receipt?: TransactionReceipt) {
    super({
      code: 'REVERT_ERROR',
      message: `Execution reverted: ${diagnosis.reason ?? 'reason unknown'}`,
      details: {
        revertKind: diagnosis.kind,
        reason: diagnosis.reason,
        data: diagnosis.rawData,
        transactionHash: receipt?.transactionHash,
      },
      suggestion: 'Check contract requirements and input parameters',
    });
    this.name = 'RevertError';
    this.diagnosis = diagnosis;
    if (receipt !== undefined) {
      this.receipt = receipt;
    }
  }

  get reason(): string | null {
    return this.diagnosis.reason;
  }

  get data(): Hex | null {
    return this.diagnosis.rawData;
  }
}

export class RpcError extends InvocationError {
  readonly kind = 'rpc' as const;
  readonly rpcCode: number;
  readonly data?: unknown;

  constructor(rpcCode: number, message: string, data?: unknown, options?: { cause?: unknown }) {
    super(
      {
        code: 'RPC_ERROR',
        message,
        details: { rpcCode, data },
        suggestion: 'Inspect the node response; transient failures are retried by the transport',
      },
      options
    );
    this.name = 'RpcError';
    this.rpcCode = rpcCode;
    if (data !== undefined) {
      this.data = data;
    }
  }
}

export class InvalidSenderError extends InvocationError {
  readonly kind = 'invalid-sender' as const;
  readonly rpcCode: number;

  constructor(rpcCode: number, message: string) {
    super({
      code: 'INVALID_SENDER',
      message,
      details: { rpcCode },
      suggestion: 'Check the signing key, the chain id it signs for and the nonce',
    });
    this.name = 'InvalidSenderError';
    this.rpcCode = rpcCode;
  }
}

export class ChainMismatchError extends InvocationError {
  readonly kind = 'chain-mismatch' as const;
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super({
      code: 'CHAIN_MISMATCH',
      message: `Chain mismatch: expected ${expected}, node reports ${actual}`,
      details: { expected, actual },
      suggestion: 'Point the client at the right RPC endpoint or change the expected chain id',
    });
    this.name = 'ChainMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class TimeoutError extends InvocationError {
  readonly kind = 'timeout' as const;
  readonly transactionHash: Hash;
  readonly timeoutMs: number;

  constructor(transactionHash: Hash, timeoutMs: number) {
    super({
      code: 'TIMEOUT_ERROR',
      message: `Timed out waiting for transaction receipt for ${transactionHash}`,
      details: { transactionHash, timeoutMs },
      suggestion: 'The transaction may still be mined; poll for its receipt again later',
      retryable: true,
    });
    this.name = 'TimeoutError';
    this.transactionHash = transactionHash;
    this.timeoutMs = timeoutMs;
  }
}

export class ClosedResourceError extends InvocationError {
  readonly kind = 'closed' as const;

  constructor(resource: string) {
    super({
      code: 'CLOSED_RESOURCE',
      message: `${resource} has been closed`,
      details: { resource },
      suggestion: 'Create a new client instead of reusing a closed one',
    });
    this.name = 'ClosedResourceError';
  }
}

export class InvalidRequestError extends InvocationError {
  readonly kind = 'invalid-request' as const;

  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: 'INVALID_REQUEST',
      message,
      details,
      suggestion: 'Fix the transaction request fields',
    });
    this.name = 'InvalidRequestError';
  }
}

/**
 * Closed set of failures an invocation can produce
 */
export type InvocationFailure =
  | AbiParseError
  | AbiEncodingError
  | AbiDecodingError
  | BindingError
  | RevertError
  | RpcError
  | InvalidSenderError
  | ChainMismatchError
  | TimeoutError
  | ClosedResourceError
  | InvalidRequestError;

export type FailureKind = InvocationFailure['kind'];

export function isInvocationFailure(error: unknown): error is InvocationFailure {
  return (
    error instanceof AbiParseError ||
    error instanceof AbiEncodingError ||
    error instanceof AbiDecodingError ||
    error instanceof BindingError ||
    error instanceof RevertError ||
    error instanceof RpcError ||
    error instanceof InvalidSenderError ||
    error instanceof ChainMismatchError ||
    error instanceof TimeoutError ||
    error instanceof ClosedResourceError ||
    error instanceof InvalidRequestError
  );
}

type FailureHandlers<U> = {
  [K in FailureKind]: (failure: Extract<InvocationFailure, { kind: K }>) => U;
};

/**
 * Exhaustive pattern match on a failure's kind
 */
export function matchFailure<U>(failure: InvocationFailure, handlers: FailureHandlers<U>): U {
  switch (failure.kind) {
    case 'abi-parse':
      return handlers['abi-parse'](failure);
    case 'encoding':
      return handlers.encoding(failure);
    case 'decoding':
      return handlers.decoding(failure);
    case 'binding':
      return handlers.binding(failure);
    case 'revert':
      return handlers.revert(failure);
    case 'rpc':
      return handlers.rpc(failure);
    case 'invalid-sender':
      return handlers['invalid-sender'](failure);
    case 'chain-mismatch':
      return handlers['chain-mismatch'](failure);
    case 'timeout':
      return handlers.timeout(failure);
    case 'closed':
      return handlers.closed(failure);
    case 'invalid-request':
      return handlers['invalid-request'](failure);
  }
}
