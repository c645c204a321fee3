/**
 * JSON-RPC transports
 * One JSON-RPC call per `send`; retries for transient failures live here
 */

import type { JsonRpcRequest, RpcErrorPayload, RpcResponse } from '../core/types.js';
import { ClosedResourceError } from '../core/errors.js';
import { isRecord } from '../core/guards.js';
import { type Logger, noopLogger, createPrefixedLogger, sanitizeForLog } from '../core/logger.js';

/**
 * Collaborator that carries JSON-RPC calls to a node
 */
export interface Transport {
  send(method: string, params: ReadonlyArray<unknown>): Promise<RpcResponse>;
  close(): void;
}

export interface HttpTransportOptions {
  url: string;
  timeout?: number;
  retries?: number;
  retryDelay?: number;
  headers?: Record<string, string>;
  logger?: Logger;
  /** Methods that are sent once; a retried broadcast could be submitted twice */
  nonRetryableMethods?: ReadonlyArray<string>;
  fetch?: typeof globalThis.fetch;
}

const INTERNAL_ERROR = -32603;

export class HttpTransport implements Transport {
  private readonly url: string;
  private readonly timeout: number;
  private readonly retries: number;
  private readonly retryDelay: number;
  private readonly headers: Record<string, string>;
  private readonly logger: Logger;
  private readonly nonRetryable: ReadonlySet<string>;
  private readonly fetchFn: typeof globalThis.fetch;
  // Random starting id so separate instances do not collide in shared logs
  private requestId = Math.floor(Math.random() * 1_000_000_000);
  private closed = false;

  constructor(options: HttpTransportOptions | string) {
    const resolved = typeof options === 'string' ? { url: options } : options;
    this.url = resolved.url;
    this.timeout = resolved.timeout ?? 30000;
    this.retries = resolved.retries ?? 3;
    this.retryDelay = resolved.retryDelay ?? 1000;
    this.headers = resolved.headers ?? {};
    this.logger = createPrefixedLogger(resolved.logger ?? noopLogger, 'HttpTransport');
    this.nonRetryable = new Set(resolved.nonRetryableMethods ?? ['eth_sendRawTransaction']);
    this.fetchFn = resolved.fetch ?? globalThis.fetch;
  }

  async send(method: string, params: ReadonlyArray<unknown>): Promise<RpcResponse> {
    if (this.closed) {
      throw new ClosedResourceError('HttpTransport');
    }

    const request: JsonRpcRequest = {
      jsonrpc: '2.0',
      id: ++this.requestId,
      method,
      params,
    };
    const body = JSON.stringify(request);
    this.logger.debug('Sending request', { method, body: sanitizeForLog(body) });

    const maxRetries = this.nonRetryable.has(method) ? 0 : this.retries;
    let lastError: unknown;

    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      try {
        const response = await this.post(body);
        if (response.error !== undefined && attempt < maxRetries && isTransientRpcError(response.error)) {
          this.logger.warn('Transient RPC error, retrying', {
            method,
            attempt: attempt + 1,
            code: response.error.code,
            message: response.error.message,
          });
          await sleep(this.retryDelay * (attempt + 1));
          continue;
        }
        return response;
      } catch (error) {
        lastError = error;
        if (attempt < maxRetries) {
          this.logger.warn('Request failed, retrying', {
            method,
            attempt: attempt + 1,
            error: error instanceof Error ? error.message : String(error),
          });
          await sleep(this.retryDelay * (attempt + 1));
        }
      }
    }

    const detail = lastError instanceof Error ? lastError.message : String(lastError);
    this.logger.error('Request failed', { method, attempts: maxRetries + 1, error: detail });
    return {
      error: {
        code: INTERNAL_ERROR,
        message: `${method} failed after ${maxRetries + 1} attempt(s): ${detail}`,
      },
    };
  }

  close(): void {
    this.closed = true;
  }

  private async post(body: string): Promise<RpcResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await this.fetchFn(this.url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...this.headers,
        },
        body,
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}: ${response.statusText}`);
      }

      const json: unknown = await response.json();
      return parseRpcResponse(json);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Validate a JSON-RPC 2.0 response envelope
 */
export function parseRpcResponse(json: unknown): RpcResponse {
  if (!isRecord(json)) {
    throw new Error('Malformed JSON-RPC response: expected an object');
  }

  const error = json['error'];
  if (error !== undefined && error !== null) {
    if (!isRecord(error) || typeof error['code'] !== 'number' || typeof error['message'] !== 'string') {
      throw new Error('Malformed JSON-RPC error object');
    }
    return {
      error: {
        code: error['code'],
        message: error['message'],
        ...(error['data'] !== undefined && { data: error['data'] }),
      },
    };
  }

  if (!('result' in json)) {
    throw new Error('Malformed JSON-RPC response: missing result');
  }
  return { result: json['result'] };
}

// ============ Error Classification ============

/**
 * Standard JSON-RPC error codes that indicate permanent failures
 */
const PERMANENT_ERROR_CODES = new Set([
  -32700, // Parse error
  -32600, // Invalid request
  -32601, // Method not found
  -32602, // Invalid params
  -32603, // Internal error
]);

const TRANSIENT_ERROR_PATTERNS = [
  'rate limit',
  'too many requests',
  'timeout',
  'timed out',
  'overloaded',
  'capacity',
  'try again',
  'temporarily unavailable',
  'service unavailable',
  'connection reset',
  'econnreset',
  'socket hang up',
  'network error',
];

/**
 * Patterns that stay permanent even under the generic -32000 code
 */
const PERMANENT_ETH_ERROR_PATTERNS = [
  'nonce too low',
  'nonce too high',
  'insufficient funds',
  'gas too low',
  'intrinsic gas too low',
  'exceeds block gas limit',
  'already known',
  'replacement transaction underpriced',
  'transaction underpriced',
  'invalid sender',
  'invalid signature',
  'execution reverted',
];

/**
 * Determine if an RPC error may succeed on retry
 */
export function isTransientRpcError(error: RpcErrorPayload): boolean {
  const message = error.message.toLowerCase();

  if (PERMANENT_ERROR_CODES.has(error.code)) {
    return false;
  }
  if (PERMANENT_ETH_ERROR_PATTERNS.some((pattern) => message.includes(pattern))) {
    return false;
  }
  if (TRANSIENT_ERROR_PATTERNS.some((pattern) => message.includes(pattern))) {
    return true;
  }
  // -32005 is the de facto "limit exceeded" code
  return error.code === -32005;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
