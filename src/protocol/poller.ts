/**
 * Receipt polling
 * A tick source yields one receipt lookup per step; the driver owns the deadline
 */

import type { Hash, TransactionReceipt } from '../core/types.js';
import { InvalidRequestError, TimeoutError } from '../core/errors.js';
import type { RpcClient } from './rpc.js';

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_POLL_INTERVAL_MS = 500;

/**
 * Time source, injectable so polling can be tested without real waits
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export type PollTick =
  | { readonly status: 'pending' }
  | { readonly status: 'found'; readonly receipt: TransactionReceipt };

/**
 * One eth_getTransactionReceipt per `next()`, finishing after the receipt is found
 */
export async function* receiptTicks(rpc: RpcClient, hash: Hash): AsyncGenerator<PollTick, void, void> {
  for (;;) {
    const receipt = await rpc.getTransactionReceipt(hash);
    if (receipt) {
      yield { status: 'found', receipt };
      return;
    }
    yield { status: 'pending' };
  }
}

export interface AwaitReceiptOptions {
  timeoutMs?: number;
  pollIntervalMs?: number;
  clock?: Clock;
}

export function validatePolling(timeoutMs: number, pollIntervalMs: number): void {
  if (!(timeoutMs > 0) || !(pollIntervalMs > 0)) {
    throw new InvalidRequestError('timeoutMs and pollIntervalMs must be positive', {
      timeoutMs,
      pollIntervalMs,
    });
  }
}

/**
 * Poll until a receipt appears or the timeout elapses
 * Polls happen at 0, I, 2I, ... while before the deadline: ceil(timeout / interval) polls at most
 */
export async function awaitReceipt(
  rpc: RpcClient,
  hash: Hash,
  options: AwaitReceiptOptions = {}
): Promise<TransactionReceipt> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  const clock = options.clock ?? systemClock;
  validatePolling(timeoutMs, pollIntervalMs);

  const deadline = clock.now() + timeoutMs;
  const ticks = receiptTicks(rpc, hash);

  try {
    while (clock.now() < deadline) {
      const next = await ticks.next();
      if (next.done) break;
      if (next.value.status === 'found') {
        return next.value.receipt;
      }
      await clock.sleep(pollIntervalMs);
    }
  } finally {
    await ticks.return();
  }

  throw new TimeoutError(hash, timeoutMs);
}
