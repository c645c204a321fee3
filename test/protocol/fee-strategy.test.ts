import { describe, it, expect, beforeEach, vi } from 'vitest';
import { FeeStrategy } from '../../src/protocol/fee-strategy.js';
import { RpcClient } from '../../src/protocol/rpc.js';
import { Abi } from '../../src/core/abi.js';
import { InvalidRequestError, RevertError, RpcError } from '../../src/core/errors.js';
import { noopLogger, type Logger } from '../../src/core/logger.js';
import { GWEI } from '../../src/core/units.js';
import { FakeTransport } from '../support/fake-transport.js';
import {
  HOLDER,
  TOKEN_ABI,
  TOKEN_ADDRESS,
  blobSidecar,
  errorStringData,
  scriptNode,
  word,
} from '../support/fixtures.js';

describe('FeeStrategy', () => {
  let transport: FakeTransport;
  let rpc: RpcClient;

  beforeEach(() => {
    transport = new FakeTransport();
    rpc = new RpcClient(transport);
  });

  describe('EIP-1559 fees', () => {
    it('derives maxFeePerGas from twice the base fee plus the priority fee', async () => {
      scriptNode(transport, { baseFee: GWEI(10) });

      const prepared = await new FeeStrategy(rpc).prepare({ to: TOKEN_ADDRESS, data: '0xabcd' }, HOLDER);

      expect(prepared.transaction).toEqual({
        type: 'eip1559',
        nonce: 7,
        gasLimit: 50_000n,
        to: TOKEN_ADDRESS,
        value: 0n,
        data: '0xabcd',
        maxPriorityFeePerGas: GWEI(1),
        maxFeePerGas: GWEI(21),
        accessList: [],
      });
      expect(prepared.requestedEip1559).toBe(true);
      expect(prepared.actualEip1559).toBe(true);
      expect(prepared.fellBackToLegacy).toBe(false);
    });

    it('estimates gas exactly once with the sender and call data', async () => {
      scriptNode(transport);

      await new FeeStrategy(rpc).prepare({ to: TOKEN_ADDRESS, data: '0xabcd', value: 3n }, HOLDER);

      expect(transport.count('eth_estimateGas')).toBe(1);
      expect(transport.paramsOf('eth_estimateGas')).toEqual([
        { from: HOLDER, to: TOKEN_ADDRESS, data: '0xabcd', value: '0x3' },
      ]);
      expect(transport.paramsOf('eth_getTransactionCount')).toEqual([HOLDER, 'pending']);
    });

    it('keeps caller-supplied fields and skips their lookups', async () => {
      scriptNode(transport);

      const prepared = await new FeeStrategy(rpc).prepare(
        { to: TOKEN_ADDRESS, nonce: 3, gasLimit: 90_000n, maxFeePerGas: GWEI(30), maxPriorityFeePerGas: GWEI(2) },
        HOLDER
      );

      expect(prepared.transaction).toMatchObject({
        nonce: 3,
        gasLimit: 90_000n,
        maxFeePerGas: GWEI(30),
        maxPriorityFeePerGas: GWEI(2),
      });
      expect(transport.methods()).toEqual(['eth_getBlockByNumber']);
    });

    it('caps the default priority fee at an explicit maxFeePerGas', async () => {
      scriptNode(transport);

      const prepared = await new FeeStrategy(rpc).prepare({ to: TOKEN_ADDRESS, maxFeePerGas: 500_000_000n }, HOLDER);

      expect(prepared.transaction).toMatchObject({ maxFeePerGas: 500_000_000n, maxPriorityFeePerGas: 500_000_000n });
    });

    it('applies configured defaults and multipliers', async () => {
      scriptNode(transport, { baseFee: GWEI(10) });
      const strategy = new FeeStrategy(rpc, { defaultPriorityFeePerGas: GWEI(2), baseFeeMultiplier: 3n });

      const prepared = await strategy.prepare({ to: TOKEN_ADDRESS }, HOLDER);

      expect(prepared.transaction).toMatchObject({ maxFeePerGas: GWEI(32), maxPriorityFeePerGas: GWEI(2) });
    });
  });

  describe('legacy transactions', () => {
    it('falls back to legacy when the latest block has no base fee', async () => {
      scriptNode(transport, { baseFee: null, gasPrice: GWEI(20) });
      const warn = vi.fn();
      const logger: Logger = { ...noopLogger, warn };

      const prepared = await new FeeStrategy(rpc, { logger }).prepare({ to: TOKEN_ADDRESS }, HOLDER);

      expect(prepared.transaction).toMatchObject({ type: 'legacy', gasPrice: GWEI(20) });
      expect(prepared.requestedEip1559).toBe(true);
      expect(prepared.actualEip1559).toBe(false);
      expect(prepared.fellBackToLegacy).toBe(true);
      expect(warn).toHaveBeenCalledWith(
        '[FeeStrategy] EIP-1559 unavailable, falling back to a legacy transaction',
        { detail: 'block 16 has no baseFeePerGas' }
      );
    });

    it('falls back silently when asked to', async () => {
      scriptNode(transport, { baseFee: null });
      const warn = vi.fn();

      const prepared = await new FeeStrategy(rpc, { eip1559Fallback: 'silent', logger: { ...noopLogger, warn } }).prepare(
        { to: TOKEN_ADDRESS },
        HOLDER
      );

      expect(prepared.fellBackToLegacy).toBe(true);
      expect(warn).not.toHaveBeenCalled();
    });

    it('refuses the fallback under the throw policy', async () => {
      scriptNode(transport, { baseFee: null });

      await expect(
        new FeeStrategy(rpc, { eip1559Fallback: 'throw' }).prepare({ to: TOKEN_ADDRESS }, HOLDER)
      ).rejects.toThrow('EIP-1559 transaction requested but block 16 has no baseFeePerGas');
      expect(transport.count('eth_gasPrice')).toBe(0);
    });

    it('reads a bare gasPrice as a legacy request', async () => {
      scriptNode(transport);

      const prepared = await new FeeStrategy(rpc).prepare({ to: TOKEN_ADDRESS, gasPrice: GWEI(5) }, HOLDER);

      expect(prepared.transaction).toMatchObject({ type: 'legacy', gasPrice: GWEI(5) });
      expect(prepared.requestedEip1559).toBe(false);
      expect(prepared.fellBackToLegacy).toBe(false);
      expect(transport.count('eth_getBlockByNumber')).toBe(0);
      expect(transport.count('eth_gasPrice')).toBe(0);
    });

    it('uses the node gas price for forced legacy requests', async () => {
      scriptNode(transport, { gasPrice: GWEI(20) });

      const prepared = await new FeeStrategy(rpc).prepare({ to: TOKEN_ADDRESS, type: 'legacy' }, HOLDER);

      expect(prepared.transaction).toEqual({
        type: 'legacy',
        nonce: 7,
        gasLimit: 50_000n,
        to: TOKEN_ADDRESS,
        value: 0n,
        data: '0x',
        gasPrice: GWEI(20),
      });
    });

    it('never asks for a block on chains without EIP-1559', async () => {
      scriptNode(transport);

      const prepared = await new FeeStrategy(rpc, { supportsEip1559: false }).prepare({ to: TOKEN_ADDRESS }, HOLDER);

      expect(prepared.transaction.type).toBe('legacy');
      expect(prepared.requestedEip1559).toBe(false);
      expect(transport.count('eth_getBlockByNumber')).toBe(0);
    });
  });

  describe('gas limit', () => {
    it('applies the buffer to estimates with floor division', async () => {
      scriptNode(transport, { estimate: 50_001n });
      const strategy = new FeeStrategy(rpc, { gasLimitBuffer: { numerator: 6n, denominator: 5n } });

      const prepared = await strategy.prepare({ to: TOKEN_ADDRESS }, HOLDER);

      expect(prepared.transaction.gasLimit).toBe(60_001n);
    });

    it('leaves explicit gas limits alone unless configured', async () => {
      scriptNode(transport);
      const buffer = { numerator: 6n, denominator: 5n };

      const plain = await new FeeStrategy(rpc, { gasLimitBuffer: buffer }).prepare(
        { to: TOKEN_ADDRESS, gasLimit: 21_000n },
        HOLDER
      );
      const buffered = await new FeeStrategy(rpc, { gasLimitBuffer: buffer, bufferExplicitGasLimit: true }).prepare(
        { to: TOKEN_ADDRESS, gasLimit: 21_000n },
        HOLDER
      );

      expect(plain.transaction.gasLimit).toBe(21_000n);
      expect(buffered.transaction.gasLimit).toBe(25_200n);
      expect(transport.count('eth_estimateGas')).toBe(0);
    });

    it('surfaces a revert during estimation as RevertError', async () => {
      scriptNode(transport).fail('eth_estimateGas', 3, 'execution reverted', errorStringData('Insufficient balance'));

      const error = await new FeeStrategy(rpc).prepare({ to: TOKEN_ADDRESS }, HOLDER).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RevertError);
      if (error instanceof RevertError) {
        expect(error.reason).toBe('Insufficient balance');
        expect(error.diagnosis.kind).toBe('error-string');
      }
      expect(transport.count('eth_getTransactionCount')).toBe(0);
    });

    it('decodes custom errors raised during estimation', async () => {
      const [insufficient] = Abi.fromJson(TOKEN_ABI).errors;
      if (!insufficient) throw new Error('fixture ABI has no errors');
      scriptNode(transport).fail('eth_estimateGas', 3, 'execution reverted', {
        data: `${insufficient.selector}${word(1n)}${word(2n)}`,
      });

      await expect(
        new FeeStrategy(rpc).prepare({ to: TOKEN_ADDRESS }, HOLDER, { customErrors: [insufficient] })
      ).rejects.toThrow('Execution reverted: InsufficientBalance(1, 2)');
    });

    it('wraps other estimation failures with the sender and recipient', async () => {
      scriptNode(transport).fail('eth_estimateGas', -32000, 'insufficient funds for gas * price + value');

      const error = await new FeeStrategy(rpc).prepare({ to: TOKEN_ADDRESS }, HOLDER).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RpcError);
      if (error instanceof RpcError) {
        expect(error.rpcCode).toBe(-32000);
        expect(error.message).toBe(
          `eth_estimateGas failed for tx from ${HOLDER} to ${TOKEN_ADDRESS}: insufficient funds for gas * price + value`
        );
        expect(error.cause).toBeInstanceOf(RpcError);
      }
    });

    it('names contract creations in estimation failures', async () => {
      scriptNode(transport).fail('eth_estimateGas', -32000, 'out of gas');

      await expect(new FeeStrategy(rpc).prepare({ data: '0x6000' }, HOLDER)).rejects.toThrow(
        `eth_estimateGas failed for tx from ${HOLDER} to contract creation: out of gas`
      );
    });
  });

  describe('blob transactions', () => {
    it('prices blob gas at twice the blob base fee', async () => {
      scriptNode(transport, { blobBaseFee: GWEI(1), baseFee: GWEI(10) });
      const sidecar = blobSidecar(2);

      const prepared = await new FeeStrategy(rpc).prepare({ to: TOKEN_ADDRESS, sidecar }, HOLDER);

      expect(prepared.transaction).toMatchObject({
        type: 'eip4844',
        to: TOKEN_ADDRESS,
        maxFeePerGas: GWEI(21),
        maxPriorityFeePerGas: GWEI(1),
        maxFeePerBlobGas: GWEI(2),
      });
      const { transaction } = prepared;
      expect(transaction.type === 'eip4844' ? transaction.blobVersionedHashes : []).toHaveLength(2);
      expect(prepared.sidecar).toBe(sidecar);
      expect(prepared.actualEip1559).toBe(true);
    });

    it('keeps an explicit maxFeePerBlobGas', async () => {
      scriptNode(transport);

      const prepared = await new FeeStrategy(rpc).prepare(
        { to: TOKEN_ADDRESS, sidecar: blobSidecar(1), maxFeePerBlobGas: GWEI(7) },
        HOLDER
      );

      expect(prepared.transaction).toMatchObject({ maxFeePerBlobGas: GWEI(7) });
      expect(transport.count('eth_blobBaseFee')).toBe(0);
    });

    it('rejects blob requests it cannot send', async () => {
      scriptNode(transport, { baseFee: null });
      const strategy = new FeeStrategy(rpc);
      const sidecar = blobSidecar(1);

      await expect(strategy.prepare({ sidecar }, HOLDER)).rejects.toThrow(
        'Blob transactions require a recipient address'
      );
      await expect(strategy.prepare({ to: TOKEN_ADDRESS, sidecar, type: 'legacy' }, HOLDER)).rejects.toThrow(
        'Blob transactions cannot be sent as legacy transactions'
      );
      await expect(strategy.prepare({ to: TOKEN_ADDRESS, sidecar }, HOLDER)).rejects.toThrow(
        'Blob transactions need a base fee or an explicit maxFeePerGas'
      );
    });
  });

  it('validates its configuration', () => {
    expect(() => new FeeStrategy(rpc, { gasLimitBuffer: { numerator: 1n, denominator: 0n } })).toThrow(
      'gasLimitBuffer numerator and denominator must be positive'
    );
    expect(() => new FeeStrategy(rpc, { baseFeeMultiplier: -1n })).toThrow(InvalidRequestError);
  });
});
