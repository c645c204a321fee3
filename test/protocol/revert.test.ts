import { describe, it, expect } from 'vitest';
import { decodeRevert, extractRevertData, revertFromRpcError } from '../../src/protocol/revert.js';
import { Abi } from '../../src/core/abi.js';
import { RevertError, RpcError } from '../../src/core/errors.js';
import { TOKEN_ABI, errorStringData, word } from '../support/fixtures.js';

const abi = Abi.fromJson(TOKEN_ABI);

describe('decodeRevert', () => {
  it('decodes Error(string)', () => {
    const data = errorStringData('Insufficient balance');
    expect(decodeRevert(data)).toEqual({ kind: 'error-string', reason: 'Insufficient balance', rawData: data });
  });

  it('decodes known panic codes', () => {
    const data = `0x4e487b71${word(0x11n)}` as const;
    expect(decodeRevert(data)).toEqual({
      kind: 'panic',
      reason: 'arithmetic overflow or underflow',
      rawData: data,
    });
  });

  it('keeps unknown panic codes in hex', () => {
    expect(decodeRevert(`0x4e487b71${word(0x99n)}`).reason).toBe('panic with code 0x99');
  });

  it('decodes custom errors declared in the ABI', () => {
    const [insufficient] = abi.errors;
    expect(insufficient).toBeDefined();
    if (!insufficient) return;
    const data = `${insufficient.selector}${word(5n)}${word(10n)}` as const;

    expect(decodeRevert(data, abi.errors)).toEqual({
      kind: 'custom',
      reason: 'InsufficientBalance(5, 10)',
      rawData: data,
    });
    expect(decodeRevert(data).kind).toBe('unknown');
  });

  it('reports empty and undecodable payloads as unknown', () => {
    expect(decodeRevert(null)).toEqual({ kind: 'unknown', reason: null, rawData: null });
    expect(decodeRevert('0x')).toEqual({ kind: 'unknown', reason: null, rawData: null });
    expect(decodeRevert('0x1234')).toEqual({ kind: 'unknown', reason: null, rawData: '0x1234' });
    expect(decodeRevert('0x08c379a000')).toEqual({ kind: 'unknown', reason: null, rawData: '0x08c379a000' });
  });
});

describe('extractRevertData', () => {
  it('reads data directly or nested one level', () => {
    const data = errorStringData('nope');
    expect(extractRevertData(data)).toBe(data);
    expect(extractRevertData({ message: 'reverted', data })).toBe(data);
  });

  it('ignores payloads too short to carry a selector and arguments', () => {
    expect(extractRevertData('0x08c379a0')).toBeUndefined();
    expect(extractRevertData({ data: 42 })).toBeUndefined();
    expect(extractRevertData(undefined)).toBeUndefined();
  });
});

describe('revertFromRpcError', () => {
  it('turns reverting node errors into RevertError', () => {
    const error = new RpcError(3, 'execution reverted', errorStringData('Insufficient balance'));
    const revert = revertFromRpcError(error);
    expect(revert).toBeInstanceOf(RevertError);
    expect(revert?.reason).toBe('Insufficient balance');
    expect(revert?.message).toBe('Execution reverted: Insufficient balance');
  });

  it('leaves other node errors alone', () => {
    expect(revertFromRpcError(new RpcError(-32000, 'nonce too low'))).toBeUndefined();
  });
});
