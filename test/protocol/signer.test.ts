import { describe, it, expect } from 'vitest';
import { inspect } from 'node:util';
import { PrivateKeySigner } from '../../src/protocol/signer.js';
import { InvalidRequestError } from '../../src/core/errors.js';
import { hashMessage } from '../../src/core/hash.js';
import { privateKeyToAddress, recoverAddress } from '../../src/core/signature.js';
import { TEST_PRIVATE_KEY } from '../support/fixtures.js';

describe('PrivateKeySigner', () => {
  it('exposes the derived address', () => {
    const signer = PrivateKeySigner.fromPrivateKey(TEST_PRIVATE_KEY);
    expect(signer.address).toBe(privateKeyToAddress(TEST_PRIVATE_KEY));
  });

  it('rejects invalid keys', () => {
    expect(() => PrivateKeySigner.fromPrivateKey('0x1234')).toThrow(InvalidRequestError);
    expect(() => PrivateKeySigner.fromPrivateKey(`0x${'00'.repeat(32)}`)).toThrow(
      'Invalid private key: expected 32 bytes within the curve order'
    );
  });

  it('signs messages', () => {
    const signer = PrivateKeySigner.fromPrivateKey(TEST_PRIVATE_KEY);
    const signature = signer.signMessage('bind');
    expect(recoverAddress(hashMessage('bind'), signature)).toBe(signer.address);
  });

  it('keeps the key out of serialized output', () => {
    const signer = PrivateKeySigner.fromPrivateKey(TEST_PRIVATE_KEY);
    const body = TEST_PRIVATE_KEY.slice(2);

    expect(JSON.stringify(signer)).toBe(JSON.stringify({ address: signer.address }));
    expect(String(signer)).toBe(`PrivateKeySigner(${signer.address})`);
    expect(inspect(signer)).not.toContain(body);
  });
});
