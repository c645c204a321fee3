/**
 * Signer collaborator
 * The engine only needs an address and the ability to sign; key custody is up to the implementation
 */

import type { Address, Hex, Signature } from '../core/types.js';
import { isValidPrivateKey, privateKeyToAddress, sign, signMessage } from '../core/signature.js';
import { InvalidRequestError } from '../core/errors.js';
import { type UnsignedTransaction, signingHash } from './transaction.js';

export interface Signer {
  readonly address: Address;
  signTransaction(transaction: UnsignedTransaction, chainId: number): Signature | Promise<Signature>;
  signMessage(message: string | Uint8Array): Signature | Promise<Signature>;
}

/**
 * In-memory secp256k1 signer
 */
export class PrivateKeySigner implements Signer {
  readonly address: Address;
  readonly #privateKey: Hex;

  private constructor(privateKey: Hex) {
    this.#privateKey = privateKey;
    this.address = privateKeyToAddress(privateKey);
  }

  static fromPrivateKey(privateKey: Hex): PrivateKeySigner {
    if (!isValidPrivateKey(privateKey)) {
      throw new InvalidRequestError('Invalid private key: expected 32 bytes within the curve order');
    }
    return new PrivateKeySigner(privateKey);
  }

  signTransaction(transaction: UnsignedTransaction, chainId: number): Signature {
    return sign(signingHash(transaction, chainId), this.#privateKey);
  }

  signMessage(message: string | Uint8Array): Signature {
    return signMessage(message, this.#privateKey);
  }

  // Keep key material out of JSON.stringify and util.inspect output
  toJSON(): { address: Address } {
    return { address: this.address };
  }

  toString(): string {
    return `PrivateKeySigner(${this.address})`;
  }
}
