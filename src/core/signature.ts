/**
 * ECDSA signature handling
 * Wrapper around @noble/secp256k1 for Ethereum signatures
 */

import * as secp256k1 from '@noble/secp256k1';
import { hmac } from '@noble/hashes/hmac';
import { sha256 } from '@noble/hashes/sha256';
import type { Address, Hash, Hex, Signature } from './types.js';
import { hexToBytes, padHex, numberToHex } from './hex.js';
import { keccak256, hashMessage } from './hash.js';
import { toChecksumAddress } from './address.js';

// Synchronous signing needs an HMAC implementation for RFC 6979 nonces
secp256k1.etc.hmacSha256Sync = (key: Uint8Array, ...messages: Uint8Array[]) => {
  const h = hmac.create(sha256, key);
  for (const msg of messages) {
    h.update(msg);
  }
  return h.digest();
};

function toYParity(recovery: number): 0 | 1 {
  if (recovery === 0 || recovery === 1) {
    return recovery;
  }
  throw new Error(`Unsupported signature recovery id: ${recovery}`);
}

/**
 * Check if a private key is valid
 */
export function isValidPrivateKey(privateKey: Hex): boolean {
  try {
    const bytes = hexToBytes(privateKey);
    return bytes.length === 32 && secp256k1.utils.isValidPrivateKey(bytes);
  } catch {
    return false;
  }
}

/**
 * Derive Ethereum address from an uncompressed public key
 */
export function publicKeyToAddress(publicKey: Uint8Array): Address {
  // Skip the 0x04 prefix of the uncompressed encoding
  const hash = keccak256(publicKey.slice(1));
  return toChecksumAddress(`0x${hash.slice(-40)}`);
}

/**
 * Derive Ethereum address from private key
 */
export function privateKeyToAddress(privateKey: Hex): Address {
  return publicKeyToAddress(secp256k1.getPublicKey(hexToBytes(privateKey), false));
}

/**
 * Sign a 32-byte hash with a private key
 * Returns signature in Ethereum format (v = 27 + yParity)
 */
export function sign(hash: Hash, privateKey: Hex): Signature {
  const hashBytes = hexToBytes(hash);
  if (hashBytes.length !== 32) {
    throw new Error(`Hash must be 32 bytes, got ${hashBytes.length}`);
  }

  const sig = secp256k1.sign(hashBytes, hexToBytes(privateKey));
  const yParity = toYParity(sig.recovery);

  return {
    r: padHex(numberToHex(sig.r), 32),
    s: padHex(numberToHex(sig.s), 32),
    v: yParity + 27,
    yParity,
  };
}

/**
 * Sign a message according to EIP-191 personal sign
 */
export function signMessage(message: string | Uint8Array, privateKey: Hex): Signature {
  return sign(hashMessage(message), privateKey);
}

/**
 * Recover the signing address from a hash and signature
 */
export function recoverAddress(hash: Hash, signature: Signature): Address {
  const compact = new Uint8Array(64);
  compact.set(hexToBytes(padHex(signature.r, 32)), 0);
  compact.set(hexToBytes(padHex(signature.s, 32)), 32);

  const recovered = secp256k1.Signature.fromCompact(compact)
    .addRecoveryBit(signature.yParity)
    .recoverPublicKey(hexToBytes(hash));

  return publicKeyToAddress(recovered.toRawBytes(false));
}
