/**
 * Unsigned transaction variants and their wire encodings
 * Legacy (EIP-155), EIP-1559 (type 2) and EIP-4844 blob (type 3) transactions
 */

import type { AccessList, Address, Hash, Hex, Signature } from '../core/types.js';
import { encode as rlpEncode, decode as rlpDecode, type RLPInput, type RLPItem } from '../core/rlp.js';
import { isHash, keccak256, sha256 } from '../core/hash.js';
import { bytesToBigInt, bytesToHex, concatBytes, hexToBigInt, hexToBytes, padHex } from '../core/hex.js';
import { toChecksumAddress } from '../core/address.js';
import { InvalidRequestError } from '../core/errors.js';

interface TransactionFields {
  readonly nonce: number;
  readonly gasLimit: bigint;
  readonly to?: Address;
  readonly value: bigint;
  readonly data: Hex;
}

export interface LegacyTransaction extends TransactionFields {
  readonly type: 'legacy';
  readonly gasPrice: bigint;
}

export interface Eip1559Transaction extends TransactionFields {
  readonly type: 'eip1559';
  readonly maxPriorityFeePerGas: bigint;
  readonly maxFeePerGas: bigint;
  readonly accessList: AccessList;
}

/**
 * Blob transactions cannot create contracts, so `to` is required
 */
export interface Eip4844Transaction extends Omit<Eip1559Transaction, 'type' | 'to'> {
  readonly type: 'eip4844';
  readonly to: Address;
  readonly maxFeePerBlobGas: bigint;
  readonly blobVersionedHashes: ReadonlyArray<Hash>;
}

export type UnsignedTransaction = LegacyTransaction | Eip1559Transaction | Eip4844Transaction;

/**
 * Blob payloads travelling next to a type-3 transaction
 */
export interface BlobSidecar {
  readonly blobs: ReadonlyArray<Hex>;
  readonly commitments: ReadonlyArray<Hex>;
  readonly proofs: ReadonlyArray<Hex>;
}

export interface SignedTransaction {
  readonly transaction: UnsignedTransaction;
  readonly chainId: number;
  readonly signature: Signature;
  /** Bytes submitted through eth_sendRawTransaction (network form for blob transactions) */
  readonly raw: Hex;
  readonly hash: Hash;
}

export const BLOB_SIZE = 131072;
export const MAX_BLOBS_PER_TRANSACTION = 6;
const KZG_BYTES = 48;
const VERSIONED_HASH_VERSION_KZG = 0x01;

const TYPE_EIP1559 = 0x02;
const TYPE_EIP4844 = 0x03;

// ============ Serialization ============

function accessListFields(accessList: AccessList): RLPInput {
  return accessList.map((item) => [item.address, item.storageKeys]);
}

function typedFields(tx: Eip1559Transaction | Eip4844Transaction, chainId: number): RLPInput[] {
  const fields: RLPInput[] = [
    chainId,
    tx.nonce,
    tx.maxPriorityFeePerGas,
    tx.maxFeePerGas,
    tx.gasLimit,
    tx.to ?? '0x',
    tx.value,
    tx.data,
    accessListFields(tx.accessList),
  ];
  if (tx.type === 'eip4844') {
    fields.push(tx.maxFeePerBlobGas, tx.blobVersionedHashes);
  }
  return fields;
}

function typePrefix(tx: Eip1559Transaction | Eip4844Transaction): number {
  return tx.type === 'eip4844' ? TYPE_EIP4844 : TYPE_EIP1559;
}

function legacyFields(tx: LegacyTransaction): RLPInput[] {
  return [tx.nonce, tx.gasPrice, tx.gasLimit, tx.to ?? '0x', tx.value, tx.data];
}

// r and s are integers, so leading zero bytes must not reach the RLP encoder
function signatureFields(signature: Signature): RLPInput[] {
  return [hexToBigInt(signature.r), hexToBigInt(signature.s)];
}

/**
 * Bytes whose keccak256 is signed
 */
export function serializeForSigning(tx: UnsignedTransaction, chainId: number): Uint8Array {
  if (tx.type === 'legacy') {
    // EIP-155 replay protection
    return rlpEncode([...legacyFields(tx), chainId, 0, 0]);
  }
  return concatBytes(new Uint8Array([typePrefix(tx)]), rlpEncode(typedFields(tx, chainId)));
}

export function signingHash(tx: UnsignedTransaction, chainId: number): Hash {
  return keccak256(serializeForSigning(tx, chainId));
}

/**
 * Canonical signed envelope; its keccak256 is the transaction hash
 */
export function serializeSigned(tx: UnsignedTransaction, chainId: number, signature: Signature): Hex {
  if (tx.type === 'legacy') {
    const v = chainId * 2 + 35 + signature.yParity;
    return bytesToHex(rlpEncode([...legacyFields(tx), v, ...signatureFields(signature)]));
  }
  const fields = [...typedFields(tx, chainId), signature.yParity, ...signatureFields(signature)];
  return bytesToHex(concatBytes(new Uint8Array([typePrefix(tx)]), rlpEncode(fields)));
}

/**
 * Blob transaction network form: 0x03 || rlp([tx_payload_body, blobs, commitments, proofs])
 */
export function serializeNetworkWrapper(
  tx: Eip4844Transaction,
  chainId: number,
  signature: Signature,
  sidecar: BlobSidecar
): Hex {
  validateSidecar(sidecar);
  const body = [...typedFields(tx, chainId), signature.yParity, ...signatureFields(signature)];
  const wrapped = rlpEncode([body, sidecar.blobs, sidecar.commitments, sidecar.proofs]);
  return bytesToHex(concatBytes(new Uint8Array([TYPE_EIP4844]), wrapped));
}

/**
 * Versioned hash of a KZG commitment: 0x01 || sha256(commitment)[1:]
 */
export function computeVersionedHash(commitment: Hex): Hash {
  const digest = sha256(commitment);
  digest[0] = VERSIONED_HASH_VERSION_KZG;
  const hash = bytesToHex(digest);
  if (!isHash(hash)) {
    throw new Error('sha256 produced a digest of unexpected length');
  }
  return hash;
}

export function validateSidecar(sidecar: BlobSidecar): void {
  const count = sidecar.blobs.length;
  if (count === 0 || count > MAX_BLOBS_PER_TRANSACTION) {
    throw new InvalidRequestError(
      `A blob transaction carries 1 to ${MAX_BLOBS_PER_TRANSACTION} blobs, got ${count}`,
      { count }
    );
  }
  if (sidecar.commitments.length !== count || sidecar.proofs.length !== count) {
    throw new InvalidRequestError('Blob sidecar needs one commitment and one proof per blob', {
      blobs: count,
      commitments: sidecar.commitments.length,
      proofs: sidecar.proofs.length,
    });
  }
  sidecar.blobs.forEach((blob, i) => requireSize(blob, BLOB_SIZE, `blob ${i}`));
  sidecar.commitments.forEach((c, i) => requireSize(c, KZG_BYTES, `commitment ${i}`));
  sidecar.proofs.forEach((p, i) => requireSize(p, KZG_BYTES, `proof ${i}`));
}

function requireSize(value: Hex, size: number, label: string): void {
  const actual = (value.length - 2) / 2;
  if (actual !== size) {
    throw new InvalidRequestError(`${label} must be ${size} bytes, got ${actual}`, { label, size, actual });
  }
}

/**
 * Assemble the submitted bytes and hash of a signed transaction
 */
export function finalizeTransaction(
  tx: UnsignedTransaction,
  chainId: number,
  signature: Signature,
  sidecar?: BlobSidecar
): SignedTransaction {
  const canonical = serializeSigned(tx, chainId, signature);
  const raw =
    tx.type === 'eip4844' && sidecar ? serializeNetworkWrapper(tx, chainId, signature, sidecar) : canonical;
  const v = tx.type === 'legacy' ? chainId * 2 + 35 + signature.yParity : signature.yParity;

  return {
    transaction: tx,
    chainId,
    signature: { ...signature, v },
    raw,
    hash: keccak256(canonical),
  };
}

// ============ Parsing ============

export interface ParsedTransaction {
  readonly transaction: UnsignedTransaction;
  /** Undefined for pre-EIP-155 legacy transactions */
  readonly chainId: number | undefined;
  readonly signature: Signature;
  readonly sidecar?: BlobSidecar;
}

function asList(item: RLPItem | undefined, label: string): RLPItem[] {
  if (!Array.isArray(item)) {
    throw new Error(`Invalid transaction: ${label} must be a list`);
  }
  return item;
}

function asBytes(item: RLPItem | undefined, label: string): Uint8Array {
  if (!(item instanceof Uint8Array)) {
    throw new Error(`Invalid transaction: ${label} must be a byte string`);
  }
  return item;
}

function asBigInt(item: RLPItem | undefined, label: string): bigint {
  return bytesToBigInt(asBytes(item, label));
}

function asNumber(item: RLPItem | undefined, label: string): number {
  const value = asBigInt(item, label);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new Error(`Invalid transaction: ${label} exceeds the safe integer range`);
  }
  return Number(value);
}

function asHex(item: RLPItem | undefined, label: string): Hex {
  return bytesToHex(asBytes(item, label));
}

function asHash(item: RLPItem | undefined, label: string): Hash {
  const hex = asHex(item, label);
  if (!isHash(hex)) {
    throw new Error(`Invalid transaction: ${label} must be 32 bytes`);
  }
  return hex;
}

function asOptionalAddress(item: RLPItem | undefined, label: string): Address | undefined {
  const bytes = asBytes(item, label);
  return bytes.length === 0 ? undefined : toChecksumAddress(bytesToHex(bytes));
}

function asParity(value: number): 0 | 1 {
  if (value === 0 || value === 1) return value;
  throw new Error(`Invalid transaction: bad signature parity ${value}`);
}

function parseSignature(items: RLPItem[], offset: number, yParity: 0 | 1, v: number): Signature {
  return {
    r: padHex(asHex(items[offset], 'r'), 32),
    s: padHex(asHex(items[offset + 1], 's'), 32),
    v,
    yParity,
  };
}

function parseAccessList(item: RLPItem | undefined): AccessList {
  return asList(item, 'accessList').map((entry, i) => {
    const [address, keys] = asList(entry, `accessList[${i}]`);
    const resolved = asOptionalAddress(address, `accessList[${i}].address`);
    if (!resolved) {
      throw new Error(`Invalid transaction: accessList[${i}] has no address`);
    }
    return {
      address: resolved,
      storageKeys: asList(keys, `accessList[${i}].storageKeys`).map((key, j) =>
        asHash(key, `accessList[${i}].storageKeys[${j}]`)
      ),
    };
  });
}

/**
 * Decode a raw signed transaction (legacy, type 2, or type 3 in canonical or network form)
 */
export function parseSignedTransaction(raw: Hex): ParsedTransaction {
  const bytes = hexToBytes(raw);
  const first = bytes[0];

  if (first === TYPE_EIP1559) {
    return parseTyped(asList(rlpDecode(bytes.subarray(1)), 'payload'), 'eip1559');
  }
  if (first === TYPE_EIP4844) {
    const items = asList(rlpDecode(bytes.subarray(1)), 'payload');
    if (items.length === 4 && Array.isArray(items[0])) {
      const parsed = parseTyped(asList(items[0], 'payload'), 'eip4844');
      return {
        ...parsed,
        sidecar: {
          blobs: asList(items[1], 'blobs').map((b, i) => asHex(b, `blobs[${i}]`)),
          commitments: asList(items[2], 'commitments').map((c, i) => asHex(c, `commitments[${i}]`)),
          proofs: asList(items[3], 'proofs').map((p, i) => asHex(p, `proofs[${i}]`)),
        },
      };
    }
    return parseTyped(items, 'eip4844');
  }
  if (first !== undefined && first >= 0xc0) {
    return parseLegacy(asList(rlpDecode(bytes), 'payload'));
  }
  throw new Error(`Unsupported transaction type: 0x${(first ?? 0).toString(16).padStart(2, '0')}`);
}

function parseLegacy(items: RLPItem[]): ParsedTransaction {
  if (items.length !== 9) {
    throw new Error(`Invalid legacy transaction: expected 9 fields, got ${items.length}`);
  }

  const v = asNumber(items[6], 'v');
  const chainId = v >= 35 ? Math.floor((v - 35) / 2) : undefined;
  const yParity = asParity(v >= 35 ? (v - 35) % 2 : v - 27);
  const to = asOptionalAddress(items[3], 'to');

  return {
    transaction: {
      type: 'legacy',
      nonce: asNumber(items[0], 'nonce'),
      gasPrice: asBigInt(items[1], 'gasPrice'),
      gasLimit: asBigInt(items[2], 'gasLimit'),
      ...(to !== undefined && { to }),
      value: asBigInt(items[4], 'value'),
      data: asHex(items[5], 'data'),
    },
    chainId,
    signature: parseSignature(items, 7, yParity, v),
  };
}

function parseTyped(items: RLPItem[], type: 'eip1559' | 'eip4844'): ParsedTransaction {
  const expected = type === 'eip1559' ? 12 : 14;
  if (items.length !== expected) {
    throw new Error(`Invalid ${type} transaction: expected ${expected} fields, got ${items.length}`);
  }

  const chainId = asNumber(items[0], 'chainId');
  const to = asOptionalAddress(items[5], 'to');
  const fields = {
    nonce: asNumber(items[1], 'nonce'),
    maxPriorityFeePerGas: asBigInt(items[2], 'maxPriorityFeePerGas'),
    maxFeePerGas: asBigInt(items[3], 'maxFeePerGas'),
    gasLimit: asBigInt(items[4], 'gasLimit'),
    value: asBigInt(items[6], 'value'),
    data: asHex(items[7], 'data'),
    accessList: parseAccessList(items[8]),
  };

  if (type === 'eip1559') {
    const yParity = asParity(asNumber(items[9], 'yParity'));
    return {
      transaction: { type: 'eip1559', ...fields, ...(to !== undefined && { to }) },
      chainId,
      signature: parseSignature(items, 10, yParity, yParity),
    };
  }

  if (to === undefined) {
    throw new Error('Invalid eip4844 transaction: missing recipient');
  }
  const yParity = asParity(asNumber(items[11], 'yParity'));
  return {
    transaction: {
      type: 'eip4844',
      ...fields,
      to,
      maxFeePerBlobGas: asBigInt(items[9], 'maxFeePerBlobGas'),
      blobVersionedHashes: asList(items[10], 'blobVersionedHashes').map((h, i) =>
        asHash(h, `blobVersionedHashes[${i}]`)
      ),
    },
    chainId,
    signature: parseSignature(items, 12, yParity, yParity),
  };
}
