import { describe, expect } from 'vitest';
import { fc, test } from '@fast-check/vitest';
import { decodeParameters, encodeParameters } from '../../src/core/abi-codec.js';
import { parseTypeSchema } from '../../src/core/abi-schema.js';
import { Abi } from '../../src/core/abi.js';
import { toChecksumAddress } from '../../src/core/address.js';
import { bytesToHex } from '../../src/core/hex.js';
import { TOKEN_ABI } from '../support/fixtures.js';

const schemas = (...types: string[]) => types.map((type) => parseTypeSchema(type));

const uint256 = fc.bigInt({ min: 0n, max: (1n << 256n) - 1n });
const int256 = fc.bigInt({ min: -(1n << 255n), max: (1n << 255n) - 1n });
const address = fc.uint8Array({ minLength: 20, maxLength: 20 }).map((bytes) => toChecksumAddress(bytesToHex(bytes)));
const bytes = fc.uint8Array({ maxLength: 100 }).map((b) => bytesToHex(b));

describe('ABI codec properties', () => {
  const abi = Abi.fromJson(TOKEN_ABI);
  const transfer = abi.getFunction('transfer');

  test.prop([address, uint256])('calldata starts with the function selector', (to, amount) => {
    const call = abi.encodeFunction('transfer', to, amount);
    expect(call.data.startsWith(transfer.selector)).toBe(true);
    expect(call.data.length).toBe(2 + 8 + 128);
  });

  test.prop([address, uint256])('encoded calldata decodes to its inputs', (to, amount) => {
    const call = abi.encodeFunction('transfer', to, amount);
    expect(decodeParameters(schemas('address', 'uint256'), call.encodedArgs)).toEqual([to, amount]);
  });

  test.prop([int256, fc.boolean()])('signed integers and booleans round trip', (n, flag) => {
    const types = schemas('int256', 'bool');
    expect(decodeParameters(types, encodeParameters(types, [n, flag]))).toEqual([n, flag]);
  });

  test.prop([fc.string(), bytes])('dynamic values round trip', (text, data) => {
    const types = schemas('string', 'bytes');
    expect(decodeParameters(types, encodeParameters(types, [text, data]))).toEqual([text, data]);
  });

  test.prop([fc.array(uint256, { maxLength: 8 }), fc.array(address, { maxLength: 4 })])(
    'arrays round trip',
    (amounts, holders) => {
      const types = schemas('uint256[]', 'address[]');
      expect(decodeParameters(types, encodeParameters(types, [amounts, holders]))).toEqual([amounts, holders]);
    }
  );

  test.prop([fc.array(fc.tuple(uint256, fc.string()), { minLength: 1, maxLength: 4 })])(
    'nested tuples round trip',
    (entries) => {
      const types = schemas('(uint256,string)[]');
      expect(decodeParameters(types, encodeParameters(types, [entries]))).toEqual([entries]);
    }
  );
});
