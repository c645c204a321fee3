import { describe, it, expect } from 'vitest';
import { Abi } from '../../src/core/abi.js';
import type { Log } from '../../src/core/types.js';
import { AbiDecodingError, AbiEncodingError, AbiParseError } from '../../src/core/errors.js';
import { settle } from '../../src/core/result.js';
import {
  HOLDER,
  RECIPIENT,
  TOKEN_ABI,
  TOKEN_ADDRESS,
  addressWord,
  asHash,
  word,
} from '../support/fixtures.js';

const TRANSFER_TOPIC = '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef';

describe('Abi', () => {
  const abi = Abi.fromJson(TOKEN_ABI);

  describe('fromJson', () => {
    it('indexes functions, events and errors', () => {
      expect(abi.functions.map((f) => f.name)).toEqual([
        'balanceOf',
        'name',
        'decimals',
        'owner',
        'reserves',
        'transfer',
        'deposit',
        'burn',
      ]);
      expect(abi.events.map((e) => e.name)).toEqual(['Transfer']);
      expect(abi.errors.map((e) => e.signature)).toEqual(['InsufficientBalance(uint256,uint256)']);
    });

    it('computes selectors and topics from canonical signatures', () => {
      const transfer = abi.getFunction('transfer');
      expect(transfer.signature).toBe('transfer(address,uint256)');
      expect(transfer.selector).toBe('0xa9059cbb');
      expect(abi.getFunction('balanceOf').selector).toBe('0x70a08231');
      expect(abi.getEvent('Transfer').topic).toBe(TRANSFER_TOPIC);
    });

    it('accepts JSON text', () => {
      const parsed = Abi.fromJson(JSON.stringify(TOKEN_ABI));
      expect(parsed.functions).toHaveLength(8);
    });

    it('rejects malformed JSON', () => {
      expect(() => Abi.fromJson('[{"type": "function",')).toThrow(AbiParseError);
    });

    it('rejects a document that is not an array', () => {
      expect(() => Abi.fromJson('{"type": "function"}')).toThrow('ABI must be a JSON array of entries');
    });

    it('rejects unknown entry types', () => {
      expect(() => Abi.fromJson([{ type: 'method', name: 'foo' }])).toThrow(
        "ABI entry 0: unknown entry type 'method'"
      );
    });

    it('rejects unknown stateMutability values', () => {
      expect(() =>
        Abi.fromJson([{ type: 'function', name: 'foo', stateMutability: 'readonly', inputs: [] }])
      ).toThrow("ABI entry 0: unknown stateMutability 'readonly'");
    });

    it('rejects unsupported parameter types', () => {
      expect(() =>
        Abi.fromJson([{ type: 'function', name: 'foo', inputs: [{ name: 'x', type: 'uint7' }] }])
      ).toThrow(AbiParseError);
    });

    it('maps legacy constant and payable flags', () => {
      const legacy = Abi.fromJson([
        { name: 'total', constant: true, inputs: [], outputs: [{ type: 'uint256' }] },
        { type: 'function', name: 'pay', payable: true, inputs: [] },
        { type: 'function', name: 'poke', inputs: [] },
      ]);
      expect(legacy.getFunction('total').stateMutability).toBe('view');
      expect(legacy.getFunction('pay').stateMutability).toBe('payable');
      expect(legacy.getFunction('poke').stateMutability).toBe('nonpayable');
    });

    it('parses constructor, fallback and receive entries', () => {
      const parsed = Abi.fromJson([
        { type: 'constructor', inputs: [{ name: 'supply', type: 'uint256' }], stateMutability: 'nonpayable' },
        { type: 'fallback', stateMutability: 'nonpayable' },
        { type: 'receive', stateMutability: 'payable' },
      ]);
      expect(parsed.constructorEntry?.inputs).toHaveLength(1);
      expect(parsed.entries.map((e) => e.kind)).toEqual(['constructor', 'fallback', 'receive']);
    });
  });

  describe('functionSelector', () => {
    it('ignores parameter names and expands uint', () => {
      expect(Abi.functionSelector('transfer(address to, uint amount)')).toBe('0xa9059cbb');
    });

    it('canonicalizes inline tuples', () => {
      expect(Abi.functionSelector('submit((uint a, address b)[] items)')).toBe(
        Abi.functionSelector('submit((uint256,address)[])')
      );
    });
  });

  describe('encodeFunction', () => {
    it('prefixes calldata with the selector', () => {
      const call = abi.encodeFunction('transfer', RECIPIENT, 100n);
      expect(call.selector).toBe('0xa9059cbb');
      expect(call.encodedArgs).toBe(`0x${addressWord(RECIPIENT)}${word(100n)}`);
      expect(call.data).toBe(`0xa9059cbb${addressWord(RECIPIENT)}${word(100n)}`);
    });

    it('rejects a negative uint256', () => {
      expect(() => abi.encodeFunction('transfer', RECIPIENT, -1n)).toThrow(
        'Negative value -1 for uint256 (uint256 at args[1])'
      );
    });

    it('rejects a wrong argument count', () => {
      expect(() => abi.encodeFunction('transfer', RECIPIENT)).toThrow(
        'Argument count mismatch for transfer(address,uint256): expected 2, got 1'
      );
    });

    it('rejects unknown functions', () => {
      expect(() => abi.encodeFunction('mint', 1n)).toThrow(AbiEncodingError);
    });

    it('resolves overloads by argument count', () => {
      const overloaded = Abi.fromJson([
        { type: 'function', name: 'pay', inputs: [{ name: 'amount', type: 'uint256' }] },
        {
          type: 'function',
          name: 'pay',
          inputs: [
            { name: 'to', type: 'address' },
            { name: 'amount', type: 'uint256' },
          ],
        },
      ]);

      expect(overloaded.encodeFunction('pay', 5n).function.signature).toBe('pay(uint256)');
      expect(overloaded.encodeFunction('pay', HOLDER, 5n).function.signature).toBe('pay(address,uint256)');
      expect(() => overloaded.getFunction('pay')).toThrow(
        "Function 'pay' is ambiguous: pay(uint256), pay(address,uint256)"
      );
      expect(overloaded.getFunction('pay(address to, uint256 amount)').inputs).toHaveLength(2);
    });

    it('accepts tuples by component name', () => {
      const withTuple = Abi.fromJson([
        {
          type: 'function',
          name: 'place',
          inputs: [
            {
              name: 'order',
              type: 'tuple',
              components: [
                { name: 'amount', type: 'uint256' },
                { name: 'maker', type: 'address' },
              ],
            },
          ],
        },
      ]);

      const byName = withTuple.encodeFunction('place', { amount: 3n, maker: HOLDER });
      const byPosition = withTuple.encodeFunction('place', [3n, HOLDER]);
      expect(byName.data).toBe(byPosition.data);
      expect(byName.function.signature).toBe('place((uint256,address))');
    });
  });

  describe('encodeConstructor', () => {
    it('encodes constructor arguments', () => {
      const withConstructor = Abi.fromJson([
        { type: 'constructor', inputs: [{ name: 'supply', type: 'uint256' }] },
      ]);
      expect(withConstructor.encodeConstructor(1000n)).toBe(`0x${word(1000n)}`);
    });

    it('is empty for an ABI without a constructor', () => {
      expect(abi.encodeConstructor()).toBe('0x');
    });
  });

  describe('decode', () => {
    it('decodes a single value', () => {
      expect(abi.decode(`0x${word(100n)}`, 'uint256')).toBe(100n);
    });

    it('fails on empty data', () => {
      expect(() => abi.decode('0x', 'uint256')).toThrow('Cannot decode empty data (0x)');
    });

    it('fails on truncated data', () => {
      expect(() => abi.decode('0x01', 'uint256')).toThrow(AbiDecodingError);
    });

    it('fails with a decoding error on malformed hex', async () => {
      expect(() => abi.decode('0xzz', 'uint256')).toThrow(AbiDecodingError);
      expect(() => abi.decode(`0x${word(1n)}0`, 'uint256')).toThrow('Malformed hex payload');
      expect(() => abi.decodeFunctionResult('balanceOf', '0xnothex')).toThrow(AbiDecodingError);

      const outcome = await settle(Promise.resolve().then(() => abi.decode('0xzz', 'uint256')));
      expect(outcome.ok).toBe(false);
      expect(outcome.error?.kind).toBe('decoding');
    });

    it('decodes function results', () => {
      const data = `0x${word(7n)}${word(9n)}` as const;
      expect(abi.decodeFunctionResult('reserves', data)).toEqual([7n, 9n]);
    });
  });

  describe('getErrorBySelector', () => {
    it('finds custom errors case-insensitively', () => {
      const error = abi.errors[0];
      expect(error).toBeDefined();
      if (!error) return;
      expect(abi.getErrorBySelector(error.selector)).toBe(error);
      expect(abi.getErrorBySelector('0xdeadbeef')).toBeUndefined();
    });
  });

  describe('decodeEvents', () => {
    const transferLog: Log = {
      address: TOKEN_ADDRESS,
      topics: [
        asHash(TRANSFER_TOPIC),
        asHash(`0x${addressWord(HOLDER)}`),
        asHash(`0x${addressWord(RECIPIENT)}`),
      ],
      data: `0x${word(100n)}`,
    };

    it('decodes values in declaration order', () => {
      const [event] = abi.decodeEvents('Transfer', [transferLog]);
      expect(event?.args).toEqual([HOLDER, RECIPIENT, 100n]);
      expect(event?.named).toEqual({ from: HOLDER, to: RECIPIENT, value: 100n });
      expect(event?.log).toBe(transferLog);
    });

    it('applies a record shape', () => {
      const values = abi.decodeEvents('Transfer', [transferLog], (e) => e.named['value']);
      expect(values).toEqual([100n]);
    });

    it('skips logs of other events', () => {
      const other: Log = { ...transferLog, topics: [asHash(`0x${word(1n)}`)] };
      expect(abi.decodeEvents('Transfer', [other])).toEqual([]);
    });

    it('skips logs with a different indexed layout', () => {
      const nft: Log = {
        ...transferLog,
        topics: [...transferLog.topics, asHash(`0x${word(5n)}`)],
        data: '0x',
      };
      expect(abi.decodeEvents('Transfer', [nft])).toEqual([]);
    });

    it('omits indexed dynamic values', () => {
      const labelled = Abi.fromJson([
        {
          type: 'event',
          name: 'Labelled',
          inputs: [
            { name: 'label', type: 'string', indexed: true },
            { name: 'who', type: 'address', indexed: true },
            { name: 'amount', type: 'uint256', indexed: false },
          ],
        },
      ]);
      const log: Log = {
        address: TOKEN_ADDRESS,
        topics: [
          labelled.getEvent('Labelled').topic,
          asHash(`0x${word(12345n)}`),
          asHash(`0x${addressWord(HOLDER)}`),
        ],
        data: `0x${word(8n)}`,
      };

      const [event] = labelled.decodeEvents('Labelled', [log]);
      expect(event?.args).toEqual([HOLDER, 8n]);
      expect(event?.named).toEqual({ who: HOLDER, amount: 8n });
    });

    it('reads anonymous event indexes from topic 0', () => {
      const anonymous = Abi.fromJson([
        {
          type: 'event',
          name: 'Ping',
          anonymous: true,
          inputs: [{ name: 'id', type: 'uint256', indexed: true }],
        },
      ]);
      const log: Log = { address: TOKEN_ADDRESS, topics: [asHash(`0x${word(42n)}`)], data: '0x' };
      expect(anonymous.decodeEvents('Ping', [log]).map((e) => e.args)).toEqual([[42n]]);
    });
  });
});
