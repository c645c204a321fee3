import { describe, it, expect } from 'vitest';
import { ETH, GWEI, parseUnits, formatUnits, formatGwei } from '../../src/core/units.js';

describe('units', () => {
  it('converts ether and gwei to wei', () => {
    expect(ETH(1)).toBe(1_000_000_000_000_000_000n);
    expect(ETH('0.5')).toBe(500_000_000_000_000_000n);
    expect(GWEI(1)).toBe(1_000_000_000n);
    expect(GWEI('2.5')).toBe(2_500_000_000n);
  });

  it('truncates excess fractional digits', () => {
    expect(parseUnits('1.239', 2)).toBe(123n);
  });

  it('parses negative and integer-only values', () => {
    expect(parseUnits('-1.5', 1)).toBe(-15n);
    expect(parseUnits('42', 0)).toBe(42n);
    expect(parseUnits('.5', 1)).toBe(5n);
  });

  it('rejects malformed numbers', () => {
    expect(() => parseUnits('1.2.3', 18)).toThrow('Invalid number: 1.2.3');
    expect(() => parseUnits('1e18', 18)).toThrow('Invalid number: 1e18');
    expect(() => parseUnits('', 18)).toThrow('Invalid number: ');
    expect(() => parseUnits('1', -1)).toThrow('Invalid decimals: -1');
  });

  it('formats without trailing zeros', () => {
    expect(formatUnits(1_500_000_000_000_000_000n, 18)).toBe('1.5');
    expect(formatUnits(1_000_000_000_000_000_000n, 18)).toBe('1');
    expect(formatUnits(-5n, 1)).toBe('-0.5');
    expect(formatUnits(7n, 0)).toBe('7');
    expect(formatGwei(20_000_000_000n)).toBe('20');
  });
});
