/**
 * Ethereum unit conversions
 * 1 ETH = 10^18 wei, 1 gwei = 10^9 wei
 */

/**
 * Convert ETH to wei
 */
export function ETH(amount: number | string): bigint {
  return parseUnits(String(amount), 18);
}

/**
 * Convert gwei to wei
 */
export function GWEI(amount: number | string): bigint {
  return parseUnits(String(amount), 9);
}

/**
 * Parse a decimal string with given decimals
 * e.g., parseUnits("1.5", 18) = 1500000000000000000n
 * Excess fractional digits are truncated, not rounded
 */
export function parseUnits(value: string, decimals: number): bigint {
  if (decimals < 0 || !Number.isInteger(decimals)) {
    throw new Error(`Invalid decimals: ${decimals}`);
  }

  const normalized = value.trim();
  const negative = normalized.startsWith('-');
  const parts = (negative ? normalized.slice(1) : normalized).split('.');

  if (parts.length > 2) {
    throw new Error(`Invalid number: ${value}`);
  }

  const intPart = parts[0] ?? '';
  const fracPart = parts[1] ?? '';
  if (!/^\d*$/.test(intPart) || !/^\d*$/.test(fracPart) || intPart + fracPart === '') {
    throw new Error(`Invalid number: ${value}`);
  }

  const result = BigInt(intPart + fracPart.slice(0, decimals).padEnd(decimals, '0'));
  return negative ? -result : result;
}

/**
 * Format wei to a decimal string with given decimals
 * e.g., formatUnits(1500000000000000000n, 18) = "1.5"
 */
export function formatUnits(value: bigint, decimals: number): string {
  if (decimals < 0 || !Number.isInteger(decimals)) {
    throw new Error(`Invalid decimals: ${decimals}`);
  }
  if (decimals === 0) return value.toString();

  const negative = value < 0n;
  const str = (negative ? -value : value).toString().padStart(decimals + 1, '0');
  const intPart = str.slice(0, -decimals);
  const fracPart = str.slice(-decimals).replace(/0+$/, '');

  const result = fracPart ? `${intPart}.${fracPart}` : intPart;
  return negative ? `-${result}` : result;
}

/**
 * Format wei as gwei
 */
export function formatGwei(wei: bigint): string {
  return formatUnits(wei, 9);
}
