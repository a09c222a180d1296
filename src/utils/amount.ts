import { ethers } from 'ethers';

// Widest value an amount or balance column holds: NUMERIC(78, 0)
export const MAX_AMOUNT = 10n ** 78n - 1n;

/**
 * Parse a decimal string ("1.5") into base units. Returns null when the text
 * is not a plain decimal, carries more fraction digits than the coin has, or
 * exceeds MAX_AMOUNT.
 */
export function parseAmount(text: string, decimals: number): bigint | null {
  const trimmed = text.trim();
  if (!/^(\d+(\.\d+)?|\.\d+)$/.test(trimmed)) {
    return null;
  }

  let value: bigint;
  try {
    value = ethers.utils.parseUnits(trimmed, decimals).toBigInt();
  } catch (error) {
    // fractional component exceeds decimals
    return null;
  }
  return value > MAX_AMOUNT ? null : value;
}

/**
 * Format base units as a decimal string without trailing zeros ("1.5", "2").
 */
export function formatAmount(value: bigint, decimals: number): string {
  const formatted = ethers.utils.formatUnits(ethers.BigNumber.from(value.toString()), decimals);
  return formatted.endsWith('.0') ? formatted.slice(0, -2) : formatted;
}

export function toBigNumber(value: bigint): ethers.BigNumber {
  return ethers.BigNumber.from(value.toString());
}

export function sumAmounts(values: Iterable<bigint>): bigint {
  let total = 0n;
  for (const value of values) {
    total += value;
  }
  return total;
}
