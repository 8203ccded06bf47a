/**
 * Ethereum unit conversions
 * ETH, GWEI, WEI and token unit handling with exact bigint math
 */

import { InvalidAmountError } from './errors.js';

// 1 ETH = 10^18 Wei, 1 GWEI = 10^9 Wei
export const ETHER_DECIMALS = 18;
export const GWEI_DECIMALS = 9;

const DECIMAL_PATTERN = /^-?(\d+\.?\d*|\.\d+)$/;

/**
 * Parse a decimal string with given decimals
 * e.g., parseUnits("1.5", 18) = 1500000000000000000n
 * Fraction digits beyond `decimals` are truncated.
 */
export function parseUnits(value: string, decimals: number): bigint {
  assertDecimals(decimals);

  const normalized = value.trim();
  if (!DECIMAL_PATTERN.test(normalized)) {
    throw new InvalidAmountError(value, 'not a decimal number');
  }

  const negative = normalized.startsWith('-');
  const abs = negative ? normalized.slice(1) : normalized;
  const [intPart = '', fracPart = ''] = abs.split('.');

  const fraction = fracPart.slice(0, decimals).padEnd(decimals, '0');
  const result = BigInt((intPart || '0') + fraction);

  return negative ? -result : result;
}

/**
 * Format an integer amount as a decimal string, trailing zeros removed
 * e.g., formatUnits(1500000000000000000n, 18) = "1.5"
 */
export function formatUnits(value: bigint, decimals: number): string {
  assertDecimals(decimals);

  const negative = value < 0n;
  const abs = negative ? -value : value;

  const str = abs.toString().padStart(decimals + 1, '0');
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals).replace(/0+$/, '');

  const result = fracPart ? `${intPart}.${fracPart}` : intPart;
  return negative ? `-${result}` : result;
}

/**
 * Format with exactly `places` fraction digits, rounding half away from zero
 * e.g., formatUnitsFixed(1234560000000000000n, 18, 4) = "1.2346"
 */
export function formatUnitsFixed(value: bigint, decimals: number, places: number): string {
  assertDecimals(decimals);
  assertDecimals(places);

  const negative = value < 0n;
  let abs = negative ? -value : value;

  if (places < decimals) {
    const divisor = 10n ** BigInt(decimals - places);
    abs = (abs + divisor / 2n) / divisor;
  } else {
    abs *= 10n ** BigInt(places - decimals);
  }

  const str = abs.toString().padStart(places + 1, '0');
  const intPart = str.slice(0, str.length - places);
  const fracPart = str.slice(str.length - places);

  const result = places > 0 ? `${intPart}.${fracPart}` : intPart;
  return negative && abs !== 0n ? `-${result}` : result;
}

export function parseEther(value: string): bigint {
  return parseUnits(value, ETHER_DECIMALS);
}

export function formatEther(wei: bigint): string {
  return formatUnits(wei, ETHER_DECIMALS);
}

export function parseGwei(value: string): bigint {
  return parseUnits(value, GWEI_DECIMALS);
}

export function formatGwei(wei: bigint): string {
  return formatUnits(wei, GWEI_DECIMALS);
}

/**
 * Convert ETH to Wei
 */
export function ETH(amount: number | string): bigint {
  return parseEther(String(amount));
}

/**
 * Convert GWEI to Wei
 */
export function GWEI(amount: number | string): bigint {
  return parseGwei(String(amount));
}

/**
 * Create Wei value directly; only whole numbers are accepted
 */
export function WEI(amount: number | bigint | string): bigint {
  if (typeof amount === 'bigint') return amount;
  if (typeof amount === 'number') {
    if (!Number.isSafeInteger(amount)) {
      throw new InvalidAmountError(String(amount), 'wei must be a whole number');
    }
    return BigInt(amount);
  }
  if (!/^-?\d+$/.test(amount.trim())) {
    throw new InvalidAmountError(amount, 'wei must be a whole number');
  }
  return BigInt(amount.trim());
}

/**
 * Convert between decimal precisions (truncates when reducing)
 */
export function convertDecimals(value: bigint, fromDecimals: number, toDecimals: number): bigint {
  assertDecimals(fromDecimals);
  assertDecimals(toDecimals);
  if (fromDecimals === toDecimals) return value;

  if (fromDecimals < toDecimals) {
    return value * 10n ** BigInt(toDecimals - fromDecimals);
  }
  return value / 10n ** BigInt(fromDecimals - toDecimals);
}

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0) {
    throw new InvalidAmountError(String(decimals), 'decimals must be a non-negative integer');
  }
}
