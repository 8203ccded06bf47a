/**
 * Ethereum address utilities
 * Validation, checksum encoding (EIP-55)
 */

import type { Address } from './types.js';
import { keccak256 } from './hash.js';
import { bytesToHex, hexToBytes } from './hex.js';
import { InvalidAddressError } from './errors.js';

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{40}$/;

/**
 * Check if a value is a valid address: 0x followed by 40 hex characters
 */
export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && ADDRESS_PATTERN.test(value);
}

/**
 * Assert that a value is a valid address
 */
export function assertAddress(value: unknown): asserts value is Address {
  if (!isAddress(value)) {
    throw new InvalidAddressError(value);
  }
}

/**
 * Validate and return an address typed as such
 */
export function parseAddress(value: string): Address {
  assertAddress(value);
  return value;
}

/**
 * Raw 20 bytes of an address
 */
export function addressToBytes(address: string): Uint8Array {
  assertAddress(address);
  return hexToBytes(address);
}

/**
 * Render 20 raw bytes as a lowercase address
 */
export function bytesToAddress(bytes: Uint8Array): Address {
  if (bytes.length !== 20) {
    throw new InvalidAddressError(bytes, `expected 20 bytes, got ${bytes.length}`);
  }
  return bytesToHex(bytes) as Address;
}

/**
 * Convert an address to checksum format (EIP-55)
 */
export function toChecksumAddress(address: string): Address {
  assertAddress(address);

  const addr = address.slice(2).toLowerCase();
  // Hash of the lowercase hex characters, not of the bytes
  const hash = keccak256(addr).slice(2);

  let checksumAddress = '0x';
  for (let i = 0; i < addr.length; i++) {
    const char = addr.charAt(i);
    checksumAddress += parseInt(hash.charAt(i), 16) >= 8 ? char.toUpperCase() : char;
  }

  return checksumAddress as Address;
}

/**
 * Verify that an address has a valid checksum.
 * All-lowercase and all-uppercase addresses carry no checksum and pass.
 */
export function isChecksumValid(address: string): boolean {
  if (!isAddress(address)) return false;

  const addrPart = address.slice(2);
  if (addrPart === addrPart.toLowerCase() || addrPart === addrPart.toUpperCase()) {
    return true;
  }
  return address === toChecksumAddress(address);
}

/**
 * Compare two addresses (case-insensitive)
 */
export function addressEquals(a: string, b: string): boolean {
  if (!isAddress(a) || !isAddress(b)) return false;
  return a.toLowerCase() === b.toLowerCase();
}

/**
 * The zero address constant
 */
export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000' as Address;

/**
 * Check if an address is the zero address
 */
export function isZeroAddress(address: string): boolean {
  return addressEquals(address, ZERO_ADDRESS);
}
