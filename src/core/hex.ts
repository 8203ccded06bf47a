/**
 * Hex string and byte array utilities
 */

import type { BytesLike, Hex } from './types.js';
import { InvalidHexError } from './errors.js';

// Lookup tables for fast hex encoding/decoding
const hexChars = '0123456789abcdef';
const hexToByteMap = new Map<string, number>();
for (let i = 0; i < 256; i++) {
  const hex = i.toString(16).padStart(2, '0');
  hexToByteMap.set(hex, i);
}

const utf8Encoder = new TextEncoder();
const utf8Decoder = new TextDecoder();

/**
 * Check if a value is a 0x-prefixed hex string (any length, including "0x")
 */
export function isHex(value: unknown): value is Hex {
  if (typeof value !== 'string') return false;
  if (!value.startsWith('0x')) return false;
  return /^[0-9a-fA-F]*$/.test(value.slice(2));
}

/**
 * Assert that a value is a valid hex string
 */
export function assertHex(value: unknown): asserts value is Hex {
  if (!isHex(value)) {
    throw new InvalidHexError(value, 'must be a hex string starting with 0x');
  }
}

/**
 * Convert bytes to a lowercase hex string
 */
export function bytesToHex(bytes: Uint8Array): Hex {
  let hex = '0x';
  for (const byte of bytes) {
    hex += hexChars[byte >> 4];
    hex += hexChars[byte & 0x0f];
  }
  return hex as Hex;
}

/**
 * Convert a hex string to bytes.
 * Accepts upper and lower case digits; odd-length input is rejected.
 */
export function hexToBytes(hex: Hex): Uint8Array {
  assertHex(hex);
  const hexStr = hex.slice(2).toLowerCase();
  if (hexStr.length % 2 !== 0) {
    throw new InvalidHexError(hex, 'odd number of hex characters');
  }

  const bytes = new Uint8Array(hexStr.length / 2);
  for (let i = 0; i < hexStr.length; i += 2) {
    const byte = hexToByteMap.get(hexStr.slice(i, i + 2));
    if (byte === undefined) {
      throw new InvalidHexError(hex, `invalid character at position ${i + 2}`);
    }
    bytes[i / 2] = byte;
  }
  return bytes;
}

/**
 * Normalize raw bytes or hex into a byte array
 */
export function toBytes(value: BytesLike): Uint8Array {
  return value instanceof Uint8Array ? value : hexToBytes(value);
}

/**
 * Concatenate byte arrays
 */
export function concatBytes(...parts: readonly Uint8Array[]): Uint8Array {
  let length = 0;
  for (const part of parts) length += part.length;

  const result = new Uint8Array(length);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
  }
  return result;
}

/**
 * Compare two byte arrays
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Convert a non-negative number or bigint to hex (no padding)
 */
export function numberToHex(value: number | bigint): Hex {
  if (typeof value === 'number' && (!Number.isSafeInteger(value) || value < 0)) {
    throw new InvalidHexError(value, 'must be a non-negative safe integer');
  }
  if (typeof value === 'bigint' && value < 0n) {
    throw new InvalidHexError(value, 'must be non-negative');
  }
  return `0x${value.toString(16)}` as Hex;
}

/**
 * Convert hex string to bigint
 */
export function hexToBigInt(hex: Hex): bigint {
  assertHex(hex);
  if (hex === '0x') return 0n;
  return BigInt(hex);
}

/**
 * Convert bytes to bigint (big-endian, unsigned)
 */
export function bytesToBigInt(bytes: Uint8Array): bigint {
  let result = 0n;
  for (const byte of bytes) {
    result = (result << 8n) | BigInt(byte);
  }
  return result;
}

/**
 * Encode a string as UTF-8 bytes
 */
export function stringToBytes(str: string): Uint8Array {
  return utf8Encoder.encode(str);
}

/**
 * Decode UTF-8 bytes into a string
 */
export function bytesToString(bytes: Uint8Array): string {
  return utf8Decoder.decode(bytes);
}

/**
 * Convert string to hex (UTF-8 encoding)
 */
export function stringToHex(str: string): Hex {
  return bytesToHex(stringToBytes(str));
}

/**
 * Convert hex to string (UTF-8 decoding)
 */
export function hexToString(hex: Hex): string {
  return bytesToString(hexToBytes(hex));
}

/**
 * Check if two hex strings are equal (case-insensitive)
 */
export function hexEquals(a: Hex, b: Hex): boolean {
  assertHex(a);
  assertHex(b);
  return a.toLowerCase() === b.toLowerCase();
}
