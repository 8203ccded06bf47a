/**
 * RLP (Recursive Length Prefix) encoding
 * Used to serialize transactions for hashing
 *
 * Reference: https://ethereum.org/en/developers/docs/data-structures-and-encoding/rlp/
 */

import { concatBytes, hexToBytes, isHex, stringToBytes } from './hex.js';
import { ValueOutOfRangeError } from './errors.js';

export type RLPInput = Uint8Array | string | bigint | number | null | readonly RLPInput[];

/**
 * Encode data as RLP.
 * Integers use minimal big-endian bytes (zero is the empty string);
 * hex strings are raw bytes, other strings UTF-8.
 */
export function encode(input: RLPInput): Uint8Array {
  if (input === null) {
    return new Uint8Array([0x80]);
  }

  if (input instanceof Uint8Array) {
    return encodeBytes(input);
  }

  if (typeof input === 'string') {
    return encodeBytes(isHex(input) ? hexToBytes(input) : stringToBytes(input));
  }

  if (typeof input === 'number' || typeof input === 'bigint') {
    return encodeBytes(integerToBytes(BigInt(input)));
  }

  const items = input.map(encode);
  return concatBytes(lengthPrefix(totalLength(items), 0xc0), ...items);
}

function encodeBytes(bytes: Uint8Array): Uint8Array {
  // A single byte below 0x80 is its own encoding
  const first = bytes[0];
  if (bytes.length === 1 && first !== undefined && first < 0x80) {
    return bytes;
  }
  return concatBytes(lengthPrefix(bytes.length, 0x80), bytes);
}

function lengthPrefix(length: number, offset: 0x80 | 0xc0): Uint8Array {
  if (length < 56) {
    return new Uint8Array([offset + length]);
  }
  const lengthBytes = integerToBytes(BigInt(length));
  return concatBytes(new Uint8Array([offset + 55 + lengthBytes.length]), lengthBytes);
}

function integerToBytes(value: bigint): Uint8Array {
  if (value < 0n) {
    throw new ValueOutOfRangeError(value, 'RLP integer');
  }
  const bytes: number[] = [];
  for (let v = value; v > 0n; v >>= 8n) {
    bytes.unshift(Number(v & 0xffn));
  }
  return new Uint8Array(bytes);
}

function totalLength(items: readonly Uint8Array[]): number {
  return items.reduce((sum, item) => sum + item.length, 0);
}
