/**
 * Cryptographic hash functions
 * Wrapper around @noble/hashes for Ethereum-specific hashing
 */

import { keccak_256 } from '@noble/hashes/sha3';
import type { Hash, Hex } from './types.js';
import { bytesToHex, hexToBytes, isHex, stringToBytes } from './hex.js';

/**
 * Compute keccak256 hash
 * Hex input is hashed as bytes, any other string as UTF-8
 */
export function keccak256(data: Hex | Uint8Array | string): Hash {
  return bytesToHex(keccak256Bytes(data)) as Hash;
}

/**
 * keccak256 returning raw bytes
 */
export function keccak256Bytes(data: Hex | Uint8Array | string): Uint8Array {
  let bytes: Uint8Array;

  if (data instanceof Uint8Array) {
    bytes = data;
  } else if (isHex(data)) {
    bytes = hexToBytes(data);
  } else {
    bytes = stringToBytes(data);
  }

  return keccak_256(bytes);
}

/**
 * Compute the 4-byte selector of a canonical signature
 * e.g., "transfer(address,uint256)" -> 0xa9059cbb
 */
export function selectorBytes(signature: string): Uint8Array {
  return keccak256Bytes(stringToBytes(signature)).slice(0, 4);
}

/**
 * Compute function selector from a canonical signature, as hex
 */
export function functionSelector(signature: string): Hex {
  return bytesToHex(selectorBytes(signature));
}

/**
 * Compute event topic from event signature
 * e.g., "Transfer(address,address,uint256)" -> full keccak256 hash
 */
export function eventTopic(signature: string): Hash {
  return keccak256(stringToBytes(signature));
}
