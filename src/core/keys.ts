/**
 * Private key handling
 * Wrapper around @noble/secp256k1 for key validation and address derivation
 */

import * as secp256k1 from '@noble/secp256k1';
import type { Address, Hex } from './types.js';
import { bytesToHex, hexToBytes, isHex } from './hex.js';
import { keccak256 } from './hash.js';
import { InvalidPrivateKeyError } from './errors.js';

const KEY_PATTERN = /^(0x)?[0-9a-fA-F]{64}$/;

/**
 * Check a private key: 32 bytes of hex (0x optional) inside the curve order
 */
export function isValidPrivateKey(privateKey: string): boolean {
  if (!KEY_PATTERN.test(privateKey)) return false;
  return secp256k1.utils.isValidPrivateKey(toKeyBytes(privateKey));
}

/**
 * Generate a random private key from a CSPRNG
 */
export function generatePrivateKey(): Hex {
  return bytesToHex(secp256k1.utils.randomPrivateKey());
}

/**
 * Derive the uncompressed public key (0x04 prefix) from a private key
 */
export function privateKeyToPublicKey(privateKey: string): Hex {
  if (!isValidPrivateKey(privateKey)) {
    throw new InvalidPrivateKeyError('expected 32 bytes inside the secp256k1 curve order');
  }
  return bytesToHex(secp256k1.getPublicKey(toKeyBytes(privateKey), false));
}

/**
 * Derive Ethereum address from an uncompressed public key
 */
export function publicKeyToAddress(publicKey: Hex): Address {
  const pubKeyBytes = hexToBytes(publicKey);
  if (pubKeyBytes.length !== 65 || pubKeyBytes[0] !== 0x04) {
    throw new InvalidPrivateKeyError('public key must be 65 uncompressed bytes');
  }

  // Hash of the 64-byte X||Y, last 20 bytes
  const hash = keccak256(pubKeyBytes.subarray(1));
  return `0x${hash.slice(-40)}` as Address;
}

/**
 * Derive Ethereum address from private key
 */
export function privateKeyToAddress(privateKey: string): Address {
  return publicKeyToAddress(privateKeyToPublicKey(privateKey));
}

function toKeyBytes(privateKey: string): Uint8Array {
  const hex = isHex(privateKey) ? privateKey : `0x${privateKey}` as const;
  return hexToBytes(hex);
}
