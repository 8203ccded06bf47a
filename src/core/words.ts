/**
 * 32-byte word helpers for the ABI wire format
 */

import { bytesToBigInt } from './hex.js';
import { NegativeValueForUnsignedError, TruncatedDataError, ValueOutOfRangeError } from './errors.js';

export const WORD_SIZE = 32;

const TWO_256 = 1n << 256n;
const MAX_UINT256 = TWO_256 - 1n;
const MIN_INT256 = -(1n << 255n);
const MAX_INT256 = (1n << 255n) - 1n;

/**
 * Right-pad bytes with zeros to the next multiple of 32.
 * Input already on a word boundary (including empty input) is returned as-is.
 */
export function padTo32(bytes: Uint8Array): Uint8Array {
  const remainder = bytes.length % WORD_SIZE;
  if (remainder === 0) return bytes;

  const padded = new Uint8Array(bytes.length + WORD_SIZE - remainder);
  padded.set(bytes);
  return padded;
}

/**
 * Encode an integer as a 32-byte big-endian word.
 * Signed values use two's complement.
 */
export function intToWord(value: bigint, signed = false): Uint8Array {
  if (signed) {
    if (value < MIN_INT256 || value > MAX_INT256) {
      throw new ValueOutOfRangeError(value, 'int256');
    }
  } else {
    if (value < 0n) {
      throw new NegativeValueForUnsignedError(value, 'uint256');
    }
    if (value > MAX_UINT256) {
      throw new ValueOutOfRangeError(value, 'uint256');
    }
  }

  let v = value < 0n ? TWO_256 + value : value;
  const word = new Uint8Array(WORD_SIZE);
  for (let i = WORD_SIZE - 1; i >= 0 && v > 0n; i--) {
    word[i] = Number(v & 0xffn);
    v >>= 8n;
  }
  return word;
}

/**
 * Decode a 32-byte word as an unsigned integer
 */
export function wordToUint(word: Uint8Array): bigint {
  assertWord(word);
  return bytesToBigInt(word);
}

/**
 * Decode a 32-byte word as a two's complement signed integer
 */
export function wordToInt(word: Uint8Array): bigint {
  const value = wordToUint(word);
  return value > MAX_INT256 ? value - TWO_256 : value;
}

/**
 * Take the low 20 bytes of a word.
 * The 12 leading bytes are ignored, not validated.
 */
export function addressFromWord(word: Uint8Array): Uint8Array {
  assertWord(word);
  return word.slice(WORD_SIZE - 20);
}

/**
 * Read the word starting at `offset`
 */
export function readWord(data: Uint8Array, offset: number, what = 'word'): Uint8Array {
  if (offset < 0 || offset + WORD_SIZE > data.length) {
    throw new TruncatedDataError(what, offset + WORD_SIZE, data.length);
  }
  return data.subarray(offset, offset + WORD_SIZE);
}

function assertWord(word: Uint8Array): void {
  if (word.length !== WORD_SIZE) {
    throw new TruncatedDataError('word', WORD_SIZE, word.length);
  }
}
