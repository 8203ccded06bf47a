import { describe, it, expect } from 'vitest';
import {
  isHex,
  assertHex,
  bytesToHex,
  hexToBytes,
  toBytes,
  concatBytes,
  bytesEqual,
  numberToHex,
  hexToBigInt,
  bytesToBigInt,
  stringToHex,
  hexToString,
  hexEquals,
} from '../../src/core/hex.js';
import { InvalidHexError } from '../../src/core/errors.js';

describe('hex utilities', () => {
  describe('isHex', () => {
    it('accepts 0x-prefixed hex of any length', () => {
      expect(isHex('0x')).toBe(true);
      expect(isHex('0x0')).toBe(true);
      expect(isHex('0xABCdef')).toBe(true);
    });

    it('rejects everything else', () => {
      expect(isHex('')).toBe(false);
      expect(isHex('abcd')).toBe(false);
      expect(isHex('0xg1')).toBe(false);
      expect(isHex(123)).toBe(false);
      expect(isHex(null)).toBe(false);
    });
  });

  describe('assertHex', () => {
    it('throws InvalidHexError', () => {
      expect(() => assertHex('nope')).toThrow(InvalidHexError);
    });
  });

  describe('bytesToHex / hexToBytes', () => {
    it('converts both ways', () => {
      expect(bytesToHex(new Uint8Array([]))).toBe('0x');
      expect(bytesToHex(new Uint8Array([0, 1, 255]))).toBe('0x0001ff');
      expect(hexToBytes('0x0001FF')).toEqual(new Uint8Array([0, 1, 255]));
      expect(hexToBytes('0x')).toEqual(new Uint8Array([]));
    });

    it('rejects odd-length hex', () => {
      expect(() => hexToBytes('0xabc')).toThrow(InvalidHexError);
    });
  });

  describe('toBytes', () => {
    it('passes byte arrays through', () => {
      const bytes = new Uint8Array([1, 2]);
      expect(toBytes(bytes)).toBe(bytes);
      expect(toBytes('0x0102')).toEqual(bytes);
    });
  });

  describe('concatBytes / bytesEqual', () => {
    it('concatenates in order', () => {
      expect(concatBytes(new Uint8Array([1]), new Uint8Array(), new Uint8Array([2, 3]))).toEqual(
        new Uint8Array([1, 2, 3])
      );
    });

    it('compares contents', () => {
      expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 2]))).toBe(true);
      expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1]))).toBe(false);
      expect(bytesEqual(new Uint8Array([1, 2]), new Uint8Array([1, 3]))).toBe(false);
    });
  });

  describe('numbers', () => {
    it('converts numbers to hex', () => {
      expect(numberToHex(0)).toBe('0x0');
      expect(numberToHex(255)).toBe('0xff');
      expect(numberToHex(2n ** 64n)).toBe('0x10000000000000000');
    });

    it('rejects negative and unsafe numbers', () => {
      expect(() => numberToHex(-1)).toThrow(InvalidHexError);
      expect(() => numberToHex(-1n)).toThrow(InvalidHexError);
      expect(() => numberToHex(1.5)).toThrow(InvalidHexError);
    });

    it('reads hex and bytes as bigint', () => {
      expect(hexToBigInt('0x')).toBe(0n);
      expect(hexToBigInt('0xff')).toBe(255n);
      expect(bytesToBigInt(new Uint8Array([1, 0]))).toBe(256n);
    });
  });

  describe('strings', () => {
    it('encodes UTF-8', () => {
      expect(stringToHex('hello')).toBe('0x68656c6c6f');
      expect(hexToString('0x68656c6c6f')).toBe('hello');
      expect(stringToHex('é')).toBe('0xc3a9');
    });
  });

  describe('hexEquals', () => {
    it('ignores case', () => {
      expect(hexEquals('0xABCD', '0xabcd')).toBe(true);
      expect(hexEquals('0xabcd', '0xabce')).toBe(false);
    });
  });
});
