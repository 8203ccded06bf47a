import { describe, it, expect } from 'vitest';
import {
  isAddress,
  assertAddress,
  parseAddress,
  addressToBytes,
  bytesToAddress,
  toChecksumAddress,
  isChecksumValid,
  addressEquals,
  isZeroAddress,
  ZERO_ADDRESS,
} from '../../src/core/address.js';
import { InvalidAddressError } from '../../src/core/errors.js';

const CHECKSUMMED = '0x5aAeb6053F3E94C9b9A09f33669435E7Ef1BeAed';
const LOWER = '0x5aaeb6053f3e94c9b9a09f33669435e7ef1beaed';

describe('address utilities', () => {
  describe('isAddress', () => {
    it('accepts 0x plus 40 hex characters in any case', () => {
      expect(isAddress(LOWER)).toBe(true);
      expect(isAddress(CHECKSUMMED)).toBe(true);
      expect(isAddress(ZERO_ADDRESS)).toBe(true);
    });

    it('rejects wrong lengths, prefixes and characters', () => {
      expect(isAddress('0x1234')).toBe(false);
      expect(isAddress(LOWER.slice(2))).toBe(false);
      expect(isAddress(`${LOWER}00`)).toBe(false);
      expect(isAddress('0x' + 'g'.repeat(40))).toBe(false);
      expect(isAddress(42)).toBe(false);
    });
  });

  describe('assertAddress / parseAddress', () => {
    it('throws InvalidAddressError with a readable message', () => {
      expect(() => assertAddress('0x1234')).toThrow(InvalidAddressError);
      expect(() => parseAddress('0x1234')).toThrow(
        'Invalid address: 0x1234 (expected 0x followed by 40 hex characters)'
      );
    });

    it('returns valid addresses unchanged', () => {
      expect(parseAddress(CHECKSUMMED)).toBe(CHECKSUMMED);
    });
  });

  describe('bytes', () => {
    it('converts to and from 20 bytes', () => {
      const bytes = addressToBytes(CHECKSUMMED);
      expect(bytes.length).toBe(20);
      expect(bytes[0]).toBe(0x5a);
      expect(bytesToAddress(bytes)).toBe(LOWER);
    });

    it('rejects other lengths', () => {
      expect(() => bytesToAddress(new Uint8Array(32))).toThrow('Invalid address: <32 bytes> (expected 20 bytes, got 32)');
    });
  });

  describe('checksums', () => {
    it('applies EIP-55 casing', () => {
      expect(toChecksumAddress(LOWER)).toBe(CHECKSUMMED);
      expect(toChecksumAddress('0xfb6916095ca1df60bb79ce92ce3ea74c37c5d359')).toBe(
        '0xfB6916095ca1df60bB79Ce92cE3Ea74c37c5d359'
      );
    });

    it('validates mixed-case addresses', () => {
      expect(isChecksumValid(CHECKSUMMED)).toBe(true);
      expect(isChecksumValid('0x5AAeb6053F3E94C9b9A09f33669435E7Ef1BeAed')).toBe(false);
    });

    it('treats single-case addresses as unchecksummed', () => {
      expect(isChecksumValid(LOWER)).toBe(true);
      expect(isChecksumValid(LOWER.toUpperCase().replace('0X', '0x'))).toBe(true);
    });
  });

  describe('comparison', () => {
    it('compares case-insensitively', () => {
      expect(addressEquals(LOWER, CHECKSUMMED)).toBe(true);
      expect(addressEquals(LOWER, ZERO_ADDRESS)).toBe(false);
      expect(addressEquals('bad', 'bad')).toBe(false);
    });

    it('detects the zero address', () => {
      expect(isZeroAddress('0x0000000000000000000000000000000000000000')).toBe(true);
      expect(isZeroAddress(LOWER)).toBe(false);
    });
  });
});
