import { describe, it, expect } from 'vitest';
import { keccak256, keccak256Bytes, selectorBytes, functionSelector, eventTopic } from '../../src/core/hash.js';

describe('hash functions', () => {
  describe('keccak256', () => {
    it('hashes empty input', () => {
      expect(keccak256('0x')).toBe('0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470');
      expect(keccak256(new Uint8Array())).toBe(
        '0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470'
      );
    });

    it('hashes plain strings as UTF-8', () => {
      expect(keccak256('')).toBe('0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470');
      expect(keccak256('hello')).toBe('0x1c8aff950685c2ed4bc3174f3472287b56d9517b9c948127319a09a7a36deac8');
    });

    it('hashes hex strings as bytes', () => {
      expect(keccak256('0x68656c6c6f')).toBe(keccak256('hello'));
    });

    it('returns 32 bytes', () => {
      expect(keccak256Bytes('abc').length).toBe(32);
    });
  });

  describe('selectors', () => {
    it('computes well-known function selectors', () => {
      expect(functionSelector('transfer(address,uint256)')).toBe('0xa9059cbb');
      expect(functionSelector('approve(address,uint256)')).toBe('0x095ea7b3');
      expect(functionSelector('balanceOf(address)')).toBe('0x70a08231');
    });

    it('returns four bytes', () => {
      expect(selectorBytes('transfer(address,uint256)')).toEqual(new Uint8Array([0xa9, 0x05, 0x9c, 0xbb]));
    });
  });

  describe('eventTopic', () => {
    it('computes the Transfer and Approval topics', () => {
      expect(eventTopic('Transfer(address,address,uint256)')).toBe(
        '0xddf252ad1be2c89b69c2b068fc378daa952ba7f163c4a11628f55a4df523b3ef'
      );
      expect(eventTopic('Approval(address,address,uint256)')).toBe(
        '0x8c5be1e5ebec7d5bd14f71427d1e84f3dd0314c0f7b2291e5b200ac8c7c3b925'
      );
    });
  });
});
