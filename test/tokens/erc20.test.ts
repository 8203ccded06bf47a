import { describe, it, expect } from 'vitest';
import { ERC20Token, ERC20_SELECTORS } from '../../src/tokens/erc20.js';
import { encodeArguments } from '../../src/core/abi.js';
import { param, stringType, stringValue } from '../../src/core/abi-types.js';
import { functionSelector } from '../../src/core/hash.js';
import { bytesToHex } from '../../src/core/hex.js';
import { intToWord } from '../../src/core/words.js';
import {
  EmptyDataError,
  InvalidAddressError,
  NegativeValueForUnsignedError,
} from '../../src/core/errors.js';

const ONE = '0x0000000000000000000000000000000000000001';
const ALICE = '0x00000000000000000000000000000000000000a1';
const BOB = '0x00000000000000000000000000000000000000b0';
const TRANSFER_CALL = `0xa9059cbb${'0'.repeat(63)}1${'0'.repeat(59)}f4240`;

const usdc = new ERC20Token({
  address: '0x00000000000000000000000000000000000000c0',
  name: 'Test Dollar',
  symbol: 'TUSD',
  decimals: 6,
});

function word(value: bigint): string {
  return bytesToHex(intToWord(value)).slice(2);
}

describe('ERC20Token', () => {
  it('validates the token address', () => {
    expect(() => new ERC20Token({ address: '0x12', name: 'x', symbol: 'X', decimals: 18 })).toThrow(
      InvalidAddressError
    );
  });

  it('uses the standard selectors', () => {
    expect(ERC20_SELECTORS).toEqual({
      transfer: functionSelector('transfer(address,uint256)'),
      transferFrom: functionSelector('transferFrom(address,address,uint256)'),
      approve: functionSelector('approve(address,uint256)'),
      balanceOf: functionSelector('balanceOf(address)'),
      allowance: functionSelector('allowance(address,address)'),
      totalSupply: functionSelector('totalSupply()'),
      name: functionSelector('name()'),
      symbol: functionSelector('symbol()'),
      decimals: functionSelector('decimals()'),
    });
  });

  describe('encoding', () => {
    it('encodes transfer', () => {
      expect(usdc.encodeTransfer(ONE, 1000000n)).toBe(TRANSFER_CALL);
    });

    it('encodes transferFrom', () => {
      expect(usdc.encodeTransferFrom(ALICE, BOB, 5n)).toBe(
        `${ERC20_SELECTORS.transferFrom}${word(0xa1n)}${word(0xb0n)}${word(5n)}`
      );
    });

    it('encodes an unlimited approve', () => {
      const data = usdc.encodeApprove(BOB, (1n << 256n) - 1n);
      expect(data.startsWith(ERC20_SELECTORS.approve)).toBe(true);
      expect(data.endsWith('ff'.repeat(32))).toBe(true);
    });

    it('encodes views', () => {
      expect(usdc.encodeBalanceOf(ALICE)).toBe(`${ERC20_SELECTORS.balanceOf}${word(0xa1n)}`);
      expect(usdc.encodeAllowance(ALICE, BOB)).toBe(`${ERC20_SELECTORS.allowance}${word(0xa1n)}${word(0xb0n)}`);
      expect(usdc.encodeTotalSupply()).toBe('0x18160ddd');
      expect(usdc.encodeName()).toBe('0x06fdde03');
      expect(usdc.encodeSymbol()).toBe('0x95d89b41');
      expect(usdc.encodeDecimals()).toBe('0x313ce567');
    });

    it('rejects bad arguments', () => {
      expect(() => usdc.encodeTransfer('0xbad', 1n)).toThrow(InvalidAddressError);
      expect(() => usdc.encodeTransfer(ONE, -1n)).toThrow(NegativeValueForUnsignedError);
    });
  });

  describe('decoding', () => {
    it('decodes uint256 results', () => {
      expect(usdc.decodeUint256(intToWord(2500000n))).toBe(2500000n);
      expect(usdc.decodeUint256(`0x${word(6n)}`)).toBe(6n);
    });

    it('decodes string results', () => {
      const data = encodeArguments([param('name', stringType)], [stringValue('Test Dollar')]);
      expect(usdc.decodeString(data)).toBe('Test Dollar');
    });

    it('rejects empty results', () => {
      expect(() => usdc.decodeUint256('0x')).toThrow(EmptyDataError);
    });
  });

  describe('amounts', () => {
    it('formats and parses with the token decimals', () => {
      expect(usdc.formatAmount(1500000n)).toBe('1.5');
      expect(usdc.parseAmount('2.25')).toBe(2250000n);
    });
  });
});
