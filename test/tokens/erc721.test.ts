import { describe, it, expect } from 'vitest';
import { ERC721Token, ERC721_SELECTORS } from '../../src/tokens/erc721.js';
import { encodeArguments } from '../../src/core/abi.js';
import { param, stringType, stringValue } from '../../src/core/abi-types.js';
import { functionSelector } from '../../src/core/hash.js';
import { bytesToHex } from '../../src/core/hex.js';
import { intToWord } from '../../src/core/words.js';
import { EmptyDataError } from '../../src/core/errors.js';

const ALICE = '0x00000000000000000000000000000000000000a1';
const BOB = '0x00000000000000000000000000000000000000b0';

const nft = new ERC721Token({
  address: '0x00000000000000000000000000000000000000d0',
  name: 'Test Tiles',
  symbol: 'TILE',
});

function word(value: bigint): string {
  return bytesToHex(intToWord(value)).slice(2);
}

describe('ERC721Token', () => {
  it('uses the standard selectors', () => {
    expect(ERC721_SELECTORS).toEqual({
      transferFrom: functionSelector('transferFrom(address,address,uint256)'),
      safeTransferFrom: functionSelector('safeTransferFrom(address,address,uint256)'),
      safeTransferFromWithData: functionSelector('safeTransferFrom(address,address,uint256,bytes)'),
      approve: functionSelector('approve(address,uint256)'),
      setApprovalForAll: functionSelector('setApprovalForAll(address,bool)'),
      ownerOf: functionSelector('ownerOf(uint256)'),
      balanceOf: functionSelector('balanceOf(address)'),
      getApproved: functionSelector('getApproved(uint256)'),
      isApprovedForAll: functionSelector('isApprovedForAll(address,address)'),
      tokenURI: functionSelector('tokenURI(uint256)'),
      name: functionSelector('name()'),
      symbol: functionSelector('symbol()'),
    });
  });

  describe('encoding', () => {
    it('encodes transferFrom', () => {
      expect(nft.encodeTransferFrom(ALICE, BOB, 42n)).toBe(
        `${ERC721_SELECTORS.transferFrom}${word(0xa1n)}${word(0xb0n)}${word(42n)}`
      );
    });

    it('encodes the three-argument safeTransferFrom', () => {
      expect(nft.encodeSafeTransferFrom(ALICE, BOB, 1n)).toBe(
        `${ERC721_SELECTORS.safeTransferFrom}${word(0xa1n)}${word(0xb0n)}${word(1n)}`
      );
    });

    it('encodes safeTransferFrom with data as a dynamic tail', () => {
      expect(nft.encodeSafeTransferFrom(ALICE, BOB, 1n, '0xabcd')).toBe(
        `${ERC721_SELECTORS.safeTransferFromWithData}${word(0xa1n)}${word(0xb0n)}${word(1n)}${word(128n)}` +
          `${word(2n)}abcd${'00'.repeat(30)}`
      );
    });

    it('encodes approvals', () => {
      expect(nft.encodeApprove(BOB, 7n)).toBe(`${ERC721_SELECTORS.approve}${word(0xb0n)}${word(7n)}`);
      expect(nft.encodeSetApprovalForAll(BOB, true)).toBe(
        `${ERC721_SELECTORS.setApprovalForAll}${word(0xb0n)}${word(1n)}`
      );
      expect(nft.encodeSetApprovalForAll(BOB, false)).toBe(
        `${ERC721_SELECTORS.setApprovalForAll}${word(0xb0n)}${word(0n)}`
      );
    });

    it('encodes views', () => {
      expect(nft.encodeOwnerOf(9n)).toBe(`${ERC721_SELECTORS.ownerOf}${word(9n)}`);
      expect(nft.encodeBalanceOf(ALICE)).toBe(`${ERC721_SELECTORS.balanceOf}${word(0xa1n)}`);
      expect(nft.encodeGetApproved(9n)).toBe(`${ERC721_SELECTORS.getApproved}${word(9n)}`);
      expect(nft.encodeIsApprovedForAll(ALICE, BOB)).toBe(
        `${ERC721_SELECTORS.isApprovedForAll}${word(0xa1n)}${word(0xb0n)}`
      );
      expect(nft.encodeTokenURI(9n)).toBe(`${ERC721_SELECTORS.tokenURI}${word(9n)}`);
    });
  });

  describe('decoding', () => {
    it('decodes ownerOf', () => {
      expect(nft.decodeOwnerOf(intToWord(0xa1n))).toBe(ALICE);
    });

    it('decodes tokenURI', () => {
      const data = encodeArguments([param('uri', stringType)], [stringValue('ipfs://tile/9')]);
      expect(nft.decodeTokenURI(data)).toBe('ipfs://tile/9');
    });

    it('rejects empty results', () => {
      expect(() => nft.decodeOwnerOf('0x')).toThrow(EmptyDataError);
    });
  });
});
