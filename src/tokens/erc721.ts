/**
 * ERC-721 call helpers
 */

import type { Address, Hex } from '../core/types.js';
import {
  type AbiParam,
  type AbiValue,
  addressType,
  addressValue,
  boolType,
  boolValue,
  bytesType,
  bytesValue,
  intValue,
  param,
  stringType,
  uint,
} from '../core/abi-types.js';
import { decodeResult, encodeCall, toCallData } from '../core/abi.js';
import { bytesToAddress, parseAddress } from '../core/address.js';
import { TypeMismatchError } from '../core/errors.js';

export const ERC721_SELECTORS = {
  transferFrom: '0x23b872dd',
  safeTransferFrom: '0x42842e0e',
  safeTransferFromWithData: '0xb88d4fde',
  approve: '0x095ea7b3',
  setApprovalForAll: '0xa22cb465',
  ownerOf: '0x6352211e',
  balanceOf: '0x70a08231',
  getApproved: '0x081812fc',
  isApprovedForAll: '0xe985e9c5',
  tokenURI: '0xc87b56dd',
  name: '0x06fdde03',
  symbol: '0x95d89b41',
} as const satisfies Record<string, Hex>;

const uint256 = uint(256);
const transferParams: readonly AbiParam[] = [
  param('from', addressType),
  param('to', addressType),
  param('tokenId', uint256),
];

export interface ERC721TokenInfo {
  address: string;
  name: string;
  symbol: string;
}

export class ERC721Token {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;

  constructor(info: ERC721TokenInfo) {
    this.address = parseAddress(info.address);
    this.name = info.name;
    this.symbol = info.symbol;
  }

  encodeTransferFrom(from: string, to: string, tokenId: bigint): Hex {
    return call('transferFrom', transferParams, [addressValue(from), addressValue(to), intValue(tokenId)]);
  }

  /**
   * safeTransferFrom, with the 4-argument overload when `data` is given
   */
  encodeSafeTransferFrom(from: string, to: string, tokenId: bigint, data?: Hex | Uint8Array): Hex {
    const values = [addressValue(from), addressValue(to), intValue(tokenId)];
    if (data === undefined) {
      return call('safeTransferFrom', transferParams, values);
    }
    return call(
      'safeTransferFrom',
      [...transferParams, param('data', bytesType)],
      [...values, bytesValue(data)]
    );
  }

  encodeApprove(to: string, tokenId: bigint): Hex {
    return call('approve', [param('to', addressType), param('tokenId', uint256)], [
      addressValue(to),
      intValue(tokenId),
    ]);
  }

  encodeSetApprovalForAll(operator: string, approved: boolean): Hex {
    return call('setApprovalForAll', [param('operator', addressType), param('approved', boolType)], [
      addressValue(operator),
      boolValue(approved),
    ]);
  }

  encodeOwnerOf(tokenId: bigint): Hex {
    return call('ownerOf', [param('tokenId', uint256)], [intValue(tokenId)]);
  }

  encodeBalanceOf(owner: string): Hex {
    return call('balanceOf', [param('owner', addressType)], [addressValue(owner)]);
  }

  encodeGetApproved(tokenId: bigint): Hex {
    return call('getApproved', [param('tokenId', uint256)], [intValue(tokenId)]);
  }

  encodeIsApprovedForAll(owner: string, operator: string): Hex {
    return call('isApprovedForAll', [param('owner', addressType), param('operator', addressType)], [
      addressValue(owner),
      addressValue(operator),
    ]);
  }

  encodeTokenURI(tokenId: bigint): Hex {
    return call('tokenURI', [param('tokenId', uint256)], [intValue(tokenId)]);
  }

  decodeOwnerOf(data: Hex | Uint8Array): Address {
    const [value] = decodeResult([addressType], data);
    if (value?.kind !== 'address') throw new TypeMismatchError('address', value?.kind ?? 'nothing');
    return bytesToAddress(value.bytes);
  }

  decodeTokenURI(data: Hex | Uint8Array): string {
    const [value] = decodeResult([stringType], data);
    if (value?.kind !== 'string') throw new TypeMismatchError('string', value?.kind ?? 'nothing');
    return value.value;
  }
}

function call(name: string, params: readonly AbiParam[], values: readonly AbiValue[]): Hex {
  return toCallData(encodeCall(name, params, values));
}
