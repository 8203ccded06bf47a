/**
 * ERC-20 call helpers
 * Pre-filled instances of the call codec for the standard token interface
 */

import type { Address, Hex } from '../core/types.js';
import { addressType, addressValue, intValue, param, stringType, uint } from '../core/abi-types.js';
import { decodeResult, encodeCall, toCallData } from '../core/abi.js';
import { parseAddress } from '../core/address.js';
import { formatUnits, parseUnits } from '../core/units.js';
import { TypeMismatchError } from '../core/errors.js';

export const ERC20_SELECTORS = {
  transfer: '0xa9059cbb',
  transferFrom: '0x23b872dd',
  approve: '0x095ea7b3',
  balanceOf: '0x70a08231',
  allowance: '0xdd62ed3e',
  totalSupply: '0x18160ddd',
  name: '0x06fdde03',
  symbol: '0x95d89b41',
  decimals: '0x313ce567',
} as const satisfies Record<string, Hex>;

const uint256 = uint(256);

export interface ERC20TokenInfo {
  address: string;
  name: string;
  symbol: string;
  decimals: number;
}

export class ERC20Token {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;

  constructor(info: ERC20TokenInfo) {
    this.address = parseAddress(info.address);
    this.name = info.name;
    this.symbol = info.symbol;
    this.decimals = info.decimals;
  }

  encodeTransfer(to: string, amount: bigint): Hex {
    return toCallData(
      encodeCall('transfer', [param('to', addressType), param('amount', uint256)], [
        addressValue(to),
        intValue(amount),
      ])
    );
  }

  encodeTransferFrom(from: string, to: string, amount: bigint): Hex {
    return toCallData(
      encodeCall(
        'transferFrom',
        [param('from', addressType), param('to', addressType), param('amount', uint256)],
        [addressValue(from), addressValue(to), intValue(amount)]
      )
    );
  }

  encodeApprove(spender: string, amount: bigint): Hex {
    return toCallData(
      encodeCall('approve', [param('spender', addressType), param('amount', uint256)], [
        addressValue(spender),
        intValue(amount),
      ])
    );
  }

  encodeBalanceOf(owner: string): Hex {
    return toCallData(encodeCall('balanceOf', [param('owner', addressType)], [addressValue(owner)]));
  }

  encodeAllowance(owner: string, spender: string): Hex {
    return toCallData(
      encodeCall('allowance', [param('owner', addressType), param('spender', addressType)], [
        addressValue(owner),
        addressValue(spender),
      ])
    );
  }

  encodeTotalSupply(): Hex {
    return toCallData(encodeCall('totalSupply', [], []));
  }

  encodeName(): Hex {
    return toCallData(encodeCall('name', [], []));
  }

  encodeSymbol(): Hex {
    return toCallData(encodeCall('symbol', [], []));
  }

  encodeDecimals(): Hex {
    return toCallData(encodeCall('decimals', [], []));
  }

  /**
   * Decode a uint256 return value (balanceOf, allowance, totalSupply, decimals)
   */
  decodeUint256(data: Hex | Uint8Array): bigint {
    const [value] = decodeResult([uint256], data);
    if (value?.kind !== 'int') throw new TypeMismatchError('uint256', value?.kind ?? 'nothing');
    return value.value;
  }

  /**
   * Decode a string return value (name, symbol)
   */
  decodeString(data: Hex | Uint8Array): string {
    const [value] = decodeResult([stringType], data);
    if (value?.kind !== 'string') throw new TypeMismatchError('string', value?.kind ?? 'nothing');
    return value.value;
  }

  formatAmount(amount: bigint): string {
    return formatUnits(amount, this.decimals);
  }

  parseAmount(amount: string): bigint {
    return parseUnits(amount, this.decimals);
  }
}
