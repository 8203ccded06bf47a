/**
 * Legacy transaction model
 * Intrinsic gas, fee arithmetic and the unsigned transaction hash
 */

import type { Address, Hash, Hex } from '../core/types.js';
import { encode as rlpEncode } from '../core/rlp.js';
import { keccak256 } from '../core/hash.js';
import { bytesToHex, toBytes } from '../core/hex.js';
import { parseAddress } from '../core/address.js';
import { GWEI } from '../core/units.js';
import { InvalidAmountError } from '../core/errors.js';

export const BASE_TX_GAS = 21000n;
export const ZERO_BYTE_GAS = 4n;
export const NONZERO_BYTE_GAS = 16n;

/**
 * Fallback gas price (20 gwei); no pricing policy is applied
 */
export const DEFAULT_GAS_PRICE = GWEI(20);

export interface Transaction {
  readonly to: Address;
  readonly value: bigint;
  readonly gasLimit: bigint;
  readonly gasPrice: bigint;
  readonly data: Hex;
  readonly nonce: number;
}

export interface TransactionRequest {
  to: string;
  value?: bigint;
  data?: Hex | Uint8Array;
  nonce?: number;
  gasLimit?: bigint;
  gasPrice?: bigint;
}

/**
 * Intrinsic gas of a call: 21000 plus 4 per zero and 16 per non-zero data byte
 */
export function estimateIntrinsicGas(data: Hex | Uint8Array = new Uint8Array()): bigint {
  let gas = BASE_TX_GAS;
  for (const byte of toBytes(data)) {
    gas += byte === 0 ? ZERO_BYTE_GAS : NONZERO_BYTE_GAS;
  }
  return gas;
}

/**
 * Build a transaction, filling gas limit, gas price, value and nonce defaults
 */
export function createTransaction(request: TransactionRequest): Transaction {
  const to = parseAddress(request.to);
  const data = bytesToHex(toBytes(request.data ?? new Uint8Array()));
  const value = request.value ?? 0n;
  const nonce = request.nonce ?? 0;

  if (value < 0n) {
    throw new InvalidAmountError(value.toString(), 'value must be non-negative');
  }
  if (!Number.isSafeInteger(nonce) || nonce < 0) {
    throw new InvalidAmountError(String(nonce), 'nonce must be a non-negative integer');
  }

  return {
    to,
    value,
    gasLimit: request.gasLimit ?? estimateIntrinsicGas(data),
    gasPrice: request.gasPrice ?? DEFAULT_GAS_PRICE,
    data,
    nonce,
  };
}

/**
 * Maximum fee: gasLimit * gasPrice
 */
export function calculateFee(tx: Pick<Transaction, 'gasLimit' | 'gasPrice'>): bigint {
  return tx.gasLimit * tx.gasPrice;
}

/**
 * Total cost the sender must hold: value plus maximum fee
 */
export function totalCost(tx: Transaction): bigint {
  return tx.value + calculateFee(tx);
}

/**
 * RLP list of the unsigned legacy fields
 */
export function serializeUnsigned(tx: Transaction): Hex {
  return bytesToHex(
    rlpEncode([tx.nonce, tx.gasPrice, tx.gasLimit, tx.to, tx.value, tx.data])
  );
}

/**
 * keccak256 of the unsigned serialization
 */
export function transactionHash(tx: Transaction): Hash {
  return keccak256(serializeUnsigned(tx));
}
