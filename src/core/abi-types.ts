/**
 * ABI type tags and values
 *
 * Usage:
 * ```typescript
 * const params = [param('to', addressType), param('amount', uint(256))];
 * const values = [addressValue('0x...'), intValue(1000n)];
 * ```
 */

import type { BytesLike } from './types.js';
import { addressToBytes, bytesToAddress } from './address.js';
import { isHex, toBytes } from './hex.js';
import { InvalidAddressError, TypeMismatchError, UnsupportedTypeError } from './errors.js';

// ============ Type Tags ============

export interface AddressTag {
  readonly kind: 'address';
}

export interface UintTag {
  readonly kind: 'uint';
  readonly bits: number;
}

export interface IntTag {
  readonly kind: 'int';
  readonly bits: number;
}

export interface BoolTag {
  readonly kind: 'bool';
}

export interface StringTag {
  readonly kind: 'string';
}

export interface BytesTag {
  readonly kind: 'bytes';
}

/**
 * Dynamic-length array. Fixed-length T[k] arrays are not modeled.
 */
export interface ArrayTag {
  readonly kind: 'array';
  readonly element: TypeTag;
}

export type TypeTag = AddressTag | UintTag | IntTag | BoolTag | StringTag | BytesTag | ArrayTag;

export interface AbiParam {
  readonly name: string;
  readonly type: TypeTag;
}

// ============ Values ============

export interface AddressValue {
  readonly kind: 'address';
  readonly bytes: Uint8Array;
}

/** Shared by uintN and intN tags */
export interface IntValue {
  readonly kind: 'int';
  readonly value: bigint;
}

export interface BoolValue {
  readonly kind: 'bool';
  readonly value: boolean;
}

export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

export interface BytesValue {
  readonly kind: 'bytes';
  readonly bytes: Uint8Array;
}

export interface ArrayValue {
  readonly kind: 'array';
  readonly items: readonly AbiValue[];
}

export type AbiValue = AddressValue | IntValue | BoolValue | StringValue | BytesValue | ArrayValue;

/**
 * Plain JS inputs accepted by `toAbiValue`
 */
export type NativeValue = string | bigint | number | boolean | Uint8Array | readonly NativeValue[];

// ============ Tag Factories ============

export const addressType: AddressTag = { kind: 'address' };
export const boolType: BoolTag = { kind: 'bool' };
export const stringType: StringTag = { kind: 'string' };
export const bytesType: BytesTag = { kind: 'bytes' };

export function uint(bits = 256): UintTag {
  return { kind: 'uint', bits: checkBits(bits, 'uint') };
}

export function int(bits = 256): IntTag {
  return { kind: 'int', bits: checkBits(bits, 'int') };
}

export function arrayOf(element: TypeTag): ArrayTag {
  return { kind: 'array', element };
}

export function param(name: string, type: TypeTag): AbiParam {
  return { name, type };
}

function checkBits(bits: number, prefix: 'uint' | 'int', operation: 'parse' | 'encode' = 'parse'): number {
  if (!Number.isInteger(bits) || bits < 8 || bits > 256 || bits % 8 !== 0) {
    throw new UnsupportedTypeError(`${prefix}${bits}`, operation);
  }
  return bits;
}

// ============ Value Factories ============

/**
 * Address value from a 0x address string or 20 raw bytes
 */
export function addressValue(address: string | Uint8Array): AddressValue {
  if (address instanceof Uint8Array) {
    if (address.length !== 20) {
      throw new InvalidAddressError(address, `expected 20 bytes, got ${address.length}`);
    }
    return { kind: 'address', bytes: address };
  }
  return { kind: 'address', bytes: addressToBytes(address) };
}

export function intValue(value: bigint | number): IntValue {
  if (typeof value === 'number' && !Number.isSafeInteger(value)) {
    throw new TypeMismatchError('intN', `non-integer number ${value}`);
  }
  return { kind: 'int', value: BigInt(value) };
}

export function boolValue(value: boolean): BoolValue {
  return { kind: 'bool', value };
}

export function stringValue(value: string): StringValue {
  return { kind: 'string', value };
}

export function bytesValue(value: BytesLike): BytesValue {
  return { kind: 'bytes', bytes: toBytes(value) };
}

export function arrayValue(items: readonly AbiValue[]): ArrayValue {
  return { kind: 'array', items };
}

// ============ Classification ============

/**
 * Dynamic types are addressed by an offset from the head;
 * static types sit inline in their head word.
 */
export function isDynamic(tag: TypeTag): boolean {
  switch (tag.kind) {
    case 'string':
    case 'bytes':
    case 'array':
      return true;
    case 'address':
    case 'uint':
    case 'int':
    case 'bool':
      return false;
    default: {
      const _exhaustive: never = tag;
      throw new UnsupportedTypeError(String(_exhaustive), 'encode');
    }
  }
}

/**
 * Check that a value's variant fits a tag (one level deep)
 */
export function valueMatchesTag(tag: TypeTag, value: AbiValue): boolean {
  switch (tag.kind) {
    case 'uint':
    case 'int':
      return value.kind === 'int';
    default:
      return value.kind === tag.kind;
  }
}

// ============ Canonical Names ============

/**
 * Canonical type name, e.g. uint256, address[]
 */
export function formatTypeTag(tag: TypeTag): string {
  switch (tag.kind) {
    case 'uint':
    case 'int':
      return `${tag.kind}${checkBits(tag.bits, tag.kind, 'encode')}`;
    case 'array':
      return `${formatTypeTag(tag.element)}[]`;
    case 'address':
    case 'bool':
    case 'string':
    case 'bytes':
      return tag.kind;
    default: {
      const _exhaustive: never = tag;
      throw new UnsupportedTypeError(String(_exhaustive), 'encode');
    }
  }
}

/**
 * Parse a canonical type name. `uint`/`int` alias the 256-bit forms.
 */
export function parseTypeTag(text: string): TypeTag {
  const type = text.trim();

  if (type.endsWith('[]')) {
    return arrayOf(parseTypeTag(type.slice(0, -2)));
  }

  switch (type) {
    case 'address':
      return addressType;
    case 'bool':
      return boolType;
    case 'string':
      return stringType;
    case 'bytes':
      return bytesType;
  }

  const intMatch = /^(u?int)(\d*)$/.exec(type);
  if (intMatch) {
    const bits = intMatch[2] ? parseInt(intMatch[2], 10) : 256;
    return intMatch[1] === 'uint' ? uint(bits) : int(bits);
  }

  throw new UnsupportedTypeError(type, 'parse');
}

// ============ Native Conversion ============

/**
 * Build a value for `tag` from a plain JS input.
 * Inputs of the wrong JS kind are rejected, never coerced.
 */
export function toAbiValue(tag: TypeTag, input: NativeValue): AbiValue {
  const type = formatTypeTag(tag);

  switch (tag.kind) {
    case 'address':
      if (typeof input === 'string' || input instanceof Uint8Array) {
        return addressValue(input);
      }
      throw new TypeMismatchError(type, nativeKind(input));
    case 'uint':
    case 'int':
      if (typeof input === 'bigint' || typeof input === 'number') {
        return intValue(input);
      }
      if (typeof input === 'string' && /^-?\d+$/.test(input)) {
        return intValue(BigInt(input));
      }
      throw new TypeMismatchError(type, nativeKind(input));
    case 'bool':
      if (typeof input === 'boolean') return boolValue(input);
      throw new TypeMismatchError(type, nativeKind(input));
    case 'string':
      if (typeof input === 'string') return stringValue(input);
      throw new TypeMismatchError(type, nativeKind(input));
    case 'bytes':
      if (input instanceof Uint8Array) return bytesValue(input);
      if (isHex(input)) return bytesValue(input);
      throw new TypeMismatchError(type, nativeKind(input));
    case 'array':
      if (isNativeArray(input)) {
        return arrayValue(input.map((item) => toAbiValue(tag.element, item)));
      }
      throw new TypeMismatchError(type, nativeKind(input));
    default: {
      const _exhaustive: never = tag;
      throw new UnsupportedTypeError(String(_exhaustive), 'encode');
    }
  }
}

/**
 * Convert a value back into plain JS: addresses as lowercase hex,
 * integers as bigint, bytes as Uint8Array.
 */
export function fromAbiValue(value: AbiValue): NativeValue {
  switch (value.kind) {
    case 'address':
      return bytesToAddress(value.bytes);
    case 'int':
    case 'bool':
    case 'string':
      return value.value;
    case 'bytes':
      return value.bytes;
    case 'array':
      return value.items.map(fromAbiValue);
    default: {
      const _exhaustive: never = value;
      throw new UnsupportedTypeError(String(_exhaustive), 'decode');
    }
  }
}

function isNativeArray(input: NativeValue): input is readonly NativeValue[] {
  return Array.isArray(input);
}

function nativeKind(input: NativeValue): string {
  if (input instanceof Uint8Array) return 'Uint8Array';
  if (Array.isArray(input)) return 'array';
  return typeof input;
}
