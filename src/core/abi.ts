/**
 * ABI (Application Binary Interface) encoding/decoding
 * Head/tail call-data layout for contract calls
 */

import type { Hex } from './types.js';
import type { AbiParam, AbiValue, NativeValue, TypeTag } from './abi-types.js';
import {
  addressValue,
  boolValue,
  formatTypeTag,
  intValue,
  isDynamic,
  param,
  parseTypeTag,
  stringValue,
  toAbiValue,
} from './abi-types.js';
import { bytesEqual, bytesToHex, bytesToString, concatBytes, stringToBytes, toBytes } from './hex.js';
import { selectorBytes } from './hash.js';
import { WORD_SIZE, addressFromWord, intToWord, padTo32, readWord, wordToUint } from './words.js';
import {
  ArityMismatchError,
  CodecError,
  EmptyDataError,
  InvalidAddressError,
  InvalidSignatureFormatError,
  NegativeValueForUnsignedError,
  SelectorMismatchError,
  TruncatedDataError,
  TypeMismatchError,
  UnsupportedTypeError,
  ValueOutOfRangeError,
} from './errors.js';
import { fromThrowable, type Result } from './result.js';

/**
 * Call data split into its wire regions
 */
export interface EncodedCall {
  /** Canonical signature, e.g. transfer(address,uint256) */
  readonly signature: string;
  readonly selector: Uint8Array;
  /** One 32-byte word per parameter */
  readonly head: readonly Uint8Array[];
  readonly tail: Uint8Array;
  /** head ++ tail, the block that head offsets are relative to */
  readonly argumentBytes: Uint8Array;
  /** selector ++ head ++ tail */
  readonly data: Uint8Array;
}

export interface ParsedSignature {
  readonly name: string;
  readonly params: readonly AbiParam[];
}

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

// ============ Signatures ============

/**
 * Canonical signature: name(type1,type2,...) with no names or spaces
 */
export function formatSignature(name: string, params: readonly AbiParam[]): string {
  if (!IDENTIFIER.test(name)) {
    throw new InvalidSignatureFormatError(name);
  }
  return `${name}(${params.map((p) => formatTypeTag(p.type)).join(',')})`;
}

/**
 * Parse a signature such as "transfer(address to, uint256 amount)".
 * Whitespace and parameter names are tolerated; unnamed params become paramN.
 */
export function parseSignature(signature: string): ParsedSignature {
  const match = /^\s*([A-Za-z_$][A-Za-z0-9_$]*)\s*\(([^()]*)\)\s*$/.exec(signature);
  if (!match?.[1] || match[2] === undefined) {
    throw new InvalidSignatureFormatError(signature);
  }

  const body = match[2].trim();
  if (body === '') {
    return { name: match[1], params: [] };
  }

  const params = body.split(',').map((part, index) => {
    const [type, name, ...rest] = part.trim().split(/\s+/);
    if (!type || rest.length > 0) {
      throw new InvalidSignatureFormatError(signature);
    }
    return param(name ?? `param${index}`, parseTypeTag(type));
  });

  return { name: match[1], params };
}

/**
 * 0x-prefixed selector of a function signature
 */
export function selectorHex(name: string, params: readonly AbiParam[]): Hex {
  return bytesToHex(selectorBytes(formatSignature(name, params)));
}

// ============ Value Encoder ============

/**
 * Encode one value against its type tag
 */
export function encodeValue(tag: TypeTag, value: AbiValue): Uint8Array {
  switch (tag.kind) {
    case 'address': {
      if (value.kind !== 'address') throw mismatch(tag, value);
      if (value.bytes.length !== 20) {
        throw new InvalidAddressError(value.bytes, `expected 20 bytes, got ${value.bytes.length}`);
      }
      const word = new Uint8Array(WORD_SIZE);
      word.set(value.bytes, WORD_SIZE - 20);
      return word;
    }

    case 'uint': {
      if (value.kind !== 'int') throw mismatch(tag, value);
      const type = formatTypeTag(tag);
      if (value.value < 0n) {
        throw new NegativeValueForUnsignedError(value.value, type);
      }
      if (value.value > (1n << BigInt(tag.bits)) - 1n) {
        throw new ValueOutOfRangeError(value.value, type);
      }
      return intToWord(value.value);
    }

    case 'int': {
      if (value.kind !== 'int') throw mismatch(tag, value);
      const type = formatTypeTag(tag);
      const limit = 1n << BigInt(tag.bits - 1);
      if (value.value < -limit || value.value >= limit) {
        throw new ValueOutOfRangeError(value.value, type);
      }
      return intToWord(value.value, true);
    }

    case 'bool': {
      if (value.kind !== 'bool') throw mismatch(tag, value);
      const word = new Uint8Array(WORD_SIZE);
      if (value.value) word[WORD_SIZE - 1] = 1;
      return word;
    }

    case 'string':
      if (value.kind !== 'string') throw mismatch(tag, value);
      return encodeLengthPrefixed(stringToBytes(value.value));

    case 'bytes':
      if (value.kind !== 'bytes') throw mismatch(tag, value);
      return encodeLengthPrefixed(value.bytes);

    case 'array': {
      if (value.kind !== 'array') throw mismatch(tag, value);
      // Elements are concatenated inline with no per-element offset table.
      // Matches the standard layout for static elements only.
      const count = intToWord(BigInt(value.items.length));
      return concatBytes(count, ...value.items.map((item) => encodeValue(tag.element, item)));
    }

    default: {
      const _exhaustive: never = tag;
      throw new UnsupportedTypeError(String(_exhaustive), 'encode');
    }
  }
}

function encodeLengthPrefixed(content: Uint8Array): Uint8Array {
  return concatBytes(intToWord(BigInt(content.length)), padTo32(content));
}

function mismatch(tag: TypeTag, value: AbiValue): TypeMismatchError {
  return new TypeMismatchError(formatTypeTag(tag), value.kind);
}

// ============ Call Encoder ============

interface SlotLayout {
  readonly dynamic: boolean;
  readonly encoded: Uint8Array;
  /** Offset from the start of the head, dynamic slots only */
  readonly offset: number;
}

/**
 * Lay out head words and tail payloads for a parameter list
 */
function layoutArguments(
  params: readonly AbiParam[],
  values: readonly AbiValue[]
): { head: Uint8Array[]; tail: Uint8Array } {
  if (params.length !== values.length) {
    throw new ArityMismatchError(params.length, values.length);
  }

  // Pass 1: classify once and size the tail
  const slots: SlotLayout[] = [];
  let tailOffset = params.length * WORD_SIZE;
  params.forEach((p, i) => {
    const value = values[i];
    if (value === undefined) throw new ArityMismatchError(params.length, i);

    const dynamic = isDynamic(p.type);
    const encoded = encodeValue(p.type, value);
    slots.push({ dynamic, encoded, offset: tailOffset });
    if (dynamic) tailOffset += encoded.length;
  });

  // Pass 2: emit
  const head: Uint8Array[] = [];
  const tail: Uint8Array[] = [];
  for (const slot of slots) {
    if (slot.dynamic) {
      head.push(intToWord(BigInt(slot.offset)));
      tail.push(slot.encoded);
    } else {
      head.push(slot.encoded);
    }
  }

  return { head, tail: concatBytes(...tail) };
}

/**
 * Encode argument bytes (head ++ tail) without a selector
 */
export function encodeArguments(params: readonly AbiParam[], values: readonly AbiValue[]): Uint8Array {
  const { head, tail } = layoutArguments(params, values);
  return concatBytes(...head, tail);
}

/**
 * Encode a function call: selector ++ head ++ tail
 */
export function encodeCall(
  name: string,
  params: readonly AbiParam[],
  values: readonly AbiValue[]
): EncodedCall {
  if (params.length !== values.length) {
    throw new ArityMismatchError(params.length, values.length);
  }

  const signature = formatSignature(name, params);
  const selector = selectorBytes(signature);
  const { head, tail } = layoutArguments(params, values);
  const argumentBytes = concatBytes(...head, tail);

  return {
    signature,
    selector,
    head,
    tail,
    argumentBytes,
    data: concatBytes(selector, argumentBytes),
  };
}

/**
 * Render an encoded call as 0x-prefixed call data
 */
export function toCallData(encoded: EncodedCall): Hex {
  return bytesToHex(encoded.data);
}

/**
 * Encode call data from a signature string and plain JS arguments
 * e.g., encodeFunctionData('transfer(address,uint256)', [to, 1000n])
 */
export function encodeFunctionData(signature: string, args: readonly NativeValue[] = []): Hex {
  const { name, params } = parseSignature(signature);
  if (params.length !== args.length) {
    throw new ArityMismatchError(params.length, args.length);
  }

  const values = params.map((p, i) => {
    const arg = args[i];
    if (arg === undefined) throw new ArityMismatchError(params.length, i);
    return toAbiValue(p.type, arg);
  });
  return toCallData(encodeCall(name, params, values));
}

// ============ Call/Result Decoder ============

/**
 * Decode the parameter whose head word starts at `headOffset`.
 * Only address, uintN, bool and string are decodable.
 */
export function decodeValue(tag: TypeTag, data: Uint8Array, headOffset: number): AbiValue {
  const what = formatTypeTag(tag);
  const word = readWord(data, headOffset, what);

  switch (tag.kind) {
    case 'address':
      return addressValue(addressFromWord(word));

    case 'uint':
      return intValue(wordToUint(word));

    case 'bool':
      return boolValue(word[WORD_SIZE - 1] !== 0);

    case 'string': {
      const offset = wordToUint(word);
      if (offset + BigInt(WORD_SIZE) > BigInt(data.length)) {
        throw new TruncatedDataError('string length', offset + BigInt(WORD_SIZE), data.length);
      }
      const start = Number(offset) + WORD_SIZE;
      const length = wordToUint(readWord(data, Number(offset), 'string length'));
      if (BigInt(start) + length > BigInt(data.length)) {
        throw new TruncatedDataError('string content', BigInt(start) + length, data.length);
      }
      return stringValue(bytesToString(data.slice(start, start + Number(length))));
    }

    case 'int':
    case 'bytes':
    case 'array':
      throw new UnsupportedTypeError(what, 'decode');

    default: {
      const _exhaustive: never = tag;
      throw new UnsupportedTypeError(String(_exhaustive), 'decode');
    }
  }
}

/**
 * Decode return data (or argument bytes) against an ordered type list
 */
export function decodeResult(types: readonly TypeTag[], data: Uint8Array | Hex): AbiValue[] {
  const bytes = toBytes(data);
  if (bytes.length === 0) {
    throw new EmptyDataError();
  }

  return types.map((tag, i) => decodeValue(tag, bytes, i * WORD_SIZE));
}

/**
 * Decode full call data, checking the selector first
 */
export function decodeCall(
  name: string,
  params: readonly AbiParam[],
  callData: Uint8Array | Hex
): AbiValue[] {
  const bytes = toBytes(callData);
  if (bytes.length === 0) {
    throw new EmptyDataError();
  }
  if (bytes.length < 4) {
    throw new TruncatedDataError('selector', 4, bytes.length);
  }

  const expected = selectorBytes(formatSignature(name, params));
  const actual = bytes.subarray(0, 4);
  if (!bytesEqual(expected, actual)) {
    throw new SelectorMismatchError(bytesToHex(expected), bytesToHex(actual));
  }
  if (params.length === 0) return [];

  return decodeResult(
    params.map((p) => p.type),
    bytes.subarray(4)
  );
}

// ============ Result Wrappers ============

function toCodecError(error: unknown): CodecError {
  if (error instanceof CodecError) return error;
  throw error;
}

/**
 * encodeCall returning a Result instead of throwing codec errors
 */
export function tryEncodeCall(
  name: string,
  params: readonly AbiParam[],
  values: readonly AbiValue[]
): Result<EncodedCall, CodecError> {
  return fromThrowable(() => encodeCall(name, params, values), toCodecError);
}

/**
 * decodeResult returning a Result instead of throwing codec errors
 */
export function tryDecodeResult(
  types: readonly TypeTag[],
  data: Uint8Array | Hex
): Result<AbiValue[], CodecError> {
  return fromThrowable(() => decodeResult(types, data), toCodecError);
}
