/**
 * Core primitives layer
 * Call codec, byte/word helpers and the building blocks around them
 */

// Types
export type { Hex, Address, Hash, BytesLike } from './types.js';

// Errors
export {
  CodecError,
  isCodecError,
  ArityMismatchError,
  InvalidAddressError,
  ValueOutOfRangeError,
  NegativeValueForUnsignedError,
  UnsupportedTypeError,
  TypeMismatchError,
  InvalidSignatureFormatError,
  EmptyDataError,
  TruncatedDataError,
  SelectorMismatchError,
  InvalidHexError,
  InvalidAmountError,
  InvalidConfigError,
  InvalidPrivateKeyError,
} from './errors.js';
export type { ErrorDetails } from './errors.js';

// Hex utilities
export {
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
  stringToBytes,
  bytesToString,
  stringToHex,
  hexToString,
  hexEquals,
} from './hex.js';

// Word utilities
export {
  WORD_SIZE,
  padTo32,
  intToWord,
  wordToUint,
  wordToInt,
  addressFromWord,
  readWord,
} from './words.js';

// Hash functions
export { keccak256, keccak256Bytes, selectorBytes, functionSelector, eventTopic } from './hash.js';

// Address utilities
export {
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
} from './address.js';

// Keys
export {
  isValidPrivateKey,
  generatePrivateKey,
  privateKeyToPublicKey,
  publicKeyToAddress,
  privateKeyToAddress,
} from './keys.js';

// Units
export {
  ETHER_DECIMALS,
  GWEI_DECIMALS,
  parseUnits,
  formatUnits,
  formatUnitsFixed,
  parseEther,
  formatEther,
  parseGwei,
  formatGwei,
  ETH,
  GWEI,
  WEI,
  convertDecimals,
} from './units.js';

// RLP encoding
export { encode as rlpEncode } from './rlp.js';
export type { RLPInput } from './rlp.js';

// ABI types and values
export {
  addressType,
  boolType,
  stringType,
  bytesType,
  uint,
  int,
  arrayOf,
  param,
  addressValue,
  intValue,
  boolValue,
  stringValue,
  bytesValue,
  arrayValue,
  isDynamic,
  valueMatchesTag,
  formatTypeTag,
  parseTypeTag,
  toAbiValue,
  fromAbiValue,
} from './abi-types.js';
export type {
  TypeTag,
  AddressTag,
  UintTag,
  IntTag,
  BoolTag,
  StringTag,
  BytesTag,
  ArrayTag,
  AbiParam,
  AbiValue,
  AddressValue,
  IntValue,
  BoolValue,
  StringValue,
  BytesValue,
  ArrayValue,
  NativeValue,
} from './abi-types.js';

// ABI encoding
export {
  formatSignature,
  parseSignature,
  selectorHex,
  encodeValue,
  encodeArguments,
  encodeCall,
  toCallData,
  encodeFunctionData,
  decodeValue,
  decodeResult,
  decodeCall,
  tryEncodeCall,
  tryDecodeResult,
} from './abi.js';
export type { EncodedCall, ParsedSignature } from './abi.js';

// Result type for explicit error handling
export {
  ok,
  err,
  isOk,
  isErr,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  match as matchResult,
  fromThrowable,
  combine,
} from './result.js';
export type { Ok, Err, Result } from './result.js';

// Logging
export { noopLogger, consoleLogger, createConsoleLogger, createPrefixedLogger } from './logger.js';
export type { Logger, LogLevel, LogContext } from './logger.js';
