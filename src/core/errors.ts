/**
 * Codec error types
 * Structured, deterministic validation errors with recovery suggestions
 */

export interface ErrorDetails {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  suggestion?: string;
}

/**
 * Base error class for all evm-calldata errors.
 * Every failure is a local validation failure, so none is retryable.
 */
export class CodecError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  readonly suggestion: string;
  readonly retryable = false;

  constructor(config: ErrorDetails) {
    super(config.message);
    this.name = 'CodecError';
    this.code = config.code;
    this.details = config.details ?? {};
    this.suggestion = config.suggestion ?? 'Check the error details and the input values';
  }

  toJSON(): ErrorDetails & { retryable: boolean } {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      suggestion: this.suggestion,
      retryable: this.retryable,
    };
  }

  override toString(): string {
    return `${this.code}: ${this.message}. ${this.suggestion}`;
  }
}

/**
 * Type guard for errors raised by this library
 */
export function isCodecError(error: unknown): error is CodecError {
  return error instanceof CodecError;
}

// ============ Encoding Errors ============

export class ArityMismatchError extends CodecError {
  constructor(expected: number, got: number) {
    super({
      code: 'ARITY_MISMATCH',
      message: `Parameter count mismatch: expected ${expected} values, got ${got}`,
      details: { expected, got },
      suggestion: 'Pass exactly one value per parameter, in parameter order',
    });
    this.name = 'ArityMismatchError';
  }
}

export class InvalidAddressError extends CodecError {
  constructor(address: unknown, reason = 'expected 0x followed by 40 hex characters') {
    super({
      code: 'INVALID_ADDRESS',
      message: `Invalid address: ${describe(address)} (${reason})`,
      details: { address: describe(address), reason },
      suggestion: 'Use a 20-byte address such as 0x742d35Cc6634C0532925a3b844Bc9e7595f0bEb1',
    });
    this.name = 'InvalidAddressError';
  }
}

export class ValueOutOfRangeError extends CodecError {
  constructor(value: bigint, type: string) {
    super({
      code: 'VALUE_OUT_OF_RANGE',
      message: `Value ${value} out of range for ${type}`,
      details: { value: value.toString(), type },
      suggestion: `Use a value that fits in ${type}`,
    });
    this.name = 'ValueOutOfRangeError';
  }
}

export class NegativeValueForUnsignedError extends CodecError {
  constructor(value: bigint, type: string) {
    super({
      code: 'NEGATIVE_VALUE_FOR_UNSIGNED',
      message: `Negative value ${value} for unsigned type ${type}`,
      details: { value: value.toString(), type },
      suggestion: 'Use a signed intN type or a non-negative value',
    });
    this.name = 'NegativeValueForUnsignedError';
  }
}

export class UnsupportedTypeError extends CodecError {
  constructor(type: string, operation: 'parse' | 'encode' | 'decode') {
    super({
      code: 'UNSUPPORTED_TYPE',
      message: `Unsupported type for ${operation}: ${type}`,
      details: { type, operation },
      suggestion:
        operation === 'decode'
          ? 'Only address, uintN, bool and string can be decoded'
          : 'Use address, uintN, intN, bool, string, bytes or T[]',
    });
    this.name = 'UnsupportedTypeError';
  }
}

export class TypeMismatchError extends CodecError {
  constructor(type: string, got: string) {
    super({
      code: 'TYPE_MISMATCH',
      message: `Value of kind ${got} does not match type ${type}`,
      details: { type, got },
      suggestion: 'Build the value with the factory matching its parameter type',
    });
    this.name = 'TypeMismatchError';
  }
}

export class InvalidSignatureFormatError extends CodecError {
  constructor(signature: string) {
    super({
      code: 'INVALID_SIGNATURE_FORMAT',
      message: `Invalid signature format: ${signature}`,
      details: { signature },
      suggestion: 'Use the form name(type1,type2,...), e.g. transfer(address,uint256)',
    });
    this.name = 'InvalidSignatureFormatError';
  }
}

// ============ Decoding Errors ============

export class EmptyDataError extends CodecError {
  constructor() {
    super({
      code: 'EMPTY_DATA',
      message: 'Cannot decode empty data',
      suggestion: 'The call may have reverted or the target may not be a contract',
    });
    this.name = 'EmptyDataError';
  }
}

export class TruncatedDataError extends CodecError {
  constructor(what: string, needed: bigint | number, available: number) {
    super({
      code: 'TRUNCATED_DATA',
      message: `Insufficient data for ${what}: need ${needed} bytes, have ${available}`,
      details: { what, needed: needed.toString(), available },
      suggestion: 'Check that the data matches the expected types',
    });
    this.name = 'TruncatedDataError';
  }
}

export class SelectorMismatchError extends CodecError {
  constructor(expected: string, got: string) {
    super({
      code: 'SELECTOR_MISMATCH',
      message: `Selector mismatch: expected ${expected}, got ${got}`,
      details: { expected, got },
      suggestion: 'Decode the call data with the signature it was encoded with',
    });
    this.name = 'SelectorMismatchError';
  }
}

export class InvalidHexError extends CodecError {
  constructor(value: unknown, reason: string) {
    super({
      code: 'INVALID_HEX',
      message: `Invalid hex value ${describe(value)}: ${reason}`,
      details: { value: describe(value), reason },
      suggestion: 'Use a 0x-prefixed string of an even number of hex characters',
    });
    this.name = 'InvalidHexError';
  }
}

// ============ Collaborator Errors ============

export class InvalidAmountError extends CodecError {
  constructor(amount: string, reason: string) {
    super({
      code: 'INVALID_AMOUNT',
      message: `Invalid amount "${amount}": ${reason}`,
      details: { amount, reason },
      suggestion: 'Use a decimal string such as "1.5" or "100"',
    });
    this.name = 'InvalidAmountError';
  }
}

export class InvalidConfigError extends CodecError {
  constructor(setting: string, value: unknown, reason: string) {
    super({
      code: 'INVALID_CONFIG',
      message: `Invalid ${setting} ${describe(value)}: ${reason}`,
      details: { setting, value: describe(value), reason },
      suggestion: `Pass a valid ${setting}`,
    });
    this.name = 'InvalidConfigError';
  }
}

export class InvalidPrivateKeyError extends CodecError {
  constructor(reason: string) {
    super({
      code: 'INVALID_PRIVATE_KEY',
      message: `Invalid private key: ${reason}`,
      details: { reason },
      suggestion: 'Use 32 bytes (64 hex characters) within the secp256k1 curve order',
    });
    this.name = 'InvalidPrivateKeyError';
  }
}

function describe(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  return String(value);
}
