import { describe, it, expect } from 'vitest';
import {
  CodecError,
  isCodecError,
  ArityMismatchError,
  InvalidAddressError,
  ValueOutOfRangeError,
  UnsupportedTypeError,
  TruncatedDataError,
  EmptyDataError,
  InvalidConfigError,
} from '../../src/core/errors.js';

describe('codec errors', () => {
  it('carries code, details and suggestion', () => {
    const error = new ArityMismatchError(2, 1);
    expect(error).toBeInstanceOf(CodecError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ArityMismatchError');
    expect(error.code).toBe('ARITY_MISMATCH');
    expect(error.details).toEqual({ expected: 2, got: 1 });
    expect(error.retryable).toBe(false);
  });

  it('serializes to JSON', () => {
    const error = new ValueOutOfRangeError(256n, 'uint8');
    expect(error.toJSON()).toEqual({
      code: 'VALUE_OUT_OF_RANGE',
      message: 'Value 256 out of range for uint8',
      details: { value: '256', type: 'uint8' },
      suggestion: 'Use a value that fits in uint8',
      retryable: false,
    });
  });

  it('renders code, message and suggestion as a string', () => {
    expect(new EmptyDataError().toString()).toBe(
      'EMPTY_DATA: Cannot decode empty data. The call may have reverted or the target may not be a contract'
    );
  });

  it('describes byte arrays by length', () => {
    expect(new InvalidAddressError(new Uint8Array(3), 'too short').message).toBe(
      'Invalid address: <3 bytes> (too short)'
    );
  });

  it('names the operation for unsupported types', () => {
    expect(new UnsupportedTypeError('int256', 'decode').message).toBe('Unsupported type for decode: int256');
  });

  it('names the rejected setting', () => {
    const error = new InvalidConfigError('mailbox size', 0, 'must be a positive integer');
    expect(error.message).toBe('Invalid mailbox size 0: must be a positive integer');
    expect(error.code).toBe('INVALID_CONFIG');
    expect(error.details).toEqual({ setting: 'mailbox size', value: '0', reason: 'must be a positive integer' });
  });

  it('stringifies bigint sizes', () => {
    expect(new TruncatedDataError('string content', 2n ** 70n, 64).details).toEqual({
      what: 'string content',
      needed: '1180591620717411303424',
      available: 64,
    });
  });

  it('recognizes codec errors', () => {
    expect(isCodecError(new EmptyDataError())).toBe(true);
    expect(isCodecError(new Error('plain'))).toBe(false);
    expect(isCodecError('EMPTY_DATA')).toBe(false);
  });
});
