/**
 * evm-calldata
 * Contract call-data encoding and decoding for EVM chains
 */

export * from './core/index.js';
export * from './protocol/index.js';
export * from './tokens/index.js';
