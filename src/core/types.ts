/**
 * Core type definitions for evm-calldata
 */

// Hex string type (0x prefixed)
export type Hex = `0x${string}`;

// Address is a 20-byte hex string
export type Address = Hex & { readonly __brand: 'Address' };

// Hash is a 32-byte hex string
export type Hash = Hex & { readonly __brand: 'Hash' };

// Raw bytes or their 0x-prefixed hex form
export type BytesLike = Uint8Array | Hex;
