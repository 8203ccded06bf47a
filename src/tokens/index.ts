/**
 * Tokens module
 * Call helpers for the ERC-20 and ERC-721 standards
 */

export { ERC20Token, ERC20_SELECTORS } from './erc20.js';
export type { ERC20TokenInfo } from './erc20.js';

export { ERC721Token, ERC721_SELECTORS } from './erc721.js';
export type { ERC721TokenInfo } from './erc721.js';
