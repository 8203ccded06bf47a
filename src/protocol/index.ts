/**
 * Protocol layer
 * Transactions and event logs on top of the core codec
 */

// Transactions
export {
  BASE_TX_GAS,
  ZERO_BYTE_GAS,
  NONZERO_BYTE_GAS,
  DEFAULT_GAS_PRICE,
  estimateIntrinsicGas,
  createTransaction,
  calculateFee,
  totalCost,
  serializeUnsigned,
  transactionHash,
} from './transaction.js';
export type { Transaction, TransactionRequest } from './transaction.js';

// Events
export {
  eventSignatureTopic,
  knownTopics,
  EventFilter,
  matchesFilter,
  parseTransferEvent,
  parseApprovalEvent,
  parseNftTransferEvent,
  parseNftApprovalEvent,
  parseApprovalForAllEvent,
  DEFAULT_MAILBOX_SIZE,
  EventSubscription,
  EventMonitor,
} from './events.js';
export type {
  EventLog,
  BlockTag,
  TransferEvent,
  ApprovalEvent,
  NftTransferEvent,
  NftApprovalEvent,
  ApprovalForAllEvent,
  EventHandler,
  SubscribeOptions,
  EventMonitorConfig,
} from './events.js';
