/**
 * Event logs
 * Filters, standard token event parsing and an in-process event monitor
 */

import type { Address, Hash, Hex } from '../core/types.js';
import type { TypeTag } from '../core/abi-types.js';
import { param, uint } from '../core/abi-types.js';
import { formatSignature, decodeResult } from '../core/abi.js';
import { eventTopic } from '../core/hash.js';
import { hexToBytes } from '../core/hex.js';
import { addressFromWord, wordToUint } from '../core/words.js';
import { bytesToAddress, parseAddress } from '../core/address.js';
import { InvalidConfigError, TruncatedDataError } from '../core/errors.js';
import { type Logger, noopLogger, createPrefixedLogger } from '../core/logger.js';

export interface EventLog {
  address: Address;
  topics: Hash[];
  data: Hex;
  blockNumber: bigint;
  transactionHash: Hash;
  transactionIndex: number;
  blockHash: Hash;
  logIndex: number;
  removed: boolean;
}

export type BlockTag = bigint | 'latest' | 'pending';

// ============ Topics ============

/**
 * Topic 0 of an event: keccak256 of its canonical signature
 */
export function eventSignatureTopic(name: string, types: readonly TypeTag[]): Hash {
  return eventTopic(formatSignature(name, types.map((type, i) => param(`arg${i}`, type))));
}

function memoize<T>(compute: () => T): () => T {
  let cached: { value: T } | undefined;
  return () => {
    if (!cached) cached = { value: compute() };
    return cached.value;
  };
}

/**
 * Well-known event topics, hashed on first use.
 * ERC-20 and ERC-721 share the Transfer and Approval signatures.
 */
export const knownTopics = {
  transfer: memoize(() => eventTopic('Transfer(address,address,uint256)')),
  approval: memoize(() => eventTopic('Approval(address,address,uint256)')),
  approvalForAll: memoize(() => eventTopic('ApprovalForAll(address,address,bool)')),
} as const;

// ============ Filters ============

/**
 * Log filter. Addresses are OR-ed; each topic position holds
 * OR-ed options, and an empty position matches anything.
 */
export class EventFilter {
  fromBlock: BlockTag | undefined;
  toBlock: BlockTag | undefined;
  readonly addresses: string[] = [];
  readonly topics: string[][] = [];

  setFromBlock(block: bigint): this {
    this.fromBlock = block;
    return this;
  }

  setToBlock(block: bigint): this {
    this.toBlock = block;
    return this;
  }

  setLatestBlock(): this {
    this.toBlock = 'latest';
    return this;
  }

  setPendingBlock(): this {
    this.toBlock = 'pending';
    return this;
  }

  addAddress(address: string): this {
    this.addresses.push(parseAddress(address).toLowerCase());
    return this;
  }

  /**
   * Add an option for topic 0 (the event signature)
   */
  addTopic(topic: string): this {
    return this.addIndexedParameter(0, topic);
  }

  /**
   * Add an option for the topic at `position`
   */
  addIndexedParameter(position: number, value: string): this {
    if (!Number.isSafeInteger(position) || position < 0) {
      throw new InvalidConfigError('topic position', position, 'must be a non-negative integer');
    }
    while (this.topics.length <= position) {
      this.topics.push([]);
    }
    const options = this.topics[position];
    if (options === undefined) {
      throw new InvalidConfigError('topic position', position, 'no topic slot');
    }
    options.push(value.toLowerCase());
    return this;
  }
}

/**
 * Check a log against a filter. Numeric block bounds are inclusive;
 * 'latest' and 'pending' do not bound.
 */
export function matchesFilter(log: EventLog, filter: EventFilter): boolean {
  if (typeof filter.fromBlock === 'bigint' && log.blockNumber < filter.fromBlock) {
    return false;
  }
  if (typeof filter.toBlock === 'bigint' && log.blockNumber > filter.toBlock) {
    return false;
  }

  if (filter.addresses.length > 0 && !filter.addresses.includes(log.address.toLowerCase())) {
    return false;
  }

  for (let i = 0; i < filter.topics.length; i++) {
    const topic = log.topics[i];
    if (topic === undefined) return false;

    const options = filter.topics[i] ?? [];
    if (options.length > 0 && !options.includes(topic.toLowerCase())) {
      return false;
    }
  }

  return true;
}

// ============ Standard Events ============

export interface TransferEvent {
  from: Address;
  to: Address;
  amount: bigint;
}

export interface ApprovalEvent {
  owner: Address;
  spender: Address;
  amount: bigint;
}

export interface NftTransferEvent {
  from: Address;
  to: Address;
  tokenId: bigint;
}

export interface NftApprovalEvent {
  owner: Address;
  approved: Address;
  tokenId: bigint;
}

export interface ApprovalForAllEvent {
  owner: Address;
  operator: Address;
  approved: boolean;
}

function topicWord(log: EventLog, index: number, needed: number): Uint8Array {
  const topic = log.topics[index];
  if (topic === undefined) {
    throw new TruncatedDataError(`topic ${index}`, needed * 32, log.topics.length * 32);
  }
  return hexToBytes(topic);
}

function topicAddress(log: EventLog, index: number, needed: number): Address {
  return bytesToAddress(addressFromWord(topicWord(log, index, needed)));
}

/**
 * Amount from the data field; empty data reads as zero
 */
function dataAmount(log: EventLog): bigint {
  if (log.data === '0x') return 0n;
  const [amount] = decodeResult([uint(256)], log.data);
  return amount?.kind === 'int' ? amount.value : 0n;
}

/**
 * ERC-20 Transfer(address indexed from, address indexed to, uint256 value)
 */
export function parseTransferEvent(log: EventLog): TransferEvent {
  return {
    from: topicAddress(log, 1, 3),
    to: topicAddress(log, 2, 3),
    amount: dataAmount(log),
  };
}

/**
 * ERC-20 Approval(address indexed owner, address indexed spender, uint256 value)
 */
export function parseApprovalEvent(log: EventLog): ApprovalEvent {
  return {
    owner: topicAddress(log, 1, 3),
    spender: topicAddress(log, 2, 3),
    amount: dataAmount(log),
  };
}

/**
 * ERC-721 Transfer, where the token id is the third indexed topic
 */
export function parseNftTransferEvent(log: EventLog): NftTransferEvent {
  return {
    from: topicAddress(log, 1, 4),
    to: topicAddress(log, 2, 4),
    tokenId: wordToUint(topicWord(log, 3, 4)),
  };
}

/**
 * ERC-721 Approval(address indexed owner, address indexed approved, uint256 indexed tokenId).
 * Shares topic 0 with the ERC-20 Approval; the token id is the third indexed topic.
 */
export function parseNftApprovalEvent(log: EventLog): NftApprovalEvent {
  return {
    owner: topicAddress(log, 1, 4),
    approved: topicAddress(log, 2, 4),
    tokenId: wordToUint(topicWord(log, 3, 4)),
  };
}

/**
 * ERC-721 ApprovalForAll(address indexed owner, address indexed operator, bool approved)
 */
export function parseApprovalForAllEvent(log: EventLog): ApprovalForAllEvent {
  const data = hexToBytes(log.data);
  return {
    owner: topicAddress(log, 1, 3),
    operator: topicAddress(log, 2, 3),
    approved: data.length >= 32 && data[31] !== 0,
  };
}

// ============ Monitor ============

export const DEFAULT_MAILBOX_SIZE = 100;

export type EventHandler = (log: EventLog) => void | Promise<void>;

export interface SubscribeOptions {
  mailboxSize?: number;
}

export interface EventMonitorConfig {
  logger?: Logger;
  defaultMailboxSize?: number;
}

let subscriptionSeq = 0;

/**
 * A filter plus a bounded mailbox. Delivery never blocks: when the
 * mailbox is full the event is dropped and counted.
 */
export class EventSubscription {
  readonly id: string;
  readonly filter: EventFilter;
  readonly createdAt: Date;
  readonly capacity: number;
  private readonly mailbox: EventLog[] = [];
  private readonly waiters: Array<(log: EventLog | undefined) => void> = [];
  private droppedCount = 0;
  private running = true;

  constructor(filter: EventFilter, capacity = DEFAULT_MAILBOX_SIZE) {
    if (!Number.isSafeInteger(capacity) || capacity < 1) {
      throw new InvalidConfigError('mailbox size', capacity, 'must be a positive integer');
    }
    subscriptionSeq += 1;
    this.id = `sub_${Date.now()}_${subscriptionSeq}`;
    this.filter = filter;
    this.createdAt = new Date();
    this.capacity = capacity;
  }

  get active(): boolean {
    return this.running;
  }

  /** Events waiting to be read */
  get size(): number {
    return this.mailbox.length;
  }

  /** Events dropped because the mailbox was full */
  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Offer an event. Returns false when inactive or dropped.
   */
  deliver(log: EventLog): boolean {
    if (!this.running) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(log);
      return true;
    }

    if (this.mailbox.length >= this.capacity) {
      this.droppedCount += 1;
      return false;
    }
    this.mailbox.push(log);
    return true;
  }

  /**
   * Take the next event without waiting
   */
  poll(): EventLog | undefined {
    return this.mailbox.shift();
  }

  /**
   * Take every queued event
   */
  drain(): EventLog[] {
    return this.mailbox.splice(0, this.mailbox.length);
  }

  /**
   * Wait for the next event; resolves undefined once stopped and empty
   */
  next(): Promise<EventLog | undefined> {
    const queued = this.mailbox.shift();
    if (queued !== undefined || !this.running) {
      return Promise.resolve(queued);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /**
   * Stop delivery. Queued events stay readable.
   */
  stop(): void {
    this.running = false;
    for (const waiter of this.waiters.splice(0, this.waiters.length)) {
      waiter(undefined);
    }
  }
}

/**
 * Routes logs to matching subscriptions and to handlers keyed by topic 0
 */
export class EventMonitor {
  private readonly subscriptions = new Map<string, EventSubscription>();
  private readonly handlers = new Map<string, EventHandler[]>();
  private readonly logger: Logger;
  private readonly defaultMailboxSize: number;

  constructor(config: EventMonitorConfig = {}) {
    this.logger = createPrefixedLogger(config.logger ?? noopLogger, 'EventMonitor');
    this.defaultMailboxSize = config.defaultMailboxSize ?? DEFAULT_MAILBOX_SIZE;
  }

  get subscriptionCount(): number {
    return this.subscriptions.size;
  }

  subscribe(filter: EventFilter, options: SubscribeOptions = {}): EventSubscription {
    const subscription = new EventSubscription(filter, options.mailboxSize ?? this.defaultMailboxSize);
    this.subscriptions.set(subscription.id, subscription);
    this.logger.debug('Subscribed', { id: subscription.id, mailboxSize: subscription.capacity });
    return subscription;
  }

  /**
   * Stop and remove a subscription. Returns false for unknown ids.
   */
  unsubscribe(id: string): boolean {
    const subscription = this.subscriptions.get(id);
    if (!subscription) return false;

    subscription.stop();
    this.subscriptions.delete(id);
    this.logger.debug('Unsubscribed', { id });
    return true;
  }

  /**
   * Register a handler for logs whose topic 0 equals `topic`.
   * Returns a function that removes it.
   */
  addEventHandler(topic: string, handler: EventHandler): () => void {
    const key = topic.toLowerCase();
    const list = this.handlers.get(key) ?? [];
    list.push(handler);
    this.handlers.set(key, list);

    return () => {
      const current = this.handlers.get(key);
      if (!current) return;
      const index = current.indexOf(handler);
      if (index >= 0) current.splice(index, 1);
      if (current.length === 0) this.handlers.delete(key);
    };
  }

  /**
   * Deliver a log to every active matching subscription and schedule
   * its topic handlers. Never blocks and never throws for handler failures.
   */
  processEvent(log: EventLog): void {
    for (const subscription of this.subscriptions.values()) {
      if (!subscription.active || !matchesFilter(log, subscription.filter)) continue;

      if (!subscription.deliver(log)) {
        this.logger.warn('Mailbox full, event dropped', {
          id: subscription.id,
          dropped: subscription.dropped,
          transactionHash: log.transactionHash,
        });
      }
    }

    const topic = log.topics[0];
    if (topic === undefined) return;

    for (const handler of this.handlers.get(topic.toLowerCase()) ?? []) {
      Promise.resolve()
        .then(() => handler(log))
        .catch((error: unknown) => {
          this.logger.error('Event handler failed', {
            topic,
            error: error instanceof Error ? error.message : String(error),
          });
        });
    }
  }
}
