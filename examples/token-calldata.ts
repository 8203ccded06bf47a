/**
 * Token Call Data Example
 *
 * Demonstrates building and reading contract call data offline:
 * - ERC-20 transfer call data and its intrinsic gas
 * - Generic calls from a signature string
 * - Decoding return data with Result types
 * - Routing Transfer logs through an EventMonitor
 *
 * Run: npx tsx examples/token-calldata.ts
 */

import {
  ERC20Token,
  EventFilter,
  EventMonitor,
  createConsoleLogger,
  createTransaction,
  decodeCall,
  encodeArguments,
  encodeFunctionData,
  knownTopics,
  matchResult,
  param,
  parseTransferEvent,
  stringType,
  stringValue,
  tryDecodeResult,
  uint,
  addressType,
  type EventLog,
  type Hash,
} from '../src/index.js';

const TOKEN = '0x00000000000000000000000000000000000000c0';
const RECIPIENT = '0x0000000000000000000000000000000000000001';

async function main() {
  const logger = createConsoleLogger('info');

  // ============ ERC-20 ============
  const token = new ERC20Token({ address: TOKEN, name: 'Test Dollar', symbol: 'TUSD', decimals: 6 });
  const amount = token.parseAmount('1');
  const data = token.encodeTransfer(RECIPIENT, amount);
  console.log(`transfer(${RECIPIENT}, ${token.formatAmount(amount)} ${token.symbol})`);
  console.log(`  call data: ${data}`);

  const tx = createTransaction({ to: TOKEN, data });
  console.log(`  intrinsic gas: ${tx.gasLimit}`);

  // The same call, from a signature string
  console.log(`  matches signature form: ${encodeFunctionData('transfer(address to, uint256 amount)', [RECIPIENT, amount]) === data}`);

  const [to, decodedAmount] = decodeCall('transfer', [param('to', addressType), param('amount', uint())], data);
  console.log(`  decoded: ${to?.kind}, ${decodedAmount?.kind === 'int' ? decodedAmount.value : '?'}`);

  // ============ Return Data ============
  const nameResult = encodeArguments([param('name', stringType)], [stringValue(token.name)]);
  const message = matchResult(tryDecodeResult([stringType], nameResult), {
    ok: ([name]) => `name() returned ${name?.kind === 'string' ? name.value : '?'}`,
    err: (error) => `decode failed: ${error.code}`,
  });
  console.log(`\n${message}`);

  const empty = tryDecodeResult([uint()], '0x');
  if (!empty.ok) console.log(`empty return data: ${empty.error.code} (${empty.error.suggestion})`);

  // ============ Events ============
  const monitor = new EventMonitor({ logger });
  const subscription = monitor.subscribe(new EventFilter().addAddress(TOKEN).addTopic(knownTopics.transfer()));
  monitor.addEventHandler(knownTopics.transfer(), (log) => {
    const transfer = parseTransferEvent(log);
    console.log(`handler saw ${token.formatAmount(transfer.amount)} ${token.symbol} to ${transfer.to}`);
  });

  const log: EventLog = {
    address: tx.to,
    topics: [knownTopics.transfer(), topicFor(TOKEN), topicFor(RECIPIENT)],
    data: `0x${amount.toString(16).padStart(64, '0')}`,
    blockNumber: 1n,
    transactionHash: topicFor(TOKEN),
    transactionIndex: 0,
    blockHash: topicFor(RECIPIENT),
    logIndex: 0,
    removed: false,
  };
  monitor.processEvent(log);

  const received = await subscription.next();
  console.log(`\nsubscription received log ${received?.logIndex} from block ${received?.blockNumber}`);
  monitor.unsubscribe(subscription.id);
}

function topicFor(address: string): Hash {
  return `0x${address.slice(2).padStart(64, '0')}` as Hash;
}

main().catch(console.error);
