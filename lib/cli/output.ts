/**
 * Text rendering of query results. Every amount shown is derived from the
 * raw integer value at print time.
 */

import { blockTagToString } from '../validation/params';
import type {
  BalanceResult,
  BlockInfo,
  CredentialsView,
  GasPrice,
  NonceResult,
  PriceQuote,
  TransactionHistory,
  TransactionLookup,
  TransactionSummary,
} from '../query/types';
import { formatBalance, formatCryptoPrice, formatFiatAmount, formatWalletAddress } from '../../utils/format';

export function formatCredentials(view: CredentialsView): string {
  return [
    `Address:      ${view.address ?? 'Not set'}`,
    `Node key:     ${view.nodeKeyConfigured ? 'configured' : 'Not set'}`,
    `Explorer key: ${view.scanKeyConfigured ? 'configured' : 'Not set'}`,
    `Stored in:    ${view.location}`,
  ].join('\n');
}

export function formatBalanceResult(result: BalanceResult): string {
  return `Balance of ${result.address} at ${blockTagToString(result.block)} (${result.network}): ${formatBalance(result.balance)}`;
}

export function formatNonceResult(result: NonceResult): string {
  return `Nonce of ${result.address} at ${blockTagToString(result.block)} (${result.network}): ${result.nonce}`;
}

export function formatGasPrice(result: GasPrice): string {
  return `Gas price (${result.network}): ${formatBalance(result.price)}`;
}

/**
 * Prices of at least one unit are grouped ("2,400.51"); smaller ones use
 * the collapsed-zero notation ("0.0₄7466").
 */
export function formatPriceQuote(quote: PriceQuote): string {
  const value = Number(quote.amount);
  const amount = value >= 1 ? formatFiatAmount(quote.amount) : formatCryptoPrice(value);
  return `${quote.coin} price: ${amount} ${quote.currency.toUpperCase()}`;
}

// =============================================================================
// Transactions
// =============================================================================

/** "2023-11-14 22:13:20 UTC" */
export function formatTimestamp(unixSeconds: number): string {
  return `${new Date(unixSeconds * 1000).toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

function counterparty(tx: TransactionSummary): string {
  switch (tx.direction) {
    case 'self':
      return 'to self';
    case 'out':
      return tx.to === null ? 'contract creation' : `to ${formatWalletAddress(tx.to)}`;
    case 'in':
      return `from ${formatWalletAddress(tx.from)}`;
  }
}

/** "gas 21000 @ 25 gwei", or whichever half the explorer reported */
function gasSpent(tx: TransactionSummary): string | null {
  const parts: string[] = [];
  if (tx.gasUsed !== null) parts.push(`gas ${tx.gasUsed.toString()}`);
  if (tx.gasPrice !== null) parts.push(`@ ${formatBalance(tx.gasPrice)}`);
  return parts.length > 0 ? parts.join(' ') : null;
}

export function formatTransactionRow(tx: TransactionSummary): string {
  const failed = tx.status === 'failed' ? ' [failed]' : '';
  const columns = [formatTimestamp(tx.timestamp), tx.direction.padEnd(4), formatBalance(tx.value), counterparty(tx)];
  const gas = gasSpent(tx);
  if (gas !== null) columns.push(gas);
  return `${columns.join('  ')}  ${tx.hash}${failed}`;
}

export function formatTransactionHistory(history: TransactionHistory): string {
  if (history.transactions.length === 0) {
    return `No transactions found for ${history.address} on ${history.network}`;
  }
  const order = history.sort === 'asc' ? 'oldest first' : 'newest first';
  return [
    `Transactions of ${history.address} (${history.network}, ${order}):`,
    ...history.transactions.map(formatTransactionRow),
  ].join('\n');
}

function field(label: string, value: string, width = 12): string {
  return `  ${`${label}:`.padEnd(width)}${value}`;
}

export function formatTransactionLookup(lookup: TransactionLookup): string {
  if (!lookup.found) {
    return `Transaction ${lookup.hash} not found on ${lookup.network}`;
  }

  const lines = [
    `Transaction ${lookup.hash} (${lookup.network})`,
    field('Status', lookup.state),
    field('Block', lookup.blockNumber === null ? 'pending' : lookup.blockNumber.toString()),
    field('From', lookup.from),
    field('To', lookup.to ?? '(contract creation)'),
    field('Value', formatBalance(lookup.value)),
    field('Nonce', lookup.nonce.toString()),
    field('Gas limit', lookup.gasLimit.toString()),
  ];
  if (lookup.gasPrice !== null) lines.push(field('Gas price', formatBalance(lookup.gasPrice)));
  if (lookup.gasUsed !== null) lines.push(field('Gas used', lookup.gasUsed.toString()));
  if (lookup.contractAddress !== null) lines.push(field('Contract', lookup.contractAddress));
  lines.push(field('Input', lookup.input === '0x' ? '(none)' : lookup.input));
  return lines.join('\n');
}

// =============================================================================
// Blocks
// =============================================================================

export function formatBlockInfo(block: BlockInfo): string {
  const lines = [
    `Latest block (${block.network})`,
    field('Number', block.number.toString(), 14),
    field('Hash', block.hash, 14),
    field('Parent hash', block.parentHash, 14),
    field('Timestamp', formatTimestamp(block.timestamp), 14),
    field('Miner', block.miner, 14),
    field('Gas used', `${block.gasUsed.toString()} / ${block.gasLimit.toString()}`, 14),
  ];
  if (block.baseFee !== null) lines.push(field('Base fee', formatBalance(block.baseFee), 14));
  lines.push(field('Transactions', block.transactionCount.toString(), 14));
  return lines.join('\n');
}
