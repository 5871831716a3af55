/**
 * Normalized query results handed to the CLI formatter.
 */

import type { Address, Hex } from 'viem';
import type { NetworkName } from '../chains';
import type { BlockTag, SortOrder } from '../validation/params';

/** Amount in the smallest on-chain unit. Display text is derived with formatBalance(). */
export interface Balance {
  wei: bigint;
  symbol: string;
  decimals: number;
}

export interface CredentialsView {
  address?: string;
  nodeKeyConfigured: boolean;
  scanKeyConfigured: boolean;
  location: string;
}

export interface BalanceResult {
  network: NetworkName;
  address: Address;
  block: BlockTag;
  balance: Balance;
}

export interface NonceResult {
  network: NetworkName;
  address: Address;
  block: BlockTag;
  nonce: number;
}

export interface TransactionSummary {
  hash: Hex;
  from: Address;
  /** null for contract creation */
  to: Address | null;
  value: Balance;
  /** Unix seconds */
  timestamp: number;
  blockNumber: bigint;
  confirmations: number;
  status: 'success' | 'failed';
  /** Relative to the queried address */
  direction: 'in' | 'out' | 'self';
  gasUsed: bigint | null;
  gasPrice: Balance | null;
}

export interface TransactionHistory {
  network: NetworkName;
  address: Address;
  sort: SortOrder;
  limit: number;
  transactions: TransactionSummary[];
}

export type TransactionLookup =
  | { found: false; network: NetworkName; hash: Hex }
  | {
      found: true;
      network: NetworkName;
      hash: Hex;
      from: Address;
      to: Address | null;
      value: Balance;
      nonce: number;
      blockNumber: bigint | null;
      state: 'pending' | 'success' | 'failed';
      gasLimit: bigint;
      gasPrice: Balance | null;
      gasUsed: bigint | null;
      contractAddress: Address | null;
      input: Hex;
    };

export interface BlockInfo {
  network: NetworkName;
  number: bigint;
  hash: Hex;
  parentHash: Hex;
  /** Unix seconds */
  timestamp: number;
  miner: Address;
  gasUsed: bigint;
  gasLimit: bigint;
  baseFee: Balance | null;
  transactionCount: number;
}

export interface PriceQuote {
  coin: string;
  currency: string;
  /** Positive decimal string */
  amount: string;
}

export interface GasPrice {
  network: NetworkName;
  price: Balance;
}

export interface AccountQuery {
  address?: string;
  block?: string;
}

export interface HistoryQuery {
  address?: string;
  limit?: number | string;
  sort?: string;
}

export interface PriceQuery {
  coin?: string;
  currency?: string;
}
