/**
 * Shared provider contract. Each external service is an adapter made of
 * operations; an operation knows how to build its wire request and how to
 * parse that service's response into a normalized result.
 */

import type { Address, Hex } from 'viem';
import type { BlockTag, SortOrder } from '../validation/params';

export type ServiceName = 'infura' | 'etherscan' | 'coingecko';

export interface WireRequest {
  method: 'GET' | 'POST';
  url: string;
  headers?: Record<string, string>;
  /** JSON-serializable body (POST only) */
  body?: unknown;
}

export interface RawResponse {
  status: number;
  ok: boolean;
  /** Parsed JSON body; undefined when the body was empty */
  body: unknown;
}

export interface ProviderOperation<P, R> {
  readonly service: ServiceName;
  readonly name: string;
  buildRequest(params: P): WireRequest;
  /** Throws QueryError (ProviderRejected, ProtocolMismatch, UnknownSymbol, Unavailable) */
  parseResponse(raw: RawResponse, params: P): R;
}

// =============================================================================
// Node provider
// =============================================================================

export interface AccountAtBlock {
  address: Address;
  block: BlockTag;
}

/** Raw chain view of a transaction plus its receipt, before display normalization. */
export type RawTransactionLookup =
  | { found: false; hash: Hex }
  | {
      found: true;
      hash: Hex;
      from: Address;
      to: Address | null;
      value: bigint;
      nonce: number;
      blockNumber: bigint | null;
      /** Gas limit set by the sender */
      gas: bigint;
      /** Effective price once mined; absent on some pending fee-market transactions */
      gasPrice: bigint | null;
      input: Hex;
      receipt: {
        status: 'success' | 'failed';
        gasUsed: bigint;
        contractAddress: Address | null;
      } | null;
    };

export interface RawBlock {
  number: bigint;
  hash: Hex;
  parentHash: Hex;
  /** Unix seconds */
  timestamp: number;
  miner: Address;
  gasUsed: bigint;
  gasLimit: bigint;
  /** null before London */
  baseFeePerGas: bigint | null;
  transactionCount: number;
}

export interface NodeProviderAdapter {
  readonly service: ServiceName;
  readonly balance: ProviderOperation<AccountAtBlock, bigint>;
  readonly nonce: ProviderOperation<AccountAtBlock, number>;
  readonly transactionStatus: ProviderOperation<{ hash: Hex }, RawTransactionLookup>;
  readonly gasPrice: ProviderOperation<Record<string, never>, bigint>;
  readonly latestBlock: ProviderOperation<Record<string, never>, RawBlock>;
}

// =============================================================================
// Explorer
// =============================================================================

export interface HistoryParams {
  address: Address;
  limit: number;
  sort: SortOrder;
}

export interface RawHistoryEntry {
  hash: Hex;
  from: Address;
  to: Address | null;
  value: bigint;
  timestamp: number;
  blockNumber: bigint;
  confirmations: number;
  failed: boolean;
  gasUsed: bigint | null;
  gasPrice: bigint | null;
}

export interface ExplorerAdapter {
  readonly service: ServiceName;
  readonly transactionHistory: ProviderOperation<HistoryParams, RawHistoryEntry[]>;
}

// =============================================================================
// Market data
// =============================================================================

export interface SpotPriceParams {
  coin: string;
  currency: string;
}

export interface MarketAdapter {
  readonly service: ServiceName;
  /** Price as a positive decimal string */
  readonly spotPrice: ProviderOperation<SpotPriceParams, string>;
}
