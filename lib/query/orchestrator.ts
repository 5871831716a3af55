/**
 * Query orchestrator: the single entry point for every read the CLI performs.
 *
 * Each operation loads the stored credentials it needs, resolves explicit arguments
 * against stored defaults, validates, checks the required key, then makes exactly
 * one adapter call. Nothing here retries; that is the caller's decision.
 */

import type { Address } from 'viem';
import { getNativeCurrency, type NetworkName } from '../chains';
import type { Credentials, CredentialStore, CredentialsPatch } from '../credentials/store';
import { invalidFormatError, missingCredentialError, missingParameterError } from '../errors';
import { runOperation, type ProviderFactories, type TransportOptions } from '../providers';
import type { RawHistoryEntry, RawTransactionLookup } from '../providers/types';
import {
  validateAddress,
  validateBlockTag,
  validateCoinCurrency,
  validateLimit,
  validateSort,
  validateTransactionHash,
  type SortOrder,
} from '../validation/params';
import type {
  AccountQuery,
  Balance,
  BalanceResult,
  BlockInfo,
  CredentialsView,
  GasPrice,
  HistoryQuery,
  NonceResult,
  PriceQuery,
  PriceQuote,
  TransactionHistory,
  TransactionLookup,
  TransactionSummary,
} from './types';

// =============================================================================
// CONFIGURATION
// =============================================================================

export const DEFAULT_BALANCE_BLOCK = 'latest';
export const DEFAULT_NONCE_BLOCK = 'latest';
export const DEFAULT_TRANSACTION_LIMIT = 10;
export const DEFAULT_SORT: SortOrder = 'desc';
export const DEFAULT_COIN = 'ethereum';
export const DEFAULT_CURRENCY = 'usd';

const SET_ADDRESS_HINT = "Pass --address or run 'ethq account set --address <address>'.";
const SET_NODE_KEY_HINT = "Run 'ethq account set --nodekey <key>'.";
const SET_SCAN_KEY_HINT = "Run 'ethq account set --scankey <key>'.";

export interface QueryRuntime {
  network: NetworkName;
  maxTransactionLimit: number;
  transport: TransportOptions;
}

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class QueryOrchestrator {
  constructor(
    private readonly store: CredentialStore,
    private readonly providers: ProviderFactories,
    private readonly runtime: QueryRuntime,
  ) {}

  get network(): NetworkName {
    return this.runtime.network;
  }

  // ---------------------------------------------------------------------------
  // Credentials
  // ---------------------------------------------------------------------------

  async showCredentials(): Promise<CredentialsView> {
    return this.toView(await this.store.get());
  }

  /**
   * Merge a patch into the stored credentials. A supplied address is validated
   * and stored in checksummed form; keys are trimmed and must not be blank.
   * An empty patch only reports current state.
   */
  async setCredentials(patch: CredentialsPatch): Promise<CredentialsView> {
    const normalized: CredentialsPatch = { ...patch };
    if (typeof patch.address === 'string') {
      normalized.address = validateAddress(patch.address);
    }
    if (typeof patch.nodeKey === 'string') {
      normalized.nodeKey = validateApiKey('nodeKey', patch.nodeKey);
    }
    if (typeof patch.scanKey === 'string') {
      normalized.scanKey = validateApiKey('scanKey', patch.scanKey);
    }
    return this.toView(await this.store.set(normalized));
  }

  credentialsLocation(): string {
    return this.store.location;
  }

  // ---------------------------------------------------------------------------
  // Node provider reads
  // ---------------------------------------------------------------------------

  async balance(query: AccountQuery = {}): Promise<BalanceResult> {
    const credentials = await this.store.get();
    const address = this.resolveAddress(query.address, credentials);
    const block = validateBlockTag(query.block ?? DEFAULT_BALANCE_BLOCK);
    const node = this.providers.node(requireNodeKey(credentials));

    const wei = await runOperation(node.balance, { address, block }, this.runtime.transport);
    return { network: this.network, address, block, balance: this.toBalance(wei) };
  }

  async nonce(query: AccountQuery = {}): Promise<NonceResult> {
    const credentials = await this.store.get();
    const address = this.resolveAddress(query.address, credentials);
    const block = validateBlockTag(query.block ?? DEFAULT_NONCE_BLOCK);
    const node = this.providers.node(requireNodeKey(credentials));

    const nonce = await runOperation(node.nonce, { address, block }, this.runtime.transport);
    return { network: this.network, address, block, nonce };
  }

  async transactionStatus(hash: string): Promise<TransactionLookup> {
    const credentials = await this.store.get();
    const txHash = validateTransactionHash(hash);
    const node = this.providers.node(requireNodeKey(credentials));

    const lookup = await runOperation(node.transactionStatus, { hash: txHash }, this.runtime.transport);
    return this.toLookup(lookup);
  }

  async gasPrice(): Promise<GasPrice> {
    const credentials = await this.store.get();
    const node = this.providers.node(requireNodeKey(credentials));

    const wei = await runOperation(node.gasPrice, {}, this.runtime.transport);
    return { network: this.network, price: toGwei(wei) };
  }

  async latestBlock(): Promise<BlockInfo> {
    const credentials = await this.store.get();
    const node = this.providers.node(requireNodeKey(credentials));

    const block = await runOperation(node.latestBlock, {}, this.runtime.transport);
    return {
      network: this.network,
      number: block.number,
      hash: block.hash,
      parentHash: block.parentHash,
      timestamp: block.timestamp,
      miner: block.miner,
      gasUsed: block.gasUsed,
      gasLimit: block.gasLimit,
      baseFee: block.baseFeePerGas === null ? null : toGwei(block.baseFeePerGas),
      transactionCount: block.transactionCount,
    };
  }

  // ---------------------------------------------------------------------------
  // Explorer
  // ---------------------------------------------------------------------------

  /**
   * Transaction history, sorted by timestamp and truncated to the limit here,
   * whatever order and count the explorer returned.
   */
  async transactions(query: HistoryQuery = {}): Promise<TransactionHistory> {
    const credentials = await this.store.get();
    const address = this.resolveAddress(query.address, credentials);
    const limit = validateLimit(query.limit ?? DEFAULT_TRANSACTION_LIMIT, this.runtime.maxTransactionLimit);
    const sort = validateSort(query.sort ?? DEFAULT_SORT);
    if (!credentials.scanKey) {
      throw missingCredentialError('scanKey', SET_SCAN_KEY_HINT);
    }
    const explorer = this.providers.explorer(credentials.scanKey);

    const rows = await runOperation(explorer.transactionHistory, { address, limit, sort }, this.runtime.transport);
    const transactions = sortAndTruncate(rows, sort, limit).map((row) => this.toSummary(row, address));
    return { network: this.network, address, sort, limit, transactions };
  }

  // ---------------------------------------------------------------------------
  // Market data
  // ---------------------------------------------------------------------------

  async price(query: PriceQuery = {}): Promise<PriceQuote> {
    const pair = validateCoinCurrency(query.coin ?? DEFAULT_COIN, query.currency ?? DEFAULT_CURRENCY);
    const market = this.providers.market();

    const amount = await runOperation(market.spotPrice, pair, this.runtime.transport);
    return { coin: pair.coin, currency: pair.currency, amount };
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private resolveAddress(explicit: string | undefined, credentials: Credentials): Address {
    const address = explicit ?? credentials.address;
    if (address === undefined || address === '') {
      throw missingParameterError('address', SET_ADDRESS_HINT);
    }
    return validateAddress(address);
  }

  private toBalance(wei: bigint): Balance {
    return { wei, ...getNativeCurrency(this.network) };
  }

  private toView(credentials: Credentials): CredentialsView {
    return {
      address: credentials.address,
      nodeKeyConfigured: Boolean(credentials.nodeKey),
      scanKeyConfigured: Boolean(credentials.scanKey),
      location: this.store.location,
    };
  }

  private toSummary(row: RawHistoryEntry, owner: Address): TransactionSummary {
    const fromOwner = row.from.toLowerCase() === owner.toLowerCase();
    const toOwner = row.to !== null && row.to.toLowerCase() === owner.toLowerCase();
    return {
      hash: row.hash,
      from: row.from,
      to: row.to,
      value: this.toBalance(row.value),
      timestamp: row.timestamp,
      blockNumber: row.blockNumber,
      confirmations: row.confirmations,
      status: row.failed ? 'failed' : 'success',
      direction: fromOwner && toOwner ? 'self' : fromOwner ? 'out' : 'in',
      gasUsed: row.gasUsed,
      gasPrice: row.gasPrice === null ? null : toGwei(row.gasPrice),
    };
  }

  private toLookup(lookup: RawTransactionLookup): TransactionLookup {
    if (!lookup.found) {
      return { found: false, network: this.network, hash: lookup.hash };
    }
    return {
      found: true,
      network: this.network,
      hash: lookup.hash,
      from: lookup.from,
      to: lookup.to,
      value: this.toBalance(lookup.value),
      nonce: lookup.nonce,
      blockNumber: lookup.blockNumber,
      // No receipt yet means not mined
      state: lookup.receipt ? lookup.receipt.status : 'pending',
      gasLimit: lookup.gas,
      gasPrice: lookup.gasPrice === null ? null : toGwei(lookup.gasPrice),
      gasUsed: lookup.receipt?.gasUsed ?? null,
      contractAddress: lookup.receipt?.contractAddress ?? null,
      input: lookup.input,
    };
  }
}

/** Gas prices are wei amounts shown in gwei */
function toGwei(wei: bigint): Balance {
  return { wei, symbol: 'gwei', decimals: 9 };
}

function validateApiKey(field: 'nodeKey' | 'scanKey', value: string): string {
  const key = value.trim();
  if (key === '') {
    throw invalidFormatError(field, value, 'a non-empty API key');
  }
  return key;
}

function requireNodeKey(credentials: Credentials): string {
  if (!credentials.nodeKey) {
    throw missingCredentialError('nodeKey', SET_NODE_KEY_HINT);
  }
  return credentials.nodeKey;
}

/**
 * Order by timestamp (block number breaks ties) and keep the first `limit` rows.
 */
export function sortAndTruncate<T extends { timestamp: number; blockNumber: bigint }>(
  rows: readonly T[],
  sort: SortOrder,
  limit: number,
): T[] {
  const direction = sort === 'asc' ? 1 : -1;
  return [...rows]
    .sort((a, b) => {
      if (a.timestamp !== b.timestamp) return (a.timestamp - b.timestamp) * direction;
      if (a.blockNumber === b.blockNumber) return 0;
      return (a.blockNumber < b.blockNumber ? -1 : 1) * direction;
    })
    .slice(0, limit);
}
