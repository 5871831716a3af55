/**
 * Parameter validation. Pure functions: each returns the canonical value or
 * throws a QueryError whose kind says exactly what was wrong.
 */

import { getAddress, type Address, type Hex } from 'viem';
import {
  invalidFormatError,
  invalidValueError,
  outOfRangeError,
  unknownSymbolError,
} from '../errors';
import { MAX_TRANSACTION_LIMIT } from '../config';
import { NETWORK_NAMES, isNetworkName, type NetworkName } from '../chains';
import marketSymbols from '../data/market-symbols.json';

// =============================================================================
// Types
// =============================================================================

export const BLOCK_TAGS = ['latest', 'pending', 'earliest', 'safe', 'finalized'] as const;

export type SymbolicBlockTag = typeof BLOCK_TAGS[number];

export type BlockTag =
  | { kind: 'tag'; tag: SymbolicBlockTag }
  | { kind: 'number'; number: bigint };

export type SortOrder = 'asc' | 'desc';

export interface MarketPair {
  /** CoinGecko coin id, e.g. "ethereum" */
  coin: string;
  /** CoinGecko vs_currency code, e.g. "usd" */
  currency: string;
}

const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;
const TX_HASH_RE = /^0x[0-9a-fA-F]{64}$/;
const DECIMAL_RE = /^\d+$/;
const HEX_QUANTITY_RE = /^0x[0-9a-fA-F]+$/;
const INTEGER_RE = /^[+-]?\d+$/;

const SORT_ALIASES: Record<string, SortOrder> = {
  asc: 'asc',
  ascending: 'asc',
  desc: 'desc',
  descending: 'desc',
};

const COIN_IDS = new Set(marketSymbols.coins.map((c) => c.id));
const COIN_ID_BY_SYMBOL = new Map(marketSymbols.coins.map((c): [string, string] => [c.symbol, c.id]));
const CURRENCIES = new Set(marketSymbols.currencies);

// =============================================================================
// Validators
// =============================================================================

/**
 * Accept a 20-byte hex address in any letter case; return its checksummed form.
 * Checksummed input is not required to carry a valid checksum.
 */
export function validateAddress(value: string): Address {
  if (!ADDRESS_RE.test(value)) {
    throw invalidFormatError('address', value, '0x followed by 40 hex characters');
  }
  return getAddress(value.toLowerCase());
}

function isTransactionHash(value: string): value is Hex {
  return TX_HASH_RE.test(value);
}

export function validateTransactionHash(value: string): Hex {
  const normalized = value.trim().toLowerCase();
  if (!isTransactionHash(normalized)) {
    throw invalidFormatError('transaction hash', value, '0x followed by 64 hex characters');
  }
  return normalized;
}

/**
 * A symbolic tag (latest, pending, ...) or a non-negative block height in
 * decimal or 0x-hex form.
 */
export function validateBlockTag(value: string): BlockTag {
  const normalized = value.trim().toLowerCase();
  const tag = BLOCK_TAGS.find((t) => t === normalized);
  if (tag) return { kind: 'tag', tag };

  if (DECIMAL_RE.test(normalized) || HEX_QUANTITY_RE.test(normalized)) {
    return { kind: 'number', number: BigInt(normalized) };
  }

  throw invalidFormatError('block', value, `one of ${BLOCK_TAGS.join(', ')} or a non-negative block number`);
}

/**
 * Positive integer no larger than `max`. Out-of-bounds values are rejected, never clamped.
 */
export function validateLimit(value: number | string, max: number = MAX_TRANSACTION_LIMIT): number {
  let n: number;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!INTEGER_RE.test(trimmed)) {
      throw invalidFormatError('limit', value, 'a whole number');
    }
    n = Number(trimmed);
  } else {
    n = value;
  }

  if (Number.isNaN(n)) {
    throw invalidFormatError('limit', String(value), 'a whole number');
  }
  if (n <= 0 || n > max) {
    throw outOfRangeError('limit', n, 1, max);
  }
  if (!Number.isInteger(n)) {
    throw invalidFormatError('limit', String(value), 'a whole number');
  }
  return n;
}

export function validateSort(value: string): SortOrder {
  const sort = SORT_ALIASES[value.trim().toLowerCase()];
  if (!sort) {
    throw invalidValueError('sort', value, Object.keys(SORT_ALIASES));
  }
  return sort;
}

/**
 * Check coin and currency against the known CoinGecko symbols. A coin may be given
 * by id ("ethereum") or ticker ("ETH"); the id is returned.
 */
export function validateCoinCurrency(coin: string, currency: string): MarketPair {
  const coinKey = coin.trim().toLowerCase();
  const coinId = COIN_IDS.has(coinKey) ? coinKey : COIN_ID_BY_SYMBOL.get(coinKey);
  if (!coinId) {
    throw unknownSymbolError('coin', coin);
  }

  const currencyKey = currency.trim().toLowerCase();
  if (!CURRENCIES.has(currencyKey)) {
    throw unknownSymbolError('currency', currency);
  }

  return { coin: coinId, currency: currencyKey };
}

export function validateNetwork(value: string): NetworkName {
  const normalized = value.trim().toLowerCase();
  if (!isNetworkName(normalized)) {
    throw invalidValueError('network', value, NETWORK_NAMES);
  }
  return normalized;
}

/** Text form of a block tag, as used in output and JSON-RPC params. */
export function blockTagToString(block: BlockTag): string {
  return block.kind === 'tag' ? block.tag : block.number.toString();
}
