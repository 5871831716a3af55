/**
 * Etherscan API provider: transaction history for an address (v2 multichain endpoint).
 */

import { getAddress, type Address, type Hex } from 'viem';
import { z } from 'zod';
import { protocolMismatchError, providerRejectedError } from '../errors';
import { unrecognizedErrorResponse } from './http';
import type { ExplorerAdapter, HistoryParams, ProviderOperation, RawHistoryEntry, RawResponse } from './types';

const SERVICE = 'etherscan';

/** Etherscan answers an address without history with status "0" and this message */
const NO_TRANSACTIONS_MESSAGE = 'No transactions found';

// =============================================================================
// Types
// =============================================================================

const NumericStringSchema = z.string().regex(/^\d+$/, 'expected numeric string');

const EtherscanTransactionSchema = z.object({
  blockNumber: NumericStringSchema,
  timeStamp: NumericStringSchema,
  hash: z.string().regex(/^0x[0-9a-fA-F]{64}$/, 'expected transaction hash'),
  from: z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'expected address'),
  // Empty for contract creations
  to: z.string().regex(/^(0x[0-9a-fA-F]{40})?$/, 'expected address or empty string'),
  value: NumericStringSchema,
  isError: z.enum(['0', '1']).optional(),
  txreceipt_status: z.string().optional(),
  confirmations: NumericStringSchema.optional(),
  gasUsed: NumericStringSchema.optional(),
  gasPrice: NumericStringSchema.optional(),
});

const EtherscanApiResponseSchema = z.object({
  status: z.enum(['0', '1']),
  message: z.string(),
  result: z.union([z.array(z.unknown()), z.string()]),
});

type EtherscanTransaction = z.infer<typeof EtherscanTransactionSchema>;

export interface EtherscanEndpoint {
  apiUrl: string;
  chainId: number;
  apiKey: string;
}

// =============================================================================
// Transaction history
// =============================================================================

/**
 * Create the explorer adapter. Rows come back in whatever order the service chooses;
 * sorting and truncation happen in the orchestrator.
 */
export function createEtherscanAdapter(endpoint: EtherscanEndpoint): ExplorerAdapter {
  const transactionHistory: ProviderOperation<HistoryParams, RawHistoryEntry[]> = {
    service: SERVICE,
    name: 'txlist',
    buildRequest: ({ address, limit, sort }) => {
      const url = new URL(endpoint.apiUrl);
      url.searchParams.set('chainid', endpoint.chainId.toString());
      url.searchParams.set('module', 'account');
      url.searchParams.set('action', 'txlist');
      url.searchParams.set('address', address);
      url.searchParams.set('startblock', '0');
      url.searchParams.set('endblock', '99999999');
      url.searchParams.set('page', '1');
      url.searchParams.set('offset', limit.toString());
      url.searchParams.set('sort', sort);
      url.searchParams.set('apikey', endpoint.apiKey);
      return { method: 'GET', url: url.toString() };
    },
    parseResponse: (raw) => parseHistoryResponse(raw),
  };

  return { service: SERVICE, transactionHistory };
}

function parseHistoryResponse(raw: RawResponse): RawHistoryEntry[] {
  const envelope = EtherscanApiResponseSchema.safeParse(raw.body);
  if (!envelope.success) {
    if (!raw.ok) throw unrecognizedErrorResponse(SERVICE, raw);
    throw protocolMismatchError(SERVICE, 'txlist: unexpected response envelope', {
      issues: envelope.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const { status, message, result } = envelope.data;

  if (status === '0') {
    if (message === NO_TRANSACTIONS_MESSAGE && (Array.isArray(result) ? result.length === 0 : true)) {
      return [];
    }
    const detail = typeof result === 'string' && result !== '' ? `${message}: ${result}` : message;
    throw providerRejectedError(SERVICE, detail, { message, result: typeof result === 'string' ? result : undefined });
  }

  if (!Array.isArray(result)) {
    throw protocolMismatchError(SERVICE, 'txlist: status 1 without a result array', { result });
  }

  return result.map((row, index) => {
    const parsed = EtherscanTransactionSchema.safeParse(row);
    if (!parsed.success) {
      throw protocolMismatchError(SERVICE, `txlist: unexpected transaction at index ${index}`, {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    return toHistoryEntry(parsed.data);
  });
}

function toHistoryEntry(tx: EtherscanTransaction): RawHistoryEntry {
  return {
    hash: toHash(tx.hash),
    from: toAddress(tx.from),
    to: tx.to === '' ? null : toAddress(tx.to),
    value: BigInt(tx.value),
    timestamp: Number(tx.timeStamp),
    blockNumber: BigInt(tx.blockNumber),
    confirmations: tx.confirmations === undefined ? 0 : Number(tx.confirmations),
    failed: tx.isError === '1' || tx.txreceipt_status === '0',
    gasUsed: tx.gasUsed === undefined ? null : BigInt(tx.gasUsed),
    gasPrice: tx.gasPrice === undefined ? null : BigInt(tx.gasPrice),
  };
}

function toAddress(value: string): Address {
  return getAddress(value.toLowerCase());
}

function toHash(value: string): Hex {
  const lower = value.toLowerCase();
  if (!isHex(lower)) {
    throw protocolMismatchError(SERVICE, `txlist: invalid hash ${value}`);
  }
  return lower;
}

function isHex(value: string): value is Hex {
  return value.startsWith('0x');
}
