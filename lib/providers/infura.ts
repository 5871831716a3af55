/**
 * Node provider adapter: Ethereum JSON-RPC over HTTP (Infura URL scheme by default).
 */

import { hexToBigInt, numberToHex, getAddress, type Address, type Hex } from 'viem';
import { z } from 'zod';
import { protocolMismatchError, providerRejectedError } from '../errors';
import { unrecognizedErrorResponse } from './http';
import type { BlockTag } from '../validation/params';
import type {
  AccountAtBlock,
  NodeProviderAdapter,
  ProviderOperation,
  RawBlock,
  RawResponse,
  RawTransactionLookup,
  WireRequest,
} from './types';

const SERVICE = 'infura';

// =============================================================================
// Schemas
// =============================================================================

const HexQuantitySchema = z.string().regex(/^0x[0-9a-fA-F]+$/, 'expected hex quantity');
const HexDataSchema = z.string().refine(isHexData, 'expected hex data');
const AddressSchema = z.string().regex(/^0x[0-9a-fA-F]{40}$/, 'expected address');

const RpcErrorSchema = z.object({
  code: z.number(),
  message: z.string(),
});

const RpcEnvelopeSchema = z.object({
  jsonrpc: z.literal('2.0').optional(),
  id: z.union([z.number(), z.string(), z.null()]).optional(),
  result: z.unknown().optional(),
  error: RpcErrorSchema.optional(),
});

const RpcTransactionSchema = z.object({
  hash: HexDataSchema,
  from: AddressSchema,
  to: AddressSchema.nullable().optional(),
  value: HexQuantitySchema,
  nonce: HexQuantitySchema,
  blockNumber: HexQuantitySchema.nullable().optional(),
  blockHash: HexDataSchema.nullable().optional(),
  gas: HexQuantitySchema,
  gasPrice: HexQuantitySchema.nullable().optional(),
  input: HexDataSchema,
});

const RpcBlockSchema = z.object({
  number: HexQuantitySchema,
  hash: HexDataSchema,
  parentHash: HexDataSchema,
  timestamp: HexQuantitySchema,
  miner: AddressSchema,
  gasUsed: HexQuantitySchema,
  gasLimit: HexQuantitySchema,
  baseFeePerGas: HexQuantitySchema.nullable().optional(),
  // Hashes, or full objects when requested; only the count is used
  transactions: z.array(z.unknown()),
});

const RpcReceiptSchema = z.object({
  status: z.enum(['0x0', '0x1']).optional(),
  gasUsed: HexQuantitySchema,
  blockNumber: HexQuantitySchema,
  contractAddress: AddressSchema.nullable().optional(),
});

type RpcEnvelope = z.infer<typeof RpcEnvelopeSchema>;

// =============================================================================
// JSON-RPC helpers
// =============================================================================

interface RpcCall {
  id: number;
  method: string;
  params: unknown[];
}

function rpcRequest(rpcUrl: string, calls: RpcCall | RpcCall[]): WireRequest {
  const toBody = (call: RpcCall) => ({ jsonrpc: '2.0', id: call.id, method: call.method, params: call.params });
  return {
    method: 'POST',
    url: rpcUrl,
    body: Array.isArray(calls) ? calls.map(toBody) : toBody(calls),
  };
}

function blockParam(block: BlockTag): string {
  return block.kind === 'tag' ? block.tag : numberToHex(block.number);
}

function parseEnvelope(body: unknown, method: string): RpcEnvelope {
  const parsed = RpcEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw protocolMismatchError(SERVICE, `${method}: malformed JSON-RPC envelope`, {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }
  return parsed.data;
}

/**
 * Unwrap a single JSON-RPC response. A JSON-RPC error object is a rejection,
 * even when it arrives with a non-2xx status (Infura answers 401 that way).
 */
function unwrapResult(raw: RawResponse, method: string): unknown {
  if (raw.body === undefined || raw.body === null || typeof raw.body !== 'object' || Array.isArray(raw.body)) {
    if (!raw.ok) throw unrecognizedErrorResponse(SERVICE, raw);
    throw protocolMismatchError(SERVICE, `${method}: expected a JSON-RPC object`);
  }

  const envelope = RpcEnvelopeSchema.safeParse(raw.body);
  if (!envelope.success) {
    if (!raw.ok) throw unrecognizedErrorResponse(SERVICE, raw);
    throw protocolMismatchError(SERVICE, `${method}: malformed JSON-RPC envelope`);
  }
  return resultOf(envelope.data, method, raw);
}

function resultOf(envelope: RpcEnvelope, method: string, raw: RawResponse): unknown {
  if (envelope.error) {
    throw providerRejectedError(SERVICE, `${method}: ${envelope.error.message} (code ${envelope.error.code})`, {
      code: envelope.error.code,
    });
  }
  if (!raw.ok) throw unrecognizedErrorResponse(SERVICE, raw);
  if (envelope.result === undefined) {
    throw protocolMismatchError(SERVICE, `${method}: response has neither result nor error`);
  }
  return envelope.result;
}

function isHexData(value: string): value is Hex {
  return /^0x[0-9a-fA-F]*$/.test(value);
}

function isHexQuantity(value: unknown): value is Hex {
  return typeof value === 'string' && /^0x[0-9a-fA-F]+$/.test(value);
}

function parseQuantity(value: unknown, method: string): bigint {
  if (!isHexQuantity(value)) {
    throw protocolMismatchError(SERVICE, `${method}: expected hex quantity, got ${JSON.stringify(value)}`);
  }
  return hexToBigInt(value);
}

function toAddress(value: string): Address {
  return getAddress(value.toLowerCase());
}

// =============================================================================
// Operations
// =============================================================================

/**
 * Create the node provider adapter for one RPC endpoint (URL already carries the key).
 */
export function createInfuraAdapter(rpcUrl: string): NodeProviderAdapter {
  const balance: ProviderOperation<AccountAtBlock, bigint> = {
    service: SERVICE,
    name: 'eth_getBalance',
    buildRequest: ({ address, block }) =>
      rpcRequest(rpcUrl, { id: 1, method: 'eth_getBalance', params: [address, blockParam(block)] }),
    parseResponse: (raw) => parseQuantity(unwrapResult(raw, 'eth_getBalance'), 'eth_getBalance'),
  };

  const nonce: ProviderOperation<AccountAtBlock, number> = {
    service: SERVICE,
    name: 'eth_getTransactionCount',
    buildRequest: ({ address, block }) =>
      rpcRequest(rpcUrl, { id: 1, method: 'eth_getTransactionCount', params: [address, blockParam(block)] }),
    parseResponse: (raw) => {
      const count = parseQuantity(unwrapResult(raw, 'eth_getTransactionCount'), 'eth_getTransactionCount');
      if (count > BigInt(Number.MAX_SAFE_INTEGER)) {
        throw protocolMismatchError(SERVICE, `eth_getTransactionCount: implausible nonce ${count}`);
      }
      return Number(count);
    },
  };

  const gasPrice: ProviderOperation<Record<string, never>, bigint> = {
    service: SERVICE,
    name: 'eth_gasPrice',
    buildRequest: () => rpcRequest(rpcUrl, { id: 1, method: 'eth_gasPrice', params: [] }),
    parseResponse: (raw) => parseQuantity(unwrapResult(raw, 'eth_gasPrice'), 'eth_gasPrice'),
  };

  const transactionStatus: ProviderOperation<{ hash: Hex }, RawTransactionLookup> = {
    service: SERVICE,
    name: 'transactionStatus',
    // One batch: transaction and receipt in a single round trip
    buildRequest: ({ hash }) =>
      rpcRequest(rpcUrl, [
        { id: 1, method: 'eth_getTransactionByHash', params: [hash] },
        { id: 2, method: 'eth_getTransactionReceipt', params: [hash] },
      ]),
    parseResponse: (raw, { hash }) => parseTransactionBatch(raw, hash),
  };

  const latestBlock: ProviderOperation<Record<string, never>, RawBlock> = {
    service: SERVICE,
    name: 'eth_getBlockByNumber',
    buildRequest: () => rpcRequest(rpcUrl, { id: 1, method: 'eth_getBlockByNumber', params: ['latest', false] }),
    parseResponse: (raw) => parseBlock(unwrapResult(raw, 'eth_getBlockByNumber')),
  };

  return { service: SERVICE, balance, nonce, gasPrice, transactionStatus, latestBlock };
}

function parseBlock(result: unknown): RawBlock {
  const block = RpcBlockSchema.safeParse(result);
  if (!block.success) {
    throw protocolMismatchError(SERVICE, 'eth_getBlockByNumber: unexpected block shape', {
      issues: block.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const data = block.data;
  const method = 'eth_getBlockByNumber';
  return {
    number: parseQuantity(data.number, method),
    hash: data.hash,
    parentHash: data.parentHash,
    timestamp: Number(parseQuantity(data.timestamp, method)),
    miner: toAddress(data.miner),
    gasUsed: parseQuantity(data.gasUsed, method),
    gasLimit: parseQuantity(data.gasLimit, method),
    baseFeePerGas: data.baseFeePerGas ? parseQuantity(data.baseFeePerGas, method) : null,
    transactionCount: data.transactions.length,
  };
}

function parseTransactionBatch(raw: RawResponse, hash: Hex): RawTransactionLookup {
  // Some providers answer a batch with a single error object (e.g. bad key)
  if (!Array.isArray(raw.body)) {
    unwrapResult(raw, 'eth_getTransactionByHash');
    throw protocolMismatchError(SERVICE, 'batch request answered with a single response');
  }

  const items: unknown[] = raw.body;
  const envelopes = items.map((item) => parseEnvelope(item, 'batch'));
  const txEnvelope = envelopes.find((e) => e.id === 1);
  const receiptEnvelope = envelopes.find((e) => e.id === 2);
  if (!txEnvelope || !receiptEnvelope) {
    throw protocolMismatchError(SERVICE, 'batch response is missing an entry', { ids: envelopes.map((e) => e.id) });
  }

  const txResult = resultOf(txEnvelope, 'eth_getTransactionByHash', raw);
  if (txResult === null) {
    return { found: false, hash };
  }

  const tx = RpcTransactionSchema.safeParse(txResult);
  if (!tx.success) {
    throw protocolMismatchError(SERVICE, 'eth_getTransactionByHash: unexpected transaction shape', {
      issues: tx.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const receiptResult = resultOf(receiptEnvelope, 'eth_getTransactionReceipt', raw);
  let receipt: Extract<RawTransactionLookup, { found: true }>['receipt'] = null;
  if (receiptResult !== null) {
    const parsedReceipt = RpcReceiptSchema.safeParse(receiptResult);
    if (!parsedReceipt.success) {
      throw protocolMismatchError(SERVICE, 'eth_getTransactionReceipt: unexpected receipt shape', {
        issues: parsedReceipt.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }
    receipt = {
      status: parsedReceipt.data.status === '0x0' ? 'failed' : 'success',
      gasUsed: parseQuantity(parsedReceipt.data.gasUsed, 'eth_getTransactionReceipt'),
      contractAddress: parsedReceipt.data.contractAddress ? toAddress(parsedReceipt.data.contractAddress) : null,
    };
  }

  const data = tx.data;
  return {
    found: true,
    hash,
    from: toAddress(data.from),
    to: data.to ? toAddress(data.to) : null,
    value: parseQuantity(data.value, 'eth_getTransactionByHash'),
    nonce: Number(parseQuantity(data.nonce, 'eth_getTransactionByHash')),
    blockNumber: data.blockNumber ? parseQuantity(data.blockNumber, 'eth_getTransactionByHash') : null,
    gas: parseQuantity(data.gas, 'eth_getTransactionByHash'),
    gasPrice: data.gasPrice ? parseQuantity(data.gasPrice, 'eth_getTransactionByHash') : null,
    input: data.input,
    receipt,
  };
}
