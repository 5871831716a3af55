/**
 * CoinGecko API: spot prices via the simple price endpoint.
 * Works without a key; a Demo API key (COINGECKO_DEMO_API_KEY) raises the rate limit.
 */

import Decimal from 'decimal.js';
import { z } from 'zod';
import { protocolMismatchError, providerRejectedError, unknownSymbolError } from '../errors';
import { unrecognizedErrorResponse } from './http';
import type { MarketAdapter, ProviderOperation, RawResponse, SpotPriceParams } from './types';

const SERVICE = 'coingecko';

/** { "<coin id>": { "<currency>": number } } */
const SimplePriceResponseSchema = z.record(z.string(), z.record(z.string(), z.unknown()));

/** CoinGecko reports failures either as { error } or { status: { error_code, error_message } } */
const CoinGeckoErrorSchema = z.union([
  z.object({ error: z.string() }),
  z.object({
    status: z.object({
      error_code: z.number().optional(),
      error_message: z.string(),
    }),
  }),
]);

export interface CoinGeckoEndpoint {
  apiUrl: string;
  apiKey?: string;
}

function buildHeaders(apiKey: string | undefined): Record<string, string> {
  return apiKey ? { 'x-cg-demo-api-key': apiKey } : {};
}

export function createCoinGeckoAdapter(endpoint: CoinGeckoEndpoint): MarketAdapter {
  const spotPrice: ProviderOperation<SpotPriceParams, string> = {
    service: SERVICE,
    name: 'simple/price',
    buildRequest: ({ coin, currency }) => {
      const url = new URL(`${endpoint.apiUrl.replace(/\/$/, '')}/simple/price`);
      url.searchParams.set('ids', coin);
      url.searchParams.set('vs_currencies', currency);
      return { method: 'GET', url: url.toString(), headers: buildHeaders(endpoint.apiKey) };
    },
    parseResponse: (raw, params) => parseSimplePrice(raw, params),
  };

  return { service: SERVICE, spotPrice };
}

function parseSimplePrice(raw: RawResponse, { coin, currency }: SpotPriceParams): string {
  const serviceError = CoinGeckoErrorSchema.safeParse(raw.body);
  if (serviceError.success) {
    const message = 'error' in serviceError.data
      ? serviceError.data.error
      : serviceError.data.status.error_message;
    if (raw.status === 429) throw unrecognizedErrorResponse(SERVICE, raw);
    throw providerRejectedError(SERVICE, message, { status: raw.status });
  }
  if (!raw.ok) throw unrecognizedErrorResponse(SERVICE, raw);

  const parsed = SimplePriceResponseSchema.safeParse(raw.body);
  if (!parsed.success) {
    throw protocolMismatchError(SERVICE, 'simple/price: expected an object keyed by coin id');
  }

  // Never fall back to another coin or currency
  const quotes = parsed.data[coin];
  if (!quotes) throw unknownSymbolError('coin', coin);
  if (!(currency in quotes)) throw unknownSymbolError('currency', currency);

  const price = quotes[currency];
  if (typeof price !== 'number' || !Number.isFinite(price) || price <= 0) {
    throw protocolMismatchError(SERVICE, `simple/price: invalid price ${JSON.stringify(price)} for ${coin}/${currency}`);
  }
  return new Decimal(price).toFixed();
}
