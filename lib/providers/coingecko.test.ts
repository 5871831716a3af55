import { describe, it, expect, vi, afterEach } from 'vitest';
import { createCoinGeckoAdapter } from './coingecko';
import { runOperation, type FetchFn } from './http';
import { QueryError, QueryErrorKind } from '../errors';

const API_URL = 'https://api.coingecko.example/api/v3/';
const pair = { coin: 'ethereum', currency: 'usd' };

function fetchReturning(body: unknown, status = 200) {
  return vi.fn<FetchFn>(async () => new Response(JSON.stringify(body), { status }));
}

async function captureError(promise: Promise<unknown>): Promise<QueryError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof QueryError) return error;
    throw error;
  }
  throw new Error('expected a QueryError');
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('simple/price', () => {
  it('builds the request, sending the demo key as a header', () => {
    const adapter = createCoinGeckoAdapter({ apiUrl: API_URL, apiKey: 'test-secret' });
    const request = adapter.spotPrice.buildRequest(pair);

    expect(request.url).toBe('https://api.coingecko.example/api/v3/simple/price?ids=ethereum&vs_currencies=usd');
    expect(request.headers).toEqual({ 'x-cg-demo-api-key': 'test-secret' });
  });

  it('sends no key header without a key', () => {
    const adapter = createCoinGeckoAdapter({ apiUrl: API_URL });
    expect(adapter.spotPrice.buildRequest(pair).headers).toEqual({});
  });

  it('returns the price as a decimal string', async () => {
    const adapter = createCoinGeckoAdapter({ apiUrl: API_URL });
    const fetchFn = fetchReturning({ ethereum: { usd: 2400.51 } });

    const amount = await runOperation(adapter.spotPrice, pair, { timeoutMs: 1000, fetchFn });

    expect(amount).toBe('2400.51');
  });

  it('reports a currency missing from the answer as UnknownSymbol', async () => {
    const adapter = createCoinGeckoAdapter({ apiUrl: API_URL });
    const error = await captureError(
      runOperation(adapter.spotPrice, pair, { timeoutMs: 1000, fetchFn: fetchReturning({ ethereum: { eur: 2200 } }) }),
    );
    expect(error.kind).toBe(QueryErrorKind.UNKNOWN_SYMBOL);
    expect(error.message).toBe('Unknown currency "usd"');
  });

  it('reports a coin missing from the answer as UnknownSymbol', async () => {
    const adapter = createCoinGeckoAdapter({ apiUrl: API_URL });
    const error = await captureError(
      runOperation(adapter.spotPrice, pair, { timeoutMs: 1000, fetchFn: fetchReturning({}) }),
    );
    expect(error.kind).toBe(QueryErrorKind.UNKNOWN_SYMBOL);
    expect(error.message).toBe('Unknown coin "ethereum"');
  });

  it('maps an error envelope to ProviderRejected', async () => {
    const adapter = createCoinGeckoAdapter({ apiUrl: API_URL, apiKey: 'test-secret' });
    const fetchFn = fetchReturning({ status: { error_code: 10002, error_message: 'API key missing' } }, 401);

    const error = await captureError(runOperation(adapter.spotPrice, pair, { timeoutMs: 1000, fetchFn }));

    expect(error.kind).toBe(QueryErrorKind.PROVIDER_REJECTED);
    expect(error.message).toBe('coingecko rejected the request: API key missing');
  });

  it('maps throttling to a retryable Unavailable error', async () => {
    const adapter = createCoinGeckoAdapter({ apiUrl: API_URL });
    const fetchFn = fetchReturning({ status: { error_code: 429, error_message: 'You have exceeded the rate limit' } }, 429);

    const error = await captureError(runOperation(adapter.spotPrice, pair, { timeoutMs: 1000, fetchFn }));

    expect(error.kind).toBe(QueryErrorKind.UNAVAILABLE);
    expect(error.retryable).toBe(true);
  });

  it('rejects a zero price as ProtocolMismatch', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const adapter = createCoinGeckoAdapter({ apiUrl: API_URL });
    const error = await captureError(
      runOperation(adapter.spotPrice, pair, { timeoutMs: 1000, fetchFn: fetchReturning({ ethereum: { usd: 0 } }) }),
    );
    expect(error.kind).toBe(QueryErrorKind.PROTOCOL_MISMATCH);
  });
});
