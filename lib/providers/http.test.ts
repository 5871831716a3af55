import { describe, it, expect, vi, afterEach } from 'vitest';
import { sendWireRequest, runOperation, redactUrl, unrecognizedErrorResponse, type FetchFn } from './http';
import { QueryError, QueryErrorKind } from '../errors';
import type { ProviderOperation } from './types';

function fetchReturning(body: string, init: ResponseInit = {}): FetchFn {
  return vi.fn(async () => new Response(body, init));
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

const echo: ProviderOperation<{ value: number }, number> = {
  service: 'coingecko',
  name: 'echo',
  buildRequest: ({ value }) => ({ method: 'GET', url: `https://api.example.test/echo?v=${value}` }),
  parseResponse: (raw) => {
    if (typeof raw.body !== 'number') throw new TypeError('not a number');
    return raw.body;
  },
};

afterEach(() => {
  vi.restoreAllMocks();
});

describe('sendWireRequest', () => {
  it('sends JSON bodies and parses JSON responses', async () => {
    const fetchFn = vi.fn<FetchFn>(async () => new Response('{"ok":true}', { status: 200 }));

    const raw = await sendWireRequest(
      'infura',
      { method: 'POST', url: 'https://rpc.example.test', body: { id: 1 } },
      { timeoutMs: 1000, fetchFn },
    );

    expect(raw).toEqual({ status: 200, ok: true, body: { ok: true } });
    const [url, init] = fetchFn.mock.calls[0];
    expect(url).toBe('https://rpc.example.test');
    expect(init?.method).toBe('POST');
    expect(init?.body).toBe('{"id":1}');
    expect(init?.headers).toEqual({ accept: 'application/json', 'content-type': 'application/json' });
  });

  it('keeps JSON error bodies of non-2xx responses for the adapter', async () => {
    const raw = await sendWireRequest(
      'etherscan',
      { method: 'GET', url: 'https://api.example.test' },
      { timeoutMs: 1000, fetchFn: fetchReturning('{"status":"0"}', { status: 403 }) },
    );
    expect(raw).toEqual({ status: 403, ok: false, body: { status: '0' } });
  });

  it('maps a timeout to a retryable Unavailable error', async () => {
    const fetchFn: FetchFn = async () => {
      throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
    };

    const error = await captureError(
      sendWireRequest('infura', { method: 'POST', url: 'https://rpc.example.test' }, { timeoutMs: 250, fetchFn }),
    );

    expect(error.kind).toBe(QueryErrorKind.UNAVAILABLE);
    expect(error.retryable).toBe(true);
    expect(error.message).toBe('infura unavailable: request timed out after 250ms');
  });

  it('maps a refused connection to Unavailable', async () => {
    const fetchFn: FetchFn = async () => {
      throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:443') });
    };

    const error = await captureError(
      sendWireRequest('etherscan', { method: 'GET', url: 'https://api.example.test' }, { timeoutMs: 1000, fetchFn }),
    );

    expect(error.kind).toBe(QueryErrorKind.UNAVAILABLE);
    expect(error.message).toBe('etherscan unavailable: fetch failed: connect ECONNREFUSED 127.0.0.1:443');
  });

  it('maps a non-2xx response without a JSON body to Unavailable', async () => {
    const error = await captureError(
      sendWireRequest(
        'coingecko',
        { method: 'GET', url: 'https://api.example.test' },
        { timeoutMs: 1000, fetchFn: fetchReturning('<html>Bad Gateway</html>', { status: 502, statusText: 'Bad Gateway' }) },
      ),
    );
    expect(error.kind).toBe(QueryErrorKind.UNAVAILABLE);
    expect(error.message).toBe('coingecko unavailable: HTTP 502 Bad Gateway');
  });

  it('maps an empty non-2xx response to Unavailable', async () => {
    const error = await captureError(
      sendWireRequest(
        'coingecko',
        { method: 'GET', url: 'https://api.example.test' },
        { timeoutMs: 1000, fetchFn: fetchReturning('', { status: 503 }) },
      ),
    );
    expect(error.kind).toBe(QueryErrorKind.UNAVAILABLE);
  });

  it('maps a 2xx response that is not JSON to ProtocolMismatch', async () => {
    const error = await captureError(
      sendWireRequest(
        'coingecko',
        { method: 'GET', url: 'https://api.example.test' },
        { timeoutMs: 1000, fetchFn: fetchReturning('hello', { status: 200 }) },
      ),
    );
    expect(error.kind).toBe(QueryErrorKind.PROTOCOL_MISMATCH);
    expect(error.retryable).toBe(false);
  });
});

describe('runOperation', () => {
  it('returns the parsed result', async () => {
    const result = await runOperation(echo, { value: 7 }, { timeoutMs: 1000, fetchFn: fetchReturning('7') });
    expect(result).toBe(7);
  });

  it('wraps unexpected parse exceptions as ProtocolMismatch and logs them', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const error = await captureError(
      runOperation(echo, { value: 7 }, { timeoutMs: 1000, fetchFn: fetchReturning('"seven"') }),
    );

    expect(error.kind).toBe(QueryErrorKind.PROTOCOL_MISMATCH);
    expect(error.message).toBe('Unexpected response from coingecko: not a number');
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn.mock.calls[0][0]).toBe('[coingecko] echo: Unexpected response from coingecko: not a number');
  });
});

describe('unrecognizedErrorResponse', () => {
  it('treats throttling and server errors as transient', () => {
    expect(unrecognizedErrorResponse('etherscan', { status: 429, ok: false, body: {} }).kind).toBe(QueryErrorKind.UNAVAILABLE);
    expect(unrecognizedErrorResponse('etherscan', { status: 500, ok: false, body: {} }).kind).toBe(QueryErrorKind.UNAVAILABLE);
  });

  it('treats other client errors as rejections', () => {
    expect(unrecognizedErrorResponse('etherscan', { status: 404, ok: false, body: {} }).kind).toBe(
      QueryErrorKind.PROVIDER_REJECTED,
    );
  });
});

describe('redactUrl', () => {
  it('hides api keys in query strings and Infura paths', () => {
    expect(redactUrl('https://api.etherscan.io/v2/api?module=account&apikey=test-secret')).toBe(
      'https://api.etherscan.io/v2/api?module=account&apikey=REDACTED',
    );
    expect(redactUrl('https://mainnet.infura.io/v3/test-secret')).toBe('https://mainnet.infura.io/v3/REDACTED');
  });
});
