/**
 * HTTP transport shared by all provider adapters.
 * Transport-level failures become Unavailable here, so adapters only deal
 * with response bodies.
 */

import {
  QueryError,
  QueryErrorKind,
  protocolMismatchError,
  providerRejectedError,
  unavailableError,
} from '../errors';
import type { ProviderOperation, RawResponse, ServiceName, WireRequest } from './types';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface TransportOptions {
  timeoutMs: number;
  /** Injected in tests; defaults to global fetch */
  fetchFn?: FetchFn;
}

/**
 * Send a wire request. Resolves with the status and parsed JSON body.
 * Rejects with Unavailable on timeout, connection failure, or a non-2xx
 * response without a JSON body; with ProtocolMismatch on a 2xx that is not JSON.
 */
export async function sendWireRequest(
  service: ServiceName,
  request: WireRequest,
  options: TransportOptions,
): Promise<RawResponse> {
  const fetchFn = options.fetchFn ?? fetch;
  const headers: Record<string, string> = { accept: 'application/json', ...request.headers };
  if (request.body !== undefined) {
    headers['content-type'] = 'application/json';
  }

  let response: Response;
  let text: string;
  try {
    response = await fetchFn(request.url, {
      method: request.method,
      headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: AbortSignal.timeout(options.timeoutMs),
    });
    text = await response.text();
  } catch (error) {
    const timedOut = isAbortLike(error);
    throw unavailableError(
      service,
      timedOut ? `request timed out after ${options.timeoutMs}ms` : describeFetchError(error),
      { url: redactUrl(request.url) },
    );
  }

  let body: unknown;
  if (text.trim() !== '') {
    try {
      body = JSON.parse(text);
    } catch {
      if (!response.ok) {
        throw unavailableError(service, `HTTP ${response.status} ${response.statusText}`.trim(), {
          status: response.status,
        });
      }
      throw protocolMismatchError(service, 'response body is not JSON', {
        status: response.status,
        bodyPreview: text.slice(0, 200),
      });
    }
  } else if (!response.ok) {
    throw unavailableError(service, `HTTP ${response.status} ${response.statusText}`.trim(), {
      status: response.status,
    });
  }

  return { status: response.status, ok: response.ok, body };
}

/**
 * Fallback for a non-2xx response whose body no adapter recognised:
 * throttling and server errors are transient, other client errors are a rejection.
 */
export function unrecognizedErrorResponse(service: ServiceName, raw: RawResponse): QueryError {
  if (raw.status === 429 || raw.status >= 500) {
    return unavailableError(service, `HTTP ${raw.status}`, { status: raw.status });
  }
  return providerRejectedError(service, `HTTP ${raw.status}`, { status: raw.status });
}

/**
 * Run one provider operation: build, send, parse. Protocol mismatches are logged
 * with enough context to spot a changed service contract.
 */
export async function runOperation<P, R>(
  operation: ProviderOperation<P, R>,
  params: P,
  options: TransportOptions,
): Promise<R> {
  const request = operation.buildRequest(params);
  const raw = await sendWireRequest(operation.service, request, options);

  try {
    return operation.parseResponse(raw, params);
  } catch (error) {
    const queryError = error instanceof QueryError
      ? error
      : protocolMismatchError(operation.service, error instanceof Error ? error.message : String(error));

    if (queryError.kind === QueryErrorKind.PROTOCOL_MISMATCH) {
      console.warn(`[${operation.service}] ${operation.name}: ${queryError.message}`, {
        status: raw.status,
        ...queryError.context,
      });
    }
    throw queryError;
  }
}

function isAbortLike(error: unknown): boolean {
  return typeof error === 'object'
    && error !== null
    && 'name' in error
    && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function describeFetchError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause instanceof Error ? `: ${error.cause.message}` : '';
    return `${error.message}${cause}`;
  }
  return String(error);
}

/** Strip API keys from URLs before they end up in error context. */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.searchParams.has('apikey')) parsed.searchParams.set('apikey', 'REDACTED');
    parsed.pathname = parsed.pathname.replace(/\/v3\/[^/]+$/, '/v3/REDACTED');
    return parsed.toString();
  } catch {
    return 'invalid-url';
  }
}
