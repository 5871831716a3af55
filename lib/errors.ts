/**
 * Structured error types for queries.
 * Every failure a query can produce is a QueryError with a kind, so callers
 * branch on the kind instead of parsing messages.
 */

// =============================================================================
// ERROR KINDS
// =============================================================================

export const QueryErrorKind = {
  // Detected locally, before any network call
  INVALID_FORMAT: 'InvalidFormat',
  OUT_OF_RANGE: 'OutOfRange',
  INVALID_VALUE: 'InvalidValue',
  UNKNOWN_SYMBOL: 'UnknownSymbol',
  MISSING_PARAMETER: 'MissingParameter',
  MISSING_CREDENTIAL: 'MissingCredential',

  // Reported by (or while talking to) an external service
  UNAVAILABLE: 'Unavailable',
  PROVIDER_REJECTED: 'ProviderRejected',
  PROTOCOL_MISMATCH: 'ProtocolMismatch',
} as const;

export type QueryErrorKind = typeof QueryErrorKind[keyof typeof QueryErrorKind];

const USER_INPUT_KINDS: ReadonlySet<QueryErrorKind> = new Set<QueryErrorKind>([
  QueryErrorKind.INVALID_FORMAT,
  QueryErrorKind.OUT_OF_RANGE,
  QueryErrorKind.INVALID_VALUE,
  QueryErrorKind.UNKNOWN_SYMBOL,
  QueryErrorKind.MISSING_PARAMETER,
  QueryErrorKind.MISSING_CREDENTIAL,
]);

/** Wire-neutral shape of an error, as handed to the CLI or serialized. */
export interface NormalizedError {
  kind: QueryErrorKind;
  message: string;
  retryable: boolean;
}

// =============================================================================
// CUSTOM ERROR CLASS
// =============================================================================

export class QueryError extends Error {
  readonly kind: QueryErrorKind;
  readonly retryable: boolean;
  readonly context: Record<string, unknown>;

  constructor(
    kind: QueryErrorKind,
    message: string,
    context: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'QueryError';
    this.kind = kind;
    this.retryable = kind === QueryErrorKind.UNAVAILABLE;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, QueryError);
    }
  }

  toNormalized(): NormalizedError {
    return { kind: this.kind, message: this.message, retryable: this.retryable };
  }

  toString(): string {
    return `[${this.kind}] ${this.message}`;
  }
}

// =============================================================================
// ERROR FACTORIES
// =============================================================================

export function invalidFormatError(field: string, value: string, expected: string): QueryError {
  return new QueryError(
    QueryErrorKind.INVALID_FORMAT,
    `Invalid ${field} "${value}": expected ${expected}`,
    { field, value }
  );
}

export function outOfRangeError(field: string, value: number, min: number, max: number): QueryError {
  return new QueryError(
    QueryErrorKind.OUT_OF_RANGE,
    `${field} must be between ${min} and ${max}, got ${value}`,
    { field, value, min, max }
  );
}

export function invalidValueError(field: string, value: string, allowed: readonly string[]): QueryError {
  return new QueryError(
    QueryErrorKind.INVALID_VALUE,
    `Invalid ${field} "${value}": expected one of ${allowed.join(', ')}`,
    { field, value, allowed }
  );
}

export function unknownSymbolError(field: 'coin' | 'currency', value: string): QueryError {
  return new QueryError(
    QueryErrorKind.UNKNOWN_SYMBOL,
    `Unknown ${field} "${value}"`,
    { field, value }
  );
}

export function missingParameterError(parameter: string, hint: string): QueryError {
  return new QueryError(
    QueryErrorKind.MISSING_PARAMETER,
    `No ${parameter} given and none stored. ${hint}`,
    { parameter }
  );
}

export function missingCredentialError(credential: 'nodeKey' | 'scanKey', hint: string): QueryError {
  return new QueryError(
    QueryErrorKind.MISSING_CREDENTIAL,
    `${credential === 'nodeKey' ? 'Node provider' : 'Explorer'} API key not configured. ${hint}`,
    { credential }
  );
}

export function unavailableError(service: string, reason: string, context: Record<string, unknown> = {}): QueryError {
  return new QueryError(
    QueryErrorKind.UNAVAILABLE,
    `${service} unavailable: ${reason}`,
    { service, ...context }
  );
}

export function providerRejectedError(service: string, reason: string, context: Record<string, unknown> = {}): QueryError {
  return new QueryError(
    QueryErrorKind.PROVIDER_REJECTED,
    `${service} rejected the request: ${reason}`,
    { service, ...context }
  );
}

export function protocolMismatchError(service: string, reason: string, context: Record<string, unknown> = {}): QueryError {
  return new QueryError(
    QueryErrorKind.PROTOCOL_MISMATCH,
    `Unexpected response from ${service}: ${reason}`,
    { service, ...context }
  );
}

// =============================================================================
// ERROR CLASSIFICATION
// =============================================================================

export function isQueryError(error: unknown): error is QueryError {
  return error instanceof QueryError;
}

/**
 * Errors caused by what the user typed or stored; retrying never helps.
 */
export function isUserInputError(error: unknown): boolean {
  return isQueryError(error) && USER_INPUT_KINDS.has(error.kind);
}

/** Process exit codes, so scripts can tell input mistakes from transient or provider failures. */
export const ExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  /** Invalid arguments, options or stored values */
  INVALID_INPUT: 2,
  UNAVAILABLE: 3,
  PROVIDER_REJECTED: 4,
  PROTOCOL_MISMATCH: 5,
} as const;

export type ExitCode = typeof ExitCode[keyof typeof ExitCode];

export function exitCodeFor(error: unknown): ExitCode {
  if (!isQueryError(error)) return ExitCode.GENERAL_ERROR;
  if (USER_INPUT_KINDS.has(error.kind)) return ExitCode.INVALID_INPUT;

  switch (error.kind) {
    case QueryErrorKind.UNAVAILABLE:
      return ExitCode.UNAVAILABLE;
    case QueryErrorKind.PROVIDER_REJECTED:
      return ExitCode.PROVIDER_REJECTED;
    case QueryErrorKind.PROTOCOL_MISMATCH:
      return ExitCode.PROTOCOL_MISMATCH;
    default:
      return ExitCode.GENERAL_ERROR;
  }
}
