/**
 * Core types for the traffic generator
 */

// ============================================================================
// ENDPOINTS
// ============================================================================

/**
 * Logical operations the generator knows how to exercise against the target API
 */
export const ENDPOINT_NAMES = ['get_root', 'get_list', 'get_one', 'post_order', 'bogus'] as const;

export type EndpointName = (typeof ENDPOINT_NAMES)[number];

export function isEndpointName(value: string): value is EndpointName {
  return ENDPOINT_NAMES.some((name) => name === value);
}

/**
 * Per-endpoint numeric table (weights, error rates)
 */
export type EndpointTable = Readonly<Partial<Record<EndpointName, number>>>;

// ============================================================================
// HTTP
// ============================================================================

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type RequestBody =
  | { kind: 'json'; value: unknown }
  | { kind: 'text'; value: string }
  | { kind: 'none' };

/**
 * A fully materialized request, ready for the transport
 */
export interface RequestSpec {
  endpoint: EndpointName;
  variant: 'good' | 'bad';
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  body: RequestBody;
}

// ============================================================================
// CYCLE OUTCOME
// ============================================================================

export type ExceptionKind =
  | 'timeout'
  | 'connection_refused'
  | 'connection_reset'
  | 'dns_failure'
  | 'network_error'
  | 'protocol_error'
  | 'unexpected';

/**
 * Classified result of one request attempt. Exactly one of status code or
 * exception kind exists, enforced by the union.
 */
export type CycleOutcome =
  | { kind: 'status'; statusCode: number }
  | { kind: 'exception'; exceptionKind: ExceptionKind };

export const statusOutcome = (statusCode: number): CycleOutcome => ({
  kind: 'status',
  statusCode,
});

export const exceptionOutcome = (exceptionKind: ExceptionKind): CycleOutcome => ({
  kind: 'exception',
  exceptionKind,
});

export function isSuccessStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode <= 299;
}

// ============================================================================
// RESULT TYPE (Functional Error Handling)
// ============================================================================

export type Result<T, E = Error> = Success<T> | Failure<E>;

export class Success<T> {
  readonly isSuccess = true;
  readonly isFailure = false;

  constructor(readonly value: T) { }

  map<U>(fn: (value: T) => U): Result<U, never> {
    return new Success(fn(this.value));
  }

  flatMap<U, E>(fn: (value: T) => Result<U, E>): Result<U, E> {
    return fn(this.value);
  }
}

export class Failure<E> {
  readonly isSuccess = false;
  readonly isFailure = true;

  constructor(readonly error: E) { }

  map<U>(_fn: (value: never) => U): Result<U, E> {
    return this as unknown as Result<U, E>;
  }

  flatMap<U>(_fn: (value: never) => Result<U, E>): Result<U, E> {
    return this as unknown as Result<U, E>;
  }
}

export const ok = <T>(value: T): Result<T, never> => new Success(value);
export const fail = <E>(error: E): Result<never, E> => new Failure(error);
