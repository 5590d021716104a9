import { HttpMethod } from '../domain/types';

/**
 * Transport interface the generator sends requests through.
 * Connection pooling and reuse are the transport's concern.
 */
export interface HttpTransport {
  /**
   * Unique identifier for the transport
   */
  readonly name: string;

  /**
   * Acquire underlying resources (agents, sockets). Called once when a run starts.
   */
  open(): Promise<void>;

  /**
   * Send one request. Resolves for every HTTP status, 4xx and 5xx included.
   * Rejects with a TransportError for timeouts and connection failures.
   */
  request(request: TransportRequest): Promise<TransportResponse>;

  /**
   * Release underlying resources. Called once on every exit path of a run.
   */
  close(): Promise<void>;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: Record<string, string>;
  /**
   * Serialized body, sent as-is
   */
  body?: string;
  timeoutMs: number;
  /**
   * Aborted when the caller gives up on the request
   */
  signal?: AbortSignal;
}

export interface TransportResponse {
  status: number;

  /**
   * Read and discard the body so the connection can be reused
   */
  drain(): Promise<void>;
}

// ============================================================================
// TRANSPORT ERROR TYPES
// ============================================================================

export enum TransportErrorCode {
  TIMEOUT = 'TIMEOUT',
  CONNECTION_REFUSED = 'CONNECTION_REFUSED',
  CONNECTION_RESET = 'CONNECTION_RESET',
  DNS_FAILURE = 'DNS_FAILURE',
  NETWORK_ERROR = 'NETWORK_ERROR',
  PROTOCOL_ERROR = 'PROTOCOL_ERROR',
}

export class TransportError extends Error {
  constructor(
    public readonly code: TransportErrorCode,
    message: string,
    public readonly transportName: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'TransportError';
    Object.setPrototypeOf(this, TransportError.prototype);
  }

  isTimeout(): boolean {
    return this.code === TransportErrorCode.TIMEOUT;
  }
}
