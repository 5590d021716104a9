import {
  CycleOutcome,
  ExceptionKind,
  RequestSpec,
  exceptionOutcome,
  statusOutcome,
} from '../domain/types';
import { serializeBody } from '../domain/orderPayloads';
import { HttpTransport, TransportError, TransportErrorCode, TransportResponse } from '../transport/transport';
import { Logger } from '../infra/observability';

const EXCEPTION_KINDS: Readonly<Record<TransportErrorCode, ExceptionKind>> = {
  [TransportErrorCode.TIMEOUT]: 'timeout',
  [TransportErrorCode.CONNECTION_REFUSED]: 'connection_refused',
  [TransportErrorCode.CONNECTION_RESET]: 'connection_reset',
  [TransportErrorCode.DNS_FAILURE]: 'dns_failure',
  [TransportErrorCode.NETWORK_ERROR]: 'network_error',
  [TransportErrorCode.PROTOCOL_ERROR]: 'protocol_error',
};

export function exceptionKindFor(code: TransportErrorCode): ExceptionKind {
  return EXCEPTION_KINDS[code];
}

const TIMED_OUT = Symbol('timed-out');

/**
 * Sends one request and classifies what happened.
 *
 * Every HTTP status is an outcome, 4xx and 5xx included. Transport failures
 * become exception kinds. send() never rejects.
 */
export class RequestExecutor {
  constructor(
    private readonly transport: HttpTransport,
    private readonly logger: Logger
  ) { }

  async send(request: RequestSpec, timeoutMs: number): Promise<CycleOutcome> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    // Aborts the call even when the transport ignores its own timeout
    const deadline = new Promise<typeof TIMED_OUT>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve(TIMED_OUT);
      }, timeoutMs);
    });

    try {
      const response = await Promise.race([
        this.transport.request({
          method: request.method,
          url: request.url,
          headers: request.headers,
          body: serializeBody(request.body),
          timeoutMs,
          signal: controller.signal,
        }),
        deadline,
      ]);

      if (response === TIMED_OUT) {
        return exceptionOutcome('timeout');
      }

      await this.drain(response, request);
      return statusOutcome(response.status);
    } catch (error) {
      return this.classify(error, request);
    } finally {
      clearTimeout(timer);
    }
  }

  private async drain(response: TransportResponse, request: RequestSpec): Promise<void> {
    try {
      await response.drain();
    } catch (error) {
      this.logger.debug('Failed to drain response body', {
        endpoint: request.endpoint,
        status: response.status,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private classify(error: unknown, request: RequestSpec): CycleOutcome {
    if (error instanceof TransportError) {
      return exceptionOutcome(exceptionKindFor(error.code));
    }

    this.logger.error(
      'Unexpected transport failure',
      error instanceof Error ? error : new Error(String(error)),
      { endpoint: request.endpoint, method: request.method, url: request.url }
    );
    return exceptionOutcome('unexpected');
  }
}
