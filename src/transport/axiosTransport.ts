import { Agent as HttpAgent } from 'http';
import { Agent as HttpsAgent } from 'https';
import axios, { AxiosAdapter, AxiosInstance, isAxiosError } from 'axios';
import {
  HttpTransport,
  TransportError,
  TransportErrorCode,
  TransportRequest,
  TransportResponse,
} from './transport';

export interface AxiosTransportOptions {
  keepAlive?: boolean;
  maxSockets?: number;
  maxRedirects?: number;
  /**
   * Replaces axios' network adapter
   */
  adapter?: AxiosAdapter;
}

const ERROR_CODE_MAP: Readonly<Record<string, TransportErrorCode>> = {
  ECONNABORTED: TransportErrorCode.TIMEOUT,
  ETIMEDOUT: TransportErrorCode.TIMEOUT,
  ERR_CANCELED: TransportErrorCode.TIMEOUT,
  ECONNREFUSED: TransportErrorCode.CONNECTION_REFUSED,
  ECONNRESET: TransportErrorCode.CONNECTION_RESET,
  EPIPE: TransportErrorCode.CONNECTION_RESET,
  ENOTFOUND: TransportErrorCode.DNS_FAILURE,
  EAI_AGAIN: TransportErrorCode.DNS_FAILURE,
  EHOSTUNREACH: TransportErrorCode.NETWORK_ERROR,
  ENETUNREACH: TransportErrorCode.NETWORK_ERROR,
  ERR_NETWORK: TransportErrorCode.NETWORK_ERROR,
  ERR_BAD_RESPONSE: TransportErrorCode.PROTOCOL_ERROR,
  ERR_FR_TOO_MANY_REDIRECTS: TransportErrorCode.PROTOCOL_ERROR,
};

/**
 * Map an axios / Node error code to a transport error code
 */
export function mapAxiosErrorCode(code: string | undefined): TransportErrorCode | undefined {
  if (code === undefined) return undefined;
  if (code.startsWith('HPE_')) return TransportErrorCode.PROTOCOL_ERROR;
  return ERROR_CODE_MAP[code];
}

/**
 * HTTP transport backed by axios with keep-alive agents.
 * Every status resolves; bodies are buffered as raw bytes and never parsed.
 */
export class AxiosTransport implements HttpTransport {
  readonly name = 'axios';

  private client?: AxiosInstance;
  private httpAgent?: HttpAgent;
  private httpsAgent?: HttpsAgent;

  constructor(private readonly options: AxiosTransportOptions = {}) { }

  async open(): Promise<void> {
    if (this.client) return;

    const keepAlive = this.options.keepAlive ?? true;
    const maxSockets = this.options.maxSockets ?? Infinity;
    this.httpAgent = new HttpAgent({ keepAlive, maxSockets });
    this.httpsAgent = new HttpsAgent({ keepAlive, maxSockets });

    this.client = axios.create({
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      maxRedirects: this.options.maxRedirects ?? 5,
      responseType: 'arraybuffer',
      validateStatus: () => true,
      // Bodies are serialized by the caller and must go out byte-for-byte
      transformRequest: [(data: unknown) => data],
      transformResponse: [(data: unknown) => data],
      ...(this.options.adapter ? { adapter: this.options.adapter } : {}),
    });
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    const client = this.client;
    if (!client) {
      throw new TransportError(
        TransportErrorCode.NETWORK_ERROR,
        'Transport is not open',
        this.name
      );
    }

    try {
      const response = await client.request({
        method: request.method,
        url: request.url,
        headers: request.headers,
        data: request.body,
        timeout: request.timeoutMs,
        signal: request.signal,
      });

      return {
        status: response.status,
        // axios has already read the whole body
        drain: () => Promise.resolve(),
      };
    } catch (error) {
      throw this.toTransportError(error);
    }
  }

  async close(): Promise<void> {
    this.httpAgent?.destroy();
    this.httpsAgent?.destroy();
    this.httpAgent = undefined;
    this.httpsAgent = undefined;
    this.client = undefined;
  }

  private toTransportError(error: unknown): unknown {
    if (!isAxiosError(error)) {
      return error;
    }

    const code = mapAxiosErrorCode(error.code);
    if (code === undefined) {
      return error;
    }

    return new TransportError(code, error.message, this.name, error);
  }
}
