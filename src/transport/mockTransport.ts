import { z } from 'zod';
import {
  HttpTransport,
  TransportError,
  TransportErrorCode,
  TransportRequest,
  TransportResponse,
} from './transport';
import { KNOWN_RESTAURANT_IDS } from '../domain/endpoints';
import { MathRandom, RandomSource, pick } from '../orchestration/random';

/**
 * Mock transport for dry runs and tests.
 * Answers in-process the way the restaurant ordering API would, with
 * configurable latency and transport failure rates.
 */

const orderSchema = z.object({
  items: z
    .array(z.object({ name: z.string().min(1), qty: z.number().int().positive() }))
    .min(1),
  deliverTo: z.object({ name: z.string().min(1) }),
  restaurant: z.object({ name: z.string().min(1) }),
});

function parseJson(text: string): { valid: true; value: unknown } | { valid: false } {
  try {
    return { valid: true, value: JSON.parse(text) };
  } catch {
    return { valid: false };
  }
}

/**
 * Status the ordering API answers for a request
 */
export function defaultMockStatus(request: TransportRequest): number {
  const path = new URL(request.url).pathname;

  if (request.method === 'GET') {
    if (path === '/' || path === '/api/restaurant') return 200;

    const match = /^\/api\/restaurant\/([^/]+)$/.exec(path);
    if (match) {
      return KNOWN_RESTAURANT_IDS.includes(match[1]) ? 200 : 400;
    }
    return 404;
  }

  if (request.method === 'POST' && path === '/api/order') {
    if (request.body === undefined) return 400;

    const parsed = parseJson(request.body);
    if (!parsed.valid) return 400;
    return orderSchema.safeParse(parsed.value).success ? 201 : 400;
  }

  return 404;
}

export interface MockTransportOptions {
  statusFor?: (request: TransportRequest) => number;
  latencyMs?: number;
  jitterMs?: number;
  failureRate?: number; // 0-1
  failureCodes?: TransportErrorCode[];
  random?: RandomSource;
}

export interface MockTransportStats {
  opened: boolean;
  openCount: number;
  closeCount: number;
  requestCount: number;
  failureCount: number;
}

export class MockTransport implements HttpTransport {
  readonly name = 'mock';

  private readonly statusFor: (request: TransportRequest) => number;
  private readonly latencyMs: number;
  private readonly jitterMs: number;
  private readonly failureRate: number;
  private readonly failureCodes: TransportErrorCode[];
  private readonly random: RandomSource;

  private stats: MockTransportStats = {
    opened: false,
    openCount: 0,
    closeCount: 0,
    requestCount: 0,
    failureCount: 0,
  };

  constructor(options: MockTransportOptions = {}) {
    this.statusFor = options.statusFor ?? defaultMockStatus;
    this.latencyMs = options.latencyMs ?? 0;
    this.jitterMs = options.jitterMs ?? 0;
    this.failureRate = options.failureRate ?? 0;
    this.failureCodes = options.failureCodes ?? [
      TransportErrorCode.CONNECTION_REFUSED,
      TransportErrorCode.CONNECTION_RESET,
    ];
    this.random = options.random ?? new MathRandom();
  }

  async open(): Promise<void> {
    this.stats.opened = true;
    this.stats.openCount++;
  }

  async request(request: TransportRequest): Promise<TransportResponse> {
    if (!this.stats.opened) {
      throw new TransportError(TransportErrorCode.NETWORK_ERROR, 'Transport is not open', this.name);
    }
    this.stats.requestCount++;

    const delay = this.latencyMs + this.random.next() * this.jitterMs;
    if (delay > 0) {
      await this.simulateLatency(delay, request);
    }

    if (this.failureRate > 0 && this.random.next() < this.failureRate) {
      this.stats.failureCount++;
      const code = pick(this.random, this.failureCodes);
      throw new TransportError(code, `Mock transport failure: ${code}`, this.name);
    }

    return {
      status: this.statusFor(request),
      drain: () => Promise.resolve(),
    };
  }

  async close(): Promise<void> {
    this.stats.opened = false;
    this.stats.closeCount++;
  }

  getStats(): MockTransportStats {
    return { ...this.stats };
  }

  private simulateLatency(delay: number, request: TransportRequest): Promise<void> {
    return new Promise((resolve, reject) => {
      if (request.signal?.aborted) {
        reject(new TransportError(TransportErrorCode.TIMEOUT, 'Request aborted', this.name));
        return;
      }

      const timedOut = delay > request.timeoutMs;
      const timer = setTimeout(
        () => {
          if (timedOut) {
            reject(
              new TransportError(
                TransportErrorCode.TIMEOUT,
                `Request timeout after ${request.timeoutMs}ms`,
                this.name
              )
            );
          } else {
            resolve();
          }
        },
        timedOut ? request.timeoutMs : delay
      );

      request.signal?.addEventListener(
        'abort',
        () => {
          clearTimeout(timer);
          reject(new TransportError(TransportErrorCode.TIMEOUT, 'Request aborted', this.name));
        },
        { once: true }
      );
    });
  }
}
