/**
 * Unit Tests: Axios Transport
 * Driven through custom axios adapters; nothing leaves the process.
 */

import { AxiosAdapter, AxiosError, InternalAxiosRequestConfig, isAxiosError } from 'axios';
import { AxiosTransport, mapAxiosErrorCode } from '../../src/transport/axiosTransport';
import { TransportError, TransportErrorCode, TransportRequest } from '../../src/transport/transport';

function respondWith(status: number, seen: InternalAxiosRequestConfig[] = []): AxiosAdapter {
  return async (config) => {
    seen.push(config);
    return { data: Buffer.alloc(0), status, statusText: '', headers: {}, config };
  };
}

function failWith(code: string): AxiosAdapter {
  return async (config) => {
    throw new AxiosError(`request failed: ${code}`, code, config);
  };
}

function request(overrides: Partial<TransportRequest> = {}): TransportRequest {
  return {
    method: 'GET',
    url: 'http://api.test/api/restaurant',
    headers: { 'X-Traffic-Type': 'test' },
    timeoutMs: 5000,
    ...overrides,
  };
}

describe('AxiosTransport', () => {
  describe('responses', () => {
    it('should resolve every status', async () => {
      const transport = new AxiosTransport({ adapter: respondWith(503) });
      await transport.open();

      const response = await transport.request(request());
      await response.drain();

      expect(response.status).toBe(503);
      await transport.close();
    });

    it('should send bodies exactly as given', async () => {
      const seen: InternalAxiosRequestConfig[] = [];
      const transport = new AxiosTransport({ adapter: respondWith(400, seen) });
      await transport.open();

      await transport.request(
        request({
          method: 'POST',
          url: 'http://api.test/api/order',
          headers: { 'Content-Type': 'application/json' },
          body: '{ this is not valid json }',
          timeoutMs: 2500,
        })
      );

      expect(seen).toHaveLength(1);
      expect(seen[0].data).toBe('{ this is not valid json }');
      expect(seen[0].method).toBe('post');
      expect(seen[0].url).toBe('http://api.test/api/order');
      expect(seen[0].timeout).toBe(2500);
      expect(seen[0].headers.get('Content-Type')).toBe('application/json');
      await transport.close();
    });

    it('should refuse requests before open and after close', async () => {
      const transport = new AxiosTransport({ adapter: respondWith(200) });

      await expect(transport.request(request())).rejects.toThrow('Transport is not open');

      await transport.open();
      await transport.close();
      await expect(transport.request(request())).rejects.toBeInstanceOf(TransportError);
    });
  });

  describe('failures', () => {
    const cases: Array<[string, TransportErrorCode]> = [
      ['ECONNREFUSED', TransportErrorCode.CONNECTION_REFUSED],
      ['ECONNRESET', TransportErrorCode.CONNECTION_RESET],
      ['ECONNABORTED', TransportErrorCode.TIMEOUT],
      ['ENOTFOUND', TransportErrorCode.DNS_FAILURE],
      ['ERR_NETWORK', TransportErrorCode.NETWORK_ERROR],
      ['HPE_INVALID_CONSTANT', TransportErrorCode.PROTOCOL_ERROR],
    ];

    it.each(cases)('should map %s to %s', async (axiosCode, expected) => {
      const transport = new AxiosTransport({ adapter: failWith(axiosCode) });
      await transport.open();

      const error = await transport.request(request()).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.code).toBe(expected);
        expect(error.transportName).toBe('axios');
        expect(error.message).toBe(`request failed: ${axiosCode}`);
      }
      await transport.close();
    });

    it('should treat a cancelled request as a timeout', async () => {
      const transport = new AxiosTransport({ adapter: respondWith(200) });
      await transport.open();
      const controller = new AbortController();
      controller.abort();

      const error = await transport.request(request({ signal: controller.signal })).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(TransportError);
      if (error instanceof TransportError) {
        expect(error.isTimeout()).toBe(true);
      }
      await transport.close();
    });

    it('should pass unmapped axios errors through', async () => {
      const transport = new AxiosTransport({ adapter: failWith('ESOMETHINGELSE') });
      await transport.open();

      const error = await transport.request(request()).catch((e: unknown) => e);

      expect(error).not.toBeInstanceOf(TransportError);
      expect(isAxiosError(error)).toBe(true);
      await transport.close();
    });

    it('should pass non-axios errors through', async () => {
      const transport = new AxiosTransport({
        adapter: async () => {
          throw new Error('adapter bug');
        },
      });
      await transport.open();

      await expect(transport.request(request())).rejects.toThrow('adapter bug');
      await transport.close();
    });
  });

  describe('mapAxiosErrorCode', () => {
    it('should map known codes and ignore the rest', () => {
      expect(mapAxiosErrorCode('ETIMEDOUT')).toBe(TransportErrorCode.TIMEOUT);
      expect(mapAxiosErrorCode('EAI_AGAIN')).toBe(TransportErrorCode.DNS_FAILURE);
      expect(mapAxiosErrorCode('HPE_HEADER_OVERFLOW')).toBe(TransportErrorCode.PROTOCOL_ERROR);
      expect(mapAxiosErrorCode('EACCES')).toBeUndefined();
      expect(mapAxiosErrorCode(undefined)).toBeUndefined();
    });
  });
});
