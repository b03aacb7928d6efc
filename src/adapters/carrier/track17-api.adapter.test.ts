import 'reflect-metadata';
import { AppConfig } from '../../config/app.config';
import { PackageStatus } from '../../types/domain.types';
import { DecodeError, TransportError } from '../../types/error.types';
import { createSilentLogger } from '../../utils/logger';
import { Track17ApiAdapter } from './track17-api.adapter';

// Mock global fetch
global.fetch = jest.fn();

function jsonResponse(body: unknown, status = 200, statusText = 'OK') {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText,
    json: async () => body
  };
}

describe('Track17ApiAdapter', () => {
  let adapter: Track17ApiAdapter;
  let mockConfig: AppConfig;

  beforeEach(() => {
    jest.clearAllMocks();
    mockConfig = {
      storage: { dbPath: ':memory:' },
      carrier: {
        apiUrl: 'https://carrier.test/v2',
        apiKey: 'test-key',
        timeoutMs: 5000
      },
      retry: {
        maxRetries: 2,
        baseDelay: 0,
        maxDelay: 0,
        jitterFactor: 0
      },
      webhook: { port: 8080 },
      sync: { intervalMs: 0 },
      logging: { level: 'silent' }
    };
    adapter = new Track17ApiAdapter(mockConfig, createSilentLogger());
  });

  describe('query - Successful responses', () => {
    // Test: Batch request shape and response mapping
    it('should post the batch and map statuses and events', async () => {
      // Arrange
      (global.fetch as jest.Mock).mockResolvedValue(jsonResponse({
        data: {
          '1Z999AA1': {
            status: 'InTransit',
            events: [
              { time: '2024-03-01T10:00:00Z', location: 'Memphis', description: 'Departed facility' }
            ]
          },
          '1Z999AA2': {
            status: 'Delivered'
          }
        }
      }));

      // Act
      const result = await adapter.query(['1Z999AA1', '1Z999AA2', '1Z999AA3']);

      // Assert: one request carrying every number
      expect(global.fetch).toHaveBeenCalledTimes(1);
      const [url, init] = (global.fetch as jest.Mock).mock.calls[0];
      expect(url).toBe('https://carrier.test/v2/getpackageinfo');
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({ APIKey: 'test-key', 'Content-Type': 'application/json' });
      expect(JSON.parse(init.body)).toEqual({ number: ['1Z999AA1', '1Z999AA2', '1Z999AA3'] });

      expect(result.size).toBe(2);
      expect(result.get('1Z999AA1')).toEqual({
        status: PackageStatus.IN_TRANSIT,
        events: [{ timestamp: '2024-03-01T10:00:00.000Z', location: 'Memphis', description: 'Departed facility' }]
      });
      expect(result.get('1Z999AA2')).toEqual({ status: PackageStatus.DELIVERED, events: [] });
      expect(result.has('1Z999AA3')).toBe(false);
    });

    // Test: Missing status
    it('should report unknown status when the carrier omits it', async () => {
      (global.fetch as jest.Mock).mockResolvedValue(jsonResponse({ data: { A: { events: [] } } }));

      const result = await adapter.query(['A']);

      expect(result.get('A')?.status).toBe(PackageStatus.UNKNOWN);
    });

    // Test: Empty batch
    it('should not call the API for an empty batch', async () => {
      const result = await adapter.query([]);

      expect(result.size).toBe(0);
      expect(global.fetch).not.toHaveBeenCalled();
    });
  });

  describe('query - Retry logic', () => {
    // Test: 5xx errors are retried
    it('should retry on 503 and succeed on a later attempt', async () => {
      (global.fetch as jest.Mock)
        .mockResolvedValueOnce(jsonResponse({}, 503, 'Service Unavailable'))
        .mockResolvedValueOnce(jsonResponse({ data: { A: { status: 'Delivered' } } }));

      const result = await adapter.query(['A']);

      expect(global.fetch).toHaveBeenCalledTimes(2);
      expect(result.get('A')?.status).toBe(PackageStatus.DELIVERED);
    });

    // Test: Network failures exhaust retries
    it('should throw TransportError after retries are exhausted', async () => {
      (global.fetch as jest.Mock).mockRejectedValue(new TypeError('fetch failed'));

      const error = await adapter.query(['A']).catch((e: unknown) => e);

      expect(global.fetch).toHaveBeenCalledTimes(3);
      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({
        message: 'Carrier request failed after 3 attempts: Carrier request failed: fetch failed',
        retryable: false
      });
    });

    // Test: Timeout while the body is still streaming
    it('should treat a timeout while reading the body as a retryable transport failure', async () => {
      const timeout = new Error('The operation was aborted due to timeout');
      timeout.name = 'TimeoutError';
      (global.fetch as jest.Mock)
        .mockResolvedValueOnce({
          ok: true,
          status: 200,
          statusText: 'OK',
          json: async () => {
            throw timeout;
          }
        })
        .mockResolvedValueOnce(jsonResponse({ data: { A: { status: 'InTransit' } } }));

      const result = await adapter.query(['A']);

      expect(global.fetch).toHaveBeenCalledTimes(2);
      expect(result.get('A')?.status).toBe(PackageStatus.IN_TRANSIT);
    });

    // Test: 4xx errors are not retried
    it('should not retry on 401', async () => {
      (global.fetch as jest.Mock).mockResolvedValue(jsonResponse({}, 401, 'Unauthorized'));

      const error = await adapter.query(['A']).catch((e: unknown) => e);

      expect(global.fetch).toHaveBeenCalledTimes(1);
      expect(error).toBeInstanceOf(TransportError);
      expect(error).toMatchObject({ message: 'HTTP 401: Unauthorized', statusCode: 401 });
    });
  });

  describe('query - Failures', () => {
    // Test: Missing credentials
    it('should fail without a request when no API key is configured', async () => {
      adapter = new Track17ApiAdapter(
        { ...mockConfig, carrier: { ...mockConfig.carrier, apiKey: '' } },
        createSilentLogger()
      );

      await expect(adapter.query(['A'])).rejects.toBeInstanceOf(TransportError);
      expect(global.fetch).not.toHaveBeenCalled();
    });

    // Test: Body that is not JSON
    it('should throw DecodeError when the body is not JSON', async () => {
      (global.fetch as jest.Mock).mockResolvedValue({
        ok: true,
        status: 200,
        statusText: 'OK',
        json: async () => {
          throw new SyntaxError('Unexpected token < in JSON at position 0');
        }
      });

      await expect(adapter.query(['A'])).rejects.toBeInstanceOf(DecodeError);
      expect(global.fetch).toHaveBeenCalledTimes(1);
    });

    // Test: Schema mismatch
    it('should throw DecodeError when the body does not match the schema', async () => {
      (global.fetch as jest.Mock).mockResolvedValue(jsonResponse({ data: { A: { events: 'none' } } }));

      const error = await adapter.query(['A']).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DecodeError);
      expect(error).toMatchObject({ issues: ['data.A.events: Expected array, received string'] });
    });

    // Test: API-level error field
    it('should throw TransportError when the API reports an error', async () => {
      (global.fetch as jest.Mock).mockResolvedValue(jsonResponse({ error: 'Invalid API key' }));

      await expect(adapter.query(['A'])).rejects.toThrow('Carrier API error: Invalid API key');
    });
  });
});
