import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { errorHandlerPlugin, sanitizeMessage } from '@/plugins/error-handler.js';
import { StorageNotFoundError, StorageOtherError, targetError } from '@/storage/errors.js';

// Use vi.hoisted() so the mock fn is available before vi.mock hoisting
const { mockCaptureException } = vi.hoisted(() => ({
  mockCaptureException: vi.fn<(error: unknown, context: { extra: Record<string, unknown> }) => void>(),
}));

// Mock @sentry/node before any imports that use it
vi.mock('@sentry/node', () => ({
  init: vi.fn(),
  captureException: mockCaptureException,
  onUnhandledRejectionIntegration: vi.fn(),
}));

interface TestErrorBody {
  statusCode?: number;
  code?: string;
  message?: string;
}

/**
 * Minimal Fastify server with the error handler, a route that throws
 * configurable errors and one that throws real storage errors.
 */
async function createTestServer(options: { isDev: boolean }): Promise<FastifyInstance> {
  const server = fastify({
    logger: false,
    requestIdHeader: 'x-request-id',
  });

  await server.register(errorHandlerPlugin, { isDev: options.isDev });

  server.post<{ Body: TestErrorBody }>('/test-error', async (request) => {
    const { statusCode, code, message } = request.body;
    throw Object.assign(new Error(message ?? 'Test error'), { statusCode, code });
  });

  server.get('/missing-object', async () => {
    throw new StorageNotFoundError('photos/2024/a.jpg');
  });

  server.get('/disk-failure', async () => {
    throw new StorageOtherError('/srv/objects/a.jpg: EIO: i/o error');
  });

  server.get('/write-failure', async () => {
    throw targetError(new Error('ENOSPC: no space left on device'), 'a.jpg');
  });

  server.get('/test-ok', async () => {
    return { ok: true };
  });

  await server.ready();
  return server;
}

describe('Error Handler Plugin', () => {
  let server: FastifyInstance;

  afterEach(async () => {
    await server.close();
    vi.clearAllMocks();
  });

  describe('Production mode error sanitization', () => {
    beforeEach(async () => {
      server = await createTestServer({ isDev: false });
    });

    it('should pass through rate limit (429) messages unchanged', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/test-error',
        payload: {
          statusCode: 429,
          code: 'RATE_LIMITED',
          message: 'Rate limit exceeded, retry in 1 second',
        },
      });

      expect(response.statusCode).toBe(429);
      expect(response.json().error.message).toBe('Rate limit exceeded, retry in 1 second');
    });

    it('should sanitize INTERNAL_ERROR messages to generic', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/test-error',
        payload: {
          statusCode: 500,
          code: 'INTERNAL_ERROR',
          message: 'Sensitive internal details',
        },
      });

      expect(response.statusCode).toBe(500);
      const body = response.json();
      expect(body.error.message).toBe('An internal error occurred');
      expect(body.error.code).toBe('INTERNAL_ERROR');
    });

    it('should sanitize SERVER_* error messages', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/test-error',
        payload: {
          statusCode: 500,
          code: 'SERVER_TIMEOUT',
          message: 'Connection to internal service timed out after 30s',
        },
      });

      expect(response.json().error).toMatchObject({
        code: 'SERVER_TIMEOUT',
        message: 'An internal error occurred',
      });
    });

    it('should hide filesystem details of storage failures', async () => {
      const response = await server.inject({ method: 'GET', url: '/disk-failure' });

      expect(response.statusCode).toBe(500);
      expect(response.json().error).toMatchObject({
        code: 'STORAGE_OTHER_ERROR',
        message: 'An internal error occurred',
        statusCode: 500,
      });
    });

    it('should hide the cause of a failed write but name the failing side', async () => {
      const response = await server.inject({ method: 'GET', url: '/write-failure' });

      expect(response.statusCode).toBe(500);
      expect(response.json().error).toEqual({
        code: 'TRANSFER_TARGET_ERROR',
        message: 'An internal error occurred',
        statusCode: 500,
        side: 'target',
      });
    });

    it('should pass through storage errors about the request', async () => {
      const response = await server.inject({ method: 'GET', url: '/missing-object' });

      expect(response.statusCode).toBe(404);
      expect(response.json().error).toEqual({
        code: 'STORAGE_NOT_FOUND',
        message: 'Object not found: photos/2024/a.jpg',
        statusCode: 404,
      });
    });

    it('should pass through CONFIG_* error messages', async () => {
      const originalMessage = 'Invalid configuration: storage.b2: required';
      const response = await server.inject({
        method: 'POST',
        url: '/test-error',
        payload: { statusCode: 500, code: 'CONFIG_INVALID', message: originalMessage },
      });

      expect(response.json().error.message).toBe(originalMessage);
    });
  });

  describe('Sentry capture', () => {
    beforeEach(async () => {
      server = await createTestServer({ isDev: false });
    });

    it('should capture 500 errors in Sentry with request context', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/test-error',
        payload: { statusCode: 500, code: 'INTERNAL_ERROR', message: 'Something broke' },
      });

      expect(response.statusCode).toBe(500);
      expect(mockCaptureException).toHaveBeenCalledOnce();

      const [capturedError, capturedContext] = mockCaptureException.mock.calls[0];
      expect(capturedError).toBeInstanceOf(Error);
      expect(capturedError).toHaveProperty('message', 'Something broke');
      expect(capturedContext?.extra).toMatchObject({
        requestId: expect.any(String),
        url: '/test-error',
        method: 'POST',
      });
    });

    it('should NOT capture 400-level errors in Sentry', async () => {
      const response = await server.inject({ method: 'GET', url: '/missing-object' });

      expect(response.statusCode).toBe(404);
      expect(mockCaptureException).not.toHaveBeenCalled();
    });

    it('should capture storage failures in Sentry tagged with their kind', async () => {
      await server.inject({ method: 'GET', url: '/disk-failure' });

      expect(mockCaptureException).toHaveBeenCalledOnce();
      const [, capturedContext] = mockCaptureException.mock.calls[0];
      expect(capturedContext?.extra).toMatchObject({ url: '/disk-failure', storageKind: 'OtherError' });
    });

    it('should tag failed writes with the kind of their cause', async () => {
      await server.inject({ method: 'GET', url: '/write-failure' });

      const [, capturedContext] = mockCaptureException.mock.calls[0];
      expect(capturedContext?.extra).toMatchObject({ storageKind: 'OtherError' });
    });
  });

  describe('Development mode behavior', () => {
    beforeEach(async () => {
      server = await createTestServer({ isDev: true });
    });

    it('should include stack trace in dev mode', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/test-error',
        payload: { statusCode: 500, code: 'INTERNAL_ERROR', message: 'Dev error with stack' },
      });

      const body = response.json();
      expect(body.error.stack).toContain('Error: Dev error with stack');
    });

    it('should return raw storage messages in dev mode', async () => {
      const response = await server.inject({ method: 'GET', url: '/disk-failure' });

      expect(response.json().error.message).toBe('Storage error: /srv/objects/a.jpg: EIO: i/o error');
    });
  });

  describe('Not-found handler', () => {
    beforeEach(async () => {
      server = await createTestServer({ isDev: false });
    });

    it('should return structured 404 for unknown routes', async () => {
      const response = await server.inject({ method: 'GET', url: '/nonexistent-route' });

      expect(response.statusCode).toBe(404);
      const body = response.json();
      expect(body.error).toEqual({
        code: 'NOT_FOUND',
        message: 'Route GET:/nonexistent-route not found',
        statusCode: 404,
      });
    });

    it('should include requestId and timestamp in 404 responses', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/does-not-exist',
        headers: { 'x-request-id': 'test-req-404' },
      });

      const body = response.json();
      expect(body.requestId).toBe('test-req-404');
      expect(new Date(body.timestamp).getTime()).not.toBeNaN();
    });
  });

  describe('Response structure', () => {
    beforeEach(async () => {
      server = await createTestServer({ isDev: false });
    });

    it('should default to 500 status and INTERNAL_ERROR code when not specified', async () => {
      const response = await server.inject({
        method: 'POST',
        url: '/test-error',
        payload: { message: 'Error without explicit status/code' },
      });

      expect(response.statusCode).toBe(500);
      const body = response.json();
      expect(body.error.code).toBe('INTERNAL_ERROR');
      expect(body.error.statusCode).toBe(500);
      expect(body.error.stack).toBeUndefined();
    });
  });
});

describe('sanitizeMessage()', () => {
  it.each([
    ['STORAGE_INVALID_SETTINGS', 500, 'An internal error occurred'],
    ['STORAGE_INTERNAL_ERROR', 500, 'An internal error occurred'],
    ['STORAGE_ACCESS_DENIED', 403, 'raw'],
    ['TRANSFER_SOURCE_ERROR', 400, 'raw'],
    ['INTERNAL_ERROR', 429, 'raw'],
  ])('should map %s (%d) to "%s"', (code, statusCode, expected) => {
    expect(sanitizeMessage('raw', code, statusCode)).toBe(expected);
  });
});
