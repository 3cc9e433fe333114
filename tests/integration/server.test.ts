import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeAll, afterAll } from 'vitest';

import { createServer } from '@/server.js';
import { FileStore } from '@/storage/file-store.js';
import { storageErrorKind } from '@/storage/errors.js';
import { testConfig } from '../helpers/server.js';

describe('Server Integration', () => {
  let server: FastifyInstance;
  let root: string;

  beforeAll(async () => {
    root = await mkdtemp(join(tmpdir(), 'objstore-server-'));
    server = await createServer({ config: testConfig(root) });
    await server.listen({ port: 0 });
  });

  afterAll(async () => {
    await server.close();
    await rm(root, { recursive: true, force: true });
  });

  it('should have security headers from helmet', async () => {
    const response = await server.inject({ method: 'GET', url: '/nonexistent' });

    expect(response.headers['x-dns-prefetch-control']).toBe('off');
    expect(response.headers['x-frame-options']).toBe('SAMEORIGIN');
    expect(response.headers['x-content-type-options']).toBe('nosniff');
  });

  it('should return request ID in error responses', async () => {
    const response = await server.inject({
      method: 'GET',
      url: '/nonexistent',
      headers: { 'x-request-id': 'test-request-123' },
    });

    expect(response.json().requestId).toBe('test-request-123');
  });

  it('should generate request ID if not provided', async () => {
    const response = await server.inject({ method: 'GET', url: '/nonexistent' });

    expect(response.json().requestId).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should return 404 for unknown routes', async () => {
    const response = await server.inject({ method: 'GET', url: '/unknown-route' });

    expect(response.statusCode).toBe(404);
    expect(response.json().error.code).toBe('NOT_FOUND');
  });

  it('should decorate the configured file store', () => {
    expect(server.storage.backendType()).toBe('file');
    expect(server.storage.fileBackend().root).toBe(root);
  });
});

describe('Server storage initialization', () => {
  it('should fail to start when the storage root is missing', async () => {
    let error: unknown;
    try {
      await createServer({ config: testConfig(join(tmpdir(), 'objstore-missing-root', 'nowhere')) });
    } catch (e) {
      error = e;
    }

    expect(storageErrorKind(error)).toBe('NotFound');
  });

  it('should use an injected store instead of the configured backend', async () => {
    const server = await createServer({
      config: testConfig(join(tmpdir(), 'objstore-unused-root')),
      storage: FileStore.stub('injected'),
    });

    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(503);
    expect(response.json().backend).toBe('stub');
    await server.close();
  });
});
