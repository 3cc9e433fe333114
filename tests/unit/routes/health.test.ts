import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { FastifyInstance } from 'fastify';
import fastify from 'fastify';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { healthRoutesPlugin } from '@/routes/health.js';
import { FileStore } from '@/storage/file-store.js';

async function createHealthServer(storage: FileStore): Promise<FastifyInstance> {
  const server = fastify({ logger: false });
  server.decorate('storage', storage);
  await server.register(healthRoutesPlugin);
  await server.ready();
  return server;
}

describe('Health Endpoint', () => {
  let server: FastifyInstance;
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'objstore-health-'));
  });

  afterEach(async () => {
    await server.close();
    await rm(root, { recursive: true, force: true });
  });

  describe('Storage reachable', () => {
    beforeEach(async () => {
      server = await createHealthServer(await FileStore.file(root));
    });

    it('should return healthy status with HTTP 200', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.json().status).toBe('healthy');
    });

    it('should report storage as up with latency, even when empty', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      const body = response.json();
      expect(body.dependencies.storage.status).toBe('up');
      expect(body.dependencies.storage.latency).toBeGreaterThanOrEqual(0);
      expect(body.dependencies.storage.error).toBeUndefined();
    });

    it('should name the backend', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.json().backend).toBe('file');
    });
  });

  describe('Storage unreachable', () => {
    it('should return unhealthy with HTTP 503 and the failure', async () => {
      server = await createHealthServer(FileStore.stub());

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      const body = response.json();
      expect(body.status).toBe('unhealthy');
      expect(body.backend).toBe('stub');
      expect(body.dependencies.storage.status).toBe('down');
      expect(body.dependencies.storage.error).toBe('Not supported: stub backend does not support listDirectory');
    });

    it('should report a root that disappeared', async () => {
      server = await createHealthServer(await FileStore.file(root));
      await rm(root, { recursive: true, force: true });

      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json().dependencies.storage.error).toBe('Object not found: ');
    });
  });

  describe('Response shape validation', () => {
    beforeEach(async () => {
      server = await createHealthServer(await FileStore.file(root));
    });

    it('should return ISO timestamp', async () => {
      const response = await server.inject({ method: 'GET', url: '/health' });

      expect(response.json().timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}/);
    });

    it('should return uptime as positive number', async () => {
      const body = (await server.inject({ method: 'GET', url: '/health' })).json();

      expect(typeof body.uptime).toBe('number');
      expect(body.uptime).toBeGreaterThan(0);
    });

    it('should return the package version', async () => {
      const body = (await server.inject({ method: 'GET', url: '/health' })).json();

      expect(body.version).toBe('0.1.0');
    });
  });
});
