import { readFileSync } from 'node:fs';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import { z } from 'zod';

import type { FileStore } from '../storage/file-store.js';

// Read version once at startup (not on every request)
const PackageJsonSchema = z.object({ version: z.string() });
const APP_VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'))
).version;

interface DependencyStatus {
  status: 'up' | 'down';
  latency?: number;
  error?: string;
}

interface HealthResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  version: string;
  uptime: number;
  backend: string;
  dependencies: Record<string, DependencyStatus>;
}

/**
 * Probe the backend by pulling the first entry of the root listing. An empty
 * root counts as reachable.
 */
async function checkStorage(storage: FileStore): Promise<DependencyStatus> {
  const start = Date.now();
  try {
    for await (const _entry of storage.listDirectory()) {
      break;
    }
    return { status: 'up', latency: Date.now() - start };
  } catch (err) {
    return {
      status: 'down',
      latency: Date.now() - start,
      error: err instanceof Error ? err.message : 'Unknown error',
    };
  }
}

const healthRoutes: FastifyPluginCallback = (fastify, _options, done) => {
  fastify.get<{ Reply: HealthResponse }>(
    '/health',
    { schema: { description: 'Server health and storage reachability', tags: ['Health'] } },
    async (_request, reply) => {
      const storage = await checkStorage(fastify.storage);
      const status: HealthResponse['status'] = storage.status === 'up' ? 'healthy' : 'unhealthy';

      const response: HealthResponse = {
        status,
        timestamp: new Date().toISOString(),
        version: APP_VERSION,
        uptime: process.uptime(),
        backend: fastify.storage.backendType(),
        dependencies: { storage },
      };

      return reply.status(status === 'healthy' ? 200 : 503).send(response);
    }
  );

  done();
};

export const healthRoutesPlugin = fp(healthRoutes, {
  name: 'health-routes',
  fastify: '5.x',
});
