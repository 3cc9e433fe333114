import { randomUUID } from 'node:crypto';

import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import multipart from '@fastify/multipart';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import fastify from 'fastify';
import {
  jsonSchemaTransform,
  serializerCompiler,
  validatorCompiler,
} from 'fastify-type-provider-zod';

import type { Config } from './config/index.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { requestLoggerPlugin } from './plugins/request-logger.js';
import { directoryRoutesPlugin } from './routes/directories.js';
import { fileRoutesPlugin } from './routes/files.js';
import { healthRoutesPlugin } from './routes/health.js';
import { objectRoutesPlugin } from './routes/objects.js';
import type { FileStore } from './storage/file-store.js';
import { createFileStore } from './storage/index.js';

// Loads the FastifyInstance augmentation
import './types/index.js';

export interface CreateServerOptions {
  config: Config;
  /** Use this store instead of connecting the configured backend. */
  storage?: FileStore;
}

function loggerOptions(config: Config): FastifyServerOptions['logger'] {
  return {
    level: config.logging.level,
    transport: config.logging.pretty
      ? {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'HH:MM:ss Z', ignore: 'pid,hostname' },
        }
      : undefined,
    // B2 keys travel only in the config, but clients may still send credentials
    redact: ['req.headers.authorization', 'req.headers.cookie'],
  };
}

async function connectStorage(server: FastifyInstance, options: CreateServerOptions): Promise<FileStore> {
  const { storage: settings } = options.config;
  try {
    const storage = options.storage ?? (await createFileStore(settings, server.log));
    server.log.info({ backend: storage.backendType() }, 'Storage layer initialized');
    return storage;
  } catch (error) {
    server.log.error({ err: error, backend: settings.backend }, 'Storage layer initialization failed');
    throw error;
  }
}

export async function createServer(options: CreateServerOptions): Promise<FastifyInstance> {
  const { config } = options;
  const isDev = config.env === 'development';

  const server = fastify({
    logger: loggerOptions(config),
    requestIdHeader: 'x-request-id',
    genReqId: () => randomUUID(),
    // Requests are logged by the request-logger plugin
    disableRequestLogging: true,
    // JSON bodies are never large; file content arrives as multipart streams
    bodyLimit: 51200,
  });

  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);
  server.decorate('config', config);

  await server.register(helmet, {
    global: true,
    contentSecurityPolicy: isDev ? false : undefined,
  });
  await server.register(rateLimit, {
    max: config.rateLimit.global,
    timeWindow: config.rateLimit.windowMs,
  });
  await server.register(cors, {
    origin: isDev,
    methods: ['GET', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID'],
    exposedHeaders: ['Content-Length', 'X-Request-ID'],
  });
  // One file per upload, capped at the configured size
  await server.register(multipart, {
    limits: { files: 1, fileSize: config.server.uploadLimit },
  });

  await server.register(errorHandlerPlugin, { isDev });
  await server.register(requestLoggerPlugin, { isDev });

  await server.register(swagger, {
    openapi: {
      openapi: '3.0.3',
      info: {
        title: 'objstore gateway',
        description: 'HTTP access to a local directory or B2 account through one object storage API.',
        version: '0.1.0',
        license: { name: 'Apache-2.0', url: 'https://www.apache.org/licenses/LICENSE-2.0' },
      },
      tags: [
        { name: 'Health', description: 'Server and backend status' },
        { name: 'Storage', description: 'Objects, directories and file content' },
      ],
    },
    transform: jsonSchemaTransform,
  });
  await server.register(swaggerUi, { routePrefix: '/docs' });

  server.decorate('storage', await connectStorage(server, options));

  await server.register(healthRoutesPlugin);
  await server.register(objectRoutesPlugin);
  await server.register(directoryRoutesPlugin);
  await server.register(fileRoutesPlugin);

  return server;
}
