import { z } from 'zod';

const MIB = 1024 * 1024;

export const FileStorageConfigSchema = z
  .object({
    /** Root directory of the store (default: ./data/files) */
    root: z.string().min(1).default('./data/files'),
    /** Size of each read buffer in bytes (default: 20 MiB) */
    initialBufferSize: z.number().int().min(1).default(20 * MIB),
    /** Remaining buffer capacity that triggers a fresh buffer (default: 1 MiB) */
    minimumBufferSize: z.number().int().min(1).default(MIB),
    /** Cap on concurrently open files; a copy needs two (default: 16) */
    maxOpenFiles: z.number().int().min(1).default(16),
  })
  .refine((file) => file.minimumBufferSize <= file.initialBufferSize, {
    message: 'minimumBufferSize must not exceed initialBufferSize',
    path: ['minimumBufferSize'],
  });

export const B2StorageConfigSchema = z.object({
  keyId: z.string().min(1),
  key: z.string().min(1),
  /** API host (default: https://api.backblazeb2.com) */
  host: z.string().url().default('https://api.backblazeb2.com'),
  /** Root for all paths: a bucket name, optionally followed by directories */
  prefix: z.string().default(''),
  /** Concurrent API requests and downloads (default: 4) */
  maxConnections: z.number().int().min(1).default(4),
  /** Attempts per call when the session has expired (default: 3) */
  authRetries: z.number().int().min(1).default(3),
  /** Per-request timeout in milliseconds (default: 30000) */
  timeoutMs: z.number().int().min(1000).default(30_000),
});

export const StorageConfigSchema = z
  .object({
    /** Storage backend type */
    backend: z.enum(['file', 'b2']).default('file'),
    /** Filesystem backend options */
    file: FileStorageConfigSchema.default({}),
    /** B2 backend options, required when backend is "b2" */
    b2: B2StorageConfigSchema.optional(),
  })
  .refine((storage) => storage.backend !== 'b2' || storage.b2 !== undefined, {
    message: 'b2 settings are required when backend is "b2"',
    path: ['b2'],
  });

export const ConfigSchema = z.object({
  server: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(1).max(65535).default(3000),
      /** Largest accepted upload in bytes (default: 100 MiB) */
      uploadLimit: z.number().int().min(1).default(100 * MIB),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
      pretty: z.boolean().default(false),
    })
    .default({}),

  // Optional Sentry integration
  sentry: z
    .object({
      dsn: z.string().url(),
      environment: z.string().default('development'),
      tracesSampleRate: z.number().min(0).max(1).default(0.1),
    })
    .optional(),

  // Environment mode
  env: z.enum(['development', 'production', 'test']).default('development'),

  // Rate limiting configuration
  rateLimit: z
    .object({
      global: z.number().int().min(1).default(100),
      windowMs: z.number().int().min(1000).default(60000),
    })
    .default({}),

  // Storage backend configuration (optional -- defaults to the filesystem)
  storage: StorageConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
