// Gateway type definitions

import type { Config } from '../config/index.js';
import type { FileStore } from '../storage/file-store.js';

// Augment Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    config: Config;
    storage: FileStore;
  }
}
