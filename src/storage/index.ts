// Storage module barrel export and factory function.

import { B2Backend } from './backends/b2/backend.js';
import { FileBackend } from './backends/file.js';
import { StorageInvalidSettingsError } from './errors.js';
import { FileStore } from './file-store.js';
import type { StorageLogger } from './logger.js';

export { FileStore } from './file-store.js';
export type { BackendImplementation } from './file-store.js';
export { FileBackend, FileBackendBuilder, DEFAULT_MAX_OPEN_FILES } from './backends/file.js';
export type { FileBackendOptions } from './backends/file.js';
export { B2Backend, B2BackendBuilder } from './backends/b2/backend.js';
export type { B2BackendOptions } from './backends/b2/backend.js';
export { B2Client } from './backends/b2/client.js';
export type { B2ClientOptions } from './backends/b2/client.js';
export { StubBackend } from './backends/stub.js';
export { ObjectPath } from './object-path.js';
export type { ObjectPathOptions } from './object-path.js';
export { StorageFuture } from './future.js';
export { MergedStreams } from './stream/merged-streams.js';
export { readerStream, ChunkBuffer } from './stream/reader-stream.js';
export type { ByteSource, ReaderStreamOptions } from './stream/reader-stream.js';
export { Limited, InUse } from './stream/limited.js';
export { silentLogger } from './logger.js';
export type { StorageLogger } from './logger.js';
export * from './errors.js';
export type * from './types.js';
export { isStorageObject } from './types.js';

export interface FileStoreConfig {
  backend: 'file' | 'b2';
  file: {
    root: string;
    initialBufferSize: number;
    minimumBufferSize: number;
    maxOpenFiles: number;
  };
  b2?: {
    keyId: string;
    key: string;
    host: string;
    prefix: string;
    maxConnections: number;
    authRetries: number;
    timeoutMs: number;
  };
}

/**
 * Connect the configured backend and wrap it in a FileStore.
 * Fails if the backend cannot be reached (missing root, rejected key).
 */
export async function createFileStore(config: FileStoreConfig, logger?: StorageLogger): Promise<FileStore> {
  if (config.backend === 'b2') {
    if (!config.b2) {
      throw new StorageInvalidSettingsError('b2 settings are required when backend is "b2"');
    }
    const { keyId, key, timeoutMs, ...options } = config.b2;
    const backend = await B2Backend.connect(keyId, key, { ...options, timeout: timeoutMs, logger });
    return FileStore.fromBackend(backend);
  }

  const backend = await FileBackend.connect(config.file.root, { ...config.file, logger });
  return FileStore.fromBackend(backend);
}
