// Shared storage types and the contract every backend implements.

import type { ObjectPath } from './object-path.js';

/** The concrete backends a FileStore can hold. */
export type Backend = 'file' | 'b2' | 'stub';

export type ObjectType = 'file' | 'directory' | 'symlink' | 'unknown';

/**
 * Backend-private data attached to an object so that later calls on the
 * same backend can skip a lookup. Never inspected outside its backend.
 */
export type ObjectInternals =
  | { backend: 'file' }
  | { backend: 'b2'; bucketId: string; bucketName: string; fileId: string | null }
  | { backend: 'stub' };

/** Metadata snapshot of one entry. `size` is only meaningful for files. */
export interface StorageObject {
  readonly path: ObjectPath;
  readonly type: ObjectType;
  readonly size: number;
  readonly internals: ObjectInternals;
}

/** Anything that identifies an object: a path, its string form or a listed object. */
export type ObjectReference = ObjectPath | string | StorageObject;

/** Lazily produced objects; breaking out of iteration releases the listing. */
export type ObjectStream = AsyncIterable<StorageObject>;

/** Lazily produced file content; breaking out of iteration closes the source. */
export type DataStream = AsyncIterable<Buffer>;

/** Input accepted by writes. Node readables qualify. */
export type SourceStream = AsyncIterable<Uint8Array>;

/**
 * The operations every backend provides. Paths passed in have already been
 * validated by the FileStore dispatcher.
 */
export interface StorageBackend {
  backendType(): Backend;

  /** Everything whose path starts with `prefix`, recursively, streamed as discovered. */
  listObjects(prefix: ObjectPath): ObjectStream;

  /** Direct children of `dir` only. */
  listDirectory(dir: ObjectPath): ObjectStream;

  getObject(path: ObjectPath): Promise<StorageObject>;

  getFileStream(reference: ObjectPath | StorageObject): Promise<DataStream>;

  deleteObject(reference: ObjectPath | StorageObject): Promise<void>;

  /** Replace whatever is at `path` with the content of `stream`. Rejects with a TransferError. */
  writeFileFromStream(path: ObjectPath, stream: SourceStream): Promise<void>;
}

export function isStorageObject(value: ObjectReference): value is StorageObject {
  return typeof value === 'object' && 'internals' in value;
}
