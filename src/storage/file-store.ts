// FileStore -- the backend-independent entry point.
//
// Holds exactly one backend and forwards to it after turning path-like
// arguments into ObjectPaths and rejecting paths that cannot name a file.
// Nothing runs until the returned future is awaited or the returned stream
// is iterated; invalid arguments surface there too.

import { B2Backend } from './backends/b2/backend.js';
import type { B2BackendOptions } from './backends/b2/backend.js';
import { FileBackend } from './backends/file.js';
import type { FileBackendOptions } from './backends/file.js';
import { StubBackend } from './backends/stub.js';
import { StorageInvalidPathError, StorageInvalidSettingsError } from './errors.js';
import { StorageFuture } from './future.js';
import { ObjectPath } from './object-path.js';
import type {
  Backend,
  DataStream,
  ObjectReference,
  ObjectStream,
  SourceStream,
  StorageBackend,
  StorageObject,
} from './types.js';
import { isStorageObject } from './types.js';

export type BackendImplementation =
  | { kind: 'file'; backend: FileBackend }
  | { kind: 'b2'; backend: B2Backend }
  | { kind: 'stub'; backend: StubBackend };

/** Parse and check a reference that must name a file. */
function fileReference(reference: ObjectReference): ObjectPath | StorageObject {
  const resolved = typeof reference === 'string' ? ObjectPath.parse(reference) : reference;
  const path = isStorageObject(resolved) ? resolved.path : resolved;
  if (path.isEmpty() || path.isDirPrefix) {
    throw new StorageInvalidPathError(
      `"${path.toString()}" (object paths cannot be empty or end with a '/' character)`
    );
  }
  return resolved;
}

function filePath(reference: ObjectReference): ObjectPath {
  const resolved = fileReference(reference);
  return isStorageObject(resolved) ? resolved.path : resolved;
}

export class FileStore {
  private readonly implementation: BackendImplementation;

  constructor(implementation: BackendImplementation) {
    this.implementation = implementation;
  }

  /** Open a store on a local directory. */
  static async file(root: string, options?: FileBackendOptions): Promise<FileStore> {
    const backend = await FileBackend.connect(root, options);
    return new FileStore({ kind: 'file', backend });
  }

  /** Open a store on a B2 account (or the part of it under `options.prefix`). */
  static async b2(keyId: string, key: string, options?: B2BackendOptions): Promise<FileStore> {
    const backend = await B2Backend.connect(keyId, key, options);
    return new FileStore({ kind: 'b2', backend });
  }

  static stub(name?: string): FileStore {
    return new FileStore({ kind: 'stub', backend: new StubBackend(name) });
  }

  static fromBackend(backend: FileBackend | B2Backend | StubBackend): FileStore {
    if (backend instanceof FileBackend) {
      return new FileStore({ kind: 'file', backend });
    }
    if (backend instanceof B2Backend) {
      return new FileStore({ kind: 'b2', backend });
    }
    return new FileStore({ kind: 'stub', backend });
  }

  backendType(): Backend {
    return this.implementation.kind;
  }

  /** The underlying file backend; fails if this store holds another kind. */
  fileBackend(): FileBackend {
    if (this.implementation.kind !== 'file') {
      throw new StorageInvalidSettingsError('FileStore does not hold a FileBackend');
    }
    return this.implementation.backend;
  }

  /** The underlying B2 backend; fails if this store holds another kind. */
  b2Backend(): B2Backend {
    if (this.implementation.kind !== 'b2') {
      throw new StorageInvalidSettingsError('FileStore does not hold a B2Backend');
    }
    return this.implementation.backend;
  }

  /**
   * Everything whose path starts with `prefix`, recursively. A prefix that
   * does not end in `/` also matches names that merely begin with its last
   * segment.
   */
  listObjects(prefix: ObjectPath | string = ObjectPath.empty()): ObjectStream {
    const backend = this.backend;
    return (async function* () {
      yield* backend.listObjects(ObjectPath.from(prefix));
    })();
  }

  /** Direct children of a directory. `dir` must be empty or end in `/`. */
  listDirectory(dir: ObjectPath | string = ObjectPath.empty()): ObjectStream {
    const backend = this.backend;
    return (async function* () {
      const path = ObjectPath.from(dir);
      if (!path.isEmpty() && !path.isDirPrefix) {
        throw new StorageInvalidPathError(`"${path.toString()}" (directory paths must end with '/')`);
      }
      yield* backend.listDirectory(path);
    })();
  }

  getObject(path: ObjectPath | string): StorageFuture<StorageObject> {
    return new StorageFuture(() => this.backend.getObject(filePath(path)));
  }

  getFileStream(reference: ObjectReference): StorageFuture<DataStream> {
    return new StorageFuture(() => this.backend.getFileStream(fileReference(reference)));
  }

  /** Delete a file, or a directory and everything beneath it. */
  deleteObject(reference: ObjectReference): StorageFuture<void> {
    return new StorageFuture(() => this.backend.deleteObject(fileReference(reference)));
  }

  /**
   * Replace whatever is at `path` with the content of `stream`. Fails with
   * TRANSFER_SOURCE_ERROR if the stream fails and TRANSFER_TARGET_ERROR if
   * storage does.
   */
  writeFileFromStream(path: ObjectPath | string, stream: SourceStream): StorageFuture<void> {
    return new StorageFuture(() => this.backend.writeFileFromStream(filePath(path), stream));
  }

  copyFile(source: ObjectReference, target: ObjectPath | string): StorageFuture<void> {
    return new StorageFuture(() => this.copy(source, target));
  }

  /** Copy, then delete the source. */
  moveFile(source: ObjectReference, target: ObjectPath | string): StorageFuture<void> {
    return new StorageFuture(async () => {
      const from = fileReference(source);
      await this.copy(from, target);
      await this.backend.deleteObject(from);
    });
  }

  private get backend(): StorageBackend {
    return this.implementation.backend;
  }

  private async copy(source: ObjectReference, target: ObjectPath | string): Promise<void> {
    const from = fileReference(source);
    const to = filePath(target);
    const fromPath = isStorageObject(from) ? from.path : from;
    if (fromPath.equals(to)) {
      throw new StorageInvalidPathError(`${to.toString()} (cannot copy a file onto itself)`);
    }

    const stream = await this.backend.getFileStream(from);
    try {
      await this.backend.writeFileFromStream(to, stream);
    } catch (error) {
      // The write may have failed before pulling anything from the source.
      await stream[Symbol.asyncIterator]().return?.();
      throw error;
    }
  }
}
