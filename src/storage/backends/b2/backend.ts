// Backblaze B2 backend.
//
// The first segment of a path names the bucket; the rest is matched against
// file names inside it. B2 has no real directories, so a directory is any
// name prefix ending in `/` that has files beneath it. A configured prefix
// (a bucket, optionally followed by directories) becomes the root of every
// path this backend sees.
//
// Listing and reading are supported. Deleting and writing are not yet.

import {
  StorageInvalidPathError,
  StorageNotFoundError,
  StorageNotSupportedError,
  targetError,
} from '../../errors.js';
import type { StorageLogger } from '../../logger.js';
import { ObjectPath } from '../../object-path.js';
import { MergedStreams } from '../../stream/merged-streams.js';
import type {
  Backend,
  DataStream,
  ObjectStream,
  SourceStream,
  StorageBackend,
  StorageObject,
} from '../../types.js';
import { isStorageObject } from '../../types.js';

import { B2Client } from './client.js';
import type { B2ClientOptions } from './client.js';
import type { BucketInfo, FileInfo, ListFileNamesRequest } from './schemas.js';

export type B2BackendOptions = Omit<B2ClientOptions, 'keyId' | 'key'> & {
  /** Root for all paths: a bucket name, optionally followed by directories. */
  prefix?: ObjectPath | string;
};

async function* deferred(start: () => Promise<DataStream>): AsyncGenerator<Buffer, void, undefined> {
  yield* await start();
}

interface Location {
  bucket: string | undefined;
  file: ObjectPath;
}

/** A directory entry within `bucket` (or the bucket itself). */
function directoryObject(bucket: BucketInfo, path: ObjectPath): StorageObject {
  return {
    path,
    type: 'directory',
    size: 0,
    internals: { backend: 'b2', bucketId: bucket.bucketId, bucketName: bucket.bucketName, fileId: null },
  };
}

export class B2Backend implements StorageBackend {
  readonly prefix: ObjectPath;
  private readonly client: B2Client;

  private constructor(client: B2Client, prefix: ObjectPath) {
    this.client = client;
    this.prefix = prefix.withoutTrailingSeparator();
  }

  /**
   * Authorize with the given key and return a backend rooted at the
   * account level (or at `options.prefix`).
   */
  static async connect(keyId: string, key: string, options: B2BackendOptions = {}): Promise<B2Backend> {
    const { prefix, ...clientOptions } = options;
    const client = new B2Client({ ...clientOptions, keyId, key });
    const backend = new B2Backend(client, ObjectPath.from(prefix ?? ObjectPath.empty()));

    // Make sure we can connect.
    await client.session();
    return backend;
  }

  static builder(keyId: string, key: string): B2BackendBuilder {
    return new B2BackendBuilder(keyId, key);
  }

  backendType(): Backend {
    return 'b2';
  }

  listObjects(prefix: ObjectPath): ObjectStream {
    return this.list(prefix);
  }

  listDirectory(dir: ObjectPath): ObjectStream {
    return this.listChildren(dir.withoutTrailingSeparator());
  }

  async getObject(path: ObjectPath): Promise<StorageObject> {
    const target = path.withoutTrailingSeparator();
    const { bucket: bucketName, file } = this.locate(target);
    if (bucketName === undefined) {
      throw new StorageInvalidPathError(`${path.toString()} (no bucket)`);
    }

    const bucket = await this.findBucket(bucketName, target);
    if (file.isEmpty()) {
      return directoryObject(bucket, target);
    }

    const name = file.toString();
    const exact = await this.firstFile({ bucketId: bucket.bucketId, prefix: name }, target);
    if (exact && exact.fileName === name) {
      return this.fileObject(bucket, exact, target);
    }

    const nested = await this.firstFile(
      { bucketId: bucket.bucketId, prefix: file.asDirectory().toString() },
      target
    );
    if (nested) {
      return directoryObject(bucket, target);
    }

    throw new StorageNotFoundError(target.toString());
  }

  /**
   * The download starts, and takes its connection, on the first pull; a
   * stream dropped before that holds nothing.
   */
  async getFileStream(reference: ObjectPath | StorageObject): Promise<DataStream> {
    if (isStorageObject(reference)) {
      const internals = reference.internals;
      if (internals.backend === 'b2' && internals.fileId !== null && reference.type === 'file') {
        const { fileId } = internals;
        return deferred(() => this.client.downloadFileById(fileId, reference.path));
      }
    }

    const path = isStorageObject(reference) ? reference.path : reference;
    const object = await this.getObject(path);
    if (object.type !== 'file' || object.internals.backend !== 'b2') {
      throw new StorageNotFoundError(`${path.toString()} (not a file)`);
    }

    const { bucketName } = object.internals;
    const { file } = this.locate(object.path);
    return deferred(() => this.client.downloadFileByName(bucketName, file.toString(), object.path));
  }

  async deleteObject(reference: ObjectPath | StorageObject): Promise<void> {
    const path = isStorageObject(reference) ? reference.path : reference;
    throw new StorageNotSupportedError(`b2 backend cannot delete ${path.toString()}`);
  }

  async writeFileFromStream(path: ObjectPath, _stream: SourceStream): Promise<void> {
    const { file } = this.locate(path);
    const target = path.toString();
    if (file.isEmpty()) {
      throw targetError(
        new StorageInvalidPathError(`${target} (cannot write a file at the bucket level)`),
        target
      );
    }
    throw targetError(new StorageNotSupportedError(`b2 backend cannot write ${target}`), target);
  }

  // ---- Listing ----

  private async *list(prefix: ObjectPath): AsyncGenerator<StorageObject, void, undefined> {
    const rooted = this.rooted(prefix);
    const isDir = rooted.isDirPrefix;
    const [bucket = '', file] = rooted.shift();

    // A bucket segment followed by anything names exactly that bucket.
    const exact = !file.isEmpty() || isDir;
    const buckets = await this.client.listBuckets(
      exact ? { bucketName: bucket } : {},
      ObjectPath.fromParts(bucket ? [bucket] : [])
    );

    const merged = new MergedStreams<StorageObject>();
    for (const info of buckets) {
      if (info.bucketName.startsWith(bucket)) {
        merged.push(this.bucketFiles(info, { bucketId: info.bucketId, prefix: file.toString() }, prefix));
      }
    }

    for await (const object of merged) {
      if (!object.path.isEmpty() && object.path.startsWith(prefix)) {
        yield object;
      }
    }
  }

  private async *listChildren(dir: ObjectPath): AsyncGenerator<StorageObject, void, undefined> {
    const rooted = this.rooted(dir).withoutTrailingSeparator();
    const [bucketName, file] = rooted.shift();

    if (bucketName === undefined) {
      for (const bucket of await this.client.listBuckets({})) {
        yield directoryObject(bucket, ObjectPath.fromParts([bucket.bucketName]));
      }
      return;
    }

    const bucket = await this.findBucket(bucketName, dir);
    const request: ListFileNamesRequest = {
      bucketId: bucket.bucketId,
      prefix: file.isEmpty() ? '' : file.asDirectory().toString(),
      delimiter: '/',
    };
    for await (const object of this.bucketFiles(bucket, request, dir)) {
      // A zero-length "dir/" placeholder names the directory itself.
      if (!object.path.isEmpty() && !object.path.equals(dir)) {
        yield object;
      }
    }
  }

  private async *bucketFiles(
    bucket: BucketInfo,
    request: ListFileNamesRequest,
    path: ObjectPath
  ): AsyncGenerator<StorageObject, void, undefined> {
    for await (const info of this.client.listFileNames(request, path)) {
      yield this.fileObject(bucket, info);
    }
  }

  // ---- Helpers ----

  /** Prepend the configured prefix, which always acts as a directory. */
  private rooted(path: ObjectPath): ObjectPath {
    return this.prefix.isEmpty() ? path : this.prefix.asDirectory().join(path);
  }

  private locate(path: ObjectPath): Location {
    const [bucket, file] = this.rooted(path).shift();
    return { bucket, file };
  }

  /**
   * Build an object from a listed file name, with its path relative to the
   * configured prefix. Names ending in `/` and `folder` entries are
   * directories.
   */
  private fileObject(bucket: BucketInfo, info: FileInfo, path?: ObjectPath): StorageObject {
    const parsed = ObjectPath.parse(info.fileName).unshift(bucket.bucketName);
    const isDir = parsed.isDirPrefix || info.action === 'folder';

    let relative = parsed.withoutTrailingSeparator();
    for (let i = 0; i < this.prefix.length; i++) {
      relative = relative.shift()[1];
    }

    return {
      path: path ?? relative,
      type: isDir ? 'directory' : 'file',
      size: isDir ? 0 : info.contentLength,
      internals: {
        backend: 'b2',
        bucketId: bucket.bucketId,
        bucketName: bucket.bucketName,
        fileId: isDir ? null : (info.fileId ?? null),
      },
    };
  }

  private async findBucket(name: string, path: ObjectPath): Promise<BucketInfo> {
    const buckets = await this.client.listBuckets({ bucketName: name }, path);
    const bucket = buckets.find((candidate) => candidate.bucketName === name);
    if (!bucket) {
      throw new StorageNotFoundError(path.toString());
    }
    return bucket;
  }

  private async firstFile(request: ListFileNamesRequest, path: ObjectPath): Promise<FileInfo | undefined> {
    for await (const info of this.client.listFileNames({ ...request, maxFileCount: 1 }, path)) {
      return info;
    }
    return undefined;
  }
}

/** Collects B2Backend options before connecting. */
export class B2BackendBuilder {
  private readonly keyId: string;
  private readonly key: string;
  private readonly options: B2BackendOptions = {};

  constructor(keyId: string, key: string) {
    this.keyId = keyId;
    this.key = key;
  }

  /** API host; generally only changed for testing. */
  host(host: string): this {
    this.options.host = host;
    return this;
  }

  /**
   * Root directory for this store. Requested paths are joined onto it, so it
   * can be a bucket name or a bucket followed by directories.
   */
  prefix(prefix: ObjectPath | string): this {
    this.options.prefix = prefix;
    return this;
  }

  maxConnections(count: number): this {
    this.options.maxConnections = count;
    return this;
  }

  authRetries(count: number): this {
    this.options.authRetries = count;
    return this;
  }

  timeout(ms: number): this {
    this.options.timeout = ms;
    return this;
  }

  logger(logger: StorageLogger): this {
    this.options.logger = logger;
    return this;
  }

  connect(): Promise<B2Backend> {
    return B2Backend.connect(this.keyId, this.key, this.options);
  }
}
