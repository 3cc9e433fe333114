// Local filesystem backend.
//
// A root directory on disk is the root of the store; path segments map one
// to one onto directory entries beneath it. Directories and symlinks show up
// in listings and metadata but are never created explicitly: writing a file
// creates its missing parents, and deleting or overwriting a directory
// removes everything inside it.

import type { Dir, Stats } from 'node:fs';
import type { FileHandle } from 'node:fs/promises';
import { lstat, mkdir, open, opendir, rmdir, stat, unlink } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import {
  StorageInvalidPathError,
  StorageInvalidSettingsError,
  StorageNotFoundError,
  StorageOtherError,
  isStorageError,
  sourceError,
  targetError,
} from '../errors.js';
import type { StorageError } from '../errors.js';
import { silentLogger } from '../logger.js';
import type { StorageLogger } from '../logger.js';
import { ObjectPath } from '../object-path.js';
import { Limited } from '../stream/limited.js';
import { MergedStreams } from '../stream/merged-streams.js';
import { readerStream, resolveBufferSizes } from '../stream/reader-stream.js';
import type { ByteSource } from '../stream/reader-stream.js';
import type {
  Backend,
  DataStream,
  ObjectStream,
  ObjectType,
  SourceStream,
  StorageBackend,
  StorageObject,
} from '../types.js';
import { isStorageObject } from '../types.js';

export const DEFAULT_MAX_OPEN_FILES = 16;

export interface FileBackendOptions {
  /** Size of each read buffer (default 20 MiB). */
  initialBufferSize?: number;
  /** Remaining read buffer capacity that triggers a new buffer (default 1 MiB). */
  minimumBufferSize?: number;
  /**
   * Cap on files open for reading, and separately on files open for
   * writing (default 16 each).
   */
  maxOpenFiles?: number;
  logger?: StorageLogger;
}

interface FileSpace {
  readonly base: string;
}

interface DirectoryEntry {
  path: ObjectPath;
  stats: Stats | undefined;
}

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isMissing(error: unknown): boolean {
  const code = errnoCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

/** Translate an OS error at the storage boundary. */
function fsError(error: unknown, path: ObjectPath): StorageError {
  if (isMissing(error)) {
    return new StorageNotFoundError(path.toString(), { cause: error });
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new StorageOtherError(`${path.toString()}: ${detail}`, { cause: error });
}

function nativePath(space: FileSpace, path: ObjectPath): string {
  for (const part of path.parts) {
    if (part === '.' || part === '..') {
      throw new StorageInvalidPathError(`${path.toString()} (relative segments are not allowed)`);
    }
  }
  return join(space.base, ...path.parts);
}

function objectType(stats: Stats | undefined): ObjectType {
  if (!stats) return 'unknown';
  if (stats.isFile()) return 'file';
  if (stats.isDirectory()) return 'directory';
  if (stats.isSymbolicLink()) return 'symlink';
  return 'unknown';
}

function toObject(path: ObjectPath, stats: Stats | undefined): StorageObject {
  const type = objectType(stats);
  return {
    path,
    type,
    size: type === 'file' && stats ? stats.size : 0,
    internals: { backend: 'file' },
  };
}

function referencePath(reference: ObjectPath | StorageObject): ObjectPath {
  return isStorageObject(reference) ? reference.path : reference;
}

function handleSource(handle: FileHandle): ByteSource {
  return {
    read: async (target) => {
      const { bytesRead } = await handle.read(target, 0, target.length, null);
      return bytesRead;
    },
    close: () => handle.close(),
  };
}

async function writeAll(handle: FileHandle, chunk: Uint8Array): Promise<void> {
  let offset = 0;
  while (offset < chunk.length) {
    const { bytesWritten } = await handle.write(chunk, offset, chunk.length - offset);
    offset += bytesWritten;
  }
}

export class FileBackend implements StorageBackend {
  private readonly space: FileSpace;
  // Writers pull from readers during a copy, so the two never share permits.
  private readonly readers: Limited<FileSpace>;
  private readonly writers: Limited<FileSpace>;
  private readonly initialBufferSize: number;
  private readonly minimumBufferSize: number;
  private readonly log: StorageLogger;

  private constructor(root: string, options: FileBackendOptions) {
    const sizes = resolveBufferSizes({
      initialSize: options.initialBufferSize,
      minimumSize: options.minimumBufferSize,
    });
    const maxOpenFiles = options.maxOpenFiles ?? DEFAULT_MAX_OPEN_FILES;
    if (!Number.isInteger(maxOpenFiles) || maxOpenFiles < 1) {
      throw new StorageInvalidSettingsError(`maxOpenFiles must be at least 1, got ${maxOpenFiles}`);
    }

    this.space = { base: root };
    this.readers = new Limited(this.space, maxOpenFiles);
    this.writers = new Limited(this.space, maxOpenFiles);
    this.initialBufferSize = sizes.initialSize;
    this.minimumBufferSize = sizes.minimumSize;
    this.log = options.logger ?? silentLogger();
  }

  /**
   * Open a store rooted at `root`, which must be an existing directory.
   */
  static async connect(root: string, options: FileBackendOptions = {}): Promise<FileBackend> {
    let stats: Stats;
    try {
      stats = await stat(root);
    } catch (error) {
      throw fsError(error, ObjectPath.empty());
    }
    if (!stats.isDirectory()) {
      throw new StorageInvalidSettingsError(`root path ${root} is not a directory`);
    }
    return new FileBackend(root, options);
  }

  static builder(root: string): FileBackendBuilder {
    return new FileBackendBuilder(root);
  }

  get root(): string {
    return this.space.base;
  }

  backendType(): Backend {
    return 'file';
  }

  listObjects(prefix: ObjectPath): ObjectStream {
    return this.list(prefix);
  }

  listDirectory(dir: ObjectPath): ObjectStream {
    return this.listChildren(dir);
  }

  async getObject(path: ObjectPath): Promise<StorageObject> {
    const target = nativePath(this.space, path);
    try {
      return toObject(path, await lstat(target));
    } catch (error) {
      if (isMissing(error)) {
        throw fsError(error, path);
      }
      this.log.debug({ path: path.toString(), err: errnoCode(error) }, 'Unable to stat object');
      return toObject(path, undefined);
    }
  }

  async getFileStream(reference: ObjectPath | StorageObject): Promise<DataStream> {
    const path = referencePath(reference);
    const target = nativePath(this.space, path);

    let stats: Stats;
    try {
      stats = await lstat(target);
    } catch (error) {
      throw fsError(error, path);
    }
    if (!stats.isFile()) {
      throw new StorageNotFoundError(`${path.toString()} (not a file)`);
    }

    return this.readFile(path);
  }

  async deleteObject(reference: ObjectPath | StorageObject): Promise<void> {
    const path = referencePath(reference);
    const target = nativePath(this.space, path);

    let stats: Stats;
    try {
      stats = await lstat(target);
    } catch (error) {
      throw fsError(error, path);
    }

    if (stats.isDirectory()) {
      await this.deleteDirectory(path);
    } else {
      await this.removeFile(path);
    }
  }

  async writeFileFromStream(path: ObjectPath, stream: SourceStream): Promise<void> {
    const guard = await this.writers.take();
    try {
      const handle = await this.openForWrite(guard.value, path);

      let written: number;
      try {
        written = await this.drain(stream, handle, path);
        await handle.sync().catch((error: unknown) => {
          throw targetError(fsError(error, path), path.toString());
        });
      } catch (error) {
        await handle.close().catch((closeError: unknown) => {
          this.log.warn({ path: path.toString(), err: closeError }, 'Failed to close file after write error');
        });
        throw error;
      }

      await this.closeHandle(handle, path);
      this.log.debug({ path: path.toString(), bytes: written }, 'File written');
    } finally {
      guard.release();
    }
  }

  // ---- Listing ----

  private async *list(prefix: ObjectPath): AsyncGenerator<StorageObject, void, undefined> {
    // A directory prefix is listed itself; anything else through its parent.
    const start = prefix.isDirPrefix ? prefix.withoutTrailingSeparator() : prefix.pop();
    const merged = new MergedStreams<DirectoryEntry>([this.directoryEntries(start)]);

    for await (const entry of merged) {
      if (!entry.path.startsWith(prefix)) {
        continue;
      }
      if (entry.stats?.isDirectory()) {
        merged.push(this.directoryEntries(entry.path));
      }
      yield toObject(entry.path, entry.stats);
    }
  }

  private async *listChildren(dir: ObjectPath): AsyncGenerator<StorageObject, void, undefined> {
    const path = dir.withoutTrailingSeparator();
    const target = nativePath(this.space, path);

    let stats: Stats;
    try {
      stats = await lstat(target);
    } catch (error) {
      throw fsError(error, path);
    }
    if (!stats.isDirectory()) {
      throw new StorageInvalidPathError(`${path.toString()} is not a directory`);
    }

    for await (const entry of this.directoryEntries(path)) {
      yield toObject(entry.path, entry.stats);
    }
  }

  /** Entries of one directory; a directory that has vanished yields nothing. */
  private async *directoryEntries(dir: ObjectPath): AsyncGenerator<DirectoryEntry, void, undefined> {
    const target = nativePath(this.space, dir);

    let handle: Dir;
    try {
      handle = await opendir(target);
    } catch (error) {
      if (isMissing(error)) {
        this.log.trace({ path: dir.toString() }, 'Directory missing, nothing to list');
        return;
      }
      throw fsError(error, dir);
    }

    try {
      for await (const dirent of handle) {
        const path = dir.push(dirent.name);
        let stats: Stats | undefined;
        try {
          stats = await lstat(join(target, dirent.name));
        } catch (error) {
          this.log.trace({ path: path.toString(), err: errnoCode(error) }, 'Unable to stat entry');
          stats = undefined;
        }
        yield { path, stats };
      }
    } catch (error) {
      throw fsError(error, dir);
    }
  }

  // ---- Reading ----

  private async *readFile(path: ObjectPath): AsyncGenerator<Buffer, void, undefined> {
    const guard = await this.readers.take();
    try {
      let handle: FileHandle;
      try {
        handle = await open(nativePath(guard.value, path), 'r');
      } catch (error) {
        throw fsError(error, path);
      }

      yield* readerStream(handleSource(handle), {
        initialSize: this.initialBufferSize,
        minimumSize: this.minimumBufferSize,
        mapError: (error) => fsError(error, path),
      });
    } finally {
      guard.release();
    }
  }

  // ---- Writing and removal ----

  private async openForWrite(space: FileSpace, path: ObjectPath): Promise<FileHandle> {
    try {
      const target = nativePath(space, path);
      await this.clearTarget(path, target);
      await mkdir(dirname(target), { recursive: true });
      return await open(target, 'w');
    } catch (error) {
      throw targetError(isStorageError(error) ? error : fsError(error, path), path.toString());
    }
  }

  private async drain(stream: SourceStream, handle: FileHandle, path: ObjectPath): Promise<number> {
    const iterator = stream[Symbol.asyncIterator]();
    let written = 0;

    while (true) {
      let next: IteratorResult<Uint8Array>;
      try {
        next = await iterator.next();
      } catch (error) {
        throw sourceError(error);
      }
      if (next.done) {
        return written;
      }

      try {
        await writeAll(handle, next.value);
      } catch (error) {
        await iterator.return?.();
        throw targetError(fsError(error, path), path.toString());
      }
      written += next.value.length;
    }
  }

  private async closeHandle(handle: FileHandle, path: ObjectPath): Promise<void> {
    try {
      await handle.close();
    } catch (error) {
      throw targetError(fsError(error, path), path.toString());
    }
  }

  /** Remove whatever currently occupies `path` so a file can be created there. */
  private async clearTarget(path: ObjectPath, target: string): Promise<void> {
    let stats: Stats;
    try {
      stats = await lstat(target);
    } catch (error) {
      if (isMissing(error)) {
        return;
      }
      throw fsError(error, path);
    }

    if (stats.isDirectory()) {
      await this.deleteDirectory(path);
    } else {
      await this.removeFile(path);
    }
  }

  /**
   * Remove a directory tree: every non-directory first, then the
   * directories deepest first, then the directory itself.
   */
  private async deleteDirectory(path: ObjectPath): Promise<void> {
    const files: StorageObject[] = [];
    const directories: StorageObject[] = [];
    for await (const object of this.list(path.asDirectory())) {
      (object.type === 'directory' ? directories : files).push(object);
    }

    for (const file of files) {
      await this.removeFile(file.path);
    }

    directories.sort((a, b) => b.path.length - a.path.length);
    for (const directory of directories) {
      await this.removeDirectory(directory.path);
    }
    await this.removeDirectory(path.withoutTrailingSeparator());
  }

  private async removeFile(path: ObjectPath): Promise<void> {
    try {
      await unlink(nativePath(this.space, path));
    } catch (error) {
      throw fsError(error, path);
    }
    this.log.debug({ path: path.toString() }, 'Removed file');
  }

  private async removeDirectory(path: ObjectPath): Promise<void> {
    try {
      await rmdir(nativePath(this.space, path));
    } catch (error) {
      throw fsError(error, path);
    }
    this.log.debug({ path: path.toString() }, 'Removed directory');
  }
}

/** Collects FileBackend options before connecting. */
export class FileBackendBuilder {
  private readonly root: string;
  private readonly options: FileBackendOptions = {};

  constructor(root: string) {
    this.root = root;
  }

  bufferSizes(initial: number, minimum: number): this {
    this.options.initialBufferSize = initial;
    this.options.minimumBufferSize = minimum;
    return this;
  }

  maxOpenFiles(count: number): this {
    this.options.maxOpenFiles = count;
    return this;
  }

  logger(logger: StorageLogger): this {
    this.options.logger = logger;
    return this;
  }

  connect(): Promise<FileBackend> {
    return FileBackend.connect(this.root, this.options);
  }
}
