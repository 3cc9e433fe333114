// Placeholder backend that supports nothing. Useful for wiring and tests
// where a FileStore is required but never expected to be touched.

import { StorageNotSupportedError, targetError } from '../errors.js';
import type { ObjectPath } from '../object-path.js';
import type { Backend, DataStream, ObjectStream, StorageBackend, StorageObject } from '../types.js';

export class StubBackend implements StorageBackend {
  readonly name: string;

  constructor(name = 'stub') {
    this.name = name;
  }

  backendType(): Backend {
    return 'stub';
  }

  listObjects(_prefix: ObjectPath): ObjectStream {
    return this.failingStream('listObjects');
  }

  listDirectory(_dir: ObjectPath): ObjectStream {
    return this.failingStream('listDirectory');
  }

  async getObject(_path: ObjectPath): Promise<StorageObject> {
    throw this.unsupported('getObject');
  }

  async getFileStream(_reference: ObjectPath | StorageObject): Promise<DataStream> {
    throw this.unsupported('getFileStream');
  }

  async deleteObject(_reference: ObjectPath | StorageObject): Promise<void> {
    throw this.unsupported('deleteObject');
  }

  async writeFileFromStream(path: ObjectPath): Promise<void> {
    throw targetError(this.unsupported('writeFileFromStream'), path.toString());
  }

  private unsupported(operation: string): Error {
    return new StorageNotSupportedError(`${this.name} backend does not support ${operation}`);
  }

  private async *failingStream(operation: string): AsyncGenerator<StorageObject, void, undefined> {
    throw this.unsupported(operation);
  }
}
