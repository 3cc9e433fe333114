// objstore library -- Example
//
// Demonstrates the FileStore API against a local directory:
//   1. Open a store on a directory (created if missing)
//   2. Write a file from a stream
//   3. Read its metadata and content back
//   4. List a directory and a prefix
//   5. Copy, move and delete
//
// Usage:
//   tsx examples/client.ts
//
// Environment variables:
//   STORE_ROOT  (optional) -- Directory to use (default: ./data/example)

import { mkdir } from 'node:fs/promises';
import { Readable } from 'node:stream';

import { pino } from 'pino';

import { FileStore, ObjectPath } from '../src/storage/index.js';

const STORE_ROOT = process.env.STORE_ROOT ?? './data/example';

async function main(): Promise<void> {
  const log = pino({ level: 'debug', transport: { target: 'pino-pretty' } });

  // 1. Open the store
  await mkdir(STORE_ROOT, { recursive: true });
  const store = await FileStore.file(STORE_ROOT, {
    initialBufferSize: 64 * 1024,
    minimumBufferSize: 4 * 1024,
    logger: log,
  });

  // 2. Write
  await store.writeFileFromStream('notes/hello.txt', Readable.from([Buffer.from('Hello, storage!\n')]));

  // 3. Metadata and content
  const object = await store.getObject('notes/hello.txt');
  log.info({ path: object.path.toString(), type: object.type, size: object.size }, 'Stored object');

  const chunks: Buffer[] = [];
  for await (const chunk of await store.getFileStream(object)) {
    chunks.push(chunk);
  }
  log.info({ content: Buffer.concat(chunks).toString('utf-8') }, 'Read back');

  // 4. Listings
  for await (const entry of store.listDirectory('notes/')) {
    log.info({ path: entry.path.toString(), type: entry.type }, 'Directory entry');
  }
  for await (const entry of store.listObjects(ObjectPath.parse('no'))) {
    log.info({ path: entry.path.toString() }, 'Prefix match');
  }

  // 5. Copy, move, delete
  await store.copyFile('notes/hello.txt', 'notes/copy.txt');
  await store.moveFile('notes/copy.txt', 'archive/hello.txt');
  await store.deleteObject('notes/hello.txt');
  await store.deleteObject('archive/hello.txt');
}

main().catch((err: unknown) => {
  console.error('Example failed:', err);
  process.exit(1);
});
