import { ConfigSchema } from '@/config/schema.js';
import type { Config } from '@/config/index.js';

/** A validated test config storing files under `root`. */
export function testConfig(root: string, overrides: { uploadLimit?: number } = {}): Config {
  return ConfigSchema.parse({
    server: { host: '127.0.0.1', port: 3000, uploadLimit: overrides.uploadLimit ?? 1024 },
    logging: { level: 'fatal' },
    env: 'test',
    rateLimit: { global: 1000 },
    storage: { backend: 'file', file: { root, initialBufferSize: 4096, minimumBufferSize: 512 } },
  });
}

/** Multipart form data with a single file part. */
export function multipartBody(filename: string, content: Buffer): { body: Buffer; boundary: string } {
  const boundary = '----TestBoundary123';
  const body = Buffer.concat([
    Buffer.from(`--${boundary}\r\n`),
    Buffer.from(`Content-Disposition: form-data; name="file"; filename="${filename}"\r\n`),
    Buffer.from('Content-Type: application/octet-stream\r\n\r\n'),
    content,
    Buffer.from(`\r\n--${boundary}--\r\n`),
  ]);
  return { body, boundary };
}
