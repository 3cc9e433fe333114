// File content routes.
//
// GET /files/*  stream a file's content
// PUT /files/*  replace a file with the first part of a multipart upload

import { Readable } from 'node:stream';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';

// Import for type augmentation -- adds request.file() to FastifyRequest
import '@fastify/multipart';

import { StorageNotFoundError } from '../storage/errors.js';
import { UploadMissingFileError, UploadTooLargeError } from '../errors/index.js';

import { PathParamsSchema } from './serialize.js';

/** Pass chunks through while counting them. */
async function* counted(
  source: AsyncIterable<Uint8Array>,
  onChunk: (size: number) => void
): AsyncGenerator<Uint8Array, void, undefined> {
  for await (const chunk of source) {
    onChunk(chunk.length);
    yield chunk;
  }
}

const fileRoutes: FastifyPluginCallback = (instance, _options, done) => {
  const fastify = instance.withTypeProvider<ZodTypeProvider>();
  const uploadLimit = fastify.config.server.uploadLimit;

  fastify.get(
    '/files/*',
    {
      schema: {
        description: 'Download a file (application/octet-stream)',
        tags: ['Storage'],
        params: PathParamsSchema,
      },
    },
    async (request, reply) => {
      const path = request.params['*'];
      const object = await fastify.storage.getObject(path);
      if (object.type !== 'file') {
        throw new StorageNotFoundError(`${path} (not a file)`);
      }

      const stream = await fastify.storage.getFileStream(object);
      return reply
        .status(200)
        .header('Content-Type', 'application/octet-stream')
        .header('Content-Length', object.size.toString())
        .send(Readable.from(stream));
    }
  );

  fastify.put(
    '/files/*',
    {
      schema: {
        description: 'Upload a file as multipart/form-data, replacing anything at the path',
        tags: ['Storage'],
        params: PathParamsSchema,
        response: {
          201: z.object({
            path: z.string(),
            size: z.number().int().nonnegative(),
          }),
        },
      },
    },
    async (request, reply) => {
      const path = request.params['*'];
      // Oversized uploads end early with `truncated` set instead of failing.
      const data = await request.file({ limits: { fileSize: uploadLimit }, throwFileSizeLimit: false });
      if (!data) {
        throw new UploadMissingFileError('send a multipart/form-data request with a file field');
      }

      const discard = async (): Promise<void> => {
        await fastify.storage.deleteObject(path).catch((err: unknown) => {
          request.log.warn({ path, err }, 'Failed to remove partial upload');
        });
      };

      let size = 0;
      try {
        await fastify.storage.writeFileFromStream(
          path,
          counted(data.file, (bytes) => {
            size += bytes;
          })
        );
      } catch (error) {
        if (data.file.truncated) {
          await discard();
          throw new UploadTooLargeError(uploadLimit);
        }
        throw error;
      }

      if (data.file.truncated) {
        await discard();
        throw new UploadTooLargeError(uploadLimit);
      }

      request.log.info({ path, size, filename: data.filename }, 'File stored');
      return reply.status(201).send({ path, size });
    }
  );

  done();
};

export const fileRoutesPlugin = fp(fileRoutes, {
  name: 'file-routes',
  fastify: '5.x',
});
