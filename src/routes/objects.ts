// Object routes -- metadata, recursive listing and deletion.
//
// GET    /objects?prefix=  NDJSON stream of every object under the prefix
// GET    /objects/*        metadata of one object
// DELETE /objects/*        delete a file, or a directory and its contents

import { Readable } from 'node:stream';

import type { FastifyPluginCallback } from 'fastify';
import fp from 'fastify-plugin';
import type { ZodTypeProvider } from 'fastify-type-provider-zod';
import { z } from 'zod';

import { ndjson, ObjectResponseSchema, PathParamsSchema, serializeObject } from './serialize.js';

const NDJSON = 'application/x-ndjson';

const objectRoutes: FastifyPluginCallback = (instance, _options, done) => {
  const fastify = instance.withTypeProvider<ZodTypeProvider>();

  fastify.get(
    '/objects',
    {
      schema: {
        description: 'List every object whose path starts with the prefix, one JSON object per line',
        tags: ['Storage'],
        querystring: z.object({
          prefix: z.string().default('').describe('Path prefix; end with "/" to list a directory'),
        }),
      },
    },
    async (request, reply) => {
      const listing = fastify.storage.listObjects(request.query.prefix)[Symbol.asyncIterator]();

      // Pull the first entry before committing to a 200.
      const first = await listing.next();
      reply.status(200).type(NDJSON);
      if (first.done) {
        return reply.send('');
      }
      return reply.send(Readable.from(ndjson(first.value, listing)));
    }
  );

  fastify.get(
    '/objects/*',
    {
      schema: {
        description: 'Metadata of a single object',
        tags: ['Storage'],
        params: PathParamsSchema,
        response: { 200: ObjectResponseSchema },
      },
    },
    async (request) => {
      const object = await fastify.storage.getObject(request.params['*']);
      return serializeObject(object);
    }
  );

  fastify.delete(
    '/objects/*',
    {
      schema: {
        description: 'Delete a file, or a directory and everything beneath it',
        tags: ['Storage'],
        params: PathParamsSchema,
      },
    },
    async (request, reply) => {
      const path = request.params['*'];
      await fastify.storage.deleteObject(path);
      request.log.info({ path }, 'Object deleted');
      return reply.status(204).send();
    }
  );

  done();
};

export const objectRoutesPlugin = fp(objectRoutes, {
  name: 'object-routes',
  fastify: '5.x',
});
